import { formatConsoleLine, logger } from '../../src/utils/logger';

describe('formatConsoleLine', () => {
  it('should show the component and small metadata', () => {
    const line = formatConsoleLine({
      timestamp: '12:00:00',
      level: 'warn',
      message: 'Module build aborted',
      component: 'nif-builder',
      service: 'nifwright',
      module: 'MathNif',
    });

    expect(line).toBe('12:00:00 [warn]: Module build aborted (nif-builder) {"module":"MathNif"}');
  });

  it('should omit metadata too large for one line', () => {
    const line = formatConsoleLine({
      timestamp: '12:00:00',
      level: 'debug',
      message: 'Resolved dependencies',
      dependencies: Array.from({ length: 40 }, (_, index) => `native/file_${index}.zig`),
    });

    expect(line).toBe('12:00:00 [debug]: Resolved dependencies');
  });
});

describe('logger', () => {
  it('should stay silent under test', () => {
    expect(logger.silent).toBe(true);
  });
});
