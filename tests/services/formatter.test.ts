import { AUTOGENERATED_HEADER, SourceFormatter, formatSource } from '../../src/services/formatter';

describe('formatSource', () => {
  const formatter: SourceFormatter & { formatString: jest.Mock<Promise<string>, [string]> } = {
    formatString: jest.fn(async (source: string) => source.replace(' =1', ' = 1')),
  };

  beforeEach(() => {
    formatter.formatString.mockClear();
  });

  it('should pass ordinary source through the formatter', async () => {
    await expect(formatSource('const a =1;', formatter)).resolves.toBe('const a = 1;');
    expect(formatter.formatString).toHaveBeenCalledTimes(1);
  });

  it('should leave generated source untouched', async () => {
    const generated = `${AUTOGENERATED_HEADER}\nconst a =1;`;

    await expect(formatSource(generated, formatter)).resolves.toBe(generated);
    expect(formatter.formatString).not.toHaveBeenCalled();
  });
});
