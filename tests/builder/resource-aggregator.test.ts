import { addNifResources, augmentExports, nifResources } from '../../src/builder/resource-aggregator';
import { ConcurrencyMode, ExportRecord, ResourceResolver, VerifiedModule } from '../../src/builder/types';
import { createModuleDescriptor } from '../../src/builder/pipeline-orchestrator';
import { literalOptions } from '../helpers/fake-services';

function record(name: string, concurrency: ConcurrencyMode): ExportRecord {
  return {
    name,
    concurrency,
    signature: { params: [], returns: 'void' },
    options: {},
    doc: null,
    resources: [],
  };
}

function verifiedModule(exports: ExportRecord[]): VerifiedModule {
  return {
    ...createModuleDescriptor(literalOptions('', [])),
    stagingDir: '/staging/test/MathNif',
    stagedSourcePath: '/staging/test/MathNif/.MathNif.zig',
    parsed: { dependencies: [], declarations: [] },
    dependencies: [],
    semaExports: [],
    exports,
  };
}

describe('nifResources', () => {
  it('should require nothing for synchronous exports', () => {
    expect(nifResources(record('add', 'synchronous'))).toEqual([]);
  });

  it.each([
    ['threaded', 'ThreadResource_work'],
    ['yielding', 'YieldingResource_work'],
    ['dirty_cpu', 'DirtyResource_work'],
    ['dirty_io', 'DirtyResource_work'],
  ] as const)('should require one root resource for %s exports', (mode, name) => {
    expect(nifResources(record('work', mode))).toEqual([{ kind: 'root', name, export: 'work' }]);
  });
});

describe('augmentExports', () => {
  it('should compute each export independently of the others', () => {
    const alone = augmentExports([record('mul', 'threaded')]);
    const together = augmentExports([record('add', 'synchronous'), record('mul', 'threaded')]);

    expect(together[1].resources).toEqual(alone[0].resources);
    expect(together[0].resources).toEqual([]);
  });
});

describe('addNifResources', () => {
  it('should append per-export resources to the module resource list', () => {
    const module = addNifResources(verifiedModule([record('add', 'synchronous'), record('mul', 'threaded')]));

    expect(module.resources).toEqual([{ kind: 'root', name: 'ThreadResource_mul', export: 'mul' }]);
    expect(module.exports.map(e => e.resources.length)).toEqual([0, 1]);
  });

  it('should keep resources that share a name across exports', () => {
    const shared: ResourceResolver = r => (r.concurrency === 'synchronous' ? [] : [{ kind: 'root', name: 'Pool', export: r.name }]);

    const module = addNifResources(verifiedModule([record('a', 'dirty_cpu'), record('b', 'dirty_cpu')]), shared);

    expect(module.resources).toEqual([
      { kind: 'root', name: 'Pool', export: 'a' },
      { kind: 'root', name: 'Pool', export: 'b' },
    ]);
  });

  it('should not modify the input module', () => {
    const input = verifiedModule([record('mul', 'yielding')]);

    addNifResources(input);

    expect(input.resources).toEqual([]);
    expect(input.exports[0].resources).toEqual([]);
  });
});
