import { createModuleDescriptor } from '../../src/builder/pipeline-orchestrator';
import { ManifestBuilder, assembleSource, buildManifest, countLines } from '../../src/services/manifest';
import { SourceFragment } from '../../src/builder/types';
import { literalOptions } from '../helpers/fake-services';

const fragments: SourceFragment[] = [
  { code: 'const a = 1;\nconst b = 2;\n', file: 'lib/math_nif.ex', line: 10 },
  { code: 'pub fn f() void {}', file: 'lib/math_nif.ex', line: 30 },
];

function literalModule() {
  return createModuleDescriptor(literalOptions('', [], { source: { kind: 'literal', fragments } }));
}

describe('assembleSource', () => {
  it('should start every fragment on a fresh line', () => {
    expect(assembleSource(fragments)).toBe('const a = 1;\nconst b = 2;\npub fn f() void {}\n');
  });

  it('should not add lines for empty fragments', () => {
    expect(assembleSource([{ code: '', file: 'x.ex', line: 1 }, ...fragments])).toBe(assembleSource(fragments));
  });
});

describe('countLines', () => {
  it('should count a final line without a newline', () => {
    expect(countLines('')).toBe(0);
    expect(countLines('a')).toBe(1);
    expect(countLines('a\n')).toBe(1);
    expect(countLines('a\nb')).toBe(2);
  });
});

describe('buildManifest', () => {
  it('should map staged lines back to the fragment they came from', () => {
    const manifest = buildManifest(literalModule(), assembleSource(fragments));

    expect(manifest.locate(1)).toEqual({ file: 'lib/math_nif.ex', line: 10 });
    expect(manifest.locate(2)).toEqual({ file: 'lib/math_nif.ex', line: 11 });
    expect(manifest.locate(3)).toEqual({ file: 'lib/math_nif.ex', line: 30 });
  });

  it('should fall back to the declaring file past the last fragment', () => {
    const manifest = buildManifest(literalModule(), assembleSource(fragments));

    expect(manifest.locate(4)).toEqual({ file: '/project/lib/math_nif.ex', line: 4 });
  });

  it('should map an external source file onto itself', () => {
    const module = createModuleDescriptor(
      literalOptions('', [], { source: { kind: 'path', path: '../native/math.zig' } })
    );

    const manifest = buildManifest(module, 'a\nb\nc');

    expect(manifest.segments).toEqual([{ startLine: 1, endLine: 3, file: '/project/native/math.zig', originLine: 1 }]);
    expect(manifest.locate(3)).toEqual({ file: '/project/native/math.zig', line: 3 });
  });
});

describe('buildManifest with a code directory', () => {
  it('should still place an external source beside the declaring file', () => {
    const module = createModuleDescriptor(
      literalOptions('', [], { dir: '/project/priv', source: { kind: 'path', path: 'math.zig' } })
    );

    expect(buildManifest(module, 'a\n').locate(1)).toEqual({ file: '/project/lib/math.zig', line: 1 });
  });
});

describe('ManifestBuilder', () => {
  it('should return a new descriptor carrying the manifest and release it on unload', () => {
    const builder = new ManifestBuilder();
    const module = literalModule();

    const created = builder.create(module, assembleSource(fragments));
    const unloaded = builder.unload(created);

    expect(module.manifest).toBeUndefined();
    expect(created.manifest?.locate(3)).toEqual({ file: 'lib/math_nif.ex', line: 30 });
    expect(unloaded.manifest).toBeUndefined();
    expect(unloaded.name).toBe('MathNif');
  });
});
