import { EventEmitter } from 'events';
import { PassThrough, Writable } from 'stream';
import { createModuleDescriptor } from '../../src/builder/pipeline-orchestrator';
import { StagedModule } from '../../src/builder/types';
import { buildManifest, remapDiagnostic } from '../../src/services/manifest';
import { CommandOptions, CommandResult, ProcessSpawner, ZigCommand, createCommandRunner } from '../../src/services/zig-command';
import { CompilerError } from '../../src/utils/errors';
import { MemoryFileSystem, literalOptions } from '../helpers/fake-services';

const stagedSourcePath = '/staging/test/MathNif/.MathNif.zig';

function stagedModule(): StagedModule {
  const module = createModuleDescriptor(literalOptions('a\nb\nc\nd\ne\n', []));
  return {
    ...module,
    stagingDir: '/staging/test/MathNif',
    stagedSourcePath,
    manifest: buildManifest(module, 'a\nb\nc\nd\ne\n'),
  };
}

function runner(result: CommandResult) {
  return jest.fn<Promise<CommandResult>, [string, string[], CommandOptions]>(async () => result);
}

describe('remapDiagnostic', () => {
  const manifest = stagedModule().manifest;

  it('should map errors in the staged source through the manifest', () => {
    const stderr = `${stagedSourcePath}:3:5: error: use of undeclared identifier 'x'\n    x += 1;\n`;

    expect(remapDiagnostic(stderr, stagedSourcePath, manifest)).toEqual({
      file: '/project/lib/math_nif.ex',
      line: 6,
      message: "use of undeclared identifier 'x'",
    });
  });

  it('should keep locations in other files as reported', () => {
    expect(remapDiagnostic('module.zig:7:1: error: expected type', stagedSourcePath, manifest)).toEqual({
      file: 'module.zig',
      line: 7,
      message: 'expected type',
    });
  });

  it('should fall back to the raw output when no location is found', () => {
    expect(remapDiagnostic('  linker crashed  \n', stagedSourcePath, manifest)).toEqual({ message: 'linker crashed' });
  });
});

describe('ZigCommand', () => {
  it('should return formatted output from zig fmt', async () => {
    const run = runner({ code: 0, stdout: 'const a = 1;\n', stderr: '' });

    const formatted = await new ZigCommand('zig', run).formatString('const a=1;');

    expect(formatted).toBe('const a = 1;\n');
    expect(run).toHaveBeenCalledWith('zig', ['fmt', '--stdin'], { input: 'const a=1;' });
  });

  it('should leave source that does not parse unchanged', async () => {
    const run = runner({ code: 1, stdout: '', stderr: '<stdin>:1:1: error: expected expression' });

    await expect(new ZigCommand('zig', run).formatString('const = ;')).resolves.toBe('const = ;');
  });

  it('should rewrite a file only when formatting changes it', async () => {
    const fileSystem = new MemoryFileSystem({ '/staging/module.zig': 'const a=1;' });
    const command = new ZigCommand('zig', runner({ code: 0, stdout: 'const a = 1;\n', stderr: '' }), fileSystem);

    await command.format('/staging/module.zig');

    expect(fileSystem.files.get('/staging/module.zig')).toBe('const a = 1;\n');
  });

  it('should compile from the staging directory', async () => {
    const run = runner({ code: 0, stdout: '', stderr: '' });
    const module = stagedModule();

    await expect(new ZigCommand('/opt/zig/zig', run).compile(module)).resolves.toBe(module);
    expect(run).toHaveBeenCalledWith(
      '/opt/zig/zig',
      ['build-lib', 'module.zig', '-dynamic', '-lc', '-O', 'ReleaseSafe', '--name', 'MathNif'],
      { cwd: '/staging/test/MathNif' }
    );
  });

  it('should raise a compiler error located in the original source', async () => {
    const run = runner({ code: 1, stdout: '', stderr: `${stagedSourcePath}:2:1: error: expected ';'` });

    const attempt = new ZigCommand('zig', run).compile(stagedModule());

    await expect(attempt).rejects.toBeInstanceOf(CompilerError);
    await expect(attempt).rejects.toThrow("/project/lib/math_nif.ex:5: expected ';'");
  });
});

class FakeProcess extends EventEmitter {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly stdin: Writable;

  constructor(inputError: Error | null = null) {
    super();
    this.stdin = new Writable({
      write: (_chunk, _encoding, callback) => callback(inputError),
    });
  }
}

function inputError(code: string): Error {
  return Object.assign(new Error(`write ${code}`), { code });
}

describe('createCommandRunner', () => {
  it('should collect output and the exit code', async () => {
    const child = new FakeProcess();
    const spawnProcess = jest.fn<FakeProcess, Parameters<ProcessSpawner>>(() => child);

    const pending = createCommandRunner(spawnProcess)('zig', ['build-lib', 'module.zig'], { cwd: '/staging' });
    child.stdout.write('built');
    child.stderr.write('warning: unused');
    setImmediate(() => child.emit('close', 1));

    await expect(pending).resolves.toEqual({ code: 1, stdout: 'built', stderr: 'warning: unused' });
    expect(spawnProcess).toHaveBeenCalledWith('zig', ['build-lib', 'module.zig'], { cwd: '/staging' });
  });

  it('should report the exit code when the process stops reading its input', async () => {
    const child = new FakeProcess(inputError('EPIPE'));

    const pending = createCommandRunner(() => child)('zig', ['fmt', '--stdin'], { input: 'const a = 1;' });
    child.stdin.once('error', () => child.emit('close', 0));

    await expect(pending).resolves.toEqual({ code: 0, stdout: '', stderr: '' });
  });

  it('should reject on other input failures', async () => {
    const child = new FakeProcess(inputError('EACCES'));

    const pending = createCommandRunner(() => child)('zig', ['fmt', '--stdin'], { input: 'const a = 1;' });

    await expect(pending).rejects.toThrow('write EACCES');
  });

  it('should reject when the process cannot start', async () => {
    const child = new FakeProcess();

    const pending = createCommandRunner(() => child)('zig', ['version'], {});
    child.emit('error', new Error('spawn zig ENOENT'));

    await expect(pending).rejects.toThrow('spawn zig ENOENT');
  });
});
