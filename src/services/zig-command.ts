import { spawn } from 'child_process';
import { EventEmitter } from 'events';
import { Readable, Writable } from 'stream';
import { NativeCompiler, SourceFileSystem, StagedModule } from '../builder/types';
import { nodeFileSystem } from '../builder/file-system';
import { config } from '../utils/config';
import { CompilerError, ErrorContext } from '../utils/errors';
import { createComponentLogger } from '../utils/logger';
import { SourceFormatter } from './formatter';
import { remapDiagnostic } from './manifest';

const logger = createComponentLogger('zig-command');

export interface CommandResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  cwd?: string;
  input?: string;
}

export type CommandRunner = (command: string, args: string[], options: CommandOptions) => Promise<CommandResult>;

/** The parts of a child process the runner talks to. */
export interface SpawnedProcess extends EventEmitter {
  stdin: Writable;
  stdout: Readable;
  stderr: Readable;
}

export type ProcessSpawner = (command: string, args: string[], options: { cwd?: string }) => SpawnedProcess;

export function createCommandRunner(spawnProcess: ProcessSpawner): CommandRunner {
  return (command, args, options) =>
    new Promise((resolve, reject) => {
      const child = spawnProcess(command, args, { cwd: options.cwd });
      let stdout = '';
      let stderr = '';

      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');
      child.stdout.on('data', (chunk: string) => (stdout += chunk));
      child.stderr.on('data', (chunk: string) => (stderr += chunk));
      child.on('error', reject);
      child.on('close', (code: number | null) => resolve({ code, stdout, stderr }));

      // A process may exit before reading all of its input; 'close' still reports how it ended
      child.stdin.on('error', (error: Error) => {
        if ('code' in error && error.code === 'EPIPE') {
          logger.debug('Process closed its input early', { command });
          return;
        }
        reject(error);
      });
      child.stdin.end(options.input ?? '');
    });
}

export const spawnCommand: CommandRunner = createCommandRunner((command, args, options) =>
  spawn(command, args, { cwd: options.cwd })
);

/**
 * Thin wrapper over the `zig` executable: `zig fmt` for formatting and
 * `zig build-lib` for the real compile, run from the staging directory.
 */
export class ZigCommand implements NativeCompiler, SourceFormatter {
  constructor(
    private executable: string = config.toolchain.zigExecutable,
    private run: CommandRunner = spawnCommand,
    private fileSystem: SourceFileSystem = nodeFileSystem
  ) {}

  async formatString(source: string): Promise<string> {
    const result = await this.run(this.executable, ['fmt', '--stdin'], { input: source });
    if (result.code !== 0) {
      logger.debug('zig fmt rejected source, leaving it unchanged', { stderr: result.stderr.trim() });
      return source;
    }
    return result.stdout;
  }

  async format(filePath: string): Promise<void> {
    const source = await this.fileSystem.readFile(filePath);
    const formatted = await this.formatString(source);
    if (formatted !== source) {
      await this.fileSystem.writeFile(filePath, formatted);
    }
  }

  async compile<M extends StagedModule>(module: M): Promise<M> {
    const args = ['build-lib', 'module.zig', '-dynamic', '-lc', '-O', 'ReleaseSafe', '--name', module.name];
    logger.debug('Compiling module', { module: module.name, cwd: module.stagingDir, args });

    const result = await this.run(this.executable, args, { cwd: module.stagingDir });
    if (result.code !== 0) {
      const diagnostic = remapDiagnostic(result.stderr, module.stagedSourcePath, module.manifest);
      const context: ErrorContext = { module: module.name };
      if (diagnostic.file !== undefined) {
        context.file = diagnostic.file;
        context.line = diagnostic.line;
      } else {
        context.file = module.file;
      }
      throw new CompilerError(diagnostic.message, context);
    }

    return module;
  }
}
