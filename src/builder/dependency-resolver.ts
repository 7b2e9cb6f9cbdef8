import path from 'path';
import { parseZigSource, ParsedSource, SourceReference } from '../parsers/zig';
import { DependencyError, errorMessage } from '../utils/errors';
import { createComponentLogger } from '../utils/logger';
import { SourceFileSystem } from './types';
import { nodeFileSystem } from './file-system';

const logger = createComponentLogger('dependency-resolver');

export interface DependencyResolverOptions {
  rootDir?: string;
  fileSystem?: SourceFileSystem;
}

interface PendingFile {
  parsed: ParsedSource;
  /** Absolute path of the file whose references are being followed. */
  path: string;
  /** How the file is reported in errors. */
  displayPath: string;
}

/**
 * Dependency Resolver
 * Computes the transitive set of files a module's source pulls in, so the host
 * can rebuild when any of them changes.
 */
export class DependencyResolver {
  private rootDir: string;
  private fileSystem: SourceFileSystem;

  constructor(options: DependencyResolverOptions = {}) {
    this.rootDir = path.resolve(options.rootDir ?? process.cwd());
    this.fileSystem = options.fileSystem ?? nodeFileSystem;
  }

  async resolve(initialSource: string, initialPath: string): Promise<string[]> {
    return this.resolveParsed(parseZigSource(initialSource), initialPath);
  }

  /**
   * Worklist traversal. A path enters `visited` before it is read, so every
   * file is read at most once and cycles terminate.
   */
  async resolveParsed(initial: ParsedSource, initialPath: string): Promise<string[]> {
    const visited = new Set<string>();
    const absoluteInitial = path.resolve(this.rootDir, initialPath);
    const worklist: PendingFile[] = [
      { parsed: initial, path: absoluteInitial, displayPath: this.relativePath(absoluteInitial) },
    ];

    for (let i = 0; i < worklist.length; i++) {
      const current = worklist[i];

      for (const reference of current.parsed.dependencies) {
        if (!isFileReference(reference)) continue;

        const absolute = path.resolve(path.dirname(current.path), reference.target);
        const dependencyPath = this.relativePath(absolute);
        if (visited.has(dependencyPath)) continue;
        visited.add(dependencyPath);

        // Embedded files are tracked for rebuilds but never parsed
        if (reference.kind === 'embed') continue;

        const source = await this.readDependency(absolute, dependencyPath, current, reference);
        worklist.push({ parsed: parseZigSource(source), path: absolute, displayPath: dependencyPath });
      }
    }

    const dependencies = Array.from(visited).sort();
    logger.debug('Resolved dependencies', { initialPath, count: dependencies.length });
    return dependencies;
  }

  relativePath(absolutePath: string): string {
    return path.relative(this.rootDir, absolutePath).split(path.sep).join('/');
  }

  private async readDependency(
    absolute: string,
    dependencyPath: string,
    referrer: PendingFile,
    reference: SourceReference
  ): Promise<string> {
    try {
      return await this.fileSystem.readFile(absolute);
    } catch (error) {
      throw new DependencyError(`cannot read dependency ${dependencyPath}: ${errorMessage(error)}`, {
        file: referrer.displayPath,
        line: reference.line,
        dependency: dependencyPath,
      });
    }
  }
}

/**
 * `@import` of a package name ("std", "beam") is not a file; only paths ending
 * in `.zig` are. Every `@embedFile` target is a file.
 */
export function isFileReference(reference: SourceReference): boolean {
  return reference.kind === 'embed' || reference.target.endsWith('.zig');
}
