import path from 'path';
import { ManifestService, ModuleDescriptor, SourceFragment, SourceManifest } from '../builder/types';
import { externalSourcePath } from '../builder/file-system';
import { SourceLocation } from '../utils/errors';
import { createComponentLogger } from '../utils/logger';

const logger = createComponentLogger('manifest');

export interface ManifestSegment {
  /** First and last staged lines (1-based, inclusive) owned by this segment. */
  startLine: number;
  endLine: number;
  file: string;
  originLine: number;
}

export class LineManifest implements SourceManifest {
  constructor(
    readonly segments: readonly ManifestSegment[],
    private fallbackFile: string
  ) {}

  locate(stagedLine: number): SourceLocation {
    const segment = this.segments.find(s => stagedLine >= s.startLine && stagedLine <= s.endLine);
    if (!segment) {
      return { file: this.fallbackFile, line: stagedLine };
    }
    return { file: segment.file, line: segment.originLine + (stagedLine - segment.startLine) };
  }
}

/**
 * Joins literal fragments in order. Each fragment starts on a fresh line so
 * line ownership stays unambiguous.
 */
export function assembleSource(fragments: readonly SourceFragment[]): string {
  return fragments
    .map(fragment => (fragment.code === '' || fragment.code.endsWith('\n') ? fragment.code : `${fragment.code}\n`))
    .join('');
}

export function countLines(text: string): number {
  if (text.length === 0) return 0;
  const newlines = text.split('\n').length - 1;
  return text.endsWith('\n') ? newlines : newlines + 1;
}

export function buildManifest(module: ModuleDescriptor, rawSource: string): LineManifest {
  const { source } = module.options;

  if (source.kind === 'path') {
    const file = externalSourcePath(module.file, source.path);
    const lines = countLines(rawSource);
    const segments = lines > 0 ? [{ startLine: 1, endLine: lines, file, originLine: 1 }] : [];
    return new LineManifest(segments, file);
  }

  const segments: ManifestSegment[] = [];
  let nextLine = 1;
  for (const fragment of source.fragments) {
    const lines = countLines(fragment.code);
    if (lines === 0) continue;
    segments.push({ startLine: nextLine, endLine: nextLine + lines - 1, file: fragment.file, originLine: fragment.line });
    nextLine += lines;
  }
  return new LineManifest(segments, module.file);
}

export class ManifestBuilder implements ManifestService {
  create<M extends ModuleDescriptor>(module: M, rawSource: string): M {
    const manifest = buildManifest(module, rawSource);
    logger.debug('Created manifest', { module: module.name, segments: manifest.segments.length });
    return { ...module, manifest };
  }

  unload<M extends ModuleDescriptor>(module: M): M {
    return { ...module, manifest: undefined };
  }
}

export interface CompilerDiagnostic {
  file?: string;
  line?: number;
  message: string;
}

const DIAGNOSTIC_PATTERN = /^(.+?):(\d+):(\d+): error: (.*)$/;

/**
 * Picks the first `file:line:col: error:` line out of compiler output. Lines
 * in the staged source are mapped back through the manifest.
 */
export function remapDiagnostic(
  output: string,
  stagedSourcePath: string,
  manifest: SourceManifest | undefined
): CompilerDiagnostic {
  for (const line of output.split(/\r?\n/)) {
    const match = DIAGNOSTIC_PATTERN.exec(line.trim());
    if (!match) continue;

    const [, file, lineText, , message] = match;
    const lineNumber = parseInt(lineText, 10);

    if (manifest && path.basename(file) === path.basename(stagedSourcePath)) {
      const origin = manifest.locate(lineNumber);
      return { file: origin.file, line: origin.line, message };
    }
    return { file, line: lineNumber, message };
  }

  return { message: output.trim() || 'compilation failed' };
}
