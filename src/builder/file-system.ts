import fs from 'fs/promises';
import path from 'path';
import { SourceFileSystem } from './types';

export const nodeFileSystem: SourceFileSystem = {
  readFile: filePath => fs.readFile(filePath, 'utf-8'),
  writeFile: (filePath, contents) => fs.writeFile(filePath, contents, 'utf-8'),
};

/**
 * An external source sits relative to the host file that declares it. The `dir`
 * option only moves where literal source resolves its imports.
 */
export function externalSourcePath(declaringFile: string, sourcePath: string): string {
  return path.resolve(path.dirname(declaringFile), sourcePath);
}
