import fs from 'fs/promises';
import path from 'path';
import { StagingService } from '../builder/types';
import { config } from '../utils/config';
import { createComponentLogger } from '../utils/logger';

const logger = createComponentLogger('staging');

export const STAGING_NAMESPACE = '.nifwright_compiler';

/**
 * `<root>/.nifwright_compiler/<env>/<module>`. Distinct modules never share a
 * directory; two builds of the same module in the same environment do.
 */
export function stagingDirectory(
  moduleName: string,
  env: string = config.toolchain.buildEnv,
  root: string = config.toolchain.stagingRoot
): string {
  return path.posix.join(root.replace(/\\/g, '/'), STAGING_NAMESPACE, env, moduleName);
}

export class FileStagingService implements StagingService {
  constructor(private root: string = config.toolchain.stagingRoot) {}

  async stage(moduleName: string, env: string): Promise<string> {
    const directory = stagingDirectory(moduleName, env, this.root);
    await fs.mkdir(directory, { recursive: true });
    logger.debug('Prepared staging directory', { module: moduleName, directory });
    return directory;
  }
}
