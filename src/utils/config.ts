import { config as dotenvConfig } from 'dotenv';
import os from 'os';
import path from 'path';

// Load environment variables
dotenvConfig();

export interface LoggingConfig {
  level: string;
  file: string;
}

export interface ToolchainConfig {
  zigExecutable: string;
  stagingRoot: string;
  buildEnv: string;
}

export interface Config {
  logging: LoggingConfig;
  toolchain: ToolchainConfig;
  nodeEnv: string;
}

function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key] ?? defaultValue;
  if (!value) {
    throw new Error(`Environment variable ${key} is required but not set`);
  }
  return value;
}

const nodeEnv = getEnvVar('NODE_ENV', 'development');

export const config: Config = {
  logging: {
    level: getEnvVar('LOG_LEVEL', 'info'),
    file: getEnvVar('LOG_FILE', path.join(process.cwd(), 'logs', 'nifwright.log')),
  },
  toolchain: {
    zigExecutable: getEnvVar('ZIG_EXECUTABLE', 'zig'),
    // Windows temp paths use backslashes; the compiler wants forward slashes
    stagingRoot: getEnvVar('NIFWRIGHT_STAGING_ROOT', os.tmpdir()).replace(/\\/g, '/'),
    buildEnv: getEnvVar('NIFWRIGHT_BUILD_ENV', nodeEnv),
  },
  nodeEnv,
};
