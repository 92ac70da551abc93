import os from 'os';
import path from 'path';
import { StorageLocationError } from './errors';
import { isLogLevel, LogLevel } from './logger';

const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

export const APP_CONFIG = {
  name: 'vocab-srs',
  dataDirName: '.vocab-srs',
  dataFileName: 'language_learning_data.json',
  defaultLogLevel: DEFAULT_LOG_LEVEL,
};

export const ENV_KEYS = {
  dataFile: 'VOCAB_SRS_DATA_FILE',
  home: 'VOCAB_SRS_HOME',
  logLevel: 'VOCAB_SRS_LOG_LEVEL',
} as const;

export interface AppConfig {
  dataFile: string;
  logLevel: LogLevel;
}

export type Env = Record<string, string | undefined>;

function readEnv(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function safeHomeDir(): string {
  try {
    return os.homedir();
  } catch {
    return '';
  }
}

function resolveDataFile(env: Env, home: string, cwd: string): string {
  const override = readEnv(env, ENV_KEYS.dataFile);
  if (override) {
    return path.resolve(cwd, override);
  }
  const baseDir = readEnv(env, ENV_KEYS.home) ?? (home.trim() || undefined);
  if (!baseDir) {
    throw new StorageLocationError(
      `No storage location: set ${ENV_KEYS.dataFile} or ${ENV_KEYS.home}, or run with a home directory`,
    );
  }
  return path.resolve(cwd, baseDir, APP_CONFIG.dataDirName, APP_CONFIG.dataFileName);
}

/**
 * Resolves runtime settings from environment variables.
 * Throws {@link StorageLocationError} when no data file location can be determined.
 */
export function loadConfig(env: Env = process.env, home: string = safeHomeDir(), cwd: string = process.cwd()): AppConfig {
  const requestedLevel = readEnv(env, ENV_KEYS.logLevel)?.toLowerCase();
  return {
    dataFile: resolveDataFile(env, home, cwd),
    logLevel: isLogLevel(requestedLevel) ? requestedLevel : APP_CONFIG.defaultLogLevel,
  };
}
