import { AppConfig, Env, loadConfig } from '../config';
import { StorageLocationError } from '../errors';
import { DeckLibrary } from '../library';
import { createLogger, LogSink } from '../logger';
import { createReadlineIO, PromptIO } from './io';
import { runMenu, MenuOptions } from './menu';

const LOG_TAG = '[CLI]';

export interface MainOptions extends MenuOptions {
  env?: Env;
  home?: string;
  io?: PromptIO;
  logSink?: LogSink;
}

/** Starts the interactive tool. Resolves to the process exit code. */
export async function main(options: MainOptions = {}): Promise<number> {
  const sink = options.logSink ?? console;

  let config: AppConfig;
  try {
    config = loadConfig(options.env, options.home);
  } catch (error) {
    if (!(error instanceof StorageLocationError)) {
      throw error;
    }
    sink.error(`${LOG_TAG} ${error.message}`);
    return 1;
  }

  const logger = createLogger(config.logLevel, sink);
  logger.debug(`${LOG_TAG} Using data file ${config.dataFile}`);
  const library = DeckLibrary.fromFile(config.dataFile, { logger });

  const io = options.io ?? createReadlineIO();
  try {
    await runMenu(library, io, { random: options.random });
  } finally {
    io.close();
  }
  return 0;
}
