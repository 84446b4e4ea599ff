/**
 * Logging for hotmic.
 *
 * All components log through scoped electron-log loggers so every line is
 * tagged with its origin, e.g. `[StateMachine] recording -> processing`.
 * The console transport stays at `warn` by default: the interactive terminal
 * surface owns stdout while a session is running.
 */

import log from 'electron-log/node';
import type { LogFunctions } from 'electron-log';
import { homedir } from 'os';
import { join } from 'path';

export type ScopedLogger = LogFunctions;

export interface LoggingOptions {
  verbose?: boolean;
  /** Disable console output entirely (the file log keeps everything) */
  silentConsole?: boolean;
}

export function getLogDirectory(): string {
  return join(homedir(), '.hotmic', 'logs');
}

export function getLogFilePath(): string {
  return join(getLogDirectory(), 'hotmic.log');
}

/**
 * Configure transports. Safe to call more than once; the last call wins.
 */
export function configureLogging(options: LoggingOptions = {}): void {
  log.transports.file.resolvePathFn = () => getLogFilePath();
  log.transports.file.level = options.verbose ? 'debug' : 'info';
  log.transports.file.maxSize = 5 * 1024 * 1024;

  if (options.silentConsole) {
    log.transports.console.level = false;
  } else {
    log.transports.console.level = options.verbose ? 'debug' : 'warn';
  }
}

export function createLogger(scope: string): ScopedLogger {
  return log.scope(scope);
}
