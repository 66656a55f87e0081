import pino, { stdTimeFunctions, type Logger, type LoggerOptions } from 'pino';
import type { ConsoleConfig } from './config';

export const createLoggerOptions = (level: string): LoggerOptions => ({
  level,
  base: undefined,
  timestamp: stdTimeFunctions.isoTime
});

/**
 * The console owns the terminal, so log records go to a file instead of stdout. Writes are
 * synchronous to keep the tail of the log when the process exits from raw mode.
 */
export function createFileLogger(config: Pick<ConsoleConfig, 'logFile' | 'logLevel'>): Logger {
  const destination = pino.destination({ dest: config.logFile, mkdir: true, sync: true });
  return pino(createLoggerOptions(config.logLevel), destination);
}
