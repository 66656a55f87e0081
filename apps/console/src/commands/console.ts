import type { Command } from 'commander';
import { ConsoleSession, PolicyStore, type CoreLogger, type StorageBackend } from '@tierdeck/core';
import type { ConsoleConfig } from '../lib/config';
import { createFileLogger } from '../lib/logger';
import { S3StorageBackend, createS3Client } from '../lib/s3Backend';
import { runTerminal } from '../terminal/loop';
import { resolveConfig } from './shared';

export type ConsoleDependencies = {
  loggerFactory?: (config: ConsoleConfig) => CoreLogger;
  backendFactory?: (config: ConsoleConfig, logger: CoreLogger) => StorageBackend;
  terminal?: (session: ConsoleSession, logger: CoreLogger) => Promise<void>;
};

const defaultBackendFactory = (config: ConsoleConfig, logger: CoreLogger): StorageBackend =>
  new S3StorageBackend(createS3Client(config.s3), logger);

const defaultTerminal = (session: ConsoleSession, logger: CoreLogger): Promise<void> =>
  runTerminal(session, { logger });

/**
 * Starts the interactive console. The policy file is loaded before the terminal is taken
 * over, so a corrupt file aborts with a plain error message.
 */
export async function startConsole(config: ConsoleConfig, deps: ConsoleDependencies = {}): Promise<ConsoleSession> {
  const loggerFactory: (config: ConsoleConfig) => CoreLogger = deps.loggerFactory ?? createFileLogger;
  const logger = loggerFactory(config);
  const policyStore = PolicyStore.fromFile(config.policyFile);
  await policyStore.init();
  logger.info({ policyFile: config.policyFile, policies: policyStore.size }, 'policies loaded');

  const backend = (deps.backendFactory ?? defaultBackendFactory)(config, logger);
  const session = new ConsoleSession({
    backend,
    policyStore,
    logger,
    restoreDays: config.restoreDays,
    statusLimit: config.statusLimit
  });

  logger.info({ region: config.s3.region, endpoint: config.s3.endpoint ?? null }, 'console started');
  await (deps.terminal ?? defaultTerminal)(session, logger);
  logger.info({}, 'console finished');
  return session;
}

export function registerConsoleCommand(program: Command, deps: ConsoleDependencies = {}): void {
  program.action(async () => {
    await startConsole(resolveConfig(program), deps);
  });
}
