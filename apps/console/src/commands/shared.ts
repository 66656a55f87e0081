import type { Command } from 'commander';
import {
  applyConfigOverrides,
  loadConsoleConfig,
  type ConsoleConfig,
  type ConsoleConfigOverrides
} from '../lib/config';

export type GlobalOptions = ConsoleConfigOverrides;

export function resolveConfig(program: Command): ConsoleConfig {
  const options = program.opts<GlobalOptions>();
  return applyConfigOverrides(loadConsoleConfig(), options);
}

export function formatOutput(payload: unknown, asJson: boolean | undefined): void {
  if (asJson) {
    console.log(JSON.stringify(payload, null, 2));
    return;
  }
  console.log(payload);
}
