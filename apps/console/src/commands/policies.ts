import type { Command } from 'commander';
import { PolicyStore, describeMask, tierLabel, type MigrationPolicy } from '@tierdeck/core';
import { formatOutput, resolveConfig } from './shared';

export function formatPolicyLine(policy: MigrationPolicy): string {
  const schedule = policy.scheduled ? ` schedule=${policy.schedule ?? 'unset'}` : '';
  return `${policy.id}  ${policy.bucket}  ${describeMask(policy.mask)} -> ${tierLabel(policy.targetTier)}${schedule}`;
}

export function registerPolicyCommands(program: Command): void {
  const policies = program.command('policies').description('Inspect saved migration policies');

  policies
    .command('list')
    .description('Print saved policies without starting the console')
    .option('--json', 'Output raw JSON')
    .action(async (cmdOptions: { json?: boolean }) => {
      const config = resolveConfig(program);
      const store = PolicyStore.fromFile(config.policyFile);
      await store.init();
      const records = store.list();
      if (cmdOptions.json) {
        formatOutput(records, true);
        return;
      }
      if (records.length === 0) {
        formatOutput(`No saved policies in ${config.policyFile}`, false);
        return;
      }
      for (const policy of records) {
        formatOutput(formatPolicyLine(policy), false);
      }
    });
}
