import { Command } from 'commander';
import { registerConsoleCommand, type ConsoleDependencies } from './commands/console';
import { registerPolicyCommands } from './commands/policies';
import { LOG_LEVELS } from './lib/config';

export function createProgram(deps: ConsoleDependencies = {}): Command {
  const program = new Command();

  program
    .name('tierdeck')
    .description('Interactive console for moving S3 objects between storage tiers')
    .version('0.1.0')
    .option('--policy-file <path>', 'Policy file location (TIERDECK_POLICY_FILE)')
    .option('--region <region>', 'Default S3 region (AWS_REGION)')
    .option('--endpoint <url>', 'Custom S3 endpoint (TIERDECK_S3_ENDPOINT)')
    .option('--log-file <path>', 'Log file location (TIERDECK_LOG_FILE)')
    .option('--log-level <level>', `Log level: ${LOG_LEVELS.join(', ')} (TIERDECK_LOG_LEVEL)`);

  registerConsoleCommand(program, deps);
  registerPolicyCommands(program);

  return program;
}

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(message);
    process.exitCode = 1;
  }
}

if (require.main === module) {
  void main();
}
