/**
 * CLI entry point using Commander.js.
 * Runs the conformance suite (default) or checks the configuration.
 */
import { Command } from 'commander';

const VERSION = '0.1.0'; // Match package.json

/**
 * Create and configure the CLI program.
 * @returns Configured Commander program
 */
export function createCLI(): Command {
  const program = new Command();

  program
    .name('jmap-conformance')
    .description('Conformance test harness for JMAP Mail servers')
    .version(VERSION);

  program
    .command('run', { isDefault: true })
    .description('Run the conformance suite against the configured server')
    .option('--strict', 'report properties the protocol does not define (same as JMAP_STRICT_PROPERTIES=1)')
    .option('--filter <text>', 'only run tests whose name contains <text>')
    .action(async (options: { strict?: boolean; filter?: string }) => {
      const { runConformance } = await import('./commands/run.js');
      process.exitCode = await runConformance(options);
    });

  program
    .command('check')
    .description('Verify configuration and test connection')
    .action(async () => {
      const { runCheck } = await import('./commands/check.js');
      process.exitCode = await runCheck();
    });

  return program;
}

/**
 * Run the CLI program.
 * Uses parseAsync for proper async action handling.
 */
export async function runCLI(argv: string[] = process.argv): Promise<void> {
  const program = createCLI();
  await program.parseAsync(argv);
}
