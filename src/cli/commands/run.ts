/**
 * Run command - execute the conformance suite and print a report.
 */
import { loadConfig } from '../../config/schema.js';
import { createLogger } from '../../config/logger.js';
import { formatStartupError } from '../../errors.js';
import { JMAPClient } from '../../jmap/client.js';
import { JmapServerAdapter } from '../../suite/adapter.js';
import { buildSuite } from '../../suite/index.js';
import { runSuite, type RunSummary, type TestOutcome } from '../../suite/runner.js';

const ICONS = { pass: '[OK]', fail: '[FAIL]', skip: '[SKIP]' } as const;

/**
 * Render one test outcome: a status line, then every failed or skipped
 * assertion with its diagnostics indented beneath it.
 */
export function formatOutcome(outcome: TestOutcome): string[] {
  const lines = [`${ICONS[outcome.status]} ${outcome.name}`];
  for (const entry of outcome.entries) {
    if (entry.status === 'pass') {
      continue;
    }
    if (entry.status === 'skip') {
      lines.push(...entry.diagnostics.map((line) => `    ${line}`));
      continue;
    }
    lines.push(`    not ok - ${entry.description}`);
    for (const diagnostic of entry.diagnostics) {
      lines.push(...diagnostic.split('\n').map((line) => `      ${line}`));
    }
  }
  return lines;
}

export function formatSummary(summary: RunSummary): string {
  return `${summary.passed} passed, ${summary.failed} failed, ${summary.skipped} skipped`;
}

/**
 * Run the suite against the configured server.
 * @returns process exit code: 0 when nothing failed
 */
export async function runConformance(options: { strict?: boolean; filter?: string }): Promise<number> {
  let sessionUrl: string | undefined;

  try {
    const config = loadConfig();
    sessionUrl = config.JMAP_SESSION_URL;
    const logger = createLogger(config.LOG_LEVEL);

    const client = new JMAPClient(config, logger);
    const adapter = new JmapServerAdapter(
      client,
      {
        JMAP_STRICT_PROPERTIES: config.JMAP_STRICT_PROPERTIES || options.strict === true,
        JMAP_ACCOUNT_PRISTINE: config.JMAP_ACCOUNT_PRISTINE,
      },
      logger
    );

    const summary = await runSuite(buildSuite(), adapter, { logger, filter: options.filter });

    console.log(`\n=== JMAP Conformance: ${sessionUrl} ===\n`);
    for (const outcome of summary.outcomes) {
      console.log(formatOutcome(outcome).join('\n'));
    }
    console.log(`\n${formatSummary(summary)}\n`);

    return summary.failed > 0 ? 1 : 0;
  } catch (error) {
    const errorMessage = formatStartupError(
      error instanceof Error ? error : new Error(String(error)),
      sessionUrl
    );
    console.error(`\n${errorMessage}\n`);
    return 1;
  }
}
