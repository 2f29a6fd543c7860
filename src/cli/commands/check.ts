/**
 * Check command - verify configuration and test connection.
 * Helps users diagnose configuration issues before a run.
 */
import { loadConfig } from '../../config/schema.js';
import { createLogger } from '../../config/logger.js';
import { JMAPClient } from '../../jmap/client.js';

interface CheckResult {
  name: string;
  status: 'ok' | 'warning' | 'error';
  message: string;
}

/**
 * Format check result with status indicator.
 */
function formatResult(result: CheckResult): string {
  const icons = { ok: '[OK]', warning: '[WARN]', error: '[FAIL]' };
  return `${icons[result.status]} ${result.name}: ${result.message}`;
}

/**
 * Check environment configuration.
 */
export function checkEnvironment(env: NodeJS.ProcessEnv = process.env): CheckResult[] {
  const results: CheckResult[] = [];

  const jmapUrl = env.JMAP_SESSION_URL;
  if (jmapUrl) {
    results.push({ name: 'JMAP URL', status: 'ok', message: jmapUrl });
  } else {
    results.push({ name: 'JMAP URL', status: 'error', message: 'JMAP_SESSION_URL not set' });
  }

  const authMethod = env.JMAP_AUTH_METHOD ?? 'basic';
  if (authMethod === 'basic') {
    const missing = ['JMAP_USERNAME', 'JMAP_PASSWORD'].filter((name) => !env[name]);
    if (missing.length === 0) {
      results.push({ name: 'Basic Auth', status: 'ok', message: 'Credentials configured' });
    } else {
      results.push({ name: 'Basic Auth', status: 'error', message: `Missing: ${missing.join(', ')}` });
    }
  } else if (authMethod === 'bearer') {
    if (env.JMAP_TOKEN) {
      results.push({ name: 'Bearer Token', status: 'ok', message: 'Token configured' });
    } else {
      results.push({ name: 'Bearer Token', status: 'error', message: 'JMAP_TOKEN not set' });
    }
  } else {
    results.push({ name: 'Auth Method', status: 'error', message: `Unsupported auth method: ${authMethod}` });
  }

  const strict = env.JMAP_STRICT_PROPERTIES;
  results.push({
    name: 'Strict Properties',
    status: 'ok',
    message: strict && strict !== '0' ? 'enabled' : 'disabled',
  });

  const pristine = env.JMAP_ACCOUNT_PRISTINE;
  if (pristine && pristine !== '0') {
    results.push({ name: 'Pristine Account', status: 'ok', message: 'pristine-only tests will run' });
  } else {
    results.push({ name: 'Pristine Account', status: 'warning', message: 'pristine-only tests will be skipped' });
  }

  return results;
}

/**
 * Test JMAP connection.
 */
async function checkConnection(): Promise<CheckResult> {
  try {
    const config = loadConfig();
    const logger = createLogger('error');
    const client = new JMAPClient(config, logger);

    const session = await client.fetchSession();
    return {
      name: 'Connection',
      status: 'ok',
      message: `Connected (Account: ${session.accountId})`,
    };
  } catch (error) {
    return {
      name: 'Connection',
      status: 'error',
      message: error instanceof Error ? error.message : String(error),
    };
  }
}

/**
 * Run configuration and connection checks.
 * @returns process exit code
 */
export async function runCheck(): Promise<number> {
  console.log('\n=== JMAP Conformance - Configuration Check ===\n');

  console.log('Environment Configuration:');
  const envResults = checkEnvironment();
  for (const result of envResults) {
    console.log(`  ${formatResult(result)}`);
  }

  if (envResults.some((r) => r.status === 'error')) {
    console.log('\nConfiguration incomplete. Set the missing environment variables.\n');
    return 1;
  }

  console.log('\nConnection Test:');
  const connResult = await checkConnection();
  console.log(`  ${formatResult(connResult)}`);

  if (connResult.status === 'error') {
    console.log('\nConnection failed. Check your configuration and network.\n');
    return 1;
  }

  console.log('\nAll checks passed! The server is ready for a conformance run.\n');
  return 0;
}
