/**
 * HTTP transport to the JMAP server under test.
 * Implements the JMAP Core (RFC 8620) session and API request patterns.
 */
import type { Config } from '../config/schema.js';
import type { Logger } from '../config/logger.js';
import { z } from 'zod';
import type { JMAPMethodCall, JMAPRequest } from '../types/jmap.js';
import { ConformanceError } from '../errors.js';
import { DEFAULT_USING, type Transport } from '../harness/request.js';

/** Extracted session data from JMAP session response */
export interface JMAPSession {
  apiUrl: string;
  accountId: string;
  capabilities: Record<string, unknown>;
  state: string;
}

/** The parts of the session resource (RFC 8620 Section 2) the harness relies on */
const sessionResponseSchema = z.object({
  capabilities: z.record(z.string(), z.unknown()),
  primaryAccounts: z.record(z.string(), z.string()),
  apiUrl: z.string(),
  state: z.string(),
});

/** Session fetch timeout (quick check) */
const SESSION_TIMEOUT = 5000;

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

/**
 * JMAP client for the server under test.
 * Handles authentication and session discovery, and carries batches verbatim:
 * it never inspects method responses, which is the harness's job.
 */
export class JMAPClient implements Transport {
  private session: JMAPSession | null = null;
  private readonly config: Config;
  private readonly logger: Logger;

  constructor(config: Config, logger: Logger) {
    this.config = config;
    this.logger = logger;
  }

  /**
   * Generate authentication headers based on configured auth method.
   * @returns Headers object with Authorization and Content-Type
   */
  private getAuthHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
    };

    if (this.config.JMAP_AUTH_METHOD === 'basic') {
      const credentials = `${this.config.JMAP_USERNAME}:${this.config.JMAP_PASSWORD}`;
      const token = Buffer.from(credentials).toString('base64');
      headers['Authorization'] = `Basic ${token}`;
    } else {
      headers['Authorization'] = `Bearer ${this.config.JMAP_TOKEN}`;
    }

    return headers;
  }

  /**
   * Fetch JMAP session from the server.
   * Discovers apiUrl, the primary mail account, and capabilities.
   * @throws ConformanceError if session fetch fails or no mail account found
   */
  async fetchSession(): Promise<JMAPSession> {
    this.logger.info({ url: this.config.JMAP_SESSION_URL }, 'Fetching JMAP session...');

    let response: Response;
    try {
      response = await fetch(this.config.JMAP_SESSION_URL, {
        method: 'GET',
        headers: this.getAuthHeaders(),
        signal: AbortSignal.timeout(SESSION_TIMEOUT),
      });
    } catch (error) {
      if (isTimeout(error)) {
        throw ConformanceError.timeout('session fetch');
      }
      throw ConformanceError.transportFailure(error);
    }

    if (!response.ok) {
      throw ConformanceError.httpError(response.status, response.statusText);
    }

    const parsed = sessionResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw ConformanceError.malformedResponse(
        `session resource is incomplete (${parsed.error.issues.map((issue) => issue.path.join('.')).join(', ')})`
      );
    }
    const sessionData = parsed.data;

    const accountId = sessionData.primaryAccounts['urn:ietf:params:jmap:mail'];
    if (!accountId) {
      throw new ConformanceError(
        'No mail account found in JMAP session',
        'noMailAccount',
        'The test account must have a primary account for urn:ietf:params:jmap:mail.'
      );
    }

    this.session = {
      apiUrl: sessionData.apiUrl,
      accountId,
      capabilities: sessionData.capabilities,
      state: sessionData.state,
    };

    this.logger.info({ accountId, apiUrl: sessionData.apiUrl }, 'JMAP session established');

    return this.session;
  }

  /**
   * Get the current session.
   * @throws ConformanceError if session not initialized
   */
  getSession(): JMAPSession {
    if (!this.session) {
      throw ConformanceError.sessionNotInitialized();
    }
    return this.session;
  }

  /**
   * POST one batch to the API endpoint and return the decoded body unchecked.
   * @throws ConformanceError on HTTP errors, timeouts, network failures and undecodable bodies
   */
  async send(methodCalls: JMAPMethodCall[], using: string[] = DEFAULT_USING): Promise<unknown> {
    const session = this.getSession();

    const requestBody: JMAPRequest = {
      using,
      methodCalls,
    };

    this.logger.debug(
      { methodCount: methodCalls.length, methods: methodCalls.map((mc) => mc[0]) },
      'Sending JMAP request'
    );

    let response: Response;
    try {
      response = await fetch(session.apiUrl, {
        method: 'POST',
        headers: this.getAuthHeaders(),
        body: JSON.stringify(requestBody),
        signal: AbortSignal.timeout(this.config.JMAP_REQUEST_TIMEOUT),
      });
    } catch (error) {
      if (isTimeout(error)) {
        throw ConformanceError.timeout('JMAP request');
      }
      throw ConformanceError.transportFailure(error);
    }

    if (!response.ok) {
      throw ConformanceError.httpError(response.status, response.statusText);
    }

    try {
      return await response.json();
    } catch (error) {
      throw ConformanceError.malformedResponse(
        `body is not JSON (${error instanceof Error ? error.message : String(error)})`
      );
    }
  }
}
