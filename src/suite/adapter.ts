/**
 * Server adapters hand out accounts for tests to run in.
 */
import type { Config } from '../config/schema.js';
import type { Logger } from '../config/logger.js';
import { createMailbox, fetchMailbox, MailboxHandle, type AccountSession, type MailboxCreate } from '../entities/mailbox.js';
import type { KnownProperties } from '../entities/known-properties.js';
import type { AssertionContext } from '../harness/assertions.js';
import type { BatchResult } from '../harness/batch.js';
import type { CreationResolver } from '../harness/creation.js';
import type { Reporter } from '../harness/reporter.js';
import { sendBatch, type BatchRequest, type Transport } from '../harness/request.js';
import type { JMAPClient } from '../jmap/client.js';

/** Answer from an adapter that cannot provide what a test needs; the test is skipped */
export interface Unsupported {
  readonly unsupported: true;
  readonly reason: string;
}

export function unsupported(reason: string): Unsupported {
  return { unsupported: true, reason };
}

export function isUnsupported(value: AccountHandle | Unsupported): value is Unsupported {
  return !(value instanceof AccountHandle);
}

export interface AccountOptions {
  logger?: Logger;
  strictProperties?: boolean;
  knownProperties?: KnownProperties;
  using?: string[];
}

/**
 * One account on the server under test, with the transport that reaches it.
 */
export class AccountHandle implements AccountSession {
  readonly accountId: string;
  readonly transport: Transport;
  private readonly options: AccountOptions;

  constructor(accountId: string, transport: Transport, options: AccountOptions = {}) {
    this.accountId = accountId;
    this.transport = transport;
    this.options = options;
  }

  /** Send a batch, resolving `#creationId` references against `references` when given */
  send(request: BatchRequest, references?: CreationResolver): Promise<BatchResult> {
    return sendBatch(this.transport, request, { ...this.options, references });
  }

  /** Everything requestAndAssert needs to run against this account */
  assertionContext(reporter: Reporter): AssertionContext {
    return {
      transport: this.transport,
      reporter,
      logger: this.options.logger,
      using: this.options.using,
      strictProperties: this.options.strictProperties,
      knownProperties: this.options.knownProperties,
    };
  }

  createMailbox(properties: MailboxCreate): Promise<MailboxHandle> {
    return createMailbox(this, properties);
  }

  async getMailbox(id: string): Promise<MailboxHandle | undefined> {
    const mailbox = await fetchMailbox(this, id);
    return mailbox ? new MailboxHandle(this, mailbox) : undefined;
  }
}

export interface ServerAdapter {
  /** Any account the tests may write to */
  anyAccount(): Promise<AccountHandle>;
  /** An account guaranteed to hold no data, or Unsupported */
  pristineAccount(): Promise<AccountHandle | Unsupported>;
}

/**
 * Adapter for a live server reached over HTTP. It knows a single account, and
 * offers it as pristine only when JMAP_ACCOUNT_PRISTINE says it is.
 */
export class JmapServerAdapter implements ServerAdapter {
  private readonly client: JMAPClient;
  private readonly config: Pick<Config, 'JMAP_STRICT_PROPERTIES' | 'JMAP_ACCOUNT_PRISTINE'>;
  private readonly logger: Logger;
  private account: Promise<AccountHandle> | null = null;

  constructor(
    client: JMAPClient,
    config: Pick<Config, 'JMAP_STRICT_PROPERTIES' | 'JMAP_ACCOUNT_PRISTINE'>,
    logger: Logger
  ) {
    this.client = client;
    this.config = config;
    this.logger = logger;
  }

  anyAccount(): Promise<AccountHandle> {
    if (!this.account) {
      this.account = this.client.fetchSession().then(
        (session) =>
          new AccountHandle(session.accountId, this.client, {
            logger: this.logger,
            strictProperties: this.config.JMAP_STRICT_PROPERTIES,
          }),
        (error: unknown) => {
          // Let the next test try again
          this.account = null;
          throw error;
        }
      );
    }
    return this.account;
  }

  async pristineAccount(): Promise<AccountHandle | Unsupported> {
    if (!this.config.JMAP_ACCOUNT_PRISTINE) {
      return unsupported('the configured account is not declared pristine (set JMAP_ACCOUNT_PRISTINE=1)');
    }
    return this.anyAccount();
  }
}
