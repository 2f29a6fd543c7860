/**
 * Mailbox handles: a server id plus the last properties the server reported.
 * Sugar over the harness for tests that need a mailbox to exist.
 */
import { z } from 'zod';
import { ConformanceError } from '../errors.js';
import type { BatchResult } from '../harness/batch.js';
import { isPlainObject } from '../harness/matcher.js';
import { SHORTHAND_CALL_ID, type BatchRequest } from '../harness/request.js';
import type { Mailbox, MailboxRights } from '../types/jmap.js';

/** What a handle needs from its account: where to send batches */
export interface AccountSession {
  readonly accountId: string;
  send(request: BatchRequest): Promise<BatchResult>;
}

const mailboxRightsSchema: z.ZodType<MailboxRights> = z.object({
  mayReadItems: z.boolean(),
  mayAddItems: z.boolean(),
  mayRemoveItems: z.boolean(),
  maySetSeen: z.boolean(),
  maySetKeywords: z.boolean(),
  mayCreateChild: z.boolean(),
  mayRename: z.boolean(),
  mayDelete: z.boolean(),
  maySubmit: z.boolean(),
});

export const mailboxSchema: z.ZodType<Mailbox> = z.object({
  id: z.string(),
  name: z.string(),
  parentId: z.string().nullable(),
  role: z.string().nullable(),
  sortOrder: z.number().int().nonnegative(),
  totalEmails: z.number().int().nonnegative(),
  unreadEmails: z.number().int().nonnegative(),
  totalThreads: z.number().int().nonnegative(),
  unreadThreads: z.number().int().nonnegative(),
  myRights: mailboxRightsSchema,
  isSubscribed: z.boolean(),
});

/** Properties a client may set when creating a mailbox */
export interface MailboxCreate {
  name: string;
  parentId?: string | null;
  role?: string | null;
  sortOrder?: number;
  isSubscribed?: boolean;
}

export type MailboxUpdate = Partial<MailboxCreate>;

/** Creation id used by {@link createMailbox} */
const CREATION_ID = 'mailbox';

function parseMailbox(id: string, value: unknown): Mailbox {
  const parsed = mailboxSchema.safeParse(value);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw ConformanceError.invalidEntity('Mailbox', id, detail);
  }
  return parsed.data;
}

/**
 * Fetch one mailbox by id.
 * @returns undefined when the server lists the id in `notFound` or omits it
 * @throws ConformanceError (type `invalidEntity`) when the returned mailbox does not validate
 */
export async function fetchMailbox(account: AccountSession, id: string): Promise<Mailbox | undefined> {
  const batch = await account.send({ 'Mailbox/get': { accountId: account.accountId, ids: [id] } });
  const list = batch.responseFor(SHORTHAND_CALL_ID)?.arguments.list;
  if (!Array.isArray(list)) {
    return undefined;
  }
  const found: unknown = list.find((item: unknown) => isPlainObject(item) && item.id === id);
  return found === undefined ? undefined : parseMailbox(id, found);
}

export class MailboxHandle {
  readonly id: string;
  private readonly account: AccountSession;
  private cached: Mailbox | null;

  constructor(account: AccountSession, properties: Mailbox) {
    this.account = account;
    this.id = properties.id;
    this.cached = properties;
  }

  get destroyed(): boolean {
    return this.cached === null;
  }

  private current(): Mailbox {
    if (!this.cached) {
      throw ConformanceError.entityDestroyed('Mailbox', this.id);
    }
    return this.cached;
  }

  /**
   * Last known value of one property.
   * @throws ConformanceError (type `entityDestroyed`) after a successful destroy()
   */
  get<K extends keyof Mailbox>(key: K): Mailbox[K] {
    return this.current()[key];
  }

  snapshot(): Readonly<Mailbox> {
    return { ...this.current() };
  }

  /**
   * Replace the cached properties with what the server reports now.
   * @throws ConformanceError (type `notFound`) when the server no longer has the mailbox
   */
  async refresh(): Promise<this> {
    this.current();
    const mailbox = await fetchMailbox(this.account, this.id);
    if (!mailbox) {
      this.cached = null;
      throw ConformanceError.entityNotFound('Mailbox', this.id);
    }
    this.cached = mailbox;
    return this;
  }

  /**
   * Send `Mailbox/set update` and refresh the cache when the server accepts it.
   * The batch is returned so tests can assert on a rejection.
   */
  async update(patch: MailboxUpdate): Promise<BatchResult> {
    this.current();
    const batch = await this.account.send({
      'Mailbox/set': { accountId: this.account.accountId, update: { [this.id]: patch } },
    });
    const updated = batch.responseFor(SHORTHAND_CALL_ID)?.arguments.updated;
    if (isPlainObject(updated) && Object.hasOwn(updated, this.id)) {
      await this.refresh();
    }
    return batch;
  }

  /**
   * Send `Mailbox/set destroy`; once the server confirms, the handle is unusable.
   */
  async destroy(): Promise<BatchResult> {
    this.current();
    const batch = await this.account.send({
      'Mailbox/set': { accountId: this.account.accountId, destroy: [this.id] },
    });
    const destroyed = batch.responseFor(SHORTHAND_CALL_ID)?.arguments.destroyed;
    if (Array.isArray(destroyed) && destroyed.includes(this.id)) {
      this.cached = null;
    }
    return batch;
  }
}

/**
 * Create a mailbox and return a handle loaded with its full server state.
 * @throws ConformanceError (type `unresolvedCreationReference`) when the server did not create it
 */
export async function createMailbox(account: AccountSession, properties: MailboxCreate): Promise<MailboxHandle> {
  const batch = await account.send({
    'Mailbox/set': { accountId: account.accountId, create: { [CREATION_ID]: { ...properties } } },
  });
  const id = batch.createdId(CREATION_ID);

  const mailbox = await fetchMailbox(account, id);
  if (!mailbox) {
    throw ConformanceError.entityNotFound('Mailbox', id);
  }
  return new MailboxHandle(account, mailbox);
}
