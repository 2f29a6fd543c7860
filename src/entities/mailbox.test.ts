import { describe, it, expect, beforeEach } from 'vitest';
import { FakeJmapServer } from '../../tests/support/fake-server.js';
import { AccountHandle } from '../suite/adapter.js';
import { createMailbox, fetchMailbox } from './mailbox.js';

describe('Mailbox handles', () => {
  let server: FakeJmapServer;
  let account: AccountHandle;

  beforeEach(() => {
    server = new FakeJmapServer();
    account = new AccountHandle(server.accountId, server);
  });

  it('creates a mailbox and loads its server state', async () => {
    const mailbox = await createMailbox(account, { name: 'Receipts' });

    expect(mailbox.id).toBe('mb-1');
    expect(mailbox.get('name')).toBe('Receipts');
    expect(mailbox.get('sortOrder')).toBe(0);
    expect(mailbox.get('parentId')).toBeNull();
    expect(server.received.map((batch) => batch.map(([name]) => name))).toEqual([['Mailbox/set'], ['Mailbox/get']]);
  });

  it('throws when the server refuses to create the mailbox', async () => {
    await expect(createMailbox(account, { name: '' })).rejects.toMatchObject({
      type: 'unresolvedCreationReference',
      message: 'Creation id "mailbox" was not created: the server rejected it (invalidProperties)',
    });
  });

  it('refreshes after an accepted update', async () => {
    const mailbox = await account.createMailbox({ name: 'Receipts' });

    await mailbox.update({ sortOrder: 7, name: 'Invoices' });

    expect(mailbox.get('sortOrder')).toBe(7);
    expect(mailbox.snapshot().name).toBe('Invoices');
  });

  it('keeps its cache when an update is rejected', async () => {
    const mailbox = await account.createMailbox({ name: 'Receipts' });
    server.mailboxes.delete(mailbox.id);

    const batch = await mailbox.update({ sortOrder: 3 });

    expect(batch.responseFor('single')?.arguments.notUpdated).toEqual({ [mailbox.id]: { type: 'notFound' } });
    expect(mailbox.get('sortOrder')).toBe(0);
  });

  it('cannot be used after destroy', async () => {
    const mailbox = await account.createMailbox({ name: 'Receipts' });

    await mailbox.destroy();

    expect(mailbox.destroyed).toBe(true);
    expect(server.mailboxes.has('mb-1')).toBe(false);
    expect(() => mailbox.get('name')).toThrow('Mailbox mb-1 has been destroyed');
  });

  it('reports a mailbox the server no longer has', async () => {
    const mailbox = await account.createMailbox({ name: 'Receipts' });
    server.mailboxes.delete(mailbox.id);

    await expect(mailbox.refresh()).rejects.toMatchObject({ type: 'notFound', message: 'Mailbox mb-1 was not found' });
    expect(mailbox.destroyed).toBe(true);
  });

  it('returns undefined for an unknown id', async () => {
    expect(await fetchMailbox(account, 'mb-404')).toBeUndefined();
    expect(await account.getMailbox('mb-404')).toBeUndefined();
  });

  it('finds a mailbox that already exists', async () => {
    const seeded = server.seedMailbox('Archive', { role: 'archive' });

    const mailbox = await account.getMailbox(seeded.id);

    expect(mailbox?.get('role')).toBe('archive');
  });

  it('rejects a mailbox with properties of the wrong type', async () => {
    const broken = new AccountHandle('account-1', {
      send: async () => ({
        methodResponses: [['Mailbox/get', { list: [{ id: 'mb-9', name: 5 }], notFound: [] }, 'single']],
      }),
    });

    await expect(fetchMailbox(broken, 'mb-9')).rejects.toMatchObject({ type: 'invalidEntity' });
  });
});
