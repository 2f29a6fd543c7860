import { describe, it, expect } from 'vitest';
import {
  CreationResolver,
  extractCreateSpec,
  extractCreated,
  extractNotCreated,
  extractResultIds,
  substituteCreationReferences,
} from './creation.js';

const setResponse = {
  accountId: 'account-1',
  created: {
    new: { id: 'mb-7', totalEmails: 0 },
    noid: {},
  },
  notCreated: {
    bad: { type: 'invalidProperties', properties: ['name'], description: 'name is required' },
  },
};

describe('extractCreateSpec', () => {
  it('returns the create map keyed by creation id', () => {
    const spec = extractCreateSpec({ create: { a: { name: 'A' }, b: { name: 'B' } } });
    expect([...spec.keys()]).toEqual(['a', 'b']);
    expect(spec.get('a')).toEqual({ name: 'A' });
  });

  it('is empty when there is no create argument', () => {
    expect(extractCreateSpec({ update: {} }).size).toBe(0);
  });
});

describe('extractCreated', () => {
  it('takes the server id from the created object', () => {
    const created = extractCreated(setResponse);
    expect(created.get('new')).toEqual({ serverId: 'mb-7', properties: { id: 'mb-7', totalEmails: 0 } });
  });

  it('leaves serverId null when the server sent no string id', () => {
    expect(extractCreated(setResponse).get('noid')?.serverId).toBeNull();
    expect(extractCreated({ created: { n: { id: 5 } } }).get('n')?.serverId).toBeNull();
  });
});

describe('extractNotCreated', () => {
  it('returns the SetError for each rejected creation id', () => {
    expect(extractNotCreated(setResponse).get('bad')).toEqual({
      type: 'invalidProperties',
      description: 'name is required',
      properties: ['name'],
    });
  });

  it('gives untyped errors the type "unknown"', () => {
    expect(extractNotCreated({ notCreated: { x: 'nope' } }).get('x')).toEqual({ type: 'unknown' });
  });
});

describe('CreationResolver', () => {
  it('resolves a created id to the server id, the same way every time', () => {
    const resolver = new CreationResolver().add(setResponse);

    expect(resolver.resolve('new')).toEqual({ success: true, id: 'mb-7' });
    expect(resolver.createdId('new')).toBe('mb-7');
    expect(resolver.createdId('new')).toBe('mb-7');
  });

  it('refuses an id the server rejected', () => {
    const resolver = new CreationResolver().add(setResponse);
    const result = resolver.resolve('bad');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.type).toBe('unresolvedCreationReference');
      expect(result.error.message).toBe(
        'Creation id "bad" was not created: the server rejected it (invalidProperties: name is required)'
      );
    }
  });

  it('throws from createdId for an unknown id', () => {
    const resolver = new CreationResolver().add(setResponse);
    expect(() => resolver.createdId('ghost')).toThrow(
      'Creation id "ghost" was not created: no response in this batch mentions it'
    );
  });

  it('refuses a created entry without a string id', () => {
    const resolver = new CreationResolver().add(setResponse);
    expect(resolver.resolve('noid').success).toBe(false);
  });

  it('keeps the first answer when two responses answer the same id', () => {
    const resolver = new CreationResolver()
      .add({ created: { a: { id: 'first' } } })
      .add({ created: { a: { id: 'second' } } });
    expect(resolver.createdId('a')).toBe('first');
  });

  it('keeps created properties for each creation id', () => {
    const resolver = new CreationResolver().add(setResponse);
    expect(resolver.createdResult('new')?.properties).toEqual({ id: 'mb-7', totalEmails: 0 });
  });
});

describe('extractResultIds', () => {
  it('lists created then notCreated ids', () => {
    expect(extractResultIds(setResponse)).toEqual(['new', 'noid', 'bad']);
  });

  it('lists an id answered in both maps twice', () => {
    expect(extractResultIds({ created: { a: { id: 'x' } }, notCreated: { a: { type: 'forbidden' } } })).toEqual([
      'a',
      'a',
    ]);
  });
});

describe('substituteCreationReferences', () => {
  it('replaces references in values and keys', () => {
    const resolver = new CreationResolver().add(setResponse);
    const result = substituteCreationReferences(
      {
        create: { child: { parentId: '#new', name: '#hashtag' } },
        filter: { inMailboxes: ['#new'] },
        mailboxIds: { '#new': true },
      },
      resolver
    );

    expect(result.args).toEqual({
      create: { child: { parentId: 'mb-7', name: '#hashtag' } },
      filter: { inMailboxes: ['mb-7'] },
      mailboxIds: { 'mb-7': true },
    });
    expect(result.unresolved).toEqual([]);
  });

  it('reports references to creations that failed and leaves them in place', () => {
    const resolver = new CreationResolver().add(setResponse);
    const result = substituteCreationReferences({ parentId: '#bad', other: '#bad' }, resolver);

    expect(result.args).toEqual({ parentId: '#bad', other: '#bad' });
    expect(result.unresolved).toEqual(['bad']);
  });

  it('does not modify the arguments it was given', () => {
    const resolver = new CreationResolver().add(setResponse);
    const args = { parentId: '#new' };
    substituteCreationReferences(args, resolver);
    expect(args).toEqual({ parentId: '#new' });
  });
});
