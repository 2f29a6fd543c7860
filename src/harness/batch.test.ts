import { describe, it, expect } from 'vitest';
import type { MethodCall, MethodResponse } from '../types/jmap.js';
import { BatchResult } from './batch.js';

const calls: MethodCall[] = [
  { name: 'Mailbox/set', arguments: { create: { b: { name: 'B' }, a: { name: 'A' } } }, callId: 'c0' },
  { name: 'Mailbox/get', arguments: { ids: null }, callId: 'c1' },
];

const responses: MethodResponse[] = [
  { name: 'Mailbox/get', arguments: { list: [] }, callId: 'c1' },
  {
    name: 'Mailbox/set',
    arguments: { created: { a: { id: 'mb-1' } }, notCreated: { b: { type: 'forbidden' } } },
    callId: 'c0',
  },
];

describe('BatchResult', () => {
  const batch = new BatchResult(calls, responses, { sessionState: 'session-1' });

  it('finds responses by call id', () => {
    expect(batch.responseFor('c0')?.name).toBe('Mailbox/set');
    expect(batch.responseFor('c1')?.arguments).toEqual({ list: [] });
    expect(batch.responseFor('nope')).toBeUndefined();
    expect(batch.sessionState).toBe('session-1');
  });

  it('lists creation and result ids sorted', () => {
    expect(batch.creationIdsFor('c0')).toEqual(['a', 'b']);
    expect(batch.resultIdsFor('c0')).toEqual(['a', 'b']);
    expect(batch.creationIds()).toEqual(['a', 'b']);
    expect(batch.resultIds()).toEqual(['a', 'b']);
    expect(batch.hasCreateSpec()).toBe(true);
  });

  it('resolves creation ids across the batch', () => {
    expect(batch.createdId('a')).toBe('mb-1');
    expect(batch.resolveCreatedId('b').success).toBe(false);
    expect(batch.creationFor('c0')?.notCreatedError('b')).toEqual({ type: 'forbidden' });
    expect(batch.creation.createdId('a')).toBe('mb-1');
  });

  it('is ok when nothing is violated', () => {
    expect(batch.violations).toEqual([]);
    expect(batch.ok).toBe(true);
  });

  it('treats method errors as errors, not creation results', () => {
    const failed = new BatchResult(
      [calls[0]],
      [{ name: 'error', arguments: { type: 'invalidArguments' }, callId: 'c0' }]
    );
    expect(failed.isError('c0')).toBe(true);
    expect(failed.creationFor('c0')).toBeUndefined();
    expect(failed.resultIds()).toEqual([]);
  });

  it('dumps calls and responses in wire form', () => {
    const small = new BatchResult(
      [{ name: 'Core/echo', arguments: { x: 1 }, callId: 'c0' }],
      [{ name: 'Core/echo', arguments: { x: 1 }, callId: 'c0' }]
    );
    expect(JSON.parse(small.dump())).toEqual({
      methodCalls: [['Core/echo', { x: 1 }, 'c0']],
      methodResponses: [['Core/echo', { x: 1 }, 'c0']],
    });
  });
});
