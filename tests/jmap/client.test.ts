import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import createFetchMock from 'vitest-fetch-mock';
import { JMAPClient } from '../../src/jmap/client.js';
import { ConformanceError } from '../../src/errors.js';
import { DEFAULT_USING } from '../../src/harness/request.js';
import type { Config } from '../../src/config/schema.js';
import { silentLogger } from '../support/logger.js';

// Setup fetch mock
const fetchMocker = createFetchMock(vi);

const mockConfig: Config = {
  JMAP_SESSION_URL: 'https://jmap.example.com/session',
  JMAP_AUTH_METHOD: 'basic',
  JMAP_USERNAME: 'testuser',
  JMAP_PASSWORD: 'test-secret',
  JMAP_TOKEN: undefined,
  JMAP_REQUEST_TIMEOUT: 30000,
  JMAP_STRICT_PROPERTIES: false,
  JMAP_ACCOUNT_PRISTINE: false,
  LOG_LEVEL: 'info',
};

// Valid session response
const validSessionResponse = {
  capabilities: {
    'urn:ietf:params:jmap:core': {},
    'urn:ietf:params:jmap:mail': {},
  },
  accounts: {
    'account-123': {
      name: 'Test User',
      isPersonal: true,
      accountCapabilities: {},
    },
  },
  primaryAccounts: {
    'urn:ietf:params:jmap:mail': 'account-123',
  },
  apiUrl: 'https://jmap.example.com/api',
  state: 'session-state-1',
};

function requestInit(index: number): RequestInit | undefined {
  return fetchMocker.mock.calls[index]?.[1];
}

describe('JMAPClient', () => {
  beforeEach(() => {
    fetchMocker.enableMocks();
    fetchMocker.resetMocks();
  });

  afterEach(() => {
    fetchMocker.disableMocks();
  });

  describe('fetchSession', () => {
    it('should fetch and parse session correctly', async () => {
      fetchMocker.mockResponseOnce(JSON.stringify(validSessionResponse));

      const client = new JMAPClient(mockConfig, silentLogger());
      const session = await client.fetchSession();

      expect(session.apiUrl).toBe('https://jmap.example.com/api');
      expect(session.accountId).toBe('account-123');
      expect(session.state).toBe('session-state-1');
      expect(session.capabilities).toHaveProperty('urn:ietf:params:jmap:core');

      // Verify fetch was called with correct params
      expect(fetchMocker).toHaveBeenCalledOnce();
      expect(fetchMocker.mock.calls[0][0]).toBe('https://jmap.example.com/session');
      expect(requestInit(0)?.method).toBe('GET');
    });

    it('should throw when no mail account found', async () => {
      fetchMocker.mockResponseOnce(JSON.stringify({ ...validSessionResponse, primaryAccounts: {} }));

      const client = new JMAPClient(mockConfig, silentLogger());

      await expect(client.fetchSession()).rejects.toMatchObject({ type: 'noMailAccount' });
    });

    it('should throw on an incomplete session resource', async () => {
      fetchMocker.mockResponseOnce(JSON.stringify({ capabilities: {} }));

      const client = new JMAPClient(mockConfig, silentLogger());

      await expect(client.fetchSession()).rejects.toMatchObject({
        type: 'malformedResponse',
        message: 'Malformed JMAP response: session resource is incomplete (primaryAccounts, apiUrl, state)',
      });
    });

    it('should throw on HTTP 401', async () => {
      fetchMocker.mockResponseOnce('Unauthorized', { status: 401, statusText: 'Unauthorized' });

      const client = new JMAPClient(mockConfig, silentLogger());

      await expect(client.fetchSession()).rejects.toMatchObject({ type: 'unauthorized' });
    });

    it('should throw on HTTP 500', async () => {
      fetchMocker.mockResponseOnce('Server Error', { status: 500, statusText: 'Internal Server Error' });

      const client = new JMAPClient(mockConfig, silentLogger());

      await expect(client.fetchSession()).rejects.toMatchObject({ type: 'serverError' });
    });

    it('should report a network failure as a transport failure', async () => {
      fetchMocker.mockRejectOnce(new Error('ECONNREFUSED'));

      const client = new JMAPClient(mockConfig, silentLogger());

      await expect(client.fetchSession()).rejects.toMatchObject({
        type: 'transportFailure',
        message: 'Transport failure: ECONNREFUSED',
      });
    });

    it('should use Basic auth header for basic auth method', async () => {
      fetchMocker.mockResponseOnce(JSON.stringify(validSessionResponse));

      const client = new JMAPClient(mockConfig, silentLogger());
      await client.fetchSession();

      const expectedToken = Buffer.from('testuser:test-secret').toString('base64');
      expect(new Headers(requestInit(0)?.headers).get('Authorization')).toBe(`Basic ${expectedToken}`);
    });

    it('should use Bearer auth header for bearer auth method', async () => {
      const bearerConfig: Config = {
        ...mockConfig,
        JMAP_AUTH_METHOD: 'bearer',
        JMAP_TOKEN: 'test-bearer-token',
      };
      fetchMocker.mockResponseOnce(JSON.stringify(validSessionResponse));

      const client = new JMAPClient(bearerConfig, silentLogger());
      await client.fetchSession();

      expect(new Headers(requestInit(0)?.headers).get('Authorization')).toBe('Bearer test-bearer-token');
    });
  });

  describe('getSession', () => {
    it('should throw error if session not initialized', () => {
      const client = new JMAPClient(mockConfig, silentLogger());

      expect(() => client.getSession()).toThrow(ConformanceError);
      expect(() => client.getSession()).toThrow('Session not initialized');
    });

    it('should return session after fetchSession', async () => {
      fetchMocker.mockResponseOnce(JSON.stringify(validSessionResponse));

      const client = new JMAPClient(mockConfig, silentLogger());
      await client.fetchSession();

      expect(client.getSession().accountId).toBe('account-123');
    });
  });

  describe('send', () => {
    let client: JMAPClient;

    beforeEach(async () => {
      fetchMocker.mockResponseOnce(JSON.stringify(validSessionResponse));
      client = new JMAPClient(mockConfig, silentLogger());
      await client.fetchSession();
    });

    it('should post the batch verbatim and return the decoded body', async () => {
      const batchedResponse = {
        methodResponses: [
          ['Mailbox/get', { accountId: 'account-123', list: [], state: 'mailbox-state-1' }, 'c2'],
          ['Email/get', { accountId: 'account-123', list: [], state: 'email-state-1' }, 'c1'],
        ],
        sessionState: 'session-state-1',
      };
      fetchMocker.mockResponseOnce(JSON.stringify(batchedResponse));

      const body = await client.send(
        [
          ['Email/get', { accountId: 'account-123', ids: null }, 'c1'],
          ['Mailbox/get', { accountId: 'account-123', ids: null }, 'c2'],
        ],
        DEFAULT_USING
      );

      expect(body).toEqual(batchedResponse);
      expect(fetchMocker).toHaveBeenCalledTimes(2); // 1 session + 1 request
      expect(fetchMocker.mock.calls[1][0]).toBe('https://jmap.example.com/api');
      expect(JSON.parse(String(requestInit(1)?.body))).toEqual({
        using: DEFAULT_USING,
        methodCalls: [
          ['Email/get', { accountId: 'account-123', ids: null }, 'c1'],
          ['Mailbox/get', { accountId: 'account-123', ids: null }, 'c2'],
        ],
      });
    });

    it('should use default capabilities if not provided', async () => {
      fetchMocker.mockResponseOnce(JSON.stringify({ methodResponses: [] }));

      await client.send([['Email/get', { accountId: 'account-123' }, 'c1']]);

      const requestBody: unknown = JSON.parse(String(requestInit(1)?.body));
      expect(requestBody).toMatchObject({ using: ['urn:ietf:params:jmap:core', 'urn:ietf:params:jmap:mail'] });
    });

    it('should not inspect the body it returns', async () => {
      fetchMocker.mockResponseOnce(JSON.stringify({ whatever: 1 }));

      await expect(client.send([['Email/get', {}, 'c1']])).resolves.toEqual({ whatever: 1 });
    });

    it('should throw on HTTP error during request', async () => {
      fetchMocker.mockResponseOnce('Forbidden', { status: 403, statusText: 'Forbidden' });

      await expect(client.send([['Email/get', {}, 'c1']])).rejects.toMatchObject({ type: 'forbidden' });
    });

    it('should throw when the body is not JSON', async () => {
      fetchMocker.mockResponseOnce('<html>oops</html>');

      await expect(client.send([['Email/get', {}, 'c1']])).rejects.toMatchObject({ type: 'malformedResponse' });
    });

    it('should report a timeout', async () => {
      fetchMocker.mockRejectOnce(new DOMException('The operation timed out', 'TimeoutError'));

      await expect(client.send([['Email/get', {}, 'c1']])).rejects.toMatchObject({
        type: 'timeout',
        message: 'JMAP request timed out',
      });
    });
  });

  it('should refuse to send before the session is fetched', async () => {
    const client = new JMAPClient(mockConfig, silentLogger());

    await expect(client.send([['Email/get', {}, 'c1']])).rejects.toThrow('Session not initialized');
  });
});
