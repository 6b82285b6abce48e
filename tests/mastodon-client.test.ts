import { afterEach, describe, expect, it, vi } from 'vitest';
import { ApiError, AuthError, DecodeError, TransportError } from '../src/lib/errors.js';
import { MastodonClient } from '../src/lib/mastodon-client.js';
import { aliceStatus, mentionFromDave } from './fixtures.js';

type ResponseLike = {
  ok: boolean;
  status: number;
  text: () => Promise<string>;
};

const makeResponse = (body: unknown, overrides: Partial<ResponseLike> = {}): ResponseLike => ({
  ok: true,
  status: 200,
  text: async (): Promise<string> => JSON.stringify(body),
  ...overrides,
});

const options = {
  accessToken: 'test-token',
  instanceUrl: 'https://example.social',
  debug: false,
};

describe('MastodonClient', () => {
  const originalFetch = global.fetch;

  afterEach(() => {
    global.fetch = originalFetch;
    vi.restoreAllMocks();
  });

  const installFetch = (...responses: ResponseLike[]) => {
    const mockFetch = vi.fn();
    for (const response of responses) {
      mockFetch.mockResolvedValueOnce(response);
    }
    global.fetch = mockFetch as unknown as typeof fetch;
    return mockFetch;
  };

  describe('constructor', () => {
    it('requires an access token', () => {
      expect(() => new MastodonClient({ accessToken: '' })).toThrow('An access token is required');
    });
  });

  describe('getHomeTimeline', () => {
    it('sends a bearer-authenticated GET with the limit', async () => {
      const mockFetch = installFetch(makeResponse([aliceStatus]));

      const client = new MastodonClient(options);
      const result = await client.getHomeTimeline(5);

      expect(result).toEqual({ success: true, statuses: [aliceStatus] });
      expect(mockFetch).toHaveBeenCalledTimes(1);
      const [url, init] = mockFetch.mock.calls[0];
      expect(url).toBe('https://example.social/api/v1/timelines/home?limit=5');
      expect(init.method).toBe('GET');
      expect(init.headers.authorization).toBe('Bearer test-token');
      expect(init.signal).toBeInstanceOf(AbortSignal);
    });

    it('drops a trailing slash from the instance URL', async () => {
      const mockFetch = installFetch(makeResponse([]));

      const client = new MastodonClient({ ...options, instanceUrl: 'https://example.social/' });
      await client.getHomeTimeline();

      expect(mockFetch.mock.calls[0][0]).toBe('https://example.social/api/v1/timelines/home?limit=20');
    });

    it('returns an ApiError with status and raw body for non-2xx responses', async () => {
      installFetch(makeResponse(null, { ok: false, status: 404, text: async () => '{"error":"Record not found"}' }));

      const client = new MastodonClient(options);
      const result = await client.getHomeTimeline();

      if (result.success) {
        throw new Error('expected failure');
      }
      expect(result.error).toBeInstanceOf(ApiError);
      expect(result.error).toMatchObject({ statusCode: 404, body: '{"error":"Record not found"}' });
      expect(result.error.message).toBe('API error (status 404): {"error":"Record not found"}');
    });

    it('returns a DecodeError for a body that is not JSON', async () => {
      installFetch(makeResponse(null, { text: async () => '<html>maintenance</html>' }));

      const client = new MastodonClient(options);
      const result = await client.getHomeTimeline();

      if (result.success) {
        throw new Error('expected failure');
      }
      expect(result.error).toBeInstanceOf(DecodeError);
      expect(result.error.message.startsWith('parsing response: ')).toBe(true);
    });

    it('returns a DecodeError when an array was expected', async () => {
      installFetch(makeResponse({ error: 'nope' }));

      const client = new MastodonClient(options);
      const result = await client.getHomeTimeline();

      if (result.success) {
        throw new Error('expected failure');
      }
      expect(result.error).toBeInstanceOf(DecodeError);
      expect(result.error.message).toBe('parsing response: expected an array, got object');
    });

    it('returns a TransportError for network failures', async () => {
      const mockFetch = vi.fn().mockRejectedValueOnce(new Error('getaddrinfo ENOTFOUND example.social'));
      global.fetch = mockFetch as unknown as typeof fetch;

      const client = new MastodonClient(options);
      const result = await client.getHomeTimeline();

      if (result.success) {
        throw new Error('expected failure');
      }
      expect(result.error).toBeInstanceOf(TransportError);
      expect(result.error.message).toBe('making request: getaddrinfo ENOTFOUND example.social');
      expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it('aborts the request when the deadline passes', async () => {
      const mockFetch = vi.fn(
        (_url: string, init: RequestInit) =>
          new Promise((_resolve, reject) => {
            init.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
          }),
      );
      global.fetch = mockFetch as unknown as typeof fetch;

      const client = new MastodonClient({ ...options, timeoutMs: 20 });
      const result = await client.getHomeTimeline();

      if (result.success) {
        throw new Error('expected failure');
      }
      expect(result.error).toBeInstanceOf(TransportError);
      expect(result.error.message).toBe('request timed out after 20ms');
      expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it('logs requests without the token when debugging', async () => {
      installFetch(makeResponse([]));
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

      const client = new MastodonClient({ ...options, debug: true });
      await client.getHomeTimeline(3);

      expect(errorSpy).toHaveBeenCalledWith('[request] GET https://example.social/api/v1/timelines/home?limit=3');
      for (const call of errorSpy.mock.calls) {
        expect(String(call[0])).not.toContain('test-token');
      }
    });
  });

  describe('getOwnStatuses', () => {
    it('looks up the account id and then its statuses', async () => {
      const mockFetch = installFetch(makeResponse({ id: '109', username: 'me' }), makeResponse([aliceStatus]));

      const client = new MastodonClient(options);
      const result = await client.getOwnStatuses(10);

      expect(result).toEqual({ success: true, statuses: [aliceStatus] });
      expect(mockFetch).toHaveBeenCalledTimes(2);
      expect(mockFetch.mock.calls[0][0]).toBe('https://example.social/api/v1/accounts/verify_credentials');
      expect(mockFetch.mock.calls[1][0]).toBe('https://example.social/api/v1/accounts/109/statuses?limit=10');
    });

    it('fails with AuthError when the account id is not a string', async () => {
      const mockFetch = installFetch(makeResponse({ id: 109, username: 'me' }));

      const client = new MastodonClient(options);
      const result = await client.getOwnStatuses();

      if (result.success) {
        throw new Error('expected failure');
      }
      expect(result.error).toBeInstanceOf(AuthError);
      expect(result.error.message).toBe('account ID not found');
      expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it('stops after a failed credential check', async () => {
      const mockFetch = installFetch(
        makeResponse(null, { ok: false, status: 401, text: async () => '{"error":"The access token is invalid"}' }),
      );

      const client = new MastodonClient(options);
      const result = await client.getOwnStatuses();

      if (result.success) {
        throw new Error('expected failure');
      }
      expect(result.error).toBeInstanceOf(ApiError);
      expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it('shares one deadline between the account lookup and the statuses request', async () => {
      const mockFetch = vi
        .fn((_url: string, _init: RequestInit): Promise<unknown> => Promise.reject(new Error('unexpected request')))
        .mockImplementationOnce(async () => makeResponse({ id: '109', username: 'me' }))
        .mockImplementationOnce(
          (_url: string, init: RequestInit) =>
            new Promise((_resolve, reject) => {
              init.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
            }),
        );
      global.fetch = mockFetch as unknown as typeof fetch;

      const client = new MastodonClient({ ...options, timeoutMs: 20 });
      const result = await client.getOwnStatuses();

      if (result.success) {
        throw new Error('expected failure');
      }
      expect(result.error).toBeInstanceOf(TransportError);
      expect(result.error.message).toBe('request timed out after 20ms');
      expect(result).not.toHaveProperty('statuses');
      expect(mockFetch).toHaveBeenCalledTimes(2);
      expect(mockFetch.mock.calls[1][0]).toBe('https://example.social/api/v1/accounts/109/statuses?limit=20');
      expect(mockFetch.mock.calls[0][1].signal).toBe(mockFetch.mock.calls[1][1].signal);
    });
  });

  describe('getMentions', () => {
    it('requests mention notifications', async () => {
      const mockFetch = installFetch(makeResponse([mentionFromDave]));

      const client = new MastodonClient(options);
      const result = await client.getMentions();

      expect(result).toEqual({ success: true, notifications: [mentionFromDave] });
      expect(mockFetch.mock.calls[0][0]).toBe('https://example.social/api/v1/notifications?limit=20&types[]=mention');
    });
  });

  describe('searchStatuses', () => {
    it('encodes the query and returns the result object', async () => {
      const mockFetch = installFetch(makeResponse({ accounts: [], statuses: [aliceStatus], hashtags: [] }));

      const client = new MastodonClient(options);
      const result = await client.searchStatuses('rust async&more', 7);

      expect(result).toEqual({ success: true, result: { accounts: [], statuses: [aliceStatus], hashtags: [] } });
      expect(mockFetch.mock.calls[0][0]).toBe(
        'https://example.social/api/v2/search?q=rust+async%26more&type=statuses&limit=7',
      );
    });

    it('returns a DecodeError when the result is not an object', async () => {
      installFetch(makeResponse([aliceStatus]));

      const client = new MastodonClient(options);
      const result = await client.searchStatuses('cats');

      if (result.success) {
        throw new Error('expected failure');
      }
      expect(result.error.message).toBe('parsing response: expected an object, got array');
    });
  });
});
