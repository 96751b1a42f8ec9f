import OAuth from 'oauth-1.0a';
import { afterEach, beforeEach, describe, expect, it, type MockedFunction, vi } from 'vitest';
import { TokenResponseError } from '../error/tokenResponseError.js';
import { FetchClient } from '../fetch/client.js';
import { buildAuthorizationUrl, createOAuth1Session } from './oauth1.js';

const TOKEN_URL = 'https://api.example.com/oauth/request_token';

function createSession(tokens: { accessToken?: string; accessTokenSecret?: string } = {}) {
  return createOAuth1Session({
    consumerKey: 'test-key',
    consumerSecret: 'test-secret',
    transport: new FetchClient(),
    userAgent: 'test-agent',
    ...tokens,
  });
}

function sentHeaders(mockedFetch: MockedFunction<typeof fetch>, call = 0): Headers {
  return new Headers(mockedFetch.mock.calls[call][1]?.headers);
}

describe('OAuth1Session', () => {
  let mockedFetch: MockedFunction<typeof fetch>;

  beforeEach(() => {
    mockedFetch = vi.fn();
    global.fetch = mockedFetch;
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('signs requests with the consumer key and token', async () => {
    mockedFetch.mockResolvedValueOnce(new Response('{}', { status: 200 }));
    const session = createSession({ accessToken: 'test-token', accessTokenSecret: 'test-token-secret' });

    await session.request('GET', 'https://api.example.com/1.1/statuses/show.json', { query: { id: '20' } });

    expect(session.kind).toBe('oauth1');
    expect(session.hasToken).toBe(true);
    expect(mockedFetch.mock.calls[0][0]).toBe('https://api.example.com/1.1/statuses/show.json?id=20');
    const headers = sentHeaders(mockedFetch);
    const authorization = headers.get('authorization') ?? '';
    expect(authorization.startsWith('OAuth ')).toBe(true);
    expect(authorization).toContain('oauth_consumer_key="test-key"');
    expect(authorization).toContain('oauth_token="test-token"');
    expect(authorization).toContain('oauth_signature_method="HMAC-SHA1"');
    expect(authorization).toContain('oauth_signature="');
    expect(headers.get('user-agent')).toBe('test-agent');
  });

  it('includes query and urlencoded form values in the signature base', async () => {
    mockedFetch.mockResolvedValueOnce(new Response('{}', { status: 200 }));
    const authorize = vi.spyOn(OAuth.prototype, 'authorize');

    await createSession().request('POST', 'https://api.example.com/1.1/statuses/update.json', {
      query: { include_entities: 'true' },
      form: { status: 'hello' },
    });

    expect(authorize.mock.calls[0][0]).toEqual({
      url: 'https://api.example.com/1.1/statuses/update.json',
      method: 'POST',
      data: { include_entities: 'true', status: 'hello' },
    });
    expect(authorize.mock.calls[0][1]).toBeUndefined();
  });

  it('leaves multipart values out of the signature base', async () => {
    mockedFetch.mockResolvedValueOnce(new Response('{}', { status: 200 }));
    const authorize = vi.spyOn(OAuth.prototype, 'authorize');

    await createSession().request('POST', 'https://upload.example.com/1.1/media/upload.json', {
      form: { media_category: 'tweet_image' },
      files: { media: new Blob(['png-bytes']) },
    });

    expect(authorize.mock.calls[0][0].data).toEqual({});
    expect(mockedFetch.mock.calls[0][1]?.body).toBeInstanceOf(FormData);
  });

  it('sends and signs the callback and verifier', async () => {
    mockedFetch.mockResolvedValue(new Response('{}', { status: 200 }));
    const authorize = vi.spyOn(OAuth.prototype, 'authorize');
    const session = createSession();

    await session.withCallback('https://app.example.com/callback').request('POST', TOKEN_URL);
    await session.withVerifier('test-verifier').request('POST', TOKEN_URL);
    await session.request('POST', TOKEN_URL);

    expect(authorize.mock.calls[0][0].data).toEqual({ oauth_callback: 'https://app.example.com/callback' });
    expect(sentHeaders(mockedFetch, 0).get('authorization')).toContain(
      'oauth_callback="https%3A%2F%2Fapp.example.com%2Fcallback"',
    );
    expect(authorize.mock.calls[1][0].data).toEqual({ oauth_verifier: 'test-verifier' });
    expect(sentHeaders(mockedFetch, 1).get('authorization')).toContain('oauth_verifier="test-verifier"');
    expect(sentHeaders(mockedFetch, 2).get('authorization')).not.toContain('oauth_callback');
  });

  it('lets per-request headers override the defaults', async () => {
    mockedFetch.mockResolvedValueOnce(new Response('{}', { status: 200 }));

    await createSession().request('GET', 'https://api.example.com/1.1/a.json', { headers: { 'User-Agent': 'other' } });

    expect(sentHeaders(mockedFetch).get('user-agent')).toBe('other');
  });

  describe('fetchToken', () => {
    it('parses the form-encoded token response', async () => {
      mockedFetch.mockResolvedValueOnce(
        new Response('oauth_token=req-token&oauth_token_secret=req-secret&oauth_callback_confirmed=true', {
          status: 200,
        }),
      );

      const [err, params] = await createSession().fetchToken(TOKEN_URL);

      expect(err).toBeNull();
      expect(params).toEqual({
        oauth_token: 'req-token',
        oauth_token_secret: 'req-secret',
        oauth_callback_confirmed: 'true',
      });
      expect(mockedFetch.mock.calls[0][1]?.method).toBe('POST');
    });

    it('rejects a denied token request', async () => {
      mockedFetch.mockResolvedValueOnce(new Response('Failed to validate oauth signature and token', { status: 401 }));

      const [err, params] = await createSession().fetchToken(TOKEN_URL);

      expect(params).toBeNull();
      expect(err).toBeInstanceOf(TokenResponseError);
      expect(err instanceof TokenResponseError && err.status).toBe(401);
    });

    it('rejects a response without both token fields', async () => {
      mockedFetch.mockResolvedValueOnce(new Response('oauth_token=req-token', { status: 200 }));

      const [err] = await createSession().fetchToken(TOKEN_URL);

      expect(err).toBeInstanceOf(TokenResponseError);
      expect(err?.message).toBe('error token response is missing oauth_token');
    });

    it('passes transport failures through', async () => {
      const cause = new TypeError('fetch failed');
      mockedFetch.mockRejectedValueOnce(cause);

      const [err] = await createSession().fetchToken(TOKEN_URL);

      expect(err).not.toBeInstanceOf(TokenResponseError);
      expect(err?.message).toBe('error wrapping POST request in fetchClient');
      expect(err?.cause).toBe(cause);
    });
  });
});

describe('buildAuthorizationUrl', () => {
  it('adds the token and extra parameters', () => {
    expect(
      buildAuthorizationUrl('https://api.example.com/oauth/authorize', 'req-token', { force_login: 'true' }),
    ).toEqual([null, 'https://api.example.com/oauth/authorize?oauth_token=req-token&force_login=true']);
  });

  it('returns an unparsable base URL as an error', () => {
    const [err, url] = buildAuthorizationUrl('not a url', 'req-token');

    expect(url).toBeNull();
    expect(err?.message).toBe('Invalid URL');
  });
});
