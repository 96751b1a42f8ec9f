import { afterEach, beforeEach, describe, expect, it, type MockedFunction, vi } from 'vitest';
import { FetchClient } from '../fetch/client.js';
import { basicAuthorization, createOAuth2Session } from './oauth2.js';

const RESOURCE_URL = 'https://api.example.com/1.1/search/tweets.json';

describe('OAuth2Session', () => {
  let mockedFetch: MockedFunction<typeof fetch>;

  beforeEach(() => {
    mockedFetch = vi.fn();
    global.fetch = mockedFetch;
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('sends the bearer token', async () => {
    mockedFetch.mockResolvedValueOnce(new Response('{}', { status: 200 }));
    const session = createOAuth2Session({
      transport: new FetchClient(),
      userAgent: 'test-agent',
      accessToken: 'test-bearer',
    });

    await session.request('GET', RESOURCE_URL, { query: { q: 'birds' } });

    const headers = new Headers(mockedFetch.mock.calls[0][1]?.headers);
    expect(session.kind).toBe('oauth2');
    expect(headers.get('authorization')).toBe('Bearer test-bearer');
    expect(headers.get('user-agent')).toBe('test-agent');
    expect(mockedFetch.mock.calls[0][0]).toBe(`${RESOURCE_URL}?q=birds`);
  });

  it('sends no authorization without a token', async () => {
    mockedFetch.mockResolvedValueOnce(new Response('{}', { status: 200 }));
    const session = createOAuth2Session({ transport: new FetchClient(), userAgent: 'test-agent' });

    await session.request('GET', RESOURCE_URL);

    expect(session.hasToken).toBe(false);
    expect(new Headers(mockedFetch.mock.calls[0][1]?.headers).get('authorization')).toBeNull();
  });

  it('lets a request switch to basic authorization', async () => {
    mockedFetch.mockResolvedValueOnce(new Response('{}', { status: 200 }));
    const session = createOAuth2Session({
      transport: new FetchClient(),
      userAgent: 'test-agent',
      accessToken: 'test-bearer',
    });

    await session.request('POST', 'https://api.example.com/oauth2/token', {
      form: { grant_type: 'client_credentials' },
      headers: { Authorization: basicAuthorization('test-key', 'test-secret') },
    });

    const init = mockedFetch.mock.calls[0][1];
    expect(new Headers(init?.headers).get('authorization')).toBe('Basic dGVzdC1rZXk6dGVzdC1zZWNyZXQ=');
    expect(init?.body?.toString()).toBe('grant_type=client_credentials');
  });
});

describe('basicAuthorization', () => {
  it('percent-encodes key and secret before encoding them', () => {
    expect(basicAuthorization('key one', 's+cret')).toBe('Basic a2V5JTIwb25lOnMlMkJjcmV0');
  });
});
