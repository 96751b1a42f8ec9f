import { afterEach, beforeEach, describe, expect, it, type MockedFunction, vi } from 'vitest';
import { FetchClient } from '../fetch/client.js';
import { encodeBody, sendRequest, withQuery } from './request.js';

describe('withQuery', () => {
  it('returns the URL untouched without values', () => {
    expect(withQuery('https://api.example.com/1.1/a.json')).toEqual([null, 'https://api.example.com/1.1/a.json']);
  });

  it('appends values to an existing query', () => {
    expect(withQuery('https://api.example.com/1.1/a.json?x=1', { id: '20', q: 'a b' })).toEqual([
      null,
      'https://api.example.com/1.1/a.json?x=1&id=20&q=a+b',
    ]);
  });

  it('returns an unparsable URL as an error', () => {
    const [err, url] = withQuery('https://bad host.example.com/1.1/a.json', { id: '20' });

    expect(url).toBeNull();
    expect(err).toBeInstanceOf(TypeError);
    expect(err?.message).toBe('Invalid URL');
  });
});

describe('encodeBody', () => {
  it('returns no body without values', () => {
    expect(encodeBody()).toBeUndefined();
  });

  it('urlencodes form values', () => {
    const body = encodeBody({ status: 'hello world', trim_user: 'true' });

    expect(body).toBeInstanceOf(URLSearchParams);
    expect(body?.toString()).toBe('status=hello+world&trim_user=true');
  });

  it('switches to multipart when file parts are present', async () => {
    const body = encodeBody({ media_category: 'tweet_image' }, { media: new Blob(['png-bytes']) });

    expect(body).toBeInstanceOf(FormData);
    const form = body instanceof FormData ? body : new FormData();
    expect(form.get('media_category')).toBe('tweet_image');
    const media = form.get('media');
    expect(media).toBeInstanceOf(Blob);
    expect(media instanceof Blob && (await media.text())).toBe('png-bytes');
  });
});

describe('sendRequest', () => {
  beforeEach(() => {
    global.fetch = vi.fn();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('sends GET values in the query string without a body', async () => {
    const mockedFetch = global.fetch as MockedFunction<typeof fetch>;
    mockedFetch.mockResolvedValueOnce(new Response('{}', { status: 200 }));

    await sendRequest(new FetchClient(), 'GET', 'https://api.example.com/1.1/a.json', {
      query: { id: '1' },
      form: { ignored: 'yes' },
    });

    expect(mockedFetch).toHaveBeenCalledWith('https://api.example.com/1.1/a.json?id=1', {
      method: 'GET',
      headers: expect.any(Headers),
      body: undefined,
    });
  });

  it('sends POST form values in the body', async () => {
    const mockedFetch = global.fetch as MockedFunction<typeof fetch>;
    mockedFetch.mockResolvedValueOnce(new Response('{}', { status: 200 }));
    const signal = new AbortController().signal;

    await sendRequest(new FetchClient(), 'POST', 'https://api.example.com/1.1/a.json', {
      form: { status: 'hi' },
      signal,
    });

    const init = mockedFetch.mock.calls[0][1];
    expect(mockedFetch.mock.calls[0][0]).toBe('https://api.example.com/1.1/a.json');
    expect(init?.method).toBe('POST');
    expect(init?.body?.toString()).toBe('status=hi');
    expect(init?.signal).toBe(signal);
  });

  it('returns an unparsable URL as an error without calling the transport', async () => {
    const [err, response] = await sendRequest(new FetchClient(), 'GET', 'https://bad host.example.com/1.1/a.json', {
      query: { id: '1' },
    });

    expect(response).toBeNull();
    expect(err?.message).toBe('Invalid URL');
    expect(global.fetch).not.toHaveBeenCalled();
  });
});
