import { describe, expect, it, vi } from 'vitest';
import { ApiError } from '../error/apiError.js';
import { AuthError } from '../error/authError.js';
import { ClientError } from '../error/clientError.js';
import { RateLimitError } from '../error/rateLimitError.js';
import type { ResponseContext } from '../types/response.js';
import { ApiResponse } from './apiResponse.js';
import { extractErrorDetails, handleApiResponse, handleStreamResponse } from './handlers.js';
import { decodeJson, JsonObject } from './jsonObject.js';
import { StreamResponse } from './streamResponse.js';

const RESOURCE_URL = 'https://api.example.com/1.1/statuses/show.json';

function contextOf(response: Response): ResponseContext {
  return {
    requestMethod: 'GET',
    resourceUrl: RESOURCE_URL,
    response,
    controller: new AbortController(),
    release: vi.fn(),
  };
}

function jsonResponse(body: unknown, status: number, headers?: Record<string, string>): Response {
  return new Response(JSON.stringify(body), { status, headers });
}

describe('handleApiResponse', () => {
  it('resolves a 200 into an ApiResponse with decoded data', async () => {
    const response = jsonResponse({ id: 1 }, 200, { 'X-Rate-Limit-Remaining': '14' });

    const [err, result] = await handleApiResponse(contextOf(response));

    expect(err).toBeNull();
    expect(result).toBeInstanceOf(ApiResponse);
    expect(result?.resourceUrl).toBe(RESOURCE_URL);
    expect(result?.requestMethod).toBe('GET');
    expect(result?.headers['x-rate-limit-remaining']).toBe('14');
    expect(result?.data instanceof JsonObject && result.data.get('id')).toEqual([null, 1]);
    expect(String(result)).toBe(`<ApiResponse: GET ${RESOURCE_URL}>`);
  });

  it('resolves a 200 with an undecodable body to null data', async () => {
    const [err, result] = await handleApiResponse(contextOf(new Response('', { status: 200 })));

    expect(err).toBeNull();
    expect(result?.data).toBeNull();
  });

  it('maps 404 to an ApiError with a fixed message, keeping the code', async () => {
    const response = jsonResponse({ errors: [{ code: 34, message: 'Sorry, that page does not exist.' }] }, 404);

    const [err, result] = await handleApiResponse(contextOf(response));

    expect(result).toBeNull();
    expect(err).toBeInstanceOf(ApiError);
    expect(err).not.toBeInstanceOf(AuthError);
    expect(err).not.toBeInstanceOf(RateLimitError);
    expect(err?.message).toBe('Invalid API resource.');
    expect(err?.statusCode).toBe(404);
    expect(err?.errorCode).toBe(34);
    expect(err?.toString()).toBe(`ApiError: Invalid API resource. (GET ${RESOURCE_URL})`);
  });

  it('maps 429 to a RateLimitError', async () => {
    const response = jsonResponse({ errors: [{ code: 88, message: 'Rate limit exceeded' }] }, 429, {
      'x-rate-limit-reset': '1700000000',
    });

    const [err] = await handleApiResponse(contextOf(response));

    expect(err).toBeInstanceOf(RateLimitError);
    expect(err?.message).toBe('Rate limit exceeded');
    expect(err?.errorCode).toBe(88);
    expect(err?.headers?.['x-rate-limit-reset']).toBe('1700000000');
  });

  it('maps 401 to an AuthError', async () => {
    const response = jsonResponse({ errors: [{ code: 89, message: 'Invalid or expired token.' }] }, 401);

    const [err] = await handleApiResponse(contextOf(response));

    expect(err).toBeInstanceOf(AuthError);
    expect(err?.message).toBe('Invalid or expired token.');
    expect(err?.errorCode).toBe(89);
  });

  it('maps a bad authentication message to an AuthError whatever the status', async () => {
    const response = jsonResponse({ errors: [{ code: 215, message: 'Bad Authentication data.' }] }, 400);

    const [err] = await handleApiResponse(contextOf(response));

    expect(err).toBeInstanceOf(AuthError);
    expect(err?.statusCode).toBe(400);
  });

  it('reads a single error object', async () => {
    const response = jsonResponse({ errors: { code: 187, message: 'Status is a duplicate.' } }, 403);

    const [err] = await handleApiResponse(contextOf(response));

    expect(err?.constructor).toBe(ApiError);
    expect(err?.message).toBe('Status is a duplicate.');
    expect(err?.errorCode).toBe(187);
  });

  it('falls back to an unknown error without a code', async () => {
    const [err] = await handleApiResponse(contextOf(jsonResponse({}, 500)));

    expect(err?.message).toBe('An unknown error has occured processing your request.');
    expect(err?.errorCode).toBeNull();
    expect(err?.statusCode).toBe(500);
  });

  it('reports an undecodable error body', async () => {
    const [err] = await handleApiResponse(contextOf(new Response('<html>Over capacity</html>', { status: 503 })));

    expect(err).toBeInstanceOf(ApiError);
    expect(err?.message).toBe('Unable to decode JSON response.');
    expect(err?.statusCode).toBe(503);
  });

  it('reports a failure to read the body as a ClientError', async () => {
    const response = new Response('{}', { status: 200 });
    const cause = new Error('connection reset');
    vi.spyOn(response, 'text').mockRejectedValueOnce(cause);

    const [err] = await handleApiResponse(contextOf(response));

    expect(err).toBeInstanceOf(ClientError);
    expect(err?.message).toBe('connection reset');
    expect(err?.statusCode).toBeNull();
    expect(err?.cause).toBe(cause);
  });
});

describe('extractErrorDetails', () => {
  it('uses the first entry of an error list', () => {
    const [, data] = decodeJson('{"errors":[{"code":1,"message":"first"},{"code":2,"message":"second"}]}');

    expect(extractErrorDetails(data)).toEqual({ code: 1, message: 'first' });
  });

  it('keeps a code the body sends as a string', () => {
    const [, data] = decodeJson('{"errors":{"code":"88","message":"Rate limit exceeded"}}');

    expect(extractErrorDetails(data)).toEqual({ code: '88', message: 'Rate limit exceeded' });
  });

  it('falls back for an empty error list', () => {
    const [, data] = decodeJson('{"errors":[]}');

    expect(extractErrorDetails(data)).toEqual({
      code: null,
      message: 'An unknown error has occured processing your request.',
    });
  });
});

describe('handleStreamResponse', () => {
  it('resolves a 200 into a StreamResponse without reading the body', async () => {
    const response = new Response('{"a":1}\n', { status: 200 });

    const [err, result] = await handleStreamResponse(contextOf(response));

    expect(err).toBeNull();
    expect(result).toBeInstanceOf(StreamResponse);
    expect(response.bodyUsed).toBe(false);
  });

  it('maps 420 to a RateLimitError carrying the raw body', async () => {
    const [err] = await handleStreamResponse(contextOf(new Response('Enhance Your Calm', { status: 420 })));

    expect(err).toBeInstanceOf(RateLimitError);
    expect(err?.message).toBe('Enhance Your Calm');
    expect(err?.errorCode).toBe(420);
  });

  it('maps 401 to an AuthError', async () => {
    const [err] = await handleStreamResponse(contextOf(new Response('<html>401</html>', { status: 401 })));

    expect(err).toBeInstanceOf(AuthError);
    expect(err?.message).toBe('Unauthorized.');
    expect(err?.errorCode).toBe(401);
  });

  it('maps 404 to an ApiError with a fixed message', async () => {
    const [err] = await handleStreamResponse(contextOf(new Response('Not Found', { status: 404 })));

    expect(err?.constructor).toBe(ApiError);
    expect(err?.message).toBe('Invalid API resource.');
    expect(err?.errorCode).toBe(404);
  });

  it('maps other statuses to an ApiError carrying the raw body', async () => {
    const [err] = await handleStreamResponse(contextOf(new Response('Service Unavailable', { status: 503 })));

    expect(err?.constructor).toBe(ApiError);
    expect(err?.message).toBe('Service Unavailable');
    expect(err?.errorCode).toBe(503);
    expect(err?.statusCode).toBe(503);
  });
});
