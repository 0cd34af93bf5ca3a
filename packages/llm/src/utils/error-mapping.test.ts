import { describe, it, expect } from 'vitest';
import { mapHttpError, parseRetryAfter } from './error-mapping.js';
import {
  AuthenticationError,
  AccessDeniedError,
  NotFoundError,
  InvalidRequestError,
  ContextLengthError,
  RateLimitError,
  ContentFilterError,
  ServerError,
  ProviderError,
} from '../types/error.js';

function map(statusCode: number, body: string, headers: Headers = new Headers()): ProviderError {
  return mapHttpError({ statusCode, body, provider: 'test', headers });
}

describe('parseRetryAfter', () => {
  it('reads delta-seconds as milliseconds', () => {
    expect(parseRetryAfter(new Headers({ 'Retry-After': '30' }))).toBe(30000);
  });

  it('computes the delta to an HTTP date', () => {
    const now = Date.parse('2024-01-01T00:00:00Z');
    const headers = new Headers({ 'Retry-After': 'Mon, 01 Jan 2024 00:01:00 GMT' });
    expect(parseRetryAfter(headers, now)).toBe(60000);
  });

  it('clamps past dates to 0', () => {
    const now = Date.parse('2024-01-01T00:01:00Z');
    const headers = new Headers({ 'Retry-After': 'Mon, 01 Jan 2024 00:00:00 GMT' });
    expect(parseRetryAfter(headers, now)).toBe(0);
  });

  it('returns null when absent or unreadable', () => {
    expect(parseRetryAfter(new Headers())).toBeNull();
    expect(parseRetryAfter(new Headers({ 'Retry-After': 'soon' }))).toBeNull();
  });
});

describe('mapHttpError', () => {
  it.each([
    [401, AuthenticationError],
    [403, AccessDeniedError],
    [404, NotFoundError],
    [413, ContextLengthError],
    [422, InvalidRequestError],
    [429, RateLimitError],
    [500, ServerError],
    [529, ServerError],
  ])('maps %i to %o', (status, errorClass) => {
    const error = map(status, 'body');
    expect(error).toBeInstanceOf(errorClass);
    expect(error.statusCode).toBe(status);
    expect(error.provider).toBe('test');
  });

  it('classifies 400 bodies', () => {
    expect(map(400, '{"type":"invalid_request_error","message":"prompt is too long"}')).toBeInstanceOf(
      ContextLengthError,
    );
    expect(map(400, 'blocked by content_policy')).toBeInstanceOf(ContentFilterError);
    expect(map(400, 'max_tokens must be positive')).toBeInstanceOf(InvalidRequestError);
  });

  it('marks only rate limits and server errors retryable', () => {
    expect(map(429, 'x').retryable).toBe(true);
    expect(map(502, 'x').retryable).toBe(true);
    expect(map(401, 'x').retryable).toBe(false);
    expect(map(400, 'x').retryable).toBe(false);
  });

  it('carries Retry-After on rate limits', () => {
    const error = map(429, 'x', new Headers({ 'Retry-After': '3' }));
    expect(error.retryAfter).toBe(3000);
  });

  it('falls back to a plain ProviderError', () => {
    const error = map(418, "I'm a teapot");
    expect(error.constructor).toBe(ProviderError);
    expect(error.message).toBe("HTTP 418: I'm a teapot");
  });
});
