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

export type MapHttpErrorOptions = {
  readonly statusCode: number;
  readonly body: string;
  readonly provider: string;
  readonly headers: Headers;
};

/**
 * Parses the Retry-After header into milliseconds.
 *
 * Accepts delta-seconds or an HTTP date; returns null when the header is
 * absent or unreadable.
 */
export function parseRetryAfter(headers: Headers, now: number = Date.now()): number | null {
  const retryAfter = headers.get('Retry-After');
  if (!retryAfter) {
    return null;
  }

  if (/^\d+$/.test(retryAfter)) {
    return Number(retryAfter) * 1000;
  }

  const retryDate = new Date(retryAfter);
  if (!isNaN(retryDate.getTime())) {
    return Math.max(0, retryDate.getTime() - now);
  }

  return null;
}

/**
 * Maps an HTTP status and body to the matching ProviderError subclass.
 * 400 responses are classified by their message.
 */
export function mapHttpError(options: MapHttpErrorOptions): ProviderError {
  const { statusCode, body, provider, headers } = options;

  switch (statusCode) {
    case 400:
      return classifyHttp400(body, provider, statusCode);

    case 401:
      return new AuthenticationError(`Authentication failed: ${body}`, statusCode, provider, body);

    case 403:
      return new AccessDeniedError(`Access denied: ${body}`, statusCode, provider, body);

    case 404:
      return new NotFoundError(`Resource not found: ${body}`, statusCode, provider, body);

    case 413:
      return new ContextLengthError(`Context length exceeded: ${body}`, statusCode, provider, body);

    case 422:
      return new InvalidRequestError(`Unprocessable entity: ${body}`, statusCode, provider, body);

    case 429:
      return new RateLimitError(
        `Rate limit exceeded: ${body}`,
        statusCode,
        provider,
        body,
        parseRetryAfter(headers),
      );

    default:
      if (statusCode >= 500) {
        return new ServerError(
          `Server error: ${body}`,
          statusCode,
          provider,
          body,
          parseRetryAfter(headers),
        );
      }

      return new ProviderError(`HTTP ${statusCode}: ${body}`, statusCode, false, provider, body);
  }
}

function classifyHttp400(body: string, provider: string, statusCode: number): ProviderError {
  const lowerBody = body.toLowerCase();

  if (
    lowerBody.includes('content_filter') ||
    lowerBody.includes('content_policy') ||
    lowerBody.includes('safety')
  ) {
    return new ContentFilterError(`Content filtered: ${body}`, statusCode, provider, body);
  }

  if (
    lowerBody.includes('context_length') ||
    lowerBody.includes('too many tokens') ||
    lowerBody.includes('prompt is too long') ||
    lowerBody.includes('maximum context')
  ) {
    return new ContextLengthError(`Context length exceeded: ${body}`, statusCode, provider, body);
  }

  return new InvalidRequestError(`Invalid request: ${body}`, statusCode, provider, body);
}
