import { AbortError, NetworkError, RequestTimeoutError } from '../types/error.js';
import type { TimeoutConfig } from '../types/config.js';
import { mapHttpError } from './error-mapping.js';

export type FetchOptions = {
  readonly url: string;
  readonly provider: string;
  readonly method?: string;
  readonly headers?: Record<string, string>;
  readonly body?: unknown;
  readonly timeout?: TimeoutConfig;
  readonly signal?: AbortSignal;
};

export type FetchResult = {
  readonly response: globalThis.Response;
  readonly body: unknown;
};

/**
 * Fetches JSON with an optional request timeout and caller abort signal.
 *
 * Non-2xx responses are mapped to ProviderError subclasses, a caller abort
 * becomes AbortError, the timeout becomes RequestTimeoutError and any other
 * fetch failure becomes NetworkError.
 */
export async function fetchWithTimeout(options: FetchOptions): Promise<FetchResult> {
  const {
    url,
    provider,
    method = 'GET',
    headers: customHeaders = {},
    body: bodyData,
    timeout,
    signal: externalSignal,
  } = options;

  if (externalSignal?.aborted) {
    throw new AbortError('Signal was already aborted');
  }

  const timeoutController = new AbortController();
  const { signal: linkedSignal, unlink } = linkSignals(externalSignal, timeoutController.signal);

  let timedOut = false;
  let timeoutId: ReturnType<typeof setTimeout> | null = null;
  if (timeout?.requestMs) {
    timeoutId = setTimeout(() => {
      timedOut = true;
      timeoutController.abort();
    }, timeout.requestMs);
  }

  try {
    const mergedHeaders: Record<string, string> = {
      'Content-Type': 'application/json',
      ...customHeaders,
    };

    const body = bodyData !== undefined ? JSON.stringify(bodyData) : undefined;

    let response: globalThis.Response;
    try {
      response = await fetch(url, {
        method,
        headers: mergedHeaders,
        body,
        signal: linkedSignal,
      });
    } catch (err) {
      if (timedOut) {
        throw new RequestTimeoutError(`Request to ${provider} timed out after ${timeout?.requestMs}ms`);
      }
      if (err instanceof globalThis.Error && err.name === 'AbortError') {
        throw new AbortError('Fetch was aborted');
      }
      const cause = err instanceof Error ? err : new Error(String(err));
      throw new NetworkError(`Could not reach ${provider}: ${cause.message}`, cause);
    }

    if (!response.ok) {
      const text = await response.text();
      throw mapHttpError({
        statusCode: response.status,
        body: text,
        provider,
        headers: response.headers,
      });
    }

    const parsedBody: unknown = await response.json();

    return {
      response,
      body: parsedBody,
    };
  } finally {
    if (timeoutId !== null) {
      clearTimeout(timeoutId);
    }
    unlink();
  }
}

/**
 * Links two abort signals so that either one being aborted triggers the result.
 * `unlink` detaches the listeners from the caller's signal, which outlives the request.
 */
function linkSignals(
  externalSignal: AbortSignal | undefined,
  targetSignal: AbortSignal,
): { readonly signal: AbortSignal; readonly unlink: () => void } {
  if (!externalSignal) {
    return { signal: targetSignal, unlink: () => {} };
  }

  const controller = new AbortController();
  const onAbort = (): void => controller.abort();

  externalSignal.addEventListener('abort', onAbort);
  targetSignal.addEventListener('abort', onAbort);

  return {
    signal: controller.signal,
    unlink: () => externalSignal.removeEventListener('abort', onAbort),
  };
}
