/**
 * JSON over HTTP
 *
 * Thin wrapper around undici for the read-only version sources.
 * Transport failures, non-2xx statuses and unparseable bodies become
 * FetchError; 404 is reported separately so callers can turn it into a
 * LookupError.
 */

import { request, type Dispatcher } from 'undici';
import { FetchError } from '@packpub/core';
import { createLogger, retry } from '@packpub/utils';

const log = createLogger({ module: 'http' });

export interface HttpOptions {
  userAgent: string;
  timeoutMs: number;
  /** Total attempts per request; 1 disables retries */
  attempts?: number;
  dispatcher?: Dispatcher;
}

export type JsonResponse =
  | { found: true; body: unknown }
  | { found: false; status: 404 };

async function getJsonOnce(url: string, options: HttpOptions): Promise<JsonResponse> {
  let response: Dispatcher.ResponseData;
  try {
    response = await request(url, {
      method: 'GET',
      headers: {
        'user-agent': options.userAgent,
        accept: 'application/json',
      },
      headersTimeout: options.timeoutMs,
      bodyTimeout: options.timeoutMs,
      dispatcher: options.dispatcher,
    });
  } catch (error) {
    throw new FetchError(url, error instanceof Error ? error.message : String(error));
  }

  const { statusCode, body } = response;

  if (statusCode === 404) {
    await body.dump();
    return { found: false, status: 404 };
  }

  if (statusCode < 200 || statusCode >= 300) {
    const text = await body.text();
    throw new FetchError(url, `HTTP ${statusCode} ${text.slice(0, 200)}`.trim(), statusCode);
  }

  const text = await body.text();
  try {
    return { found: true, body: JSON.parse(text) };
  } catch {
    throw new FetchError(url, 'response is not valid JSON', statusCode);
  }
}

/**
 * GET a JSON document, retrying FetchError up to `attempts` times
 */
export async function getJson(url: string, options: HttpOptions): Promise<JsonResponse> {
  return retry(() => getJsonOnce(url, options), {
    maxAttempts: options.attempts ?? 1,
    initialDelay: 500,
    retryIf: (error) => error instanceof FetchError,
    onRetry: (error, attempt) => {
      log.warn(
        { url, attempt, error: error instanceof Error ? error.message : String(error) },
        'Fetch failed, retrying'
      );
    },
  });
}
