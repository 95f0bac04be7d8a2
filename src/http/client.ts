import { HTTP_CONSTANTS } from '../config/constants.js';
import { HttpError, ResolutionError } from '../core/errors.js';
import { describeErrorChain, getErrorName } from '../utils/error-utils.js';
import { log } from '../utils/logger.js';
import { isRateLimitError, withRetry } from '../utils/retry.js';
import type { Sleep } from '../utils/retry.js';

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

export interface HttpOptions {
  timeoutMs?: number;
  retryDelaysMs?: readonly number[];
  fetchImpl?: FetchLike;
  sleep?: Sleep;
}

export interface RequestOptions extends HttpOptions {
  /** Human-readable service name used in diagnostics, e.g. "PubMed eFetch" */
  service: string;
}

function previewBody(body: string): string {
  return body.replace(/\s+/g, ' ').trim().slice(0, HTTP_CONSTANTS.ERROR_BODY_PREVIEW);
}

function isAbort(error: unknown): boolean {
  const name = getErrorName(error);
  return name === 'AbortError' || name === 'TimeoutError';
}

async function attempt(url: URL, init: RequestInit, options: RequestOptions, timeoutMs: number): Promise<string> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetchImpl(url, { ...init, signal: controller.signal });

    if (!response.ok) {
      const body = await response.text().catch(() => '');
      throw new HttpError(response.status, url.toString(), previewBody(body));
    }

    return await response.text();
  } catch (error) {
    if (error instanceof HttpError) {
      throw error;
    }
    if (isAbort(error)) {
      throw new ResolutionError('timeout', `${options.service} did not respond within ${timeoutMs} ms`, {
        service: options.service,
        cause: error
      });
    }
    throw new ResolutionError('unavailable', `${options.service} is unavailable: ${describeErrorChain(error)}`, {
      service: options.service,
      cause: error
    });
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Perform one HTTP request and return the response body as text.
 *
 * Non-2xx responses fail; 429 responses are retried with the configured
 * delays first. Every failure surfaces as a ResolutionError.
 */
export async function requestText(url: URL, init: RequestInit, options: RequestOptions): Promise<string> {
  const timeoutMs = options.timeoutMs ?? HTTP_CONSTANTS.DEFAULT_TIMEOUT_MS;
  const delaysMs = options.retryDelaysMs ?? HTTP_CONSTANTS.RETRY_DELAYS_MS;

  log.debug(`${init.method ?? 'GET'} ${url.toString()}`, { service: options.service, timeoutMs });

  try {
    return await withRetry(() => attempt(url, init, options, timeoutMs), {
      delaysMs,
      shouldRetry: isRateLimitError,
      sleep: options.sleep,
      onRetry: (_error, retry, delayMs) => {
        log.warn(`${options.service} rate limit hit (429), retrying in ${delayMs}ms (attempt ${retry}/${delaysMs.length})`);
      }
    });
  } catch (error) {
    if (error instanceof HttpError) {
      const detail = error.body ? `: ${error.body}` : '';
      throw new ResolutionError('http', `${options.service} returned HTTP ${error.status}${detail}`, {
        service: options.service,
        cause: error
      });
    }
    throw error;
  }
}
