/**
 * =============================================================================
 * HTTP UTILITIES - fetch with timeout
 * =============================================================================
 *
 * Thin layer over the global fetch used by the geocoding and routing clients.
 * - Every call carries a timeout (AbortSignal.timeout)
 * - Network failures and timeouts become UpstreamError
 * - The fetch function is injectable so tests never touch the network
 * =============================================================================
 */

import { ErrorCode, UpstreamError } from '../../core';
import { logger, redactUrl } from '../services/logger.service';

/**
 * Subset of the global fetch signature used by the clients
 */
export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export interface HttpTextResponse {
  status: number;
  ok: boolean;
  text: string;
}

export interface RequestOptions {
  /** Service name used in logs and error messages */
  service: string;
  timeoutMs: number;
  method?: 'GET' | 'POST';
  body?: unknown;
}

/**
 * Perform one HTTP request and read the body as text.
 * Does not check the status code, callers decide what a failure is.
 */
export async function requestText(
  fetchFn: FetchFn,
  url: string,
  options: RequestOptions
): Promise<HttpTextResponse> {
  const { service, timeoutMs, method = 'GET', body } = options;
  const startTime = Date.now();

  const init: RequestInit = {
    method,
    signal: AbortSignal.timeout(timeoutMs),
    headers: { Accept: 'application/json' },
  };
  if (body !== undefined) {
    init.body = JSON.stringify(body);
    init.headers = { Accept: 'application/json', 'Content-Type': 'application/json' };
  }

  logger.debug(`${service} request: ${method} ${redactUrl(url)}`, body !== undefined ? { body } : undefined);

  let response: Response;
  let text: string;
  try {
    response = await fetchFn(url, init);
    text = await response.text();
  } catch (error: unknown) {
    if (isTimeout(error)) {
      throw new UpstreamError(`${service} request timed out after ${timeoutMs}ms`, {
        code: ErrorCode.UPSTREAM_TIMEOUT,
      });
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new UpstreamError(`${service} request failed: ${reason}`, {
      code: ErrorCode.UPSTREAM_HTTP_ERROR,
    });
  }

  logger.debug(`${service} response: HTTP ${response.status} - ${Date.now() - startTime}ms`, {
    body: text.slice(0, 500),
  });

  return { status: response.status, ok: response.ok, text };
}

/**
 * Parse a JSON body, failing with UpstreamError that carries the raw text
 */
export function parseJsonBody(service: string, response: HttpTextResponse): unknown {
  try {
    return JSON.parse(response.text);
  } catch {
    throw new UpstreamError(`${service} returned a body that is not JSON`, {
      status: response.status,
      body: response.text,
    });
  }
}

/**
 * Fail with UpstreamError unless the status is 2xx
 */
export function assertOk(service: string, response: HttpTextResponse): void {
  if (!response.ok) {
    throw new UpstreamError(`${service} returned HTTP ${response.status}`, {
      status: response.status,
      body: response.text,
      code: ErrorCode.UPSTREAM_HTTP_ERROR,
    });
  }
}

function isTimeout(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'name' in error &&
    (error.name === 'TimeoutError' || error.name === 'AbortError')
  );
}

/**
 * Build a URL with query parameters
 */
export function buildUrl(base: string, params: Record<string, string>): string {
  const query = new URLSearchParams(params).toString();
  return query ? `${base}?${query}` : base;
}
