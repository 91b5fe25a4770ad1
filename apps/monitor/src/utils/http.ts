/**
 * HTTP Client Utilities
 *
 * Provides a consistent interface for making HTTP requests with:
 * - Automatic error handling and typed errors
 * - Classification of failures into transport / protocol / unexpected
 * - Request timeout support
 * - Zurg request headers (identifying user agent, optional Basic auth)
 */

import { APP_INFO } from '@zurgmon/shared';
import { ExternalServiceError } from './errors.js';

/**
 * HTTP client error with service context
 */
export class HttpClientError extends Error {
  public readonly statusCode: number;
  public readonly statusText: string;
  public readonly service: string;
  public readonly url: string;

  constructor(options: {
    service: string;
    statusCode: number;
    statusText: string;
    url: string;
    message?: string;
  }) {
    const message =
      options.message ||
      `${options.service} request failed: ${options.statusCode} ${options.statusText}`;
    super(message);
    this.name = 'HttpClientError';
    this.service = options.service;
    this.statusCode = options.statusCode;
    this.statusText = options.statusText;
    this.url = options.url;

    Error.captureStackTrace(this, this.constructor);
    Object.setPrototypeOf(this, HttpClientError.prototype);
  }

  /**
   * Convert to ExternalServiceError for known services
   */
  toExternalServiceError(): ExternalServiceError | this {
    if (this.service === 'zurg') {
      return new ExternalServiceError(this.service, this.message, {
        statusCode: this.statusCode,
        url: this.url,
      });
    }
    return this;
  }
}

/**
 * Options for HTTP requests
 */
export interface HttpRequestOptions extends Omit<RequestInit, 'signal'> {
  /** Service name for error messages */
  service?: string;
  /** Request timeout in milliseconds */
  timeout?: number;
}

/**
 * Check if response is OK, throw HttpClientError if not
 */
function assertResponseOk(response: Response, url: string, options: HttpRequestOptions): void {
  if (response.ok) return;

  throw new HttpClientError({
    service: options.service || 'API',
    statusCode: response.status,
    statusText: response.statusText,
    url,
  });
}

/**
 * Fetch text content from a URL
 *
 * @example
 * const html = await fetchText('http://localhost:9999/manage/', {
 *   service: 'zurg',
 *   timeout: 30000,
 * });
 */
export async function fetchText(url: string, options: HttpRequestOptions = {}): Promise<string> {
  const { timeout, ...fetchOptions } = options;

  const response = await fetch(url, {
    ...fetchOptions,
    signal: timeout ? AbortSignal.timeout(timeout) : undefined,
  });

  assertResponseOk(response, url, options);

  return response.text();
}

// ============================================================================
// Failure Classification
// ============================================================================

/**
 * Why a request produced no data
 * - transport: the remote could not be reached (DNS, connect, timeout)
 * - protocol: the remote answered with a non-2xx status
 * - unexpected: anything else
 */
export type RequestFailure =
  | { kind: 'transport'; url: string; reason: string }
  | { kind: 'protocol'; url: string; reason: string; statusCode: number }
  | { kind: 'unexpected'; url: string; reason: string };

function errorName(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'name' in error) {
    const { name } = error;
    return typeof name === 'string' ? name : undefined;
  }
  return undefined;
}

/**
 * Describe the low-level cause of a failed fetch (e.g. "connect ECONNREFUSED 127.0.0.1:9999")
 */
function describeCause(error: Error): string {
  const cause: unknown = error.cause;
  if (cause instanceof Error) {
    const code = 'code' in cause && typeof cause.code === 'string' ? cause.code : undefined;
    return code && !cause.message.includes(code) ? `${code}: ${cause.message}` : cause.message;
  }
  return error.message;
}

/**
 * Map an error thrown by fetch/fetchText to a RequestFailure
 */
export function classifyRequestError(error: unknown, url: string, timeoutMs?: number): RequestFailure {
  if (error instanceof HttpClientError) {
    return {
      kind: 'protocol',
      url,
      statusCode: error.statusCode,
      reason: `${error.statusCode} ${error.statusText}`.trim(),
    };
  }

  const name = errorName(error);
  if (name === 'TimeoutError' || name === 'AbortError') {
    return {
      kind: 'transport',
      url,
      reason: timeoutMs ? `timed out after ${timeoutMs}ms` : 'request aborted',
    };
  }

  // undici reports DNS and connection failures as TypeError('fetch failed') with a cause
  if (error instanceof TypeError && error.message === 'fetch failed') {
    return { kind: 'transport', url, reason: describeCause(error) };
  }

  return {
    kind: 'unexpected',
    url,
    reason: error instanceof Error ? error.message : String(error),
  };
}

// ============================================================================
// Header Helpers
// ============================================================================

/**
 * Build the Basic auth header value, or undefined when credentials are incomplete
 */
export function basicAuthorization(username?: string, password?: string): string | undefined {
  if (!username || !password) return undefined;
  return `Basic ${Buffer.from(`${username}:${password}`).toString('base64')}`;
}

/**
 * Helper to create Zurg request headers
 */
export function zurgHeaders(credentials?: {
  username?: string;
  password?: string;
}): Record<string, string> {
  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
    'User-Agent': APP_INFO.USER_AGENT,
  };

  const authorization = basicAuthorization(credentials?.username, credentials?.password);
  if (authorization) {
    headers['Authorization'] = authorization;
  }

  return headers;
}
