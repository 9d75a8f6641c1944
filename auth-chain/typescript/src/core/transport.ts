/**
 * HTTP Transport
 *
 * HTTP client interface and implementations for provider exchanges.
 */

import { AuthError, AuthErrorKind } from '../errors/index.js';
import { cancelledError } from './sleep.js';

/** Default per-request timeout in milliseconds. */
export const DEFAULT_HTTP_TIMEOUT_MS = 30000;

/**
 * HTTP request definition.
 */
export interface HttpRequest {
  method: 'GET' | 'POST' | 'PUT' | 'DELETE';
  url: string;
  headers?: Record<string, string>;
  body?: string;
  timeout?: number;
  /** Caller cancellation signal */
  signal?: AbortSignal;
}

/**
 * HTTP response definition.
 */
export interface HttpResponse {
  status: number;
  statusText: string;
  headers: Record<string, string>;
  body: string;
}

/**
 * HTTP transport interface (for dependency injection).
 */
export interface HttpTransport {
  /**
   * Send an HTTP request.
   */
  send(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * Default fetch-based HTTP transport.
 */
export class FetchHttpTransport implements HttpTransport {
  private readonly defaultTimeout: number;
  private readonly maxResponseSize: number;

  constructor(options?: { timeout?: number; maxResponseSize?: number }) {
    this.defaultTimeout = options?.timeout ?? DEFAULT_HTTP_TIMEOUT_MS;
    this.maxResponseSize = options?.maxResponseSize ?? 1048576; // 1MB
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    if (request.signal?.aborted) {
      throw cancelledError(`${request.method} ${request.url}`);
    }

    const timeout = request.timeout ?? this.defaultTimeout;
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeout);
    const onCallerAbort = (): void => controller.abort();
    request.signal?.addEventListener('abort', onCallerAbort, { once: true });

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
        redirect: 'manual',
      });

      if (response.status >= 300 && response.status < 400) {
        const location = response.headers.get('location');
        throw new AuthError(
          AuthErrorKind.AuthenticationFailed,
          `Unexpected redirect from ${request.url} to ${location}`,
          { statusCode: response.status, context: { endpoint: request.url } }
        );
      }

      const body = await this.readBody(response);

      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key.toLowerCase()] = value;
      });

      return {
        status: response.status,
        statusText: response.statusText,
        headers,
        body,
      };
    } catch (error) {
      if (error instanceof AuthError) {
        throw error;
      }

      if (error instanceof Error && error.name === 'AbortError') {
        if (!timedOut) {
          throw cancelledError(`${request.method} ${request.url}`);
        }
        throw new AuthError(
          AuthErrorKind.AuthenticationFailed,
          `Request to ${request.url} timed out after ${timeout}ms`,
          { cause: error, context: { endpoint: request.url } }
        );
      }

      const message = error instanceof Error ? error.message : String(error);
      throw new AuthError(
        AuthErrorKind.AuthenticationFailed,
        `Request to ${request.url} failed: ${message}`,
        { cause: error, context: { endpoint: request.url } }
      );
    } finally {
      clearTimeout(timeoutId);
      request.signal?.removeEventListener('abort', onCallerAbort);
    }
  }

  private async readBody(response: Response): Promise<string> {
    const contentLength = response.headers.get('content-length');
    if (contentLength && parseInt(contentLength, 10) > this.maxResponseSize) {
      throw new AuthError(
        AuthErrorKind.AuthenticationFailed,
        `Response too large: ${contentLength} bytes`
      );
    }

    const reader = response.body?.getReader();
    if (!reader) {
      return '';
    }

    const chunks: Uint8Array[] = [];
    let totalSize = 0;

    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      totalSize += value.length;
      if (totalSize > this.maxResponseSize) {
        await reader.cancel();
        throw new AuthError(
          AuthErrorKind.AuthenticationFailed,
          `Response too large: ${totalSize} bytes`
        );
      }

      chunks.push(value);
    }

    return Buffer.concat(chunks).toString('utf-8');
  }
}

/**
 * Handler used by {@link MockHttpTransport} to compute responses dynamically.
 */
export type MockHandler = (request: HttpRequest) => HttpResponse | Promise<HttpResponse>;

/**
 * Mock HTTP transport for testing.
 */
export class MockHttpTransport implements HttpTransport {
  private readonly responses: Array<HttpResponse | MockHandler> = [];
  private requestHistory: HttpRequest[] = [];
  private defaultResponse?: HttpResponse;

  /**
   * Queue a response or handler to return.
   */
  queueResponse(response: HttpResponse | MockHandler): this {
    this.responses.push(response);
    return this;
  }

  /**
   * Set default response when queue is empty.
   */
  setDefaultResponse(response: HttpResponse): this {
    this.defaultResponse = response;
    return this;
  }

  /**
   * Queue a JSON response.
   */
  queueJsonResponse(status: number, body: unknown): this {
    return this.queueResponse(jsonResponse(status, body));
  }

  /**
   * Queue an OAuth error response.
   */
  queueErrorResponse(status: number, error: string, description?: string): this {
    return this.queueJsonResponse(status, {
      error,
      error_description: description,
    });
  }

  getRequests(): HttpRequest[] {
    return [...this.requestHistory];
  }

  getLastRequest(): HttpRequest | undefined {
    return this.requestHistory[this.requestHistory.length - 1];
  }

  clearHistory(): void {
    this.requestHistory = [];
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.requestHistory.push(request);

    if (request.signal?.aborted) {
      throw cancelledError(`${request.method} ${request.url}`);
    }

    const next = this.responses.shift() ?? this.defaultResponse;
    if (!next) {
      throw new Error('No mock response available');
    }

    return typeof next === 'function' ? next(request) : next;
  }
}

/**
 * Builds a JSON response value.
 */
export function jsonResponse(status: number, body: unknown): HttpResponse {
  return {
    status,
    statusText: status >= 200 && status < 300 ? 'OK' : 'Error',
    headers: { 'content-type': 'application/json' },
    body: JSON.stringify(body),
  };
}

/**
 * Parses a JSON body into a plain object, or undefined when it is not one.
 */
export function parseJsonObject(body: string): Record<string, unknown> | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return undefined;
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return undefined;
  }
  return Object.fromEntries(Object.entries(parsed));
}

/**
 * Create production HTTP transport.
 */
export function createTransport(timeout?: number): HttpTransport {
  return new FetchHttpTransport({ timeout });
}
