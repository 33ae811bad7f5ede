import { DEFAULT_REQUEST_TIMEOUT_MS } from '../constants.js';
import { MissingDependencyError } from '../errors.js';
import type { HttpRequest, StatusCategory } from '../types/poznote.js';

export type TransportOutcome =
  | { kind: 'response'; status: number; body: string }
  | { kind: 'failure'; category: 'network-error' | 'timeout'; message: string };

/**
 * Map an HTTP status code onto the category the CLI reports.
 */
export function classifyStatus(status: number): StatusCategory {
  if (status >= 200 && status < 300) return 'success';
  if (status === 401 || status === 403) return 'unauthorized';
  if (status === 404) return 'not-found';
  if (status >= 500 && status < 600) return 'server-error';
  return 'client-error';
}

// DOMException from AbortSignal.timeout() is matched by name.
function errorName(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'name' in error) {
    return typeof error.name === 'string' ? error.name : undefined;
  }
  return undefined;
}

function describeNetworkError(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  const cause: unknown = error.cause;
  if (cause instanceof Error) {
    const code = 'code' in cause ? cause.code : undefined;
    return typeof code === 'string'
      ? `${error.message} (${code})`
      : `${error.message} (${cause.message})`;
  }
  return error.message;
}

export function assertFetchAvailable(): void {
  if (typeof globalThis.fetch !== 'function') {
    throw new MissingDependencyError(
      'Global fetch is unavailable: Node.js 20 or newer is required',
    );
  }
}

/**
 * Base HTTP client for the Poznote REST API.
 * Sends one request with a bounded timeout and never throws.
 */
export class HttpClient {
  protected timeoutMs: number;

  constructor(timeoutMs: number = DEFAULT_REQUEST_TIMEOUT_MS) {
    this.timeoutMs = timeoutMs;
  }

  async send(request: HttpRequest): Promise<TransportOutcome> {
    const options: RequestInit = {
      method: request.method,
      headers: request.headers,
      signal: AbortSignal.timeout(this.timeoutMs),
    };

    if (request.body !== undefined) {
      options.body = request.body;
    }

    try {
      const response = await fetch(request.url, options);
      const body = await response.text();
      return { kind: 'response', status: response.status, body };
    } catch (error) {
      const name = errorName(error);
      if (name === 'TimeoutError' || name === 'AbortError') {
        return {
          kind: 'failure',
          category: 'timeout',
          message: `Request timed out after ${this.timeoutMs} ms`,
        };
      }
      return {
        kind: 'failure',
        category: 'network-error',
        message: describeNetworkError(error),
      };
    }
  }
}
