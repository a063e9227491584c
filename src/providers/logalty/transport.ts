/**
 * HTTP transport for the Logalty API.
 *
 * One fetch exchange per call, bounded by a timeout. Failures are classified
 * into the gateway error taxonomy: timeouts and connection failures become
 * TransientNetworkError, error statuses and unreadable bodies RemoteApiError.
 */

import { RemoteApiError, TransientNetworkError, describeError } from '../../errors.js';

export interface HttpTransportConfig {
  /** Base URL of the remote API, without trailing slash */
  baseUrl: string;
  /** Request timeout in milliseconds */
  timeoutMs: number;
  /** Custom fetch implementation (for testing) */
  fetch?: typeof fetch;
}

export interface TransportRequest {
  method: 'GET' | 'POST' | 'PUT' | 'DELETE';
  path: string;
  /** Bearer token for the Authorization header */
  token?: string;
  /** JSON body */
  json?: Record<string, unknown>;
  /** Form-encoded body */
  form?: Record<string, string>;
}

const MAX_ERROR_BODY_LENGTH = 500;

export class HttpTransport {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;

  constructor(config: HttpTransportConfig) {
    if (!config.baseUrl) throw new Error('baseUrl is required');

    this.baseUrl = config.baseUrl.replace(/\/$/, '');
    this.timeoutMs = config.timeoutMs;
    this.fetchFn = config.fetch ?? globalThis.fetch.bind(globalThis);
  }

  /**
   * Send a request and parse the response body as JSON. An empty body yields
   * `undefined`.
   */
  async requestJson(request: TransportRequest): Promise<unknown> {
    const { status, body } = await this.exchange(request);
    if (body.trim() === '') return undefined;

    try {
      return JSON.parse(body);
    } catch {
      throw new RemoteApiError(
        status,
        `${request.method} ${request.path} returned a body that is not valid JSON`,
        body.slice(0, MAX_ERROR_BODY_LENGTH),
      );
    }
  }

  /**
   * Send a request whose response body is of no interest.
   */
  async request(request: TransportRequest): Promise<void> {
    await this.exchange(request);
  }

  private async exchange(request: TransportRequest): Promise<{ status: number; body: string }> {
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);

    const headers: Record<string, string> = { Accept: 'application/json' };
    let body: string | undefined;

    if (request.token) {
      headers['Authorization'] = `Bearer ${request.token}`;
    }
    if (request.form) {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
      body = new URLSearchParams(request.form).toString();
    } else if (request.json) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(request.json);
    }

    try {
      const response = await this.fetchFn(`${this.baseUrl}${request.path}`, {
        method: request.method,
        headers,
        body,
        signal: controller.signal,
      });
      const text = await response.text();

      if (!response.ok) {
        throw new RemoteApiError(
          response.status,
          `${request.method} ${request.path} failed: HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ''}`,
          text.slice(0, MAX_ERROR_BODY_LENGTH),
        );
      }

      return { status: response.status, body: text };
    } catch (error) {
      if (error instanceof RemoteApiError) throw error;
      if (timedOut) {
        throw new TransientNetworkError(
          'timeout',
          `${request.method} ${request.path} timed out after ${this.timeoutMs}ms`,
          { cause: error },
        );
      }
      throw new TransientNetworkError(
        'connection',
        `${request.method} ${request.path} failed: ${describeError(error)}`,
        { cause: error },
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
