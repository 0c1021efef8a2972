/**
 * Storage-appliance REST client.
 *
 * Thin JSON transport over the appliance management API with per-request
 * timeouts and exponential-backoff retries for timeouts, connection failures
 * and 5xx responses. 4xx responses are never retried.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { APPLIANCE_DEFAULTS, SERVER_NAME, SERVER_VERSION } from '../constants.js';
import { Errors, GatewayError } from '../errors/index.js';
import { logger } from '../utils/logger.js';
import type { ApplianceSettings } from '../config/settings.js';

export type QueryParams = Record<string, string | number | boolean | undefined>;

/**
 * Request/response transport consumed by the tool groups.
 */
export interface ApplianceTransport {
  get(path: string, params?: QueryParams): Promise<unknown>;
  post(path: string, body?: unknown): Promise<unknown>;
  put(path: string, body?: unknown): Promise<unknown>;
  delete(path: string, body?: unknown): Promise<unknown>;
}

type FailureKind = 'timeout' | 'connection' | 'server';

interface ClientOptions {
  fetchImpl?: typeof fetch;
}

export class ApplianceHttpClient implements ApplianceTransport {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private requestCount = 0;
  private errorCount = 0;

  constructor(private readonly settings: ApplianceSettings & { url: string }, options: ClientOptions = {}) {
    this.baseUrl = `${settings.url.replace(/\/+$/, '')}${APPLIANCE_DEFAULTS.API_PREFIX}`;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  get(path: string, params?: QueryParams): Promise<unknown> {
    return this.request('GET', path, { params });
  }

  post(path: string, body?: unknown): Promise<unknown> {
    return this.request('POST', path, { body });
  }

  put(path: string, body?: unknown): Promise<unknown> {
    return this.request('PUT', path, { body });
  }

  delete(path: string, body?: unknown): Promise<unknown> {
    return this.request('DELETE', path, { body });
  }

  getStats(): { requests: number; errors: number } {
    return { requests: this.requestCount, errors: this.errorCount };
  }

  private buildUrl(path: string, params?: QueryParams): string {
    const url = new URL(`${this.baseUrl}${path.startsWith('/') ? path : `/${path}`}`);
    for (const [key, value] of Object.entries(params ?? {})) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }

  private async request(
    method: string,
    path: string,
    options: { params?: QueryParams; body?: unknown }
  ): Promise<unknown> {
    const url = this.buildUrl(path, options.params);
    const maxRetries = Math.max(1, this.settings.maxRetries);
    let lastFailure: FailureKind = 'connection';
    let lastStatus = 0;
    let lastBody = '';

    for (let attempt = 0; attempt < maxRetries; attempt++) {
      this.requestCount += 1;
      logger.debug('Appliance request', { method, path, attempt: attempt + 1 });

      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          method,
          headers: {
            Authorization: `Bearer ${this.settings.apiKey}`,
            'Content-Type': 'application/json',
            Accept: 'application/json',
            'User-Agent': `${SERVER_NAME}/${SERVER_VERSION}`
          },
          body: options.body === undefined ? undefined : JSON.stringify(options.body),
          signal: AbortSignal.timeout(this.settings.timeoutMs)
        });
      } catch (error) {
        this.errorCount += 1;
        lastFailure = error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')
          ? 'timeout'
          : 'connection';
        await this.backoff(attempt, maxRetries, `${lastFailure}: ${error instanceof Error ? error.message : String(error)}`);
        continue;
      }

      if (response.status >= 500) {
        this.errorCount += 1;
        lastFailure = 'server';
        lastStatus = response.status;
        lastBody = await response.text();
        await this.backoff(attempt, maxRetries, `HTTP ${response.status}`);
        continue;
      }

      if (response.status >= 400) {
        this.errorCount += 1;
        throw await this.clientError(response, path);
      }

      const text = await response.text();
      if (response.status === 204 || text.length === 0) {
        return null;
      }
      try {
        return JSON.parse(text);
      } catch {
        return text;
      }
    }

    logger.error('Appliance request failed', { method, path, attempts: maxRetries, failure: lastFailure });
    if (lastFailure === 'timeout') throw Errors.applianceTimeout(maxRetries);
    if (lastFailure === 'connection') throw Errors.applianceConnection(maxRetries);
    throw Errors.applianceApi(lastStatus, lastBody || `Request failed after ${maxRetries} attempts`);
  }

  private async backoff(attempt: number, maxRetries: number, reason: string): Promise<void> {
    if (attempt >= maxRetries - 1) {
      return;
    }
    const waitMs = this.settings.retryBackoffMs * 2 ** attempt;
    logger.warn('Appliance request failed, retrying', {
      attempt: attempt + 1,
      max_retries: maxRetries,
      wait_ms: waitMs,
      reason
    });
    if (waitMs > 0) {
      await sleep(waitMs);
    }
  }

  private async clientError(response: Response, path: string): Promise<GatewayError> {
    const body = await response.text();
    switch (response.status) {
      case 401:
      case 403:
        return Errors.applianceAuth(response.status);
      case 404:
        return Errors.applianceNotFound(path);
      case 429:
        return Errors.applianceRateLimited();
      default:
        return Errors.applianceApi(response.status, body);
    }
  }
}
