/**
 * Base Adapter - HTTP plumbing shared by exchange adapters
 */

import { fetch, type Dispatcher } from 'undici';
import { HttpError, retryAfterMs, withRetry } from './retry.js';
import type { Transport, TransportResponse } from './types.js';

const MAX_RETRY_DELAY_MS = 10000;

export interface BaseAdapterConfig {
  /** Log prefix, e.g. [exchange] */
  label: string;
  timeoutMs: number;
  maxAttempts: number;
  retryDelayMs: number;
}

/**
 * Transport over undici fetch, optionally through a dispatcher (proxy)
 */
export function undiciTransport(dispatcher?: Dispatcher): Transport {
  return (url, request) => fetch(url, { ...request, dispatcher });
}

/**
 * Abstract base class for adapters
 * POSTs JSON with timeout handling and retry with exponential backoff
 */
export abstract class BaseAdapter {
  constructor(
    protected readonly baseConfig: BaseAdapterConfig,
    private readonly transport: Transport
  ) {}

  /**
   * POST a JSON body and parse the JSON response.
   * Non-2xx responses raise HttpError; Retry-After is honoured.
   */
  protected async postJsonWithRetry(
    url: string,
    body: unknown,
    headers: Record<string, string> = {}
  ): Promise<unknown> {
    const { label } = this.baseConfig;
    return withRetry(
      async () => {
        const response = await this.postWithTimeout(url, JSON.stringify(body), headers);
        if (!response.ok) {
          const errorBody = await response.text().catch((err: unknown) => {
            console.warn(`${label} Could not read error body: ${err}`);
            return '';
          });
          throw new HttpError(
            `${label} API error: ${response.status} ${response.statusText}${errorBody ? `: ${errorBody}` : ''}`,
            response.status,
            retryAfterMs(response.headers.get('Retry-After'))
          );
        }

        const text = await response.text();
        try {
          return JSON.parse(text);
        } catch {
          throw new Error(`${label} Response is not JSON: ${text.slice(0, 200)}`);
        }
      },
      {
        maxAttempts: this.baseConfig.maxAttempts,
        baseDelayMs: this.baseConfig.retryDelayMs,
        maxDelayMs: MAX_RETRY_DELAY_MS,
      },
      label
    );
  }

  /**
   * Single POST with timeout using AbortController
   */
  private async postWithTimeout(url: string, body: string, headers: Record<string, string>): Promise<TransportResponse> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.baseConfig.timeoutMs);

    try {
      return await this.transport(url, {
        method: 'POST',
        headers: {
          Accept: 'application/json',
          'Content-Type': 'application/json',
          ...headers,
        },
        body,
        signal: controller.signal,
      });
    } finally {
      clearTimeout(timeout);
    }
  }
}
