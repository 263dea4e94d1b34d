/**
 * Exchange Adapter - Market Data Provider over the JSON-RPC betting API
 *
 * listEvents -> events for a team within a sport
 * listMarketCatalogue -> markets of an event, filtered by type code
 * listMarketBook -> best lay offer per runner
 */

import type { ExchangeEvent, MarketCatalogue, MarketDataProvider } from '@valuebet/core';
import { ProxyAgent } from 'undici';
import { z } from 'zod';
import { BaseAdapter, undiciTransport } from './base.adapter.js';
import { type ExchangeConfig, loadExchangeConfig } from './exchange.config.js';
import type { Transport } from './types.js';

const API_PREFIX = 'SportsAPING/v1.0/';
const MAX_CATALOGUE_RESULTS = 100;

/**
 * Error reported inside a JSON-RPC response
 */
export class ExchangeApiError extends Error {
  constructor(
    message: string,
    public readonly method: string,
    public readonly code?: number,
    public readonly errorCode?: string
  ) {
    super(message);
    this.name = 'ExchangeApiError';
  }
}

// ============================================================================
// RESPONSE SHAPES
// ============================================================================

const rpcEnvelopeSchema = z.object({
  result: z.unknown().optional(),
  error: z
    .object({
      code: z.number().optional(),
      message: z.string().optional(),
      data: z
        .object({
          APINGException: z.object({ errorCode: z.string().optional() }).optional(),
        })
        .optional(),
    })
    .optional(),
});

const eventResultSchema = z.array(
  z.object({
    event: z.object({
      id: z.string(),
      name: z.string(),
      openDate: z.string().optional(),
    }),
    marketCount: z.number().optional(),
  })
);

const catalogueResultSchema = z.array(
  z.object({
    marketId: z.string(),
    marketName: z.string(),
    marketStartTime: z.string().optional(),
    runners: z.array(z.object({ selectionId: z.number(), runnerName: z.string() })).default([]),
  })
);

const bookResultSchema = z.array(
  z.object({
    marketId: z.string(),
    runners: z
      .array(
        z.object({
          selectionId: z.number(),
          ex: z
            .object({
              availableToLay: z.array(z.object({ price: z.number(), size: z.number().optional() })).default([]),
            })
            .optional(),
        })
      )
      .default([]),
  })
);

export class ExchangeAdapter extends BaseAdapter implements MarketDataProvider {
  private readonly exchangeConfig: ExchangeConfig;
  private requestId = 0;

  constructor(config: ExchangeConfig = loadExchangeConfig(), transport?: Transport) {
    super(
      {
        label: '[exchange]',
        timeoutMs: config.timeoutMs,
        maxAttempts: config.maxAttempts,
        retryDelayMs: config.retryDelayMs,
      },
      transport ?? undiciTransport(config.proxyUrl ? new ProxyAgent(config.proxyUrl) : undefined)
    );
    this.exchangeConfig = config;

    if (config.proxyUrl && !transport) {
      console.log(`[exchange] Using proxy: ${config.proxyUrl}`);
    }
    if (!config.appKey || !config.sessionToken) {
      console.warn('[exchange] EXCHANGE_APP_KEY or EXCHANGE_SESSION_TOKEN not set, requests will be rejected');
    }
  }

  async findEvents(teamQuery: string, sportId: string): Promise<ExchangeEvent[]> {
    const result = await this.call(
      'listEvents',
      { filter: { eventTypeIds: [sportId], textQuery: teamQuery } },
      eventResultSchema
    );
    return result.map(({ event }) => ({ id: event.id, name: event.name, openDate: event.openDate ?? '' }));
  }

  async listMarketCatalogue(eventId: string, typeCodes: readonly string[]): Promise<MarketCatalogue[]> {
    if (typeCodes.length === 0) return [];
    return this.call(
      'listMarketCatalogue',
      {
        filter: { eventIds: [eventId], marketTypeCodes: [...typeCodes] },
        maxResults: MAX_CATALOGUE_RESULTS,
        marketProjection: ['RUNNER_DESCRIPTION'],
      },
      catalogueResultSchema
    );
  }

  async bestLayPrice(marketId: string, selectionId: number): Promise<number | null> {
    const books = await this.call(
      'listMarketBook',
      { marketIds: [marketId], priceProjection: { priceData: ['EX_BEST_OFFERS'] } },
      bookResultSchema
    );

    const runner = books[0]?.runners.find((r) => r.selectionId === selectionId);
    const best = runner?.ex?.availableToLay[0];
    return best ? best.price : null;
  }

  /**
   * One JSON-RPC call; API errors and unexpected shapes raise ExchangeApiError
   */
  private async call<T>(method: string, params: unknown, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const payload = { jsonrpc: '2.0', method: `${API_PREFIX}${method}`, params, id: ++this.requestId };
    const raw = await this.postJsonWithRetry(this.exchangeConfig.baseUrl, payload, {
      'X-Application': this.exchangeConfig.appKey,
      'X-Authentication': this.exchangeConfig.sessionToken,
    });

    const envelope = rpcEnvelopeSchema.safeParse(raw);
    if (!envelope.success) {
      throw new ExchangeApiError(`${method}: malformed JSON-RPC response`, method);
    }

    const { error, result } = envelope.data;
    if (error) {
      const errorCode = error.data?.APINGException?.errorCode;
      throw new ExchangeApiError(
        `${method} failed: ${errorCode ?? error.message ?? 'unknown error'}`,
        method,
        error.code,
        errorCode
      );
    }

    const parsed = schema.safeParse(result ?? []);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new ExchangeApiError(`${method}: unexpected result shape (${issues})`, method);
    }
    return parsed.data;
  }
}
