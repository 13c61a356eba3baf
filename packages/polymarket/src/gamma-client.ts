import { z } from 'zod';
import type { CatalogEntry, MarketCatalog } from '@strike-quoter/core';
import { EndpointRateLimiter } from './rate-limiter.js';
import { requestJson, type FetchLike } from './http.js';

export interface GammaClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  pageSize?: number;
  fetchImpl?: FetchLike;
}

// Gamma encodes list fields as JSON strings ("[\"Yes\", \"No\"]").
const jsonStringArray = z.preprocess((value) => {
  if (typeof value !== 'string') {
    return value;
  }
  try {
    return JSON.parse(value);
  } catch {
    return value;
  }
}, z.array(z.string()));

export const gammaMarketSchema = z.object({
  id: z.coerce.string(),
  question: z.string(),
  slug: z.string().optional(),
  active: z.boolean().default(false),
  closed: z.boolean().default(false),
  outcomes: jsonStringArray.default([]),
  clobTokenIds: jsonStringArray.default([]),
});

export type GammaMarket = z.infer<typeof gammaMarketSchema>;

export function toCatalogEntry(market: GammaMarket): CatalogEntry {
  return {
    id: market.id,
    description: market.question,
    active: market.active && !market.closed,
    tokens: market.clobTokenIds.map((tokenId, index) => ({
      tokenId,
      outcome: market.outcomes[index] ?? `Outcome ${index + 1}`,
    })),
  };
}

export class GammaClient implements MarketCatalog {
  private baseUrl: string;
  private timeoutMs: number;
  private pageSize: number;
  private fetchImpl: FetchLike;
  private rateLimiter: EndpointRateLimiter;

  constructor(options: GammaClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? 'https://gamma-api.polymarket.com';
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.pageSize = options.pageSize ?? 500;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    // 4000 requests per 10 seconds
    this.rateLimiter = new EndpointRateLimiter({}, { burst: 400, perSecond: 400 });
  }

  async getMarkets(active: boolean = true): Promise<GammaMarket[]> {
    const limiter = this.rateLimiter.for('markets');
    const params = new URLSearchParams({
      active: String(active),
      closed: 'false',
      limit: String(this.pageSize),
    });

    return requestJson({
      baseUrl: this.baseUrl,
      endpoint: `/markets?${params.toString()}`,
      schema: z.array(gammaMarketSchema),
      limiter,
      timeoutMs: this.timeoutMs,
      fetchImpl: this.fetchImpl,
    });
  }

  async getActiveInstruments(): Promise<CatalogEntry[]> {
    const markets = await this.getMarkets(true);
    return markets.map(toCatalogEntry).filter((entry) => entry.active);
  }
}
