import { z } from 'zod';
import Decimal from 'decimal.js';
import type { ExchangeClient, Fill, OrderId, SubmitOrderRequest, TokenId } from '@strike-quoter/core';
import { BPS, ExchangeRequestError } from '@strike-quoter/core';
import { EndpointRateLimiter, type RateLimit, type RateLimiter } from './rate-limiter.js';
import { requestJson, type FetchLike } from './http.js';

export interface ClobRestClientOptions {
  baseUrl: string;
  apiKey?: string;
  /** Funder address of this account; identifies our maker orders alongside the API key. */
  makerAddress?: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

const CLOB_LIMITS: Record<string, RateLimit> = {
  order: { burst: 60, perSecond: 10 },
  data: { burst: 60, perSecond: 1 },
  // looked up before every submission
  'fee-rate': { burst: 60, perSecond: 10 },
};

const FALLBACK_LIMIT: RateLimit = { burst: 10, perSecond: 10 / 60 };

const decimalString = z.string().regex(/^-?\d+(\.\d+)?$/);

const postOrderResponseSchema = z.object({
  success: z.boolean().optional(),
  orderID: z.string().optional(),
  errorMsg: z.string().optional(),
});

const cancelResponseSchema = z.object({
  canceled: z.array(z.string()).default([]),
  not_canceled: z.record(z.string()).default({}),
});

const openOrderSchema = z.object({
  id: z.string(),
});

// The CLOB answers list endpoints either with a bare array or a cursor page.
function listOf<T extends z.ZodTypeAny>(item: T) {
  return z.union([
    z.array(item),
    z.object({ data: z.array(item) }).transform((page) => page.data),
  ]);
}

const feeRateResponseSchema = z.object({
  base_fee: z.coerce.number().nonnegative(),
});

const sideSchema = z.enum(['BUY', 'SELL']);

const makerOrderSchema = z.object({
  order_id: z.string(),
  owner: z.string().optional(),
  maker_address: z.string().optional(),
  asset_id: z.string().optional(),
  side: sideSchema.optional(),
  price: decimalString,
  matched_amount: decimalString,
  fee_rate_bps: decimalString.default('0'),
});

const tradeSchema = z.object({
  id: z.string(),
  taker_order_id: z.string(),
  asset_id: z.string(),
  side: sideSchema,
  price: decimalString,
  size: decimalString,
  fee_rate_bps: decimalString.default('0'),
  match_time: z.string().regex(/^\d+$/),
  trader_side: z.enum(['TAKER', 'MAKER']).default('TAKER'),
  maker_orders: z.array(makerOrderSchema).default([]),
});

type TradeResponse = z.infer<typeof tradeSchema>;
type MakerOrderResponse = z.infer<typeof makerOrderSchema>;
type Side = z.infer<typeof sideSchema>;

function toOrderSide(side: Side): Fill['side'] {
  return side === 'BUY' ? 'buy' : 'sell';
}

/**
 * REST client for the Polymarket CLOB. Order signing is not handled here:
 * the order payload is posted as-is under the configured API credential.
 */
export class ClobRestClient implements ExchangeClient {
  private baseUrl: string;
  private apiKey?: string;
  private makerAddress?: string;
  private timeoutMs: number;
  private fetchImpl: FetchLike;
  private rateLimiter: EndpointRateLimiter;

  constructor(options: ClobRestClientOptions) {
    this.baseUrl = options.baseUrl;
    this.apiKey = options.apiKey;
    this.makerAddress = options.makerAddress?.toLowerCase();
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.rateLimiter = new EndpointRateLimiter(CLOB_LIMITS, FALLBACK_LIMIT);
  }

  private limiterFor(endpoint: string): RateLimiter {
    return this.rateLimiter.for(endpoint.split(/[/?]/)[1] || 'default');
  }

  private request<T>(
    endpoint: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    init?: RequestInit
  ): Promise<T> {
    const headers: Record<string, string> = {};
    if (this.apiKey) {
      headers['Authorization'] = `Bearer ${this.apiKey}`;
    }

    return requestJson({
      baseUrl: this.baseUrl,
      endpoint,
      schema,
      limiter: this.limiterFor(endpoint),
      timeoutMs: this.timeoutMs,
      fetchImpl: this.fetchImpl,
      init,
      headers,
    });
  }

  async submit(request: SubmitOrderRequest): Promise<OrderId> {
    const body = {
      order: {
        tokenID: request.tokenId,
        side: request.side === 'buy' ? 'BUY' : 'SELL',
        price: request.price.toString(),
        size: request.size.toString(),
        feeRateBps: String(request.feeRateBps),
      },
      orderType: 'GTC',
    };

    const response = await this.request('/order', postOrderResponseSchema, {
      method: 'POST',
      body: JSON.stringify(body),
    });

    if (response.success === false || !response.orderID) {
      throw new ExchangeRequestError(
        '/order',
        `Order rejected: ${response.errorMsg || 'no order id returned'}`
      );
    }
    return response.orderID;
  }

  async cancel(orderId: OrderId): Promise<void> {
    const response = await this.request('/order', cancelResponseSchema, {
      method: 'DELETE',
      body: JSON.stringify({ orderID: orderId }),
    });

    const reason = response.not_canceled[orderId];
    if (reason !== undefined) {
      throw new ExchangeRequestError('/order', `Order ${orderId} not cancelled: ${reason}`);
    }
  }

  async listOpenOrders(): Promise<OrderId[]> {
    const orders = await this.request('/data/orders', listOf(openOrderSchema));
    return orders.map((order) => order.id);
  }

  async feeRate(tokenId: TokenId): Promise<number> {
    const response = await this.request(
      `/fee-rate?token_id=${encodeURIComponent(tokenId)}`,
      feeRateResponseSchema
    );
    return response.base_fee;
  }

  /**
   * Our fills since `since`, optionally narrowed to one token. A trade we
   * took maps from its own fields; a trade we made maps from the
   * `maker_orders` entries that belong to this account, since the trade's
   * top-level side and order id are the taker's.
   */
  async listFills(since: Date, tokenId?: TokenId): Promise<Fill[]> {
    const after = Math.floor(since.getTime() / 1000);
    const trades = await this.request(`/data/trades?after=${after}`, listOf(tradeSchema));
    const fills = trades.flatMap((trade) =>
      trade.trader_side === 'MAKER' ? this.mapMakerTrade(trade) : [this.mapTakerTrade(trade)]
    );
    return tokenId === undefined ? fills : fills.filter((fill) => fill.tokenId === tokenId);
  }

  private ownsMakerOrder(order: MakerOrderResponse): boolean {
    if (this.apiKey !== undefined && order.owner === this.apiKey) {
      return true;
    }
    return this.makerAddress !== undefined && order.maker_address?.toLowerCase() === this.makerAddress;
  }

  private mapTakerTrade(trade: TradeResponse): Fill {
    const price = new Decimal(trade.price);
    const size = new Decimal(trade.size);
    return {
      id: trade.id,
      orderId: trade.taker_order_id,
      tokenId: trade.asset_id,
      side: toOrderSide(trade.side),
      price,
      size,
      fee: price.times(size).times(trade.fee_rate_bps).div(BPS),
      timestamp: new Date(Number(trade.match_time) * 1000),
    };
  }

  private mapMakerTrade(trade: TradeResponse): Fill[] {
    const timestamp = new Date(Number(trade.match_time) * 1000);
    // Without its own side, a maker order is on the other side of the taker.
    const counterSide: Side = trade.side === 'BUY' ? 'SELL' : 'BUY';

    return trade.maker_orders
      .filter((order) => this.ownsMakerOrder(order))
      .map((order) => {
        const price = new Decimal(order.price);
        const size = new Decimal(order.matched_amount);
        return {
          id: `${trade.id}:${order.order_id}`,
          orderId: order.order_id,
          tokenId: order.asset_id ?? trade.asset_id,
          side: toOrderSide(order.side ?? counterSide),
          price,
          size,
          fee: price.times(size).times(order.fee_rate_bps).div(BPS),
          timestamp,
        };
      });
  }
}
