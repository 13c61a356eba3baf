import Decimal from 'decimal.js';
import type { Logger } from 'pino';
import type {
  ExchangeClient,
  Instrument,
  OrderId,
  OrderSide,
  RestingOrder,
  TokenId,
} from '@strike-quoter/core';
import { primaryToken } from '@strike-quoter/core';
import { buildQuote } from '@strike-quoter/quoting';

export interface OrderLifecycleManagerOptions {
  exchange: ExchangeClient;
  logger: Logger;
}

// An order that still refuses to cancel after this many passes is given up on.
const MAX_CANCEL_ATTEMPTS = 5;

export interface ReplaceResult {
  buyOrderId: OrderId | null;
  sellOrderId: OrderId | null;
}

/**
 * Sole owner of the quotes resting on the exchange. Each replace cancels
 * what is tracked, then places a fresh buy and sell around the fair price.
 */
export class OrderLifecycleManager {
  private exchange: ExchangeClient;
  private logger: Logger;
  private resting: Map<OrderId, RestingOrder> = new Map();
  // Failed cancels by order id, with the number of failed attempts so far.
  private orphans: Map<OrderId, number> = new Map();

  constructor(options: OrderLifecycleManagerOptions) {
    this.exchange = options.exchange;
    this.logger = options.logger.child({ component: 'order-lifecycle' });
  }

  async replace(
    instrument: Instrument,
    fairPrice: Decimal,
    spreadBps: Decimal.Value,
    size: Decimal.Value
  ): Promise<ReplaceResult> {
    await this.cancelTracked();

    const quote = buildQuote(fairPrice, spreadBps, size);
    const { tokenId } = primaryToken(instrument);

    const buyOrderId = await this.place(tokenId, 'buy', quote.buyPrice, quote.size);
    const sellOrderId = await this.place(tokenId, 'sell', quote.sellPrice, quote.size);

    this.logger.info(
      {
        instrumentId: instrument.id,
        fairPrice: fairPrice.toString(),
        buyPrice: quote.buyPrice.toString(),
        sellPrice: quote.sellPrice.toString(),
        size: quote.size.toString(),
        buyOrderId,
        sellOrderId,
      },
      'Quotes replaced'
    );

    return { buyOrderId, sellOrderId };
  }

  /** Best-effort cancel of every tracked and orphaned order. Returns how many were cancelled. */
  async cancelAll(): Promise<number> {
    const cancelled = await this.cancelTracked();
    if (cancelled > 0 || this.orphans.size > 0) {
      this.logger.info({ cancelled, orphaned: this.orphans.size }, 'Cancelled resting orders');
    }
    return cancelled;
  }

  getRestingOrders(): RestingOrder[] {
    return Array.from(this.resting.values(), (order) => ({ ...order }));
  }

  getOrphanedOrders(): OrderId[] {
    return Array.from(this.orphans.keys());
  }

  private async cancelTracked(): Promise<number> {
    await this.reconcileOrphans();

    const attempts = new Map<OrderId, number>(this.orphans);
    for (const orderId of this.resting.keys()) {
      attempts.set(orderId, attempts.get(orderId) ?? 0);
    }
    this.resting.clear();
    this.orphans.clear();

    let cancelled = 0;
    for (const [orderId, failures] of attempts) {
      try {
        await this.exchange.cancel(orderId);
        cancelled++;
      } catch (err) {
        if (failures + 1 >= MAX_CANCEL_ATTEMPTS) {
          this.logger.error({ err, orderId, attempts: failures + 1 }, 'Cancel keeps failing, no longer tracking order');
          continue;
        }
        this.orphans.set(orderId, failures + 1);
        this.logger.warn({ err, orderId }, 'Cancel failed, will retry on next pass');
      }
    }
    return cancelled;
  }

  /** Drops orphans the exchange no longer lists as open (filled, expired or cancelled). */
  private async reconcileOrphans(): Promise<void> {
    if (this.orphans.size === 0) {
      return;
    }

    let open: Set<OrderId>;
    try {
      open = new Set(await this.exchange.listOpenOrders());
    } catch (err) {
      this.logger.warn({ err, orphaned: this.orphans.size }, 'Could not list open orders, retrying every orphan');
      return;
    }

    for (const orderId of this.orphans.keys()) {
      if (!open.has(orderId)) {
        this.orphans.delete(orderId);
        this.logger.info({ orderId }, 'Orphaned order no longer open');
      }
    }
  }

  private async place(
    tokenId: TokenId,
    side: OrderSide,
    price: Decimal,
    size: Decimal
  ): Promise<OrderId | null> {
    try {
      const feeRateBps = await this.exchange.feeRate(tokenId);
      const orderId = await this.exchange.submit({ tokenId, side, price, size, feeRateBps });
      this.resting.set(orderId, { orderId, side, price, size });
      return orderId;
    } catch (err) {
      this.logger.error({ err, tokenId, side, price: price.toString() }, 'Failed to place quote');
      return null;
    }
  }
}
