import { randomUUID } from 'crypto';
import type { Logger } from 'pino';
import type {
  ExchangeClient,
  Fill,
  OrderId,
  RestingOrder,
  SubmitOrderRequest,
  TokenId,
} from '@strike-quoter/core';

export interface PaperExchangeOptions {
  logger: Logger;
  feeRateBps?: number;
}

/**
 * Dry-run exchange. Orders rest in memory and never fill, so the daily
 * ledger stays flat and quoting can be observed without capital at risk.
 */
export class PaperExchange implements ExchangeClient {
  private openOrders: Map<OrderId, RestingOrder> = new Map();
  private feeRateBps: number;
  private logger: Logger;

  constructor(options: PaperExchangeOptions) {
    this.feeRateBps = options.feeRateBps ?? 0;
    this.logger = options.logger.child({ component: 'paper-exchange' });
  }

  async submit(request: SubmitOrderRequest): Promise<OrderId> {
    const orderId = `paper-${randomUUID()}`;
    this.openOrders.set(orderId, {
      orderId,
      side: request.side,
      price: request.price,
      size: request.size,
    });
    this.logger.debug(
      {
        orderId,
        tokenId: request.tokenId,
        side: request.side,
        price: request.price.toString(),
        size: request.size.toString(),
        feeRateBps: request.feeRateBps,
      },
      'Paper order placed'
    );
    return orderId;
  }

  async cancel(orderId: OrderId): Promise<void> {
    if (this.openOrders.delete(orderId)) {
      this.logger.debug({ orderId }, 'Paper order cancelled');
    }
  }

  async listOpenOrders(): Promise<OrderId[]> {
    return Array.from(this.openOrders.keys());
  }

  async feeRate(_tokenId: TokenId): Promise<number> {
    return this.feeRateBps;
  }

  async listFills(_since: Date): Promise<Fill[]> {
    return [];
  }

  getOpenOrders(): RestingOrder[] {
    return Array.from(this.openOrders.values());
  }
}
