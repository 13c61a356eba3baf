import Decimal from 'decimal.js';

export type InstrumentId = string;
export type TokenId = string;
export type OrderId = string;

export type OrderSide = 'buy' | 'sell';

export const DURATION_CLASSES = ['5m', '15m', '1h'] as const;
export type DurationClass = (typeof DURATION_CLASSES)[number];

/**
 * One accepted reference-price tick. Instances are frozen and replaced
 * wholesale by the next tick, never mutated.
 */
export interface PriceSample {
  readonly value: Decimal;
  readonly observedAt: Date;
}

export interface OutcomeToken {
  tokenId: TokenId;
  outcome: string;
}

/**
 * The prediction-market instrument the engine quotes for its whole run.
 * `strike` is parsed out of `description` at selection time.
 */
export interface Instrument {
  readonly id: InstrumentId;
  readonly description: string;
  readonly strike: Decimal;
  readonly tokens: readonly OutcomeToken[];
}

export interface QuoteIntent {
  buyPrice: Decimal;
  sellPrice: Decimal;
  size: Decimal;
}

export interface RestingOrder {
  orderId: OrderId;
  side: OrderSide;
  price: Decimal;
  size: Decimal;
}

export type EnginePhase = 'idle' | 'selecting' | 'streaming' | 'stopped';

export interface EngineState {
  phase: EnginePhase;
  lastRequoteAt: Date | null;
  lastQuotedPrice: Decimal | null;
  running: boolean;
}

export interface Fill {
  id: string;
  orderId: OrderId;
  tokenId: TokenId;
  side: OrderSide;
  price: Decimal;
  size: Decimal;
  fee: Decimal;
  timestamp: Date;
}

// Collaborator contracts

export interface CatalogEntry {
  id: InstrumentId;
  description: string;
  active: boolean;
  tokens: OutcomeToken[];
}

export interface MarketCatalog {
  getActiveInstruments(): Promise<CatalogEntry[]>;
}

export interface SubmitOrderRequest {
  tokenId: TokenId;
  side: OrderSide;
  price: Decimal;
  size: Decimal;
  feeRateBps: number;
}

export interface ExchangeClient {
  /** Resolves with the exchange order id; rejects when the order is not accepted. */
  submit(request: SubmitOrderRequest): Promise<OrderId>;
  cancel(orderId: OrderId): Promise<void>;
  listOpenOrders(): Promise<OrderId[]>;
  /** Current fee rate for the token in basis points. */
  feeRate(tokenId: TokenId): Promise<number>;
  /** Fills of this account since `since`, narrowed to `tokenId` when given. */
  listFills(since: Date, tokenId?: TokenId): Promise<Fill[]>;
}
