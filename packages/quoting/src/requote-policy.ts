import Decimal from 'decimal.js';
import { relativeChange } from '@strike-quoter/core';

export interface RequotePolicy {
  intervalMs: number;
  /** Relative reference-price move that forces a requote, e.g. 0.001 for 0.1%. */
  priceChangeThreshold: Decimal.Value;
}

export interface RequoteInput {
  price: Decimal;
  now: number;
  lastRequoteAt: Date | null;
  lastQuotedPrice: Decimal | null;
}

export type RequoteReason = 'initial' | 'interval' | 'price-move';

/** Why a requote is due now, or null when the resting quotes can stay. */
export function requoteReason(input: RequoteInput, policy: RequotePolicy): RequoteReason | null {
  const { price, now, lastRequoteAt, lastQuotedPrice } = input;

  if (lastQuotedPrice === null || lastRequoteAt === null) {
    return 'initial';
  }

  if (now - lastRequoteAt.getTime() >= policy.intervalMs) {
    return 'interval';
  }

  const change = relativeChange(price, lastQuotedPrice);
  if (change !== null && change.gte(policy.priceChangeThreshold)) {
    return 'price-move';
  }

  return null;
}

export function shouldRequote(input: RequoteInput, policy: RequotePolicy): boolean {
  return requoteReason(input, policy) !== null;
}
