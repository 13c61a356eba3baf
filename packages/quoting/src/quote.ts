import Decimal from 'decimal.js';
import type { QuoteIntent } from '@strike-quoter/core';
import { bpsToFraction, clampPrice } from '@strike-quoter/core';

/** Buy and sell straddling the fair price by half the spread each, clamped to [0.01, 0.99]. */
export function buildQuote(
  fairPrice: Decimal,
  spreadBps: Decimal.Value,
  size: Decimal.Value
): QuoteIntent {
  const halfSpread = bpsToFraction(spreadBps).div(2);
  return {
    buyPrice: clampPrice(fairPrice.minus(halfSpread)),
    sellPrice: clampPrice(fairPrice.plus(halfSpread)),
    size: new Decimal(size),
  };
}
