import Decimal from 'decimal.js';
import { clampPrice } from '@strike-quoter/core';

export const HALF = new Decimal('0.5');

interface Tier {
  minDistance: Decimal;
  above: Decimal;
  below: Decimal;
}

// Checked widest first; anything closer than $100 falls through to the linear band.
const TIERS: readonly Tier[] = [
  { minDistance: new Decimal(500), above: new Decimal('0.90'), below: new Decimal('0.10') },
  { minDistance: new Decimal(300), above: new Decimal('0.75'), below: new Decimal('0.25') },
  { minDistance: new Decimal(100), above: new Decimal('0.60'), below: new Decimal('0.40') },
];

const LINEAR_STEP = new Decimal(100);
const LINEAR_SLOPE = new Decimal('0.01');

/**
 * Probability-like fair price of the "above strike" outcome given the
 * reference price. Piecewise in the dollar distance from the strike,
 * symmetric around 0.50, always within [0.01, 0.99].
 *
 * A NaN input has no distance and prices at 0.50, which the quote gate
 * always vetoes.
 */
export function fairPrice(referencePrice: Decimal.Value, strike: Decimal.Value): Decimal {
  const diff = new Decimal(referencePrice).minus(strike);
  if (diff.isNaN()) {
    return HALF;
  }

  const distance = diff.abs();
  for (const tier of TIERS) {
    if (distance.gte(tier.minDistance)) {
      return clampPrice(diff.isPositive() ? tier.above : tier.below);
    }
  }

  return clampPrice(HALF.plus(diff.div(LINEAR_STEP).times(LINEAR_SLOPE)));
}
