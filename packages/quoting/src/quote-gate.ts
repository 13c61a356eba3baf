import Decimal from 'decimal.js';
import { bpsToFraction } from '@strike-quoter/core';
import { HALF } from './fair-value.js';

export interface GateDecision {
  allowed: boolean;
  /** |fair - 0.50| */
  edge: Decimal;
  required: Decimal;
}

/**
 * Taker fees peak at the 50% price, so quoting is vetoed while the fair
 * price sits within minEdgeBps/2 of it. The boundary itself is allowed.
 */
export function evaluateGate(fairPrice: Decimal.Value, minEdgeBps: Decimal.Value): GateDecision {
  const edge = new Decimal(fairPrice).minus(HALF).abs();
  const required = bpsToFraction(minEdgeBps).div(2);
  return { allowed: !edge.lt(required), edge, required };
}

export function allowQuote(fairPrice: Decimal.Value, minEdgeBps: Decimal.Value): boolean {
  return evaluateGate(fairPrice, minEdgeBps).allowed;
}
