import Decimal from 'decimal.js';

export const MIN_PRICE = new Decimal('0.01');
export const MAX_PRICE = new Decimal('0.99');
export const BPS = new Decimal(10000);

export function clamp(value: Decimal, min: Decimal, max: Decimal): Decimal {
  return Decimal.max(min, Decimal.min(max, value));
}

/** Clamp into the tradable probability range [0.01, 0.99]. */
export function clampPrice(value: Decimal): Decimal {
  return clamp(value, MIN_PRICE, MAX_PRICE);
}

export function bpsToFraction(bps: Decimal.Value): Decimal {
  return new Decimal(bps).div(BPS);
}

/**
 * |current - previous| / previous. Returns null when previous is zero,
 * since no relative move is defined.
 */
export function relativeChange(current: Decimal, previous: Decimal): Decimal | null {
  if (previous.isZero()) {
    return null;
  }
  return current.minus(previous).abs().div(previous.abs());
}

export function formatUsd(value: Decimal, decimals: number = 2): string {
  const [whole, fraction] = value.toFixed(decimals).split('.');
  const grouped = whole.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
  return fraction ? `$${grouped}.${fraction}` : `$${grouped}`;
}
