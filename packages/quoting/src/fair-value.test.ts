import { describe, it, expect } from 'vitest';
import Decimal from 'decimal.js';
import { fairPrice } from './fair-value.js';

const STRIKE = new Decimal(83000);

function priceAt(offset: Decimal.Value): string {
  return fairPrice(STRIKE.plus(offset), STRIKE).toString();
}

describe('fairPrice', () => {
  it('should sit at 0.50 on the strike', () => {
    expect(priceAt(0)).toBe('0.5');
  });

  it('should move 0.01 per $100 inside the linear band', () => {
    expect(priceAt(90)).toBe('0.509');
    expect(priceAt(-90)).toBe('0.491');
    expect(priceAt('99.99')).toBe('0.509999');
    expect(priceAt(50)).toBe('0.505');
  });

  it('should jump from the linear band to the first tier at $100', () => {
    expect(priceAt('99.99')).toBe('0.509999');
    expect(priceAt(100)).toBe('0.6');
    expect(priceAt('-99.99')).toBe('0.490001');
    expect(priceAt(-100)).toBe('0.4');
  });

  it('should step to the tier values at $100, $300 and $500', () => {
    expect(priceAt(100)).toBe('0.6');
    expect(priceAt(299)).toBe('0.6');
    expect(priceAt(300)).toBe('0.75');
    expect(priceAt(310)).toBe('0.75');
    expect(priceAt(500)).toBe('0.9');
    expect(priceAt(25000)).toBe('0.9');

    expect(priceAt(-100)).toBe('0.4');
    expect(priceAt(-300)).toBe('0.25');
    expect(priceAt(-500)).toBe('0.1');
  });

  it('should be symmetric around 0.50', () => {
    for (const offset of [1, 37.5, 99, 100, 250, 300, 499, 500, 1200]) {
      const above = fairPrice(STRIKE.plus(offset), STRIKE);
      const below = fairPrice(STRIKE.minus(offset), STRIKE);
      expect(above.plus(below).toString()).toBe('1');
    }
  });

  it('should stay in range and never decrease as the reference rises', () => {
    let previous = new Decimal(0);
    for (let offset = -1000; offset <= 1000; offset += 7.5) {
      const price = fairPrice(STRIKE.plus(offset), STRIKE);
      expect(price.gte('0.01')).toBe(true);
      expect(price.lte('0.99')).toBe(true);
      expect(price.gte(previous)).toBe(true);
      previous = price;
    }
  });

  it('should price a NaN reference at 0.50', () => {
    expect(fairPrice(NaN, STRIKE).toString()).toBe('0.5');
  });
});
