import { describe, it, expect, beforeEach } from 'vitest';
import Decimal from 'decimal.js';
import type { Fill, OrderSide } from '@strike-quoter/core';
import { DailyRiskLedger } from './daily-risk-ledger.js';

const noon = new Date('2026-01-05T12:00:00Z');

function fill(id: string, side: OrderSide, price: string, size: number, fee: string = '0', at: Date = noon): Fill {
  return {
    id,
    orderId: `o-${id}`,
    tokenId: 'tok-yes',
    side,
    price: new Decimal(price),
    size: new Decimal(size),
    fee: new Decimal(fee),
    timestamp: at,
  };
}

describe('DailyRiskLedger', () => {
  let ledger: DailyRiskLedger;

  beforeEach(() => {
    ledger = new DailyRiskLedger({ maxDailyLoss: 20, maxDailyTrades: 3 }, noon);
  });

  it('should track cash and inventory through round trips', () => {
    const recorded = ledger.recordFills([fill('f1', 'buy', '0.6', 10, '0.06'), fill('f2', 'sell', '0.65', 10)], noon);

    expect(recorded).toBe(2);
    expect(ledger.getInventory().toString()).toBe('0');
    expect(ledger.markedPnl('0.5').toString()).toBe('0.44');
    expect(ledger.getFees().toString()).toBe('0.06');
  });

  it('should ignore fills it has already seen', () => {
    ledger.recordFills([fill('f1', 'buy', '0.6', 10)], noon);

    expect(ledger.recordFills([fill('f1', 'buy', '0.6', 10)], noon)).toBe(0);
    expect(ledger.getTradeCount()).toBe(1);
    expect(ledger.getInventory().toString()).toBe('10');
  });

  it('should mark open inventory at the fair price', () => {
    ledger.recordFills([fill('f1', 'buy', '0.9', 50)], noon);

    expect(ledger.check('0.6', noon)).toEqual({ allowed: true });
    expect(ledger.check('0.5', noon)).toEqual({
      allowed: false,
      reason: 'Daily loss limit reached: -20.00',
    });
  });

  it('should block once the trade count reaches the limit', () => {
    ledger.recordFills(
      [fill('f1', 'buy', '0.5', 1), fill('f2', 'sell', '0.5', 1), fill('f3', 'buy', '0.5', 1)],
      noon
    );

    expect(ledger.check('0.5', noon)).toEqual({
      allowed: false,
      reason: 'Daily trade limit reached: 3',
    });
  });

  it('should reset at the UTC day rollover', () => {
    ledger.recordFills(
      [fill('f1', 'buy', '0.5', 1), fill('f2', 'sell', '0.5', 1), fill('f3', 'buy', '0.5', 1)],
      noon
    );
    const nextDay = new Date('2026-01-06T00:00:01Z');

    expect(ledger.check('0.5', nextDay)).toEqual({ allowed: true });
    expect(ledger.getTradeCount()).toBe(0);
    expect(ledger.getInventory().toString()).toBe('0');
  });

  it('should not count yesterday\'s fills after the rollover', () => {
    const nextDay = new Date('2026-01-06T00:00:01Z');

    const recorded = ledger.recordFills([fill('late', 'buy', '0.5', 1, '0', noon)], nextDay);

    expect(recorded).toBe(0);
    expect(ledger.getTradeCount()).toBe(0);
  });
});
