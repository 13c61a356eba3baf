import Decimal from 'decimal.js';
import type { Fill } from '@strike-quoter/core';

export interface DailyRiskLimits {
  maxDailyLoss: Decimal.Value;
  maxDailyTrades: number;
}

export interface RiskCheckResult {
  allowed: boolean;
  reason?: string;
}

function utcDay(at: Date): string {
  return at.toISOString().slice(0, 10);
}

/**
 * Intraday fills, cash and inventory for the quoted token. Inventory is
 * marked at the fair price supplied to each check. Everything resets when
 * the UTC day rolls over.
 */
export class DailyRiskLedger {
  private maxDailyLoss: Decimal;
  private maxDailyTrades: number;
  private day: string;
  private seenFills: Set<string> = new Set();
  private trades: number = 0;
  private cash: Decimal = new Decimal(0);
  private inventory: Decimal = new Decimal(0);
  private fees: Decimal = new Decimal(0);

  constructor(limits: DailyRiskLimits, now: Date = new Date()) {
    this.maxDailyLoss = new Decimal(limits.maxDailyLoss);
    this.maxDailyTrades = limits.maxDailyTrades;
    this.day = utcDay(now);
  }

  /** Returns the number of fills that were new for today. */
  recordFills(fills: readonly Fill[], now: Date = new Date()): number {
    this.rollover(now);

    let recorded = 0;
    for (const fill of fills) {
      if (this.seenFills.has(fill.id) || utcDay(fill.timestamp) < this.day) {
        continue;
      }
      this.seenFills.add(fill.id);

      const notional = fill.price.times(fill.size);
      if (fill.side === 'buy') {
        this.cash = this.cash.minus(notional).minus(fill.fee);
        this.inventory = this.inventory.plus(fill.size);
      } else {
        this.cash = this.cash.plus(notional).minus(fill.fee);
        this.inventory = this.inventory.minus(fill.size);
      }
      this.fees = this.fees.plus(fill.fee);
      this.trades++;
      recorded++;
    }
    return recorded;
  }

  markedPnl(fairPrice: Decimal.Value): Decimal {
    return this.cash.plus(this.inventory.times(fairPrice));
  }

  check(fairPrice: Decimal.Value, now: Date = new Date()): RiskCheckResult {
    this.rollover(now);

    const pnl = this.markedPnl(fairPrice);
    if (pnl.lte(this.maxDailyLoss.neg())) {
      return { allowed: false, reason: `Daily loss limit reached: ${pnl.toFixed(2)}` };
    }
    if (this.trades >= this.maxDailyTrades) {
      return { allowed: false, reason: `Daily trade limit reached: ${this.trades}` };
    }
    return { allowed: true };
  }

  getTradeCount(): number {
    return this.trades;
  }

  getInventory(): Decimal {
    return this.inventory;
  }

  getFees(): Decimal {
    return this.fees;
  }

  private rollover(now: Date): void {
    const today = utcDay(now);
    if (today === this.day) {
      return;
    }
    this.day = today;
    this.seenFills.clear();
    this.trades = 0;
    this.cash = new Decimal(0);
    this.inventory = new Decimal(0);
    this.fees = new Decimal(0);
  }
}
