import { describe, it, expect, beforeEach } from 'vitest';
import pino from 'pino';
import type { CatalogEntry, MarketCatalog } from '@strike-quoter/core';
import { NoActiveInstrumentError, NoStrikeFoundError } from '@strike-quoter/core';
import { MarketSelector, extractStrike, matchesDuration } from './market-selector.js';

class StaticCatalog implements MarketCatalog {
  constructor(private readonly entries: CatalogEntry[]) {}

  async getActiveInstruments(): Promise<CatalogEntry[]> {
    return this.entries;
  }
}

function entry(id: string, description: string, active: boolean = true): CatalogEntry {
  return {
    id,
    description,
    active,
    tokens: [
      { tokenId: `${id}-yes`, outcome: 'Yes' },
      { tokenId: `${id}-no`, outcome: 'No' },
    ],
  };
}

describe('extractStrike', () => {
  it('should parse a comma-grouped dollar amount', () => {
    expect(extractStrike('Will BTC be above $83,000 at 3:15 PM?')?.toString()).toBe('83000');
  });

  it('should parse decimals and take the first amount', () => {
    expect(extractStrike('ETH above $3,250.50 or $3,300?')?.toString()).toBe('3250.5');
  });

  it('should return null without a currency amount', () => {
    expect(extractStrike('Bitcoin Up or Down - 15m')).toBeNull();
    expect(extractStrike('Will BTC be above $0?')).toBeNull();
  });
});

describe('matchesDuration', () => {
  it('should not match 5m inside 15m', () => {
    expect(matchesDuration('BTC 15m above $83,000', '5m')).toBe(false);
    expect(matchesDuration('BTC 15m above $83,000', '15m')).toBe(true);
  });

  it('should accept spelled-out durations', () => {
    expect(matchesDuration('Bitcoin 15 minute market', '15m')).toBe(true);
    expect(matchesDuration('Bitcoin 1 Hour above $84,000', '1h')).toBe(true);
  });
});

describe('MarketSelector', () => {
  const logger = pino({ level: 'silent' });
  let catalog: StaticCatalog;

  beforeEach(() => {
    catalog = new StaticCatalog([
      entry('m1', 'Will ETH be above $3,000 in 15m?'),
      entry('m2', 'Will BTC be above $84,000 in 1 hour?'),
      entry('m3', 'Will BTC be above $83,000 in 15m?'),
      entry('m4', 'Will Bitcoin be above $83,500 in 15 minutes?'),
    ]);
  });

  it('should pick the first matching instrument in catalog order', async () => {
    const selector = new MarketSelector({ catalog, symbol: 'BTCUSDT', aliases: ['btc', 'bitcoin'], logger });

    const instrument = await selector.select('15m');

    expect(instrument.id).toBe('m3');
    expect(instrument.strike.toString()).toBe('83000');
    expect(instrument.tokens[0].tokenId).toBe('m3-yes');
    expect(Object.isFrozen(instrument)).toBe(true);
  });

  it('should skip inactive entries', async () => {
    catalog = new StaticCatalog([
      entry('m1', 'Will BTC be above $83,000 in 15m?', false),
      entry('m2', 'Will BTC be above $83,100 in 15m?'),
    ]);
    const selector = new MarketSelector({ catalog, symbol: 'BTCUSDT', aliases: ['btc'], logger });

    expect((await selector.select('15m')).id).toBe('m2');
  });

  it('should fail with NoActiveInstrument when nothing matches', async () => {
    const selector = new MarketSelector({ catalog, symbol: 'BTCUSDT', aliases: ['btc'], logger });

    await expect(selector.select('5m')).rejects.toBeInstanceOf(NoActiveInstrumentError);
  });

  it('should fail with NoStrikeFound when the description has no amount', async () => {
    catalog = new StaticCatalog([entry('m1', 'Bitcoin Up or Down - 15m')]);
    const selector = new MarketSelector({ catalog, symbol: 'BTCUSDT', aliases: ['bitcoin'], logger });

    await expect(selector.select('15m')).rejects.toBeInstanceOf(NoStrikeFoundError);
  });

  it('should move past a match without tokens to the next match', async () => {
    catalog = new StaticCatalog([
      { id: 'm1', description: 'BTC above $83,000 15m', active: true, tokens: [] },
      entry('m2', 'BTC above $83,200 15m'),
    ]);
    const selector = new MarketSelector({ catalog, symbol: 'BTCUSDT', aliases: ['btc'], logger });

    const instrument = await selector.select('15m');

    expect(instrument.id).toBe('m2');
    expect(instrument.strike.toString()).toBe('83200');
  });

  it('should fail when no match has tokens', async () => {
    catalog = new StaticCatalog([{ id: 'm1', description: 'BTC above $83,000 15m', active: true, tokens: [] }]);
    const selector = new MarketSelector({ catalog, symbol: 'BTCUSDT', aliases: ['btc'], logger });

    await expect(selector.select('15m')).rejects.toBeInstanceOf(NoActiveInstrumentError);
  });
});
