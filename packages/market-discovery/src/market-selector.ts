import Decimal from 'decimal.js';
import type { Logger } from 'pino';
import type { CatalogEntry, DurationClass, Instrument, MarketCatalog } from '@strike-quoter/core';
import { NoActiveInstrumentError, NoStrikeFoundError, formatUsd } from '@strike-quoter/core';

export interface MarketSelectorOptions {
  catalog: MarketCatalog;
  symbol: string;
  aliases: readonly string[];
  logger: Logger;
}

const DURATION_SPELLINGS: Record<DurationClass, string[]> = {
  '5m': ['5m', '5 min', '5 minute', '5 minutes', '5-minute'],
  '15m': ['15m', '15 min', '15 minute', '15 minutes', '15-minute'],
  '1h': ['1h', '1 hour', '1-hour', 'hourly'],
};

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Whole-word match, so "5m" does not match inside "15m". */
function wordPattern(spellings: readonly string[]): RegExp {
  const alternatives = spellings.map(escapeRegExp).join('|');
  return new RegExp(`(?<![a-z0-9])(?:${alternatives})(?![a-z0-9])`, 'i');
}

/**
 * First currency amount in the text, e.g. "above $83,000 at 3:15 PM" -> 83000.
 * Returns null when there is none.
 */
export function extractStrike(description: string): Decimal | null {
  const match = /\$\s?(\d[\d,]*(?:\.\d+)?)/.exec(description);
  if (!match) {
    return null;
  }
  const strike = new Decimal(match[1].replace(/,/g, ''));
  return strike.gt(0) ? strike : null;
}

export function matchesDuration(description: string, duration: DurationClass): boolean {
  return wordPattern(DURATION_SPELLINGS[duration]).test(description);
}

export class MarketSelector {
  private readonly catalog: MarketCatalog;
  private readonly symbol: string;
  private readonly symbolPattern: RegExp;
  private readonly logger: Logger;

  constructor(options: MarketSelectorOptions) {
    this.catalog = options.catalog;
    this.symbol = options.symbol;
    const aliases = options.aliases.length > 0 ? options.aliases : [options.symbol];
    this.symbolPattern = wordPattern(aliases);
    this.logger = options.logger.child({ component: 'market-selector' });
  }

  filter(entries: CatalogEntry[], duration: DurationClass): CatalogEntry[] {
    return entries.filter(
      (entry) =>
        entry.active &&
        this.symbolPattern.test(entry.description) &&
        matchesDuration(entry.description, duration)
    );
  }

  /**
   * Resolves the instrument to quote for this run: the first active match in
   * catalog order that lists outcome tokens. Throws NoActiveInstrumentError or NoStrikeFoundError.
   */
  async select(duration: DurationClass): Promise<Instrument> {
    const entries = await this.catalog.getActiveInstruments();
    const candidates = this.filter(entries, duration);

    this.logger.debug(
      { scanned: entries.length, matched: candidates.length, duration },
      'Filtered catalog'
    );

    // A listing without outcome tokens cannot be quoted; fall through to the next.
    const chosen = candidates.find((candidate) => candidate.tokens.length > 0);
    if (!chosen) {
      throw new NoActiveInstrumentError(this.symbol, duration);
    }

    const strike = extractStrike(chosen.description);
    if (!strike) {
      throw new NoStrikeFoundError(chosen.description);
    }

    this.logger.info(
      { instrumentId: chosen.id, strike: strike.toString(), tokenId: chosen.tokens[0].tokenId },
      `Selected market: ${chosen.description} (strike ${formatUsd(strike, 0)})`
    );

    return Object.freeze({
      id: chosen.id,
      description: chosen.description,
      strike,
      tokens: Object.freeze(chosen.tokens.map((token) => ({ ...token }))),
    });
  }
}
