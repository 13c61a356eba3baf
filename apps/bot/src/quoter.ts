import type { Logger } from 'pino';
import type { QuoterConfig } from '@strike-quoter/config';
import type { ExchangeClient } from '@strike-quoter/core';
import { PriceStream } from '@strike-quoter/price-feed';
import { ClobRestClient, GammaClient } from '@strike-quoter/polymarket';
import { MarketSelector } from '@strike-quoter/market-discovery';
import { OrderLifecycleManager, PaperExchange } from '@strike-quoter/execution';
import { DailyRiskLedger, KillSwitch } from '@strike-quoter/risk';
import { QuoteEngine } from './quote-engine.js';

export type ExchangeMode = 'paper' | 'live';

export function createExchange(config: QuoterConfig, logger: Logger, mode: ExchangeMode): ExchangeClient {
  if (mode === 'paper') {
    return new PaperExchange({ logger });
  }
  return new ClobRestClient({
    baseUrl: config.polymarket.clobUrl,
    apiKey: config.polymarket.apiKey,
    makerAddress: config.polymarket.funderAddress,
    timeoutMs: config.requestTimeoutMs,
  });
}

/** Wires every collaborator of the engine from one immutable config. */
export function createQuoteEngine(config: QuoterConfig, logger: Logger, exchange: ExchangeClient): QuoteEngine {
  const stream = new PriceStream({
    symbol: config.feed.symbol,
    wsBaseUrl: config.feed.wsBaseUrl,
    logger,
    staleMs: config.feed.staleMs,
    startupTimeoutMs: config.feed.startupTimeoutMs,
    reconnect: {
      initialDelayMs: config.feed.reconnectInitialMs,
      maxDelayMs: config.feed.reconnectMaxMs,
    },
  });

  const selector = new MarketSelector({
    catalog: new GammaClient({ baseUrl: config.polymarket.gammaUrl, timeoutMs: config.requestTimeoutMs }),
    symbol: config.feed.symbol,
    aliases: config.market.symbolAliases,
    logger,
  });

  return new QuoteEngine({
    config,
    stream,
    selector,
    orders: new OrderLifecycleManager({ exchange, logger }),
    exchange,
    ledger: new DailyRiskLedger({
      maxDailyLoss: config.safety.maxDailyLoss,
      maxDailyTrades: config.safety.maxDailyTrades,
    }),
    killSwitch: new KillSwitch(config.safety.killSwitchFile),
    logger,
  });
}
