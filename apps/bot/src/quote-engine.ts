import Decimal from 'decimal.js';
import type { Logger } from 'pino';
import type { QuoterConfig } from '@strike-quoter/config';
import type {
  DurationClass,
  EnginePhase,
  EngineState,
  ExchangeClient,
  Instrument,
  PriceSample,
} from '@strike-quoter/core';
import { PriceStreamUnavailableError, QuoterError, QuoterErrorCode, primaryToken } from '@strike-quoter/core';
import { HALF, evaluateGate, fairPrice, requoteReason, type RequotePolicy } from '@strike-quoter/quoting';
import type { OrderLifecycleManager } from '@strike-quoter/execution';
import type { DailyRiskLedger } from '@strike-quoter/risk';

/** What the engine needs from the reference feed. */
export interface PriceSource {
  start(): Promise<void>;
  stop(): void;
  current(now?: number): PriceSample | null;
  isHealthy(now?: number): boolean;
}

export interface InstrumentSelector {
  select(duration: DurationClass): Promise<Instrument>;
}

export interface HaltSwitch {
  isEngaged(): boolean;
}

export type StopReason = 'shutdown' | 'safety-limit' | 'error';

export interface QuoteEngineOptions {
  config: QuoterConfig;
  stream: PriceSource;
  selector: InstrumentSelector;
  orders: OrderLifecycleManager;
  exchange: ExchangeClient;
  ledger: DailyRiskLedger;
  killSwitch: HaltSwitch;
  logger: Logger;
}

export interface EngineSnapshot {
  phase: EnginePhase;
  running: boolean;
  instrumentId: string | null;
  strike: Decimal | null;
  lastRequoteAt: Date | null;
  lastQuotedPrice: Decimal | null;
  lastReferencePrice: Decimal | null;
  lastFairPrice: Decimal | null;
  streamHealthy: boolean;
  restingOrders: number;
  requotes: number;
  vetoes: number;
  skippedTicks: number;
  dailyTrades: number;
  dailyPnl: Decimal;
  stopReason: StopReason | null;
}

/**
 * Drives the quoting loop for one instrument: poll the reference price,
 * decide whether to requote, and cancel/replace through the order manager.
 * Runs once; a stopped engine is not restartable.
 */
export class QuoteEngine {
  private config: QuoterConfig;
  private stream: PriceSource;
  private selector: InstrumentSelector;
  private orders: OrderLifecycleManager;
  private exchange: ExchangeClient;
  private ledger: DailyRiskLedger;
  private killSwitch: HaltSwitch;
  private logger: Logger;
  private policy: RequotePolicy;

  private state: EngineState = {
    phase: 'idle',
    lastRequoteAt: null,
    lastQuotedPrice: null,
    running: false,
  };
  private instrument: Instrument | null = null;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<StopReason | null> | null = null;
  private stopping: Promise<void> | null = null;
  private stopReason: StopReason | null = null;
  private lastFillPollAt: number = 0;
  private lastReferencePrice: Decimal | null = null;
  private lastFairPrice: Decimal | null = null;
  private requotes: number = 0;
  private vetoes: number = 0;
  private skippedTicks: number = 0;
  private stopped: Promise<void>;
  private markStopped: () => void = () => {};

  constructor(options: QuoteEngineOptions) {
    this.config = options.config;
    this.stream = options.stream;
    this.selector = options.selector;
    this.orders = options.orders;
    this.exchange = options.exchange;
    this.ledger = options.ledger;
    this.killSwitch = options.killSwitch;
    this.logger = options.logger.child({ component: 'quote-engine' });
    this.policy = {
      intervalMs: options.config.trading.requoteIntervalSeconds * 1000,
      priceChangeThreshold: options.config.trading.priceChangeThreshold,
    };
    this.stopped = new Promise((resolve) => {
      this.markStopped = resolve;
    });
  }

  async start(): Promise<void> {
    if (this.state.phase !== 'idle') {
      throw new QuoterError(
        QuoterErrorCode.ENGINE_STATE,
        `Quote engine cannot start from ${this.state.phase}`
      );
    }

    this.state.phase = 'selecting';
    this.state.running = true;
    this.logger.info(
      { symbol: this.config.feed.symbol, duration: this.config.market.duration, dryRun: this.config.dryRun },
      'Starting quote engine'
    );

    let instrument: Instrument;
    try {
      await this.stream.start();
      if (!this.stream.isHealthy()) {
        throw new PriceStreamUnavailableError(this.config.feed.symbol, this.config.feed.startupTimeoutMs);
      }
      instrument = await this.selector.select(this.config.market.duration);
    } catch (err) {
      if (this.stopping) {
        return;
      }
      this.logger.error({ err }, 'Quote engine failed to start');
      this.stream.stop();
      this.state.running = false;
      this.state.phase = 'stopped';
      this.stopReason = 'error';
      this.markStopped();
      throw err;
    }

    if (this.stopping) {
      return;
    }

    this.instrument = instrument;
    this.state.phase = 'streaming';
    this.lastFillPollAt = Date.now();
    this.logger.info(
      {
        instrumentId: instrument.id,
        description: instrument.description,
        strike: instrument.strike.toString(),
      },
      'Quoting instrument'
    );
    this.scheduleTick();
  }

  /**
   * Runs one quoting cycle at `now`. A safety breach or an error inside the
   * cycle stops the engine before this resolves.
   */
  async tick(now: number = Date.now()): Promise<void> {
    const reason = await this.guardedCycle(now);
    if (reason) {
      await this.stop(reason);
    }
  }

  /** Idempotent. Waits for an in-flight tick, then flattens and closes the feed. */
  stop(reason: StopReason = 'shutdown'): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown(reason);
    }
    return this.stopping;
  }

  /** Resolves once the engine has fully stopped, whoever stopped it. */
  waitUntilStopped(): Promise<void> {
    return this.stopped;
  }

  getState(): EngineState {
    return { ...this.state };
  }

  getInstrument(): Instrument | null {
    return this.instrument;
  }

  getSnapshot(): EngineSnapshot {
    return {
      phase: this.state.phase,
      running: this.state.running,
      instrumentId: this.instrument?.id ?? null,
      strike: this.instrument?.strike ?? null,
      lastRequoteAt: this.state.lastRequoteAt,
      lastQuotedPrice: this.state.lastQuotedPrice,
      lastReferencePrice: this.lastReferencePrice,
      lastFairPrice: this.lastFairPrice,
      streamHealthy: this.stream.isHealthy(),
      restingOrders: this.orders.getRestingOrders().length,
      requotes: this.requotes,
      vetoes: this.vetoes,
      skippedTicks: this.skippedTicks,
      dailyTrades: this.ledger.getTradeCount(),
      dailyPnl: this.ledger.markedPnl(this.lastFairPrice ?? HALF),
      stopReason: this.stopReason,
    };
  }

  private scheduleTick(): void {
    if (!this.state.running) {
      return;
    }

    this.timer = setTimeout(() => {
      this.timer = null;
      const tick = this.guardedCycle(Date.now());
      this.inFlight = tick;
      tick
        .then((reason) => {
          this.inFlight = null;
          if (reason) {
            return this.stop(reason);
          }
          this.scheduleTick();
        })
        .catch((err) => {
          this.logger.error({ err }, 'Quote loop failed');
        });
    }, this.config.tickIntervalMs);
  }

  private async guardedCycle(now: number): Promise<StopReason | null> {
    try {
      return await this.runCycle(now);
    } catch (err) {
      this.logger.error({ err }, 'Error in quote cycle, stopping');
      return 'error';
    }
  }

  private async runCycle(now: number): Promise<StopReason | null> {
    const instrument = this.instrument;
    if (!this.state.running || this.state.phase !== 'streaming' || !instrument) {
      return null;
    }

    await this.pollFills(instrument, now);

    if (this.killSwitch.isEngaged()) {
      this.logger.warn('Kill switch engaged, stopping');
      return 'safety-limit';
    }

    const risk = this.ledger.check(this.lastFairPrice ?? HALF, new Date(now));
    if (!risk.allowed) {
      this.logger.warn({ reason: risk.reason }, 'Daily safety limit reached, stopping');
      return 'safety-limit';
    }

    const sample = this.stream.current(now);
    if (!sample) {
      this.skippedTicks++;
      this.logger.debug('No fresh reference price, skipping tick');
      return null;
    }
    this.lastReferencePrice = sample.value;

    const trigger = requoteReason(
      {
        price: sample.value,
        now,
        lastRequoteAt: this.state.lastRequoteAt,
        lastQuotedPrice: this.state.lastQuotedPrice,
      },
      this.policy
    );
    if (!trigger) {
      return null;
    }

    const fair = fairPrice(sample.value, instrument.strike);
    this.lastFairPrice = fair;

    const gate = evaluateGate(fair, this.config.trading.minEdgeBps);
    if (!gate.allowed) {
      this.vetoes++;
      this.logger.info(
        {
          referencePrice: sample.value.toString(),
          fairPrice: fair.toString(),
          edge: gate.edge.toString(),
          required: gate.required.toString(),
        },
        'Fair price too close to 50%, flattening'
      );
      await this.orders.cancelAll();
      return null;
    }

    await this.orders.replace(
      instrument,
      fair,
      this.config.trading.spreadBps,
      this.config.trading.maxPositionSize
    );
    this.state.lastRequoteAt = new Date(now);
    this.state.lastQuotedPrice = sample.value;
    this.requotes++;
    this.logger.debug(
      { trigger, referencePrice: sample.value.toString(), fairPrice: fair.toString() },
      'Requoted'
    );
    return null;
  }

  private async pollFills(instrument: Instrument, now: number): Promise<void> {
    if (now - this.lastFillPollAt < this.policy.intervalMs) {
      return;
    }

    const since = new Date(this.lastFillPollAt);
    const { tokenId } = primaryToken(instrument);
    try {
      // Inventory and PnL are marked against the quoted token only.
      const fills = (await this.exchange.listFills(since, tokenId)).filter((fill) => fill.tokenId === tokenId);
      const recorded = this.ledger.recordFills(fills, new Date(now));
      if (recorded > 0) {
        this.logger.info(
          { recorded, dailyTrades: this.ledger.getTradeCount() },
          'Recorded fills'
        );
      }
      this.lastFillPollAt = now;
    } catch (err) {
      this.logger.warn({ err }, 'Failed to poll fills');
    }
  }

  private async shutdown(reason: StopReason): Promise<void> {
    const wasRunning = this.state.running;
    this.state.running = false;
    this.stopReason = this.stopReason ?? reason;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }

    if (wasRunning) {
      this.logger.info({ reason }, 'Stopping quote engine');
    }

    if (this.inFlight) {
      await this.inFlight;
    }

    const cancelled = await this.orders.cancelAll();
    this.stream.stop();
    this.state.phase = 'stopped';
    this.markStopped();

    this.logger.info(
      { reason, cancelled, orphaned: this.orders.getOrphanedOrders().length },
      'Quote engine stopped'
    );
  }
}
