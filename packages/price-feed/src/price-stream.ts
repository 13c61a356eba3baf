import WebSocket from 'ws';
import Decimal from 'decimal.js';
import { z } from 'zod';
import type { Logger } from 'pino';
import type { PriceSample } from '@strike-quoter/core';
import { formatUsd, toError } from '@strike-quoter/core';
import { ReconnectPolicy, type ReconnectPolicyOptions } from './reconnect-policy.js';

/** The subset of a `ws` WebSocket the stream relies on. */
export interface TickerSocket {
  on(event: 'open', listener: () => void): unknown;
  on(event: 'message', listener: (data: WebSocket.RawData | string) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  on(event: 'close', listener: (code: number) => void): unknown;
  close(): void;
}

export type SocketFactory = (url: string) => TickerSocket;
export type PriceListener = (sample: PriceSample) => void;

export interface PriceStreamOptions {
  symbol: string;
  wsBaseUrl: string;
  logger: Logger;
  staleMs?: number;
  startupTimeoutMs?: number;
  reconnect?: Partial<ReconnectPolicyOptions>;
  createSocket?: SocketFactory;
}

// Binance 24h rolling ticker; `c` is the last price.
const tickerMessageSchema = z.object({
  e: z.literal('24hrTicker'),
  s: z.string(),
  c: z.string().regex(/^\d+(\.\d+)?$/),
});

const defaultSocketFactory: SocketFactory = (url) => new WebSocket(url);

function rawToString(data: WebSocket.RawData | string): string {
  if (typeof data === 'string') {
    return data;
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}

export class PriceStream {
  private readonly symbol: string;
  private readonly streamUrl: string;
  private readonly staleMs: number;
  private readonly startupTimeoutMs: number;
  private readonly createSocket: SocketFactory;
  private readonly reconnectPolicy: ReconnectPolicy;
  private readonly logger: Logger;

  private socket: TickerSocket | null = null;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private running = false;
  private connected = false;
  private latest: PriceSample | null = null;
  private listeners: Set<PriceListener> = new Set();
  private notifyPending = false;
  private settleStartup: (() => void) | null = null;

  constructor(options: PriceStreamOptions) {
    this.symbol = options.symbol.toUpperCase();
    this.streamUrl = `${options.wsBaseUrl.replace(/\/+$/, '')}/${this.symbol.toLowerCase()}@ticker`;
    this.staleMs = options.staleMs ?? 10000;
    this.startupTimeoutMs = options.startupTimeoutMs ?? 10000;
    this.createSocket = options.createSocket ?? defaultSocketFactory;
    this.reconnectPolicy = new ReconnectPolicy(options.reconnect);
    this.logger = options.logger.child({ component: 'price-stream', symbol: this.symbol });
  }

  /**
   * Opens the background connection and waits until the first tick arrives
   * or the startup timeout elapses. Never rejects on a slow feed: callers
   * check `isHealthy()` afterwards.
   */
  async start(): Promise<void> {
    if (this.running) {
      this.logger.warn('Price stream already running');
      return;
    }

    this.running = true;
    this.connect();

    const received = await this.waitForFirstSample();
    if (received && this.latest) {
      this.logger.info(
        { price: this.latest.value.toString() },
        `Price stream started: ${this.symbol} ${formatUsd(this.latest.value)}`
      );
    } else if (this.running) {
      this.logger.warn({ timeoutMs: this.startupTimeoutMs }, 'Price stream started but no price received yet');
    }
  }

  stop(): void {
    if (!this.running) {
      return;
    }

    this.logger.info('Stopping price stream');
    this.running = false;
    this.connected = false;
    this.clearReconnectTimer();
    this.settleStartup?.();

    const socket = this.socket;
    this.socket = null;
    if (socket) {
      try {
        socket.close();
      } catch (error) {
        this.logger.debug({ err: toError(error) }, 'Error while closing ticker socket');
      }
    }
  }

  /** Latest sample, or null when none has arrived or it is older than the staleness window. */
  current(now: number = Date.now()): PriceSample | null {
    const sample = this.latest;
    if (!sample) {
      return null;
    }
    if (now - sample.observedAt.getTime() > this.staleMs) {
      return null;
    }
    return sample;
  }

  isHealthy(now: number = Date.now()): boolean {
    return this.running && this.current(now) !== null;
  }

  isConnected(): boolean {
    return this.connected;
  }

  getReconnectAttempts(): number {
    return this.reconnectPolicy.getAttempts();
  }

  /**
   * Registers a listener for accepted ticks. Notifications are coalesced
   * onto a microtask, so a burst of ticks delivers only the newest sample.
   * Returns an unsubscribe function.
   */
  onUpdate(listener: PriceListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private connect(): void {
    if (!this.running) {
      return;
    }

    let socket: TickerSocket;
    try {
      socket = this.createSocket(this.streamUrl);
    } catch (error) {
      this.logger.error({ err: toError(error) }, 'Failed to create ticker socket');
      this.scheduleReconnect();
      return;
    }
    this.socket = socket;

    socket.on('open', () => {
      if (this.socket !== socket) {
        return;
      }
      this.connected = true;
      this.reconnectPolicy.reset();
      this.logger.info({ url: this.streamUrl }, 'Connected to ticker stream');
    });

    socket.on('message', (data) => {
      if (this.socket !== socket) {
        return;
      }
      this.handleMessage(data);
    });

    socket.on('error', (error) => {
      this.logger.error({ err: error }, 'Ticker stream error');
    });

    socket.on('close', (code) => {
      if (this.socket !== socket) {
        return;
      }
      this.socket = null;
      this.connected = false;
      this.logger.warn({ code }, 'Ticker stream closed');
      this.scheduleReconnect();
    });
  }

  private handleMessage(data: WebSocket.RawData | string): void {
    if (!this.running) {
      return;
    }

    let payload: unknown;
    try {
      payload = JSON.parse(rawToString(data));
    } catch (error) {
      this.logger.warn({ err: toError(error) }, 'Dropped unparsable ticker message');
      return;
    }

    const parsed = tickerMessageSchema.safeParse(payload);
    if (!parsed.success) {
      this.logger.debug({ issues: parsed.error.issues.length }, 'Ignored non-ticker message');
      return;
    }

    if (parsed.data.s.toUpperCase() !== this.symbol) {
      this.logger.debug({ received: parsed.data.s }, 'Ignored ticker for another symbol');
      return;
    }

    const value = new Decimal(parsed.data.c);
    if (!value.isFinite() || value.lte(0)) {
      this.logger.debug({ price: parsed.data.c }, 'Ignored non-positive price');
      return;
    }

    this.latest = Object.freeze({ value, observedAt: new Date() });
    this.scheduleNotify();
  }

  private scheduleNotify(): void {
    if (this.notifyPending) {
      return;
    }
    this.notifyPending = true;
    queueMicrotask(() => {
      this.notifyPending = false;
      const sample = this.latest;
      if (!sample) {
        return;
      }
      for (const listener of this.listeners) {
        try {
          listener(sample);
        } catch (error) {
          this.logger.error({ err: toError(error) }, 'Price listener error');
        }
      }
    });
  }

  private waitForFirstSample(): Promise<boolean> {
    if (this.latest) {
      return Promise.resolve(true);
    }

    return new Promise((resolve) => {
      const finish = (received: boolean): void => {
        clearTimeout(timer);
        unsubscribe();
        this.settleStartup = null;
        resolve(received);
      };
      const timer = setTimeout(() => finish(false), this.startupTimeoutMs);
      const unsubscribe = this.onUpdate(() => finish(true));
      this.settleStartup = () => finish(false);
    });
  }

  private scheduleReconnect(): void {
    if (!this.running || this.reconnectTimer) {
      return;
    }

    const delay = this.reconnectPolicy.nextDelay();
    this.logger.info(
      { delayMs: delay, attempt: this.reconnectPolicy.getAttempts() },
      `Reconnecting to ticker stream in ${Math.round(delay / 1000)}s`
    );
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect();
    }, delay);
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }
}
