import { z } from 'zod';
import dotenv from 'dotenv';
import { ConfigValidationError, DURATION_CLASSES } from '@strike-quoter/core';

dotenv.config();

const durationSchema = z.enum(DURATION_CLASSES);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error']).default('info'),
  ENABLE_DRY_RUN: z.string().transform((val) => val.toLowerCase() === 'true').default('true'),

  // Polymarket
  POLYMARKET_PRIVATE_KEY: z.string().optional(),
  POLYMARKET_API_KEY: z.string().optional(),
  POLYMARKET_FUNDER_ADDRESS: z.string().optional(),
  POLYMARKET_CLOB_URL: z.string().url().default('https://clob.polymarket.com'),
  POLYMARKET_GAMMA_URL: z.string().url().default('https://gamma-api.polymarket.com'),

  // Reference price feed
  BINANCE_WS_URL: z.string().url().default('wss://stream.binance.com:9443/ws'),
  BINANCE_API_URL: z.string().url().default('https://api.binance.com'),
  SYMBOL: z.string().min(1).default('BTCUSDT'),
  SYMBOL_ALIASES: z.string().default('btc,bitcoin'),
  MARKET_DURATION: durationSchema.default('15m'),

  // Trading
  INITIAL_CAPITAL: z.string().transform(Number).pipe(z.number().positive()).default('100'),
  MAX_POSITION_SIZE: z.string().transform(Number).pipe(z.number().positive()).default('20'),
  SPREAD_BPS: z.string().transform(Number).pipe(z.number().int()).default('50'),
  CANCEL_REPLACE_INTERVAL: z.string().transform(Number).pipe(z.number()).default('2'),
  QUOTE_REFRESH_ON_PRICE_CHANGE: z.string().transform(Number).pipe(z.number().positive()).default('0.001'),
  MIN_EDGE_BPS: z.string().transform(Number).pipe(z.number().int().nonnegative()).default('200'),

  // Safety
  MAX_DAILY_LOSS: z.string().transform(Number).pipe(z.number().positive()).default('20'),
  MAX_DAILY_TRADES: z.string().transform(Number).pipe(z.number().int().positive()).default('500'),
  KILL_SWITCH_FILE: z.string().default('kill-switch.flag'),

  // Timing
  PRICE_STALE_MS: z.string().transform(Number).pipe(z.number().int().positive()).default('10000'),
  STREAM_STARTUP_TIMEOUT_MS: z.string().transform(Number).pipe(z.number().int().positive()).default('10000'),
  RECONNECT_INITIAL_MS: z.string().transform(Number).pipe(z.number().int().positive()).default('5000'),
  RECONNECT_MAX_MS: z.string().transform(Number).pipe(z.number().int().positive()).default('60000'),
  REQUEST_TIMEOUT_MS: z.string().transform(Number).pipe(z.number().int().positive()).default('10000'),
  TICK_INTERVAL_MS: z.string().transform(Number).pipe(z.number().int().positive()).default('1000'),

  // Observability
  METRICS_PORT: z.string().transform(Number).pipe(z.number().int().nonnegative()).default('9090'),
});

export type Env = z.infer<typeof envSchema>;
export type MarketDuration = z.infer<typeof durationSchema>;

export interface QuoterConfig {
  readonly nodeEnv: Env['NODE_ENV'];
  readonly logLevel: Env['LOG_LEVEL'];
  readonly dryRun: boolean;
  readonly polymarket: {
    readonly privateKey?: string;
    readonly apiKey?: string;
    readonly funderAddress?: string;
    readonly clobUrl: string;
    readonly gammaUrl: string;
  };
  readonly feed: {
    readonly wsBaseUrl: string;
    readonly restUrl: string;
    readonly symbol: string;
    readonly staleMs: number;
    readonly startupTimeoutMs: number;
    readonly reconnectInitialMs: number;
    readonly reconnectMaxMs: number;
  };
  readonly market: {
    readonly symbolAliases: readonly string[];
    readonly duration: MarketDuration;
  };
  readonly trading: {
    readonly initialCapital: number;
    readonly maxPositionSize: number;
    readonly spreadBps: number;
    readonly requoteIntervalSeconds: number;
    readonly priceChangeThreshold: number;
    readonly minEdgeBps: number;
  };
  readonly safety: {
    readonly maxDailyLoss: number;
    readonly maxDailyTrades: number;
    readonly killSwitchFile: string;
  };
  readonly requestTimeoutMs: number;
  readonly tickIntervalMs: number;
  readonly metricsPort: number;
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

/**
 * Cross-field rules that zod's per-key schema cannot express.
 * Returns one message per violated rule.
 */
export function validateEnv(env: Env): string[] {
  const problems: string[] = [];

  if (!env.ENABLE_DRY_RUN && !env.POLYMARKET_PRIVATE_KEY) {
    problems.push('POLYMARKET_PRIVATE_KEY required when ENABLE_DRY_RUN=false');
  }
  if (env.MAX_POSITION_SIZE > env.INITIAL_CAPITAL) {
    problems.push('MAX_POSITION_SIZE cannot exceed INITIAL_CAPITAL');
  }
  if (env.SPREAD_BPS < 10) {
    problems.push('SPREAD_BPS too low (minimum 10 = 0.1%)');
  }
  if (env.CANCEL_REPLACE_INTERVAL < 1) {
    problems.push('CANCEL_REPLACE_INTERVAL too low (minimum 1 second)');
  }
  if (env.RECONNECT_MAX_MS < env.RECONNECT_INITIAL_MS) {
    problems.push('RECONNECT_MAX_MS cannot be lower than RECONNECT_INITIAL_MS');
  }

  return problems;
}

export function loadConfig(source: NodeJS.ProcessEnv): QuoterConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigValidationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const env = parsed.data;
  const problems = validateEnv(env);
  if (problems.length > 0) {
    throw new ConfigValidationError(problems);
  }

  return deepFreeze({
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    dryRun: env.ENABLE_DRY_RUN,
    polymarket: {
      privateKey: env.POLYMARKET_PRIVATE_KEY || undefined,
      apiKey: env.POLYMARKET_API_KEY || undefined,
      funderAddress: env.POLYMARKET_FUNDER_ADDRESS || undefined,
      clobUrl: env.POLYMARKET_CLOB_URL,
      gammaUrl: env.POLYMARKET_GAMMA_URL,
    },
    feed: {
      wsBaseUrl: env.BINANCE_WS_URL,
      restUrl: env.BINANCE_API_URL,
      symbol: env.SYMBOL.toUpperCase(),
      staleMs: env.PRICE_STALE_MS,
      startupTimeoutMs: env.STREAM_STARTUP_TIMEOUT_MS,
      reconnectInitialMs: env.RECONNECT_INITIAL_MS,
      reconnectMaxMs: env.RECONNECT_MAX_MS,
    },
    market: {
      symbolAliases: env.SYMBOL_ALIASES.split(',')
        .map((alias) => alias.trim().toLowerCase())
        .filter((alias) => alias.length > 0),
      duration: env.MARKET_DURATION,
    },
    trading: {
      initialCapital: env.INITIAL_CAPITAL,
      maxPositionSize: env.MAX_POSITION_SIZE,
      spreadBps: env.SPREAD_BPS,
      requoteIntervalSeconds: env.CANCEL_REPLACE_INTERVAL,
      priceChangeThreshold: env.QUOTE_REFRESH_ON_PRICE_CHANGE,
      minEdgeBps: env.MIN_EDGE_BPS,
    },
    safety: {
      maxDailyLoss: env.MAX_DAILY_LOSS,
      maxDailyTrades: env.MAX_DAILY_TRADES,
      killSwitchFile: env.KILL_SWITCH_FILE,
    },
    requestTimeoutMs: env.REQUEST_TIMEOUT_MS,
    tickIntervalMs: env.TICK_INTERVAL_MS,
    metricsPort: env.METRICS_PORT,
  });
}

let cachedConfig: QuoterConfig | null = null;

// Entrypoint use only; components take a QuoterConfig in their constructors.
export function getConfig(): QuoterConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  cachedConfig = loadConfig(process.env);
  return cachedConfig;
}

export function maskSecret(secret: string | undefined): string {
  if (!secret) {
    return 'Not configured';
  }
  if (secret.length <= 10) {
    return '***';
  }
  return `${secret.slice(0, 6)}...${secret.slice(-4)}`;
}

export function describeConfig(config: QuoterConfig): string[] {
  const { trading, safety } = config;
  return [
    `Mode:              ${config.dryRun ? 'DRY-RUN' : 'LIVE'}`,
    `Symbol:            ${config.feed.symbol} (${config.market.duration} markets)`,
    `Initial Capital:   $${trading.initialCapital.toFixed(2)}`,
    `Max Position:      $${trading.maxPositionSize.toFixed(2)}`,
    `Spread:            ${(trading.spreadBps / 100).toFixed(2)}%`,
    `Cancel/Replace:    ${trading.requoteIntervalSeconds}s`,
    `Requote On Move:   ${(trading.priceChangeThreshold * 100).toFixed(2)}%`,
    `Min Edge:          ${(trading.minEdgeBps / 100).toFixed(2)}%`,
    `Max Daily Loss:    $${safety.maxDailyLoss.toFixed(2)}`,
    `Max Daily Trades:  ${safety.maxDailyTrades}`,
    `Wallet:            ${maskSecret(config.polymarket.privateKey)}`,
  ];
}
