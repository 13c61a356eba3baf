import { createServer, type Server } from 'http';
import type Decimal from 'decimal.js';
import type { Logger } from 'pino';
import type { EngineSnapshot } from './quote-engine.js';

export type SnapshotSource = () => EngineSnapshot;

export interface MetricsServerOptions {
  port: number;
  source: SnapshotSource;
  logger: Logger;
}

type MetricType = 'counter' | 'gauge';

function metric(
  lines: string[],
  name: string,
  type: MetricType,
  help: string,
  value: number | Decimal | null
): void {
  lines.push(`# HELP ${name} ${help}`);
  lines.push(`# TYPE ${name} ${type}`);
  lines.push(`${name} ${value === null ? 'NaN' : value.toString()}`);
}

/** Prometheus text exposition of one engine snapshot. */
export function renderMetrics(snapshot: EngineSnapshot): string {
  const lines: string[] = [];

  metric(lines, 'quoter_running', 'gauge', 'Whether the quote loop is running', snapshot.running ? 1 : 0);
  metric(lines, 'quoter_requotes_total', 'counter', 'Cancel/replace cycles completed', snapshot.requotes);
  metric(lines, 'quoter_vetoes_total', 'counter', 'Requotes vetoed near the 50% price', snapshot.vetoes);
  metric(lines, 'quoter_skipped_ticks_total', 'counter', 'Ticks skipped for lack of a fresh price', snapshot.skippedTicks);
  metric(lines, 'quoter_resting_orders', 'gauge', 'Orders currently tracked on the exchange', snapshot.restingOrders);
  metric(lines, 'quoter_reference_price', 'gauge', 'Last reference price observed', snapshot.lastReferencePrice);
  metric(lines, 'quoter_fair_price', 'gauge', 'Last computed fair price', snapshot.lastFairPrice);
  metric(lines, 'quoter_stream_healthy', 'gauge', 'Whether the reference price is fresh', snapshot.streamHealthy ? 1 : 0);
  metric(lines, 'quoter_daily_trades', 'gauge', 'Fills recorded today (UTC)', snapshot.dailyTrades);
  metric(lines, 'quoter_daily_pnl', 'gauge', 'Marked PnL for today (UTC)', snapshot.dailyPnl);

  return lines.join('\n') + '\n';
}

export class MetricsServer {
  private server: Server | null = null;
  private port: number;
  private source: SnapshotSource;
  private logger: Logger;

  constructor(options: MetricsServerOptions) {
    this.port = options.port;
    this.source = options.source;
    this.logger = options.logger.child({ component: 'metrics' });
  }

  start(): Promise<number> {
    const server = createServer((req, res) => {
      if (req.url === '/metrics') {
        res.writeHead(200, { 'Content-Type': 'text/plain; version=0.0.4' });
        res.end(renderMetrics(this.source()));
      } else {
        res.writeHead(404);
        res.end('Not found');
      }
    });
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.port, () => {
        const address = server.address();
        const port = typeof address === 'object' && address !== null ? address.port : this.port;
        this.logger.info({ port }, 'Metrics server listening');
        resolve(port);
      });
    });
  }

  stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) {
      return Promise.resolve();
    }
    return new Promise((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }
}
