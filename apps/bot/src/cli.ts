#!/usr/bin/env node
import { Command } from 'commander';
import { createInterface } from 'readline';
import type { Logger } from 'pino';
import { ConfigValidationError } from '@strike-quoter/core';
import { describeConfig, getConfig, type QuoterConfig } from '@strike-quoter/config';
import { ClobRestClient } from '@strike-quoter/polymarket';
import { KillSwitch } from '@strike-quoter/risk';
import { createLogger } from './logger.js';
import { MetricsServer } from './metrics.js';
import { createExchange, createQuoteEngine, type ExchangeMode } from './quoter.js';
import { checkTargets, estimateCancelReplace, probeEndpoint, type ProbeResult } from './connectivity.js';

function loadConfigOrExit(): QuoterConfig {
  try {
    return getConfig();
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      console.error('Configuration errors:');
      for (const problem of error.problems) {
        console.error(`  - ${problem}`);
      }
      process.exit(1);
    }
    throw error;
  }
}

async function runEngine(config: QuoterConfig, logger: Logger, mode: ExchangeMode): Promise<void> {
  const exchange = createExchange(config, logger, mode);
  const engine = createQuoteEngine(config, logger, exchange);
  const metrics =
    config.metricsPort > 0
      ? new MetricsServer({ port: config.metricsPort, source: () => engine.getSnapshot(), logger })
      : null;

  let exiting = false;
  const shutdown = (reason: string, exitCode: number): void => {
    if (exiting) {
      return;
    }
    exiting = true;
    logger.info({ reason }, 'Shutting down...');
    engine
      .stop()
      .then(() => metrics?.stop())
      .then(() => process.exit(exitCode))
      .catch((err) => {
        logger.error({ err }, 'Shutdown failed');
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT', 0));
  process.on('SIGTERM', () => shutdown('SIGTERM', 0));
  process.on('unhandledRejection', (err) => {
    logger.error({ err }, 'Unhandled rejection');
    shutdown('unhandledRejection', 1);
  });
  process.on('uncaughtException', (err) => {
    logger.error({ err }, 'Uncaught exception');
    shutdown('uncaughtException', 1);
  });

  for (const line of describeConfig(config)) {
    logger.info(line);
  }

  if (metrics) {
    await metrics.start();
  }

  try {
    await engine.start();
  } catch (err) {
    logger.error({ err }, 'Failed to start');
    shutdown('startup-failed', 1);
    return;
  }

  await engine.waitUntilStopped();
  const { stopReason } = engine.getSnapshot();
  shutdown(stopReason ?? 'stopped', stopReason === 'error' ? 1 : 0);
}

async function confirm(question: string): Promise<boolean> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  const answer = await new Promise<string>((resolve) => {
    rl.question(question, resolve);
  });
  rl.close();

  return answer.trim().toLowerCase() === 'yes';
}

const program = new Command();

program
  .name('strike-quoter')
  .description('Two-sided quoter for short-dated crypto strike markets')
  .version('0.1.0');

program
  .command('run')
  .description('Quote against the paper exchange (dry run)')
  .action(async () => {
    const config = loadConfigOrExit();
    const logger = createLogger(config);
    if (!config.dryRun) {
      logger.warn('ENABLE_DRY_RUN is false, but "run" always uses the paper exchange. Use "live" for live trading.');
    }
    await runEngine(config, logger, 'paper');
  });

program
  .command('live')
  .description('Quote against the Polymarket CLOB (requires ENABLE_DRY_RUN=false)')
  .action(async () => {
    const config = loadConfigOrExit();
    const logger = createLogger(config);
    if (config.dryRun) {
      logger.error('ENABLE_DRY_RUN must be false for live trading');
      process.exit(1);
    }

    if (!(await confirm('Are you sure you want to enable LIVE TRADING? (yes/no): '))) {
      logger.info('Live trading cancelled');
      process.exit(0);
    }

    logger.warn('LIVE TRADING ENABLED - Real money at risk!');
    await runEngine(config, logger, 'live');
  });

program
  .command('config')
  .description('Print the configuration summary with secrets masked')
  .action(() => {
    const config = loadConfigOrExit();
    console.log(describeConfig(config).join('\n'));
  });

program
  .command('check')
  .description('Measure latency to the CLOB and the reference price API')
  .action(async () => {
    const config = loadConfigOrExit();
    const results: ProbeResult[] = [];
    for (const [name, url] of checkTargets(config.polymarket.clobUrl, config.feed.restUrl, config.feed.symbol)) {
      const result = await probeEndpoint(name, url, { timeoutMs: config.requestTimeoutMs });
      results.push(result);
      console.log(
        result.ok
          ? `OK    ${name}: ${result.latencyMs.toFixed(0)}ms`
          : `FAIL  ${name}: ${result.error ?? 'unknown error'}`
      );
    }

    const clob = results[0];
    if (!results.every((result) => result.ok) || !clob) {
      console.log('\nSome connections failed.');
      process.exit(1);
    }

    const estimate = estimateCancelReplace(clob.latencyMs);
    console.log(`\nEstimated cancel/replace loop: ${estimate.estimatedMs.toFixed(0)}ms (${estimate.rating.toUpperCase()})`);
  });

program
  .command('cancel-all')
  .description('Emergency stop: cancel every open order on the exchange')
  .action(async () => {
    const config = loadConfigOrExit();
    const logger = createLogger(config);
    const client = new ClobRestClient({
      baseUrl: config.polymarket.clobUrl,
      apiKey: config.polymarket.apiKey,
      timeoutMs: config.requestTimeoutMs,
    });

    const orderIds = await client.listOpenOrders();
    logger.warn({ count: orderIds.length }, 'Cancelling all open orders');

    let cancelled = 0;
    for (const orderId of orderIds) {
      try {
        await client.cancel(orderId);
        cancelled++;
      } catch (err) {
        logger.error({ err, orderId }, 'Failed to cancel order');
      }
    }

    logger.info({ cancelled, failed: orderIds.length - cancelled }, 'Cancel-all finished');
    if (cancelled < orderIds.length) {
      process.exit(1);
    }
  });

program
  .command('kill-switch')
  .description('Activate the kill switch (a running engine stops on its next tick)')
  .action(() => {
    const config = loadConfigOrExit();
    const logger = createLogger(config);
    new KillSwitch(config.safety.killSwitchFile).engage();
    logger.warn({ file: config.safety.killSwitchFile }, 'Kill switch activated');
  });

program
  .command('kill-switch:clear')
  .description('Clear the kill switch')
  .action(() => {
    const config = loadConfigOrExit();
    const logger = createLogger(config);
    if (new KillSwitch(config.safety.killSwitchFile).clear()) {
      logger.info('Kill switch cleared');
    } else {
      logger.info('Kill switch was not active');
    }
  });

program.parseAsync().catch((err) => {
  console.error(err);
  process.exit(1);
});
