#!/usr/bin/env node
/**
 * 15m vs 5m Up/Down Overlap Arbitrage Bot
 *
 * Strategy: during the last 5 minutes of a 15m period, buy 15m-Up + 5m-Down
 * (or 15m-Down + 5m-Up) when the two asks sum below the threshold.
 * Both markets resolve against nearly the same price-to-beat, so at least
 * one leg usually pays out.
 */

import * as dotenv from 'dotenv';
import type { Server } from 'http';
import { parseCliArgs, type CliArgs } from './cli';
import { loadConfig, loadSecrets, type AppConfig, type Secrets } from './config/config';
import { PriceFeedCache } from './crypto/price-cache';
import { SessionLedger, formatSessionReport } from './crypto/persistence';
import { createPublicClobClient, createTradingClobClient } from './polymarket/client';
import { PolymarketVenueClient } from './polymarket/gamma';
import { MarketDiscovery, classifyOutcome } from './polymarket/discovery';
import { ClobOrderGateway } from './polymarket/orders';
import { CtfSettlementGateway } from './polymarket/redeem';
import { OrderBookWebSocket } from './execution/orderbook-ws';
import { ChainlinkReferenceStream } from './execution/reference-ws';
import { ResolutionCoordinator, resolvedWinner } from './execution/resolution';
import { SymbolArbStateMachine } from './execution/state-machine';
import { Orchestrator } from './execution/orchestrator';
import { LogBuffer, startDashboardServer, type BotStatus } from './dashboard/server';
import { systemClock, type VenueQuery } from './types/venue';
import { errorMessage } from './types/errors';
import { levelFromEnv, logger } from './logger/logger';

// Load environment variables
dotenv.config();
logger.setLevel(levelFromEnv());

const log = logger.child('main');

async function runManualRedeem(args: CliArgs, config: AppConfig, secrets: Secrets, venue: VenueQuery): Promise<boolean> {
  const conditionId = args.conditionId;
  if (!conditionId) return false;

  let outcome: string | undefined = args.outcome;
  if (!outcome) {
    const market = await venue.getMarketByConditionId(conditionId);
    const winner = resolvedWinner(market);
    if (!winner) {
      log.error(`Market ${conditionId} is not resolved yet; pass --outcome to redeem anyway`);
      return false;
    }
    outcome = classifyOutcome(winner.outcome) ?? winner.outcome;
    log.info(`Resolved winner for ${conditionId}: ${outcome}`);
  }

  const settlement = new CtfSettlementGateway({ rpcUrl: config.polymarket.rpcUrl, secrets });
  const result = await settlement.redeem(conditionId, outcome);
  if (result.success) {
    log.info(`✓ ${result.message ?? 'Redeemed'}`);
  } else {
    log.error(`Redeem failed: ${result.message ?? 'unknown error'}`);
  }
  return result.success;
}

function logBanner(config: AppConfig): void {
  const s = config.strategy;
  log.info('━'.repeat(55));
  log.info(`   15m vs 5m ARBITRAGE (symbols: ${s.symbols.join(', ')})`);
  log.info(`   Mode: ${s.simulationMode ? 'SIMULATION' : `LIVE - ${s.arbShares} shares per leg`}`);
  log.info('   Price-to-beat: RTDS Chainlink (one socket for all symbols); per-symbol tolerance');
  log.info(`   Place both legs when sum of asks < ${s.sumThreshold}; next arb after ${s.tradeIntervalSecs}s cooldown`);
  log.info(`   Post-arb: poll resolution every ${s.resolutionPollIntervalSecs}s, auto_redeem=${s.autoRedeem}`);
  log.info('━'.repeat(55));
}

// Main entry point
async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));
  const config = loadConfig(args.configPath);
  const secrets = loadSecrets();

  const venue = new PolymarketVenueClient({
    gammaApiUrl: config.polymarket.gammaApiUrl,
    clob: createPublicClobClient(config.polymarket.clobApiUrl),
  });

  if (args.redeem) {
    const ok = await runManualRedeem(args, config, secrets, venue);
    process.exit(ok ? 0 : 1);
  }

  const startTime = Date.now();
  let botStatus: BotStatus = 'initializing';

  const logBuffer = new LogBuffer();
  logger.addSink(logBuffer.sink);

  logBanner(config);

  const cache = new PriceFeedCache();
  const ledger = new SessionLedger();
  const orders = new ClobOrderGateway(() =>
    createTradingClobClient(config.polymarket.clobApiUrl, secrets, logger.child('clob')),
  );
  const resolution = new ResolutionCoordinator({
    venue,
    settlement: new CtfSettlementGateway({ rpcUrl: config.polymarket.rpcUrl, secrets }),
    clock: systemClock,
    strategy: config.strategy,
    hasProxyWallet: secrets.proxyWallet !== undefined,
  });
  const discovery = new MarketDiscovery(venue);
  const bookStream = new OrderBookWebSocket(config.polymarket.wsUrl);

  const runners = config.strategy.symbols.map(symbol => new SymbolArbStateMachine({
    symbol,
    strategy: config.strategy,
    clock: systemClock,
    venue,
    discovery,
    cache,
    orders,
    stream: bookStream,
    resolution,
    ledger,
  }));

  const orchestrator = new Orchestrator({
    cache,
    referenceStream: new ChainlinkReferenceStream({
      url: config.polymarket.rtdsWsUrl,
      symbols: config.strategy.symbols,
    }),
    runners,
    ledger,
    clock: systemClock,
  });

  let server: Server | null = null;
  if (config.dashboard.enabled) {
    const envPort = process.env.PORT ? parseInt(process.env.PORT, 10) : NaN;
    const port = Number.isInteger(envPort) && envPort > 0 ? envPort : config.dashboard.port;
    server = startDashboardServer({
      botStatus: () => botStatus,
      orchestrator: () => orchestrator.status(),
      stats: () => ledger.getStats(),
      logs: logBuffer,
      startTime,
    }, port);
  }

  // Handle graceful shutdown
  const shutdown = (signal: string): void => {
    log.info(`Received ${signal}, shutting down...`);
    botStatus = 'stopped';
    orchestrator.stop();
    console.log('\n' + formatSessionReport(ledger.getStats(), Date.now() - startTime));
    server?.close();
    log.info('Bot stopped.');
    process.exit(0);
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  botStatus = 'running';
  log.info('🚀 Starting symbol loops...');
  const results = await orchestrator.run();
  botStatus = 'stopped';

  for (const result of results) {
    if (result.status === 'failed') {
      log.error(`${result.symbol.toUpperCase()} stopped: ${result.error ?? 'unknown error'}`);
    }
  }
  console.log('\n' + formatSessionReport(ledger.getStats(), Date.now() - startTime));
  server?.close();
}

// Run
main().catch((error: unknown) => {
  log.error(`Fatal error: ${errorMessage(error)}`);
  process.exit(1);
});
