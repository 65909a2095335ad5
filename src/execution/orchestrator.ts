/**
 * Orchestrator
 *
 * Starts the shared reference feed once, then runs every symbol loop
 * concurrently. One symbol failing never stops the others.
 */

import type { Clock, ReferencePriceStream } from '../types/venue';
import type { ArbState, SymbolRunner } from './state-machine';
import { PriceFeedCache } from '../crypto/price-cache';
import { SessionLedger } from '../crypto/persistence';
import { errorMessage } from '../types/errors';
import { Logger, logger as rootLogger } from '../logger/logger';
import { RTDS_WARMUP_MS } from '../config/constants';

export interface SymbolResult {
  symbol: string;
  status: 'stopped' | 'failed';
  error?: string;
}

export interface SymbolStatus {
  symbol: string;
  state: ArbState;
}

export interface OrchestratorStatus {
  running: boolean;
  started_at: number | null;
  symbols: SymbolStatus[];
  cumulative_pnl: number;
}

export interface OrchestratorDeps {
  cache: PriceFeedCache;
  referenceStream: ReferencePriceStream;
  runners: SymbolRunner[];
  ledger: SessionLedger;
  clock: Clock;
  warmupMs?: number;
  log?: Logger;
}

export class Orchestrator {
  private readonly log: Logger;
  private running = false;
  private startedAt: number | null = null;

  constructor(private readonly deps: OrchestratorDeps) {
    this.log = deps.log ?? rootLogger.child('orchestrator');
  }

  /**
   * Resolves once every symbol loop has ended, stopped or failed
   */
  async run(): Promise<SymbolResult[]> {
    const { cache, referenceStream, runners, clock } = this.deps;
    this.running = true;
    this.startedAt = clock.now();

    referenceStream.start(tick => {
      for (const captured of cache.recordReference(tick)) {
        this.log.info(
          `RTDS Chainlink price-to-beat ${captured.granularity}m ${captured.symbol}: ` +
          `period ${captured.period_start} -> ${captured.value.toFixed(2)} USD (feed_ts=${tick.timestamp_sec})`,
        );
      }
    });
    await clock.sleep(this.deps.warmupMs ?? RTDS_WARMUP_MS);

    const results = await Promise.all(runners.map(runner => this.runSymbol(runner)));

    referenceStream.stop();
    this.running = false;
    return results;
  }

  private async runSymbol(runner: SymbolRunner): Promise<SymbolResult> {
    try {
      await runner.run();
      return { symbol: runner.symbol, status: 'stopped' };
    } catch (error) {
      const message = errorMessage(error);
      this.log.error(`Symbol loop ${runner.symbol} failed: ${message}`);
      return { symbol: runner.symbol, status: 'failed', error: message };
    }
  }

  stop(): void {
    for (const runner of this.deps.runners) {
      runner.stop();
    }
    this.deps.referenceStream.stop();
    this.running = false;
  }

  status(): OrchestratorStatus {
    return {
      running: this.running,
      started_at: this.startedAt,
      symbols: this.deps.runners.map(r => ({ symbol: r.symbol, state: r.state })),
      cumulative_pnl: this.deps.ledger.cumulative,
    };
  }
}
