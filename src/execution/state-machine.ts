/**
 * Per-symbol execution state machine
 *
 *   WaitingForOverlap -> WaitingForReferencePrices -> Trading -> Resolving -> Redeeming
 *        ^__________________________________________________________________________|
 *
 * One instance per symbol. Instances share only the price cache and the ledger.
 */

import type {
  ArbSelection,
  DiscoveredMarket,
  OverlapTokens,
  RedemptionTarget,
  TradeRecord,
} from '../types/arbitrage';
import type { Clock, OrderBookStream, OrderGateway, VenueQuery } from '../types/venue';
import { toleranceFor, type StrategyConfig } from '../config/config';
import { currentPeriods, isOverlap, periodEnd } from '../crypto/window-clock';
import { selectArbLegs } from '../crypto/arbitrage';
import { PriceFeedCache } from '../crypto/price-cache';
import { SessionLedger } from '../crypto/persistence';
import { MarketDiscovery } from '../polymarket/discovery';
import { placeArbLegs } from './trader';
import { ResolutionCoordinator, dedupeTargets, describeLegs, settleBatch } from './resolution';
import { FatalError, errorMessage } from '../types/errors';
import { Logger, logger as rootLogger } from '../logger/logger';

export type ArbState =
  | 'WaitingForOverlap'
  | 'WaitingForReferencePrices'
  | 'Trading'
  | 'Resolving'
  | 'Redeeming'
  | 'Stopped';

export type CycleOutcome =
  | { kind: 'stopped' }
  | { kind: 'skipped'; period_15: number; reason: 'tolerance' | 'period-ended' }
  | { kind: 'no-trades'; period_15: number }
  | { kind: 'dropped'; period_15: number; trades: number }
  | {
      kind: 'resolved';
      period_15: number;
      trades: number;
      batch_pnl: number;
      cumulative_pnl: number;
      targets: RedemptionTarget[];
    };

/**
 * What the orchestrator needs from a symbol loop
 */
export interface SymbolRunner {
  readonly symbol: string;
  readonly state: ArbState;
  run(): Promise<void>;
  stop(): void;
}

export interface StateMachineDeps {
  symbol: string;
  strategy: StrategyConfig;
  clock: Clock;
  venue: VenueQuery;
  discovery: MarketDiscovery;
  cache: PriceFeedCache;
  orders: OrderGateway;
  stream: OrderBookStream;
  resolution: ResolutionCoordinator;
  ledger: SessionLedger;
  log?: Logger;
}

interface OverlapMarkets {
  period_15: number;
  period_5: number;
  market_15: DiscoveredMarket;
  market_5: DiscoveredMarket;
}

interface ReferencePair {
  ref_15: number;
  ref_5: number;
}

export class SymbolArbStateMachine implements SymbolRunner {
  readonly symbol: string;
  private currentState: ArbState = 'WaitingForOverlap';
  private stopped = false;
  private lastHandledPeriod15: number | null = null;
  private tradeSeq = 0;
  private readonly log: Logger;
  private readonly label: string;

  constructor(private readonly deps: StateMachineDeps) {
    this.symbol = deps.symbol.toLowerCase();
    this.label = this.symbol.toUpperCase();
    this.log = deps.log ?? rootLogger.child(this.label);
  }

  get state(): ArbState {
    return this.currentState;
  }

  private nowSec(): number {
    return Math.floor(this.deps.clock.now() / 1000);
  }

  private transition(next: ArbState): void {
    if (this.currentState !== next) {
      this.log.debug(`${this.currentState} -> ${next}`);
      this.currentState = next;
    }
  }

  stop(): void {
    this.stopped = true;
  }

  /**
   * Loop cycles until stopped. A FatalError ends the loop; anything else is
   * logged and the next cycle starts after the inter-cycle delay.
   */
  async run(): Promise<void> {
    const { clock, strategy } = this.deps;

    while (!this.stopped) {
      try {
        await this.runCycle();
      } catch (error) {
        if (error instanceof FatalError) {
          this.transition('Stopped');
          throw error;
        }
        this.log.error(`${this.label} cycle error: ${errorMessage(error)}`);
      }
      if (!this.stopped) {
        await clock.sleep(strategy.cycleDelaySecs * 1000);
      }
    }

    this.transition('Stopped');
  }

  /**
   * One pass from WaitingForOverlap to the end of Redeeming (or an early exit)
   */
  async runCycle(): Promise<CycleOutcome> {
    this.transition('WaitingForOverlap');
    const overlap = await this.waitForOverlap();
    if (!overlap) return { kind: 'stopped' };

    this.transition('WaitingForReferencePrices');
    const refs = await this.waitForReferences(overlap);
    if (refs === 'stopped') return { kind: 'stopped' };
    if (refs === 'period-ended') {
      this.log.info(`${this.label}: 15m period ${overlap.period_15} ended before reference prices arrived`);
      this.lastHandledPeriod15 = overlap.period_15;
      return { kind: 'skipped', period_15: overlap.period_15, reason: 'period-ended' };
    }

    const tolerance = toleranceFor(this.deps.strategy, this.symbol);
    const diff = Math.abs(refs.ref_15 - refs.ref_5);
    if (diff > tolerance) {
      this.log.info(
        `${this.label}: |15m - 5m| price-to-beat = ${diff.toFixed(6)} > tolerance ${tolerance.toFixed(6)} USD; skipping`,
      );
      this.lastHandledPeriod15 = overlap.period_15;
      return { kind: 'skipped', period_15: overlap.period_15, reason: 'tolerance' };
    }

    const [pair15, pair5] = await Promise.all([
      this.deps.discovery.getOutcomeTokens(overlap.market_15.condition_id),
      this.deps.discovery.getOutcomeTokens(overlap.market_5.condition_id),
    ]);
    const tokens: OverlapTokens = {
      up_15: pair15.up_token_id,
      down_15: pair15.down_token_id,
      up_5: pair5.up_token_id,
      down_5: pair5.down_token_id,
    };

    const questionRef = (market: DiscoveredMarket): string =>
      market.reference_price !== null ? `, question ${market.reference_price}` : '';
    this.log.info(
      `🎯 ${this.label} overlap active: 15m period ${overlap.period_15} (P2B ${refs.ref_15.toFixed(4)}${questionRef(overlap.market_15)}), ` +
      `5m period ${overlap.period_5} (P2B ${refs.ref_5.toFixed(4)}${questionRef(overlap.market_5)}), tolerance ${tolerance.toFixed(6)}`,
    );
    this.lastHandledPeriod15 = overlap.period_15;

    this.transition('Trading');
    const trades = await this.trade(overlap, tokens);
    if (trades.length === 0) {
      return { kind: 'no-trades', period_15: overlap.period_15 };
    }

    return this.resolveAndRedeem(overlap, trades);
  }

  // WaitingForOverlap

  private async waitForOverlap(): Promise<OverlapMarkets | null> {
    const { clock, strategy, discovery } = this.deps;
    const pollMs = strategy.overlapPollSecs * 1000;

    while (!this.stopped) {
      const now = this.nowSec();
      const { period_15, period_5 } = currentPeriods(now);

      if (!isOverlap(now, period_15) || period_15 === this.lastHandledPeriod15) {
        await clock.sleep(pollMs);
        continue;
      }

      const [market_15, market_5] = await Promise.all([
        discovery.findMarket(this.symbol, 15, period_15),
        discovery.findMarket(this.symbol, 5, period_5),
      ]);

      if (!market_15) {
        this.log.warn(`15m ${this.symbol} market not found for period ${period_15}. Retrying.`);
        await clock.sleep(pollMs);
        continue;
      }
      if (!market_5) {
        this.log.warn(`5m ${this.symbol} market not found for period ${period_5}. Retrying.`);
        await clock.sleep(pollMs);
        continue;
      }

      return { period_15, period_5, market_15, market_5 };
    }

    return null;
  }

  // WaitingForReferencePrices

  private async waitForReferences(overlap: OverlapMarkets): Promise<ReferencePair | 'stopped' | 'period-ended'> {
    const { clock, strategy, cache } = this.deps;
    const end = periodEnd(overlap.period_15, 15);

    while (!this.stopped) {
      if (this.nowSec() >= end) return 'period-ended';

      const ref15 = cache.getReference(this.symbol, 15, overlap.period_15);
      const ref5 = cache.getReference(this.symbol, 5, overlap.period_5);
      if (ref15 !== undefined && ref5 !== undefined) {
        return { ref_15: ref15, ref_5: ref5 };
      }

      this.log.info(`${this.label}: waiting for price-to-beat 15m=${ref15 ?? 'none'}, 5m=${ref5 ?? 'none'}`);
      await clock.sleep(strategy.referencePollSecs * 1000);
    }

    return 'stopped';
  }

  // Trading

  /**
   * REST snapshot of the four books so the loop has quotes before the
   * stream's first frame. Stream frames override these as they arrive.
   */
  private async seedQuotes(tokenIds: string[]): Promise<void> {
    const results = await Promise.allSettled(tokenIds.map(id => this.deps.venue.getOrderBookBestPrices(id)));
    results.forEach((result, i) => {
      if (result.status === 'fulfilled') {
        this.deps.cache.applyBookUpdate({ token_id: tokenIds[i], best_bid: result.value.bid, best_ask: result.value.ask });
      } else {
        this.log.debug(`Book snapshot failed for ${tokenIds[i].slice(0, 10)}...`, { error: errorMessage(result.reason) });
      }
    });
  }

  private async trade(overlap: OverlapMarkets, tokens: OverlapTokens): Promise<TradeRecord[]> {
    const { clock, strategy, cache, stream, orders, ledger } = this.deps;
    const tokenIds = [tokens.up_15, tokens.down_15, tokens.up_5, tokens.down_5];
    const end = periodEnd(overlap.period_15, 15);
    const pollMs = strategy.tradingPollMs;
    const cooldownMs = strategy.tradeIntervalSecs * 1000;

    const trades: TradeRecord[] = [];
    let lastTradeAt: number | null = null;

    const subscription = stream.subscribe(tokenIds, update => {
      cache.applyBookUpdate(update);
    });

    try {
      await this.seedQuotes(tokenIds);

      while (!this.stopped && this.nowSec() < end) {
        if (lastTradeAt !== null && clock.now() - lastTradeAt < cooldownMs) {
          await clock.sleep(pollMs);
          continue;
        }

        const selection = selectArbLegs(cache.getOverlapAsks(tokens), tokens, strategy.sumThreshold);
        if (!selection) {
          await clock.sleep(pollMs);
          continue;
        }

        const { leg1, leg2 } = selection;

        if (strategy.simulationMode) {
          this.log.info(
            `[SIM] ${this.label} arb would place: 15m ${leg1.outcome} @ ${leg1.price.toFixed(4)} + ` +
            `5m ${leg2.outcome} @ ${leg2.price.toFixed(4)} (sum ${selection.combined_cost.toFixed(4)} < ${strategy.sumThreshold})`,
          );
          trades.push(this.record(overlap, selection, null, null, true));
          lastTradeAt = clock.now();
          await clock.sleep(pollMs);
          continue;
        }

        const placement = await placeArbLegs(orders, selection, strategy.arbShares, this.log);
        if (placement.ok) {
          this.log.info(
            `✅ ${this.label} arb placed: 15m ${leg1.outcome} @ ${leg1.price.toFixed(4)} (${placement.leg1.order_id ?? ''}), ` +
            `5m ${leg2.outcome} @ ${leg2.price.toFixed(4)} (${placement.leg2.order_id ?? ''}), next in ${strategy.tradeIntervalSecs}s`,
          );
          trades.push(this.record(overlap, selection, placement.leg1.order_id, placement.leg2.order_id, false));
          lastTradeAt = clock.now();
        } else if (placement.surviving) {
          const { leg, order_id } = placement.surviving;
          this.log.error(
            `🚨 ${this.label} single-leg exposure: ${leg.outcome} @ ${leg.price.toFixed(4)} filled as ${order_id ?? 'unknown'}, ` +
            `other leg failed (${placement.failed.map(f => f.error).join('; ')})`,
          );
          ledger.recordUnhedgedLeg({
            symbol: this.symbol,
            token_id: leg.token_id,
            order_id,
            price: leg.price,
            size: strategy.arbShares,
          }, clock.now());
          // The exposure is already taken; the next attempt waits out the cooldown
          lastTradeAt = clock.now();
        } else {
          this.log.warn(`${this.label} arb legs both failed: ${placement.failed.map(f => f.error).join('; ')}`);
        }

        await clock.sleep(pollMs);
      }
    } finally {
      subscription.close();
      cache.clearQuotes(tokenIds);
    }

    this.log.info(`${this.label} overlap window ended (period ${overlap.period_15}), ${trades.length} trade(s) placed`);
    return trades;
  }

  private record(
    overlap: OverlapMarkets,
    selection: ArbSelection,
    orderId1: string | null,
    orderId2: string | null,
    simulated: boolean,
  ): TradeRecord {
    this.tradeSeq++;
    return {
      id: `${this.symbol}-${overlap.period_15}-${this.tradeSeq}`,
      symbol: this.symbol,
      period_15: overlap.period_15,
      period_5: overlap.period_5,
      cid_15: overlap.market_15.condition_id,
      cid_5: overlap.market_5.condition_id,
      leg1: { ...selection.leg1, condition_id: overlap.market_15.condition_id, order_id: orderId1 },
      leg2: { ...selection.leg2, condition_id: overlap.market_5.condition_id, order_id: orderId2 },
      size: this.deps.strategy.arbShares,
      simulated,
      placed_at: this.deps.clock.now(),
    };
  }

  // Resolving / Redeeming

  private async resolveAndRedeem(overlap: OverlapMarkets, trades: TradeRecord[]): Promise<CycleOutcome> {
    const { resolution, ledger, clock } = this.deps;
    const cid15 = overlap.market_15.condition_id;
    const cid5 = overlap.market_5.condition_id;

    this.transition('Resolving');
    const winners = await resolution.awaitResolution(cid15, cid5, trades.length);
    if (!winners) {
      this.log.warn(
        `Resolution timeout for ${trades.length} trade(s) (cid_15=${cid15}, cid_5=${cid5}); batch dropped`,
      );
      ledger.recordDroppedBatch(this.symbol, trades, clock.now());
      return { kind: 'dropped', period_15: overlap.period_15, trades: trades.length };
    }

    this.transition('Redeeming');
    const batch = settleBatch(trades, winners.winner_15.token_id, winners.winner_5.token_id);

    let running = 0;
    for (const { pnl } of batch.results) {
      running += pnl.pnl;
      this.log.info(
        `${this.label} resolved: Won 15m ${winners.winner_15.outcome} 5m ${winners.winner_5.outcome} | ` +
        `${describeLegs(pnl)} | cost=${pnl.cost.toFixed(2)}, payout=${pnl.payout.toFixed(2)}, ` +
        `PnL=${pnl.pnl.toFixed(2)} | period PnL=${running.toFixed(2)}`,
      );
    }

    const cumulative = ledger.recordResolvedBatch(this.symbol, batch.results, clock.now());
    this.log.info(`Period PnL: ${batch.batch_pnl.toFixed(2)} | Cumulative PnL: ${cumulative.toFixed(2)}`);

    const targets = dedupeTargets(batch.targets);
    await resolution.redeem(targets);

    return {
      kind: 'resolved',
      period_15: overlap.period_15,
      trades: trades.length,
      batch_pnl: batch.batch_pnl,
      cumulative_pnl: cumulative,
      targets,
    };
  }
}
