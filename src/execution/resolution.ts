/**
 * Resolution & redemption
 *
 * After an overlap's trades, wait for both markets to finalize, price the
 * batch and hand the winning positions to the settlement gateway.
 */

import type { Market, OutcomeToken, RedemptionTarget, TradePnl, TradeRecord } from '../types/arbitrage';
import type { Clock, SettlementGateway, VenueQuery } from '../types/venue';
import type { StrategyConfig } from '../config/config';
import { computeTradePnl } from '../crypto/pnl';
import { errorMessage } from '../types/errors';
import { Logger, logger as rootLogger } from '../logger/logger';

export interface ResolvedWinners {
  winner_15: OutcomeToken;
  winner_5: OutcomeToken;
}

export interface BatchSettlement {
  results: Array<{ trade: TradeRecord; pnl: TradePnl }>;
  targets: RedemptionTarget[];
  batch_pnl: number;
}

export interface RedeemReport {
  submitted: number;
  succeeded: number;
  failed: number;
  skipped: boolean;
}

/**
 * The single winning token of a closed market, or null while unresolved
 */
export function resolvedWinner(market: Market): OutcomeToken | null {
  if (!market.closed) return null;
  const winners = market.tokens.filter(t => t.winner);
  return winners.length === 1 ? winners[0] : null;
}

/**
 * PnL of every trade plus one redemption target per winning leg.
 * Targets may repeat across trades that share a market.
 */
export function settleBatch(trades: TradeRecord[], winToken15: string, winToken5: string): BatchSettlement {
  const results: BatchSettlement['results'] = [];
  const targets: RedemptionTarget[] = [];
  let batchPnl = 0;

  for (const trade of trades) {
    const pnl = computeTradePnl(trade, winToken15, winToken5);
    batchPnl += pnl.pnl;
    results.push({ trade, pnl });

    if (pnl.won_15m) {
      targets.push({ condition_id: trade.cid_15, outcome: trade.leg1.outcome });
    }
    if (pnl.won_5m) {
      targets.push({ condition_id: trade.cid_5, outcome: trade.leg2.outcome });
    }
  }

  return { results, targets, batch_pnl: batchPnl };
}

export function dedupeTargets(targets: RedemptionTarget[]): RedemptionTarget[] {
  const seen = new Set<string>();
  const unique: RedemptionTarget[] = [];
  for (const target of targets) {
    const key = `${target.condition_id}:${target.outcome}`;
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(target);
  }
  return unique;
}

export function describeLegs(pnl: TradePnl): string {
  if (pnl.won_15m && pnl.won_5m) return 'Won both legs';
  if (pnl.won_15m) return 'Won 15m leg';
  if (pnl.won_5m) return 'Won 5m leg';
  return 'Lost both legs';
}

export interface ResolutionDeps {
  venue: VenueQuery;
  settlement: SettlementGateway;
  clock: Clock;
  strategy: StrategyConfig;
  /** A proxy wallet is configured */
  hasProxyWallet: boolean;
  log?: Logger;
}

export class ResolutionCoordinator {
  private readonly log: Logger;

  constructor(private readonly deps: ResolutionDeps) {
    this.log = deps.log ?? rootLogger.child('resolution');
  }

  get redeemEnabled(): boolean {
    const { strategy, hasProxyWallet } = this.deps;
    return strategy.autoRedeem && !strategy.simulationMode && hasProxyWallet;
  }

  private async tryGetMarket(conditionId: string): Promise<Market | null> {
    try {
      return await this.deps.venue.getMarketByConditionId(conditionId);
    } catch (error) {
      this.log.debug(`Resolution poll failed for ${conditionId}`, { error: errorMessage(error) });
      return null;
    }
  }

  /**
   * Wait the settle delay, then poll both markets until each is closed with
   * exactly one winner. Null once the max wait runs out.
   */
  async awaitResolution(cid15: string, cid5: string, tradeCount: number): Promise<ResolvedWinners | null> {
    const { clock, strategy } = this.deps;
    this.log.info(
      `Resolution: waiting ${strategy.resolutionSettleDelaySecs}s, then polling every ` +
      `${strategy.resolutionPollIntervalSecs}s (max ${strategy.resolutionMaxWaitSecs}s) for ${tradeCount} trade(s)`,
    );
    await clock.sleep(strategy.resolutionSettleDelaySecs * 1000);

    const started = clock.now();
    const maxWaitMs = strategy.resolutionMaxWaitSecs * 1000;

    while (clock.now() - started < maxWaitMs) {
      const [m15, m5] = await Promise.all([this.tryGetMarket(cid15), this.tryGetMarket(cid5)]);
      const winner15 = m15 ? resolvedWinner(m15) : null;
      const winner5 = m5 ? resolvedWinner(m5) : null;

      if (winner15 && winner5) {
        return { winner_15: winner15, winner_5: winner5 };
      }
      await clock.sleep(strategy.resolutionPollIntervalSecs * 1000);
    }

    return null;
  }

  /**
   * Submit each unique target. Failures are logged and the rest continue.
   */
  async redeem(targets: RedemptionTarget[]): Promise<RedeemReport> {
    const unique = dedupeTargets(targets);
    if (unique.length === 0) {
      return { submitted: 0, succeeded: 0, failed: 0, skipped: false };
    }

    if (!this.redeemEnabled) {
      this.log.info(`Auto-redeem off; skipping ${unique.length} target(s)`, {
        targets: unique.map(t => `${t.condition_id}:${t.outcome}`),
      });
      return { submitted: 0, succeeded: 0, failed: 0, skipped: true };
    }

    let succeeded = 0;
    let failed = 0;
    for (const target of unique) {
      try {
        const result = await this.deps.settlement.redeem(target.condition_id, target.outcome);
        if (result.success) {
          succeeded++;
          this.log.info(`💰 Redeemed ${target.condition_id} outcome ${target.outcome}`, { tx: result.tx_hash });
        } else {
          failed++;
          this.log.warn(`Redeem failed for ${target.condition_id} ${target.outcome}: ${result.message ?? 'unknown'}`);
        }
      } catch (error) {
        failed++;
        this.log.warn(`Redeem failed for ${target.condition_id} ${target.outcome}: ${errorMessage(error)}`);
      }
    }

    return { submitted: unique.length, succeeded, failed, skipped: false };
  }
}
