/**
 * Session Ledger
 *
 * Holds the cumulative PnL shared by every symbol loop, plus what happened
 * to each batch of trades this session. In-memory only.
 */

import type { TradePnl, TradeRecord } from '../types/arbitrage';

export interface ResolvedTradeEntry {
  trade_id: string;
  symbol: string;
  cost: number;
  payout: number;
  pnl: number;
  won_15m: boolean;
  won_5m: boolean;
  resolved_at: number;
}

export interface DroppedBatchEntry {
  symbol: string;
  cid_15: string;
  cid_5: string;
  trade_count: number;
  cost: number;
  dropped_at: number;
}

export interface UnhedgedLegEntry {
  symbol: string;
  token_id: string;
  order_id: string | null;
  price: number;
  size: number;
  recorded_at: number;
}

export interface SessionStats {
  resolved_trades: number;
  won_both: number;
  won_one: number;
  lost_both: number;
  total_cost: number;
  total_payout: number;
  cumulative_pnl: number;
  dropped_batches: number;
  dropped_trades: number;
  unhedged_legs: number;
  by_symbol: Record<string, number>;
}

export class SessionLedger {
  private cumulativePnl = 0;
  private readonly resolved: ResolvedTradeEntry[] = [];
  private readonly dropped: DroppedBatchEntry[] = [];
  private readonly unhedged: UnhedgedLegEntry[] = [];

  get cumulative(): number {
    return this.cumulativePnl;
  }

  /**
   * Credit one resolved batch. Returns the new cumulative total.
   */
  recordResolvedBatch(
    symbol: string,
    results: Array<{ trade: TradeRecord; pnl: TradePnl }>,
    now: number = Date.now(),
  ): number {
    let batchPnl = 0;
    for (const { trade, pnl } of results) {
      batchPnl += pnl.pnl;
      this.resolved.push({
        trade_id: trade.id,
        symbol,
        cost: pnl.cost,
        payout: pnl.payout,
        pnl: pnl.pnl,
        won_15m: pnl.won_15m,
        won_5m: pnl.won_5m,
        resolved_at: now,
      });
    }
    this.cumulativePnl += batchPnl;
    return this.cumulativePnl;
  }

  /**
   * A batch whose markets never resolved in time. Not credited.
   */
  recordDroppedBatch(symbol: string, trades: TradeRecord[], now: number = Date.now()): void {
    if (trades.length === 0) return;
    this.dropped.push({
      symbol,
      cid_15: trades[0].cid_15,
      cid_5: trades[0].cid_5,
      trade_count: trades.length,
      cost: trades.reduce((sum, t) => sum + (t.leg1.price + t.leg2.price) * t.size, 0),
      dropped_at: now,
    });
  }

  recordUnhedgedLeg(entry: Omit<UnhedgedLegEntry, 'recorded_at'>, now: number = Date.now()): void {
    this.unhedged.push({ ...entry, recorded_at: now });
  }

  getResolvedTrades(): ResolvedTradeEntry[] {
    return [...this.resolved];
  }

  getDroppedBatches(): DroppedBatchEntry[] {
    return [...this.dropped];
  }

  getUnhedgedLegs(): UnhedgedLegEntry[] {
    return [...this.unhedged];
  }

  getStats(): SessionStats {
    const bySymbol: Record<string, number> = {};
    let wonBoth = 0;
    let wonOne = 0;
    let lostBoth = 0;

    for (const entry of this.resolved) {
      bySymbol[entry.symbol] = (bySymbol[entry.symbol] || 0) + entry.pnl;
      const wins = Number(entry.won_15m) + Number(entry.won_5m);
      if (wins === 2) wonBoth++;
      else if (wins === 1) wonOne++;
      else lostBoth++;
    }

    return {
      resolved_trades: this.resolved.length,
      won_both: wonBoth,
      won_one: wonOne,
      lost_both: lostBoth,
      total_cost: this.resolved.reduce((sum, e) => sum + e.cost, 0),
      total_payout: this.resolved.reduce((sum, e) => sum + e.payout, 0),
      cumulative_pnl: this.cumulativePnl,
      dropped_batches: this.dropped.length,
      dropped_trades: this.dropped.reduce((sum, d) => sum + d.trade_count, 0),
      unhedged_legs: this.unhedged.length,
      by_symbol: bySymbol,
    };
  }
}

/**
 * Plain-text session report printed on shutdown
 */
export function formatSessionReport(stats: SessionStats, runtimeMs: number): string {
  const hours = runtimeMs / (1000 * 60 * 60);
  const symbols = Object.entries(stats.by_symbol)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([symbol, pnl]) => `  ${symbol.toUpperCase()}: $${pnl.toFixed(2)}`);

  const lines = [
    '═══════════════════════════════════════════════════════════',
    '         15M / 5M OVERLAP ARBITRAGE REPORT',
    '═══════════════════════════════════════════════════════════',
    '',
    `Runtime: ${hours.toFixed(2)} hours`,
    '',
    '───────────────────────────────────────────────────────────',
    'RESOLVED',
    '───────────────────────────────────────────────────────────',
    `Trades: ${stats.resolved_trades}`,
    `Won both legs: ${stats.won_both}`,
    `Won one leg: ${stats.won_one}`,
    `Lost both legs: ${stats.lost_both}`,
    `Total cost: $${stats.total_cost.toFixed(2)}`,
    `Total payout: $${stats.total_payout.toFixed(2)}`,
    `Cumulative PnL: $${stats.cumulative_pnl.toFixed(2)}`,
    ...symbols,
    '',
    '───────────────────────────────────────────────────────────',
    'UNTRACKED',
    '───────────────────────────────────────────────────────────',
    `Dropped batches: ${stats.dropped_batches} (${stats.dropped_trades} trades)`,
    `Unhedged legs: ${stats.unhedged_legs}`,
    '',
    '═══════════════════════════════════════════════════════════',
  ];

  return lines.join('\n');
}
