/**
 * Dual price feed cache
 *
 * One instance per process, handed to every symbol loop and both streams:
 *   - quotes:     token id -> best bid/ask (order-book stream)
 *   - references: (symbol, granularity) -> period start -> reference price (RTDS)
 *
 * Every write is a single synchronous Map mutation, so readers on the event
 * loop never observe a half-applied update. Nothing here awaits.
 */

import type { Granularity, OverlapAsks, OverlapTokens, PriceQuote } from '../types/arbitrage';
import type { BookUpdate, ReferenceTick } from '../types/venue';
import { periodStart } from './window-clock';
import {
  PLACEHOLDER_ASK_MIN,
  PLACEHOLDER_BID_MAX,
  REFERENCE_CAPTURE_WINDOW_SECONDS,
  REFERENCE_RETENTION_SECONDS,
} from '../config/constants';

const GRANULARITIES: Granularity[] = [15, 5];

/**
 * Quotes an empty book shows (bid ~0, ask ~1) carry no information
 */
export function isPlaceholderQuote(bid: number | undefined, ask: number | undefined): boolean {
  if (bid !== undefined && ask !== undefined) {
    return bid < PLACEHOLDER_BID_MAX && ask > PLACEHOLDER_ASK_MIN;
  }
  if (bid !== undefined) return bid < PLACEHOLDER_BID_MAX;
  if (ask !== undefined) return ask > PLACEHOLDER_ASK_MIN;
  return false;
}

export interface CapturedReference {
  symbol: string;
  granularity: Granularity;
  period_start: number;
  value: number;
}

export class PriceFeedCache {
  private readonly quotes: Map<string, PriceQuote> = new Map();
  private readonly references: Map<string, Map<number, number>> = new Map();

  // Quotes

  /**
   * Merge a book update into the token's quote. Placeholder quotes and
   * updates carrying neither side are dropped. Returns whether it was applied.
   */
  applyBookUpdate(update: BookUpdate): boolean {
    const { best_bid: bid, best_ask: ask } = update;
    if (bid === undefined && ask === undefined) return false;
    if (isPlaceholderQuote(bid, ask)) return false;

    const existing = this.quotes.get(update.token_id);
    this.quotes.set(update.token_id, {
      bid: bid ?? existing?.bid,
      ask: ask ?? existing?.ask,
    });
    return true;
  }

  getQuote(tokenId: string): PriceQuote | undefined {
    const quote = this.quotes.get(tokenId);
    return quote ? { ...quote } : undefined;
  }

  getAsk(tokenId: string): number | undefined {
    return this.quotes.get(tokenId)?.ask;
  }

  getOverlapAsks(tokens: OverlapTokens): OverlapAsks {
    return {
      up_15: this.getAsk(tokens.up_15),
      down_15: this.getAsk(tokens.down_15),
      up_5: this.getAsk(tokens.up_5),
      down_5: this.getAsk(tokens.down_5),
    };
  }

  clearQuotes(tokenIds: string[]): void {
    for (const id of tokenIds) {
      this.quotes.delete(id);
    }
  }

  // References

  private referenceKey(symbol: string, granularity: Granularity): string {
    return `${symbol.toLowerCase()}:${granularity}`;
  }

  /**
   * Offer a reference tick for every granularity. A slot is filled only when
   * the tick lands inside the capture window after its period start and the
   * slot is still empty; later ticks never overwrite it.
   */
  recordReference(tick: ReferenceTick): CapturedReference[] {
    const captured: CapturedReference[] = [];
    const ts = Math.floor(tick.timestamp_sec);

    for (const granularity of GRANULARITIES) {
      const start = periodStart(ts, granularity);
      if (ts < start || ts >= start + REFERENCE_CAPTURE_WINDOW_SECONDS) continue;

      const key = this.referenceKey(tick.symbol, granularity);
      let slots = this.references.get(key);
      if (!slots) {
        slots = new Map();
        this.references.set(key, slots);
      }
      if (slots.has(start)) continue;

      slots.set(start, tick.value);
      this.prune(slots, start - REFERENCE_RETENTION_SECONDS);
      captured.push({ symbol: tick.symbol.toLowerCase(), granularity, period_start: start, value: tick.value });
    }

    return captured;
  }

  getReference(symbol: string, granularity: Granularity, periodStartSec: number): number | undefined {
    return this.references.get(this.referenceKey(symbol, granularity))?.get(periodStartSec);
  }

  private prune(slots: Map<number, number>, before: number): void {
    for (const start of slots.keys()) {
      if (start < before) slots.delete(start);
    }
  }
}
