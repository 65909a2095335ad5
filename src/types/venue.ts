/**
 * Contracts for the external collaborators the strategy talks to.
 * Production implementations live in polymarket/ and execution/*-ws.ts.
 */

import type { Market, PriceQuote } from './arbitrage';

export interface VenueQuery {
  /** null when the venue has no market under this slug */
  getMarketBySlug(slug: string): Promise<Market | null>;
  getMarketByConditionId(conditionId: string): Promise<Market>;
  getOrderBookBestPrices(tokenId: string): Promise<PriceQuote>;
}

export type OrderSide = 'BUY' | 'SELL';

export interface OrderResult {
  order_id: string | null;
  success: boolean;
  error_message?: string;
}

export interface OrderGateway {
  placeOrder(tokenId: string, side: OrderSide, size: number, price: number): Promise<OrderResult>;
}

export interface RedeemResult {
  success: boolean;
  tx_hash?: string;
  message?: string;
}

/**
 * Redemption must be safe to call repeatedly with the same arguments.
 */
export interface SettlementGateway {
  redeem(conditionId: string, outcome: string): Promise<RedeemResult>;
}

export interface BookUpdate {
  token_id: string;
  best_bid?: number;
  best_ask?: number;
}

export interface StreamSubscription {
  close(): void;
}

export interface OrderBookStream {
  subscribe(tokenIds: string[], onUpdate: (update: BookUpdate) => void): StreamSubscription;
}

export interface ReferenceTick {
  symbol: string;
  timestamp_sec: number;
  value: number;
}

export interface ReferencePriceStream {
  start(onTick: (tick: ReferenceTick) => void): void;
  stop(): void;
}

/**
 * Wall clock and timed waits, injectable so tests can move time by hand
 */
export interface Clock {
  /** Unix milliseconds */
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms: number) => new Promise(r => setTimeout(r, ms)),
};
