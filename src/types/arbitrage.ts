/**
 * Types for 15m vs 5m Up/Down Overlap Arbitrage
 */

export type Granularity = 5 | 15;

export type OutcomeLabel = 'Up' | 'Down';

/**
 * One resolution side of a market
 */
export interface OutcomeToken {
  token_id: string;
  outcome: string;
  winner: boolean;
}

/**
 * A venue market as read from the venue. Never cached locally:
 * active/closed/winner flip on the venue side.
 */
export interface Market {
  condition_id: string;
  question: string;
  slug: string;
  active: boolean;
  closed: boolean;
  tokens: OutcomeToken[];
  end_date_iso?: string;
}

/**
 * Result of a successful discovery lookup for one (symbol, granularity, period)
 */
export interface DiscoveredMarket {
  symbol: string;
  granularity: Granularity;
  period_start: number;
  condition_id: string;
  question: string;

  // Parsed from the question text, when present
  reference_price: number | null;
}

export interface OutcomeTokenPair {
  up_token_id: string;
  down_token_id: string;
}

/**
 * Best bid/ask for one outcome token, probabilities in [0,1]
 */
export interface PriceQuote {
  bid?: number;
  ask?: number;
}

/**
 * Best asks of the four tokens involved in one overlap
 */
export interface OverlapAsks {
  up_15?: number;
  down_15?: number;
  up_5?: number;
  down_5?: number;
}

export interface OverlapTokens {
  up_15: string;
  down_15: string;
  up_5: string;
  down_5: string;
}

export interface ArbLeg {
  token_id: string;
  outcome: OutcomeLabel;
  price: number;
}

/**
 * Two legs drawn from opposite sides of the 15m and 5m markets.
 * leg1 is always the 15m leg, leg2 the 5m leg.
 */
export interface ArbSelection {
  leg1: ArbLeg;
  leg2: ArbLeg;
  combined_cost: number;
}

export interface TradeLeg extends ArbLeg {
  condition_id: string;
  order_id: string | null;
}

/**
 * An executed (or simulated) two-leg trade
 */
export interface TradeRecord {
  id: string;
  symbol: string;

  // Periods and markets of the overlap
  period_15: number;
  period_5: number;
  cid_15: string;
  cid_5: string;

  leg1: TradeLeg;
  leg2: TradeLeg;
  size: number;

  simulated: boolean;
  placed_at: number; // Unix ms
}

export interface RedemptionTarget {
  condition_id: string;
  outcome: string;
}

export interface TradePnl {
  cost: number;
  payout: number;
  pnl: number;
  won_15m: boolean;
  won_5m: boolean;
}
