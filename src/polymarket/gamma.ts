/**
 * Venue reads: Gamma API (slug lookup) + CLOB (market by condition id, order book)
 */

import type { ClobClient } from '@polymarket/clob-client';
import type { Market, OutcomeToken, PriceQuote } from '../types/arbitrage';
import type { VenueQuery } from '../types/venue';
import { VenueError, errorMessage } from '../types/errors';
import { GAMMA_TIMEOUT_MS } from '../config/constants';

type Json = Record<string, unknown>;

function isJson(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function str(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return '';
}

/**
 * Gamma encodes some arrays as JSON strings ('["Up","Down"]')
 */
function stringList(value: unknown): string[] {
  let list: unknown = value;
  if (typeof value === 'string') {
    try {
      list = JSON.parse(value);
    } catch {
      return [];
    }
  }
  return Array.isArray(list) ? list.map(str) : [];
}

/**
 * First market of a Gamma event payload
 */
export function parseGammaEventMarket(payload: unknown): Market | null {
  if (!isJson(payload) || !Array.isArray(payload.markets) || payload.markets.length === 0) {
    return null;
  }
  const markets: unknown[] = payload.markets;
  const m = markets[0];
  if (!isJson(m) || !str(m.conditionId)) return null;

  const outcomes = stringList(m.outcomes);
  const tokenIds = stringList(m.clobTokenIds);
  const tokens: OutcomeToken[] = tokenIds.map((token_id, i) => ({
    token_id,
    outcome: outcomes[i] ?? '',
    winner: false,
  }));

  return {
    condition_id: str(m.conditionId),
    question: str(m.question),
    slug: str(m.slug),
    active: m.active === true,
    closed: m.closed === true,
    tokens,
    end_date_iso: str(m.endDate) || undefined,
  };
}

export function parseClobMarket(payload: unknown): Market {
  if (!isJson(payload) || !str(payload.condition_id)) {
    throw new Error('Invalid CLOB market response');
  }
  const rawTokens: unknown[] = Array.isArray(payload.tokens) ? payload.tokens : [];
  const tokens: OutcomeToken[] = rawTokens.filter(isJson).map(t => ({
    token_id: str(t.token_id),
    outcome: str(t.outcome),
    winner: t.winner === true,
  }));

  return {
    condition_id: str(payload.condition_id),
    question: str(payload.question),
    slug: str(payload.market_slug),
    active: payload.active === true,
    closed: payload.closed === true,
    tokens,
    end_date_iso: str(payload.end_date_iso) || undefined,
  };
}

interface BookLevel {
  price: string;
  size: string;
}

/**
 * Highest bid and lowest ask, whatever order the levels arrive in
 */
export function bestPrices(bids: BookLevel[], asks: BookLevel[]): PriceQuote {
  const bidPrices = bids.map(l => parseFloat(l.price)).filter(Number.isFinite);
  const askPrices = asks.map(l => parseFloat(l.price)).filter(Number.isFinite);
  return {
    bid: bidPrices.length > 0 ? Math.max(...bidPrices) : undefined,
    ask: askPrices.length > 0 ? Math.min(...askPrices) : undefined,
  };
}

export interface PolymarketVenueOptions {
  gammaApiUrl: string;
  clob: ClobClient;
  timeoutMs?: number;
}

export class PolymarketVenueClient implements VenueQuery {
  private readonly gammaUrl: string;
  private readonly clob: ClobClient;
  private readonly timeoutMs: number;

  constructor(options: PolymarketVenueOptions) {
    this.gammaUrl = options.gammaApiUrl.replace(/\/$/, '');
    this.clob = options.clob;
    this.timeoutMs = options.timeoutMs ?? GAMMA_TIMEOUT_MS;
  }

  async getMarketBySlug(slug: string): Promise<Market | null> {
    const url = `${this.gammaUrl}/events/slug/${slug}`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(url, {
        signal: controller.signal,
        headers: { Accept: 'application/json' },
      });
      if (response.status === 404) return null;
      if (!response.ok) {
        throw new VenueError(`Failed to fetch market by slug ${slug}`, url, response.status);
      }
      return parseGammaEventMarket(await response.json());
    } catch (error) {
      if (error instanceof VenueError) throw error;
      throw new VenueError(`Failed to fetch market by slug ${slug}: ${errorMessage(error)}`, url);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  async getMarketByConditionId(conditionId: string): Promise<Market> {
    let payload: unknown;
    try {
      payload = await this.clob.getMarket(conditionId);
    } catch (error) {
      throw new VenueError(`Failed to fetch market ${conditionId}: ${errorMessage(error)}`, `/markets/${conditionId}`);
    }
    return parseClobMarket(payload);
  }

  async getOrderBookBestPrices(tokenId: string): Promise<PriceQuote> {
    try {
      const book = await this.clob.getOrderBook(tokenId);
      return bestPrices(book.bids ?? [], book.asks ?? []);
    } catch (error) {
      throw new VenueError(`Failed to fetch order book ${tokenId}: ${errorMessage(error)}`, '/book');
    }
  }
}
