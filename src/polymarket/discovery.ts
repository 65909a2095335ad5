/**
 * Market discovery for the 15m / 5m Up/Down series
 */

import type { DiscoveredMarket, Granularity, Market, OutcomeTokenPair } from '../types/arbitrage';
import type { VenueQuery } from '../types/venue';
import { buildSlug, parseReferencePriceFromQuestion } from '../crypto/slug';
import { errorMessage } from '../types/errors';
import { Logger, logger as rootLogger } from '../logger/logger';

export function classifyOutcome(label: string): 'Up' | 'Down' | null {
  const outcome = label.trim().toUpperCase();
  if (outcome.includes('UP') || outcome === '1') return 'Up';
  if (outcome.includes('DOWN') || outcome === '0') return 'Down';
  return null;
}

export class MarketDiscovery {
  constructor(
    private readonly venue: VenueQuery,
    private readonly log: Logger = rootLogger.child('discovery'),
  ) {}

  /**
   * The market for (symbol, granularity, period), or null when it is missing,
   * inactive or closed. A failed venue query also counts as "not yet".
   */
  async findMarket(symbol: string, granularity: Granularity, periodStart: number): Promise<DiscoveredMarket | null> {
    const slug = buildSlug(symbol, granularity, periodStart);

    let market: Market | null;
    try {
      market = await this.venue.getMarketBySlug(slug);
    } catch (error) {
      this.log.debug(`Lookup failed for ${slug}`, { error: errorMessage(error) });
      return null;
    }

    if (!market || !market.active || market.closed) {
      return null;
    }

    return {
      symbol,
      granularity,
      period_start: periodStart,
      condition_id: market.condition_id,
      question: market.question,
      reference_price: parseReferencePriceFromQuestion(market.question),
    };
  }

  /**
   * Up and Down token ids of a market. Throws if either side cannot be classified.
   */
  async getOutcomeTokens(conditionId: string): Promise<OutcomeTokenPair> {
    const market = await this.venue.getMarketByConditionId(conditionId);

    let up: string | null = null;
    let down: string | null = null;
    for (const token of market.tokens) {
      const side = classifyOutcome(token.outcome);
      if (side === 'Up') up = token.token_id;
      else if (side === 'Down') down = token.token_id;
    }

    if (!up) throw new Error(`Up token not found for ${conditionId}`);
    if (!down) throw new Error(`Down token not found for ${conditionId}`);
    return { up_token_id: up, down_token_id: down };
  }
}
