import type { Granularity } from '../types/arbitrage';

/**
 * Market slug for a period, e.g. "btc-updown-15m-1700000000"
 */
export function buildSlug(symbol: string, granularity: Granularity, periodStartSec: number): string {
  return `${symbol.toLowerCase()}-updown-${granularity}m-${periodStartSec}`;
}

// "above $97,500", "above 97500", or any "$97,500.25"
const REFERENCE_PRICE_PATTERN = /(?:above\s+\$?|\$)\s*(\d[\d,]*(?:\.\d+)?)/i;

/**
 * Reference price embedded in a market question, or null
 */
export function parseReferencePriceFromQuestion(question: string): number | null {
  const match = REFERENCE_PRICE_PATTERN.exec(question);
  if (!match) return null;

  const value = parseFloat(match[1].replace(/,/g, ''));
  return Number.isFinite(value) ? value : null;
}
