import { describe, expect, it } from 'vitest';
import { buildSlug, parseReferencePriceFromQuestion } from '../src/crypto/slug';

describe('buildSlug', () => {
  it('lowercases the symbol', () => {
    expect(buildSlug('BTC', 15, 1700000000)).toBe('btc-updown-15m-1700000000');
    expect(buildSlug('eth', 5, 1700000300)).toBe('eth-updown-5m-1700000300');
  });
});

describe('parseReferencePriceFromQuestion', () => {
  it('reads a dollar amount with thousands separators', () => {
    expect(parseReferencePriceFromQuestion('Will Bitcoin be above $97,500 at 10:15 ET?')).toBe(97500);
  });

  it('keeps decimals', () => {
    expect(parseReferencePriceFromQuestion('Will XRP be above $2.1834 at 3PM ET?')).toBe(2.1834);
  });

  it('accepts "above" without a currency sign', () => {
    expect(parseReferencePriceFromQuestion('Will ETH be above 3,120.5?')).toBe(3120.5);
  });

  it('returns null without a price', () => {
    expect(parseReferencePriceFromQuestion('Bitcoin Up or Down - November 14, 5:00PM-5:15PM ET')).toBeNull();
  });
});
