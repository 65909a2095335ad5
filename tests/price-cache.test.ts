import { describe, expect, it } from 'vitest';
import { PriceFeedCache, isPlaceholderQuote } from '../src/crypto/price-cache';

// 2023-11-14 17:00:00 ET
const P = 1699999200;

describe('isPlaceholderQuote', () => {
  it('flags an empty-book quote', () => {
    expect(isPlaceholderQuote(0.02, 0.99)).toBe(true);
  });

  it('accepts a real quote with a low bid', () => {
    expect(isPlaceholderQuote(0.02, 0.4)).toBe(false);
  });

  it('checks a lone side against its own threshold', () => {
    expect(isPlaceholderQuote(0.02, undefined)).toBe(true);
    expect(isPlaceholderQuote(undefined, 0.97)).toBe(true);
    expect(isPlaceholderQuote(undefined, 0.5)).toBe(false);
    expect(isPlaceholderQuote(undefined, undefined)).toBe(false);
  });
});

describe('PriceFeedCache quotes', () => {
  it('merges sides independently', () => {
    const cache = new PriceFeedCache();
    expect(cache.applyBookUpdate({ token_id: 't1', best_bid: 0.4, best_ask: 0.6 })).toBe(true);
    expect(cache.applyBookUpdate({ token_id: 't1', best_ask: 0.55 })).toBe(true);
    expect(cache.getQuote('t1')).toEqual({ bid: 0.4, ask: 0.55 });
  });

  it('drops placeholder and empty updates', () => {
    const cache = new PriceFeedCache();
    expect(cache.applyBookUpdate({ token_id: 't1', best_bid: 0.02, best_ask: 0.99 })).toBe(false);
    expect(cache.applyBookUpdate({ token_id: 't1' })).toBe(false);
    expect(cache.getQuote('t1')).toBeUndefined();
  });

  it('keeps the previous quote when a placeholder arrives', () => {
    const cache = new PriceFeedCache();
    cache.applyBookUpdate({ token_id: 't1', best_bid: 0.45, best_ask: 0.5 });
    cache.applyBookUpdate({ token_id: 't1', best_ask: 0.98 });
    expect(cache.getAsk('t1')).toBe(0.5);
  });

  it('reads the four overlap asks and clears them', () => {
    const cache = new PriceFeedCache();
    cache.applyBookUpdate({ token_id: 'u15', best_ask: 0.45 });
    cache.applyBookUpdate({ token_id: 'd5', best_ask: 0.47 });
    const tokens = { up_15: 'u15', down_15: 'd15', up_5: 'u5', down_5: 'd5' };

    expect(cache.getOverlapAsks(tokens)).toEqual({ up_15: 0.45, down_15: undefined, up_5: undefined, down_5: 0.47 });

    cache.clearQuotes(['u15', 'd5']);
    expect(cache.getOverlapAsks(tokens)).toEqual({});
  });
});

describe('PriceFeedCache references', () => {
  it('captures a tick inside the window for both granularities', () => {
    const cache = new PriceFeedCache();
    const captured = cache.recordReference({ symbol: 'btc', timestamp_sec: P + 1, value: 97000 });

    expect(captured).toEqual([
      { symbol: 'btc', granularity: 15, period_start: P, value: 97000 },
      { symbol: 'btc', granularity: 5, period_start: P, value: 97000 },
    ]);
    expect(cache.getReference('btc', 15, P)).toBe(97000);
    expect(cache.getReference('btc', 5, P)).toBe(97000);
  });

  it('keeps the first value', () => {
    const cache = new PriceFeedCache();
    cache.recordReference({ symbol: 'btc', timestamp_sec: P, value: 97000 });
    expect(cache.recordReference({ symbol: 'btc', timestamp_sec: P + 1, value: 98000 })).toEqual([]);
    expect(cache.getReference('btc', 15, P)).toBe(97000);
  });

  it('ignores ticks at or after the end of the window', () => {
    const cache = new PriceFeedCache();
    expect(cache.recordReference({ symbol: 'btc', timestamp_sec: P + 2, value: 97000 })).toEqual([]);
    expect(cache.getReference('btc', 15, P)).toBeUndefined();
  });

  it('captures a 5m start that is not a 15m start', () => {
    const cache = new PriceFeedCache();
    const captured = cache.recordReference({ symbol: 'BTC', timestamp_sec: P + 301, value: 97010 });
    expect(captured).toEqual([{ symbol: 'btc', granularity: 5, period_start: P + 300, value: 97010 }]);
    expect(cache.getReference('btc', 15, P)).toBeUndefined();
  });

  it('keeps symbols apart', () => {
    const cache = new PriceFeedCache();
    cache.recordReference({ symbol: 'eth', timestamp_sec: P, value: 3100 });
    expect(cache.getReference('btc', 15, P)).toBeUndefined();
    expect(cache.getReference('eth', 15, P)).toBe(3100);
  });
});
