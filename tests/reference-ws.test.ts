import { describe, expect, it } from 'vitest';
import { parseChainlinkMessage, symbolKey } from '../src/execution/reference-ws';
import { PriceFeedCache } from '../src/crypto/price-cache';

const symbols = new Set(['btc', 'eth']);

function frame(payload: Record<string, unknown>, topic = 'crypto_prices_chainlink'): string {
  return JSON.stringify({ topic, type: 'update', timestamp: 1700000001500, payload });
}

describe('symbolKey', () => {
  it('keeps the base of a pair', () => {
    expect(symbolKey('BTC/USD')).toBe('btc');
    expect(symbolKey('eth')).toBe('eth');
  });
});

describe('parseChainlinkMessage', () => {
  it('normalizes millisecond timestamps', () => {
    const tick = parseChainlinkMessage(frame({ symbol: 'btc/usd', timestamp: 1700000001000, value: 97000.5 }), symbols);
    expect(tick).toEqual({ symbol: 'btc', timestamp_sec: 1700000001, value: 97000.5 });
  });

  it('accepts numeric strings', () => {
    const tick = parseChainlinkMessage(frame({ symbol: 'eth/usd', timestamp: '1700000001', value: '3120.25' }), symbols);
    expect(tick).toEqual({ symbol: 'eth', timestamp_sec: 1700000001, value: 3120.25 });
  });

  it('ignores symbols that are not configured', () => {
    expect(parseChainlinkMessage(frame({ symbol: 'doge/usd', timestamp: 1700000001000, value: 0.08 }), symbols)).toBeNull();
  });

  it('ignores other topics', () => {
    const raw = frame({ symbol: 'btcusdt', timestamp: 1700000001000, value: 97000 }, 'crypto_prices');
    expect(parseChainlinkMessage(raw, symbols)).toBeNull();
  });

  it('ignores payloads without a usable value', () => {
    expect(parseChainlinkMessage(frame({ symbol: 'btc/usd', timestamp: 1700000001000, value: 'n/a' }), symbols)).toBeNull();
  });

  it('throws on invalid JSON', () => {
    expect(() => parseChainlinkMessage('not json', symbols)).toThrow();
  });

  it('captures a tick one second after the period start but not two', () => {
    // 2023-11-14 17:00:00 ET
    const start = 1699999200;
    const cache = new PriceFeedCache();

    const late = parseChainlinkMessage(frame({ symbol: 'btc/usd', timestamp: (start + 2) * 1000, value: 97100 }), symbols);
    const early = parseChainlinkMessage(frame({ symbol: 'btc/usd', timestamp: (start + 1) * 1000, value: 97000 }), symbols);
    if (!late || !early) throw new Error('expected ticks');

    cache.recordReference(late);
    expect(cache.getReference('btc', 15, start)).toBeUndefined();
    cache.recordReference(early);
    expect(cache.getReference('btc', 15, start)).toBe(97000);
  });
});
