import { describe, expect, it } from 'vitest';
import { MarketDiscovery, classifyOutcome } from '../src/polymarket/discovery';
import type { Market } from '../src/types/arbitrage';
import { FakeVenue, market, quietLogger } from './helpers/fakes';

// 2023-11-14 17:00:00 ET
const P = 1699999200;

class FailingVenue extends FakeVenue {
  async getMarketBySlug(slug: string): Promise<Market | null> {
    this.slugLookups.push(slug);
    throw new Error('gamma unavailable');
  }
}

describe('classifyOutcome', () => {
  it('reads Up/Down labels in any case', () => {
    expect(classifyOutcome('Up')).toBe('Up');
    expect(classifyOutcome(' down ')).toBe('Down');
  });

  it('reads numeric labels', () => {
    expect(classifyOutcome('1')).toBe('Up');
    expect(classifyOutcome('0')).toBe('Down');
  });

  it('rejects anything else', () => {
    expect(classifyOutcome('Yes')).toBeNull();
  });
});

describe('MarketDiscovery.findMarket', () => {
  it('looks the market up by slug', async () => {
    const venue = new FakeVenue();
    venue.addMarket(`btc-updown-15m-${P}`, market({
      condition_id: 'c15',
      question: 'Bitcoin Up or Down - above $97,000.50?',
    }));
    const discovery = new MarketDiscovery(venue, quietLogger());

    const found = await discovery.findMarket('BTC', 15, P);

    expect(venue.slugLookups).toEqual([`btc-updown-15m-${P}`]);
    expect(found).toEqual({
      symbol: 'BTC',
      granularity: 15,
      period_start: P,
      condition_id: 'c15',
      question: 'Bitcoin Up or Down - above $97,000.50?',
      reference_price: 97000.5,
    });
  });

  it('returns null for a missing market', async () => {
    const discovery = new MarketDiscovery(new FakeVenue(), quietLogger());
    expect(await discovery.findMarket('eth', 5, P)).toBeNull();
  });

  it('returns null for inactive or closed markets', async () => {
    const venue = new FakeVenue();
    venue.addMarket(`eth-updown-5m-${P}`, market({ condition_id: 'a', active: false }));
    venue.addMarket(`eth-updown-15m-${P}`, market({ condition_id: 'b', closed: true }));
    const discovery = new MarketDiscovery(venue, quietLogger());

    expect(await discovery.findMarket('eth', 5, P)).toBeNull();
    expect(await discovery.findMarket('eth', 15, P)).toBeNull();
  });

  it('treats a failed lookup as not found', async () => {
    const discovery = new MarketDiscovery(new FailingVenue(), quietLogger());
    expect(await discovery.findMarket('btc', 15, P)).toBeNull();
  });
});

describe('MarketDiscovery.getOutcomeTokens', () => {
  it('pairs the Up and Down tokens whatever their order', async () => {
    const venue = new FakeVenue();
    venue.addMarket('s', market({
      condition_id: 'c5',
      tokens: [
        { token_id: 'd5', outcome: 'Down', winner: false },
        { token_id: 'u5', outcome: 'Up', winner: false },
      ],
    }));
    const discovery = new MarketDiscovery(venue, quietLogger());

    expect(await discovery.getOutcomeTokens('c5')).toEqual({ up_token_id: 'u5', down_token_id: 'd5' });
  });

  it('throws when a side cannot be classified', async () => {
    const venue = new FakeVenue();
    venue.addMarket('s', market({
      condition_id: 'cx',
      tokens: [
        { token_id: 'y', outcome: 'Yes', winner: false },
        { token_id: 'n', outcome: 'Down', winner: false },
      ],
    }));
    const discovery = new MarketDiscovery(venue, quietLogger());

    await expect(discovery.getOutcomeTokens('cx')).rejects.toThrow('Up token not found for cx');
  });
});
