import { describe, expect, it } from 'vitest';
import {
  ResolutionCoordinator,
  dedupeTargets,
  describeLegs,
  resolvedWinner,
  settleBatch,
} from '../src/execution/resolution';
import type { TradeRecord } from '../src/types/arbitrage';
import {
  FakeClock,
  FakeSettlement,
  FakeVenue,
  market,
  quietLogger,
  testStrategy,
} from './helpers/fakes';

function trade(id: string): TradeRecord {
  return {
    id,
    symbol: 'btc',
    period_15: 0,
    period_5: 600,
    cid_15: 'c15',
    cid_5: 'c5',
    leg1: { token_id: 'u15', outcome: 'Up', price: 0.45, condition_id: 'c15', order_id: null },
    leg2: { token_id: 'd5', outcome: 'Down', price: 0.47, condition_id: 'c5', order_id: null },
    size: 10,
    simulated: false,
    placed_at: 0,
  };
}

function venueWithMarkets(): FakeVenue {
  const venue = new FakeVenue();
  venue.addMarket('m15', market({
    condition_id: 'c15',
    tokens: [
      { token_id: 'u15', outcome: 'Up', winner: false },
      { token_id: 'd15', outcome: 'Down', winner: false },
    ],
  }));
  venue.addMarket('m5', market({
    condition_id: 'c5',
    tokens: [
      { token_id: 'u5', outcome: 'Up', winner: false },
      { token_id: 'd5', outcome: 'Down', winner: false },
    ],
  }));
  return venue;
}

describe('resolvedWinner', () => {
  const tokens = [
    { token_id: 'u', outcome: 'Up', winner: true },
    { token_id: 'd', outcome: 'Down', winner: false },
  ];

  it('needs a closed market', () => {
    expect(resolvedWinner(market({ condition_id: 'c', tokens }))).toBeNull();
  });

  it('returns the single winner', () => {
    expect(resolvedWinner(market({ condition_id: 'c', closed: true, tokens }))?.token_id).toBe('u');
  });

  it('rejects zero or two winners', () => {
    const none = tokens.map(t => ({ ...t, winner: false }));
    const both = tokens.map(t => ({ ...t, winner: true }));
    expect(resolvedWinner(market({ condition_id: 'c', closed: true, tokens: none }))).toBeNull();
    expect(resolvedWinner(market({ condition_id: 'c', closed: true, tokens: both }))).toBeNull();
  });
});

describe('settleBatch', () => {
  it('prices every trade and lists the winning legs', () => {
    const batch = settleBatch([trade('a'), trade('b')], 'u15', 'd5');

    expect(batch.batch_pnl).toBeCloseTo(21.6, 10);
    expect(batch.targets).toEqual([
      { condition_id: 'c15', outcome: 'Up' },
      { condition_id: 'c5', outcome: 'Down' },
      { condition_id: 'c15', outcome: 'Up' },
      { condition_id: 'c5', outcome: 'Down' },
    ]);
    expect(dedupeTargets(batch.targets)).toEqual([
      { condition_id: 'c15', outcome: 'Up' },
      { condition_id: 'c5', outcome: 'Down' },
    ]);
  });

  it('lists nothing when both legs lose', () => {
    const batch = settleBatch([trade('a')], 'd15', 'u5');
    expect(batch.targets).toEqual([]);
    expect(batch.batch_pnl).toBeCloseTo(-9.2, 10);
    expect(describeLegs(batch.results[0].pnl)).toBe('Lost both legs');
  });
});

describe('ResolutionCoordinator.awaitResolution', () => {
  it('waits the settle delay, then polls until both markets resolve', async () => {
    const clock = new FakeClock(0);
    const venue = venueWithMarkets();
    const coordinator = new ResolutionCoordinator({
      venue,
      settlement: new FakeSettlement(),
      clock,
      strategy: testStrategy(),
      hasProxyWallet: true,
      log: quietLogger(),
    });
    clock.at(90_000, () => {
      venue.resolve('c15', 'u15');
      venue.resolve('c5', 'd5');
    });

    const winners = await coordinator.awaitResolution('c15', 'c5', 1);

    expect(winners?.winner_15.token_id).toBe('u15');
    expect(winners?.winner_5.token_id).toBe('d5');
    expect(clock.now()).toBe(90_000);
  });

  it('gives up after the max wait', async () => {
    const clock = new FakeClock(0);
    const coordinator = new ResolutionCoordinator({
      venue: venueWithMarkets(),
      settlement: new FakeSettlement(),
      clock,
      strategy: testStrategy(),
      hasProxyWallet: true,
      log: quietLogger(),
    });

    expect(await coordinator.awaitResolution('c15', 'c5', 1)).toBeNull();
    expect(clock.now()).toBe(660_000);
  });

  it('keeps polling through venue errors', async () => {
    const clock = new FakeClock(0);
    const venue = new FakeVenue();
    const coordinator = new ResolutionCoordinator({
      venue,
      settlement: new FakeSettlement(),
      clock,
      strategy: testStrategy(),
      hasProxyWallet: true,
      log: quietLogger(),
    });
    clock.at(120_000, () => {
      const resolved = venueWithMarkets();
      resolved.resolve('c15', 'd15');
      resolved.resolve('c5', 'd5');
      for (const [cid, m] of resolved.byConditionId) venue.byConditionId.set(cid, m);
    });

    const winners = await coordinator.awaitResolution('c15', 'c5', 1);
    expect(winners?.winner_15.outcome).toBe('Down');
  });
});

describe('ResolutionCoordinator.redeem', () => {
  function coordinator(settlement: FakeSettlement, overrides: { simulationMode?: boolean; autoRedeem?: boolean; hasProxyWallet?: boolean } = {}) {
    return new ResolutionCoordinator({
      venue: new FakeVenue(),
      settlement,
      clock: new FakeClock(0),
      strategy: testStrategy({ simulationMode: overrides.simulationMode ?? false, autoRedeem: overrides.autoRedeem ?? true }),
      hasProxyWallet: overrides.hasProxyWallet ?? true,
      log: quietLogger(),
    });
  }

  const targets = [
    { condition_id: 'c15', outcome: 'Up' },
    { condition_id: 'c5', outcome: 'Down' },
    { condition_id: 'c15', outcome: 'Up' },
  ];

  it('submits each unique target once', async () => {
    const settlement = new FakeSettlement();
    const report = await coordinator(settlement).redeem(targets);

    expect(settlement.calls).toEqual([
      { conditionId: 'c15', outcome: 'Up' },
      { conditionId: 'c5', outcome: 'Down' },
    ]);
    expect(report).toEqual({ submitted: 2, succeeded: 2, failed: 0, skipped: false });
  });

  it('continues past a failed redemption', async () => {
    const settlement = new FakeSettlement();
    settlement.failing.add('c15');
    const report = await coordinator(settlement).redeem(targets);

    expect(settlement.calls).toHaveLength(2);
    expect(report).toEqual({ submitted: 2, succeeded: 1, failed: 1, skipped: false });
  });

  it.each([
    ['simulation mode', { simulationMode: true }],
    ['auto-redeem off', { autoRedeem: false }],
    ['no proxy wallet', { hasProxyWallet: false }],
  ])('skips in %s', async (_name, overrides) => {
    const settlement = new FakeSettlement();
    const report = await coordinator(settlement, overrides).redeem(targets);

    expect(settlement.calls).toEqual([]);
    expect(report.skipped).toBe(true);
  });
});
