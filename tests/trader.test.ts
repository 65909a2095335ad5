import { describe, expect, it } from 'vitest';
import { placeArbLegs, roundPrice } from '../src/execution/trader';
import type { ArbSelection } from '../src/types/arbitrage';
import { FatalError } from '../src/types/errors';
import { FakeOrderGateway, quietLogger } from './helpers/fakes';

const selection: ArbSelection = {
  leg1: { token_id: 'u15', outcome: 'Up', price: 0.451234 },
  leg2: { token_id: 'd5', outcome: 'Down', price: 0.47 },
  combined_cost: 0.921234,
};

describe('roundPrice', () => {
  it('rounds to four decimals', () => {
    expect(roundPrice(0.451234)).toBe(0.4512);
    expect(roundPrice(0.47)).toBe(0.47);
  });
});

describe('placeArbLegs', () => {
  it('places both legs as BUYs', async () => {
    const gateway = new FakeOrderGateway();
    const placement = await placeArbLegs(gateway, selection, 10, quietLogger());

    expect(gateway.placed).toEqual([
      { tokenId: 'u15', side: 'BUY', size: 10, price: 0.4512 },
      { tokenId: 'd5', side: 'BUY', size: 10, price: 0.47 },
    ]);
    expect(placement).toEqual({
      ok: true,
      leg1: { leg: selection.leg1, order_id: 'order-1' },
      leg2: { leg: selection.leg2, order_id: 'order-2' },
    });
  });

  it('reports the surviving leg when the other is rejected', async () => {
    const gateway = new FakeOrderGateway();
    gateway.rejecting.add('d5');
    const placement = await placeArbLegs(gateway, selection, 10, quietLogger());

    expect(placement).toEqual({
      ok: false,
      failed: [{ leg: selection.leg2, error: 'not enough balance' }],
      surviving: { leg: selection.leg1, order_id: 'order-1' },
    });
  });

  it('reports both legs when the gateway throws', async () => {
    const gateway = new FakeOrderGateway();
    gateway.throwing = new Error('socket hang up');
    const placement = await placeArbLegs(gateway, selection, 10, quietLogger());

    expect(placement).toEqual({
      ok: false,
      failed: [
        { leg: selection.leg1, error: 'socket hang up' },
        { leg: selection.leg2, error: 'socket hang up' },
      ],
      surviving: null,
    });
  });

  it('rethrows fatal errors', async () => {
    const gateway = new FakeOrderGateway();
    gateway.throwing = new FatalError('POLYMARKET_PRIVATE_KEY not set');
    await expect(placeArbLegs(gateway, selection, 10, quietLogger())).rejects.toBeInstanceOf(FatalError);
  });
});
