/**
 * TWO-LEG EXECUTION
 *
 * Both legs go out at once as GTC BUYs at the selected asks.
 * A failed leg is never unwound: the surviving leg is reported back.
 */

import type { ArbLeg, ArbSelection } from '../types/arbitrage';
import type { OrderGateway, OrderResult } from '../types/venue';
import { FatalError, errorMessage } from '../types/errors';
import { Logger, logger as rootLogger } from '../logger/logger';

export interface PlacedLeg {
  leg: ArbLeg;
  order_id: string | null;
}

export interface FailedLeg {
  leg: ArbLeg;
  error: string;
}

export type LegPlacement =
  | { ok: true; leg1: PlacedLeg; leg2: PlacedLeg }
  | { ok: false; failed: FailedLeg[]; surviving: PlacedLeg | null };

/**
 * Limit prices go out at 4 decimals
 */
export function roundPrice(price: number): number {
  return Math.round(price * 10_000) / 10_000;
}

function settle(leg: ArbLeg, outcome: PromiseSettledResult<OrderResult>): PlacedLeg | FailedLeg {
  if (outcome.status === 'rejected') {
    return { leg, error: errorMessage(outcome.reason) };
  }
  if (!outcome.value.success) {
    return { leg, error: outcome.value.error_message || 'Order rejected' };
  }
  return { leg, order_id: outcome.value.order_id };
}

function isPlaced(result: PlacedLeg | FailedLeg): result is PlacedLeg {
  return 'order_id' in result;
}

/**
 * Place both legs of `selection` for `size` shares each.
 * A FatalError from either order is rethrown once both have settled.
 */
export async function placeArbLegs(
  gateway: OrderGateway,
  selection: ArbSelection,
  size: number,
  log: Logger = rootLogger.child('trader'),
): Promise<LegPlacement> {
  const { leg1, leg2 } = selection;

  const [r1, r2] = await Promise.allSettled([
    gateway.placeOrder(leg1.token_id, 'BUY', size, roundPrice(leg1.price)),
    gateway.placeOrder(leg2.token_id, 'BUY', size, roundPrice(leg2.price)),
  ]);

  for (const r of [r1, r2]) {
    if (r.status === 'rejected' && r.reason instanceof FatalError) {
      throw r.reason;
    }
  }

  const first = settle(leg1, r1);
  const second = settle(leg2, r2);

  if (isPlaced(first) && isPlaced(second)) {
    return { ok: true, leg1: first, leg2: second };
  }

  const failed: FailedLeg[] = [];
  let surviving: PlacedLeg | null = null;
  for (const result of [first, second]) {
    if (isPlaced(result)) {
      surviving = result;
    } else {
      failed.push(result);
      log.warn(`❌ ${result.leg.outcome} leg ${result.leg.token_id.slice(0, 10)}... failed: ${result.error}`);
    }
  }
  return { ok: false, failed, surviving };
}
