/**
 * Cross-tenor leg selection
 *
 * Buying 15m-Up + 5m-Down (or 15m-Down + 5m-Up) during the overlap pays at
 * least one leg whenever both markets resolve against the same reference.
 */

import type { ArbSelection, OverlapAsks, OverlapTokens } from '../types/arbitrage';

/**
 * Pick the legs to buy, or null if neither pairing is under `threshold`.
 * A pairing with a missing ask is never picked.
 *
 * 15m-Up / 5m-Down is checked first and wins whenever it qualifies, even if
 * 15m-Down / 5m-Up would too.
 */
export function selectArbLegs(
  asks: OverlapAsks,
  tokens: OverlapTokens,
  threshold: number,
): ArbSelection | null {
  const { up_15, down_15, up_5, down_5 } = asks;

  if (up_15 !== undefined && down_5 !== undefined && up_15 + down_5 < threshold) {
    return {
      leg1: { token_id: tokens.up_15, outcome: 'Up', price: up_15 },
      leg2: { token_id: tokens.down_5, outcome: 'Down', price: down_5 },
      combined_cost: up_15 + down_5,
    };
  }

  if (down_15 !== undefined && up_5 !== undefined && down_15 + up_5 < threshold) {
    return {
      leg1: { token_id: tokens.down_15, outcome: 'Down', price: down_15 },
      leg2: { token_id: tokens.up_5, outcome: 'Up', price: up_5 },
      combined_cost: down_15 + up_5,
    };
  }

  return null;
}
