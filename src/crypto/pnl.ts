import type { TradePnl, TradeRecord } from '../types/arbitrage';

/**
 * PnL of a resolved two-leg trade. Each winning leg pays 1 per share.
 */
export function computeTradePnl(trade: TradeRecord, winToken15: string, winToken5: string): TradePnl {
  const cost = (trade.leg1.price + trade.leg2.price) * trade.size;
  const won_15m = trade.leg1.token_id === winToken15;
  const won_5m = trade.leg2.token_id === winToken5;
  const payout = trade.size * (Number(won_15m) + Number(won_5m));
  return {
    cost,
    payout,
    pnl: payout - cost,
    won_15m,
    won_5m,
  };
}
