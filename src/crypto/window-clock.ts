/**
 * Period windows
 *
 * Up/Down markets are aligned to US Eastern wall-clock boundaries
 * (HH:00, HH:05, ... for 5m; HH:00, HH:15, ... for 15m).
 * All timestamps here are Unix seconds.
 */

import type { Granularity } from '../types/arbitrage';
import { MARKET_TIME_ZONE, OVERLAP_START_SECONDS, PERIOD_15M_SECONDS } from '../config/constants';

const formatters: Map<string, Intl.DateTimeFormat> = new Map();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      minute: '2-digit',
      second: '2-digit',
      hour12: false,
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

/**
 * Minute-of-hour and second-of-minute of `timestampSec` in `timeZone`
 */
function zonedMinuteSecond(timestampSec: number, timeZone: string): { minute: number; second: number } {
  const parts = formatterFor(timeZone).formatToParts(new Date(timestampSec * 1000));
  const minute = parseInt(parts.find(p => p.type === 'minute')?.value || '0', 10);
  const second = parseInt(parts.find(p => p.type === 'second')?.value || '0', 10);
  return { minute, second };
}

/**
 * Start of the `granularityMinutes` period containing `timestampSec`,
 * floored on the zone's local minute-of-hour.
 *
 * Offsets of the zone are whole hours, so flooring within the local hour
 * never crosses a DST transition.
 */
export function periodStart(
  timestampSec: number,
  granularityMinutes: number,
  timeZone: string = MARKET_TIME_ZONE,
): number {
  const ts = Math.floor(timestampSec);
  const { minute, second } = zonedMinuteSecond(ts, timeZone);
  return ts - ((minute % granularityMinutes) * 60 + second);
}

export function periodEnd(start: number, granularity: Granularity): number {
  return start + granularity * 60;
}

/**
 * True during the last 5 minutes of the 15m period starting at `period15Start`
 */
export function isOverlap(nowSec: number, period15Start: number): boolean {
  const elapsed = nowSec - period15Start;
  return elapsed >= OVERLAP_START_SECONDS && elapsed < PERIOD_15M_SECONDS;
}

export interface CurrentPeriods {
  period_15: number;
  period_5: number;
}

export function currentPeriods(nowSec: number): CurrentPeriods {
  return {
    period_15: periodStart(nowSec, 15),
    period_5: periodStart(nowSec, 5),
  };
}
