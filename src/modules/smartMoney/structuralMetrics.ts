/**
 * Structural Metrics
 * Range equilibrium, OTE retracement band and structure-invalidation stop.
 */

import type { Bars, Equilibrium, InvalidationStop, OteZone, TradeDirection } from './types.js';
import { findPivots, pivotsOfKind } from './pivots.js';
import { latest, tailStart, windowHigh, windowLow } from './utils.js';

export const OTE_SHALLOW = 0.62;
export const OTE_DEEP = 0.79;

export function computeEquilibrium(bars: Bars, lookback: number = 30): Equilibrium {
  const start = tailStart(bars, lookback);
  const high = windowHigh(bars, start);
  const low = windowLow(bars, start);
  return { high, low, equilibrium: (high + low) / 2 };
}

export interface OteOptions {
  swingHigh?: number;
  swingLow?: number;
  lookback?: number;
}

/**
 * 62%–79% retracement band measured from the swing high toward the low.
 * Null when the swing has no positive range.
 */
export function computeOteZone(bars: Bars, options: OteOptions = {}): OteZone | null {
  const start = tailStart(bars, options.lookback ?? 100);
  const swingHigh = options.swingHigh ?? windowHigh(bars, start);
  const swingLow = options.swingLow ?? windowLow(bars, start);

  if (!Number.isFinite(swingHigh) || !Number.isFinite(swingLow)) return null;
  if (swingHigh <= swingLow) return null;

  const range = swingHigh - swingLow;
  return {
    low: swingHigh - OTE_DEEP * range,
    high: swingHigh - OTE_SHALLOW * range,
  };
}

export interface InvalidationOptions {
  lookback?: number;
  bufferPct?: number;
  pivotWindow?: number;
}

/**
 * Stop placed beyond the structure whose breach invalidates the trade:
 * the latest swing low for a long, the latest swing high for a short.
 * Without enough pivots, the range extremum of the lookback window is used.
 */
export function computeInvalidationStop(
  bars: Bars,
  direction: TradeDirection,
  options: InvalidationOptions = {}
): InvalidationStop | null {
  const lastBar = latest(bars);
  if (!lastBar) return null;

  const bufferPct = options.bufferPct ?? 0.001;
  const start = tailStart(bars, options.lookback ?? 50);
  const segment = bars.slice(start);
  const current = lastBar.close;
  const pivots = findPivots(segment, options.pivotWindow ?? 3)
    .map(p => ({ ...p, index: p.index + start }));

  const distancePct = (sl: number) => (Math.abs(current - sl) / current) * 100;

  if (pivots.length < 2) {
    const buffer = current * bufferPct;
    const sl = direction === 'LONG'
      ? windowLow(bars, start) - buffer
      : windowHigh(bars, start) + buffer;
    return {
      sl_price: sl,
      sl_type: 'range_extremum',
      distance_pct: distancePct(sl),
      invalidation_level: sl,
      pivot_idx: null,
    };
  }

  if (direction === 'LONG') {
    const lows = pivotsOfKind(pivots, 'low');
    const last = latest(lows);
    if (!last) return null;

    const prev = lows.length >= 2 ? lows[lows.length - 2] : null;
    const isHigherLow = prev ? last.price > prev.price : true;
    const sl = last.price - last.price * bufferPct;
    return {
      sl_price: sl,
      sl_type: isHigherLow ? 'structure_hl' : 'swing_low',
      distance_pct: distancePct(sl),
      invalidation_level: last.price,
      pivot_idx: last.index,
    };
  }

  const highs = pivotsOfKind(pivots, 'high');
  const last = latest(highs);
  if (!last) return null;

  const prev = highs.length >= 2 ? highs[highs.length - 2] : null;
  const isLowerHigh = prev ? last.price < prev.price : true;
  const sl = last.price + last.price * bufferPct;
  return {
    sl_price: sl,
    sl_type: isLowerHigh ? 'structure_lh' : 'swing_high',
    distance_pct: distancePct(sl),
    invalidation_level: last.price,
    pivot_idx: last.index,
  };
}
