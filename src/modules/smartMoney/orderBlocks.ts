/**
 * Order Block Detection Module
 * Identifies institutional order blocks based on ICT methodology
 *
 * Order Block: the last opposing candle before price presses into the
 * extreme of the window. Its body is the zone where a retrace is expected.
 * Breaker Block: an order block whose zone price has closed through, so the
 * zone now acts with its role reversed.
 * Mitigation Block: an order block that was retested and held, with price
 * back at the zone now.
 */

import type {
  Bars,
  BreakerBlockEvent,
  MitigationBlockEvent,
  OrderBlockEvent,
  Pivot,
  PriceBar,
} from './types.js';
import { findPivots } from './pivots.js';
import { bodyHigh, bodyLow, isBearishCandle, isBullishCandle, latest, tailStart, windowHigh, windowLow } from './utils.js';

export interface OrderBlockOptions {
  lookback?: number;
  pivots?: readonly Pivot[];
}

export interface BreakerBlockOptions {
  pivots?: readonly Pivot[];
  tolerance?: number;
}

export interface MitigationOptions {
  lookback?: number;
  pivots?: readonly Pivot[];
  minAgeBars?: number;
  proximityPct?: number;
}

const DEFAULT_OB_LOOKBACK = 30;
const EXTREME_PROXIMITY = 0.001;  // 0.1% of the window high/low

function toOrderBlock(bar: PriceBar, index: number, direction: 'LONG' | 'SHORT'): OrderBlockEvent {
  return {
    pattern: 'ORDER_BLOCK',
    direction,
    level: bar.open,
    start_idx: index,
    end_idx: null,
    meta: {
      zone_low: bodyLow(bar),
      zone_high: bodyHigh(bar),
    },
  };
}

function findLastCandle(
  bars: Bars,
  start: number,
  predicate: (bar: PriceBar) => boolean
): number | null {
  for (let i = bars.length - 1; i >= start; i--) {
    if (predicate(bars[i])) return i;
  }
  return null;
}

export function detectOrderBlocks(bars: Bars, options: OrderBlockOptions = {}): OrderBlockEvent[] {
  const pivots = options.pivots ?? findPivots(bars);
  const start = tailStart(bars, options.lookback ?? DEFAULT_OB_LOOKBACK);
  const events: OrderBlockEvent[] = [];
  const lastBar = latest(bars);

  if (pivots.length === 0 || !lastBar || bars.length - start < 3) return events;

  const close = lastBar.close;
  const high = windowHigh(bars, start);
  const low = windowLow(bars, start);

  // Bullish: last bearish candle before price presses the window high
  if (close > high * (1 - EXTREME_PROXIMITY)) {
    const idx = findLastCandle(bars, start, isBearishCandle);
    if (idx !== null) events.push(toOrderBlock(bars[idx], idx, 'LONG'));
  }

  // Bearish: last bullish candle before price presses the window low
  if (close < low * (1 + EXTREME_PROXIMITY)) {
    const idx = findLastCandle(bars, start, isBullishCandle);
    if (idx !== null) events.push(toOrderBlock(bars[idx], idx, 'SHORT'));
  }

  return events;
}

export function detectBreakerBlocks(bars: Bars, options: BreakerBlockOptions = {}): BreakerBlockEvent[] {
  const pivots = options.pivots ?? findPivots(bars);
  const tolerance = options.tolerance ?? 1e-4;
  const lastBar = latest(bars);

  if (pivots.length < 3 || !lastBar) return [];

  const orderBlocks = detectOrderBlocks(bars, { pivots });
  const close = lastBar.close;
  const events: BreakerBlockEvent[] = [];

  for (const ob of orderBlocks) {
    const { zone_low, zone_high } = ob.meta;

    if (ob.direction === 'LONG' && close > zone_high + tolerance) {
      events.push({
        pattern: 'BREAKER_BLOCK',
        direction: 'LONG',
        level: zone_high,
        start_idx: ob.start_idx,
        end_idx: null,
        meta: { zone_low, zone_high, origin_idx: ob.start_idx },
      });
    } else if (ob.direction === 'SHORT' && close < zone_low - tolerance) {
      events.push({
        pattern: 'BREAKER_BLOCK',
        direction: 'SHORT',
        level: zone_low,
        start_idx: ob.start_idx,
        end_idx: null,
        meta: { zone_low, zone_high, origin_idx: ob.start_idx },
      });
    }
  }

  return events;
}

export function detectMitigationBlocks(bars: Bars, options: MitigationOptions = {}): MitigationBlockEvent[] {
  const minAge = options.minAgeBars ?? 3;
  const p = options.proximityPct ?? 0.01;
  const lastBar = latest(bars);
  const events: MitigationBlockEvent[] = [];

  if (bars.length < 10 || !lastBar) return events;

  const orderBlocks = detectOrderBlocks(bars, { lookback: options.lookback ?? 50, pivots: options.pivots });
  const lastIdx = bars.length - 1;

  for (const ob of orderBlocks) {
    const { zone_low, zone_high } = ob.meta;
    if (ob.start_idx >= bars.length - minAge) continue;

    const post = bars.slice(ob.start_idx + 1);
    if (post.length < 3) continue;

    if (ob.direction === 'LONG') {
      const tested = post.filter(b => b.low <= zone_high).length;
      const held = post.every(b => b.close > zone_low);
      if (tested === 0 || !held) continue;

      const inZone = zone_low <= lastBar.close && lastBar.close <= zone_high * (1 + p);
      const nearZone = zone_low * (1 - p) <= lastBar.low && lastBar.low <= zone_high * (1 + 2 * p);
      if (inZone || nearZone) {
        events.push({
          pattern: 'MITIGATION_BLOCK',
          direction: 'LONG',
          level: zone_low,
          start_idx: ob.start_idx,
          end_idx: lastIdx,
          meta: { zone_low, zone_high, times_tested: tested },
        });
      }
    } else if (ob.direction === 'SHORT') {
      const tested = post.filter(b => b.high >= zone_low).length;
      const held = post.every(b => b.close < zone_high);
      if (tested === 0 || !held) continue;

      const inZone = zone_low * (1 - p) <= lastBar.close && lastBar.close <= zone_high;
      const nearZone = zone_low * (1 - 2 * p) <= lastBar.high && lastBar.high <= zone_high * (1 + p);
      if (inZone || nearZone) {
        events.push({
          pattern: 'MITIGATION_BLOCK',
          direction: 'SHORT',
          level: zone_high,
          start_idx: ob.start_idx,
          end_idx: lastIdx,
          meta: { zone_low, zone_high, times_tested: tested },
        });
      }
    }
  }

  return events;
}
