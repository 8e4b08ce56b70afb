/**
 * Structure Break Detection
 * BOS: the last close breaks beyond the most recent swing pivot.
 * CHoCH: the last close breaks against the pivot that formed most recently.
 */

import type { Bars, BosEvent, ChochEvent, Pivot } from './types.js';
import { findPivots, latestPivots } from './pivots.js';
import { latest } from './utils.js';

export interface BreakOptions {
  pivots?: readonly Pivot[];
  tolerance?: number;
}

const DEFAULT_TOLERANCE = 1e-4;

export function detectBos(bars: Bars, options: BreakOptions = {}): BosEvent[] {
  const pivots = options.pivots ?? findPivots(bars);
  const tolerance = options.tolerance ?? DEFAULT_TOLERANCE;
  const events: BosEvent[] = [];
  const lastBar = latest(bars);

  if (pivots.length < 3 || !lastBar) return events;

  const close = lastBar.close;
  const lastHigh = latest(latestPivots(pivots, 'high', 2));
  const lastLow = latest(latestPivots(pivots, 'low', 2));

  if (lastHigh && close > lastHigh.price + tolerance) {
    events.push({
      pattern: 'BOS',
      direction: 'LONG',
      level: lastHigh.price,
      start_idx: lastHigh.index,
      end_idx: null,
      meta: { broken_high: lastHigh.price },
    });
  }

  if (lastLow && close < lastLow.price - tolerance) {
    events.push({
      pattern: 'BOS',
      direction: 'SHORT',
      level: lastLow.price,
      start_idx: lastLow.index,
      end_idx: null,
      meta: { broken_low: lastLow.price },
    });
  }

  return events;
}

export function detectChoch(bars: Bars, options: BreakOptions = {}): ChochEvent[] {
  const pivots = options.pivots ?? findPivots(bars);
  const tolerance = options.tolerance ?? DEFAULT_TOLERANCE;
  const events: ChochEvent[] = [];
  const lastBar = latest(bars);
  const lastPivot = latest(pivots);

  if (pivots.length < 4 || !lastBar || !lastPivot) return events;

  const lastHigh = latest(latestPivots(pivots, 'high', 2));
  const lastLow = latest(latestPivots(pivots, 'low', 2));
  if (!lastHigh || !lastLow) return events;

  const close = lastBar.close;

  if (lastPivot.kind === 'high') {
    // Up-leg just printed: losing the last low flips character bearish
    if (close < lastLow.price - tolerance) {
      events.push({
        pattern: 'CHoCH',
        direction: 'SHORT',
        level: lastLow.price,
        start_idx: lastLow.index,
        end_idx: null,
        meta: { broken_low: lastLow.price },
      });
    }
  } else if (close > lastHigh.price + tolerance) {
    events.push({
      pattern: 'CHoCH',
      direction: 'LONG',
      level: lastHigh.price,
      start_idx: lastHigh.index,
      end_idx: null,
      meta: { broken_high: lastHigh.price },
    });
  }

  return events;
}
