/**
 * Swing Pivot Detection
 * A pivot is a bar whose high (low) is the extreme of the centered window
 * of `2 * window + 1` bars. Bars closer than `window` to either end of the
 * series never qualify.
 */

import type { Bars, Pivot, PivotKind } from './types.js';

export interface PivotOptions {
  useWicks?: boolean;
}

export function findPivots(
  bars: Bars,
  window: number = 3,
  options: PivotOptions = {}
): Pivot[] {
  const w = Math.max(1, Math.floor(window));
  const useWicks = options.useWicks ?? true;
  const pivots: Pivot[] = [];

  if (bars.length < w * 2 + 1) return pivots;

  const highs = bars.map(b => (useWicks ? b.high : b.close));
  const lows = bars.map(b => (useWicks ? b.low : b.close));

  for (let i = w; i < bars.length - w; i++) {
    let segmentMax = -Infinity;
    let segmentMin = Infinity;

    for (let j = i - w; j <= i + w; j++) {
      segmentMax = Math.max(segmentMax, highs[j]);
      segmentMin = Math.min(segmentMin, lows[j]);
    }

    if (highs[i] === segmentMax) {
      pivots.push({ index: i, price: highs[i], kind: 'high' });
    }
    if (lows[i] === segmentMin) {
      pivots.push({ index: i, price: lows[i], kind: 'low' });
    }
  }

  return pivots;
}

export function pivotsOfKind(pivots: readonly Pivot[], kind: PivotKind): Pivot[] {
  return pivots.filter(p => p.kind === kind);
}

/**
 * Last `n` pivots of a kind, oldest first.
 */
export function latestPivots(pivots: readonly Pivot[], kind: PivotKind, n: number): Pivot[] {
  const filtered = pivotsOfKind(pivots, kind);
  return filtered.slice(Math.max(0, filtered.length - n));
}
