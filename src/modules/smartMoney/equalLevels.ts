/**
 * Equal Highs / Equal Lows
 * Clusters of near-identical extremes mark resting liquidity: buy stops
 * above equal highs, sell stops below equal lows.
 */

import type { Bars, EqualHighsEvent, EqualLowsEvent } from './types.js';
import { tailStart } from './utils.js';

export interface EqualLevelOptions {
  lookback?: number;
  tolerance?: number;
}

const DEFAULT_LOOKBACK = 20;
const DEFAULT_TOLERANCE = 1e-3;

interface Cluster {
  level: number;
  extremeIdx: number;
  indices: number[];
}

function clusterAround(
  values: readonly number[],
  offset: number,
  pick: 'max' | 'min',
  tolerance: number
): Cluster | null {
  if (values.length < 2) return null;

  let extremeIdx = 0;
  for (let i = 1; i < values.length; i++) {
    const better = pick === 'max' ? values[i] > values[extremeIdx] : values[i] < values[extremeIdx];
    if (better) extremeIdx = i;
  }

  const level = values[extremeIdx];
  const indices: number[] = [];
  values.forEach((v, i) => {
    if (Math.abs(v - level) <= tolerance) indices.push(i + offset);
  });

  if (indices.length < 2) return null;
  return { level, extremeIdx: extremeIdx + offset, indices };
}

function clusterSpan(cluster: Cluster): { start: number; end: number } {
  const start = cluster.indices[0];
  const end = cluster.extremeIdx > start
    ? cluster.extremeIdx
    : cluster.indices[cluster.indices.length - 1];
  return { start, end };
}

export function detectEqualHighs(bars: Bars, options: EqualLevelOptions = {}): EqualHighsEvent[] {
  const start = tailStart(bars, options.lookback ?? DEFAULT_LOOKBACK);
  const highs = bars.slice(start).map(b => b.high);
  const cluster = clusterAround(highs, start, 'max', options.tolerance ?? DEFAULT_TOLERANCE);
  if (!cluster) return [];

  const span = clusterSpan(cluster);
  return [{
    pattern: 'EQH',
    direction: 'SHORT',
    level: cluster.level,
    start_idx: span.start,
    end_idx: span.end,
    meta: { count: cluster.indices.length },
  }];
}

export function detectEqualLows(bars: Bars, options: EqualLevelOptions = {}): EqualLowsEvent[] {
  const start = tailStart(bars, options.lookback ?? DEFAULT_LOOKBACK);
  const lows = bars.slice(start).map(b => b.low);
  const cluster = clusterAround(lows, start, 'min', options.tolerance ?? DEFAULT_TOLERANCE);
  if (!cluster) return [];

  const span = clusterSpan(cluster);
  return [{
    pattern: 'EQL',
    direction: 'LONG',
    level: cluster.level,
    start_idx: span.start,
    end_idx: span.end,
    meta: { count: cluster.indices.length },
  }];
}
