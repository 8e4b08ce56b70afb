/**
 * Fair Value Gap (FVG) Detection Module
 * Identifies three-candle imbalances in the most recent bars
 *
 * Bullish FVG: candle 2's low sits above candle 1's high
 * Bearish FVG: candle 2's high sits below candle 1's low
 */

import type { Bars, FvgEvent } from './types.js';

export interface FVGOptions {
  lookback?: number;
  tolerance?: number;
}

const DEFAULT_LOOKBACK = 10;

export function detectFvg(bars: Bars, options: FVGOptions = {}): FvgEvent[] {
  const lookback = options.lookback ?? DEFAULT_LOOKBACK;
  const tolerance = options.tolerance ?? 0;
  const events: FvgEvent[] = [];

  if (bars.length < 3) return events;

  const startIdx = Math.max(2, bars.length - lookback);

  for (let i = startIdx; i < bars.length; i++) {
    const bar1 = bars[i - 2];
    const bar2 = bars[i - 1];

    if (bar2.low > bar1.high + tolerance) {
      events.push({
        pattern: 'FVG',
        direction: 'LONG',
        level: (bar1.high + bar2.low) / 2,
        start_idx: i - 2,
        end_idx: i,
        meta: {
          gap_low: bar1.high,
          gap_high: bar2.low,
          width: bar2.low - bar1.high,
        },
      });
    }

    if (bar2.high < bar1.low - tolerance) {
      events.push({
        pattern: 'FVG',
        direction: 'SHORT',
        level: (bar1.low + bar2.high) / 2,
        start_idx: i - 2,
        end_idx: i,
        meta: {
          gap_low: bar2.high,
          gap_high: bar1.low,
          width: bar1.low - bar2.high,
        },
      });
    }
  }

  return events;
}
