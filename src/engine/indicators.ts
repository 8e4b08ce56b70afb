/**
 * Volatility Indicators
 * True range and simple-moving-average ATR, aligned 1:1 with the bars.
 * Entries without enough history are NaN.
 */

import type { Bars } from '../modules/smartMoney/types.js';

export function trueRange(bars: Bars): number[] {
  return bars.map((bar, i) => {
    const range = Math.abs(bar.high - bar.low);
    if (i === 0) return range;
    const prevClose = bars[i - 1].close;
    return Math.max(range, Math.abs(bar.high - prevClose), Math.abs(bar.low - prevClose));
  });
}

/**
 * Rolling mean over `period` values that needs at least `minPeriods`
 * finite values in the window to produce a number.
 */
export function rollingMean(values: readonly number[], period: number, minPeriods: number): number[] {
  const n = Math.max(1, Math.floor(period));
  return values.map((_, i) => {
    let sum = 0;
    let count = 0;
    for (let j = Math.max(0, i - n + 1); j <= i; j++) {
      if (Number.isFinite(values[j])) {
        sum += values[j];
        count++;
      }
    }
    return count >= minPeriods ? sum / count : NaN;
  });
}

export function calculateATR(bars: Bars, period: number = 14): number[] {
  const minPeriods = Math.max(2, Math.floor(period / 2));
  return rollingMean(trueRange(bars), period, minPeriods);
}

/**
 * Latest ATR value, or null when it is NaN.
 */
export function latestATR(bars: Bars, period: number = 14): number | null {
  const atr = calculateATR(bars, period);
  const last = atr.length > 0 ? atr[atr.length - 1] : NaN;
  return Number.isNaN(last) ? null : last;
}
