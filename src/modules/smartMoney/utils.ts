/**
 * Shared helpers for the SMC detectors.
 */

import type { Bars, PriceBar } from './types.js';

export function latest<T>(arr: readonly T[] | undefined): T | null {
  if (!arr || arr.length === 0) return null;
  return arr[arr.length - 1];
}

/**
 * Start index of the trailing `lookback` window.
 */
export function tailStart(bars: Bars, lookback: number): number {
  return Math.max(0, bars.length - Math.max(0, Math.floor(lookback)));
}

export function isBullishCandle(bar: PriceBar): boolean {
  return bar.close > bar.open;
}

export function isBearishCandle(bar: PriceBar): boolean {
  return bar.close < bar.open;
}

export function bodyLow(bar: PriceBar): number {
  return Math.min(bar.open, bar.close);
}

export function bodyHigh(bar: PriceBar): number {
  return Math.max(bar.open, bar.close);
}

export function windowHigh(bars: Bars, start: number, end: number = bars.length): number {
  let max = -Infinity;
  for (let i = start; i < end; i++) max = Math.max(max, bars[i].high);
  return max;
}

export function windowLow(bars: Bars, start: number, end: number = bars.length): number {
  let min = Infinity;
  for (let i = start; i < end; i++) min = Math.min(min, bars[i].low);
  return min;
}
