/**
 * Liquidity Sweep Detection Module
 * Identifies stop-hunt patterns where price runs liquidity then reverses
 *
 * Inducement: equal highs/lows are pierced by the previous bar and the
 * latest close is back inside the range.
 * Sweep: a long rejection wick whose next close confirms the reversal.
 */

import type { Bars, InducementEvent, LiquiditySweepEvent } from './types.js';
import { latest, tailStart } from './utils.js';

export interface InducementOptions {
  lookback?: number;
  tolerance?: number;       // relative to the pool level
  excludeRecent?: number;   // trailing bars left out of the pool
}

export interface SweepOptions {
  lookback?: number;
  wickRatio?: number;
}

export function detectInducement(bars: Bars, options: InducementOptions = {}): InducementEvent[] {
  const lookback = options.lookback ?? 30;
  const tolerance = options.tolerance ?? 0.001;
  const exclude = options.excludeRecent ?? 3;
  const events: InducementEvent[] = [];
  const lastBar = latest(bars);

  if (bars.length < lookback || bars.length < 2 || !lastBar) return events;

  const start = tailStart(bars, lookback);
  const pool = bars.slice(start, Math.max(start, bars.length - exclude));
  if (pool.length < 2) return events;

  const maxHigh = Math.max(...pool.map(b => b.high));
  const minLow = Math.min(...pool.map(b => b.low));
  const tolHigh = maxHigh * tolerance;
  const tolLow = minLow * tolerance;

  const nearHighs = pool.filter(b => Math.abs(b.high - maxHigh) <= tolHigh).length;
  const nearLows = pool.filter(b => Math.abs(b.low - minLow) <= tolLow).length;

  const prevIdx = bars.length - 2;
  const prevBar = bars[prevIdx];
  const close = lastBar.close;

  if (nearLows >= 2 && prevBar.low < minLow - tolLow && close > minLow) {
    events.push({
      pattern: 'INDUCEMENT',
      direction: 'LONG',
      level: minLow,
      start_idx: prevIdx,
      end_idx: prevIdx + 1,
      meta: {
        liquidity_level: minLow,
        sweep_price: prevBar.low,
        recovery_close: close,
        touches: nearLows,
        strength: nearLows / 2,
      },
    });
  }

  if (nearHighs >= 2 && prevBar.high > maxHigh + tolHigh && close < maxHigh) {
    events.push({
      pattern: 'INDUCEMENT',
      direction: 'SHORT',
      level: maxHigh,
      start_idx: prevIdx,
      end_idx: prevIdx + 1,
      meta: {
        liquidity_level: maxHigh,
        sweep_price: prevBar.high,
        recovery_close: close,
        touches: nearHighs,
        strength: nearHighs / 2,
      },
    });
  }

  return events;
}

export function detectLiquiditySweep(bars: Bars, options: SweepOptions = {}): LiquiditySweepEvent[] {
  const ratio = options.wickRatio ?? 0.4;
  const start = tailStart(bars, options.lookback ?? 20);
  const events: LiquiditySweepEvent[] = [];

  if (bars.length < 5) return events;

  // Third- and second-to-last candles, each confirmed by the candle after it
  for (let i = Math.max(start, bars.length - 3); i < bars.length - 1; i++) {
    const candle = bars[i];
    const next = bars[i + 1];
    const range = candle.high - candle.low;
    if (range === 0) continue;

    const upperWick = candle.high - Math.max(candle.open, candle.close);
    const lowerWick = Math.min(candle.open, candle.close) - candle.low;

    if (upperWick > range * ratio && next.close < candle.open) {
      events.push({
        pattern: 'LIQUIDITY_SWEEP',
        direction: 'SHORT',
        level: candle.high,
        start_idx: i,
        end_idx: i + 1,
        meta: {
          sweep_type: 'high_sweep',
          wick_ratio: upperWick / range,
          confirmation: 'bearish_close',
        },
      });
    }

    if (lowerWick > range * ratio && next.close > candle.open) {
      events.push({
        pattern: 'LIQUIDITY_SWEEP',
        direction: 'LONG',
        level: candle.low,
        start_idx: i,
        end_idx: i + 1,
        meta: {
          sweep_type: 'low_sweep',
          wick_ratio: lowerWick / range,
          confirmation: 'bullish_close',
        },
      });
    }
  }

  return events;
}
