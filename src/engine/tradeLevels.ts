/**
 * Trade Levels
 * Entry at the middle of the OTE band, stop at structural invalidation
 * (ATR-based fallback), target as a reward multiple of the risk.
 */

import type { InvalidationStop, TradeDirection } from '../modules/smartMoney/types.js';
import { OTE_DEEP, OTE_SHALLOW } from '../modules/smartMoney/structuralMetrics.js';

const EPSILON = 1e-9;

export interface EntryZone {
  low: number;
  high: number;
  mid: number;
}

export interface LevelInputs {
  direction: TradeDirection;
  swingHigh: number;
  swingLow: number;
  atr: number;
  slMult: number;
  tpMult: number;
  invalidation: InvalidationStop | null;
}

export type StopSource = 'invalidation' | 'atr';

export interface TradeLevels {
  zone: EntryZone;
  price: number | null;
  sl: number | null;
  tp: number | null;
  slSource: StopSource;
  degenerate: boolean;
}

/**
 * OTE band of the swing for a trade direction: longs retrace from the low
 * upward, shorts from the high downward.
 */
export function entryZone(direction: TradeDirection, swingLow: number, swingHigh: number): EntryZone {
  const length = swingHigh - swingLow;
  const [a, b] = direction === 'LONG'
    ? [swingLow + OTE_SHALLOW * length, swingLow + OTE_DEEP * length]
    : [swingHigh - OTE_DEEP * length, swingHigh - OTE_SHALLOW * length];
  return { low: Math.min(a, b), high: Math.max(a, b), mid: (a + b) / 2 };
}

export function isValidOrder(direction: TradeDirection, entry: number, sl: number, tp: number): boolean {
  if (![entry, sl, tp].every(n => Number.isFinite(n))) return false;
  if (direction === 'LONG') return sl < entry && tp > entry;
  return sl > entry && tp < entry;
}

export function isDegenerate(direction: TradeDirection, entry: number, sl: number, tp: number): boolean {
  return sl === tp
    || Math.abs(tp - entry) < EPSILON
    || Math.abs(entry - sl) < EPSILON
    || !isValidOrder(direction, entry, sl, tp);
}

function pickStop(inputs: LevelInputs, entry: number): { sl: number; source: StopSource } {
  const { direction, invalidation, swingHigh, swingLow, atr, slMult } = inputs;
  const candidate = invalidation?.sl_price;

  // Only a stop on the losing side of the entry can invalidate the trade
  if (candidate !== undefined && Number.isFinite(candidate)) {
    const losingSide = direction === 'LONG' ? candidate < entry : candidate > entry;
    if (losingSide) return { sl: candidate, source: 'invalidation' };
  }

  const sl = direction === 'LONG'
    ? Math.min(swingLow, entry) - slMult * atr
    : Math.max(swingHigh, entry) + slMult * atr;
  return { sl, source: 'atr' };
}

export function computeTradeLevels(inputs: LevelInputs): TradeLevels {
  const { direction, atr, tpMult } = inputs;
  const zone = entryZone(direction, inputs.swingLow, inputs.swingHigh);
  const price = zone.mid;
  const { sl, source } = pickStop(inputs, price);

  let tp: number;
  if (direction === 'LONG') {
    const risk = price - sl;
    tp = risk > 0 ? price + tpMult * risk : price + tpMult * atr;
  } else {
    const risk = sl - price;
    tp = risk > 0 ? price - tpMult * risk : price - tpMult * atr;
  }

  if (isDegenerate(direction, price, sl, tp)) {
    return { zone, price: null, sl: null, tp: null, slSource: source, degenerate: true };
  }

  return { zone, price, sl, tp, slSource: source, degenerate: false };
}
