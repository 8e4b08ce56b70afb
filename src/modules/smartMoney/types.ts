/**
 * Smart Money Concepts (SMC) Type Definitions
 * Bars, pivots and the pattern events emitted by the detectors.
 *
 * Bars, pivots and events share one zero-based index space: index 0 is the
 * oldest bar of the analysed series.
 */

export interface PriceBar {
  time: number;        // epoch seconds, strictly increasing
  open: number;
  high: number;
  low: number;
  close: number;
}

export type Bars = readonly PriceBar[];

export type PivotKind = 'high' | 'low';

export interface Pivot {
  index: number;
  price: number;
  kind: PivotKind;
}

export type PatternKind =
  | 'BOS'
  | 'CHoCH'
  | 'FVG'
  | 'EQH'
  | 'EQL'
  | 'ORDER_BLOCK'
  | 'BREAKER_BLOCK'
  | 'INDUCEMENT'
  | 'LIQUIDITY_SWEEP'
  | 'MITIGATION_BLOCK';

export type TradeDirection = 'LONG' | 'SHORT';
export type PatternDirection = TradeDirection | null;

// ═══════════════════════════════════════════════════════════════
// PATTERN METADATA
// ═══════════════════════════════════════════════════════════════

export type BreakMeta =
  | { broken_high: number }
  | { broken_low: number };

export interface FvgMeta {
  gap_low: number;
  gap_high: number;
  width: number;
}

export interface EqualLevelMeta {
  count: number;
}

export interface ZoneMeta {
  zone_low: number;
  zone_high: number;
}

export interface BreakerMeta extends ZoneMeta {
  origin_idx: number;
}

export interface InducementMeta {
  liquidity_level: number;
  sweep_price: number;
  recovery_close: number;
  touches: number;
  strength: number;
}

export interface SweepMeta {
  sweep_type: 'high_sweep' | 'low_sweep';
  wick_ratio: number;
  confirmation: 'bearish_close' | 'bullish_close';
}

export interface MitigationMeta extends ZoneMeta {
  times_tested: number;
}

// ═══════════════════════════════════════════════════════════════
// PATTERN EVENTS
// ═══════════════════════════════════════════════════════════════

interface EventBase<K extends PatternKind, M> {
  pattern: K;
  direction: PatternDirection;
  level: number;
  start_idx: number;
  end_idx: number | null;
  meta: M;
}

export type BosEvent = EventBase<'BOS', BreakMeta>;
export type ChochEvent = EventBase<'CHoCH', BreakMeta>;
export type FvgEvent = EventBase<'FVG', FvgMeta>;
export type EqualHighsEvent = EventBase<'EQH', EqualLevelMeta>;
export type EqualLowsEvent = EventBase<'EQL', EqualLevelMeta>;
export type OrderBlockEvent = EventBase<'ORDER_BLOCK', ZoneMeta>;
export type BreakerBlockEvent = EventBase<'BREAKER_BLOCK', BreakerMeta>;
export type InducementEvent = EventBase<'INDUCEMENT', InducementMeta>;
export type LiquiditySweepEvent = EventBase<'LIQUIDITY_SWEEP', SweepMeta>;
export type MitigationBlockEvent = EventBase<'MITIGATION_BLOCK', MitigationMeta>;

export type PatternEvent =
  | BosEvent
  | ChochEvent
  | FvgEvent
  | EqualHighsEvent
  | EqualLowsEvent
  | OrderBlockEvent
  | BreakerBlockEvent
  | InducementEvent
  | LiquiditySweepEvent
  | MitigationBlockEvent;

// ═══════════════════════════════════════════════════════════════
// STRUCTURAL METRICS
// ═══════════════════════════════════════════════════════════════

export interface Equilibrium {
  high: number;
  low: number;
  equilibrium: number;
}

export interface OteZone {
  low: number;
  high: number;
}

export type InvalidationType =
  | 'range_extremum'
  | 'structure_hl'
  | 'swing_low'
  | 'structure_lh'
  | 'swing_high';

export interface InvalidationStop {
  sl_price: number;
  sl_type: InvalidationType;
  distance_pct: number;
  invalidation_level: number;
  pivot_idx: number | null;
}
