/**
 * Structure Agent Configuration
 *
 * Parameters arrive with the snake_case keys used by agent profiles and the
 * HTTP API. They are validated once, defaults applied, and frozen into a
 * StructureConfig that stays unchanged for the whole decision.
 */

import { z } from 'zod';
import { createLogger } from '../services/logger.js';

const logger = createLogger('StructureConfig');

// ═══════════════════════════════════════════════════════════════
// DEFAULTS
// ═══════════════════════════════════════════════════════════════

export const TIMEFRAMES = ['M1', 'M5', 'M15', 'M30', 'H1', 'H4', 'D1'] as const;

export const SMC_EVENT_GROUPS = [
  'bos',
  'choch',
  'fvg',
  'eqh',
  'eql',
  'order_blocks',
  'breaker_blocks',
  'inducement',
  'liquidity_sweep',
  'mitigation_block',
] as const;

export type SmcEventGroup = (typeof SMC_EVENT_GROUPS)[number];
export type SmcWeights = Readonly<Record<SmcEventGroup, number>>;

export const SMC_WEIGHTS: SmcWeights = {
  bos: 2.0,
  choch: 2.0,
  breaker_blocks: 1.5,
  order_blocks: 1.0,
  fvg: 0.75,
  eqh: 0.5,
  eql: 0.5,
  inducement: 2.5,         // manufactured stop-run ahead of a reversal
  liquidity_sweep: 2.0,
  mitigation_block: 1.5,
};

export interface DetectorThresholds {
  inducement: { lookback: number; tolerance: number; excludeRecent: number };
  liquiditySweep: { lookback: number; wickRatio: number };
  mitigation: { lookback: number; minAgeBars: number; proximityPct: number };
  invalidation: { lookback: number; bufferPct: number };
}

export const DETECTOR_DEFAULTS: DetectorThresholds = {
  inducement: { lookback: 30, tolerance: 0.001, excludeRecent: 3 },
  liquiditySweep: { lookback: 20, wickRatio: 0.4 },
  mitigation: { lookback: 50, minAgeBars: 3, proximityPct: 0.01 },
  invalidation: { lookback: 50, bufferPct: 0.001 },
};

export const STRUCTURE_DEFAULTS = {
  timeframe: 'M15',
  lookback: 300,
  swingWindow: 20,
  retestBars: 3,
  atrPeriod: 14,
  slMult: 1.5,
  tpMult: 2.5,
  smcEnabled: true,
  smcFvgTolerance: 0.0,
  smcEqTolerance: 0.001,
  useWicks: true,
} as const;

export interface StructureConfig {
  readonly timeframe: string;
  readonly lookback: number;
  readonly swingWindow: number;
  readonly smcPivotWindow: number;
  readonly retestBars: number;
  readonly atrPeriod: number;
  readonly slMult: number;
  readonly tpMult: number;
  readonly smcEnabled: boolean;
  readonly smcFvgTolerance: number;
  readonly smcEqTolerance: number;
  readonly useWicks: boolean;
  readonly weights: SmcWeights;
  readonly detectors: Readonly<DetectorThresholds>;
}

// ═══════════════════════════════════════════════════════════════
// SCHEMA
// ═══════════════════════════════════════════════════════════════

/**
 * Invalid values are dropped (and logged) so the default applies instead.
 */
function lenient<T extends z.ZodTypeAny>(key: string, schema: T) {
  return schema.optional().catch(ctx => {
    logger.warn('Ignoring invalid structure parameter', {
      key,
      input: ctx.input,
      issues: ctx.error.issues.map(issue => issue.message),
    });
    return undefined;
  });
}

const positiveInt = z.number().int().positive();
const nonNegative = z.number().finite().nonnegative();

const WeightsSchema = z.object({
  bos: nonNegative.optional(),
  choch: nonNegative.optional(),
  fvg: nonNegative.optional(),
  eqh: nonNegative.optional(),
  eql: nonNegative.optional(),
  order_blocks: nonNegative.optional(),
  breaker_blocks: nonNegative.optional(),
  inducement: nonNegative.optional(),
  liquidity_sweep: nonNegative.optional(),
  mitigation_block: nonNegative.optional(),
});

const DetectorsSchema = z.object({
  inducement: z.object({
    lookback: positiveInt.optional(),
    tolerance: nonNegative.optional(),
    exclude_recent: z.number().int().nonnegative().optional(),
  }).optional(),
  liquidity_sweep: z.object({
    lookback: positiveInt.optional(),
    wick_ratio: z.number().min(0).max(1).optional(),
  }).optional(),
  mitigation: z.object({
    lookback: positiveInt.optional(),
    min_age_bars: positiveInt.optional(),
    proximity_pct: nonNegative.optional(),
  }).optional(),
  invalidation: z.object({
    lookback: positiveInt.optional(),
    buffer_pct: nonNegative.optional(),
  }).optional(),
});

/**
 * Agent parameters as written in profiles and request bodies.
 */
export interface StructureParams {
  timeframe?: string;
  lookback?: number;
  swing_window?: number;
  wing_lookback?: number;
  smc_pivot_window?: number;
  retest_bars?: number;
  atr_period?: number;
  sl_mult?: number;
  tp_mult?: number;
  smc_enabled?: boolean;
  smc_fvg_tolerance?: number;
  smc_eq_tolerance?: number;
  use_wicks?: boolean;
  smc_weights?: Partial<Record<SmcEventGroup, number>>;
  smc_detectors?: z.input<typeof DetectorsSchema>;
}

export const StructureParamsSchema = z.object({
  timeframe: lenient('timeframe', z.string().min(1).max(8).transform(s => s.toUpperCase())),
  lookback: lenient('lookback', positiveInt),
  swing_window: lenient('swing_window', positiveInt),
  wing_lookback: lenient('wing_lookback', positiveInt),
  smc_pivot_window: lenient('smc_pivot_window', positiveInt),
  retest_bars: lenient('retest_bars', z.number().int().nonnegative()),
  atr_period: lenient('atr_period', positiveInt),
  sl_mult: lenient('sl_mult', nonNegative),
  tp_mult: lenient('tp_mult', nonNegative),
  smc_enabled: lenient('smc_enabled', z.boolean()),
  smc_fvg_tolerance: lenient('smc_fvg_tolerance', nonNegative),
  smc_eq_tolerance: lenient('smc_eq_tolerance', nonNegative),
  use_wicks: lenient('use_wicks', z.boolean()),
  smc_weights: lenient('smc_weights', WeightsSchema),
  smc_detectors: lenient('smc_detectors', DetectorsSchema),
} satisfies Record<keyof StructureParams, z.ZodTypeAny>).passthrough();

// ═══════════════════════════════════════════════════════════════
// RESOLUTION
// ═══════════════════════════════════════════════════════════════

function resolveDetectors(raw: z.output<typeof DetectorsSchema> | undefined): DetectorThresholds {
  const d = DETECTOR_DEFAULTS;
  return {
    inducement: {
      lookback: raw?.inducement?.lookback ?? d.inducement.lookback,
      tolerance: raw?.inducement?.tolerance ?? d.inducement.tolerance,
      excludeRecent: raw?.inducement?.exclude_recent ?? d.inducement.excludeRecent,
    },
    liquiditySweep: {
      lookback: raw?.liquidity_sweep?.lookback ?? d.liquiditySweep.lookback,
      wickRatio: raw?.liquidity_sweep?.wick_ratio ?? d.liquiditySweep.wickRatio,
    },
    mitigation: {
      lookback: raw?.mitigation?.lookback ?? d.mitigation.lookback,
      minAgeBars: raw?.mitigation?.min_age_bars ?? d.mitigation.minAgeBars,
      proximityPct: raw?.mitigation?.proximity_pct ?? d.mitigation.proximityPct,
    },
    invalidation: {
      lookback: raw?.invalidation?.lookback ?? d.invalidation.lookback,
      bufferPct: raw?.invalidation?.buffer_pct ?? d.invalidation.bufferPct,
    },
  };
}

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  const values: unknown[] = Object.values(obj);
  for (const value of values) {
    if (typeof value === 'object' && value !== null) deepFreeze(value);
  }
  return Object.freeze(obj);
}

export function resolveStructureConfig(params: unknown = {}): StructureConfig {
  const parsed = StructureParamsSchema.safeParse(params ?? {});
  if (!parsed.success) {
    logger.warn('Structure parameters are not an object, using defaults');
  }
  const p = parsed.success ? parsed.data : StructureParamsSchema.parse({});

  const swingWindow = p.swing_window ?? p.wing_lookback ?? STRUCTURE_DEFAULTS.swingWindow;
  const weights: Record<SmcEventGroup, number> = { ...SMC_WEIGHTS };
  for (const group of SMC_EVENT_GROUPS) {
    const override = p.smc_weights?.[group];
    if (override !== undefined) weights[group] = override;
  }

  return deepFreeze({
    timeframe: p.timeframe ?? STRUCTURE_DEFAULTS.timeframe,
    lookback: p.lookback ?? STRUCTURE_DEFAULTS.lookback,
    swingWindow,
    smcPivotWindow: Math.max(2, p.smc_pivot_window ?? Math.floor(swingWindow / 2)),
    retestBars: p.retest_bars ?? STRUCTURE_DEFAULTS.retestBars,
    atrPeriod: p.atr_period ?? STRUCTURE_DEFAULTS.atrPeriod,
    slMult: p.sl_mult ?? STRUCTURE_DEFAULTS.slMult,
    tpMult: p.tp_mult ?? STRUCTURE_DEFAULTS.tpMult,
    smcEnabled: p.smc_enabled ?? STRUCTURE_DEFAULTS.smcEnabled,
    smcFvgTolerance: p.smc_fvg_tolerance ?? STRUCTURE_DEFAULTS.smcFvgTolerance,
    smcEqTolerance: p.smc_eq_tolerance ?? STRUCTURE_DEFAULTS.smcEqTolerance,
    useWicks: p.use_wicks ?? STRUCTURE_DEFAULTS.useWicks,
    weights,
    detectors: resolveDetectors(p.smc_detectors),
  });
}

export const MIN_HISTORY_ROWS = 100;
export const MIN_CLEAN_BARS = 50;

/**
 * Rows a payload must carry before anything is analyzed.
 */
export function minHistoryRows(config: StructureConfig): number {
  return Math.max(MIN_HISTORY_ROWS, config.atrPeriod + 10);
}

export function minCleanBars(config: StructureConfig): number {
  return Math.max(MIN_CLEAN_BARS, config.atrPeriod + 5);
}

/**
 * Trailing bars one decision looks at.
 */
export function analysisWindow(config: StructureConfig): number {
  return Math.max(config.lookback, config.atrPeriod + 10);
}

/**
 * Bars requested from the provider: the analysis window, never less than
 * the history check asks for.
 */
export function barsNeeded(config: StructureConfig): number {
  return Math.max(analysisWindow(config), minHistoryRows(config));
}
