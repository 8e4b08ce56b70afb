/**
 * Structure Agent
 * Price-action decision from swing structure:
 * - BOS / CHoCH against the latest swing pivots
 * - False-breakout (FBO) filter over the last few closes
 * - OTE entry, invalidation stop and reward-multiple target
 * - SMC pattern vote carried alongside as supporting metadata
 *
 * Every path returns a decision; failures surface as WAIT with a reason.
 */

import type { StructureConfig } from '../config/structure.js';
import {
  analysisWindow,
  barsNeeded,
  minCleanBars,
  minHistoryRows,
  resolveStructureConfig,
} from '../config/structure.js';
import type { AgentProfile } from '../config/profiles.js';
import { resolveAgentParams } from '../config/profiles.js';
import { computeInvalidationStop, findPivots, pivotsOfKind } from '../modules/smartMoney/index.js';
import type { Bars, InvalidationStop, Pivot } from '../modules/smartMoney/index.js';
import type { BarProvider } from '../services/barProvider.js';
import { createLogger } from '../services/logger.js';
import { normalizeRates } from './barNormalizer.js';
import { latestATR } from './indicators.js';
import { runSmcVote, serializeEvents } from './smcVote.js';
import type { SerializedEvents, SignalSide, SmcVote } from './smcVote.js';
import { computeTradeLevels } from './tradeLevels.js';
import type { StopSource } from './tradeLevels.js';

const logger = createLogger('StructureAgent');

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export type TrendBias = 'up' | 'down' | null;

export type WaitReason = 'no_data' | 'too_short' | 'no_pivots' | 'analysis_failed';

export interface StructureDebug {
  tf: string;
  bias: TrendBias;
  bos_up: boolean;
  bos_dn: boolean;
  choch_up: boolean;
  choch_dn: boolean;
  fbo: boolean;
  last_high: number;
  last_low: number;
  atr: number | null;
  smc_signal: SignalSide;
  smc: {
    events: SerializedEvents;
    meta: SmcVote['meta'];
  };
  ote_zone?: [number, number, number];
  long_leg?: boolean;
  invalidation_sl?: InvalidationStop;
  sl_source?: StopSource;
  degenerate_levels?: boolean;
}

export interface StructureDecision {
  signal: SignalSide;
  reason?: WaitReason;
  price: number | null;
  sl: number | null;
  tp: number | null;
  smc_signal: SignalSide;
  smc_events: SerializedEvents;
  smc_meta: SmcVote['meta'];
  debug: StructureDebug | null;
  [atr: `ATR_${string}`]: number | null;
}

// ═══════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════

function lastN<T>(seq: readonly T[], n: number): T[] {
  return seq.slice(Math.max(0, seq.length - n));
}

/**
 * up on higher high + higher low, down on lower high + lower low.
 */
export function trendBias(highs: readonly number[], lows: readonly number[]): TrendBias {
  if (highs.length < 2 || lows.length < 2) return null;
  const [h2, h1] = lastN(highs, 2);
  const [l2, l1] = lastN(lows, 2);
  if (h1 > h2 && l1 > l2) return 'up';
  if (h1 < h2 && l1 < l2) return 'down';
  return null;
}

/**
 * A breakout is false when any of the last `retestBars + 1` closes sits
 * back across the broken level.
 */
export function isFalseBreakout(
  bars: Bars,
  retestBars: number,
  broke: { up: boolean; down: boolean },
  levels: { high: number; low: number }
): boolean {
  if (!broke.up && !broke.down) return false;
  const recent = bars.slice(Math.max(0, bars.length - (retestBars + 1)));
  if (broke.up && recent.some(b => b.close < levels.high)) return true;
  if (broke.down && recent.some(b => b.close > levels.low)) return true;
  return false;
}

function atrKey(tf: string): `ATR_${string}` {
  return `ATR_${tf}`;
}

function withAtr(decision: StructureDecision, tf: string, atr: number | null): StructureDecision {
  decision[atrKey(tf)] = atr;
  return decision;
}

function waitDecision(reason: WaitReason, tf: string): StructureDecision {
  return withAtr({
    signal: 'WAIT',
    reason,
    price: null,
    sl: null,
    tp: null,
    smc_signal: 'WAIT',
    smc_events: {},
    smc_meta: {},
    debug: null,
  }, tf, null);
}

// ═══════════════════════════════════════════════════════════════
// ANALYSIS
// ═══════════════════════════════════════════════════════════════

/**
 * Runs the decision over bars that are already clean and ascending.
 */
export function analyzeBars(bars: Bars, config: StructureConfig, timeframe: string = config.timeframe): StructureDecision {
  const tf = timeframe.toUpperCase();
  const lastBar = bars.length > 0 ? bars[bars.length - 1] : null;
  if (!lastBar) return waitDecision('too_short', tf);

  const atr = latestATR(bars, config.atrPeriod);

  const pivots = findPivots(bars, config.swingWindow, { useWicks: config.useWicks });
  const highPivots = pivotsOfKind(pivots, 'high');
  const lowPivots = pivotsOfKind(pivots, 'low');
  const lastHighPivot: Pivot | undefined = highPivots[highPivots.length - 1];
  const lastLowPivot: Pivot | undefined = lowPivots[lowPivots.length - 1];

  if (!lastHighPivot || !lastLowPivot) return waitDecision('no_pivots', tf);

  const lastHighs = lastN(highPivots, 2).map(p => p.price);
  const lastLows = lastN(lowPivots, 2).map(p => p.price);
  const lastHigh = lastHighPivot.price;
  const lastLow = lastLowPivot.price;
  const close = lastBar.close;

  const bias = trendBias(lastHighs, lastLows);
  const smc = runSmcVote(bars, config);

  const bosUp = close > lastHigh;
  const bosDn = close < lastLow;
  const chochUp = bias === 'down' && bosUp;
  const chochDn = bias === 'up' && bosDn;
  const fbo = isFalseBreakout(
    bars,
    config.retestBars,
    { up: bosUp, down: bosDn },
    { high: lastHigh, low: lastLow }
  );

  let signal: SignalSide = 'WAIT';
  if (fbo) signal = 'WAIT';
  else if (chochUp || bosUp) signal = 'LONG';
  else if (chochDn || bosDn) signal = 'SHORT';

  const smcEvents = serializeEvents(smc.events);
  const debug: StructureDebug = {
    tf,
    bias,
    bos_up: bosUp,
    bos_dn: bosDn,
    choch_up: chochUp,
    choch_dn: chochDn,
    fbo,
    last_high: lastHigh,
    last_low: lastLow,
    atr,
    smc_signal: smc.signal,
    smc: { events: smcEvents, meta: smc.meta },
  };

  let price: number | null = null;
  let sl: number | null = null;
  let tp: number | null = null;

  if (signal !== 'WAIT' && atr) {
    debug.long_leg = lastHighPivot.index > lastLowPivot.index;

    const invalidation = computeInvalidationStop(bars, signal, config.detectors.invalidation);
    if (invalidation) debug.invalidation_sl = invalidation;

    const levels = computeTradeLevels({
      direction: signal,
      swingHigh: lastHigh,
      swingLow: lastLow,
      atr,
      slMult: config.slMult,
      tpMult: config.tpMult,
      invalidation,
    });

    debug.ote_zone = [levels.zone.low, levels.zone.high, levels.zone.mid];
    debug.sl_source = levels.slSource;
    debug.degenerate_levels = levels.degenerate;
    ({ price, sl, tp } = levels);
  }

  logger.debug(`Decision ${tf}: ${signal}`, { bias, bosUp, bosDn, fbo, smc: smc.signal });

  return withAtr({
    signal,
    price,
    sl,
    tp,
    smc_signal: smc.signal,
    smc_events: smcEvents,
    smc_meta: smc.meta,
    debug,
  }, tf, atr);
}

/**
 * Applies the history checks to a provider payload, then analyzes the
 * trailing window of clean bars.
 */
export function evaluateRates(raw: unknown, config: StructureConfig, timeframe: string = config.timeframe): StructureDecision {
  const tf = timeframe.toUpperCase();
  const normalized = raw === null || raw === undefined ? null : normalizeRates(raw);

  if (!normalized || normalized.rows < minHistoryRows(config)) {
    return waitDecision('no_data', tf);
  }
  if (normalized.bars.length < minCleanBars(config)) {
    return waitDecision('too_short', tf);
  }

  const need = analysisWindow(config);
  const bars = normalized.bars.slice(Math.max(0, normalized.bars.length - need));

  try {
    return analyzeBars(bars, config, tf);
  } catch (e) {
    const error = e instanceof Error ? e.message : String(e);
    logger.error(`Structure analysis failed for ${tf}`, { error });
    return waitDecision('analysis_failed', tf);
  }
}

// ═══════════════════════════════════════════════════════════════
// AGENT
// ═══════════════════════════════════════════════════════════════

export interface StructureAgentOptions {
  symbol: string;
  provider?: BarProvider | null;
  params?: unknown;
  profile?: AgentProfile;
}

export class StructureAgent {
  readonly symbol: string;
  readonly config: StructureConfig;
  private readonly provider: BarProvider | null;

  constructor(options: StructureAgentOptions) {
    this.symbol = options.symbol;
    this.provider = options.provider ?? null;
    this.config = resolveStructureConfig(options.params ?? resolveAgentParams(options.profile));
  }

  async generateSignal(timeframe?: string): Promise<StructureDecision> {
    const tf = (timeframe ?? this.config.timeframe).toUpperCase();
    const raw = await this.fetchRates(tf, barsNeeded(this.config));
    return evaluateRates(raw, this.config, tf);
  }

  private async fetchRates(timeframe: string, count: number): Promise<unknown> {
    if (!this.provider) return null;
    try {
      return await this.provider.getRates(this.symbol, timeframe, count);
    } catch (e) {
      const error = e instanceof Error ? e.message : String(e);
      logger.warn(`Failed to fetch rates for ${this.symbol} ${timeframe}`, { error });
      return null;
    }
  }
}
