/**
 * SMC Vote
 * Runs every pattern detector over the bars and weighs the events into a
 * LONG / SHORT / WAIT opinion. A side wins only when its score beats the
 * other side's by 20%.
 */

import type { StructureConfig, SmcEventGroup, SmcWeights } from '../config/structure.js';
import { SMC_EVENT_GROUPS } from '../config/structure.js';
import {
  computeEquilibrium,
  computeOteZone,
  detectBos,
  detectBreakerBlocks,
  detectChoch,
  detectEqualHighs,
  detectEqualLows,
  detectFvg,
  detectInducement,
  detectLiquiditySweep,
  detectMitigationBlocks,
  detectOrderBlocks,
  findPivots,
} from '../modules/smartMoney/index.js';
import type { Bars, Equilibrium, OteZone, PatternEvent, Pivot } from '../modules/smartMoney/index.js';
import { createLogger } from '../services/logger.js';

const logger = createLogger('SmcVote');

export type SignalSide = 'LONG' | 'SHORT' | 'WAIT';

export const DOMINANCE_RATIO = 1.2;

export type SmcEvents = Partial<Record<SmcEventGroup, PatternEvent[]>>;

export interface SmcVoteMeta {
  long_score: number;
  short_score: number;
  equilibrium: Equilibrium;
  ote_zone: OteZone | null;
  failed: SmcEventGroup[];
}

export interface SmcVote {
  signal: SignalSide;
  events: SmcEvents;
  meta: SmcVoteMeta | Record<string, never>;
}

export interface SerializedEvent {
  pattern: PatternEvent['pattern'];
  direction: PatternEvent['direction'];
  level: number;
  start_idx: number;
  end_idx: number | null;
  meta: Record<string, unknown>;
}

export type SerializedEvents = Partial<Record<SmcEventGroup, SerializedEvent[]>>;

type Detector = (bars: Bars, pivots: readonly Pivot[]) => PatternEvent[];

function buildDetectors(config: StructureConfig): Record<SmcEventGroup, Detector> {
  const d = config.detectors;
  return {
    bos: (bars, pivots) => detectBos(bars, { pivots }),
    choch: (bars, pivots) => detectChoch(bars, { pivots }),
    fvg: bars => detectFvg(bars, { tolerance: config.smcFvgTolerance }),
    eqh: bars => detectEqualHighs(bars, { tolerance: config.smcEqTolerance }),
    eql: bars => detectEqualLows(bars, { tolerance: config.smcEqTolerance }),
    order_blocks: (bars, pivots) => detectOrderBlocks(bars, { pivots }),
    breaker_blocks: (bars, pivots) => detectBreakerBlocks(bars, { pivots }),
    inducement: bars => detectInducement(bars, d.inducement),
    liquidity_sweep: bars => detectLiquiditySweep(bars, d.liquiditySweep),
    mitigation_block: (bars, pivots) => detectMitigationBlocks(bars, { ...d.mitigation, pivots }),
  };
}

const round3 = (n: number) => Math.round(n * 1000) / 1000;

export function scoreEvents(events: SmcEvents, weights: SmcWeights): { long: number; short: number } {
  let long = 0;
  let short = 0;

  for (const group of SMC_EVENT_GROUPS) {
    const weight = weights[group];
    for (const evt of events[group] ?? []) {
      if (evt.direction === 'LONG') long += weight;
      else if (evt.direction === 'SHORT') short += weight;
    }
  }

  return { long, short };
}

export function decideVote(longScore: number, shortScore: number): SignalSide {
  if (longScore > shortScore * DOMINANCE_RATIO && longScore > 0) return 'LONG';
  if (shortScore > longScore * DOMINANCE_RATIO && shortScore > 0) return 'SHORT';
  return 'WAIT';
}

export function runSmcVote(bars: Bars, config: StructureConfig): SmcVote {
  if (!config.smcEnabled || bars.length === 0) {
    return { signal: 'WAIT', events: {}, meta: {} };
  }

  const pivots = findPivots(bars, Math.max(2, config.smcPivotWindow), { useWicks: config.useWicks });
  const detectors = buildDetectors(config);
  const events: SmcEvents = {};
  const failed: SmcEventGroup[] = [];

  for (const group of SMC_EVENT_GROUPS) {
    try {
      events[group] = detectors[group](bars, pivots);
    } catch (e) {
      const error = e instanceof Error ? e.message : String(e);
      logger.warn(`Detector ${group} failed, skipping`, { error });
      events[group] = [];
      failed.push(group);
    }
  }

  const scores = scoreEvents(events, config.weights);

  return {
    signal: decideVote(scores.long, scores.short),
    events,
    meta: {
      long_score: round3(scores.long),
      short_score: round3(scores.short),
      equilibrium: computeEquilibrium(bars),
      ote_zone: computeOteZone(bars),
      failed,
    },
  };
}

export function serializeEvents(events: SmcEvents): SerializedEvents {
  const out: SerializedEvents = {};
  for (const group of SMC_EVENT_GROUPS) {
    const list = events[group];
    if (!list) continue;
    out[group] = list.map(evt => ({
      pattern: evt.pattern,
      direction: evt.direction,
      level: evt.level,
      start_idx: evt.start_idx,
      end_idx: evt.end_idx,
      meta: { ...evt.meta },
    }));
  }
  return out;
}
