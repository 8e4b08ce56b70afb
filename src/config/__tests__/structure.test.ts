import { describe, it, expect } from 'vitest';
import {
  DETECTOR_DEFAULTS,
  SMC_WEIGHTS,
  analysisWindow,
  barsNeeded,
  minCleanBars,
  minHistoryRows,
  resolveStructureConfig,
} from '../structure.js';

describe('resolveStructureConfig', () => {
  it('applies the defaults', () => {
    const config = resolveStructureConfig();

    expect(config).toMatchObject({
      timeframe: 'M15',
      lookback: 300,
      swingWindow: 20,
      smcPivotWindow: 10,
      retestBars: 3,
      atrPeriod: 14,
      slMult: 1.5,
      tpMult: 2.5,
      smcEnabled: true,
      smcFvgTolerance: 0,
      smcEqTolerance: 0.001,
      useWicks: true,
    });
    expect(config.weights).toEqual(SMC_WEIGHTS);
    expect(config.detectors).toEqual(DETECTOR_DEFAULTS);
  });

  it('derives the SMC pivot window from the swing window', () => {
    expect(resolveStructureConfig({ swing_window: 9 }).smcPivotWindow).toBe(4);
    expect(resolveStructureConfig({ swing_window: 3 }).smcPivotWindow).toBe(2);
    expect(resolveStructureConfig({ swing_window: 9, smc_pivot_window: 6 }).smcPivotWindow).toBe(6);
  });

  it('accepts wing_lookback as the swing window', () => {
    expect(resolveStructureConfig({ wing_lookback: 6 }).swingWindow).toBe(6);
    expect(resolveStructureConfig({ wing_lookback: 6, swing_window: 8 }).swingWindow).toBe(8);
  });

  it('falls back to defaults for invalid values', () => {
    const config = resolveStructureConfig({ atr_period: -5, sl_mult: 'wide', lookback: 1.5, use_wicks: 'yes' });

    expect(config.atrPeriod).toBe(14);
    expect(config.slMult).toBe(1.5);
    expect(config.lookback).toBe(300);
    expect(config.useWicks).toBe(true);
  });

  it('ignores unknown keys', () => {
    expect(resolveStructureConfig({ colour: 'blue', tp_mult: 3 }).tpMult).toBe(3);
  });

  it('uses defaults for params that are not an object', () => {
    expect(resolveStructureConfig('fast').lookback).toBe(300);
    expect(resolveStructureConfig(null).lookback).toBe(300);
  });

  it('upper-cases the timeframe', () => {
    expect(resolveStructureConfig({ timeframe: 'h4' }).timeframe).toBe('H4');
  });

  it('overrides single weights', () => {
    const { weights } = resolveStructureConfig({ smc_weights: { fvg: 3 } });
    expect(weights.fvg).toBe(3);
    expect(weights.bos).toBe(2.0);
  });

  it('drops a weight table with a negative entry', () => {
    expect(resolveStructureConfig({ smc_weights: { fvg: -1 } }).weights).toEqual(SMC_WEIGHTS);
  });

  it('overrides detector thresholds', () => {
    const { detectors } = resolveStructureConfig({
      smc_detectors: { inducement: { exclude_recent: 5 }, invalidation: { buffer_pct: 0.002 } },
    });

    expect(detectors.inducement).toEqual({ lookback: 30, tolerance: 0.001, excludeRecent: 5 });
    expect(detectors.invalidation).toEqual({ lookback: 50, bufferPct: 0.002 });
  });

  it('freezes the result', () => {
    const config = resolveStructureConfig();

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.weights)).toBe(true);
    expect(Object.isFrozen(config.detectors.mitigation)).toBe(true);
  });

  it('does not share state between configs', () => {
    resolveStructureConfig({ smc_weights: { bos: 9 } });
    expect(resolveStructureConfig().weights.bos).toBe(2.0);
    expect(SMC_WEIGHTS.bos).toBe(2.0);
  });
});

describe('barsNeeded', () => {
  it('analyzes the lookback and the ATR warm-up', () => {
    expect(analysisWindow(resolveStructureConfig({ lookback: 20, atr_period: 14 }))).toBe(24);
    expect(analysisWindow(resolveStructureConfig({ lookback: 200 }))).toBe(200);
  });

  it('requests at least the rows the history check needs', () => {
    const short = resolveStructureConfig({ lookback: 60, atr_period: 7 });
    expect(analysisWindow(short)).toBe(60);
    expect(minHistoryRows(short)).toBe(100);
    expect(barsNeeded(short)).toBe(100);

    const slowAtr = resolveStructureConfig({ lookback: 60, atr_period: 120 });
    expect(minHistoryRows(slowAtr)).toBe(130);
    expect(minCleanBars(slowAtr)).toBe(125);
    expect(barsNeeded(slowAtr)).toBe(130);

    expect(barsNeeded(resolveStructureConfig({ lookback: 200 }))).toBe(200);
  });
});
