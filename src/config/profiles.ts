/**
 * Structure Agent Profiles
 *
 * Per-timeframe parameter presets for the two trading styles. Values use
 * the same snake_case keys as any other agent parameters and go through
 * resolveStructureConfig like them.
 */

import type { StructureParams } from './structure.js';

export type TradingStyle = 'scalping' | 'swing';

interface StylePreset {
  defaultTimeframe: string;
  timeframes: Record<string, StructureParams>;
}

export const STRUCTURE_PROFILES: Record<TradingStyle, StylePreset> = {
  // ═══════════════════════════════════════════════════════════════
  // SCALPING (M5 – M30)
  // ═══════════════════════════════════════════════════════════════
  scalping: {
    defaultTimeframe: 'M15',
    timeframes: {
      M5: {
        lookback: 60, swing_window: 5, retest_bars: 1, atr_period: 7,
        sl_mult: 0.8, tp_mult: 1.2, smc_enabled: true, smc_pivot_window: 3,
        smc_fvg_tolerance: 0.001, smc_eq_tolerance: 0.0005,
      },
      M15: {
        lookback: 100, swing_window: 8, retest_bars: 2, atr_period: 10,
        sl_mult: 1.0, tp_mult: 1.5, smc_enabled: true, smc_pivot_window: 5,
        smc_fvg_tolerance: 0.0015, smc_eq_tolerance: 0.0008,
      },
      M30: {
        lookback: 150, swing_window: 12, retest_bars: 3, atr_period: 14,
        sl_mult: 1.2, tp_mult: 1.8, smc_enabled: true, smc_pivot_window: 8,
        smc_fvg_tolerance: 0.002, smc_eq_tolerance: 0.001,
      },
    },
  },

  // ═══════════════════════════════════════════════════════════════
  // SWING (H1 – D1)
  // ═══════════════════════════════════════════════════════════════
  swing: {
    defaultTimeframe: 'H4',
    timeframes: {
      H1: {
        lookback: 200, swing_window: 15, retest_bars: 3, atr_period: 14,
        sl_mult: 1.5, tp_mult: 3.0, smc_enabled: true, smc_pivot_window: 8,
        smc_fvg_tolerance: 0.002, smc_eq_tolerance: 0.001,
      },
      H4: {
        lookback: 300, swing_window: 20, retest_bars: 5, atr_period: 14,
        sl_mult: 2.0, tp_mult: 4.0, smc_enabled: true, smc_pivot_window: 12,
        smc_fvg_tolerance: 0.003, smc_eq_tolerance: 0.0015,
      },
      D1: {
        lookback: 200, swing_window: 30, retest_bars: 8, atr_period: 7,
        sl_mult: 2.5, tp_mult: 5.0, smc_enabled: true, smc_pivot_window: 20,
        smc_fvg_tolerance: 0.005, smc_eq_tolerance: 0.002,
      },
    },
  },
};

/**
 * Preset for a style and timeframe; unknown timeframes fall back to the
 * style's default one. The returned params carry the timeframe they belong to.
 */
export function getStructureProfile(style: TradingStyle, timeframe: string): StructureParams {
  const preset = STRUCTURE_PROFILES[style];
  const tf = timeframe.toUpperCase();
  const resolvedTf = tf in preset.timeframes ? tf : preset.defaultTimeframe;
  return { ...preset.timeframes[resolvedTf], timeframe: resolvedTf };
}

export interface AgentProfile {
  agents?: Record<string, unknown>;
}

/**
 * Structure agent params from an agent profile. Older profiles register
 * the agent as `price_action`.
 */
export function resolveAgentParams(profile: AgentProfile | null | undefined): unknown {
  const agents = profile?.agents;
  if (!agents) return {};

  const structure = agents.structure;
  if (isNonEmptyObject(structure)) return structure;

  const priceAction = agents.price_action;
  return isNonEmptyObject(priceAction) ? priceAction : {};
}

function isNonEmptyObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && Object.keys(value).length > 0;
}
