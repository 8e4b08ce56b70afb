/**
 * Public API of the market structure engine.
 */

export * from './modules/smartMoney/index.js';

export {
  StructureAgent,
  analyzeBars,
  evaluateRates,
  isFalseBreakout,
  trendBias,
} from './engine/structureAgent.js';
export type {
  StructureAgentOptions,
  StructureDebug,
  StructureDecision,
  TrendBias,
  WaitReason,
} from './engine/structureAgent.js';

export { runSmcVote, scoreEvents, decideVote, serializeEvents, DOMINANCE_RATIO } from './engine/smcVote.js';
export type { SerializedEvent, SerializedEvents, SignalSide, SmcEvents, SmcVote, SmcVoteMeta } from './engine/smcVote.js';

export { computeTradeLevels, entryZone, isDegenerate, isValidOrder } from './engine/tradeLevels.js';
export type { EntryZone, LevelInputs, StopSource, TradeLevels } from './engine/tradeLevels.js';

export { calculateATR, latestATR, trueRange } from './engine/indicators.js';
export { normalizeRates } from './engine/barNormalizer.js';
export type { NormalizedRates, RawColumns, RawRates, RawRow } from './engine/barNormalizer.js';

export {
  DETECTOR_DEFAULTS,
  SMC_EVENT_GROUPS,
  SMC_WEIGHTS,
  STRUCTURE_DEFAULTS,
  TIMEFRAMES,
  StructureParamsSchema,
  analysisWindow,
  barsNeeded,
  minCleanBars,
  minHistoryRows,
  resolveStructureConfig,
} from './config/structure.js';
export type {
  DetectorThresholds,
  SmcEventGroup,
  SmcWeights,
  StructureConfig,
  StructureParams,
} from './config/structure.js';

export { STRUCTURE_PROFILES, getStructureProfile, resolveAgentParams } from './config/profiles.js';
export type { AgentProfile, TradingStyle } from './config/profiles.js';

export { InMemoryBarProvider } from './services/barProvider.js';
export type { BarProvider } from './services/barProvider.js';
export { Logger, consoleSink, createLogger, isLogLevel, logger } from './services/logger.js';
export type { LogLevel, LogSink, LoggerOptions } from './services/logger.js';

export { createApp } from './app.js';
