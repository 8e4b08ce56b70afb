/**
 * Smart Money Concepts (SMC) Module Index
 * Exports all SMC detectors and metrics for the structure agent
 */

export * from './types.js';
export * from './pivots.js';
export * from './structureBreaks.js';
export * from './fairValueGaps.js';
export * from './equalLevels.js';
export * from './orderBlocks.js';
export * from './liquiditySweep.js';
export * from './structuralMetrics.js';
