import { describe, it, expect } from 'vitest';
import { detectBos, detectChoch } from '../structureBreaks.js';
import type { Pivot } from '../types.js';
import { makeBars } from '../../../__tests__/bars.js';

function seriesClosingAt(close: number) {
  return makeBars([
    { high: 101, low: 99 },
    { high: 105, low: 100 },
    { high: 102, low: 97 },
    { high: 98, low: 95 },
    { high: 100, low: 96 },
    { high: close + 1, low: close - 1, close },
  ]);
}

describe('detectBos', () => {
  const pivots: Pivot[] = [
    { index: 1, price: 105, kind: 'high' },
    { index: 3, price: 95, kind: 'low' },
    { index: 4, price: 100, kind: 'high' },
  ];

  it('emits a long break above the latest high pivot', () => {
    expect(detectBos(seriesClosingAt(111), { pivots })).toEqual([{
      pattern: 'BOS',
      direction: 'LONG',
      level: 100,
      start_idx: 4,
      end_idx: null,
      meta: { broken_high: 100 },
    }]);
  });

  it('emits a short break below the latest low pivot', () => {
    expect(detectBos(seriesClosingAt(90), { pivots })).toEqual([{
      pattern: 'BOS',
      direction: 'SHORT',
      level: 95,
      start_idx: 3,
      end_idx: null,
      meta: { broken_low: 95 },
    }]);
  });

  it('stays quiet inside the range', () => {
    expect(detectBos(seriesClosingAt(97), { pivots })).toEqual([]);
  });

  it('needs three pivots', () => {
    expect(detectBos(seriesClosingAt(111), { pivots: pivots.slice(1) })).toEqual([]);
  });

  it('respects the tolerance band', () => {
    expect(detectBos(seriesClosingAt(100.5), { pivots, tolerance: 1 })).toEqual([]);
  });
});

describe('detectChoch', () => {
  it('flips bearish when a fresh high pivot is followed by a lost low', () => {
    const pivots: Pivot[] = [
      { index: 0, price: 90, kind: 'low' },
      { index: 1, price: 100, kind: 'high' },
      { index: 2, price: 92, kind: 'low' },
      { index: 3, price: 104, kind: 'high' },
    ];

    expect(detectChoch(seriesClosingAt(91), { pivots })).toEqual([{
      pattern: 'CHoCH',
      direction: 'SHORT',
      level: 92,
      start_idx: 2,
      end_idx: null,
      meta: { broken_low: 92 },
    }]);
  });

  it('flips bullish when a fresh low pivot is followed by a taken high', () => {
    const pivots: Pivot[] = [
      { index: 0, price: 100, kind: 'high' },
      { index: 1, price: 90, kind: 'low' },
      { index: 2, price: 105, kind: 'high' },
      { index: 3, price: 95, kind: 'low' },
    ];

    expect(detectChoch(seriesClosingAt(110), { pivots })).toEqual([{
      pattern: 'CHoCH',
      direction: 'LONG',
      level: 105,
      start_idx: 2,
      end_idx: null,
      meta: { broken_high: 105 },
    }]);
  });

  it('ignores a break in the direction of the latest leg', () => {
    const pivots: Pivot[] = [
      { index: 0, price: 90, kind: 'low' },
      { index: 1, price: 100, kind: 'high' },
      { index: 2, price: 92, kind: 'low' },
      { index: 3, price: 104, kind: 'high' },
    ];

    expect(detectChoch(seriesClosingAt(110), { pivots })).toEqual([]);
  });

  it('needs four pivots', () => {
    const pivots: Pivot[] = [
      { index: 0, price: 100, kind: 'high' },
      { index: 1, price: 90, kind: 'low' },
      { index: 3, price: 95, kind: 'low' },
    ];

    expect(detectChoch(seriesClosingAt(110), { pivots })).toEqual([]);
  });
});
