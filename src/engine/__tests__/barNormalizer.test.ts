import { describe, it, expect } from 'vitest';
import { normalizeRates } from '../barNormalizer.js';

describe('normalizeRates', () => {
  it('sorts rows by time and keeps the last duplicate', () => {
    const result = normalizeRates([
      { time: 3, open: 1, high: 2, low: 0.5, close: 1.5 },
      { time: 1, open: 1, high: 2, low: 0.5, close: 1.5 },
      { time: 3, open: 2, high: 3, low: 1.5, close: 2.5 },
    ]);

    expect(result).toEqual({
      rows: 3,
      bars: [
        { time: 1, open: 1, high: 2, low: 0.5, close: 1.5 },
        { time: 3, open: 2, high: 3, low: 1.5, close: 2.5 },
      ],
    });
  });

  it('reads column arrays', () => {
    const result = normalizeRates({
      time: [60, 120],
      open: [1, 2],
      high: [2, 3],
      low: [0.5, 1.5],
      close: [1.5, 2.5],
    });

    expect(result?.bars).toEqual([
      { time: 60, open: 1, high: 2, low: 0.5, close: 1.5 },
      { time: 120, open: 2, high: 3, low: 1.5, close: 2.5 },
    ]);
  });

  it('parses numeric strings and ISO timestamps', () => {
    const result = normalizeRates([
      { time: '2024-01-01T00:00:00Z', open: '1.1', high: '1.2', low: '1.0', close: '1.15' },
    ]);

    expect(result?.bars).toEqual([
      { time: 1704067200, open: 1.1, high: 1.2, low: 1.0, close: 1.15 },
    ]);
  });

  it('drops rows with a non-numeric field but counts them', () => {
    const result = normalizeRates([
      { time: 1, open: 1, high: 2, low: 0.5, close: 'n/a' },
      { time: 2, open: 1, high: 2, low: 0.5, close: 1.5 },
    ]);

    expect(result?.rows).toBe(2);
    expect(result?.bars.map(b => b.time)).toEqual([2]);
  });

  it('is empty for an empty payload', () => {
    expect(normalizeRates([])).toEqual({ rows: 0, bars: [] });
  });

  it('is null when a field is missing from every row', () => {
    expect(normalizeRates([{ time: 1, open: 1, high: 2, low: 0.5 }])).toBeNull();
  });

  it('is null for an unknown shape', () => {
    expect(normalizeRates(42)).toBeNull();
    expect(normalizeRates('bars')).toBeNull();
    expect(normalizeRates({ time: [1] })).toBeNull();
  });
});
