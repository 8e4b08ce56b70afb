import { describe, it, expect } from 'vitest';
import { AnalyzeRequestSchema, EnvSchema, ProfileParamsSchema } from '../schemas.js';

const row = { time: 60, open: 1, high: 2, low: 0.5, close: 1.5 };

describe('AnalyzeRequestSchema', () => {
  it('accepts row bars and normalises the timeframe', () => {
    const parsed = AnalyzeRequestSchema.parse({ symbol: 'EURUSD', timeframe: 'h1', bars: [row] });
    expect(parsed.timeframe).toBe('H1');
  });

  it('accepts column bars', () => {
    const parsed = AnalyzeRequestSchema.safeParse({
      bars: { time: [60], open: [1], high: [2], low: [0.5], close: ['1.5'] },
    });
    expect(parsed.success).toBe(true);
  });

  it('rejects unknown timeframes', () => {
    expect(AnalyzeRequestSchema.safeParse({ timeframe: 'W1', bars: [row] }).success).toBe(false);
  });

  it('rejects rows without a close', () => {
    const { close: _close, ...partial } = row;
    expect(AnalyzeRequestSchema.safeParse({ bars: [partial] }).success).toBe(false);
  });
});

describe('ProfileParamsSchema', () => {
  it('only knows the two styles', () => {
    expect(ProfileParamsSchema.safeParse({ style: 'swing', timeframe: 'H4' }).success).toBe(true);
    expect(ProfileParamsSchema.safeParse({ style: 'position', timeframe: 'H4' }).success).toBe(false);
  });
});

describe('EnvSchema', () => {
  it('defaults the port and log level', () => {
    expect(EnvSchema.parse({})).toEqual({ PORT: 3000, LOG_LEVEL: 'info' });
  });

  it('coerces the port', () => {
    expect(EnvSchema.parse({ PORT: '8080', LOG_LEVEL: 'debug' })).toEqual({ PORT: 8080, LOG_LEVEL: 'debug' });
  });
});
