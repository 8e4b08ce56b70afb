import { z } from 'zod';
import { TIMEFRAMES } from '../config/structure.js';

const NumericLike = z.union([z.number(), z.string().min(1)]);

const BarRowSchema = z.object({
  time: NumericLike,
  open: NumericLike,
  high: NumericLike,
  low: NumericLike,
  close: NumericLike,
}).passthrough();

const BarColumnsSchema = z.object({
  time: z.array(NumericLike),
  open: z.array(NumericLike),
  high: z.array(NumericLike),
  low: z.array(NumericLike),
  close: z.array(NumericLike),
});

const TimeframeSchema = z.string()
  .transform(s => s.toUpperCase())
  .pipe(z.enum(TIMEFRAMES));

export const AnalyzeRequestSchema = z.object({
  symbol: z.string().min(1).max(20).optional(),
  timeframe: TimeframeSchema.optional(),
  bars: z.union([z.array(BarRowSchema).max(10000), BarColumnsSchema]),
  config: z.record(z.unknown()).optional(),
});

export const ProfileParamsSchema = z.object({
  style: z.enum(['scalping', 'swing']),
  timeframe: z.string().min(1).max(8),
});

export const EnvSchema = z.object({
  PORT: z.coerce.number().min(1).max(65535).optional().default(3000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional().default('info'),
});

export type AnalyzeRequest = z.infer<typeof AnalyzeRequestSchema>;
export type ProfileParams = z.infer<typeof ProfileParamsSchema>;
export type Env = z.infer<typeof EnvSchema>;
