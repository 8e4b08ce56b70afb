/**
 * Market Structure Engine - HTTP API
 *
 * Endpoints:
 * GET  /api/health                           - Health check
 * POST /api/structure/analyze                - Decision for a bar series
 * GET  /api/structure/profiles/:style/:tf    - Parameter preset for a style/timeframe
 */

import express from 'express';
import cors from 'cors';

import { resolveStructureConfig } from './config/structure.js';
import type { StructureConfig, StructureParams } from './config/structure.js';
import { getStructureProfile } from './config/profiles.js';
import { evaluateRates } from './engine/structureAgent.js';
import type { StructureDecision } from './engine/structureAgent.js';
import { requestIdMiddleware } from './middleware/requestId.js';
import { validateBody, validateParams } from './middleware/validate.js';
import type { Next, ReplyLike } from './middleware/validate.js';
import { AnalyzeRequestSchema, ProfileParamsSchema } from './validation/schemas.js';
import type { AnalyzeRequest, ProfileParams } from './validation/schemas.js';
import { createLogger } from './services/logger.js';

export const VERSION = '1.0.0';

const logger = createLogger('App');
const httpLogger = logger.child('HTTP');

// ═══════════════════════════════════════════════════════════════
// HANDLERS
// ═══════════════════════════════════════════════════════════════

export interface AnalyzeResponse {
  symbol: string | null;
  timeframe: string;
  decision: StructureDecision;
}

export function analyzeRequest(body: AnalyzeRequest): AnalyzeResponse {
  const config = resolveStructureConfig(body.config ?? {});
  const timeframe = body.timeframe ?? config.timeframe;
  const decision = evaluateRates(body.bars, config, timeframe);

  logger.info(`Analyzed ${body.symbol ?? 'series'} ${timeframe}: ${decision.signal}`, {
    reason: decision.reason,
    bars: Array.isArray(body.bars) ? body.bars.length : body.bars.time.length,
  });

  return { symbol: body.symbol ?? null, timeframe, decision };
}

export interface ProfileResponse {
  style: ProfileParams['style'];
  timeframe: string;
  params: StructureParams;
  config: StructureConfig;
}

export function profileFor({ style, timeframe }: ProfileParams): ProfileResponse {
  const params = getStructureProfile(style, timeframe);
  const config = resolveStructureConfig(params);
  return { style, timeframe: config.timeframe, params, config };
}

export function healthStatus() {
  return {
    status: 'ok',
    version: VERSION,
    timestamp: new Date().toISOString(),
  };
}

interface ErrorRequestLike {
  method: string;
  path: string;
}

/**
 * Malformed JSON bodies answer 400; everything else is logged and answers 500.
 */
export function errorHandler(err: unknown, req: ErrorRequestLike, res: ReplyLike, _next: Next): void {
  if (err instanceof SyntaxError) {
    httpLogger.warn(`Malformed JSON on ${req.method} ${req.path}`, { error: err.message });
    res.status(400).json({ error: 'Malformed JSON body' });
    return;
  }

  const error = err instanceof Error ? err : new Error(String(err));
  logger.error('Unhandled error', { error: error.message, stack: error.stack });
  res.status(500).json({ error: 'Internal server error' });
}

// ═══════════════════════════════════════════════════════════════
// APPLICATION
// ═══════════════════════════════════════════════════════════════

export function createApp(): express.Express {
  const app = express();

  app.use(cors());
  app.use(requestIdMiddleware);
  app.use(express.json({ limit: '5mb' }));

  // Request logging
  app.use((req, res, next) => {
    const start = Date.now();
    res.on('finish', () => {
      const duration = Date.now() - start;
      httpLogger.debug(`${req.method} ${req.path} ${res.statusCode} ${duration}ms`, { requestId: res.locals.requestId });
    });
    next();
  });

  app.get('/api/health', (_req, res) => {
    res.json(healthStatus());
  });

  app.post('/api/structure/analyze', validateBody(AnalyzeRequestSchema), (_req, res: express.Response) => {
    const body: AnalyzeRequest = res.locals.body;
    res.json(analyzeRequest(body));
  });

  app.get('/api/structure/profiles/:style/:timeframe', validateParams(ProfileParamsSchema), (_req, res: express.Response) => {
    const params: ProfileParams = res.locals.params;
    res.json(profileFor(params));
  });

  app.use((req, res) => {
    res.status(404).json({ error: `Not found: ${req.method} ${req.path}` });
  });

  app.use(errorHandler);

  return app;
}
