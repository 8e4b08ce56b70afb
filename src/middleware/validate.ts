import type { ZodType, ZodTypeDef } from 'zod';
import { createLogger } from '../services/logger.js';

const logger = createLogger('Validation');

type Target = 'body' | 'params';

export interface RequestLike {
  path: string;
  body?: unknown;
  params?: unknown;
}

export interface ReplyLike {
  locals: Record<string, unknown>;
  status(code: number): ReplyLike;
  json(body: unknown): unknown;
}

export type Next = (err?: unknown) => void;

export interface ValidationIssue {
  field: string;
  message: string;
}

const ERROR_MESSAGES: Record<Target, string> = {
  body: 'Validation failed',
  params: 'Invalid path parameters',
};

/**
 * Parsed values land in `res.locals[target]`; the raw request is left as is.
 */
function validate<T>(target: Target, schema: ZodType<T, ZodTypeDef, unknown>) {
  return (req: RequestLike, res: ReplyLike, next: Next): void => {
    const result = schema.safeParse(req[target]);
    if (result.success) {
      res.locals[target] = result.data;
      next();
      return;
    }

    const issues: ValidationIssue[] = result.error.issues.map(issue => ({
      field: issue.path.join('.'),
      message: issue.message,
    }));
    logger.warn(`${target} validation failed`, { path: req.path, issues });
    res.status(400).json({ error: ERROR_MESSAGES[target], issues });
  };
}

export function validateBody<T>(schema: ZodType<T, ZodTypeDef, unknown>) {
  return validate('body', schema);
}

export function validateParams<T>(schema: ZodType<T, ZodTypeDef, unknown>) {
  return validate('params', schema);
}
