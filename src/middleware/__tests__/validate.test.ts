import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { validateBody, validateParams } from '../validate.js';
import type { ReplyLike } from '../validate.js';

class FakeReply implements ReplyLike {
  locals: Record<string, unknown> = {};
  statusCode = 200;
  body: unknown = undefined;

  status(code: number): this {
    this.statusCode = code;
    return this;
  }

  json(body: unknown): this {
    this.body = body;
    return this;
  }
}

const schema = z.object({ count: z.coerce.number().int() });

describe('validateBody', () => {
  it('stores the parsed body and continues', () => {
    const res = new FakeReply();
    const calls: unknown[] = [];

    validateBody(schema)({ path: '/x', body: { count: '3' } }, res, err => calls.push(err));

    expect(calls).toEqual([undefined]);
    expect(res.locals.body).toEqual({ count: 3 });
    expect(res.statusCode).toBe(200);
  });

  it('answers 400 with the issues', () => {
    const res = new FakeReply();
    let called = false;

    validateBody(schema)({ path: '/x', body: { count: 'many' } }, res, () => {
      called = true;
    });

    expect(called).toBe(false);
    expect(res.statusCode).toBe(400);
    expect(res.body).toEqual({
      error: 'Validation failed',
      issues: [{ field: 'count', message: 'Expected number, received nan' }],
    });
  });
});

describe('validateParams', () => {
  it('labels path parameter failures', () => {
    const res = new FakeReply();
    validateParams(z.object({ style: z.enum(['swing']) }))({ path: '/x', params: { style: 'scalp' } }, res, () => {});

    expect(res.statusCode).toBe(400);
    expect(res.body).toMatchObject({ error: 'Invalid path parameters', issues: [{ field: 'style' }] });
  });
});
