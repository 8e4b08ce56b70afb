import { describe, it, expect, vi } from 'vitest';
import { runSmcVote } from '../smcVote.js';
import { resolveStructureConfig } from '../../config/structure.js';
import { makeBars } from '../../__tests__/bars.js';

vi.mock('../../modules/smartMoney/index.js', async importOriginal => {
  const actual = await importOriginal<typeof import('../../modules/smartMoney/index.js')>();
  return {
    ...actual,
    detectFvg: () => {
      throw new Error('detector exploded');
    },
  };
});

describe('runSmcVote with a failing detector', () => {
  const bars = makeBars(Array.from({ length: 30 }, (_, i) => ({ high: 101 + (i % 5), low: 99 + (i % 5) })));

  it('records the group and keeps voting with the others', () => {
    const vote = runSmcVote(bars, resolveStructureConfig());

    expect(vote.events.fvg).toEqual([]);
    expect(vote.events.bos).toBeDefined();
    expect(vote.meta).toMatchObject({ failed: ['fvg'] });
  });
});
