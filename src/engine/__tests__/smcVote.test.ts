import { describe, it, expect } from 'vitest';
import { DOMINANCE_RATIO, decideVote, runSmcVote, scoreEvents, serializeEvents } from '../smcVote.js';
import type { SmcEvents } from '../smcVote.js';
import { resolveStructureConfig, SMC_WEIGHTS } from '../../config/structure.js';
import type { TradeDirection } from '../../modules/smartMoney/types.js';
import { makeBars } from '../../__tests__/bars.js';

function sampleEvents(bull: TradeDirection, bear: TradeDirection): SmcEvents {
  return {
    bos: [{ pattern: 'BOS', direction: bull, level: 100, start_idx: 4, end_idx: null, meta: { broken_high: 100 } }],
    fvg: [{
      pattern: 'FVG', direction: bear, level: 99, start_idx: 5, end_idx: 7,
      meta: { gap_low: 98.5, gap_high: 99.5, width: 1 },
    }],
    inducement: [{
      pattern: 'INDUCEMENT', direction: bull, level: 95, start_idx: 8, end_idx: 9,
      meta: { liquidity_level: 95, sweep_price: 94.8, recovery_close: 95.4, touches: 2, strength: 1 },
    }],
  };
}

describe('scoreEvents', () => {
  it('sums the weights per direction', () => {
    expect(scoreEvents(sampleEvents('LONG', 'SHORT'), SMC_WEIGHTS)).toEqual({ long: 4.5, short: 0.75 });
  });

  it('swaps the scores when every direction is flipped', () => {
    const flipped = scoreEvents(sampleEvents('SHORT', 'LONG'), SMC_WEIGHTS);
    expect(flipped).toEqual({ long: 0.75, short: 4.5 });
  });

  it('ignores undirected events', () => {
    const events: SmcEvents = {
      eqh: [{ pattern: 'EQH', direction: null, level: 1, start_idx: 0, end_idx: 1, meta: { count: 2 } }],
    };
    expect(scoreEvents(events, SMC_WEIGHTS)).toEqual({ long: 0, short: 0 });
  });
});

describe('decideVote', () => {
  it(`needs a ${DOMINANCE_RATIO}x lead`, () => {
    expect(decideVote(3, 2)).toBe('LONG');
    expect(decideVote(2, 3)).toBe('SHORT');
    expect(decideVote(2.4, 2)).toBe('WAIT');
    expect(decideVote(2, 2.4)).toBe('WAIT');
  });

  it('waits without any score', () => {
    expect(decideVote(0, 0)).toBe('WAIT');
  });

  it('lets a lone side win', () => {
    expect(decideVote(0.5, 0)).toBe('LONG');
    expect(decideVote(0, 0.5)).toBe('SHORT');
  });
});

describe('runSmcVote', () => {
  const bars = makeBars(Array.from({ length: 40 }, (_, i) => ({
    high: 101 + Math.sin(i / 3),
    low: 99 + Math.sin(i / 3),
  })));

  it('waits with empty meta when disabled', () => {
    const config = resolveStructureConfig({ smc_enabled: false });
    expect(runSmcVote(bars, config)).toEqual({ signal: 'WAIT', events: {}, meta: {} });
  });

  it('waits with empty meta without bars', () => {
    expect(runSmcVote([], resolveStructureConfig())).toEqual({ signal: 'WAIT', events: {}, meta: {} });
  });

  it('runs every detector group', () => {
    const vote = runSmcVote(bars, resolveStructureConfig({ swing_window: 6 }));

    expect(Object.keys(vote.events).sort()).toEqual([
      'bos', 'breaker_blocks', 'choch', 'eqh', 'eql', 'fvg',
      'inducement', 'liquidity_sweep', 'mitigation_block', 'order_blocks',
    ]);
    expect(vote.meta).toMatchObject({ failed: [] });
  });

  it('is deterministic', () => {
    const config = resolveStructureConfig({ swing_window: 6 });
    expect(runSmcVote(bars, config)).toEqual(runSmcVote(bars, config));
  });

  it('zeroes a group through its weight', () => {
    const config = resolveStructureConfig({ smc_weights: { bos: 0, choch: 0 } });
    const scores = scoreEvents(sampleEvents('LONG', 'SHORT'), config.weights);
    expect(scores).toEqual({ long: 2.5, short: 0.75 });
  });
});

describe('serializeEvents', () => {
  it('keeps the wire fields and copies meta', () => {
    const events = sampleEvents('LONG', 'SHORT');
    const wire = serializeEvents(events);

    expect(wire.bos).toEqual([{
      pattern: 'BOS', direction: 'LONG', level: 100, start_idx: 4, end_idx: null, meta: { broken_high: 100 },
    }]);
    expect(wire.fvg?.[0].meta).not.toBe(events.fvg?.[0].meta);
    expect(wire.eqh).toBeUndefined();
  });
});
