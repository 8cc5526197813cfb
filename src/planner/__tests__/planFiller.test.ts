import { MalformedPlan, type TradePlan } from '../../sizing/types';
import type { QuoteTable } from '../../quotes/types';
import { FillNote, fillPlan, fillPlans, roundPrice, symbolsNeedingQuotes } from '../planFiller';

const opts = { entryBufferPct: 0.001, stopBufferPct: 0.02 };

const quotes: QuoteTable = {
  AAA: { price: 100, source: 'alpaca' },
  BBB: { price: 50, source: 'alpaca' },
  CCC: { price: 210, source: 'binance' },
};

function plan(overrides: Partial<TradePlan> = {}): TradePlan {
  return { symbol: 'AAA', direction: 'long', lot_size: 1, no_short: false, unit_type: 'shares', ...overrides };
}

describe('fillPlan', () => {
  it('buffers a long entry above the last price and the stop below it', () => {
    const { plan: out, filled } = fillPlan(plan(), quotes, opts);
    expect(filled).toBe(true);
    expect(out.entry_price).toBe(100.1);
    expect(out.stop_price).toBe(98.1);
    expect(out.notes).toBe('entry/stop filled from last price 100 (alpaca)');
  });

  it('mirrors the offsets for a short', () => {
    const { plan: out } = fillPlan(plan({ symbol: 'BBB', direction: 'Short' }), quotes, opts);
    expect(out.entry_price).toBe(49.95);
    expect(out.stop_price).toBe(50.95);
  });

  it('anchors a missing stop on an existing entry', () => {
    const { plan: out } = fillPlan(plan({ symbol: 'CCC', entry_price: 200 }), quotes, opts);
    expect(out.entry_price).toBe(200);
    expect(out.stop_price).toBe(196);
    expect(out.notes).toBe('stop filled from last price 210 (binance)');
  });

  it('appends to an existing note', () => {
    const { plan: out } = fillPlan(plan({ notes: 'from screener' }), quotes, opts);
    expect(out.notes).toBe('from screener; entry/stop filled from last price 100 (alpaca)');
  });

  it('matches quotes case-insensitively on symbol', () => {
    const { filled } = fillPlan(plan({ symbol: 'aaa' }), quotes, opts);
    expect(filled).toBe(true);
  });

  it('leaves the plan unfilled without a quote', () => {
    const { plan: out, filled } = fillPlan(plan({ symbol: 'ZZZ' }), quotes, opts);
    expect(filled).toBe(false);
    expect(out.entry_price).toBeUndefined();
    expect(out.notes).toBe(FillNote.NO_QUOTE);
  });

  it('does not repeat a note the plan already carries', () => {
    const noted = 'from screener; no quote available; entry/stop not filled';
    expect(fillPlan(plan({ symbol: 'ZZZ', notes: noted }), quotes, opts).plan.notes).toBe(noted);
    expect(fillPlan(plan({ direction: 'flat', notes: FillNote.UNKNOWN_DIRECTION }), quotes, opts).plan.notes).toBe(
      FillNote.UNKNOWN_DIRECTION,
    );
  });

  it('leaves the plan unfilled when the direction is unknown', () => {
    const { plan: out, filled } = fillPlan(plan({ direction: 'flat' }), quotes, opts);
    expect(filled).toBe(false);
    expect(out.notes).toBe('direction unknown; entry/stop not filled');
  });

  it('passes complete plans through untouched', () => {
    const p = plan({ entry_price: 10, stop_price: 9 });
    const out = fillPlan(p, quotes, opts);
    expect(out.plan).toBe(p);
    expect(out.filled).toBe(false);
  });
});

describe('fillPlans', () => {
  it('counts filled plans and keeps order', () => {
    const result = fillPlans(
      [plan({ symbol: 'ZZZ' }), plan({ symbol: 'AAA' }), plan({ symbol: 'X', entry_price: 5, stop_price: 4 })],
      quotes,
      opts,
    );
    expect(result.filled).toBe(1);
    expect(result.plans.map((p) => p.symbol)).toEqual(['ZZZ', 'AAA', 'X']);
  });

  it('passes malformed records through untouched', () => {
    const bad = new MalformedPlan('BAD', ['lot_size: Number must be greater than 0'], { symbol: 'BAD', lot_size: 0 });
    const result = fillPlans([bad, plan()], quotes, opts);
    expect(result.plans[0]).toBe(bad);
    expect(result.filled).toBe(1);
  });
});

describe('symbolsNeedingQuotes', () => {
  it('lists symbols of plans missing entry or stop', () => {
    expect(
      symbolsNeedingQuotes([
        plan({ symbol: 'A', entry_price: 1, stop_price: 0.9 }),
        plan({ symbol: 'B', stop_price: 2 }),
        plan({ symbol: 'C', entry_price: 3, stop_price: null }),
      ]),
    ).toEqual(['B', 'C']);
  });

  it('skips plans whose direction cannot be filled and malformed records', () => {
    expect(
      symbolsNeedingQuotes([
        plan({ symbol: 'A', direction: 'flat' }),
        plan({ symbol: 'B', direction: 'SHORT' }),
        new MalformedPlan('C', ['plan: Expected object, received number'], 7),
      ]),
    ).toEqual(['B']);
  });
});

describe('roundPrice', () => {
  it('keeps four decimals below one', () => {
    expect(roundPrice(0.123456)).toBe(0.1235);
    expect(roundPrice(12.3456)).toBe(12.35);
  });
});
