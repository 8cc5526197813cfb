import type { QuoteTable } from '../quotes/types';
import { MalformedPlan, type PlanRecord, type TradePlan } from '../sizing/types';

export interface FillOptions {
  /** Entry sits this fraction beyond the last price, in the trade's direction. */
  entryBufferPct: number;
  /** Stop sits this fraction away from the entry, against the trade. */
  stopBufferPct: number;
}

export interface FillResult {
  plans: PlanRecord[];
  filled: number;
}

export const FillNote = {
  UNKNOWN_DIRECTION: 'direction unknown; entry/stop not filled',
  NO_QUOTE: 'no quote available; entry/stop not filled',
} as const;

export function roundPrice(x: number): number {
  return x >= 1 ? Math.round(x * 100) / 100 : Math.round(x * 10000) / 10000;
}

// notes survive rewrites of the plans file, so the same note is never added twice
function appendNote(existing: string | undefined, note: string): string {
  if (!existing) return note;
  return existing.includes(note) ? existing : `${existing}; ${note}`;
}

function tradeDirection(plan: TradePlan): 'long' | 'short' | null {
  const d = plan.direction.toLowerCase();
  return d === 'long' || d === 'short' ? d : null;
}

function needsFill(plan: PlanRecord): plan is TradePlan {
  return !(plan instanceof MalformedPlan) && (plan.entry_price == null || plan.stop_price == null);
}

export function fillPlan(plan: TradePlan, quotes: QuoteTable, opts: FillOptions): { plan: TradePlan; filled: boolean } {
  const needEntry = plan.entry_price == null;
  const needStop = plan.stop_price == null;
  if (!needEntry && !needStop) return { plan, filled: false };

  const direction = tradeDirection(plan);
  if (!direction) {
    return { plan: { ...plan, notes: appendNote(plan.notes, FillNote.UNKNOWN_DIRECTION) }, filled: false };
  }
  const quote = quotes[plan.symbol.trim().toUpperCase()];
  if (!quote) {
    return { plan: { ...plan, notes: appendNote(plan.notes, FillNote.NO_QUOTE) }, filled: false };
  }

  const sign = direction === 'long' ? 1 : -1;
  const entry = plan.entry_price ?? roundPrice(quote.price * (1 + sign * opts.entryBufferPct));
  const stop = plan.stop_price ?? roundPrice(entry * (1 - sign * opts.stopBufferPct));

  const fields = [needEntry ? 'entry' : null, needStop ? 'stop' : null].filter(Boolean).join('/');
  const note = `${fields} filled from last price ${quote.price} (${quote.source})`;
  return {
    plan: { ...plan, entry_price: entry, stop_price: stop, notes: appendNote(plan.notes, note) },
    filled: true,
  };
}

/** Fills missing entry/stop prices from last-price quotes. Never sizes anything. */
export function fillPlans(plans: PlanRecord[], quotes: QuoteTable, opts: FillOptions): FillResult {
  let filled = 0;
  const out = plans.map((p): PlanRecord => {
    if (p instanceof MalformedPlan) return p;
    const r = fillPlan(p, quotes, opts);
    if (r.filled) filled++;
    return r.plan;
  });
  return { plans: out, filled };
}

export function plansNeedingFill(plans: PlanRecord[]): TradePlan[] {
  return plans.filter(needsFill);
}

/** Symbols worth quoting: plans missing a price whose direction says which way to buffer. */
export function symbolsNeedingQuotes(plans: PlanRecord[]): string[] {
  return plansNeedingFill(plans)
    .filter((p) => tradeDirection(p) !== null)
    .map((p) => p.symbol);
}
