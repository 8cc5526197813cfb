import { z } from 'zod';
import { InputShapeError } from '../errors';
import { isRecord, numeric } from './limits';
import { MalformedPlan, type PlanRecord, type TradePlan } from './types';

const optionalPrice = z.number().finite().nullish();

// loose truthiness for hand-edited flags: 1, "yes" and [x] count, 0, "" and [] do not
function truthy(value: unknown): boolean {
  if (Array.isArray(value)) return value.length > 0;
  if (isRecord(value)) return Object.keys(value).length > 0;
  return Boolean(value);
}

export const tradePlanSchema = z
  .object({
    symbol: z
      .union([z.string(), z.number().transform((n) => String(n))])
      .nullish()
      .transform((s) => s ?? ''),
    entry_price: optionalPrice,
    stop_price: optionalPrice,
    direction: z.string().default(''),
    lot_size: z.number().int().positive().default(1),
    max_shares: numeric.nullish(),
    max_notional: numeric.nullish(),
    no_short: z.unknown().transform(truthy),
    unit_type: z.string().default('shares'),
    notes: z.string().optional(),
  })
  .passthrough();

function recordSymbol(item: unknown, index: number): string {
  if (isRecord(item) && (typeof item.symbol === 'string' || typeof item.symbol === 'number')) {
    return String(item.symbol);
  }
  return `plan[${index}]`;
}

/**
 * Reads a decoded trade_plans.json document. Only a document that is not a
 * list is fatal; a record that cannot be read as a plan comes back as a
 * MalformedPlan so the sizer can skip it and carry on with the rest.
 */
export function parseTradePlans(raw: unknown): PlanRecord[] {
  if (!Array.isArray(raw)) {
    throw new InputShapeError('trade_plans.json must be a list of plans.');
  }
  return raw.map((item: unknown, i): PlanRecord => {
    const parsed = tradePlanSchema.safeParse(item);
    if (parsed.success) {
      const plan: TradePlan = parsed.data;
      return plan;
    }
    const problems = parsed.error.issues.map((issue) => {
      const field = issue.path.length ? issue.path.join('.') : 'plan';
      return `${field}: ${issue.message}`;
    });
    return new MalformedPlan(recordSymbol(item, i), problems, item);
  });
}

/** The JSON document to write back: parsed plans as read, malformed records verbatim. */
export function planDocument(records: PlanRecord[]): unknown[] {
  return records.map((r) => (r instanceof MalformedPlan ? r.raw : r));
}
