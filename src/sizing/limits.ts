import { z } from 'zod';
import { ConfigError, InputShapeError } from '../errors';
import type { Limits } from './types';

export const REQUIRED_LIMIT_KEYS = [
  'max_risk_per_trade_pct',
  'max_daily_loss_pct',
  'max_positions',
  'max_total_concurrent_risk_pct',
] as const;

// numbers or numeric strings; null, booleans and blanks are rejected
export const numeric = z.union([z.number(), z.string().trim().min(1)]).pipe(z.coerce.number().finite());

const limitsSchema = z.object({
  max_risk_per_trade_pct: numeric,
  max_daily_loss_pct: numeric,
  max_positions: numeric.transform((n) => Math.trunc(n)),
  max_total_concurrent_risk_pct: numeric,
});

export function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === 'object' && x !== null && !Array.isArray(x);
}

/**
 * Checks the preferences mapping for the four risk limits and coerces them.
 * Ranges are deliberately not checked: a zero or negative limit is passed on
 * and simply produces zero-sized risk downstream.
 */
export function validateLimits(prefs: unknown): Limits {
  if (!isRecord(prefs)) {
    throw new InputShapeError('preferences.json must be a JSON object');
  }
  const missing = REQUIRED_LIMIT_KEYS.filter((k) => !Object.hasOwn(prefs, k));
  if (missing.length) {
    throw new ConfigError(`preferences.json missing keys: ${missing.join(', ')}`, [...missing]);
  }
  const parsed = limitsSchema.safeParse(prefs);
  if (!parsed.success) {
    const keys = Array.from(new Set(parsed.error.issues.map((i) => String(i.path[0]))));
    throw new ConfigError(`preferences.json has non-numeric values for: ${keys.join(', ')}`, keys);
  }
  return parsed.data;
}
