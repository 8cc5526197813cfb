export type Direction = 'long' | 'short';

export interface Limits {
  max_risk_per_trade_pct: number;
  /** Recorded in the checklist only; nothing enforces it within a run. */
  max_daily_loss_pct: number;
  max_positions: number;
  max_total_concurrent_risk_pct: number;
}

export interface TradePlan {
  symbol: string;
  entry_price?: number | null;
  stop_price?: number | null;
  /** Free-form on input; only long/short (any case) survive sizing. */
  direction: string;
  lot_size: number;
  max_shares?: number | null;
  max_notional?: number | null;
  no_short: boolean;
  unit_type: string;
  notes?: string;
  [extra: string]: unknown;
}

/** A plan record that could not be read; it is sized as a skip and written back untouched. */
export class MalformedPlan {
  constructor(
    readonly symbol: string,
    readonly problems: string[],
    readonly raw: unknown,
  ) {}
}

export type PlanRecord = TradePlan | MalformedPlan;

export interface SizedOrder {
  symbol: string;
  direction: Direction;
  entry: number;
  stop: number;
  risk_per_trade_usd: number;
  unit_size: number;
  unit_type: string;
  max_loss_if_stopped: number;
  notes: string;
}

export const AGGREGATE_MARKER = '<aggregate>';

export interface SkipRecord {
  symbol: string;
  reason: string;
}

export const SkipReason = {
  MISSING_ENTRY_OR_STOP: 'missing entry or stop',
  STOP_DISTANCE: 'stop distance <= 0',
  BAD_DIRECTION: "direction must be 'long' or 'short'",
  SHORTING_DISABLED: 'shorting disabled for instrument',
  SIZE_TOO_SMALL: 'size < 1 unit; stop too tight',
  EXCEEDS_MAX_POSITIONS: 'exceeds max_positions',
  MALFORMED: 'malformed plan',
} as const;

export interface RiskAllocation {
  planned_positions: number;
  risk_per_trade_pct: number;
  risk_per_trade_usd: number;
  max_total_risk_usd: number;
}

export interface SizingResult {
  allocation: RiskAllocation;
  orders: SizedOrder[];
  skipped: SkipRecord[];
  /** Summed worst-case loss of every plan that sized, before the position cap. */
  total_risk_usd: number;
}
