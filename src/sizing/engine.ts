import { InputShapeError } from '../errors';
import {
  AGGREGATE_MARKER,
  MalformedPlan,
  SkipReason,
  type Direction,
  type Limits,
  type PlanRecord,
  type RiskAllocation,
  type SizedOrder,
  type SizingResult,
  type SkipRecord,
  type TradePlan,
} from './types';

export type PlanOutcome =
  | { kind: 'sized'; order: SizedOrder; maxLossUsd: number }
  | { kind: 'skipped'; skip: SkipRecord };

function round2(x: number): number {
  return Math.round(x * 100) / 100;
}

function alignToLot(units: number, lotSize: number): number {
  return Math.floor(units / lotSize) * lotSize;
}

function parseDirection(raw: string): Direction | null {
  const d = raw.toLowerCase();
  return d === 'long' || d === 'short' ? d : null;
}

/**
 * Per-trade budget is the tighter of the per-trade cap and an even split of
 * the aggregate cap over every input plan, including plans that will be
 * skipped later. Budget freed by a skip is not handed to the others.
 */
export function allocateRisk(equity: number, limits: Limits, planCount: number): RiskAllocation {
  const plannedPositions = Math.max(1, planCount);
  const riskPerTradePct = Math.min(
    limits.max_risk_per_trade_pct,
    limits.max_total_concurrent_risk_pct / plannedPositions,
  );
  return {
    planned_positions: plannedPositions,
    risk_per_trade_pct: riskPerTradePct,
    risk_per_trade_usd: equity * riskPerTradePct,
    max_total_risk_usd: equity * limits.max_total_concurrent_risk_pct,
  };
}

/** A non-positive notional cap means "not set". */
export function clampToNotional(units: number, entry: number, maxNotional: number): number {
  if (maxNotional <= 0) return units;
  const maxUnits = Math.floor(maxNotional / entry);
  return Math.max(0, Math.min(units, maxUnits));
}

/**
 * Sizes one plan. Exactly one outcome per plan; the first failing check
 * decides the skip reason.
 */
export function sizePlan(plan: TradePlan, riskPerTradeUsd: number): PlanOutcome {
  const skip = (reason: string): PlanOutcome => ({ kind: 'skipped', skip: { symbol: plan.symbol, reason } });

  const entry = plan.entry_price;
  const stop = plan.stop_price;
  if (entry == null || stop == null) return skip(SkipReason.MISSING_ENTRY_OR_STOP);

  const stopDistance = Math.abs(entry - stop);
  if (stopDistance <= 0) return skip(SkipReason.STOP_DISTANCE);

  const direction = parseDirection(plan.direction);
  if (!direction) return skip(SkipReason.BAD_DIRECTION);
  if (direction === 'short' && plan.no_short) return skip(SkipReason.SHORTING_DISABLED);

  // round down only: rounding up would overshoot the risk budget
  let units = alignToLot(riskPerTradeUsd / stopDistance, plan.lot_size);
  if (plan.max_shares != null) {
    units = Math.min(units, Math.trunc(plan.max_shares));
  }
  if (plan.max_notional != null) {
    units = clampToNotional(units, entry, plan.max_notional);
  }
  units = alignToLot(units, plan.lot_size);

  if (units < 1) return skip(SkipReason.SIZE_TOO_SMALL);

  const unitSize = Math.trunc(units);
  const maxLossUsd = unitSize * stopDistance;
  return {
    kind: 'sized',
    maxLossUsd,
    order: {
      symbol: plan.symbol,
      direction,
      entry,
      stop,
      risk_per_trade_usd: round2(riskPerTradeUsd),
      unit_size: unitSize,
      unit_type: plan.unit_type,
      max_loss_if_stopped: round2(maxLossUsd),
      notes: plan.notes ?? '',
    },
  };
}

function skipMalformed(plan: MalformedPlan): PlanOutcome {
  return { kind: 'skipped', skip: { symbol: plan.symbol, reason: `${SkipReason.MALFORMED}: ${plan.problems.join('; ')}` } };
}

export interface PortfolioCapInput {
  orders: SizedOrder[];
  skipped: SkipRecord[];
  totalRiskUsd: number;
  maxPositions: number;
  maxTotalRiskUsd: number;
}

/**
 * Second pass over the already-sized set. Orders past max_positions move to
 * the skip list (earlier plans win). The aggregate risk check only appends an
 * advisory record; it never resizes or drops an order.
 */
export function capPortfolio(input: PortfolioCapInput): { orders: SizedOrder[]; skipped: SkipRecord[] } {
  const skipped = [...input.skipped];
  let orders = [...input.orders];

  const cap = Math.max(0, input.maxPositions);
  if (orders.length > cap) {
    const extra = orders.slice(cap);
    orders = orders.slice(0, cap);
    for (const o of extra) skipped.push({ symbol: o.symbol, reason: SkipReason.EXCEEDS_MAX_POSITIONS });
  }

  if (input.totalRiskUsd > input.maxTotalRiskUsd) {
    skipped.push({
      symbol: AGGREGATE_MARKER,
      reason: `total risk ${input.totalRiskUsd.toFixed(2)} exceeds limit ${input.maxTotalRiskUsd.toFixed(2)}`,
    });
  }
  return { orders, skipped };
}

/**
 * Pure sizing pass: (equity, limits, plans) -> orders + skips. Throws only on
 * an unusable equity value; every plan-level problem becomes a skip record.
 */
export function sizeTradePlans(equity: number, limits: Limits, plans: PlanRecord[]): SizingResult {
  if (!Number.isFinite(equity)) {
    throw new InputShapeError('equity must be a finite number');
  }
  const allocation = allocateRisk(equity, limits, plans.length);

  const sized: SizedOrder[] = [];
  const skipped: SkipRecord[] = [];
  let totalRiskUsd = 0;
  for (const plan of plans) {
    const outcome =
      plan instanceof MalformedPlan ? skipMalformed(plan) : sizePlan(plan, allocation.risk_per_trade_usd);
    if (outcome.kind === 'skipped') {
      skipped.push(outcome.skip);
      continue;
    }
    sized.push(outcome.order);
    totalRiskUsd += outcome.maxLossUsd;
  }

  const capped = capPortfolio({
    orders: sized,
    skipped,
    totalRiskUsd,
    maxPositions: limits.max_positions,
    maxTotalRiskUsd: allocation.max_total_risk_usd,
  });
  return { allocation, orders: capped.orders, skipped: capped.skipped, total_risk_usd: totalRiskUsd };
}
