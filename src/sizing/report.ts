import type { Limits, SizedOrder, SkipRecord } from './types';

function pct(x: number): string {
  return `${(x * 100).toFixed(2)}%`;
}

export function formatSkip(s: SkipRecord): string {
  return `${s.symbol}: ${s.reason}`;
}

export function buildOrderSheet(orders: SizedOrder[]): string {
  return JSON.stringify(orders, null, 2);
}

export function buildRiskChecklist(equity: number, limits: Limits, skipped: SkipRecord[]): string {
  const lines = [
    '# Risk Checklist',
    `- Account equity: ${equity}`,
    `- Max risk per trade: ${pct(limits.max_risk_per_trade_pct)}`,
    `- Max daily loss: ${pct(limits.max_daily_loss_pct)}`,
    `- Max positions: ${limits.max_positions}`,
    `- Max total concurrent risk: ${pct(limits.max_total_concurrent_risk_pct)}`,
    '',
    '## Skipped / Notes',
  ];
  if (skipped.length) {
    for (const s of skipped) lines.push(`- ${formatSkip(s)}`);
  } else {
    lines.push('- None');
  }
  return lines.join('\n') + '\n';
}
