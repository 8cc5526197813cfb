import path from 'path';
import type { Logger } from 'pino';
import { InputShapeError, SizerError } from '../errors';
import { sizeTradePlans } from '../sizing/engine';
import { validateLimits } from '../sizing/limits';
import { parseTradePlans } from '../sizing/plans';
import { buildOrderSheet, buildRiskChecklist, formatSkip } from '../sizing/report';
import { missingOrEmpty, readJson, workspacePaths, writeFileAtomic } from '../workspace';
import { defaultLogger } from '../logger';

export interface SizingOptions {
  workspaceDir: string;
  equity?: string | number;
  logger?: Logger;
}

export function parseEquity(raw: string | number | undefined): number {
  if (raw === undefined || (typeof raw === 'string' && raw.trim() === '')) {
    throw new InputShapeError('Provide account equity via --equity.');
  }
  const equity = typeof raw === 'number' ? raw : Number(raw.trim());
  if (!Number.isFinite(equity)) {
    throw new InputShapeError(`equity must be numeric, got '${raw}'`);
  }
  if (equity <= 0) {
    throw new InputShapeError(`equity must be positive, got ${equity}`);
  }
  return equity;
}

/** Reads plans and limits from the workspace, sizes them and writes the order sheet and checklist. */
export function runSizing(opts: SizingOptions): number {
  const logger = opts.logger ?? defaultLogger();
  const paths = workspacePaths(opts.workspaceDir);

  const missing = missingOrEmpty([paths.tradePlans]);
  if (missing.length) {
    logger.error({ missing }, 'Sizing agent halted. Missing or empty files');
    return 1;
  }

  try {
    const equity = parseEquity(opts.equity);
    const limits = validateLimits(readJson(paths.preferences));
    const plans = parseTradePlans(readJson(paths.tradePlans));

    const result = sizeTradePlans(equity, limits, plans);
    logger.info(
      {
        plans: plans.length,
        riskPerTradeUsd: result.allocation.risk_per_trade_usd,
        maxTotalRiskUsd: result.allocation.max_total_risk_usd,
        orders: result.orders.length,
        skipped: result.skipped.length,
      },
      'sizing complete',
    );

    const orderSheetPath = path.join(paths.sizingDir, 'order_sheet.json');
    const checklistPath = path.join(paths.sizingDir, 'risk_checklist.md');
    writeFileAtomic(orderSheetPath, buildOrderSheet(result.orders));
    writeFileAtomic(checklistPath, buildRiskChecklist(equity, limits, result.skipped));
    logger.info({ file: orderSheetPath }, 'wrote order sheet');
    logger.info({ file: checklistPath }, 'wrote risk checklist');

    for (const s of result.skipped) logger.warn({ symbol: s.symbol }, `skipped ${formatSkip(s)}`);
    return 0;
  } catch (err) {
    if (err instanceof SizerError) {
      logger.error({ code: err.code }, `Sizing agent halted. ${err.message}`);
      return 1;
    }
    throw err;
  }
}
