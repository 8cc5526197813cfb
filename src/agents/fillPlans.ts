import type { Logger } from 'pino';
import { SizerError } from '../errors';
import { fillPlans, plansNeedingFill, symbolsNeedingQuotes, type FillOptions } from '../planner/planFiller';
import { fetchQuotes } from '../quotes/quoteService';
import type { QuoteSource, QuoteTable } from '../quotes/types';
import { parseTradePlans, planDocument } from '../sizing/plans';
import type { PlanRecord } from '../sizing/types';
import { missingOrEmpty, readJson, workspacePaths, writeFileAtomic } from '../workspace';
import { defaultLogger } from '../logger';

export interface FillPlansOptions extends FillOptions {
  workspaceDir: string;
  sources: QuoteSource[];
  concurrency?: number;
  logger?: Logger;
}

/** Quotes the symbols whose plans lack entry/stop and rewrites trade_plans.json in place. */
export async function runFillPlans(opts: FillPlansOptions): Promise<number> {
  const logger = opts.logger ?? defaultLogger();
  const paths = workspacePaths(opts.workspaceDir);

  const missing = missingOrEmpty([paths.tradePlans]);
  if (missing.length) {
    logger.error({ missing }, 'Plan filler halted. Missing or empty files');
    return 1;
  }

  let plans: PlanRecord[];
  try {
    plans = parseTradePlans(readJson(paths.tradePlans));
  } catch (err) {
    if (err instanceof SizerError) {
      logger.error({ code: err.code }, `Plan filler halted. ${err.message}`);
      return 1;
    }
    throw err;
  }

  const pending = plansNeedingFill(plans).length;
  if (!pending) {
    logger.info({ plans: plans.length }, 'all plans already have entry and stop');
    return 0;
  }

  const symbols = symbolsNeedingQuotes(plans);
  const quotes: QuoteTable = symbols.length
    ? await fetchQuotes(symbols, opts.sources, { concurrency: opts.concurrency, logger })
    : {};
  const result = fillPlans(plans, quotes, {
    entryBufferPct: opts.entryBufferPct,
    stopBufferPct: opts.stopBufferPct,
  });
  writeFileAtomic(paths.tradePlans, JSON.stringify(planDocument(result.plans), null, 2) + '\n');
  logger.info(
    { file: paths.tradePlans, filled: result.filled, unfilled: pending - result.filled },
    'updated trade plans',
  );
  return 0;
}
