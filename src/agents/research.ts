import fs from 'fs';
import path from 'path';
import type { Logger } from 'pino';
import { missingOrEmpty, workspacePaths, writeFileAtomic } from '../workspace';
import { defaultLogger } from '../logger';

export interface ResearchOptions {
  workspaceDir: string;
  stub?: boolean;
  logger?: Logger;
}

export const REQUIRED_RESEARCH_INPUTS = ['preferences.json', 'universe.txt', 'strategy_spec.md', 'data_sources.md'];

const STUB_BRIEF = '# Daily Market Prep (stub)\n\n- Status: inputs validated; replace this stub with real analysis.\n';

export function runResearch(opts: ResearchOptions): number {
  const logger = opts.logger ?? defaultLogger();
  const paths = workspacePaths(opts.workspaceDir);

  const missing = missingOrEmpty(REQUIRED_RESEARCH_INPUTS.map((f) => path.join(paths.inputs, f)));
  if (missing.length) {
    logger.error({ missing }, 'Research agent halted. Missing or empty files');
    return 1;
  }

  if (!fs.existsSync(paths.screener)) {
    logger.info({ file: paths.screener }, 'optional screener not found; continuing without it');
  }

  const briefPath = path.join(paths.researchDir, 'daily_brief.md');
  const watchlistPath = path.join(paths.researchDir, 'watchlist.json');
  if (opts.stub) {
    writeFileAtomic(briefPath, STUB_BRIEF);
    writeFileAtomic(watchlistPath, '[]\n');
    logger.info({ dir: paths.researchDir }, 'wrote stub research outputs');
  } else {
    logger.info({ outputs: [briefPath, watchlistPath] }, 'inputs validated; write research outputs to these paths');
  }
  return 0;
}
