#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import pino from 'pino';
import { runFillPlans } from './agents/fillPlans';
import { runResearch } from './agents/research';
import { runSizing } from './agents/sizing';
import { loadConfig } from './config';
import { createQuoteSources } from './quotes/quoteService';

const logger = pino({ level: process.env.LOG_LEVEL ?? 'info' });

const program = new Command();

program.name('position-sizer').description('Research input checks, plan filling and risk-bounded position sizing.');

program
  .command('research')
  .description('validate inputs for the research step')
  .option('--stub', 'write stub outputs after validation', false)
  .action((options: { stub: boolean }) => {
    const cfg = loadConfig();
    process.exitCode = runResearch({ workspaceDir: cfg.workspaceDir, stub: options.stub, logger });
  });

program
  .command('fill-plans')
  .description('fill missing entry/stop prices in trade_plans.json from last-price quotes')
  .action(async () => {
    const cfg = loadConfig();
    process.exitCode = await runFillPlans({
      workspaceDir: cfg.workspaceDir,
      sources: createQuoteSources(cfg),
      concurrency: cfg.PRICE_CONCURRENCY,
      entryBufferPct: cfg.ENTRY_BUFFER_PCT,
      stopBufferPct: cfg.STOP_BUFFER_PCT,
      logger,
    });
  });

program
  .command('sizing')
  .description('compute position sizes from trade_plans.json')
  .option('--equity <usd>', 'account equity in USD (required)')
  .action((options: { equity?: string }) => {
    const cfg = loadConfig();
    process.exitCode = runSizing({ workspaceDir: cfg.workspaceDir, equity: options.equity, logger });
  });

async function main(): Promise<void> {
  await program.parseAsync(process.argv);
}

main().catch((err) => {
  logger.error({ err }, 'fatal error');
  process.exit(1);
});
