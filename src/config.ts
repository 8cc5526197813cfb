import path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors';

const configSchema = z.object({
  WORKSPACE_DIR: z.string().min(1).optional(),
  LOG_LEVEL: z.string().default('info'),
  QUOTE_SOURCES: z.string().default('alpaca,binance'),
  ALPACA_API_KEY_ID: z.string().optional(),
  ALPACA_API_SECRET_KEY: z.string().optional(),
  ALPACA_DATA_BASE_URL: z.string().url().default('https://data.alpaca.markets'),
  BINANCE_BASE_URL: z.string().url().default('https://api.binance.com'),
  QUOTE_TIMEOUT_MS: z.coerce.number().int().positive().default(8000),
  PRICE_CONCURRENCY: z.coerce.number().int().positive().default(8),
  ENTRY_BUFFER_PCT: z.coerce.number().nonnegative().default(0.001),
  STOP_BUFFER_PCT: z.coerce.number().positive().default(0.02),
});

export type QuoteSourceName = 'alpaca' | 'binance';

export type AppConfig = z.infer<typeof configSchema> & {
  workspaceDir: string;
  quoteSourceList: QuoteSourceName[];
};

function isQuoteSourceName(s: string): s is QuoteSourceName {
  return s === 'alpaca' || s === 'binance';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${parsed.error.toString()}`);
  }
  const cfg = parsed.data;
  const names = Array.from(
    new Set(
      cfg.QUOTE_SOURCES.split(',')
        .map((s) => s.trim().toLowerCase())
        .filter(Boolean),
    ),
  );
  const unknown = names.filter((n) => !isQuoteSourceName(n));
  if (unknown.length) {
    throw new ConfigError(`Invalid configuration: unknown quote sources: ${unknown.join(', ')}`, ['QUOTE_SOURCES']);
  }
  return {
    ...cfg,
    workspaceDir: path.resolve(cfg.WORKSPACE_DIR ?? process.cwd()),
    quoteSourceList: names.filter(isQuoteSourceName),
  };
}
