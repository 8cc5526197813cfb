import type { Logger } from 'pino';
import type { AppConfig } from '../config';
import { createAlpacaQuoteSource } from '../exchanges/alpaca';
import { createBinanceQuoteSource } from '../exchanges/binance';
import { defaultLogger } from '../logger';
import type { Quote, QuoteSource, QuoteTable } from './types';

export function createQuoteSources(cfg: AppConfig): QuoteSource[] {
  return cfg.quoteSourceList.map((name) => {
    if (name === 'alpaca') {
      return createAlpacaQuoteSource({
        baseURL: cfg.ALPACA_DATA_BASE_URL,
        keyId: cfg.ALPACA_API_KEY_ID,
        secretKey: cfg.ALPACA_API_SECRET_KEY,
        timeoutMs: cfg.QUOTE_TIMEOUT_MS,
      });
    }
    return createBinanceQuoteSource(cfg.BINANCE_BASE_URL, cfg.QUOTE_TIMEOUT_MS);
  });
}

export interface FetchQuotesOptions {
  concurrency?: number;
  logger?: Logger;
}

async function quoteOne(symbol: string, sources: QuoteSource[], logger: Logger): Promise<Quote | null> {
  for (const source of sources) {
    try {
      const price = await source.getPrice(symbol);
      return { price, source: source.name };
    } catch (err) {
      logger.warn({ err, symbol, source: source.name }, 'quote failed');
    }
  }
  return null;
}

/**
 * Best-effort last prices. Sources are tried in order per symbol, one pass,
 * no retries; symbols nobody can price are left out of the table.
 */
export async function fetchQuotes(
  symbols: string[],
  sources: QuoteSource[],
  opts: FetchQuotesOptions = {},
): Promise<QuoteTable> {
  const logger = opts.logger ?? defaultLogger();
  const concurrency = Math.max(1, opts.concurrency ?? 8);
  const unique = Array.from(new Set(symbols.map((s) => s.trim().toUpperCase()).filter(Boolean)));

  const table: QuoteTable = {};
  for (let i = 0; i < unique.length; i += concurrency) {
    const batch = unique.slice(i, i + concurrency);
    const quotes = await Promise.all(batch.map(async (symbol) => ({ symbol, quote: await quoteOne(symbol, sources, logger) })));
    for (const { symbol, quote } of quotes) {
      if (quote) {
        table[symbol] = quote;
      } else {
        logger.warn({ symbol }, 'no quote from any source');
      }
    }
  }
  return table;
}
