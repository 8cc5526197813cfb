import axios from 'axios';
import type { QuoteSource } from '../quotes/types';

export interface AlpacaDataOptions {
  baseURL: string;
  keyId?: string;
  secretKey?: string;
  timeoutMs: number;
}

export async function getLatestPrice(symbol: string, opts: AlpacaDataOptions): Promise<number> {
  const res = await axios.get(`${opts.baseURL}/v2/stocks/${encodeURIComponent(symbol)}/trades/latest`, {
    headers: {
      'APCA-API-KEY-ID': opts.keyId ?? '',
      'APCA-API-SECRET-KEY': opts.secretKey ?? '',
    },
    timeout: opts.timeoutMs,
  });
  const price = Number(res?.data?.trade?.p);
  if (!Number.isFinite(price) || price <= 0) throw new Error(`Invalid latest price for ${symbol}`);
  return price;
}

export function createAlpacaQuoteSource(opts: AlpacaDataOptions): QuoteSource {
  return {
    name: 'alpaca',
    getPrice: (symbol) => getLatestPrice(symbol, opts),
  };
}
