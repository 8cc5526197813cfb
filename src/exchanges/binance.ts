import axios from 'axios';
import type { QuoteSource } from '../quotes/types';

export const BINANCE_PUBLIC_BASE = 'https://api.binance.com';

export async function getPrice(symbol: string, baseURL = BINANCE_PUBLIC_BASE, timeoutMs = 5000): Promise<number> {
  const res = await axios.get(`${baseURL}/api/v3/ticker/price`, {
    params: { symbol },
    timeout: timeoutMs,
  });
  const price = Number(res.data.price);
  if (!Number.isFinite(price) || price <= 0) throw new Error(`Invalid price for ${symbol}`);
  return price;
}

export function createBinanceQuoteSource(baseURL: string, timeoutMs: number): QuoteSource {
  return {
    name: 'binance',
    getPrice: (symbol) => getPrice(symbol, baseURL, timeoutMs),
  };
}
