export interface QuoteSource {
  name: string;
  getPrice(symbol: string): Promise<number>;
}

export interface Quote {
  price: number;
  source: string;
}

export type QuoteTable = Record<string, Quote>;
