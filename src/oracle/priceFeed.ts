import type { AssetId } from '../loans/types.js';

/** Price of one unit of `base` in units of `quote`, scaled by 10^decimals. */
export type PriceQuote = {
  price: bigint;
  decimals: number;
};

export interface PriceFeed {
  /** `null` when the pair is not quoted. */
  getPrice(base: AssetId, quote: AssetId): PriceQuote | null;
}

export type StaticPrice = {
  base: AssetId;
  quote: AssetId;
  price: bigint;
  decimals: number;
};

const pairKey = (base: AssetId, quote: AssetId) => `${base}/${quote}`;

/** Fixed quotes, set from configuration or by an operator. */
export class StaticPriceFeed implements PriceFeed {
  private readonly quotes = new Map<string, PriceQuote>();

  constructor(prices: StaticPrice[] = []) {
    for (const p of prices) this.set(p.base, p.quote, p.price, p.decimals);
  }

  set(base: AssetId, quote: AssetId, price: bigint, decimals: number): void {
    if (price < 0n) throw new RangeError('price must not be negative');
    if (!Number.isInteger(decimals) || decimals < 0 || decimals > 36) throw new RangeError('decimals must be an integer in 0..36');
    this.quotes.set(pairKey(base, quote), { price, decimals });
  }

  remove(base: AssetId, quote: AssetId): void {
    this.quotes.delete(pairKey(base, quote));
  }

  getPrice(base: AssetId, quote: AssetId): PriceQuote | null {
    return this.quotes.get(pairKey(base, quote)) ?? null;
  }
}
