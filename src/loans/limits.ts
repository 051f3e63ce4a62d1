import { BPS, mulDiv, mulDivUp } from '../utils/bigint.js';

export type LadderParams = {
  maxRatioBps: number;
  scoreFree: number;
};

/**
 * Required collateral ratio for a reputation score. Falls linearly from
 * `maxRatioBps` at score 0 to 0 at `scoreFree`; rounded up so that no score
 * reaches a lower requirement than the line gives it.
 */
export function ratioForScore(score: number, params: LadderParams): number {
  const { maxRatioBps, scoreFree } = params;
  if (scoreFree <= 0) return 0;
  const s = Math.max(0, Math.floor(score));
  if (s >= scoreFree) return 0;
  const ratio = mulDivUp(BigInt(maxRatioBps), BigInt(scoreFree - s), BigInt(scoreFree));
  return Number(ratio);
}

/**
 * Largest borrow the collateral supports at `ratioBps`:
 * `collateralAmount * price / 10^decimals * 10000 / ratioBps`, floored once.
 */
export function maxBorrowForCollateral(
  collateralAmount: bigint,
  price: bigint,
  decimals: number,
  ratioBps: number,
): bigint {
  if (ratioBps <= 0) throw new RangeError('ratioBps must be positive');
  const scale = 10n ** BigInt(decimals);
  return mulDiv(collateralAmount * price, BPS, scale * BigInt(ratioBps));
}
