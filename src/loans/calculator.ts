import { BPS, maxBig, mulDiv } from '../utils/bigint.js';

export const SECONDS_PER_DAY = 86_400;
export const SECONDS_PER_YEAR = 365 * SECONDS_PER_DAY;

/** Time-based debt model. Implementations are stateless apart from their rates. */
export interface InterestModel {
  debt(principal: bigint, startTs: number, nowTs: number): bigint;
  debtWithPenalty(principal: bigint, startTs: number, dueTs: number, nowTs: number): bigint;
}

export type InterestRates = {
  aprBps: number;
  penaltyAprBps: number;
  secondsPerYear?: number;
};

/**
 * Simple (non-compounding) interest at `aprBps`, switching to `penaltyAprBps`
 * for time elapsed after the due date. Both pieces share one floor division,
 * so the penalty regime never owes less than `debt` at the same instant.
 */
export class LinearInterestModel implements InterestModel {
  readonly aprBps: number;
  readonly penaltyAprBps: number;
  readonly secondsPerYear: number;

  constructor(rates: InterestRates) {
    const { aprBps, penaltyAprBps, secondsPerYear = SECONDS_PER_YEAR } = rates;
    if (!Number.isInteger(aprBps) || aprBps < 0) throw new RangeError('aprBps must be a non-negative integer');
    if (!Number.isInteger(penaltyAprBps) || penaltyAprBps < 0) throw new RangeError('penaltyAprBps must be a non-negative integer');
    if (!Number.isInteger(secondsPerYear) || secondsPerYear <= 0) throw new RangeError('secondsPerYear must be a positive integer');
    this.aprBps = aprBps;
    this.penaltyAprBps = penaltyAprBps;
    this.secondsPerYear = secondsPerYear;
    Object.freeze(this);
  }

  debt(principal: bigint, startTs: number, nowTs: number): bigint {
    if (principal === 0n || nowTs <= startTs) return principal;
    return principal + this.interestFor(principal, this.aprBps, nowTs - startTs);
  }

  debtWithPenalty(principal: bigint, startTs: number, dueTs: number, nowTs: number): bigint {
    if (principal === 0n || nowTs <= startTs) return principal;
    const effectiveDue = Math.max(dueTs, startTs);
    if (nowTs <= effectiveDue) return this.debt(principal, startTs, nowTs);
    const rateTime =
      BigInt(this.aprBps) * BigInt(effectiveDue - startTs) + BigInt(this.penaltyAprBps) * BigInt(nowTs - effectiveDue);
    return principal + mulDiv(principal, rateTime, this.denominator());
  }

  /** Interest alone, i.e. `debtWithPenalty - principal`. */
  interestOf(principal: bigint, startTs: number, dueTs: number, nowTs: number): bigint {
    return maxBig(0n, this.debtWithPenalty(principal, startTs, dueTs, nowTs) - principal);
  }

  private interestFor(principal: bigint, rateBps: number, elapsed: number): bigint {
    if (rateBps === 0 || elapsed <= 0) return 0n;
    // principal * rate * elapsed / (year * 10000), multiplied out before the single division
    return mulDiv(principal * BigInt(rateBps), BigInt(elapsed), this.denominator());
  }

  private denominator(): bigint {
    return BigInt(this.secondsPerYear) * BPS;
  }
}
