import type { Address, BorrowRequest, RejectReason, RiskResult } from './types.js';
import type { ReputationStore } from '../reputation/store.js';
import type { PriceFeed, PriceQuote } from '../oracle/priceFeed.js';
import type { ProofVerifier } from '../proof/verifier.js';
import { maxBorrowForCollateral, ratioForScore } from './limits.js';
import { createLogger } from '../log.js';
import { describeError } from '../utils/errors.js';

const log = createLogger('risk');

export interface RiskPolicy {
  collateralRatioBps(borrower: Address): number;
  isDefaulter(borrower: Address): boolean;
  assessBorrow(borrower: Address, request: BorrowRequest): RiskResult;
}

export type RiskParams = {
  maxRatioBps: number;
  scoreFree: number;
  /** Flat ceiling for borrowers whose required ratio is 0. */
  noCollateralCeiling: bigint;
  requireProof: boolean;
  /** Accepted collateral assets; empty accepts any. */
  collateralAssets: readonly string[];
};

/**
 * Optional collaborators. `null` is an explicit choice with a fixed meaning:
 * - reputation: nobody is a defaulter and every score reads 0;
 * - priceFeed: collateralised borrows in another asset are rejected (NO_ORACLE);
 * - verifier: when proofs are required, every proof is rejected (BAD_PROOF).
 */
export type RiskDeps = {
  reputation: ReputationStore | null;
  priceFeed: PriceFeed | null;
  verifier: ProofVerifier | null;
};

const ONE_TO_ONE: PriceQuote = { price: 1n, decimals: 0 };

type PriceLookup = { ok: true; quote: PriceQuote } | { ok: false; reason: RejectReason };

export class ReputationRiskPolicy implements RiskPolicy {
  constructor(
    readonly params: RiskParams,
    private readonly deps: RiskDeps,
  ) {
    if (!Number.isInteger(params.maxRatioBps) || params.maxRatioBps < 0) throw new RangeError('maxRatioBps must be a non-negative integer');
    if (!Number.isInteger(params.scoreFree) || params.scoreFree <= 0) throw new RangeError('scoreFree must be a positive integer');
    if (params.noCollateralCeiling < 0n) throw new RangeError('noCollateralCeiling must not be negative');
  }

  isDefaulter(borrower: Address): boolean {
    const store = this.deps.reputation;
    if (!store) return false;
    return store.hasBadge(borrower);
  }

  collateralRatioBps(borrower: Address): number {
    const store = this.deps.reputation;
    const score = store ? store.scoreOf(borrower) : 0;
    return ratioForScore(score, this.params);
  }

  assessBorrow(borrower: Address, request: BorrowRequest): RiskResult {
    const ratio = this.collateralRatioBps(borrower);
    const reject = (reason: RejectReason, maxBorrow = 0n): RiskResult => ({
      allowed: false,
      collateralRatioBps: ratio,
      maxBorrow,
      reason,
    });

    if (this.isDefaulter(borrower)) return reject('DEFAULTER');

    if (this.params.requireProof) {
      if (!request.proof) return reject('MISSING_PROOF');
      if (!this.proofValid(borrower, request.proof)) return reject('BAD_PROOF');
    }

    let maxBorrow: bigint;
    if (ratio === 0) {
      maxBorrow = this.params.noCollateralCeiling;
    } else {
      if (request.collateralAmount <= 0n) return reject('NO_COLLATERAL');
      const accepted = this.params.collateralAssets;
      if (accepted.length > 0 && !accepted.includes(request.collateralAsset)) return reject('BAD_COLLATERAL_ASSET');
      const lookup = this.priceOf(request.collateralAsset, request.asset);
      if (!lookup.ok) return reject(lookup.reason);
      maxBorrow = maxBorrowForCollateral(request.collateralAmount, lookup.quote.price, lookup.quote.decimals, ratio);
    }

    if (request.amount > maxBorrow) return reject('LIMIT', maxBorrow);
    return { allowed: true, collateralRatioBps: ratio, maxBorrow, reason: 'OK' };
  }

  private proofValid(borrower: Address, proof: string): boolean {
    const verifier = this.deps.verifier;
    if (!verifier) {
      log.warn({ msg: 'risk_no_verifier', borrower });
      return false;
    }
    try {
      return verifier.verify(borrower, proof) === true;
    } catch (err) {
      log.warn({ msg: 'risk_verifier_failed', borrower, error: describeError(err) });
      return false;
    }
  }

  private priceOf(collateralAsset: string, debtAsset: string): PriceLookup {
    if (collateralAsset === debtAsset) return { ok: true, quote: ONE_TO_ONE };
    const feed = this.deps.priceFeed;
    if (!feed) return { ok: false, reason: 'NO_ORACLE' };
    let quote: PriceQuote | null;
    try {
      quote = feed.getPrice(collateralAsset, debtAsset);
    } catch (err) {
      log.warn({ msg: 'risk_oracle_failed', base: collateralAsset, quote: debtAsset, error: describeError(err) });
      return { ok: false, reason: 'BAD_PRICE' };
    }
    if (!quote) return { ok: false, reason: 'NO_ORACLE' };
    if (quote.price <= 0n || !Number.isInteger(quote.decimals) || quote.decimals < 0) return { ok: false, reason: 'BAD_PRICE' };
    return { ok: true, quote };
  }
}
