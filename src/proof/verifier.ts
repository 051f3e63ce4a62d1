import { createHmac, timingSafeEqual } from 'node:crypto';
import type { Address } from '../loans/types.js';

export interface ProofVerifier {
  verify(borrower: Address, proof: string): boolean;
}

/**
 * A proof is the hex HMAC-SHA256 of the borrower id under a secret shared with
 * the identity provider.
 */
export class HmacProofVerifier implements ProofVerifier {
  constructor(private readonly secret: string) {
    if (!secret) throw new RangeError('HmacProofVerifier needs a non-empty secret');
  }

  sign(borrower: Address): string {
    return createHmac('sha256', this.secret).update(borrower).digest('hex');
  }

  verify(borrower: Address, proof: string): boolean {
    if (!/^[0-9a-f]{64}$/i.test(proof)) return false;
    const expected = Buffer.from(this.sign(borrower), 'hex');
    const given = Buffer.from(proof, 'hex');
    return timingSafeEqual(expected, given);
  }
}

/** Accepts any proof; the permissive deployment. */
export class AllowAllVerifier implements ProofVerifier {
  verify(): boolean {
    return true;
  }
}
