import type { RejectReason } from '../loans/types.js';

export type ErrorKind =
  | 'InvalidInput'
  | 'StateConflict'
  | 'PolicyRejection'
  | 'ResourceExhaustion'
  | 'ReentrancyViolation'
  | 'DependencyUnavailable';

export type InvalidInputCode = 'ZeroAmount' | 'ZeroAddress' | 'DurationOutOfBounds' | 'NotBorrower' | 'BadConfig';
export type StateConflictCode = 'LoanAlreadyActive' | 'LoanNotFound' | 'LoanNotActive' | 'NotPastDue' | 'Paused';
export type ResourceCode = 'InsufficientLiquidity' | 'InsufficientBalance';
export type DependencyCode = 'NoRiskPolicy' | 'NoInterestModel' | 'NoCustody';

export abstract class LedgerError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidInputError extends LedgerError {
  readonly kind = 'InvalidInput';
  constructor(readonly code: InvalidInputCode, message: string = code) { super(message); }
}

export class StateConflictError extends LedgerError {
  readonly kind = 'StateConflict';
  constructor(readonly code: StateConflictCode, message: string = code) { super(message); }
}

export class PolicyRejectionError extends LedgerError {
  readonly kind = 'PolicyRejection';
  constructor(
    readonly code: Exclude<RejectReason, 'OK'>,
    readonly maxBorrow: bigint,
    readonly collateralRatioBps: number,
  ) {
    super(`Borrow not allowed: ${code}`);
  }
}

export class ResourceExhaustionError extends LedgerError {
  readonly kind = 'ResourceExhaustion';
  constructor(readonly code: ResourceCode, message: string = code) { super(message); }
}

export class ReentrancyError extends LedgerError {
  readonly kind = 'ReentrancyViolation';
  readonly code = 'Reentrancy';
  constructor(entry: string) { super(`Reentrant call into ${entry}`); }
}

export class DependencyUnavailableError extends LedgerError {
  readonly kind = 'DependencyUnavailable';
  constructor(readonly code: DependencyCode, message: string = code) { super(message); }
}

/** Business outcomes a caller is expected to branch on, as opposed to misuse. */
export function isRecoverable(err: unknown): boolean {
  return err instanceof PolicyRejectionError || err instanceof ResourceExhaustionError;
}
