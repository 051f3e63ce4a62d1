export type Address = string;
export type AssetId = string;

/** `Liquidated` is reserved for collateral seizure and never assigned. */
export type LoanStatus = 'None' | 'Active' | 'Repaid' | 'Defaulted' | 'Liquidated';

export type Loan = {
  id: number;
  borrower: Address;
  asset: AssetId;
  collateralAsset: AssetId;
  principal: bigint;
  originationFee: bigint;
  principalRepaid: bigint;
  collateralAmount: bigint;
  startTs: number; // seconds
  dueTs: number;   // seconds
  closedTs: number | null;
  status: LoanStatus;
};

export type BorrowRequest = {
  asset: AssetId;
  amount: bigint;
  collateralAsset: AssetId;
  collateralAmount: bigint;
  duration: number; // seconds
  proof?: string;
};

export type RejectReason =
  | 'OK'
  | 'DEFAULTER'
  | 'MISSING_PROOF'
  | 'BAD_PROOF'
  | 'NO_ORACLE'
  | 'NO_COLLATERAL'
  | 'BAD_COLLATERAL_ASSET'
  | 'BAD_PRICE'
  | 'LIMIT';

export type RiskResult = {
  allowed: boolean;
  collateralRatioBps: number;
  maxBorrow: bigint;
  reason: RejectReason;
};

export type RepayResult = {
  paidNet: bigint;
  totalRepaid: bigint;
  totalDebt: bigint;
  fullyRepaid: boolean;
  refund: bigint;
  protocolFee: bigint;
};

export type DefaultResult = {
  bounty: bigint;
  retainedCollateral: bigint;
};

export type FeeSchedule = {
  originationFeeBps: number;
  protocolFeeBps: number;
  defaultBountyBps: number;
};

export type DurationBounds = {
  minDuration: number;
  maxDuration: number;
};
