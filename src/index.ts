export * from './loans/types.js';
export { LoanLedger, type LedgerParams, type LedgerDeps } from './loans/ledger.js';
export {
  LedgerEvents,
  type LedgerEventMap,
  type LedgerModule,
  type LoanOpenedEvent,
  type LoanRepaidEvent,
  type LoanDefaultedEvent,
} from './loans/events.js';
export {
  LinearInterestModel,
  SECONDS_PER_DAY,
  SECONDS_PER_YEAR,
  type InterestModel,
  type InterestRates,
} from './loans/calculator.js';
export { ratioForScore, maxBorrowForCollateral, type LadderParams } from './loans/limits.js';
export { ReputationRiskPolicy, type RiskPolicy, type RiskParams, type RiskDeps } from './loans/underwrite.js';
export { SqliteAssetCustody, type AssetCustody } from './economy/custody.js';
export { SqliteReputationStore, DEFAULT_MAX_SCORE, type ReputationStore } from './reputation/store.js';
export { CreditScoreHook, type ReputationHook, type CreditScoreHookOptions } from './reputation/hook.js';
export { StaticPriceFeed, type PriceFeed, type PriceQuote, type StaticPrice } from './oracle/priceFeed.js';
export { HmacProofVerifier, AllowAllVerifier, type ProofVerifier } from './proof/verifier.js';
export { AccessControl, AuthzError, Role } from './admin/roles.js';
export { openLedgerDb, type LedgerDb } from './db/connection.js';
export { runMigrations } from './db/migrate.js';
export { loadConfig, defaultConfig, applyEnvOverrides, configSchema, type LedgerConfig } from './config/index.js';
export { createLedgerRuntime, type LedgerRuntime } from './bootstrap/ledger.js';
export { ManualClock, systemClock, type Clock } from './util/clock.js';
export * from './util/errors.js';
