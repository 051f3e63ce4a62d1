import type { LedgerConfig } from '../config/index.js';
import { openLedgerDb, type LedgerDb } from '../db/connection.js';
import { SqliteAssetCustody } from '../economy/custody.js';
import { SqliteReputationStore } from '../reputation/store.js';
import { CreditScoreHook } from '../reputation/hook.js';
import { StaticPriceFeed } from '../oracle/priceFeed.js';
import { AllowAllVerifier, HmacProofVerifier, type ProofVerifier } from '../proof/verifier.js';
import { ReputationRiskPolicy } from '../loans/underwrite.js';
import { LinearInterestModel } from '../loans/calculator.js';
import { LoanLedger } from '../loans/ledger.js';
import { AccessControl } from '../admin/roles.js';
import { setStateFlag } from '../db/kv.js';
import type { Clock } from '../util/clock.js';

export type LedgerRuntime = {
  config: LedgerConfig;
  db: LedgerDb;
  ledger: LoanLedger;
  custody: SqliteAssetCustody;
  reputation: SqliteReputationStore;
  priceFeed: StaticPriceFeed;
  verifier: ProofVerifier;
  policy: ReputationRiskPolicy;
  interest: LinearInterestModel;
  access: AccessControl;
  close(): void;
};

/**
 * Wires a ledger and its reference collaborators over one database, so that
 * custody and reputation writes share the ledger's transactions.
 */
export function createLedgerRuntime(
  config: LedgerConfig,
  opts: { db?: LedgerDb; clock?: Clock } = {},
): LedgerRuntime {
  const db = opts.db ?? openLedgerDb(config.dbPath);
  const custody = new SqliteAssetCustody(db);
  const reputation = new SqliteReputationStore(db, config.reputation.maxScore);
  const hook = new CreditScoreHook(reputation, {
    scoreStep: config.reputation.scoreStep,
    strict: config.reputation.strict,
  });
  const priceFeed = new StaticPriceFeed(config.prices);
  const verifier: ProofVerifier = config.proofSecret
    ? new HmacProofVerifier(config.proofSecret)
    : new AllowAllVerifier();
  const policy = new ReputationRiskPolicy(config.risk, { reputation, priceFeed, verifier });
  const interest = new LinearInterestModel(config.interest);
  const access = new AccessControl(db);
  const ledger = new LoanLedger(
    {
      ledgerAccount: config.ledgerAccount,
      treasury: config.treasury,
      fees: config.fees,
      durations: config.durations,
      gracePeriod: config.gracePeriod,
    },
    { db, custody, access, riskPolicy: policy, interestModel: interest, hook, clock: opts.clock },
  );
  if (config.paused) setStateFlag(db, 'paused', true);

  return {
    config,
    db,
    ledger,
    custody,
    reputation,
    priceFeed,
    verifier,
    policy,
    interest,
    access,
    close: () => db.close(),
  };
}
