import { defaultConfig, type LedgerConfig } from '../../src/config/index.js';
import { createLedgerRuntime, type LedgerRuntime } from '../../src/bootstrap/ledger.js';
import { openLedgerDb } from '../../src/db/connection.js';
import { ManualClock } from '../../src/util/clock.js';
import type { BorrowRequest } from '../../src/loans/types.js';

export const T0 = 1_700_000_000;
export const DAY = 86_400;
export const ADMIN = 'admin';
export const LIQUIDITY = 10_000_000_000n;

export type Fixture = LedgerRuntime & { clock: ManualClock };

/**
 * In-memory ledger on the default configuration, a super admin named
 * `admin` and `LIQUIDITY` USDC in the ledger account.
 */
export function makeLedger(overrides: Partial<LedgerConfig> = {}, opts: { liquidity?: bigint } = {}): Fixture {
  const clock = new ManualClock(T0);
  const config: LedgerConfig = { ...defaultConfig(), ...overrides };
  const rt = createLedgerRuntime(config, { db: openLedgerDb(':memory:'), clock });
  rt.access.seedSuperAdmin(ADMIN);
  const liquidity = opts.liquidity ?? LIQUIDITY;
  if (liquidity > 0n) rt.custody.mint('USDC', config.ledgerAccount, liquidity);
  return { ...rt, clock };
}

/** 1 000 000 USDC against 1 500 000 USDC of collateral for ten days. */
export function usdcLoan(overrides: Partial<BorrowRequest> = {}): BorrowRequest {
  return {
    asset: 'USDC',
    amount: 1_000_000n,
    collateralAsset: 'USDC',
    collateralAmount: 1_500_000n,
    duration: 10 * DAY,
    ...overrides,
  };
}
