import { EventEmitter } from 'node:events';
import type { Address } from './types.js';

export type LoanOpenedEvent = {
  loanId: number;
  borrower: Address;
  asset: string;
  principal: bigint;
  originationFee: bigint;
  collateralAsset: string;
  collateralAmount: bigint;
  dueTs: number;
};

export type LoanRepaidEvent = {
  loanId: number;
  borrower: Address;
  paidNet: bigint;
  totalRepaid: bigint;
  totalDebt: bigint;
  fullyRepaid: boolean;
};

export type LoanDefaultedEvent = {
  loanId: number;
  borrower: Address;
  caller: Address;
  bounty: bigint;
};

export type LedgerModule = 'riskPolicy' | 'interestModel' | 'reputationHook';

export type LedgerEventMap = {
  loanOpened: LoanOpenedEvent;
  loanRepaid: LoanRepaidEvent;
  loanDefaulted: LoanDefaultedEvent;
  paused: { paused: boolean; by: Address };
  moduleChanged: { module: LedgerModule; by: Address };
};

/** Notifications published after a ledger operation has committed. */
export class LedgerEvents {
  private readonly emitter = new EventEmitter();

  on<K extends keyof LedgerEventMap>(name: K, fn: (event: LedgerEventMap[K]) => void): () => void {
    this.emitter.on(name, fn);
    return () => {
      this.emitter.off(name, fn);
    };
  }

  emit<K extends keyof LedgerEventMap>(name: K, event: LedgerEventMap[K]): void {
    this.emitter.emit(name, event);
  }
}
