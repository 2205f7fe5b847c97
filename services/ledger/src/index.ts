import { DocumentStore } from '@ledgerline/database';
import { Clock, systemClock } from '@ledgerline/shared-types';
import { Mutex } from '@ledgerline/shared-utils';
import { AccountPlan } from './services/chartOfAccounts';
import { Ledger, LedgerOptions } from './services/ledger';
import { PeriodRegistry } from './services/periods';

export * from './services/chartOfAccounts';
export * from './services/ledger';
export * from './services/periods';

export interface LedgerService {
  accounts: AccountPlan;
  periods: PeriodRegistry;
  ledger: Ledger;
}

/** Wires an account plan, period registry and ledger over one store, sharing one clock and one lock. */
export function createLedgerService(store: DocumentStore, options: LedgerOptions = {}): LedgerService {
  const clock: Clock = options.clock ?? systemClock;
  const lock = new Mutex();
  const accounts = new AccountPlan(store, clock, lock);
  const periods = new PeriodRegistry(store, clock, lock);
  const ledger = new Ledger(store, accounts, periods, { ...options, clock });
  return { accounts, periods, ledger };
}
