import { randomUUID } from 'crypto';
import { DocumentStore } from '@ledgerline/database';
import {
  Account,
  AccountCode,
  CalendarDate,
  Clock,
  CurrencyCode,
  NewTransaction,
  Period,
  PeriodId,
  PeriodStatus,
  Posting,
  PostingSide,
  Reversal,
  Transaction,
  TransactionId,
  TransactionStatus,
  systemClock,
} from '@ledgerline/shared-types';
import {
  ConflictError,
  ConstraintViolationError,
  CurrencyMismatchError,
  ImmutableTransactionError,
  NotFoundError,
  PeriodClosedError,
  UnbalancedError,
  UnknownAccountError,
  ValidationError,
  calendarDateOf,
  calendarDateSchema,
  createLogger,
  minorUnitDigits,
  newTransactionSchema,
  normaliseTimestamp,
  parseWith,
} from '@ledgerline/shared-utils';
import { AccountPlan } from './chartOfAccounts';
import { PeriodRegistry } from './periods';

const logger = createLogger('ledger-service');

/**
 * Checked against the balances the ledger would hold after a post commits. Throw to reject the
 * post; nothing is written when a constraint fails.
 */
export type BalanceConstraint = (
  transaction: Transaction,
  balances: ReadonlyMap<AccountCode, number>
) => void;

/** Rejects posts that would take any of `codes` below zero on its normal side. */
export function noOverdraft(codes: AccountCode[]): BalanceConstraint {
  const guarded = new Set(codes);
  return (_transaction, balances) => {
    for (const [code, balance] of balances) {
      if (guarded.has(code) && balance < 0) {
        throw new ConstraintViolationError('no-overdraft', code, balance);
      }
    }
  };
}

export interface LedgerOptions {
  currency?: CurrencyCode;
  clock?: Clock;
  constraints?: BalanceConstraint[];
  generateId?: () => string;
}

export interface PostOptions {
  constraints?: BalanceConstraint[];
}

export interface VoidOptions {
  reason?: string;
  /** Timestamp of the reversing entry; defaults to now. */
  timestamp?: string;
}

export interface VoidResult {
  original: Transaction;
  reversal: Transaction;
}

export interface TransactionFilter {
  from?: CalendarDate;
  to?: CalendarDate;
  accountCode?: AccountCode;
  status?: TransactionStatus;
}

export interface StatementLine {
  transactionId: TransactionId;
  timestamp: string;
  description: string;
  side: PostingSide;
  amount: number;
  balance: number;
}

export interface AccountStatement {
  accountCode: AccountCode;
  from: CalendarDate;
  to: CalendarDate;
  openingBalance: number;
  lines: StatementLine[];
  closingBalance: number;
}

export interface TrialBalanceRow {
  accountCode: AccountCode;
  name: string;
  debit: number;
  credit: number;
}

export interface TrialBalance {
  asOf: CalendarDate;
  rows: TrialBalanceRow[];
  totalDebits: number;
  totalCredits: number;
}

/** Signed effect of a posting on the debit side. */
export function debitEffect(posting: Posting): number {
  return posting.side === PostingSide.DEBIT ? posting.amount : -posting.amount;
}

function orientedEffect(posting: Posting, account: Account): number {
  const effect = debitEffect(posting);
  return account.normalSide === PostingSide.DEBIT ? effect : -effect;
}

/** Orders by timestamp, ties broken by insertion sequence. */
export function chronological(a: Transaction, b: Transaction): number {
  if (a.timestamp !== b.timestamp) {
    return a.timestamp < b.timestamp ? -1 : 1;
  }
  return a.sequence - b.sequence;
}

function isCommitted(transaction: Transaction): boolean {
  return transaction.status !== TransactionStatus.DRAFT;
}

function dateOf(transaction: Transaction): CalendarDate {
  return calendarDateOf(transaction.timestamp);
}

/**
 * Append-only double-entry ledger. Posted transactions never change; a void appends a
 * reversing entry and a reversal relation while the original keeps its postings.
 */
export class Ledger {
  readonly currency: CurrencyCode;
  private readonly clock: Clock;
  private readonly constraints: BalanceConstraint[];
  private readonly generateId: () => string;
  private nextSequence?: number;

  constructor(
    private readonly store: DocumentStore,
    readonly accounts: AccountPlan,
    readonly periods: PeriodRegistry,
    options: LedgerOptions = {}
  ) {
    if (accounts.lock !== periods.lock) {
      throw new ValidationError('The account plan and period registry must share the ledger lock');
    }
    this.currency = options.currency ?? 'GBP';
    minorUnitDigits(this.currency);
    this.clock = options.clock ?? systemClock;
    this.constraints = options.constraints ?? [];
    this.generateId = options.generateId ?? randomUUID;
  }

  async post(input: NewTransaction, options: PostOptions = {}): Promise<Transaction> {
    const draft = this.buildTransaction(input);
    return this.periods.lock.runExclusive(async () => {
      if (await this.store.load('transaction', draft.id)) {
        throw new ConflictError(`Transaction already exists: ${draft.id}`, { transactionId: draft.id });
      }
      return this.commit(draft, options.constraints ?? [], true);
    });
  }

  createDraft(input: NewTransaction): Promise<Transaction> {
    const draft = this.buildTransaction(input);
    return this.periods.lock.runExclusive(async () => {
      if (await this.store.load('transaction', draft.id)) {
        throw new ConflictError(`Transaction already exists: ${draft.id}`, { transactionId: draft.id });
      }
      await this.store.save('transaction', draft.id, draft);
      return draft;
    });
  }

  updateDraft(transactionId: TransactionId, input: NewTransaction): Promise<Transaction> {
    const updated = this.buildTransaction({ ...input, id: transactionId });
    return this.periods.lock.runExclusive(async () => {
      const existing = await this.get(transactionId);
      if (existing.status !== TransactionStatus.DRAFT) {
        throw new ImmutableTransactionError(transactionId, `status is ${existing.status}`);
      }
      await this.store.save('transaction', transactionId, updated);
      return updated;
    });
  }

  postDraft(transactionId: TransactionId, options: PostOptions = {}): Promise<Transaction> {
    return this.periods.lock.runExclusive(async () => {
      const draft = await this.get(transactionId);
      if (draft.status !== TransactionStatus.DRAFT) {
        throw new ImmutableTransactionError(transactionId, `status is ${draft.status}`);
      }
      return this.commit(draft, options.constraints ?? [], true);
    });
  }

  void(transactionId: TransactionId, options: VoidOptions = {}): Promise<VoidResult> {
    return this.periods.lock.runExclusive(async () => {
      const original = await this.get(transactionId);
      if (original.status === TransactionStatus.DRAFT) {
        throw new ImmutableTransactionError(transactionId, 'drafts are discarded, not voided');
      }
      if (original.status === TransactionStatus.VOID) {
        throw new ImmutableTransactionError(transactionId, 'already voided');
      }
      if (original.reversalOf) {
        throw new ImmutableTransactionError(transactionId, 'reversing entries cannot be voided');
      }

      const reversalDraft: Transaction = {
        id: this.generateId(),
        timestamp: normaliseTimestamp(options.timestamp ?? this.clock.now().toISOString()),
        description: `Reversal of ${original.description || original.id}`,
        currency: original.currency,
        postings: original.postings.map((posting) => ({
          ...posting,
          side: posting.side === PostingSide.DEBIT ? PostingSide.CREDIT : PostingSide.DEBIT,
        })),
        status: TransactionStatus.DRAFT,
        sequence: 0,
        reversalOf: original.id,
        metadata: options.reason ? { reason: options.reason } : undefined,
      };
      // Reversals may touch accounts deactivated since the original was posted.
      const reversal = await this.commit(reversalDraft, [], false);

      const voided: Transaction = { ...original, status: TransactionStatus.VOID };
      await this.store.save('transaction', original.id, voided);

      const relation: Reversal = {
        originalId: original.id,
        reversalId: reversal.id,
        reason: options.reason,
        createdAt: this.clock.now().toISOString(),
      };
      await this.store.save('reversal', original.id, relation);

      logger.info('Transaction voided', { transactionId, reversalId: reversal.id });
      return { original: voided, reversal };
    });
  }

  async get(transactionId: TransactionId): Promise<Transaction> {
    const transaction = await this.store.load('transaction', transactionId);
    if (!transaction) {
      throw new NotFoundError('Transaction', transactionId);
    }
    return transaction;
  }

  async reversalOf(transactionId: TransactionId): Promise<Reversal | undefined> {
    return this.store.load('reversal', transactionId);
  }

  /** Transactions in chronological order. */
  async list(filter: TransactionFilter = {}): Promise<Transaction[]> {
    const transactions = await this.store.list('transaction', filter.status ? { status: filter.status } : undefined);
    return transactions
      .filter((transaction) => {
        const date = dateOf(transaction);
        if (filter.from && date < filter.from) {
          return false;
        }
        if (filter.to && date > filter.to) {
          return false;
        }
        if (filter.accountCode && !transaction.postings.some((posting) => posting.accountCode === filter.accountCode)) {
          return false;
        }
        return true;
      })
      .sort(chronological);
  }

  /**
   * Balance of an account from every committed posting dated on or before `date`, signed
   * towards the account's normal side.
   */
  async balanceAsOf(accountCode: AccountCode, date: CalendarDate): Promise<number> {
    const asOf = parseWith(calendarDateSchema, date, 'balance date');
    const account = await this.accounts.get(accountCode);
    let balance = 0;
    for (const transaction of await this.committed()) {
      if (dateOf(transaction) > asOf) {
        break;
      }
      for (const posting of transaction.postings) {
        if (posting.accountCode === accountCode) {
          balance += orientedEffect(posting, account);
        }
      }
    }
    return balance;
  }

  async statement(accountCode: AccountCode, from: CalendarDate, to: CalendarDate): Promise<AccountStatement> {
    const start = parseWith(calendarDateSchema, from, 'statement start');
    const end = parseWith(calendarDateSchema, to, 'statement end');
    if (start > end) {
      throw new ValidationError('Statement start must not be after its end', { from, to });
    }
    const account = await this.accounts.get(accountCode);

    let openingBalance = 0;
    let balance = 0;
    const lines: StatementLine[] = [];
    for (const transaction of await this.committed()) {
      const date = dateOf(transaction);
      if (date > end) {
        break;
      }
      for (const posting of transaction.postings) {
        if (posting.accountCode !== accountCode) {
          continue;
        }
        balance += orientedEffect(posting, account);
        if (date < start) {
          openingBalance = balance;
        } else {
          lines.push({
            transactionId: transaction.id,
            timestamp: transaction.timestamp,
            description: transaction.description,
            side: posting.side,
            amount: posting.amount,
            balance,
          });
        }
      }
    }

    return { accountCode, from: start, to: end, openingBalance, lines, closingBalance: balance };
  }

  async trialBalance(asOf: CalendarDate): Promise<TrialBalance> {
    const date = parseWith(calendarDateSchema, asOf, 'trial balance date');
    const net = new Map<AccountCode, number>();
    for (const transaction of await this.committed()) {
      if (dateOf(transaction) > date) {
        break;
      }
      for (const posting of transaction.postings) {
        net.set(posting.accountCode, (net.get(posting.accountCode) ?? 0) + debitEffect(posting));
      }
    }

    const names = new Map((await this.store.list('account')).map((account) => [account.code, account.name]));
    const rows: TrialBalanceRow[] = [...net.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([accountCode, amount]) => ({
        accountCode,
        name: names.get(accountCode) ?? accountCode,
        debit: amount > 0 ? amount : 0,
        credit: amount < 0 ? -amount : 0,
      }));

    return {
      asOf: date,
      rows,
      totalDebits: rows.reduce((sum, row) => sum + row.debit, 0),
      totalCredits: rows.reduce((sum, row) => sum + row.credit, 0),
    };
  }

  /** Committed transactions (originals, voided originals and reversals) dated inside the period. */
  async transactionsInPeriod(period: Pick<Period, 'start' | 'end'>): Promise<Transaction[]> {
    return (await this.committed()).filter((transaction) => {
      const date = dateOf(transaction);
      return period.start <= date && date <= period.end;
    });
  }

  /** Freezes the set of transactions eligible for the period. */
  closePeriod(periodId: PeriodId, configVersion?: string): Promise<Period> {
    return this.periods.lock.runExclusive(() => this.periods.close(periodId, configVersion));
  }

  reopenPeriod(periodId: PeriodId): Promise<Period> {
    return this.periods.lock.runExclusive(() => this.periods.reopen(periodId));
  }

  private async committed(): Promise<Transaction[]> {
    const transactions = await this.store.list('transaction');
    return transactions.filter(isCommitted).sort(chronological);
  }

  private buildTransaction(input: NewTransaction): Transaction {
    const parsed = parseWith(newTransactionSchema, input, 'transaction');
    return {
      id: parsed.id ?? this.generateId(),
      timestamp: normaliseTimestamp(parsed.timestamp),
      description: parsed.description,
      currency: parsed.currency ?? this.currency,
      postings: parsed.postings,
      status: TransactionStatus.DRAFT,
      sequence: 0,
      metadata: parsed.metadata,
    };
  }

  /** Caller holds the lock. Validates, then writes; a failure writes nothing. */
  private async commit(
    draft: Transaction,
    extraConstraints: BalanceConstraint[],
    requireActive: boolean
  ): Promise<Transaction> {
    if (draft.currency !== this.currency) {
      throw new CurrencyMismatchError(this.currency, draft.currency);
    }
    if (draft.postings.length < 2) {
      throw new ValidationError('A transaction needs at least two postings');
    }

    const accounts = new Map<AccountCode, Account>();
    const unknown: AccountCode[] = [];
    for (const code of new Set(draft.postings.map((posting) => posting.accountCode))) {
      const account = await this.accounts.find(code);
      if (!account || (requireActive && !account.active)) {
        unknown.push(code);
      } else {
        accounts.set(code, account);
      }
    }
    if (unknown.length > 0) {
      throw new UnknownAccountError(unknown);
    }

    let debits = 0;
    let credits = 0;
    for (const posting of draft.postings) {
      if (posting.side === PostingSide.DEBIT) {
        debits += posting.amount;
      } else {
        credits += posting.amount;
      }
    }
    if (debits !== credits) {
      throw new UnbalancedError(debits, credits);
    }

    const date = dateOf(draft);
    const locked = (await this.periods.findContaining(date)).find((period) => period.status !== PeriodStatus.OPEN);
    if (locked) {
      throw new PeriodClosedError(locked.id, date);
    }

    const constraints = [...this.constraints, ...extraConstraints];
    if (constraints.length > 0) {
      const projected = await this.projectBalances(draft, accounts);
      for (const constraint of constraints) {
        constraint(draft, projected);
      }
    }

    const sequence = await this.allocateSequence();
    const posted: Transaction = {
      ...draft,
      status: TransactionStatus.POSTED,
      sequence,
      postedAt: this.clock.now().toISOString(),
    };
    await this.store.save('transaction', posted.id, posted);
    await this.accounts.markReferenced(accounts.keys());

    logger.info('Transaction posted', {
      transactionId: posted.id,
      sequence,
      postingCount: posted.postings.length,
      reversalOf: posted.reversalOf,
    });
    return posted;
  }

  private async projectBalances(
    draft: Transaction,
    accounts: Map<AccountCode, Account>
  ): Promise<Map<AccountCode, number>> {
    const projected = new Map<AccountCode, number>();
    for (const code of accounts.keys()) {
      projected.set(code, 0);
    }
    for (const transaction of [...(await this.committed()), draft]) {
      for (const posting of transaction.postings) {
        const account = accounts.get(posting.accountCode);
        if (account) {
          projected.set(account.code, (projected.get(account.code) ?? 0) + orientedEffect(posting, account));
        }
      }
    }
    return projected;
  }

  private async allocateSequence(): Promise<number> {
    if (this.nextSequence === undefined) {
      const committed = await this.committed();
      this.nextSequence = committed.reduce((max, transaction) => Math.max(max, transaction.sequence), 0) + 1;
    }
    const sequence = this.nextSequence;
    this.nextSequence += 1;
    return sequence;
  }
}
