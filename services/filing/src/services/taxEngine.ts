import { randomUUID } from 'crypto';
import { debitEffect } from '@ledgerline/ledger-service';
import {
  Account,
  AccountCode,
  Clock,
  Period,
  PeriodId,
  PeriodStatus,
  PostingSide,
  TaxKind,
  TaxLines,
  TaxReturn,
  Transaction,
  systemClock,
} from '@ledgerline/shared-types';
import {
  PeriodNotClosedError,
  ValidationError,
  applyRate,
  checksum,
  createLogger,
  rateFromPercent,
  roundToMajorUnit,
} from '@ledgerline/shared-utils';
import {
  AccountSelector,
  LineDefinition,
  LineRule,
  TaxConfiguration,
  TaxConfigurationRegistry,
  linesFor,
} from './taxConfiguration';

const logger = createLogger('filing-service');

export interface PeriodReader {
  get(periodId: PeriodId): Promise<Period>;
}

/** Read side of the ledger the engine depends on. */
export interface LedgerReader {
  readonly periods: PeriodReader;
  transactionsInPeriod(period: Pick<Period, 'start' | 'end'>): Promise<Transaction[]>;
}

export interface AccountReader {
  list(): Promise<Account[]>;
}

export interface TaxEngineOptions {
  clock?: Clock;
  generateId?: () => string;
}

export interface LineDescription {
  id: string;
  label: string;
}

interface LineContext {
  netDebits: Map<AccountCode, number>;
  accounts: Map<AccountCode, Account>;
  currency: string;
}

function selects(selector: AccountSelector, account: Account): boolean {
  if (selector.types && !selector.types.includes(account.type)) {
    return false;
  }
  if (selector.codes && !selector.codes.includes(account.code)) {
    return false;
  }
  return !selector.excludeCodes?.includes(account.code);
}

function lineValue(lines: TaxLines, id: string): number {
  const value = lines[id];
  if (value === undefined) {
    throw new ValidationError(`Tax line ${id} has not been computed`);
  }
  return value;
}

/** Each rule rounds its own result once; inputs from other lines are already rounded. */
function evaluateRule(rule: LineRule, lines: TaxLines, context: LineContext): number {
  switch (rule.kind) {
    case 'aggregate': {
      let total = 0;
      for (const [code, netDebit] of context.netDebits) {
        const account = context.accounts.get(code);
        if (account && selects(rule.select, account)) {
          total += rule.orientation === PostingSide.DEBIT ? netDebit : -netDebit;
        }
      }
      if (rule.ratePercent !== undefined) {
        total = applyRate(total, rateFromPercent(rule.ratePercent));
      }
      return rule.wholeUnits ? roundToMajorUnit(total, context.currency) : total;
    }
    case 'constant':
      return rule.amount;
    case 'sum':
      return rule.lines.reduce((total, id) => total + lineValue(lines, id), 0);
    case 'difference': {
      const difference = lineValue(lines, rule.minuend) - lineValue(lines, rule.subtrahend);
      return rule.floorAtZero ? Math.max(0, difference) : difference;
    }
    case 'absDifference':
      return Math.abs(lineValue(lines, rule.lines[0]) - lineValue(lines, rule.lines[1]));
    case 'taperedAllowance': {
      const excess = Math.max(0, lineValue(lines, rule.incomeLine) - rule.threshold);
      return Math.max(0, rule.base - applyRate(excess, rateFromPercent(rule.taperPercent)));
    }
    case 'band': {
      const base = lineValue(lines, rule.of);
      const upper = rule.to === undefined ? base : Math.min(base, rule.to);
      return applyRate(Math.max(0, upper - rule.from), rateFromPercent(rule.ratePercent));
    }
  }
}

function evaluateLines(definitions: LineDefinition[], context: LineContext): TaxLines {
  const lines: TaxLines = {};
  for (const definition of definitions) {
    lines[definition.id] = evaluateRule(definition.rule, lines, context);
  }
  return lines;
}

/**
 * Derives statutory figures for a closed period from the ledger. Computation has no side
 * effects: the same period, transactions, accounts and configuration always produce the same
 * lines and checksum.
 */
export class TaxEngine {
  private readonly clock: Clock;
  private readonly generateId: () => string;

  constructor(
    private readonly ledger: LedgerReader,
    private readonly accounts: AccountReader,
    private readonly configurations: TaxConfigurationRegistry,
    options: TaxEngineOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.generateId = options.generateId ?? randomUUID;
  }

  computeVAT(period: Period): Promise<TaxReturn> {
    return this.compute(period, TaxKind.VAT);
  }

  computeIncomeTax(period: Period): Promise<TaxReturn> {
    return this.compute(period, TaxKind.INCOME_TAX);
  }

  /** Pinned configuration for a closed period, otherwise the one in force at its end. */
  configurationFor(period: Period): TaxConfiguration {
    return period.configVersion
      ? this.configurations.get(period.configVersion)
      : this.configurations.effectiveOn(period.end);
  }

  describeLines(kind: TaxKind, version?: string): LineDescription[] {
    const configuration = version
      ? this.configurations.get(version)
      : this.configurations.effectiveOn(this.clock.now().toISOString().slice(0, 10));
    return linesFor(configuration, kind).map(({ id, label }) => ({ id, label }));
  }

  /** Computes from the stored period, so a stale copy cannot stand in for a reopened one. */
  async compute(requested: Period, kind: TaxKind = requested.taxKind): Promise<TaxReturn> {
    const period = await this.ledger.periods.get(requested.id);
    if (period.taxKind !== kind) {
      throw new ValidationError(`Period ${period.id} is a ${period.taxKind} period, not ${kind}`);
    }
    if (period.status !== PeriodStatus.CLOSED && period.status !== PeriodStatus.SUBMITTED) {
      throw new PeriodNotClosedError(period.id, period.status);
    }

    const configuration = this.configurationFor(period);
    const transactions = await this.ledger.transactionsInPeriod(period);
    const accounts = new Map((await this.accounts.list()).map((account) => [account.code, account]));

    const netDebits = new Map<AccountCode, number>();
    for (const transaction of transactions) {
      if (transaction.currency !== configuration.currency) {
        throw new ValidationError(
          `Transaction ${transaction.id} is in ${transaction.currency}; configuration ${configuration.version} computes ${configuration.currency}`
        );
      }
      for (const posting of transaction.postings) {
        netDebits.set(posting.accountCode, (netDebits.get(posting.accountCode) ?? 0) + debitEffect(posting));
      }
    }

    const lines = evaluateLines(linesFor(configuration, kind), {
      netDebits,
      accounts,
      currency: configuration.currency,
    });

    const taxReturn: TaxReturn = {
      id: this.generateId(),
      periodId: period.id,
      taxKind: kind,
      periodKey: period.periodKey,
      start: period.start,
      end: period.end,
      lines,
      currency: configuration.currency,
      computedAt: this.clock.now().toISOString(),
      configVersion: configuration.version,
      checksum: this.inputChecksum(period, kind, configuration, transactions, accounts),
      transactionIds: transactions.map((transaction) => transaction.id),
    };

    logger.info('Tax return computed', {
      periodId: period.id,
      taxKind: kind,
      configVersion: configuration.version,
      transactions: transactions.length,
      checksum: taxReturn.checksum,
    });
    return taxReturn;
  }

  /**
   * Covers everything the figures derive from. Transaction status is left out: voiding an
   * original after the period closed adds a reversal elsewhere without changing this period.
   */
  private inputChecksum(
    period: Period,
    kind: TaxKind,
    configuration: TaxConfiguration,
    transactions: Transaction[],
    accounts: Map<AccountCode, Account>
  ): string {
    const referenced = new Set(transactions.flatMap((transaction) => transaction.postings.map((p) => p.accountCode)));
    return checksum({
      period: { id: period.id, taxKind: kind, start: period.start, end: period.end },
      configuration,
      transactions: transactions.map(({ id, timestamp, currency, postings }) => ({
        id,
        timestamp,
        currency,
        postings: postings.map(({ accountCode, amount, side }) => ({ accountCode, amount, side })),
      })),
      accounts: [...referenced].sort().map((code) => {
        const account = accounts.get(code);
        return { code, type: account?.type, normalSide: account?.normalSide };
      }),
    });
  }
}
