import { jest } from '@jest/globals';
import { InMemoryDocumentStore } from '@ledgerline/database';
import { LedgerService, createLedgerService } from '@ledgerline/ledger-service';
import { Clock, Period, PostingSide, TaxKind, TaxReturn } from '@ledgerline/shared-types';
import { AuthorityGateway } from '../services/authorityGateway';
import { TaxEngine } from '../services/taxEngine';
import { defaultTaxConfigurations } from '../services/taxConfiguration';

export interface MutableClock extends Clock {
  set(iso: string): void;
  advance(ms: number): void;
}

export function mutableClock(iso: string): MutableClock {
  let current = new Date(iso);
  return {
    now: () => current,
    set: (next) => {
      current = new Date(next);
    },
    advance: (ms) => {
      current = new Date(current.getTime() + ms);
    },
  };
}

export interface Books {
  store: InMemoryDocumentStore;
  service: LedgerService;
  engine: TaxEngine;
}

export async function openBooks(clock: Clock): Promise<Books> {
  const store = new InMemoryDocumentStore();
  const service = createLedgerService(store, { clock });
  await service.accounts.seedDefaultChart();
  let sequence = 0;
  const engine = new TaxEngine(service.ledger, service.accounts, defaultTaxConfigurations(), {
    clock,
    generateId: () => `return-${++sequence}`,
  });
  return { store, service, engine };
}

/** Books a sale to the bank: debit 1100, credit `incomeCode`. */
export function postSale(books: Books, amount: number, timestamp: string, incomeCode = '4000') {
  return books.service.ledger.post({
    timestamp,
    description: 'Sale',
    postings: [
      { accountCode: '1100', amount, side: PostingSide.DEBIT },
      { accountCode: incomeCode, amount, side: PostingSide.CREDIT },
    ],
  });
}

export function postExpense(books: Books, amount: number, timestamp: string, expenseCode = '5000') {
  return books.service.ledger.post({
    timestamp,
    description: 'Purchase',
    postings: [
      { accountCode: expenseCode, amount, side: PostingSide.DEBIT },
      { accountCode: '1100', amount, side: PostingSide.CREDIT },
    ],
  });
}

/** Q1 2024 VAT period with one £1,200 sale and one £300 purchase, closed and keyed `24A1`. */
export async function closedVatQuarter(books: Books): Promise<Period> {
  const period = await books.service.periods.createPeriod({
    start: '2024-01-01',
    end: '2024-03-31',
    taxKind: TaxKind.VAT,
    periodKey: '24A1',
  });
  await postSale(books, 120000, '2024-02-10T10:00:00.000Z');
  await postExpense(books, 30000, '2024-02-20T10:00:00.000Z');
  return books.service.ledger.closePeriod(period.id);
}

export function fakeGateway() {
  return {
    listObligations: jest.fn<AuthorityGateway['listObligations']>(),
    submitReturn: jest.fn<AuthorityGateway['submitReturn']>(),
    filingStatus: jest.fn<AuthorityGateway['filingStatus']>(),
  };
}

export function receipt(reference: string) {
  return { processingDate: '2024-04-20T09:00:00.000Z', reference, formBundleNumber: reference, raw: { formBundleNumber: reference } };
}

export function vatReturn(overrides: Partial<TaxReturn> = {}): TaxReturn {
  return {
    id: 'return-1',
    periodId: 'period-q1',
    taxKind: TaxKind.VAT,
    periodKey: '24A1',
    start: '2024-01-01',
    end: '2024-03-31',
    lines: {
      vatDueSales: 24000,
      vatDueAcquisitions: 0,
      totalVatDue: 24000,
      vatReclaimedCurrPeriod: 6000,
      netVatDue: 18000,
      totalValueSalesExVAT: 120000,
      totalValuePurchasesExVAT: 30000,
      totalValueGoodsSuppliedExVAT: 0,
      totalAcquisitionsExVAT: 0,
    },
    currency: 'GBP',
    computedAt: '2024-04-10T09:00:00.000Z',
    configVersion: 'uk-2023.1',
    checksum: 'checksum-a',
    transactionIds: ['t-1', 't-2'],
    ...overrides,
  };
}
