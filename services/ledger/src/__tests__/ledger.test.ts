import { describe, it, expect, beforeEach } from '@jest/globals';
import { InMemoryDocumentStore } from '@ledgerline/database';
import {
  AccountType,
  NewTransaction,
  PostingSide,
  TaxKind,
  Transaction,
  TransactionStatus,
} from '@ledgerline/shared-types';
import {
  ConflictError,
  ConstraintViolationError,
  CurrencyMismatchError,
  ImmutableTransactionError,
  PeriodClosedError,
  UnbalancedError,
  UnknownAccountError,
  ValidationError,
} from '@ledgerline/shared-utils';
import { LedgerService, createLedgerService, debitEffect, noOverdraft } from '../index';

const clock = { now: () => new Date('2024-06-15T12:00:00.000Z') };

function sale(amount: number, timestamp: string, id?: string): NewTransaction {
  return {
    id,
    timestamp,
    description: 'Invoice',
    postings: [
      { accountCode: '1100', amount, side: PostingSide.DEBIT },
      { accountCode: '4000', amount, side: PostingSide.CREDIT },
    ],
  };
}

function expense(amount: number, timestamp: string): NewTransaction {
  return {
    timestamp,
    description: 'Supplier payment',
    postings: [
      { accountCode: '5000', amount, side: PostingSide.DEBIT },
      { accountCode: '1100', amount, side: PostingSide.CREDIT },
    ],
  };
}

function isBalanced(transaction: Transaction): boolean {
  return transaction.postings.reduce((sum, posting) => sum + debitEffect(posting), 0) === 0;
}

describe('Ledger', () => {
  let service: LedgerService;

  beforeEach(async () => {
    service = createLedgerService(new InMemoryDocumentStore(), { clock });
    await service.accounts.create('1100', 'Bank', AccountType.ASSET);
    await service.accounts.create('2100', 'VAT Output', AccountType.LIABILITY);
    await service.accounts.create('3000', 'Capital', AccountType.EQUITY);
    await service.accounts.create('4000', 'Sales', AccountType.INCOME);
    await service.accounts.create('5000', 'Purchases', AccountType.EXPENSE);
  });

  describe('post', () => {
    it('posts a balanced transaction and orients balances to the normal side', async () => {
      const posted = await service.ledger.post(sale(120000, '2024-01-15T10:00:00Z'));

      expect(posted.status).toBe(TransactionStatus.POSTED);
      expect(posted.sequence).toBe(1);
      expect(posted.timestamp).toBe('2024-01-15T10:00:00.000Z');
      expect(await service.ledger.balanceAsOf('1100', '2024-01-31')).toBe(120000);
      expect(await service.ledger.balanceAsOf('4000', '2024-01-31')).toBe(120000);
      expect((await service.accounts.get('1100')).referenced).toBe(true);
    });

    it('rejects a three-posting transaction a penny out of balance without touching balances', async () => {
      await expect(
        service.ledger.post({
          timestamp: '2024-01-15T10:00:00Z',
          description: 'Invoice with VAT',
          postings: [
            { accountCode: '1100', amount: 12000, side: PostingSide.DEBIT },
            { accountCode: '4000', amount: 10000, side: PostingSide.CREDIT },
            { accountCode: '2100', amount: 1999, side: PostingSide.CREDIT },
          ],
        })
      ).rejects.toBeInstanceOf(UnbalancedError);

      expect(await service.ledger.balanceAsOf('1100', '2024-12-31')).toBe(0);
      expect(await service.ledger.balanceAsOf('4000', '2024-12-31')).toBe(0);
      expect(await service.ledger.balanceAsOf('2100', '2024-12-31')).toBe(0);
      expect(await service.ledger.list()).toEqual([]);
      expect((await service.accounts.get('1100')).referenced).toBe(false);
    });

    it('rejects unknown and inactive accounts', async () => {
      const unknown = sale(100, '2024-01-15T10:00:00Z');
      unknown.postings[1] = { accountCode: '9999', amount: 100, side: PostingSide.CREDIT };
      await expect(service.ledger.post(unknown)).rejects.toBeInstanceOf(UnknownAccountError);

      await service.accounts.deactivate('4000');
      await expect(service.ledger.post(sale(100, '2024-01-15T10:00:00Z'))).rejects.toBeInstanceOf(
        UnknownAccountError
      );
    });

    it('rejects fractional amounts, single postings and foreign currency', async () => {
      const fractional = sale(100, '2024-01-15T10:00:00Z');
      fractional.postings[0] = { accountCode: '1100', amount: 100.5, side: PostingSide.DEBIT };
      await expect(service.ledger.post(fractional)).rejects.toBeInstanceOf(ValidationError);

      await expect(
        service.ledger.post({
          timestamp: '2024-01-15T10:00:00Z',
          description: 'Half',
          postings: [{ accountCode: '1100', amount: 100, side: PostingSide.DEBIT }],
        })
      ).rejects.toBeInstanceOf(ValidationError);

      await expect(
        service.ledger.post({ ...sale(100, '2024-01-15T10:00:00Z'), currency: 'EUR' })
      ).rejects.toBeInstanceOf(CurrencyMismatchError);
    });

    it('refuses posts dated inside a closed period until it is reopened', async () => {
      const period = await service.periods.createPeriod({ start: '2024-01-01', end: '2024-03-31', taxKind: TaxKind.VAT });
      await service.ledger.closePeriod(period.id, 'uk-2024.1');

      await expect(service.ledger.post(sale(100, '2024-02-10T09:00:00Z'))).rejects.toBeInstanceOf(PeriodClosedError);

      await service.ledger.reopenPeriod(period.id);
      await expect(service.ledger.post(sale(100, '2024-02-10T09:00:00Z'))).resolves.toMatchObject({
        status: TransactionStatus.POSTED,
      });
    });

    it('serialises concurrent posts against balance constraints', async () => {
      await service.ledger.post({
        timestamp: '2024-01-01T09:00:00Z',
        description: 'Opening capital',
        postings: [
          { accountCode: '1100', amount: 10000, side: PostingSide.DEBIT },
          { accountCode: '3000', amount: 10000, side: PostingSide.CREDIT },
        ],
      });
      const constraints = [noOverdraft(['1100'])];

      const results = await Promise.allSettled([
        service.ledger.post(expense(7000, '2024-01-02T09:00:00Z'), { constraints }),
        service.ledger.post(expense(7000, '2024-01-02T09:00:00Z'), { constraints }),
      ]);

      expect(results.filter((result) => result.status === 'fulfilled')).toHaveLength(1);
      const rejected = results.find((result) => result.status === 'rejected');
      expect(rejected?.status === 'rejected' && rejected.reason).toBeInstanceOf(ConstraintViolationError);
      expect(await service.ledger.balanceAsOf('1100', '2024-01-31')).toBe(3000);
    });
  });

  describe('balanceAsOf', () => {
    it('includes the whole of the requested date and ignores later postings', async () => {
      await service.ledger.post(sale(5000, '2024-01-15T23:30:00Z'));
      expect(await service.ledger.balanceAsOf('1100', '2024-01-15')).toBe(5000);

      await service.ledger.post(sale(700, '2024-01-20T09:00:00Z'));
      expect(await service.ledger.balanceAsOf('1100', '2024-01-15')).toBe(5000);

      await service.ledger.post(sale(300, '2024-01-10T09:00:00Z'));
      expect(await service.ledger.balanceAsOf('1100', '2024-01-15')).toBe(5300);
    });

    it('returns a negative balance when an account runs against its normal side', async () => {
      await service.ledger.post(expense(2500, '2024-01-05T09:00:00Z'));
      expect(await service.ledger.balanceAsOf('1100', '2024-01-31')).toBe(-2500);
    });
  });

  describe('void', () => {
    it('keeps the original, appends a balanced reversal and nets the balance to zero', async () => {
      const original = await service.ledger.post(sale(120000, '2024-01-15T10:00:00Z'));

      const { original: voided, reversal } = await service.ledger.void(original.id, { reason: 'duplicate invoice' });

      expect(voided.status).toBe(TransactionStatus.VOID);
      expect(voided.postings).toEqual(original.postings);
      expect(reversal.reversalOf).toBe(original.id);
      expect(reversal.timestamp).toBe('2024-06-15T12:00:00.000Z');
      expect(reversal.postings.map((posting) => posting.side)).toEqual([PostingSide.CREDIT, PostingSide.DEBIT]);
      expect(await service.ledger.balanceAsOf('1100', '2024-12-31')).toBe(0);
      expect(await service.ledger.balanceAsOf('1100', '2024-01-31')).toBe(120000);
      expect(await service.ledger.reversalOf(original.id)).toEqual({
        originalId: original.id,
        reversalId: reversal.id,
        reason: 'duplicate invoice',
        createdAt: '2024-06-15T12:00:00.000Z',
      });

      const all = await service.ledger.list();
      expect(all).toHaveLength(2);
      expect(all.every(isBalanced)).toBe(true);
    });

    it('refuses to void twice or to void a reversal', async () => {
      const original = await service.ledger.post(sale(100, '2024-01-15T10:00:00Z'));
      const { reversal } = await service.ledger.void(original.id);

      await expect(service.ledger.void(original.id)).rejects.toBeInstanceOf(ImmutableTransactionError);
      await expect(service.ledger.void(reversal.id)).rejects.toBeInstanceOf(ImmutableTransactionError);
    });
  });

  describe('drafts', () => {
    it('keeps drafts out of balances until they are posted', async () => {
      const draft = await service.ledger.createDraft(sale(100, '2024-01-15T10:00:00Z', 'draft-1'));
      expect(draft.status).toBe(TransactionStatus.DRAFT);
      expect(await service.ledger.balanceAsOf('1100', '2024-01-31')).toBe(0);

      await service.ledger.updateDraft('draft-1', sale(250, '2024-01-16T10:00:00Z'));
      const posted = await service.ledger.postDraft('draft-1');

      expect(posted.id).toBe('draft-1');
      expect(await service.ledger.balanceAsOf('1100', '2024-01-31')).toBe(250);
      await expect(service.ledger.updateDraft('draft-1', sale(1, '2024-01-16T10:00:00Z'))).rejects.toBeInstanceOf(
        ImmutableTransactionError
      );
    });

    it('applies an edit queued before a post of the same draft', async () => {
      await service.ledger.createDraft(sale(100, '2024-01-15T10:00:00Z', 'draft-2'));

      const [updated, posted] = await Promise.allSettled([
        service.ledger.updateDraft('draft-2', sale(999, '2024-01-15T10:00:00Z')),
        service.ledger.postDraft('draft-2'),
      ]);

      expect(updated.status).toBe('fulfilled');
      expect(posted.status).toBe('fulfilled');
      expect((await service.ledger.get('draft-2')).status).toBe(TransactionStatus.POSTED);
      expect(await service.ledger.balanceAsOf('1100', '2024-01-31')).toBe(999);
    });

    it('refuses an edit queued after a post of the same draft', async () => {
      await service.ledger.createDraft(sale(100, '2024-01-15T10:00:00Z', 'draft-3'));

      const [posted, updated] = await Promise.allSettled([
        service.ledger.postDraft('draft-3'),
        service.ledger.updateDraft('draft-3', sale(999, '2024-01-15T10:00:00Z')),
      ]);

      expect(posted.status).toBe('fulfilled');
      expect(updated.status).toBe('rejected');
      if (updated.status === 'rejected') {
        expect(updated.reason).toBeInstanceOf(ImmutableTransactionError);
      }
      expect(await service.ledger.balanceAsOf('1100', '2024-01-31')).toBe(100);
    });

    it('never replaces a posted transaction with a draft of the same id', async () => {
      const [posted, drafted] = await Promise.allSettled([
        service.ledger.post(sale(100, '2024-01-15T10:00:00Z', 'txn-1')),
        service.ledger.createDraft(sale(5, '2024-01-15T10:00:00Z', 'txn-1')),
      ]);

      expect(posted.status).toBe('fulfilled');
      expect(drafted.status).toBe('rejected');
      if (drafted.status === 'rejected') {
        expect(drafted.reason).toBeInstanceOf(ConflictError);
      }
      expect((await service.ledger.get('txn-1')).status).toBe(TransactionStatus.POSTED);
      expect(await service.ledger.balanceAsOf('1100', '2024-01-31')).toBe(100);
    });
  });

  describe('reports', () => {
    it('produces a statement with opening and running balances', async () => {
      await service.ledger.post(sale(1000, '2024-01-05T10:00:00Z'));
      await service.ledger.post(expense(400, '2024-02-03T10:00:00Z'));
      await service.ledger.post(sale(200, '2024-02-20T10:00:00Z'));

      const statement = await service.ledger.statement('1100', '2024-02-01', '2024-02-29');

      expect(statement.openingBalance).toBe(1000);
      expect(statement.lines.map((line) => line.balance)).toEqual([600, 800]);
      expect(statement.closingBalance).toBe(800);
    });

    it('produces a trial balance whose columns agree', async () => {
      await service.ledger.post(sale(1000, '2024-01-05T10:00:00Z'));
      await service.ledger.post(expense(400, '2024-02-03T10:00:00Z'));

      const trialBalance = await service.ledger.trialBalance('2024-12-31');

      expect(trialBalance.rows).toEqual([
        { accountCode: '1100', name: 'Bank', debit: 600, credit: 0 },
        { accountCode: '4000', name: 'Sales', debit: 0, credit: 1000 },
        { accountCode: '5000', name: 'Purchases', debit: 400, credit: 0 },
      ]);
      expect(trialBalance.totalDebits).toBe(1000);
      expect(trialBalance.totalCredits).toBe(1000);
    });

    it('selects committed transactions inside a period', async () => {
      await service.ledger.post(sale(1000, '2024-03-31T23:59:00Z'));
      await service.ledger.post(sale(2000, '2024-04-01T00:00:00Z'));
      await service.ledger.createDraft(sale(3000, '2024-03-10T00:00:00Z'));

      const inQuarter = await service.ledger.transactionsInPeriod({ start: '2024-01-01', end: '2024-03-31' });

      expect(inQuarter.map((transaction) => transaction.postings[0]?.amount)).toEqual([1000]);
    });
  });
});
