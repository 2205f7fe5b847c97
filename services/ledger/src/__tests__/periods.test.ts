import { describe, it, expect, beforeEach } from '@jest/globals';
import { InMemoryDocumentStore } from '@ledgerline/database';
import { PeriodStatus, TaxKind } from '@ledgerline/shared-types';
import {
  ConflictError,
  PeriodGapError,
  PeriodNotClosedError,
  PeriodOverlapError,
} from '@ledgerline/shared-utils';
import { LedgerService, createLedgerService, currentTaxYearStart, quarterlyVatPeriods, ukTaxYear } from '../index';

const clock = { now: () => new Date('2024-06-15T12:00:00.000Z') };

describe('PeriodRegistry', () => {
  let service: LedgerService;

  beforeEach(() => {
    service = createLedgerService(new InMemoryDocumentStore(), { clock });
  });

  it('tiles periods of one kind without overlaps or gaps', async () => {
    const q2 = await service.periods.createPeriod({ start: '2024-04-01', end: '2024-06-30', taxKind: TaxKind.VAT });

    await expect(
      service.periods.createPeriod({ start: '2024-06-01', end: '2024-08-31', taxKind: TaxKind.VAT })
    ).rejects.toBeInstanceOf(PeriodOverlapError);
    await expect(
      service.periods.createPeriod({ start: '2024-08-01', end: '2024-10-31', taxKind: TaxKind.VAT })
    ).rejects.toBeInstanceOf(PeriodGapError);

    const q1 = await service.periods.createPeriod({ start: '2024-01-01', end: '2024-03-31', taxKind: TaxKind.VAT });
    const q3 = await service.periods.createPeriod({ start: '2024-07-01', end: '2024-09-30', taxKind: TaxKind.VAT });
    await service.periods.createPeriod({ start: '2024-04-06', end: '2025-04-05', taxKind: TaxKind.INCOME_TAX });

    expect((await service.periods.list(TaxKind.VAT)).map((period) => period.id)).toEqual([q1.id, q2.id, q3.id]);
    expect((await service.periods.findContaining('2024-05-01')).map((period) => period.taxKind).sort()).toEqual([
      TaxKind.INCOME_TAX,
      TaxKind.VAT,
    ]);
    expect((await service.periods.findByRange('2024-07-01', '2024-09-30', TaxKind.VAT))?.id).toBe(q3.id);
  });

  it('rejects a period that ends before it starts', async () => {
    await expect(
      service.periods.createPeriod({ start: '2024-03-31', end: '2024-01-01', taxKind: TaxKind.VAT })
    ).rejects.toMatchObject({ code: 'VALIDATION_ERROR' });
  });

  it('pins the configuration version at close and clears it on reopen', async () => {
    const period = await service.periods.createPeriod({ start: '2024-01-01', end: '2024-03-31', taxKind: TaxKind.VAT });

    const closed = await service.ledger.closePeriod(period.id, 'uk-2024.1');
    expect(closed.status).toBe(PeriodStatus.CLOSED);
    expect(closed.configVersion).toBe('uk-2024.1');
    expect(closed.closedAt).toBe('2024-06-15T12:00:00.000Z');

    const reopened = await service.ledger.reopenPeriod(period.id);
    expect(reopened.status).toBe(PeriodStatus.OPEN);
    expect(reopened.configVersion).toBeUndefined();
  });

  it('only marks closed periods as submitted, and never reopens them afterwards', async () => {
    const period = await service.periods.createPeriod({ start: '2024-01-01', end: '2024-03-31', taxKind: TaxKind.VAT });

    await expect(service.periods.markSubmitted(period.id)).rejects.toBeInstanceOf(PeriodNotClosedError);

    await service.ledger.closePeriod(period.id);
    const submitted = await service.periods.markSubmitted(period.id);
    expect(submitted.status).toBe(PeriodStatus.SUBMITTED);
    await expect(service.ledger.reopenPeriod(period.id)).rejects.toBeInstanceOf(ConflictError);
  });

  it('assigns authority period keys', async () => {
    const period = await service.periods.createPeriod({ start: '2024-01-01', end: '2024-03-31', taxKind: TaxKind.VAT });
    await service.periods.assignPeriodKey(period.id, '24A1');

    expect((await service.periods.findByPeriodKey('24A1', TaxKind.VAT))?.id).toBe(period.id);
  });
});

describe('period calendars', () => {
  it('splits a year into calendar quarters', () => {
    expect(quarterlyVatPeriods(2024)).toEqual([
      { start: '2024-01-01', end: '2024-03-31' },
      { start: '2024-04-01', end: '2024-06-30' },
      { start: '2024-07-01', end: '2024-09-30' },
      { start: '2024-10-01', end: '2024-12-31' },
    ]);
  });

  it('runs the UK tax year from 6 April to 5 April', () => {
    expect(ukTaxYear(2024)).toEqual({ start: '2024-04-06', end: '2025-04-05', key: '2024-25' });
    expect(ukTaxYear(2099).key).toBe('2099-00');
    expect(currentTaxYearStart('2024-04-05')).toBe(2023);
    expect(currentTaxYearStart('2024-04-06')).toBe(2024);
  });
});
