import { randomUUID } from 'crypto';
import { DocumentStore } from '@ledgerline/database';
import {
  CalendarDate,
  Clock,
  Period,
  PeriodId,
  PeriodStatus,
  TaxKind,
  systemClock,
} from '@ledgerline/shared-types';
import {
  ConflictError,
  Mutex,
  NotFoundError,
  PeriodGapError,
  PeriodNotClosedError,
  PeriodOverlapError,
  addDays,
  createLogger,
  lastDayOfMonth,
  parseWith,
  periodInputSchema,
} from '@ledgerline/shared-utils';

const logger = createLogger('ledger-service');

export interface PeriodInput {
  start: CalendarDate;
  end: CalendarDate;
  taxKind: TaxKind;
  periodKey?: string;
}

export interface DateRange {
  start: CalendarDate;
  end: CalendarDate;
}

export interface TaxYear extends DateRange {
  /** Authority form, e.g. `2024-25`. */
  key: string;
}

/** Calendar quarters of `year` (Jan-Mar, Apr-Jun, Jul-Sep, Oct-Dec). */
export function quarterlyVatPeriods(year: number): DateRange[] {
  return [1, 4, 7, 10].map((startMonth) => ({
    start: `${year}-${String(startMonth).padStart(2, '0')}-01`,
    end: lastDayOfMonth(year, startMonth + 2),
  }));
}

/** UK tax year starting 6 April of `startYear`. */
export function ukTaxYear(startYear: number): TaxYear {
  return {
    start: `${startYear}-04-06`,
    end: `${startYear + 1}-04-05`,
    key: `${startYear}-${String((startYear + 1) % 100).padStart(2, '0')}`,
  };
}

export function currentTaxYearStart(date: CalendarDate): number {
  const year = Number(date.slice(0, 4));
  return date.slice(5) < '04-06' ? year - 1 : year;
}

function overlaps(a: DateRange, b: DateRange): boolean {
  return a.start <= b.end && b.start <= a.end;
}

function byStart(a: Period, b: Period): number {
  return a.start < b.start ? -1 : a.start > b.start ? 1 : 0;
}

/**
 * Tax periods per kind. Periods of one kind never overlap and extend the existing run without
 * gaps. Status changes run under the owning ledger's mutex so that a close cannot interleave
 * with a post.
 */
export class PeriodRegistry {
  readonly lock: Mutex;

  constructor(
    private readonly store: DocumentStore,
    private readonly clock: Clock = systemClock,
    lock: Mutex = new Mutex()
  ) {
    this.lock = lock;
  }

  async createPeriod(input: PeriodInput): Promise<Period> {
    const parsed = parseWith(periodInputSchema, input, 'period');
    return this.lock.runExclusive(async () => {
      const existing = await this.list(parsed.taxKind);

      const overlapping = existing.find((period) => overlaps(period, parsed));
      if (overlapping) {
        throw new PeriodOverlapError(overlapping.id);
      }

      const first = existing[0];
      const last = existing[existing.length - 1];
      if (first && last) {
        const expectedStart = addDays(last.end, 1);
        const expectedEnd = addDays(first.start, -1);
        if (parsed.start !== expectedStart && parsed.end !== expectedEnd) {
          throw new PeriodGapError(expectedStart, expectedEnd);
        }
      }

      const period: Period = {
        id: randomUUID(),
        start: parsed.start,
        end: parsed.end,
        taxKind: parsed.taxKind,
        status: PeriodStatus.OPEN,
        periodKey: parsed.periodKey,
        createdAt: this.clock.now().toISOString(),
      };
      await this.store.save('period', period.id, period);

      logger.info('Period created', { periodId: period.id, taxKind: period.taxKind, start: period.start, end: period.end });
      return period;
    });
  }

  async get(periodId: PeriodId): Promise<Period> {
    const period = await this.store.load('period', periodId);
    if (!period) {
      throw new NotFoundError('Period', periodId);
    }
    return period;
  }

  /** Periods ordered by start date. */
  async list(taxKind?: TaxKind): Promise<Period[]> {
    const periods = await this.store.list('period', taxKind ? { taxKind } : undefined);
    return periods.sort(byStart);
  }

  async findByRange(start: CalendarDate, end: CalendarDate, taxKind: TaxKind): Promise<Period | undefined> {
    return (await this.list(taxKind)).find((period) => period.start === start && period.end === end);
  }

  async findByPeriodKey(periodKey: string, taxKind: TaxKind): Promise<Period | undefined> {
    return (await this.list(taxKind)).find((period) => period.periodKey === periodKey);
  }

  async findContaining(date: CalendarDate, taxKind?: TaxKind): Promise<Period[]> {
    return (await this.list(taxKind)).filter((period) => period.start <= date && date <= period.end);
  }

  /** Caller must hold {@link lock}. */
  async close(periodId: PeriodId, configVersion?: string): Promise<Period> {
    const period = await this.get(periodId);
    if (period.status !== PeriodStatus.OPEN) {
      return period;
    }
    const closed: Period = {
      ...period,
      status: PeriodStatus.CLOSED,
      configVersion: configVersion ?? period.configVersion,
      closedAt: this.clock.now().toISOString(),
    };
    await this.store.save('period', periodId, closed);
    logger.info('Period closed', { periodId, configVersion: closed.configVersion });
    return closed;
  }

  /** Caller must hold {@link lock}. */
  async reopen(periodId: PeriodId): Promise<Period> {
    const period = await this.get(periodId);
    if (period.status === PeriodStatus.SUBMITTED) {
      throw new ConflictError(`Period ${periodId} has been submitted and cannot be reopened`, { periodId });
    }
    if (period.status === PeriodStatus.OPEN) {
      return period;
    }
    const reopened: Period = { ...period, status: PeriodStatus.OPEN };
    delete reopened.configVersion;
    delete reopened.closedAt;
    await this.store.save('period', periodId, reopened);
    logger.info('Period reopened', { periodId });
    return reopened;
  }

  markSubmitted(periodId: PeriodId): Promise<Period> {
    return this.lock.runExclusive(async () => {
      const period = await this.get(periodId);
      if (period.status === PeriodStatus.SUBMITTED) {
        return period;
      }
      if (period.status !== PeriodStatus.CLOSED) {
        throw new PeriodNotClosedError(periodId, period.status);
      }
      const submitted: Period = {
        ...period,
        status: PeriodStatus.SUBMITTED,
        submittedAt: this.clock.now().toISOString(),
      };
      await this.store.save('period', periodId, submitted);
      return submitted;
    });
  }

  async assignPeriodKey(periodId: PeriodId, periodKey: string): Promise<Period> {
    const period = await this.get(periodId);
    if (period.periodKey === periodKey) {
      return period;
    }
    const updated: Period = { ...period, periodKey };
    await this.store.save('period', periodId, updated);
    return updated;
  }
}
