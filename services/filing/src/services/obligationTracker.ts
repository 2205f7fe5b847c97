import { DocumentStore } from '@ledgerline/database';
import {
  CalendarDate,
  Clock,
  Obligation,
  ObligationStatus,
  Period,
  PeriodId,
  TaxKind,
  systemClock,
} from '@ledgerline/shared-types';
import {
  AlreadyFulfilledError,
  Mutex,
  NotFoundError,
  addDays,
  addMonths,
  createLogger,
  lastDayOfMonth,
  toCalendarDate,
} from '@ledgerline/shared-utils';

const logger = createLogger('filing-service');

export interface ObligationInput {
  periodId: PeriodId;
  taxKind: TaxKind;
  start: CalendarDate;
  end: CalendarDate;
  dueDate: CalendarDate;
  periodKey?: string;
}

/**
 * Statutory deadline when the authority has not told us one: seven days after the end of the
 * month following a VAT period, 31 January after the end of a tax year.
 */
export function defaultDueDate(period: Pick<Period, 'taxKind' | 'end'>): CalendarDate {
  if (period.taxKind === TaxKind.VAT) {
    const following = addMonths(period.end, 1);
    return addDays(lastDayOfMonth(Number(following.slice(0, 4)), Number(following.slice(5, 7))), 7);
  }
  return `${Number(period.end.slice(0, 4)) + 1}-01-31`;
}

function byDueDate(a: Obligation, b: Obligation): number {
  if (a.dueDate !== b.dueDate) {
    return a.dueDate < b.dueDate ? -1 : 1;
  }
  return a.start < b.start ? -1 : a.start > b.start ? 1 : 0;
}

/** Filing obligations per period, keyed by period id. Fulfilment is terminal. */
export class ObligationTracker {
  private readonly lock = new Mutex();

  constructor(
    private readonly store: DocumentStore,
    private readonly clock: Clock = systemClock
  ) {}

  /** Creates or refreshes an open obligation. A fulfilled obligation is returned unchanged. */
  register(input: ObligationInput): Promise<Obligation> {
    return this.lock.runExclusive(() => this.upsert(input));
  }

  private async upsert(input: ObligationInput): Promise<Obligation> {
    const existing = await this.store.load('obligation', input.periodId);
    if (existing?.status === ObligationStatus.FULFILLED) {
      return existing;
    }
    const obligation: Obligation = {
      periodId: input.periodId,
      taxKind: input.taxKind,
      periodKey: input.periodKey ?? existing?.periodKey,
      start: input.start,
      end: input.end,
      dueDate: input.dueDate,
      status: ObligationStatus.OPEN,
    };
    await this.store.save('obligation', input.periodId, obligation);
    if (!existing) {
      logger.info('Obligation registered', { periodId: input.periodId, dueDate: input.dueDate });
    }
    return obligation;
  }

  /** Registers an obligation for a period using the statutory due date. */
  registerForPeriod(period: Period): Promise<Obligation> {
    return this.register({
      periodId: period.id,
      taxKind: period.taxKind,
      start: period.start,
      end: period.end,
      periodKey: period.periodKey,
      dueDate: defaultDueDate(period),
    });
  }

  async get(periodId: PeriodId): Promise<Obligation> {
    const obligation = await this.store.load('obligation', periodId);
    if (!obligation) {
      throw new NotFoundError('Obligation', periodId);
    }
    return obligation;
  }

  async find(periodId: PeriodId): Promise<Obligation | undefined> {
    return this.store.load('obligation', periodId);
  }

  /** Open obligations already due, earliest due date first. */
  async listOpen(): Promise<Obligation[]> {
    const today = toCalendarDate(this.clock.now());
    const open = await this.store.list('obligation', { status: ObligationStatus.OPEN });
    return open.filter((obligation) => obligation.dueDate <= today).sort(byDueDate);
  }

  async listAll(): Promise<Obligation[]> {
    return (await this.store.list('obligation')).sort(byDueDate);
  }

  /**
   * One-way transition to fulfilled. Repeating with the same reference is a no-op; a different
   * reference fails and leaves the recorded one in place.
   */
  markFulfilled(periodId: PeriodId, authorityReference: string): Promise<Obligation> {
    return this.lock.runExclusive(() => this.fulfil(periodId, authorityReference));
  }

  private async fulfil(periodId: PeriodId, authorityReference: string): Promise<Obligation> {
    const obligation = await this.get(periodId);
    if (obligation.status === ObligationStatus.FULFILLED) {
      if (obligation.authorityReference === authorityReference) {
        return obligation;
      }
      throw new AlreadyFulfilledError(periodId, obligation.authorityReference ?? 'unknown reference');
    }
    const fulfilled: Obligation = {
      ...obligation,
      status: ObligationStatus.FULFILLED,
      authorityReference,
      fulfilledAt: this.clock.now().toISOString(),
    };
    await this.store.save('obligation', periodId, fulfilled);
    logger.info('Obligation fulfilled', { periodId, authorityReference });
    return fulfilled;
  }
}
