import { classifyMtdError } from '@ledgerline/hmrc';
import { createServiceLogger, withExponentialBackoff } from '@ledgerline/observability';
import { CalendarDate, Obligation, Period, PeriodId, TaxKind } from '@ledgerline/shared-types';
import { PeriodGapError, PeriodOverlapError } from '@ledgerline/shared-utils';
import { AuthorityGateway, AuthorityObligation, DateWindow } from './authorityGateway';
import { ObligationTracker } from './obligationTracker';
import { TokenProvider } from './submissionPipeline';

const logger = createServiceLogger('filing-service', { component: 'obligation-discovery' });

/** Period operations discovery needs; a PeriodRegistry in production. */
export interface PeriodCatalog {
  findByPeriodKey(periodKey: string, taxKind: TaxKind): Promise<Period | undefined>;
  findByRange(start: CalendarDate, end: CalendarDate, taxKind: TaxKind): Promise<Period | undefined>;
  createPeriod(input: { start: CalendarDate; end: CalendarDate; taxKind: TaxKind; periodKey?: string }): Promise<Period>;
  assignPeriodKey(periodId: PeriodId, periodKey: string): Promise<Period>;
}

export interface DiscoveryOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  wait?: (ms: number) => Promise<void>;
}

export interface DiscoveryResult {
  taxKind: TaxKind;
  obligations: Obligation[];
  createdPeriods: PeriodId[];
  /** Authority obligations that could not be matched to, or turned into, a ledger period. */
  skipped: Array<{ periodKey?: string; start: CalendarDate; end: CalendarDate; reason: string }>;
}

/**
 * Pulls the authority's obligations for a window and mirrors them locally: a period per
 * obligation (created when missing, keyed otherwise) and an obligation record carrying the
 * authority's due date and status.
 */
export class ObligationDiscovery {
  constructor(
    private readonly gateway: AuthorityGateway,
    private readonly auth: TokenProvider,
    private readonly periods: PeriodCatalog,
    private readonly tracker: ObligationTracker,
    private readonly options: DiscoveryOptions = {}
  ) {}

  async discover(taxKind: TaxKind, window: DateWindow): Promise<DiscoveryResult> {
    const accessToken = await this.auth.validToken();
    const fetched = await withExponentialBackoff(
      () => this.gateway.listObligations(taxKind, window, { accessToken }),
      {
        maxAttempts: this.options.maxAttempts ?? 3,
        baseDelayMs: this.options.baseDelayMs,
        maxDelayMs: this.options.maxDelayMs,
        wait: this.options.wait,
        shouldRetry: (error) => {
          const kind = classifyMtdError(error);
          return kind === 'transient' || kind === 'timeout';
        },
        onRetry: (attempt, error, delayMs) => {
          logger.warn('Obligation retrieval failed; retrying', { taxKind, attempt, delayMs, error: String(error) });
        },
      }
    );

    const result: DiscoveryResult = { taxKind, obligations: [], createdPeriods: [], skipped: [] };
    const ordered = [...fetched].sort((a, b) => (a.start < b.start ? -1 : a.start > b.start ? 1 : 0));

    for (const remote of ordered) {
      const period = await this.matchPeriod(taxKind, remote, result);
      if (!period) {
        continue;
      }

      let obligation = await this.tracker.register({
        periodId: period.id,
        taxKind,
        start: period.start,
        end: period.end,
        periodKey: remote.periodKey ?? period.periodKey,
        dueDate: remote.due,
      });
      if (remote.status === 'fulfilled') {
        obligation = await this.tracker.markFulfilled(
          period.id,
          obligation.authorityReference ?? `${remote.periodKey ?? period.id}:${remote.received ?? 'received'}`
        );
      }
      result.obligations.push(obligation);
    }

    logger.info('Obligations discovered', {
      taxKind,
      from: window.from,
      to: window.to,
      obligations: result.obligations.length,
      createdPeriods: result.createdPeriods.length,
      skipped: result.skipped.length,
    });
    return result;
  }

  private async matchPeriod(
    taxKind: TaxKind,
    remote: AuthorityObligation,
    result: DiscoveryResult
  ): Promise<Period | undefined> {
    const byKey = remote.periodKey ? await this.periods.findByPeriodKey(remote.periodKey, taxKind) : undefined;
    if (byKey) {
      return byKey;
    }

    const byRange = await this.periods.findByRange(remote.start, remote.end, taxKind);
    if (byRange) {
      return remote.periodKey ? this.periods.assignPeriodKey(byRange.id, remote.periodKey) : byRange;
    }

    try {
      const created = await this.periods.createPeriod({
        start: remote.start,
        end: remote.end,
        taxKind,
        periodKey: remote.periodKey,
      });
      result.createdPeriods.push(created.id);
      return created;
    } catch (error) {
      if (!(error instanceof PeriodOverlapError || error instanceof PeriodGapError)) {
        throw error;
      }
      logger.warn('Authority obligation does not fit the local periods', {
        taxKind,
        periodKey: remote.periodKey,
        start: remote.start,
        end: remote.end,
        reason: error.message,
      });
      result.skipped.push({ periodKey: remote.periodKey, start: remote.start, end: remote.end, reason: error.message });
      return undefined;
    }
  }
}
