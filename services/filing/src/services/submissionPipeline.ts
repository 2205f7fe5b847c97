import { randomUUID } from 'crypto';
import { DocumentStore } from '@ledgerline/database';
import { MtdApiError, classifyMtdError } from '@ledgerline/hmrc';
import { BackoffPolicy, computeBackoffDelay, createServiceLogger } from '@ledgerline/observability';
import {
  Clock,
  Period,
  PeriodId,
  SubmissionErrorDetail,
  SubmissionOutcome,
  SubmissionRecord,
  SubmissionState,
  TaxReturn,
  systemClock,
} from '@ledgerline/shared-types';
import {
  AlreadyFulfilledError,
  AuthExpiredError,
  AuthRequiredError,
  AuthenticationError,
  PeriodNotClosedError,
  SingleFlight,
  SubmissionCancelledError,
  SubmissionDivergenceError,
  isAppError,
  sleep,
  toError,
} from '@ledgerline/shared-utils';
import { AuthorityFilingStatus, AuthorityGateway, AuthorityReceipt } from './authorityGateway';
import { ObligationTracker, defaultDueDate } from './obligationTracker';
import { assertSubmittable } from './preSubmissionValidation';

const logger = createServiceLogger('filing-service', { component: 'submission-pipeline' });

/** Anything that hands out a current access token (an AuthSession in production). */
export interface TokenProvider {
  validToken(): Promise<string>;
}

export interface SubmittedPeriods {
  markSubmitted(periodId: PeriodId): Promise<Period>;
}

export interface SubmissionPolicy extends BackoffPolicy {
  maxAttempts: number;
  timeoutMs: number;
}

export interface SubmissionPipelineOptions {
  policy?: Partial<SubmissionPolicy>;
  clock?: Clock;
  /** Waits out a retry delay; rejects when the signal aborts. */
  wait?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
  generateId?: () => string;
  onTransition?: (checksum: string, state: SubmissionState) => void;
}

export interface SubmitOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
  /** When false, return after one attempt instead of waiting out retry delays. */
  waitForRetries?: boolean;
}

export interface SubmissionResult {
  taxReturnId: string;
  checksum: string;
  state: SubmissionState;
  outcome: SubmissionOutcome;
  attempt: number;
  authorityReference?: string;
  error?: SubmissionErrorDetail;
  /** True when an earlier outcome was returned without contacting the authority. */
  cached: boolean;
  record: SubmissionRecord;
}

export const DEFAULT_SUBMISSION_POLICY: SubmissionPolicy = {
  maxAttempts: 5,
  baseDelayMs: 1000,
  maxDelayMs: 60000,
  jitterRatio: 0.1,
  timeoutMs: 30000,
};

type RecordFields = Omit<SubmissionRecord, 'id' | 'taxReturnId' | 'checksum' | 'periodId' | 'attempt' | 'attemptedAt'>;

function errorDetail(error: unknown): SubmissionErrorDetail {
  const err = toError(error);
  return {
    code: isAppError(err) ? err.code : 'UNKNOWN',
    message: err.message,
    statusCode: err instanceof MtdApiError ? err.status : undefined,
    body: err instanceof MtdApiError ? err.body : undefined,
  };
}

function isAuthFailure(error: unknown): boolean {
  return error instanceof AuthExpiredError || error instanceof AuthRequiredError || error instanceof AuthenticationError;
}

/** Records since the last terminal error; a new cycle restarts the attempt count. */
function currentCycle(records: SubmissionRecord[]): SubmissionRecord[] {
  let start = 0;
  records.forEach((record, index) => {
    if (record.state === SubmissionState.ERROR) {
      start = index + 1;
    }
  });
  return records.slice(start);
}

/**
 * Submits tax returns to the authority as a persisted state machine:
 * computed → authenticating → submitting → accepted | rejected | retrying → submitting | error,
 * with reconciling after a timeout.
 *
 * Every step appends a SubmissionRecord before the next one starts, so a restarted process
 * resumes from the records alone. A dispatch is always preceded by a `submitting` record; a
 * trailing `submitting` record therefore means the outcome is unknown and is reconciled with
 * the authority instead of being sent again.
 */
export class SubmissionPipeline {
  private readonly policy: SubmissionPolicy;
  private readonly clock: Clock;
  private readonly wait: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly random: () => number;
  private readonly generateId: () => string;
  private readonly submissions = new SingleFlight<string, SubmissionResult>();

  constructor(
    private readonly store: DocumentStore,
    private readonly gateway: AuthorityGateway,
    private readonly auth: TokenProvider,
    private readonly obligations: ObligationTracker,
    private readonly periods: SubmittedPeriods,
    private readonly options: SubmissionPipelineOptions = {}
  ) {
    this.policy = { ...DEFAULT_SUBMISSION_POLICY, ...options.policy };
    this.clock = options.clock ?? systemClock;
    this.wait = options.wait ?? sleep;
    this.random = options.random ?? Math.random;
    this.generateId = options.generateId ?? randomUUID;
  }

  /**
   * Submits a computed return. An accepted or rejected outcome for the same checksum is returned
   * without contacting the authority; concurrent calls for one checksum share a submission.
   */
  async submit(taxReturn: TaxReturn, options: SubmitOptions = {}): Promise<SubmissionResult> {
    assertSubmittable(taxReturn);

    const divergent = await this.detectDivergence(taxReturn);
    if (divergent) {
      throw new SubmissionDivergenceError(taxReturn.periodId, divergent.checksum, taxReturn.checksum);
    }

    return this.submissions.run(taxReturn.checksum, () => this.drive(taxReturn, options));
  }

  /** Continues persisted submissions whose retry time has passed or whose outcome is unknown. */
  async resumePending(): Promise<SubmissionResult[]> {
    const now = this.clock.now().getTime();
    const candidates = [
      ...(await this.store.list('submission_record', { state: SubmissionState.RETRYING })),
      ...(await this.store.list('submission_record', { state: SubmissionState.SUBMITTING })),
    ];
    const checksums = [...new Set(candidates.map((record) => record.checksum))];

    const results: SubmissionResult[] = [];
    for (const checksum of checksums) {
      const latest = await this.latest(checksum);
      if (!latest || this.submissions.isInFlight(checksum)) {
        continue;
      }
      const due =
        (latest.state === SubmissionState.RETRYING && Date.parse(latest.nextEligibleAt ?? latest.attemptedAt) <= now) ||
        latest.state === SubmissionState.SUBMITTING;
      if (!due) {
        continue;
      }

      const taxReturn = await this.store.load('tax_return', latest.taxReturnId);
      if (!taxReturn) {
        logger.error('Pending submission has no stored tax return', undefined, {
          checksum,
          taxReturnId: latest.taxReturnId,
        });
        continue;
      }
      try {
        results.push(
          await this.submissions.run(checksum, () => this.drive(taxReturn, { waitForRetries: false }))
        );
      } catch (error) {
        logger.error('Resuming submission failed', error, { checksum, periodId: latest.periodId });
      }
    }
    return results;
  }

  /** Every record for a checksum in the order written. */
  history(checksum: string): Promise<SubmissionRecord[]> {
    return this.store.list('submission_record', { checksum });
  }

  async latest(checksum: string): Promise<SubmissionRecord | undefined> {
    const records = await this.history(checksum);
    return records[records.length - 1];
  }

  /** Accepted record for the same period under a different checksum, if any. */
  async detectDivergence(taxReturn: TaxReturn): Promise<SubmissionRecord | undefined> {
    const accepted = await this.store.list('submission_record', {
      periodId: taxReturn.periodId,
      outcome: SubmissionOutcome.ACCEPTED,
    });
    return accepted.find((record) => record.checksum !== taxReturn.checksum);
  }

  private async drive(taxReturn: TaxReturn, options: SubmitOptions): Promise<SubmissionResult> {
    await this.store.save('tax_return', taxReturn.id, taxReturn);
    this.transition(taxReturn, SubmissionState.COMPUTED);

    for (;;) {
      const records = await this.history(taxReturn.checksum);
      const latest = records[records.length - 1];
      const accepted = records.find((record) => record.outcome === SubmissionOutcome.ACCEPTED);

      if (accepted) {
        logger.info('Returning recorded outcome', { checksum: taxReturn.checksum, state: accepted.state });
        return this.toResult(accepted, true);
      }
      if (latest?.state === SubmissionState.REJECTED) {
        logger.info('Returning recorded outcome', { checksum: taxReturn.checksum, state: latest.state });
        return this.toResult(latest, true);
      }

      if (latest?.state === SubmissionState.RETRYING) {
        const delay = Date.parse(latest.nextEligibleAt ?? latest.attemptedAt) - this.clock.now().getTime();
        if (delay > 0) {
          if (options.waitForRetries === false) {
            return this.toResult(latest, false);
          }
          await this.pause(taxReturn, latest.attempt, delay, options.signal);
        }
      }

      const cycle = currentCycle(records);
      const lastAttempt = cycle.reduce((max, record) => Math.max(max, record.attempt), 0);
      const unresolved = latest?.state === SubmissionState.SUBMITTING;
      const record = await this.step(taxReturn, unresolved ? lastAttempt : lastAttempt + 1, unresolved, options);

      if (record.state !== SubmissionState.RETRYING || options.waitForRetries === false) {
        return this.toResult(record, false);
      }
    }
  }

  private async step(
    taxReturn: TaxReturn,
    attempt: number,
    unresolved: boolean,
    options: SubmitOptions
  ): Promise<SubmissionRecord> {
    await this.cancelIfAborted(taxReturn, attempt, options.signal);
    const timeoutMs = options.timeoutMs ?? this.policy.timeoutMs;

    this.transition(taxReturn, SubmissionState.AUTHENTICATING);
    let accessToken: string;
    try {
      accessToken = await this.auth.validToken();
    } catch (error) {
      return this.tokenFailure(taxReturn, attempt, error);
    }

    if (unresolved) {
      return this.reconcile(taxReturn, attempt, accessToken, timeoutMs);
    }

    // Last point at which cancellation is honoured.
    await this.cancelIfAborted(taxReturn, attempt, options.signal);
    await this.append(taxReturn, attempt, {
      state: SubmissionState.SUBMITTING,
      outcome: SubmissionOutcome.PENDING,
      networkAttempted: true,
    });
    this.transition(taxReturn, SubmissionState.SUBMITTING);

    let receipt: AuthorityReceipt;
    try {
      receipt = await this.gateway.submitReturn(taxReturn, { accessToken, timeoutMs });
    } catch (error) {
      if (isAuthFailure(error)) {
        throw error;
      }
      return this.dispatchFailure(taxReturn, attempt, accessToken, timeoutMs, error);
    }
    return this.accept(taxReturn, attempt, receipt.reference, receipt.raw);
  }

  private async dispatchFailure(
    taxReturn: TaxReturn,
    attempt: number,
    accessToken: string,
    timeoutMs: number,
    error: unknown
  ): Promise<SubmissionRecord> {
    const kind = classifyMtdError(error);
    const detail = errorDetail(error);

    switch (kind) {
      case 'rejected': {
        logger.warn('Return rejected by the authority', { checksum: taxReturn.checksum, attempt, code: detail.code });
        const record = await this.append(taxReturn, attempt, {
          state: SubmissionState.REJECTED,
          outcome: SubmissionOutcome.REJECTED,
          networkAttempted: true,
          statusCode: detail.statusCode,
          error: detail,
        });
        this.transition(taxReturn, SubmissionState.REJECTED);
        return record;
      }
      case 'authentication':
        await this.append(taxReturn, attempt, {
          state: SubmissionState.ERROR,
          outcome: SubmissionOutcome.ERROR,
          networkAttempted: true,
          statusCode: detail.statusCode,
          error: detail,
        });
        this.transition(taxReturn, SubmissionState.ERROR);
        throw new AuthRequiredError('The authority refused the access token; re-authorization required', detail);
      case 'timeout':
        return this.reconcile(taxReturn, attempt, accessToken, timeoutMs);
      case 'transient':
        return this.retryOrFail(taxReturn, attempt, detail, true);
      case 'unknown': {
        logger.error('Submission failed', error, { checksum: taxReturn.checksum, attempt });
        const record = await this.append(taxReturn, attempt, {
          state: SubmissionState.ERROR,
          outcome: SubmissionOutcome.ERROR,
          networkAttempted: true,
          error: detail,
        });
        this.transition(taxReturn, SubmissionState.ERROR);
        return record;
      }
    }
  }

  private async tokenFailure(taxReturn: TaxReturn, attempt: number, error: unknown): Promise<SubmissionRecord> {
    const detail = errorDetail(error);
    if (isAuthFailure(error)) {
      await this.append(taxReturn, attempt, {
        state: SubmissionState.ERROR,
        outcome: SubmissionOutcome.ERROR,
        networkAttempted: false,
        error: detail,
      });
      this.transition(taxReturn, SubmissionState.ERROR);
      logger.warn('Submission needs re-authorization', { checksum: taxReturn.checksum, code: detail.code });
      throw new AuthRequiredError('Re-authorization required before the return can be submitted', detail);
    }
    if (classifyMtdError(error) === 'transient') {
      return this.retryOrFail(taxReturn, attempt, detail, false);
    }
    throw toError(error);
  }

  /**
   * Settles an unknown outcome by asking the authority what it holds for the period. Nothing is
   * resent from here.
   */
  private async reconcile(
    taxReturn: TaxReturn,
    attempt: number,
    accessToken: string,
    timeoutMs: number
  ): Promise<SubmissionRecord> {
    this.transition(taxReturn, SubmissionState.RECONCILING);
    logger.warn('Submission outcome unknown; reconciling', { checksum: taxReturn.checksum, attempt });

    let status: AuthorityFilingStatus;
    try {
      status = await this.gateway.filingStatus(taxReturn, { accessToken, timeoutMs });
    } catch (error) {
      logger.error('Reconciliation failed; outcome unknown', error, { checksum: taxReturn.checksum, attempt });
      const record = await this.append(taxReturn, attempt, {
        state: SubmissionState.ERROR,
        outcome: SubmissionOutcome.ERROR,
        networkAttempted: true,
        error: { ...errorDetail(error), code: 'OUTCOME_UNKNOWN' },
      });
      this.transition(taxReturn, SubmissionState.ERROR);
      return record;
    }

    if (!status.fulfilled) {
      return this.retryOrFail(
        taxReturn,
        attempt,
        { code: 'NOT_RECEIVED', message: 'The authority has no return for the period after a timeout' },
        true
      );
    }
    if (status.matches === false) {
      const record = await this.append(taxReturn, attempt, {
        state: SubmissionState.ERROR,
        outcome: SubmissionOutcome.ERROR,
        networkAttempted: true,
        error: {
          code: 'RECONCILIATION_MISMATCH',
          message: 'The authority holds a return for the period with different figures',
        },
      });
      this.transition(taxReturn, SubmissionState.ERROR);
      return record;
    }
    return this.accept(taxReturn, attempt, status.reference ?? `reconciled:${taxReturn.periodKey ?? taxReturn.periodId}`, {
      reconciled: true,
    });
  }

  private async retryOrFail(
    taxReturn: TaxReturn,
    attempt: number,
    detail: SubmissionErrorDetail,
    networkAttempted: boolean
  ): Promise<SubmissionRecord> {
    if (attempt >= this.policy.maxAttempts) {
      logger.error('Submission attempts exhausted', undefined, {
        checksum: taxReturn.checksum,
        attempt,
        code: detail.code,
      });
      const record = await this.append(taxReturn, attempt, {
        state: SubmissionState.ERROR,
        outcome: SubmissionOutcome.ERROR,
        networkAttempted,
        statusCode: detail.statusCode,
        error: detail,
      });
      this.transition(taxReturn, SubmissionState.ERROR);
      return record;
    }

    const delay = computeBackoffDelay(attempt, this.policy, this.random);
    const nextEligibleAt = new Date(this.clock.now().getTime() + delay).toISOString();
    logger.warn('Submission attempt failed; retry scheduled', {
      checksum: taxReturn.checksum,
      attempt,
      code: detail.code,
      nextEligibleAt,
    });
    const record = await this.append(taxReturn, attempt, {
      state: SubmissionState.RETRYING,
      outcome: SubmissionOutcome.PENDING,
      networkAttempted,
      nextEligibleAt,
      statusCode: detail.statusCode,
      error: detail,
    });
    this.transition(taxReturn, SubmissionState.RETRYING);
    return record;
  }

  private async accept(
    taxReturn: TaxReturn,
    attempt: number,
    authorityReference: string,
    response: Record<string, unknown>
  ): Promise<SubmissionRecord> {
    const record = await this.append(taxReturn, attempt, {
      state: SubmissionState.ACCEPTED,
      outcome: SubmissionOutcome.ACCEPTED,
      networkAttempted: true,
      authorityReference,
      response,
    });
    this.transition(taxReturn, SubmissionState.ACCEPTED);
    logger.info('Return accepted', { checksum: taxReturn.checksum, periodId: taxReturn.periodId, authorityReference });

    if (!(await this.obligations.find(taxReturn.periodId))) {
      await this.obligations.register({
        periodId: taxReturn.periodId,
        taxKind: taxReturn.taxKind,
        start: taxReturn.start,
        end: taxReturn.end,
        periodKey: taxReturn.periodKey,
        dueDate: defaultDueDate({ taxKind: taxReturn.taxKind, end: taxReturn.end }),
      });
    }
    try {
      await this.obligations.markFulfilled(taxReturn.periodId, authorityReference);
    } catch (error) {
      if (!(error instanceof AlreadyFulfilledError)) {
        throw error;
      }
      logger.warn('Obligation already fulfilled under another reference', {
        periodId: taxReturn.periodId,
        authorityReference,
        reason: error.message,
      });
    }

    try {
      await this.periods.markSubmitted(taxReturn.periodId);
    } catch (error) {
      if (!(error instanceof PeriodNotClosedError)) {
        throw error;
      }
      logger.warn('Accepted return for a period that is not closed', { periodId: taxReturn.periodId });
    }
    return record;
  }

  private async pause(taxReturn: TaxReturn, attempt: number, delay: number, signal?: AbortSignal): Promise<void> {
    try {
      await this.wait(delay, signal);
    } catch (error) {
      if (signal?.aborted) {
        await this.cancel(taxReturn, attempt);
      }
      throw error;
    }
  }

  private async cancelIfAborted(taxReturn: TaxReturn, attempt: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      await this.cancel(taxReturn, attempt);
    }
  }

  private async cancel(taxReturn: TaxReturn, attempt: number): Promise<never> {
    const cancelled = new SubmissionCancelledError();
    await this.append(taxReturn, attempt, {
      state: SubmissionState.ERROR,
      outcome: SubmissionOutcome.ERROR,
      networkAttempted: false,
      error: errorDetail(cancelled),
    });
    this.transition(taxReturn, SubmissionState.ERROR);
    logger.info('Submission cancelled before dispatch', { checksum: taxReturn.checksum, attempt });
    throw cancelled;
  }

  private async append(taxReturn: TaxReturn, attempt: number, fields: RecordFields): Promise<SubmissionRecord> {
    const record: SubmissionRecord = {
      id: this.generateId(),
      taxReturnId: taxReturn.id,
      checksum: taxReturn.checksum,
      periodId: taxReturn.periodId,
      attempt,
      attemptedAt: this.clock.now().toISOString(),
      ...fields,
    };
    await this.store.save('submission_record', record.id, record);
    return record;
  }

  private transition(taxReturn: TaxReturn, state: SubmissionState): void {
    logger.debug('Submission state', { checksum: taxReturn.checksum, state });
    this.options.onTransition?.(taxReturn.checksum, state);
  }

  private toResult(record: SubmissionRecord, cached: boolean): SubmissionResult {
    return {
      taxReturnId: record.taxReturnId,
      checksum: record.checksum,
      state: record.state,
      outcome: record.outcome,
      attempt: record.attempt,
      authorityReference: record.authorityReference,
      error: record.error,
      cached,
      record,
    };
  }
}
