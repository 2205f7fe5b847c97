import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import { MtdApiError, MtdTimeoutError, MtdTransportError } from '@ledgerline/hmrc';
import {
  ObligationStatus,
  Period,
  PeriodStatus,
  SubmissionOutcome,
  SubmissionState,
  TaxReturn,
} from '@ledgerline/shared-types';
import {
  AuthExpiredError,
  AuthRequiredError,
  SubmissionCancelledError,
  SubmissionDivergenceError,
  ValidationError,
} from '@ledgerline/shared-utils';
import { ObligationTracker } from '../services/obligationTracker';
import { SubmissionPipeline, SubmissionPipelineOptions } from '../services/submissionPipeline';
import { Books, closedVatQuarter, fakeGateway, mutableClock, openBooks, receipt } from './helpers';

function serverError(status = 503): MtdApiError {
  return new MtdApiError(status, { code: 'SERVER_ERROR', message: 'Service unavailable' }, 'VAT return submission');
}

function fakeTokens() {
  return { validToken: jest.fn<() => Promise<string>>().mockResolvedValue('access-1') };
}

describe('SubmissionPipeline', () => {
  const clock = mutableClock('2024-04-20T09:00:00.000Z');
  let books: Books;
  let period: Period;
  let taxReturn: TaxReturn;
  let tracker: ObligationTracker;
  let gateway: ReturnType<typeof fakeGateway>;
  let tokens: ReturnType<typeof fakeTokens>;
  let waits: number[];
  let transitions: SubmissionState[];

  function pipeline(options: SubmissionPipelineOptions = {}): SubmissionPipeline {
    let sequence = 0;
    return new SubmissionPipeline(books.store, gateway, tokens, tracker, books.service.periods, {
      clock,
      random: () => 0,
      generateId: () => `record-${++sequence}`,
      wait: async (ms) => {
        waits.push(ms);
        clock.advance(ms);
      },
      onTransition: (_checksum, state) => transitions.push(state),
      ...options,
    });
  }

  beforeEach(async () => {
    clock.set('2024-04-20T09:00:00.000Z');
    books = await openBooks(clock);
    period = await closedVatQuarter(books);
    taxReturn = await books.engine.computeVAT(period);
    tracker = new ObligationTracker(books.store, clock);
    await tracker.registerForPeriod(period);
    gateway = fakeGateway();
    tokens = fakeTokens();
    waits = [];
    transitions = [];
  });

  it('retries transient failures with backoff until the authority accepts', async () => {
    gateway.submitReturn
      .mockRejectedValueOnce(serverError())
      .mockRejectedValueOnce(serverError())
      .mockResolvedValueOnce(receipt('123456789012'));

    const result = await pipeline().submit(taxReturn);

    expect(result.state).toBe(SubmissionState.ACCEPTED);
    expect(result.outcome).toBe(SubmissionOutcome.ACCEPTED);
    expect(result.attempt).toBe(3);
    expect(result.authorityReference).toBe('123456789012');
    expect(result.cached).toBe(false);
    expect(gateway.submitReturn).toHaveBeenCalledTimes(3);
    expect(gateway.submitReturn).toHaveBeenCalledWith(taxReturn, { accessToken: 'access-1', timeoutMs: 30000 });
    expect(waits).toEqual([1000, 2000]);

    const history = await pipeline().history(taxReturn.checksum);
    expect(history.map((record) => record.state)).toEqual([
      SubmissionState.SUBMITTING,
      SubmissionState.RETRYING,
      SubmissionState.SUBMITTING,
      SubmissionState.RETRYING,
      SubmissionState.SUBMITTING,
      SubmissionState.ACCEPTED,
    ]);
    expect(history.filter((record) => record.state === SubmissionState.SUBMITTING && record.networkAttempted)).toHaveLength(3);
    expect(history.filter((record) => record.outcome === SubmissionOutcome.ACCEPTED)).toHaveLength(1);
    expect(
      history.filter((record) => record.state === SubmissionState.RETRYING).map((record) => record.nextEligibleAt)
    ).toEqual(['2024-04-20T09:00:01.000Z', '2024-04-20T09:00:03.000Z']);

    expect(transitions).toEqual([
      SubmissionState.COMPUTED,
      SubmissionState.AUTHENTICATING,
      SubmissionState.SUBMITTING,
      SubmissionState.RETRYING,
      SubmissionState.AUTHENTICATING,
      SubmissionState.SUBMITTING,
      SubmissionState.RETRYING,
      SubmissionState.AUTHENTICATING,
      SubmissionState.SUBMITTING,
      SubmissionState.ACCEPTED,
    ]);

    const obligation = await tracker.get(period.id);
    expect(obligation.status).toBe(ObligationStatus.FULFILLED);
    expect(obligation.authorityReference).toBe('123456789012');
    expect((await books.service.periods.get(period.id)).status).toBe(PeriodStatus.SUBMITTED);
    expect(await books.store.load('tax_return', taxReturn.id)).toEqual(taxReturn);
  });

  it('records a rejection without retrying and leaves the obligation open', async () => {
    gateway.submitReturn.mockRejectedValueOnce(
      new MtdApiError(400, { code: 'INVALID_REQUEST', message: 'Invalid request' }, 'VAT return submission')
    );
    const submissions = pipeline();

    const result = await submissions.submit(taxReturn);

    expect(result.state).toBe(SubmissionState.REJECTED);
    expect(result.outcome).toBe(SubmissionOutcome.REJECTED);
    expect(result.attempt).toBe(1);
    expect(result.error?.statusCode).toBe(400);
    expect(result.error?.body).toEqual({ code: 'INVALID_REQUEST', message: 'Invalid request' });
    expect(gateway.submitReturn).toHaveBeenCalledTimes(1);
    expect(transitions).toEqual([
      SubmissionState.COMPUTED,
      SubmissionState.AUTHENTICATING,
      SubmissionState.SUBMITTING,
      SubmissionState.REJECTED,
    ]);
    expect((await tracker.get(period.id)).status).toBe(ObligationStatus.OPEN);
    expect((await books.service.periods.get(period.id)).status).toBe(PeriodStatus.CLOSED);

    const again = await submissions.submit(taxReturn);
    expect(again.cached).toBe(true);
    expect(again.state).toBe(SubmissionState.REJECTED);
    expect(gateway.submitReturn).toHaveBeenCalledTimes(1);
  });

  it('sends a return once however many callers submit it', async () => {
    gateway.submitReturn.mockResolvedValue(receipt('123456789012'));
    const submissions = pipeline();

    const [first, second] = await Promise.all([submissions.submit(taxReturn), submissions.submit(taxReturn)]);
    const third = await submissions.submit(taxReturn);

    expect(gateway.submitReturn).toHaveBeenCalledTimes(1);
    expect(second.record.id).toBe(first.record.id);
    expect(third.cached).toBe(true);
    expect(third.record.id).toBe(first.record.id);
    expect(third.authorityReference).toBe('123456789012');
  });

  it('keeps an acceptance when the obligation was already fulfilled under another reference', async () => {
    await tracker.markFulfilled(period.id, '24A1:2024-04-19');
    gateway.submitReturn.mockResolvedValue(receipt('123456789012'));
    const submissions = pipeline();

    const first = await submissions.submit(taxReturn);
    const again = await submissions.submit(taxReturn);

    expect(first.state).toBe(SubmissionState.ACCEPTED);
    expect(first.cached).toBe(false);
    expect(again.cached).toBe(true);
    expect(again.record.id).toBe(first.record.id);
    expect(gateway.submitReturn).toHaveBeenCalledTimes(1);
    expect((await submissions.history(taxReturn.checksum)).map((record) => record.state)).toEqual([
      SubmissionState.SUBMITTING,
      SubmissionState.ACCEPTED,
    ]);
    expect((await tracker.get(period.id)).authorityReference).toBe('24A1:2024-04-19');
    expect((await books.service.periods.get(period.id)).status).toBe(PeriodStatus.SUBMITTED);
  });

  it('returns an earlier acceptance even when later records follow it', async () => {
    const base = {
      taxReturnId: taxReturn.id,
      checksum: taxReturn.checksum,
      periodId: taxReturn.periodId,
      attempt: 1,
      attemptedAt: '2024-04-20T08:00:00.000Z',
      networkAttempted: true,
    };
    await books.store.save('submission_record', 'accepted-1', {
      ...base,
      id: 'accepted-1',
      state: SubmissionState.ACCEPTED,
      outcome: SubmissionOutcome.ACCEPTED,
      authorityReference: '123456789012',
    });
    await books.store.save('submission_record', 'error-1', {
      ...base,
      id: 'error-1',
      state: SubmissionState.ERROR,
      outcome: SubmissionOutcome.ERROR,
      error: { code: 'UNKNOWN', message: 'bookkeeping failed' },
    });

    const result = await pipeline().submit(taxReturn);

    expect(result.cached).toBe(true);
    expect(result.record.id).toBe('accepted-1');
    expect(result.authorityReference).toBe('123456789012');
    expect(gateway.submitReturn).not.toHaveBeenCalled();
  });

  describe('after a timeout', () => {
    beforeEach(() => {
      gateway.submitReturn.mockRejectedValueOnce(new MtdTimeoutError('VAT return submission', 30000));
    });

    it('accepts when the authority holds matching figures', async () => {
      gateway.filingStatus.mockResolvedValueOnce({ fulfilled: true, reference: '24A1:2024-04-20', matches: true });

      const result = await pipeline().submit(taxReturn);

      expect(result.state).toBe(SubmissionState.ACCEPTED);
      expect(result.authorityReference).toBe('24A1:2024-04-20');
      expect(gateway.submitReturn).toHaveBeenCalledTimes(1);
      expect(gateway.filingStatus).toHaveBeenCalledTimes(1);
      expect(transitions).toContain(SubmissionState.RECONCILING);
      expect((await tracker.get(period.id)).authorityReference).toBe('24A1:2024-04-20');
    });

    it('schedules a retry when the authority has nothing, and resumes it later', async () => {
      gateway.filingStatus.mockResolvedValueOnce({ fulfilled: false });
      gateway.submitReturn.mockResolvedValueOnce(receipt('123456789012'));
      const submissions = pipeline();

      const pending = await submissions.submit(taxReturn, { waitForRetries: false });

      expect(pending.state).toBe(SubmissionState.RETRYING);
      expect(pending.outcome).toBe(SubmissionOutcome.PENDING);
      expect(pending.error?.code).toBe('NOT_RECEIVED');
      expect(pending.record.nextEligibleAt).toBe('2024-04-20T09:00:01.000Z');

      expect(await submissions.resumePending()).toEqual([]);

      clock.advance(1000);
      const [resumed] = await submissions.resumePending();

      expect(resumed?.state).toBe(SubmissionState.ACCEPTED);
      expect(resumed?.attempt).toBe(2);
      expect(gateway.submitReturn).toHaveBeenCalledTimes(2);
    });

    it('stops in error when the outcome cannot be established', async () => {
      gateway.filingStatus.mockRejectedValueOnce(new MtdTransportError('connection reset'));

      const result = await pipeline().submit(taxReturn);

      expect(result.state).toBe(SubmissionState.ERROR);
      expect(result.error?.code).toBe('OUTCOME_UNKNOWN');
      expect(gateway.submitReturn).toHaveBeenCalledTimes(1);
      expect((await tracker.get(period.id)).status).toBe(ObligationStatus.OPEN);
    });

    it('stops in error when the authority holds different figures', async () => {
      gateway.filingStatus.mockResolvedValueOnce({ fulfilled: true, reference: '24A1:2024-04-20', matches: false });

      const result = await pipeline().submit(taxReturn);

      expect(result.state).toBe(SubmissionState.ERROR);
      expect(result.error?.code).toBe('RECONCILIATION_MISMATCH');
    });
  });

  it('reconciles a dispatch left without an outcome instead of sending it again', async () => {
    await books.store.save('tax_return', taxReturn.id, taxReturn);
    await books.store.save('submission_record', 'orphan', {
      id: 'orphan',
      taxReturnId: taxReturn.id,
      checksum: taxReturn.checksum,
      periodId: taxReturn.periodId,
      attempt: 1,
      attemptedAt: '2024-04-20T08:59:00.000Z',
      state: SubmissionState.SUBMITTING,
      outcome: SubmissionOutcome.PENDING,
      networkAttempted: true,
    });
    gateway.filingStatus.mockResolvedValueOnce({ fulfilled: true, reference: '24A1:2024-04-20', matches: true });

    const [result] = await pipeline().resumePending();

    expect(result?.state).toBe(SubmissionState.ACCEPTED);
    expect(result?.attempt).toBe(1);
    expect(gateway.submitReturn).not.toHaveBeenCalled();
  });

  it('gives up after the attempt ceiling and surfaces the last failure', async () => {
    gateway.submitReturn.mockRejectedValue(serverError(502));

    const result = await pipeline({ policy: { maxAttempts: 2 } }).submit(taxReturn);

    expect(result.state).toBe(SubmissionState.ERROR);
    expect(result.outcome).toBe(SubmissionOutcome.ERROR);
    expect(result.attempt).toBe(2);
    expect(result.error?.statusCode).toBe(502);
    expect(gateway.submitReturn).toHaveBeenCalledTimes(2);
    expect(waits).toEqual([1000]);
  });

  it('fails AuthRequired without contacting the authority when the session has expired', async () => {
    tokens.validToken.mockRejectedValue(new AuthExpiredError());
    const submissions = pipeline();

    await expect(submissions.submit(taxReturn)).rejects.toBeInstanceOf(AuthRequiredError);

    expect(gateway.submitReturn).not.toHaveBeenCalled();
    const [record] = await submissions.history(taxReturn.checksum);
    expect(record?.state).toBe(SubmissionState.ERROR);
    expect(record?.networkAttempted).toBe(false);
    expect(record?.error?.code).toBe('AUTH_EXPIRED');
  });

  it('fails AuthRequired when the authority refuses the token', async () => {
    gateway.submitReturn.mockRejectedValueOnce(
      new MtdApiError(401, { code: 'INVALID_CREDENTIALS', message: 'Invalid Authentication information provided' }, 'VAT return submission')
    );

    await expect(pipeline().submit(taxReturn)).rejects.toBeInstanceOf(AuthRequiredError);
    expect(gateway.submitReturn).toHaveBeenCalledTimes(1);
  });

  it('refuses a different return for a period that already has an accepted one', async () => {
    gateway.submitReturn.mockResolvedValue(receipt('123456789012'));
    const submissions = pipeline();
    await submissions.submit(taxReturn);

    const amended: TaxReturn = { ...taxReturn, id: 'return-amended', checksum: 'a-different-checksum' };

    await expect(submissions.submit(amended)).rejects.toBeInstanceOf(SubmissionDivergenceError);
    expect((await submissions.detectDivergence(amended))?.checksum).toBe(taxReturn.checksum);
    expect(gateway.submitReturn).toHaveBeenCalledTimes(1);
  });

  it('honours cancellation before dispatch and allows a later submission', async () => {
    gateway.submitReturn.mockResolvedValue(receipt('123456789012'));
    const controller = new AbortController();
    controller.abort();
    const submissions = pipeline();

    await expect(submissions.submit(taxReturn, { signal: controller.signal })).rejects.toBeInstanceOf(
      SubmissionCancelledError
    );
    expect(gateway.submitReturn).not.toHaveBeenCalled();
    expect((await submissions.latest(taxReturn.checksum))?.error?.code).toBe('SUBMISSION_CANCELLED');

    const result = await submissions.submit(taxReturn);
    expect(result.state).toBe(SubmissionState.ACCEPTED);
    expect(result.attempt).toBe(1);
  });

  it('validates the return before anything is recorded', async () => {
    const unkeyed: TaxReturn = { ...taxReturn, periodKey: undefined };

    await expect(pipeline().submit(unkeyed)).rejects.toBeInstanceOf(ValidationError);
    expect(await books.store.list('submission_record')).toEqual([]);
  });
});
