import cron, { ScheduledTask } from 'node-cron';
import { TaxKind } from '@ledgerline/shared-types';
import { currentTaxYearStart, ukTaxYear } from '@ledgerline/ledger-service';
import { createLogger, toCalendarDate } from '@ledgerline/shared-utils';
import { FilingRuntime } from './runtime';

const logger = createLogger('filing-scheduler');

async function resumeSubmissions(runtime: FilingRuntime): Promise<void> {
  const results = await runtime.pipeline.resumePending();
  for (const result of results) {
    logger.info('Resumed submission', {
      checksum: result.checksum,
      state: result.state,
      attempt: result.attempt,
    });
  }
}

async function refreshObligations(runtime: FilingRuntime): Promise<void> {
  const today = toCalendarDate(new Date());
  // Covers the previous tax year too, whose returns fall due during the current one.
  const window = { from: ukTaxYear(currentTaxYearStart(today) - 1).start, to: today };
  if (runtime.config.hmrc.vrn) {
    await runtime.discovery.discover(TaxKind.VAT, window);
  }
  if (runtime.config.hmrc.nino) {
    await runtime.discovery.discover(TaxKind.INCOME_TAX, window);
  }
}

export function startSubmissionScheduler(
  runtime: FilingRuntime,
  cronExpression: string = runtime.config.submission.resumeSchedule
): ScheduledTask {
  const task = cron.schedule(cronExpression, () => {
    resumeSubmissions(runtime).catch((error) => {
      logger.error('Submission resume sweep failed', error instanceof Error ? error : new Error(String(error)));
    });
    if (runtime.auth.state === 'authenticated') {
      refreshObligations(runtime).catch((error) => {
        logger.error('Obligation refresh failed', error instanceof Error ? error : new Error(String(error)));
      });
    }
  });

  logger.info('Submission scheduler started', { cronExpression });
  return task;
}
