import { createServiceLogger } from '@ledgerline/observability';
import { loadFilingConfig } from './config';
import { FilingRuntime, createFilingRuntime } from './runtime';
import { startSubmissionScheduler } from './scheduler';

export * from './config';
export * from './runtime';
export * from './scheduler';
export * from './services/authorityGateway';
export * from './services/obligationDiscovery';
export * from './services/obligationTracker';
export * from './services/preSubmissionValidation';
export * from './services/submissionPipeline';
export * from './services/taxConfiguration';
export * from './services/taxEngine';

const SERVICE_NAME = 'filing-service';
const logger = createServiceLogger(SERVICE_NAME);

/** Boots the runtime from the environment and keeps resuming submissions on a schedule. */
export async function start(env: NodeJS.ProcessEnv = process.env): Promise<FilingRuntime> {
  const runtime = await createFilingRuntime(loadFilingConfig(env));
  const task = startSubmissionScheduler(runtime);

  const shutdown = (): void => {
    task.stop();
    runtime.close().then(
      () => logger.info('Filing service stopped'),
      (error) => logger.error('Shutdown failed', error)
    );
  };
  process.once('SIGTERM', shutdown);
  process.once('SIGINT', shutdown);

  logger.info('Filing service started', { hmrcEnv: runtime.config.hmrc.env, authState: runtime.auth.state });
  return runtime;
}

if (require.main === module) {
  start().catch((error) => {
    logger.error('Filing service failed to start', error);
    process.exitCode = 1;
  });
}
