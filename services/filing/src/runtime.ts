import { Database, DocumentStore, createDocumentStore, runMigrations } from '@ledgerline/database';
import { MtdClient } from '@ledgerline/hmrc';
import { AuthSession, createAuthSession } from '@ledgerline/integrations-service';
import { LedgerService, createLedgerService } from '@ledgerline/ledger-service';
import { createServiceLogger } from '@ledgerline/observability';
import { Clock, PeriodId, systemClock } from '@ledgerline/shared-types';
import { FilingConfig } from './config';
import { AuthorityGateway, MtdGateway } from './services/authorityGateway';
import { ObligationDiscovery } from './services/obligationDiscovery';
import { ObligationTracker } from './services/obligationTracker';
import { SubmissionPipeline, SubmissionResult, SubmitOptions, TokenProvider } from './services/submissionPipeline';
import { TaxConfigurationRegistry, defaultTaxConfigurations } from './services/taxConfiguration';
import { TaxEngine } from './services/taxEngine';

const logger = createServiceLogger('filing-service');

export interface FilingRuntime {
  config: FilingConfig;
  store: DocumentStore;
  database?: Database;
  ledger: LedgerService;
  auth: AuthSession;
  gateway: AuthorityGateway;
  configurations: TaxConfigurationRegistry;
  engine: TaxEngine;
  obligations: ObligationTracker;
  discovery: ObligationDiscovery;
  pipeline: SubmissionPipeline;
  close(): Promise<void>;
}

/** Replacements for the parts that reach outside the process. */
export interface FilingRuntimeOverrides {
  store?: DocumentStore;
  gateway?: AuthorityGateway;
  tokens?: TokenProvider;
  clock?: Clock;
  wait?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export async function createFilingRuntime(
  config: FilingConfig,
  overrides: FilingRuntimeOverrides = {}
): Promise<FilingRuntime> {
  const clock = overrides.clock ?? systemClock;

  let store: DocumentStore;
  let database: Database | undefined;
  if (overrides.store) {
    store = overrides.store;
  } else {
    ({ store, database } = createDocumentStore());
    if (database) {
      const applied = await runMigrations(database);
      logger.info('Database ready', { migrationsApplied: applied.length });
    }
  }

  const ledger = createLedgerService(store, { clock, currency: config.currency });
  const auth = createAuthSession(
    store,
    {
      env: config.hmrc.env,
      baseUrl: config.hmrc.baseUrl,
      timeoutMs: config.submission.timeoutMs,
      refreshMarginSeconds: config.refreshMarginSeconds,
      secureStoreKey: config.secureStoreKey,
    },
    clock
  );
  if (config.hmrc.clientId && config.hmrc.clientSecret) {
    const restored = await auth.restore(config.hmrc.clientId, config.hmrc.clientSecret);
    logger.info('Authority session', { restored, state: auth.state });
  }

  const gateway =
    overrides.gateway ??
    new MtdGateway(
      new MtdClient({ env: config.hmrc.env, baseUrl: config.hmrc.baseUrl, timeoutMs: config.submission.timeoutMs }),
      { vrn: config.hmrc.vrn, nino: config.hmrc.nino }
    );
  const tokens = overrides.tokens ?? auth;

  const configurations = defaultTaxConfigurations();
  const engine = new TaxEngine(ledger.ledger, ledger.accounts, configurations, { clock });
  const obligations = new ObligationTracker(store, clock);
  const discovery = new ObligationDiscovery(gateway, tokens, ledger.periods, obligations);
  const pipeline = new SubmissionPipeline(store, gateway, tokens, obligations, ledger.periods, {
    clock,
    wait: overrides.wait,
    policy: {
      maxAttempts: config.submission.maxAttempts,
      baseDelayMs: config.submission.baseDelayMs,
      maxDelayMs: config.submission.maxDelayMs,
      timeoutMs: config.submission.timeoutMs,
    },
  });

  return {
    config,
    store,
    database,
    ledger,
    auth,
    gateway,
    configurations,
    engine,
    obligations,
    discovery,
    pipeline,
    close: async () => {
      await database?.close();
    },
  };
}

/** Computes the return for a closed period and submits it. */
export async function fileReturn(
  runtime: FilingRuntime,
  periodId: PeriodId,
  options?: SubmitOptions
): Promise<SubmissionResult> {
  const period = await runtime.ledger.periods.get(periodId);
  const taxReturn = await runtime.engine.compute(period);
  return runtime.pipeline.submit(taxReturn, options);
}
