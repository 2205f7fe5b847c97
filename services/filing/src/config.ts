import { z } from 'zod';
import { envInteger, loadConfig } from '@ledgerline/shared-utils';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === '' ? undefined : value));

const filingConfigSchema = z.object({
  HMRC_ENV: z.enum(['sandbox', 'production']).default('sandbox'),
  HMRC_BASE_URL: optionalString,
  HMRC_CLIENT_ID: optionalString,
  HMRC_CLIENT_SECRET: optionalString,
  HMRC_SCOPE: z.string().default('read:vat write:vat read:self-assessment write:self-assessment'),
  HMRC_VRN: optionalString,
  HMRC_NINO: optionalString,
  SUBMISSION_MAX_ATTEMPTS: envInteger(5).pipe(z.number().min(1)),
  SUBMISSION_BASE_DELAY_MS: envInteger(1000),
  SUBMISSION_MAX_DELAY_MS: envInteger(60000),
  SUBMISSION_TIMEOUT_MS: envInteger(30000),
  AUTH_REFRESH_MARGIN_SECONDS: envInteger(60),
  SUBMISSION_RESUME_SCHEDULE: z.string().default('*/5 * * * *'),
  SECURE_STORE_KEY: optionalString,
  LEDGER_CURRENCY: z.string().length(3).default('GBP'),
});

export interface FilingConfig {
  hmrc: {
    env: 'sandbox' | 'production';
    baseUrl?: string;
    clientId?: string;
    clientSecret?: string;
    scope: string;
    vrn?: string;
    nino?: string;
  };
  submission: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    timeoutMs: number;
    resumeSchedule: string;
  };
  refreshMarginSeconds: number;
  secureStoreKey?: string;
  currency: string;
}

export function loadFilingConfig(env: NodeJS.ProcessEnv = process.env): FilingConfig {
  const parsed = loadConfig(filingConfigSchema, env);
  return {
    hmrc: {
      env: parsed.HMRC_ENV,
      baseUrl: parsed.HMRC_BASE_URL,
      clientId: parsed.HMRC_CLIENT_ID,
      clientSecret: parsed.HMRC_CLIENT_SECRET,
      scope: parsed.HMRC_SCOPE,
      vrn: parsed.HMRC_VRN,
      nino: parsed.HMRC_NINO?.toUpperCase(),
    },
    submission: {
      maxAttempts: parsed.SUBMISSION_MAX_ATTEMPTS,
      baseDelayMs: parsed.SUBMISSION_BASE_DELAY_MS,
      maxDelayMs: parsed.SUBMISSION_MAX_DELAY_MS,
      timeoutMs: parsed.SUBMISSION_TIMEOUT_MS,
      resumeSchedule: parsed.SUBMISSION_RESUME_SCHEDULE,
    },
    refreshMarginSeconds: parsed.AUTH_REFRESH_MARGIN_SECONDS,
    secureStoreKey: parsed.SECURE_STORE_KEY,
    currency: parsed.LEDGER_CURRENCY.toUpperCase(),
  };
}
