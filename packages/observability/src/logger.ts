import { createLogger as createBaseLogger } from '@ledgerline/shared-utils';
import { randomUUID } from 'crypto';

const PII_PATTERNS: Array<{ pattern: RegExp; replacement: string }> = [
  { pattern: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g, replacement: '[EMAIL]' },
  { pattern: /\b\d{4}\s?\d{4}\s?\d{4}\s?\d{4}\b/g, replacement: '[CARD]' },
  { pattern: /\b[A-CEGHJ-PR-TW-Z]{2}\d{6}[A-D]\b/g, replacement: '[NINO]' },
  { pattern: /\b\d{9,}\b/g, replacement: '[TAXREF]' },
];

export function maskPII(message: string): string {
  return PII_PATTERNS.reduce((current, { pattern, replacement }) => current.replace(pattern, replacement), message);
}

export interface ServiceLogger {
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  debug: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, error?: unknown, meta?: Record<string, unknown>) => void;
}

/**
 * Logger for code paths that handle taxpayer identifiers (VRN, UTR, NINO). Messages are
 * masked; metadata values that are strings are masked too.
 */
export function createServiceLogger(service: string, context?: Record<string, unknown>): ServiceLogger {
  const baseLogger = createBaseLogger(service);
  const traceId = process.env.TRACE_ID || randomUUID();

  const enrich = (meta?: Record<string, unknown>) => {
    const masked: Record<string, unknown> = { ...context, traceId };
    for (const [key, value] of Object.entries(meta ?? {})) {
      masked[key] = typeof value === 'string' ? maskPII(value) : value;
    }
    return masked;
  };

  return {
    info: (message, meta) => {
      baseLogger.info(maskPII(message), enrich(meta));
    },
    warn: (message, meta) => {
      baseLogger.warn(maskPII(message), enrich(meta));
    },
    debug: (message, meta) => {
      baseLogger.debug(maskPII(message), enrich(meta));
    },
    error: (message, error, meta) => {
      const err = error === undefined ? undefined : error instanceof Error ? error : new Error(String(error));
      baseLogger.error(maskPII(message), err, enrich(meta));
    },
  };
}
