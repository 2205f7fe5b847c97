import axios from 'axios';
import { AppError } from '@ledgerline/shared-utils';

export class MtdApiError extends AppError {
  readonly status: number;
  readonly body: unknown;
  readonly authorityCode?: string;

  constructor(status: number, body: unknown, context: string) {
    const authorityCode = extractAuthorityCode(body);
    super(
      'MTD_API_ERROR',
      `HMRC API error (${status})${authorityCode ? ` ${authorityCode}` : ''} during ${context}`,
      status,
      body
    );
    this.status = status;
    this.body = body;
    this.authorityCode = authorityCode;
  }
}

export class MtdTransportError extends AppError {
  constructor(message: string, cause?: string) {
    super('MTD_TRANSPORT_ERROR', message, 503, { cause });
  }
}

export class MtdTimeoutError extends AppError {
  readonly timeoutMs?: number;

  constructor(context: string, timeoutMs?: number) {
    super('MTD_TIMEOUT', `HMRC request timed out during ${context}`, 504, { timeoutMs });
    this.timeoutMs = timeoutMs;
  }
}

export type MtdErrorClass = 'transient' | 'timeout' | 'rejected' | 'authentication' | 'unknown';

const AUTHORISATION_CODES = new Set([
  'CLIENT_OR_AGENT_NOT_AUTHORISED',
  'INVALID_CREDENTIALS',
  'UNAUTHORIZED',
  'INVALID_BEARER_TOKEN',
]);

function extractAuthorityCode(body: unknown): string | undefined {
  if (typeof body === 'object' && body !== null && 'code' in body) {
    const { code } = body;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Maps a failure from the authority onto how the caller should react:
 * 5xx, 429 and connection failures are transient; 401 and authorisation 403s need a new token;
 * any other 4xx is a rejection of the payload.
 */
export function classifyMtdError(error: unknown): MtdErrorClass {
  if (error instanceof MtdTimeoutError) {
    return 'timeout';
  }
  if (error instanceof MtdTransportError) {
    return 'transient';
  }
  if (error instanceof MtdApiError) {
    if (error.status >= 500 || error.status === 429) {
      return 'transient';
    }
    if (error.status === 401) {
      return 'authentication';
    }
    if (error.status === 403 && error.authorityCode && AUTHORISATION_CODES.has(error.authorityCode)) {
      return 'authentication';
    }
    if (error.status >= 400) {
      return 'rejected';
    }
  }
  return 'unknown';
}

export function normaliseAxiosError(error: unknown, context: string, timeoutMs?: number): Error {
  if (axios.isAxiosError(error)) {
    if (error.response) {
      return new MtdApiError(error.response.status, error.response.data, context);
    }
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new MtdTimeoutError(context, timeoutMs);
    }
    return new MtdTransportError(`HMRC request failed during ${context}: ${error.message}`, error.code);
  }
  return error instanceof Error ? error : new Error(String(error));
}
