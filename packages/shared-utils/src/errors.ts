export class AppError extends Error {
  readonly code: string;
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(code: string, message: string, statusCode: number = 500, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// Validation errors: surfaced immediately, never retried.

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super('VALIDATION_ERROR', message, 400, details);
  }
}

export class UnbalancedError extends AppError {
  constructor(debits: number, credits: number) {
    super(
      'UNBALANCED',
      `Transaction does not balance: debits ${debits} != credits ${credits}`,
      422,
      { debits, credits, difference: debits - credits }
    );
  }
}

export class UnknownAccountError extends AppError {
  constructor(accountCodes: string[]) {
    super('UNKNOWN_ACCOUNT', `Unknown or inactive account(s): ${accountCodes.join(', ')}`, 422, {
      accountCodes,
    });
  }
}

export class CurrencyMismatchError extends AppError {
  constructor(expected: string, actual: string) {
    super('CURRENCY_MISMATCH', `Ledger currency is ${expected}, got ${actual}`, 422, {
      expected,
      actual,
    });
  }
}

export class PeriodNotClosedError extends AppError {
  constructor(periodId: string, status: string) {
    super('PERIOD_NOT_CLOSED', `Period ${periodId} must be closed before computation (status: ${status})`, 409, {
      periodId,
      status,
    });
  }
}

export class PeriodClosedError extends AppError {
  constructor(periodId: string, date: string) {
    super('PERIOD_CLOSED', `Date ${date} falls in closed period ${periodId}`, 409, { periodId, date });
  }
}

export class PeriodOverlapError extends AppError {
  constructor(existingPeriodId: string) {
    super('PERIOD_OVERLAP', `Period overlaps existing period ${existingPeriodId}`, 409, {
      existingPeriodId,
    });
  }
}

export class PeriodGapError extends AppError {
  constructor(expectedStart: string | undefined, expectedEnd: string | undefined) {
    super(
      'PERIOD_GAP',
      `Period must extend the existing run contiguously (start ${expectedStart ?? '-'} or end ${expectedEnd ?? '-'})`,
      409,
      { expectedStart, expectedEnd }
    );
  }
}

export class ConstraintViolationError extends AppError {
  constructor(constraint: string, accountCode: string, balance: number) {
    super('CONSTRAINT_VIOLATION', `Posting would violate ${constraint} on account ${accountCode}`, 422, {
      constraint,
      accountCode,
      balance,
    });
  }
}

// Lookup and conflict errors

export class NotFoundError extends AppError {
  constructor(resource: string, id?: string) {
    super('NOT_FOUND', id ? `${resource} not found: ${id}` : `${resource} not found`, 404, { resource, id });
  }
}

export class DuplicateCodeError extends AppError {
  constructor(code: string) {
    super('DUPLICATE_CODE', `Account code already exists: ${code}`, 409, { code });
  }
}

export class AccountInUseError extends AppError {
  constructor(code: string, reason: string) {
    super('ACCOUNT_IN_USE', `Account ${code} is in use: ${reason}`, 409, { code, reason });
  }
}

export class ConflictError extends AppError {
  constructor(message: string, details?: unknown) {
    super('CONFLICT', message, 409, details);
  }
}

// Authentication errors: operator action required, no automatic retry.

export class AuthenticationError extends AppError {
  constructor(message = 'Authentication failed', details?: unknown) {
    super('AUTHENTICATION_ERROR', message, 401, details);
  }
}

export class AuthExpiredError extends AppError {
  constructor(message = 'Refresh token expired; re-authorization required') {
    super('AUTH_EXPIRED', message, 401);
  }
}

export class AuthRequiredError extends AppError {
  constructor(message = 'Authority authorization required', details?: unknown) {
    super('AUTH_REQUIRED', message, 401, details);
  }
}

// Data-integrity errors: caller bugs, fail fast.

export class ImmutableTransactionError extends AppError {
  constructor(transactionId: string, reason: string) {
    super('IMMUTABLE_TRANSACTION', `Transaction ${transactionId} cannot be changed: ${reason}`, 409, {
      transactionId,
    });
  }
}

export class AlreadyFulfilledError extends AppError {
  constructor(periodId: string, existingReference: string) {
    super('ALREADY_FULFILLED', `Obligation for period ${periodId} already fulfilled (${existingReference})`, 409, {
      periodId,
      existingReference,
    });
  }
}

export class SubmissionDivergenceError extends AppError {
  constructor(periodId: string, acceptedChecksum: string, checksum: string) {
    super(
      'SUBMISSION_DIVERGENCE',
      `Period ${periodId} already has an accepted return with different figures`,
      409,
      { periodId, acceptedChecksum, checksum }
    );
  }
}

export class SubmissionCancelledError extends AppError {
  constructor(message = 'Submission cancelled before dispatch') {
    super('SUBMISSION_CANCELLED', message, 499);
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
