// Core domain types

export type AccountCode = string;
export type TransactionId = string;
export type PeriodId = string;
export type TaxReturnId = string;
export type SubmissionRecordId = string;

/** ISO-4217 currency code, e.g. `GBP`. */
export type CurrencyCode = string;

/** Calendar date in `YYYY-MM-DD` form. */
export type CalendarDate = string;

/** ISO-8601 timestamp. */
export type Timestamp = string;

/**
 * Monetary value in the currency's minor unit (pence for GBP).
 * Always an integer; floating-point amounts never cross a boundary.
 */
export interface Money {
  amount: number;
  currency: CurrencyCode;
}

export enum AccountType {
  ASSET = 'asset',
  LIABILITY = 'liability',
  EQUITY = 'equity',
  INCOME = 'income',
  EXPENSE = 'expense',
}

export enum PostingSide {
  DEBIT = 'debit',
  CREDIT = 'credit',
}

export interface Account {
  code: AccountCode;
  name: string;
  type: AccountType;
  normalSide: PostingSide;
  parentCode?: AccountCode;
  active: boolean;
  /** Set once a posted transaction references the account; the account is then immutable. */
  referenced: boolean;
  createdAt: Timestamp;
  updatedAt?: Timestamp;
  /** Tombstone; deleted codes may be created again. */
  deletedAt?: Timestamp;
}

export enum TransactionStatus {
  DRAFT = 'draft',
  POSTED = 'posted',
  VOID = 'void',
}

export interface Posting {
  accountCode: AccountCode;
  /** Signed minor-unit integer. */
  amount: number;
  side: PostingSide;
  memo?: string;
}

export interface Transaction {
  id: TransactionId;
  timestamp: Timestamp;
  description: string;
  currency: CurrencyCode;
  postings: Posting[];
  status: TransactionStatus;
  /** Insertion order within the ledger; breaks timestamp ties. */
  sequence: number;
  /** Set on compensating entries created by a void. */
  reversalOf?: TransactionId;
  postedAt?: Timestamp;
  metadata?: Record<string, unknown>;
}

export interface NewTransaction {
  id?: TransactionId;
  timestamp: Timestamp;
  description: string;
  currency?: CurrencyCode;
  postings: Posting[];
  metadata?: Record<string, unknown>;
}

export interface Reversal {
  originalId: TransactionId;
  reversalId: TransactionId;
  reason?: string;
  createdAt: Timestamp;
}

export enum TaxKind {
  VAT = 'vat',
  INCOME_TAX = 'income_tax',
}

export enum PeriodStatus {
  OPEN = 'open',
  CLOSED = 'closed',
  SUBMITTED = 'submitted',
}

export interface Period {
  id: PeriodId;
  start: CalendarDate;
  end: CalendarDate;
  taxKind: TaxKind;
  status: PeriodStatus;
  /** Key the authority uses for this period (e.g. `24A1`, or a tax year `2024-25`). */
  periodKey?: string;
  /** Tax configuration version pinned when the period was closed. */
  configVersion?: string;
  closedAt?: Timestamp;
  submittedAt?: Timestamp;
  createdAt: Timestamp;
}

export type TaxLines = Record<string, number>;

export interface TaxReturn {
  id: TaxReturnId;
  periodId: PeriodId;
  taxKind: TaxKind;
  periodKey?: string;
  start: CalendarDate;
  end: CalendarDate;
  /** Line identifier → minor-unit amount. */
  lines: TaxLines;
  currency: CurrencyCode;
  computedAt: Timestamp;
  configVersion: string;
  /** sha256 of the inputs the figures were derived from. */
  checksum: string;
  transactionIds: TransactionId[];
}

export enum ObligationStatus {
  OPEN = 'open',
  FULFILLED = 'fulfilled',
}

export interface Obligation {
  periodId: PeriodId;
  taxKind: TaxKind;
  periodKey?: string;
  start: CalendarDate;
  end: CalendarDate;
  dueDate: CalendarDate;
  status: ObligationStatus;
  authorityReference?: string;
  fulfilledAt?: Timestamp;
}

export interface AuthToken {
  accessToken: string;
  refreshToken: string;
  expiresAt: Timestamp;
  refreshExpiresAt?: Timestamp;
  scopes: string[];
  tokenType: string;
}

export enum SubmissionOutcome {
  PENDING = 'pending',
  ACCEPTED = 'accepted',
  REJECTED = 'rejected',
  ERROR = 'error',
}

export enum SubmissionState {
  COMPUTED = 'computed',
  AUTHENTICATING = 'authenticating',
  SUBMITTING = 'submitting',
  RETRYING = 'retrying',
  RECONCILING = 'reconciling',
  ACCEPTED = 'accepted',
  REJECTED = 'rejected',
  ERROR = 'error',
}

export interface SubmissionErrorDetail {
  code: string;
  message: string;
  statusCode?: number;
  body?: unknown;
}

export interface SubmissionRecord {
  id: SubmissionRecordId;
  taxReturnId: TaxReturnId;
  checksum: string;
  periodId: PeriodId;
  /** Network attempts made so far for this checksum, including this one. */
  attempt: number;
  attemptedAt: Timestamp;
  state: SubmissionState;
  outcome: SubmissionOutcome;
  networkAttempted: boolean;
  nextEligibleAt?: Timestamp;
  statusCode?: number;
  authorityReference?: string;
  response?: Record<string, unknown>;
  error?: SubmissionErrorDetail;
}

/** Store kinds shared between services. */
export const DocumentKinds = {
  ACCOUNT: 'account',
  TRANSACTION: 'transaction',
  REVERSAL: 'reversal',
  PERIOD: 'period',
  OBLIGATION: 'obligation',
  TAX_RETURN: 'tax_return',
  SUBMISSION_RECORD: 'submission_record',
  AUTH_TOKEN: 'auth_token',
} as const;

export type DocumentKind = (typeof DocumentKinds)[keyof typeof DocumentKinds];

/** AES-GCM payload as stored; the plaintext never reaches the store. */
export interface EncryptedDocument {
  id: string;
  encrypted: string;
  iv: string;
  tag: string;
  salt: string;
  updatedAt: Timestamp;
}

/** Record type held under each store kind. */
export interface DocumentTypes {
  account: Account;
  transaction: Transaction;
  reversal: Reversal;
  period: Period;
  obligation: Obligation;
  tax_return: TaxReturn;
  submission_record: SubmissionRecord;
  auth_token: EncryptedDocument;
}

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};
