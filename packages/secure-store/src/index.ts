import { EncryptedData, ValidationError, decrypt, encrypt } from '@ledgerline/shared-utils';

export type SecretPayload = EncryptedData;

const DEVELOPMENT_KEY = 'ledgerline-local-development-key';

function resolveKey(provided?: string): string {
  const key = provided || process.env.SECURE_STORE_KEY;

  if (key && key.length >= 16) {
    return key;
  }

  if (key) {
    throw new ValidationError('SECURE_STORE_KEY must be at least 16 characters');
  }

  if (process.env.NODE_ENV === 'production') {
    throw new ValidationError('SECURE_STORE_KEY must be configured in production');
  }

  return DEVELOPMENT_KEY;
}

export function isSecretPayload(payload: unknown): payload is SecretPayload {
  if (typeof payload !== 'object' || payload === null) {
    return false;
  }
  const candidate: Record<string, unknown> = { ...payload };
  return (
    typeof candidate.encrypted === 'string' &&
    typeof candidate.iv === 'string' &&
    typeof candidate.tag === 'string' &&
    typeof candidate.salt === 'string'
  );
}

function assertSecretPayload(payload: unknown): SecretPayload {
  if (typeof payload === 'string') {
    let parsed: unknown;
    try {
      parsed = JSON.parse(payload);
    } catch (error) {
      throw new ValidationError(
        `Failed to parse encrypted payload string: ${error instanceof Error ? error.message : 'unknown error'}`
      );
    }
    return assertSecretPayload(parsed);
  }

  if (isSecretPayload(payload)) {
    return payload;
  }

  throw new ValidationError('Invalid encrypted payload format');
}

export function encryptSecret(value: string, key?: string): SecretPayload {
  return encrypt(value, resolveKey(key));
}

export function decryptSecret(payload: SecretPayload | string, key?: string): string {
  return decrypt(assertSecretPayload(payload), resolveKey(key));
}

/** Encrypts a JSON-serialisable value as one secret. */
export function sealJson(value: unknown, key?: string): SecretPayload {
  return encryptSecret(JSON.stringify(value), key);
}

export function openJson(payload: unknown, key?: string): unknown {
  return JSON.parse(decryptSecret(assertSecretPayload(payload), key));
}
