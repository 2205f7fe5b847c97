import { describe, it, expect } from '@jest/globals';
import { ValidationError } from '@ledgerline/shared-utils';
import { decryptSecret, encryptSecret, isSecretPayload, openJson, sealJson } from '../index';

const KEY = 'test-secret-store-key';

describe('secure-store', () => {
  it('seals and opens JSON values', () => {
    const sealed = sealJson({ accessToken: 'access-1', scopes: ['read:vat'] }, KEY);

    expect(isSecretPayload(sealed)).toBe(true);
    expect(openJson(sealed, KEY)).toEqual({ accessToken: 'access-1', scopes: ['read:vat'] });
  });

  it('accepts a payload serialised as a string', () => {
    const payload = encryptSecret('client-secret', KEY);

    expect(decryptSecret(JSON.stringify(payload), KEY)).toBe('client-secret');
  });

  it('rejects short keys and malformed payloads', () => {
    expect(() => encryptSecret('value', 'short')).toThrow(ValidationError);
    expect(() => decryptSecret('not json', KEY)).toThrow(ValidationError);
    expect(() => openJson({ encrypted: 'abc' }, KEY)).toThrow(ValidationError);
    expect(isSecretPayload(null)).toBe(false);
  });
});
