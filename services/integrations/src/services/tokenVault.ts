import { z } from 'zod';
import { DocumentStore } from '@ledgerline/database';
import { AuthToken, Clock, systemClock } from '@ledgerline/shared-types';
import { openJson, sealJson } from '@ledgerline/secure-store';
import { ValidationError } from '@ledgerline/shared-utils';

const storedTokenSchema = z
  .object({
    accessToken: z.string(),
    refreshToken: z.string(),
    expiresAt: z.string(),
    refreshExpiresAt: z.string().optional(),
    scopes: z.array(z.string()),
    tokenType: z.string(),
  })
  .nullable();

/**
 * Persists OAuth tokens through the document store as AES-GCM payloads. The store has no
 * delete, so clearing a session seals `null` in its place.
 */
export class TokenVault {
  constructor(
    private readonly store: DocumentStore,
    private readonly key?: string,
    private readonly clock: Clock = systemClock
  ) {}

  async save(sessionId: string, token: AuthToken): Promise<void> {
    await this.write(sessionId, token);
  }

  async clear(sessionId: string): Promise<void> {
    await this.write(sessionId, null);
  }

  async load(sessionId: string): Promise<AuthToken | undefined> {
    const document = await this.store.load('auth_token', sessionId);
    if (!document) {
      return undefined;
    }
    const { encrypted, iv, tag, salt } = document;
    const parsed = storedTokenSchema.safeParse(openJson({ encrypted, iv, tag, salt }, this.key));
    if (!parsed.success) {
      throw new ValidationError(`Stored token for session ${sessionId} is malformed`, parsed.error.issues);
    }
    return parsed.data ?? undefined;
  }

  private async write(sessionId: string, value: AuthToken | null): Promise<void> {
    const sealed = sealJson(value, this.key);
    await this.store.save('auth_token', sessionId, {
      id: sessionId,
      ...sealed,
      updatedAt: this.clock.now().toISOString(),
    });
  }
}
