import { DocumentStore } from '@ledgerline/database';
import { TokenEndpointConfig } from '@ledgerline/hmrc';
import { Clock } from '@ledgerline/shared-types';
import { AuthSession, mtdTokenEndpoint } from './services/authSession';
import { TokenVault } from './services/tokenVault';

export * from './services/authSession';
export * from './services/tokenVault';

export interface AuthSessionConfig extends TokenEndpointConfig {
  sessionId?: string;
  refreshMarginSeconds?: number;
  /** Key for the token vault; secure-store falls back to SECURE_STORE_KEY. */
  secureStoreKey?: string;
}

/** Session against the MTD token endpoint whose tokens persist encrypted in `store`. */
export function createAuthSession(store: DocumentStore, config: AuthSessionConfig = {}, clock?: Clock): AuthSession {
  const { sessionId, refreshMarginSeconds, secureStoreKey, ...endpointConfig } = config;
  return new AuthSession(mtdTokenEndpoint(endpointConfig), {
    sessionId,
    refreshMarginSeconds,
    clock,
    vault: new TokenVault(store, secureStoreKey, clock),
  });
}
