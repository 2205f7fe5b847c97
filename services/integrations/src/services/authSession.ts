import {
  ClientCredentials,
  MtdTokenSet,
  TokenEndpointConfig,
  buildAuthorizationUrl,
  classifyMtdError,
  exchangeAuthorizationCode,
  refreshAccessToken,
  requestClientCredentialsToken,
} from '@ledgerline/hmrc';
import { createServiceLogger } from '@ledgerline/observability';
import { AuthToken, Clock, systemClock } from '@ledgerline/shared-types';
import {
  AuthExpiredError,
  AuthRequiredError,
  AuthenticationError,
  SingleFlight,
  isAppError,
  toError,
} from '@ledgerline/shared-utils';
import { TokenVault } from './tokenVault';

const logger = createServiceLogger('integrations-service', { component: 'auth-session' });

export type AuthState = 'unauthenticated' | 'authorizing' | 'authenticated' | 'refreshing' | 'expired';

export interface AuthorizationGrant {
  authorizationCode: string;
  redirectUri: string;
}

/** OAuth2 grants the session needs from the authority. */
export interface TokenEndpoint {
  exchangeCode(credentials: ClientCredentials & AuthorizationGrant): Promise<MtdTokenSet>;
  clientCredentials(credentials: ClientCredentials): Promise<MtdTokenSet>;
  refresh(credentials: ClientCredentials & { refreshToken: string }): Promise<MtdTokenSet>;
  authorizationUrl(params: { clientId: string; redirectUri: string; scope: string; state: string }): string;
}

export function mtdTokenEndpoint(config: TokenEndpointConfig = {}): TokenEndpoint {
  return {
    exchangeCode: (credentials) => exchangeAuthorizationCode(config, credentials),
    clientCredentials: (credentials) => requestClientCredentialsToken(config, credentials),
    refresh: (credentials) => refreshAccessToken(config, credentials),
    authorizationUrl: (params) => buildAuthorizationUrl(config, params),
  };
}

export interface AuthSessionOptions {
  sessionId?: string;
  vault?: TokenVault;
  clock?: Clock;
  /** Tokens expiring within this many seconds are refreshed before use. */
  refreshMarginSeconds?: number;
}

const DEFAULT_REFRESH_MARGIN_SECONDS = 60;

function scopesOf(scope: string | undefined, requested: string): string[] {
  return (scope ?? requested).split(/\s+/).filter(Boolean);
}

/**
 * OAuth2 token lifecycle for one authority connection:
 * unauthenticated → authorizing → authenticated ⇄ refreshing → expired.
 *
 * Refresh tokens are single-use at the authority, so at most one refresh grant is in flight;
 * concurrent callers of {@link validToken} share its result.
 */
export class AuthSession {
  private currentState: AuthState = 'unauthenticated';
  private token?: AuthToken;
  private credentials?: ClientCredentials;
  private readonly refreshes = new SingleFlight<string, string>();
  private readonly sessionId: string;
  private readonly clock: Clock;
  private readonly marginMs: number;

  constructor(
    private readonly endpoint: TokenEndpoint,
    private readonly options: AuthSessionOptions = {}
  ) {
    this.sessionId = options.sessionId ?? 'default';
    this.clock = options.clock ?? systemClock;
    this.marginMs = (options.refreshMarginSeconds ?? DEFAULT_REFRESH_MARGIN_SECONDS) * 1000;
  }

  get state(): AuthState {
    return this.currentState;
  }

  get scopes(): string[] {
    return this.token ? [...this.token.scopes] : [];
  }

  /** URL the user visits to grant access; the session waits in `authorizing` for {@link acquire}. */
  authorizationUrl(clientId: string, redirectUri: string, scope: string, state: string): string {
    this.currentState = 'authorizing';
    return this.endpoint.authorizationUrl({ clientId, redirectUri, scope, state });
  }

  /**
   * Runs the authorization-code exchange when `grant` is given, the client-credentials grant
   * otherwise.
   */
  async acquire(clientId: string, clientSecret: string, scope: string, grant?: AuthorizationGrant): Promise<AuthToken> {
    this.currentState = 'authorizing';
    const credentials: ClientCredentials = { clientId, clientSecret, scope };

    let tokens: MtdTokenSet;
    try {
      tokens = grant
        ? await this.endpoint.exchangeCode({ ...credentials, ...grant })
        : await this.endpoint.clientCredentials(credentials);
    } catch (error) {
      this.currentState = 'unauthenticated';
      this.token = undefined;
      logger.error('Token acquisition failed', error, { sessionId: this.sessionId });
      throw new AuthenticationError(`Token acquisition failed: ${toError(error).message}`, {
        code: isAppError(error) ? error.code : undefined,
      });
    }

    this.credentials = credentials;
    await this.install(this.toAuthToken(tokens, scope));
    logger.info('Session authenticated', {
      sessionId: this.sessionId,
      grant: grant ? 'authorization_code' : 'client_credentials',
    });
    return { ...this.requireToken() };
  }

  /** Loads a previously stored token. Returns false when the vault holds none. */
  async restore(clientId: string, clientSecret: string): Promise<boolean> {
    const stored = await this.options.vault?.load(this.sessionId);
    if (!stored) {
      return false;
    }
    this.credentials = { clientId, clientSecret };
    this.token = stored;
    this.currentState = this.refreshTokenExpired(stored) ? 'expired' : 'authenticated';
    return true;
  }

  async revoke(): Promise<void> {
    this.token = undefined;
    this.credentials = undefined;
    this.currentState = 'unauthenticated';
    await this.options.vault?.clear(this.sessionId);
    logger.info('Session revoked', { sessionId: this.sessionId });
  }

  /**
   * Access token valid for at least the refresh margin. Fails `AuthRequired` when no token was
   * ever acquired and `AuthExpired` once re-authorization is needed.
   */
  validToken(): Promise<string> {
    const token = this.token;
    if (this.currentState === 'expired') {
      return Promise.reject(new AuthExpiredError());
    }
    if (!token) {
      return Promise.reject(new AuthRequiredError());
    }
    if (this.currentState !== 'refreshing' && !this.expiresSoon(token)) {
      return Promise.resolve(token.accessToken);
    }
    return this.refreshes.run(this.sessionId, () => this.refresh());
  }

  private async refresh(): Promise<string> {
    const token = this.requireToken();
    const credentials = this.credentials;
    if (!credentials || !token.refreshToken || this.refreshTokenExpired(token)) {
      this.currentState = 'expired';
      logger.warn('Refresh token expired', { sessionId: this.sessionId });
      throw new AuthExpiredError();
    }

    this.currentState = 'refreshing';
    let tokens: MtdTokenSet;
    try {
      tokens = await this.endpoint.refresh({ ...credentials, refreshToken: token.refreshToken });
    } catch (error) {
      const kind = classifyMtdError(error);
      if (kind === 'rejected' || kind === 'authentication') {
        this.currentState = 'expired';
        logger.warn('Refresh grant rejected', { sessionId: this.sessionId, kind });
        throw new AuthExpiredError('Refresh grant rejected; re-authorization required');
      }
      this.currentState = 'authenticated';
      if (this.clock.now().getTime() < Date.parse(token.expiresAt)) {
        logger.warn('Refresh failed, using current token until expiry', { sessionId: this.sessionId, kind });
        return token.accessToken;
      }
      throw toError(error);
    }

    await this.install(this.toAuthToken(tokens, token.scopes.join(' '), token));
    logger.info('Access token refreshed', { sessionId: this.sessionId });
    return this.requireToken().accessToken;
  }

  private async install(token: AuthToken): Promise<void> {
    this.token = token;
    this.currentState = 'authenticated';
    await this.options.vault?.save(this.sessionId, token);
  }

  private toAuthToken(tokens: MtdTokenSet, requestedScope: string, previous?: AuthToken): AuthToken {
    const now = this.clock.now().getTime();
    const refreshExpiresAt =
      tokens.refreshTokenExpiresIn !== undefined
        ? new Date(now + tokens.refreshTokenExpiresIn * 1000).toISOString()
        : previous?.refreshExpiresAt;
    return {
      accessToken: tokens.accessToken,
      // The authority may rotate the refresh token or leave it out of a refresh response.
      refreshToken: tokens.refreshToken ?? previous?.refreshToken ?? '',
      expiresAt: new Date(now + tokens.expiresIn * 1000).toISOString(),
      refreshExpiresAt,
      scopes: scopesOf(tokens.scope, requestedScope),
      tokenType: tokens.tokenType,
    };
  }

  private requireToken(): AuthToken {
    if (!this.token) {
      throw new AuthRequiredError();
    }
    return this.token;
  }

  private expiresSoon(token: AuthToken): boolean {
    return Date.parse(token.expiresAt) - this.clock.now().getTime() <= this.marginMs;
  }

  private refreshTokenExpired(token: AuthToken): boolean {
    return token.refreshExpiresAt !== undefined && Date.parse(token.refreshExpiresAt) <= this.clock.now().getTime();
  }
}
