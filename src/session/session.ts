/**
 * Session state owned by one client instance.
 */

/**
 * Read-only copy of the authorization headers handed to transfer workers.
 */
export type AuthHeaders = Readonly<Record<string, string>>;

/**
 * Token pair returned by the token endpoint.
 */
export interface TokenPair {
  accessToken: string;
  refreshToken: string;
}

/**
 * Mutable authentication and connectivity state.
 *
 * Only the token lifecycle and the connection guard write to it. The
 * authorization headers are rebuilt whenever the access token changes, so
 * the two never disagree.
 */
export class Session {
  private _accessToken = "";
  private _refreshToken: string;
  private _authHeaders: AuthHeaders = Object.freeze({});
  private _lastRefreshedAt = 0;

  /** Whether the identity probe has succeeded */
  isConnected = false;

  constructor(refreshToken: string) {
    this._refreshToken = refreshToken;
  }

  get accessToken(): string {
    return this._accessToken;
  }

  get refreshToken(): string {
    return this._refreshToken;
  }

  /** Epoch milliseconds of the last successful refresh, 0 before the first */
  get lastRefreshedAt(): number {
    return this._lastRefreshedAt;
  }

  /**
   * Frozen headers for the current access token; safe to share between
   * concurrent workers.
   */
  get authHeaders(): AuthHeaders {
    return this._authHeaders;
  }

  /**
   * Replace both tokens, the headers and the refresh timestamp together.
   */
  applyTokens(tokens: TokenPair, refreshedAt: number): void {
    this._accessToken = tokens.accessToken;
    this._refreshToken = tokens.refreshToken;
    this._authHeaders = Object.freeze({ Authorization: `Bearer ${tokens.accessToken}` });
    this._lastRefreshedAt = refreshedAt;
  }
}
