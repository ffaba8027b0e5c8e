/**
 * Token lifecycle management with heartbeat refresh.
 */

import { z } from "zod";
import { AuthError, NetworkError, errorMessage } from "../errors";
import type { Logger } from "../logging";
import { noOpLogger } from "../logging";
import type { HttpTransport } from "../transport";
import { responseJson } from "../transport";
import type { RetryPolicy } from "../config";
import type { Session, TokenPair } from "./session";

/**
 * Parameters of the refresh-token grant.
 */
export interface TokenEndpointConfig {
  authUrl: string;
  clientId: string;
  permissions: readonly string[];
  redirectUri: string;
  timeout?: number;
}

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1),
});

const TokenErrorSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

/**
 * Sole writer of the session's credentials.
 *
 * Concurrent callers of {@link refresh} share one in-flight request, so the
 * refresh token is never exchanged twice.
 */
export class TokenLifecycle {
  private inFlight?: Promise<void>;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(
    private readonly session: Session,
    private readonly transport: HttpTransport,
    private readonly endpoint: TokenEndpointConfig,
    options?: { logger?: Logger; now?: () => number }
  ) {
    this.logger = options?.logger ?? noOpLogger;
    this.now = options?.now ?? (() => Date.now());
  }

  /**
   * Exchange the refresh token for a new token pair.
   *
   * @throws {AuthError} If the request fails or the response lacks a token; the session is left unchanged
   */
  refresh(): Promise<void> {
    if (!this.inFlight) {
      this.inFlight = this.exchange().finally(() => {
        this.inFlight = undefined;
      });
    }
    return this.inFlight;
  }

  /**
   * Refresh when the token is older than the policy's refresh interval.
   */
  async ensureFresh(policy: RetryPolicy): Promise<void> {
    const age = this.now() - this.session.lastRefreshedAt;
    if (age > policy.refreshIntervalMs) {
      this.logger.debug("Access token is stale, refreshing", { durationMs: age });
      await this.refresh();
    }
  }

  private async exchange(): Promise<void> {
    const body = new URLSearchParams();
    body.set("client_id", this.endpoint.clientId);
    body.set("scope", this.endpoint.permissions.join(" "));
    body.set("refresh_token", this.session.refreshToken);
    body.set("redirect_uri", this.endpoint.redirectUri);
    body.set("grant_type", "refresh_token");

    let tokens: TokenPair;
    try {
      const response = await this.transport.send({
        method: "POST",
        url: this.endpoint.authUrl,
        headers: {
          "content-type": "application/x-www-form-urlencoded",
          accept: "application/json",
        },
        body: body.toString(),
        timeout: this.endpoint.timeout,
      });

      const data = responseJson(response);

      if (response.status < 200 || response.status >= 300) {
        const parsedError = TokenErrorSchema.safeParse(data);
        const reason = parsedError.success
          ? parsedError.data.error_description ?? parsedError.data.error
          : response.statusText;
        throw new AuthError(
          `Token refresh failed with status ${response.status}: ${reason}`,
          "RefreshFailed",
          { status: response.status }
        );
      }

      const parsed = TokenResponseSchema.safeParse(data);
      if (!parsed.success) {
        const missing = parsed.error.issues.map((issue) => issue.path.join(".")).join(", ");
        throw new AuthError(
          `Token response is missing ${missing}`,
          "InvalidResponse",
          { status: response.status }
        );
      }

      tokens = {
        accessToken: parsed.data.access_token,
        refreshToken: parsed.data.refresh_token,
      };
    } catch (error) {
      this.logger.error("Token refresh failed", {
        errorCode: error instanceof AuthError || error instanceof NetworkError
          ? error.code
          : undefined,
      });
      if (error instanceof AuthError) {
        throw error;
      }
      throw new AuthError(
        `Token refresh failed: ${errorMessage(error)}`,
        "NetworkFailure",
        { cause: error }
      );
    }

    this.session.applyTokens(tokens, this.now());
    this.logger.debug("Access token refreshed");
  }
}
