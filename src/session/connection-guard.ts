/**
 * Precondition gate run before every public operation.
 */

import { ConnectionError } from "../errors";
import type { Logger } from "../logging";
import { noOpLogger } from "../logging";
import type { RetryPolicy } from "../config";
import type { RemoteResult } from "../api/result";
import { describeFailure } from "../api/result";
import type { AuthHeaders, Session } from "./session";
import type { TokenLifecycle } from "./token-lifecycle";

/**
 * Identity probe used to decide whether the session can reach the drive.
 */
export interface DriveProbe {
  probeDrive(headers: AuthHeaders): Promise<RemoteResult<void>>;
}

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Connects the session if needed, then runs the heartbeat refresh.
 */
export class ConnectionGuard {
  private readonly logger: Logger;
  private readonly sleep: Sleep;
  private connecting?: Promise<void>;

  constructor(
    private readonly session: Session,
    private readonly tokens: TokenLifecycle,
    private readonly probe: DriveProbe,
    options?: { logger?: Logger; sleep?: Sleep }
  ) {
    this.logger = options?.logger ?? noOpLogger;
    this.sleep = options?.sleep ?? defaultSleep;
  }

  /**
   * Make sure the session is connected and its token is fresh.
   *
   * Each connection attempt refreshes the token and probes the drive. An
   * {@link AuthError} from the refresh ends the loop at once; a failed probe
   * is retried after `perAttemptDelayMs`. Concurrent callers share one
   * connect loop.
   *
   * @throws {ConnectionError} If no probe succeeded within `maxAttempts`
   */
  async ensureConnected(policy: RetryPolicy): Promise<void> {
    if (!this.session.isConnected) {
      if (!this.connecting) {
        this.connecting = this.connect(policy).finally(() => {
          this.connecting = undefined;
        });
      }
      await this.connecting;
    }
    await this.tokens.ensureFresh(policy);
  }

  private async connect(policy: RetryPolicy): Promise<void> {
    for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
      await this.tokens.refresh();

      const result = await this.probe.probeDrive(this.session.authHeaders);
      if ("ok" in result) {
        this.session.isConnected = true;
        this.logger.info("Connected to OneDrive", { attempt });
        return;
      }

      this.logger.warn(describeFailure("Connection attempt failed", result.error), { attempt });
      if (attempt < policy.maxAttempts) {
        await this.sleep(policy.perAttemptDelayMs);
      }
    }

    throw new ConnectionError(
      `Could not establish connection to OneDrive after ${policy.maxAttempts} attempts`,
      policy.maxAttempts
    );
  }
}
