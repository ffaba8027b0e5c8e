/**
 * Shared failure log of one batch run.
 */

import { AggregatedError } from "../errors";

/**
 * Separator placed between drained messages.
 */
export const ERROR_SEPARATOR = ". ";

/**
 * Collects per-item failure messages from concurrent workers.
 *
 * Both methods are synchronous, so on the event loop a `record` can never
 * land in the middle of a `drainAndRaise`.
 */
export class ErrorSink {
  private messages: string[] = [];

  /**
   * Append a failure message.
   */
  record(message: string): void {
    this.messages.push(message);
  }

  /**
   * Number of messages waiting to be drained.
   */
  get size(): number {
    return this.messages.length;
  }

  /**
   * Clear the log and throw everything recorded since the last drain.
   * Does nothing when the log is empty.
   *
   * @throws {AggregatedError} With `prefix` followed by the joined messages
   */
  drainAndRaise(prefix = ""): void {
    if (this.messages.length === 0) {
      return;
    }
    const drained = this.messages;
    this.messages = [];
    throw new AggregatedError(prefix + drained.join(ERROR_SEPARATOR), drained);
  }
}
