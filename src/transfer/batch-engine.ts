/**
 * Bounded concurrent batch execution with fail-fast error aggregation.
 */

import { ConfigurationError, errorMessage } from "../errors";
import type { Logger } from "../logging";
import { noOpLogger } from "../logging";
import { ErrorSink } from "./error-sink";

/**
 * Performs the transfer of one item.
 *
 * Failures are reported through `sink.record`; a worker is not expected to
 * reject, but if it does the engine records the rejection in the same sink.
 */
export type TransferWorker<T> = (item: T, sink: ErrorSink) => Promise<void>;

export interface BatchEngineOptions {
  /** Maximum number of workers running at the same time */
  maxConcurrency: number;
  logger?: Logger;
}

/**
 * What a successful run did.
 */
export interface BatchRunSummary {
  /** Number of workers launched in each batch, in execution order */
  batchSizes: number[];
  /** Total number of items processed */
  itemsProcessed: number;
}

export class BatchTransferEngine {
  readonly maxConcurrency: number;
  private readonly logger: Logger;

  /**
   * @throws {ConfigurationError} If `maxConcurrency` is not a positive integer
   */
  constructor(options: BatchEngineOptions) {
    if (!Number.isInteger(options.maxConcurrency) || options.maxConcurrency <= 0) {
      throw new ConfigurationError(
        `maxConcurrency must be a positive integer, got ${options.maxConcurrency}`,
        "InvalidValue"
      );
    }
    this.maxConcurrency = options.maxConcurrency;
    this.logger = options.logger ?? noOpLogger;
  }

  /**
   * Process `items` from the tail towards the head in batches of at most
   * `maxConcurrency` concurrent workers.
   *
   * Every worker of a batch finishes before the batch's failures are
   * inspected. If any were recorded, the remaining items are not started and
   * an {@link AggregatedError} prefixed with `contextPrefix` is thrown. Items
   * of earlier batches stay transferred.
   *
   * @param items - Items to process; the array itself is not modified
   * @param worker - Transfer of a single item
   * @param contextPrefix - Text put before the joined failure messages
   */
  async runBatches<T>(
    items: readonly T[],
    worker: TransferWorker<T>,
    contextPrefix: string
  ): Promise<BatchRunSummary> {
    const pending = [...items];
    const sink = new ErrorSink();
    const batchSizes: number[] = [];

    while (pending.length > 0) {
      const take = Math.min(this.maxConcurrency, pending.length);
      // Popped order: last item first.
      const batch = pending.splice(pending.length - take).reverse();

      const batchNumber = batchSizes.length + 1;
      this.logger.debug("Starting batch", { batch: batchNumber, size: batch.length });

      await Promise.all(batch.map((item) => this.runWorker(worker, item, sink)));
      batchSizes.push(batch.length);

      if (sink.size > 0) {
        this.logger.warn("Batch finished with failures", {
          batch: batchNumber,
          failures: sink.size,
          abandoned: pending.length,
        });
      }
      sink.drainAndRaise(contextPrefix);
    }

    return {
      batchSizes,
      itemsProcessed: batchSizes.reduce((sum, size) => sum + size, 0),
    };
  }

  private async runWorker<T>(worker: TransferWorker<T>, item: T, sink: ErrorSink): Promise<void> {
    try {
      await worker(item, sink);
    } catch (error) {
      sink.record(errorMessage(error));
    }
  }
}
