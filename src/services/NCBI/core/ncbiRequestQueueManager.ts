/**
 * @fileoverview Serializes NCBI E-utility requests and spaces them out so the
 * configured requests-per-second ceiling is never exceeded.
 * @module src/services/NCBI/core/ncbiRequestQueueManager
 */

import { config } from "../../../config/index.js";
import {
  logger,
  type RequestContext,
  requestContextService,
} from "../../../utils/index.js";
import type { NcbiEndpoint } from "./ncbiConstants.js";

interface QueuedRequest {
  run: () => Promise<void>;
  context: RequestContext;
  endpoint: NcbiEndpoint;
}

const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export class NcbiRequestQueueManager {
  private readonly requestQueue: QueuedRequest[] = [];
  private isProcessingQueue = false;
  private lastRequestTime = 0;

  constructor(private readonly minIntervalMs: number = config.ncbiRequestDelayMs) {}

  /**
   * Drains the queue one request at a time, waiting between requests as needed.
   */
  private async processQueue(): Promise<void> {
    if (this.isProcessingQueue) {
      return;
    }
    this.isProcessingQueue = true;

    try {
      let item = this.requestQueue.shift();
      while (item) {
        const delayNeeded =
          this.minIntervalMs - (Date.now() - this.lastRequestTime);
        if (delayNeeded > 0) {
          logger.debug(
            `Delaying NCBI request by ${delayNeeded}ms to respect rate limit.`,
            requestContextService.createRequestContext({
              parentRequestId: item.context.requestId,
              operation: "NCBI_RateLimitDelay",
              delayNeeded,
              endpoint: item.endpoint,
            }),
          );
          await sleep(delayNeeded);
        }

        this.lastRequestTime = Date.now();
        // `run` settles the caller's promise itself and never rejects.
        await item.run();
        item = this.requestQueue.shift();
      }
    } finally {
      this.isProcessingQueue = false;
    }
  }

  /**
   * Enqueues `task` and resolves or rejects with its outcome.
   */
  public enqueueRequest<T>(
    task: () => Promise<T>,
    context: RequestContext,
    endpoint: NcbiEndpoint,
  ): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.requestQueue.push({
        context,
        endpoint,
        run: () => task().then(resolve, reject),
      });
      void this.processQueue();
    });
  }
}
