/**
 * Bounded worker pool + timeout helpers.
 */

import { logger } from "./logger";

/**
 * Run `worker` over `items` with at most `limit` in flight.
 * Results are collected by input index, so output order matches input order.
 * The first rejection rejects the whole call; callers that want per-item
 * failures should capture them inside `worker`.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const maxConcurrent = Math.max(1, Math.min(Math.floor(limit) || 1, items.length || 1));
  let next = 0;

  const runLane = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      results[index] = await worker(items[index], index);
    }
  };

  const lanes: Promise<void>[] = [];
  for (let i = 0; i < maxConcurrent; i++) {
    lanes.push(runLane());
  }
  await Promise.all(lanes);

  return results;
}

/**
 * Race `operation` against a timer. The operation receives an AbortSignal that
 * fires on expiry so in-flight work can stop early; `onTimeout` builds the
 * error that rejects the call.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number | undefined,
  onTimeout: () => Error
): Promise<T> {
  const controller = new AbortController();

  if (timeoutMs === undefined || !Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return operation(controller.signal);
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const expiry = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(onTimeout());
    }, timeoutMs);
  });

  const work = operation(controller.signal);
  // A rejection arriving after expiry has nobody left to observe it
  void work.catch((error: unknown) => {
    if (controller.signal.aborted) {
      logger.debug("Operation settled after timeout", {
        timeoutMs,
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  });

  try {
    return await Promise.race([work, expiry]);
  } finally {
    clearTimeout(timer);
  }
}
