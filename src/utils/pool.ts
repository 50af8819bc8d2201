import { setImmediate as yieldToEventLoop } from "node:timers/promises";

export interface DrainOptions {
  /** Number of lanes pulling from the queue. */
  lanes: number;
  /** Checked before each item is taken; returning true stops every lane. */
  shouldStop?: () => boolean;
  /** Give the event loop a turn between items so timers and aborts are observed. */
  yieldBetween?: boolean;
}

export interface DrainResult {
  started: number;
  skipped: number;
}

/**
 * Drains `items` through a fixed number of lanes sharing one cursor.
 * Completion order is not the input order; callers that need determinism
 * store results by index or sort afterwards.
 */
export async function drainQueue<T>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<void> | void,
  options: DrainOptions,
): Promise<DrainResult> {
  let cursor = 0;
  let stopped = false;
  const laneCount = Math.max(1, Math.min(Math.floor(options.lanes), items.length));

  const lane = async (): Promise<void> => {
    while (cursor < items.length) {
      if (stopped || options.shouldStop?.()) {
        stopped = true;
        return;
      }
      const index = cursor;
      cursor += 1;
      await worker(items[index], index);
      if (options.yieldBetween) {
        await yieldToEventLoop();
      }
    }
  };

  if (items.length > 0) {
    await Promise.all(Array.from({ length: laneCount }, () => lane()));
  }

  return { started: cursor, skipped: items.length - cursor };
}
