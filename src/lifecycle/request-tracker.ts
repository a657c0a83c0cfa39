import type { MiddlewareHandler } from "hono";
import type { RequestTracker } from "./types.ts";

const DRAIN_POLL_MS = 100;

/**
 * Create a request tracker for counting in-flight HTTP requests.
 *
 * Used by the shutdown manager to wait for drain before closing the store.
 */
export function createRequestTracker(): RequestTracker {
  let activeRequests = 0;

  return {
    trackRequest() {
      activeRequests++;
      let called = false;
      return () => {
        if (!called) {
          called = true;
          activeRequests--;
        }
      };
    },

    activeCount() {
      return activeRequests;
    },

    waitForDrain(timeoutMs: number): Promise<void> {
      return new Promise<void>((resolve, reject) => {
        if (activeRequests === 0) {
          resolve();
          return;
        }

        const interval = setInterval(() => {
          if (activeRequests === 0) {
            clearInterval(interval);
            clearTimeout(timeout);
            resolve();
          }
        }, DRAIN_POLL_MS);
        const timeout = setTimeout(() => {
          clearInterval(interval);
          reject(new Error(`Drain timeout after ${timeoutMs}ms`));
        }, timeoutMs);
      });
    },
  };
}

/** Hono middleware that counts every request until its response is produced. */
export function trackRequests(tracker: RequestTracker): MiddlewareHandler {
  return async (_c, next) => {
    const untrack = tracker.trackRequest();
    try {
      await next();
    } finally {
      untrack();
    }
  };
}
