/**
 * Lifecycle types for graceful shutdown and request tracking.
 */

/** Tracks in-flight HTTP requests for graceful drain. */
export interface RequestTracker {
  /** Increment the active request count. Returns an untrack function (idempotent). */
  trackRequest(): () => void;
  activeCount(): number;
  /**
   * Resolves when no requests are in flight, or rejects after timeoutMs if some remain.
   */
  waitForDrain(timeoutMs: number): Promise<void>;
}

/** Handles SIGTERM/SIGINT: stop accepting, drain, release resources, exit. */
export interface ShutdownManager {
  /** Register signal handlers. Call once at startup. */
  start(): void;
  isShuttingDown(): boolean;
  /** Run the drain sequence without a signal. Resolves with the exit code. */
  shutdown(reason: string): Promise<number>;
}
