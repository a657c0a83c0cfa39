import type { Logger } from "pino";
import type { RequestTracker, ShutdownManager } from "./types.ts";

interface ShutdownManagerDeps {
  logger: Logger;
  requestTracker: RequestTracker;
  /** Stop accepting new connections */
  closeServer: () => Promise<void>;
  /** Release the event store */
  closeStore: () => void;
  graceMs: number;
  exit?: (code: number) => void;
}

/**
 * Create a shutdown manager that handles SIGTERM/SIGINT with drain logic.
 *
 * On signal:
 * 1. Stop accepting connections
 * 2. Wait for in-flight requests within the grace window
 * 3. Close the store and exit 0, or exit 1 if the drain timed out
 */
export function createShutdownManager(deps: ShutdownManagerDeps): ShutdownManager {
  const { logger, requestTracker, closeServer, closeStore, graceMs } = deps;
  const exit = deps.exit ?? ((code: number) => process.exit(code));
  let shuttingDown = false;

  async function drain(reason: string): Promise<number> {
    shuttingDown = true;
    logger.info(
      { reason, activeRequests: requestTracker.activeCount(), graceMs },
      "Shutdown started, draining in-flight requests",
    );

    // Resolves once open connections finish; the drain below bounds the wait
    const serverClosed = closeServer().catch((err: unknown) => {
      logger.warn({ err }, "HTTP server did not close cleanly");
    });

    let exitCode = 0;
    try {
      await requestTracker.waitForDrain(graceMs);
      logger.info("Graceful drain completed");
    } catch {
      exitCode = 1;
      logger.error(
        { abandonedRequests: requestTracker.activeCount() },
        "Drain timed out, abandoning in-flight requests",
      );
    }

    if (exitCode === 0) {
      await serverClosed;
    }
    closeStore();
    return exitCode;
  }

  async function handleSignal(signal: string): Promise<void> {
    if (shuttingDown) {
      logger.warn({ signal }, "Shutdown already in progress, ignoring duplicate signal");
      return;
    }
    exit(await drain(signal));
  }

  return {
    start() {
      process.on("SIGTERM", () => {
        void handleSignal("SIGTERM");
      });
      process.on("SIGINT", () => {
        void handleSignal("SIGINT");
      });
      logger.info({ graceMs }, "Shutdown manager registered SIGTERM/SIGINT handlers");
    },

    isShuttingDown() {
      return shuttingDown;
    },

    shutdown(reason: string) {
      return drain(reason);
    },
  };
}
