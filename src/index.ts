import { serve } from "@hono/node-server";
import { createApp } from "./app.ts";
import { loadConfig, loadEnvFile } from "./config.ts";
import { openEventStore } from "./events/store.ts";
import { createGitHubOctokit, createIssueClient } from "./issues/client.ts";
import { createRequestTracker } from "./lifecycle/request-tracker.ts";
import { createShutdownManager } from "./lifecycle/shutdown-manager.ts";
import { createLogger } from "./lib/logger.ts";

// Fail fast on missing or invalid config
loadEnvFile();
const config = loadConfig();
const logger = createLogger(config.logLevel);

// Webhook event log (SQLite via sql.js, flushed to disk on write), opened once and shared
const store = await openEventStore({ dbPath: config.eventsDbPath, logger });

if (config.eventRetentionDays > 0) {
  const purged = store.purgeOlderThan(config.eventRetentionDays);
  if (purged.ok && purged.value > 0) {
    logger.info(
      { purgedCount: purged.value, retentionDays: config.eventRetentionDays },
      "Webhook event retention purge complete",
    );
  }
}

const stored = store.count();
if (stored.ok) {
  logger.info({ dbPath: config.eventsDbPath, storedEvents: stored.value }, "Webhook event log ready");
}

const issues = createIssueClient({
  octokit: createGitHubOctokit({ token: config.githubToken, logger }),
  owner: config.githubOwner,
  repo: config.githubRepo,
  logger,
});

const requestTracker = createRequestTracker();
const app = createApp({ config, logger, store, issues, requestTracker });

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  logger.info(
    { port: info.port, repository: `${config.githubOwner}/${config.githubRepo}` },
    "GitHub issue service started",
  );
});

createShutdownManager({
  logger,
  requestTracker,
  graceMs: config.shutdownGraceMs,
  closeServer: () =>
    new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    }),
  closeStore: () => store.close(),
}).start();
