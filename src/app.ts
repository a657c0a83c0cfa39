import { Hono } from "hono";
import type { Logger } from "pino";
import type { AppConfig } from "./config.ts";
import type { EventStore } from "./events/types.ts";
import type { IssueClient } from "./issues/types.ts";
import { trackRequests } from "./lifecycle/request-tracker.ts";
import type { RequestTracker } from "./lifecycle/types.ts";
import { createEventRoutes } from "./routes/events.ts";
import { createHealthRoutes } from "./routes/health.ts";
import { createIssueRoutes } from "./routes/issues.ts";
import { createWebhookRoutes } from "./routes/webhooks.ts";
import { createWebhookPipeline } from "./webhook/pipeline.ts";

export interface AppDeps {
  config: Pick<AppConfig, "webhookSecret" | "webhookMaxBodyBytes">;
  logger: Logger;
  store: EventStore;
  issues: IssueClient;
  requestTracker?: RequestTracker;
}

export function createApp(deps: AppDeps): Hono {
  const { config, logger, store, issues, requestTracker } = deps;
  const pipeline = createWebhookPipeline({ secret: config.webhookSecret, store, logger });

  const app = new Hono();

  if (requestTracker) {
    app.use("*", trackRequests(requestTracker));
  }

  // Mount routes
  app.route(
    "/",
    createWebhookRoutes({ pipeline, logger, maxBodyBytes: config.webhookMaxBodyBytes }),
  );
  app.route("/", createEventRoutes({ store, logger }));
  app.route("/", createIssueRoutes({ issues, logger }));
  app.route("/", createHealthRoutes());

  app.notFound((c) => c.json({ error: "Not Found" }, 404));

  // Global error handler
  app.onError((err, c) => {
    logger.error({ err, path: c.req.path, method: c.req.method }, "Unhandled error");
    return c.json({ error: "Internal Server Error" }, 500);
  });

  return app;
}
