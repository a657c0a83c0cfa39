import { Hono } from "hono";
import { bodyLimit } from "hono/body-limit";
import type { Logger } from "pino";
import type { WebhookPipeline } from "../webhook/pipeline.ts";

interface WebhookRouteDeps {
  pipeline: WebhookPipeline;
  logger: Logger;
  maxBodyBytes: number;
}

export function createWebhookRoutes(deps: WebhookRouteDeps): Hono {
  const { pipeline, logger, maxBodyBytes } = deps;
  const app = new Hono();

  // GitHub (and humans) probe the URL with GET when configuring the hook
  app.get("/webhook", (c) =>
    c.json({ message: "GitHub Issue Service Webhook Endpoint", status: "active" }),
  );

  app.post(
    "/webhook",
    bodyLimit({
      maxSize: maxBodyBytes,
      onError: (c) => {
        logger.warn(
          { deliveryId: c.req.header("x-github-delivery"), maxBodyBytes },
          "Webhook payload exceeds size limit",
        );
        return c.json({ error: "Payload too large" }, 413);
      },
    }),
    async (c) => {
      // Raw bytes: HMAC is computed over the body exactly as sent, before any decoding
      const rawBody = new Uint8Array(await c.req.arrayBuffer());

      const outcome = await pipeline.process({
        rawBody,
        signature: c.req.header("x-hub-signature-256"),
        eventName: c.req.header("x-github-event"),
        deliveryId: c.req.header("x-github-delivery"),
      });

      if (outcome.state === "acknowledged") {
        return c.body(null, 204);
      }
      return c.json({ error: outcome.message }, outcome.status);
    },
  );

  return app;
}
