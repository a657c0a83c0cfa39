import { Hono } from "hono";

export const SERVICE_NAME = "github-issue-service";

export function createHealthRoutes(): Hono {
  const app = new Hono();

  // Liveness only: the process is up and serving requests
  app.get("/healthz", (c) =>
    c.json({
      status: "healthy",
      service: SERVICE_NAME,
      timestamp: new Date().toISOString(),
    }),
  );

  return app;
}
