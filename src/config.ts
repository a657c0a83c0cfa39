import { config as loadDotenv } from "dotenv";
import { z } from "zod";

// GitHub rejects webhook payloads above 25 MB, so nothing larger is legitimate.
const GITHUB_MAX_PAYLOAD_BYTES = 25 * 1024 * 1024;

const configSchema = z.object({
  githubToken: z.string().min(1, "GITHUB_TOKEN is required"),
  githubOwner: z.string().min(1, "GITHUB_OWNER is required"),
  githubRepo: z.string().min(1, "GITHUB_REPO is required"),
  webhookSecret: z.string().min(1, "GITHUB_WEBHOOK_SECRET is required"),
  port: z.coerce.number().int().positive().default(8000),
  logLevel: z.string().default("info"),
  eventsDbPath: z.string().min(1).default("./data/webhook-events.db"),
  eventRetentionDays: z.coerce.number().int().nonnegative().default(0),
  webhookMaxBodyBytes: z.coerce
    .number()
    .int()
    .positive()
    .max(GITHUB_MAX_PAYLOAD_BYTES)
    .default(GITHUB_MAX_PAYLOAD_BYTES),
  shutdownGraceMs: z.coerce.number().int().nonnegative().default(10_000),
});

export type AppConfig = z.infer<typeof configSchema>;

type Env = Record<string, string | undefined>;

/** Empty strings count as unset so that `FOO=` in a .env file falls back to the default. */
function read(env: Env, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = env[key];
    if (value !== undefined && value !== "") {
      return value;
    }
  }
  return undefined;
}

export function parseConfig(env: Env) {
  return configSchema.safeParse({
    githubToken: read(env, "GITHUB_TOKEN"),
    githubOwner: read(env, "GITHUB_OWNER"),
    githubRepo: read(env, "GITHUB_REPO"),
    webhookSecret: read(env, "GITHUB_WEBHOOK_SECRET", "WEBHOOK_SECRET"),
    port: read(env, "PORT"),
    logLevel: read(env, "LOG_LEVEL"),
    eventsDbPath: read(env, "EVENTS_DB_PATH"),
    eventRetentionDays: read(env, "EVENT_RETENTION_DAYS"),
    webhookMaxBodyBytes: read(env, "WEBHOOK_MAX_BODY_BYTES"),
    shutdownGraceMs: read(env, "SHUTDOWN_GRACE_MS"),
  });
}

/**
 * Fill process.env from a .env file. Variables already set in the environment win,
 * and a missing file leaves the environment untouched.
 */
export function loadEnvFile(path = ".env"): void {
  loadDotenv({ path });
}

export function loadConfig(env: Env = process.env): AppConfig {
  const result = parseConfig(env);

  if (!result.success) {
    console.error("FATAL: Invalid configuration:");
    for (const issue of result.error.issues) {
      console.error(`  ${issue.path.join(".")}: ${issue.message}`);
    }
    process.exit(1);
  }

  return result.data;
}
