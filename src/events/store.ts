import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import type { Logger } from "pino";
import initSqlJs, { type BindParams, type Database, type SqlJsStatic } from "sql.js";
import { z } from "zod";
import {
  StorageError,
  type EventStore,
  type RecentEvent,
  type StorageOperation,
  type StoreResult,
  type StoredWebhookEvent,
  type WebhookEventInput,
} from "./types.ts";

const MS_PER_DAY = 24 * 60 * 60 * 1000;

const eventRowSchema = z.object({
  delivery_id: z.string().nullable(),
  event_type: z.enum(["issues", "issue_comment"]),
  action: z.string(),
  issue_number: z.number().int().nullable(),
  received_at: z.string(),
});

const fullEventRowSchema = eventRowSchema.extend({ payload: z.string() });

const countRowSchema = z.object({ cnt: z.number().int() });

type EventRow = z.infer<typeof eventRowSchema>;

function toRecentEvent(row: EventRow): RecentEvent {
  return {
    deliveryId: row.delivery_id,
    eventType: row.event_type,
    action: row.action,
    issueNumber: row.issue_number,
    timestamp: row.received_at,
  };
}

// The WASM module is loaded once per process and shared by every store
let sqlModule: Promise<SqlJsStatic> | undefined;

function loadSqlModule(): Promise<SqlJsStatic> {
  sqlModule ??= initSqlJs();
  return sqlModule;
}

/** Run a SELECT and return every row as a column-name keyed object. */
function queryRows(db: Database, sql: string, params: BindParams = []): Record<string, unknown>[] {
  const stmt = db.prepare(sql);
  try {
    stmt.bind(params);
    const rows: Record<string, unknown>[] = [];
    while (stmt.step()) {
      rows.push(stmt.getAsObject());
    }
    return rows;
  } finally {
    stmt.free();
  }
}

/**
 * Open the webhook event log backed by SQLite (sql.js, in process).
 *
 * Called once at startup; the returned handle is shared by every request.
 * Schema creation is idempotent, so reopening an existing database is safe.
 * Idempotency of inserts rests on the UNIQUE constraint on delivery_id, not on
 * application-level locking.
 *
 * The database lives in memory and every write that changes rows is flushed to
 * `dbPath` (temp file + rename). `:memory:` skips the file entirely. One process
 * owns the file at a time.
 */
export async function openEventStore(opts: {
  dbPath: string;
  logger: Logger;
  now?: () => Date;
}): Promise<EventStore> {
  const { dbPath, logger } = opts;
  const now = opts.now ?? (() => new Date());
  const persistent = dbPath !== ":memory:";

  const SQL = await loadSqlModule();

  if (persistent) {
    mkdirSync(dirname(dbPath), { recursive: true });
  }
  const db =
    persistent && existsSync(dbPath) ? new SQL.Database(readFileSync(dbPath)) : new SQL.Database();

  // delivery_id stays nullable: a delivery without the header is still recorded,
  // and SQLite lets any number of NULLs coexist under UNIQUE.
  db.run(`
    CREATE TABLE IF NOT EXISTS webhook_events (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      delivery_id TEXT UNIQUE,
      event_type TEXT NOT NULL CHECK (event_type IN ('issues', 'issue_comment')),
      action TEXT NOT NULL,
      issue_number INTEGER,
      payload TEXT NOT NULL,
      received_at TEXT NOT NULL
    )
  `);
  db.run(`
    CREATE INDEX IF NOT EXISTS idx_webhook_events_received_at
    ON webhook_events(received_at)
  `);

  function persist(): void {
    if (!persistent) {
      return;
    }
    const tmpPath = `${dbPath}.tmp`;
    writeFileSync(tmpPath, db.export());
    renameSync(tmpPath, dbPath);
  }

  persist();

  function attempt<T>(
    operation: StorageOperation,
    context: Record<string, unknown>,
    fn: () => T,
  ): StoreResult<T> {
    try {
      return { ok: true, value: fn() };
    } catch (err) {
      const error = new StorageError(operation, err);
      logger.error({ err, operation, ...context }, "Event store operation failed");
      return { ok: false, error };
    }
  }

  let closed = false;

  logger.debug({ dbPath }, "Webhook event store opened");

  return {
    insertIfAbsent(entry: WebhookEventInput) {
      return attempt(
        "insertIfAbsent",
        { deliveryId: entry.deliveryId, eventType: entry.eventType },
        () => {
          db.run(
            `INSERT OR IGNORE INTO webhook_events (
              delivery_id, event_type, action, issue_number, payload, received_at
            ) VALUES (?, ?, ?, ?, ?, ?)`,
            [
              entry.deliveryId,
              entry.eventType,
              entry.action,
              entry.issueNumber ?? null,
              JSON.stringify(entry.payload) ?? "null",
              now().toISOString(),
            ],
          );
          const inserted = db.getRowsModified() > 0;
          if (inserted) {
            persist();
          }
          return { inserted };
        },
      );
    },

    recentEvents(limit: number) {
      // AUTOINCREMENT id gives a strict insertion order even when timestamps tie
      return attempt("recentEvents", { limit }, () =>
        queryRows(
          db,
          `SELECT delivery_id, event_type, action, issue_number, received_at
           FROM webhook_events
           ORDER BY id DESC
           LIMIT ?`,
          [limit],
        ).map((row) => toRecentEvent(eventRowSchema.parse(row))),
      );
    },

    findByDeliveryId(deliveryId: string) {
      return attempt("findByDeliveryId", { deliveryId }, (): StoredWebhookEvent | undefined => {
        const [found] = queryRows(
          db,
          `SELECT delivery_id, event_type, action, issue_number, received_at, payload
           FROM webhook_events
           WHERE delivery_id = ?`,
          [deliveryId],
        );
        if (!found) {
          return undefined;
        }
        const row = fullEventRowSchema.parse(found);
        const payload: unknown = JSON.parse(row.payload);
        return { ...toRecentEvent(row), payload };
      });
    },

    purgeOlderThan(days: number) {
      return attempt("purgeOlderThan", { days }, () => {
        const cutoff = new Date(now().getTime() - days * MS_PER_DAY).toISOString();
        db.run("DELETE FROM webhook_events WHERE received_at < ?", [cutoff]);
        const removed = db.getRowsModified();
        if (removed > 0) {
          persist();
        }
        return removed;
      });
    },

    count() {
      return attempt("count", {}, () => {
        const [row] = queryRows(db, "SELECT COUNT(*) AS cnt FROM webhook_events");
        return countRowSchema.parse(row).cnt;
      });
    },

    close(): void {
      if (closed) {
        return;
      }
      closed = true;
      db.close();
      logger.debug({ dbPath }, "Webhook event store closed");
    },
  };
}
