import type { StoredEventType } from "../webhook/types.ts";

/**
 * Input for an idempotent insert into the webhook event log.
 *
 * `issueNumber` comes from the normalizer, never from the sender.
 */
export type WebhookEventInput = {
  /** X-GitHub-Delivery; null when the header was missing */
  deliveryId: string | null;
  eventType: StoredEventType;
  action: string;
  issueNumber?: number;
  payload: unknown;
};

/** Summary row returned by recentEvents(). */
export type RecentEvent = {
  deliveryId: string | null;
  eventType: StoredEventType;
  action: string;
  issueNumber: number | null;
  /** ISO-8601 UTC insertion time */
  timestamp: string;
};

/** Full row including the original payload. */
export type StoredWebhookEvent = RecentEvent & {
  payload: unknown;
};

export type StorageOperation =
  | "insertIfAbsent"
  | "recentEvents"
  | "findByDeliveryId"
  | "purgeOlderThan"
  | "count";

export class StorageError extends Error {
  readonly operation: StorageOperation;

  constructor(operation: StorageOperation, cause: unknown) {
    super(
      `Event store ${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
    this.name = "StorageError";
    this.operation = operation;
  }
}

/**
 * Outcome of a store call. Storage failures are values at this boundary so that
 * callers decide whether to log-and-continue or surface them.
 */
export type StoreResult<T> = { ok: true; value: T } | { ok: false; error: StorageError };

export interface EventStore {
  /** Insert unless a row with the same delivery id exists. `inserted` is false for duplicates. */
  insertIfAbsent(entry: WebhookEventInput): StoreResult<{ inserted: boolean }>;
  /** Newest first, at most `limit` rows. */
  recentEvents(limit: number): StoreResult<RecentEvent[]>;
  findByDeliveryId(deliveryId: string): StoreResult<StoredWebhookEvent | undefined>;
  /** Delete rows received more than `days` days ago. Returns the number removed. */
  purgeOlderThan(days: number): StoreResult<number>;
  count(): StoreResult<number>;
  close(): void;
}
