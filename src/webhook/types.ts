/** Event types this service accepts on the X-GitHub-Event header. */
export const SUPPORTED_EVENT_TYPES = ["issues", "issue_comment", "ping"] as const;

export type WebhookEventType = (typeof SUPPORTED_EVENT_TYPES)[number];

/** Only these event types are ever persisted; ping is acknowledged and dropped. */
export type StoredEventType = Exclude<WebhookEventType, "ping">;

export function isStoredEventType(value: string | undefined): value is StoredEventType {
  return value === "issues" || value === "issue_comment";
}

/** A webhook delivery as it arrives on the wire, before any checks. */
export interface WebhookDelivery {
  /** Request body exactly as received. HMAC is computed over these bytes. */
  rawBody: Uint8Array;
  /** X-Hub-Signature-256 header value */
  signature?: string;
  /** X-GitHub-Event header value */
  eventName?: string;
  /** X-GitHub-Delivery header value; absent deliveries are stored with a null key */
  deliveryId?: string;
}

/** Uniform view over issues and issue_comment payload shapes. */
export interface NormalizedEvent {
  /** The payload's `action` field ("opened", "created", ...), or "unknown" */
  eventType: string;
  issueNumber?: number;
  issueTitle: string;
  commentBody: string;
  actor: string;
}

export type PipelineState =
  | "received"
  | "verified"
  | "parsed"
  | "classified"
  | "acknowledged"
  | "rejected";

export type WebhookRejectionCategory =
  | "authentication_failure"
  | "malformed_input"
  | "unsupported_event_type"
  | "internal_fault";

export type PipelineOutcome =
  | {
      state: "acknowledged";
      status: 204;
      /** Whether the event was written (false for ping and for duplicates or store failures) */
      stored: boolean;
    }
  | {
      state: "rejected";
      status: 400 | 401 | 500;
      category: WebhookRejectionCategory;
      message: string;
      /** Last state reached before rejection */
      failedAt: Exclude<PipelineState, "acknowledged" | "rejected">;
    };
