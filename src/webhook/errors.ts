import type { WebhookRejectionCategory } from "./types.ts";

/** HTTP status returned to the sender for each rejection category */
export const REJECTION_STATUS = {
  authentication_failure: 401,
  malformed_input: 400,
  unsupported_event_type: 400,
  internal_fault: 500,
} as const satisfies Record<WebhookRejectionCategory, 400 | 401 | 500>;

/**
 * Messages are deliberately generic. Authentication failures never say whether
 * the signature was missing or wrong, and nothing echoes payload contents.
 */
export function rejectionMessage(
  category: WebhookRejectionCategory,
  eventName?: string,
): string {
  switch (category) {
    case "authentication_failure":
      return "Invalid signature";
    case "malformed_input":
      return "Invalid JSON payload";
    case "unsupported_event_type":
      return `Unsupported event type: ${eventName ?? "none"}`;
    case "internal_fault":
      return "Internal server error";
  }
}
