import type { Logger } from "pino";
import type { EventStore } from "../events/types.ts";
import { createChildLogger } from "../lib/logger.ts";
import { REJECTION_STATUS, rejectionMessage } from "./errors.ts";
import { normalizeWebhookPayload } from "./normalize.ts";
import type {
  PipelineOutcome,
  PipelineState,
  WebhookDelivery,
  WebhookRejectionCategory,
} from "./types.ts";
import { isStoredEventType } from "./types.ts";
import { decodeUtf8, verifyWebhookSignature } from "./verify.ts";

export interface WebhookPipelineDeps {
  secret: string;
  store: EventStore;
  logger: Logger;
}

export interface WebhookPipeline {
  /** Run one delivery through verify → parse → classify → store. Never throws. */
  process(delivery: WebhookDelivery): Promise<PipelineOutcome>;
}

function reject(
  category: WebhookRejectionCategory,
  failedAt: Exclude<PipelineState, "acknowledged" | "rejected">,
  eventName?: string,
): PipelineOutcome {
  return {
    state: "rejected",
    status: REJECTION_STATUS[category],
    category,
    message: rejectionMessage(category, eventName),
    failedAt,
  };
}

/** Strict UTF-8, then JSON. A leading BOM is not JSON whitespace, so it fails the parse. */
function parseBody(rawBody: Uint8Array): { ok: true; payload: unknown } | { ok: false } {
  const text = decodeUtf8(rawBody);
  if (text === undefined) {
    return { ok: false };
  }
  try {
    const payload: unknown = JSON.parse(text);
    return { ok: true, payload };
  } catch {
    return { ok: false };
  }
}

/**
 * Creates the webhook ingestion pipeline.
 *
 * States: received → verified → parsed → classified → acknowledged | rejected.
 * Storage is best-effort: a failed insert is logged and the delivery is still
 * acknowledged, since GitHub disables hooks that keep answering non-2xx.
 * No retries happen here; redelivery is GitHub's job.
 */
export function createWebhookPipeline(deps: WebhookPipelineDeps): WebhookPipeline {
  const { secret, store, logger } = deps;

  return {
    async process(delivery: WebhookDelivery): Promise<PipelineOutcome> {
      const { rawBody, signature, eventName } = delivery;
      // An empty header is as good as none: never key idempotency on ""
      const deliveryId = delivery.deliveryId || null;
      const log = createChildLogger(logger, { deliveryId, eventName });

      // received → verified
      if (!(await verifyWebhookSignature(rawBody, signature, secret))) {
        log.warn("Webhook signature verification failed");
        return reject("authentication_failure", "received");
      }

      // verified → parsed
      const parsed = parseBody(rawBody);
      if (!parsed.ok) {
        log.warn("Webhook payload is not valid JSON");
        return reject("malformed_input", "verified");
      }
      const payload = parsed.payload;

      // parsed → classified
      if (eventName === "ping") {
        log.info("Ping received");
        return { state: "acknowledged", status: 204, stored: false };
      }

      if (!isStoredEventType(eventName)) {
        log.warn("Unsupported webhook event type");
        return reject("unsupported_event_type", "parsed", eventName);
      }

      try {
        const normalized = normalizeWebhookPayload(payload);
        if (!deliveryId) {
          log.warn("Delivery has no X-GitHub-Delivery header; storing without idempotency key");
        }

        const result = store.insertIfAbsent({
          deliveryId,
          eventType: eventName,
          action: normalized.eventType,
          issueNumber: normalized.issueNumber,
          payload,
        });

        if (!result.ok) {
          log.warn(
            { operation: result.error.operation },
            "Event not persisted; acknowledging anyway",
          );
          return { state: "acknowledged", status: 204, stored: false };
        }

        if (!result.value.inserted) {
          log.info("Duplicate delivery skipped");
        } else {
          log.info(
            {
              action: normalized.eventType,
              issueNumber: normalized.issueNumber,
              actor: normalized.actor,
            },
            "Webhook event stored",
          );
        }

        return { state: "acknowledged", status: 204, stored: result.value.inserted };
      } catch (err) {
        log.error({ err }, "Unexpected fault while processing webhook");
        return reject("internal_fault", "classified");
      }
    },
  };
}
