import { createHmac } from "node:crypto";
import pino from "pino";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { openEventStore } from "../events/store.ts";
import type { EventStore } from "../events/types.ts";
import { createWebhookPipeline, type WebhookPipeline } from "./pipeline.ts";
import type { WebhookDelivery } from "./types.ts";

const SECRET = "test-secret";
const logger = pino({ level: "silent" });

function signed(body: string | Uint8Array, overrides: Partial<WebhookDelivery> = {}): WebhookDelivery {
  const rawBody = typeof body === "string" ? Buffer.from(body) : body;
  return {
    rawBody,
    signature: `sha256=${createHmac("sha256", SECRET).update(rawBody).digest("hex")}`,
    eventName: "issues",
    deliveryId: "delivery-1",
    ...overrides,
  };
}

const OPENED = JSON.stringify({
  action: "opened",
  issue: { number: 42, title: "Bug" },
  sender: { login: "alice" },
});

describe("createWebhookPipeline", () => {
  let store: EventStore;
  let pipeline: WebhookPipeline;

  beforeEach(async () => {
    store = await openEventStore({ dbPath: ":memory:", logger });
    pipeline = createWebhookPipeline({ secret: SECRET, store, logger });
  });

  afterEach(() => {
    store.close();
  });

  test("stores a verified issues event and acknowledges it", async () => {
    const outcome = await pipeline.process(signed(OPENED));

    expect(outcome).toEqual({ state: "acknowledged", status: 204, stored: true });
    const recent = store.recentEvents(1);
    expect(recent.ok && recent.value[0]).toMatchObject({
      deliveryId: "delivery-1",
      eventType: "issues",
      action: "opened",
      issueNumber: 42,
    });
  });

  test("derives the issue number of an issue_comment from the nested issue", async () => {
    const body = JSON.stringify({
      action: "created",
      comment: { body: "LGTM", issue: { number: 7 } },
      sender: { login: "bob" },
    });

    await pipeline.process(signed(body, { eventName: "issue_comment", deliveryId: "c-1" }));

    const found = store.findByDeliveryId("c-1");
    expect(found.ok && found.value).toMatchObject({
      eventType: "issue_comment",
      action: "created",
      issueNumber: 7,
    });
  });

  test("records an unknown action when the payload has none", async () => {
    await pipeline.process(signed("{}"));

    const found = store.findByDeliveryId("delivery-1");
    expect(found.ok && found.value?.action).toBe("unknown");
  });

  test("rejects a missing signature before looking at the body", async () => {
    const outcome = await pipeline.process({
      rawBody: Buffer.from("{ not json"),
      eventName: "issues",
    });

    expect(outcome).toEqual({
      state: "rejected",
      status: 401,
      category: "authentication_failure",
      message: "Invalid signature",
      failedAt: "received",
    });
    expect(store.count()).toEqual({ ok: true, value: 0 });
  });

  test("a wrong signature gets the same rejection as a missing one", async () => {
    const outcome = await pipeline.process({ ...signed(OPENED), signature: "sha256=deadbeef" });

    expect(outcome.state).toBe("rejected");
    expect(outcome.status).toBe(401);
    if (outcome.state === "rejected") {
      expect(outcome.message).toBe("Invalid signature");
    }
  });

  test("rejects malformed JSON with 400", async () => {
    const outcome = await pipeline.process(signed("{ not json"));

    expect(outcome).toMatchObject({
      state: "rejected",
      status: 400,
      category: "malformed_input",
      message: "Invalid JSON payload",
      failedAt: "verified",
    });
  });

  test("rejects a signed body that is not valid UTF-8 as malformed", async () => {
    const body = Buffer.from([0x7b, 0x22, 0x61, 0x22, 0x3a, 0x22, 0xff, 0xfe, 0x22, 0x7d]);

    const outcome = await pipeline.process(signed(body));

    expect(outcome).toMatchObject({
      state: "rejected",
      status: 400,
      category: "malformed_input",
      failedAt: "verified",
    });
    expect(store.count()).toEqual({ ok: true, value: 0 });
  });

  test("rejects a signed body with a leading byte order mark as malformed", async () => {
    const body = Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from(OPENED)]);

    const outcome = await pipeline.process(signed(body));

    expect(outcome).toMatchObject({
      state: "rejected",
      status: 400,
      category: "malformed_input",
      failedAt: "verified",
    });
  });

  test("acknowledges ping without storing it", async () => {
    const outcome = await pipeline.process(
      signed('{"zen":"Design for failure."}', { eventName: "ping" }),
    );

    expect(outcome).toEqual({ state: "acknowledged", status: 204, stored: false });
    expect(store.count()).toEqual({ ok: true, value: 0 });
  });

  test("rejects unsupported event types by name", async () => {
    const outcome = await pipeline.process(signed("{}", { eventName: "push" }));

    expect(outcome).toMatchObject({
      status: 400,
      category: "unsupported_event_type",
      message: "Unsupported event type: push",
      failedAt: "parsed",
    });
  });

  test("rejects a delivery without an event type header", async () => {
    const outcome = await pipeline.process(signed("{}", { eventName: undefined }));

    expect(outcome).toMatchObject({ status: 400, message: "Unsupported event type: none" });
  });

  test("a repeated delivery is acknowledged but not stored again", async () => {
    await pipeline.process(signed(OPENED));
    const outcome = await pipeline.process(signed(OPENED));

    expect(outcome).toEqual({ state: "acknowledged", status: 204, stored: false });
    expect(store.count()).toEqual({ ok: true, value: 1 });
  });

  test("treats an empty delivery id like a missing one", async () => {
    await pipeline.process(signed(OPENED, { deliveryId: "" }));
    await pipeline.process(signed(OPENED, { deliveryId: "" }));

    expect(store.count()).toEqual({ ok: true, value: 2 });
    const recent = store.recentEvents(2);
    expect(recent.ok && recent.value.map((e) => e.deliveryId)).toEqual([null, null]);
  });

  test("still acknowledges when the store is unavailable", async () => {
    store.close();

    const outcome = await pipeline.process(signed(OPENED));

    expect(outcome).toEqual({ state: "acknowledged", status: 204, stored: false });
  });

  test("maps an unexpected fault to 500 without echoing the payload", async () => {
    const faulty: EventStore = {
      ...store,
      insertIfAbsent() {
        throw new Error("disk on fire");
      },
    };
    const faultyPipeline = createWebhookPipeline({ secret: SECRET, store: faulty, logger });

    const outcome = await faultyPipeline.process(signed(OPENED));

    expect(outcome).toEqual({
      state: "rejected",
      status: 500,
      category: "internal_fault",
      message: "Internal server error",
      failedAt: "classified",
    });
  });
});
