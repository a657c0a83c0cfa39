import type { NormalizedEvent } from "./types.ts";

type PayloadRecord = Record<string, unknown>;

function isRecord(value: unknown): value is PayloadRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function getRecord(record: PayloadRecord, key: string): PayloadRecord | undefined {
  const value = record[key];
  return isRecord(value) ? value : undefined;
}

function getString(record: PayloadRecord | undefined, key: string): string | undefined {
  const value = record?.[key];
  return typeof value === "string" ? value : undefined;
}

function getInteger(record: PayloadRecord | undefined, key: string): number | undefined {
  const value = record?.[key];
  return typeof value === "number" && Number.isInteger(value) ? value : undefined;
}

/**
 * Issue number lookup, first match wins:
 * 1. top-level `issue.number`
 * 2. `comment.issue.number`
 *
 * A top-level issue without a number does not fall through to the comment.
 */
function extractIssueNumber(
  issue: PayloadRecord | undefined,
  comment: PayloadRecord | undefined,
): number | undefined {
  if (issue) {
    return getInteger(issue, "number");
  }
  const nestedIssue = comment ? getRecord(comment, "issue") : undefined;
  if (nestedIssue) {
    return getInteger(nestedIssue, "number");
  }
  return undefined;
}

/**
 * Extract a uniform record from an issues / issue_comment payload.
 *
 * Never throws: anything that is missing or of the wrong type falls back to its
 * default, including a payload that is not an object at all.
 */
export function normalizeWebhookPayload(payload: unknown): NormalizedEvent {
  const record: PayloadRecord = isRecord(payload) ? payload : {};
  const issue = getRecord(record, "issue");
  const comment = getRecord(record, "comment");
  const sender = getRecord(record, "sender");

  return {
    eventType: getString(record, "action") ?? "unknown",
    issueNumber: extractIssueNumber(issue, comment),
    issueTitle: getString(issue, "title") ?? "",
    commentBody: getString(comment, "body") ?? "",
    actor: getString(sender, "login") ?? "unknown",
  };
}
