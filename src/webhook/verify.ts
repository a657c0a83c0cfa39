import { verify } from "@octokit/webhooks-methods";
import { createHmac, timingSafeEqual } from "node:crypto";

const SIGNATURE_PREFIX = "sha256=";

/**
 * Decode a request body as strict UTF-8. Returns undefined when the bytes are not
 * valid UTF-8. A leading BOM is kept in the text, so the result re-encodes to
 * exactly the input bytes.
 */
export function decodeUtf8(bytes: Uint8Array): string | undefined {
  try {
    return new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(bytes);
  } catch {
    return undefined;
  }
}

function timingSafeCompare(actual: string, expected: string): boolean {
  const actualBuffer = Buffer.from(actual, "utf8");
  const expectedBuffer = Buffer.from(expected, "utf8");
  if (actualBuffer.length !== expectedBuffer.length) {
    return false;
  }
  return timingSafeEqual(actualBuffer, expectedBuffer);
}

/**
 * Verify a GitHub webhook signature using HMAC-SHA256 over the raw body bytes.
 *
 * Fail-closed: a missing secret or signature yields false, never an exception.
 * The header may carry the digest bare or with the `sha256=` prefix GitHub sends.
 * UTF-8 bodies go through @octokit/webhooks-methods, which only takes text; bytes
 * that do not decode are hashed directly so that a signed but malformed body is
 * still recognised as authentic and rejected later as malformed.
 */
export async function verifyWebhookSignature(
  rawBody: Uint8Array,
  signatureHeader: string | undefined,
  secret: string | undefined,
): Promise<boolean> {
  if (!signatureHeader || !secret) {
    return false;
  }

  const digest = signatureHeader.startsWith(SIGNATURE_PREFIX)
    ? signatureHeader.slice(SIGNATURE_PREFIX.length)
    : signatureHeader;
  if (digest.length === 0) {
    return false;
  }

  const text = decodeUtf8(rawBody);
  if (text === undefined) {
    const expected = createHmac("sha256", secret).update(rawBody).digest("hex");
    return timingSafeCompare(digest, expected);
  }

  try {
    return await verify(secret, text, `${SIGNATURE_PREFIX}${digest}`);
  } catch {
    // The library throws on an empty payload; an empty body cannot be a valid delivery.
    return false;
  }
}
