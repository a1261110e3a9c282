/**
 * Webhook Signature Verification
 *
 * HMAC-SHA256 over the exact raw request body, compared in constant time.
 * The body must be the bytes received on the wire: a JSON round-trip changes
 * whitespace and key order and breaks the signature.
 */

import { createHmac, timingSafeEqual } from 'crypto';
import { InvalidSignatureError, MissingHeaderError, SignatureDecodeError } from '../errors.js';
import { WEBHOOK_HEADERS } from '../headers.js';

const DIGEST_LENGTH = 32;
const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;
const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})+$/;

/**
 * Decode a signature header into candidate digests: base64 first, hex as the
 * fallback. A 64-character hex string is also well-formed base64, so both
 * readings are kept when both parse.
 */
export function decodeSignature(header: string): Buffer[] {
  const value = header.trim();
  const candidates: Buffer[] = [];

  if (value && BASE64_PATTERN.test(value)) {
    candidates.push(Buffer.from(value, 'base64'));
  }
  if (HEX_PATTERN.test(value)) {
    candidates.push(Buffer.from(value, 'hex'));
  }

  return candidates;
}

/**
 * Base64 HMAC-SHA256 of a raw body, as the platform sends it
 */
export function signWebhookPayload(rawBody: Buffer | string, secret: string): string {
  return computeDigest(rawBody, secret).toString('base64');
}

/**
 * Verify an inbound webhook signature.
 *
 * @throws MissingHeaderError when the header is empty or absent
 * @throws SignatureDecodeError when the header is neither base64 nor hex
 * @throws InvalidSignatureError when no decoding matches
 */
export function verifyWebhookSignature(
  rawBody: Buffer | string,
  signatureHeader: string | undefined,
  secret: string
): void {
  if (!signatureHeader || !signatureHeader.trim()) {
    throw new MissingHeaderError(WEBHOOK_HEADERS.SIGNATURE);
  }
  if (!secret) {
    throw new InvalidSignatureError();
  }

  const candidates = decodeSignature(signatureHeader);
  if (candidates.length === 0) {
    throw new SignatureDecodeError();
  }

  const expected = computeDigest(rawBody, secret);
  const matched = candidates.some(
    (candidate) => candidate.length === DIGEST_LENGTH && timingSafeEqual(candidate, expected)
  );

  if (!matched) {
    throw new InvalidSignatureError();
  }
}

function computeDigest(rawBody: Buffer | string, secret: string): Buffer {
  return createHmac('sha256', secret).update(rawBody).digest();
}
