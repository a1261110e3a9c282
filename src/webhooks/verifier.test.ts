import { createHmac } from 'crypto';
import { describe, it, expect } from 'vitest';
import { InvalidSignatureError, MissingHeaderError, SignatureDecodeError } from '../errors.js';
import { decodeSignature, signWebhookPayload, verifyWebhookSignature } from './verifier.js';

const SECRET = 'test-secret';
const BODY = Buffer.from('{"id":1001,"total_price":"19.99"}');

function digest(body: Buffer, secret = SECRET): Buffer {
  return createHmac('sha256', secret).update(body).digest();
}

describe('signWebhookPayload', () => {
  it('returns the base64 HMAC-SHA256 of the body', () => {
    expect(signWebhookPayload(BODY, SECRET)).toBe(digest(BODY).toString('base64'));
  });
});

describe('decodeSignature', () => {
  it('reads base64', () => {
    const encoded = digest(BODY).toString('base64');

    expect(decodeSignature(encoded)).toEqual([digest(BODY)]);
  });

  it('keeps both readings of a hex string', () => {
    const hex = digest(BODY).toString('hex');
    const candidates = decodeSignature(hex);

    expect(candidates).toHaveLength(2);
    expect(candidates[1]).toEqual(digest(BODY));
  });

  it('returns nothing for undecodable input', () => {
    expect(decodeSignature('not a signature!')).toEqual([]);
  });
});

describe('verifyWebhookSignature', () => {
  it('accepts a base64 signature', () => {
    expect(() => verifyWebhookSignature(BODY, signWebhookPayload(BODY, SECRET), SECRET)).not.toThrow();
  });

  it('accepts a hex signature', () => {
    expect(() => verifyWebhookSignature(BODY, digest(BODY).toString('hex'), SECRET)).not.toThrow();
  });

  it('accepts a string body', () => {
    const body = '{"id":1}';

    expect(() => verifyWebhookSignature(body, signWebhookPayload(body, SECRET), SECRET)).not.toThrow();
  });

  it('tolerates surrounding whitespace in the header', () => {
    expect(() => verifyWebhookSignature(BODY, ` ${signWebhookPayload(BODY, SECRET)} `, SECRET)).not.toThrow();
  });

  it('rejects a missing or blank header', () => {
    expect(() => verifyWebhookSignature(BODY, undefined, SECRET)).toThrow(MissingHeaderError);
    expect(() => verifyWebhookSignature(BODY, '   ', SECRET)).toThrow(
      'Missing required header: x-shopify-hmac-sha256'
    );
  });

  it('rejects an undecodable header', () => {
    expect(() => verifyWebhookSignature(BODY, '%%%', SECRET)).toThrow(SignatureDecodeError);
  });

  it('rejects a signature made with another secret', () => {
    const forged = signWebhookPayload(BODY, 'other-secret');

    expect(() => verifyWebhookSignature(BODY, forged, SECRET)).toThrow(InvalidSignatureError);
  });

  it('rejects a modified body', () => {
    const signature = signWebhookPayload(BODY, SECRET);
    const reformatted = Buffer.from('{"id": 1001, "total_price": "19.99"}');

    expect(() => verifyWebhookSignature(reformatted, signature, SECRET)).toThrow(
      'Webhook signature verification failed'
    );
  });

  it('rejects the body with any single byte flipped', () => {
    const signature = signWebhookPayload(BODY, SECRET);

    for (let i = 0; i < BODY.length; i++) {
      const tampered = Buffer.from(BODY);
      tampered[i] = (tampered[i] ?? 0) ^ 0x01;
      expect(() => verifyWebhookSignature(tampered, signature, SECRET)).toThrow(InvalidSignatureError);
    }
  });

  it('rejects a digest of the wrong length', () => {
    const truncated = digest(BODY).subarray(0, 16).toString('base64');

    expect(() => verifyWebhookSignature(BODY, truncated, SECRET)).toThrow(InvalidSignatureError);
  });

  it('rejects an empty secret', () => {
    expect(() => verifyWebhookSignature(BODY, signWebhookPayload(BODY, ''), '')).toThrow(InvalidSignatureError);
  });
});
