/**
 * Webhook Signature Tests
 */

import crypto from 'crypto';
import { describe, it, expect } from 'vitest';
import { computeWebhookSignature, verifyWebhookSignature } from '../graphql/webhooks.js';

const SECRET = 'test-secret';
const BODY = '{"id":123,"title":"Espresso Beans"}';

function sign(body: string, secret = SECRET): string {
  return crypto.createHmac('sha256', secret).update(body, 'utf8').digest('base64');
}

describe('verifyWebhookSignature', () => {
  it('accepts the base64 HMAC of the raw body', () => {
    expect(verifyWebhookSignature(BODY, sign(BODY), SECRET)).toEqual({ valid: true });
  });

  it('accepts a Buffer body', () => {
    expect(verifyWebhookSignature(Buffer.from(BODY), sign(BODY), SECRET).valid).toBe(true);
  });

  it('rejects a signature computed over a re-serialized body', () => {
    const reserialized = JSON.stringify({ title: 'Espresso Beans', id: 123 });

    expect(verifyWebhookSignature(BODY, sign(reserialized), SECRET)).toEqual({
      valid: false,
      error: 'Invalid signature',
    });
  });

  it('rejects a signature made with another secret', () => {
    expect(verifyWebhookSignature(BODY, sign(BODY, 'other-secret'), SECRET).valid).toBe(false);
  });

  it('rejects a missing or truncated signature', () => {
    expect(verifyWebhookSignature(BODY, undefined, SECRET)).toEqual({
      valid: false,
      error: 'Missing signature header',
    });
    expect(verifyWebhookSignature(BODY, sign(BODY).slice(0, 10), SECRET).valid).toBe(false);
  });

  it('rejects everything when no secret is configured', () => {
    expect(verifyWebhookSignature(BODY, sign(BODY), '').valid).toBe(false);
  });

  it('computes the same digest the platform sends', () => {
    expect(computeWebhookSignature(BODY, SECRET)).toBe(sign(BODY));
  });
});
