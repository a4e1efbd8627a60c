/**
 * Webhook signature verification
 * The platform signs the raw request body with HMAC-SHA256 and sends the
 * base64 digest in `x-shopify-hmac-sha256`.
 */

import crypto from 'crypto';

export const WEBHOOK_HEADERS = {
  topic: 'x-shopify-topic',
  signature: 'x-shopify-hmac-sha256',
  eventId: 'x-shopify-event-id',
  webhookId: 'x-shopify-webhook-id',
  shopDomain: 'x-shopify-shop-domain',
} as const;

export interface WebhookValidationResult {
  valid: boolean;
  error?: string;
}

export function computeWebhookSignature(rawBody: string | Buffer, secret: string): string {
  return crypto.createHmac('sha256', secret).update(rawBody).digest('base64');
}

/**
 * Must run on the exact bytes received, before any JSON decoding.
 */
export function verifyWebhookSignature(
  rawBody: string | Buffer,
  signature: string | undefined,
  secret: string
): WebhookValidationResult {
  if (!secret) {
    return { valid: false, error: 'Webhook secret not configured' };
  }
  if (!signature) {
    return { valid: false, error: 'Missing signature header' };
  }

  const expected = Buffer.from(computeWebhookSignature(rawBody, secret));
  const received = Buffer.from(signature.trim());

  // timingSafeEqual throws on length mismatch
  if (expected.length !== received.length) {
    return { valid: false, error: 'Invalid signature' };
  }

  if (!crypto.timingSafeEqual(expected, received)) {
    return { valid: false, error: 'Invalid signature' };
  }

  return { valid: true };
}
