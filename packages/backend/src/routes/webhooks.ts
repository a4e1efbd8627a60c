/**
 * Webhook Routes - signed change notifications from the commerce platform
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { SyncEngine } from '@commercesync/sync-engine';
import type { WebhookAck } from '../types/index.js';

export interface WebhookRoutesOptions {
  engine: Pick<SyncEngine, 'receiveWebhook'>;
}

export async function webhookRoutes(app: FastifyInstance, options: WebhookRoutesOptions): Promise<void> {
  // Keep the raw bytes; the signature covers them exactly as sent
  app.addContentTypeParser('application/json', { parseAs: 'buffer' }, (_request, body, done) => {
    done(null, body);
  });

  // POST /webhooks - Receive a delivery
  app.post<{ Body: Buffer }>('/', async (request: FastifyRequest<{ Body: Buffer }>, reply: FastifyReply) => {
    const rawBody = Buffer.isBuffer(request.body) ? request.body : Buffer.alloc(0);
    const result = await options.engine.receiveWebhook(rawBody, request.headers);

    if (!result.ok) {
      request.log.warn({ reason: result.error.reason }, 'Webhook delivery rejected');
      return reply.code(401).send({
        status: 'rejected',
        message: result.error.message,
      } satisfies WebhookAck);
    }

    request.log.debug(
      { topic: result.value.topic, eventId: result.value.eventId, jobs: result.value.jobIds.length },
      result.value.duplicate ? 'Duplicate webhook acknowledged' : 'Webhook accepted'
    );
    return reply.code(200).send({ status: 'accepted' } satisfies WebhookAck);
  });
}

export default webhookRoutes;
