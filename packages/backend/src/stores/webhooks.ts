/**
 * Postgres webhook receipt store
 */

import { and, eq, lt } from 'drizzle-orm';
import type { RecordReceiptOutcome, WebhookEventStore, WebhookReceipt } from '@commercesync/sync-engine';
import type { Database } from '../db/index.js';
import { webhookEvents, type WebhookEventRow } from '../db/schema.js';

function toReceipt(row: WebhookEventRow): WebhookReceipt {
  return {
    eventId: row.eventId,
    topic: row.topic,
    receivedAt: row.receivedAt,
    signatureValid: row.signatureValid,
    processed: row.processed,
  };
}

export class DrizzleWebhookEventStore implements WebhookEventStore {
  constructor(private readonly db: Database) {}

  async recordReceipt(receipt: WebhookReceipt): Promise<RecordReceiptOutcome> {
    const inserted = await this.db
      .insert(webhookEvents)
      .values({
        eventId: receipt.eventId,
        topic: receipt.topic,
        receivedAt: receipt.receivedAt,
        signatureValid: true,
        processed: false,
      })
      .onConflictDoNothing()
      .returning({ id: webhookEvents.id });
    if (inserted.length > 0) {
      return { inserted: true };
    }

    const [existing] = await this.db
      .select()
      .from(webhookEvents)
      .where(this.validReceipt(receipt.topic, receipt.eventId))
      .limit(1);
    if (!existing) {
      // Purged between the insert and the read
      return this.recordReceipt(receipt);
    }
    return { inserted: false, existing: toReceipt(existing) };
  }

  async recordRejected(receipt: WebhookReceipt): Promise<void> {
    await this.db.insert(webhookEvents).values({
      eventId: receipt.eventId,
      topic: receipt.topic,
      receivedAt: receipt.receivedAt,
      signatureValid: false,
      processed: false,
    });
  }

  async reclaim(topic: string, eventId: string, previousReceivedAt: Date, now: Date): Promise<boolean> {
    const rows = await this.db
      .update(webhookEvents)
      .set({ receivedAt: now })
      .where(
        and(
          this.validReceipt(topic, eventId),
          eq(webhookEvents.processed, false),
          eq(webhookEvents.receivedAt, previousReceivedAt)
        )
      )
      .returning({ id: webhookEvents.id });
    return rows.length > 0;
  }

  async markProcessed(topic: string, eventId: string): Promise<void> {
    await this.db.update(webhookEvents).set({ processed: true }).where(this.validReceipt(topic, eventId));
  }

  async purgeOlderThan(cutoff: Date): Promise<number> {
    const rows = await this.db
      .delete(webhookEvents)
      .where(lt(webhookEvents.receivedAt, cutoff))
      .returning({ id: webhookEvents.id });
    return rows.length;
  }

  private validReceipt(topic: string, eventId: string) {
    return and(
      eq(webhookEvents.topic, topic),
      eq(webhookEvents.eventId, eventId),
      eq(webhookEvents.signatureValid, true)
    );
  }
}
