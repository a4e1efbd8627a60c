import { z } from 'zod';
import type { SyncJob } from '@commercesync/sync-engine';

// ============================================================================
// Zod Schemas for Request Validation
// ============================================================================

// Sweep trigger options
export const sweepQuerySchema = z.object({
  full: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),
  since: z.string().datetime().optional(),
});

// Failed job listing
export const failedJobsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

// ============================================================================
// API Response Types
// ============================================================================

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  message?: string;
}

export interface FailedJobsResponse extends ApiResponse<SyncJob[]> {
  count: number;
}

// Webhook acknowledgement; the sender only distinguishes accepted from rejected
export interface WebhookAck {
  status: 'accepted' | 'rejected';
  message?: string;
}

// ============================================================================
// Inferred Types
// ============================================================================

export type SweepQuery = z.infer<typeof sweepQuerySchema>;
export type FailedJobsQuery = z.infer<typeof failedJobsQuerySchema>;
