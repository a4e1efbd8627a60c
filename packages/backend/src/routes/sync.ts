/**
 * Sync Routes - Operator controls for sweeps, failed jobs and engine status
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { isEntityType, describeError } from '@commercesync/integrations';
import type { EngineStatus, SweepReport, SyncEngine } from '@commercesync/sync-engine';
import { requireOperatorToken } from '../middleware/auth.js';
import {
  failedJobsQuerySchema,
  sweepQuerySchema,
  type ApiResponse,
  type FailedJobsResponse,
} from '../types/index.js';

export interface SyncRoutesOptions {
  engine: Pick<SyncEngine, 'runSweep' | 'listFailedJobs' | 'retryJob' | 'getStatus' | 'resumeCredential'>;
  operatorToken: string;
}

export async function syncRoutes(app: FastifyInstance, options: SyncRoutesOptions): Promise<void> {
  const { engine } = options;

  // All routes require the operator token
  app.addHook('preHandler', requireOperatorToken(options.operatorToken));

  // ============================================================================
  // Sweeps
  // ============================================================================

  // POST /sync/sweeps/:entityType - Run a reconciliation sweep now
  app.post<{ Params: { entityType: string }; Querystring: Record<string, string | undefined> }>(
    '/sweeps/:entityType',
    async (
      request: FastifyRequest<{ Params: { entityType: string }; Querystring: Record<string, string | undefined> }>,
      reply: FastifyReply
    ) => {
      const { entityType } = request.params;
      if (!isEntityType(entityType)) {
        return reply.code(400).send({
          success: false,
          error: 'Validation Error',
          message: `Unknown entity type "${entityType}"`,
        } satisfies ApiResponse);
      }

      const query = sweepQuerySchema.safeParse(request.query);
      if (!query.success) {
        return reply.code(400).send({
          success: false,
          error: 'Validation Error',
          message: query.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
        } satisfies ApiResponse);
      }

      const result = await engine.runSweep(entityType, {
        full: query.data.full,
        since: query.data.since ? new Date(query.data.since) : undefined,
      });
      if (!result.ok) {
        request.log.warn({ entityType, kind: result.error.kind }, 'Operator sweep failed');
        return reply.code(502).send({
          success: false,
          error: result.error.kind,
          message: describeError(result.error),
        } satisfies ApiResponse);
      }

      return reply.code(200).send({
        success: true,
        data: result.value,
      } satisfies ApiResponse<SweepReport>);
    }
  );

  // ============================================================================
  // Failed jobs
  // ============================================================================

  // GET /sync/jobs/failed - Jobs that no retry sweep will pick up again
  app.get<{ Querystring: Record<string, string | undefined> }>(
    '/jobs/failed',
    async (request: FastifyRequest<{ Querystring: Record<string, string | undefined> }>, reply: FastifyReply) => {
      const query = failedJobsQuerySchema.safeParse(request.query);
      if (!query.success) {
        return reply.code(400).send({
          success: false,
          error: 'Validation Error',
          message: 'limit must be an integer between 1 and 500',
        } satisfies ApiResponse);
      }

      const jobs = await engine.listFailedJobs(query.data.limit);
      return reply.code(200).send({
        success: true,
        data: jobs,
        count: jobs.length,
      } satisfies FailedJobsResponse);
    }
  );

  // POST /sync/jobs/:id/retry - Re-enqueue a failed job with a fresh retry budget
  app.post<{ Params: { id: string } }>(
    '/jobs/:id/retry',
    async (request: FastifyRequest<{ Params: { id: string } }>, reply: FastifyReply) => {
      const { id } = request.params;
      const retried = await engine.retryJob(id);

      if (!retried) {
        return reply.code(404).send({
          success: false,
          error: 'Not Found',
          message: `Job ${id} does not exist or has not failed`,
        } satisfies ApiResponse);
      }

      request.log.info({ jobId: id }, 'Job re-enqueued by operator');
      return reply.code(200).send({
        success: true,
        message: `Job ${id} re-enqueued`,
      } satisfies ApiResponse);
    }
  );

  // ============================================================================
  // Engine status
  // ============================================================================

  // GET /sync/status - Worker pool, queue counts and credential state
  app.get('/status', async (_request: FastifyRequest, reply: FastifyReply) => {
    const status = await engine.getStatus();
    return reply.code(200).send({
      success: true,
      data: status,
    } satisfies ApiResponse<EngineStatus>);
  });

  // POST /sync/credential/resume - Lift the halt after the access token was replaced
  app.post('/credential/resume', async (request: FastifyRequest, reply: FastifyReply) => {
    engine.resumeCredential();
    request.log.info('Credential halt lifted by operator');
    return reply.code(200).send({
      success: true,
      message: 'API calls resumed',
    } satisfies ApiResponse);
  });
}

export default syncRoutes;
