import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { ApiResponse } from '../types/index.js';

export interface HealthRoutesOptions {
  checkDatabase: () => Promise<boolean>;
  version?: string;
}

interface HealthStatus {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  version: string;
  uptime: number;
  checks: {
    database: {
      status: 'up' | 'down';
      latency: number;
    };
  };
}

export async function healthRoutes(app: FastifyInstance, options: HealthRoutesOptions): Promise<void> {
  // GET /health - Basic health check
  app.get('/', async (_request: FastifyRequest, reply: FastifyReply) => {
    const startTime = Date.now();

    // Check database connectivity
    const dbHealthy = await options.checkDatabase();
    const dbLatency = Date.now() - startTime;

    const healthStatus: HealthStatus = {
      status: dbHealthy ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      version: options.version ?? '1.0.0',
      uptime: process.uptime(),
      checks: {
        database: {
          status: dbHealthy ? 'up' : 'down',
          latency: dbLatency,
        },
      },
    };

    return reply.code(dbHealthy ? 200 : 503).send({
      success: dbHealthy,
      data: healthStatus,
    } satisfies ApiResponse<HealthStatus>);
  });

  // GET /health/ready - Readiness probe
  app.get('/ready', async (_request: FastifyRequest, reply: FastifyReply) => {
    if (await options.checkDatabase()) {
      return reply.code(200).send({
        success: true,
        message: 'Service is ready',
      } satisfies ApiResponse);
    }

    return reply.code(503).send({
      success: false,
      error: 'Service not ready',
      message: 'Database connection not available',
    } satisfies ApiResponse);
  });

  // GET /health/live - Liveness probe
  app.get('/live', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.code(200).send({
      success: true,
      message: 'Service is alive',
    } satisfies ApiResponse);
  });
}

export default healthRoutes;
