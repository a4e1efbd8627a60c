import Fastify, { type FastifyInstance } from 'fastify';
import type { SyncEngine } from '@commercesync/sync-engine';
import type { Config } from './config/index.js';
import { healthRoutes } from './routes/health.js';
import { syncRoutes } from './routes/sync.js';
import { webhookRoutes } from './routes/webhooks.js';

export interface BuildAppOptions {
  engine: SyncEngine;
  config: Pick<Config, 'NODE_ENV' | 'LOG_LEVEL' | 'OPERATOR_TOKEN'>;
  checkDatabase: () => Promise<boolean>;
}

// Create Fastify instance with plugins and routes
export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const { config, engine } = options;

  const app = Fastify({
    logger: {
      level: config.LOG_LEVEL ?? (config.NODE_ENV === 'production' ? 'info' : 'debug'),
      transport:
        config.NODE_ENV === 'development'
          ? {
              target: 'pino-pretty',
              options: {
                colorize: true,
              },
            }
          : undefined,
    },
  });

  // Global error handler
  app.setErrorHandler((error, _request, reply) => {
    app.log.error(error);

    // Handle known error types
    if (error.validation) {
      return reply.code(400).send({
        success: false,
        error: 'Validation Error',
        message: error.message,
      });
    }

    // Generic error response
    const statusCode = error.statusCode ?? 500;
    return reply.code(statusCode).send({
      success: false,
      error: error.name || 'Internal Server Error',
      message: config.NODE_ENV === 'production' ? 'An error occurred' : error.message,
    });
  });

  // Health check routes (unprotected)
  await app.register(healthRoutes, { prefix: '/health', checkDatabase: options.checkDatabase });

  // Operator routes
  await app.register(syncRoutes, { prefix: '/api/sync', engine, operatorToken: config.OPERATOR_TOKEN });

  // Webhook routes (unprotected - use signature verification)
  await app.register(webhookRoutes, { prefix: '/webhooks', engine });

  // Root route
  app.get('/', async () => {
    return {
      name: 'Commerce Sync',
      version: '1.0.0',
      status: 'running',
      endpoints: {
        health: '/health',
        sync: '/api/sync',
        webhooks: '/webhooks',
      },
    };
  });

  return app;
}
