// Export all route modules
export { healthRoutes, type HealthRoutesOptions } from './health.js';
export { syncRoutes, type SyncRoutesOptions } from './sync.js';
export { webhookRoutes, type WebhookRoutesOptions } from './webhooks.js';
