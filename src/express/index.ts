/**
 * Commerce Gateway - Express Integration
 *
 * Re-exports for Express framework integration.
 */

export { tenantMiddleware, signTenantHeaders, isInternalNetwork, extractBearerToken } from './middleware.js';
export type { TenantRequest, TenantMiddlewareOptions, HeaderTrustMode } from './middleware.js';

// Webhook receiver
export { webhookRouter, createWebhookHandler, WEBHOOK_ROUTES } from './webhook-router.js';
export type { WebhookRouterOptions, WebhookSecretResolver } from './webhook-router.js';
