/**
 * Webhook Receiver - Express Router
 *
 * Accepts commerce platform callbacks addressed to a tenant, verifies the
 * HMAC over the raw body and hands the event to the dispatcher.
 *
 * The raw body MUST reach the handler untouched. `webhookRouter()` mounts
 * `express.raw()` for its own routes; mount it before any JSON body parser.
 */

import express, { type Router } from 'express';
import type { IncomingHttpHeaders } from 'http';
import { GatewayError, MissingHeaderError } from '../errors.js';
import { WEBHOOK_HEADERS, getHeader } from '../headers.js';
import { componentLogger, type Logger } from '../logger.js';
import { toTenantIdentity } from '../tenant-key.js';
import type { TenantIdentity, WebhookEvent, WebhookEventStore } from '../types.js';
import type { WebhookDispatcher } from '../webhooks/dispatcher.js';
import { verifyWebhookSignature } from '../webhooks/verifier.js';
import type { JsonResponse } from './middleware.js';

// =============================================================================
// OPTIONS
// =============================================================================

/**
 * Looks up the signing secret for the tenant a callback was addressed to.
 * Resolves null when the tenant has no credentials.
 */
export type WebhookSecretResolver = (tenant: TenantIdentity, shopDomain: string) => Promise<string | null>;

export interface WebhookRouterOptions {
  dispatcher: WebhookDispatcher;
  resolveSecret: WebhookSecretResolver;

  /** Persist each verified event before dispatch */
  store?: WebhookEventStore;

  defaultEnvironment?: string;

  /** Raw body size limit (default: '1mb') */
  bodyLimit?: string;

  logger?: Logger;
  now?: () => Date;
}

/**
 * The parts of a webhook request the handler reads. Express's Request
 * satisfies it once `express.raw()` has run.
 */
export interface WebhookRequestLike {
  params: Record<string, string | undefined>;
  headers: IncomingHttpHeaders;
  body: unknown;
}

export const WEBHOOK_ROUTES = ['/webhooks/:projectId/:environment', '/webhooks/:projectId'];

// =============================================================================
// HANDLER
// =============================================================================

/**
 * Request handler for one webhook delivery. Expects `req.body` to be the raw
 * body as a Buffer.
 */
export function createWebhookHandler(options: WebhookRouterOptions) {
  const { dispatcher, resolveSecret, store, defaultEnvironment, now = () => new Date() } = options;
  const logger = componentLogger('webhook-router', options.logger);

  return async (req: WebhookRequestLike, res: JsonResponse): Promise<void> => {
    const projectId = req.params.projectId ?? '';

    try {
      const signature = getHeader(req.headers, WEBHOOK_HEADERS.SIGNATURE);
      const topic = getHeader(req.headers, WEBHOOK_HEADERS.TOPIC);
      const shopDomain = getHeader(req.headers, WEBHOOK_HEADERS.SHOP_DOMAIN) ?? '';
      const webhookId = getHeader(req.headers, WEBHOOK_HEADERS.WEBHOOK_ID);

      if (!signature) {
        throw new MissingHeaderError(WEBHOOK_HEADERS.SIGNATURE);
      }
      if (!topic) {
        throw new MissingHeaderError(WEBHOOK_HEADERS.TOPIC);
      }

      const tenant = toTenantIdentity(projectId, req.params.environment, defaultEnvironment);
      const secret = await resolveSecret(tenant, shopDomain);
      if (secret === null) {
        logger.warn({ projectId: tenant.projectId, environment: tenant.environment, topic }, 'Webhook for unconfigured tenant');
        res.status(404).json({
          error: {
            code: 'TENANT_NOT_CONFIGURED',
            message: `Commerce API not configured for project ${tenant.projectId} and environment ${tenant.environment}`,
          },
        });
        return;
      }

      const payload = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
      verifyWebhookSignature(payload, signature, secret);

      const event: WebhookEvent = {
        id: webhookId,
        topic,
        shopDomain,
        tenantKey: tenant.tenantKey,
        payload,
        verified: true,
        receivedAt: now(),
      };

      if (store) {
        await store.save(event);
      }

      const report = await dispatcher.dispatch(event);
      logger.info(
        { tenantKey: tenant.tenantKey, topic, webhookId, handled: report.succeeded.length, failed: report.failed.length },
        'Webhook received'
      );

      res.status(200).json({ received: true, handled: report.succeeded.length });
    } catch (error) {
      if (error instanceof GatewayError) {
        logger.warn({ projectId, code: error.code }, error.message);
        res.status(error.statusCode).json(error.toJSON());
        return;
      }

      logger.error({ projectId, err: error }, 'Webhook processing failed');
      res.status(500).json({
        error: {
          code: 'WEBHOOK_PROCESSING_FAILED',
          message: 'Failed to process webhook',
        },
      });
    }
  };
}

/**
 * Router serving the webhook endpoints with a raw body parser
 *
 * @example
 * app.use(webhookRouter({ dispatcher, resolveSecret }));
 * app.use(express.json());
 */
export function webhookRouter(options: WebhookRouterOptions): Router {
  const router = express.Router();
  const handler = createWebhookHandler(options);

  router.post(WEBHOOK_ROUTES, express.raw({ type: '*/*', limit: options.bodyLimit ?? '1mb' }), (req, res, next) => {
    handler(req, res).catch(next);
  });

  return router;
}
