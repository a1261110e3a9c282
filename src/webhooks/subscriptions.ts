/**
 * Webhook Subscriptions
 *
 * Registers the gateway's receiver with a shop, one upstream webhook per
 * topic. Each callback address carries the tenant so the receiver can pick
 * the right signing secret.
 */

import type { CommerceClient } from '../commerce-client.js';
import { isCancellationError, WebhookSubscriptionError } from '../errors.js';
import { componentLogger, type Logger } from '../logger.js';
import type { TenantIdentity } from '../types.js';
import { DEFAULT_WEBHOOK_TOPICS } from './topics.js';

export interface WebhookSubscription {
  /** Upstream webhook id, when the response carried one */
  id?: number;
  topic: string;
  address: string;
}

export interface SubscribeOptions {
  /** Public base URL of the receiver, e.g. "https://app.example.com/webhooks" */
  webhookUrl: string;
  topics?: readonly string[];
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Callback address for one tenant: `<webhookUrl>/<projectId>/<environment>`
 */
export function buildWebhookAddress(webhookUrl: string, tenant: Pick<TenantIdentity, 'projectId' | 'environment'>): string {
  const base = webhookUrl.replace(/\/+$/, '');
  return `${base}/${encodeURIComponent(tenant.projectId)}/${encodeURIComponent(tenant.environment)}`;
}

/**
 * Create a webhook for every topic, in order. Stops at the first topic the
 * commerce API refuses; topics created before it stay registered.
 *
 * @throws WebhookSubscriptionError with the upstream failure as `cause`
 */
export async function subscribeToWebhooks(
  client: CommerceClient,
  tenant: Pick<TenantIdentity, 'projectId' | 'environment'>,
  shopDomain: string,
  accessToken: string,
  options: SubscribeOptions
): Promise<WebhookSubscription[]> {
  const logger = componentLogger('webhook-subscriptions', options.logger);
  const address = buildWebhookAddress(options.webhookUrl, tenant);
  const topics = options.topics ?? DEFAULT_WEBHOOK_TOPICS;
  const created: WebhookSubscription[] = [];

  for (const topic of topics) {
    let response: unknown;
    try {
      response = await client.post<unknown>(
        shopDomain,
        accessToken,
        'webhooks.json',
        { webhook: { topic, address, format: 'json' } },
        options.signal
      );
    } catch (error) {
      if (isCancellationError(error)) {
        throw error;
      }
      logger.error({ err: error, shopDomain, topic }, 'Failed to create webhook');
      throw new WebhookSubscriptionError(topic, error);
    }

    const subscription: WebhookSubscription = { id: readWebhookId(response), topic, address };
    created.push(subscription);
    logger.info({ shopDomain, topic, address, webhookId: subscription.id }, 'Webhook subscription created');
  }

  return created;
}

function readWebhookId(response: unknown): number | undefined {
  if (typeof response !== 'object' || response === null || !('webhook' in response)) {
    return undefined;
  }
  const { webhook } = response;
  if (typeof webhook !== 'object' || webhook === null || !('id' in webhook)) {
    return undefined;
  }
  return typeof webhook.id === 'number' ? webhook.id : undefined;
}
