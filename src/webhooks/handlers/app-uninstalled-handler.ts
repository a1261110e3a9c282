import type { Logger } from '../../logger.js';
import type { WebhookEvent } from '../../types.js';
import { WEBHOOK_TOPICS } from '../topics.js';
import { TopicHandler, type WebhookPayload } from './topic-handler.js';

export type UninstallCallback = (event: WebhookEvent, payload: WebhookPayload) => void | Promise<void>;

/**
 * Reacts to the app being removed from a shop. The callback typically
 * invalidates the tenant's cached client and revokes stored tokens.
 */
export class AppUninstalledHandler extends TopicHandler {
  readonly name = 'AppUninstalledHandler';

  constructor(private readonly onUninstalled?: UninstallCallback, logger?: Logger) {
    super([WEBHOOK_TOPICS.APP_UNINSTALLED], logger);
  }

  protected async process(event: WebhookEvent, payload: WebhookPayload): Promise<void> {
    this.logger.info(
      { topic: event.topic, shopDomain: event.shopDomain, tenantKey: event.tenantKey },
      'Processing app uninstalled webhook event'
    );
    await this.onUninstalled?.(event, payload);
  }
}
