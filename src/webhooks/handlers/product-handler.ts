import type { Logger } from '../../logger.js';
import type { WebhookEvent } from '../../types.js';
import { WEBHOOK_TOPICS } from '../topics.js';
import { TopicHandler, type WebhookPayload } from './topic-handler.js';

const PRODUCT_TOPICS = [
  WEBHOOK_TOPICS.PRODUCTS_CREATE,
  WEBHOOK_TOPICS.PRODUCTS_UPDATE,
  WEBHOOK_TOPICS.PRODUCTS_DELETE,
];

export class ProductHandler extends TopicHandler {
  readonly name = 'ProductHandler';

  constructor(logger?: Logger) {
    super(PRODUCT_TOPICS, logger);
  }

  protected async process(event: WebhookEvent, payload: WebhookPayload): Promise<void> {
    this.logger.info(
      { topic: event.topic, shopDomain: event.shopDomain, productId: payload.id, title: payload.title },
      'Processing product webhook event'
    );
  }
}
