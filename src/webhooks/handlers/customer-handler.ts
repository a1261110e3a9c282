import type { Logger } from '../../logger.js';
import type { WebhookEvent } from '../../types.js';
import { WEBHOOK_TOPICS } from '../topics.js';
import { TopicHandler, type WebhookPayload } from './topic-handler.js';

const CUSTOMER_TOPICS = [
  WEBHOOK_TOPICS.CUSTOMERS_CREATE,
  WEBHOOK_TOPICS.CUSTOMERS_UPDATE,
  WEBHOOK_TOPICS.CUSTOMERS_DELETE,
  WEBHOOK_TOPICS.CUSTOMERS_ENABLE,
  WEBHOOK_TOPICS.CUSTOMERS_DISABLE,
];

export class CustomerHandler extends TopicHandler {
  readonly name = 'CustomerHandler';

  constructor(logger?: Logger) {
    super(CUSTOMER_TOPICS, logger);
  }

  // Customer payloads carry PII; only the id is logged
  protected async process(event: WebhookEvent, payload: WebhookPayload): Promise<void> {
    this.logger.info(
      { topic: event.topic, shopDomain: event.shopDomain, customerId: payload.id },
      'Processing customer webhook event'
    );
  }
}
