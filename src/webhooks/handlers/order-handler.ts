import type { Logger } from '../../logger.js';
import type { WebhookEvent } from '../../types.js';
import { WEBHOOK_TOPICS } from '../topics.js';
import { TopicHandler, type WebhookPayload } from './topic-handler.js';

const ORDER_TOPICS = [
  WEBHOOK_TOPICS.ORDERS_CREATE,
  WEBHOOK_TOPICS.ORDERS_UPDATED,
  WEBHOOK_TOPICS.ORDERS_CANCELLED,
  WEBHOOK_TOPICS.ORDERS_PAID,
  WEBHOOK_TOPICS.ORDERS_FULFILLED,
  WEBHOOK_TOPICS.ORDERS_PARTIALLY_FULFILLED,
];

export class OrderHandler extends TopicHandler {
  readonly name = 'OrderHandler';

  constructor(logger?: Logger) {
    super(ORDER_TOPICS, logger);
  }

  protected async process(event: WebhookEvent, payload: WebhookPayload): Promise<void> {
    this.logger.info(
      {
        topic: event.topic,
        shopDomain: event.shopDomain,
        orderId: payload.id,
        financialStatus: payload.financial_status,
      },
      'Processing order webhook event'
    );
  }
}
