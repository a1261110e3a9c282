/**
 * Base class for handlers that match a fixed set of topics and work on the
 * parsed JSON payload.
 */

import { componentLogger, type Logger } from '../../logger.js';
import type { WebhookEvent, WebhookHandler } from '../../types.js';

export type WebhookPayload = Record<string, unknown>;

export abstract class TopicHandler implements WebhookHandler {
  abstract readonly name: string;
  protected readonly logger: Logger;
  private readonly topics: ReadonlySet<string>;

  constructor(topics: readonly string[], logger?: Logger) {
    this.topics = new Set(topics);
    this.logger = componentLogger('webhook-handler', logger);
  }

  canHandle(topic: string): boolean {
    return this.topics.has(topic);
  }

  async handle(event: WebhookEvent, signal?: AbortSignal): Promise<void> {
    const payload = parsePayload(event);
    await this.process(event, payload, signal);
  }

  protected abstract process(event: WebhookEvent, payload: WebhookPayload, signal?: AbortSignal): Promise<void>;
}

/**
 * Parse the raw body as a JSON object
 *
 * @throws Error when the body is not a JSON object
 */
export function parsePayload(event: WebhookEvent): WebhookPayload {
  let parsed: unknown;
  try {
    parsed = JSON.parse(event.payload.toString('utf8'));
  } catch (error) {
    throw new Error(`Failed to parse ${event.topic} webhook payload`, { cause: error });
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Failed to parse ${event.topic} webhook payload: expected a JSON object`);
  }
  return Object.fromEntries(Object.entries(parsed));
}
