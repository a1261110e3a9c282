/**
 * Webhook Dispatcher
 *
 * Routes one verified event to every handler whose `canHandle(topic)` is
 * true. Handlers run in registration order; a failing handler is logged and
 * skipped, and never fails the dispatch.
 */

import { componentLogger, type Logger } from '../logger.js';
import type { DispatchReport, WebhookEvent, WebhookHandler } from '../types.js';

export interface DispatcherOptions {
  logger?: Logger;
  handlers?: WebhookHandler[];
}

export class WebhookDispatcher {
  private handlers: readonly WebhookHandler[] = [];
  private readonly logger: Logger;

  constructor(options: DispatcherOptions = {}) {
    this.logger = componentLogger('webhook-dispatcher', options.logger);
    for (const handler of options.handlers ?? []) {
      this.registerHandler(handler);
    }
  }

  /**
   * Append a handler. Replaces the list rather than mutating it, so a
   * dispatch already iterating keeps its own snapshot.
   */
  registerHandler(handler: WebhookHandler): void {
    this.handlers = [...this.handlers, handler];
    this.logger.info(
      { handler: handler.name, position: this.handlers.length },
      'Webhook handler registered'
    );
  }

  get handlerCount(): number {
    return this.handlers.length;
  }

  async dispatch(event: WebhookEvent, signal?: AbortSignal): Promise<DispatchReport> {
    const snapshot = this.handlers;
    const report: DispatchReport = {
      topic: event.topic,
      matched: [],
      succeeded: [],
      failed: [],
    };
    const context = { topic: event.topic, shopDomain: event.shopDomain, tenantKey: event.tenantKey };

    for (const handler of snapshot) {
      if (!this.matches(handler, event.topic)) continue;

      report.matched.push(handler.name);
      try {
        await handler.handle(event, signal);
        report.succeeded.push(handler.name);
        this.logger.info({ ...context, handler: handler.name }, 'Webhook event handled successfully');
      } catch (error) {
        report.failed.push({
          handler: handler.name,
          error: error instanceof Error ? error.message : String(error),
        });
        this.logger.error({ ...context, handler: handler.name, err: error }, 'Webhook handler failed');
      }
    }

    if (report.matched.length === 0) {
      this.logger.warn(context, 'No handler found for webhook topic');
    }

    return report;
  }

  private matches(handler: WebhookHandler, topic: string): boolean {
    try {
      return handler.canHandle(topic);
    } catch (error) {
      this.logger.error({ topic, handler: handler.name, err: error }, 'Webhook handler predicate failed');
      return false;
    }
  }
}
