export { TopicHandler, parsePayload } from './topic-handler.js';
export type { WebhookPayload } from './topic-handler.js';
export { OrderHandler } from './order-handler.js';
export { ProductHandler } from './product-handler.js';
export { CustomerHandler } from './customer-handler.js';
export { AppUninstalledHandler } from './app-uninstalled-handler.js';
export type { UninstallCallback } from './app-uninstalled-handler.js';
