/**
 * Webhook Topics
 *
 * Topics the gateway subscribes to and routes.
 */

export const WEBHOOK_TOPICS = {
  ORDERS_CREATE: 'orders/create',
  ORDERS_UPDATED: 'orders/updated',
  ORDERS_CANCELLED: 'orders/cancelled',
  ORDERS_PAID: 'orders/paid',
  ORDERS_FULFILLED: 'orders/fulfilled',
  ORDERS_PARTIALLY_FULFILLED: 'orders/partially_fulfilled',

  PRODUCTS_CREATE: 'products/create',
  PRODUCTS_UPDATE: 'products/update',
  PRODUCTS_DELETE: 'products/delete',

  CUSTOMERS_CREATE: 'customers/create',
  CUSTOMERS_UPDATE: 'customers/update',
  CUSTOMERS_DELETE: 'customers/delete',
  CUSTOMERS_ENABLE: 'customers/enable',
  CUSTOMERS_DISABLE: 'customers/disable',

  APP_UNINSTALLED: 'app/uninstalled',
} as const;

export type WebhookTopic = (typeof WEBHOOK_TOPICS)[keyof typeof WEBHOOK_TOPICS];

/**
 * Topics `subscribeToWebhooks` registers when the caller names none
 */
export const DEFAULT_WEBHOOK_TOPICS: readonly WebhookTopic[] = [
  WEBHOOK_TOPICS.ORDERS_CREATE,
  WEBHOOK_TOPICS.ORDERS_UPDATED,
  WEBHOOK_TOPICS.PRODUCTS_CREATE,
  WEBHOOK_TOPICS.PRODUCTS_UPDATE,
  WEBHOOK_TOPICS.APP_UNINSTALLED,
];
