/**
 * Standard Gateway Headers
 *
 * Header names used on inbound webhooks, upstream responses and internal
 * tenant propagation.
 */

// =============================================================================
// WEBHOOK HEADERS (Set by the commerce platform)
// =============================================================================

export const WEBHOOK_HEADERS = {
  /** Base64 (or hex) HMAC-SHA256 of the raw body */
  SIGNATURE: 'x-shopify-hmac-sha256',

  /** Event topic, e.g. "orders/create" */
  TOPIC: 'x-shopify-topic',

  /** Originating shop domain */
  SHOP_DOMAIN: 'x-shopify-shop-domain',

  /** Delivery id, stable across redeliveries */
  WEBHOOK_ID: 'x-shopify-webhook-id',
} as const;

// =============================================================================
// UPSTREAM HEADERS (Returned by the commerce API)
// =============================================================================

export const UPSTREAM_HEADERS = {
  /** Call budget as "used/limit", e.g. "12/40" */
  CALL_LIMIT: 'x-shopify-shop-api-call-limit',

  /** Access token for Admin API calls */
  ACCESS_TOKEN: 'x-shopify-access-token',
} as const;

// =============================================================================
// TENANT HEADERS (Set by internal gateways)
// =============================================================================

export const TENANT_HEADERS = {
  PROJECT_ID: 'x-project-id',
  ENVIRONMENT: 'x-environment',
  SIGNATURE: 'x-tenant-signature',
  SIGNATURE_TIMESTAMP: 'x-tenant-signature-ts',
} as const;

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Get header value (case-insensitive)
 */
export function getHeader(
  headers: Record<string, string | string[] | undefined>,
  name: string
): string | undefined {
  const value = headers[name] ?? headers[name.toLowerCase()];
  if (Array.isArray(value)) {
    return value[0];
  }
  return value;
}

/**
 * Parse a "used/limit" call-limit header. Returns null for anything that is
 * not two non-negative integers with a positive limit.
 */
export function parseCallLimit(value: string | null | undefined): { used: number; limit: number } | null {
  if (!value) return null;

  const match = /^\s*(\d+)\s*\/\s*(\d+)\s*$/.exec(value);
  if (!match?.[1] || !match[2]) return null;

  const used = parseInt(match[1], 10);
  const limit = parseInt(match[2], 10);
  if (limit <= 0) return null;

  return { used, limit };
}
