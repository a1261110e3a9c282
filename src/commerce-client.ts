/**
 * Commerce Client
 *
 * The per-tenant handle cached by the client pool. It holds the tenant's app
 * credentials and sends every call through the shared transport, so all
 * tenants on one shop share that shop's rate-limit bucket.
 *
 * Resource schemas (products, orders, ...) are not modelled here; callers get
 * parsed JSON back and type it themselves.
 */

import { DEFAULT_API_VERSION } from './config.js';
import { GatewayError, UpstreamHttpError } from './errors.js';
import { UPSTREAM_HEADERS } from './headers.js';
import type { ClientFactory } from './client-pool.js';
import { UpstreamTransport, type FetchFn } from './transport.js';
import type { TenantKey } from './types.js';

// =============================================================================
// TYPES
// =============================================================================

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface CommerceRequest {
  method: HttpMethod;
  /** Path below /admin/api/<version>/, e.g. "products.json" */
  path: string;
  query?: Record<string, string | number | boolean | undefined>;
  body?: unknown;
}

export interface AuthUrlOptions {
  redirectUri?: string;
  state?: string;
}

/**
 * Upstream call surface handed out by the pool
 */
export interface CommerceClient {
  readonly tenantKey: TenantKey;
  readonly apiKey: string;

  generateAuthUrl(shopDomain: string, scopes: string[], options?: AuthUrlOptions): string;
  exchangeToken(shopDomain: string, code: string, signal?: AbortSignal): Promise<string>;

  request<T = unknown>(
    shopDomain: string,
    accessToken: string,
    request: CommerceRequest,
    signal?: AbortSignal
  ): Promise<T>;

  get<T = unknown>(shopDomain: string, accessToken: string, path: string, query?: CommerceRequest['query'], signal?: AbortSignal): Promise<T>;
  post<T = unknown>(shopDomain: string, accessToken: string, path: string, body: unknown, signal?: AbortSignal): Promise<T>;
  put<T = unknown>(shopDomain: string, accessToken: string, path: string, body: unknown, signal?: AbortSignal): Promise<T>;
  delete(shopDomain: string, accessToken: string, path: string, signal?: AbortSignal): Promise<void>;
}

export interface CommerceClientOptions {
  tenantKey: TenantKey;
  apiKey: string;
  apiSecret: string;
  transport: UpstreamTransport;
  apiVersion?: string;
  /** Base URL of this service, used for the default OAuth redirect */
  appUrl?: string;
}

// =============================================================================
// VALIDATION
// =============================================================================

const SHOP_DOMAIN_PATTERN = /^[a-z0-9](?:[a-z0-9-]*[a-z0-9])?(?:\.[a-z0-9](?:[a-z0-9-]*[a-z0-9])?)+$/;
const CREDENTIAL_PATTERN = /^[\x21-\x7e]+$/;

/**
 * Lower-case and validate a shop hostname so it can be placed in a URL
 */
export function normalizeShopDomain(shopDomain: string): string {
  const domain = shopDomain.trim().toLowerCase();
  if (!SHOP_DOMAIN_PATTERN.test(domain)) {
    throw new GatewayError('INVALID_SHOP_DOMAIN', `Invalid shop domain: ${shopDomain}`, 400, {
      details: { shopDomain },
    });
  }
  return domain;
}

// =============================================================================
// CLIENT
// =============================================================================

export class HttpCommerceClient implements CommerceClient {
  readonly tenantKey: TenantKey;
  readonly apiKey: string;
  private readonly apiSecret: string;
  private readonly transport: UpstreamTransport;
  private readonly apiVersion: string;
  private readonly appUrl?: string;

  constructor(options: CommerceClientOptions) {
    if (!CREDENTIAL_PATTERN.test(options.apiKey) || !CREDENTIAL_PATTERN.test(options.apiSecret)) {
      throw new TypeError('apiKey and apiSecret must be non-empty printable ASCII without spaces');
    }

    this.tenantKey = options.tenantKey;
    this.apiKey = options.apiKey;
    this.apiSecret = options.apiSecret;
    this.transport = options.transport;
    this.apiVersion = options.apiVersion ?? DEFAULT_API_VERSION;
    this.appUrl = options.appUrl;
  }

  generateAuthUrl(shopDomain: string, scopes: string[], options: AuthUrlOptions = {}): string {
    const shop = normalizeShopDomain(shopDomain);
    const url = new URL(`https://${shop}/admin/oauth/authorize`);

    url.searchParams.set('client_id', this.apiKey);
    url.searchParams.set('scope', scopes.join(','));

    const redirectUri = options.redirectUri ?? (this.appUrl ? `${this.appUrl.replace(/\/$/, '')}/auth/callback` : undefined);
    if (redirectUri) {
      url.searchParams.set('redirect_uri', redirectUri);
    }
    if (options.state) {
      url.searchParams.set('state', options.state);
    }

    return url.toString();
  }

  async exchangeToken(shopDomain: string, code: string, signal?: AbortSignal): Promise<string> {
    const shop = normalizeShopDomain(shopDomain);

    const response = await this.transport.send(
      shop,
      {
        method: 'POST',
        url: `https://${shop}/admin/oauth/access_token`,
        headers: { 'content-type': 'application/json', accept: 'application/json' },
        body: JSON.stringify({ client_id: this.apiKey, client_secret: this.apiSecret, code }),
      },
      signal
    );

    assertOk(response.status, response.body, 'Failed to exchange token');

    const parsed = parseJson(response.status, response.body, 'Token exchange response was not JSON');
    if (!isRecord(parsed) || typeof parsed.access_token !== 'string' || !parsed.access_token) {
      throw new UpstreamHttpError(response.status, 'Token exchange response did not include an access token');
    }
    return parsed.access_token;
  }

  async request<T = unknown>(
    shopDomain: string,
    accessToken: string,
    request: CommerceRequest,
    signal?: AbortSignal
  ): Promise<T> {
    const shop = normalizeShopDomain(shopDomain);
    const url = new URL(`https://${shop}/admin/api/${this.apiVersion}/${request.path.replace(/^\/+/, '')}`);

    for (const [key, value] of Object.entries(request.query ?? {})) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }

    const headers: Record<string, string> = {
      accept: 'application/json',
      [UPSTREAM_HEADERS.ACCESS_TOKEN]: accessToken,
    };
    let body: string | undefined;
    if (request.body !== undefined) {
      headers['content-type'] = 'application/json';
      body = JSON.stringify(request.body);
    }

    const response = await this.transport.send(shop, { method: request.method, url: url.toString(), headers, body }, signal);

    assertOk(response.status, response.body, `${request.method} ${request.path} failed`);

    // 200/204 with an empty body (e.g. DELETE) parses as null
    return parseJson(response.status, response.body || 'null', `${request.method} ${request.path} returned invalid JSON`) as T;
  }

  get<T = unknown>(shopDomain: string, accessToken: string, path: string, query?: CommerceRequest['query'], signal?: AbortSignal): Promise<T> {
    return this.request<T>(shopDomain, accessToken, { method: 'GET', path, query }, signal);
  }

  post<T = unknown>(shopDomain: string, accessToken: string, path: string, body: unknown, signal?: AbortSignal): Promise<T> {
    return this.request<T>(shopDomain, accessToken, { method: 'POST', path, body }, signal);
  }

  put<T = unknown>(shopDomain: string, accessToken: string, path: string, body: unknown, signal?: AbortSignal): Promise<T> {
    return this.request<T>(shopDomain, accessToken, { method: 'PUT', path, body }, signal);
  }

  async delete(shopDomain: string, accessToken: string, path: string, signal?: AbortSignal): Promise<void> {
    await this.request<unknown>(shopDomain, accessToken, { method: 'DELETE', path }, signal);
  }
}

// =============================================================================
// FACTORY
// =============================================================================

export interface CommerceClientFactoryOptions {
  apiVersion?: string;
  appUrl?: string;
  fetch?: FetchFn;
}

/**
 * Client factory for TenantClientPool: wires the pool's shared rate limiter
 * and retry policy into each tenant's client
 */
export function createCommerceClientFactory(
  options: CommerceClientFactoryOptions = {}
): ClientFactory<CommerceClient> {
  return ({ tenantKey, credentials, rateLimiter, retryPolicy, logger }) =>
    new HttpCommerceClient({
      tenantKey,
      apiKey: credentials.apiKey,
      apiSecret: credentials.apiSecret,
      apiVersion: options.apiVersion,
      appUrl: options.appUrl,
      transport: new UpstreamTransport({ rateLimiter, retryPolicy, logger, fetch: options.fetch }),
    });
}

// =============================================================================
// HELPERS
// =============================================================================

function assertOk(status: number, body: string, message: string): void {
  if (status < 200 || status >= 300) {
    throw new UpstreamHttpError(status, `${message}: ${status}`, body.slice(0, 1024));
  }
}

function parseJson(status: number, body: string, message: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    throw new UpstreamHttpError(status, message, body.slice(0, 1024));
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
