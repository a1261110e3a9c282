import { describe, it, expect, vi } from 'vitest';
import { HttpCommerceClient } from '../commerce-client.js';
import { createRetryPolicy, DEFAULT_API_VERSION } from '../config.js';
import { OperationCancelledError, UpstreamHttpError, WebhookSubscriptionError } from '../errors.js';
import { RateLimiter } from '../rate-limiter.js';
import { UpstreamTransport, type FetchFn } from '../transport.js';
import { buildWebhookAddress, subscribeToWebhooks } from './subscriptions.js';

const tenant = { projectId: 'proj_1', environment: 'staging' };
const WEBHOOK_URL = 'https://app.example.com/webhooks';

function clientWith(fetch: FetchFn): HttpCommerceClient {
  return new HttpCommerceClient({
    tenantKey: 'proj_1:staging',
    apiKey: 'test-key',
    apiSecret: 'test-secret',
    transport: new UpstreamTransport({
      rateLimiter: new RateLimiter(),
      retryPolicy: createRetryPolicy({ maxRetries: 0 }),
      fetch,
    }),
  });
}

function createdWebhooks() {
  let id = 100;
  return vi.fn<FetchFn>(async () => new Response(JSON.stringify({ webhook: { id: ++id } }), { status: 201 }));
}

function sentBody(fetch: ReturnType<typeof createdWebhooks>, call: number): unknown {
  const body = fetch.mock.calls[call]?.[1]?.body;
  return typeof body === 'string' ? JSON.parse(body) : undefined;
}

describe('buildWebhookAddress', () => {
  it('appends project and environment', () => {
    expect(buildWebhookAddress(WEBHOOK_URL, tenant)).toBe('https://app.example.com/webhooks/proj_1/staging');
  });

  it('drops trailing slashes and encodes the path segments', () => {
    expect(buildWebhookAddress(`${WEBHOOK_URL}/`, { projectId: 'a/b', environment: 'eu prod' })).toBe(
      'https://app.example.com/webhooks/a%2Fb/eu%20prod'
    );
  });
});

describe('subscribeToWebhooks', () => {
  it('creates one webhook per default topic', async () => {
    const fetch = createdWebhooks();

    const created = await subscribeToWebhooks(clientWith(fetch), tenant, 'demo.example.com', 'test-token', {
      webhookUrl: WEBHOOK_URL,
    });

    expect(created.map((subscription) => subscription.topic)).toEqual([
      'orders/create',
      'orders/updated',
      'products/create',
      'products/update',
      'app/uninstalled',
    ]);
    expect(created.map((subscription) => subscription.id)).toEqual([101, 102, 103, 104, 105]);
    expect(fetch).toHaveBeenCalledTimes(5);
    expect(fetch.mock.calls[0]?.[0]).toBe(`https://demo.example.com/admin/api/${DEFAULT_API_VERSION}/webhooks.json`);
    expect(fetch.mock.calls[0]?.[1]?.method).toBe('POST');
    expect(sentBody(fetch, 0)).toEqual({
      webhook: {
        topic: 'orders/create',
        address: 'https://app.example.com/webhooks/proj_1/staging',
        format: 'json',
      },
    });
  });

  it('subscribes to the requested topics only', async () => {
    const fetch = createdWebhooks();

    const created = await subscribeToWebhooks(clientWith(fetch), tenant, 'demo.example.com', 'test-token', {
      webhookUrl: WEBHOOK_URL,
      topics: ['customers/create'],
    });

    expect(created).toEqual([
      { id: 101, topic: 'customers/create', address: 'https://app.example.com/webhooks/proj_1/staging' },
    ]);
  });

  it('leaves the id out when the response has none', async () => {
    const fetch = vi.fn<FetchFn>(async () => new Response('{}', { status: 201 }));

    const [created] = await subscribeToWebhooks(clientWith(fetch), tenant, 'demo.example.com', 'test-token', {
      webhookUrl: WEBHOOK_URL,
      topics: ['orders/create'],
    });

    expect(created?.id).toBeUndefined();
  });

  it('stops at the first refused topic', async () => {
    const fetch = createdWebhooks();
    fetch.mockResolvedValueOnce(new Response('{"webhook":{"id":1}}', { status: 201 }));
    fetch.mockResolvedValueOnce(new Response('{"errors":{"address":["taken"]}}', { status: 422 }));

    const error = await subscribeToWebhooks(clientWith(fetch), tenant, 'demo.example.com', 'test-token', {
      webhookUrl: WEBHOOK_URL,
    }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(WebhookSubscriptionError);
    expect(error).toHaveProperty('message', 'Failed to create webhook for topic orders/updated');
    expect(error instanceof Error ? error.cause : undefined).toBeInstanceOf(UpstreamHttpError);
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it('passes cancellation through unchanged', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      subscribeToWebhooks(clientWith(createdWebhooks()), tenant, 'demo.example.com', 'test-token', {
        webhookUrl: WEBHOOK_URL,
        signal: controller.signal,
      })
    ).rejects.toBeInstanceOf(OperationCancelledError);
  });
});
