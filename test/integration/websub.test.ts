import { createHmac } from 'node:crypto';
import { describe, expect, it } from 'vitest';
import { InvalidRequestError, InvalidTopicError } from '../../src/lib/errors.js';
import { handleHubRequest } from '../../src/routes/websub.js';
import type { TopicRenderer } from '../../src/types/websub.js';
import { createTestIndieWeb, formRequest, type FakeRoute } from '../helpers.js';

const FEED = 'https://example.com/feed.xml';
const CALLBACK = 'https://reader.example.net/push';
const HUB = 'https://example.com/websub';

const renderTopic: TopicRenderer = async () => ({ body: '<feed/>', contentType: 'application/atom+xml' });

/** Subscriber that confirms every challenge and accepts deliveries with `deliveryStatus` */
function subscriber(deliveryStatus = 204): FakeRoute {
  return (request) => {
    if (request.method === 'POST') {
      return new Response(null, { status: deliveryStatus });
    }
    return new Response(new URL(request.url).searchParams.get('hub.challenge'));
  };
}

function hubWith(routes: Record<string, FakeRoute>, withRenderer = true) {
  return createTestIndieWeb({
    routes,
    overrides: { websub: { feeds: ['/feed.xml', '/tags/'] } },
    dependencies: withRenderer ? { renderTopic } : {},
  });
}

describe('WebSubHub', () => {
  it('verifies intent with the subscriber before storing the subscription', async () => {
    const { indieweb, fake } = hubWith({ [CALLBACK]: subscriber() });

    const result = await indieweb.websub.subscribe({ callback: CALLBACK, topic: FEED, leaseSeconds: 3600 });

    expect(result.verified).toBe(true);
    const [check] = fake.callsTo(CALLBACK);
    const params = new URL(check?.url ?? CALLBACK).searchParams;
    expect(params.get('hub.mode')).toBe('subscribe');
    expect(params.get('hub.topic')).toBe(FEED);
    expect(params.get('hub.lease_seconds')).toBe('3600');
  });

  it('keeps a lease active until it runs out', async () => {
    const { indieweb, clock } = hubWith({ [CALLBACK]: subscriber() });
    await indieweb.websub.subscribe({ callback: CALLBACK, topic: FEED, leaseSeconds: 3600 });

    clock.advance(3599);
    expect(await indieweb.websub.listSubscriptions(FEED)).toHaveLength(1);

    clock.advance(2);
    expect(await indieweb.websub.listSubscriptions(FEED)).toEqual([]);
    expect(await indieweb.websub.listSubscriptions(FEED, { includeExpired: true })).toHaveLength(1);
  });

  it('does not store a subscription whose challenge was not echoed', async () => {
    const { indieweb } = hubWith({ [CALLBACK]: () => new Response('nope') });

    const result = await indieweb.websub.subscribe({ callback: CALLBACK, topic: FEED });

    expect(result).toEqual({
      verified: false,
      subscription: null,
      reason: 'callback did not echo the challenge (text/plain)',
    });
    expect(await indieweb.websub.listSubscriptions(FEED, { includeExpired: true })).toEqual([]);
  });

  it('renews an existing subscription instead of adding one', async () => {
    const { indieweb, clock } = hubWith({ [CALLBACK]: subscriber() });
    await indieweb.websub.subscribe({ callback: CALLBACK, topic: FEED, leaseSeconds: 60 });
    clock.advance(30);
    const renewed = await indieweb.websub.subscribe({ callback: CALLBACK, topic: FEED, leaseSeconds: 60 });

    expect(renewed.subscription?.expiresAt).toEqual(new Date(clock.now().getTime() + 60_000));
    expect(await indieweb.websub.listSubscriptions(FEED)).toHaveLength(1);
  });

  it('defaults, floors and clamps leases', () => {
    const { indieweb } = hubWith({});

    expect(indieweb.websub.leaseFor(null)).toBe(864000);
    expect(indieweb.websub.leaseFor(100.7)).toBe(100);
    expect(indieweb.websub.leaseFor(10 ** 9)).toBe(31536000);
  });

  it('accepts only its own feeds as topics', () => {
    const { indieweb } = hubWith({});

    expect(indieweb.websub.isPublishedTopic(FEED)).toBe(true);
    expect(indieweb.websub.isPublishedTopic('https://example.com/tags/walks')).toBe(true);
    expect(indieweb.websub.isPublishedTopic('https://example.com/tagsx')).toBe(false);
    expect(() => indieweb.websub.validateRequest({ callback: CALLBACK, topic: 'https://elsewhere.example.net/feed' })).toThrow(
      InvalidTopicError
    );
  });

  it('rejects bad callbacks, leases and oversized secrets', () => {
    const { indieweb } = hubWith({});

    expect(() => indieweb.websub.validateRequest({ callback: 'ftp://reader.example.net/', topic: FEED })).toThrow(
      InvalidRequestError
    );
    expect(() => indieweb.websub.validateRequest({ callback: CALLBACK, topic: FEED, leaseSeconds: -1 })).toThrow(
      'hub.lease_seconds must be a positive number'
    );
    expect(() => indieweb.websub.validateRequest({ callback: CALLBACK, topic: FEED, secret: 'x'.repeat(200) })).toThrow(
      'hub.secret must be shorter than 200 bytes'
    );
    expect(() => indieweb.websub.validateRequest({ callback: CALLBACK, topic: FEED, secret: 'x'.repeat(199) })).not.toThrow();
  });

  it('signs deliveries with the subscriber secret', async () => {
    const { indieweb, fake } = hubWith({ [CALLBACK]: subscriber() });
    await indieweb.websub.subscribe({ callback: CALLBACK, topic: FEED, secret: 's3cr3t' });

    const result = await indieweb.websub.publish(FEED);

    expect(result).toEqual({ topic: FEED, delivered: 1, failed: 0 });
    const delivery = fake.calls.find((call) => call.method === 'POST');
    expect(delivery?.body).toBe('<feed/>');
    expect(delivery?.headers.get('content-type')).toBe('application/atom+xml');
    expect(delivery?.headers.get('x-hub-signature')).toBe(
      `sha256=${createHmac('sha256', 's3cr3t').update('<feed/>').digest('hex')}`
    );
    expect(delivery?.headers.get('link')).toBe(`<${HUB}>; rel="hub", <${FEED}>; rel="self"`);
  });

  it('counts failed deliveries and only stamps successful ones', async () => {
    const failing = 'https://broken.example.net/push';
    const { indieweb, clock } = hubWith({ [CALLBACK]: subscriber(), [failing]: subscriber(500) });
    await indieweb.websub.subscribe({ callback: CALLBACK, topic: FEED });
    await indieweb.websub.subscribe({ callback: failing, topic: FEED });
    clock.advance(10);

    expect(await indieweb.websub.publish(FEED)).toEqual({ topic: FEED, delivered: 1, failed: 1 });

    const stamps = Object.fromEntries(
      (await indieweb.websub.listSubscriptions(FEED)).map((subscription) => [subscription.callback, subscription.lastDeliveryAt])
    );
    expect(stamps).toEqual({ [CALLBACK]: clock.now(), [failing]: null });
  });

  it('fetches the topic with the last delivery time by default', async () => {
    const { indieweb, fake, clock } = hubWith(
      { [CALLBACK]: subscriber(), [`GET ${FEED}`]: () => new Response('<feed/>') },
      false
    );
    await indieweb.websub.subscribe({ callback: CALLBACK, topic: FEED });
    await indieweb.websub.publish(FEED);
    const firstDelivery = clock.now();
    clock.advance(60);
    await indieweb.websub.publish(FEED);

    expect(fake.callsTo(FEED).map((call) => call.url)).toEqual([
      FEED,
      `${FEED}?since=${encodeURIComponent(firstDelivery.toISOString())}`,
    ]);
  });

  it('removes a subscription after a confirmed unsubscribe', async () => {
    const { indieweb } = hubWith({ [CALLBACK]: subscriber() });
    await indieweb.websub.subscribe({ callback: CALLBACK, topic: FEED });

    const result = await indieweb.websub.unsubscribe({ callback: CALLBACK, topic: FEED });

    expect(result.verified).toBe(true);
    expect(result.subscription?.callback).toBe(CALLBACK);
    expect(await indieweb.websub.listSubscriptions(FEED, { includeExpired: true })).toEqual([]);
  });

  it('publishes the feeds when a public entry changes', async () => {
    const { indieweb, fake } = hubWith({ [CALLBACK]: subscriber() });
    await indieweb.websub.subscribe({ callback: CALLBACK, topic: FEED });

    await indieweb.entries.create({ type: ['h-entry'], properties: { content: ['Public note'] } });
    await indieweb.entries.create({ type: ['h-entry'], properties: { content: ['Secret'], visibility: ['private'] } });
    await indieweb.tasks.drain();

    expect(fake.calls.filter((call) => call.method === 'POST')).toHaveLength(1);
  });

  it('publishes topics subscribed under a prefix feed', async () => {
    const TAG = 'https://example.com/tags/walks';
    const { indieweb, fake } = hubWith({ [CALLBACK]: subscriber() });
    await indieweb.websub.subscribe({ callback: CALLBACK, topic: TAG });

    await indieweb.entries.create({ type: ['h-entry'], properties: { content: ['Tagged walk'] } });
    await indieweb.tasks.drain();

    const deliveries = fake.calls.filter((call) => call.method === 'POST');
    expect(deliveries).toHaveLength(1);
    expect(deliveries[0]?.headers.get('link')).toBe(`<${HUB}>; rel="hub", <${TAG}>; rel="self"`);
  });

  it('expands a prefix feed to its actively subscribed topics', async () => {
    const TAG = 'https://example.com/tags/walks';
    const { indieweb, clock } = hubWith({ [CALLBACK]: subscriber() });
    await indieweb.websub.subscribe({ callback: CALLBACK, topic: TAG });

    expect(await indieweb.websub.topicsFor('https://example.com/tags/')).toEqual([TAG]);
    expect(await indieweb.websub.topicsFor(FEED)).toEqual([FEED]);

    clock.advance(864001);
    expect(await indieweb.websub.topicsFor('https://example.com/tags/')).toEqual([]);
  });
});

describe('hub endpoint', () => {
  const url = new URL(HUB);

  it('accepts a subscription and verifies it in the background', async () => {
    const { indieweb } = hubWith({ [CALLBACK]: subscriber() });

    const response = await handleHubRequest(indieweb, {
      url,
      request: formRequest(HUB, {
        'hub.mode': 'subscribe',
        'hub.callback': CALLBACK,
        'hub.topic': FEED,
        'hub.lease_seconds': '120',
      }),
    });
    expect(response.status).toBe(202);

    await indieweb.tasks.drain();
    const [subscription] = await indieweb.websub.listSubscriptions(FEED);
    expect(subscription?.expiresAt).toEqual(new Date('2024-03-01T12:02:00.000Z'));
  });

  it('answers 400 for a topic it does not publish', async () => {
    const { indieweb } = hubWith({});

    const response = await handleHubRequest(indieweb, {
      url,
      request: formRequest(HUB, {
        'hub.mode': 'subscribe',
        'hub.callback': CALLBACK,
        'hub.topic': 'https://elsewhere.example.net/feed',
      }),
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: 'invalid_request',
      error_description: 'Topic is not published by this hub: https://elsewhere.example.net/feed',
    });
  });

  it('takes publish pings for known topics', async () => {
    const { indieweb, fake } = hubWith({ [CALLBACK]: subscriber() });
    await indieweb.websub.subscribe({ callback: CALLBACK, topic: FEED });

    const response = await handleHubRequest(indieweb, {
      url,
      request: formRequest(HUB, { 'hub.mode': 'publish', 'hub.url': FEED }),
    });
    await indieweb.tasks.drain();

    expect(response.status).toBe(202);
    expect(fake.calls.filter((call) => call.method === 'POST')).toHaveLength(1);
  });

  it('rejects unknown modes', async () => {
    const { indieweb } = hubWith({});

    const response = await handleHubRequest(indieweb, {
      url,
      request: formRequest(HUB, { 'hub.mode': 'list' }),
    });

    expect(response.status).toBe(400);
  });
});
