import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { signLineBody } from '@gasguard/messaging';
import { buildTestServer } from '../../__tests__/setup.js';
import type { FakeDeliveryAdapter } from '../../__tests__/helpers.js';

const SECRET = 'test-secret';

describe('Webhook Route', () => {
  // ==========================================================================
  // Signed webhooks
  // ==========================================================================

  describe('with a channel secret', () => {
    let app: FastifyInstance;
    let adapter: FakeDeliveryAdapter;

    beforeEach(async () => {
      ({ app, adapter } = await buildTestServer({ LINE_CHANNEL_SECRET: SECRET }));
    });

    afterEach(async () => {
      await app.close();
    });

    const send = (raw: string, signature?: string) =>
      app.inject({
        method: 'POST',
        url: '/webhook',
        payload: raw,
        headers: {
          'content-type': 'application/json',
          ...(signature !== undefined ? { 'x-line-signature': signature } : {}),
        },
      });

    const textEvent = (text: string) =>
      JSON.stringify({
        destination: 'Ubot',
        events: [{ type: 'message', replyToken: 'rt-1', source: { userId: 'U1' }, message: { type: 'text', text } }],
      });

    it('accepts a correctly signed body and auto-replies', async () => {
      const raw = textEvent('hello');

      const res = await send(raw, signLineBody(raw, SECRET));

      expect(res.statusCode).toBe(200);
      expect(JSON.parse(res.body)).toEqual({
        status: 'ok',
        processed: 1,
        tokensIssued: 1,
        replies: [
          { accepted: true, channel: 'reply', deliveries: [{ target: 'rt-1', status: 'DELIVERED', attempts: 1 }] },
        ],
      });
      expect(adapter.calls[0]).toMatchObject({ channel: 'reply', targets: ['rt-1'], message: 'You said: hello' });
    });

    it('answers the status command with the alert summary', async () => {
      const raw = textEvent('status');

      await send(raw, signLineBody(raw, SECRET));

      expect(adapter.messages[0]).toBe(
        'SYSTEM STATUS\n==============\ngas: normal (no data)\ntemperature: normal (no data)\nhumidity: normal (no data)',
      );
    });

    it('rejects a request without a signature', async () => {
      const res = await send(textEvent('hello'));

      expect(res.statusCode).toBe(401);
      expect(JSON.parse(res.body)).toEqual({ error: 'Missing X-Line-Signature header' });
      expect(adapter.calls).toHaveLength(0);
    });

    it('rejects a signature made with another secret', async () => {
      const raw = textEvent('hello');

      const res = await send(raw, signLineBody(raw, 'other-secret'));

      expect(res.statusCode).toBe(401);
      expect(JSON.parse(res.body)).toEqual({ error: 'Invalid signature' });
    });

    it('rejects a body altered after signing', async () => {
      const signature = signLineBody(textEvent('hello'), SECRET);

      const res = await send(textEvent('hello!'), signature);

      expect(res.statusCode).toBe(401);
      expect(adapter.calls).toHaveLength(0);
    });

    it('issues no tokens for a signed but malformed payload', async () => {
      const raw = JSON.stringify({ events: [{ type: 'follow', replyToken: 'rt-1' }, { type: 'message' }] });

      const res = await send(raw, signLineBody(raw, SECRET));

      expect(res.statusCode).toBe(400);
      expect(JSON.parse(res.body)).toEqual({ error: 'events[1].message must be an object', statusCode: 400 });
      expect(app.replyTokens.size).toBe(0);
    });

    it('rejects a body that is not JSON', async () => {
      const res = await send('not json', 'irrelevant');

      expect(res.statusCode).toBe(400);
      expect(JSON.parse(res.body)).toEqual({ error: 'Webhook body is not valid JSON', statusCode: 400 });
    });
  });

  // ==========================================================================
  // Unsigned webhooks
  // ==========================================================================

  describe('without a channel secret', () => {
    let app: FastifyInstance;
    let adapter: FakeDeliveryAdapter;

    beforeEach(async () => {
      ({ app, adapter } = await buildTestServer({ WEBHOOK_AUTO_REPLY: 'false' }));
    });

    afterEach(async () => {
      await app.close();
    });

    it('skips signature verification', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/webhook',
        payload: { events: [{ type: 'follow', replyToken: 'rt-1', source: { userId: 'U1' } }] },
      });

      expect(res.statusCode).toBe(200);
      expect(JSON.parse(res.body)).toEqual({ status: 'ok', processed: 1, tokensIssued: 1, replies: [] });
      expect(app.recipients.ids()).toEqual(['U1']);
      expect(adapter.calls).toHaveLength(0);
    });

    it('tracks followers and unfollowers', async () => {
      await app.inject({
        method: 'POST',
        url: '/webhook',
        payload: {
          events: [
            { type: 'follow', replyToken: 'rt-1', source: { userId: 'U1' } },
            { type: 'follow', replyToken: 'rt-2', source: { userId: 'U2' } },
            { type: 'unfollow', source: { userId: 'U1' } },
          ],
        },
      });

      expect(app.recipients.ids()).toEqual(['U2']);
    });

    it('acknowledges an empty event list', async () => {
      const res = await app.inject({ method: 'POST', url: '/webhook', payload: { events: [] } });

      expect(res.statusCode).toBe(200);
      expect(JSON.parse(res.body)).toEqual({ status: 'ok', processed: 0, tokensIssued: 0, replies: [] });
    });
  });
});
