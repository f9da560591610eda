import type { FastifyPluginAsync } from 'fastify';
import { verifyLineSignature } from '@gasguard/messaging';
import { MalformedInputError } from '../../errors.js';
import { handleWebhookEvents, parseWebhookPayload } from '../../services/webhook-events.js';

/**
 * Messaging Webhook Endpoint
 *
 * POST /webhook
 *
 * Receives message, follow and unfollow events. When a channel secret is
 * configured the raw body is verified against X-Line-Signature
 * (base64 HMAC-SHA256) before anything is parsed.
 */
const lineWebhookRoutes: FastifyPluginAsync = async (fastify) => {
  // Raw body is needed for the HMAC check
  fastify.addContentTypeParser('application/json', { parseAs: 'string' }, (req, body, done) => {
    const raw = typeof body === 'string' ? body : body.toString('utf8');
    req.rawBody = raw;
    try {
      done(null, JSON.parse(raw));
    } catch {
      done(new MalformedInputError('Webhook body is not valid JSON'), undefined);
    }
  });

  fastify.post('/webhook', { schema: { tags: ['webhook'], summary: 'Inbound messaging events' } }, async (request, reply) => {
    const { channelSecret } = fastify.appConfig.messaging.line;

    // -----------------------------------------------------------------------
    // 1. Verify signature
    // -----------------------------------------------------------------------
    if (channelSecret) {
      const signature = request.headers['x-line-signature'];
      const rawBody = request.rawBody;

      if (typeof signature !== 'string' || rawBody === undefined) {
        return reply.code(401).send({ error: 'Missing X-Line-Signature header' });
      }
      if (!verifyLineSignature(rawBody, signature, channelSecret)) {
        request.log.warn('Webhook signature verification failed');
        return reply.code(401).send({ error: 'Invalid signature' });
      }
    }

    // -----------------------------------------------------------------------
    // 2. Parse every event before changing any state
    // -----------------------------------------------------------------------
    const payload = parseWebhookPayload(request.body);

    // -----------------------------------------------------------------------
    // 3. Tokens, recipients, auto-reply
    // -----------------------------------------------------------------------
    const summary = await handleWebhookEvents(payload.events, {
      replyTokens: fastify.replyTokens,
      recipients: fastify.recipients,
      alertStates: fastify.alertStates,
      gateway: fastify.gateway,
      thresholds: fastify.appConfig.thresholds,
      autoReply: fastify.appConfig.webhook.autoReply,
      log: request.log,
    });

    request.log.info(
      { destination: payload.destination, processed: summary.processed, tokensIssued: summary.tokensIssued },
      'Webhook events handled',
    );

    return { status: 'ok', ...summary };
  });
};

export default lineWebhookRoutes;
