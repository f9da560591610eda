import type { FastifyPluginAsync, FastifyReply } from 'fastify';
import type { DispatchChannel, DispatchRequest, DispatchResult, RejectionReason } from '@gasguard/core';
import { isRecord, isStringArray, optionalString } from '../utils/payload.js';

type ParsedDispatch = { ok: true; request: DispatchRequest } | { ok: false; detail: string };

const REJECTION_STATUS: Record<RejectionReason, number> = {
  INVALID_REQUEST: 400,
  INVALID_TOKEN: 400,
  QUOTA_EXCEEDED: 429,
  DELIVERY_FAILED: 502,
};

export function statusFor(result: DispatchResult): number {
  if (result.accepted) return 200;
  return result.reason ? REJECTION_STATUS[result.reason] : 500;
}

/**
 * Map a JSON body onto a DispatchRequest. Field names of the earlier
 * snake_case API (user_id, user_ids, reply_token) are accepted too.
 */
export function parseDispatchBody(channel: DispatchChannel, body: unknown): ParsedDispatch {
  if (!isRecord(body)) return { ok: false, detail: 'Body must be a JSON object' };
  const message = optionalString(body, 'message') ?? '';

  switch (channel) {
    case 'push': {
      const target = optionalString(body, 'target') ?? optionalString(body, 'user_id');
      if (target === undefined) return { ok: false, detail: 'target is required' };
      return { ok: true, request: { channel, target, message } };
    }
    case 'multicast': {
      const targets = body.targets ?? body.user_ids;
      if (!isStringArray(targets)) return { ok: false, detail: 'targets must be an array of strings' };
      return { ok: true, request: { channel, targets, message } };
    }
    case 'broadcast':
      return { ok: true, request: { channel, message } };
    case 'reply': {
      const token = optionalString(body, 'token') ?? optionalString(body, 'reply_token');
      if (token === undefined) return { ok: false, detail: 'token is required' };
      return { ok: true, request: { channel, token, message } };
    }
  }
}

/** Aborts when the client disconnects before the response is written */
function callerSignal(reply: FastifyReply): AbortSignal {
  const controller = new AbortController();
  reply.raw.once('close', () => {
    if (!reply.raw.writableFinished) controller.abort();
  });
  return controller.signal;
}

const messageRoutes: FastifyPluginAsync = async (fastify) => {
  const routes: Array<{ path: string; channel: DispatchChannel; summary: string }> = [
    { path: '/send', channel: 'push', summary: 'Push a message to one user' },
    { path: '/broadcast', channel: 'broadcast', summary: 'Broadcast a message to every follower' },
    { path: '/multicast', channel: 'multicast', summary: 'Send one message to several users' },
    { path: '/reply', channel: 'reply', summary: 'Answer an inbound event with its reply token' },
  ];

  for (const { path, channel, summary } of routes) {
    fastify.post(path, { schema: { tags: ['messages'], summary } }, async (request, reply) => {
      const parsed = parseDispatchBody(channel, request.body);
      if (!parsed.ok) {
        const rejected: DispatchResult = {
          accepted: false,
          channel,
          reason: 'INVALID_REQUEST',
          detail: parsed.detail,
          deliveries: [],
        };
        return reply.code(400).send(rejected);
      }

      const result = await fastify.gateway.dispatch(parsed.request, { signal: callerSignal(reply) });
      return reply.code(statusFor(result)).send(result);
    });
  }
};

export default messageRoutes;
