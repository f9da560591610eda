import type { FastifyPluginAsync } from 'fastify';
import { isMetric } from '@gasguard/core';

const statusRoutes: FastifyPluginAsync = async (fastify) => {
  // GET /api/v1/alerts - alert state of every metric
  fastify.get('/alerts', { schema: { tags: ['status'], summary: 'Alert state per metric' } }, async () => {
    const thresholds = fastify.appConfig.thresholds;
    return {
      alerts: fastify.alertStates.list().map((state) => ({ ...state, threshold: thresholds[state.metric] ?? null })),
    };
  });

  // GET /api/v1/alerts/:metric
  fastify.get<{ Params: { metric: string } }>(
    '/alerts/:metric',
    { schema: { tags: ['status'], summary: 'Alert state of one metric' } },
    async (request, reply) => {
      const { metric } = request.params;
      if (!isMetric(metric)) {
        return reply.code(404).send({ error: `Unknown metric: ${metric}` });
      }
      return { ...fastify.alertStates.get(metric), threshold: fastify.appConfig.thresholds[metric] ?? null };
    },
  );

  // GET /api/v1/quota - current counters per channel
  fastify.get('/quota', { schema: { tags: ['status'], summary: 'Quota usage per channel' } }, async () => {
    return {
      multicastCharge: fastify.appConfig.quota.multicastCharge,
      counters: fastify.quota.snapshot().map((counter) => ({
        ...counter,
        remaining: counter.limit > 0 ? Math.max(0, counter.limit - counter.count) : null,
      })),
    };
  });

  // GET /api/v1/recipients - users learned from webhook events
  fastify.get('/recipients', { schema: { tags: ['status'], summary: 'Known recipients' } }, async () => {
    const recipients = fastify.recipients.list();
    return { count: recipients.length, recipients };
  });
};

export default statusRoutes;
