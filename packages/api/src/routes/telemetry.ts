import type { FastifyPluginAsync } from 'fastify';
import { isMetric, type Metric } from '@gasguard/core';
import { isRecord, optionalNumber, parseTimestamp } from '../utils/payload.js';
import { isValidDateString } from '../utils/sanitize.js';

interface RangeQuerystring {
  start_date?: string;
  end_date?: string;
}

interface ListQuerystring extends RangeQuerystring {
  limit?: string;
}

function parseLimit(raw: string | undefined): number | null {
  if (raw === undefined) return 100;
  const limit = Number(raw);
  return Number.isInteger(limit) && limit >= 1 && limit <= 10_000 ? limit : null;
}

function parseRange(query: RangeQuerystring): { since?: Date; until?: Date } | null {
  const { start_date, end_date } = query;
  if ((start_date && !isValidDateString(start_date)) || (end_date && !isValidDateString(end_date))) {
    return null;
  }
  return {
    ...(start_date ? { since: new Date(start_date) } : {}),
    ...(end_date ? { until: new Date(end_date) } : {}),
  };
}

function intInRange(raw: string | undefined, fallback: number, min: number, max: number): number | null {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  return Number.isInteger(value) && value >= min && value <= max ? value : null;
}

const telemetryRoutes: FastifyPluginAsync = async (fastify) => {
  // POST /api/v1/telemetry/readings - composite reading from the sensor node
  fastify.post('/readings', { schema: { tags: ['telemetry'], summary: 'Submit a sensor reading' } }, async (request, reply) => {
    const body = request.body;
    if (!isRecord(body)) {
      return reply.code(400).send({ error: 'Body must be a JSON object' });
    }

    const gasLevel = optionalNumber(body, 'gas_level');
    const temperature = optionalNumber(body, 'temperature');
    const humidity = optionalNumber(body, 'humidity');
    if (gasLevel === undefined || temperature === undefined || humidity === undefined) {
      return reply.code(400).send({ error: 'gas_level, temperature, and humidity must be numbers' });
    }

    let observedAt = fastify.telemetry.now();
    if (body.observed_at !== undefined) {
      const parsed = parseTimestamp(body.observed_at);
      if (!parsed) {
        return reply.code(400).send({ error: 'observed_at must be epoch seconds or an ISO date' });
      }
      observedAt = parsed;
    }

    const evaluations = await fastify.telemetry.processReading({ gasLevel, temperature, humidity, observedAt });
    return reply.code(201).send({ observedAt: observedAt.toISOString(), evaluations });
  });

  // GET /api/v1/telemetry/readings - stored samples, newest first
  fastify.get<{ Querystring: ListQuerystring & { metric?: string } }>(
    '/readings',
    { schema: { tags: ['telemetry'], summary: 'List stored samples' } },
    async (request, reply) => {
      const { metric } = request.query;
      const limit = parseLimit(request.query.limit);
      const range = parseRange(request.query);

      if (metric !== undefined && !isMetric(metric)) {
        return reply.code(400).send({ error: 'metric must be one of gas, temperature, humidity' });
      }
      if (limit === null) return reply.code(400).send({ error: 'limit must be an integer from 1 to 10000' });
      if (!range) return reply.code(400).send({ error: 'start_date and end_date must be valid dates' });

      const filter: Metric | undefined = metric;
      const readings = fastify.history.listReadings({ metric: filter, limit, ...range });
      return { count: readings.length, readings };
    },
  );

  // GET /api/v1/telemetry/alarms - gateway and device alarm log
  fastify.get<{ Querystring: ListQuerystring & { type?: string } }>(
    '/alarms',
    { schema: { tags: ['telemetry'], summary: 'List alarm log entries' } },
    async (request, reply) => {
      const limit = parseLimit(request.query.limit);
      const range = parseRange(request.query);

      if (limit === null) return reply.code(400).send({ error: 'limit must be an integer from 1 to 10000' });
      if (!range) return reply.code(400).send({ error: 'start_date and end_date must be valid dates' });

      const alarms = fastify.history.listAlarms({ type: request.query.type, limit, ...range });
      return { count: alarms.length, alarms };
    },
  );

  // GET /api/v1/telemetry/stats - per-metric aggregates and alarm counts
  fastify.get<{ Querystring: RangeQuerystring }>(
    '/stats',
    { schema: { tags: ['telemetry'], summary: 'Aggregate statistics' } },
    async (request, reply) => {
      const range = parseRange(request.query);
      if (!range) return reply.code(400).send({ error: 'start_date and end_date must be valid dates' });
      return fastify.history.stats(range);
    },
  );

  // GET /api/v1/telemetry/series - bucketed averages for charts
  fastify.get<{ Querystring: { hours?: string; interval?: string } }>(
    '/series',
    { schema: { tags: ['telemetry'], summary: 'Time-bucketed series' } },
    async (request, reply) => {
      const hours = intInRange(request.query.hours, 24, 1, 168);
      const interval = intInRange(request.query.interval, 5, 1, 60);

      if (hours === null) return reply.code(400).send({ error: 'hours must be an integer from 1 to 168' });
      if (interval === null) return reply.code(400).send({ error: 'interval must be an integer from 1 to 60' });

      const points = fastify.history.series(hours, interval, fastify.telemetry.now());
      return { hours, intervalMinutes: interval, points };
    },
  );
};

export default telemetryRoutes;
