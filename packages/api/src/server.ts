import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import type { DeliveryAdapter } from '@gasguard/messaging';
import { getConfig, type AppConfig } from './config.js';
import type { TelemetrySource } from './services/mqtt-source.js';
import type { Clock } from './types.js';

// Plugins
import gatewayPlugin from './plugins/gateway.js';
import historyPlugin from './plugins/history.js';
import telemetryPlugin from './plugins/telemetry.js';

// Routes
import messageRoutes from './routes/messages.js';
import lineWebhookRoutes from './routes/webhooks/line.js';
import telemetryRoutes from './routes/telemetry.js';
import statusRoutes from './routes/alerts.js';

// Side-effect: import types for augmentation
import './types.js';

export interface BuildServerOptions {
  config?: AppConfig;
  /** Replaces the configured logger (tests pass a silent pino instance) */
  logger?: FastifyBaseLogger;
  deliveryAdapter?: DeliveryAdapter;
  telemetrySource?: TelemetrySource;
  clock?: Clock;
  sleep?: (ms: number) => Promise<void>;
}

function loggerOptions(config: AppConfig) {
  return {
    level: config.server.logLevel,
    ...(config.server.prettyLogs && {
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, translateTime: 'HH:MM:ss' },
      },
    }),
    serializers: {
      req(req: { method: string; url: string; ip: string }) {
        return {
          method: req.method,
          url: req.url,
          remoteAddress: req.ip,
        };
      },
    },
    redact: ['req.headers.authorization', 'req.headers["x-line-signature"]'],
  };
}

export async function buildServer(options: BuildServerOptions = {}): Promise<FastifyInstance> {
  const config = options.config ?? getConfig();

  const app = Fastify({
    logger: options.logger ?? loggerOptions(config),
  });

  app.decorate('appConfig', config);

  const isProduction = process.env.NODE_ENV === 'production';
  await app.register(cors, {
    origin: config.server.corsOrigins,
    credentials: !isProduction,
  });

  // Rate limiting: 100 req/min global
  await app.register(rateLimit, {
    max: 100,
    timeWindow: '1 minute',
  });

  // OpenAPI documentation
  await app.register(swagger, {
    openapi: {
      info: {
        title: 'GasGuard Notification Gateway',
        description: 'Environmental telemetry alerts and LINE messaging gateway',
        version: '0.1.0',
      },
      servers: [{ url: `http://localhost:${config.server.port}` }],
    },
  });
  await app.register(swaggerUi, {
    routePrefix: '/docs',
  });

  // Global error handler
  app.setErrorHandler((error, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    const level = statusCode >= 500 ? 'error' : 'warn';
    request.log[level]({
      err: error,
      url: request.url,
      method: request.method,
    });

    if (statusCode >= 500) {
      reply.code(statusCode).send({
        error: 'Internal Server Error',
        statusCode,
      });
    } else {
      reply.code(statusCode).send({
        error: error.message,
        statusCode,
      });
    }
  });

  // Plugins
  await app.register(historyPlugin, { dbPath: config.history.dbPath });
  await app.register(gatewayPlugin, {
    config,
    adapter: options.deliveryAdapter,
    clock: options.clock,
    sleep: options.sleep,
  });
  await app.register(telemetryPlugin, {
    config,
    source: options.telemetrySource,
    clock: options.clock,
  });

  // Health check endpoint
  app.get('/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
    };
  });

  // Readiness check (confirms the history database answers)
  app.get('/ready', async (request, reply) => {
    try {
      app.history.ping();
      return { status: 'ready' };
    } catch (err: unknown) {
      request.log.error({ err }, 'Readiness check failed');
      return reply.code(503).send({ status: 'not ready' });
    }
  });

  // API root: endpoint index
  app.get('/', async () => {
    return {
      status: 'ok',
      docs: '/docs',
      endpoints: {
        'POST /send': 'Push a message to one user',
        'POST /broadcast': 'Broadcast a message to every follower',
        'POST /multicast': 'Send one message to several users',
        'POST /reply': 'Reply with a token from a webhook event',
        'POST /webhook': 'Inbound messaging events',
        'POST /api/v1/telemetry/readings': 'Submit a sensor reading',
        'GET /api/v1/telemetry/readings': 'Stored samples',
        'GET /api/v1/telemetry/alarms': 'Alarm log',
        'GET /api/v1/telemetry/stats': 'Aggregate statistics',
        'GET /api/v1/telemetry/series': 'Time-bucketed series',
        'GET /api/v1/alerts': 'Alert state per metric',
        'GET /api/v1/quota': 'Quota usage per channel',
        'GET /api/v1/recipients': 'Known recipients',
      },
    };
  });

  // Routes
  await app.register(messageRoutes);
  await app.register(lineWebhookRoutes);
  await app.register(telemetryRoutes, { prefix: '/api/v1/telemetry' });
  await app.register(statusRoutes, { prefix: '/api/v1' });

  return app;
}
