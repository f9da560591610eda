import fp from 'fastify-plugin';
import type { AppConfig } from '../config.js';
import { MqttTelemetrySource, type TelemetrySource } from '../services/mqtt-source.js';
import { TelemetryIngest } from '../services/telemetry-ingest.js';
import type { Clock } from '../types.js';

export interface TelemetryPluginOptions {
  config: AppConfig;
  /** Overrides the MQTT subscription built from MQTT_URL */
  source?: TelemetrySource;
  clock?: Clock;
}

/**
 * Sensor path. HTTP readings always work; the broker subscription starts
 * only when MQTT_URL is set or a source is supplied.
 */
export default fp<TelemetryPluginOptions>(async (fastify, opts) => {
  const { config } = opts;

  const telemetry = new TelemetryIngest({
    thresholds: config.thresholds,
    alertStates: fastify.alertStates,
    gateway: fastify.gateway,
    history: fastify.history,
    topics: config.mqtt.topics,
    log: fastify.log.child({ component: 'telemetry' }),
    now: opts.clock,
    maxReorderMs: config.telemetry.maxReorderMs,
  });
  fastify.decorate('telemetry', telemetry);

  const { url, clientId, username, password } = config.mqtt;
  const source =
    opts.source ??
    (url ? new MqttTelemetrySource({ url, clientId, username, password }, fastify.log.child({ component: 'mqtt' })) : null);

  if (!source) {
    fastify.log.info('MQTT_URL not set, telemetry accepted over HTTP only');
    return;
  }

  fastify.addHook('onReady', async () => {
    source.start(telemetry.topics, (topic, payload) => telemetry.handleMessage(topic, payload));
  });

  fastify.addHook('onClose', async () => {
    await source.close();
  });
}, { name: 'telemetry', dependencies: ['gateway', 'history'] });
