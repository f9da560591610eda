import { connect, type IClientOptions, type MqttClient } from 'mqtt';
import type { Logger } from '../types.js';

export type TelemetryHandler = (topic: string, payload: Buffer) => Promise<unknown>;

/** Where sensor telemetry comes from. The server owns one and closes it on shutdown. */
export interface TelemetrySource {
  start(topics: string[], onMessage: TelemetryHandler): void;
  close(): Promise<void>;
}

export interface MqttSourceOptions {
  url: string;
  clientId: string;
  username?: string;
  password?: string;
}

/**
 * Broker subscription for the sensor node topics. The client reconnects on
 * its own; subscriptions are re-issued on every connect.
 */
export class MqttTelemetrySource implements TelemetrySource {
  private client: MqttClient | null = null;

  constructor(
    private readonly options: MqttSourceOptions,
    private readonly log: Logger,
  ) {}

  start(topics: string[], onMessage: TelemetryHandler): void {
    const clientOptions: IClientOptions = {
      clientId: this.options.clientId,
      reconnectPeriod: 5000,
      keepalive: 60,
      clean: true,
    };
    if (this.options.username) {
      clientOptions.username = this.options.username;
      clientOptions.password = this.options.password;
    }

    const client = connect(this.options.url, clientOptions);
    this.client = client;

    client.on('connect', () => {
      this.log.info({ url: this.options.url }, 'Connected to MQTT broker');
      client.subscribe(topics, { qos: 1 }, (err) => {
        if (err) {
          this.log.error({ err, topics }, 'Failed to subscribe to telemetry topics');
        } else {
          this.log.info({ topics }, 'Subscribed to telemetry topics');
        }
      });
    });

    client.on('message', (topic, payload) => {
      onMessage(topic, payload).catch((err: unknown) => {
        this.log.error({ err, topic }, 'Telemetry message processing failed');
      });
    });

    client.on('error', (err) => {
      this.log.error({ err }, 'MQTT connection error');
    });

    client.on('offline', () => {
      this.log.warn('MQTT broker unreachable, reconnecting');
    });
  }

  async close(): Promise<void> {
    if (!this.client) return;
    await this.client.endAsync();
    this.client = null;
  }
}
