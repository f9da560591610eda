import { METRICS, type ThresholdBand, type ThresholdConfig } from '@gasguard/core';
import { ConfigError } from './errors.js';
import type { AlertRouting, DeliveryPolicy } from './services/dispatch-gateway.js';
import { QUOTA_PERIODS, type MulticastCharge, type QuotaPeriod, type QuotaRules } from './services/quota-tracker.js';
import { DEFAULT_MAX_REORDER_MS } from './services/telemetry-ingest.js';
import { validateThresholds } from './services/threshold-evaluator.js';

export interface AppConfig {
  server: {
    port: number;
    host: string;
    logLevel: string;
    prettyLogs: boolean;
    corsOrigins: string[] | boolean;
  };
  messaging: {
    adapter: 'console' | 'line';
    line: {
      channelAccessToken?: string;
      channelSecret?: string;
      apiUrl: string;
    };
  };
  thresholds: ThresholdConfig;
  replyTokens: {
    ttlMs: number;
    sweepIntervalMs: number;
  };
  quota: {
    rules: QuotaRules;
    multicastCharge: MulticastCharge;
  };
  delivery: DeliveryPolicy;
  alertRouting: AlertRouting;
  webhook: {
    autoReply: boolean;
  };
  mqtt: {
    url?: string;
    username?: string;
    password?: string;
    clientId: string;
    topics: {
      gas: string;
      temperature: string;
      alarmLog: string;
    };
  };
  telemetry: {
    /** Samples further behind than this reset the metric's clock instead of counting as stale */
    maxReorderMs: number;
  };
  history: {
    dbPath: string;
  };
}

type Env = Record<string, string | undefined>;

function intVar(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(`${key} must be a non-negative integer, got "${raw}"`, key);
  }
  return value;
}

function floatVar(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${key} must be a number, got "${raw}"`, key);
  }
  return value;
}

function oneOf<T extends string>(env: Env, key: string, allowed: readonly T[], fallback: T): T {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;
  const match = allowed.find((option) => option === raw);
  if (!match) {
    throw new ConfigError(`${key} must be one of ${allowed.join(', ')}, got "${raw}"`, key);
  }
  return match;
}

function listVar(env: Env, key: string): string[] {
  return (env[key] ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

// Defaults follow the sensor node firmware: gas ADC 1500 with 100 hysteresis, 35 °C with 1 °C
const THRESHOLD_DEFAULTS: Record<(typeof METRICS)[number], ThresholdBand & { prefix: string }> = {
  gas: { prefix: 'GAS', triggerHigh: 1500, clearLow: 1400, unit: '' },
  temperature: { prefix: 'TEMPERATURE', triggerHigh: 35, clearLow: 34, unit: 'C' },
  humidity: { prefix: 'HUMIDITY', triggerHigh: 80, clearLow: 70, unit: '%' },
};

function quotaRule(env: Env, channel: string, limit: number, period: QuotaPeriod) {
  return {
    limit: intVar(env, `QUOTA_${channel}_LIMIT`, limit),
    period: oneOf(env, `QUOTA_${channel}_PERIOD`, QUOTA_PERIODS, period),
  };
}

export function getConfig(env: Env = process.env): AppConfig {
  const isProduction = env.NODE_ENV === 'production';

  const thresholds: ThresholdConfig = {};
  for (const metric of METRICS) {
    const defaults = THRESHOLD_DEFAULTS[metric];
    thresholds[metric] = {
      triggerHigh: floatVar(env, `${defaults.prefix}_TRIGGER_HIGH`, defaults.triggerHigh),
      clearLow: floatVar(env, `${defaults.prefix}_CLEAR_LOW`, defaults.clearLow),
      unit: defaults.unit,
    };
  }

  const config: AppConfig = {
    server: {
      port: intVar(env, 'PORT', 3000),
      host: env.HOST || '0.0.0.0',
      logLevel: env.LOG_LEVEL || 'info',
      prettyLogs: !isProduction && env.NODE_ENV !== 'test',
      // Block all cross-origin in production unless CORS_ORIGINS is set
      corsOrigins: env.CORS_ORIGINS ? listVar(env, 'CORS_ORIGINS') : !isProduction,
    },
    messaging: {
      adapter: oneOf(env, 'MESSAGING_ADAPTER', ['console', 'line'] as const, 'console'),
      line: {
        channelAccessToken: env.LINE_CHANNEL_ACCESS_TOKEN,
        channelSecret: env.LINE_CHANNEL_SECRET,
        apiUrl: env.LINE_API_URL || 'https://api.line.me/v2/bot/message',
      },
    },
    thresholds,
    replyTokens: {
      ttlMs: intVar(env, 'REPLY_TOKEN_TTL_MS', 60_000),
      sweepIntervalMs: intVar(env, 'REPLY_TOKEN_SWEEP_MS', 60_000),
    },
    quota: {
      rules: {
        push: quotaRule(env, 'PUSH', 500, 'month'),
        broadcast: quotaRule(env, 'BROADCAST', 100, 'month'),
        multicast: quotaRule(env, 'MULTICAST', 500, 'month'),
        reply: quotaRule(env, 'REPLY', 0, 'month'),
      },
      multicastCharge: oneOf(env, 'MULTICAST_QUOTA_CHARGE', ['per-call', 'per-target'] as const, 'per-call'),
    },
    delivery: {
      maxAttempts: intVar(env, 'DELIVERY_MAX_ATTEMPTS', 3),
      baseDelayMs: intVar(env, 'DELIVERY_BASE_DELAY_MS', 500),
      maxDelayMs: intVar(env, 'DELIVERY_MAX_DELAY_MS', 8000),
      timeoutMs: intVar(env, 'DELIVERY_TIMEOUT_MS', 10_000),
      maxMulticastTargets: intVar(env, 'MULTICAST_MAX_TARGETS', 500),
    },
    alertRouting: {
      channel: oneOf(env, 'ALERT_CHANNEL', ['push', 'multicast', 'broadcast'] as const, 'broadcast'),
      targets: listVar(env, 'ALERT_TARGETS'),
      includeSubscribers: env.ALERT_INCLUDE_SUBSCRIBERS === 'true',
    },
    webhook: {
      autoReply: env.WEBHOOK_AUTO_REPLY !== 'false',
    },
    mqtt: {
      url: env.MQTT_URL || undefined,
      username: env.MQTT_USERNAME,
      password: env.MQTT_PASSWORD,
      clientId: env.MQTT_CLIENT_ID || 'gasguard-gateway',
      topics: {
        gas: env.MQTT_TOPIC_GAS || 'sensor/gas/data',
        temperature: env.MQTT_TOPIC_TEMPERATURE || 'sensor/temp/data',
        alarmLog: env.MQTT_TOPIC_ALARM_LOG || 'sensor/alarm/log',
      },
    },
    telemetry: {
      maxReorderMs: intVar(env, 'TELEMETRY_MAX_REORDER_MS', DEFAULT_MAX_REORDER_MS),
    },
    history: {
      dbPath: env.HISTORY_DB_PATH || 'sensor_data.db',
    },
  };

  validateConfig(config);
  return config;
}

/** Startup invariants. Any violation is fatal. */
export function validateConfig(config: AppConfig): void {
  validateThresholds(config.thresholds);

  if (config.delivery.maxAttempts < 1) {
    throw new ConfigError('DELIVERY_MAX_ATTEMPTS must be at least 1', 'DELIVERY_MAX_ATTEMPTS');
  }
  if (config.delivery.timeoutMs < 1) {
    throw new ConfigError('DELIVERY_TIMEOUT_MS must be at least 1', 'DELIVERY_TIMEOUT_MS');
  }
  if (config.replyTokens.ttlMs < 1) {
    throw new ConfigError('REPLY_TOKEN_TTL_MS must be at least 1', 'REPLY_TOKEN_TTL_MS');
  }
  if (config.messaging.adapter === 'line' && !config.messaging.line.channelAccessToken) {
    throw new ConfigError('LINE_CHANNEL_ACCESS_TOKEN is required when MESSAGING_ADAPTER=line', 'LINE_CHANNEL_ACCESS_TOKEN');
  }
  const routing = config.alertRouting;
  if (routing.channel !== 'broadcast' && routing.targets.length === 0 && !routing.includeSubscribers) {
    throw new ConfigError(
      `ALERT_CHANNEL=${routing.channel} needs ALERT_TARGETS or ALERT_INCLUDE_SUBSCRIBERS=true`,
      'ALERT_TARGETS',
    );
  }
}
