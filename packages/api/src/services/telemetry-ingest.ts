/**
 * GasGuard Telemetry Ingest
 *
 * Sensor path: MQTT messages or HTTP readings become per-metric samples that
 * are evaluated, committed to the Alert State Store, stored in history and,
 * on a transition, handed to the Dispatch Gateway. Each metric runs in its own
 * critical section, so a metric's TRIGGERED notification always leaves before
 * its RESOLVED one while other metrics proceed independently.
 */

import {
  AlertStatus,
  renderAlertMessage,
  samplesFromReading,
  type Metric,
  type MetricSample,
  type SensorReading,
  type Severity,
  type ThresholdConfig,
} from '@gasguard/core';
import { MalformedInputError } from '../errors.js';
import type { Clock, Logger } from '../types.js';
import { KeyedMutex } from '../utils/keyed-mutex.js';
import { isRecord, optionalNumber, optionalString, parseTimestamp } from '../utils/payload.js';
import type { AlertStateStore } from './alert-state-store.js';
import type { DispatchGateway } from './dispatch-gateway.js';
import type { ReadingHistory } from './reading-history.js';
import { evaluate } from './threshold-evaluator.js';

export interface TelemetryTopics {
  gas: string;
  temperature: string;
  alarmLog: string;
}

export interface SampleOutcome {
  metric: Metric;
  value: number;
  status: AlertStatus;
  severity: Severity;
  transitioned: boolean;
  /** Older than the last evaluated sample: stored, not evaluated */
  stale: boolean;
  notificationsAccepted: number;
}

export interface TelemetryIngestDeps {
  thresholds: ThresholdConfig;
  alertStates: AlertStateStore;
  gateway: DispatchGateway;
  history: ReadingHistory;
  topics: TelemetryTopics;
  log: Logger;
  now?: Clock;
  /**
   * How far behind the last evaluated sample a timestamp may fall and still
   * count as late delivery. Anything further back means the sensor clock
   * restarted. Defaults to five minutes.
   */
  maxReorderMs?: number;
}

export const DEFAULT_MAX_REORDER_MS = 5 * 60_000;

function parseJson(payload: Buffer): Record<string, unknown> {
  let body: unknown;
  try {
    body = JSON.parse(payload.toString('utf8'));
  } catch {
    throw new MalformedInputError('Payload is not valid JSON');
  }
  if (!isRecord(body)) throw new MalformedInputError('Payload must be a JSON object');
  return body;
}

function requireNumber(body: Record<string, unknown>, key: string): number {
  const value = optionalNumber(body, key);
  if (value === undefined) throw new MalformedInputError(`"${key}" must be a finite number`);
  return value;
}

export class TelemetryIngest {
  private readonly mutex = new KeyedMutex<Metric>();
  /** Arrival time for samples that carry no timestamp */
  readonly now: Clock;
  private readonly maxReorderMs: number;

  constructor(private readonly deps: TelemetryIngestDeps) {
    this.now = deps.now ?? (() => new Date());
    this.maxReorderMs = deps.maxReorderMs ?? DEFAULT_MAX_REORDER_MS;
  }

  get topics(): string[] {
    const { gas, temperature, alarmLog } = this.deps.topics;
    return [gas, temperature, alarmLog];
  }

  /**
   * Entry point for the broker subscription. Malformed payloads are logged
   * and dropped without touching any state.
   */
  async handleMessage(topic: string, payload: Buffer): Promise<SampleOutcome[]> {
    const { topics, log } = this.deps;

    let samples: MetricSample[];
    try {
      if (topic === topics.gas) {
        samples = this.parseGas(parseJson(payload));
      } else if (topic === topics.temperature) {
        samples = this.parseClimate(parseJson(payload));
      } else if (topic === topics.alarmLog) {
        this.recordDeviceAlarm(parseJson(payload));
        return [];
      } else {
        log.debug({ topic }, 'Ignoring message on unknown topic');
        return [];
      }
    } catch (err: unknown) {
      if (err instanceof MalformedInputError) {
        log.warn({ topic, error: err.message }, 'Dropping malformed telemetry payload');
        return [];
      }
      throw err;
    }

    return Promise.all(samples.map((sample) => this.processSample(sample)));
  }

  processReading(reading: SensorReading): Promise<SampleOutcome[]> {
    return Promise.all(samplesFromReading(reading).map((sample) => this.processSample(sample)));
  }

  processSample(sample: MetricSample): Promise<SampleOutcome> {
    return this.mutex.runExclusive(sample.metric, () => this.evaluateSample(sample));
  }

  private async evaluateSample(sample: MetricSample): Promise<SampleOutcome> {
    const { thresholds, alertStates, history, gateway, log } = this.deps;

    history.recordSample(sample);

    const previous = alertStates.get(sample.metric);
    const evaluation = evaluate(sample, previous, thresholds);

    const lastObserved = previous.lastObservedAt;
    const lagMs = lastObserved ? lastObserved.getTime() - sample.observedAt.getTime() : 0;
    if (lastObserved && lagMs > this.maxReorderMs) {
      // The node never syncs its clock, so a reboot restarts its timestamps near zero
      log.warn(
        { metric: sample.metric, observedAt: sample.observedAt, lastObservedAt: lastObserved, lagMs },
        'Sensor clock went backwards, resetting last observed time',
      );
    } else if (lastObserved && lagMs > 0) {
      log.debug(
        { metric: sample.metric, observedAt: sample.observedAt, lastObservedAt: lastObserved },
        'Stale sample stored without evaluation',
      );
      return {
        metric: sample.metric,
        value: sample.value,
        status: previous.status,
        severity: evaluation.severity,
        transitioned: false,
        stale: true,
        notificationsAccepted: 0,
      };
    }

    const { state, transitioned } = alertStates.apply(sample.metric, evaluation.status, sample);
    const band = thresholds[sample.metric];
    let notificationsAccepted = 0;

    if (transitioned && band) {
      const cleared = state.status === AlertStatus.RESOLVED;
      log.info(
        { metric: sample.metric, value: sample.value, status: state.status, severity: evaluation.severity },
        cleared ? 'Alert resolved' : 'Alert triggered',
      );

      history.recordAlarm({
        type: cleared ? `${sample.metric}_clear` : sample.metric,
        message: renderAlertMessage(sample.metric, state.status, sample.value, band) ?? '',
        metric: sample.metric,
        value: sample.value,
        source: 'gateway',
        observedAt: sample.observedAt,
      });

      const results = await gateway.dispatchAlert({
        metric: sample.metric,
        status: state.status,
        value: sample.value,
        observedAt: sample.observedAt,
        band,
      });
      notificationsAccepted = results.filter((r) => r.accepted).length;
    }

    return {
      metric: sample.metric,
      value: sample.value,
      status: state.status,
      severity: evaluation.severity,
      transitioned,
      stale: false,
      notificationsAccepted,
    };
  }

  // ==========================================================================
  // Payload parsing
  // ==========================================================================

  private parseGas(body: Record<string, unknown>): MetricSample[] {
    const value = requireNumber(body, 'raw');
    return [{ metric: 'gas', value, observedAt: this.timestampOf(body) }];
  }

  private parseClimate(body: Record<string, unknown>): MetricSample[] {
    // The node publishes valid=false when the DHT read failed
    if (body.valid === false) {
      this.deps.log.debug('Skipping climate reading flagged invalid by the sensor');
      return [];
    }
    const temperature = requireNumber(body, 'temperature');
    const humidity = requireNumber(body, 'humidity');
    const observedAt = this.timestampOf(body);
    return [
      { metric: 'temperature', value: temperature, observedAt },
      { metric: 'humidity', value: humidity, observedAt },
    ];
  }

  private recordDeviceAlarm(body: Record<string, unknown>): void {
    const type = optionalString(body, 'type');
    const message = optionalString(body, 'message');
    if (!type || message === undefined) {
      throw new MalformedInputError('Alarm log needs "type" and "message" strings');
    }
    this.deps.history.recordAlarm({ type, message, source: 'device', observedAt: this.timestampOf(body) });
    this.deps.log.info({ type }, 'Device alarm logged');
  }

  private timestampOf(body: Record<string, unknown>): Date {
    return parseTimestamp(body.timestamp) ?? this.now();
  }
}
