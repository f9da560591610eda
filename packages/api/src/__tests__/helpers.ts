import pino from 'pino';
import { targetsOf, type DeliveryAdapter, type DeliveryRequest, type DeliveryResult } from '@gasguard/messaging';
import type { TelemetryHandler, TelemetrySource } from '../services/mqtt-source.js';

export const silentLogger = () => pino({ level: 'silent' });

/** Settable clock for stores, quota periods and token expiry */
export class ManualClock {
  private current: number;

  constructor(start: Date | string = '2026-03-10T08:00:00.000Z') {
    this.current = new Date(start).getTime();
  }

  now = (): Date => new Date(this.current);

  advance(ms: number): void {
    this.current += ms;
  }

  set(at: Date | string): void {
    this.current = new Date(at).getTime();
  }
}

interface ScriptedFailure {
  remaining: number;
  retryable: boolean;
  error: string;
}

/**
 * In-process delivery adapter. Records every call; targets can be scripted
 * to fail a number of times, the adapter can throw or never answer.
 */
export class FakeDeliveryAdapter implements DeliveryAdapter {
  name = 'Fake';
  readonly calls: DeliveryRequest[] = [];
  private failures = new Map<string, ScriptedFailure>();
  private mode: 'answer' | 'hang' | 'throw' = 'answer';

  failTarget(
    target: string,
    options: { times?: number; retryable?: boolean; error?: string } = {},
  ): this {
    this.failures.set(target, {
      remaining: options.times ?? Number.POSITIVE_INFINITY,
      retryable: options.retryable ?? true,
      error: options.error ?? 'HTTP 500: upstream unavailable',
    });
    return this;
  }

  /** Every call stays pending forever */
  hang(): this {
    this.mode = 'hang';
    return this;
  }

  /** Every call rejects with "adapter exploded" */
  explode(): this {
    this.mode = 'throw';
    return this;
  }

  get messages(): string[] {
    return this.calls.map((call) => call.message);
  }

  async deliver(request: DeliveryRequest): Promise<DeliveryResult> {
    this.calls.push({ ...request, targets: [...request.targets] });

    if (this.mode === 'throw') throw new Error('adapter exploded');
    if (this.mode === 'hang') return new Promise<DeliveryResult>(() => undefined);

    return {
      outcomes: targetsOf(request).map((target) => {
        const failure = this.failures.get(target);
        if (failure && failure.remaining > 0) {
          failure.remaining--;
          return { target, ok: false, retryable: failure.retryable, error: failure.error };
        }
        return { target, ok: true, retryable: false };
      }),
    };
  }
}

/** Stands in for the MQTT subscription */
export class FakeTelemetrySource implements TelemetrySource {
  topics: string[] = [];
  closed = false;
  private handler: TelemetryHandler | null = null;

  start(topics: string[], onMessage: TelemetryHandler): void {
    this.topics = topics;
    this.handler = onMessage;
  }

  async publish(topic: string, payload: unknown): Promise<unknown> {
    if (!this.handler) throw new Error('telemetry source was not started');
    const raw = typeof payload === 'string' ? payload : JSON.stringify(payload);
    return this.handler(topic, Buffer.from(raw, 'utf8'));
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
