// GasGuard Core Types

// ============================================================================
// Telemetry
// ============================================================================

export const METRICS = ['gas', 'temperature', 'humidity'] as const;

export type Metric = (typeof METRICS)[number];

export function isMetric(value: unknown): value is Metric {
  return typeof value === 'string' && (METRICS as readonly string[]).includes(value);
}

/** Composite sample published by the sensor node. */
export interface SensorReading {
  gasLevel: number; // raw ADC value from the gas sensor
  temperature: number; // °C
  humidity: number; // %RH
  observedAt: Date;
}

export interface MetricSample {
  metric: Metric;
  value: number;
  observedAt: Date;
}

export function samplesFromReading(reading: SensorReading): MetricSample[] {
  return [
    { metric: 'gas', value: reading.gasLevel, observedAt: reading.observedAt },
    { metric: 'temperature', value: reading.temperature, observedAt: reading.observedAt },
    { metric: 'humidity', value: reading.humidity, observedAt: reading.observedAt },
  ];
}

// ============================================================================
// Thresholds & Alert State
// ============================================================================

export interface ThresholdBand {
  /** Value at or above which the metric is hazardous */
  triggerHigh: number;
  /** Value the metric must fall back to (or below) before the alert clears */
  clearLow: number;
  unit: string;
}

export type ThresholdConfig = Partial<Record<Metric, ThresholdBand>>;

export enum AlertStatus {
  NORMAL = 'NORMAL',
  TRIGGERED = 'TRIGGERED',
  RESOLVED = 'RESOLVED',
}

export type Severity = 'NORMAL' | 'ELEVATED' | 'HAZARDOUS';

export interface AlertState {
  metric: Metric;
  status: AlertStatus;
  triggeredAt: Date | null;
  lastNotifiedAt: Date | null;
  lastObservedAt: Date | null;
  lastValue: number | null;
}

// ============================================================================
// Dispatch
// ============================================================================

export const DISPATCH_CHANNELS = ['push', 'broadcast', 'multicast', 'reply'] as const;

export type DispatchChannel = (typeof DISPATCH_CHANNELS)[number];

export type DispatchRequest =
  | { channel: 'push'; target: string; message: string }
  | { channel: 'multicast'; targets: string[]; message: string }
  | { channel: 'broadcast'; message: string }
  | { channel: 'reply'; token: string; message: string };

export type RejectionReason =
  | 'QUOTA_EXCEEDED'
  | 'INVALID_TOKEN'
  | 'INVALID_REQUEST'
  | 'DELIVERY_FAILED';

export type DeliveryStatus = 'DELIVERED' | 'FAILED' | 'CANCELLED';

export interface TargetDelivery {
  target: string;
  status: DeliveryStatus;
  attempts: number;
  error?: string;
}

export interface DispatchResult {
  accepted: boolean;
  channel: DispatchChannel;
  reason?: RejectionReason;
  detail?: string;
  deliveries: TargetDelivery[];
}

// ============================================================================
// Reply Tokens
// ============================================================================

export interface ReplyToken {
  tokenId: string;
  issuedAt: Date;
  expiresAt: Date;
  consumed: boolean;
  userId?: string;
}

export type TokenRejection = 'NOT_FOUND' | 'EXPIRED' | 'ALREADY_CONSUMED';
