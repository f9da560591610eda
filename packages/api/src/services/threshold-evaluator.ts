import {
  AlertStatus,
  type AlertState,
  type MetricSample,
  type Severity,
  type ThresholdBand,
  type ThresholdConfig,
} from '@gasguard/core';
import { ConfigError } from '../errors.js';

/** Where a value sits relative to a metric's hysteresis band */
export type BandPosition = 'ABOVE_TRIGGER' | 'IN_BAND' | 'BELOW_CLEAR';

/**
 * Alert transition table. A (status, position) pair that is not listed
 * keeps the current status.
 */
export const TRANSITIONS: Record<AlertStatus, Partial<Record<BandPosition, AlertStatus>>> = {
  [AlertStatus.NORMAL]: { ABOVE_TRIGGER: AlertStatus.TRIGGERED },
  [AlertStatus.TRIGGERED]: { BELOW_CLEAR: AlertStatus.RESOLVED },
  // A resolved alert the gateway has not collected yet re-triggers as a fresh alert
  [AlertStatus.RESOLVED]: { ABOVE_TRIGGER: AlertStatus.TRIGGERED },
};

export interface Evaluation {
  status: AlertStatus;
  transitioned: boolean;
  severity: Severity;
}

export function validateBand(metric: string, band: ThresholdBand): void {
  if (!Number.isFinite(band.triggerHigh) || !Number.isFinite(band.clearLow)) {
    throw new ConfigError(`${metric}: thresholds must be finite numbers`, metric);
  }
  if (band.clearLow >= band.triggerHigh) {
    throw new ConfigError(
      `${metric}: clear level (${band.clearLow}) must be below trigger level (${band.triggerHigh})`,
      metric,
    );
  }
}

export function validateThresholds(config: ThresholdConfig): void {
  for (const [metric, band] of Object.entries(config)) {
    if (band) validateBand(metric, band);
  }
}

export function bandPosition(value: number, band: ThresholdBand): BandPosition {
  if (value >= band.triggerHigh) return 'ABOVE_TRIGGER';
  if (value <= band.clearLow) return 'BELOW_CLEAR';
  return 'IN_BAND';
}

const SEVERITY: Record<BandPosition, Severity> = {
  ABOVE_TRIGGER: 'HAZARDOUS',
  IN_BAND: 'ELEVATED',
  BELOW_CLEAR: 'NORMAL',
};

/**
 * Evaluate one metric sample against the previous alert state. Pure: the
 * caller commits the result to the AlertStateStore.
 */
export function evaluate(sample: MetricSample, previous: AlertState, config: ThresholdConfig): Evaluation {
  const band = config[sample.metric];
  if (!band || !Number.isFinite(sample.value)) {
    return { status: previous.status, transitioned: false, severity: 'NORMAL' };
  }
  validateBand(sample.metric, band);

  const position = bandPosition(sample.value, band);
  const next = TRANSITIONS[previous.status][position];

  return {
    status: next ?? previous.status,
    transitioned: next !== undefined,
    severity: SEVERITY[position],
  };
}
