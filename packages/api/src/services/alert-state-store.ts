import { AlertStatus, METRICS, type AlertState, type Metric, type MetricSample } from '@gasguard/core';
import type { Clock } from '../types.js';
import { TRANSITIONS } from './threshold-evaluator.js';

export interface ApplyResult {
  state: AlertState;
  transitioned: boolean;
}

function normalState(metric: Metric): AlertState {
  return {
    metric,
    status: AlertStatus.NORMAL,
    triggeredAt: null,
    lastNotifiedAt: null,
    lastObservedAt: null,
    lastValue: null,
  };
}

function isTableTransition(from: AlertStatus, to: AlertStatus): boolean {
  return Object.values(TRANSITIONS[from]).includes(to);
}

/**
 * Per-metric alert lifecycle. Every method is synchronous, so each
 * read-modify-write is atomic on the event loop. States are returned as
 * copies; the store is the only writer.
 */
export class AlertStateStore {
  private states = new Map<Metric, AlertState>();

  constructor(private readonly now: Clock = () => new Date()) {}

  get(metric: Metric): AlertState {
    const state = this.states.get(metric);
    return state ? { ...state } : normalState(metric);
  }

  list(): AlertState[] {
    return METRICS.map((metric) => this.get(metric));
  }

  /**
   * Commit an evaluated status. A repeat of the current status, or a move the
   * transition table does not allow, only records the observation.
   */
  apply(metric: Metric, status: AlertStatus, sample?: MetricSample): ApplyResult {
    const current = this.states.get(metric) ?? normalState(metric);
    const next: AlertState = { ...current };

    if (sample) {
      next.lastObservedAt = sample.observedAt;
      next.lastValue = sample.value;
    }

    const transitioned = status !== current.status && isTableTransition(current.status, status);
    if (transitioned) {
      next.status = status;
      if (status === AlertStatus.TRIGGERED) {
        next.triggeredAt = sample?.observedAt ?? this.now();
        next.lastNotifiedAt = null;
      }
    }

    this.states.set(metric, next);
    return { state: { ...next }, transitioned };
  }

  markNotified(metric: Metric, at: Date = this.now()): void {
    const state = this.states.get(metric);
    if (state) state.lastNotifiedAt = at;
  }

  /**
   * Read by the dispatch gateway after a RESOLVED notification. Collapses the
   * state back to NORMAL so a later crossing counts as a fresh alert.
   */
  collectResolved(metric: Metric): AlertState {
    const state = this.get(metric);
    if (state.status === AlertStatus.RESOLVED) {
      this.states.set(metric, {
        ...state,
        status: AlertStatus.NORMAL,
        triggeredAt: null,
      });
    }
    return state;
  }
}
