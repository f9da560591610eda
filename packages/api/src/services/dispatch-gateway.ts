/**
 * GasGuard Dispatch Gateway
 *
 * Turns alert transitions and explicit API requests into deliveries on the
 * messaging channel. Admission (validation, reply token, quota) happens in
 * one synchronous block before the first await, so concurrent callers can
 * never both pass a check that only one of them should.
 *
 * Delivery policy:
 * - push / multicast: bounded exponential backoff on retryable failures,
 *   only still-failing targets are retried, delivered targets are kept
 * - broadcast: one attempt, failures are logged and reported
 * - reply: one attempt; the token stays consumed whatever the outcome
 * - every attempt carries a timeout; a caller abort stops further attempts
 */

import crypto from 'node:crypto';
import {
  AlertStatus,
  renderAlertMessage,
  type DispatchChannel,
  type DispatchRequest,
  type DispatchResult,
  type Metric,
  type RejectionReason,
  type TargetDelivery,
  type ThresholdBand,
} from '@gasguard/core';
import {
  targetsOf,
  type DeliveryAdapter,
  type DeliveryOutcome,
  type DeliveryRequest,
} from '@gasguard/messaging';
import type { Clock, Logger } from '../types.js';
import { MAX_MESSAGE_LENGTH, sanitizeMessage } from '../utils/sanitize.js';
import { DeliveryTimeoutError, calculateBackoffMs, raceAbort, sleep as defaultSleep } from '../utils/retry.js';
import type { AlertStateStore } from './alert-state-store.js';
import type { MulticastCharge, QuotaTracker } from './quota-tracker.js';
import type { RecipientDirectory } from './recipient-directory.js';
import type { ReplyTokenStore } from './reply-token-store.js';

export interface DeliveryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  timeoutMs: number;
  maxMulticastTargets: number;
}

export interface AlertRouting {
  channel: 'push' | 'multicast' | 'broadcast';
  targets: string[];
  /** Also notify every user the webhook has seen follow or message the bot */
  includeSubscribers: boolean;
}

export interface AlertTransition {
  metric: Metric;
  status: AlertStatus;
  value: number;
  observedAt: Date;
  band: ThresholdBand;
}

export interface DispatchOptions {
  /** Aborted when the caller goes away; stops further attempts */
  signal?: AbortSignal;
}

export interface DispatchGatewayDeps {
  adapter: DeliveryAdapter;
  quota: QuotaTracker;
  replyTokens: ReplyTokenStore;
  alertStates: AlertStateStore;
  recipients: RecipientDirectory;
  policy: DeliveryPolicy;
  routing: AlertRouting;
  multicastCharge: MulticastCharge;
  log: Logger;
  now?: Clock;
  sleep?: (ms: number) => Promise<void>;
}

type Admission =
  | { ok: true; request: DispatchRequest; targets: string[] }
  | { ok: false; reason: RejectionReason; detail: string };

function reject(channel: DispatchChannel, reason: RejectionReason, detail: string): DispatchResult {
  return { accepted: false, channel, reason, detail, deliveries: [] };
}

export class DispatchGateway {
  private readonly adapter: DeliveryAdapter;
  private readonly quota: QuotaTracker;
  private readonly replyTokens: ReplyTokenStore;
  private readonly alertStates: AlertStateStore;
  private readonly recipients: RecipientDirectory;
  private readonly policy: DeliveryPolicy;
  private readonly routing: AlertRouting;
  private readonly multicastCharge: MulticastCharge;
  private readonly log: Logger;
  private readonly now: Clock;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(deps: DispatchGatewayDeps) {
    this.adapter = deps.adapter;
    this.quota = deps.quota;
    this.replyTokens = deps.replyTokens;
    this.alertStates = deps.alertStates;
    this.recipients = deps.recipients;
    this.policy = deps.policy;
    this.routing = deps.routing;
    this.multicastCharge = deps.multicastCharge;
    this.log = deps.log;
    this.now = deps.now ?? (() => new Date());
    this.sleep = deps.sleep ?? defaultSleep;
  }

  // ==========================================================================
  // Explicit dispatch
  // ==========================================================================

  async dispatch(request: DispatchRequest, options: DispatchOptions = {}): Promise<DispatchResult> {
    const admission = this.admit(request);
    if (!admission.ok) {
      this.log.info({ channel: request.channel, reason: admission.reason, detail: admission.detail }, 'Dispatch rejected');
      return reject(request.channel, admission.reason, admission.detail);
    }

    const admitted = admission.request;
    const deliveryRequest: DeliveryRequest = {
      channel: admitted.channel,
      targets: admission.targets,
      message: admitted.message,
      retryKey: crypto.randomUUID(),
    };

    const retries = admitted.channel === 'push' || admitted.channel === 'multicast';
    const deliveries = await this.deliver(deliveryRequest, retries ? this.policy.maxAttempts : 1, options.signal);
    const delivered = deliveries.filter((d) => d.status === 'DELIVERED').length;

    if (delivered === 0) {
      const detail = deliveries.find((d) => d.error)?.error ?? 'No target was delivered';
      this.log.error({ channel: admitted.channel, deliveries }, 'Delivery failed');
      return { accepted: false, channel: admitted.channel, reason: 'DELIVERY_FAILED', detail, deliveries };
    }

    if (delivered < deliveries.length) {
      this.log.warn(
        { channel: admitted.channel, delivered, failed: deliveries.length - delivered },
        'Partial delivery',
      );
    } else {
      this.log.info({ channel: admitted.channel, delivered }, 'Dispatch delivered');
    }

    return { accepted: true, channel: admitted.channel, deliveries };
  }

  /**
   * Validation, reply token and quota checks. Synchronous on purpose: the
   * token is consumed and the quota charged in the same turn of the event
   * loop that decided the request may proceed.
   */
  private admit(request: DispatchRequest): Admission {
    const message = sanitizeMessage(request.message);
    if (!message) {
      return { ok: false, reason: 'INVALID_REQUEST', detail: 'message is required' };
    }
    if (message.length > MAX_MESSAGE_LENGTH) {
      return { ok: false, reason: 'INVALID_REQUEST', detail: `message exceeds ${MAX_MESSAGE_LENGTH} characters` };
    }

    let normalized: DispatchRequest;
    let targets: string[];
    let units = 1;

    switch (request.channel) {
      case 'push': {
        const target = request.target.trim();
        if (!target) return { ok: false, reason: 'INVALID_REQUEST', detail: 'target is required' };
        normalized = { channel: 'push', target, message };
        targets = [target];
        break;
      }
      case 'multicast': {
        const unique = [...new Set(request.targets.map((t) => t.trim()).filter((t) => t.length > 0))];
        if (unique.length === 0) {
          return { ok: false, reason: 'INVALID_REQUEST', detail: 'targets must not be empty' };
        }
        if (unique.length > this.policy.maxMulticastTargets) {
          return {
            ok: false,
            reason: 'INVALID_REQUEST',
            detail: `multicast is limited to ${this.policy.maxMulticastTargets} targets`,
          };
        }
        normalized = { channel: 'multicast', targets: unique, message };
        targets = unique;
        if (this.multicastCharge === 'per-target') units = unique.length;
        break;
      }
      case 'broadcast':
        normalized = { channel: 'broadcast', message };
        targets = [];
        break;
      case 'reply': {
        const token = request.token.trim();
        if (!token) return { ok: false, reason: 'INVALID_REQUEST', detail: 'token is required' };
        const check = this.replyTokens.inspect(token);
        if (!check.ok) return { ok: false, reason: 'INVALID_TOKEN', detail: check.reason };
        normalized = { channel: 'reply', token, message };
        targets = [token];
        break;
      }
    }

    const reservation = this.quota.reserve(request.channel, units);
    if (!reservation.ok) {
      return {
        ok: false,
        reason: 'QUOTA_EXCEEDED',
        detail: `${request.channel} quota of ${reservation.limit} reached until ${reservation.resetAt.toISOString()}`,
      };
    }

    if (normalized.channel === 'reply') {
      const consumed = this.replyTokens.consume(normalized.token);
      if (!consumed.ok) return { ok: false, reason: 'INVALID_TOKEN', detail: consumed.reason };
    }

    return { ok: true, request: normalized, targets };
  }

  // ==========================================================================
  // Delivery
  // ==========================================================================

  private async deliver(request: DeliveryRequest, maxAttempts: number, signal?: AbortSignal): Promise<TargetDelivery[]> {
    const allTargets = targetsOf(request);
    const results = new Map<string, TargetDelivery>(
      allTargets.map((target) => [target, { target, status: 'CANCELLED', attempts: 0 }]),
    );

    let pending = allTargets;

    for (let attempt = 1; attempt <= maxAttempts && pending.length > 0; attempt++) {
      if (attempt > 1) {
        const delay = calculateBackoffMs(attempt - 1, this.policy);
        this.log.warn({ channel: request.channel, attempt, delay, pending: pending.length }, 'Retrying delivery');
        await this.sleep(delay);
      }
      if (signal?.aborted) {
        this.log.warn({ channel: request.channel, attempt }, 'Dispatch cancelled by caller');
        break;
      }

      const targets = request.channel === 'broadcast' ? [] : pending;
      const outcomes = await this.attempt({ ...request, targets }, signal);
      const retryable: string[] = [];

      for (const target of pending) {
        const outcome = outcomes.find((o) => o.target === target);
        const attempts = (results.get(target)?.attempts ?? 0) + 1;

        if (outcome?.ok) {
          results.set(target, { target, status: 'DELIVERED', attempts });
          continue;
        }

        const error = outcome?.error ?? 'No delivery result for target';
        results.set(target, { target, status: 'FAILED', attempts, error });
        if (outcome?.retryable) retryable.push(target);
      }

      pending = retryable;
    }

    return allTargets.map((target) => results.get(target) ?? { target, status: 'CANCELLED', attempts: 0 });
  }

  /** One adapter call, bounded by the delivery timeout. Never throws. */
  private async attempt(request: DeliveryRequest, callerSignal?: AbortSignal): Promise<DeliveryOutcome[]> {
    const timeout = AbortSignal.timeout(this.policy.timeoutMs);
    const signal = callerSignal ? AbortSignal.any([timeout, callerSignal]) : timeout;
    const targets = targetsOf(request);

    try {
      const result = await raceAbort(this.adapter.deliver(request, signal), signal);
      return result.outcomes;
    } catch (err: unknown) {
      const error = timeout.aborted
        ? new DeliveryTimeoutError(this.policy.timeoutMs).message
        : err instanceof Error
          ? err.message
          : String(err);
      this.log.warn({ channel: request.channel, adapter: this.adapter.name, error }, 'Delivery attempt failed');
      // Retry only when the failure is ours (timeout, thrown error), not the caller leaving
      const retryable = !callerSignal?.aborted;
      return targets.map((target) => ({ target, ok: false, retryable, error }));
    }
  }

  // ==========================================================================
  // Alert dispatch
  // ==========================================================================

  /**
   * Notify recipients of a committed alert transition. Push routing fans out
   * one request per target; multicast routing sends one request per
   * `maxMulticastTargets` recipients. A RESOLVED state is collected (back to
   * NORMAL) once its notification has been attempted.
   */
  async dispatchAlert(transition: AlertTransition): Promise<DispatchResult[]> {
    const message = renderAlertMessage(transition.metric, transition.status, transition.value, transition.band);
    if (!message) return [];

    const requests = this.alertRequests(message);
    const results: DispatchResult[] = [];
    for (const request of requests) {
      results.push(await this.dispatch(request));
    }

    const accepted = results.filter((r) => r.accepted).length;
    if (accepted > 0) {
      this.alertStates.markNotified(transition.metric, this.now());
    }
    if (transition.status === AlertStatus.RESOLVED) {
      this.alertStates.collectResolved(transition.metric);
    }

    const summary = {
      metric: transition.metric,
      status: transition.status,
      value: transition.value,
      accepted,
      requests: results.length,
      reasons: results.flatMap((r) => (r.reason ? [r.reason] : [])),
    };
    if (accepted === 0) {
      this.log.error(summary, 'Alert notification reached no recipient');
    } else {
      this.log.info(summary, 'Alert notification dispatched');
    }

    return results;
  }

  private alertRequests(message: string): DispatchRequest[] {
    if (this.routing.channel === 'broadcast') return [{ channel: 'broadcast', message }];

    const targets = this.alertTargets();
    if (this.routing.channel === 'push') {
      return targets.map((target): DispatchRequest => ({ channel: 'push', target, message }));
    }

    const size = Math.max(1, this.policy.maxMulticastTargets);
    const requests: DispatchRequest[] = [];
    for (let i = 0; i < targets.length; i += size) {
      requests.push({ channel: 'multicast', targets: targets.slice(i, i + size), message });
    }
    return requests;
  }

  private alertTargets(): string[] {
    const targets = new Set(this.routing.targets);
    if (this.routing.includeSubscribers) {
      for (const id of this.recipients.ids()) targets.add(id);
    }
    return [...targets];
  }
}
