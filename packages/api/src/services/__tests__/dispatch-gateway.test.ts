import { describe, it, expect, beforeEach, vi } from 'vitest';
import { AlertStatus, type ThresholdBand } from '@gasguard/core';
import { AlertStateStore } from '../alert-state-store.js';
import { DispatchGateway, type AlertRouting, type DeliveryPolicy } from '../dispatch-gateway.js';
import { QuotaTracker, type MulticastCharge, type QuotaRules } from '../quota-tracker.js';
import { RecipientDirectory } from '../recipient-directory.js';
import { ReplyTokenStore } from '../reply-token-store.js';
import { FakeDeliveryAdapter, ManualClock, silentLogger } from '../../__tests__/helpers.js';

const GAS_BAND: ThresholdBand = { triggerHigh: 80, clearLow: 20, unit: '' };

interface SetupOptions {
  policy?: Partial<DeliveryPolicy>;
  routing?: Partial<AlertRouting>;
  rules?: Partial<QuotaRules>;
  multicastCharge?: MulticastCharge;
  onSleep?: (ms: number) => void;
}

function setup(options: SetupOptions = {}) {
  const clock = new ManualClock('2026-03-10T08:00:00.000Z');
  const adapter = new FakeDeliveryAdapter();
  const quota = new QuotaTracker(
    {
      push: { limit: 100, period: 'month' },
      broadcast: { limit: 100, period: 'month' },
      multicast: { limit: 100, period: 'month' },
      reply: { limit: 0, period: 'month' },
      ...options.rules,
    },
    clock.now,
  );
  const replyTokens = new ReplyTokenStore(60_000, clock.now);
  const alertStates = new AlertStateStore(clock.now);
  const recipients = new RecipientDirectory(clock.now);
  const sleeps: number[] = [];
  const log = silentLogger();

  const gateway = new DispatchGateway({
    adapter,
    quota,
    replyTokens,
    alertStates,
    recipients,
    policy: { maxAttempts: 3, baseDelayMs: 500, maxDelayMs: 8000, timeoutMs: 1000, maxMulticastTargets: 500, ...options.policy },
    routing: { channel: 'broadcast', targets: [], includeSubscribers: false, ...options.routing },
    multicastCharge: options.multicastCharge ?? 'per-call',
    log,
    now: clock.now,
    sleep: async (ms) => {
      sleeps.push(ms);
      options.onSleep?.(ms);
    },
  });

  const used = (channel: 'push' | 'broadcast' | 'multicast' | 'reply') =>
    quota.snapshot().find((c) => c.channel === channel)?.count;

  return { clock, adapter, quota, replyTokens, alertStates, recipients, gateway, log, sleeps, used };
}

describe('DispatchGateway', () => {
  // ==========================================================================
  // Validation
  // ==========================================================================

  describe('validation', () => {
    it('delivers a push and reports the target', async () => {
      const { gateway, adapter } = setup();

      const result = await gateway.dispatch({ channel: 'push', target: 'U1', message: 'hello' });

      expect(result).toEqual({
        accepted: true,
        channel: 'push',
        deliveries: [{ target: 'U1', status: 'DELIVERED', attempts: 1 }],
      });
      expect(adapter.calls).toHaveLength(1);
      expect(adapter.calls[0]).toMatchObject({ channel: 'push', targets: ['U1'], message: 'hello' });
      expect(typeof adapter.calls[0]?.retryKey).toBe('string');
    });

    it('sends the sanitized message', async () => {
      const { gateway, adapter } = setup();
      await gateway.dispatch({ channel: 'push', target: ' U1 ', message: '  line\r\nnext\u0007  ' });

      expect(adapter.calls[0]?.message).toBe('line\nnext');
      expect(adapter.calls[0]?.targets).toEqual(['U1']);
    });

    it('rejects an empty message without charging quota', async () => {
      const { gateway, adapter, used } = setup();

      const result = await gateway.dispatch({ channel: 'push', target: 'U1', message: '   ' });

      expect(result).toEqual({
        accepted: false,
        channel: 'push',
        reason: 'INVALID_REQUEST',
        detail: 'message is required',
        deliveries: [],
      });
      expect(adapter.calls).toHaveLength(0);
      expect(used('push')).toBe(0);
    });

    it('rejects a message over 5000 characters', async () => {
      const { gateway } = setup();
      const result = await gateway.dispatch({ channel: 'broadcast', message: 'x'.repeat(5001) });

      expect(result.reason).toBe('INVALID_REQUEST');
      expect(result.detail).toBe('message exceeds 5000 characters');
    });

    it('rejects a blank push target', async () => {
      const { gateway } = setup();
      const result = await gateway.dispatch({ channel: 'push', target: ' ', message: 'hi' });
      expect(result.detail).toBe('target is required');
    });

    it('de-duplicates multicast targets', async () => {
      const { gateway, adapter } = setup();
      await gateway.dispatch({ channel: 'multicast', targets: ['U1', 'U2', 'U1', ''], message: 'hi' });
      expect(adapter.calls[0]?.targets).toEqual(['U1', 'U2']);
    });

    it('rejects an empty multicast', async () => {
      const { gateway } = setup();
      const result = await gateway.dispatch({ channel: 'multicast', targets: [], message: 'hi' });
      expect(result.detail).toBe('targets must not be empty');
    });

    it('rejects a multicast over the target limit', async () => {
      const { gateway } = setup({ policy: { maxMulticastTargets: 2 } });
      const result = await gateway.dispatch({ channel: 'multicast', targets: ['U1', 'U2', 'U3'], message: 'hi' });
      expect(result).toMatchObject({ reason: 'INVALID_REQUEST', detail: 'multicast is limited to 2 targets' });
    });
  });

  // ==========================================================================
  // Delivery and retry
  // ==========================================================================

  describe('delivery', () => {
    it('accepts a multicast where only some targets fail', async () => {
      const { gateway, adapter } = setup();
      adapter.failTarget('U2', { retryable: false, error: 'HTTP 400: invalid user' });

      const result = await gateway.dispatch({ channel: 'multicast', targets: ['U1', 'U2', 'U3'], message: 'hi' });

      expect(result).toEqual({
        accepted: true,
        channel: 'multicast',
        deliveries: [
          { target: 'U1', status: 'DELIVERED', attempts: 1 },
          { target: 'U2', status: 'FAILED', attempts: 1, error: 'HTTP 400: invalid user' },
          { target: 'U3', status: 'DELIVERED', attempts: 1 },
        ],
      });
      expect(adapter.calls).toHaveLength(1);
    });

    it('retries retryable failures with exponential backoff and one retry key', async () => {
      const { gateway, adapter, sleeps } = setup();
      adapter.failTarget('U1', { times: 2 });

      const result = await gateway.dispatch({ channel: 'push', target: 'U1', message: 'hi' });

      expect(result.accepted).toBe(true);
      expect(result.deliveries).toEqual([{ target: 'U1', status: 'DELIVERED', attempts: 3 }]);
      expect(sleeps).toEqual([500, 1000]);
      expect(new Set(adapter.calls.map((c) => c.retryKey)).size).toBe(1);
    });

    it('retries only the targets that are still failing', async () => {
      const { gateway, adapter } = setup();
      adapter.failTarget('U2', { times: 1 });

      const result = await gateway.dispatch({ channel: 'multicast', targets: ['U1', 'U2'], message: 'hi' });

      expect(adapter.calls.map((c) => c.targets)).toEqual([['U1', 'U2'], ['U2']]);
      expect(result.deliveries).toEqual([
        { target: 'U1', status: 'DELIVERED', attempts: 1 },
        { target: 'U2', status: 'DELIVERED', attempts: 2 },
      ]);
    });

    it('stops at a non-retryable failure', async () => {
      const { gateway, adapter } = setup();
      adapter.failTarget('U1', { retryable: false, error: 'HTTP 403: forbidden' });

      const result = await gateway.dispatch({ channel: 'push', target: 'U1', message: 'hi' });

      expect(adapter.calls).toHaveLength(1);
      expect(result).toEqual({
        accepted: false,
        channel: 'push',
        reason: 'DELIVERY_FAILED',
        detail: 'HTTP 403: forbidden',
        deliveries: [{ target: 'U1', status: 'FAILED', attempts: 1, error: 'HTTP 403: forbidden' }],
      });
    });

    it('gives up after the maximum number of attempts', async () => {
      const { gateway, adapter } = setup({ policy: { maxAttempts: 3 } });
      adapter.failTarget('U1');

      const result = await gateway.dispatch({ channel: 'push', target: 'U1', message: 'hi' });

      expect(adapter.calls).toHaveLength(3);
      expect(result.reason).toBe('DELIVERY_FAILED');
      expect(result.deliveries[0]?.attempts).toBe(3);
    });

    it('does not retry a broadcast', async () => {
      const { gateway, adapter } = setup();
      adapter.failTarget('*', { error: 'HTTP 503: busy' });

      const result = await gateway.dispatch({ channel: 'broadcast', message: 'hi' });

      expect(adapter.calls).toHaveLength(1);
      expect(result.deliveries).toEqual([{ target: '*', status: 'FAILED', attempts: 1, error: 'HTTP 503: busy' }]);
      expect(result.reason).toBe('DELIVERY_FAILED');
    });

    it('sends a broadcast without targets and reports it as *', async () => {
      const { gateway, adapter } = setup();
      const result = await gateway.dispatch({ channel: 'broadcast', message: 'hi' });

      expect(adapter.calls[0]?.targets).toEqual([]);
      expect(result.deliveries).toEqual([{ target: '*', status: 'DELIVERED', attempts: 1 }]);
    });

    it('counts a hung adapter call as a timed out failure', async () => {
      const { gateway, adapter } = setup({ policy: { timeoutMs: 20, maxAttempts: 2 } });
      adapter.hang();

      const result = await gateway.dispatch({ channel: 'push', target: 'U1', message: 'hi' });

      expect(adapter.calls).toHaveLength(2);
      expect(result).toMatchObject({ accepted: false, reason: 'DELIVERY_FAILED', detail: 'Delivery timed out after 20ms' });
      expect(result.deliveries).toEqual([
        { target: 'U1', status: 'FAILED', attempts: 2, error: 'Delivery timed out after 20ms' },
      ]);
    });

    it('turns an adapter exception into a failed delivery', async () => {
      const { gateway, adapter } = setup({ policy: { maxAttempts: 1 } });
      adapter.explode();

      const result = await gateway.dispatch({ channel: 'push', target: 'U1', message: 'hi' });

      expect(result).toMatchObject({ accepted: false, reason: 'DELIVERY_FAILED', detail: 'adapter exploded' });
    });

    it('cancels delivery when the caller has already gone', async () => {
      const { gateway, adapter } = setup();
      const controller = new AbortController();
      controller.abort();

      const result = await gateway.dispatch({ channel: 'push', target: 'U1', message: 'hi' }, { signal: controller.signal });

      expect(adapter.calls).toHaveLength(0);
      expect(result.deliveries).toEqual([{ target: 'U1', status: 'CANCELLED', attempts: 0 }]);
      expect(result.detail).toBe('No target was delivered');
    });

    it('stops retrying once the caller aborts during backoff', async () => {
      const controller = new AbortController();
      const { gateway, adapter } = setup({ onSleep: () => controller.abort() });
      adapter.failTarget('U1');

      const result = await gateway.dispatch(
        { channel: 'push', target: 'U1', message: 'hi' },
        { signal: controller.signal },
      );

      expect(adapter.calls).toHaveLength(1);
      expect(result).toMatchObject({ accepted: false, reason: 'DELIVERY_FAILED', detail: 'HTTP 500: upstream unavailable' });
      expect(result.deliveries).toEqual([
        { target: 'U1', status: 'FAILED', attempts: 1, error: 'HTTP 500: upstream unavailable' },
      ]);
    });
  });

  // ==========================================================================
  // Quota
  // ==========================================================================

  describe('quota', () => {
    it('rejects once the channel quota is used up', async () => {
      const { gateway, adapter } = setup({ rules: { push: { limit: 1, period: 'month' } } });

      await gateway.dispatch({ channel: 'push', target: 'U1', message: 'one' });
      const second = await gateway.dispatch({ channel: 'push', target: 'U1', message: 'two' });

      expect(second).toEqual({
        accepted: false,
        channel: 'push',
        reason: 'QUOTA_EXCEEDED',
        detail: 'push quota of 1 reached until 2026-04-01T00:00:00.000Z',
        deliveries: [],
      });
      expect(adapter.calls).toHaveLength(1);
    });

    it('charges one unit per request regardless of retries', async () => {
      const { gateway, adapter, used } = setup();
      adapter.failTarget('U1', { times: 2 });

      await gateway.dispatch({ channel: 'push', target: 'U1', message: 'hi' });

      expect(used('push')).toBe(1);
    });

    it('charges a failed delivery', async () => {
      const { gateway, adapter, used } = setup();
      adapter.failTarget('U1', { retryable: false });

      await gateway.dispatch({ channel: 'push', target: 'U1', message: 'hi' });

      expect(used('push')).toBe(1);
    });

    it('charges multicast per call by default', async () => {
      const { gateway, used } = setup();
      await gateway.dispatch({ channel: 'multicast', targets: ['U1', 'U2', 'U3'], message: 'hi' });
      expect(used('multicast')).toBe(1);
    });

    it('charges multicast per target when configured, all or nothing', async () => {
      const { gateway, adapter, used } = setup({
        rules: { multicast: { limit: 5, period: 'month' } },
        multicastCharge: 'per-target',
      });

      const first = await gateway.dispatch({ channel: 'multicast', targets: ['U1', 'U2', 'U3'], message: 'hi' });
      const second = await gateway.dispatch({ channel: 'multicast', targets: ['U4', 'U5', 'U6'], message: 'hi' });

      expect(first.accepted).toBe(true);
      expect(second.reason).toBe('QUOTA_EXCEEDED');
      expect(used('multicast')).toBe(3);
      expect(adapter.calls).toHaveLength(1);
    });
  });

  // ==========================================================================
  // Reply tokens
  // ==========================================================================

  describe('reply', () => {
    it('replies with a fresh token and consumes it', async () => {
      const { gateway, adapter, replyTokens } = setup();
      replyTokens.issue({ replyToken: 'rt-1', userId: 'U1' });

      const result = await gateway.dispatch({ channel: 'reply', token: 'rt-1', message: 'pong' });

      expect(result.deliveries).toEqual([{ target: 'rt-1', status: 'DELIVERED', attempts: 1 }]);
      expect(adapter.calls[0]).toMatchObject({ channel: 'reply', targets: ['rt-1'] });
      expect(replyTokens.inspect('rt-1')).toEqual({ ok: false, reason: 'ALREADY_CONSUMED' });
    });

    it('rejects a second reply on the same token', async () => {
      const { gateway, replyTokens } = setup();
      replyTokens.issue({ replyToken: 'rt-1' });

      await gateway.dispatch({ channel: 'reply', token: 'rt-1', message: 'one' });
      const second = await gateway.dispatch({ channel: 'reply', token: 'rt-1', message: 'two' });

      expect(second).toEqual({
        accepted: false,
        channel: 'reply',
        reason: 'INVALID_TOKEN',
        detail: 'ALREADY_CONSUMED',
        deliveries: [],
      });
    });

    it('lets exactly one of two concurrent replies through', async () => {
      const { gateway, adapter, replyTokens } = setup();
      replyTokens.issue({ replyToken: 'rt-1' });

      const results = await Promise.all([
        gateway.dispatch({ channel: 'reply', token: 'rt-1', message: 'one' }),
        gateway.dispatch({ channel: 'reply', token: 'rt-1', message: 'two' }),
      ]);

      expect(results.map((r) => r.accepted)).toEqual([true, false]);
      expect(results[1]?.detail).toBe('ALREADY_CONSUMED');
      expect(adapter.calls).toHaveLength(1);
    });

    it('rejects an unknown token', async () => {
      const { gateway } = setup();
      const result = await gateway.dispatch({ channel: 'reply', token: 'nope', message: 'hi' });
      expect(result).toMatchObject({ reason: 'INVALID_TOKEN', detail: 'NOT_FOUND' });
    });

    it('rejects an expired token', async () => {
      const { gateway, replyTokens, clock } = setup();
      replyTokens.issue({ replyToken: 'rt-1' });
      clock.advance(60_000);

      const result = await gateway.dispatch({ channel: 'reply', token: 'rt-1', message: 'hi' });
      expect(result).toMatchObject({ reason: 'INVALID_TOKEN', detail: 'EXPIRED' });
    });

    it('keeps the token consumed when delivery fails', async () => {
      const { gateway, adapter, replyTokens } = setup();
      replyTokens.issue({ replyToken: 'rt-1' });
      adapter.failTarget('rt-1', { error: 'HTTP 500: boom' });

      const result = await gateway.dispatch({ channel: 'reply', token: 'rt-1', message: 'hi' });

      expect(result.reason).toBe('DELIVERY_FAILED');
      expect(adapter.calls).toHaveLength(1);
      expect(replyTokens.inspect('rt-1')).toEqual({ ok: false, reason: 'ALREADY_CONSUMED' });
    });

    it('does not consume the token when quota rejects the reply', async () => {
      const { gateway, replyTokens } = setup({ rules: { reply: { limit: 1, period: 'month' } } });
      replyTokens.issue({ replyToken: 'rt-1' });
      replyTokens.issue({ replyToken: 'rt-2' });

      await gateway.dispatch({ channel: 'reply', token: 'rt-1', message: 'one' });
      const second = await gateway.dispatch({ channel: 'reply', token: 'rt-2', message: 'two' });

      expect(second.reason).toBe('QUOTA_EXCEEDED');
      expect(replyTokens.inspect('rt-2').ok).toBe(true);
    });
  });

  // ==========================================================================
  // Alert notifications
  // ==========================================================================

  describe('dispatchAlert', () => {
    let ctx: ReturnType<typeof setup>;

    beforeEach(() => {
      ctx = setup();
    });

    it('broadcasts the rendered gas alert and marks the alert notified', async () => {
      const { gateway, adapter, alertStates } = ctx;
      alertStates.apply('gas', AlertStatus.TRIGGERED, { metric: 'gas', value: 85, observedAt: new Date('2026-03-10T07:59:00Z') });

      const results = await gateway.dispatchAlert({
        metric: 'gas',
        status: AlertStatus.TRIGGERED,
        value: 85,
        observedAt: new Date('2026-03-10T07:59:00Z'),
        band: GAS_BAND,
      });

      expect(results).toHaveLength(1);
      expect(adapter.calls[0]?.channel).toBe('broadcast');
      expect(adapter.messages[0]).toBe(
        'GAS ALERT!\n==============\nGas level exceeded!\nCurrent: 85\nThreshold: 80\n==============\nCheck environment immediately!',
      );
      expect(alertStates.get('gas').lastNotifiedAt).toEqual(new Date('2026-03-10T08:00:00.000Z'));
    });

    it('fans push alerts out to configured targets and subscribers', async () => {
      const { adapter, gateway, recipients } = setup({
        routing: { channel: 'push', targets: ['U1', 'U2'], includeSubscribers: true },
      });
      recipients.add('U3');
      recipients.add('U1');

      await gateway.dispatchAlert({
        metric: 'temperature',
        status: AlertStatus.TRIGGERED,
        value: 36,
        observedAt: new Date('2026-03-10T07:59:00Z'),
        band: { triggerHigh: 35, clearLow: 34, unit: 'C' },
      });

      expect(adapter.calls.map((c) => c.targets)).toEqual([['U1'], ['U2'], ['U3']]);
      expect(adapter.messages[0]?.split('\n')[3]).toBe('Current: 36C');
    });

    it('sends one multicast for multicast routing', async () => {
      const { adapter, gateway } = setup({ routing: { channel: 'multicast', targets: ['U1', 'U2'] } });

      await gateway.dispatchAlert({
        metric: 'humidity',
        status: AlertStatus.TRIGGERED,
        value: 85,
        observedAt: new Date('2026-03-10T07:59:00Z'),
        band: { triggerHigh: 80, clearLow: 70, unit: '%' },
      });

      expect(adapter.calls).toHaveLength(1);
      expect(adapter.calls[0]).toMatchObject({ channel: 'multicast', targets: ['U1', 'U2'] });
    });

    it('splits multicast alerts into batches of the target cap', async () => {
      const { adapter, gateway, alertStates } = setup({
        routing: { channel: 'multicast', targets: ['U1', 'U2', 'U3', 'U4', 'U5'] },
        policy: { maxMulticastTargets: 2 },
      });
      alertStates.apply('gas', AlertStatus.TRIGGERED, { metric: 'gas', value: 85, observedAt: new Date('2026-03-10T07:59:00Z') });

      const results = await gateway.dispatchAlert({
        metric: 'gas',
        status: AlertStatus.TRIGGERED,
        value: 85,
        observedAt: new Date('2026-03-10T07:59:00Z'),
        band: GAS_BAND,
      });

      expect(adapter.calls.map((c) => c.targets)).toEqual([['U1', 'U2'], ['U3', 'U4'], ['U5']]);
      expect(results.map((r) => r.accepted)).toEqual([true, true, true]);
      expect(alertStates.get('gas').lastNotifiedAt).toEqual(new Date('2026-03-10T08:00:00.000Z'));
    });

    it('reaches every subscriber past the multicast cap', async () => {
      const { adapter, gateway, recipients } = setup({
        routing: { channel: 'multicast', targets: [], includeSubscribers: true },
      });
      for (let i = 0; i < 501; i++) recipients.add(`U${i}`);

      const results = await gateway.dispatchAlert({
        metric: 'gas',
        status: AlertStatus.TRIGGERED,
        value: 85,
        observedAt: new Date('2026-03-10T07:59:00Z'),
        band: GAS_BAND,
      });

      expect(adapter.calls.map((c) => c.targets.length)).toEqual([500, 1]);
      expect(adapter.calls[1]?.targets).toEqual(['U500']);
      expect(results.every((r) => r.accepted)).toBe(true);
    });

    it('logs an error when an alert reaches nobody', async () => {
      const { adapter, gateway, log } = setup({ rules: { broadcast: { limit: 1, period: 'month' } } });
      const error = vi.spyOn(log, 'error');
      await gateway.dispatch({ channel: 'broadcast', message: 'spend the quota' });

      const results = await gateway.dispatchAlert({
        metric: 'gas',
        status: AlertStatus.TRIGGERED,
        value: 85,
        observedAt: new Date('2026-03-10T07:59:00Z'),
        band: GAS_BAND,
      });

      expect(results[0]).toMatchObject({ accepted: false, reason: 'QUOTA_EXCEEDED' });
      expect(adapter.calls).toHaveLength(1);
      expect(error).toHaveBeenCalledWith(
        expect.objectContaining({ metric: 'gas', accepted: 0, requests: 1, reasons: ['QUOTA_EXCEEDED'] }),
        'Alert notification reached no recipient',
      );
    });

    it('collects a resolved alert back to NORMAL', async () => {
      const { gateway, adapter, alertStates } = ctx;
      alertStates.apply('gas', AlertStatus.TRIGGERED, { metric: 'gas', value: 85, observedAt: new Date('2026-03-10T07:58:00Z') });
      alertStates.apply('gas', AlertStatus.RESOLVED, { metric: 'gas', value: 5, observedAt: new Date('2026-03-10T07:59:00Z') });

      await gateway.dispatchAlert({
        metric: 'gas',
        status: AlertStatus.RESOLVED,
        value: 5,
        observedAt: new Date('2026-03-10T07:59:00Z'),
        band: GAS_BAND,
      });

      expect(adapter.messages[0]).toBe('GAS ALERT CLEARED\n==============\nGas level is normal\nCurrent: 5\nClear level: 20');
      expect(alertStates.get('gas').status).toBe(AlertStatus.NORMAL);
    });

    it('leaves lastNotifiedAt unset when nothing was delivered', async () => {
      const { gateway, adapter, alertStates } = ctx;
      adapter.failTarget('*');
      alertStates.apply('gas', AlertStatus.TRIGGERED, { metric: 'gas', value: 85, observedAt: new Date('2026-03-10T07:59:00Z') });

      const results = await gateway.dispatchAlert({
        metric: 'gas',
        status: AlertStatus.TRIGGERED,
        value: 85,
        observedAt: new Date('2026-03-10T07:59:00Z'),
        band: GAS_BAND,
      });

      expect(results[0]?.accepted).toBe(false);
      expect(alertStates.get('gas').lastNotifiedAt).toBeNull();
    });

    it('sends nothing for a NORMAL status', async () => {
      const { gateway, adapter } = ctx;
      const results = await gateway.dispatchAlert({
        metric: 'gas',
        status: AlertStatus.NORMAL,
        value: 10,
        observedAt: new Date('2026-03-10T07:59:00Z'),
        band: GAS_BAND,
      });

      expect(results).toEqual([]);
      expect(adapter.calls).toHaveLength(0);
    });
  });
});
