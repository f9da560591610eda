import fp from 'fastify-plugin';
import type { DeliveryAdapter } from '@gasguard/messaging';
import type { AppConfig } from '../config.js';
import { AlertStateStore } from '../services/alert-state-store.js';
import { createDeliveryAdapter } from '../services/delivery.js';
import { DispatchGateway } from '../services/dispatch-gateway.js';
import { QuotaTracker } from '../services/quota-tracker.js';
import { RecipientDirectory } from '../services/recipient-directory.js';
import { ReplyTokenStore } from '../services/reply-token-store.js';
import type { Clock } from '../types.js';

export interface GatewayPluginOptions {
  config: AppConfig;
  /** Overrides the adapter chosen by MESSAGING_ADAPTER */
  adapter?: DeliveryAdapter;
  clock?: Clock;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * In-memory stores and the Dispatch Gateway, decorated onto the instance.
 * Expired reply tokens are swept on an interval for the life of the server.
 */
export default fp<GatewayPluginOptions>(async (fastify, opts) => {
  const { config } = opts;
  const now: Clock = opts.clock ?? (() => new Date());
  const adapter = opts.adapter ?? createDeliveryAdapter(config);

  const alertStates = new AlertStateStore(now);
  const quota = new QuotaTracker(config.quota.rules, now);
  const replyTokens = new ReplyTokenStore(config.replyTokens.ttlMs, now);
  const recipients = new RecipientDirectory(now);

  const gateway = new DispatchGateway({
    adapter,
    quota,
    replyTokens,
    alertStates,
    recipients,
    policy: config.delivery,
    routing: config.alertRouting,
    multicastCharge: config.quota.multicastCharge,
    log: fastify.log.child({ component: 'dispatch-gateway' }),
    now,
    sleep: opts.sleep,
  });

  fastify.decorate('alertStates', alertStates);
  fastify.decorate('quota', quota);
  fastify.decorate('replyTokens', replyTokens);
  fastify.decorate('recipients', recipients);
  fastify.decorate('gateway', gateway);

  fastify.log.info({ adapter: adapter.name, alertChannel: config.alertRouting.channel }, 'Dispatch gateway ready');

  let sweeper: NodeJS.Timeout | null = null;
  if (config.replyTokens.sweepIntervalMs > 0) {
    sweeper = setInterval(() => {
      const removed = replyTokens.sweep();
      if (removed > 0) fastify.log.debug({ removed }, 'Swept expired reply tokens');
    }, config.replyTokens.sweepIntervalMs);
    sweeper.unref();
  }

  fastify.addHook('onClose', async () => {
    if (sweeper) clearInterval(sweeper);
  });
}, { name: 'gateway' });
