import { ConsoleDeliveryAdapter, LineMessagingAdapter, type DeliveryAdapter } from '@gasguard/messaging';
import type { AppConfig } from '../config.js';
import { ConfigError } from '../errors.js';

/** Messaging adapter selected by MESSAGING_ADAPTER */
export function createDeliveryAdapter(config: AppConfig): DeliveryAdapter {
  const { messaging, delivery } = config;

  switch (messaging.adapter) {
    case 'line': {
      const { channelAccessToken, apiUrl } = messaging.line;
      if (!channelAccessToken) {
        throw new ConfigError('LINE_CHANNEL_ACCESS_TOKEN is required when MESSAGING_ADAPTER=line', 'LINE_CHANNEL_ACCESS_TOKEN');
      }
      return new LineMessagingAdapter({ channelAccessToken, apiUrl, timeoutMs: delivery.timeoutMs });
    }
    case 'console':
      return new ConsoleDeliveryAdapter();
  }
}
