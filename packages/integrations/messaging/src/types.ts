import type { DispatchChannel } from '@gasguard/core';

export interface DeliveryRequest {
  channel: DispatchChannel;
  /**
   * Recipient ids. Empty for broadcast; for reply the single entry is the
   * reply token.
   */
  targets: string[];
  message: string;
  /** Reused across retries of one request so the provider can de-duplicate */
  retryKey?: string;
}

export interface DeliveryOutcome {
  target: string;
  ok: boolean;
  retryable: boolean;
  error?: string;
}

export interface DeliveryResult {
  outcomes: DeliveryOutcome[];
}

export interface DeliveryAdapter {
  name: string;
  deliver(request: DeliveryRequest, signal?: AbortSignal): Promise<DeliveryResult>;
}

/** Target id reported for broadcast deliveries */
export const BROADCAST_TARGET = '*';

export function targetsOf(request: DeliveryRequest): string[] {
  return request.channel === 'broadcast' ? [BROADCAST_TARGET] : request.targets;
}
