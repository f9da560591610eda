/**
 * Inbound messaging webhook: payload parsing and event handling.
 *
 * The whole payload is parsed before any event is handled, so a malformed
 * event rejects the request without issuing tokens or touching the
 * recipient directory.
 */

import { AlertStatus, formatMeasurement, type AlertState, type DispatchResult, type ThresholdConfig } from '@gasguard/core';
import { MalformedInputError } from '../errors.js';
import type { Logger } from '../types.js';
import { isRecord, optionalString } from '../utils/payload.js';
import type { AlertStateStore } from './alert-state-store.js';
import type { DispatchGateway } from './dispatch-gateway.js';
import type { RecipientDirectory } from './recipient-directory.js';
import type { ReplyTokenStore } from './reply-token-store.js';

export type WebhookEvent =
  | { type: 'message'; replyToken?: string; userId?: string; messageType: string; text?: string }
  | { type: 'follow'; replyToken?: string; userId?: string }
  | { type: 'unfollow'; userId?: string }
  | { type: 'unsupported'; eventType: string };

export interface WebhookPayload {
  destination?: string;
  events: WebhookEvent[];
}

export interface WebhookSummary {
  processed: number;
  tokensIssued: number;
  replies: DispatchResult[];
}

export interface WebhookHandlerDeps {
  replyTokens: ReplyTokenStore;
  recipients: RecipientDirectory;
  alertStates: AlertStateStore;
  gateway: DispatchGateway;
  thresholds: ThresholdConfig;
  autoReply: boolean;
  log: Logger;
}

function optionalField(record: Record<string, unknown>, key: string, where: string): string | undefined {
  const value = record[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') throw new MalformedInputError(`${where}.${key} must be a string`);
  return value;
}

function parseEvent(raw: unknown, index: number): WebhookEvent {
  const where = `events[${index}]`;
  if (!isRecord(raw)) throw new MalformedInputError(`${where} must be an object`);

  const type = optionalString(raw, 'type');
  if (!type) throw new MalformedInputError(`${where}.type is required`);

  let userId: string | undefined;
  if (raw.source !== undefined) {
    if (!isRecord(raw.source)) throw new MalformedInputError(`${where}.source must be an object`);
    userId = optionalField(raw.source, 'userId', `${where}.source`);
  }

  switch (type) {
    case 'message': {
      if (!isRecord(raw.message)) throw new MalformedInputError(`${where}.message must be an object`);
      const messageType = optionalString(raw.message, 'type');
      if (!messageType) throw new MalformedInputError(`${where}.message.type is required`);
      return {
        type: 'message',
        replyToken: optionalField(raw, 'replyToken', where),
        userId,
        messageType,
        text: optionalField(raw.message, 'text', `${where}.message`),
      };
    }
    case 'follow':
      return { type: 'follow', replyToken: optionalField(raw, 'replyToken', where), userId };
    case 'unfollow':
      return { type: 'unfollow', userId };
    default:
      return { type: 'unsupported', eventType: type };
  }
}

export function parseWebhookPayload(body: unknown): WebhookPayload {
  if (!isRecord(body)) throw new MalformedInputError('Webhook body must be a JSON object');
  if (!Array.isArray(body.events)) throw new MalformedInputError('events must be an array');

  return {
    destination: optionalField(body, 'destination', 'body'),
    events: body.events.map((event: unknown, index: number) => parseEvent(event, index)),
  };
}

const STATUS_LABEL: Record<AlertStatus, string> = {
  [AlertStatus.NORMAL]: 'normal',
  [AlertStatus.TRIGGERED]: 'ALERT',
  [AlertStatus.RESOLVED]: 'cleared',
};

/** Reply text for the `status` command */
export function formatStatusSummary(states: AlertState[], thresholds: ThresholdConfig): string {
  const lines = states.map((state) => {
    const unit = thresholds[state.metric]?.unit ?? '';
    const value = state.lastValue === null ? 'no data' : formatMeasurement(state.lastValue, unit);
    return `${state.metric}: ${STATUS_LABEL[state.status]} (${value})`;
  });
  return ['SYSTEM STATUS', '==============', ...lines].join('\n');
}

export async function handleWebhookEvents(events: WebhookEvent[], deps: WebhookHandlerDeps): Promise<WebhookSummary> {
  const summary: WebhookSummary = { processed: 0, tokensIssued: 0, replies: [] };

  for (const event of events) {
    summary.processed++;

    switch (event.type) {
      case 'follow': {
        if (event.userId) deps.recipients.add(event.userId);
        deps.replyTokens.issue({ replyToken: event.replyToken, userId: event.userId });
        summary.tokensIssued++;
        deps.log.info({ userId: event.userId }, 'Follow event');
        break;
      }
      case 'unfollow': {
        if (event.userId) deps.recipients.remove(event.userId);
        deps.log.info({ userId: event.userId }, 'Unfollow event');
        break;
      }
      case 'message': {
        if (event.userId) deps.recipients.add(event.userId);
        const token = deps.replyTokens.issue({ replyToken: event.replyToken, userId: event.userId });
        summary.tokensIssued++;

        // A generated token id means nothing to the messaging API, so only a real one gets an answer
        if (deps.autoReply && event.replyToken === undefined) {
          deps.log.debug({ userId: event.userId }, 'Message event carried no reply token, not auto-replying');
        } else if (deps.autoReply && event.messageType === 'text' && event.text !== undefined) {
          const reply =
            event.text.trim().toLowerCase() === 'status'
              ? formatStatusSummary(deps.alertStates.list(), deps.thresholds)
              : `You said: ${event.text}`;
          const result = await deps.gateway.dispatch({ channel: 'reply', token: token.tokenId, message: reply });
          summary.replies.push(result);
        }
        break;
      }
      case 'unsupported':
        deps.log.debug({ eventType: event.eventType }, 'Ignoring unsupported webhook event');
        break;
    }
  }

  return summary;
}
