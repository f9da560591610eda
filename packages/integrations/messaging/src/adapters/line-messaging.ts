/**
 * LINE Messaging API adapter
 *
 * Sends text messages through the LINE bot message endpoints
 * (push, multicast, broadcast, reply). Authenticates with the channel
 * access token as a bearer token. Multicast is a single API call, so
 * every target of one request shares the same outcome.
 */

import {
  targetsOf,
  type DeliveryAdapter,
  type DeliveryOutcome,
  type DeliveryRequest,
  type DeliveryResult,
} from '../types.js';

export interface LineMessagingConfig {
  channelAccessToken: string;
  /** Default: https://api.line.me/v2/bot/message */
  apiUrl?: string;
  /** Per-call timeout when the caller passes no signal. Default: 10000 */
  timeoutMs?: number;
}

export class LineApiError extends Error {
  public readonly statusCode?: number;
  public readonly isTimeout: boolean;

  constructor(message: string, statusCode?: number, isTimeout = false) {
    super(message);
    this.name = 'LineApiError';
    this.statusCode = statusCode;
    this.isTimeout = isTimeout;
  }

  /** Server errors, throttling, timeouts and network failures are worth retrying */
  get retryable(): boolean {
    if (this.statusCode === undefined) return true;
    return this.statusCode === 429 || this.statusCode >= 500;
  }
}

interface TextMessage {
  type: 'text';
  text: string;
}

type LineRequestBody =
  | { to: string; messages: TextMessage[] }
  | { to: string[]; messages: TextMessage[] }
  | { replyToken: string; messages: TextMessage[] }
  | { messages: TextMessage[] };

export class LineMessagingAdapter implements DeliveryAdapter {
  name = 'LINE Messaging API';

  private readonly apiUrl: string;
  private readonly channelAccessToken: string;
  private readonly timeoutMs: number;

  constructor(config: LineMessagingConfig) {
    this.apiUrl = (config.apiUrl ?? 'https://api.line.me/v2/bot/message').replace(/\/+$/, '');
    this.channelAccessToken = config.channelAccessToken;
    this.timeoutMs = config.timeoutMs ?? 10000;
  }

  async deliver(request: DeliveryRequest, signal?: AbortSignal): Promise<DeliveryResult> {
    const targets = targetsOf(request);

    try {
      await this.post(request, signal);
      return { outcomes: targets.map((target) => ({ target, ok: true, retryable: false })) };
    } catch (err: unknown) {
      const outcome = (target: string): DeliveryOutcome =>
        err instanceof LineApiError
          ? { target, ok: false, retryable: err.retryable, error: err.message }
          : { target, ok: false, retryable: true, error: err instanceof Error ? err.message : String(err) };
      return { outcomes: targets.map(outcome) };
    }
  }

  private buildBody(request: DeliveryRequest): LineRequestBody {
    const messages: TextMessage[] = [{ type: 'text', text: request.message }];

    switch (request.channel) {
      case 'push':
        return { to: request.targets[0] ?? '', messages };
      case 'multicast':
        return { to: request.targets, messages };
      case 'reply':
        return { replyToken: request.targets[0] ?? '', messages };
      case 'broadcast':
        return { messages };
    }
  }

  private async post(request: DeliveryRequest, signal?: AbortSignal): Promise<void> {
    const path = `/${request.channel}`;
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Authorization: `Bearer ${this.channelAccessToken}`,
    };

    // Reply requests do not accept a retry key
    if (request.retryKey && request.channel !== 'reply') {
      headers['X-Line-Retry-Key'] = request.retryKey;
    }

    let response: Response;
    try {
      response = await fetch(`${this.apiUrl}${path}`, {
        method: 'POST',
        headers,
        body: JSON.stringify(this.buildBody(request)),
        signal: signal ?? AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err: unknown) {
      if (err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')) {
        throw new LineApiError(`Request aborted: POST ${path}`, undefined, true);
      }
      throw new LineApiError(`Network error: ${err instanceof Error ? err.message : String(err)}`);
    }

    // A 409 on a retried request means LINE already accepted the original
    if (response.status === 409 && request.retryKey) {
      return;
    }

    if (!response.ok) {
      let errorBody = '';
      try {
        errorBody = await response.text();
      } catch {
        // body is only used for the error message
      }
      throw new LineApiError(`HTTP ${response.status}: ${errorBody || response.statusText}`, response.status);
    }
  }
}
