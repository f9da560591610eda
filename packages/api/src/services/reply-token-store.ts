import crypto from 'node:crypto';
import type { ReplyToken, TokenRejection } from '@gasguard/core';
import type { Clock } from '../types.js';

export interface TokenSource {
  /** Token id supplied by the inbound event; generated when absent */
  replyToken?: string;
  userId?: string;
}

export type TokenCheck = { ok: true; token: ReplyToken } | { ok: false; reason: TokenRejection };

/**
 * Short-lived single-use reply tokens. consume() is the only place that
 * sets `consumed`. Expired entries keep answering EXPIRED until sweep()
 * drops them.
 */
export class ReplyTokenStore {
  private tokens = new Map<string, ReplyToken>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: Clock = () => new Date(),
  ) {}

  issue(source: TokenSource = {}): ReplyToken {
    const tokenId = source.replyToken ?? crypto.randomUUID();

    // Webhook redelivery must not reset an existing token
    const existing = this.tokens.get(tokenId);
    if (existing) return { ...existing };

    const issuedAt = this.now();
    const token: ReplyToken = {
      tokenId,
      issuedAt,
      expiresAt: new Date(issuedAt.getTime() + this.ttlMs),
      consumed: false,
      ...(source.userId ? { userId: source.userId } : {}),
    };
    this.tokens.set(tokenId, token);
    return { ...token };
  }

  /** Same checks as consume() without marking the token */
  inspect(tokenId: string): TokenCheck {
    const token = this.tokens.get(tokenId);
    if (!token) return { ok: false, reason: 'NOT_FOUND' };
    if (token.consumed) return { ok: false, reason: 'ALREADY_CONSUMED' };
    if (this.now().getTime() >= token.expiresAt.getTime()) return { ok: false, reason: 'EXPIRED' };
    return { ok: true, token: { ...token } };
  }

  consume(tokenId: string): TokenCheck {
    const check = this.inspect(tokenId);
    if (!check.ok) return check;

    const token = this.tokens.get(tokenId);
    if (!token) return { ok: false, reason: 'NOT_FOUND' };
    token.consumed = true;
    return { ok: true, token: { ...token } };
  }

  /** Drop expired tokens. Returns how many were removed. */
  sweep(): number {
    const now = this.now().getTime();
    let removed = 0;
    for (const [tokenId, token] of this.tokens) {
      if (now >= token.expiresAt.getTime()) {
        this.tokens.delete(tokenId);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.tokens.size;
  }
}
