import type { Clock } from '../types.js';

export interface Recipient {
  userId: string;
  firstSeenAt: Date;
  lastSeenAt: Date;
}

/** User ids learned from inbound webhook events (follow / message / unfollow) */
export class RecipientDirectory {
  private recipients = new Map<string, Recipient>();

  constructor(private readonly now: Clock = () => new Date()) {}

  add(userId: string): Recipient {
    const at = this.now();
    const existing = this.recipients.get(userId);
    const recipient: Recipient = existing ? { ...existing, lastSeenAt: at } : { userId, firstSeenAt: at, lastSeenAt: at };
    this.recipients.set(userId, recipient);
    return { ...recipient };
  }

  remove(userId: string): boolean {
    return this.recipients.delete(userId);
  }

  ids(): string[] {
    return [...this.recipients.keys()];
  }

  list(): Recipient[] {
    return [...this.recipients.values()].map((r) => ({ ...r }));
  }
}
