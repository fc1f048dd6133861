import type { ChatId, UserId } from "./types";

const throttleKey = (chatId: ChatId, userId: UserId) => `${chatId}:${userId}`;

/**
 * Remembers when each user was last warned so rapid repeat offenders get one warning per
 * window. In-memory only; a restart forgets everything.
 */
export class WarningThrottle {
  private lastWarned = new Map<string, number>();

  constructor(readonly windowMs: number) {}

  shouldWarn(chatId: ChatId, userId: UserId, now: number, windowMs = this.windowMs): boolean {
    const prev = this.lastWarned.get(throttleKey(chatId, userId));
    return prev === undefined || now - prev >= windowMs;
  }

  markWarned(chatId: ChatId, userId: UserId, now: number): void {
    this.prune(now);
    this.lastWarned.set(throttleKey(chatId, userId), now);
  }

  prune(now: number): void {
    for (const [key, at] of this.lastWarned) {
      if (now - at >= this.windowMs) this.lastWarned.delete(key);
    }
  }

  get size(): number {
    return this.lastWarned.size;
  }

  reset(): void {
    this.lastWarned.clear();
  }
}
