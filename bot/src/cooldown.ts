import { findRecord, listRecords } from "./dataStore";
import type { DataStore } from "./dataStore";
import type { ChatId, Clock, CooldownTable, MessageTable, SendDecision, UserId } from "./types";

export const HOUR_MS = 60 * 60 * 1000;

/** Cooldown hours for a user: the override when one exists, otherwise the default. 0 means unlimited. */
export const resolveCooldownHours = (
  overrides: CooldownTable,
  chatId: ChatId,
  userId: UserId,
  defaultHours: number,
): number => overrides[String(chatId)]?.[String(userId)] ?? defaultHours;

export const evaluateCooldown = (lastSentAt: number | undefined, hours: number, now: number): SendDecision => {
  if (lastSentAt === undefined || hours === 0) return { allowed: true };
  const elapsed = now - lastSentAt;
  const cooldownMs = hours * HOUR_MS;
  if (elapsed >= cooldownMs) return { allowed: true };
  return { allowed: false, remainingMs: cooldownMs - elapsed };
};

const localDayKey = (ms: number) => {
  const date = new Date(ms);
  return `${date.getFullYear()}-${date.getMonth() + 1}-${date.getDate()}`;
};

export class CooldownEvaluator {
  constructor(
    private readonly store: DataStore,
    readonly defaultHours: number,
    private readonly now: Clock = Date.now,
  ) {}

  async effectiveCooldown(chatId: ChatId, userId: UserId): Promise<number> {
    const overrides = await this.store.fetchCooldownOverrides();
    return resolveCooldownHours(overrides, chatId, userId, this.defaultHours);
  }

  async canSend(chatId: ChatId, userId: UserId, records: MessageTable): Promise<SendDecision> {
    const record = findRecord(records, chatId, userId);
    if (!record) return { allowed: true };
    const hours = await this.effectiveCooldown(chatId, userId);
    return evaluateCooldown(record.lastSentAt, hours, this.now());
  }

  /** Drops the chat's records whose owner's own cooldown has elapsed. Overrides are re-read on every call. */
  async pruneExpired(records: MessageTable, chatId: ChatId): Promise<MessageTable> {
    const chatKey = String(chatId);
    const users = records[chatKey];
    if (!users) return records;

    const overrides = await this.store.fetchCooldownOverrides();
    const now = this.now();
    const kept: Record<string, string> = {};
    for (const record of listRecords(records, chatId)) {
      const hours = resolveCooldownHours(overrides, chatId, record.userId, this.defaultHours);
      if (hours > 0 && now - record.lastSentAt < hours * HOUR_MS) {
        kept[String(record.userId)] = users[String(record.userId)];
      }
    }

    const next = { ...records };
    if (Object.keys(kept).length) next[chatKey] = kept;
    else delete next[chatKey];
    return next;
  }

  /** Users holding more than one record dated today, across all chats. */
  duplicateSendersToday(records: MessageTable): UserId[] {
    const today = localDayKey(this.now());
    const seen = new Set<UserId>();
    const duplicates = new Set<UserId>();
    for (const record of listRecords(records)) {
      if (localDayKey(record.lastSentAt) !== today) continue;
      if (seen.has(record.userId)) duplicates.add(record.userId);
      else seen.add(record.userId);
    }
    return [...duplicates].sort((a, b) => a - b);
  }
}
