import logger from "./logger";
import { TTLCache } from "./cache";
import type { DataStore } from "./dataStore";
import type { ChatId, ChatPlatform, Clock, UserId } from "./types";

/** Telegram's GroupAnonymousBot, the sender shown for admins posting as the group. */
export const ANONYMOUS_ADMIN_ID = 1087968824;

export interface ExemptionQuery {
  chatId: ChatId;
  userId: UserId;
  senderChatId?: ChatId;
}

export interface ExemptionRule {
  name: string;
  matches(query: ExemptionQuery): boolean | Promise<boolean>;
}

export interface AdminResolverOptions {
  platform: ChatPlatform;
  store: DataStore;
  cacheTtlMs: number;
  now?: Clock;
}

export class AdminResolver {
  private readonly adminCache: TTLCache<UserId[]>;
  private readonly inflight = new Map<ChatId, Promise<UserId[] | null>>();
  private readonly platform: ChatPlatform;
  private readonly store: DataStore;

  /** Evaluated in order; the first match exempts the sender. */
  readonly rules: readonly ExemptionRule[] = [
    { name: "anonymous-sender", matches: ({ chatId, senderChatId }) => senderChatId === chatId },
    { name: "anonymous-admin-account", matches: ({ userId }) => userId === ANONYMOUS_ADMIN_ID },
    {
      name: "custom-admin",
      matches: async ({ chatId, userId }) => (await this.store.fetchCustomAdmins(chatId)).includes(userId),
    },
    {
      name: "platform-admin",
      matches: async ({ chatId, userId }) => ((await this.getPlatformAdmins(chatId)) ?? []).includes(userId),
    },
  ];

  constructor({ platform, store, cacheTtlMs, now = Date.now }: AdminResolverOptions) {
    this.platform = platform;
    this.store = store;
    this.adminCache = new TTLCache<UserId[]>(cacheTtlMs, now);
  }

  async isExempt(query: ExemptionQuery): Promise<boolean> {
    for (const rule of this.rules) {
      if (await rule.matches(query)) {
        logger.debug({ ...query, rule: rule.name }, "Sender exempt");
        return true;
      }
    }
    return false;
  }

  /** Asks the platform directly, ignoring the cache and custom admins. */
  async isRealAdminOrOwner(chatId: ChatId, userId: UserId): Promise<boolean> {
    try {
      const member = await this.platform.getChatMember(chatId, userId);
      return member.role === "owner" || member.role === "administrator";
    } catch (error) {
      logger.error({ err: error, chatId, userId }, "Failed to fetch chat member");
      return false;
    }
  }

  invalidate(chatId: ChatId): void {
    this.adminCache.delete(chatId);
  }

  /** Cached admin ids of a chat, or null when the platform could not be reached. */
  private getPlatformAdmins(chatId: ChatId): Promise<UserId[] | null> {
    const cached = this.adminCache.get(chatId);
    if (cached) return Promise.resolve(cached);

    const running = this.inflight.get(chatId);
    if (running) return running;

    const lookup = this.fetchPlatformAdmins(chatId).finally(() => this.inflight.delete(chatId));
    this.inflight.set(chatId, lookup);
    return lookup;
  }

  private async fetchPlatformAdmins(chatId: ChatId): Promise<UserId[] | null> {
    try {
      const admins = await this.platform.getChatAdministrators(chatId);
      const ids = admins.map((admin) => admin.userId);
      this.adminCache.set(chatId, ids);
      return ids;
    } catch (error) {
      logger.error({ err: error, chatId }, "Failed to fetch chat admins");
      return null;
    }
  }
}
