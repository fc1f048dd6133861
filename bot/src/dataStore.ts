import path from "node:path";
import logger from "./logger";
import { expectObject, JsonTable } from "./storage";
import type { TableChange, TableSchema } from "./storage";
import type { ChatId, CooldownTable, CustomAdminTable, MessageRecord, MessageTable, UserId } from "./types";

const parseMessages = (data: unknown): MessageTable => {
  const table: MessageTable = {};
  for (const [chatKey, users] of Object.entries(expectObject(data, "message records"))) {
    const entries: Record<string, string> = {};
    for (const [userKey, timestamp] of Object.entries(expectObject(users, `records of chat ${chatKey}`))) {
      if (typeof timestamp !== "string" || Number.isNaN(Date.parse(timestamp))) {
        logger.warn({ chatId: chatKey, userId: userKey, timestamp }, "Dropping record with invalid timestamp");
        continue;
      }
      entries[userKey] = timestamp;
    }
    table[chatKey] = entries;
  }
  return table;
};

const parseCustomAdmins = (data: unknown): CustomAdminTable => {
  const table: CustomAdminTable = {};
  for (const [chatKey, ids] of Object.entries(expectObject(data, "custom admins"))) {
    if (!Array.isArray(ids) || !ids.every((id): id is number => Number.isInteger(id))) {
      throw new TypeError(`custom admins of chat ${chatKey} must be a list of user ids`);
    }
    table[chatKey] = ids;
  }
  return table;
};

const parseCooldowns = (data: unknown): CooldownTable => {
  const table: CooldownTable = {};
  for (const [chatKey, users] of Object.entries(expectObject(data, "cooldown overrides"))) {
    const entries: Record<string, number> = {};
    for (const [userKey, hours] of Object.entries(expectObject(users, `cooldowns of chat ${chatKey}`))) {
      if (typeof hours !== "number" || !Number.isInteger(hours) || hours < 0) {
        throw new TypeError(`cooldown of user ${userKey} in chat ${chatKey} must be a non-negative integer`);
      }
      entries[userKey] = hours;
    }
    table[chatKey] = entries;
  }
  return table;
};

export const messageSchema: TableSchema<MessageTable> = {
  name: "messages",
  empty: () => ({}),
  parse: parseMessages,
};

export const customAdminSchema: TableSchema<CustomAdminTable> = {
  name: "custom_admins",
  empty: () => ({}),
  parse: parseCustomAdmins,
};

export const cooldownSchema: TableSchema<CooldownTable> = {
  name: "cooldown_overrides",
  empty: () => ({}),
  parse: parseCooldowns,
};

export const listRecords = (records: MessageTable, chatId?: ChatId): MessageRecord[] => {
  const result: MessageRecord[] = [];
  for (const [chatKey, users] of Object.entries(records)) {
    if (chatId !== undefined && chatKey !== String(chatId)) continue;
    for (const [userKey, timestamp] of Object.entries(users)) {
      result.push({ chatId: Number(chatKey), userId: Number(userKey), lastSentAt: Date.parse(timestamp) });
    }
  }
  return result;
};

export const findRecord = (records: MessageTable, chatId: ChatId, userId: UserId): MessageRecord | undefined => {
  const timestamp = records[String(chatId)]?.[String(userId)];
  if (timestamp === undefined) return undefined;
  return { chatId, userId, lastSentAt: Date.parse(timestamp) };
};

export const withRecord = (records: MessageTable, chatId: ChatId, userId: UserId, at: number): MessageTable => ({
  ...records,
  [String(chatId)]: { ...records[String(chatId)], [String(userId)]: new Date(at).toISOString() },
});

export class DataStore {
  readonly messages: JsonTable<MessageTable>;
  readonly customAdmins: JsonTable<CustomAdminTable>;
  readonly cooldowns: JsonTable<CooldownTable>;

  constructor(dataDir: string) {
    this.messages = new JsonTable(path.join(dataDir, "message_records.json"), messageSchema);
    this.customAdmins = new JsonTable(path.join(dataDir, "custom_admins.json"), customAdminSchema);
    this.cooldowns = new JsonTable(path.join(dataDir, "cooldown_overrides.json"), cooldownSchema);
  }

  fetchMessageRecords(): Promise<MessageTable> {
    return this.messages.read();
  }

  updateMessageRecords<R>(
    mutate: (records: MessageTable) => TableChange<MessageTable, R> | Promise<TableChange<MessageTable, R>>,
  ): Promise<R> {
    return this.messages.update(mutate);
  }

  /** Returns whether a record existed. */
  removeMessageRecord(chatId: ChatId, userId: UserId): Promise<boolean> {
    return this.messages.update((records) => {
      const chatKey = String(chatId);
      const users = { ...records[chatKey] };
      const existed = String(userId) in users;
      delete users[String(userId)];
      const value = { ...records };
      if (Object.keys(users).length) value[chatKey] = users;
      else delete value[chatKey];
      return { value, result: existed };
    });
  }

  async fetchCustomAdmins(chatId: ChatId): Promise<UserId[]> {
    const table = await this.customAdmins.read();
    return table[String(chatId)] ?? [];
  }

  /** Returns false when the user was already a custom admin. */
  addCustomAdmin(chatId: ChatId, userId: UserId): Promise<boolean> {
    return this.customAdmins.update((table) => {
      const current = table[String(chatId)] ?? [];
      if (current.includes(userId)) return { value: table, result: false };
      return { value: { ...table, [String(chatId)]: [...current, userId] }, result: true };
    });
  }

  /** Returns false when the user was not a custom admin. */
  removeCustomAdmin(chatId: ChatId, userId: UserId): Promise<boolean> {
    return this.customAdmins.update((table) => {
      const current = table[String(chatId)] ?? [];
      if (!current.includes(userId)) return { value: table, result: false };
      const value = { ...table };
      const remaining = current.filter((id) => id !== userId);
      if (remaining.length) value[String(chatId)] = remaining;
      else delete value[String(chatId)];
      return { value, result: true };
    });
  }

  fetchCooldownOverrides(): Promise<CooldownTable> {
    return this.cooldowns.read();
  }

  async fetchChatCooldowns(chatId: ChatId): Promise<Record<string, number>> {
    const table = await this.cooldowns.read();
    return table[String(chatId)] ?? {};
  }

  setCooldownOverride(chatId: ChatId, userId: UserId, hours: number): Promise<void> {
    return this.cooldowns.update((table) => ({
      value: { ...table, [String(chatId)]: { ...table[String(chatId)], [String(userId)]: hours } },
      result: undefined,
    }));
  }

  /** Returns whether an override existed. */
  removeCooldownOverride(chatId: ChatId, userId: UserId): Promise<boolean> {
    return this.cooldowns.update((table) => {
      const chatKey = String(chatId);
      const users = { ...table[chatKey] };
      const existed = String(userId) in users;
      delete users[String(userId)];
      const value = { ...table };
      if (Object.keys(users).length) value[chatKey] = users;
      else delete value[chatKey];
      return { value, result: existed };
    });
  }
}
