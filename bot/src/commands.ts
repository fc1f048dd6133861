import logger from "./logger";
import { listRecords } from "./dataStore";
import { PermissionDeniedError, UserInputError } from "./errors";
import {
  escapeHtml,
  formatCooldown,
  formatCooldowns,
  formatCustomAdmins,
  formatDuplicates,
  formatHelp,
  formatStatus,
} from "./messages";
import { isAllowedChat } from "./moderation";
import type { AdminResolver } from "./adminResolver";
import type { CooldownEvaluator } from "./cooldown";
import type { DataStore } from "./dataStore";
import type { ChatId, Clock, UserId } from "./types";

/** `admin` goes through the exemption chain; `owner` requires a real administrator or the owner. */
export type CommandAccess = "admin" | "owner";

export interface CommandContext {
  chatId: ChatId;
  userId: UserId;
  senderChatId?: ChatId;
  args: string[];
}

export interface CommandDefinition {
  name: string;
  usage: string;
  description: string;
  access: CommandAccess;
  run(ctx: CommandContext): Promise<string>;
}

export interface CommandDeps {
  store: DataStore;
  resolver: AdminResolver;
  evaluator: CooldownEvaluator;
  allowedChatIds: ChatId[];
  now?: Clock;
}

const code = (value: number) => `<code>${value}</code>`;

const GENERIC_FAILURE = "❌ Something went wrong, please try again later.";
const OWNER_ONLY = "Only group administrators can manage custom admins.";

export const parseUserId = (raw: string | undefined, usage: string): UserId => {
  if (!raw || !/^-?\d+$/.test(raw)) throw new UserInputError(usage);
  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value === 0) throw new UserInputError(usage);
  return value;
};

export const parseHours = (raw: string | undefined, usage: string): number => {
  if (!raw || !/^\d+$/.test(raw)) throw new UserInputError(usage);
  const value = Number(raw);
  if (!Number.isSafeInteger(value)) throw new UserInputError(usage);
  return value;
};

export class CommandService {
  private readonly now: Clock;
  readonly commands: readonly CommandDefinition[];

  constructor(private readonly deps: CommandDeps) {
    this.now = deps.now ?? Date.now;
    this.commands = this.buildCommands();
  }

  find(name: string): CommandDefinition | undefined {
    return this.commands.find((command) => command.name === name);
  }

  /** Runs a command and returns the reply, or null when the chat is not served. */
  async execute(name: string, ctx: CommandContext): Promise<string | null> {
    const command = this.find(name);
    if (!command || !isAllowedChat(this.deps.allowedChatIds, ctx.chatId)) return null;

    try {
      await this.authorize(command, ctx);
      return await command.run(ctx);
    } catch (error) {
      if (error instanceof UserInputError) return `Usage: ${escapeHtml(error.usage)}`;
      if (error instanceof PermissionDeniedError) return `❌ ${escapeHtml(error.message)}`;
      logger.error({ err: error, command: name, chatId: ctx.chatId, userId: ctx.userId }, "Command failed");
      return GENERIC_FAILURE;
    }
  }

  private async authorize(command: CommandDefinition, ctx: CommandContext) {
    const { resolver } = this.deps;
    if (command.access === "owner") {
      if (!(await resolver.isRealAdminOrOwner(ctx.chatId, ctx.userId))) throw new PermissionDeniedError(OWNER_ONLY);
      return;
    }
    const allowed = await resolver.isExempt({ chatId: ctx.chatId, userId: ctx.userId, senderChatId: ctx.senderChatId });
    if (!allowed) throw new PermissionDeniedError();
  }

  private buildCommands(): CommandDefinition[] {
    const { store, evaluator } = this.deps;

    return [
      {
        name: "status",
        usage: "/status",
        description: "View active message records",
        access: "admin",
        run: async ({ chatId }) => {
          const records = await store.updateMessageRecords(async (current) => {
            const value = await evaluator.pruneExpired(current, chatId);
            return { value, result: listRecords(value, chatId) };
          });
          return formatStatus(records, this.now());
        },
      },
      {
        name: "check_duplicates",
        usage: "/check_duplicates",
        description: "List users with more than one message today",
        access: "admin",
        run: async () => formatDuplicates(evaluator.duplicateSendersToday(await store.fetchMessageRecords())),
      },
      {
        name: "reset",
        usage: "/reset <user_id>",
        description: "Reset a user's cooldown",
        access: "admin",
        run: async ({ chatId, args }) => {
          const userId = parseUserId(args[0], "/reset <user_id>");
          return (await store.removeMessageRecord(chatId, userId))
            ? `✅ Reset cooldown for user ID ${code(userId)}.`
            : `ℹ️ User ID ${code(userId)} not found in records.`;
        },
      },
      {
        name: "addadmin",
        usage: "/addadmin <user_id>",
        description: "Exempt a user from the limit (group admins only)",
        access: "owner",
        run: async ({ chatId, args }) => {
          const userId = parseUserId(args[0], "/addadmin <user_id>");
          return (await store.addCustomAdmin(chatId, userId))
            ? `✅ User ${code(userId)} added as a custom admin.`
            : `ℹ️ User ${code(userId)} is already a custom admin.`;
        },
      },
      {
        name: "removeadmin",
        usage: "/removeadmin <user_id>",
        description: "Remove a custom admin (group admins only)",
        access: "owner",
        run: async ({ chatId, args }) => {
          const userId = parseUserId(args[0], "/removeadmin <user_id>");
          return (await store.removeCustomAdmin(chatId, userId))
            ? `✅ User ${code(userId)} removed from custom admins.`
            : `ℹ️ User ${code(userId)} is not a custom admin.`;
        },
      },
      {
        name: "listadmins",
        usage: "/listadmins",
        description: "List custom admins",
        access: "admin",
        run: async ({ chatId }) => formatCustomAdmins(await store.fetchCustomAdmins(chatId)),
      },
      {
        name: "setcooldown",
        usage: "/setcooldown <user_id> <hours>",
        description: "Set a user's cooldown, 0 for unlimited",
        access: "admin",
        run: async ({ chatId, args }) => {
          const usage = "/setcooldown <user_id> <hours>";
          const userId = parseUserId(args[0], usage);
          const hours = parseHours(args[1], usage);
          await store.setCooldownOverride(chatId, userId, hours);
          return `✅ Cooldown for user ${code(userId)} set to ${formatCooldown(hours)}.`;
        },
      },
      {
        name: "resetcooldown",
        usage: "/resetcooldown <user_id>",
        description: "Revert a user to the default cooldown",
        access: "admin",
        run: async ({ chatId, args }) => {
          const userId = parseUserId(args[0], "/resetcooldown <user_id>");
          return (await store.removeCooldownOverride(chatId, userId))
            ? `✅ Cooldown for user ${code(userId)} reset to default (${formatCooldown(evaluator.defaultHours)}).`
            : `ℹ️ User ${code(userId)} has no cooldown override.`;
        },
      },
      {
        name: "listcooldowns",
        usage: "/listcooldowns",
        description: "List cooldown overrides",
        access: "admin",
        run: async ({ chatId }) => formatCooldowns(await store.fetchChatCooldowns(chatId), evaluator.defaultHours),
      },
      {
        name: "help",
        usage: "/help",
        description: "Show this message",
        access: "admin",
        run: async () => formatHelp([...this.commands], evaluator.defaultHours),
      },
    ];
  }
}
