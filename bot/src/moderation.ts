import logger from "./logger";
import { listRecords, withRecord } from "./dataStore";
import { displayName, formatWarningMessage } from "./messages";
import type { AdminResolver } from "./adminResolver";
import type { CooldownEvaluator } from "./cooldown";
import type { DataStore } from "./dataStore";
import type { TaskScheduler } from "./scheduler";
import type { WarningThrottle } from "./warningThrottle";
import type { ChatId, ChatPlatform, Clock, InboundMessage, ModerationOutcome, SendDecision } from "./types";

export interface ModerationSettings {
  topicId: number;
  allowedChatIds: ChatId[];
  warningDeleteMs: number;
}

export interface ModerationDeps {
  platform: ChatPlatform;
  store: DataStore;
  resolver: AdminResolver;
  evaluator: CooldownEvaluator;
  throttle: WarningThrottle;
  scheduler: TaskScheduler;
  now?: Clock;
}

export const isAllowedChat = (allowedChatIds: ChatId[], chatId: ChatId) =>
  allowedChatIds.length === 0 || allowedChatIds.includes(chatId);

export class ModerationPipeline {
  private readonly now: Clock;

  constructor(
    private readonly settings: ModerationSettings,
    private readonly deps: ModerationDeps,
  ) {
    this.now = deps.now ?? Date.now;
  }

  isMonitored(message: InboundMessage): boolean {
    return isAllowedChat(this.settings.allowedChatIds, message.chatId) && message.threadId === this.settings.topicId;
  }

  async handleMessage(message: InboundMessage): Promise<ModerationOutcome> {
    if (!this.isMonitored(message)) return "ignored";
    const { chatId, userId } = message;

    try {
      if (await this.deps.resolver.isExempt({ chatId, userId, senderChatId: message.senderChatId })) {
        return "exempt";
      }

      const decision = await this.admitOrReject(chatId, userId);
      if (decision.allowed) {
        logger.info({ chatId, userId, username: message.username }, "Message recorded");
        return "admitted";
      }

      await this.reject(message, decision.remainingMs ?? 0);
      return "rejected";
    } catch (error) {
      logger.error({ err: error, chatId, userId, messageId: message.messageId }, "Failed to process message");
      return "ignored";
    }
  }

  private admitOrReject(chatId: ChatId, userId: number): Promise<SendDecision> {
    const { evaluator } = this.deps;
    return this.deps.store.updateMessageRecords(async (records) => {
      const pruned = await evaluator.pruneExpired(records, chatId);
      const decision = await evaluator.canSend(chatId, userId, pruned);
      if (decision.allowed) {
        return { value: withRecord(pruned, chatId, userId, this.now()), result: decision };
      }
      // rejections only persist pruning, and a failed write does not undo the decision
      const changed = listRecords(pruned, chatId).length !== listRecords(records, chatId).length;
      return { value: changed ? pruned : undefined, result: decision, bestEffort: true };
    });
  }

  private async reject(message: InboundMessage, remainingMs: number) {
    const { platform, throttle, scheduler, evaluator } = this.deps;
    const { chatId, userId } = message;

    try {
      await platform.deleteMessage(chatId, message.messageId);
    } catch (error) {
      logger.warn({ err: error, chatId, messageId: message.messageId }, "Failed to delete message");
    }

    const now = this.now();
    if (!throttle.shouldWarn(chatId, userId, now)) {
      logger.debug({ chatId, userId }, "Warning suppressed");
      return;
    }
    throttle.markWarned(chatId, userId, now);

    const cooldownHours = await evaluator.effectiveCooldown(chatId, userId);
    const text = formatWarningMessage({
      name: displayName(message.username, message.firstName),
      cooldownHours,
      remainingMs,
    });

    try {
      const warningId = await platform.sendMessage(chatId, text, { threadId: this.settings.topicId });
      scheduler.schedule(
        `delete-warning:${chatId}:${warningId}`,
        () => platform.deleteMessage(chatId, warningId),
        this.settings.warningDeleteMs,
      );
    } catch (error) {
      logger.warn({ err: error, chatId, userId }, "Failed to send warning");
    }
  }
}
