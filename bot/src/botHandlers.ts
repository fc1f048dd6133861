import type TelegramBot from "node-telegram-bot-api";
import logger from "./logger";
import { toInboundMessage } from "./telegramPlatform";
import type { CommandService } from "./commands";
import type { ModerationPipeline } from "./moderation";
import type { ChatPlatform, ModerationOutcome } from "./types";

export interface HandlerDeps {
  platform: ChatPlatform;
  pipeline: ModerationPipeline;
  commands: CommandService;
}

export const commandPattern = (name: string) => new RegExp(`^/${name}(?:@\\w+)?(?:\\s+([\\s\\S]*))?$`);

export const parseCommandArgs = (raw: string | undefined) => (raw ?? "").split(/\s+/).filter(Boolean);

/**
 * Every message with a sender goes through moderation, commands included: exempt senders pass
 * untouched, and members cannot dodge the limit by prefixing a post with a command.
 */
export const moderateIncoming = (
  msg: TelegramBot.Message,
  pipeline: ModerationPipeline,
): Promise<ModerationOutcome> => {
  const inbound = toInboundMessage(msg);
  if (!inbound) return Promise.resolve("ignored");
  logger.debug({ chatId: inbound.chatId, threadId: inbound.threadId, userId: inbound.userId }, "Message received");
  return pipeline.handleMessage(inbound);
};

export const registerHandlers = (bot: TelegramBot, { platform, pipeline, commands }: HandlerDeps) => {
  for (const command of commands.commands) {
    bot.onText(commandPattern(command.name), async (msg: TelegramBot.Message, match: RegExpExecArray | null) => {
      if (!msg.from) return;
      const reply = await commands.execute(command.name, {
        chatId: msg.chat.id,
        userId: msg.from.id,
        senderChatId: msg.sender_chat?.id,
        args: parseCommandArgs(match?.[1]),
      });
      if (reply === null) return;
      try {
        await platform.sendMessage(msg.chat.id, reply, {
          threadId: msg.message_thread_id,
          replyToMessageId: msg.message_id,
        });
      } catch (error) {
        logger.warn({ err: error, chatId: msg.chat.id, command: command.name }, "Failed to send command reply");
      }
    });
  }

  bot.on("message", async (msg: TelegramBot.Message) => {
    await moderateIncoming(msg, pipeline);
  });

  bot.on("polling_error", (error: Error) => {
    logger.error({ err: error }, "Polling error");
  });

  bot.on("webhook_error", (error: Error) => {
    logger.error({ err: error }, "Webhook error");
  });
};
