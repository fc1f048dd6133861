import type TelegramBot from "node-telegram-bot-api";
import type { ChatId, ChatMemberInfo, ChatPlatform, InboundMessage, MemberRole, SendOptions, UserId } from "./types";

export type TelegramApi = Pick<
  TelegramBot,
  "deleteMessage" | "sendMessage" | "getChatAdministrators" | "getChatMember"
>;

const ROLE_MAP: Record<TelegramBot.ChatMemberStatus, MemberRole> = {
  creator: "owner",
  administrator: "administrator",
  member: "member",
  restricted: "restricted",
  left: "left",
  kicked: "banned",
};

const toMemberInfo = (member: TelegramBot.ChatMember): ChatMemberInfo => ({
  userId: member.user.id,
  role: ROLE_MAP[member.status],
});

export class TelegramPlatform implements ChatPlatform {
  constructor(private readonly bot: TelegramApi) {}

  async deleteMessage(chatId: ChatId, messageId: number): Promise<void> {
    await this.bot.deleteMessage(chatId, messageId);
  }

  async sendMessage(chatId: ChatId, text: string, options: SendOptions = {}): Promise<number> {
    const sent = await this.bot.sendMessage(chatId, text, {
      parse_mode: "HTML",
      message_thread_id: options.threadId,
      reply_to_message_id: options.replyToMessageId,
    });
    return sent.message_id;
  }

  async getChatAdministrators(chatId: ChatId): Promise<ChatMemberInfo[]> {
    const admins = await this.bot.getChatAdministrators(chatId);
    return admins.map(toMemberInfo);
  }

  async getChatMember(chatId: ChatId, userId: UserId): Promise<ChatMemberInfo> {
    return toMemberInfo(await this.bot.getChatMember(chatId, userId));
  }
}

/** Null for updates without a sender (channel posts). */
export const toInboundMessage = (msg: TelegramBot.Message): InboundMessage | null => {
  if (!msg.from) return null;
  return {
    chatId: msg.chat.id,
    messageId: msg.message_id,
    threadId: msg.message_thread_id,
    userId: msg.from.id,
    username: msg.from.username,
    firstName: msg.from.first_name,
    senderChatId: msg.sender_chat?.id,
  };
};
