export type ChatId = number;
export type UserId = number;

/** Milliseconds since the epoch. */
export type Clock = () => number;

export interface MessageRecord {
  chatId: ChatId;
  userId: UserId;
  lastSentAt: number;
}

/** chatId → userId → ISO timestamp of the last admitted message. */
export type MessageTable = Record<string, Record<string, string>>;

/** chatId → custom admin user ids. */
export type CustomAdminTable = Record<string, UserId[]>;

/** chatId → userId → cooldown hours (0 = unlimited). */
export type CooldownTable = Record<string, Record<string, number>>;

export type MemberRole = "owner" | "administrator" | "member" | "restricted" | "left" | "banned";

export interface ChatMemberInfo {
  userId: UserId;
  role: MemberRole;
}

export interface SendOptions {
  threadId?: number;
  replyToMessageId?: number;
}

/** The subset of the chat platform the engine talks to. Every call may fail. */
export interface ChatPlatform {
  deleteMessage(chatId: ChatId, messageId: number): Promise<void>;
  sendMessage(chatId: ChatId, text: string, options?: SendOptions): Promise<number>;
  getChatAdministrators(chatId: ChatId): Promise<ChatMemberInfo[]>;
  getChatMember(chatId: ChatId, userId: UserId): Promise<ChatMemberInfo>;
}

export interface InboundMessage {
  chatId: ChatId;
  messageId: number;
  threadId?: number;
  userId: UserId;
  username?: string;
  firstName?: string;
  /** Set when the message was posted on behalf of a chat (anonymous admin, linked channel). */
  senderChatId?: ChatId;
}

export type ModerationOutcome = "ignored" | "exempt" | "admitted" | "rejected";

export interface SendDecision {
  allowed: boolean;
  remainingMs?: number;
}
