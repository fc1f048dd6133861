import { config as loadEnv } from "dotenv";
import path from "node:path";
import { ConfigError } from "./errors";

export interface BotConfig {
  token: string;
  topicId: number;
  defaultCooldownHours: number;
  warningDeleteSeconds: number;
  warningMarginSeconds: number;
  adminCacheTtlSeconds: number;
  allowedChatIds: number[];
  dataDir: string;
  webhookUrl: string;
  webhookPort: number;
  webhookHost: string;
  webhookPath: string;
  webhookSecret: string;
}

type Env = Record<string, string | undefined>;

const requireEnv = (env: Env, key: string): string => {
  const value = env[key];
  if (!value) {
    throw new ConfigError(key, `Missing required environment variable: ${key}`);
  }
  return value;
};

const parseInteger = (key: string, raw: string, min: number): number => {
  const value = Number(raw.trim());
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(key, `${key} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
};

const intEnv = (env: Env, key: string, fallback: number, min = 0): number => {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  return parseInteger(key, raw, min);
};

const parseChatIds = (raw: string | undefined): number[] =>
  (raw ?? "")
    .split(",")
    .map((v) => v.trim())
    .filter(Boolean)
    .map((v) => {
      const id = Number(v);
      if (!Number.isInteger(id)) {
        throw new ConfigError("ALLOWED_CHAT_IDS", `ALLOWED_CHAT_IDS contains an invalid chat id: "${v}"`);
      }
      return id;
    });

export const loadEnvFile = (env: Env = process.env) => {
  loadEnv({ path: env.ENV_FILE ?? path.resolve(process.cwd(), ".env") });
};

export const loadBotConfig = (env: Env = process.env): BotConfig => ({
  token: requireEnv(env, "BOT_TOKEN"),
  topicId: parseInteger("TOPIC_ID", requireEnv(env, "TOPIC_ID"), 1),
  defaultCooldownHours: intEnv(env, "DEFAULT_COOLDOWN_HOURS", 24),
  warningDeleteSeconds: intEnv(env, "WARNING_DELETE_SECONDS", 10),
  warningMarginSeconds: intEnv(env, "WARNING_MARGIN_SECONDS", 5),
  adminCacheTtlSeconds: intEnv(env, "ADMIN_CACHE_TTL_SECONDS", 300),
  allowedChatIds: parseChatIds(env.ALLOWED_CHAT_IDS),
  dataDir: env.DATA_DIR ?? "data",
  webhookUrl: env.WEBHOOK_URL ?? "",
  webhookPort: intEnv(env, "WEBHOOK_PORT", 8443, 1),
  webhookHost: env.WEBHOOK_HOST ?? "0.0.0.0",
  webhookPath: env.WEBHOOK_PATH ?? "/webhook",
  webhookSecret: env.WEBHOOK_SECRET ?? "topic-guard-secret",
});

export const useWebhook = (config: BotConfig) => Boolean(config.webhookUrl);
