import TelegramBot from "node-telegram-bot-api";
import type { Server } from "node:http";
import { loadBotConfig, loadEnvFile, useWebhook } from "./config";
import logger from "./logger";
import { registerHandlers } from "./botHandlers";
import { startWebhookServer } from "./server";
import { AdminResolver } from "./adminResolver";
import { CommandService } from "./commands";
import { CooldownEvaluator } from "./cooldown";
import { DataStore } from "./dataStore";
import { ModerationPipeline } from "./moderation";
import { TaskScheduler } from "./scheduler";
import { TelegramPlatform } from "./telegramPlatform";
import { WarningThrottle } from "./warningThrottle";

async function bootstrap() {
  loadEnvFile();
  const config = loadBotConfig();
  const webhook = useWebhook(config);
  const bot = new TelegramBot(config.token, { polling: !webhook });

  const platform = new TelegramPlatform(bot);
  const store = new DataStore(config.dataDir);
  const resolver = new AdminResolver({ platform, store, cacheTtlMs: config.adminCacheTtlSeconds * 1000 });
  const evaluator = new CooldownEvaluator(store, config.defaultCooldownHours);
  const throttle = new WarningThrottle((config.warningDeleteSeconds + config.warningMarginSeconds) * 1000);
  const scheduler = new TaskScheduler();
  const pipeline = new ModerationPipeline(
    { topicId: config.topicId, allowedChatIds: config.allowedChatIds, warningDeleteMs: config.warningDeleteSeconds * 1000 },
    { platform, store, resolver, evaluator, throttle, scheduler },
  );
  const commands = new CommandService({ store, resolver, evaluator, allowedChatIds: config.allowedChatIds });

  registerHandlers(bot, { platform, pipeline, commands });

  let server: Server | undefined;
  if (webhook) {
    await bot.setWebHook(config.webhookUrl, { secret_token: config.webhookSecret });
    server = startWebhookServer(bot, config);
    logger.info({ url: config.webhookUrl, port: config.webhookPort }, "Webhook mode enabled");
  } else {
    logger.info("Polling mode enabled");
  }
  logger.info(
    { topicId: config.topicId, cooldownHours: config.defaultCooldownHours, allowedChatIds: config.allowedChatIds },
    "Monitoring topic",
  );

  const shutdown = (signal: string) => {
    logger.info({ signal, pendingDeletions: scheduler.size }, "Shutting down");
    scheduler.cancelAll();
    server?.close();
    const stopped = webhook ? Promise.resolve() : bot.stopPolling();
    stopped
      .catch((err) => logger.warn({ err }, "Failed to stop polling"))
      .finally(() => process.exit(0));
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

bootstrap().catch((error) => {
  logger.error({ err: error }, "Bot failed to start");
  process.exit(1);
});
