import express from "express";
import bodyParser from "body-parser";
import type TelegramBot from "node-telegram-bot-api";
import type { Server } from "node:http";

import type { BotConfig } from "./config";
import logger from "./logger";

export function createWebhookApp(bot: Pick<TelegramBot, "processUpdate">, config: BotConfig) {
  const app = express();
  app.use(bodyParser.json());

  app.post(config.webhookPath, (req, res) => {
    const secretHeader = req.headers["x-telegram-bot-api-secret-token"];
    if (secretHeader !== config.webhookSecret) {
      return res.sendStatus(401);
    }
    bot.processUpdate(req.body);
    res.sendStatus(200);
  });

  return app;
}

export function startWebhookServer(bot: TelegramBot, config: BotConfig): Server {
  return createWebhookApp(bot, config).listen(config.webhookPort, config.webhookHost, () => {
    logger.info(
      { host: config.webhookHost, port: config.webhookPort, path: config.webhookPath },
      "Webhook listener running",
    );
  });
}
