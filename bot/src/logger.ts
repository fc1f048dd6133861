import pino from "pino";

const plain = process.env.NODE_ENV === "production" || process.env.NODE_ENV === "test";

const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  transport: plain ? undefined : { target: "pino-pretty" },
});

export default logger;
