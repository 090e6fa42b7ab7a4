import pino from "pino";

const nodeEnv = process.env.NODE_ENV;
const isDev = nodeEnv === "development";

function defaultLevel(): string {
  if (nodeEnv === "test") return "silent";
  return isDev ? "debug" : "info";
}

export const logger = pino({
  name: "blockproof",
  level: process.env.LOG_LEVEL || defaultLevel(),
  transport: isDev
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
        },
      }
    : undefined,
});

export type Logger = typeof logger;
