import { Logger, type ILogObj } from "tslog";

import { logLevelSchema, type LogLevel } from "./env.js";

const LOG_LEVEL_IDS: Record<LogLevel, number> = {
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

let rootLogger: Logger<ILogObj> | null = null;

function getRootLogger(): Logger<ILogObj> {
  if (!rootLogger) {
    rootLogger = new Logger<ILogObj>({
      name: "proxy-printer",
      type: "pretty",
      // LOG_LEVEL only; the rest of the env is validated by getEnv()
      minLevel: LOG_LEVEL_IDS[logLevelSchema.catch("info").parse(process.env.LOG_LEVEL ?? "info")],
    });
  }
  return rootLogger;
}

export type AppLogger = Logger<ILogObj>;

export function createLogger(name: string): AppLogger {
  return getRootLogger().getSubLogger({ name });
}
