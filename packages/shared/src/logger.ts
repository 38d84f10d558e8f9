import pino, { Logger } from "pino";

export type { Logger };

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const createLogger = (options: { level?: LogLevel; name?: string } = {}): Logger =>
  pino({
    name: options.name ?? "strata",
    level: options.level ?? "info",
  });

export const silentLogger = (): Logger => pino({ level: "silent" });
