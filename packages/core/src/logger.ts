import pino, { type DestinationStream, type Logger } from "pino";

export type { Logger } from "pino";

export interface CreateLoggerOptions {
  name?: string;
  level?: string;
  destination?: DestinationStream;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const level = options.level ?? process.env.CHATSYNC_LOG_LEVEL ?? "info";
  const config = { name: options.name ?? "chatsync", level };
  return options.destination ? pino(config, options.destination) : pino(config);
}

/** Logger that drops everything; default for components built without one. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
