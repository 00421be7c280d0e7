import { pino, type Logger as PinoLogger, type LoggerOptions, type LevelWithSilent } from "pino";

export type Logger = PinoLogger;

export type CreateLoggerOptions = LoggerOptions & {
  service?: string;
};

const LEVELS: readonly LevelWithSilent[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

function envLevel(): LevelWithSilent {
  const v = (process.env.LOG_LEVEL ?? "").toLowerCase();
  return LEVELS.find((l) => l === v) ?? "info";
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const { service, level, ...rest } = options;
  const loggerOptions: LoggerOptions = {
    level: level ?? envLevel(),
    base: { pid: process.pid },
    ...rest,
  };
  if (service && !loggerOptions.name) loggerOptions.name = service;
  return pino(loggerOptions);
}
