/* eslint-disable no-console */
// Console output mirrors the structured logs locally while they ship to Better Stack.
import type { Logtail } from "@logtail/node";
import { monitoringConfig } from "./config/monitoring";

export type LoggerProcessType = "service" | "engine";

export type LoggerMetadata = Record<string, unknown>;

type LoggerOptions = {
  module: string;
  processType: LoggerProcessType;
};

type LogLevel = "debug" | "info" | "warn" | "error" | "fatal";

const consoleWriters: Record<LogLevel, (...args: unknown[]) => void> = {
  debug: console.debug.bind(console),
  info: console.info.bind(console),
  warn: console.warn.bind(console),
  error: console.error.bind(console),
  fatal: console.error.bind(console),
};

let logtailInstance: Promise<Logtail | null> | null = null;

const loadLogtail = (): Promise<Logtail | null> => {
  if (!monitoringConfig.logtail.enabled) {
    return Promise.resolve(null);
  }

  if (logtailInstance) {
    return logtailInstance;
  }

  logtailInstance = (async () => {
    try {
      const { Logtail: LogtailClient } = await import("@logtail/node");
      return new LogtailClient(monitoringConfig.logtail.token);
    } catch (error) {
      console.error("Failed to initialise Better Stack Logtail client", error);
      return null;
    }
  })();

  return logtailInstance;
};

const emitLogtail = async (
  level: LogLevel,
  message: string,
  metadata: LoggerMetadata,
) => {
  try {
    const client = await loadLogtail();
    if (!client) {
      return;
    }

    switch (level) {
      case "debug":
        await client.debug(message, metadata);
        return;
      case "info":
        await client.info(message, metadata);
        return;
      case "warn":
        await client.warn(message, metadata);
        return;
      default:
        await client.error(message, metadata);
    }
  } catch (error) {
    console.error("Failed to send log to Better Stack", error);
  }
};

const createEmitter =
  ({ module, processType }: LoggerOptions, level: LogLevel) =>
  (message: string, metadata: LoggerMetadata = {}) => {
    const timestamp = new Date().toISOString();
    const enrichedMetadata = {
      ...metadata,
      module,
      processType,
      environment: monitoringConfig.environment,
      timestamp,
      level,
    };

    consoleWriters[level](
      `[${timestamp}] [${level.toUpperCase()}] ${message}`,
      enrichedMetadata,
    );

    if (monitoringConfig.logtail.enabled) {
      emitLogtail(level, message, enrichedMetadata).catch(() => undefined);
    }
  };

export const createLogger = (options: LoggerOptions) => {
  const flush = async () => {
    const client = await loadLogtail();
    await client?.flush();
  };

  return {
    debug: createEmitter(options, "debug"),
    info: createEmitter(options, "info"),
    warn: createEmitter(options, "warn"),
    error: createEmitter(options, "error"),
    fatal: createEmitter(options, "fatal"),
    flush,
  };
};

export type Logger = ReturnType<typeof createLogger>;

const loggerCache = new Map<string, Logger>();

export const getLogger = (
  module: string,
  processType: LoggerProcessType,
): Logger => {
  const cacheKey = `${processType}:${module}`;

  const cached = loggerCache.get(cacheKey);
  if (cached) {
    return cached;
  }

  const logger = createLogger({ module, processType });
  loggerCache.set(cacheKey, logger);
  return logger;
};
