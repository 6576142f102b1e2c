import * as Sentry from "@sentry/node";
import { monitoringConfig } from "../shared/config/monitoring";
import { getLogger } from "../shared/logger";

const logger = getLogger("sentry-service", "service");

let isInitialised = false;

let handlersRegistered = false;

export const captureException = (
  error: unknown,
  context?: Record<string, unknown>,
) => {
  if (!isInitialised || !monitoringConfig.sentry.enabled) {
    return;
  }

  Sentry.captureException(error, {
    contexts: context ? { metadata: context } : undefined,
  });
};

const resolveReasonMessage = (reason: unknown): string => {
  if (reason instanceof Error) {
    return reason.message;
  }

  if (typeof reason === "string") {
    return reason;
  }

  try {
    return JSON.stringify(reason);
  } catch {
    return "unknown";
  }
};

export const initServiceSentry = (): boolean => {
  if (isInitialised) {
    return true;
  }

  if (!monitoringConfig.sentry.enabled) {
    logger.debug("Skipping Sentry initialisation: disabled by configuration");
    return false;
  }

  Sentry.init({
    dsn: monitoringConfig.sentry.dsn,
    environment: monitoringConfig.environment,
    release: monitoringConfig.release,
    beforeSend: (event) => monitoringConfig.sentry.beforeSend(event),
    tracesSampleRate: monitoringConfig.sentry.tracesSampleRate,
  });

  Sentry.setTag("process", "service");
  Sentry.setContext("service", {
    pid: process.pid,
    platform: process.platform,
    node: process.versions.node,
  });

  isInitialised = true;
  return true;
};

export const closeServiceSentry = async (timeoutMs = 2000) => {
  if (!isInitialised) {
    return;
  }

  await Sentry.close(timeoutMs);
  isInitialised = false;
};

export const registerProcessHandlers = () => {
  if (handlersRegistered) {
    return;
  }

  process.on("uncaughtException", (error) => {
    logger.fatal("Uncaught exception in compliance service", {
      error: error.message,
      stack: error.stack,
    });
    captureException(error);
  });

  process.on("unhandledRejection", (reason) => {
    const error =
      reason instanceof Error ? reason : new Error(resolveReasonMessage(reason));
    logger.fatal("Unhandled promise rejection in compliance service", {
      error: error.message,
      stack: error.stack,
    });
    captureException(error);
  });

  handlersRegistered = true;
};
