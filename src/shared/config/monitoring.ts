import type { NodeOptions } from "@sentry/node";
import { parseBooleanFlag, parseNumericEnv } from "../env";

type Environment = string;
type RuntimeEnv = Record<string, string | undefined>;

export type SentryErrorEvent = Parameters<
  NonNullable<NodeOptions["beforeSend"]>
>[0];

const resolveEnvironment = (env: RuntimeEnv): Environment => {
  const explicitEnv = env.APP_ENV ?? env.PPE_ENV;

  if (explicitEnv && explicitEnv.trim().length > 0) {
    return explicitEnv.trim();
  }

  const nodeEnv = env.NODE_ENV;
  if (nodeEnv && nodeEnv.trim().length > 0) {
    return nodeEnv.trim();
  }

  return "development";
};

const SENSITIVE_KEYS = [
  "password",
  "token",
  "secret",
  "authorization",
  "auth",
  "dsn",
  "email",
  "phone",
];

const isSensitiveKey = (key: string): boolean => {
  const lowerKey = key.toLowerCase();
  return SENSITIVE_KEYS.some((sensitiveKey) => lowerKey.includes(sensitiveKey));
};

const scrubValue = (value: unknown): unknown => {
  if (value == null) {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => scrubValue(item));
  }

  if (typeof value === "object") {
    return scrubRecord(value);
  }

  if (typeof value === "string" && isSensitiveKey(value)) {
    return "[redacted]";
  }

  return value;
};

export const scrubRecord = (record: object): Record<string, unknown> => {
  const result: Record<string, unknown> = {};

  Object.entries(record).forEach(([key, nestedValue]) => {
    result[key] = isSensitiveKey(key) ? "[redacted]" : scrubValue(nestedValue);
  });

  return result;
};

/**
 * Strips request data, keeps only the user id and redacts sensitive keys in
 * extras and breadcrumb payloads before an event leaves the process.
 */
const sanitizeSentryEvent = (event: SentryErrorEvent): SentryErrorEvent => {
  const sanitized: SentryErrorEvent = { ...event, request: undefined };

  if (event.extra) {
    sanitized.extra = scrubRecord(event.extra);
  }

  if (event.breadcrumbs) {
    sanitized.breadcrumbs = event.breadcrumbs.map((breadcrumb) =>
      breadcrumb.data
        ? { ...breadcrumb, data: scrubRecord(breadcrumb.data) }
        : { ...breadcrumb },
    );
  }

  if (event.user) {
    sanitized.user =
      event.user.id != null ? { id: String(event.user.id) } : undefined;
  }

  return sanitized;
};

export type MonitoringConfig = {
  environment: Environment;
  release?: string;
  sentry: {
    dsn: string;
    enabled: boolean;
    tracesSampleRate: number;
    beforeSend: typeof sanitizeSentryEvent;
  };
  logtail: {
    token: string;
    enabled: boolean;
    consoleOnly: boolean;
  };
};

export const resolveMonitoringConfig = (
  runtimeEnv: RuntimeEnv,
): MonitoringConfig => {
  const environment = resolveEnvironment(runtimeEnv);
  const isProductionLike =
    environment === "production" || environment === "staging";

  const sentryDsn = runtimeEnv.SENTRY_DSN ?? "";
  const enableSentryInDev = parseBooleanFlag(runtimeEnv.ENABLE_SENTRY_IN_DEV);
  const sentryEnabled =
    Boolean(sentryDsn) && (isProductionLike || enableSentryInDev);

  const logtailToken = runtimeEnv.BETTER_STACK_TOKEN ?? "";
  const logtailEnabled =
    Boolean(logtailToken) &&
    (isProductionLike ||
      parseBooleanFlag(runtimeEnv.ENABLE_BETTER_STACK_IN_DEV));

  return {
    environment,
    release: runtimeEnv.npm_package_version,
    sentry: {
      dsn: sentryDsn,
      enabled: sentryEnabled,
      tracesSampleRate:
        parseNumericEnv(runtimeEnv.SENTRY_TRACES_SAMPLE_RATE, {
          min: 0,
          max: 1,
        }) ?? 0.1,
      beforeSend: sanitizeSentryEvent,
    },
    logtail: {
      token: logtailToken,
      enabled: logtailEnabled,
      consoleOnly: !logtailEnabled,
    },
  };
};

export const monitoringConfig: MonitoringConfig = resolveMonitoringConfig(
  process.env,
);
