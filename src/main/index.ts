import "./load-env";
import { analyzeDetections, type AnalyzeOptions } from "../engine";
import {
  loadComplianceConfig,
  type ComplianceConfig,
  type ComplianceConfigOverrides,
} from "../engine/config/compliance-config";
import { InvalidDetectionPayloadError } from "../shared/errors";
import { getLogger } from "../shared/logger";
import type { AnalysisReport } from "../shared/types/compliance";
import {
  isDetectionPayload,
  isImageSize,
} from "../shared/validation/detectionValues";
import {
  captureException,
  closeServiceSentry,
  initServiceSentry,
  registerProcessHandlers,
} from "./sentry";

const logger = getLogger("compliance-service", "service");

export type ComplianceServiceOptions = {
  /** Applied on top of defaults and PPE_* environment variables. */
  config?: ComplianceConfigOverrides;
  /** Install uncaughtException/unhandledRejection logging. Defaults to true. */
  registerProcessHandlers?: boolean;
};

export type ComplianceService = {
  readonly config: Readonly<ComplianceConfig>;
  analyze: (payload: unknown, options?: AnalyzeOptions) => AnalysisReport;
  /** Flushes shipped logs and pending Sentry events. */
  shutdown: () => Promise<void>;
};

const describeError = (error: unknown) => ({
  error: error instanceof Error ? error.message : String(error),
  stack: error instanceof Error ? error.stack : undefined,
});

/**
 * Startup for a process that serves compliance analyses. Configuration is
 * validated here, once; an invalid threshold throws and the process should
 * not start.
 */
export const startComplianceService = (
  options: ComplianceServiceOptions = {},
): ComplianceService => {
  initServiceSentry();
  if (options.registerProcessHandlers ?? true) {
    registerProcessHandlers();
  }

  let config: Readonly<ComplianceConfig>;
  try {
    config = loadComplianceConfig(options.config);
  } catch (error) {
    logger.fatal("Refusing to start with invalid configuration", describeError(error));
    captureException(error);
    throw error;
  }

  logger.info("Compliance service ready", {
    regions: config.regions,
    thresholds: config.thresholds,
    riskBands: config.riskBands,
  });

  const analyze = (
    payload: unknown,
    analyzeOptions: AnalyzeOptions = {},
  ): AnalysisReport => {
    if (!isDetectionPayload(payload)) {
      throw new InvalidDetectionPayloadError(
        "Expected an array of { box: { x1, y1, x2, y2 }, label, confidence } detections",
      );
    }
    if (
      analyzeOptions.imageSize !== undefined &&
      !isImageSize(analyzeOptions.imageSize)
    ) {
      throw new InvalidDetectionPayloadError(
        "imageSize must have positive finite width and height",
      );
    }

    try {
      return analyzeDetections(payload, config, analyzeOptions);
    } catch (error) {
      logger.error("Compliance analysis failed", {
        requestId: analyzeOptions.requestId,
        ...describeError(error),
      });
      captureException(error, { requestId: analyzeOptions.requestId });
      throw error;
    }
  };

  const shutdown = async () => {
    logger.info("Compliance service shutting down");
    await logger.flush();
    await closeServiceSentry();
  };

  return { config, analyze, shutdown };
};
