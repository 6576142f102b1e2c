import { NoPersonsDetectedError } from "../shared/errors";
import { getLogger } from "../shared/logger";
import type { AnalysisReport } from "../shared/types/compliance";
import type { Detection, ImageSize } from "../shared/types/detection";
import { buildAnnotations } from "./aggregation/annotations";
import {
  buildPersonReports,
  commitAssignments,
  summarizeCompliance,
} from "./aggregation";
import type { ComplianceConfig } from "./config/compliance-config";
import { matchHelmets, matchVests, resolveMasks } from "./matching";
import { partitionDetections } from "./partition";

const logger = getLogger("compliance-engine", "engine");

export type AnalyzeOptions = {
  /** When known, boxes reaching outside the image are rejected. */
  imageSize?: ImageSize;
  /** Correlates log lines for one request; not used in the computation. */
  requestId?: string;
};

/**
 * Runs one image's detections through partitioning, the three category
 * matchers and aggregation. Synchronous and free of shared state: the same
 * detections and config always give the same report.
 */
export const analyzeDetections = (
  detections: readonly Detection[],
  config: ComplianceConfig,
  options: AnalyzeOptions = {},
): AnalysisReport => {
  const { requestId } = options;
  const partitioned = partitionDetections(detections, options.imageSize);
  const warnings: string[] = [];

  partitioned.rejected.forEach((error) => {
    warnings.push(error.message);
    logger.warn("Dropped malformed detection", {
      requestId,
      index: error.index,
      reason: error.reason,
    });
  });

  const { persons } = partitioned;
  const helmet = matchHelmets(persons, partitioned.helmets, config);
  const vest = matchVests(persons, partitioned.vests, config);
  const mask = resolveMasks(
    persons,
    partitioned.maskViolations,
    partitioned.masksWorn,
    config,
  );

  const records = commitAssignments(persons, { helmet, vest, mask });
  const reports = buildPersonReports(persons, records);
  const summary = summarizeCompliance(records, config.riskBands);

  const noPersonsDetected = persons.length === 0;
  if (noPersonsDetected) {
    const notice = new NoPersonsDetectedError();
    warnings.push(notice.message);
    logger.info(notice.message, { requestId, detections: detections.length });
  }

  const report: AnalysisReport = {
    persons: reports,
    summary,
    annotations: buildAnnotations(reports),
    diagnostics: {
      malformedCount: partitioned.rejected.length,
      ignoredCount: partitioned.ignoredCount,
      unmatched: {
        helmet: helmet.unmatched.length,
        vest: vest.unmatched.length,
        mask: mask.violations.unmatched.length + mask.worn.unmatched.length,
      },
      noPersonsDetected,
      warnings,
    },
  };

  logger.debug("Compliance analysis complete", {
    requestId,
    total: summary.total,
    complianceScore: summary.complianceScore,
    riskLevel: summary.riskLevel,
    malformed: report.diagnostics.malformedCount,
  });

  return report;
};

export {
  DEFAULT_COMPLIANCE_CONFIG,
  loadComplianceConfig,
} from "./config/compliance-config";
export type {
  ComplianceConfig,
  ComplianceConfigOverrides,
} from "./config/compliance-config";
