// Must stay first: monitoring reads process.env when the engine loads.
import "./main/load-env";

export { analyzeDetections, type AnalyzeOptions } from "./engine";
export {
  DEFAULT_COMPLIANCE_CONFIG,
  loadComplianceConfig,
  validateComplianceConfig,
  type ComplianceConfig,
  type ComplianceConfigOverrides,
  type MatchThresholds,
  type RegionFractions,
  type RiskBands,
} from "./engine/config/compliance-config";
export {
  containmentFraction,
  faceRegion,
  headRegion,
  iou,
  isWellFormedBox,
  snapToPixel,
} from "./engine/geometry";
export { partitionDetections } from "./engine/partition";
export {
  createHelmetStrategy,
  createMaskStrategy,
  createVestStrategy,
  matchDetections,
  matchHelmets,
  matchVests,
  resolveMasks,
} from "./engine/matching";
export { DEFAULT_COMPLIANCE_STATUS } from "./engine/aggregation";
export { buildAnnotations } from "./engine/aggregation/annotations";
export {
  startComplianceService,
  type ComplianceService,
  type ComplianceServiceOptions,
} from "./main";
export * from "./shared/errors";
export type * from "./shared/types/compliance";
export type * from "./shared/types/detection";
