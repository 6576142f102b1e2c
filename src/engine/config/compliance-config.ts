import { getEnvVar, parseStrictNumericEnv } from "../../shared/env";
import { ComplianceConfigError } from "../../shared/errors";
import { isFraction, isFiniteNumber } from "../../shared/validation/detectionValues";

export type RegionFractions = {
  /** Share of the person box height, from the top, treated as the head. */
  headHeightFraction: number;
  /** Share of the person box height, from the top, treated as the face. */
  faceHeightFraction: number;
  /** Horizontal centre of the face region as a share of the box width. */
  faceCenterFraction: number;
  /** Width of the face region as a share of the box width. */
  faceWidthFraction: number;
};

export type MatchThresholds = {
  /** Minimum share of a helmet box inside the head region (inclusive). */
  helmetContainment: number;
  /** Minimum IoU between vest and person boxes (inclusive). */
  vestIou: number;
  /** Minimum share of a mask box inside the face region (inclusive). */
  maskContainment: number;
};

export type RiskBands = {
  /** Site compliance score (0-100) at or above which risk is LOW. */
  low: number;
  /** Site compliance score (0-100) at or above which risk is MEDIUM. */
  medium: number;
};

export type ComplianceConfig = {
  regions: RegionFractions;
  thresholds: MatchThresholds;
  riskBands: RiskBands;
};

export type ComplianceConfigOverrides = Partial<{
  regions: Partial<RegionFractions>;
  thresholds: Partial<MatchThresholds>;
  riskBands: Partial<RiskBands>;
}>;

const freezeConfig = (config: ComplianceConfig): Readonly<ComplianceConfig> => {
  Object.freeze(config.regions);
  Object.freeze(config.thresholds);
  Object.freeze(config.riskBands);
  return Object.freeze(config);
};

export const DEFAULT_COMPLIANCE_CONFIG: Readonly<ComplianceConfig> = freezeConfig({
  regions: {
    headHeightFraction: 0.35,
    faceHeightFraction: 0.2,
    faceCenterFraction: 0.6,
    faceWidthFraction: 0.5,
  },
  thresholds: {
    helmetContainment: 0.5,
    // Vests cover only the torso, so IoU against the full person box stays low.
    vestIou: 0.3,
    maskContainment: 0.4,
  },
  riskBands: {
    low: 85,
    medium: 60,
  },
});

export const cloneComplianceConfig = (
  config: ComplianceConfig,
): ComplianceConfig => {
  return {
    regions: { ...config.regions },
    thresholds: { ...config.thresholds },
    riskBands: { ...config.riskBands },
  };
};

export const mergeComplianceConfig = (
  current: ComplianceConfig,
  overrides?: ComplianceConfigOverrides,
): ComplianceConfig => {
  if (!overrides) {
    return cloneComplianceConfig(current);
  }

  return {
    regions: { ...current.regions, ...(overrides.regions ?? {}) },
    thresholds: { ...current.thresholds, ...(overrides.thresholds ?? {}) },
    riskBands: { ...current.riskBands, ...(overrides.riskBands ?? {}) },
  } satisfies ComplianceConfig;
};

const REGION_ENV_KEYS: Record<keyof RegionFractions, string> = {
  headHeightFraction: "PPE_HEAD_HEIGHT_FRACTION",
  faceHeightFraction: "PPE_FACE_HEIGHT_FRACTION",
  faceCenterFraction: "PPE_FACE_CENTER_FRACTION",
  faceWidthFraction: "PPE_FACE_WIDTH_FRACTION",
};

const THRESHOLD_ENV_KEYS: Record<keyof MatchThresholds, string> = {
  helmetContainment: "PPE_HELMET_CONTAINMENT_THRESHOLD",
  vestIou: "PPE_VEST_IOU_THRESHOLD",
  maskContainment: "PPE_MASK_CONTAINMENT_THRESHOLD",
};

const RISK_ENV_KEYS: Record<keyof RiskBands, string> = {
  low: "PPE_RISK_LOW_MIN_SCORE",
  medium: "PPE_RISK_MEDIUM_MIN_SCORE",
};

const readEnvGroup = <K extends string>(
  keys: Record<K, string>,
): Partial<Record<K, number>> => {
  const group: Partial<Record<K, number>> = {};
  for (const field in keys) {
    const value = parseStrictNumericEnv(getEnvVar(keys[field]));
    if (value !== null) {
      group[field] = value;
    }
  }
  return group;
};

/** Unparseable values come through as NaN so validation rejects them. */
export const createComplianceEnvOverrides = (): ComplianceConfigOverrides => {
  const regions = readEnvGroup(REGION_ENV_KEYS);
  const thresholds = readEnvGroup(THRESHOLD_ENV_KEYS);
  const riskBands = readEnvGroup(RISK_ENV_KEYS);

  return {
    regions: Object.keys(regions).length > 0 ? regions : undefined,
    thresholds: Object.keys(thresholds).length > 0 ? thresholds : undefined,
    riskBands: Object.keys(riskBands).length > 0 ? riskBands : undefined,
  };
};

export const collectConfigIssues = (config: ComplianceConfig): string[] => {
  const issues: string[] = [];

  Object.entries(config.regions).forEach(([key, value]) => {
    if (!isFraction(value)) {
      issues.push(`regions.${key} must be within [0, 1], got ${String(value)}`);
    }
  });

  Object.entries(config.thresholds).forEach(([key, value]) => {
    if (!isFraction(value)) {
      issues.push(
        `thresholds.${key} must be within [0, 1], got ${String(value)}`,
      );
    }
  });

  Object.entries(config.riskBands).forEach(([key, value]) => {
    if (!isFiniteNumber(value) || value < 0 || value > 100) {
      issues.push(
        `riskBands.${key} must be within [0, 100], got ${String(value)}`,
      );
    }
  });

  if (config.riskBands.medium > config.riskBands.low) {
    issues.push("riskBands.medium must not exceed riskBands.low");
  }

  return issues;
};

export const validateComplianceConfig = (
  config: ComplianceConfig,
): ComplianceConfig => {
  const issues = collectConfigIssues(config);
  if (issues.length > 0) {
    throw new ComplianceConfigError(issues);
  }
  return config;
};

/**
 * Defaults, then environment, then explicit overrides. Returns a validated,
 * frozen snapshot that concurrent analyses can share.
 */
export const loadComplianceConfig = (
  overrides?: ComplianceConfigOverrides,
): Readonly<ComplianceConfig> => {
  const fromEnv = mergeComplianceConfig(
    DEFAULT_COMPLIANCE_CONFIG,
    createComplianceEnvOverrides(),
  );
  const merged = mergeComplianceConfig(fromEnv, overrides);
  return freezeConfig(validateComplianceConfig(merged));
};
