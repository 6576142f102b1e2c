import type { IndexedDetection, Person } from "../../shared/types/detection";
import type { ComplianceConfig } from "../config/compliance-config";
import {
  containmentFraction,
  faceRegion,
  headRegion,
  iou,
} from "../geometry";
import { matchDetections } from "./matcher";
import type { MatchResult, MatchStrategy } from "./types";

export { matchDetections } from "./matcher";
export type {
  Assignment,
  MatchResult,
  MatchStrategy,
  ScoreFn,
  UnmatchedCandidate,
  UnmatchedReason,
} from "./types";

export const createHelmetStrategy = (
  config: Pick<ComplianceConfig, "regions" | "thresholds">,
): MatchStrategy => ({
  category: "helmet",
  score: (helmetBox, personBox) =>
    containmentFraction(helmetBox, headRegion(personBox, config.regions)),
  threshold: config.thresholds.helmetContainment,
});

export const createVestStrategy = (
  config: Pick<ComplianceConfig, "thresholds">,
): MatchStrategy => ({
  category: "vest",
  score: (vestBox, personBox) => iou(vestBox, personBox),
  threshold: config.thresholds.vestIou,
});

export const createMaskStrategy = (
  config: Pick<ComplianceConfig, "regions" | "thresholds">,
): MatchStrategy => ({
  category: "mask",
  score: (maskBox, personBox) =>
    containmentFraction(maskBox, faceRegion(personBox, config.regions)),
  threshold: config.thresholds.maskContainment,
});

export const matchHelmets = (
  persons: readonly Person[],
  helmets: readonly IndexedDetection[],
  config: ComplianceConfig,
): MatchResult => matchDetections(persons, helmets, createHelmetStrategy(config));

export const matchVests = (
  persons: readonly Person[],
  vests: readonly IndexedDetection[],
  config: ComplianceConfig,
): MatchResult => matchDetections(persons, vests, createVestStrategy(config));

export type MaskResolution = {
  violations: MatchResult;
  worn: MatchResult;
};

/**
 * Violation and positive mask evidence are matched independently with the
 * same face-region strategy; the aggregator gives violations precedence.
 */
export const resolveMasks = (
  persons: readonly Person[],
  maskViolations: readonly IndexedDetection[],
  masksWorn: readonly IndexedDetection[],
  config: ComplianceConfig,
): MaskResolution => {
  const strategy = createMaskStrategy(config);
  return {
    violations: matchDetections(persons, maskViolations, strategy),
    worn: matchDetections(persons, masksWorn, strategy),
  };
};
