import type {
  CategoryCounts,
  ComplianceRecord,
  ComplianceStatus,
  ComplianceSummary,
  OverallColor,
  PersonReport,
  RiskLevel,
} from "../../shared/types/compliance";
import type { Person, PpeCategory } from "../../shared/types/detection";
import type { RiskBands } from "../config/compliance-config";
import type { MaskResolution, MatchResult } from "../matching";

/** Status of any category that no detection speaks for. */
export const DEFAULT_COMPLIANCE_STATUS: ComplianceStatus = "VIOLATION";

export const PPE_CATEGORIES: readonly PpeCategory[] = ["helmet", "vest", "mask"];

export const RISK_RECOMMENDATIONS: Record<RiskLevel, string> = {
  LOW: "Site is compliant. Maintain existing safety protocols.",
  MEDIUM:
    "Partial compliance detected. Increase supervision and PPE enforcement.",
  HIGH: "Critical safety risk identified. Immediate corrective action required.",
};

export const createComplianceRecord = (): ComplianceRecord => ({
  helmet: DEFAULT_COMPLIANCE_STATUS,
  vest: DEFAULT_COMPLIANCE_STATUS,
  mask: DEFAULT_COMPLIANCE_STATUS,
});

export type CategoryMatches = {
  helmet: MatchResult;
  vest: MatchResult;
  mask: MaskResolution;
};

const assignedPersonIds = (result: MatchResult): Set<number> =>
  new Set(result.assignments.map((assignment) => assignment.personId));

/**
 * Builds one record per person, indexed by personId. A mask-violation
 * assignment overrides positive mask evidence for the same person.
 */
export const commitAssignments = (
  persons: readonly Person[],
  matches: CategoryMatches,
): ComplianceRecord[] => {
  const records = persons.map(() => createComplianceRecord());

  assignedPersonIds(matches.helmet).forEach((personId) => {
    records[personId].helmet = "COMPLIANT";
  });
  assignedPersonIds(matches.vest).forEach((personId) => {
    records[personId].vest = "COMPLIANT";
  });
  assignedPersonIds(matches.mask.worn).forEach((personId) => {
    records[personId].mask = "COMPLIANT";
  });
  assignedPersonIds(matches.mask.violations).forEach((personId) => {
    records[personId].mask = "VIOLATION";
  });

  return records;
};

export const countCompliantFields = (record: ComplianceRecord): number =>
  PPE_CATEGORIES.filter((category) => record[category] === "COMPLIANT").length;

export const resolveOverallColor = (record: ComplianceRecord): OverallColor =>
  countCompliantFields(record) === PPE_CATEGORIES.length ? "GREEN" : "RED";

export const personComplianceScore = (record: ComplianceRecord): number =>
  Math.floor((countCompliantFields(record) / PPE_CATEGORIES.length) * 100);

export const formatPersonLabel = (
  color: OverallColor,
  complianceScore: number,
): string => `${color === "GREEN" ? "SAFE" : "UNSAFE"} | ${complianceScore}%`;

export const resolveRiskLevel = (score: number, bands: RiskBands): RiskLevel => {
  if (score >= bands.low) {
    return "LOW";
  }
  if (score >= bands.medium) {
    return "MEDIUM";
  }
  return "HIGH";
};

const countCategory = (
  records: readonly ComplianceRecord[],
  category: PpeCategory,
): CategoryCounts => {
  const wearing = records.filter(
    (record) => record[category] === "COMPLIANT",
  ).length;
  return { wearing, notWearing: records.length - wearing };
};

export const summarizeCompliance = (
  records: readonly ComplianceRecord[],
  bands: RiskBands,
): ComplianceSummary => {
  const total = records.length;
  const helmet = countCategory(records, "helmet");
  const vest = countCategory(records, "vest");
  const mask = countCategory(records, "mask");

  const complianceScore =
    total === 0
      ? 0
      : Math.floor(
          ((helmet.wearing + vest.wearing + mask.wearing) /
            (PPE_CATEGORIES.length * total)) *
            100,
        );
  const riskLevel = resolveRiskLevel(complianceScore, bands);

  return {
    total,
    helmet,
    vest,
    mask,
    complianceScore,
    riskLevel,
    recommendation: RISK_RECOMMENDATIONS[riskLevel],
  };
};

export const buildPersonReports = (
  persons: readonly Person[],
  records: readonly ComplianceRecord[],
): PersonReport[] => {
  return persons.map((person) => {
    const record = records[person.personId];
    const overallColor = resolveOverallColor(record);
    const complianceScore = personComplianceScore(record);

    return {
      personId: person.personId,
      box: { ...person.detection.box },
      confidence: person.detection.confidence,
      helmet: record.helmet,
      vest: record.vest,
      mask: record.mask,
      overallColor,
      complianceScore,
      label: formatPersonLabel(overallColor, complianceScore),
    };
  });
};
