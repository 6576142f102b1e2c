import type { BoundingBox, PpeCategory } from "./detection";

export type ComplianceStatus = "COMPLIANT" | "VIOLATION";

export type ComplianceRecord = Record<PpeCategory, ComplianceStatus>;

export type OverallColor = "GREEN" | "RED";

export type RiskLevel = "LOW" | "MEDIUM" | "HIGH";

export type CategoryCounts = {
  wearing: number;
  notWearing: number;
};

export type ComplianceSummary = Record<PpeCategory, CategoryCounts> & {
  total: number;
  /** Share of satisfied helmet/vest/mask checks across all persons, 0-100. */
  complianceScore: number;
  riskLevel: RiskLevel;
  recommendation: string;
};

export type PersonReport = ComplianceRecord & {
  personId: number;
  box: BoundingBox;
  confidence: number;
  overallColor: OverallColor;
  complianceScore: number;
  label: string;
};

export type RgbColor = readonly [number, number, number];

export type Annotation = {
  personId: number;
  box: BoundingBox;
  color: OverallColor;
  rgb: RgbColor;
  label: string;
  labelAnchor: { x: number; y: number };
};

export type AnalysisDiagnostics = {
  malformedCount: number;
  ignoredCount: number;
  unmatched: Record<PpeCategory, number>;
  noPersonsDetected: boolean;
  warnings: string[];
};

export type AnalysisReport = {
  persons: PersonReport[];
  summary: ComplianceSummary;
  annotations: Annotation[];
  diagnostics: AnalysisDiagnostics;
};
