import type { DetectionLabel } from "../../shared/types/detection";

export type LabelResolution =
  | { kind: "known"; label: DetectionLabel }
  | { kind: "ignored" }
  | { kind: "unknown" };

// Keys are normalised class names (see normalizeClassName).
const LABEL_ALIASES = new Map<string, DetectionLabel>([
  ["person", "person"],
  ["worker", "person"],
  ["hardhat", "helmet"],
  ["helmet", "helmet"],
  ["safetyvest", "vest"],
  ["vest", "vest"],
  ["nomask", "mask-violation"],
  ["mask", "mask"],
  ["facemask", "mask"],
]);

// Classes the PPE model emits that take no part in matching.
const IGNORED_LABELS = new Set([
  "nohardhat",
  "nosafetyvest",
  "safetycone",
  "machinery",
  "vehicle",
]);

export const normalizeClassName = (raw: string): string => {
  return raw.trim().toLowerCase().replace(/[\s_-]+/g, "");
};

export const resolveLabel = (raw: string): LabelResolution => {
  const normalised = normalizeClassName(raw);
  const label = LABEL_ALIASES.get(normalised);
  if (label) {
    return { kind: "known", label };
  }
  if (IGNORED_LABELS.has(normalised)) {
    return { kind: "ignored" };
  }
  return { kind: "unknown" };
};
