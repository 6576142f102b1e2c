import type {
  BoundingBox,
  IndexedDetection,
  PpeCategory,
} from "../../shared/types/detection";

export type ScoreFn = (candidateBox: BoundingBox, personBox: BoundingBox) => number;

export type MatchStrategy = {
  category: PpeCategory;
  score: ScoreFn;
  /** Inclusive: a score equal to the threshold is a match. */
  threshold: number;
};

export type Assignment = {
  personId: number;
  candidate: IndexedDetection;
  score: number;
};

export type UnmatchedReason = "below-threshold" | "outscored";

export type UnmatchedCandidate = {
  candidate: IndexedDetection;
  reason: UnmatchedReason;
  /** Best score reached against any person, 0 when there were none. */
  bestScore: number;
};

export type MatchResult = {
  category: PpeCategory;
  /** Ordered by personId. */
  assignments: Assignment[];
  /** Ordered by input index. */
  unmatched: UnmatchedCandidate[];
};
