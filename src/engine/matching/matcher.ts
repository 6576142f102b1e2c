import type { IndexedDetection, Person } from "../../shared/types/detection";
import type {
  Assignment,
  MatchResult,
  MatchStrategy,
  UnmatchedCandidate,
} from "./types";

type Preference = {
  personId: number | null;
  score: number;
  /** Best score against any person, eligible or not. */
  bestScore: number;
};

/**
 * Highest score at or above the threshold wins; equal scores go to the
 * lowest personId. A zero score never matches. Persons arrive sorted by
 * personId.
 */
const pickPerson = (
  candidate: IndexedDetection,
  persons: readonly Person[],
  strategy: MatchStrategy,
): Preference => {
  const preference: Preference = { personId: null, score: 0, bestScore: 0 };

  persons.forEach((person) => {
    const score = strategy.score(candidate.detection.box, person.detection.box);
    preference.bestScore = Math.max(preference.bestScore, score);

    if (score <= 0 || score < strategy.threshold) {
      return;
    }
    if (preference.personId === null || score > preference.score) {
      preference.personId = person.personId;
      preference.score = score;
    }
  });

  return preference;
};

/**
 * Assigns each candidate to at most one person and gives each person at most
 * one candidate: the candidate that scored highest for it, with ties going to
 * the earlier input index. The result does not depend on iteration order.
 */
export const matchDetections = (
  persons: readonly Person[],
  candidates: readonly IndexedDetection[],
  strategy: MatchStrategy,
): MatchResult => {
  const winners = new Map<number, Assignment>();
  const unmatched: UnmatchedCandidate[] = [];

  candidates.forEach((candidate) => {
    const preference = pickPerson(candidate, persons, strategy);
    if (preference.personId === null) {
      unmatched.push({
        candidate,
        reason: "below-threshold",
        bestScore: preference.bestScore,
      });
      return;
    }

    const incumbent = winners.get(preference.personId);
    const challenger: Assignment = {
      personId: preference.personId,
      candidate,
      score: preference.score,
    };

    if (!incumbent) {
      winners.set(preference.personId, challenger);
      return;
    }

    const challengerWins =
      challenger.score > incumbent.score ||
      (challenger.score === incumbent.score &&
        challenger.candidate.index < incumbent.candidate.index);

    const loser = challengerWins ? incumbent : challenger;
    if (challengerWins) {
      winners.set(preference.personId, challenger);
    }
    unmatched.push({
      candidate: loser.candidate,
      reason: "outscored",
      bestScore: loser.score,
    });
  });

  return {
    category: strategy.category,
    assignments: [...winners.values()].sort((a, b) => a.personId - b.personId),
    unmatched: unmatched.sort((a, b) => a.candidate.index - b.candidate.index),
  };
};
