import type {
  Classification,
  ClassificationName,
  ResolvedScore,
  ScoreInput,
  ScoreName,
} from '../shared/types.js';
import type { ScoreRepository } from '../warehouse/score-repository.js';

/** Scores within ±SCORE_EPSILON of zero count as additive. */
export const SCORE_EPSILON = 1e-5;

const SCORE_FIELDS: ReadonlyArray<readonly [ScoreName, keyof ScoreInput]> = [
  ['HSA', 'hsa'],
  ['Bliss', 'bliss'],
  ['Loewe', 'loewe'],
  ['ZIP', 'zip'],
];

export interface ScoreVote {
  scoreName: ScoreName;
  value: number;
  vote: Classification;
}

export interface ClassifiedScores {
  votes: ScoreVote[];
  classification: Classification;
}

export interface ScoreEngineResult {
  scores: ResolvedScore[];
  classification: Classification;
}

export function roundScore(value: number): number {
  return Math.round(value * 1e4) / 1e4;
}

function sign(value: number): Classification {
  if (value > 0) return 1;
  if (value < 0) return -1;
  return 0;
}

export function voteFor(value: number): Classification {
  if (value > SCORE_EPSILON) return 1;
  if (value < -SCORE_EPSILON) return -1;
  return 0;
}

/**
 * Majority vote across the synergy metrics present: each one votes +1, -1 or
 * 0 by its sign, and the classification is the sign of the total. Missing
 * and non-finite scores do not vote.
 */
export function classifyScores(input: ScoreInput): ClassifiedScores {
  const votes: ScoreVote[] = [];
  for (const [scoreName, field] of SCORE_FIELDS) {
    const value = input[field];
    if (value === null || !Number.isFinite(value)) {
      continue;
    }
    votes.push({ scoreName, value, vote: voteFor(value) });
  }
  const total = votes.reduce((sum, v) => sum + v.vote, 0);
  return { votes, classification: sign(total) };
}

export function classificationName(classification: Classification): ClassificationName {
  if (classification > 0) return 'Synergistic';
  if (classification < 0) return 'Antagonistic';
  return 'Additive';
}

/**
 * Classifies a combination's scores and resolves each present score's id,
 * rounding values to four decimals for storage.
 */
export class ScoreEngine {
  private readonly scores: ScoreRepository;

  constructor(scores: ScoreRepository) {
    this.scores = scores;
  }

  run(input: ScoreInput): ScoreEngineResult {
    const { votes, classification } = classifyScores(input);
    return {
      scores: votes.map((v) => ({
        scoreName: v.scoreName,
        scoreValue: roundScore(v.value),
        scoreId: this.scores.getOrCreate(v.scoreName),
      })),
      classification,
    };
  }
}
