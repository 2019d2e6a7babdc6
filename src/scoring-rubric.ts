// PitchScoop - Scoring rubric
// Four criteria worth 25 points each. The model scores each on a 0..10 scale;
// everything derived from those raw scores (rescaled criterion scores, total,
// percentage, tier) is computed here and never taken from the model.

import type { CriterionKey, CriterionScore, OverallScore, RankingTier } from "./types.js";

export const RAW_SCALE_MAX = 10;
export const MAX_CRITERION_SCORE = 25;

export interface CriterionDefinition {
  key: CriterionKey;
  label: string;
  description: string;
}

export const CRITERIA: readonly CriterionDefinition[] = [
  {
    key: "idea",
    label: "Idea",
    description:
      "Unique value proposition, the problem being solved, market potential and originality.",
  },
  {
    key: "technical_implementation",
    label: "Technical Implementation",
    description:
      "Novel use of technology, technical sophistication, architecture and evidence of a working build.",
  },
  {
    key: "tool_use",
    label: "Tool Use",
    description:
      "Meaningful integration of the sponsor tools, how many are used and how well they are combined.",
  },
  {
    key: "presentation_delivery",
    label: "Presentation Delivery",
    description:
      "Clarity, structure, demo effectiveness and use of the available time.",
  },
];

export const CRITERION_KEYS: readonly CriterionKey[] = CRITERIA.map((c) => c.key);

export const MAX_TOTAL_SCORE = MAX_CRITERION_SCORE * CRITERIA.length;

// Ordered from highest floor down; the first floor a percentage reaches wins.
export const RANKING_TIERS: ReadonlyArray<{ tier: RankingTier; minPercentage: number }> = [
  { tier: "excellent", minPercentage: 85 },
  { tier: "very_good", minPercentage: 70 },
  { tier: "good", minPercentage: 55 },
  { tier: "needs_improvement", minPercentage: 0 },
];

/** Rounds to one decimal place. */
export function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Maps a raw 0..10 score onto 0..25, rounded to one decimal.
 * Out-of-range input is clamped first.
 */
export function rescaleRawScore(raw: number): number {
  const clamped = Math.min(RAW_SCALE_MAX, Math.max(0, raw));
  // raw × 2.5 in tenths: raw × 25 keeps one-decimal raw scores exact
  return Math.round(clamped * 25) / 10;
}

export function deriveRankingTier(percentage: number): RankingTier {
  for (const { tier, minPercentage } of RANKING_TIERS) {
    if (percentage >= minPercentage) return tier;
  }
  return "needs_improvement";
}

export interface RawCriterion {
  score: number;
  strengths: string[];
  areas_of_improvement: string[];
}

export function buildCriterionScore(raw: RawCriterion): CriterionScore {
  return {
    score: rescaleRawScore(raw.score),
    max_score: MAX_CRITERION_SCORE,
    raw_score: raw.score,
    strengths: [...raw.strengths],
    areas_of_improvement: [...raw.areas_of_improvement],
  };
}

/**
 * Sums criterion scores in tenths so the total is exact to one decimal.
 * Percentage equals the total because the maximum is 100.
 */
export function buildOverall(
  criteria: Record<CriterionKey, CriterionScore>,
  narrative: {
    standout_features: string[];
    critical_improvements: string[];
    judge_recommendation: string;
  },
): OverallScore {
  const tenths = CRITERION_KEYS.reduce((sum, key) => sum + Math.round(criteria[key].score * 10), 0);
  const total = tenths / 10;
  const percentage = round1((total / MAX_TOTAL_SCORE) * 100);
  return {
    total_score: total,
    max_total: MAX_TOTAL_SCORE,
    percentage,
    ranking_tier: deriveRankingTier(percentage),
    standout_features: [...narrative.standout_features],
    critical_improvements: [...narrative.critical_improvements],
    judge_recommendation: narrative.judge_recommendation,
  };
}
