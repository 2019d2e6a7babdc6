// Property-Based Tests for the scoring rubric
// Aggregation invariants: total is the sum of criteria, each criterion stays
// within its maximum, percentage equals total, and the tier follows the table.

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import {
  CRITERION_KEYS,
  MAX_CRITERION_SCORE,
  buildCriterionScore,
  buildOverall,
  deriveRankingTier,
  rescaleRawScore,
} from "./scoring-rubric.js";
import type { CriterionKey, CriterionScore, RankingTier } from "./types.js";

// ─── Generators ─────────────────────────────────────────────────────────────────

/** Raw model scores: any finite value in 0..10, including one-decimal values. */
function arbitraryRawScore(): fc.Arbitrary<number> {
  return fc.oneof(
    fc.integer({ min: 0, max: 100 }).map((tenths) => tenths / 10),
    fc.double({ min: 0, max: 10, noNaN: true, noDefaultInfinity: true }),
  );
}

function expectedTier(percentage: number): RankingTier {
  if (percentage >= 85) return "excellent";
  if (percentage >= 70) return "very_good";
  if (percentage >= 55) return "good";
  return "needs_improvement";
}

describe("scoring rubric properties", () => {
  it("total equals the criterion sum, each criterion stays in range, percentage equals total", () => {
    fc.assert(
      fc.property(fc.tuple(arbitraryRawScore(), arbitraryRawScore(), arbitraryRawScore(), arbitraryRawScore()), (raws) => {
        const criteria: Record<CriterionKey, CriterionScore> = {
          idea: buildCriterionScore({ score: raws[0], strengths: [], areas_of_improvement: [] }),
          technical_implementation: buildCriterionScore({ score: raws[1], strengths: [], areas_of_improvement: [] }),
          tool_use: buildCriterionScore({ score: raws[2], strengths: [], areas_of_improvement: [] }),
          presentation_delivery: buildCriterionScore({ score: raws[3], strengths: [], areas_of_improvement: [] }),
        };
        const overall = buildOverall(criteria, {
          standout_features: [],
          critical_improvements: [],
          judge_recommendation: "ok",
        });

        let sum = 0;
        for (const key of CRITERION_KEYS) {
          expect(criteria[key].score).toBeGreaterThanOrEqual(0);
          expect(criteria[key].score).toBeLessThanOrEqual(MAX_CRITERION_SCORE);
          sum += criteria[key].score;
        }
        expect(overall.total_score).toBeCloseTo(sum, 9);
        expect(overall.percentage).toBe(overall.total_score);
        expect(overall.ranking_tier).toBe(expectedTier(overall.percentage));
      }),
      { numRuns: 300 },
    );
  });

  it("rescaled scores carry at most one decimal place", () => {
    fc.assert(
      fc.property(arbitraryRawScore(), (raw) => {
        const scaled = rescaleRawScore(raw);
        expect(Math.abs(scaled * 10 - Math.round(scaled * 10))).toBeLessThan(1e-9);
      }),
    );
  });

  it("tier never decreases as the percentage grows", () => {
    const order: RankingTier[] = ["needs_improvement", "good", "very_good", "excellent"];
    fc.assert(
      fc.property(
        fc.double({ min: 0, max: 100, noNaN: true }),
        fc.double({ min: 0, max: 100, noNaN: true }),
        (a, b) => {
          const [low, high] = a <= b ? [a, b] : [b, a];
          expect(order.indexOf(deriveRankingTier(low))).toBeLessThanOrEqual(
            order.indexOf(deriveRankingTier(high)),
          );
        },
      ),
    );
  });
});
