// PitchScoop - Completion output parsing
// Model output must be strict JSON (one surrounding Markdown fence is tolerated).
// Shape checks run through zod; the first failing issue becomes a ParseError
// carrying its dotted path, e.g. "idea.score".

import { z } from "zod";
import { ParseError } from "./errors.js";
import { RAW_SCALE_MAX, type RawCriterion } from "./scoring-rubric.js";
import type { CriterionKey } from "./types.js";

// ─── Schemas ────────────────────────────────────────────────────────────────────

const CriterionSchema = z.object({
  score: z.number().min(0).max(RAW_SCALE_MAX),
  strengths: z.array(z.string()),
  areas_of_improvement: z.array(z.string()),
});

const ScoringResponseSchema = z.object({
  idea: CriterionSchema,
  technical_implementation: CriterionSchema,
  tool_use: CriterionSchema,
  presentation_delivery: CriterionSchema,
  overall: z.object({
    judge_recommendation: z.string().trim().min(1, "must be a non-empty string"),
    standout_features: z.array(z.string()).default([]),
    critical_improvements: z.array(z.string()).default([]),
  }),
});

const ToolAnalysisResponseSchema = z.object({
  tools_identified: z.array(
    z.object({
      tool_name: z.string().trim().min(1),
      usage_description: z.string().default(""),
    }),
  ),
  improvement_suggestions: z.array(z.string()).default([]),
});

const ComparisonResponseSchema = z.object({
  ranking: z
    .array(
      z.object({
        session_id: z.string().min(1),
        rationale: z.string().default(""),
      }),
    )
    .min(1),
  criteria_analysis: z
    .record(z.object({ strongest: z.string(), reasoning: z.string().default("") }))
    .default({}),
  judge_commentary: z.string().default(""),
});

export interface ParsedScoring {
  criteria: Record<CriterionKey, RawCriterion>;
  overall: z.output<typeof ScoringResponseSchema>["overall"];
}

export type ParsedToolAnalysis = z.output<typeof ToolAnalysisResponseSchema>;
export type ParsedComparison = z.output<typeof ComparisonResponseSchema>;

// ─── Parsing ────────────────────────────────────────────────────────────────────

const FENCE = /^```[a-zA-Z]*\s*\n([\s\S]*?)\n?```$/;

/** Removes one Markdown code fence wrapping the whole text, if present. */
export function stripCodeFence(raw: string): string {
  const trimmed = raw.trim();
  const match = FENCE.exec(trimmed);
  return match ? match[1].trim() : trimmed;
}

function parseJson(raw: string): unknown {
  const text = stripCodeFence(raw);
  try {
    return JSON.parse(text);
  } catch {
    throw new ParseError(`Completion output is not valid JSON: ${text.slice(0, 200)}`);
  }
}

function parseWith<S extends z.ZodTypeAny>(schema: S, raw: string, label: string): z.output<S> {
  const result = schema.safeParse(parseJson(raw));
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue && issue.path.length > 0 ? issue.path.join(".") : null;
    const detail = issue ? issue.message : "invalid shape";
    throw new ParseError(`${label} missing or invalid '${path ?? "root"}': ${detail}`, path);
  }
  return result.data;
}

/**
 * Parses a scoring completion. Totals or tiers the model adds are dropped;
 * only raw criterion scores and the narrative fields survive.
 */
export function parseScoringResponse(raw: string): ParsedScoring {
  const data = parseWith(ScoringResponseSchema, raw, "Scoring response");
  return {
    criteria: {
      idea: data.idea,
      technical_implementation: data.technical_implementation,
      tool_use: data.tool_use,
      presentation_delivery: data.presentation_delivery,
    },
    overall: data.overall,
  };
}

export function parseToolAnalysisResponse(raw: string): ParsedToolAnalysis {
  return parseWith(ToolAnalysisResponseSchema, raw, "Tool analysis response");
}

export function parseComparisonResponse(raw: string): ParsedComparison {
  return parseWith(ComparisonResponseSchema, raw, "Comparison response");
}
