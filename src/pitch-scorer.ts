// PitchScoop - Pitch Scorer
// Scores a completed pitch transcript with the LLM judge and stores the result.
//
// Pipeline per scoring call:
//   1. Load the session under (event_id, session_id); it must be completed and
//      carry a non-empty transcript.
//   2. Prompt: system message with rubric and JSON shape, user message with
//      team, title, sponsor tools and the transcript.
//   3. Completion (temperature 0.3, 2000 tokens, JSON mode).
//   4. Strict parse, then rescale and aggregate locally.
//   5. Persist under (event_id, session_id, judge key), holding the session
//      lock and only while the session still exists.
//
// The same session guards and completion path serve tool-usage analysis and
// multi-pitch comparison. Delivery analysis uses the same guards but is
// computed locally from the transcript and timings, without a completion.

import type { CompletionClient } from "./completion-client.js";
import { NotFoundError, ParseError, StateError, ValidationError } from "./errors.js";
import type { EventManager } from "./event-manager.js";
import { silentLogger, type Logger } from "./logger.js";
import {
  parseComparisonResponse,
  parseScoringResponse,
  parseToolAnalysisResponse,
} from "./score-parser.js";
import type { ScoreStore } from "./score-store.js";
import { SessionLocks } from "./session-locks.js";
import {
  CRITERIA,
  CRITERION_KEYS,
  MAX_CRITERION_SCORE,
  RAW_SCALE_MAX,
  buildCriterionScore,
  buildOverall,
  round1,
} from "./scoring-rubric.js";
import type { SessionStore } from "./session-store.js";
import {
  DEFAULT_EVENT_ID,
  SessionStatus,
  type CriterionKey,
  type CriterionScore,
  type PitchComparison,
  type PitchSession,
  type ScoreResult,
  type ToolUsageAnalysis,
} from "./types.js";

// ─── Completion parameters ──────────────────────────────────────────────────────

export const SCORING_TEMPERATURE = 0.3;
export const SCORING_MAX_TOKENS = 2000;
export const MIN_SPONSOR_TOOLS = 3;
export const MIN_COMPARED_SESSIONS = 2;
export const MAX_COMPARED_SESSIONS = 10;

// ─── Delivery analysis ──────────────────────────────────────────────────────────

export const DEFAULT_BENCHMARK_WPM = 150;
export const MIN_BENCHMARK_WPM = 100;
export const MAX_BENCHMARK_WPM = 200;
/** Words per minute either side of the benchmark still counted as on pace. */
export const PACE_TOLERANCE_WPM = 30;
/** Filler words above this share of all words draw a suggestion. */
export const FILLER_RATIO_THRESHOLD = 0.03;
/** Pitches using less than this share of their time limit draw a suggestion. */
export const UNDERUSED_TIME_RATIO = 0.75;

const FILLER_WORDS: ReadonlySet<string> = new Set([
  "um",
  "umm",
  "uh",
  "uhm",
  "er",
  "erm",
  "ah",
  "hmm",
  "basically",
  "literally",
]);

// ─── Inputs and results ─────────────────────────────────────────────────────────

export interface ScorePitchInput {
  session_id: string;
  event_id?: string;
  judge_id?: string;
  scoring_context?: Record<string, unknown>;
}

export interface SessionScores {
  session_id: string;
  event_id: string;
  results: ScoreResult[];
  judge_count: number;
  average_total_score: number;
}

export interface AnalyzeToolsInput {
  session_id: string;
  event_id?: string;
  sponsor_tools?: string[];
}

export interface ToolAnalysisResult {
  session_id: string;
  event_id: string;
  team_name: string;
  analysis: ToolUsageAnalysis;
}

export interface ComparePitchesInput {
  session_ids: string[];
  event_id?: string;
  criteria?: string[];
}

export interface ComparisonResult {
  event_id: string;
  sessions_compared: number;
  skipped_sessions: Array<{ session_id: string; reason: string }>;
  comparison: PitchComparison;
}

export interface AnalyzeDeliveryInput {
  session_id: string;
  event_id?: string;
  benchmark_wpm?: number;
}

export type PaceAssessment = "too_slow" | "on_pace" | "too_fast" | "unknown";

export interface DeliveryAnalysis {
  session_id: string;
  event_id: string;
  team_name: string;
  pitch_title: string;
  word_count: number;
  duration_seconds: number;
  estimated_wpm: number;
  benchmark_wpm: number;
  pace_vs_benchmark: number;
  pace_assessment: PaceAssessment;
  filler_word_count: number;
  /** Filler words as a percentage of all words, one decimal. */
  filler_percentage: number;
  transcript_segments: number;
  duration_limit_minutes: number;
  exceeded_time_limit: boolean;
  suggestions: string[];
}

export interface PitchScorerDeps {
  sessionStore: SessionStore;
  scoreStore: ScoreStore;
  eventManager: EventManager;
  completionClient: CompletionClient;
  locks?: SessionLocks;
  logger?: Logger;
  now?: () => Date;
}

// ─── Prompts ────────────────────────────────────────────────────────────────────

function rubricText(): string {
  return CRITERIA.map(
    (c) => `- ${c.key} (${c.label}, worth ${MAX_CRITERION_SCORE} points): ${c.description}`,
  ).join("\n");
}

function criterionShape(): string {
  return CRITERION_KEYS.map(
    (key) =>
      `  "${key}": { "score": <number 1-${RAW_SCALE_MAX}>, "strengths": [<string>], "areas_of_improvement": [<string>] }`,
  ).join(",\n");
}

function pitchHeader(session: PitchSession, sponsorTools: string[]): string {
  return [
    `Team: ${session.team_name}`,
    `Pitch title: ${session.pitch_title}`,
    `Sponsor tools: ${sponsorTools.length > 0 ? sponsorTools.join(", ") : "none listed"}`,
  ].join("\n");
}

// ─── PitchScorer ────────────────────────────────────────────────────────────────

export class PitchScorer {
  private readonly deps: PitchScorerDeps;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly locks: SessionLocks;

  constructor(deps: PitchScorerDeps) {
    this.deps = deps;
    this.logger = deps.logger ?? silentLogger;
    this.now = deps.now ?? (() => new Date());
    this.locks = deps.locks ?? new SessionLocks();
  }

  /**
   * Scores one pitch and stores the result, replacing only this judge's
   * previous result for the session.
   */
  async scorePitch(input: ScorePitchInput): Promise<ScoreResult> {
    const eventId = input.event_id ?? DEFAULT_EVENT_ID;
    const judgeId = input.judge_id ?? null;
    const session = await this.loadScorableSession(eventId, input.session_id);
    const event = await this.deps.eventManager.getEvent(eventId);
    const scoringContext = input.scoring_context ?? {};

    const startedAt = Date.now();
    this.logger.info("Scoring started", {
      event_id: eventId,
      session_id: session.session_id,
      judge_id: judgeId,
    });

    const raw = await this.deps.completionClient.complete({
      ...this.buildScoringPrompt(session, event.sponsor_tools, scoringContext),
      temperature: SCORING_TEMPERATURE,
      maxTokens: SCORING_MAX_TOKENS,
    });
    const parsed = parseScoringResponse(raw);

    const criteria: Record<CriterionKey, CriterionScore> = {
      idea: buildCriterionScore(parsed.criteria.idea),
      technical_implementation: buildCriterionScore(parsed.criteria.technical_implementation),
      tool_use: buildCriterionScore(parsed.criteria.tool_use),
      presentation_delivery: buildCriterionScore(parsed.criteria.presentation_delivery),
    };

    const result: ScoreResult = {
      session_id: session.session_id,
      event_id: eventId,
      judge_id: judgeId,
      team_name: session.team_name,
      pitch_title: session.pitch_title,
      scored_at: this.now().toISOString(),
      scoring_method: "azure_openai",
      scoring_context: scoringContext,
      scores: { ...criteria, overall: buildOverall(criteria, parsed.overall) },
    };
    await this.locks.run(eventId, session.session_id, async () => {
      // The session may have been deleted while the completion was pending.
      const current = await this.deps.sessionStore.get(eventId, session.session_id);
      if (!current) {
        throw new NotFoundError(
          "SESSION_NOT_FOUND",
          `Session ${session.session_id} in event ${eventId} was deleted before its score was stored`,
        );
      }
      await this.deps.scoreStore.put(eventId, result);
    });

    this.logger.info("Scoring complete", {
      event_id: eventId,
      session_id: session.session_id,
      judge_id: judgeId,
      total_score: result.scores.overall.total_score,
      ranking_tier: result.scores.overall.ranking_tier,
      duration_ms: Date.now() - startedAt,
    });
    return result;
  }

  /**
   * Stored results for a session: one judge's when `judgeId` is given,
   * otherwise every judge's.
   * @throws NotFoundError SCORES_NOT_FOUND when nothing is stored.
   */
  async getScores(eventId: string, sessionId: string, judgeId?: string): Promise<SessionScores> {
    let results: ScoreResult[];
    if (judgeId !== undefined) {
      const single = await this.deps.scoreStore.get(eventId, sessionId, judgeId);
      results = single ? [single] : [];
    } else {
      results = await this.deps.scoreStore.listForSession(eventId, sessionId);
    }
    if (results.length === 0) {
      const whose = judgeId !== undefined ? ` by judge ${judgeId}` : "";
      throw new NotFoundError(
        "SCORES_NOT_FOUND",
        `No scores${whose} for session ${sessionId} in event ${eventId}`,
      );
    }
    results.sort((a, b) => a.scored_at.localeCompare(b.scored_at));
    const sum = results.reduce((acc, r) => acc + r.scores.overall.total_score, 0);
    return {
      session_id: sessionId,
      event_id: eventId,
      results,
      judge_count: results.length,
      average_total_score: round1(sum / results.length),
    };
  }

  /** LLM analysis of how the pitch uses the event's sponsor tools. */
  async analyzeToolUsage(input: AnalyzeToolsInput): Promise<ToolAnalysisResult> {
    const eventId = input.event_id ?? DEFAULT_EVENT_ID;
    const session = await this.loadScorableSession(eventId, input.session_id);
    const event = await this.deps.eventManager.getEvent(eventId);
    const expected = input.sponsor_tools ?? event.sponsor_tools;

    const raw = await this.deps.completionClient.complete({
      system: [
        "You analyze startup pitch transcripts for the sponsor tools and technologies a team used.",
        "Only list tools the transcript actually mentions or clearly describes.",
        "Respond with JSON only, shaped as:",
        '{ "tools_identified": [{ "tool_name": <string>, "usage_description": <string> }],',
        '  "improvement_suggestions": [<string>] }',
      ].join("\n"),
      user: `${pitchHeader(session, expected)}\n\nTranscript:\n${session.final_transcript?.total_text ?? ""}`,
      temperature: SCORING_TEMPERATURE,
      maxTokens: SCORING_MAX_TOKENS,
    });
    const parsed = parseToolAnalysisResponse(raw);

    const seen = new Set<string>();
    const tools = parsed.tools_identified.filter((t) => {
      const name = t.tool_name.toLowerCase();
      if (seen.has(name)) return false;
      seen.add(name);
      return true;
    });

    this.logger.info("Tool analysis complete", {
      event_id: eventId,
      session_id: session.session_id,
      tool_count: tools.length,
    });

    return {
      session_id: session.session_id,
      event_id: eventId,
      team_name: session.team_name,
      analysis: {
        tools_identified: tools,
        tool_count: tools.length,
        meets_minimum_requirement: tools.length >= MIN_SPONSOR_TOOLS,
        expected_tools: [...expected],
        missing_expected_tools: expected.filter((tool) => !seen.has(tool.toLowerCase())),
        improvement_suggestions: parsed.improvement_suggestions,
      },
    };
  }

  /**
   * Ranks 2..10 pitches of one event against each other. Sessions that are
   * missing, unfinished or untranscribed are skipped and reported.
   */
  async comparePitches(input: ComparePitchesInput): Promise<ComparisonResult> {
    const eventId = input.event_id ?? DEFAULT_EVENT_ID;
    const ids = [...new Set(input.session_ids)];
    if (ids.length < MIN_COMPARED_SESSIONS || ids.length > MAX_COMPARED_SESSIONS) {
      throw new ValidationError(
        `compare_pitches needs between ${MIN_COMPARED_SESSIONS} and ${MAX_COMPARED_SESSIONS} distinct session_ids`,
      );
    }

    const usable: PitchSession[] = [];
    const skipped: Array<{ session_id: string; reason: string }> = [];
    for (const id of ids) {
      const session = await this.deps.sessionStore.get(eventId, id);
      if (!session) {
        skipped.push({ session_id: id, reason: "not found in event" });
      } else if (session.status !== SessionStatus.COMPLETED) {
        skipped.push({ session_id: id, reason: `status is ${session.status}` });
      } else if (!session.final_transcript?.total_text.trim()) {
        skipped.push({ session_id: id, reason: "no transcript" });
      } else {
        usable.push(session);
      }
    }
    if (usable.length < MIN_COMPARED_SESSIONS) {
      throw new ValidationError(
        `At least ${MIN_COMPARED_SESSIONS} completed sessions with transcripts are required; found ${usable.length}`,
      );
    }

    const criteria = input.criteria && input.criteria.length > 0 ? input.criteria : [...CRITERION_KEYS];
    const pitches = usable
      .map(
        (s, i) =>
          `Pitch ${i + 1}\nsession_id: ${s.session_id}\nTeam: ${s.team_name}\nTitle: ${s.pitch_title}\n` +
          `Transcript:\n${s.final_transcript?.total_text ?? ""}`,
      )
      .join("\n\n---\n\n");

    const raw = await this.deps.completionClient.complete({
      system: [
        "You are a competition judge comparing startup pitches from the same event.",
        `Compare them on these criteria: ${criteria.join(", ")}.`,
        "Rank every pitch from strongest to weakest using the session_id values given.",
        "Respond with JSON only, shaped as:",
        '{ "ranking": [{ "session_id": <string>, "rationale": <string> }],',
        '  "criteria_analysis": { <criterion>: { "strongest": <session_id>, "reasoning": <string> } },',
        '  "judge_commentary": <string> }',
      ].join("\n"),
      user: pitches,
      temperature: SCORING_TEMPERATURE,
      maxTokens: SCORING_MAX_TOKENS,
    });
    const parsed = parseComparisonResponse(raw);

    const byId = new Map(usable.map((s) => [s.session_id, s]));
    const ranked = new Set<string>();
    const ranking: PitchComparison["ranking"] = [];
    for (const entry of parsed.ranking) {
      const session = byId.get(entry.session_id);
      if (!session || ranked.has(entry.session_id)) continue;
      ranked.add(entry.session_id);
      ranking.push({
        rank: ranking.length + 1,
        session_id: session.session_id,
        team_name: session.team_name,
        rationale: entry.rationale,
      });
    }
    if (ranking.length === 0) {
      throw new ParseError("Comparison ranking referenced none of the compared sessions", "ranking");
    }

    this.logger.info("Pitch comparison complete", {
      event_id: eventId,
      sessions_compared: usable.length,
    });

    return {
      event_id: eventId,
      sessions_compared: usable.length,
      skipped_sessions: skipped,
      comparison: {
        ranking,
        criteria_analysis: parsed.criteria_analysis,
        judge_commentary: parsed.judge_commentary,
      },
    };
  }

  /**
   * Speaking pace and filler words from the finished transcript, measured
   * against a words-per-minute benchmark between 100 and 200.
   */
  async analyzePresentationDelivery(input: AnalyzeDeliveryInput): Promise<DeliveryAnalysis> {
    const eventId = input.event_id ?? DEFAULT_EVENT_ID;
    const benchmark = input.benchmark_wpm ?? DEFAULT_BENCHMARK_WPM;
    if (!Number.isInteger(benchmark) || benchmark < MIN_BENCHMARK_WPM || benchmark > MAX_BENCHMARK_WPM) {
      throw new ValidationError(
        `benchmark_wpm must be an integer between ${MIN_BENCHMARK_WPM} and ${MAX_BENCHMARK_WPM}`,
      );
    }
    const session = await this.loadScorableSession(eventId, input.session_id);

    const words = (session.final_transcript?.total_text ?? "").split(/\s+/).filter((w) => w.length > 0);
    const fillers = words.filter((w) => FILLER_WORDS.has(w.toLowerCase().replace(/[^a-z]/g, ""))).length;
    const started = Date.parse(session.recording_started_at ?? session.created_at);
    const ended = Date.parse(session.completed_at ?? session.created_at);
    const durationSeconds = round1(Math.max(0, ended - started) / 1000);
    const wpm = durationSeconds > 0 ? round1((words.length / durationSeconds) * 60) : 0;
    const limitSeconds = session.duration_limit_minutes * 60;

    let pace: PaceAssessment = "on_pace";
    if (durationSeconds === 0) pace = "unknown";
    else if (wpm < benchmark - PACE_TOLERANCE_WPM) pace = "too_slow";
    else if (wpm > benchmark + PACE_TOLERANCE_WPM) pace = "too_fast";

    const fillerRatio = words.length > 0 ? fillers / words.length : 0;
    const exceeded = durationSeconds > limitSeconds;
    const suggestions: string[] = [];
    if (pace === "too_slow") {
      suggestions.push("Practice to increase speaking pace and keep the audience engaged");
    } else if (pace === "too_fast") {
      suggestions.push(`Slow down so key points land; aim for about ${benchmark} words per minute`);
    }
    if (fillerRatio > FILLER_RATIO_THRESHOLD) {
      suggestions.push("Cut filler words; pause silently instead");
    }
    if (exceeded) {
      suggestions.push(`Tighten the pitch to fit the ${session.duration_limit_minutes}-minute limit`);
    } else if (durationSeconds < limitSeconds * UNDERUSED_TIME_RATIO) {
      suggestions.push(
        `Use more of the ${session.duration_limit_minutes}-minute slot to cover the demo and its impact`,
      );
    }

    this.logger.info("Delivery analysis complete", {
      event_id: eventId,
      session_id: session.session_id,
      estimated_wpm: wpm,
      pace_assessment: pace,
    });

    return {
      session_id: session.session_id,
      event_id: eventId,
      team_name: session.team_name,
      pitch_title: session.pitch_title,
      word_count: words.length,
      duration_seconds: durationSeconds,
      estimated_wpm: wpm,
      benchmark_wpm: benchmark,
      pace_vs_benchmark: round1(wpm - benchmark),
      pace_assessment: pace,
      filler_word_count: fillers,
      filler_percentage: round1(fillerRatio * 100),
      transcript_segments: session.final_transcript?.segments_count ?? 0,
      duration_limit_minutes: session.duration_limit_minutes,
      exceeded_time_limit: exceeded,
      suggestions,
    };
  }

  // ── Internals ──────────────────────────────────────────────────────────────

  /**
   * @throws NotFoundError SESSION_NOT_FOUND, StateError SESSION_NOT_COMPLETED
   *   or MISSING_TRANSCRIPT
   */
  private async loadScorableSession(eventId: string, sessionId: string): Promise<PitchSession> {
    const session = await this.deps.sessionStore.get(eventId, sessionId);
    if (!session) {
      throw new NotFoundError(
        "SESSION_NOT_FOUND",
        `Session not found: ${sessionId} in event ${eventId}`,
      );
    }
    if (session.status !== SessionStatus.COMPLETED) {
      throw new StateError(
        "SESSION_NOT_COMPLETED",
        `Session ${sessionId} is ${session.status}; stop the recording before scoring`,
      );
    }
    if (!session.final_transcript || session.final_transcript.total_text.trim() === "") {
      throw new StateError("MISSING_TRANSCRIPT", `Session ${sessionId} has no transcript to score`);
    }
    return session;
  }

  private buildScoringPrompt(
    session: PitchSession,
    sponsorTools: string[],
    scoringContext: Record<string, unknown>,
  ): { system: string; user: string } {
    const system = [
      "You are an experienced startup competition judge scoring a pitch transcript.",
      "",
      "Score each criterion on a 1-10 scale:",
      rubricText(),
      "",
      "Give concrete strengths and areas of improvement that cite what the team said.",
      "Do not compute totals; respond with JSON only, shaped exactly as:",
      "{",
      criterionShape() + ",",
      '  "overall": { "standout_features": [<string>], "critical_improvements": [<string>], "judge_recommendation": <string> }',
      "}",
    ].join("\n");

    const parts = [pitchHeader(session, sponsorTools)];
    if (Object.keys(scoringContext).length > 0) {
      parts.push(`Scoring context: ${JSON.stringify(scoringContext)}`);
    }
    parts.push(`Transcript:\n${session.final_transcript?.total_text ?? ""}`);

    return { system, user: parts.join("\n\n") };
  }
}
