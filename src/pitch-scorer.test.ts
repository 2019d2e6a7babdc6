import { describe, it, expect, vi, beforeEach, type Mock } from "vitest";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { FileAudioStorage } from "./audio-storage.js";
import type { CompletionRequest } from "./completion-client.js";
import { ExternalServiceError } from "./errors.js";
import { EventManager } from "./event-manager.js";
import { InMemoryEventStore } from "./event-store.js";
import { PitchScorer, SCORING_MAX_TOKENS, SCORING_TEMPERATURE } from "./pitch-scorer.js";
import { InMemoryScoreStore } from "./score-store.js";
import { SessionLocks } from "./session-locks.js";
import { SessionManager } from "./session-manager.js";
import { InMemorySessionStore } from "./session-store.js";
import { SessionStatus, type PitchSession } from "./types.js";

// ─── Test Helpers ───────────────────────────────────────────────────────────────

function makeSession(
  eventId: string,
  sessionId: string,
  overrides: Partial<PitchSession> = {},
): PitchSession {
  const text = "We built a pitch scoring service on Redis and Azure OpenAI.";
  return {
    session_id: sessionId,
    event_id: eventId,
    team_name: `Team ${sessionId}`,
    pitch_title: `Pitch ${sessionId}`,
    status: SessionStatus.COMPLETED,
    websocket_url: "",
    duration_limit_minutes: 3,
    created_at: "2025-03-01T10:00:00.000Z",
    recording_started_at: "2025-03-01T10:00:05.000Z",
    completed_at: "2025-03-01T10:02:05.000Z",
    transcript_segments: [{ text }],
    final_transcript: { total_text: text, segments_count: 1, segments: [{ text }] },
    audio: { has_audio: false, audio_size: 0 },
    ...overrides,
  };
}

function scoringResponse(raw: [number, number, number, number]): string {
  const criterion = (score: number) => ({
    score,
    strengths: [`strength at ${score}`],
    areas_of_improvement: [`improve from ${score}`],
  });
  return JSON.stringify({
    idea: criterion(raw[0]),
    technical_implementation: criterion(raw[1]),
    tool_use: criterion(raw[2]),
    presentation_delivery: criterion(raw[3]),
    overall: {
      standout_features: ["Live demo"],
      critical_improvements: ["Tighter close"],
      judge_recommendation: "Advance to finals",
    },
  });
}

describe("PitchScorer", () => {
  let clock: number;
  let sessionStore: InMemorySessionStore;
  let scoreStore: InMemoryScoreStore;
  let eventManager: EventManager;
  let complete: Mock<(request: CompletionRequest) => Promise<string>>;
  let locks: SessionLocks;
  let sessionManager: SessionManager;
  let scorer: PitchScorer;

  beforeEach(() => {
    clock = Date.parse("2025-03-01T11:00:00.000Z");
    const now = () => new Date(clock);
    sessionStore = new InMemorySessionStore();
    scoreStore = new InMemoryScoreStore();
    locks = new SessionLocks();
    const audioStorage = new FileAudioStorage({
      baseDir: join(tmpdir(), "pitchscoop-unused"),
      publicBaseUrl: "http://localhost:8000",
      secret: "test-secret",
    });
    eventManager = new EventManager({
      eventStore: new InMemoryEventStore(),
      sessionStore,
      scoreStore,
      audioStorage,
      locks,
      now,
    });
    sessionManager = new SessionManager({
      sessionStore,
      scoreStore,
      eventManager,
      audioStorage,
      publicBaseUrl: "http://localhost:8000",
      locks,
      now,
    });
    complete = vi.fn<(request: CompletionRequest) => Promise<string>>();
    scorer = new PitchScorer({
      sessionStore,
      scoreStore,
      eventManager,
      completionClient: { complete },
      locks,
      now,
    });
  });

  describe("scorePitch", () => {
    it("rescales raw scores and derives totals locally", async () => {
      await sessionStore.put("default", makeSession("default", "s1"));
      complete.mockResolvedValue(scoringResponse([8, 7, 9, 6]));

      const result = await scorer.scorePitch({ session_id: "s1" });

      expect(result).toMatchObject({
        session_id: "s1",
        event_id: "default",
        judge_id: null,
        team_name: "Team s1",
        pitch_title: "Pitch s1",
        scored_at: "2025-03-01T11:00:00.000Z",
        scoring_method: "azure_openai",
        scoring_context: {},
      });
      expect(result.scores.idea).toEqual({
        score: 20,
        max_score: 25,
        raw_score: 8,
        strengths: ["strength at 8"],
        areas_of_improvement: ["improve from 8"],
      });
      expect(result.scores.technical_implementation.score).toBe(17.5);
      expect(result.scores.tool_use.score).toBe(22.5);
      expect(result.scores.presentation_delivery.score).toBe(15);
      expect(result.scores.overall).toEqual({
        total_score: 75,
        max_total: 100,
        percentage: 75,
        ranking_tier: "very_good",
        standout_features: ["Live demo"],
        critical_improvements: ["Tighter close"],
        judge_recommendation: "Advance to finals",
      });
      expect(await scoreStore.get("default", "s1", null)).toEqual(result);
    });

    it("calls the completion client with the scoring parameters and pitch context", async () => {
      await sessionStore.put("default", makeSession("default", "s1"));
      complete.mockResolvedValue(scoringResponse([5, 5, 5, 5]));

      await scorer.scorePitch({ session_id: "s1", scoring_context: { round: "finals" } });

      expect(complete).toHaveBeenCalledTimes(1);
      const request = complete.mock.calls[0][0];
      expect(request.temperature).toBe(SCORING_TEMPERATURE);
      expect(request.maxTokens).toBe(SCORING_MAX_TOKENS);
      expect(SCORING_TEMPERATURE).toBe(0.3);
      expect(SCORING_MAX_TOKENS).toBe(2000);
      expect(request.system).toContain("- idea (Idea, worth 25 points):");
      expect(request.user).toBe(
        [
          "Team: Team s1",
          "Pitch title: Pitch s1",
          "Sponsor tools: none listed",
          "",
          'Scoring context: {"round":"finals"}',
          "",
          "Transcript:",
          "We built a pitch scoring service on Redis and Azure OpenAI.",
        ].join("\n"),
      );
    });

    it("checks existence, then status, then transcript", async () => {
      await expect(scorer.scorePitch({ session_id: "missing" })).rejects.toMatchObject({
        code: "SESSION_NOT_FOUND",
      });

      await sessionStore.put(
        "default",
        makeSession("default", "live", {
          status: SessionStatus.RECORDING,
          completed_at: null,
          final_transcript: null,
        }),
      );
      await expect(scorer.scorePitch({ session_id: "live" })).rejects.toMatchObject({
        code: "SESSION_NOT_COMPLETED",
      });

      await sessionStore.put(
        "default",
        makeSession("default", "silent", {
          final_transcript: { total_text: "", segments_count: 0, segments: [] },
        }),
      );
      await expect(scorer.scorePitch({ session_id: "silent" })).rejects.toMatchObject({
        code: "MISSING_TRANSCRIPT",
      });

      expect(complete).not.toHaveBeenCalled();
    });

    it("does not see sessions of another event", async () => {
      await sessionStore.put("default", makeSession("default", "s1"));
      await expect(scorer.scorePitch({ session_id: "s1", event_id: "other" })).rejects.toMatchObject({
        code: "SESSION_NOT_FOUND",
      });
    });

    it("keeps one result per judge and replaces only the rescoring judge", async () => {
      await sessionStore.put("default", makeSession("default", "s1"));

      complete.mockResolvedValueOnce(scoringResponse([5, 5, 5, 5]));
      await scorer.scorePitch({ session_id: "s1" });
      clock += 1000;
      complete.mockResolvedValueOnce(scoringResponse([8, 7, 9, 6]));
      await scorer.scorePitch({ session_id: "s1", judge_id: "alice" });
      clock += 1000;
      complete.mockResolvedValueOnce(scoringResponse([10, 10, 10, 10]));
      await scorer.scorePitch({ session_id: "s1", judge_id: "bob" });

      const all = await scorer.getScores("default", "s1");
      expect(all.judge_count).toBe(3);
      expect(all.results.map((r) => r.judge_id)).toEqual([null, "alice", "bob"]);
      expect(all.average_total_score).toBe(75);

      clock += 1000;
      complete.mockResolvedValueOnce(scoringResponse([6, 6, 6, 6]));
      await scorer.scorePitch({ session_id: "s1", judge_id: "alice" });

      const after = await scorer.getScores("default", "s1");
      expect(after.results.map((r) => r.judge_id)).toEqual([null, "bob", "alice"]);
      expect(after.results.map((r) => r.scores.overall.total_score)).toEqual([50, 100, 60]);
      expect(after.average_total_score).toBe(70);

      const alice = await scorer.getScores("default", "s1", "alice");
      expect(alice.judge_count).toBe(1);
      expect(alice.results[0].scored_at).toBe("2025-03-01T11:00:03.000Z");
    });

    it("stores nothing when the completion cannot be parsed", async () => {
      await sessionStore.put("default", makeSession("default", "s1"));
      complete.mockResolvedValue("I would give this pitch an 8.");

      await expect(scorer.scorePitch({ session_id: "s1" })).rejects.toMatchObject({
        code: "PARSE_ERROR",
        statusCode: 422,
      });
      expect(await scoreStore.listForSession("default", "s1")).toEqual([]);
    });

    it("propagates completion failures", async () => {
      await sessionStore.put("default", makeSession("default", "s1"));
      complete.mockRejectedValue(
        new ExternalServiceError("azure_openai", "Completion request failed: timeout"),
      );

      await expect(scorer.scorePitch({ session_id: "s1" })).rejects.toMatchObject({
        code: "COMPLETION_FAILED",
        message: "Completion request failed: timeout",
      });
    });

    it("does not store a score for a session deleted while the completion was pending", async () => {
      await sessionStore.put("default", makeSession("default", "s1"));
      let release: (raw: string) => void = () => undefined;
      complete.mockImplementation(
        () =>
          new Promise<string>((resolve) => {
            release = resolve;
          }),
      );

      const pending = scorer.scorePitch({ session_id: "s1", judge_id: "alice" });
      await vi.waitFor(() => expect(complete).toHaveBeenCalledTimes(1));
      await sessionManager.deleteSession("default", "s1");
      release(scoringResponse([8, 7, 9, 6]));

      await expect(pending).rejects.toMatchObject({
        code: "SESSION_NOT_FOUND",
        message: "Session s1 in event default was deleted before its score was stored",
      });
      expect(await scoreStore.listForSession("default", "s1")).toEqual([]);
    });

    it("does not store a score once the session's event is deleted", async () => {
      const event = await eventManager.createEvent({ event_name: "Hack", event_type: "hackathon" });
      await sessionStore.put(event.event_id, makeSession(event.event_id, "s1"));
      let release: (raw: string) => void = () => undefined;
      complete.mockImplementation(
        () =>
          new Promise<string>((resolve) => {
            release = resolve;
          }),
      );

      const pending = scorer.scorePitch({ session_id: "s1", event_id: event.event_id });
      await vi.waitFor(() => expect(complete).toHaveBeenCalledTimes(1));
      await eventManager.deleteEvent(event.event_id, true);
      release(scoringResponse([8, 7, 9, 6]));

      await expect(pending).rejects.toMatchObject({ code: "SESSION_NOT_FOUND" });
      expect(await scoreStore.listForEvent(event.event_id)).toEqual([]);
    });
  });

  describe("getScores", () => {
    it("reports sessions without scores", async () => {
      await expect(scorer.getScores("default", "s1")).rejects.toMatchObject({
        code: "SCORES_NOT_FOUND",
        message: "No scores for session s1 in event default",
      });
      await expect(scorer.getScores("default", "s1", "alice")).rejects.toMatchObject({
        code: "SCORES_NOT_FOUND",
        message: "No scores by judge alice for session s1 in event default",
      });
    });
  });

  describe("analyzeToolUsage", () => {
    it("deduplicates tools and compares them with the event's sponsor tools", async () => {
      const event = await eventManager.createEvent({
        event_name: "Hack",
        event_type: "hackathon",
        sponsor_tools: ["Redis", "MinIO", "Azure OpenAI"],
      });
      await sessionStore.put(event.event_id, makeSession(event.event_id, "s1"));
      complete.mockResolvedValue(
        JSON.stringify({
          tools_identified: [
            { tool_name: "Redis", usage_description: "Session cache" },
            { tool_name: "redis", usage_description: "Duplicate mention" },
            { tool_name: "Azure OpenAI", usage_description: "Scoring" },
          ],
          improvement_suggestions: ["Show the MinIO integration"],
        }),
      );

      const result = await scorer.analyzeToolUsage({ session_id: "s1", event_id: event.event_id });

      expect(result).toEqual({
        session_id: "s1",
        event_id: event.event_id,
        team_name: "Team s1",
        analysis: {
          tools_identified: [
            { tool_name: "Redis", usage_description: "Session cache" },
            { tool_name: "Azure OpenAI", usage_description: "Scoring" },
          ],
          tool_count: 2,
          meets_minimum_requirement: false,
          expected_tools: ["Redis", "MinIO", "Azure OpenAI"],
          missing_expected_tools: ["MinIO"],
          improvement_suggestions: ["Show the MinIO integration"],
        },
      });
      expect(complete.mock.calls[0][0].user).toContain("Sponsor tools: Redis, MinIO, Azure OpenAI");
    });

    it("meets the minimum with three distinct tools and honors explicit sponsor tools", async () => {
      await sessionStore.put("default", makeSession("default", "s1"));
      complete.mockResolvedValue(
        JSON.stringify({
          tools_identified: [{ tool_name: "A" }, { tool_name: "B" }, { tool_name: "C" }],
        }),
      );

      const { analysis } = await scorer.analyzeToolUsage({ session_id: "s1", sponsor_tools: ["a", "D"] });

      expect(analysis.tool_count).toBe(3);
      expect(analysis.meets_minimum_requirement).toBe(true);
      expect(analysis.expected_tools).toEqual(["a", "D"]);
      expect(analysis.missing_expected_tools).toEqual(["D"]);
      expect(analysis.improvement_suggestions).toEqual([]);
    });
  });

  describe("comparePitches", () => {
    beforeEach(async () => {
      for (const id of ["s1", "s2", "s3"]) {
        await sessionStore.put("default", makeSession("default", id));
      }
      await sessionStore.put(
        "default",
        makeSession("default", "live", { status: SessionStatus.RECORDING, final_transcript: null }),
      );
    });

    it("ranks the usable sessions and reports skipped ones", async () => {
      complete.mockResolvedValue(
        JSON.stringify({
          ranking: [
            { session_id: "s2", rationale: "Clearest demo" },
            { session_id: "stranger", rationale: "Not compared" },
            { session_id: "s1", rationale: "Strong idea" },
            { session_id: "s2", rationale: "Repeated" },
            { session_id: "s3" },
          ],
          criteria_analysis: { idea: { strongest: "s1", reasoning: "Most original" } },
          judge_commentary: "Close field",
        }),
      );

      const result = await scorer.comparePitches({
        session_ids: ["s1", "live", "s2", "gone", "s3", "s1"],
      });

      expect(result).toEqual({
        event_id: "default",
        sessions_compared: 3,
        skipped_sessions: [
          { session_id: "live", reason: "status is recording" },
          { session_id: "gone", reason: "not found in event" },
        ],
        comparison: {
          ranking: [
            { rank: 1, session_id: "s2", team_name: "Team s2", rationale: "Clearest demo" },
            { rank: 2, session_id: "s1", team_name: "Team s1", rationale: "Strong idea" },
            { rank: 3, session_id: "s3", team_name: "Team s3", rationale: "" },
          ],
          criteria_analysis: { idea: { strongest: "s1", reasoning: "Most original" } },
          judge_commentary: "Close field",
        },
      });
      expect(complete.mock.calls[0][0].system).toContain(
        "Compare them on these criteria: idea, technical_implementation, tool_use, presentation_delivery.",
      );
    });

    it("requires 2 to 10 distinct session ids", async () => {
      await expect(scorer.comparePitches({ session_ids: ["s1", "s1"] })).rejects.toMatchObject({
        code: "VALIDATION_ERROR",
      });
      const eleven = Array.from({ length: 11 }, (_, i) => `id${i}`);
      await expect(scorer.comparePitches({ session_ids: eleven })).rejects.toMatchObject({
        code: "VALIDATION_ERROR",
      });
    });

    it("needs at least two usable sessions before calling the model", async () => {
      await expect(scorer.comparePitches({ session_ids: ["s1", "live"] })).rejects.toMatchObject({
        code: "VALIDATION_ERROR",
        message: "At least 2 completed sessions with transcripts are required; found 1",
      });
      expect(complete).not.toHaveBeenCalled();
    });

    it("fails when the ranking names none of the compared sessions", async () => {
      complete.mockResolvedValue(JSON.stringify({ ranking: [{ session_id: "stranger" }] }));
      await expect(scorer.comparePitches({ session_ids: ["s1", "s2"] })).rejects.toMatchObject({
        code: "PARSE_ERROR",
        path: "ranking",
      });
    });
  });

  describe("analyzePresentationDelivery", () => {
    // 20 words over 10 seconds: 120 words per minute.
    const twentyWords = "um we built a tool that um helps judges score pitches faster and basically fairly with notes for every team";

    function deliverySession(text: string, completedAt: string): PitchSession {
      return makeSession("default", "s1", {
        recording_started_at: "2025-03-01T10:00:00.000Z",
        completed_at: completedAt,
        transcript_segments: [{ text }],
        final_transcript: { total_text: text, segments_count: 1, segments: [{ text }] },
      });
    }

    it("measures pace and filler words against the default benchmark", async () => {
      await sessionStore.put("default", deliverySession(twentyWords, "2025-03-01T10:00:10.000Z"));

      const result = await scorer.analyzePresentationDelivery({ session_id: "s1" });

      expect(result).toEqual({
        session_id: "s1",
        event_id: "default",
        team_name: "Team s1",
        pitch_title: "Pitch s1",
        word_count: 20,
        duration_seconds: 10,
        estimated_wpm: 120,
        benchmark_wpm: 150,
        pace_vs_benchmark: -30,
        pace_assessment: "on_pace",
        filler_word_count: 3,
        filler_percentage: 15,
        transcript_segments: 1,
        duration_limit_minutes: 3,
        exceeded_time_limit: false,
        suggestions: [
          "Cut filler words; pause silently instead",
          "Use more of the 3-minute slot to cover the demo and its impact",
        ],
      });
      expect(complete).not.toHaveBeenCalled();
    });

    it("flags a slow pitch that overran its time limit", async () => {
      await sessionStore.put("default", deliverySession("We ship pitch scoring.", "2025-03-01T10:04:00.000Z"));

      const result = await scorer.analyzePresentationDelivery({ session_id: "s1", benchmark_wpm: 100 });

      expect(result).toMatchObject({
        word_count: 4,
        duration_seconds: 240,
        estimated_wpm: 1,
        pace_vs_benchmark: -99,
        pace_assessment: "too_slow",
        filler_word_count: 0,
        exceeded_time_limit: true,
        suggestions: [
          "Practice to increase speaking pace and keep the audience engaged",
          "Tighten the pitch to fit the 3-minute limit",
        ],
      });
    });

    it("flags a fast pitch", async () => {
      await sessionStore.put("default", deliverySession(twentyWords, "2025-03-01T10:00:05.000Z"));

      const result = await scorer.analyzePresentationDelivery({ session_id: "s1", benchmark_wpm: 200 });

      expect(result.estimated_wpm).toBe(240);
      expect(result.pace_assessment).toBe("too_fast");
      expect(result.suggestions[0]).toBe(
        "Slow down so key points land; aim for about 200 words per minute",
      );
    });

    it("rejects benchmarks outside 100 to 200 words per minute", async () => {
      await sessionStore.put("default", deliverySession(twentyWords, "2025-03-01T10:00:10.000Z"));

      for (const benchmark of [99, 201, 150.5]) {
        await expect(
          scorer.analyzePresentationDelivery({ session_id: "s1", benchmark_wpm: benchmark }),
        ).rejects.toMatchObject({
          code: "VALIDATION_ERROR",
          message: "benchmark_wpm must be an integer between 100 and 200",
        });
      }
    });

    it("applies the scoring guards", async () => {
      await expect(scorer.analyzePresentationDelivery({ session_id: "s1" })).rejects.toMatchObject({
        code: "SESSION_NOT_FOUND",
      });
      await sessionStore.put(
        "default",
        makeSession("default", "s1", { status: SessionStatus.RECORDING, completed_at: null }),
      );
      await expect(scorer.analyzePresentationDelivery({ session_id: "s1" })).rejects.toMatchObject({
        code: "SESSION_NOT_COMPLETED",
      });
    });
  });
});
