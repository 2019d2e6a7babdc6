// PitchScoop - Shared TypeScript interfaces and types
// Wire-facing records use snake_case keys so tool payloads serialize without mapping.

// ─── Session State Machine ──────────────────────────────────────────────────────

export enum SessionStatus {
  READY_TO_RECORD = "ready_to_record",
  RECORDING = "recording",
  COMPLETED = "completed",
}

// ─── Events (tenant scope) ──────────────────────────────────────────────────────

export const DEFAULT_EVENT_ID = "default";

export type EventType = "hackathon" | "vc_pitch" | "practice";

export type EventStatus = "upcoming" | "active" | "completed";

export interface PitchEvent {
  event_id: string;
  event_name: string;
  event_type: EventType;
  status: EventStatus;
  description: string;
  duration_minutes: number; // per-pitch time limit
  sponsor_tools: string[];
  max_participants: number;
  created_at: string;
  started_at: string | null;
  ended_at: string | null;
}

// ─── Transcript ─────────────────────────────────────────────────────────────────

export interface TranscriptSegment {
  text: string;
  start_time?: number; // seconds from recording start
  end_time?: number;
}

export interface FinalTranscript {
  total_text: string;
  segments_count: number;
  segments: TranscriptSegment[];
}

// ─── Audio ──────────────────────────────────────────────────────────────────────

export interface AudioInfo {
  has_audio: boolean;
  audio_size: number; // bytes
  content_type?: string;
  playback_url?: string;
  expires_at?: string;
  audio_error?: string;
}

// ─── Session ────────────────────────────────────────────────────────────────────

export interface PitchSession {
  session_id: string;
  event_id: string;
  team_name: string;
  pitch_title: string;
  status: SessionStatus;
  websocket_url: string;
  duration_limit_minutes: number;
  created_at: string;
  recording_started_at: string | null;
  completed_at: string | null;
  transcript_segments: TranscriptSegment[];
  final_transcript: FinalTranscript | null;
  audio: AudioInfo;
}

export interface SessionSummary {
  session_id: string;
  event_id: string;
  team_name: string;
  pitch_title: string;
  status: SessionStatus;
  created_at: string;
  completed_at?: string;
  duration_seconds?: number;
  has_audio: boolean;
  transcript_segments: number;
}

export interface SessionFilter {
  event_id?: string;
  team_name?: string;
  status?: SessionStatus;
}

// ─── Scoring ────────────────────────────────────────────────────────────────────

export type CriterionKey =
  | "idea"
  | "technical_implementation"
  | "tool_use"
  | "presentation_delivery";

export type RankingTier = "excellent" | "very_good" | "good" | "needs_improvement";

export interface CriterionScore {
  score: number; // 0..max_score, one decimal
  max_score: number;
  raw_score: number; // model output on the 0..10 scale
  strengths: string[];
  areas_of_improvement: string[];
}

export interface OverallScore {
  total_score: number;
  max_total: number;
  percentage: number;
  ranking_tier: RankingTier;
  standout_features: string[];
  critical_improvements: string[];
  judge_recommendation: string;
}

export type PitchScores = Record<CriterionKey, CriterionScore> & {
  overall: OverallScore;
};

export interface ScoreResult {
  session_id: string;
  event_id: string;
  judge_id: string | null;
  team_name: string;
  pitch_title: string;
  scored_at: string;
  scoring_method: "azure_openai";
  scoring_context: Record<string, unknown>;
  scores: PitchScores;
}

// ─── Analysis extras ────────────────────────────────────────────────────────────

export interface ToolUsageAnalysis {
  tools_identified: Array<{ tool_name: string; usage_description: string }>;
  tool_count: number;
  meets_minimum_requirement: boolean;
  expected_tools: string[];
  missing_expected_tools: string[];
  improvement_suggestions: string[];
}

export interface PitchComparison {
  ranking: Array<{
    rank: number;
    session_id: string;
    team_name: string;
    rationale: string;
  }>;
  criteria_analysis: Record<string, { strongest: string; reasoning: string }>;
  judge_commentary: string;
}

export interface LeaderboardEntry {
  rank: number;
  session_id: string;
  team_name: string;
  pitch_title: string;
  total_score: number; // mean across judges
  ranking_tier: RankingTier;
  judge_count: number;
  category_scores: Record<CriterionKey, number>;
  scored_at: string; // earliest score for the session
}

// ─── Tool protocol ──────────────────────────────────────────────────────────────

export interface ToolErrorBody {
  code: string;
  message: string;
}

export type ToolResponse =
  | ({ success: true } & Record<string, unknown>)
  | { success: false; error: ToolErrorBody; tool?: string };

// ─── WebSocket stream protocol ──────────────────────────────────────────────────

// Client → Server (text frames; audio travels as binary frames)
export type StreamClientMessage = {
  type: "transcript_segment";
  text: string;
  start_time?: number;
  end_time?: number;
};

// Server → Client
export type StreamServerMessage =
  | { type: "status"; status: SessionStatus; session_id: string }
  | { type: "segment_ack"; segments: number }
  | { type: "error"; message: string; recoverable: boolean };
