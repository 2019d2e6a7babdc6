// PitchScoop - Leaderboard
// Ranks the scored sessions of one event by their mean total across judges.
// Ties go to the session scored first; session_id breaks any remaining tie.

import { NotFoundError } from "./errors.js";
import type { EventManager } from "./event-manager.js";
import { silentLogger, type Logger } from "./logger.js";
import type { ScoreStore } from "./score-store.js";
import { CRITERION_KEYS, deriveRankingTier, round1 } from "./scoring-rubric.js";
import type {
  CriterionKey,
  LeaderboardEntry,
  PitchEvent,
  RankingTier,
  ScoreResult,
} from "./types.js";

export const DEFAULT_LEADERBOARD_LIMIT = 10;

export interface Leaderboard {
  event_id: string;
  event_name: string;
  total_scored_sessions: number;
  leaderboard: LeaderboardEntry[];
}

export interface TeamRank extends LeaderboardEntry {
  event_id: string;
  total_teams: number;
  /** Share of the other teams ranked below this one, 0..100. */
  percentile: number;
}

export interface ScoreDistribution {
  "90_100": number;
  "80_89": number;
  "70_79": number;
  "60_69": number;
  below_60: number;
}

export interface LeaderboardStats {
  highest_score: number;
  lowest_score: number;
  average_score: number;
  median_score: number;
  score_distribution: ScoreDistribution;
  tier_distribution: Record<RankingTier, number>;
  category_averages: Record<CriterionKey, number>;
}

export interface LeaderboardStatsResult {
  event_id: string;
  event_name: string;
  total_teams: number;
  /** null until at least one session of the event is scored. */
  stats: LeaderboardStats | null;
}

function mean(values: number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Collapses every judge's result for one session into an unranked entry. */
export function aggregateSession(results: ScoreResult[]): Omit<LeaderboardEntry, "rank"> {
  const ordered = [...results].sort((a, b) => a.scored_at.localeCompare(b.scored_at));
  const first = ordered[0];
  const total = round1(mean(ordered.map((r) => r.scores.overall.total_score)));

  const categoryScores: Record<CriterionKey, number> = {
    idea: 0,
    technical_implementation: 0,
    tool_use: 0,
    presentation_delivery: 0,
  };
  for (const key of CRITERION_KEYS) {
    categoryScores[key] = round1(mean(ordered.map((r) => r.scores[key].score)));
  }

  return {
    session_id: first.session_id,
    team_name: first.team_name,
    pitch_title: first.pitch_title,
    total_score: total,
    ranking_tier: deriveRankingTier(total),
    judge_count: ordered.length,
    category_scores: categoryScores,
    scored_at: first.scored_at,
  };
}

/** Orders aggregated entries and assigns 1-based ranks. */
export function rankEntries(
  entries: Array<Omit<LeaderboardEntry, "rank">>,
  limit: number = DEFAULT_LEADERBOARD_LIMIT,
): LeaderboardEntry[] {
  return [...entries]
    .sort(
      (a, b) =>
        b.total_score - a.total_score ||
        a.scored_at.localeCompare(b.scored_at) ||
        a.session_id.localeCompare(b.session_id),
    )
    .slice(0, limit)
    .map((entry, index) => ({ rank: index + 1, ...entry }));
}

function median(values: number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

function distribute(totals: number[]): ScoreDistribution {
  const buckets: ScoreDistribution = { "90_100": 0, "80_89": 0, "70_79": 0, "60_69": 0, below_60: 0 };
  for (const total of totals) {
    if (total >= 90) buckets["90_100"]++;
    else if (total >= 80) buckets["80_89"]++;
    else if (total >= 70) buckets["70_79"]++;
    else if (total >= 60) buckets["60_69"]++;
    else buckets.below_60++;
  }
  return buckets;
}

/** Summary statistics over ranked entries; null when there are none. */
export function summarizeEntries(entries: Array<Omit<LeaderboardEntry, "rank">>): LeaderboardStats | null {
  if (entries.length === 0) return null;
  const totals = entries.map((e) => e.total_score);

  const tierDistribution: Record<RankingTier, number> = {
    excellent: 0,
    very_good: 0,
    good: 0,
    needs_improvement: 0,
  };
  for (const entry of entries) {
    tierDistribution[entry.ranking_tier]++;
  }

  const categoryAverages: Record<CriterionKey, number> = {
    idea: 0,
    technical_implementation: 0,
    tool_use: 0,
    presentation_delivery: 0,
  };
  for (const key of CRITERION_KEYS) {
    categoryAverages[key] = round1(mean(entries.map((e) => e.category_scores[key])));
  }

  return {
    highest_score: Math.max(...totals),
    lowest_score: Math.min(...totals),
    average_score: round1(mean(totals)),
    median_score: round1(median(totals)),
    score_distribution: distribute(totals),
    tier_distribution: tierDistribution,
    category_averages: categoryAverages,
  };
}

export class LeaderboardService {
  private readonly scoreStore: ScoreStore;
  private readonly eventManager: EventManager;
  private readonly logger: Logger;

  constructor(scoreStore: ScoreStore, eventManager: EventManager, logger: Logger = silentLogger) {
    this.scoreStore = scoreStore;
    this.eventManager = eventManager;
    this.logger = logger;
  }

  /** @throws NotFoundError EVENT_NOT_FOUND */
  async generate(eventId: string, limit: number = DEFAULT_LEADERBOARD_LIMIT): Promise<Leaderboard> {
    const { event, entries } = await this.collect(eventId);
    const leaderboard = rankEntries(entries, limit);

    this.logger.info("Leaderboard generated", {
      event_id: eventId,
      scored_sessions: entries.length,
      returned: leaderboard.length,
    });

    return {
      event_id: eventId,
      event_name: event.event_name,
      total_scored_sessions: entries.length,
      leaderboard,
    };
  }

  /**
   * One session's position among every scored session of its event.
   * @throws NotFoundError EVENT_NOT_FOUND, SCORES_NOT_FOUND
   */
  async getTeamRank(eventId: string, sessionId: string): Promise<TeamRank> {
    const { entries } = await this.collect(eventId);
    const ranked = rankEntries(entries, entries.length);
    const entry = ranked.find((e) => e.session_id === sessionId);
    if (!entry) {
      throw new NotFoundError(
        "SCORES_NOT_FOUND",
        `No scores for session ${sessionId} in event ${eventId}`,
      );
    }

    const totalTeams = ranked.length;
    const percentile =
      totalTeams === 1 ? 100 : round1(((totalTeams - entry.rank) / (totalTeams - 1)) * 100);
    this.logger.info("Team rank retrieved", {
      event_id: eventId,
      session_id: sessionId,
      rank: entry.rank,
      total_teams: totalTeams,
    });
    return { event_id: eventId, ...entry, total_teams: totalTeams, percentile };
  }

  /** @throws NotFoundError EVENT_NOT_FOUND */
  async getStats(eventId: string): Promise<LeaderboardStatsResult> {
    const { event, entries } = await this.collect(eventId);
    const stats = summarizeEntries(entries);
    this.logger.info("Leaderboard statistics generated", {
      event_id: eventId,
      total_teams: entries.length,
      average_score: stats?.average_score ?? null,
    });
    return {
      event_id: eventId,
      event_name: event.event_name,
      total_teams: entries.length,
      stats,
    };
  }

  private async collect(
    eventId: string,
  ): Promise<{ event: PitchEvent; entries: Array<Omit<LeaderboardEntry, "rank">> }> {
    const event = await this.eventManager.getEvent(eventId);
    const results = await this.scoreStore.listForEvent(eventId);

    const bySession = new Map<string, ScoreResult[]>();
    for (const result of results) {
      const group = bySession.get(result.session_id) ?? [];
      group.push(result);
      bySession.set(result.session_id, group);
    }
    return { event, entries: [...bySession.values()].map((group) => aggregateSession(group)) };
  }
}
