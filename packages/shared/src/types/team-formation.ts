import type { LeagueSnapshot } from './league.js';
import type { TeamSummary } from './team.js';

/**
 * Keys of the scorer catalog, one per balancing criterion
 */
export const SCORER_KEYS = [
  'skill',
  'grade',
  'size',
  'location',
  'practice_day',
  'teammate',
  'first_round',
  'top',
  'mid',
  'bottom',
  'goalie',
] as const;

export type ScorerKey = (typeof SCORER_KEYS)[number];

/**
 * Scoring weights for team formation
 *
 * Every scorer returns 0-1 (higher is better). The composite score is the
 * weighted average over the keys present, so weights need not sum to 1.
 */
export type FormationWeights = Record<ScorerKey, number>;

/**
 * Default scoring weights
 */
export const DEFAULT_FORMATION_WEIGHTS: FormationWeights = {
  // Parity
  skill: 0.3,
  grade: 0.3,
  size: 0.15,
  first_round: 0.15,
  top: 0.1,
  mid: 0.1,
  bottom: 0.1,
  goalie: 0.1,

  // Convenience
  location: 0.05,
  practice_day: 0.05,
  teammate: 0.1,
};

// Number of chained moves explored per player
export const DEFAULT_SEARCH_DEPTH = 2;

// Skill tiers
export const FIRST_ROUND_SKILL = 1;
export const TOP_TIER_SKILLS: readonly number[] = [1, 2, 3];
export const MID_TIER_SKILLS: readonly number[] = [4, 5, 6, 7];
export const BOTTOM_TIER_SKILLS: readonly number[] = [8, 9, 10];

// A goalie skill at or below this counts the player as a goalie
export const GOALIE_THRESHOLD = 3;

// Location scorer credit for a backup site (a preferred site scores 1)
export const BACKUP_LOCATION_CREDIT = 0.5;

/**
 * Request to place every unassigned player of a league snapshot
 */
export interface FormTeamsRequest {
  snapshot: LeagueSnapshot;
  weights?: Partial<FormationWeights>; // Optional: replaces the default weight table
  depth?: number; // Optional: search lookahead (default: DEFAULT_SEARCH_DEPTH)
}

/**
 * Result of a team formation run
 */
export interface FormTeamsResult {
  success: boolean;
  message: string;
  playersAssigned: number;
  snapshot?: LeagueSnapshot;
  teams?: TeamSummary[];
  scores?: Record<ScorerKey, number>;
  totalScore?: number;
  errors?: FormationError[];
  formationLog: FormationLogEntry[];
}

/**
 * Request to score a league snapshot without moving anyone
 */
export interface EvaluateLeagueRequest {
  snapshot: LeagueSnapshot;
  weights?: Partial<FormationWeights>;
}

export interface EvaluateLeagueResult {
  scores: Record<ScorerKey, number>;
  totalScore: number;
  teams: TeamSummary[];
  unassignedPlayers: number;
}

/**
 * Log entry for tracing formation decisions
 */
export interface FormationLogEntry {
  timestamp: string;
  level: 'info' | 'warning' | 'error' | 'debug';
  category: 'league' | 'search' | 'assignment' | 'general';
  message: string;
  details?: {
    playerId?: string;
    playerName?: string;
    teamName?: string;
    score?: number;
    [key: string]: unknown;
  };
}

/**
 * Error encountered during team formation
 */
export interface FormationError {
  type: FormationErrorType;
  message: string;
  details?: Record<string, unknown>;
}

export type FormationErrorType =
  | 'invalid_config'
  | 'invalid_snapshot'
  | 'no_teams'
  | 'no_feasible_team'
  | 'generation_failed';
