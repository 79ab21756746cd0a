import type { SnapshotPlayer } from './player.js';
import type { TeamRecord } from './team.js';

/**
 * A flat snapshot of a league: every player with their current team (if any)
 * and every team. This is both the input and the output of team formation.
 */
export interface LeagueSnapshot {
  players: SnapshotPlayer[];
  teams: TeamRecord[];
}

/**
 * Column order of the players CSV
 */
export const PLAYER_CSV_HEADERS = [
  'id',
  'first_name',
  'last_name',
  'grade',
  'skill',
  'goalie_skill',
  'unavailable_days',
  'preferred_days',
  'disallowed_locations',
  'preferred_locations',
  'backup_locations',
  'teammate_requests',
  'lock',
  'emailed_parents',
  'school',
  'comment',
  'team',
] as const;

/**
 * Column order of the teams CSV (input)
 */
export const TEAM_CSV_HEADERS = ['name', 'practice_day', 'location'] as const;

/**
 * Column order of the teams CSV written after formation
 */
export const TEAM_SUMMARY_CSV_HEADERS = [
  ...TEAM_CSV_HEADERS,
  'size',
  'mean_skill',
  'mean_grade',
  'goalies',
  'first_round',
  'top',
  'mid',
  'bottom',
] as const;
