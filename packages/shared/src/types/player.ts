/**
 * Practice day codes, one letter per weekday
 * Thursday is R so that every day is a single distinct character
 */
export const DAY_CODES = ['M', 'T', 'W', 'R', 'F'] as const;

// Skill ratings run 1 (best) to 10
export const MIN_SKILL = 1;
export const MAX_SKILL = 10;

// Pre-K is -1, kindergarten is 0
export const MIN_GRADE = -2;
export const MAX_GRADE = 12;

/**
 * PlayerRecord is the JSON shape of a registered player
 * Day sets are lists of day codes, location sets are lists of site codes
 */
export interface PlayerRecord {
  id: string;
  firstName: string;
  lastName: string;
  grade: number;
  skill: number; // 1-10, lower is better
  goalieSkill: number; // 1-10, lower is better
  unavailableDays?: string[];
  preferredDays?: string[];
  disallowedLocations?: string[];
  preferredLocations?: string[];
  backupLocations?: string[];
  teammateRequests?: string[]; // Free-text names
  lock?: boolean; // Pinned to their current team
  emailedParents?: boolean; // Placement already announced, implies lock
  school?: string;
  comment?: string;
}

/**
 * A player row in a league snapshot
 * team is the name of the team the player currently sits on, absent for the pool
 */
export interface SnapshotPlayer extends PlayerRecord {
  team?: string | null;
}
