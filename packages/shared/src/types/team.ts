/**
 * TeamRecord is the JSON shape of a team in a league snapshot
 * Team names are unique within a league
 */
export interface TeamRecord {
  name: string;
  practiceDay: string; // Day code (M, T, W, R, F)
  location: string; // Practice site code
}

/**
 * Per-team statistics for reports and the teams output file
 */
export interface TeamSummary {
  name: string;
  practiceDay: string;
  location: string;
  size: number;
  meanSkill: number;
  meanGrade: number;
  goalies: number;
  firstRound: number;
  topTier: number;
  midTier: number;
  bottomTier: number;
  playerIds: string[];
}
