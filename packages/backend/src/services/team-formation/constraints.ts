import type { Move, Player, Team } from './models.js';

/**
 * Check if a team's practice day or location is ruled out for a player
 */
export function violatesPlacement(player: Player, team: Team): boolean {
  return player.unavailableDays.has(team.practiceDay) || player.disallowedLocations.has(team.location);
}

/**
 * Check if a player is pinned where they are.
 * A locked player only stays put while their current team is itself legal
 * for them; a locked player in the pool is free to be placed.
 */
export function isLockedInPlace(player: Player, currentTeam: Team | null): boolean {
  return player.lock && currentTeam !== null && !violatesPlacement(player, currentTeam);
}

/**
 * Check if a single move is illegal
 */
export function moveBreaksConstraints(move: Move): boolean {
  // Unassigning is bookkeeping, never a search move
  if (move.teamTo === null) return true;

  if (violatesPlacement(move.player, move.teamTo)) return true;

  return isLockedInPlace(move.player, move.teamFrom);
}

/**
 * Check if any move in a sequence is illegal
 */
export function breaksConstraints(moves: readonly Move[]): boolean {
  return moves.some(moveBreaksConstraints);
}
