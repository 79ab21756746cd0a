import type { FormationWeights } from '@league-formation/shared';
import { DEFAULT_FORMATION_WEIGHTS, DEFAULT_SEARCH_DEPTH } from '@league-formation/shared';
import { breaksConstraints, isLockedInPlace } from './constraints.js';
import { InvalidMoveSequenceError } from './errors.js';
import { createMove, playerName, type League, type Move, type Player } from './models.js';

/**
 * Outcome of a move search for one player
 */
export type MoveSearchResult =
  | { success: true; moves: Move[]; score: number }
  | { success: false; reason: 'no_feasible_team'; message: string };

/**
 * Follow-up moves for a sequence: every player still on the last move's
 * destination who has not moved yet (and is not locked) may move on to any
 * other team.
 */
export function expandSequence(moves: readonly Move[], league: League): Move[][] {
  const last = moves[moves.length - 1];
  const pivot = last?.teamTo;
  if (!pivot) return [];

  const moved = new Set(moves.map((m) => m.player.id));
  const children: Move[][] = [];
  for (const other of Array.from(pivot.players)) {
    if (moved.has(other.id) || other.lock) continue;
    for (const team of league.teams) {
      if (team === pivot) continue;
      children.push([...moves, createMove(other, pivot, team)]);
    }
  }
  return children;
}

/**
 * Score a move sequence by applying it, reading the composite score and
 * undoing it again. The league is always left as it was found.
 */
export function scoreMoves(
  moves: readonly Move[],
  league: League,
  weights: Partial<FormationWeights>
): number {
  league.applyMoves(moves);
  try {
    return league.scorer.score(weights);
  } finally {
    league.undoMoves(moves);
  }
}

/**
 * Find the best sequence of moves that places a player.
 *
 * Depth-first search over move sequences: each team seeds a one-move
 * sequence for the player, and every legal sequence shorter than depth is
 * extended by moving someone off the team it just filled. Sequences that
 * break a constraint are dropped along with everything below them. Ties
 * keep the sequence found first.
 *
 * A player locked on a legal team gets an empty move list.
 */
export function findBestMoves(
  player: Player,
  league: League,
  depth: number = DEFAULT_SEARCH_DEPTH,
  weights: Partial<FormationWeights> = DEFAULT_FORMATION_WEIGHTS
): MoveSearchResult {
  if (!Number.isInteger(depth) || depth < 1) {
    throw new RangeError(`Search depth must be a whole number of at least 1, got ${depth}`);
  }

  const currentTeam = league.findTeam(player);
  if (isLockedInPlace(player, currentTeam)) {
    return { success: true, moves: [], score: league.scorer.score(weights) };
  }

  // Pushed in reverse so teams are tried in league order
  const stack: Move[][] = [];
  for (let i = league.teams.length - 1; i >= 0; i--) {
    stack.push([createMove(player, currentTeam, league.teams[i])]);
  }

  let bestMoves: Move[] | null = null;
  let bestScore = -Infinity;

  let moves: Move[] | undefined;
  while ((moves = stack.pop()) !== undefined) {
    if (breaksConstraints(moves)) continue;

    const score = scoreMoves(moves, league, weights);
    if (score > bestScore) {
      bestScore = score;
      bestMoves = moves;
    }

    if (moves.length < depth) {
      stack.push(...expandSequence(moves, league));
    }
  }

  if (bestMoves === null) {
    return {
      success: false,
      reason: 'no_feasible_team',
      message: `No team can take ${playerName(player)} (${player.id}) without breaking a day, location or lock constraint`,
    };
  }

  for (const move of bestMoves) {
    if (move.teamTo === null) {
      throw new InvalidMoveSequenceError(`Best sequence for ${playerName(player)} ends with an unassign`);
    }
  }

  return { success: true, moves: bestMoves, score: bestScore };
}
