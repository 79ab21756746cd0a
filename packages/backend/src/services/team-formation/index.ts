import type {
  EvaluateLeagueRequest,
  EvaluateLeagueResult,
  FormationWeights,
  FormTeamsRequest,
  FormTeamsResult,
} from '@league-formation/shared';
import { DEFAULT_FORMATION_WEIGHTS, DEFAULT_SEARCH_DEPTH } from '@league-formation/shared';
import { ValidationError } from './errors.js';
import { TeamFormer } from './former.js';
import { League } from './models.js';
import { validateWeights } from './scorers/composite.js';

export { ValidationError, InvalidMoveSequenceError } from './errors.js';
export { League, Team, createPlayer, createTeam, createMove } from './models.js';
export type { Player, Move } from './models.js';
export { findBestMoves, type MoveSearchResult } from './optimizer.js';
export { breaksConstraints, violatesPlacement } from './constraints.js';
export { CompositeScorer, validateWeights } from './scorers/composite.js';

/**
 * Resolve request weights: the default table when none are given
 * Throws ValidationError on an unusable table
 */
export function resolveWeights(weights: Partial<FormationWeights> | undefined): Partial<FormationWeights> {
  if (weights === undefined) {
    return DEFAULT_FORMATION_WEIGHTS;
  }
  if (weights === null || typeof weights !== 'object' || Array.isArray(weights)) {
    throw new ValidationError('weights must be an object of scorer name to weight', 'weights');
  }
  const problems = validateWeights(weights);
  if (problems.length > 0) {
    throw new ValidationError(problems.join('; '), 'weights');
  }
  return weights;
}

export function resolveDepth(depth: number | undefined): number {
  if (depth === undefined) {
    return DEFAULT_SEARCH_DEPTH;
  }
  if (typeof depth !== 'number' || !Number.isInteger(depth) || depth < 1) {
    throw new ValidationError(`depth must be a whole number of at least 1, got ${String(depth)}`, 'depth');
  }
  return depth;
}

/**
 * Main service for forming teams
 */
export function formTeams(request: FormTeamsRequest): FormTeamsResult {
  let weights: Partial<FormationWeights>;
  let depth: number;
  try {
    weights = resolveWeights(request.weights);
    depth = resolveDepth(request.depth);
  } catch (error) {
    return {
      success: false,
      message: 'Invalid formation settings',
      playersAssigned: 0,
      errors: [{ type: 'invalid_config', message: error instanceof Error ? error.message : String(error) }],
      formationLog: [],
    };
  }

  let league: League;
  try {
    league = League.fromSnapshot(request.snapshot);
  } catch (error) {
    if (!(error instanceof ValidationError)) throw error;
    console.error('formTeams: Invalid snapshot:', error.message);
    return {
      success: false,
      message: 'Invalid league snapshot',
      playersAssigned: 0,
      errors: [
        {
          type: 'invalid_snapshot',
          message: error.message,
          details: { field: error.field, recordId: error.recordId },
        },
      ],
      formationLog: [],
    };
  }

  return new TeamFormer(league, weights, depth).run();
}

/**
 * Score a league snapshot as it stands
 * Throws ValidationError on a bad snapshot or weight table
 */
export function evaluateLeague(request: EvaluateLeagueRequest): EvaluateLeagueResult {
  const weights = resolveWeights(request.weights);
  const league = League.fromSnapshot(request.snapshot);

  return {
    scores: league.scorer.breakdown(),
    totalScore: league.scorer.score(weights),
    teams: league.summarize(),
    unassignedPlayers: league.availablePlayers.size,
  };
}
