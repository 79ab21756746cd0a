import { Hono } from 'hono';
import type { EvaluateLeagueRequest, FormTeamsRequest, LeagueSnapshot } from '@league-formation/shared';
import { DEFAULT_FORMATION_WEIGHTS, DEFAULT_SEARCH_DEPTH, SCORER_KEYS } from '@league-formation/shared';
import { evaluateLeague, formTeams, ValidationError } from '../services/team-formation/index.js';

const router = new Hono();

function isSnapshot(value: unknown): value is LeagueSnapshot {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'players' in value &&
    Array.isArray(value.players) &&
    'teams' in value &&
    Array.isArray(value.teams)
  );
}

function hasSnapshot(value: unknown): value is FormTeamsRequest & EvaluateLeagueRequest {
  return typeof value === 'object' && value !== null && 'snapshot' in value && isSnapshot(value.snapshot);
}

// GET /api/team-formation/weights - Default weights and search depth
router.get('/weights', (c) => {
  return c.json({
    scorers: SCORER_KEYS,
    weights: DEFAULT_FORMATION_WEIGHTS,
    depth: DEFAULT_SEARCH_DEPTH,
  });
});

// POST /api/team-formation/form - Place every unassigned player of a snapshot
router.post('/form', async (c) => {
  let request: unknown;
  try {
    request = await c.req.json();
  } catch {
    return c.json({ error: 'Request body must be JSON' }, 400);
  }

  if (!hasSnapshot(request)) {
    return c.json({ error: 'snapshot with players and teams is required' }, 400);
  }

  console.log(
    `Team formation request: ${request.snapshot.players.length} players, ${request.snapshot.teams.length} teams`
  );
  const result = formTeams(request);

  if (result.success) {
    return c.json(result);
  }

  const errorTypes = new Set(result.errors?.map((e) => e.type));
  if (errorTypes.has('invalid_config') || errorTypes.has('invalid_snapshot') || errorTypes.has('no_teams')) {
    return c.json(result, 400);
  }
  if (errorTypes.has('no_feasible_team')) {
    return c.json(result, 422);
  }
  return c.json(result, 500);
});

// POST /api/team-formation/evaluate - Score a snapshot without moving anyone
router.post('/evaluate', async (c) => {
  let request: unknown;
  try {
    request = await c.req.json();
  } catch {
    return c.json({ error: 'Request body must be JSON' }, 400);
  }

  if (!hasSnapshot(request)) {
    return c.json({ error: 'snapshot with players and teams is required' }, 400);
  }

  try {
    return c.json(evaluateLeague(request));
  } catch (error) {
    if (error instanceof ValidationError) {
      return c.json({ error: error.message, field: error.field, recordId: error.recordId }, 400);
    }
    console.error('Error evaluating league:', error);
    return c.json({ error: 'Failed to evaluate league' }, 500);
  }
});

export default router;
