import type { FormationWeights, ScorerKey } from '@league-formation/shared';
import { DEFAULT_FORMATION_WEIGHTS, SCORER_KEYS } from '@league-formation/shared';
import type { Player, Team } from '../models.js';
import type { Scorer, ScorerState } from './base.js';
import { SCORER_REGISTRY } from './catalog.js';

/**
 * Build a table with one entry per scorer key
 */
function byScorerKey<T>(build: (key: ScorerKey) => T): Record<ScorerKey, T> {
  return {
    skill: build('skill'),
    grade: build('grade'),
    size: build('size'),
    location: build('location'),
    practice_day: build('practice_day'),
    teammate: build('teammate'),
    first_round: build('first_round'),
    top: build('top'),
    mid: build('mid'),
    bottom: build('bottom'),
    goalie: build('goalie'),
  };
}

/**
 * Holds one scorer per catalog key and blends them into a single score.
 * Owned by the League, which forwards every membership change to it.
 */
export class CompositeScorer {
  private readonly scorers: Record<ScorerKey, Scorer>;

  constructor(players: readonly Player[], teams: readonly Team[]) {
    this.scorers = byScorerKey((key) => SCORER_REGISTRY[key](players, teams));
  }

  onAdd(player: Player, team: Team): void {
    for (const key of SCORER_KEYS) {
      this.scorers[key].onAdd(player, team);
    }
  }

  onRemove(player: Player, team: Team): void {
    for (const key of SCORER_KEYS) {
      this.scorers[key].onRemove(player, team);
    }
  }

  /**
   * Weighted average over the keys present in weights
   * Keys left out contribute nothing; the default table is used when weights is omitted
   */
  score(weights: Partial<FormationWeights> = DEFAULT_FORMATION_WEIGHTS): number {
    let score = 0;
    let totalWeight = 0;
    for (const key of SCORER_KEYS) {
      const weight = weights[key];
      if (weight === undefined || weight === 0) continue;
      score += weight * this.scorers[key].score();
      totalWeight += weight;
    }
    if (totalWeight === 0) return 0;
    return score / totalWeight;
  }

  /**
   * Every sub-score by key
   */
  breakdown(): Record<ScorerKey, number> {
    return byScorerKey((key) => this.scorers[key].score());
  }

  snapshotState(): Record<ScorerKey, ScorerState> {
    return byScorerKey((key) => this.scorers[key].snapshotState());
  }
}

/**
 * Check a caller-supplied weight table
 * Returns a list of problems, empty when the table is usable
 */
export function validateWeights(weights: Record<string, unknown>): string[] {
  const problems: string[] = [];
  const known: ReadonlySet<string> = new Set(SCORER_KEYS);
  let total = 0;

  for (const [key, value] of Object.entries(weights)) {
    if (!known.has(key)) {
      problems.push(`Unknown scorer "${key}" (expected one of ${SCORER_KEYS.join(', ')})`);
      continue;
    }
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
      problems.push(`Weight for "${key}" must be a non-negative number, got ${String(value)}`);
      continue;
    }
    total += value;
  }

  if (problems.length === 0 && total === 0) {
    problems.push('At least one weight must be greater than zero');
  }
  return problems;
}
