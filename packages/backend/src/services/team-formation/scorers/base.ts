import type { Player, Team } from '../models.js';

/**
 * Scorers rate a league arrangement from 0 to 1, higher is better.
 *
 * They keep running statistics instead of rescanning teams, so the League
 * must call onAdd/onRemove BEFORE it changes the team's membership: the
 * incremental updates read the team's current size.
 */
export interface Scorer {
  onAdd(player: Player, team: Team): void;
  onRemove(player: Player, team: Team): void;
  score(): number;
  snapshotState(): ScorerState;
}

/**
 * Plain copy of a scorer's running statistics
 */
export type ScorerState = Record<string, number | Record<string, number>>;

/**
 * Squash a non-negative error into (0, 1]
 */
export function normalize(x: number): number {
  return 1 - Math.tanh(x);
}

/**
 * Root mean squared error of values against an ideal value
 */
export function calculateRmse(values: Iterable<number>, idealValue: number): number {
  let sum = 0;
  let count = 0;
  for (const value of values) {
    sum += (value - idealValue) ** 2;
    count++;
  }
  if (count === 0) return 0;
  return Math.sqrt(sum / count);
}

/**
 * Update a mean after adding or removing one value
 * Removing the last value resets the mean to 0
 */
export function updateRollingMean(
  oldMean: number,
  oldSize: number,
  value: number,
  addValue: boolean
): number {
  if (addValue) {
    return (oldSize * oldMean + value) / (oldSize + 1);
  }
  if (oldSize <= 1) {
    return 0;
  }
  return (oldSize * oldMean - value) / (oldSize - 1);
}

/**
 * Counts (player, team) matches across the whole league.
 * score = matches / league size, so more matches anywhere is strictly better.
 * A match may be partial: matchWeight returns a credit from 0 to 1.
 */
export abstract class CountScorer implements Scorer {
  private readonly leagueSize: number;
  private matches = 0;

  constructor(players: readonly Player[], teams: readonly Team[]) {
    this.leagueSize = players.length;
    for (const team of teams) {
      for (const player of team.players) {
        this.matches += this.matchWeight(player, team);
      }
    }
  }

  protected abstract matchWeight(player: Player, team: Team): number;

  onAdd(player: Player, team: Team): void {
    this.matches += this.matchWeight(player, team);
  }

  onRemove(player: Player, team: Team): void {
    this.matches -= this.matchWeight(player, team);
  }

  score(): number {
    if (this.leagueSize === 0) return 0;
    return this.matches / this.leagueSize;
  }

  snapshotState(): ScorerState {
    return { leagueSize: this.leagueSize, matches: this.matches };
  }
}

/**
 * Rewards an even spread of players satisfying a predicate.
 * Each team's count is compared against total / number of teams.
 */
export abstract class CountParityScorer implements Scorer {
  private totalCount = 0;
  private readonly teamCounts = new Map<string, number>();

  constructor(_players: readonly Player[], teams: readonly Team[]) {
    for (const team of teams) {
      let count = 0;
      for (const player of team.players) {
        if (this.countPlayer(player)) count++;
      }
      this.teamCounts.set(team.name, count);
      this.totalCount += count;
    }
  }

  protected abstract countPlayer(player: Player): boolean;

  onAdd(player: Player, team: Team): void {
    if (this.countPlayer(player)) {
      this.totalCount++;
      this.teamCounts.set(team.name, (this.teamCounts.get(team.name) ?? 0) + 1);
    }
  }

  onRemove(player: Player, team: Team): void {
    if (this.countPlayer(player)) {
      this.totalCount--;
      this.teamCounts.set(team.name, (this.teamCounts.get(team.name) ?? 0) - 1);
    }
  }

  score(): number {
    if (this.teamCounts.size === 0) return 1;
    const idealCount = this.totalCount / this.teamCounts.size;
    return normalize(calculateRmse(this.teamCounts.values(), idealCount));
  }

  snapshotState(): ScorerState {
    return { totalCount: this.totalCount, teamCounts: Object.fromEntries(this.teamCounts) };
  }
}

/**
 * Rewards team means of a numeric attribute that sit close to the league mean.
 * Team means are rolled forward on every add/remove, never recomputed.
 * An empty team holds a mean of 0.
 */
export abstract class MeanParityScorer implements Scorer {
  private totalValue = 0;
  private totalPlayers = 0;
  private readonly teamMeans = new Map<string, number>();

  constructor(_players: readonly Player[], teams: readonly Team[]) {
    for (const team of teams) {
      let teamTotal = 0;
      for (const player of team.players) {
        teamTotal += this.getValue(player);
      }
      this.teamMeans.set(team.name, team.size === 0 ? 0 : teamTotal / team.size);
      this.totalValue += teamTotal;
      this.totalPlayers += team.size;
    }
  }

  protected abstract getValue(player: Player): number;

  onAdd(player: Player, team: Team): void {
    const value = this.getValue(player);
    this.totalValue += value;
    this.totalPlayers++;
    this.teamMeans.set(
      team.name,
      updateRollingMean(this.teamMeans.get(team.name) ?? 0, team.size, value, true)
    );
  }

  onRemove(player: Player, team: Team): void {
    const value = this.getValue(player);
    this.totalValue -= value;
    this.totalPlayers--;
    this.teamMeans.set(
      team.name,
      updateRollingMean(this.teamMeans.get(team.name) ?? 0, team.size, value, false)
    );
  }

  score(): number {
    if (this.totalPlayers === 0) return 1;
    const idealValue = this.totalValue / this.totalPlayers;
    return normalize(calculateRmse(this.teamMeans.values(), idealValue));
  }

  snapshotState(): ScorerState {
    return {
      totalValue: this.totalValue,
      totalPlayers: this.totalPlayers,
      teamMeans: Object.fromEntries(this.teamMeans),
    };
  }
}
