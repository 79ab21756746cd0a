import type { ScorerKey } from '@league-formation/shared';
import {
  BACKUP_LOCATION_CREDIT,
  BOTTOM_TIER_SKILLS,
  FIRST_ROUND_SKILL,
  GOALIE_THRESHOLD,
  MID_TIER_SKILLS,
  TOP_TIER_SKILLS,
} from '@league-formation/shared';
import type { Player, Team } from '../models.js';
import { buildTeammateRequestIndex } from '../teammates.js';
import {
  CountParityScorer,
  CountScorer,
  MeanParityScorer,
  type Scorer,
  type ScorerState,
} from './base.js';

// ============================================
// Convenience scorers
// ============================================

export class PracticeDayScorer extends CountScorer {
  protected matchWeight(player: Player, team: Team): number {
    return player.preferredDays.has(team.practiceDay) ? 1 : 0;
  }
}

/**
 * Full credit for a preferred site, partial credit for a backup site
 */
export class LocationScorer extends CountScorer {
  protected matchWeight(player: Player, team: Team): number {
    if (player.preferredLocations.has(team.location)) return 1;
    if (player.backupLocations.has(team.location)) return BACKUP_LOCATION_CREDIT;
    return 0;
  }
}

/**
 * Rewards players sharing a team with the teammates they asked for.
 *
 * Per placed player we track how many requested players are on their team
 * (outgoing) and how many teammates requested them (incoming). A player
 * contributes at most one match per direction, so asking for the same friend
 * twice or being requested by a whole team counts once.
 * score = matches / (league size * 2)
 */
export class TeammateScorer implements Scorer {
  private readonly leagueSize: number;
  private readonly requests: Map<string, ReadonlySet<string>>;
  private readonly outgoing = new Map<string, number>();
  private readonly incoming = new Map<string, number>();
  private matches = 0;

  constructor(players: readonly Player[], teams: readonly Team[]) {
    this.leagueSize = players.length;
    this.requests = buildTeammateRequestIndex(players);

    for (const team of teams) {
      const placed: Player[] = [];
      for (const player of team.players) {
        this.link(player, placed, 1);
        placed.push(player);
      }
    }
  }

  private requested(from: Player, to: Player): boolean {
    return this.requests.get(from.id)?.has(to.id) ?? false;
  }

  private shift(counts: Map<string, number>, playerId: string, delta: number): void {
    const before = counts.get(playerId) ?? 0;
    const after = before + delta;
    if (after === 0) {
      counts.delete(playerId);
    } else {
      counts.set(playerId, after);
    }
    if (before === 0 && after > 0) this.matches++;
    if (before > 0 && after === 0) this.matches--;
  }

  private link(player: Player, teammates: Iterable<Player>, delta: number): void {
    for (const other of teammates) {
      if (other.id === player.id) continue;
      if (this.requested(player, other)) {
        this.shift(this.outgoing, player.id, delta);
        this.shift(this.incoming, other.id, delta);
      }
      if (this.requested(other, player)) {
        this.shift(this.outgoing, other.id, delta);
        this.shift(this.incoming, player.id, delta);
      }
    }
  }

  onAdd(player: Player, team: Team): void {
    this.link(player, team.players, 1);
  }

  onRemove(player: Player, team: Team): void {
    this.link(player, team.players, -1);
  }

  score(): number {
    if (this.leagueSize === 0) return 0;
    return this.matches / this.leagueSize / 2;
  }

  snapshotState(): ScorerState {
    return {
      matches: this.matches,
      outgoing: Object.fromEntries(this.outgoing),
      incoming: Object.fromEntries(this.incoming),
    };
  }
}

// ============================================
// Parity scorers
// ============================================

export class SizeScorer extends CountParityScorer {
  protected countPlayer(): boolean {
    return true;
  }
}

export class FirstRoundScorer extends CountParityScorer {
  protected countPlayer(player: Player): boolean {
    return player.skill === FIRST_ROUND_SKILL;
  }
}

export class TopTierScorer extends CountParityScorer {
  protected countPlayer(player: Player): boolean {
    return TOP_TIER_SKILLS.includes(player.skill);
  }
}

export class MidTierScorer extends CountParityScorer {
  protected countPlayer(player: Player): boolean {
    return MID_TIER_SKILLS.includes(player.skill);
  }
}

export class BottomTierScorer extends CountParityScorer {
  protected countPlayer(player: Player): boolean {
    return BOTTOM_TIER_SKILLS.includes(player.skill);
  }
}

export class GoalieScorer extends CountParityScorer {
  protected countPlayer(player: Player): boolean {
    return player.goalieSkill <= GOALIE_THRESHOLD;
  }
}

export class SkillScorer extends MeanParityScorer {
  protected getValue(player: Player): number {
    return player.skill;
  }
}

export class GradeScorer extends MeanParityScorer {
  protected getValue(player: Player): number {
    return player.grade;
  }
}

export type ScorerFactory = (players: readonly Player[], teams: readonly Team[]) => Scorer;

/**
 * Scorer catalog: one factory per scorer key
 */
export const SCORER_REGISTRY: Record<ScorerKey, ScorerFactory> = {
  skill: (players, teams) => new SkillScorer(players, teams),
  grade: (players, teams) => new GradeScorer(players, teams),
  size: (players, teams) => new SizeScorer(players, teams),
  location: (players, teams) => new LocationScorer(players, teams),
  practice_day: (players, teams) => new PracticeDayScorer(players, teams),
  teammate: (players, teams) => new TeammateScorer(players, teams),
  first_round: (players, teams) => new FirstRoundScorer(players, teams),
  top: (players, teams) => new TopTierScorer(players, teams),
  mid: (players, teams) => new MidTierScorer(players, teams),
  bottom: (players, teams) => new BottomTierScorer(players, teams),
  goalie: (players, teams) => new GoalieScorer(players, teams),
};
