import type {
  LeagueSnapshot,
  PlayerRecord,
  SnapshotPlayer,
  TeamRecord,
  TeamSummary,
} from '@league-formation/shared';
import { BOTTOM_TIER_SKILLS, FIRST_ROUND_SKILL, GOALIE_THRESHOLD, MID_TIER_SKILLS, TOP_TIER_SKILLS } from '@league-formation/shared';
import { violatesPlacement } from './constraints.js';
import { InvalidMoveSequenceError, ValidationError } from './errors.js';
import { CompositeScorer } from './scorers/composite.js';
import { validatePlayerRecord, validateTeamRecord, type ValidationContext } from './validation.js';

/**
 * A registered player. Frozen once created: moving a player between teams is
 * a Move, never an edit of the player.
 */
export interface Player {
  readonly id: string;
  readonly firstName: string;
  readonly lastName: string;
  readonly grade: number;
  readonly skill: number;
  readonly goalieSkill: number;
  readonly unavailableDays: ReadonlySet<string>;
  readonly preferredDays: ReadonlySet<string>;
  readonly disallowedLocations: ReadonlySet<string>;
  readonly preferredLocations: ReadonlySet<string>;
  readonly backupLocations: ReadonlySet<string>;
  readonly teammateRequests: readonly string[];
  readonly lock: boolean;
  readonly emailedParents: boolean;
  readonly school?: string;
  readonly comment?: string;
}

function cleanList(values: readonly string[] | undefined): string[] {
  return (values ?? []).map((v) => v.trim()).filter((v) => v.length > 0);
}

/**
 * Validate a player record and build the Player
 */
export function createPlayer(record: PlayerRecord, context: ValidationContext = {}): Player {
  validatePlayerRecord(record, context);

  return Object.freeze({
    id: record.id,
    firstName: record.firstName.trim(),
    lastName: record.lastName.trim(),
    grade: record.grade,
    skill: record.skill,
    goalieSkill: record.goalieSkill,
    unavailableDays: new Set(cleanList(record.unavailableDays)),
    preferredDays: new Set(cleanList(record.preferredDays)),
    disallowedLocations: new Set(cleanList(record.disallowedLocations)),
    preferredLocations: new Set(cleanList(record.preferredLocations)),
    backupLocations: new Set(cleanList(record.backupLocations)),
    teammateRequests: Object.freeze(cleanList(record.teammateRequests)),
    lock: record.lock ?? false,
    emailedParents: record.emailedParents ?? false,
    school: record.school,
    comment: record.comment,
  });
}

export function playerName(player: Player): string {
  return `${player.firstName} ${player.lastName}`;
}

/**
 * Convert a Player back to its JSON record
 */
export function playerToRecord(player: Player): PlayerRecord {
  const record: PlayerRecord = {
    id: player.id,
    firstName: player.firstName,
    lastName: player.lastName,
    grade: player.grade,
    skill: player.skill,
    goalieSkill: player.goalieSkill,
    unavailableDays: Array.from(player.unavailableDays),
    preferredDays: Array.from(player.preferredDays),
    disallowedLocations: Array.from(player.disallowedLocations),
    preferredLocations: Array.from(player.preferredLocations),
    backupLocations: Array.from(player.backupLocations),
    teammateRequests: [...player.teammateRequests],
    lock: player.lock,
    emailedParents: player.emailedParents,
  };
  if (player.school !== undefined) record.school = player.school;
  if (player.comment !== undefined) record.comment = player.comment;
  return record;
}

/**
 * A team and its current players.
 *
 * Derived statistics are not cached here; the League's scorers keep them.
 * Membership must only change through League.applyMoves/undoMoves, otherwise
 * the scorers go stale.
 */
export class Team {
  readonly name: string;
  readonly practiceDay: string;
  readonly location: string;
  private readonly members = new Map<string, Player>();

  constructor(name: string, practiceDay: string, location: string) {
    this.name = name;
    this.practiceDay = practiceDay;
    this.location = location;
  }

  get players(): IterableIterator<Player> {
    return this.members.values();
  }

  get size(): number {
    return this.members.size;
  }

  has(player: Player): boolean {
    return this.members.has(player.id);
  }

  /** Only League may call this */
  addPlayer(player: Player): void {
    if (this.members.has(player.id)) {
      throw new InvalidMoveSequenceError(`${playerName(player)} is already on ${this.name}`);
    }
    this.members.set(player.id, player);
  }

  /** Only League may call this */
  removePlayer(player: Player): void {
    if (!this.members.delete(player.id)) {
      throw new InvalidMoveSequenceError(`${playerName(player)} is not on ${this.name}`);
    }
  }

  toRecord(): TeamRecord {
    return { name: this.name, practiceDay: this.practiceDay, location: this.location };
  }

  summarize(): TeamSummary {
    const players = Array.from(this.members.values());
    const mean = (values: number[]) =>
      values.length === 0 ? 0 : values.reduce((sum, v) => sum + v, 0) / values.length;
    const count = (predicate: (p: Player) => boolean) => players.filter(predicate).length;

    return {
      ...this.toRecord(),
      size: players.length,
      meanSkill: mean(players.map((p) => p.skill)),
      meanGrade: mean(players.map((p) => p.grade)),
      goalies: count((p) => p.goalieSkill <= GOALIE_THRESHOLD),
      firstRound: count((p) => p.skill === FIRST_ROUND_SKILL),
      topTier: count((p) => TOP_TIER_SKILLS.includes(p.skill)),
      midTier: count((p) => MID_TIER_SKILLS.includes(p.skill)),
      bottomTier: count((p) => BOTTOM_TIER_SKILLS.includes(p.skill)),
      playerIds: players.map((p) => p.id).sort(),
    };
  }
}

/**
 * Validate a team record and build an empty Team
 */
export function createTeam(record: TeamRecord): Team {
  validateTeamRecord(record);
  return new Team(record.name.trim(), record.practiceDay, record.location.trim());
}

/**
 * One player changing place. A null teamFrom is the available pool,
 * a null teamTo sends the player back to the pool.
 */
export interface Move {
  readonly player: Player;
  readonly teamFrom: Team | null;
  readonly teamTo: Team | null;
}

export function createMove(player: Player, teamFrom: Team | null, teamTo: Team | null): Move {
  if (teamFrom === null && teamTo === null) {
    throw new InvalidMoveSequenceError(`Move for ${playerName(player)} has neither a source nor a destination`);
  }
  return Object.freeze({ player, teamFrom, teamTo });
}

export interface LeagueOptions {
  // Sites players may name besides the teams' own practice locations
  knownLocations?: readonly string[];
}

/**
 * The league: a fixed set of teams, the pool of players not yet placed, and
 * a composite scorer kept in step with every move.
 */
export class League {
  readonly teams: readonly Team[];
  readonly scorer: CompositeScorer;
  private readonly players: readonly Player[];
  private readonly available = new Map<string, Player>();
  private readonly placements = new Map<string, Team>();

  constructor(teams: readonly Team[], placements: ReadonlyArray<{ player: Player; team: Team | null }>) {
    this.teams = teams;
    this.players = placements.map(({ player }) => player);

    for (const { player, team } of placements) {
      if (team) {
        team.addPlayer(player);
        this.placements.set(player.id, team);
      } else {
        this.available.set(player.id, player);
      }
    }

    // Built after the initial placement so its running totals start correct
    this.scorer = new CompositeScorer(this.players, this.teams);
  }

  /**
   * Build a league from a snapshot, validating every record
   */
  static fromSnapshot(snapshot: LeagueSnapshot, options: LeagueOptions = {}): League {
    const teamsByName = new Map<string, Team>();
    for (const record of snapshot.teams) {
      const team = createTeam(record);
      if (teamsByName.has(team.name)) {
        throw new ValidationError(`Duplicate team name: ${team.name}`, 'name', team.name);
      }
      teamsByName.set(team.name, team);
    }

    const teams = Array.from(teamsByName.values());
    const context: ValidationContext = {
      locations: new Set([...teams.map((t) => t.location), ...(options.knownLocations ?? [])]),
    };

    const seenIds = new Set<string>();
    const placements = snapshot.players.map((record: SnapshotPlayer) => {
      const player = createPlayer(record, context);
      if (seenIds.has(player.id)) {
        throw new ValidationError(`Duplicate player id: ${player.id}`, 'id', player.id);
      }
      seenIds.add(player.id);

      const team: unknown = record.team;
      let teamName = '';
      if (typeof team === 'string') {
        teamName = team.trim();
      } else if (team !== undefined && team !== null) {
        throw new ValidationError(
          `Player ${playerName(player)} (${player.id}) has team ${String(team)}; expected a team name`,
          'team',
          player.id
        );
      }
      if (!teamName) {
        return { player, team: null };
      }
      const assigned = teamsByName.get(teamName);
      if (!assigned) {
        throw new ValidationError(
          `Player ${playerName(player)} (${player.id}) is on unknown team "${teamName}"`,
          'team',
          player.id
        );
      }
      return { player, team: assigned };
    });

    return new League(teams, placements);
  }

  get availablePlayers(): ReadonlyMap<string, Player> {
    return this.available;
  }

  get allPlayers(): readonly Player[] {
    return this.players;
  }

  getTeam(name: string): Team | undefined {
    return this.teams.find((t) => t.name === name);
  }

  getPlayer(id: string): Player | undefined {
    return this.players.find((p) => p.id === id);
  }

  /**
   * The team a player currently sits on, null for the pool
   */
  findTeam(player: Player): Team | null {
    return this.placements.get(player.id) ?? null;
  }

  /**
   * Next player to place: best skill first, then the player with the fewest
   * teams they can legally join, then by id. Null once the pool is empty.
   * The player stays in the pool until a move takes them out.
   */
  getNextPlayer(): Player | null {
    let next: Player | null = null;
    let nextFeasible = 0;
    for (const player of this.available.values()) {
      const feasible = this.teams.filter((team) => !violatesPlacement(player, team)).length;
      if (
        next === null ||
        player.skill < next.skill ||
        (player.skill === next.skill && feasible < nextFeasible) ||
        (player.skill === next.skill && feasible === nextFeasible && player.id < next.id)
      ) {
        next = player;
        nextFeasible = feasible;
      }
    }
    return next;
  }

  /**
   * Players sitting on a team that breaks their day or location constraints
   */
  misplacedPlayers(): Player[] {
    const misplaced: Player[] = [];
    for (const team of this.teams) {
      for (const player of team.players) {
        if (violatesPlacement(player, team)) misplaced.push(player);
      }
    }
    return misplaced;
  }

  /**
   * Apply moves in order. Scorers are told before each team changes.
   */
  applyMoves(moves: readonly Move[]): void {
    for (const move of moves) {
      this.detach(move.player, move.teamFrom);
      this.attach(move.player, move.teamTo);
    }
  }

  /**
   * Exact inverse of applyMoves: moves are replayed last to first with
   * source and destination swapped.
   */
  undoMoves(moves: readonly Move[]): void {
    for (let i = moves.length - 1; i >= 0; i--) {
      const move = moves[i];
      this.detach(move.player, move.teamTo);
      this.attach(move.player, move.teamFrom);
    }
  }

  private detach(player: Player, team: Team | null): void {
    if (team) {
      if (!team.has(player)) {
        throw new InvalidMoveSequenceError(`${playerName(player)} cannot leave ${team.name}: not on that team`);
      }
      this.scorer.onRemove(player, team);
      team.removePlayer(player);
      this.placements.delete(player.id);
    } else {
      if (!this.available.delete(player.id)) {
        throw new InvalidMoveSequenceError(`${playerName(player)} cannot leave the pool: not available`);
      }
    }
  }

  private attach(player: Player, team: Team | null): void {
    if (team) {
      this.scorer.onAdd(player, team);
      team.addPlayer(player);
      this.placements.set(player.id, team);
    } else {
      this.available.set(player.id, player);
    }
  }

  toSnapshot(): LeagueSnapshot {
    return {
      players: this.players.map((player) => ({
        ...playerToRecord(player),
        team: this.findTeam(player)?.name ?? null,
      })),
      teams: this.teams.map((team) => team.toRecord()),
    };
  }

  summarize(): TeamSummary[] {
    return this.teams.map((team) => team.summarize());
  }
}
