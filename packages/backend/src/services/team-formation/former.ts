import type {
  FormationError,
  FormationLogEntry,
  FormationWeights,
  FormTeamsResult,
} from '@league-formation/shared';
import { InvalidMoveSequenceError } from './errors.js';
import { playerName, type League, type Player } from './models.js';
import { findBestMoves } from './optimizer.js';

/**
 * Drives a league to completion: every misplaced player is moved off their
 * illegal team, then players are drawn from the pool one at a time and placed
 * with the move search until the pool is empty.
 *
 * Stops at the first player no team can take; that player needs a manual
 * placement.
 */
export class TeamFormer {
  private readonly league: League;
  private readonly weights: Partial<FormationWeights>;
  private readonly depth: number;
  private errors: FormationError[] = [];
  private formationLog: FormationLogEntry[] = [];
  private playersAssigned = 0;

  constructor(league: League, weights: Partial<FormationWeights>, depth: number) {
    this.league = league;
    this.weights = weights;
    this.depth = depth;
  }

  /**
   * Add an entry to the formation log
   */
  private log(
    level: FormationLogEntry['level'],
    category: FormationLogEntry['category'],
    message: string,
    details?: FormationLogEntry['details']
  ): void {
    this.formationLog.push({
      timestamp: new Date().toISOString(),
      level,
      category,
      message,
      details,
    });
    const detailsStr = details ? ` ${JSON.stringify(details)}` : '';
    console.log(`[${level.toUpperCase()}] [${category}] ${message}${detailsStr}`);
  }

  /**
   * Form the teams
   */
  run(): FormTeamsResult {
    try {
      console.log('='.repeat(80));
      console.log('TEAM FORMATION STARTED');
      console.log(`Teams: ${this.league.teams.length}, Players: ${this.league.allPlayers.length}, Available: ${this.league.availablePlayers.size}`);
      console.log(`Depth: ${this.depth}, Weights: ${JSON.stringify(this.weights)}`);
      console.log('='.repeat(80));

      if (!this.validatePrerequisites()) {
        return this.buildResult(false, 'League cannot be formed');
      }

      this.log('info', 'league', 'Starting league', {
        score: this.league.scorer.score(this.weights),
        available: this.league.availablePlayers.size,
      });

      // Step 1: players sitting on a team they cannot attend
      for (const player of this.league.misplacedPlayers()) {
        this.log('warning', 'assignment', `${playerName(player)} is on a team that breaks their constraints`, {
          playerId: player.id,
          teamName: this.league.findTeam(player)?.name,
        });
        if (!this.place(player)) {
          return this.buildResult(false, `Could not reassign ${playerName(player)}`);
        }
      }

      // Step 2: drain the pool
      for (let player = this.league.getNextPlayer(); player !== null; player = this.league.getNextPlayer()) {
        if (!this.place(player)) {
          return this.buildResult(false, `Could not place ${playerName(player)}`);
        }
        if (this.league.availablePlayers.has(player.id)) {
          throw new InvalidMoveSequenceError(`${playerName(player)} is still unassigned after placement`);
        }
      }

      console.log('\n' + '='.repeat(80));
      console.log('TEAM FORMATION COMPLETED');
      for (const summary of this.league.summarize()) {
        console.log(
          `Team ${summary.name.padEnd(11)} (${summary.practiceDay} ${summary.location}) size=${summary.size}, ` +
            `skill=${summary.meanSkill.toFixed(2)}, grade=${summary.meanGrade.toFixed(2)}`
        );
      }
      console.log('='.repeat(80));

      return this.buildResult(true, `Assigned ${this.playersAssigned} players`);
    } catch (error) {
      console.error('❌ TEAM FORMATION FAILED:', error);
      this.errors.push({
        type: 'generation_failed',
        message: error instanceof Error ? error.message : 'Unknown error',
      });
      return this.buildResult(false, 'Team formation failed');
    }
  }

  private validatePrerequisites(): boolean {
    if (this.league.teams.length === 0) {
      this.errors.push({ type: 'no_teams', message: 'No teams to place players on' });
      return false;
    }
    return true;
  }

  /**
   * Search and commit the best moves for one player
   */
  private place(player: Player): boolean {
    const result = findBestMoves(player, this.league, this.depth, this.weights);
    if (!result.success) {
      this.log('error', 'search', result.message, { playerId: player.id, playerName: playerName(player) });
      this.errors.push({
        type: result.reason,
        message: result.message,
        details: { playerId: player.id, playerName: playerName(player) },
      });
      return false;
    }

    this.league.applyMoves(result.moves);
    this.playersAssigned++;

    const [first, ...followUps] = result.moves;
    this.log('info', 'assignment', `Placed ${playerName(player)} on ${first?.teamTo?.name ?? 'their current team'}`, {
      playerId: player.id,
      teamName: first?.teamTo?.name,
      score: result.score,
    });
    for (const move of followUps) {
      this.log('debug', 'assignment', `Moved ${playerName(move.player)} from ${move.teamFrom?.name} to ${move.teamTo?.name}`, {
        playerId: move.player.id,
        teamName: move.teamTo?.name,
      });
    }
    return true;
  }

  private buildResult(success: boolean, message: string): FormTeamsResult {
    const result: FormTeamsResult = {
      success,
      message,
      playersAssigned: this.playersAssigned,
      formationLog: this.formationLog,
    };
    if (this.errors.length > 0) {
      result.errors = this.errors;
    }
    if (success) {
      result.snapshot = this.league.toSnapshot();
      result.teams = this.league.summarize();
      result.scores = this.league.scorer.breakdown();
      result.totalScore = this.league.scorer.score(this.weights);
    }
    return result;
  }
}
