import { describe, it, expect } from 'vitest';
import type { LeagueSnapshot, SnapshotPlayer, TeamRecord } from '@league-formation/shared';
import { createMove, League, type Player, type Team } from './models.js';
import { expandSequence, findBestMoves, scoreMoves } from './optimizer.js';

function createRecord(overrides: Partial<SnapshotPlayer> = {}): SnapshotPlayer {
  return {
    id: 'p1',
    firstName: 'Pat',
    lastName: 'Lee',
    grade: 3,
    skill: 5,
    goalieSkill: 10,
    ...overrides,
  };
}

const TWO_TEAMS: TeamRecord[] = [
  { name: 'A', practiceDay: 'M', location: 'North' },
  { name: 'B', practiceDay: 'T', location: 'North' },
];

const THREE_TEAMS: TeamRecord[] = [
  ...TWO_TEAMS,
  { name: 'C', practiceDay: 'W', location: 'North' },
];

function createLeague(players: SnapshotPlayer[], teams: TeamRecord[] = TWO_TEAMS): League {
  const snapshot: LeagueSnapshot = { players, teams };
  return League.fromSnapshot(snapshot);
}

function requireTeam(league: League, name: string): Team {
  const team = league.getTeam(name);
  if (!team) throw new Error(`No team ${name}`);
  return team;
}

function requirePlayer(league: League, id: string): Player {
  const player = league.getPlayer(id);
  if (!player) throw new Error(`No player ${id}`);
  return player;
}

const SIZE_ONLY = { size: 1 };

// Deterministic numbers in [0, 1) for generated leagues
function mulberry32(seed: number): () => number {
  let a = seed | 0;
  return () => {
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 0x100000000;
  };
}

const RANDOM_TEAMS: TeamRecord[] = [
  { name: 'A', practiceDay: 'M', location: 'North' },
  { name: 'B', practiceDay: 'T', location: 'South' },
  { name: 'C', practiceDay: 'W', location: 'North' },
];

const RANDOM_NAMES = ['Ann Bell', 'Ben Cole', 'Cy Dunn', 'Dee Fox', 'Eli Gray', 'Fay Hart', 'Gus Ives'];

// Six placed players with mixed attributes and one (p6) left in the pool
function createRandomLeague(seed: number): League {
  const random = mulberry32(seed);
  const pick = <T>(items: readonly T[]): T => items[Math.floor(random() * items.length)];

  const players = RANDOM_NAMES.map((name, i) => {
    const [firstName, lastName] = name.split(' ');
    return createRecord({
      id: `p${i}`,
      firstName,
      lastName,
      grade: Math.floor(random() * 6),
      skill: 1 + Math.floor(random() * 10),
      goalieSkill: 1 + Math.floor(random() * 10),
      preferredDays: [pick(['M', 'T', 'W'])],
      preferredLocations: [pick(['North', 'South'])],
      teammateRequests: [pick(RANDOM_NAMES)],
      lock: random() < 0.2,
      team: i === RANDOM_NAMES.length - 1 ? null : pick(['A', 'B', 'C']),
    });
  });
  return createLeague(players, RANDOM_TEAMS);
}

function expectScoresBounded(league: League): void {
  for (const value of Object.values(league.scorer.breakdown())) {
    expect(value).toBeGreaterThanOrEqual(0);
    expect(value).toBeLessThanOrEqual(1);
  }
}

describe('findBestMoves', () => {
  it('balances team sizes when placing a pool one player at a time', () => {
    const league = createLeague(
      ['p1', 'p2', 'p3', 'p4', 'p5', 'p6'].map((id) => createRecord({ id })),
      THREE_TEAMS
    );

    for (let player = league.getNextPlayer(); player !== null; player = league.getNextPlayer()) {
      const result = findBestMoves(player, league, 2, SIZE_ONLY);
      if (!result.success) throw new Error(result.message);
      league.applyMoves(result.moves);
    }

    expect(league.teams.map((t) => t.size)).toEqual([2, 2, 2]);
    expect(league.scorer.breakdown().size).toBe(1);
  });

  it('balances six interchangeable players over three teams at depth 1', () => {
    const league = createLeague(
      ['p1', 'p2', 'p3', 'p4', 'p5', 'p6'].map((id) => createRecord({ id })),
      THREE_TEAMS
    );

    for (let player = league.getNextPlayer(); player !== null; player = league.getNextPlayer()) {
      const result = findBestMoves(player, league, 1);
      if (!result.success) throw new Error(result.message);
      expect(result.moves).toHaveLength(1);
      league.applyMoves(result.moves);
    }

    expect(league.teams.map((t) => t.size)).toEqual([2, 2, 2]);
    expect(league.scorer.breakdown().size).toBe(1);
  });

  it('never scores worse with a deeper search', () => {
    for (let seed = 1; seed <= 20; seed++) {
      const scores = [1, 2, 3].map((depth) => {
        const league = createRandomLeague(seed);
        const result = findBestMoves(requirePlayer(league, 'p6'), league, depth);
        if (!result.success) throw new Error(result.message);
        return result.score;
      });

      expect(scores[1]).toBeGreaterThanOrEqual(scores[0] - 1e-9);
      expect(scores[2]).toBeGreaterThanOrEqual(scores[1] - 1e-9);
    }
  });

  it('skips a team on an unavailable day', () => {
    const league = createLeague([
      createRecord({ id: 'p1', team: 'A' }),
      createRecord({ id: 'x', unavailableDays: ['M'] }),
    ]);

    const result = findBestMoves(requirePlayer(league, 'x'), league, 2, SIZE_ONLY);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.moves).toHaveLength(1);
    expect(result.moves[0].teamFrom).toBeNull();
    expect(result.moves[0].teamTo?.name).toBe('B');
    expect(result.score).toBe(1);
  });

  it('returns no moves for a player locked on a legal team', () => {
    const league = createLeague([createRecord({ id: 'p1', team: 'A', lock: true })]);

    const result = findBestMoves(requirePlayer(league, 'p1'), league);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.moves).toEqual([]);
  });

  it('moves a locked player off a team they cannot attend', () => {
    const league = createLeague([createRecord({ id: 'p1', team: 'A', lock: true, unavailableDays: ['M'] })]);

    const result = findBestMoves(requirePlayer(league, 'p1'), league);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.moves.map((m) => [m.teamFrom?.name, m.teamTo?.name])).toEqual([['A', 'B']]);
  });

  it('fails when no team is feasible', () => {
    const league = createLeague([createRecord({ id: 'x', unavailableDays: ['M', 'T'] })]);

    const result = findBestMoves(requirePlayer(league, 'x'), league);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.reason).toBe('no_feasible_team');
    expect(result.message).toContain('Pat Lee (x)');
  });

  it('chains a second move when it improves the score', () => {
    // x can only join A, which already holds two players
    const players = [
      createRecord({ id: 'p1', team: 'A' }),
      createRecord({ id: 'p2', team: 'A' }),
      createRecord({ id: 'x', unavailableDays: ['T'] }),
    ];

    const shallowLeague = createLeague(players);
    const shallow = findBestMoves(requirePlayer(shallowLeague, 'x'), shallowLeague, 1, SIZE_ONLY);
    const deepLeague = createLeague(players);
    const deep = findBestMoves(requirePlayer(deepLeague, 'x'), deepLeague, 2, SIZE_ONLY);

    if (!shallow.success || !deep.success) throw new Error('search failed');
    // Sizes 3/0 against 2/1
    expect(shallow.moves).toHaveLength(1);
    expect(shallow.score).toBeCloseTo(1 - Math.tanh(1.5));
    expect(deep.moves).toHaveLength(2);
    expect(deep.moves[0].teamTo?.name).toBe('A');
    expect(deep.moves[1].teamFrom?.name).toBe('A');
    expect(deep.moves[1].teamTo?.name).toBe('B');
    expect(['p1', 'p2']).toContain(deep.moves[1].player.id);
    expect(deep.score).toBeCloseTo(1 - Math.tanh(0.5));
    expect(deep.score).toBeGreaterThan(shallow.score);
  });

  it('never moves a locked teammate', () => {
    const league = createLeague([
      createRecord({ id: 'p1', team: 'A', lock: true }),
      createRecord({ id: 'p2', team: 'A', lock: true }),
      createRecord({ id: 'x', unavailableDays: ['T'] }),
    ]);

    const result = findBestMoves(requirePlayer(league, 'x'), league, 3, SIZE_ONLY);

    if (!result.success) throw new Error(result.message);
    expect(result.moves).toHaveLength(1);
  });

  it('leaves the league as it found it', () => {
    const league = createLeague([
      createRecord({ id: 'p1', team: 'A', skill: 2 }),
      createRecord({ id: 'p2', team: 'B', skill: 8 }),
      createRecord({ id: 'p3', team: 'B', skill: 4 }),
      createRecord({ id: 'x', skill: 6 }),
    ]);
    const before = league.toSnapshot();
    const scoreBefore = league.scorer.score();

    findBestMoves(requirePlayer(league, 'x'), league, 3);

    expect(league.toSnapshot()).toEqual(before);
    expect(league.scorer.score()).toBeCloseTo(scoreBefore, 9);
    expect(league.availablePlayers.has('x')).toBe(true);
  });

  it('rejects a depth below 1', () => {
    const league = createLeague([createRecord({ id: 'x' })]);
    expect(() => findBestMoves(requirePlayer(league, 'x'), league, 0)).toThrow(RangeError);
  });
});

describe('expandSequence', () => {
  it('moves unmoved players off the last destination to every other team', () => {
    const league = createLeague(
      [
        createRecord({ id: 'p1', team: 'A' }),
        createRecord({ id: 'p2', team: 'A', lock: true }),
        createRecord({ id: 'x' }),
      ],
      THREE_TEAMS
    );
    const teamA = requireTeam(league, 'A');

    const children = expandSequence([createMove(requirePlayer(league, 'x'), null, teamA)], league);

    expect(children.map((moves) => moves.map((m) => `${m.player.id}:${m.teamTo?.name}`))).toEqual([
      ['x:A', 'p1:B'],
      ['x:A', 'p1:C'],
    ]);
  });

  it('has nothing to expand for an empty sequence', () => {
    const league = createLeague([createRecord({ id: 'x' })]);
    expect(expandSequence([], league)).toEqual([]);
  });
});

describe('scoreMoves', () => {
  it('scores the moved league and restores it', () => {
    const league = createLeague([createRecord({ id: 'p1', team: 'A' }), createRecord({ id: 'x' })]);
    const teamB = requireTeam(league, 'B');

    const score = scoreMoves([createMove(requirePlayer(league, 'x'), null, teamB)], league, SIZE_ONLY);

    expect(score).toBe(1);
    expect(teamB.size).toBe(0);
    expect(league.availablePlayers.has('x')).toBe(true);
  });
});

describe('score bounds', () => {
  it('keeps every sub-score within 0 and 1 as players move', () => {
    for (let seed = 1; seed <= 20; seed++) {
      const league = createRandomLeague(seed);
      expectScoresBounded(league);

      const result = findBestMoves(requirePlayer(league, 'p6'), league);
      if (!result.success) throw new Error(result.message);
      league.applyMoves(result.moves);
      expectScoresBounded(league);

      // Rotate every placed player to the next team
      for (const player of league.allPlayers) {
        const from = league.findTeam(player);
        if (!from) continue;
        const to = league.teams[(league.teams.indexOf(from) + 1) % league.teams.length];
        league.applyMoves([createMove(player, from, to)]);
        expectScoresBounded(league);
      }
    }
  });
});
