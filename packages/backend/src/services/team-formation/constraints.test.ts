import { describe, it, expect } from 'vitest';
import type { PlayerRecord } from '@league-formation/shared';
import { breaksConstraints, isLockedInPlace, moveBreaksConstraints, violatesPlacement } from './constraints.js';
import { createMove, createPlayer, Team, type Player } from './models.js';

function createTestPlayer(overrides: Partial<PlayerRecord> = {}): Player {
  return createPlayer({
    id: 'p1',
    firstName: 'Pat',
    lastName: 'Lee',
    grade: 3,
    skill: 5,
    goalieSkill: 10,
    ...overrides,
  });
}

const monday = new Team('A', 'M', 'North');
const tuesday = new Team('B', 'T', 'South');

describe('violatesPlacement', () => {
  it('flags an unavailable practice day', () => {
    const player = createTestPlayer({ unavailableDays: ['M'] });
    expect(violatesPlacement(player, monday)).toBe(true);
    expect(violatesPlacement(player, tuesday)).toBe(false);
  });

  it('flags a disallowed location', () => {
    const player = createTestPlayer({ disallowedLocations: ['South'] });
    expect(violatesPlacement(player, monday)).toBe(false);
    expect(violatesPlacement(player, tuesday)).toBe(true);
  });

  it('ignores preferences', () => {
    const player = createTestPlayer({ preferredDays: ['T'], backupLocations: ['South'] });
    expect(violatesPlacement(player, monday)).toBe(false);
  });
});

describe('isLockedInPlace', () => {
  it('pins a locked player on a legal team', () => {
    expect(isLockedInPlace(createTestPlayer({ lock: true }), monday)).toBe(true);
  });

  it('frees a locked player on an illegal team', () => {
    expect(isLockedInPlace(createTestPlayer({ lock: true, unavailableDays: ['M'] }), monday)).toBe(false);
  });

  it('frees a locked player in the pool', () => {
    expect(isLockedInPlace(createTestPlayer({ lock: true }), null)).toBe(false);
  });

  it('never pins an unlocked player', () => {
    expect(isLockedInPlace(createTestPlayer(), monday)).toBe(false);
  });
});

describe('moveBreaksConstraints', () => {
  it('allows placing a free player on a legal team', () => {
    expect(moveBreaksConstraints(createMove(createTestPlayer(), null, monday))).toBe(false);
  });

  it('rejects sending a player back to the pool', () => {
    expect(moveBreaksConstraints(createMove(createTestPlayer(), monday, null))).toBe(true);
  });

  it('rejects a destination the player cannot attend', () => {
    const player = createTestPlayer({ unavailableDays: ['T'] });
    expect(moveBreaksConstraints(createMove(player, null, tuesday))).toBe(true);
  });

  it('rejects moving a locked player off a legal team', () => {
    const player = createTestPlayer({ lock: true });
    expect(moveBreaksConstraints(createMove(player, monday, tuesday))).toBe(true);
  });

  it('allows moving a locked player off an illegal team', () => {
    const player = createTestPlayer({ lock: true, unavailableDays: ['M'] });
    expect(moveBreaksConstraints(createMove(player, monday, tuesday))).toBe(false);
  });

  it('allows placing a locked player from the pool', () => {
    const player = createTestPlayer({ lock: true });
    expect(moveBreaksConstraints(createMove(player, null, tuesday))).toBe(false);
  });
});

describe('breaksConstraints', () => {
  it('is false for an empty sequence', () => {
    expect(breaksConstraints([])).toBe(false);
  });

  it('is true when any move is illegal', () => {
    const free = createTestPlayer({ id: 'p1' });
    const busy = createTestPlayer({ id: 'p2', unavailableDays: ['T'] });
    expect(
      breaksConstraints([createMove(free, null, monday), createMove(busy, monday, tuesday)])
    ).toBe(true);
  });
});
