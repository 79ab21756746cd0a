import type { PlayerRecord, TeamRecord } from '@league-formation/shared';
import { DAY_CODES, MIN_SKILL, MAX_SKILL, MIN_GRADE, MAX_GRADE } from '@league-formation/shared';
import { ValidationError } from './errors.js';

/**
 * What a player record is checked against
 * locations: when set, every location a player names must be one of these
 */
export interface ValidationContext {
  locations?: ReadonlySet<string>;
}

const VALID_DAYS: ReadonlySet<string> = new Set(DAY_CODES);

function describePlayer(record: PlayerRecord): string {
  return `${record.firstName} ${record.lastName} (${record.id})`;
}

function fail(record: PlayerRecord, field: string, message: string): never {
  throw new ValidationError(
    `Failed to create player ${describePlayer(record)}. ${message} Please correct this in the input and retry.`,
    field,
    typeof record.id === 'string' ? record.id : undefined
  );
}

function validateStrings(record: PlayerRecord): void {
  for (const key of ['id', 'firstName', 'lastName'] as const) {
    const value: unknown = record[key];
    if (typeof value !== 'string') {
      fail(record, key, `Expected a string but found ${key}=${String(value)} (${typeof value}) instead.`);
    }
    if (value.trim().length === 0) {
      fail(record, key, `${key} is empty.`);
    }
  }
}

const INTEGER_RANGES: Array<{ key: 'grade' | 'skill' | 'goalieSkill'; min: number; max: number }> = [
  { key: 'grade', min: MIN_GRADE, max: MAX_GRADE },
  { key: 'skill', min: MIN_SKILL, max: MAX_SKILL },
  { key: 'goalieSkill', min: MIN_SKILL, max: MAX_SKILL },
];

function validateIntegers(record: PlayerRecord): void {
  for (const { key, min, max } of INTEGER_RANGES) {
    const value: unknown = record[key];
    if (typeof value !== 'number' || !Number.isInteger(value)) {
      fail(record, key, `Expected an integer but found ${key}=${String(value)} (${typeof value}) instead.`);
    }
    if (value < min || value > max) {
      fail(record, key, `${key} (${value}) is outside ${min}-${max}.`);
    }
  }
}

/**
 * Read a list field as trimmed strings, the form createPlayer stores
 */
function validateList(record: PlayerRecord, key: keyof PlayerRecord): string[] {
  const value: unknown = record[key];
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    fail(record, key, `Expected a list for ${key} but found ${typeof value}.`);
  }
  const items: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string') {
      fail(record, key, `Expected only strings in ${key} but found ${String(item)}.`);
    }
    items.push(item.trim());
  }
  return items;
}

function validateDays(record: PlayerRecord): void {
  const unavailable = validateList(record, 'unavailableDays');
  const preferred = validateList(record, 'preferredDays');

  for (const day of [...unavailable, ...preferred]) {
    if (!VALID_DAYS.has(day)) {
      fail(record, 'days', `${day} is not a valid day (${DAY_CODES.join('')}).`);
    }
  }

  for (const day of unavailable) {
    if (preferred.includes(day)) {
      fail(
        record,
        'days',
        `${day} was marked as both unavailable (${unavailable.join('')}) and preferred (${preferred.join('')}).`
      );
    }
  }
}

function validateLocations(record: PlayerRecord, context: ValidationContext): void {
  const disallowed = validateList(record, 'disallowedLocations');
  const preferred = validateList(record, 'preferredLocations');
  const backup = validateList(record, 'backupLocations');

  for (const location of [...disallowed, ...preferred, ...backup]) {
    if (location.length === 0) {
      fail(record, 'locations', 'Location names cannot be empty.');
    }
    if (context.locations && !context.locations.has(location)) {
      fail(
        record,
        'locations',
        `${location} is not a valid location (${Array.from(context.locations).join(', ')}).`
      );
    }
  }

  for (const location of disallowed) {
    if (preferred.includes(location) || backup.includes(location)) {
      fail(
        record,
        'locations',
        `${location} was marked as both disallowed (${disallowed.join(', ')}) and preferred (${[...preferred, ...backup].join(', ')}).`
      );
    }
  }
}

function validateFlags(record: PlayerRecord): void {
  for (const key of ['lock', 'emailedParents'] as const) {
    const value: unknown = record[key];
    if (value !== undefined && typeof value !== 'boolean') {
      fail(record, key, `Expected true or false for ${key} but found ${String(value)}.`);
    }
  }

  if (record.emailedParents && !record.lock) {
    fail(record, 'emailedParents', 'Parents were already emailed about a placement, so the player must be locked.');
  }
}

/**
 * Check a player record before it becomes a Player
 * Throws ValidationError on the first problem found
 */
export function validatePlayerRecord(record: PlayerRecord, context: ValidationContext = {}): void {
  const value: unknown = record;
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ValidationError(`Failed to create player: expected a player record but found ${String(value)}.`, 'player');
  }
  validateStrings(record);
  validateIntegers(record);
  validateDays(record);
  validateLocations(record, context);
  validateList(record, 'teammateRequests');
  validateFlags(record);

  for (const key of ['school', 'comment'] as const) {
    const value: unknown = record[key];
    if (value !== undefined && typeof value !== 'string') {
      fail(record, key, `Expected text for ${key} but found ${typeof value}.`);
    }
  }
}

/**
 * Check a team record before it becomes a Team
 */
export function validateTeamRecord(record: TeamRecord): void {
  const value: unknown = record;
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ValidationError(`Failed to create team: expected a team record but found ${String(value)}.`, 'team');
  }

  const name: unknown = record.name;
  if (typeof name !== 'string' || name.trim().length === 0) {
    throw new ValidationError('Failed to create team: name is required.', 'name');
  }

  const practiceDay: unknown = record.practiceDay;
  if (typeof practiceDay !== 'string' || !VALID_DAYS.has(practiceDay)) {
    throw new ValidationError(
      `Failed to create team ${name}: ${String(practiceDay)} is not a valid practice day (${DAY_CODES.join('')}).`,
      'practiceDay',
      name
    );
  }

  const location: unknown = record.location;
  if (typeof location !== 'string' || location.trim().length === 0) {
    throw new ValidationError(`Failed to create team ${name}: location is required.`, 'location', name);
  }
}
