import type { LeagueSnapshot, SnapshotPlayer, TeamRecord, TeamSummary } from '@league-formation/shared';
import { PLAYER_CSV_HEADERS, TEAM_CSV_HEADERS, TEAM_SUMMARY_CSV_HEADERS } from '@league-formation/shared';
import { formatCsvLine, parseCsvLine, splitCsvLines } from '../utils/csv.js';

export interface CsvParseResult<T> {
  rows: T[];
  errors: string[];
}

const REQUIRED_PLAYER_COLUMNS = ['id', 'first_name', 'last_name', 'grade', 'skill', 'goalie_skill'];

/**
 * Reads named cells of one CSV row, collecting conversion errors
 */
class RowReader {
  constructor(
    private readonly columns: Map<string, number>,
    private readonly values: string[],
    private readonly rowNumber: number,
    private readonly errors: string[]
  ) {}

  text(column: string): string {
    const index = this.columns.get(column);
    return index === undefined ? '' : (this.values[index] ?? '').trim();
  }

  integer(column: string): number {
    const value = this.text(column);
    if (!/^-?\d+$/.test(value)) {
      this.errors.push(`Row ${this.rowNumber}: ${column} should be a whole number but found "${value}"`);
      return Number.NaN;
    }
    return parseInt(value, 10);
  }

  /**
   * Day codes written together ("MW") or separated ("m, w"), in any case
   */
  days(column: string): string[] {
    return this.text(column).toUpperCase().replace(/[\s,]/g, '').split('');
  }

  list(column: string): string[] {
    return this.text(column)
      .split(',')
      .map((v) => v.trim())
      .filter((v) => v.length > 0);
  }

  boolean(column: string): boolean {
    const value = this.text(column).toLowerCase();
    if (value === '' || value === 'false' || value === '0' || value === 'no') return false;
    if (value === 'true' || value === '1' || value === 'yes') return true;
    this.errors.push(`Row ${this.rowNumber}: ${column} should be true or false but found "${value}"`);
    return false;
  }
}

/**
 * Parse the header row and rows of a CSV file, checking required columns
 */
function parseTable<T>(
  content: string,
  requiredColumns: readonly string[],
  buildRow: (reader: RowReader) => T
): CsvParseResult<T> {
  const errors: string[] = [];
  const rows: T[] = [];

  const lines = splitCsvLines(content);
  if (lines.length === 0) {
    errors.push('CSV file is empty');
    return { rows, errors };
  }

  const headers = parseCsvLine(lines[0]).map((h) => h.trim().toLowerCase());
  const columns = new Map(headers.map((h, i): [string, number] => [h, i]));
  const missing = requiredColumns.filter((c) => !columns.has(c));
  if (missing.length > 0) {
    errors.push(`Invalid header: missing column(s) ${missing.join(', ')}`);
    return { rows, errors };
  }

  for (let i = 1; i < lines.length; i++) {
    const rowNumber = i + 1; // 1-indexed, accounting for header
    const values = parseCsvLine(lines[i]);

    if (values.length !== headers.length) {
      errors.push(`Row ${rowNumber}: Expected ${headers.length} columns but found ${values.length}`);
      continue;
    }

    const errorCount = errors.length;
    const row = buildRow(new RowReader(columns, values, rowNumber, errors));
    if (errors.length === errorCount) {
      rows.push(row);
    }
  }

  return { rows, errors };
}

/**
 * Parse a players CSV into snapshot players
 * Only id, names, grade and skills are required; the team column is optional
 */
export function parsePlayersCsv(content: string): CsvParseResult<SnapshotPlayer> {
  return parseTable(content, REQUIRED_PLAYER_COLUMNS, (row) => {
    const player: SnapshotPlayer = {
      id: row.text('id'),
      firstName: row.text('first_name'),
      lastName: row.text('last_name'),
      grade: row.integer('grade'),
      skill: row.integer('skill'),
      goalieSkill: row.integer('goalie_skill'),
      unavailableDays: row.days('unavailable_days'),
      preferredDays: row.days('preferred_days'),
      disallowedLocations: row.list('disallowed_locations'),
      preferredLocations: row.list('preferred_locations'),
      backupLocations: row.list('backup_locations'),
      teammateRequests: row.list('teammate_requests'),
      lock: row.boolean('lock'),
      emailedParents: row.boolean('emailed_parents'),
      team: row.text('team') || null,
    };
    const school = row.text('school');
    const comment = row.text('comment');
    if (school) player.school = school;
    if (comment) player.comment = comment;
    return player;
  });
}

/**
 * Parse a teams CSV
 */
export function parseTeamsCsv(content: string): CsvParseResult<TeamRecord> {
  return parseTable(content, TEAM_CSV_HEADERS, (row) => ({
    name: row.text('name'),
    practiceDay: row.text('practice_day').toUpperCase(),
    location: row.text('location'),
  }));
}

/**
 * Parse both CSV files of a league snapshot
 */
export function parseLeagueCsvs(
  playersCsv: string,
  teamsCsv: string
): { snapshot: LeagueSnapshot; errors: string[] } {
  const players = parsePlayersCsv(playersCsv);
  const teams = parseTeamsCsv(teamsCsv);
  return {
    snapshot: { players: players.rows, teams: teams.rows },
    errors: [
      ...players.errors.map((e) => `players: ${e}`),
      ...teams.errors.map((e) => `teams: ${e}`),
    ],
  };
}

/**
 * Write snapshot players as CSV, one row per player
 */
export function formatPlayersCsv(snapshot: LeagueSnapshot): string {
  const lines = [formatCsvLine(PLAYER_CSV_HEADERS)];
  for (const p of snapshot.players) {
    lines.push(
      formatCsvLine([
        p.id,
        p.firstName,
        p.lastName,
        p.grade,
        p.skill,
        p.goalieSkill,
        (p.unavailableDays ?? []).join(''),
        (p.preferredDays ?? []).join(''),
        (p.disallowedLocations ?? []).join(', '),
        (p.preferredLocations ?? []).join(', '),
        (p.backupLocations ?? []).join(', '),
        (p.teammateRequests ?? []).join(', '),
        p.lock ?? false,
        p.emailedParents ?? false,
        p.school,
        p.comment,
        p.team,
      ])
    );
  }
  return lines.join('\n') + '\n';
}

/**
 * Write team summaries as CSV
 */
export function formatTeamsCsv(teams: readonly TeamSummary[]): string {
  const lines = [formatCsvLine(TEAM_SUMMARY_CSV_HEADERS)];
  for (const t of teams) {
    lines.push(
      formatCsvLine([
        t.name,
        t.practiceDay,
        t.location,
        t.size,
        t.meanSkill.toFixed(2),
        t.meanGrade.toFixed(2),
        t.goalies,
        t.firstRound,
        t.topTier,
        t.midTier,
        t.bottomTier,
      ])
    );
  }
  return lines.join('\n') + '\n';
}
