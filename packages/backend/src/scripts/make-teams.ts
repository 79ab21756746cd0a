/**
 * Assign players to teams from CSV files
 *
 * Usage:
 *   make-teams --input <stem> --output <stem> [--weights weights.json] [--depth 2]
 *
 * Reads <input>-players.csv and <input>-teams.csv, writes
 * <output>-players.csv and <output>-teams.csv.
 */

import * as fs from 'fs';
import { pathToFileURL } from 'url';
import type { FormationWeights, FormTeamsResult } from '@league-formation/shared';
import { SCORER_KEYS } from '@league-formation/shared';
import { formatPlayersCsv, formatTeamsCsv, parseLeagueCsvs } from '../services/league-csv.js';
import { formTeams, validateWeights } from '../services/team-formation/index.js';

export interface MakeTeamsOptions {
  inputStem: string;
  outputStem: string;
  weightsFile?: string;
  depth?: number;
}

const USAGE = 'Usage: make-teams --input <stem> --output <stem> [--weights weights.json] [--depth n]';

export function parseMakeTeamsArgs(args: string[]): MakeTeamsOptions {
  let inputStem: string | undefined;
  let outputStem: string | undefined;
  let weightsFile: string | undefined;
  let depth: number | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const value = args[i + 1];
    if ((arg === '--input' || arg === '-i') && value !== undefined) {
      inputStem = value;
      i++;
    } else if ((arg === '--output' || arg === '-o') && value !== undefined) {
      outputStem = value;
      i++;
    } else if ((arg === '--weights' || arg === '-c') && value !== undefined) {
      weightsFile = value;
      i++;
    } else if ((arg === '--depth' || arg === '-d') && value !== undefined) {
      depth = Number(value);
      i++;
    } else {
      throw new Error(`Unexpected argument "${arg}"\n${USAGE}`);
    }
  }

  if (!inputStem || !outputStem) {
    throw new Error(`--input and --output are required\n${USAGE}`);
  }
  return { inputStem, outputStem, weightsFile, depth };
}

function readWeights(file: string): Partial<FormationWeights> {
  const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`${file} must hold a JSON object of scorer name to weight`);
  }
  const table: Record<string, unknown> = Object.fromEntries(Object.entries(parsed));
  const problems = validateWeights(table);
  if (problems.length > 0) {
    throw new Error(`${file}: ${problems.join('; ')}`);
  }

  const weights: Partial<FormationWeights> = {};
  for (const key of SCORER_KEYS) {
    const value = table[key];
    if (typeof value === 'number') weights[key] = value;
  }
  return weights;
}

/**
 * Run team formation over CSV files
 */
export function makeTeams(options: MakeTeamsOptions): FormTeamsResult {
  const playerInputFile = `${options.inputStem}-players.csv`;
  const teamInputFile = `${options.inputStem}-teams.csv`;
  console.log(`Loading league from ${playerInputFile} (players) and ${teamInputFile} (teams)`);

  const { snapshot, errors } = parseLeagueCsvs(
    fs.readFileSync(playerInputFile, 'utf-8'),
    fs.readFileSync(teamInputFile, 'utf-8')
  );
  if (errors.length > 0) {
    return {
      success: false,
      message: 'Could not read input CSVs',
      playersAssigned: 0,
      errors: errors.map((message) => ({ type: 'invalid_snapshot', message })),
      formationLog: [],
    };
  }

  const weights = options.weightsFile ? readWeights(options.weightsFile) : undefined;
  console.log(`Using weights ${JSON.stringify(weights ?? 'default')}.`);

  const result = formTeams({ snapshot, weights, depth: options.depth });
  if (result.success && result.snapshot && result.teams) {
    const playerOutputFile = `${options.outputStem}-players.csv`;
    const teamOutputFile = `${options.outputStem}-teams.csv`;
    fs.writeFileSync(playerOutputFile, formatPlayersCsv(result.snapshot));
    fs.writeFileSync(teamOutputFile, formatTeamsCsv(result.teams));
    console.log(`Wrote ${playerOutputFile} and ${teamOutputFile}`);
  }
  return result;
}

function main(): void {
  const options = parseMakeTeamsArgs(process.argv.slice(2));
  const result = makeTeams(options);
  if (!result.success) {
    for (const error of result.errors ?? []) {
      console.error(`[${error.type}] ${error.message}`);
    }
    process.exitCode = 1;
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  try {
    main();
  } catch (error) {
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
  }
}
