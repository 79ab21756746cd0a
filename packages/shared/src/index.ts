export * from './types/player.js';
export * from './types/team.js';
export * from './types/league.js';
export * from './types/team-formation.js';
