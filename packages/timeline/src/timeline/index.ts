/**
 * Timeline assembly
 */

export type { HalfInningOptions, SimulatedHalfInning } from './half-inning.js';
export { simulateHalfInning } from './half-inning.js';

export type { HalfInningPlays } from './assemble.js';
export { assembleGame, groupHalfInnings, lastBatterOf, battingSideOf, fieldingSideOf } from './assemble.js';

export { buildLinescore, buildPitchingLines, buildBattingLines, formatInningsPitched } from './box-score.js';

export type { ProcessGameOptions } from './pipeline.js';
export { processGame } from './pipeline.js';

export type { GameOutcome, ProcessGamesOptions } from './batch.js';
export { processGames } from './batch.js';
