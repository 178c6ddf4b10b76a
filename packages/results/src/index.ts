/**
 * SQLite storage for assembled game timelines
 */

export type * from './types.js';

export type { ScorecardDatabase, OpenScorecardOptions } from './database.js';
export { openScorecardDatabase, closeScorecardDatabase } from './database.js';

export { SCORECARD_SCHEMA, SCORECARD_SCHEMA_VERSION, createScorecardSchema, getSchemaVersion } from './schema.js';

export {
	saveGame,
	getGame,
	getPlateAppearances,
	getKeyPlays,
	getLinescore,
	getPitchingLines,
	getUnrecognizedPlays,
	deleteGame,
	listGameIds,
} from './games.js';
