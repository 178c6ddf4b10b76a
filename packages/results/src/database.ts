/**
 * Scorecard database lifecycle
 * Opens a better-sqlite3 database (a file, or ':memory:') and makes sure the schema exists
 */

import Database from 'better-sqlite3';
import { createLogger } from '@scorebook/timeline';
import type { Logger } from '@scorebook/timeline';
import { SCORECARD_SCHEMA_VERSION, createScorecardSchema, getSchemaVersion } from './schema.js';

export type ScorecardDatabase = Database.Database;

export interface OpenScorecardOptions {
	logger?: Logger;
}

/**
 * Open the scorecard database, creating the schema when it is missing
 */
export function openScorecardDatabase(filename = ':memory:', options: OpenScorecardOptions = {}): ScorecardDatabase {
	const logger = options.logger ?? createLogger('ScorecardDB');

	logger.info(`Opening ${filename}`);
	const db = new Database(filename);

	try {
		db.pragma('foreign_keys = ON');
		if (filename !== ':memory:') {
			db.pragma('journal_mode = WAL');
		}

		const version = getSchemaVersion(db);
		if (version > SCORECARD_SCHEMA_VERSION) {
			throw new Error(`Schema version ${version} is newer than supported version ${SCORECARD_SCHEMA_VERSION}`);
		}
		if (version < SCORECARD_SCHEMA_VERSION) {
			logger.info(`Creating schema (version ${SCORECARD_SCHEMA_VERSION})`);
			createScorecardSchema(db);
		}
	} catch (error) {
		db.close();
		logger.error(`Failed to open ${filename}:`, error);
		throw error;
	}

	return db;
}

export function closeScorecardDatabase(db: ScorecardDatabase, logger: Logger = createLogger('ScorecardDB')): void {
	if (!db.open) return;
	db.close();
	logger.info(`Closed ${db.name}`);
}
