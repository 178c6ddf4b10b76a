/**
 * SQL schema for the scorecard database
 */

import type Database from 'better-sqlite3';

export const SCORECARD_SCHEMA_VERSION = 1;

export const SCORECARD_SCHEMA = `
  -- Tables
  CREATE TABLE IF NOT EXISTS games (
    id TEXT PRIMARY KEY,
    date TEXT,
    venue TEXT,
    away_team_id TEXT NOT NULL,
    home_team_id TEXT NOT NULL,
    away_score INTEGER NOT NULL,
    home_score INTEGER NOT NULL,
    innings INTEGER NOT NULL,
    winner TEXT CHECK(winner IN ('away', 'home')),
    regulation_innings INTEGER NOT NULL,
    key_play_threshold REAL NOT NULL,
    anomaly_count INTEGER NOT NULL DEFAULT 0,
    metadata_json TEXT NOT NULL,
    saved_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS plate_appearances (
    game_id TEXT NOT NULL,
    sequence INTEGER NOT NULL,
    inning INTEGER NOT NULL,
    is_top_inning INTEGER NOT NULL CHECK(is_top_inning IN (0, 1)),
    play_index INTEGER NOT NULL,
    batter_id TEXT NOT NULL,
    pitcher_id TEXT NOT NULL,
    kind TEXT NOT NULL,
    notation TEXT NOT NULL,
    description TEXT NOT NULL,
    outs_before INTEGER NOT NULL,
    outs_after INTEGER NOT NULL,
    runs_scored INTEGER NOT NULL DEFAULT 0,
    rbi INTEGER NOT NULL DEFAULT 0,
    earned_runs INTEGER NOT NULL DEFAULT 0,
    unearned_runs INTEGER NOT NULL DEFAULT 0,
    runner_1b_before TEXT,
    runner_2b_before TEXT,
    runner_3b_before TEXT,
    runner_1b_after TEXT,
    runner_2b_after TEXT,
    runner_3b_after TEXT,
    win_probability_before REAL NOT NULL,
    win_probability_after REAL NOT NULL,
    win_probability_swing REAL NOT NULL,
    is_key_play INTEGER NOT NULL DEFAULT 0 CHECK(is_key_play IN (0, 1)),
    rule_id TEXT NOT NULL,
    confidence REAL NOT NULL,
    PRIMARY KEY (game_id, sequence),
    FOREIGN KEY (game_id) REFERENCES games(id) ON DELETE CASCADE
  );

  CREATE TABLE IF NOT EXISTS run_attributions (
    game_id TEXT NOT NULL,
    inning INTEGER NOT NULL,
    is_top_inning INTEGER NOT NULL CHECK(is_top_inning IN (0, 1)),
    play_index INTEGER NOT NULL,
    runner_id TEXT NOT NULL,
    charged_pitcher_id TEXT NOT NULL,
    is_earned INTEGER NOT NULL CHECK(is_earned IN (0, 1)),
    is_earned_for_pitcher INTEGER NOT NULL CHECK(is_earned_for_pitcher IN (0, 1)),
    is_ghost INTEGER NOT NULL DEFAULT 0 CHECK(is_ghost IN (0, 1)),
    unearned_reason TEXT,
    FOREIGN KEY (game_id) REFERENCES games(id) ON DELETE CASCADE
  );

  -- One row per team per inning; runs is NULL for a bottom half never played
  CREATE TABLE IF NOT EXISTS inning_lines (
    game_id TEXT NOT NULL,
    side TEXT NOT NULL CHECK(side IN ('away', 'home')),
    team_id TEXT NOT NULL,
    inning INTEGER NOT NULL,
    runs INTEGER,
    hits INTEGER NOT NULL DEFAULT 0,
    errors INTEGER NOT NULL DEFAULT 0,
    left_on_base INTEGER NOT NULL DEFAULT 0,
    PRIMARY KEY (game_id, side, inning),
    FOREIGN KEY (game_id) REFERENCES games(id) ON DELETE CASCADE
  );

  CREATE TABLE IF NOT EXISTS pitching_lines (
    game_id TEXT NOT NULL,
    pitcher_id TEXT NOT NULL,
    appearance INTEGER NOT NULL,
    side TEXT NOT NULL CHECK(side IN ('away', 'home')),
    batters_faced INTEGER NOT NULL,
    outs_recorded INTEGER NOT NULL,
    innings_pitched TEXT NOT NULL,
    pitches INTEGER NOT NULL,
    hits INTEGER NOT NULL,
    walks INTEGER NOT NULL,
    strikeouts INTEGER NOT NULL,
    home_runs INTEGER NOT NULL,
    runs INTEGER NOT NULL,
    earned_runs INTEGER NOT NULL,
    PRIMARY KEY (game_id, pitcher_id),
    FOREIGN KEY (game_id) REFERENCES games(id) ON DELETE CASCADE
  );

  CREATE TABLE IF NOT EXISTS anomalies (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    game_id TEXT NOT NULL,
    code TEXT NOT NULL,
    inning INTEGER NOT NULL,
    is_top_inning INTEGER NOT NULL CHECK(is_top_inning IN (0, 1)),
    play_index INTEGER,
    description TEXT,
    message TEXT NOT NULL,
    recovery TEXT NOT NULL,
    FOREIGN KEY (game_id) REFERENCES games(id) ON DELETE CASCADE
  );

  -- Indexes
  CREATE INDEX IF NOT EXISTS idx_games_date ON games(date);
  CREATE INDEX IF NOT EXISTS idx_plate_appearances_batter ON plate_appearances(batter_id);
  CREATE INDEX IF NOT EXISTS idx_plate_appearances_pitcher ON plate_appearances(pitcher_id);
  CREATE INDEX IF NOT EXISTS idx_plate_appearances_key ON plate_appearances(game_id, is_key_play);
  CREATE INDEX IF NOT EXISTS idx_run_attributions_game ON run_attributions(game_id);
  CREATE INDEX IF NOT EXISTS idx_run_attributions_pitcher ON run_attributions(charged_pitcher_id);
  CREATE INDEX IF NOT EXISTS idx_anomalies_game ON anomalies(game_id);
  CREATE INDEX IF NOT EXISTS idx_anomalies_code ON anomalies(code);
`;

/**
 * Create all tables and indexes, then stamp the schema version
 */
export function createScorecardSchema(db: Database.Database): void {
	db.exec(SCORECARD_SCHEMA);
	db.pragma(`user_version = ${SCORECARD_SCHEMA_VERSION}`);
}

export function getSchemaVersion(db: Database.Database): number {
	const version: unknown = db.pragma('user_version', { simple: true });
	return typeof version === 'number' ? version : 0;
}
