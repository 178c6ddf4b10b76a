/**
 * Saving and reading assembled games
 *
 * Every function expects a database from openScorecardDatabase, which turns
 * on foreign keys so that deleting a game removes its rows everywhere.
 */

import { GameMetadataSchema, createLogger, isPlayKind } from '@scorebook/timeline';
import type {
	BaseState,
	Game,
	KeyPlayRef,
	LineScoreRow,
	PitchingLine,
	TeamSide,
} from '@scorebook/timeline';
import type { ScorecardDatabase } from './database.js';
import type {
	GameRow,
	InningLineRow,
	PitchingLineRow,
	PlateAppearanceRow,
	RunnerIds,
	SaveGameOptions,
	SavedGame,
	SavedPlateAppearance,
	UnrecognizedPlay,
	UnrecognizedPlayRow,
} from './types.js';

const log = createLogger('Games');

function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

function toSide(value: string): TeamSide {
	if (value === 'away' || value === 'home') return value;
	throw new Error(`Unknown team side "${value}"`);
}

function runnerIds(bases: BaseState): RunnerIds {
	return {
		first: bases.first?.playerId ?? null,
		second: bases.second?.playerId ?? null,
		third: bases.third?.playerId ?? null,
	};
}

/**
 * Save an assembled game, replacing any game already stored under its id.
 * Either every row is written or none is.
 */
export function saveGame(db: ScorecardDatabase, game: Game, options: SaveGameOptions = {}): void {
	const logger = options.logger ?? log;
	const savedAt = (options.savedAt ?? new Date()).toISOString();

	const removeGame = db.prepare<[string]>('DELETE FROM games WHERE id = ?');
	const insertGame = db.prepare(
		`INSERT INTO games (
			id, date, venue, away_team_id, home_team_id, away_score, home_score,
			innings, winner, regulation_innings, key_play_threshold, anomaly_count,
			metadata_json, saved_at
		) VALUES (
			@id, @date, @venue, @away_team_id, @home_team_id, @away_score, @home_score,
			@innings, @winner, @regulation_innings, @key_play_threshold, @anomaly_count,
			@metadata_json, @saved_at
		)`
	);
	const insertPlate = db.prepare(
		`INSERT INTO plate_appearances (
			game_id, sequence, inning, is_top_inning, play_index, batter_id, pitcher_id,
			kind, notation, description, outs_before, outs_after, runs_scored, rbi,
			earned_runs, unearned_runs,
			runner_1b_before, runner_2b_before, runner_3b_before,
			runner_1b_after, runner_2b_after, runner_3b_after,
			win_probability_before, win_probability_after, win_probability_swing,
			is_key_play, rule_id, confidence
		) VALUES (
			@game_id, @sequence, @inning, @is_top_inning, @play_index, @batter_id, @pitcher_id,
			@kind, @notation, @description, @outs_before, @outs_after, @runs_scored, @rbi,
			@earned_runs, @unearned_runs,
			@runner_1b_before, @runner_2b_before, @runner_3b_before,
			@runner_1b_after, @runner_2b_after, @runner_3b_after,
			@win_probability_before, @win_probability_after, @win_probability_swing,
			@is_key_play, @rule_id, @confidence
		)`
	);
	const insertRun = db.prepare(
		`INSERT INTO run_attributions (
			game_id, inning, is_top_inning, play_index, runner_id, charged_pitcher_id,
			is_earned, is_earned_for_pitcher, is_ghost, unearned_reason
		) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
	);
	const insertInningLine = db.prepare(
		`INSERT INTO inning_lines (game_id, side, team_id, inning, runs, hits, errors, left_on_base)
		 VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
	);
	const insertPitching = db.prepare(
		`INSERT INTO pitching_lines (
			game_id, pitcher_id, appearance, side, batters_faced, outs_recorded, innings_pitched,
			pitches, hits, walks, strikeouts, home_runs, runs, earned_runs
		) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
	);
	const insertAnomaly = db.prepare(
		`INSERT INTO anomalies (game_id, code, inning, is_top_inning, play_index, description, message, recovery)
		 VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
	);

	const write = db.transaction(() => {
		removeGame.run(game.gameId);

		const gameRow: GameRow = {
			id: game.gameId,
			date: game.metadata.date ?? null,
			venue: game.metadata.venue ?? null,
			away_team_id: game.linescore.away.teamId,
			home_team_id: game.linescore.home.teamId,
			away_score: game.finalScore.away,
			home_score: game.finalScore.home,
			innings: game.innings.length,
			winner: game.winner,
			regulation_innings: game.regulationInnings,
			key_play_threshold: game.keyPlayThreshold,
			anomaly_count: game.anomalies.length,
			metadata_json: JSON.stringify(game.metadata),
			saved_at: savedAt,
		};
		insertGame.run(gameRow);

		let sequence = 0;
		for (const half of game.halfInnings) {
			const isTop = half.half === 'top' ? 1 : 0;

			for (const record of half.plays) {
				const runs = half.runAttributions.filter((run) => run.playIndex === record.index);
				const earned = runs.filter((run) => run.earned).length;
				const before = runnerIds(record.basesBefore);
				const after = runnerIds(record.basesAfter);

				const plateRow: PlateAppearanceRow = {
					game_id: game.gameId,
					sequence,
					inning: record.inning,
					is_top_inning: isTop,
					play_index: record.index,
					batter_id: record.batterId,
					pitcher_id: record.pitcherId,
					kind: record.event.kind,
					notation: record.event.notation,
					description: record.description,
					outs_before: record.outsBefore,
					outs_after: record.outsAfter,
					runs_scored: record.runsScored,
					rbi: record.event.rbi,
					earned_runs: earned,
					unearned_runs: runs.length - earned,
					runner_1b_before: before.first,
					runner_2b_before: before.second,
					runner_3b_before: before.third,
					runner_1b_after: after.first,
					runner_2b_after: after.second,
					runner_3b_after: after.third,
					win_probability_before: record.winProbabilityBefore,
					win_probability_after: record.winProbabilityAfter,
					win_probability_swing: record.winProbabilitySwing,
					is_key_play: record.isKeyPlay ? 1 : 0,
					rule_id: record.event.ruleId,
					confidence: record.event.confidence,
				};
				insertPlate.run(plateRow);
				sequence++;
			}

			for (const run of half.runAttributions) {
				insertRun.run(
					game.gameId,
					half.inning,
					isTop,
					run.playIndex,
					run.runnerId,
					run.chargedPitcherId,
					run.earned ? 1 : 0,
					run.earnedForPitcher ? 1 : 0,
					run.isGhost ? 1 : 0,
					run.unearnedReason
				);
			}
		}

		// Errors belong to the fielding team, everything else to the batting team
		for (const side of ['away', 'home'] as const) {
			for (const inning of game.innings) {
				const batting = side === 'away' ? inning.top : inning.bottom;
				const fielding = side === 'away' ? inning.bottom : inning.top;
				insertInningLine.run(
					game.gameId,
					side,
					game.linescore[side].teamId,
					inning.number,
					batting ? batting.runs : null,
					batting?.hits ?? 0,
					fielding?.errors ?? 0,
					batting?.leftOnBase ?? 0
				);
			}
		}

		game.pitching.forEach((line, appearance) => {
			insertPitching.run(
				game.gameId,
				line.pitcherId,
				appearance,
				line.side,
				line.battersFaced,
				line.outsRecorded,
				line.inningsPitched,
				line.pitches,
				line.hits,
				line.walks,
				line.strikeouts,
				line.homeRuns,
				line.runs,
				line.earnedRuns
			);
		});

		for (const anomaly of game.anomalies) {
			insertAnomaly.run(
				game.gameId,
				anomaly.code,
				anomaly.inning,
				anomaly.half === 'top' ? 1 : 0,
				anomaly.playIndex,
				anomaly.description,
				anomaly.message,
				anomaly.recovery
			);
		}

		return sequence;
	});

	try {
		const plays = write();
		logger.info(`Saved game ${game.gameId} (${plays} plays, ${game.anomalies.length} anomalies)`);
	} catch (error) {
		logger.error(`Failed to save game ${game.gameId}:`, error);
		throw new Error(`Failed to save game ${game.gameId}: ${errorMessage(error)}`);
	}
}

/**
 * Get a saved game by id, or null when there is none
 */
export function getGame(db: ScorecardDatabase, gameId: string): SavedGame | null {
	try {
		const row = db.prepare<[string], GameRow>('SELECT * FROM games WHERE id = ?').get(gameId);
		if (!row) return null;

		const metadata: unknown = JSON.parse(row.metadata_json);
		return {
			id: row.id,
			date: row.date,
			venue: row.venue,
			awayTeamId: row.away_team_id,
			homeTeamId: row.home_team_id,
			awayScore: row.away_score,
			homeScore: row.home_score,
			innings: row.innings,
			winner: row.winner === null ? null : toSide(row.winner),
			regulationInnings: row.regulation_innings,
			keyPlayThreshold: row.key_play_threshold,
			anomalyCount: row.anomaly_count,
			metadata: GameMetadataSchema.parse(metadata),
			savedAt: row.saved_at,
		};
	} catch (error) {
		log.error('Failed to get game:', error);
		throw new Error(`Failed to get game ${gameId}: ${errorMessage(error)}`);
	}
}

/**
 * Every play of a game in the order it happened
 */
export function getPlateAppearances(db: ScorecardDatabase, gameId: string): SavedPlateAppearance[] {
	const rows = db
		.prepare<[string], PlateAppearanceRow>('SELECT * FROM plate_appearances WHERE game_id = ? ORDER BY sequence')
		.all(gameId);

	return rows.map((row): SavedPlateAppearance => {
		if (!isPlayKind(row.kind)) {
			throw new Error(`Game ${gameId} play ${row.sequence}: unknown play kind "${row.kind}"`);
		}
		return {
			gameId: row.game_id,
			sequence: row.sequence,
			inning: row.inning,
			half: row.is_top_inning === 1 ? 'top' : 'bottom',
			playIndex: row.play_index,
			batterId: row.batter_id,
			pitcherId: row.pitcher_id,
			kind: row.kind,
			notation: row.notation,
			description: row.description,
			outsBefore: row.outs_before,
			outsAfter: row.outs_after,
			runsScored: row.runs_scored,
			rbi: row.rbi,
			earnedRuns: row.earned_runs,
			unearnedRuns: row.unearned_runs,
			runnersBefore: { first: row.runner_1b_before, second: row.runner_2b_before, third: row.runner_3b_before },
			runnersAfter: { first: row.runner_1b_after, second: row.runner_2b_after, third: row.runner_3b_after },
			winProbabilityBefore: row.win_probability_before,
			winProbabilityAfter: row.win_probability_after,
			winProbabilitySwing: row.win_probability_swing,
			isKeyPlay: row.is_key_play === 1,
			ruleId: row.rule_id,
			confidence: row.confidence,
		};
	});
}

export function getKeyPlays(db: ScorecardDatabase, gameId: string): KeyPlayRef[] {
	const rows = db
		.prepare<[string], PlateAppearanceRow>(
			'SELECT * FROM plate_appearances WHERE game_id = ? AND is_key_play = 1 ORDER BY sequence'
		)
		.all(gameId);

	return rows.map((row): KeyPlayRef => ({
		inning: row.inning,
		half: row.is_top_inning === 1 ? 'top' : 'bottom',
		playIndex: row.play_index,
		batterId: row.batter_id,
		notation: row.notation,
		winProbabilitySwing: row.win_probability_swing,
	}));
}

/**
 * Rebuild the linescore from the stored inning lines
 */
export function getLinescore(db: ScorecardDatabase, gameId: string): Record<TeamSide, LineScoreRow> | null {
	const rows = db
		.prepare<[string], InningLineRow>(
			'SELECT side, team_id, inning, runs, hits, errors, left_on_base FROM inning_lines WHERE game_id = ? ORDER BY inning'
		)
		.all(gameId);

	const away = rows.filter((row) => row.side === 'away');
	const home = rows.filter((row) => row.side === 'home');
	if (away.length === 0 || home.length === 0) return null;

	const build = (side: TeamSide, lines: InningLineRow[]): LineScoreRow => {
		let total = 0;
		const cumulativeRuns = lines.map((line) => (total += line.runs ?? 0));
		return {
			side,
			teamId: lines[0].team_id,
			runsByInning: lines.map((line) => line.runs),
			cumulativeRuns,
			runs: total,
			hits: lines.reduce((sum, line) => sum + line.hits, 0),
			errors: lines.reduce((sum, line) => sum + line.errors, 0),
			leftOnBase: lines.reduce((sum, line) => sum + line.left_on_base, 0),
		};
	};

	return { away: build('away', away), home: build('home', home) };
}

/**
 * Pitching lines in order of appearance
 */
export function getPitchingLines(db: ScorecardDatabase, gameId: string): PitchingLine[] {
	const rows = db
		.prepare<[string], PitchingLineRow>(
			`SELECT pitcher_id, side, batters_faced, outs_recorded, innings_pitched, pitches,
				hits, walks, strikeouts, home_runs, runs, earned_runs
			 FROM pitching_lines WHERE game_id = ? ORDER BY appearance`
		)
		.all(gameId);

	return rows.map((row): PitchingLine => ({
		pitcherId: row.pitcher_id,
		side: toSide(row.side),
		battersFaced: row.batters_faced,
		outsRecorded: row.outs_recorded,
		inningsPitched: row.innings_pitched,
		pitches: row.pitches,
		hits: row.hits,
		walks: row.walks,
		strikeouts: row.strikeouts,
		homeRuns: row.home_runs,
		runs: row.runs,
		earnedRuns: row.earned_runs,
	}));
}

/**
 * Descriptions no rule recognized, for one game or for every stored game.
 * This is the list to read when adding classification rules.
 */
export function getUnrecognizedPlays(db: ScorecardDatabase, gameId?: string): UnrecognizedPlay[] {
	const base = `SELECT game_id, inning, is_top_inning, play_index, description, message
		FROM anomalies
		WHERE code = 'UnrecognizedPlayPattern' AND play_index IS NOT NULL AND description IS NOT NULL`;

	const rows =
		gameId === undefined
			? db.prepare<[], UnrecognizedPlayRow>(`${base} ORDER BY game_id, id`).all()
			: db.prepare<[string], UnrecognizedPlayRow>(`${base} AND game_id = ? ORDER BY id`).all(gameId);

	return rows.map((row): UnrecognizedPlay => ({
		gameId: row.game_id,
		inning: row.inning,
		half: row.is_top_inning === 1 ? 'top' : 'bottom',
		playIndex: row.play_index,
		description: row.description,
		message: row.message,
	}));
}

/**
 * Delete a game and everything stored with it
 *
 * @returns false when there was no such game
 */
export function deleteGame(db: ScorecardDatabase, gameId: string): boolean {
	try {
		return db.prepare<[string]>('DELETE FROM games WHERE id = ?').run(gameId).changes > 0;
	} catch (error) {
		log.error('Failed to delete game:', error);
		throw new Error(`Failed to delete game ${gameId}: ${errorMessage(error)}`);
	}
}

/**
 * Ids of every stored game, oldest date first
 */
export function listGameIds(db: ScorecardDatabase): string[] {
	return db
		.prepare<[], { id: string }>('SELECT id FROM games ORDER BY date, id')
		.all()
		.map((row) => row.id);
}
