/**
 * Types for stored game timelines
 */

import type { GameMetadata, Half, Logger, PlayKind, PlayerId, PitcherId, TeamSide } from '@scorebook/timeline';

export interface SavedGame {
	id: string;
	date: string | null;
	venue: string | null;
	awayTeamId: string;
	homeTeamId: string;
	awayScore: number;
	homeScore: number;
	innings: number;
	winner: TeamSide | null;
	regulationInnings: number;
	keyPlayThreshold: number;
	anomalyCount: number;
	metadata: GameMetadata;
	savedAt: string;
}

/** Player ids on first, second and third */
export interface RunnerIds {
	first: PlayerId | null;
	second: PlayerId | null;
	third: PlayerId | null;
}

export interface SavedPlateAppearance {
	gameId: string;
	/** Position of the play in the whole game, from 0 */
	sequence: number;
	inning: number;
	half: Half;
	/** Position of the play within its half-inning */
	playIndex: number;
	batterId: PlayerId;
	pitcherId: PitcherId;
	kind: PlayKind;
	notation: string;
	description: string;
	outsBefore: number;
	outsAfter: number;
	runsScored: number;
	rbi: number;
	earnedRuns: number;
	unearnedRuns: number;
	runnersBefore: RunnerIds;
	runnersAfter: RunnerIds;
	winProbabilityBefore: number;
	winProbabilityAfter: number;
	winProbabilitySwing: number;
	isKeyPlay: boolean;
	ruleId: string;
	confidence: number;
}

/** A description no classification rule accepted */
export interface UnrecognizedPlay {
	gameId: string;
	inning: number;
	half: Half;
	playIndex: number;
	description: string;
	message: string;
}

export interface SaveGameOptions {
	/** Defaults to now */
	savedAt?: Date;
	logger?: Logger;
}

// Rows as better-sqlite3 returns them

export interface GameRow {
	id: string;
	date: string | null;
	venue: string | null;
	away_team_id: string;
	home_team_id: string;
	away_score: number;
	home_score: number;
	innings: number;
	winner: string | null;
	regulation_innings: number;
	key_play_threshold: number;
	anomaly_count: number;
	metadata_json: string;
	saved_at: string;
}

export interface PlateAppearanceRow {
	game_id: string;
	sequence: number;
	inning: number;
	is_top_inning: number;
	play_index: number;
	batter_id: string;
	pitcher_id: string;
	kind: string;
	notation: string;
	description: string;
	outs_before: number;
	outs_after: number;
	runs_scored: number;
	rbi: number;
	earned_runs: number;
	unearned_runs: number;
	runner_1b_before: string | null;
	runner_2b_before: string | null;
	runner_3b_before: string | null;
	runner_1b_after: string | null;
	runner_2b_after: string | null;
	runner_3b_after: string | null;
	win_probability_before: number;
	win_probability_after: number;
	win_probability_swing: number;
	is_key_play: number;
	rule_id: string;
	confidence: number;
}

export interface InningLineRow {
	side: string;
	team_id: string;
	inning: number;
	runs: number | null;
	hits: number;
	errors: number;
	left_on_base: number;
}

export interface PitchingLineRow {
	pitcher_id: string;
	side: string;
	batters_faced: number;
	outs_recorded: number;
	innings_pitched: string;
	pitches: number;
	hits: number;
	walks: number;
	strikeouts: number;
	home_runs: number;
	runs: number;
	earned_runs: number;
}

export interface UnrecognizedPlayRow {
	game_id: string;
	inning: number;
	is_top_inning: number;
	play_index: number;
	description: string;
	message: string;
}
