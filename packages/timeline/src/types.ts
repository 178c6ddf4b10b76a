/**
 * Types for the game timeline pipeline
 */

import type { GameMetadata } from './input/schema.js';

export type { GameMetadata } from './input/schema.js';

export type PlayerId = string;
export type PitcherId = string;

export type Half = 'top' | 'bottom';
export type TeamSide = 'away' | 'home';

export type Base = 'first' | 'second' | 'third';
export type BaseTarget = Base | 'home';

/**
 * Pitch-by-pitch tags as delivered by the play feed.
 */
export type PitchTag = 'ball' | 'strike' | 'foul' | 'inPlay';

/**
 * Defensive positions by scorecard number (1=P, 2=C, 3=1B ... 9=RF)
 */
export type FielderPosition = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

/**
 * One row of the play feed. Immutable input.
 */
export interface RawPlay {
	readonly inning: number;
	readonly half: Half;
	readonly batterId: PlayerId;
	readonly pitcherId: PitcherId;
	readonly description: string;
	readonly pitches: readonly PitchTag[];
	readonly runsScored: number;
	readonly outsRecorded: number;
	/** Home team win probability before the play, 0-1 */
	readonly winProbabilityBefore: number;
	/** Home team win probability after the play, 0-1 */
	readonly winProbabilityAfter: number;
}

export interface GameInput {
	readonly metadata: GameMetadata;
	readonly plays: readonly RawPlay[];
}

/**
 * Canonical play outcomes.
 */
export type PlayKind =
	// Strikeout / awarded bases
	| 'strikeout'
	| 'walk'
	| 'hitByPitch'
	| 'catcherInterference'
	// Hits
	| 'single'
	| 'double'
	| 'triple'
	| 'homeRun'
	// Ball-in-play outs
	| 'groundOut'
	| 'flyOut'
	| 'fieldersChoice'
	| 'doublePlay'
	| 'triplePlay'
	// Sacrifices
	| 'sacrificeFly'
	| 'sacrificeBunt'
	// Errors
	| 'reachedOnError'
	// Runner events between pitches
	| 'stolenBase'
	| 'caughtStealing'
	| 'wildPitch'
	| 'passedBall'
	| 'balk'
	// Fallback for unrecognized descriptions
	| 'genericOut';

export type BattedBallTrajectory = 'ground' | 'fly' | 'line' | 'pop';

type DetailedKind = 'strikeout' | 'walk' | 'flyOut' | 'doublePlay' | 'triplePlay' | 'reachedOnError';

/**
 * Variant-specific part of a play event, produced by a classification rule.
 */
export type PlayTemplate =
	| { readonly kind: 'strikeout'; readonly looking: boolean }
	| { readonly kind: 'walk'; readonly intentional: boolean }
	| { readonly kind: 'flyOut'; readonly trajectory: Exclude<BattedBallTrajectory, 'ground'> }
	| { readonly kind: 'doublePlay'; readonly trajectory: BattedBallTrajectory }
	| { readonly kind: 'triplePlay'; readonly trajectory: BattedBallTrajectory }
	| { readonly kind: 'reachedOnError'; readonly errorFielder: FielderPosition | null }
	| { readonly kind: Exclude<PlayKind, DetailedKind> };

/**
 * Where an existing runner ends up after a play.
 */
export interface RunnerMovement {
	readonly runnerId: PlayerId;
	readonly from: Base;
	readonly to: BaseTarget | 'out';
	/** Advanced (or scored) because of an error or passed ball */
	readonly onError: boolean;
	/** Stated in the description rather than inferred */
	readonly explicit: boolean;
}

export interface BatterOutcome {
	/** Base the batter reached, 'home' on a home run, null when retired or not involved */
	readonly reached: BaseTarget | null;
	readonly retired: boolean;
	/** Reached because of an error or catcher's interference */
	readonly onError: boolean;
}

export interface PlayEventFields {
	readonly batterId: PlayerId;
	/** Fielders in the order they handled the ball */
	readonly fielders: readonly FielderPosition[];
	readonly movements: readonly RunnerMovement[];
	readonly batter: BatterOutcome;
	readonly outs: number;
	readonly rbi: number;
	/** Errors charged to the defense on this play */
	readonly errors: number;
	/** Outs that would have been recorded without an error */
	readonly errorPreventedOuts: number;
	/** True when no error was involved in the outs of this play */
	readonly cleanOuts: boolean;
	/** Scorecard shorthand (K, BB, GO6-3, F8, E6 ...) */
	readonly notation: string;
	readonly ruleId: string;
	readonly confidence: number;
}

export type PlayEvent = PlayTemplate & PlayEventFields;

export interface Runner {
	readonly playerId: PlayerId;
	/** Pitcher on the mound when this runner reached; never reassigned */
	readonly responsiblePitcherId: PitcherId;
	readonly base: Base;
	readonly isGhost: boolean;
	readonly reachedOnError: boolean;
}

export interface BaseState {
	readonly first: Runner | null;
	readonly second: Runner | null;
	readonly third: Runner | null;
}

export interface ScoredRun {
	readonly runner: Runner;
	/** Scored because of an error or passed ball */
	readonly onError: boolean;
}

export type AnomalyCode =
	| 'UnrecognizedPlayPattern'
	| 'IllegalAdvancement'
	| 'InconsistentOutCount'
	| 'ReportedTotalsMismatch'
	| 'ContestedEarnedRun';

export interface Anomaly {
	readonly code: AnomalyCode;
	readonly message: string;
	readonly inning: number;
	readonly half: Half;
	/** Index of the play within its half-inning, null for half-inning level anomalies */
	readonly playIndex: number | null;
	readonly description: string | null;
	readonly recovery: string;
}

export interface PlateAppearanceRecord {
	readonly index: number;
	readonly inning: number;
	readonly half: Half;
	readonly batterId: PlayerId;
	readonly pitcherId: PitcherId;
	readonly pitches: readonly PitchTag[];
	readonly description: string;
	readonly event: PlayEvent;
	readonly basesBefore: BaseState;
	readonly basesAfter: BaseState;
	readonly outsBefore: number;
	readonly outsAfter: number;
	readonly runsScored: number;
	readonly scorers: readonly ScoredRun[];
	readonly winProbabilityBefore: number;
	readonly winProbabilityAfter: number;
	readonly winProbabilitySwing: number;
	readonly isKeyPlay: boolean;
	readonly anomalies: readonly AnomalyCode[];
}

export type UnearnedReason =
	| 'afterThirdOut'
	| 'errorPreventedThirdOut'
	| 'reachedOnError'
	| 'advancedOnError'
	| 'ghostRunner';

export interface RunAttribution {
	readonly runnerId: PlayerId;
	readonly playIndex: number;
	readonly chargedPitcherId: PitcherId;
	/** Earned for the team, replaying every error of the half-inning as an out */
	readonly earned: boolean;
	/** Earned against the charged pitcher, counting only outs missed since they entered */
	readonly earnedForPitcher: boolean;
	readonly isGhost: boolean;
	readonly unearnedReason: UnearnedReason | null;
}

export interface PitcherResponsibility {
	readonly pitcherId: PitcherId;
	/** Runners who reached base while this pitcher was responsible */
	readonly runners: readonly PlayerId[];
	readonly battersFaced: number;
	readonly outsRecorded: number;
	readonly runsCharged: number;
	readonly earnedRunsCharged: number;
}

export interface HalfInning {
	readonly inning: number;
	readonly half: Half;
	readonly battingSide: TeamSide;
	readonly fieldingSide: TeamSide;
	readonly plays: readonly PlateAppearanceRecord[];
	readonly outs: number;
	readonly runs: number;
	readonly earnedRuns: number;
	readonly unearnedRuns: number;
	readonly hits: number;
	/** Errors committed by the fielding side */
	readonly errors: number;
	readonly leftOnBase: number;
	readonly ghostRunner: Runner | null;
	readonly runAttributions: readonly RunAttribution[];
	readonly pitchers: readonly PitcherResponsibility[];
}

export interface Inning {
	readonly number: number;
	readonly top: HalfInning;
	/** Null when the home team did not need to bat */
	readonly bottom: HalfInning | null;
}

export interface LineScoreRow {
	readonly side: TeamSide;
	readonly teamId: string;
	/** Runs per inning; null for an unplayed bottom half */
	readonly runsByInning: readonly (number | null)[];
	readonly cumulativeRuns: readonly number[];
	readonly runs: number;
	readonly hits: number;
	readonly errors: number;
	readonly leftOnBase: number;
}

export interface PitchingLine {
	readonly pitcherId: PitcherId;
	readonly side: TeamSide;
	readonly battersFaced: number;
	readonly outsRecorded: number;
	/** Baseball notation, e.g. "5.2" */
	readonly inningsPitched: string;
	readonly pitches: number;
	readonly hits: number;
	readonly walks: number;
	readonly strikeouts: number;
	readonly homeRuns: number;
	readonly runs: number;
	readonly earnedRuns: number;
}

export interface BattingLine {
	readonly batterId: PlayerId;
	readonly side: TeamSide;
	readonly plateAppearances: number;
	readonly atBats: number;
	readonly runs: number;
	readonly hits: number;
	readonly doubles: number;
	readonly triples: number;
	readonly homeRuns: number;
	readonly rbi: number;
	readonly walks: number;
	readonly strikeouts: number;
}

export interface KeyPlayRef {
	readonly inning: number;
	readonly half: Half;
	readonly playIndex: number;
	readonly batterId: PlayerId;
	readonly notation: string;
	readonly winProbabilitySwing: number;
}

export interface Game {
	readonly gameId: string;
	readonly metadata: GameMetadata;
	readonly regulationInnings: number;
	readonly keyPlayThreshold: number;
	readonly innings: readonly Inning[];
	readonly halfInnings: readonly HalfInning[];
	readonly linescore: Readonly<Record<TeamSide, LineScoreRow>>;
	readonly finalScore: Readonly<Record<TeamSide, number>>;
	readonly winner: TeamSide | null;
	readonly pitching: readonly PitchingLine[];
	readonly batting: readonly BattingLine[];
	readonly keyPlays: readonly KeyPlayRef[];
	readonly anomalies: readonly Anomaly[];
}
