/**
 * Error taxonomy for the timeline pipeline
 *
 * Per-play problems (unrecognized text, illegal advancement, too many outs)
 * are recovered locally and surface as anomalies on the assembled game.
 * Only structural problems with a whole game are thrown.
 */

import type { Base, BaseTarget, Half } from './types.js';

export type ScorebookErrorCode =
	| 'UnrecognizedPlayPattern'
	| 'IllegalAdvancement'
	| 'InconsistentOutCount'
	| 'IncompleteGameData'
	| 'GameInput';

export class ScorebookError extends Error {
	readonly code: ScorebookErrorCode;

	constructor(code: ScorebookErrorCode, message: string) {
		super(message);
		this.name = new.target.name;
		this.code = code;
	}
}

export class UnrecognizedPlayPatternError extends ScorebookError {
	readonly description: string;
	/** Best rule that matched below the confidence threshold, if any */
	readonly bestCandidate: { ruleId: string; confidence: number } | null;

	constructor(description: string, bestCandidate: { ruleId: string; confidence: number } | null = null) {
		const hint = bestCandidate
			? ` (closest rule ${bestCandidate.ruleId} at confidence ${bestCandidate.confidence})`
			: '';
		super('UnrecognizedPlayPattern', `Unrecognized play -> "${description}"${hint}`);
		this.description = description;
		this.bestCandidate = bestCandidate;
	}
}

export type IllegalAdvancementKind = 'backward' | 'occupied' | 'emptyBase';

export class IllegalAdvancementError extends ScorebookError {
	readonly kind: IllegalAdvancementKind;
	readonly from: Base | 'batter';
	readonly to: BaseTarget;

	constructor(kind: IllegalAdvancementKind, from: Base | 'batter', to: BaseTarget, detail: string) {
		super('IllegalAdvancement', `Illegal advancement (${kind}) from ${from} to ${to}: ${detail}`);
		this.kind = kind;
		this.from = from;
		this.to = to;
	}
}

export class InconsistentOutCountError extends ScorebookError {
	readonly outsBefore: number;
	readonly outsRequested: number;

	constructor(outsBefore: number, outsRequested: number) {
		super(
			'InconsistentOutCount',
			`Play records ${outsRequested} out(s) with ${outsBefore} already recorded; capped at 3`
		);
		this.outsBefore = outsBefore;
		this.outsRequested = outsRequested;
	}
}

export class IncompleteGameDataError extends ScorebookError {
	readonly gameId: string;
	readonly inning: number | null;
	readonly half: Half | null;

	constructor(gameId: string, reason: string, inning: number | null = null, half: Half | null = null) {
		const where = inning !== null && half !== null ? ` (${half} ${inning})` : '';
		super('IncompleteGameData', `Game ${gameId}: ${reason}${where}`);
		this.gameId = gameId;
		this.inning = inning;
		this.half = half;
	}
}

export class GameInputError extends ScorebookError {
	readonly issues: readonly string[];

	constructor(issues: readonly string[]) {
		super('GameInput', `Invalid game input: ${issues.join('; ')}`);
		this.issues = issues;
	}
}
