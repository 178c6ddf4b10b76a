/**
 * Play kind classification helpers
 */

import type { PlayKind } from '../types.js';

export const PLAY_KINDS = [
	'strikeout',
	'walk',
	'hitByPitch',
	'catcherInterference',
	'single',
	'double',
	'triple',
	'homeRun',
	'groundOut',
	'flyOut',
	'fieldersChoice',
	'doublePlay',
	'triplePlay',
	'sacrificeFly',
	'sacrificeBunt',
	'reachedOnError',
	'stolenBase',
	'caughtStealing',
	'wildPitch',
	'passedBall',
	'balk',
	'genericOut',
] as const satisfies readonly PlayKind[];

export function isPlayKind(value: string): value is PlayKind {
	return PLAY_KINDS.some((kind) => kind === value);
}

export const HIT_KINDS: readonly PlayKind[] = ['single', 'double', 'triple', 'homeRun'];
export const AWARDED_BASE_KINDS: readonly PlayKind[] = ['walk', 'hitByPitch', 'catcherInterference'];
export const SACRIFICE_KINDS: readonly PlayKind[] = ['sacrificeFly', 'sacrificeBunt'];
export const RUNNER_EVENT_KINDS: readonly PlayKind[] = [
	'stolenBase',
	'caughtStealing',
	'wildPitch',
	'passedBall',
	'balk',
];

/**
 * Kinds whose runs are wiped out when the play makes the third out
 * (the batter never reached first, or a force/caught fly ended the inning)
 */
export const NO_RUN_THIRD_OUT_KINDS: readonly PlayKind[] = [
	'strikeout',
	'groundOut',
	'flyOut',
	'sacrificeFly',
	'sacrificeBunt',
	'fieldersChoice',
	'doublePlay',
	'triplePlay',
	'genericOut',
];

/** Kinds that never credit the batter with an RBI */
export const NO_RBI_KINDS: readonly PlayKind[] = [
	'strikeout',
	'doublePlay',
	'triplePlay',
	'genericOut',
	...RUNNER_EVENT_KINDS,
];

export function isHit(kind: PlayKind): boolean {
	return HIT_KINDS.includes(kind);
}

export function isAwardedBase(kind: PlayKind): boolean {
	return AWARDED_BASE_KINDS.includes(kind);
}

export function isSacrifice(kind: PlayKind): boolean {
	return SACRIFICE_KINDS.includes(kind);
}

export function isRunnerEvent(kind: PlayKind): boolean {
	return RUNNER_EVENT_KINDS.includes(kind);
}

/** Stolen bases, wild pitches and the like happen during a plate appearance, not as one */
export function isPlateAppearance(kind: PlayKind): boolean {
	return !isRunnerEvent(kind);
}

/** Plate appearances that do not count as an at-bat */
export function isAtBat(kind: PlayKind): boolean {
	return isPlateAppearance(kind) && !isAwardedBase(kind) && !isSacrifice(kind);
}

export function negatesRunsOnThirdOut(kind: PlayKind): boolean {
	return NO_RUN_THIRD_OUT_KINDS.includes(kind);
}

export function creditsRbi(kind: PlayKind): boolean {
	return !NO_RBI_KINDS.includes(kind);
}
