/**
 * Extra-inning runner placed on second base
 */

import type { BaseState, Half, PitcherId, PlayerId, Runner } from '../types.js';
import { createRunner, isBasesEmpty, withRunner } from './state.js';

/**
 * A half-inning starts with a runner on second once the game is past
 * regulation and nobody is on base yet
 */
export function needsGhostRunner(
	inning: number,
	regulationInnings: number,
	state: BaseState,
	enabled = true
): boolean {
	return enabled && inning > regulationInnings && isBasesEmpty(state);
}

export function placeGhostRunner(
	state: BaseState,
	runnerId: PlayerId,
	pitcherId: PitcherId
): { state: BaseState; runner: Runner } {
	const runner = createRunner(runnerId, pitcherId, 'second', { isGhost: true });
	return { state: withRunner(state, runner), runner };
}

/** Used when the batting team's previous half-inning is unknown */
export function fallbackGhostRunnerId(inning: number, half: Half): PlayerId {
	return `ghost-${inning}${half === 'top' ? 't' : 'b'}`;
}
