/**
 * Base occupancy values and helpers
 *
 * A BaseState is immutable: every helper returns a new value.
 */

import type { Base, BaseState, BaseTarget, PitcherId, PlayerId, Runner } from '../types.js';

/**
 * Movement of one runner (or the batter) during a play
 */
export interface BaserunningEvent {
	runnerId: PlayerId;
	from: 'batter' | Base;
	to: BaseTarget | 'out';
}

export const BASES: readonly Base[] = ['first', 'second', 'third'];

/** Lead runner first */
export const BASES_LEAD_FIRST: readonly Base[] = ['third', 'second', 'first'];

export const EMPTY_BASES: BaseState = { first: null, second: null, third: null };

const BASE_NUMBER: Record<BaseTarget, number> = { first: 1, second: 2, third: 3, home: 4 };

export function baseNumber(base: BaseTarget): number {
	return BASE_NUMBER[base];
}

export function baseFromNumber(n: number): BaseTarget {
	if (n <= 1) return 'first';
	if (n === 2) return 'second';
	if (n === 3) return 'third';
	return 'home';
}

export function createRunner(
	playerId: PlayerId,
	responsiblePitcherId: PitcherId,
	base: Base,
	flags: { isGhost?: boolean; reachedOnError?: boolean } = {}
): Runner {
	return {
		playerId,
		responsiblePitcherId,
		base,
		isGhost: flags.isGhost ?? false,
		reachedOnError: flags.reachedOnError ?? false,
	};
}

/**
 * Build a state from runners; the runner's own `base` decides where it stands
 */
export function createBaseState(runners: readonly Runner[]): BaseState {
	let state = EMPTY_BASES;
	for (const runner of runners) {
		if (state[runner.base]) {
			throw new Error(`Two runners on ${runner.base}: ${state[runner.base]?.playerId} and ${runner.playerId}`);
		}
		state = withRunner(state, runner);
	}
	return state;
}

export function withRunner(state: BaseState, runner: Runner): BaseState {
	return { ...state, [runner.base]: runner };
}

export function isBasesEmpty(state: BaseState): boolean {
	return countRunners(state) === 0;
}

export function countRunners(state: BaseState): number {
	return BASES.filter((base) => state[base] !== null).length;
}

/**
 * Runners on base, lead runner first
 */
export function runnersLeadFirst(state: BaseState): Runner[] {
	const runners: Runner[] = [];
	for (const base of BASES_LEAD_FIRST) {
		const runner = state[base];
		if (runner) runners.push(runner);
	}
	return runners;
}

/**
 * Whether the runner on `base` must advance when the batter takes first
 */
export function isForced(state: BaseState, base: Base): boolean {
	if (!state[base]) return false;
	if (base === 'first') return true;
	if (base === 'second') return state.first !== null;
	return state.first !== null && state.second !== null;
}
