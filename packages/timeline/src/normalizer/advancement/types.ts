/**
 * Shared shapes for default runner advancement
 */

import type { Base, BaseState, BaseTarget, BatterOutcome } from '../../types.js';
import { BASES_LEAD_FIRST, baseFromNumber, baseNumber } from '../../state-machine/state.js';

export interface RunnerTarget {
	to: BaseTarget | 'out';
	onError: boolean;
}

/** Where each occupied base's runner goes; a missing entry holds */
export type RunnerTargets = Partial<Record<Base, RunnerTarget>>;

export interface AdvancementContext {
	readonly outsBefore: number;
	readonly bases: BaseState;
	/** Bases whose runner the description puts out by name */
	readonly explicitOuts: ReadonlySet<Base>;
	/** The description says the batter reached safely */
	readonly batterSafe: boolean;
}

export interface DefaultAdvancement {
	targets: RunnerTargets;
	batter: BatterOutcome;
}

export const BATTER_OUT: BatterOutcome = { reached: null, retired: true, onError: false };
export const BATTER_NOT_INVOLVED: BatterOutcome = { reached: null, retired: false, onError: false };

export function batterTo(base: BaseTarget, onError = false): BatterOutcome {
	return { reached: base, retired: false, onError };
}

export function holdAll(bases: BaseState): RunnerTargets {
	const targets: RunnerTargets = {};
	for (const base of BASES_LEAD_FIRST) {
		if (bases[base]) targets[base] = { to: base, onError: false };
	}
	return targets;
}

/**
 * Every runner moves up `count` bases
 */
export function advanceAll(bases: BaseState, count: number, onError = false): RunnerTargets {
	const targets: RunnerTargets = {};
	for (const base of BASES_LEAD_FIRST) {
		if (bases[base]) targets[base] = { to: baseFromNumber(baseNumber(base) + count), onError };
	}
	return targets;
}
