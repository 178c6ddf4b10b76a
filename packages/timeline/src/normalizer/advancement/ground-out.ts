/**
 * Ground out advancement defaults
 *
 * Rules:
 * - 2 outs before: no advancement (the out ends the inning)
 * - 0 outs before: runner on 3B holds
 * - 1 out before: runner on 3B scores
 * - Runner on 2B advances to 3B if 3B is empty
 * - Runner on 1B advances to 2B if 2B is empty
 */

import type { AdvancementContext, DefaultAdvancement, RunnerTargets } from './types.js';
import { BATTER_OUT } from './types.js';

export function handleGroundOut(context: AdvancementContext): DefaultAdvancement {
	const { bases, outsBefore } = context;
	const targets: RunnerTargets = {};

	if (outsBefore >= 2) {
		return { targets, batter: BATTER_OUT };
	}

	let thirdFree = !bases.third;
	if (bases.third && outsBefore === 1) {
		targets.third = { to: 'home', onError: false };
		thirdFree = true;
	}

	let secondFree = !bases.second;
	if (bases.second && thirdFree) {
		targets.second = { to: 'third', onError: false };
		secondFree = true;
	}

	if (bases.first && secondFree) {
		targets.first = { to: 'second', onError: false };
	}

	return { targets, batter: BATTER_OUT };
}
