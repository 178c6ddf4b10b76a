/**
 * Fly out advancement defaults
 *
 * Rules:
 * - 2 outs before: no advancement (the catch ends the inning)
 * - Line drives and pop ups: runners hold
 * - Fly balls with 0-1 outs: runner on 3B tags and scores, runner on 2B
 *   tags to 3B if it is empty, runner on 1B holds
 */

import type { BattedBallTrajectory } from '../../types.js';
import type { AdvancementContext, DefaultAdvancement, RunnerTargets } from './types.js';
import { BATTER_OUT } from './types.js';

export function handleFlyOut(
	context: AdvancementContext,
	trajectory: Exclude<BattedBallTrajectory, 'ground'>
): DefaultAdvancement {
	const { bases, outsBefore } = context;
	const targets: RunnerTargets = {};

	if (outsBefore >= 2 || trajectory !== 'fly') {
		return { targets, batter: BATTER_OUT };
	}

	if (bases.third) targets.third = { to: 'home', onError: false };
	if (bases.second) targets.second = { to: 'third', onError: false };

	return { targets, batter: BATTER_OUT };
}
