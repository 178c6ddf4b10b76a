/**
 * Double and triple play advancement defaults
 *
 * Outs are filled in this order until the play has its two (or three):
 * - runners the description puts out by name
 * - the batter, unless described as safe
 * - on the ground, the trailing runners (force at second first);
 *   in the air, the lead runners (doubled off)
 * Runners not put out hold.
 */

import type { Base, BattedBallTrajectory, BatterOutcome } from '../../types.js';
import type { AdvancementContext, DefaultAdvancement, RunnerTargets } from './types.js';
import { BATTER_OUT, batterTo } from './types.js';

const GROUND_ORDER: readonly Base[] = ['first', 'second', 'third'];
const AIR_ORDER: readonly Base[] = ['third', 'second', 'first'];

export function handleMultipleOutPlay(
	context: AdvancementContext,
	outsOnPlay: 2 | 3,
	trajectory: BattedBallTrajectory
): DefaultAdvancement {
	const { bases, explicitOuts, batterSafe } = context;
	const targets: RunnerTargets = {};
	let outs = explicitOuts.size;

	let batter: BatterOutcome;
	if (batterSafe || outs >= outsOnPlay) {
		batter = batterTo('first');
	} else {
		batter = BATTER_OUT;
		outs++;
	}

	const order = trajectory === 'ground' ? GROUND_ORDER : AIR_ORDER;
	for (const base of order) {
		if (outs >= outsOnPlay) break;
		if (!bases[base] || explicitOuts.has(base)) continue;
		targets[base] = { to: 'out', onError: false };
		outs++;
	}

	return { targets, batter };
}
