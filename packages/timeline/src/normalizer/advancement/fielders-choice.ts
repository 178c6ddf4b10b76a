/**
 * Fielder's choice advancement defaults
 *
 * Rules:
 * - Batter reaches 1B
 * - Lead forced runner is retired, unless the description names who was put out
 * - No runner forced: the lead runner is retired
 * - Other runners advance only when forced
 * - Bases empty: batter reaches with no out
 */

import type { AdvancementContext, DefaultAdvancement, RunnerTargets } from './types.js';
import { batterTo } from './types.js';
import { forcedTargets } from './walk.js';
import { isForced, runnersLeadFirst } from '../../state-machine/state.js';

export function handleFieldersChoice(context: AdvancementContext): DefaultAdvancement {
	const { bases, explicitOuts } = context;
	const targets: RunnerTargets = forcedTargets(bases);

	const runners = runnersLeadFirst(bases);
	const retired = runners.find((runner) => isForced(bases, runner.base)) ?? runners[0];
	if (retired && explicitOuts.size === 0) {
		targets[retired.base] = { to: 'out', onError: false };
	}

	return { targets, batter: batterTo('first') };
}
