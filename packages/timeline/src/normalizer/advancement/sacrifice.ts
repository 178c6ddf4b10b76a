/**
 * Sacrifice advancement defaults
 *
 * Rules:
 * - Sacrifice fly: batter out, runner on 3B tags and scores, others hold
 * - Sacrifice bunt: batter out, every runner moves up one base
 */

import type { BaseState } from '../../types.js';
import type { DefaultAdvancement, RunnerTargets } from './types.js';
import { BATTER_OUT, advanceAll } from './types.js';

export function handleSacrificeFly(bases: BaseState): DefaultAdvancement {
	const targets: RunnerTargets = {};
	if (bases.third) targets.third = { to: 'home', onError: false };
	return { targets, batter: BATTER_OUT };
}

export function handleSacrificeBunt(bases: BaseState): DefaultAdvancement {
	return { targets: advanceAll(bases, 1), batter: BATTER_OUT };
}
