/**
 * Reached on error advancement defaults
 *
 * Rules:
 * - Batter reaches 1B on the error (no out)
 * - Runners move up one base like a single
 * - Runners who were not forced are credited to the error
 */

import type { BaseState } from '../../types.js';
import { isForced } from '../../state-machine/state.js';
import type { DefaultAdvancement, RunnerTargets } from './types.js';
import { batterTo } from './types.js';

export function handleReachedOnError(bases: BaseState): DefaultAdvancement {
	const targets: RunnerTargets = {};
	if (bases.third) targets.third = { to: 'home', onError: !isForced(bases, 'third') };
	if (bases.second) targets.second = { to: 'third', onError: !isForced(bases, 'second') };
	if (bases.first) targets.first = { to: 'second', onError: false };
	return { targets, batter: batterTo('first', true) };
}
