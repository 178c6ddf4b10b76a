/**
 * Walk / hit by pitch / catcher's interference advancement defaults
 *
 * Rules:
 * - Force advancement only: a runner moves up one base when every base behind them is filled
 * - Batter takes 1B (on interference the batter reaches on the catcher's error)
 * - Bases loaded: runner from 3B scores
 */

import type { BaseState } from '../../types.js';
import { isForced } from '../../state-machine/state.js';
import type { DefaultAdvancement, RunnerTargets } from './types.js';
import { batterTo } from './types.js';

export function forcedTargets(bases: BaseState): RunnerTargets {
	const targets: RunnerTargets = {};
	if (isForced(bases, 'third')) targets.third = { to: 'home', onError: false };
	if (isForced(bases, 'second')) targets.second = { to: 'third', onError: false };
	if (isForced(bases, 'first')) targets.first = { to: 'second', onError: false };
	return targets;
}

export function handleAwardedBase(
	bases: BaseState,
	kind: 'walk' | 'hitByPitch' | 'catcherInterference'
): DefaultAdvancement {
	return {
		targets: forcedTargets(bases),
		batter: batterTo('first', kind === 'catcherInterference'),
	};
}
