/**
 * Advancement defaults for plays between pitches
 *
 * Rules:
 * - Stolen base: the lead runner with an open base ahead takes it
 *   (runner on 3B steals home only when nobody else can move)
 * - Caught stealing: that same runner is out
 * - Wild pitch, passed ball, balk: every runner moves up one base;
 *   passed ball advances are charged to the catcher's error
 */

import type { Base, BaseState } from '../../types.js';
import { BASES_LEAD_FIRST, baseFromNumber, baseNumber } from '../../state-machine/state.js';
import type { DefaultAdvancement, RunnerTargets } from './types.js';
import { BATTER_NOT_INVOLVED, advanceAll } from './types.js';

/**
 * Runner most likely to be running on a steal attempt
 */
export function stealingRunner(bases: BaseState): Base | null {
	for (const base of BASES_LEAD_FIRST) {
		if (!bases[base] || base === 'third') continue;
		const ahead = baseFromNumber(baseNumber(base) + 1);
		if (ahead !== 'home' && !bases[ahead]) return base;
	}
	return bases.third ? 'third' : null;
}

export function handleRunnerEvent(
	bases: BaseState,
	kind: 'stolenBase' | 'caughtStealing' | 'wildPitch' | 'passedBall' | 'balk'
): DefaultAdvancement {
	const targets: RunnerTargets = {};

	switch (kind) {
		case 'stolenBase': {
			const runner = stealingRunner(bases);
			if (runner) targets[runner] = { to: baseFromNumber(baseNumber(runner) + 1), onError: false };
			break;
		}
		case 'caughtStealing': {
			const runner = stealingRunner(bases);
			if (runner) targets[runner] = { to: 'out', onError: false };
			break;
		}
		case 'wildPitch':
		case 'balk':
			return { targets: advanceAll(bases, 1), batter: BATTER_NOT_INVOLVED };
		case 'passedBall':
			return { targets: advanceAll(bases, 1, true), batter: BATTER_NOT_INVOLVED };
	}

	return { targets, batter: BATTER_NOT_INVOLVED };
}
