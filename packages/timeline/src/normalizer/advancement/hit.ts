/**
 * Hit advancement defaults (single, double, triple, home run)
 *
 * Rules:
 * - Single: every runner takes one extra base (1B to 3B, 2B and 3B score), batter to 1B
 * - Double: all runners score, batter to 2B
 * - Triple: all runners score, batter to 3B
 * - Home Run: all runners and the batter score
 */

import type { BaseState } from '../../types.js';
import type { DefaultAdvancement } from './types.js';
import { advanceAll, batterTo } from './types.js';

export function handleHit(
	bases: BaseState,
	kind: 'single' | 'double' | 'triple' | 'homeRun'
): DefaultAdvancement {
	switch (kind) {
		case 'single':
			return { targets: advanceAll(bases, 2), batter: batterTo('first') };
		case 'double':
			return { targets: advanceAll(bases, 3), batter: batterTo('second') };
		case 'triple':
			return { targets: advanceAll(bases, 3), batter: batterTo('third') };
		case 'homeRun':
			return { targets: advanceAll(bases, 3), batter: batterTo('home') };
	}
}
