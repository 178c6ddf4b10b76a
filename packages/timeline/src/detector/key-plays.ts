/**
 * Key-play detection from win-probability swings
 */

import type { PlayEvent } from '../types.js';

const TOLERANCE = 1e-9;

/**
 * Signed change in home-team win probability
 */
export function winProbabilitySwing(wpBefore: number, wpAfter: number): number {
	return wpAfter - wpBefore;
}

/**
 * A play is key when the win probability moved by at least `threshold` in
 * either direction. Every play kind uses the same threshold.
 */
export function isKeyPlay(_event: PlayEvent, wpBefore: number, wpAfter: number, threshold: number): boolean {
	if (!Number.isFinite(wpBefore) || !Number.isFinite(wpAfter)) return false;
	return Math.abs(winProbabilitySwing(wpBefore, wpAfter)) + TOLERANCE >= threshold;
}
