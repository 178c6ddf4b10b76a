/**
 * Fielder extraction from play text
 */

import type { FielderPosition } from '../types.js';

const POSITION_WORDS: ReadonlyArray<readonly [RegExp, FielderPosition]> = [
	[/\bpitcher\b/y, 1],
	[/\bcatcher\b(?!'?s? interference)/y, 2],
	[/\bfirst baseman\b/y, 3],
	[/\bsecond baseman\b/y, 4],
	[/\bthird baseman\b/y, 5],
	[/\bshortstop\b/y, 6],
	[/\bleft fielder\b/y, 7],
	[/\bcenter fielder\b/y, 8],
	[/\bright fielder\b/y, 9],
];

export const POSITION_ABBREVIATIONS: Record<FielderPosition, string> = {
	1: 'P',
	2: 'C',
	3: '1B',
	4: '2B',
	5: '3B',
	6: 'SS',
	7: 'LF',
	8: 'CF',
	9: 'RF',
};

export function isFielderPosition(n: number): n is FielderPosition {
	return Number.isInteger(n) && n >= 1 && n <= 9;
}

/**
 * Positions named in the text, in the order they appear
 */
export function extractFielders(text: string): FielderPosition[] {
	const lower = text.toLowerCase();
	const fielders: FielderPosition[] = [];
	for (let i = 0; i < lower.length; i++) {
		if (i > 0 && /\w/.test(lower[i - 1])) continue;
		for (const [pattern, position] of POSITION_WORDS) {
			pattern.lastIndex = i;
			if (pattern.test(lower)) {
				fielders.push(position);
				break;
			}
		}
	}
	return fielders;
}

/**
 * Positions from scorecard digits: "6-4-3" -> [6, 4, 3], "3U" -> [3]
 */
export function fieldersFromDigits(digits: string): FielderPosition[] {
	const fielders: FielderPosition[] = [];
	for (const char of digits) {
		const n = Number(char);
		if (isFielderPosition(n)) fielders.push(n);
	}
	return fielders;
}

/**
 * Fielder charged with the error in "error by shortstop Smith"
 */
export function extractErrorFielder(text: string): FielderPosition | null {
	const match = /\berror by ([a-z ]+)/i.exec(text);
	if (!match) return null;
	const [first] = extractFielders(match[1]);
	return first ?? null;
}

export function countErrors(text: string): number {
	return (text.match(/\berrors?\b/gi) ?? []).length;
}
