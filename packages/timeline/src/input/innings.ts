/**
 * Inning labels as they appear in play feeds: "Top of the 3rd", "bot 9", "t3", "b10"
 */

import type { Half } from '../types.js';

const INNING_LABEL = /^(top|bottom|bot|t|b)\s*(?:of\s+(?:the\s+)?)?(\d+)(?:st|nd|rd|th)?$/i;

export function parseInningLabel(label: string): { inning: number; half: Half } | null {
	const match = INNING_LABEL.exec(label.trim().replace(/\s+/g, ' '));
	if (!match) return null;

	const inning = Number(match[2]);
	if (!Number.isInteger(inning) || inning < 1) return null;

	const half: Half = match[1].toLowerCase().startsWith('t') ? 'top' : 'bottom';
	return { inning, half };
}

/**
 * Short label used in logs and anomaly messages ("t3", "b10")
 */
export function formatInningLabel(inning: number, half: Half): string {
	return `${half === 'top' ? 't' : 'b'}${inning}`;
}

