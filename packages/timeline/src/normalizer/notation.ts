/**
 * Scorecard shorthand for a resolved play
 */

import type { FielderPosition, PlayTemplate } from '../types.js';

function chain(fielders: readonly FielderPosition[]): string {
	return fielders.join('-');
}

export function scorecardNotation(template: PlayTemplate, fielders: readonly FielderPosition[]): string {
	const first = fielders.length > 0 ? String(fielders[0]) : '';
	const last = fielders.length > 0 ? String(fielders[fielders.length - 1]) : '';

	switch (template.kind) {
		case 'strikeout':
			return template.looking ? 'Ʞ' : 'K';
		case 'walk':
			return template.intentional ? 'IBB' : 'BB';
		case 'hitByPitch':
			return 'HBP';
		case 'catcherInterference':
			return 'CI';
		case 'single':
			return '1B';
		case 'double':
			return '2B';
		case 'triple':
			return '3B';
		case 'homeRun':
			return 'HR';
		case 'groundOut':
			if (fielders.length === 1) return `GO${first}U`;
			return `GO${chain(fielders)}`;
		case 'flyOut': {
			const prefix = template.trajectory === 'line' ? 'L' : template.trajectory === 'pop' ? 'P' : 'F';
			return `${prefix}${last}`;
		}
		case 'sacrificeFly':
			return `SF${last}`;
		case 'sacrificeBunt':
			return `SAC${chain(fielders)}`;
		case 'fieldersChoice':
			return `FC${chain(fielders)}`;
		case 'doublePlay':
			return `DP${chain(fielders)}`;
		case 'triplePlay':
			return `TP${chain(fielders)}`;
		case 'reachedOnError':
			return `E${template.errorFielder ?? last}`;
		case 'stolenBase':
			return 'SB';
		case 'caughtStealing':
			return `CS${chain(fielders)}`;
		case 'wildPitch':
			return 'WP';
		case 'passedBall':
			return 'PB';
		case 'balk':
			return 'BK';
		case 'genericOut':
			return '-';
		default: {
			const _exhaustive: never = template;
			return _exhaustive;
		}
	}
}
