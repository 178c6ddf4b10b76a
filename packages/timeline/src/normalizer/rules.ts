/**
 * Classification rule table
 *
 * Rules are tried in order, most specific first. Each rule turns a matching
 * description into a play template; runner advancement is resolved later
 * against the base state.
 */

import type { BattedBallTrajectory, FielderPosition, PlayTemplate } from '../types.js';
import { extractErrorFielder, fieldersFromDigits, isFielderPosition } from './fielders.js';

export interface RuleMatch {
	readonly template: PlayTemplate;
	/** Fielders given by the rule itself (scorecard digits); null to read them from the text */
	readonly fielders: readonly FielderPosition[] | null;
}

export interface PlayRule {
	readonly id: string;
	readonly pattern: RegExp;
	readonly confidence: number;
	readonly build: (match: RegExpExecArray, text: string) => RuleMatch;
}

const SHORTHAND_CONFIDENCE = 0.7;

function plain(template: PlayTemplate): RuleMatch {
	return { template, fielders: null };
}

function withDigits(template: PlayTemplate, digits: string | undefined): RuleMatch {
	return { template, fielders: fieldersFromDigits(digits ?? '') };
}

/**
 * Trajectory from the verb: "lines into", "flied into", "pops into"
 */
export function trajectoryOf(text: string): BattedBallTrajectory {
	if (/\b(?:lines?|lined|line drive)\b/i.test(text)) return 'line';
	if (/\b(?:pops?|popped|pop up|bunt pops)\b/i.test(text)) return 'pop';
	if (/\b(?:flies|flied|fly ball|fly)\b/i.test(text)) return 'fly';
	return 'ground';
}

const DIGITS = '([1-9](?:-?[1-9])*)';

/**
 * Scorecard shorthand, the whole description being a single code
 */
export const SHORTHAND_RULES: readonly PlayRule[] = [
	{
		id: 'shorthand-strikeout',
		pattern: /^(K|Ʞ|KL|Kc)$/,
		confidence: SHORTHAND_CONFIDENCE,
		build: (m) => plain({ kind: 'strikeout', looking: m[1] !== 'K' }),
	},
	{
		id: 'shorthand-walk',
		pattern: /^(I?BB|IW)$/,
		confidence: SHORTHAND_CONFIDENCE,
		build: (m) => plain({ kind: 'walk', intentional: m[1] !== 'BB' }),
	},
	{
		id: 'shorthand-hit-by-pitch',
		pattern: /^HBP$/,
		confidence: SHORTHAND_CONFIDENCE,
		build: () => plain({ kind: 'hitByPitch' }),
	},
	{
		id: 'shorthand-interference',
		pattern: /^CI$/,
		confidence: SHORTHAND_CONFIDENCE,
		build: () => withDigits({ kind: 'catcherInterference' }, '2'),
	},
	{
		id: 'shorthand-hit',
		pattern: /^(1B|2B|3B|HR)$/,
		confidence: SHORTHAND_CONFIDENCE,
		build: (m) => {
			switch (m[1]) {
				case '1B':
					return plain({ kind: 'single' });
				case '2B':
					return plain({ kind: 'double' });
				case '3B':
					return plain({ kind: 'triple' });
				default:
					return plain({ kind: 'homeRun' });
			}
		},
	},
	{
		id: 'shorthand-ground-out',
		pattern: new RegExp(`^GO${DIGITS}U?$`),
		confidence: SHORTHAND_CONFIDENCE,
		build: (m) => withDigits({ kind: 'groundOut' }, m[1]),
	},
	{
		id: 'shorthand-air-out',
		pattern: /^([FLP])([1-9])$/,
		confidence: SHORTHAND_CONFIDENCE,
		build: (m) =>
			withDigits({ kind: 'flyOut', trajectory: m[1] === 'L' ? 'line' : m[1] === 'P' ? 'pop' : 'fly' }, m[2]),
	},
	{
		id: 'shorthand-sacrifice-fly',
		pattern: /^SF([1-9])$/,
		confidence: SHORTHAND_CONFIDENCE,
		build: (m) => withDigits({ kind: 'sacrificeFly' }, m[1]),
	},
	{
		id: 'shorthand-sacrifice-bunt',
		pattern: new RegExp(`^SAC${DIGITS}$`),
		confidence: SHORTHAND_CONFIDENCE,
		build: (m) => withDigits({ kind: 'sacrificeBunt' }, m[1]),
	},
	{
		id: 'shorthand-fielders-choice',
		pattern: new RegExp(`^FC${DIGITS}?$`),
		confidence: SHORTHAND_CONFIDENCE,
		build: (m) => withDigits({ kind: 'fieldersChoice' }, m[1]),
	},
	{
		id: 'shorthand-double-play',
		pattern: new RegExp(`^DP${DIGITS}?$`),
		confidence: SHORTHAND_CONFIDENCE,
		build: (m) => withDigits({ kind: 'doublePlay', trajectory: 'ground' }, m[1]),
	},
	{
		id: 'shorthand-triple-play',
		pattern: new RegExp(`^TP${DIGITS}?$`),
		confidence: SHORTHAND_CONFIDENCE,
		build: (m) => withDigits({ kind: 'triplePlay', trajectory: 'ground' }, m[1]),
	},
	{
		id: 'shorthand-error',
		pattern: /^E([1-9])$/,
		confidence: SHORTHAND_CONFIDENCE,
		build: (m) => {
			const position = Number(m[1]);
			const errorFielder = isFielderPosition(position) ? position : null;
			return withDigits({ kind: 'reachedOnError', errorFielder }, m[1]);
		},
	},
	{
		id: 'shorthand-stolen-base',
		pattern: /^SB[23H]?$/,
		confidence: SHORTHAND_CONFIDENCE,
		build: () => plain({ kind: 'stolenBase' }),
	},
	{
		id: 'shorthand-caught-stealing',
		pattern: new RegExp(`^CS[23H]?${DIGITS}?$`),
		confidence: SHORTHAND_CONFIDENCE,
		build: (m) => withDigits({ kind: 'caughtStealing' }, m[1]),
	},
	{
		id: 'shorthand-wild-pitch',
		pattern: /^WP$/,
		confidence: SHORTHAND_CONFIDENCE,
		build: () => plain({ kind: 'wildPitch' }),
	},
	{
		id: 'shorthand-passed-ball',
		pattern: /^PB$/,
		confidence: SHORTHAND_CONFIDENCE,
		build: () => plain({ kind: 'passedBall' }),
	},
	{
		id: 'shorthand-balk',
		pattern: /^BK$/,
		confidence: SHORTHAND_CONFIDENCE,
		build: () => plain({ kind: 'balk' }),
	},
];

/**
 * Free-text rules, most specific first
 */
export const TEXT_RULES: readonly PlayRule[] = [
	{
		id: 'triple-play',
		pattern: /\btriple play\b/i,
		confidence: 0.95,
		build: (_m, text) => plain({ kind: 'triplePlay', trajectory: trajectoryOf(text) }),
	},
	{
		id: 'into-double-play',
		pattern:
			/\b(?:grounds?|grounded|lines?|lined|flies|flied|pops?|popped|hits?|bunts?)\b[^.]*?\binto (?:a |an )?(?:force |unassisted |sacrifice )?double play\b/i,
		confidence: 0.95,
		build: (m) => plain({ kind: 'doublePlay', trajectory: trajectoryOf(m[0]) }),
	},
	{
		id: 'catcher-interference',
		pattern: /\bcatcher(?:'s)? interference\b/i,
		confidence: 0.9,
		build: () => ({ template: { kind: 'catcherInterference' }, fielders: [2] }),
	},
	{
		id: 'reached-on-error',
		pattern: /\breach(?:es|ed)\b[^.]*?\berror\b/i,
		confidence: 0.9,
		build: (_m, text) => plain({ kind: 'reachedOnError', errorFielder: extractErrorFielder(text) }),
	},
	{
		id: 'fielders-choice',
		pattern: /\bfielder'?s choice\b|\bforce(?:d)? out\b/i,
		confidence: 0.85,
		build: () => plain({ kind: 'fieldersChoice' }),
	},
	{
		id: 'sacrifice-fly',
		pattern: /\bsac(?:rifice)? fly\b/i,
		confidence: 0.9,
		build: () => plain({ kind: 'sacrificeFly' }),
	},
	{
		id: 'sacrifice-bunt',
		pattern: /\bsac(?:rifice)? bunt\b|\bbunts?\b[^.]*\bsacrifice\b/i,
		confidence: 0.9,
		build: () => plain({ kind: 'sacrificeBunt' }),
	},
	{
		id: 'home-run',
		pattern: /\bhomers?\b|\bhomered\b|\bhome run\b|\bgrand slam\b/i,
		confidence: 0.9,
		build: () => plain({ kind: 'homeRun' }),
	},
	{
		id: 'triple',
		pattern: /\btriples?\b(?! play)|\btripled(?! off)\b/i,
		confidence: 0.85,
		build: () => plain({ kind: 'triple' }),
	},
	{
		id: 'double',
		pattern: /\bdoubles\b|\bdoubled(?! off)\b|\bdouble\b(?! play)/i,
		confidence: 0.85,
		build: () => plain({ kind: 'double' }),
	},
	{
		id: 'single',
		pattern: /\bsingles?\b|\bsingled\b/i,
		confidence: 0.85,
		build: () => plain({ kind: 'single' }),
	},
	{
		id: 'intentional-walk',
		pattern: /\bintentionally walk(?:s|ed)\b|\bintentional walk\b/i,
		confidence: 0.9,
		build: () => plain({ kind: 'walk', intentional: true }),
	},
	{
		id: 'walk',
		pattern: /\bwalks\b|\bwalked\b|\bbase on balls\b/i,
		confidence: 0.85,
		build: () => plain({ kind: 'walk', intentional: false }),
	},
	{
		id: 'hit-by-pitch',
		pattern: /\bhit by (?:a )?pitch\b/i,
		confidence: 0.9,
		build: () => plain({ kind: 'hitByPitch' }),
	},
	{
		id: 'called-strikeout',
		pattern: /\bcalled out on strikes\b|\bstr(?:ikes|uck) out looking\b/i,
		confidence: 0.9,
		build: () => plain({ kind: 'strikeout', looking: true }),
	},
	{
		id: 'strikeout',
		pattern: /\bstr(?:ikes|uck) out\b|\bstrikeout\b/i,
		confidence: 0.9,
		build: () => plain({ kind: 'strikeout', looking: false }),
	},
	{
		id: 'ground-out',
		pattern: /\bground(?:s|ed)? out\b/i,
		confidence: 0.8,
		build: () => plain({ kind: 'groundOut' }),
	},
	{
		id: 'line-out',
		pattern: /\blines? out\b|\blined out\b/i,
		confidence: 0.8,
		build: () => plain({ kind: 'flyOut', trajectory: 'line' }),
	},
	{
		id: 'pop-out',
		pattern: /\bpops? (?:out|up)\b|\bpopped (?:out|up)\b/i,
		confidence: 0.8,
		build: () => plain({ kind: 'flyOut', trajectory: 'pop' }),
	},
	{
		id: 'fly-out',
		pattern: /\bfl(?:ies|ied|y) out\b|\bfouls? out\b|\bfouled out\b/i,
		confidence: 0.8,
		build: () => plain({ kind: 'flyOut', trajectory: 'fly' }),
	},
	{
		id: 'caught-stealing',
		pattern: /\bcaught stealing\b|\bpicked off\b/i,
		confidence: 0.85,
		build: () => plain({ kind: 'caughtStealing' }),
	},
	{
		id: 'stolen-base',
		pattern: /\bsteals\b|\bstole\b|\bstolen base\b/i,
		confidence: 0.85,
		build: () => plain({ kind: 'stolenBase' }),
	},
	{
		id: 'wild-pitch',
		pattern: /\bwild pitch\b/i,
		confidence: 0.85,
		build: () => plain({ kind: 'wildPitch' }),
	},
	{
		id: 'passed-ball',
		pattern: /\bpassed ball\b/i,
		confidence: 0.85,
		build: () => plain({ kind: 'passedBall' }),
	},
	{
		id: 'balk',
		pattern: /\bbalks?\b/i,
		confidence: 0.85,
		build: () => plain({ kind: 'balk' }),
	},
	{
		id: 'loose-double-play',
		pattern: /\bdouble play\b/i,
		confidence: 0.6,
		build: (_m, text) => plain({ kind: 'doublePlay', trajectory: trajectoryOf(text) }),
	},
	{
		id: 'loose-error',
		pattern: /\berror\b/i,
		confidence: 0.45,
		build: (_m, text) => plain({ kind: 'reachedOnError', errorFielder: extractErrorFielder(text) }),
	},
	{
		id: 'loose-out',
		pattern: /\bout\b/i,
		confidence: 0.35,
		build: () => plain({ kind: 'genericOut' }),
	},
];

export const PLAY_RULES: readonly PlayRule[] = [...SHORTHAND_RULES, ...TEXT_RULES];

export interface Classification {
	readonly rule: PlayRule;
	readonly match: RuleMatch;
}

/**
 * First rule matching `text` at or above `minConfidence`, plus the best
 * rule that matched below it (for diagnostics)
 */
export function classify(
	text: string,
	minConfidence: number,
	rules: readonly PlayRule[] = PLAY_RULES
): { accepted: Classification | null; rejected: PlayRule | null } {
	let rejected: PlayRule | null = null;
	for (const rule of rules) {
		const match = rule.pattern.exec(text);
		if (!match) continue;
		if (rule.confidence >= minConfidence) {
			return { accepted: { rule, match: rule.build(match, text) }, rejected };
		}
		if (!rejected || rule.confidence > rejected.confidence) rejected = rule;
	}
	return { accepted: null, rejected };
}
