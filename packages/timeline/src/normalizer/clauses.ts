/**
 * Runner clauses: the parts of a description that say what happened to a
 * runner already on base ("Smith scores.", "Jones to 3rd.", "Lee out at home")
 */

import type { Base, BaseState, BaseTarget, PlayerId } from '../types.js';
import type { NameIndex } from '../input/names.js';
import { displayName } from '../input/names.js';
import { BASES } from '../state-machine/state.js';

export interface RunnerClause {
	readonly to: BaseTarget | 'out';
	readonly onError: boolean;
	readonly text: string;
}

export interface DescriptionParts {
	/** Text describing the batter's own result */
	readonly lead: string;
	/** Clause per base for runners mentioned after the lead */
	readonly runners: ReadonlyMap<Base, RunnerClause>;
	/** The batter mentioned again later, e.g. "Jones to 2nd on throwing error" */
	readonly batter: RunnerClause | null;
}

const OUT_WORDS = /\b(?:out|doubled off|tripled off|caught stealing|picked off|thrown out)\b/i;
const SCORE_WORDS = /\b(?:scores|scored|steals (?:\(\d+\)\s*)?home)\b/i;
const BASE_WORDS =
	/\b(?:to|steals(?:\s*\(\d+\))?|stole|advances to|takes)\s+(1st|2nd|3rd|first|second|third|home)\b/i;
const ERROR_WORDS = /\b(?:error|passed ball)\b/i;

const BASE_BY_WORD: Record<string, BaseTarget> = {
	'1st': 'first',
	first: 'first',
	'2nd': 'second',
	second: 'second',
	'3rd': 'third',
	third: 'third',
	home: 'home',
};

export function escapeRegExp(value: string): string {
	return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Position of every standalone mention of `label` in `text`
 */
export function findMentions(text: string, label: string): number[] {
	if (!label) return [];
	const pattern = new RegExp(`(?<![\\w.])${escapeRegExp(label)}(?!\\w)`, 'gi');
	const positions: number[] = [];
	for (const match of text.matchAll(pattern)) {
		if (match.index !== undefined) positions.push(match.index);
	}
	return positions;
}

/**
 * Read what a clause says happened to its subject
 */
export function parseClause(text: string): RunnerClause | null {
	const onError = ERROR_WORDS.test(text);
	const candidates: { index: number; to: BaseTarget | 'out' }[] = [];

	const out = OUT_WORDS.exec(text);
	if (out) candidates.push({ index: out.index, to: 'out' });
	const scored = SCORE_WORDS.exec(text);
	if (scored) candidates.push({ index: scored.index, to: 'home' });
	const base = BASE_WORDS.exec(text);
	if (base) {
		const target = BASE_BY_WORD[base[1].toLowerCase()];
		if (target) candidates.push({ index: base.index, to: target });
	}

	if (candidates.length === 0) return null;
	candidates.sort((a, b) => a.index - b.index);
	return { to: candidates[0].to, onError, text: text.trim() };
}

/**
 * Split a description into the batter's lead clause and per-runner clauses
 */
export function splitDescription(
	text: string,
	batterId: PlayerId,
	bases: BaseState,
	names?: NameIndex
): DescriptionParts {
	const mentions: { index: number; subject: Base | 'batter' }[] = [];
	for (const base of BASES) {
		const runner = bases[base];
		if (!runner) continue;
		const [first] = findMentions(text, displayName(names, runner.playerId));
		if (first !== undefined) mentions.push({ index: first, subject: base });
	}

	const runnerStart = mentions.length > 0 ? Math.min(...mentions.map((m) => m.index)) : text.length;
	const batterMentions = findMentions(text, displayName(names, batterId));
	const laterBatter = batterMentions.find((index, n) => n > 0 || index >= runnerStart);
	if (laterBatter !== undefined) mentions.push({ index: laterBatter, subject: 'batter' });
	mentions.sort((a, b) => a.index - b.index);

	const runners = new Map<Base, RunnerClause>();
	let batter: RunnerClause | null = null;
	for (let i = 0; i < mentions.length; i++) {
		const mention = mentions[i];
		const end = i + 1 < mentions.length ? mentions[i + 1].index : text.length;
		const clause = parseClause(text.slice(mention.index, end));
		if (!clause) continue;
		if (mention.subject === 'batter') {
			batter = clause;
		} else {
			runners.set(mention.subject, clause);
		}
	}

	const leadEnd = mentions.length > 0 ? mentions[0].index : text.length;
	return { lead: text.slice(0, leadEnd).trim(), runners, batter };
}
