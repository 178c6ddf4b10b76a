/**
 * Play normalizer: raw description -> canonical play event
 */

import type { BaseState, PlayEvent, RawPlay } from '../types.js';
import { DEFAULT_CONFIG } from '../config.js';
import { UnrecognizedPlayPatternError } from '../errors.js';
import type { NameIndex } from '../input/names.js';
import { splitDescription } from './clauses.js';
import { extractFielders } from './fielders.js';
import type { Classification, PlayRule } from './rules.js';
import { PLAY_RULES, classify } from './rules.js';
import { resolvePlay } from './resolve.js';

export interface NormalizeContext {
	readonly outsBefore: number;
	readonly basesBefore: BaseState;
	/** Player id -> name as written in descriptions */
	readonly names?: NameIndex;
}

export interface NormalizeOptions {
	readonly minRuleConfidence?: number;
	readonly rules?: readonly PlayRule[];
}

export type NormalizeResult =
	| { readonly ok: true; readonly event: PlayEvent }
	| { readonly ok: false; readonly error: UnrecognizedPlayPatternError; readonly event: PlayEvent };

export const FALLBACK_RULE_ID = 'fallback-generic-out';

export function normalizeText(description: string): string {
	return description.replace(/\s+/g, ' ').trim();
}

export function normalize(raw: RawPlay, context: NormalizeContext, options: NormalizeOptions = {}): NormalizeResult {
	const minConfidence = options.minRuleConfidence ?? DEFAULT_CONFIG.minRuleConfidence;
	const rules = options.rules ?? PLAY_RULES;
	const text = normalizeText(raw.description);
	const parts = splitDescription(text, raw.batterId, context.basesBefore, context.names);

	// The batter's own clause decides the play; the full text is the fallback
	let classifiedText = parts.lead;
	let outcome = parts.lead ? classify(parts.lead, minConfidence, rules) : { accepted: null, rejected: null };
	let rejected = outcome.rejected;
	if (!outcome.accepted && parts.lead !== text) {
		classifiedText = text;
		outcome = classify(text, minConfidence, rules);
		rejected = rejected ?? outcome.rejected;
	}

	const accepted: Classification | null = outcome.accepted;
	if (!accepted) {
		const error = new UnrecognizedPlayPatternError(
			raw.description,
			rejected ? { ruleId: rejected.id, confidence: rejected.confidence } : null
		);
		return {
			ok: false,
			error,
			event: resolvePlay({
				raw,
				outsBefore: context.outsBefore,
				bases: context.basesBefore,
				parts: { lead: text, runners: new Map(), batter: null },
				template: { kind: 'genericOut' },
				fielders: [],
				text,
				ruleId: FALLBACK_RULE_ID,
				confidence: 0,
			}),
		};
	}

	return {
		ok: true,
		event: resolvePlay({
			raw,
			outsBefore: context.outsBefore,
			bases: context.basesBefore,
			parts,
			template: accepted.match.template,
			fielders: accepted.match.fielders ?? extractFielders(classifiedText),
			text,
			ruleId: accepted.rule.id,
			confidence: accepted.rule.confidence,
		}),
	};
}
