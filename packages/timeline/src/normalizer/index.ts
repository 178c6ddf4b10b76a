/**
 * Play normalizer
 */

export type { NormalizeContext, NormalizeOptions, NormalizeResult } from './normalize.js';
export { normalize, normalizeText, FALLBACK_RULE_ID } from './normalize.js';

export type { Classification, PlayRule, RuleMatch } from './rules.js';
export { PLAY_RULES, SHORTHAND_RULES, TEXT_RULES, classify, trajectoryOf } from './rules.js';

export type { DescriptionParts, RunnerClause } from './clauses.js';
export { splitDescription, parseClause, findMentions } from './clauses.js';

export {
	POSITION_ABBREVIATIONS,
	extractFielders,
	extractErrorFielder,
	fieldersFromDigits,
	countErrors,
	isFielderPosition,
} from './fielders.js';

export { scorecardNotation } from './notation.js';

export type { AdvancementContext, DefaultAdvancement, RunnerTarget, RunnerTargets } from './advancement/index.js';
export { defaultAdvancement } from './advancement/index.js';
