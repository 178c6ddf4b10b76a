/**
 * Game timeline reconstruction
 *
 * Raw play-by-play in, a scored Game out: base states after every play,
 * earned and unearned runs charged to the responsible pitcher, key plays,
 * linescore and box score.
 */

export type * from './types.js';

export type { ScorebookConfig } from './config.js';
export { DEFAULT_CONFIG, resolveConfig } from './config.js';

export type { LogLevel, LogSink, Logger } from './logger.js';
export { createLogger } from './logger.js';

export type { IllegalAdvancementKind, ScorebookErrorCode } from './errors.js';
export {
	ScorebookError,
	UnrecognizedPlayPatternError,
	IllegalAdvancementError,
	InconsistentOutCountError,
	IncompleteGameDataError,
	GameInputError,
} from './errors.js';

export { RawPlaySchema, GameMetadataSchema, GameInputSchema, PitchTagSchema, parseGameInput } from './input/schema.js';
export { parseInningLabel, formatInningLabel } from './input/innings.js';
export type { NameIndex } from './input/names.js';
export { buildNameIndex } from './input/names.js';

export * from './normalizer/index.js';
export * from './state-machine/index.js';

export type { LedgerOptions, LedgerResult } from './ledger/earned-runs.js';
export { attributeRuns, unearnedReason, involvesError } from './ledger/earned-runs.js';

export { isKeyPlay, winProbabilitySwing } from './detector/key-plays.js';

export * from './timeline/index.js';
