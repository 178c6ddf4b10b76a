/**
 * Base-state simulator
 *
 * Folds normalized plays into base occupancy, one half-inning at a time.
 */

export type { BaserunningEvent } from './state.js';

export {
	BASES,
	BASES_LEAD_FIRST,
	EMPTY_BASES,
	baseNumber,
	baseFromNumber,
	createRunner,
	createBaseState,
	withRunner,
	isBasesEmpty,
	countRunners,
	runnersLeadFirst,
	isForced,
} from './state.js';

export type { TransitionContext, TransitionIssue, TransitionResult } from './transitions.js';
export { advance } from './transitions.js';

export { needsGhostRunner, placeGhostRunner, fallbackGhostRunnerId } from './ghost-runner.js';

export {
	PLAY_KINDS,
	HIT_KINDS,
	AWARDED_BASE_KINDS,
	SACRIFICE_KINDS,
	RUNNER_EVENT_KINDS,
	NO_RUN_THIRD_OUT_KINDS,
	NO_RBI_KINDS,
	isHit,
	isAwardedBase,
	isSacrifice,
	isRunnerEvent,
	isPlateAppearance,
	isAtBat,
	negatesRunsOnThirdOut,
	creditsRbi,
	isPlayKind,
} from './outcome-types.js';
