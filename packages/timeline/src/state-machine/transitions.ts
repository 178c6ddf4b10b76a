/**
 * Base-state transitions
 * Pure functions: the input state is never modified
 */

import type { Base, BaseState, BaseTarget, PitcherId, PlayEvent, Runner, RunnerMovement, ScoredRun } from '../types.js';
import { IllegalAdvancementError, InconsistentOutCountError } from '../errors.js';
import type { BaserunningEvent } from './state.js';
import { BASES_LEAD_FIRST, EMPTY_BASES, baseFromNumber, baseNumber, createRunner, withRunner } from './state.js';
import { negatesRunsOnThirdOut } from './outcome-types.js';

export type TransitionIssue = IllegalAdvancementError | InconsistentOutCountError;

/**
 * Result of applying one play to a base state
 */
export interface TransitionResult {
	/** Bases after the play; runners stranded by a third out stay on base */
	nextState: BaseState;
	runsScored: number;
	outsRecorded: number;
	outsAfter: number;
	scorers: ScoredRun[];
	/** Runners on base before the play who were put out */
	retired: Runner[];
	advancement: BaserunningEvent[];
	/** Runs crossed the plate but the third out cancelled them */
	runsNegated: boolean;
	issues: TransitionIssue[];
}

export interface TransitionContext {
	outsBefore: number;
}

/**
 * Core transition: move runners, place the batter, count outs and runs
 *
 * Problems are returned as issues, never thrown. The simulator recovers
 * by keeping every runner on a legal base.
 */
export function advance(
	state: BaseState,
	event: PlayEvent,
	pitcherId: PitcherId,
	context: TransitionContext
): TransitionResult {
	const issues: TransitionIssue[] = [];
	const advancement: BaserunningEvent[] = [];
	const scorers: ScoredRun[] = [];
	const retired: Runner[] = [];
	let next: BaseState = EMPTY_BASES;

	const movementByBase = new Map<Base, RunnerMovement>();
	for (const movement of event.movements) {
		if (!state[movement.from]) {
			issues.push(
				new IllegalAdvancementError(
					'emptyBase',
					movement.from,
					movement.to === 'out' ? movement.from : movement.to,
					`no runner on ${movement.from} for ${movement.runnerId}`
				)
			);
			continue;
		}
		if (!movementByBase.has(movement.from)) movementByBase.set(movement.from, movement);
	}

	for (const base of BASES_LEAD_FIRST) {
		const runner = state[base];
		if (!runner) continue;
		const movement = movementByBase.get(base);
		const to = movement?.to ?? base;
		const onError = movement?.onError ?? false;

		if (to === 'out') {
			retired.push(runner);
			advancement.push({ runnerId: runner.playerId, from: base, to: 'out' });
			continue;
		}
		if (to === 'home') {
			scorers.push({ runner, onError });
			advancement.push({ runnerId: runner.playerId, from: base, to: 'home' });
			continue;
		}

		let wanted: Base = to;
		if (baseNumber(to) < baseNumber(base)) {
			issues.push(new IllegalAdvancementError('backward', base, to, `${runner.playerId} cannot retreat`));
			wanted = base;
		}
		let target: BaseTarget = wanted;
		if (next[wanted] !== null) {
			issues.push(new IllegalAdvancementError('occupied', base, wanted, `${wanted} already taken`));
			target = findFreeBase(next, base, baseNumber(wanted));
		}

		if (target === 'home') {
			scorers.push({ runner, onError });
		} else {
			next = withRunner(next, { ...runner, base: target });
		}
		if (target !== base) advancement.push({ runnerId: runner.playerId, from: base, to: target });
	}

	// Batter
	const reached = event.batter.reached;
	if (reached === 'home') {
		const batterRunner = createRunner(event.batterId, pitcherId, 'third', { reachedOnError: event.batter.onError });
		scorers.push({ runner: batterRunner, onError: event.batter.onError });
		advancement.push({ runnerId: event.batterId, from: 'batter', to: 'home' });
	} else if (reached !== null) {
		if (next[reached] !== null) {
			issues.push(new IllegalAdvancementError('occupied', 'batter', reached, `${reached} already taken`));
			const forced = forceAhead(next, reached);
			next = forced.state;
			scorers.push(...forced.scored);
		}
		next = withRunner(
			next,
			createRunner(event.batterId, pitcherId, reached, { reachedOnError: event.batter.onError })
		);
		advancement.push({ runnerId: event.batterId, from: 'batter', to: reached });
	} else if (event.batter.retired) {
		advancement.push({ runnerId: event.batterId, from: 'batter', to: 'out' });
	}

	// Outs
	const outsBefore = context.outsBefore;
	let outsAfter = outsBefore + event.outs;
	if (outsAfter > 3) {
		issues.push(new InconsistentOutCountError(outsBefore, event.outs));
		outsAfter = 3;
	}
	const outsRecorded = Math.max(0, outsAfter - outsBefore);

	// Runs do not count when a force, strikeout or caught ball makes the third out
	let runsNegated = false;
	if (outsAfter === 3 && outsRecorded > 0 && negatesRunsOnThirdOut(event.kind) && scorers.length > 0) {
		runsNegated = true;
		scorers.length = 0;
	}

	return {
		nextState: next,
		runsScored: scorers.length,
		outsRecorded,
		outsAfter,
		scorers,
		retired,
		advancement,
		runsNegated,
		issues,
	};
}

/**
 * Nearest free base at or below `wanted` (never below `origin`), else the
 * nearest one above it
 */
function findFreeBase(state: BaseState, origin: Base, wanted: number): BaseTarget {
	for (let n = Math.min(wanted, 3); n >= baseNumber(origin); n--) {
		const base = baseFromNumber(n);
		if (base !== 'home' && state[base] === null) return base;
	}
	for (let n = wanted + 1; n <= 4; n++) {
		const base = baseFromNumber(n);
		if (base === 'home' || state[base] === null) return base;
	}
	return 'home';
}

/**
 * Push the runner on `base` (and anyone in front of them) up one base
 */
function forceAhead(state: BaseState, base: Base): { state: BaseState; scored: ScoredRun[] } {
	const runner = state[base];
	if (!runner) return { state, scored: [] };

	const nextTarget = baseFromNumber(baseNumber(base) + 1);
	const cleared: BaseState = { ...state, [base]: null };
	if (nextTarget === 'home') {
		return { state: cleared, scored: [{ runner, onError: false }] };
	}
	const ahead = forceAhead(cleared, nextTarget);
	return { state: withRunner(ahead.state, { ...runner, base: nextTarget }), scored: ahead.scored };
}
