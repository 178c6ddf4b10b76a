/**
 * Resolve a classified play template against the base state
 *
 * Order: per-kind defaults, explicit runner clauses, reconciliation with the
 * reported run count, then settling so no two runners share a base.
 */

import type {
	Base,
	BaseState,
	BatterOutcome,
	FielderPosition,
	PlayEvent,
	PlayTemplate,
	RawPlay,
	RunnerMovement,
} from '../types.js';
import { BASES, BASES_LEAD_FIRST, baseFromNumber, baseNumber } from '../state-machine/state.js';
import { creditsRbi, isHit, negatesRunsOnThirdOut } from '../state-machine/outcome-types.js';
import type { DescriptionParts } from './clauses.js';
import type { RunnerTargets } from './advancement/index.js';
import { defaultAdvancement } from './advancement/index.js';
import { countErrors } from './fielders.js';
import { scorecardNotation } from './notation.js';

export interface ResolveInput {
	readonly raw: RawPlay;
	readonly outsBefore: number;
	readonly bases: BaseState;
	readonly parts: DescriptionParts;
	readonly template: PlayTemplate;
	readonly fielders: readonly FielderPosition[];
	/** Normalized description text */
	readonly text: string;
	readonly ruleId: string;
	readonly confidence: number;
}

export function resolvePlay(input: ResolveInput): PlayEvent {
	const { raw, outsBefore, bases, parts, template } = input;

	const explicitOuts = new Set<Base>();
	for (const [base, clause] of parts.runners) {
		if (clause.to === 'out') explicitOuts.add(base);
	}
	const batterSafe = parts.batter !== null && parts.batter.to !== 'out';

	const defaults = defaultAdvancement(template, { outsBefore, bases, explicitOuts, batterSafe });

	// Explicit clauses override the defaults
	const targets: RunnerTargets = { ...defaults.targets };
	const explicit = new Set<Base>();
	for (const [base, clause] of parts.runners) {
		targets[base] = { to: clause.to, onError: clause.onError };
		explicit.add(base);
	}

	let batter: BatterOutcome = defaults.batter;
	if (parts.batter) {
		batter =
			parts.batter.to === 'out'
				? { reached: null, retired: true, onError: false }
				: { reached: parts.batter.to, retired: false, onError: batter.onError || parts.batter.onError };
	}

	let outs = countOuts(bases, targets, batter);
	if (template.kind === 'genericOut') {
		outs = Math.max(outs, 1, raw.outsRecorded);
	}

	const thirdOutNegates = outsBefore + outs >= 3 && negatesRunsOnThirdOut(template.kind);
	if (!thirdOutNegates && template.kind !== 'homeRun' && template.kind !== 'genericOut') {
		reconcileRuns(bases, targets, batter, explicit, raw.runsScored, isHit(template.kind));
	}
	settle(bases, targets, batter);

	const movements: RunnerMovement[] = [];
	for (const base of BASES_LEAD_FIRST) {
		const runner = bases[base];
		const target = targets[base];
		if (!runner || !target || target.to === base) continue;
		movements.push({
			runnerId: runner.playerId,
			from: base,
			to: target.to,
			onError: target.onError,
			explicit: explicit.has(base),
		});
	}

	const errors = Math.max(
		countErrors(input.text),
		template.kind === 'reachedOnError' || template.kind === 'catcherInterference' ? 1 : 0
	);

	return {
		...template,
		batterId: raw.batterId,
		fielders: input.fielders,
		movements,
		batter,
		outs,
		rbi: thirdOutNegates ? 0 : countRbi(template, movements, batter, outsBefore),
		errors,
		errorPreventedOuts: template.kind === 'reachedOnError' ? 1 : 0,
		cleanOuts: errors === 0,
		notation: scorecardNotation(template, input.fielders),
		ruleId: input.ruleId,
		confidence: input.confidence,
	};
}

function countOuts(bases: BaseState, targets: RunnerTargets, batter: BatterOutcome): number {
	let outs = batter.retired ? 1 : 0;
	for (const base of BASES) {
		if (bases[base] && targets[base]?.to === 'out') outs++;
	}
	return outs;
}

/**
 * Move inferred (non-explicit) runners so the play's runs match the feed:
 * extra runs come from the lead runners one base from home (two on a hit),
 * missing runs hold the trailing scorers at third. Runs that cannot be
 * placed this way are left for the reported-totals check.
 */
function reconcileRuns(
	bases: BaseState,
	targets: RunnerTargets,
	batter: BatterOutcome,
	explicit: ReadonlySet<Base>,
	reportedRuns: number,
	hit: boolean
): void {
	let resolved = batter.reached === 'home' ? 1 : 0;
	for (const base of BASES) {
		if (bases[base] && targets[base]?.to === 'home') resolved++;
	}

	let diff = reportedRuns - resolved;
	if (diff > 0) {
		for (const base of BASES_LEAD_FIRST) {
			if (diff === 0) break;
			if (!bases[base] || explicit.has(base)) continue;
			const current = targets[base] ?? { to: base, onError: false };
			const reachesHome = current.to === 'third' || (hit && current.to === 'second');
			if (!reachesHome) continue;
			targets[base] = { to: 'home', onError: current.onError };
			diff--;
		}
	} else if (diff < 0) {
		for (const base of BASES) {
			if (diff === 0) break;
			const current = targets[base];
			if (!bases[base] || explicit.has(base) || current?.to !== 'home') continue;
			targets[base] = { to: 'third', onError: current.onError };
			diff++;
		}
	}
}

/**
 * Resolve base collisions. Runners are placed lead-first and back off toward
 * (never below) their own base; the batter then forces anyone in the way
 * up one base.
 */
function settle(bases: BaseState, targets: RunnerTargets, batter: BatterOutcome): void {
	const landingOrigin = new Map<Base, Base>();

	for (const base of BASES_LEAD_FIRST) {
		if (!bases[base]) continue;
		const target = targets[base] ?? { to: base, onError: false };
		if (target.to === 'out' || target.to === 'home') continue;

		let landing = baseNumber(target.to) < baseNumber(base) ? base : target.to;
		while (landingOrigin.has(landing) && baseNumber(landing) > baseNumber(base)) {
			const back = baseFromNumber(baseNumber(landing) - 1);
			if (back === 'home') break;
			landing = back;
		}

		let moved: Base | 'home' = landing;
		while (moved !== 'home' && landingOrigin.has(moved)) {
			moved = baseFromNumber(baseNumber(moved) + 1);
		}
		if (moved === 'home') {
			targets[base] = { to: 'home', onError: target.onError };
			continue;
		}
		landingOrigin.set(moved, base);
		targets[base] = { to: moved, onError: target.onError };
	}

	const reached = batter.reached;
	if (reached && reached !== 'home' && landingOrigin.has(reached)) {
		bump(reached, landingOrigin, targets);
	}
}

function bump(landing: Base, landingOrigin: Map<Base, Base>, targets: RunnerTargets): void {
	const origin = landingOrigin.get(landing);
	if (!origin) return;
	const onError = targets[origin]?.onError ?? false;
	landingOrigin.delete(landing);

	const next = baseFromNumber(baseNumber(landing) + 1);
	if (next === 'home') {
		targets[origin] = { to: 'home', onError };
		return;
	}
	if (landingOrigin.has(next)) bump(next, landingOrigin, targets);
	landingOrigin.set(next, origin);
	targets[origin] = { to: next, onError };
}

function countRbi(
	template: PlayTemplate,
	movements: readonly RunnerMovement[],
	batter: BatterOutcome,
	outsBefore: number
): number {
	if (!creditsRbi(template.kind)) return 0;

	const earnedScorers = movements.filter((m) => m.to === 'home' && !m.onError).length;
	if (template.kind === 'reachedOnError') {
		// With two outs the error, not the batter, drove the run in
		return outsBefore < 2 ? earnedScorers : 0;
	}
	return earnedScorers + (batter.reached === 'home' ? 1 : 0);
}
