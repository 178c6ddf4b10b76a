/**
 * Earned-run ledger
 *
 * Replays a half-inning as if every error had been an out. A run is unearned
 * when, in that replay, the defense already had (or on the same play would
 * have had) its third out, or when the runner only reached or advanced
 * because of a misplay. Each run is charged to the pitcher responsible for
 * the scoring runner, whoever is pitching when the run scores.
 *
 * A relief pitcher gets no credit for outs the defense missed before they
 * entered, so each pitcher also has their own replay, started from the real
 * out count at their entry. A run can be unearned for the team and still
 * earned against the reliever.
 */

import type {
	PitcherId,
	PitcherResponsibility,
	PlateAppearanceRecord,
	PlayEvent,
	PlayerId,
	RunAttribution,
	ScoredRun,
	UnearnedReason,
} from '../types.js';
import { BASES } from '../state-machine/state.js';
import { isPlateAppearance } from '../state-machine/outcome-types.js';

export interface LedgerOptions {
	/** Count runs by the extra-inning runner as earned */
	ghostRunsEarned: boolean;
}

export interface LedgerResult {
	attributions: RunAttribution[];
	runs: number;
	earnedRuns: number;
	unearnedRuns: number;
	/** Pitchers in order of appearance, including those charged with inherited runners */
	pitchers: PitcherResponsibility[];
	/** More than one play involved an error and at least one run is unearned */
	contested: boolean;
}

export function involvesError(event: PlayEvent): boolean {
	return (
		event.errors > 0 ||
		event.errorPreventedOuts > 0 ||
		event.batter.onError ||
		event.movements.some((m) => m.onError)
	);
}

/**
 * Why a run would not count against the pitcher, or null when it is earned
 */
export function unearnedReason(
	scored: ScoredRun,
	counterfactualOutsBefore: number,
	counterfactualOutsAfter: number,
	errorPreventedOuts: number,
	options: LedgerOptions
): UnearnedReason | null {
	if (counterfactualOutsBefore >= 3) return 'afterThirdOut';
	if (scored.runner.isGhost && !options.ghostRunsEarned) return 'ghostRunner';
	if (scored.runner.reachedOnError) return 'reachedOnError';
	if (errorPreventedOuts > 0 && counterfactualOutsAfter >= 3) return 'errorPreventedThirdOut';
	if (scored.onError) return 'advancedOnError';
	return null;
}

export function attributeRuns(records: readonly PlateAppearanceRecord[], options: LedgerOptions): LedgerResult {
	const attributions: RunAttribution[] = [];
	let counterfactualOuts = 0;
	// Per pitcher, the same replay started from the real outs when they entered
	const pitcherOuts = new Map<PitcherId, number>();

	for (const record of records) {
		if (!pitcherOuts.has(record.pitcherId)) {
			pitcherOuts.set(record.pitcherId, record.outsBefore);
		}
		const replayed = record.outsAfter - record.outsBefore + record.event.errorPreventedOuts;
		const before = counterfactualOuts;
		const after = before + replayed;

		for (const scored of record.scorers) {
			const reason = unearnedReason(scored, before, after, record.event.errorPreventedOuts, options);
			const chargedId = scored.runner.responsiblePitcherId;
			const pitcherBefore = pitcherOuts.get(chargedId) ?? before;
			const pitcherReason = unearnedReason(
				scored,
				pitcherBefore,
				pitcherBefore + replayed,
				record.event.errorPreventedOuts,
				options
			);
			attributions.push({
				runnerId: scored.runner.playerId,
				playIndex: record.index,
				chargedPitcherId: chargedId,
				earned: reason === null,
				earnedForPitcher: pitcherReason === null,
				isGhost: scored.runner.isGhost,
				unearnedReason: reason,
			});
		}

		counterfactualOuts = after;
		for (const [pitcherId, outs] of pitcherOuts) {
			pitcherOuts.set(pitcherId, outs + replayed);
		}
	}

	const earnedRuns = attributions.filter((a) => a.earned).length;
	const unearnedRuns = attributions.length - earnedRuns;
	const errorPlays = records.filter((r) => involvesError(r.event)).length;

	return {
		attributions,
		runs: attributions.length,
		earnedRuns,
		unearnedRuns,
		pitchers: pitcherResponsibilities(records, attributions),
		contested: errorPlays > 1 && unearnedRuns > 0,
	};
}

function pitcherResponsibilities(
	records: readonly PlateAppearanceRecord[],
	attributions: readonly RunAttribution[]
): PitcherResponsibility[] {
	const order: PitcherId[] = [];
	const runners = new Map<PitcherId, PlayerId[]>();
	const faced = new Map<PitcherId, number>();
	const outs = new Map<PitcherId, number>();

	const seePitcher = (pitcherId: PitcherId) => {
		if (!runners.has(pitcherId)) {
			order.push(pitcherId);
			runners.set(pitcherId, []);
		}
	};
	const seeRunner = (pitcherId: PitcherId, playerId: PlayerId) => {
		seePitcher(pitcherId);
		const list = runners.get(pitcherId);
		if (list && !list.includes(playerId)) list.push(playerId);
	};

	for (const record of records) {
		for (const base of BASES) {
			const runner = record.basesBefore[base];
			if (runner) seeRunner(runner.responsiblePitcherId, runner.playerId);
		}
		seePitcher(record.pitcherId);
		if (isPlateAppearance(record.event.kind)) {
			faced.set(record.pitcherId, (faced.get(record.pitcherId) ?? 0) + 1);
		}
		outs.set(record.pitcherId, (outs.get(record.pitcherId) ?? 0) + (record.outsAfter - record.outsBefore));
		for (const base of BASES) {
			const runner = record.basesAfter[base];
			if (runner) seeRunner(runner.responsiblePitcherId, runner.playerId);
		}
		for (const scored of record.scorers) {
			seeRunner(scored.runner.responsiblePitcherId, scored.runner.playerId);
		}
	}

	return order.map((pitcherId) => {
		const charged = attributions.filter((a) => a.chargedPitcherId === pitcherId);
		return {
			pitcherId,
			runners: runners.get(pitcherId) ?? [],
			battersFaced: faced.get(pitcherId) ?? 0,
			outsRecorded: outs.get(pitcherId) ?? 0,
			runsCharged: charged.length,
			earnedRunsCharged: charged.filter((a) => a.earned).length,
		};
	});
}
