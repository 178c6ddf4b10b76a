/**
 * One half-inning through normalizer, simulator and key-play detector
 */

import type {
	Anomaly,
	AnomalyCode,
	BaseState,
	Half,
	PitcherId,
	PlateAppearanceRecord,
	PlayerId,
	RawPlay,
	Runner,
} from '../types.js';
import type { NameIndex } from '../input/names.js';
import { formatInningLabel } from '../input/innings.js';
import { normalize } from '../normalizer/normalize.js';
import { EMPTY_BASES } from '../state-machine/state.js';
import { advance } from '../state-machine/transitions.js';
import { fallbackGhostRunnerId, needsGhostRunner, placeGhostRunner } from '../state-machine/ghost-runner.js';
import { isKeyPlay, winProbabilitySwing } from '../detector/key-plays.js';

export interface HalfInningOptions {
	inning: number;
	half: Half;
	regulationInnings: number;
	extraInningRunner: boolean;
	keyPlayThreshold: number;
	minRuleConfidence: number;
	names?: NameIndex;
	/** Who starts on second in extra innings; defaults to a placeholder id */
	ghostRunnerId?: PlayerId | null;
}

export interface SimulatedHalfInning {
	inning: number;
	half: Half;
	records: PlateAppearanceRecord[];
	anomalies: Anomaly[];
	ghostRunner: Runner | null;
	outs: number;
	/** Bases when the half-inning ended */
	finalState: BaseState;
}

export function simulateHalfInning(plays: readonly RawPlay[], options: HalfInningOptions): SimulatedHalfInning {
	const { inning, half } = options;
	const label = formatInningLabel(inning, half);
	const anomalies: Anomaly[] = [];
	const records: PlateAppearanceRecord[] = [];

	let state: BaseState = EMPTY_BASES;
	let outs = 0;
	let ghostRunner: Runner | null = null;

	if (plays.length > 0 && needsGhostRunner(inning, options.regulationInnings, state, options.extraInningRunner)) {
		const startingPitcher: PitcherId = plays[0].pitcherId;
		const placed = placeGhostRunner(
			state,
			options.ghostRunnerId ?? fallbackGhostRunnerId(inning, half),
			startingPitcher
		);
		state = placed.state;
		ghostRunner = placed.runner;
	}

	plays.forEach((raw, index) => {
		const codes: AnomalyCode[] = [];
		const flag = (code: AnomalyCode, message: string, recovery: string) => {
			codes.push(code);
			anomalies.push({ code, message, inning, half, playIndex: index, description: raw.description, recovery });
		};

		const afterThirdOut = outs >= 3;
		if (afterThirdOut) {
			flag('InconsistentOutCount', `${label} #${index + 1}: play recorded after the third out`, 'Outs capped at 3');
		}

		const normalized = normalize(
			raw,
			{ outsBefore: outs, basesBefore: state, names: options.names },
			{ minRuleConfidence: options.minRuleConfidence }
		);
		if (!normalized.ok) {
			flag(
				'UnrecognizedPlayPattern',
				`${label} #${index + 1}: ${normalized.error.message}`,
				'Treated as a generic out with no runner advancement'
			);
		}

		const event = normalized.event;
		const result = advance(state, event, raw.pitcherId, { outsBefore: outs });
		for (const issue of result.issues) {
			if (issue.code === 'InconsistentOutCount') {
				// One out-count anomaly per play
				if (afterThirdOut) continue;
				flag('InconsistentOutCount', `${label} #${index + 1}: ${issue.message}`, 'Outs capped at 3');
			} else {
				flag(
					'IllegalAdvancement',
					`${label} #${index + 1}: ${issue.message}`,
					'Runner kept on the nearest open base'
				);
			}
		}

		const totalsDiffer = result.runsScored !== raw.runsScored || result.outsRecorded !== raw.outsRecorded;
		if (totalsDiffer && !afterThirdOut) {
			flag(
				'ReportedTotalsMismatch',
				`${label} #${index + 1}: feed reports ${raw.runsScored} run(s) and ${raw.outsRecorded} out(s), ` +
					`reconstructed ${result.runsScored} run(s) and ${result.outsRecorded} out(s)`,
				'Kept the reconstructed totals'
			);
		}

		const swing = winProbabilitySwing(raw.winProbabilityBefore, raw.winProbabilityAfter);
		records.push({
			index,
			inning,
			half,
			batterId: raw.batterId,
			pitcherId: raw.pitcherId,
			pitches: raw.pitches,
			description: raw.description,
			event,
			basesBefore: state,
			basesAfter: result.nextState,
			outsBefore: outs,
			outsAfter: result.outsAfter,
			runsScored: result.runsScored,
			scorers: result.scorers,
			winProbabilityBefore: raw.winProbabilityBefore,
			winProbabilityAfter: raw.winProbabilityAfter,
			winProbabilitySwing: swing,
			isKeyPlay: isKeyPlay(event, raw.winProbabilityBefore, raw.winProbabilityAfter, options.keyPlayThreshold),
			anomalies: codes,
		});

		state = result.nextState;
		outs = result.outsAfter;
	});

	return { inning, half, records, anomalies, ghostRunner, outs, finalState: state };
}
