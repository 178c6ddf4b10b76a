/**
 * Timeline assembler
 *
 * Merges simulated half-innings and ledger output into the Game value and
 * checks that the game is structurally complete.
 */

import type {
	Anomaly,
	Game,
	GameInput,
	Half,
	HalfInning,
	Inning,
	KeyPlayRef,
	PlayerId,
	RawPlay,
	TeamSide,
} from '../types.js';
import type { ScorebookConfig } from '../config.js';
import { IncompleteGameDataError } from '../errors.js';
import { formatInningLabel } from '../input/innings.js';
import { countRunners } from '../state-machine/state.js';
import { isHit } from '../state-machine/outcome-types.js';
import { attributeRuns } from '../ledger/earned-runs.js';
import type { SimulatedHalfInning } from './half-inning.js';
import { buildBattingLines, buildLinescore, buildPitchingLines } from './box-score.js';

export interface HalfInningPlays {
	inning: number;
	half: Half;
	plays: RawPlay[];
}

export function battingSideOf(half: Half): TeamSide {
	return half === 'top' ? 'away' : 'home';
}

export function fieldingSideOf(half: Half): TeamSide {
	return half === 'top' ? 'home' : 'away';
}

/**
 * Position of a half-inning in game order: t1 = 0, b1 = 1, t2 = 2 ...
 */
function halfIndex(inning: number, half: Half): number {
	return (inning - 1) * 2 + (half === 'top' ? 0 : 1);
}

/**
 * Split the play stream into half-innings, requiring t1, b1, t2 ... in order
 */
export function groupHalfInnings(gameId: string, plays: readonly RawPlay[]): HalfInningPlays[] {
	if (plays.length === 0) {
		throw new IncompleteGameDataError(gameId, 'no plays');
	}

	const groups: HalfInningPlays[] = [];
	for (const play of plays) {
		const current = groups[groups.length - 1];
		if (current && current.inning === play.inning && current.half === play.half) {
			current.plays.push(play);
			continue;
		}
		const expected = groups.length;
		if (halfIndex(play.inning, play.half) !== expected) {
			const seen = groups.some((g) => g.inning === play.inning && g.half === play.half);
			throw new IncompleteGameDataError(
				gameId,
				seen
					? `half-inning ${formatInningLabel(play.inning, play.half)} appears out of order`
					: `expected ${describeHalf(expected)} but found ${formatInningLabel(play.inning, play.half)}`,
				play.inning,
				play.half
			);
		}
		groups.push({ inning: play.inning, half: play.half, plays: [play] });
	}
	return groups;
}

function describeHalf(index: number): string {
	return formatInningLabel(Math.floor(index / 2) + 1, index % 2 === 0 ? 'top' : 'bottom');
}

/**
 * Last batter of a half-inning, who starts the team's next extra inning on second
 */
export function lastBatterOf(group: HalfInningPlays | undefined): PlayerId | null {
	if (!group || group.plays.length === 0) return null;
	return group.plays[group.plays.length - 1].batterId;
}

export function assembleGame(
	input: GameInput,
	halves: readonly SimulatedHalfInning[],
	config: ScorebookConfig
): Game {
	const gameId = input.metadata.gameId;
	if (halves.length === 0) {
		throw new IncompleteGameDataError(gameId, 'no plays');
	}

	const anomalies: Anomaly[] = [];
	const halfInnings: HalfInning[] = halves.map((sim, i) => {
		if (halfIndex(sim.inning, sim.half) !== i) {
			throw new IncompleteGameDataError(
				gameId,
				`expected ${describeHalf(i)} but found ${formatInningLabel(sim.inning, sim.half)}`,
				sim.inning,
				sim.half
			);
		}

		const ledger = attributeRuns(sim.records, { ghostRunsEarned: config.ghostRunsEarned });
		anomalies.push(...sim.anomalies);
		if (ledger.contested) {
			anomalies.push({
				code: 'ContestedEarnedRun',
				message: `${formatInningLabel(sim.inning, sim.half)}: several plays involved errors; earned-run split is a best reconstruction`,
				inning: sim.inning,
				half: sim.half,
				playIndex: null,
				description: null,
				recovery: 'Applied the error-free replay rule',
			});
		}

		return {
			inning: sim.inning,
			half: sim.half,
			battingSide: battingSideOf(sim.half),
			fieldingSide: fieldingSideOf(sim.half),
			plays: sim.records,
			outs: sim.outs,
			runs: ledger.runs,
			earnedRuns: ledger.earnedRuns,
			unearnedRuns: ledger.unearnedRuns,
			hits: sim.records.filter((r) => isHit(r.event.kind)).length,
			errors: sim.records.reduce((sum, r) => sum + r.event.errors, 0),
			leftOnBase: countRunners(sim.finalState),
			ghostRunner: sim.ghostRunner,
			runAttributions: ledger.attributions,
			pitchers: ledger.pitchers,
		};
	});

	checkCompleteness(gameId, halfInnings, config.regulationInnings);

	const innings: Inning[] = [];
	for (const half of halfInnings) {
		if (half.half === 'top') {
			innings.push({ number: half.inning, top: half, bottom: null });
		} else {
			const inning = innings[innings.length - 1];
			innings[innings.length - 1] = { ...inning, bottom: half };
		}
	}

	const linescore = buildLinescore(halfInnings, input.metadata);
	const finalScore = { away: linescore.away.runs, home: linescore.home.runs };
	const winner: TeamSide | null =
		finalScore.away === finalScore.home ? null : finalScore.away > finalScore.home ? 'away' : 'home';

	const keyPlays: KeyPlayRef[] = halfInnings.flatMap((half) =>
		half.plays
			.filter((record) => record.isKeyPlay)
			.map((record) => ({
				inning: record.inning,
				half: record.half,
				playIndex: record.index,
				batterId: record.batterId,
				notation: record.event.notation,
				winProbabilitySwing: record.winProbabilitySwing,
			}))
	);

	return {
		gameId,
		metadata: input.metadata,
		regulationInnings: config.regulationInnings,
		keyPlayThreshold: config.keyPlayThreshold,
		innings,
		halfInnings,
		linescore,
		finalScore,
		winner,
		pitching: buildPitchingLines(halfInnings),
		batting: buildBattingLines(halfInnings),
		keyPlays,
		anomalies,
	};
}

/**
 * Every half-inning but the last needs three outs. The last may stop short
 * only on a walk-off; a missing bottom half is allowed only when the home
 * team was already ahead.
 */
function checkCompleteness(gameId: string, halfInnings: readonly HalfInning[], regulationInnings: number): void {
	const last = halfInnings[halfInnings.length - 1];

	for (const half of halfInnings) {
		if (half !== last && half.outs < 3) {
			throw new IncompleteGameDataError(gameId, `half-inning ended with ${half.outs} out(s)`, half.inning, half.half);
		}
	}

	const runs = (side: TeamSide) =>
		halfInnings.filter((h) => h.battingSide === side).reduce((sum, h) => sum + h.runs, 0);
	const homeAhead = runs('home') > runs('away');

	if (last.half === 'top') {
		if (last.outs < 3) {
			throw new IncompleteGameDataError(gameId, `half-inning ended with ${last.outs} out(s)`, last.inning, last.half);
		}
		if (last.inning >= regulationInnings && homeAhead) return;
		throw new IncompleteGameDataError(gameId, 'bottom half-inning is missing', last.inning, 'bottom');
	}

	if (last.outs < 3 && !(last.inning >= regulationInnings && homeAhead)) {
		throw new IncompleteGameDataError(
			gameId,
			`final half-inning ended with ${last.outs} out(s) without a walk-off`,
			last.inning,
			last.half
		);
	}
}
