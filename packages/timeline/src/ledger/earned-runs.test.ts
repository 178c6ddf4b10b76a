/**
 * Earned-run ledger tests
 */

import { describe, it, expect } from 'vitest';
import { attributeRuns, unearnedReason } from './earned-runs.js';
import { simulateHalfInning } from '../timeline/half-inning.js';
import type { HalfInningOptions } from '../timeline/half-inning.js';
import { createRunner } from '../state-machine/state.js';
import { rawPlay } from '../test-fixtures.js';
import type { Half, RawPlay } from '../types.js';

function options(inning: number, half: Half): HalfInningOptions {
	return {
		inning,
		half,
		regulationInnings: 9,
		extraInningRunner: true,
		keyPlayThreshold: 0.1,
		minRuleConfidence: 0.5,
	};
}

const earnedOnly = { ghostRunsEarned: false };

describe('unearnedReason', () => {
	const clean = { runner: createRunner('a', 'p1', 'third'), onError: false };

	it('should treat a clean run as earned', () => {
		expect(unearnedReason(clean, 1, 2, 0, earnedOnly)).toBeNull();
	});

	it('should give the first reason that applies', () => {
		expect(unearnedReason(clean, 3, 3, 0, earnedOnly)).toBe('afterThirdOut');
		expect(
			unearnedReason({ runner: createRunner('g', 'p1', 'second', { isGhost: true }), onError: false }, 0, 0, 0, earnedOnly)
		).toBe('ghostRunner');
		expect(
			unearnedReason(
				{ runner: createRunner('e', 'p1', 'first', { reachedOnError: true }), onError: false },
				0,
				0,
				0,
				earnedOnly
			)
		).toBe('reachedOnError');
		expect(unearnedReason(clean, 2, 3, 1, earnedOnly)).toBe('errorPreventedThirdOut');
		expect(unearnedReason({ ...clean, onError: true }, 0, 0, 0, earnedOnly)).toBe('advancedOnError');
	});

	it('should count extra-inning runners as earned when configured', () => {
		const ghost = { runner: createRunner('g', 'p1', 'second', { isGhost: true }), onError: false };
		expect(unearnedReason(ghost, 0, 0, 0, { ghostRunsEarned: true })).toBeNull();
	});
});

describe('attributeRuns', () => {
	it('should charge each run of a grand slam to the pitcher who put the runner on', () => {
		const play = (batterId: string, pitcherId: string, description: string, extra: Partial<RawPlay> = {}) =>
			rawPlay({ inning: 1, half: 'bottom', batterId, pitcherId, description, ...extra });
		const plays = [
			play('Ames', 'Starter', 'Ames walks.'),
			play('Baker', 'Starter', 'Baker walks.'),
			play('Cole', 'Reliever', 'Cole hit by pitch.'),
			play('Diaz', 'Reliever', 'Diaz homers (1) on a fly ball to left field. Ames scores. Baker scores. Cole scores.', {
				runsScored: 4,
			}),
			play('Evans', 'Reliever', 'Evans strikes out swinging.', { outsRecorded: 1 }),
			play('Fox', 'Reliever', 'Fox grounds out, shortstop Ortiz to first baseman Lee.', { outsRecorded: 1 }),
			play('Gray', 'Reliever', 'Gray flies out to center fielder Ruiz.', { outsRecorded: 1 }),
		];

		const half = simulateHalfInning(plays, options(1, 'bottom'));
		const ledger = attributeRuns(half.records, earnedOnly);

		expect(half.anomalies).toEqual([]);
		expect(ledger.runs).toBe(4);
		expect(ledger.earnedRuns).toBe(4);
		expect(ledger.attributions.map((a) => [a.runnerId, a.chargedPitcherId, a.playIndex])).toEqual([
			['Ames', 'Starter', 3],
			['Baker', 'Starter', 3],
			['Cole', 'Reliever', 3],
			['Diaz', 'Reliever', 3],
		]);
		expect(ledger.pitchers).toEqual([
			{
				pitcherId: 'Starter',
				runners: ['Ames', 'Baker'],
				battersFaced: 2,
				outsRecorded: 0,
				runsCharged: 2,
				earnedRunsCharged: 2,
			},
			{
				pitcherId: 'Reliever',
				runners: ['Cole', 'Diaz'],
				battersFaced: 5,
				outsRecorded: 3,
				runsCharged: 2,
				earnedRunsCharged: 2,
			},
		]);
		expect(ledger.contested).toBe(false);
	});

	it('should make runs after a two-out error unearned', () => {
		const play = (batterId: string, description: string, extra: Partial<RawPlay> = {}) =>
			rawPlay({ inning: 1, half: 'top', batterId, pitcherId: 'Starter', description, ...extra });
		const plays = [
			play('Ames', 'Ames strikes out swinging.', { outsRecorded: 1 }),
			play('Baker', 'Baker grounds out to second baseman Kim.', { outsRecorded: 1 }),
			play('Cole', 'Cole reaches on a throwing error by shortstop Ortiz.'),
			play('Diaz', 'Diaz homers to left field. Cole scores.', { runsScored: 2 }),
			play('Evans', 'Evans flies out to right fielder Ruiz.', { outsRecorded: 1 }),
		];

		const half = simulateHalfInning(plays, options(1, 'top'));
		const ledger = attributeRuns(half.records, earnedOnly);

		expect(half.outs).toBe(3);
		expect(ledger.runs).toBe(2);
		expect(ledger.earnedRuns).toBe(0);
		expect(ledger.attributions).toEqual([
			{
				runnerId: 'Cole',
				playIndex: 3,
				chargedPitcherId: 'Starter',
				earned: false,
				earnedForPitcher: false,
				isGhost: false,
				unearnedReason: 'afterThirdOut',
			},
			{
				runnerId: 'Diaz',
				playIndex: 3,
				chargedPitcherId: 'Starter',
				earned: false,
				earnedForPitcher: false,
				isGhost: false,
				unearnedReason: 'afterThirdOut',
			},
		]);
		expect(ledger.contested).toBe(false);
	});

	it('should not give a reliever credit for outs missed before they entered', () => {
		const play = (batterId: string, pitcherId: string, description: string, extra: Partial<RawPlay> = {}) =>
			rawPlay({ inning: 1, half: 'top', batterId, pitcherId, description, ...extra });
		const plays = [
			play('Ames', 'Starter', 'Ames strikes out swinging.', { outsRecorded: 1 }),
			play('Baker', 'Starter', 'Baker strikes out looking.', { outsRecorded: 1 }),
			play('Cole', 'Starter', 'Cole walks.'),
			play('Diaz', 'Starter', 'Diaz reaches on a fielding error by shortstop Ortiz.'),
			play('Evans', 'Reliever', 'Evans homers to left field. Cole scores. Diaz scores.', { runsScored: 3 }),
			play('Fox', 'Reliever', 'Fox strikes out swinging.', { outsRecorded: 1 }),
		];

		const half = simulateHalfInning(plays, options(1, 'top'));
		const ledger = attributeRuns(half.records, earnedOnly);

		expect(half.anomalies).toEqual([]);
		expect(ledger.runs).toBe(3);
		expect(ledger.earnedRuns).toBe(0);
		expect(ledger.attributions.map((a) => [a.runnerId, a.chargedPitcherId, a.earned, a.earnedForPitcher])).toEqual([
			['Cole', 'Starter', false, false],
			['Diaz', 'Starter', false, false],
			['Evans', 'Reliever', false, true],
		]);
		expect(ledger.pitchers).toEqual([
			{
				pitcherId: 'Starter',
				runners: ['Cole', 'Diaz'],
				battersFaced: 4,
				outsRecorded: 2,
				runsCharged: 2,
				earnedRunsCharged: 0,
			},
			{
				pitcherId: 'Reliever',
				runners: ['Evans'],
				battersFaced: 2,
				outsRecorded: 1,
				runsCharged: 1,
				earnedRunsCharged: 1,
			},
		]);
	});

	it('should make the extra-inning runner unearned but charge the pitcher', () => {
		const plays = [
			rawPlay({
				inning: 10,
				half: 'bottom',
				batterId: 'Moss',
				pitcherId: 'Closer',
				description: 'Moss singles to right field. Lane scores.',
				runsScored: 1,
			}),
		];

		const half = simulateHalfInning(plays, { ...options(10, 'bottom'), ghostRunnerId: 'Lane' });

		expect(attributeRuns(half.records, earnedOnly).attributions).toEqual([
			{
				runnerId: 'Lane',
				playIndex: 0,
				chargedPitcherId: 'Closer',
				earned: false,
				earnedForPitcher: false,
				isGhost: true,
				unearnedReason: 'ghostRunner',
			},
		]);
		expect(attributeRuns(half.records, { ghostRunsEarned: true }).earnedRuns).toBe(1);
	});

	it('should flag a split that depends on several errors', () => {
		const play = (batterId: string, description: string, extra: Partial<RawPlay> = {}) =>
			rawPlay({ inning: 2, half: 'top', batterId, pitcherId: 'Starter', description, ...extra });
		const plays = [
			play('Ames', 'Ames reaches on a fielding error by third baseman Kim.'),
			play('Baker', 'Baker reaches on a throwing error by shortstop Ortiz. Ames to 3rd.'),
			play('Cole', 'Cole singles to left field. Ames scores. Baker to 2nd.', { runsScored: 1 }),
		];

		const ledger = attributeRuns(simulateHalfInning(plays, options(2, 'top')).records, earnedOnly);

		expect(ledger.attributions.map((a) => a.unearnedReason)).toEqual(['reachedOnError']);
		expect(ledger.contested).toBe(true);
	});
});
