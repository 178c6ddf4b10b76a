/**
 * Whole-game pipeline tests
 */

import { describe, it, expect, vi } from 'vitest';
import { processGame } from './pipeline.js';
import { createLogger } from '../logger.js';
import { parseGameInput } from '../input/schema.js';
import { gameInput, metadata, quietHalf, rawPlay } from '../test-fixtures.js';
import type { GameInput, RawPlay } from '../types.js';

const AWAY = ['a1', 'a2', 'a3', 'a4', 'a5', 'a6', 'a7', 'a8', 'a9'];
const HOME = ['h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'h7', 'h8', 'h9'];
const HOME_NAMES: Record<string, string> = { h1: 'Moss', h9: 'Lane' };

/** The three batters due up in an inning when every half-inning goes down in order */
function dueUp(lineup: readonly string[], inning: number): string[] {
	const start = ((inning - 1) * 3) % lineup.length;
	return [0, 1, 2].map((k) => lineup[(start + k) % lineup.length]);
}

/** Scoreless through nine, away team retired in the tenth, home team walks off */
function extraInningWalkOff(): GameInput {
	const plays: RawPlay[] = [];
	for (let inning = 1; inning <= 9; inning++) {
		plays.push(...quietHalf(inning, 'top', dueUp(AWAY, inning), 'homeP'));
		plays.push(...quietHalf(inning, 'bottom', dueUp(HOME, inning), 'awayP'));
	}
	plays.push(...quietHalf(10, 'top', dueUp(AWAY, 10), 'homeP'));
	plays.push(
		rawPlay({
			inning: 10,
			half: 'bottom',
			batterId: 'h1',
			pitcherId: 'awayP',
			description: 'Moss singles to right field. Lane scores.',
			pitches: ['inPlay'],
			runsScored: 1,
			winProbabilityBefore: 0.7,
			winProbabilityAfter: 1,
		})
	);

	return gameInput(plays, 'g10', {
		lineups: {
			away: AWAY.map((playerId) => ({ playerId, name: playerId })),
			home: HOME.map((playerId) => ({ playerId, name: HOME_NAMES[playerId] ?? playerId })),
		},
	});
}

describe('processGame', () => {
	describe('extra-inning walk-off', () => {
		const game = processGame(extraInningWalkOff(), { logLevel: 'silent' });

		it('should end the game when the home team goes ahead in the tenth', () => {
			expect(game.innings).toHaveLength(10);
			expect(game.finalScore).toEqual({ away: 0, home: 1 });
			expect(game.winner).toBe('home');
			expect(game.anomalies).toEqual([]);
		});

		it("should start each extra half-inning with the team's last batter on second", () => {
			expect(game.innings[9].top.ghostRunner?.playerId).toBe('a9');
			expect(game.innings[9].top.leftOnBase).toBe(1);
			expect(game.innings[9].bottom?.ghostRunner?.playerId).toBe('h9');
		});

		it('should charge the unearned run to the pitcher in the tenth', () => {
			expect(game.innings[9].bottom?.runAttributions).toEqual([
				{
					runnerId: 'h9',
					playIndex: 0,
					chargedPitcherId: 'awayP',
					earned: false,
					earnedForPitcher: false,
					isGhost: true,
					unearnedReason: 'ghostRunner',
				},
			]);
			expect(game.pitching.map((line) => [line.pitcherId, line.inningsPitched, line.runs, line.earnedRuns])).toEqual([
				['homeP', '10.0', 0, 0],
				['awayP', '9.0', 1, 0],
			]);
		});

		it('should fill the linescore through the tenth', () => {
			expect(game.linescore.home.runsByInning).toEqual([0, 0, 0, 0, 0, 0, 0, 0, 0, 1]);
			expect(game.linescore.away.runsByInning).toEqual([0, 0, 0, 0, 0, 0, 0, 0, 0, 0]);
			expect(game.linescore.home.leftOnBase).toBe(1);
			expect(game.linescore.away.leftOnBase).toBe(1);
			expect(game.linescore.home.hits).toBe(1);
		});

		it('should credit the scoring runner and the batter', () => {
			const lane = game.batting.find((line) => line.batterId === 'h9');
			const moss = game.batting.find((line) => line.batterId === 'h1');
			expect(lane?.runs).toBe(1);
			expect(lane?.plateAppearances).toBe(3);
			expect(moss).toMatchObject({ plateAppearances: 4, atBats: 4, hits: 1, rbi: 1, strikeouts: 3 });
		});

		it('should keep the walk-off as the only key play', () => {
			expect(game.keyPlays.map((k) => [k.inning, k.half, k.batterId, k.notation])).toEqual([[10, 'bottom', 'h1', '1B']]);
		});
	});

	it('should give the same game for the same input', () => {
		const input = extraInningWalkOff();
		expect(processGame(input, { logLevel: 'silent' })).toEqual(processGame(input, { logLevel: 'silent' }));
	});

	it('should run on input parsed from JSON', () => {
		const json: unknown = JSON.parse(JSON.stringify(extraInningWalkOff()));
		const game = processGame(parseGameInput(json), { logLevel: 'silent' });
		expect(game.finalScore).toEqual({ away: 0, home: 1 });
	});

	it('should log anomalies and a summary line', () => {
		const sink = { debug: vi.fn(), log: vi.fn(), warn: vi.fn(), error: vi.fn() };
		const plays = [
			rawPlay({ batterId: 'a1', pitcherId: 'homeP', description: 'Something odd happened.', outsRecorded: 1 }),
			...quietHalf(1, 'top', ['a2', 'a3'], 'homeP'),
			rawPlay({
				half: 'bottom',
				batterId: 'h1',
				pitcherId: 'awayP',
				description: 'h1 homers to center field.',
				runsScored: 1,
			}),
			...quietHalf(1, 'bottom', ['h2', 'h3', 'h4'], 'awayP'),
		];

		processGame({ metadata: metadata('g2'), plays }, { regulationInnings: 1 }, {
			logger: createLogger('Timeline', 'info', sink),
		});

		expect(sink.warn).toHaveBeenCalledWith(
			'[Timeline] Game g2: UnrecognizedPlayPattern - t1 #1: Unrecognized play -> "Something odd happened." ' +
				'(Treated as a generic out with no runner advancement)'
		);
		expect(sink.log).toHaveBeenCalledWith(
			'[Timeline] Assembled game g2: AWY 0, HOM 1 (1 innings, 0 key plays, 1 anomalies)'
		);
		expect(sink.debug).not.toHaveBeenCalled();
	});
});
