import { describe, it, expect } from 'vitest';
import { parseGameInput } from './schema.js';
import { formatInningLabel, parseInningLabel } from './innings.js';
import { buildNameIndex, displayName } from './names.js';
import { GameInputError } from '../errors.js';
import { metadata } from '../test-fixtures.js';

const basePlay = {
	batterId: 'Ames',
	pitcherId: 'Starter',
	description: 'Ames walks.',
	winProbabilityBefore: 0.5,
	winProbabilityAfter: 0.52,
};

describe('parseInningLabel', () => {
	it('should read the common label forms', () => {
		expect(parseInningLabel('Top of the 3rd')).toEqual({ inning: 3, half: 'top' });
		expect(parseInningLabel('bot 9')).toEqual({ inning: 9, half: 'bottom' });
		expect(parseInningLabel('Bottom 1st')).toEqual({ inning: 1, half: 'bottom' });
		expect(parseInningLabel('b10')).toEqual({ inning: 10, half: 'bottom' });
	});

	it('should reject anything else', () => {
		expect(parseInningLabel('middle 4')).toBeNull();
		expect(parseInningLabel('t0')).toBeNull();
	});

	it('should format short labels', () => {
		expect(formatInningLabel(3, 'top')).toBe('t3');
		expect(formatInningLabel(10, 'bottom')).toBe('b10');
	});
});

describe('parseGameInput', () => {
	it('should fill defaults and resolve inning labels and pitch codes', () => {
		const input = parseGameInput({
			metadata: { ...metadata('g7'), umpire: 'Kim' },
			plays: [{ ...basePlay, inningLabel: 'Top of the 3rd', pitches: ['B', 'X', 'foul'] }],
		});

		expect(input.plays).toEqual([
			{
				inning: 3,
				half: 'top',
				batterId: 'Ames',
				pitcherId: 'Starter',
				description: 'Ames walks.',
				pitches: ['ball', 'inPlay', 'foul'],
				runsScored: 0,
				outsRecorded: 0,
				winProbabilityBefore: 0.5,
				winProbabilityAfter: 0.52,
			},
		]);
		expect(input.metadata.gameId).toBe('g7');
		expect(input.metadata.umpire).toBe('Kim');
	});

	it('should prefer explicit inning and half over the label', () => {
		const input = parseGameInput({
			metadata: metadata(),
			plays: [{ ...basePlay, inning: 2, half: 'bottom', inningLabel: 'Top of the 3rd' }],
		});

		expect(input.plays[0].inning).toBe(2);
		expect(input.plays[0].half).toBe('bottom');
	});

	it('should list every problem with its path', () => {
		let caught: unknown;
		try {
			parseGameInput({
				metadata: metadata(),
				plays: [basePlay, { ...basePlay, inning: 1, half: 'top', winProbabilityAfter: 1.5 }],
			});
		} catch (error) {
			caught = error;
		}

		expect(caught).toBeInstanceOf(GameInputError);
		if (caught instanceof GameInputError) {
			expect(caught.issues).toEqual([
				'plays.0: Play needs inning and half, or an inningLabel',
				'plays.1.winProbabilityAfter: Number must be less than or equal to 1',
			]);
		}
	});

	it('should report an unreadable label', () => {
		expect(() =>
			parseGameInput({ metadata: metadata(), plays: [{ ...basePlay, inningLabel: 'seventh stretch' }] })
		).toThrow('Invalid game input: plays.0: Unreadable inning label "seventh stretch"');
	});
});

describe('Name index', () => {
	it('should let lineup names win over roster names', () => {
		const names = buildNameIndex(
			metadata('g1', {
				roster: [
					{ playerId: 'p1', name: 'Roster Name' },
					{ playerId: 'p2', name: 'Bench Player' },
				],
				lineups: { away: [{ playerId: 'p1', name: 'Lineup Name' }], home: [] },
			})
		);

		expect(displayName(names, 'p1')).toBe('Lineup Name');
		expect(displayName(names, 'p2')).toBe('Bench Player');
		expect(displayName(names, 'p3')).toBe('p3');
		expect(displayName(undefined, 'p3')).toBe('p3');
	});
});
