import { describe, it, expect } from 'vitest';
import {
	EMPTY_BASES,
	baseFromNumber,
	isBasesEmpty,
	countRunners,
	createBaseState,
	createRunner,
	isForced,
	runnersLeadFirst,
} from './state.js';
import { fallbackGhostRunnerId, needsGhostRunner, placeGhostRunner } from './ghost-runner.js';
import { isAtBat, isPlateAppearance, negatesRunsOnThirdOut } from './outcome-types.js';

const first = createRunner('a', 'p1', 'first');
const second = createRunner('b', 'p1', 'second');
const third = createRunner('c', 'p2', 'third');

describe('Base state', () => {
	it('should count runners on base', () => {
		expect(countRunners(EMPTY_BASES)).toBe(0);
		expect(countRunners(createBaseState([first, third]))).toBe(2);
		expect(isBasesEmpty(EMPTY_BASES)).toBe(true);
		expect(isBasesEmpty(createBaseState([second]))).toBe(false);
	});

	it('should reject two runners on one base', () => {
		expect(() => createBaseState([first, createRunner('d', 'p1', 'first')])).toThrow('Two runners on first: a and d');
	});

	it('should list runners lead first', () => {
		const state = createBaseState([first, second, third]);
		expect(runnersLeadFirst(state).map((r) => r.playerId)).toEqual(['c', 'b', 'a']);
	});

	it('should know which runners are forced', () => {
		const firstAndThird = createBaseState([first, third]);
		expect(isForced(firstAndThird, 'first')).toBe(true);
		expect(isForced(firstAndThird, 'third')).toBe(false);
		expect(isForced(createBaseState([first, second, third]), 'third')).toBe(true);
		expect(isForced(createBaseState([second]), 'second')).toBe(false);
	});

	it('should clamp base numbers', () => {
		expect(baseFromNumber(0)).toBe('first');
		expect(baseFromNumber(3)).toBe('third');
		expect(baseFromNumber(5)).toBe('home');
	});
});

describe('Extra-inning runner', () => {
	it('should be placed only past regulation on empty bases', () => {
		expect(needsGhostRunner(10, 9, EMPTY_BASES)).toBe(true);
		expect(needsGhostRunner(9, 9, EMPTY_BASES)).toBe(false);
		expect(needsGhostRunner(10, 9, EMPTY_BASES, false)).toBe(false);
		expect(needsGhostRunner(10, 9, createBaseState([first]))).toBe(false);
	});

	it('should start on second charged to the given pitcher', () => {
		const { state, runner } = placeGhostRunner(EMPTY_BASES, 'lane', 'closer');
		expect(runner).toEqual({
			playerId: 'lane',
			responsiblePitcherId: 'closer',
			base: 'second',
			isGhost: true,
			reachedOnError: false,
		});
		expect(state.second).toBe(runner);
	});

	it('should fall back to a placeholder id', () => {
		expect(fallbackGhostRunnerId(10, 'bottom')).toBe('ghost-10b');
		expect(fallbackGhostRunnerId(11, 'top')).toBe('ghost-11t');
	});
});

describe('Play kinds', () => {
	it('should separate plate appearances from runner events', () => {
		expect(isPlateAppearance('walk')).toBe(true);
		expect(isPlateAppearance('stolenBase')).toBe(false);
		expect(isAtBat('walk')).toBe(false);
		expect(isAtBat('sacrificeFly')).toBe(false);
		expect(isAtBat('reachedOnError')).toBe(true);
	});

	it('should cancel runs on a third-out force but not on a hit', () => {
		expect(negatesRunsOnThirdOut('fieldersChoice')).toBe(true);
		expect(negatesRunsOnThirdOut('single')).toBe(false);
		expect(negatesRunsOnThirdOut('caughtStealing')).toBe(false);
	});
});
