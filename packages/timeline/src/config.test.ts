import { describe, it, expect, vi } from 'vitest';
import { DEFAULT_CONFIG, resolveConfig } from './config.js';
import { createLogger } from './logger.js';
import { GameInputError, IncompleteGameDataError, ScorebookError, UnrecognizedPlayPatternError } from './errors.js';

describe('resolveConfig', () => {
	it('should start from the defaults', () => {
		expect(resolveConfig()).toEqual({
			regulationInnings: 9,
			keyPlayThreshold: 0.1,
			extraInningRunner: true,
			ghostRunsEarned: false,
			minRuleConfidence: 0.5,
			logLevel: 'info',
		});
		expect(resolveConfig()).not.toBe(DEFAULT_CONFIG);
	});

	it('should apply overrides', () => {
		expect(resolveConfig({ regulationInnings: 7, ghostRunsEarned: true })).toMatchObject({
			regulationInnings: 7,
			ghostRunsEarned: true,
			keyPlayThreshold: 0.1,
		});
	});

	it('should reject values out of range', () => {
		expect(() => resolveConfig({ regulationInnings: 0 })).toThrow('regulationInnings must be a positive integer, got 0');
		expect(() => resolveConfig({ keyPlayThreshold: 0 })).toThrow('keyPlayThreshold must be in (0, 1], got 0');
		expect(() => resolveConfig({ minRuleConfidence: 1.5 })).toThrow('minRuleConfidence must be in [0, 1], got 1.5');
	});
});

describe('createLogger', () => {
	function sink() {
		return { debug: vi.fn(), log: vi.fn(), warn: vi.fn(), error: vi.fn() };
	}

	it('should prefix lines with the scope', () => {
		const out = sink();
		createLogger('Timeline', 'info', out).info('Assembled game g1', 42);
		expect(out.log).toHaveBeenCalledWith('[Timeline] Assembled game g1', 42);
	});

	it('should drop lines below the level', () => {
		const out = sink();
		const logger = createLogger('Batch', 'warn', out);
		logger.debug('hidden');
		logger.info('hidden');
		logger.warn('shown');
		logger.error('shown too');

		expect(out.debug).not.toHaveBeenCalled();
		expect(out.log).not.toHaveBeenCalled();
		expect(out.warn).toHaveBeenCalledWith('[Batch] shown');
		expect(out.error).toHaveBeenCalledWith('[Batch] shown too');
	});

	it('should stay quiet when silent', () => {
		const out = sink();
		createLogger('Batch', 'silent', out).error('nothing');
		expect(out.error).not.toHaveBeenCalled();
	});
});

describe('Errors', () => {
	it('should carry a code and the class name', () => {
		const error = new IncompleteGameDataError('g1', 'bottom half-inning is missing', 9, 'bottom');
		expect(error).toBeInstanceOf(ScorebookError);
		expect(error.name).toBe('IncompleteGameDataError');
		expect(error.code).toBe('IncompleteGameData');
		expect(error.message).toBe('Game g1: bottom half-inning is missing (bottom 9)');
	});

	it('should describe the closest rule for an unrecognized play', () => {
		const error = new UnrecognizedPlayPatternError('Ames is out.', { ruleId: 'loose-out', confidence: 0.35 });
		expect(error.message).toBe('Unrecognized play -> "Ames is out." (closest rule loose-out at confidence 0.35)');
	});

	it('should join input issues', () => {
		expect(new GameInputError(['a: bad', 'b: worse']).message).toBe('Invalid game input: a: bad; b: worse');
	});
});
