/**
 * Play normalizer tests: description + base state -> play event
 */

import { describe, it, expect } from 'vitest';
import { FALLBACK_RULE_ID, normalize, normalizeText } from './normalize.js';
import { EMPTY_BASES, createBaseState, createRunner } from '../state-machine/state.js';
import { rawPlay } from '../test-fixtures.js';
import type { BaseState, PlayEvent, RawPlay } from '../types.js';

function run(raw: RawPlay, outsBefore = 0, basesBefore: BaseState = EMPTY_BASES): PlayEvent {
	const result = normalize(raw, { outsBefore, basesBefore });
	if (!result.ok) throw result.error;
	return result.event;
}

describe('normalize', () => {
	it('should collapse whitespace', () => {
		expect(normalizeText('  Ames \n walks.  ')).toBe('Ames walks.');
	});

	it('should put a walked batter on first', () => {
		const event = run(rawPlay({ batterId: 'Ames', description: 'Ames walks.' }));

		expect(event.kind).toBe('walk');
		expect(event.notation).toBe('BB');
		expect(event.batter).toEqual({ reached: 'first', retired: false, onError: false });
		expect(event.outs).toBe(0);
		expect(event.ruleId).toBe('walk');
		expect(event.confidence).toBe(0.85);
	});

	it('should read shorthand ground outs with their fielders', () => {
		const event = run(rawPlay({ description: 'GO6-3', outsRecorded: 1 }));

		expect(event.kind).toBe('groundOut');
		expect(event.fielders).toEqual([6, 3]);
		expect(event.notation).toBe('GO6-3');
		expect(event.outs).toBe(1);
		expect(event.confidence).toBe(0.7);
	});

	it('should resolve a double play with the runner named in the text', () => {
		const bases = createBaseState([createRunner('Ames', 'p1', 'first')]);
		const event = run(
			rawPlay({
				batterId: 'Baker',
				description:
					'Baker grounds into a double play, shortstop Ortiz to second baseman Kim to first baseman Lee. Ames out at 2nd.',
				outsRecorded: 2,
			}),
			0,
			bases
		);

		expect(event.kind).toBe('doublePlay');
		expect(event.notation).toBe('DP6-4-3');
		expect(event.outs).toBe(2);
		expect(event.movements).toEqual([{ runnerId: 'Ames', from: 'first', to: 'out', onError: false, explicit: true }]);
		expect(event.batter.retired).toBe(true);
		expect(event.rbi).toBe(0);
	});

	it('should credit a sacrifice fly with the run batted in', () => {
		const bases = createBaseState([createRunner('Ames', 'p1', 'third')]);
		const event = run(
			rawPlay({
				batterId: 'Cole',
				description: 'Cole hits a sacrifice fly to center fielder Ortiz. Ames scores.',
				runsScored: 1,
				outsRecorded: 1,
			}),
			1,
			bases
		);

		expect(event.kind).toBe('sacrificeFly');
		expect(event.notation).toBe('SF8');
		expect(event.movements).toEqual([{ runnerId: 'Ames', from: 'third', to: 'home', onError: false, explicit: true }]);
		expect(event.rbi).toBe(1);
	});

	it('should hold an inferred scorer at third when the feed reports no run', () => {
		const bases = createBaseState([createRunner('Ames', 'p1', 'second')]);
		const event = run(rawPlay({ batterId: 'Baker', description: 'Baker singles to center field.' }), 0, bases);

		expect(event.movements).toEqual([{ runnerId: 'Ames', from: 'second', to: 'third', onError: false, explicit: false }]);
		expect(event.rbi).toBe(0);
	});

	it('should send inferred runners home to match the reported runs', () => {
		const bases = createBaseState([createRunner('Ames', 'p1', 'first')]);
		const event = run(
			rawPlay({ batterId: 'Baker', description: 'Baker doubles to left field.', runsScored: 1 }),
			0,
			bases
		);

		expect(event.movements).toEqual([{ runnerId: 'Ames', from: 'first', to: 'home', onError: false, explicit: false }]);
		expect(event.batter.reached).toBe('second');
		expect(event.rbi).toBe(1);
	});

	it('should apply a later clause about the batter', () => {
		const event = run(
			rawPlay({
				batterId: 'Baker',
				description: 'Baker singles to left field. Baker to 2nd on throwing error by left fielder Ortiz.',
			})
		);

		expect(event.kind).toBe('single');
		expect(event.batter).toEqual({ reached: 'second', retired: false, onError: true });
		expect(event.errors).toBe(1);
		expect(event.cleanOuts).toBe(false);
	});

	it('should charge an error and a prevented out on a reached-on-error', () => {
		const event = run(
			rawPlay({ batterId: 'Cole', description: 'Cole reaches on a throwing error by shortstop Ortiz.' }),
			2
		);

		expect(event.kind).toBe('reachedOnError');
		expect(event.notation).toBe('E6');
		expect(event.batter).toEqual({ reached: 'first', retired: false, onError: true });
		expect(event.errors).toBe(1);
		expect(event.errorPreventedOuts).toBe(1);
		expect(event.rbi).toBe(0);
	});

	it('should give no run batted in when the third out cancels the run', () => {
		const bases = createBaseState([createRunner('Ames', 'p1', 'third')]);
		const event = run(
			rawPlay({ batterId: 'Baker', description: 'Baker grounds out to second baseman Kim. Ames scores.' }),
			2,
			bases
		);

		expect(event.notation).toBe('GO4U');
		expect(event.rbi).toBe(0);
		expect(event.outs).toBe(1);
	});

	it('should use display names to find runners', () => {
		const bases = createBaseState([createRunner('p-17', 'p1', 'third')]);
		const result = normalize(
			rawPlay({ batterId: 'p-22', description: 'Baker hits a sacrifice fly. Ames scores.', runsScored: 1 }),
			{ outsBefore: 0, basesBefore: bases, names: new Map([['p-17', 'Ames'], ['p-22', 'Baker']]) }
		);

		expect(result.ok).toBe(true);
		expect(result.event.movements.map((m) => m.runnerId)).toEqual(['p-17']);
	});

	describe('unrecognized plays', () => {
		it('should fall back to a generic out', () => {
			const result = normalize(rawPlay({ description: 'Something odd happened.' }), {
				outsBefore: 0,
				basesBefore: createBaseState([createRunner('Ames', 'p1', 'second')]),
			});

			expect(result.ok).toBe(false);
			expect(result.event.kind).toBe('genericOut');
			expect(result.event.ruleId).toBe(FALLBACK_RULE_ID);
			expect(result.event.confidence).toBe(0);
			expect(result.event.outs).toBe(1);
			expect(result.event.movements).toEqual([]);
			expect(result.event.notation).toBe('-');
			if (!result.ok) {
				expect(result.error.message).toBe('Unrecognized play -> "Something odd happened."');
				expect(result.error.bestCandidate).toBeNull();
			}
		});

		it('should name the closest rule below the threshold', () => {
			const result = normalize(rawPlay({ batterId: 'Ames', description: 'Ames is out.' }), {
				outsBefore: 0,
				basesBefore: EMPTY_BASES,
			});

			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error.bestCandidate).toEqual({ ruleId: 'loose-out', confidence: 0.35 });
			}
		});

		it('should accept loose rules under a lower threshold', () => {
			const result = normalize(
				rawPlay({ batterId: 'Ames', description: 'Ames is out.' }),
				{ outsBefore: 0, basesBefore: EMPTY_BASES },
				{ minRuleConfidence: 0.3 }
			);

			expect(result.ok).toBe(true);
			expect(result.event.ruleId).toBe('loose-out');
		});
	});

	it('should give the same event for the same input', () => {
		const bases = createBaseState([createRunner('Ames', 'p1', 'first'), createRunner('Kim', 'p1', 'third')]);
		const raw = rawPlay({ batterId: 'Baker', description: 'Baker singles to right field. Kim scores.', runsScored: 1 });

		expect(run(raw, 1, bases)).toEqual(run(raw, 1, bases));
	});
});
