/**
 * Builders for play feeds used across the test suites
 */

import type { GameInput, GameMetadata, Half, PlayEvent, PlayEventFields, PlayTemplate, RawPlay } from './types.js';

export function rawPlay(fields: Partial<RawPlay> & Pick<RawPlay, 'description'>): RawPlay {
	return {
		inning: 1,
		half: 'top',
		batterId: 'batter',
		pitcherId: 'pitcher',
		pitches: [],
		runsScored: 0,
		outsRecorded: 0,
		winProbabilityBefore: 0.5,
		winProbabilityAfter: 0.5,
		...fields,
	};
}

export function strikeout(inning: number, half: Half, batterId: string, pitcherId: string): RawPlay {
	return rawPlay({
		inning,
		half,
		batterId,
		pitcherId,
		description: `${batterId} strikes out swinging.`,
		pitches: ['strike', 'strike', 'strike'],
		outsRecorded: 1,
	});
}

/** Three strikeouts in a row */
export function quietHalf(inning: number, half: Half, batters: readonly string[], pitcherId: string): RawPlay[] {
	return batters.slice(0, 3).map((batterId) => strikeout(inning, half, batterId, pitcherId));
}

export function metadata(gameId = 'g1', extra: Partial<GameMetadata> = {}): GameMetadata {
	return {
		gameId,
		teams: { away: { id: 'AWY', name: 'Visitors' }, home: { id: 'HOM', name: 'Hosts' } },
		...extra,
	};
}

export function gameInput(plays: RawPlay[], gameId = 'g1', extra: Partial<GameMetadata> = {}): GameInput {
	return { metadata: metadata(gameId, extra), plays };
}

/** Play event with neutral defaults, for driving the simulator directly */
export function playEvent(template: PlayTemplate, fields: Partial<PlayEventFields> = {}): PlayEvent {
	return {
		...template,
		batterId: 'batter',
		fielders: [],
		movements: [],
		batter: { reached: null, retired: false, onError: false },
		outs: 0,
		rbi: 0,
		errors: 0,
		errorPreventedOuts: 0,
		cleanOuts: true,
		notation: '',
		ruleId: 'test',
		confidence: 1,
		...fields,
	};
}
