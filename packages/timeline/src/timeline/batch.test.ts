import { describe, it, expect, vi } from 'vitest';
import { processGames } from './batch.js';
import { createLogger } from '../logger.js';
import { gameInput, quietHalf, rawPlay } from '../test-fixtures.js';

function shortGame(gameId: string) {
	return gameInput(
		[
			...quietHalf(1, 'top', ['a1', 'a2', 'a3'], 'homeP'),
			rawPlay({ half: 'bottom', batterId: 'h1', pitcherId: 'awayP', description: 'h1 homers to left field.', runsScored: 1 }),
			...quietHalf(1, 'bottom', ['h2', 'h3', 'h4'], 'awayP'),
		],
		gameId
	);
}

function quietSink() {
	return { debug: vi.fn(), log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('processGames', () => {
	it('should report failed games without stopping the batch', () => {
		const sink = quietSink();
		const outcomes = processGames([shortGame('g1'), gameInput([], 'broken'), shortGame('g3')], {
			config: { regulationInnings: 1 },
			logger: createLogger('Batch', 'info', sink),
		});

		expect(outcomes.map((o) => o.ok)).toEqual([true, false, true]);
		const [first, broken] = outcomes;
		if (first.ok) expect(first.game.finalScore).toEqual({ away: 0, home: 1 });
		if (!broken.ok) {
			expect(broken.gameId).toBe('broken');
			expect(broken.error.message).toBe('Game broken: no plays');
		}
		expect(sink.error).toHaveBeenCalledWith('[Batch] Game broken failed: Game broken: no plays');
		expect(sink.log).toHaveBeenLastCalledWith('[Batch] Finished 3 games (2 ok, 1 failed)');
	});

	it('should keep outcomes in input order', () => {
		const outcomes = processGames([shortGame('g2'), shortGame('g1')], {
			config: { regulationInnings: 1 },
			logger: createLogger('Batch', 'info', quietSink()),
		});

		expect(outcomes.map((o) => (o.ok ? o.game.gameId : o.gameId))).toEqual(['g2', 'g1']);
	});

	it('should handle an empty list', () => {
		const sink = quietSink();
		expect(processGames([], { logger: createLogger('Batch', 'info', sink) })).toEqual([]);
		expect(sink.log).toHaveBeenLastCalledWith('[Batch] Finished 0 games (0 ok, 0 failed)');
	});
});
