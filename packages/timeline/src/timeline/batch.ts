/**
 * Batch processing: many games, one at a time
 *
 * Each game is independent; a game that fails is reported and the rest
 * carry on.
 */

import type { Game, GameInput } from '../types.js';
import type { ScorebookConfig } from '../config.js';
import { resolveConfig } from '../config.js';
import type { Logger } from '../logger.js';
import { createLogger } from '../logger.js';
import { processGame } from './pipeline.js';

export type GameOutcome =
	| { readonly ok: true; readonly game: Game }
	| { readonly ok: false; readonly gameId: string; readonly error: Error };

export interface ProcessGamesOptions {
	config?: Partial<ScorebookConfig>;
	logger?: Logger;
}

/**
 * Process every game in input order; outcomes line up with `inputs`
 */
export function processGames(inputs: readonly GameInput[], options: ProcessGamesOptions = {}): GameOutcome[] {
	const overrides = options.config ?? {};
	const config = resolveConfig(overrides);
	const logger = options.logger ?? createLogger('Batch', config.logLevel);

	logger.info(`Processing ${inputs.length} games`);

	const outcomes = inputs.map((input): GameOutcome => {
		try {
			return { ok: true, game: processGame(input, overrides, { logger }) };
		} catch (error) {
			const failure = error instanceof Error ? error : new Error(String(error));
			logger.error(`Game ${input.metadata.gameId} failed: ${failure.message}`);
			return { ok: false, gameId: input.metadata.gameId, error: failure };
		}
	});

	const failed = outcomes.filter((o) => !o.ok).length;
	logger.info(`Finished ${inputs.length} games (${inputs.length - failed} ok, ${failed} failed)`);
	return outcomes;
}
