/**
 * Whole-game pipeline: play stream -> Game
 */

import type { Game, GameInput } from '../types.js';
import type { ScorebookConfig } from '../config.js';
import { resolveConfig } from '../config.js';
import type { Logger } from '../logger.js';
import { createLogger } from '../logger.js';
import { buildNameIndex } from '../input/names.js';
import type { SimulatedHalfInning } from './half-inning.js';
import { simulateHalfInning } from './half-inning.js';
import { assembleGame, groupHalfInnings, lastBatterOf } from './assemble.js';

export interface ProcessGameOptions {
	logger?: Logger;
}

export function processGame(
	input: GameInput,
	overrides: Partial<ScorebookConfig> = {},
	options: ProcessGameOptions = {}
): Game {
	const config = resolveConfig(overrides);
	const logger = options.logger ?? createLogger('Timeline', config.logLevel);
	const gameId = input.metadata.gameId;
	const names = buildNameIndex(input.metadata);

	const groups = groupHalfInnings(gameId, input.plays);
	const halves: SimulatedHalfInning[] = groups.map((group, i) =>
		simulateHalfInning(group.plays, {
			inning: group.inning,
			half: group.half,
			regulationInnings: config.regulationInnings,
			extraInningRunner: config.extraInningRunner,
			keyPlayThreshold: config.keyPlayThreshold,
			minRuleConfidence: config.minRuleConfidence,
			names,
			// Same team's previous half-inning is two back
			ghostRunnerId: lastBatterOf(groups[i - 2]),
		})
	);
	logger.debug(`Game ${gameId}: simulated ${halves.length} half-innings from ${input.plays.length} plays`);

	const game = assembleGame(input, halves, config);

	for (const anomaly of game.anomalies) {
		logger.warn(`Game ${gameId}: ${anomaly.code} - ${anomaly.message} (${anomaly.recovery})`);
	}
	logger.info(
		`Assembled game ${gameId}: ${game.linescore.away.teamId} ${game.finalScore.away}, ` +
			`${game.linescore.home.teamId} ${game.finalScore.home} ` +
			`(${game.innings.length} innings, ${game.keyPlays.length} key plays, ${game.anomalies.length} anomalies)`
	);

	return game;
}
