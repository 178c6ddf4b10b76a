/**
 * Pipeline configuration
 */

import type { LogLevel } from './logger.js';

export interface ScorebookConfig {
	/** Innings in a regulation game; extra innings start after this */
	regulationInnings: number;
	/** Minimum absolute win-probability swing for a key play (0-1) */
	keyPlayThreshold: number;
	/** Place a runner on second at the start of extra half-innings */
	extraInningRunner: boolean;
	/** Whether a run scored by the extra-inning runner can be earned */
	ghostRunsEarned: boolean;
	/** Rules matching below this confidence fall back to a generic out */
	minRuleConfidence: number;
	logLevel: LogLevel;
}

export const DEFAULT_CONFIG: Readonly<ScorebookConfig> = {
	regulationInnings: 9,
	keyPlayThreshold: 0.1,
	extraInningRunner: true,
	ghostRunsEarned: false,
	minRuleConfidence: 0.5,
	logLevel: 'info',
};

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

/**
 * Merge overrides onto the defaults and validate the result
 */
export function resolveConfig(overrides: Partial<ScorebookConfig> = {}): ScorebookConfig {
	const config: ScorebookConfig = { ...DEFAULT_CONFIG, ...overrides };

	if (!Number.isInteger(config.regulationInnings) || config.regulationInnings < 1) {
		throw new Error(`regulationInnings must be a positive integer, got ${config.regulationInnings}`);
	}
	if (!(config.keyPlayThreshold > 0 && config.keyPlayThreshold <= 1)) {
		throw new Error(`keyPlayThreshold must be in (0, 1], got ${config.keyPlayThreshold}`);
	}
	if (!(config.minRuleConfidence >= 0 && config.minRuleConfidence <= 1)) {
		throw new Error(`minRuleConfidence must be in [0, 1], got ${config.minRuleConfidence}`);
	}
	if (!LOG_LEVELS.includes(config.logLevel)) {
		throw new Error(`logLevel must be one of ${LOG_LEVELS.join(', ')}, got ${config.logLevel}`);
	}

	return config;
}
