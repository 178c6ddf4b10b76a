/**
 * Default runner advancement per play template
 */

import type { PlayTemplate } from '../../types.js';
import type { AdvancementContext, DefaultAdvancement } from './types.js';
import { BATTER_OUT, holdAll } from './types.js';
import { handleHit } from './hit.js';
import { handleAwardedBase } from './walk.js';
import { handleGroundOut } from './ground-out.js';
import { handleFlyOut } from './fly-out.js';
import { handleSacrificeBunt, handleSacrificeFly } from './sacrifice.js';
import { handleFieldersChoice } from './fielders-choice.js';
import { handleMultipleOutPlay } from './double-play.js';
import { handleReachedOnError } from './reached-on-error.js';
import { handleRunnerEvent } from './runner-event.js';

export type { AdvancementContext, DefaultAdvancement, RunnerTarget, RunnerTargets } from './types.js';

export function defaultAdvancement(template: PlayTemplate, context: AdvancementContext): DefaultAdvancement {
	switch (template.kind) {
		case 'single':
		case 'double':
		case 'triple':
		case 'homeRun':
			return handleHit(context.bases, template.kind);

		case 'walk':
		case 'hitByPitch':
		case 'catcherInterference':
			return handleAwardedBase(context.bases, template.kind);

		case 'strikeout':
		case 'genericOut':
			return { targets: holdAll(context.bases), batter: BATTER_OUT };

		case 'groundOut':
			return handleGroundOut(context);
		case 'flyOut':
			return handleFlyOut(context, template.trajectory);

		case 'sacrificeFly':
			return handleSacrificeFly(context.bases);
		case 'sacrificeBunt':
			return handleSacrificeBunt(context.bases);

		case 'fieldersChoice':
			return handleFieldersChoice(context);
		case 'doublePlay':
			return handleMultipleOutPlay(context, 2, template.trajectory);
		case 'triplePlay':
			return handleMultipleOutPlay(context, 3, template.trajectory);

		case 'reachedOnError':
			return handleReachedOnError(context.bases);

		case 'stolenBase':
		case 'caughtStealing':
		case 'wildPitch':
		case 'passedBall':
		case 'balk':
			return handleRunnerEvent(context.bases, template.kind);

		default: {
			const _exhaustive: never = template;
			return _exhaustive;
		}
	}
}
