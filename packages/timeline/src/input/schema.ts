/**
 * Validation of the play feed boundary
 */

import { z } from 'zod';
import type { GameInput, PitchTag, RawPlay } from '../types.js';
import { GameInputError } from '../errors.js';
import { parseInningLabel } from './innings.js';

/** Single-letter pitch codes used by some feeds */
const PITCH_CODES: Record<'B' | 'C' | 'S' | 'F' | 'T' | 'X', PitchTag> = {
	B: 'ball',
	C: 'strike',
	S: 'strike',
	F: 'foul',
	T: 'strike',
	X: 'inPlay',
};

export const PitchTagSchema = z.union([
	z.enum(['ball', 'strike', 'foul', 'inPlay']),
	z.enum(['B', 'C', 'S', 'F', 'T', 'X']).transform((code): PitchTag => PITCH_CODES[code]),
]);

const WinProbabilitySchema = z.number().min(0).max(1);

export const RawPlaySchema = z
	.object({
		inning: z.number().int().positive().optional(),
		half: z.enum(['top', 'bottom']).optional(),
		inningLabel: z.string().optional(),
		batterId: z.string().min(1),
		pitcherId: z.string().min(1),
		description: z.string(),
		pitches: z.array(PitchTagSchema).default([]),
		runsScored: z.number().int().min(0).default(0),
		outsRecorded: z.number().int().min(0).max(3).default(0),
		winProbabilityBefore: WinProbabilitySchema,
		winProbabilityAfter: WinProbabilitySchema,
	})
	.transform((play, ctx): RawPlay => {
		let inning = play.inning;
		let half = play.half;
		if ((inning === undefined || half === undefined) && play.inningLabel !== undefined) {
			const parsed = parseInningLabel(play.inningLabel);
			if (parsed) {
				inning = inning ?? parsed.inning;
				half = half ?? parsed.half;
			}
		}
		if (inning === undefined || half === undefined) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: play.inningLabel
					? `Unreadable inning label "${play.inningLabel}"`
					: 'Play needs inning and half, or an inningLabel',
			});
			return z.NEVER;
		}
		return {
			inning,
			half,
			batterId: play.batterId,
			pitcherId: play.pitcherId,
			description: play.description,
			pitches: play.pitches,
			runsScored: play.runsScored,
			outsRecorded: play.outsRecorded,
			winProbabilityBefore: play.winProbabilityBefore,
			winProbabilityAfter: play.winProbabilityAfter,
		};
	});

const TeamSchema = z.object({
	id: z.string().min(1),
	name: z.string().optional(),
});

const LineupEntrySchema = z.object({
	playerId: z.string().min(1),
	name: z.string(),
	position: z.string().optional(),
});

const RosterEntrySchema = z.object({
	playerId: z.string().min(1),
	name: z.string(),
});

/**
 * Game-level metadata; anything beyond the known fields is kept as-is
 */
export const GameMetadataSchema = z
	.object({
		gameId: z.string().min(1),
		date: z.string().optional(),
		venue: z.string().optional(),
		weather: z.string().optional(),
		attendance: z.number().int().nonnegative().optional(),
		teams: z.object({ away: TeamSchema, home: TeamSchema }),
		lineups: z
			.object({
				away: z.array(LineupEntrySchema),
				home: z.array(LineupEntrySchema),
			})
			.optional(),
		startingPitchers: z.object({ away: z.string(), home: z.string() }).optional(),
		roster: z.array(RosterEntrySchema).optional(),
	})
	.passthrough();

export type GameMetadata = z.infer<typeof GameMetadataSchema>;

export const GameInputSchema = z.object({
	metadata: GameMetadataSchema,
	plays: z.array(RawPlaySchema),
});

/**
 * Validate untrusted JSON into a GameInput
 */
export function parseGameInput(value: unknown): GameInput {
	const result = GameInputSchema.safeParse(value);
	if (!result.success) {
		throw new GameInputError(
			result.error.issues.map((issue) => {
				const path = issue.path.join('.');
				return path ? `${path}: ${issue.message}` : issue.message;
			})
		);
	}
	return result.data;
}
