/**
 * Linescore, pitching lines and batting lines
 */

import type {
	BattingLine,
	GameMetadata,
	HalfInning,
	LineScoreRow,
	PitcherId,
	PitchingLine,
	PlayerId,
	TeamSide,
} from '../types.js';
import { isAtBat, isHit, isPlateAppearance } from '../state-machine/outcome-types.js';

/**
 * Innings pitched in baseball notation: 17 outs -> "5.2"
 */
export function formatInningsPitched(outs: number): string {
	return `${Math.floor(outs / 3)}.${outs % 3}`;
}

export function buildLinescore(
	halfInnings: readonly HalfInning[],
	metadata: GameMetadata
): Record<TeamSide, LineScoreRow> {
	const innings = Math.max(0, ...halfInnings.map((h) => h.inning));

	const row = (side: TeamSide): LineScoreRow => {
		const batting = halfInnings.filter((h) => h.battingSide === side);
		const fielding = halfInnings.filter((h) => h.fieldingSide === side);

		const runsByInning: (number | null)[] = [];
		const cumulativeRuns: number[] = [];
		let total = 0;
		for (let inning = 1; inning <= innings; inning++) {
			const half = batting.find((h) => h.inning === inning);
			runsByInning.push(half ? half.runs : null);
			total += half?.runs ?? 0;
			cumulativeRuns.push(total);
		}

		return {
			side,
			teamId: metadata.teams[side].id,
			runsByInning,
			cumulativeRuns,
			runs: total,
			hits: batting.reduce((sum, h) => sum + h.hits, 0),
			errors: fielding.reduce((sum, h) => sum + h.errors, 0),
			leftOnBase: batting.reduce((sum, h) => sum + h.leftOnBase, 0),
		};
	};

	return { away: row('away'), home: row('home') };
}

interface MutablePitchingLine {
	pitcherId: PitcherId;
	side: TeamSide;
	battersFaced: number;
	outsRecorded: number;
	pitches: number;
	hits: number;
	walks: number;
	strikeouts: number;
	homeRuns: number;
	runs: number;
	earnedRuns: number;
}

/**
 * Pitching lines in order of appearance. Runs are charged per the ledger:
 * inherited runners count against the pitcher who put them on.
 */
export function buildPitchingLines(halfInnings: readonly HalfInning[]): PitchingLine[] {
	const lines = new Map<PitcherId, MutablePitchingLine>();
	const lineFor = (pitcherId: PitcherId, side: TeamSide): MutablePitchingLine => {
		let line = lines.get(pitcherId);
		if (!line) {
			line = {
				pitcherId,
				side,
				battersFaced: 0,
				outsRecorded: 0,
				pitches: 0,
				hits: 0,
				walks: 0,
				strikeouts: 0,
				homeRuns: 0,
				runs: 0,
				earnedRuns: 0,
			};
			lines.set(pitcherId, line);
		}
		return line;
	};

	for (const half of halfInnings) {
		for (const record of half.plays) {
			const line = lineFor(record.pitcherId, half.fieldingSide);
			const kind = record.event.kind;
			if (isPlateAppearance(kind)) line.battersFaced++;
			line.outsRecorded += record.outsAfter - record.outsBefore;
			line.pitches += record.pitches.length;
			if (isHit(kind)) line.hits++;
			if (kind === 'walk') line.walks++;
			if (kind === 'strikeout') line.strikeouts++;
			if (kind === 'homeRun') line.homeRuns++;
		}
		for (const attribution of half.runAttributions) {
			const line = lineFor(attribution.chargedPitcherId, half.fieldingSide);
			line.runs++;
			if (attribution.earnedForPitcher) line.earnedRuns++;
		}
	}

	return [...lines.values()].map((line) => ({
		...line,
		inningsPitched: formatInningsPitched(line.outsRecorded),
	}));
}

type MutableBattingLine = { -readonly [K in keyof BattingLine]: BattingLine[K] };

function emptyBattingLine(batterId: PlayerId, side: TeamSide): MutableBattingLine {
	return {
		batterId,
		side,
		plateAppearances: 0,
		atBats: 0,
		runs: 0,
		hits: 0,
		doubles: 0,
		triples: 0,
		homeRuns: 0,
		rbi: 0,
		walks: 0,
		strikeouts: 0,
	};
}

/**
 * Batting lines in order of first appearance. Placeholder extra-inning
 * runners who never batted get no line.
 */
export function buildBattingLines(halfInnings: readonly HalfInning[]): BattingLine[] {
	const lines = new Map<PlayerId, MutableBattingLine>();

	for (const half of halfInnings) {
		for (const record of half.plays) {
			const kind = record.event.kind;
			if (isPlateAppearance(kind)) {
				let line = lines.get(record.batterId);
				if (!line) {
					line = emptyBattingLine(record.batterId, half.battingSide);
					lines.set(record.batterId, line);
				}
				line.plateAppearances++;
				if (isAtBat(kind)) line.atBats++;
				if (isHit(kind)) line.hits++;
				if (kind === 'double') line.doubles++;
				if (kind === 'triple') line.triples++;
				if (kind === 'homeRun') line.homeRuns++;
				if (kind === 'walk') line.walks++;
				if (kind === 'strikeout') line.strikeouts++;
				line.rbi += record.event.rbi;
			}

			for (const scored of record.scorers) {
				let line = lines.get(scored.runner.playerId);
				if (!line) {
					if (scored.runner.isGhost) continue;
					line = emptyBattingLine(scored.runner.playerId, half.battingSide);
					lines.set(scored.runner.playerId, line);
				}
				line.runs++;
			}
		}
	}

	return [...lines.values()];
}
