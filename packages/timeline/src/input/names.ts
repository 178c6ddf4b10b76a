/**
 * Player name index built from lineups and roster
 */

import type { GameMetadata, PlayerId } from '../types.js';

export type NameIndex = ReadonlyMap<PlayerId, string>;

export function buildNameIndex(metadata: GameMetadata): NameIndex {
	const names = new Map<PlayerId, string>();
	for (const entry of metadata.roster ?? []) {
		names.set(entry.playerId, entry.name);
	}
	// Lineup names win over roster names
	for (const entry of [...(metadata.lineups?.away ?? []), ...(metadata.lineups?.home ?? [])]) {
		names.set(entry.playerId, entry.name);
	}
	return names;
}

export function displayName(names: NameIndex | undefined, playerId: PlayerId): string {
	return names?.get(playerId) ?? playerId;
}
