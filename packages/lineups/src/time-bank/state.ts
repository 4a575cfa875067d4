/**
 * Time-bank state - who is on court, and every player's stint history
 */

import type { PlayerId, Rosters, Side, TeamId } from '../types.js';
import { SIDES } from '../types.js';

/**
 * Per-player court status. A player is either off court or on court
 * since a given game-time-remaining value.
 */
export type CourtStatus = { status: 'offCourt' } | { status: 'onCourt'; since: number };

export const OFF_COURT: CourtStatus = { status: 'offCourt' };

/**
 * Running record for one player.
 * While off court `checkIns` and `checkOuts` have equal length;
 * while on court `checkIns` is one longer.
 */
export interface PlayerTimeRecord {
	readonly playerId: PlayerId;
	readonly teamId: TeamId;
	readonly side: Side;
	playingTime: number;
	court: CourtStatus;
	readonly checkIns: number[];
	readonly checkOuts: number[];
	/** Period each closed stint belongs to, parallel to `checkOuts` */
	readonly periods: number[];
}

export interface TimeBankState {
	readonly rosters: Rosters;
	/** Period being played; advances on every period end */
	period: number;
	/** Insertion-ordered on-court sets */
	readonly onCourt: Record<Side, Set<PlayerId>>;
	/** Keyed by player id, in roster order (home first) */
	readonly records: Map<PlayerId, PlayerTimeRecord>;
}

export function createPlayerTimeRecord(playerId: PlayerId, teamId: TeamId, side: Side): PlayerTimeRecord {
	return {
		playerId,
		teamId,
		side,
		playingTime: 0,
		court: OFF_COURT,
		checkIns: [],
		checkOuts: [],
		periods: [],
	};
}

/**
 * Create an empty time bank with a record for every roster player
 */
export function createTimeBankState(rosters: Rosters): TimeBankState {
	const records = new Map<PlayerId, PlayerTimeRecord>();

	for (const side of SIDES) {
		const { teamId, playerIds } = rosters[side];
		for (const playerId of playerIds) {
			records.set(playerId, createPlayerTimeRecord(playerId, teamId, side));
		}
	}

	return {
		rosters,
		period: 1,
		onCourt: { home: new Set(), visitor: new Set() },
		records,
	};
}

/**
 * Check a player in at `at` seconds remaining
 */
export function openStint(record: PlayerTimeRecord, at: number): void {
	record.court = { status: 'onCourt', since: at };
	record.checkIns.push(at);
}

/**
 * Check a player out at `at` seconds remaining, banking the time since check-in
 */
export function closeStint(record: PlayerTimeRecord, at: number, period: number): void {
	if (record.court.status !== 'onCourt') {
		throw new Error(`Player ${record.playerId} has no open stint to close`);
	}

	record.playingTime += record.court.since - at;
	record.court = OFF_COURT;
	record.checkOuts.push(at);
	record.periods.push(period);
}

export function isOnCourt(record: PlayerTimeRecord): boolean {
	return record.court.status === 'onCourt';
}
