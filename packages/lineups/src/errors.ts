/**
 * Failures raised while reconstructing a game.
 * Each one aborts the whole game: a partial lineup table is never returned.
 */

import type { PlayerId, TeamId } from './types.js';

export class LineupReconstructionError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'LineupReconstructionError';
	}
}

export class MalformedClockError extends LineupReconstructionError {
	constructor(
		public readonly clock: string,
		public readonly period: number,
		reason = 'expected minutes:seconds'
	) {
		super(`Malformed clock "${clock}" in period ${period}: ${reason}`);
		this.name = 'MalformedClockError';
	}
}

export class UnknownParticipantError extends LineupReconstructionError {
	constructor(
		public readonly playerId: PlayerId | null,
		public readonly eventNum: number
	) {
		super(
			playerId === null
				? `Event ${eventNum} is missing a required participant`
				: `Player ${playerId} in event ${eventNum} is not on either roster`
		);
		this.name = 'UnknownParticipantError';
	}
}

export class TeamMismatchError extends LineupReconstructionError {
	constructor(
		public readonly playerId: PlayerId,
		public readonly teamId: TeamId,
		public readonly eventNum: number
	) {
		super(`Player ${playerId} in event ${eventNum} is not on team ${teamId}'s roster`);
		this.name = 'TeamMismatchError';
	}
}

export class LineupSizeMismatchError extends LineupReconstructionError {
	constructor(
		public readonly teamId: TeamId,
		public readonly eventNum: number,
		public readonly found: number
	) {
		super(`Expected 5 players on court for team ${teamId} at event ${eventNum}, found ${found}`);
		this.name = 'LineupSizeMismatchError';
	}
}

export class UnterminatedIntervalError extends LineupReconstructionError {
	constructor(
		public readonly playerId: PlayerId,
		public readonly checkIns: number,
		public readonly checkOuts: number
	) {
		super(
			`Player ${playerId} is still checked in after the last event ` +
				`(${checkIns} check-ins, ${checkOuts} check-outs); the log has no closing period end`
		);
		this.name = 'UnterminatedIntervalError';
	}
}
