/**
 * Core types for on-court lineup reconstruction
 */

export type PlayerId = number;
export type TeamId = number;

/** Which side of the box score a team sits on */
export type Side = 'home' | 'visitor';

export const SIDES: readonly Side[] = ['home', 'visitor'];

/**
 * Play-by-play category codes.
 * Only substitutions, period ends and the game actions up to TURNOVER
 * affect who is on court; every other code is carried through untouched.
 */
export const EventMessageType = {
	FIELD_GOAL_MADE: 1,
	FIELD_GOAL_MISSED: 2,
	FREE_THROW: 3,
	REBOUND: 4,
	TURNOVER: 5,
	FOUL: 6,
	VIOLATION: 7,
	SUBSTITUTION: 8,
	TIMEOUT: 9,
	JUMP_BALL: 10,
	EJECTION: 11,
	PERIOD_START: 12,
	PERIOD_END: 13,
	INSTANT_REPLAY: 18,
} as const;

export type EventMessageType = (typeof EventMessageType)[keyof typeof EventMessageType];

/** Highest category code whose participants are known to be on court */
export const GENERIC_PLAY_MAX_TYPE = EventMessageType.TURNOVER;

/**
 * A single play-by-play record as it arrives from the data source.
 * `eventType` stays a plain number: logs carry codes this library never interprets.
 */
export interface PlayByPlayEvent {
	readonly gameId: string;
	readonly eventNum: number;
	readonly period: number;
	/** Game clock, "M:SS" with optional fractional seconds */
	readonly clock: string;
	readonly eventType: number;
	readonly player1Id: PlayerId | null;
	readonly player1TeamId: TeamId | null;
	readonly player2Id: PlayerId | null;
	readonly player2TeamId: TeamId | null;
	readonly player3Id: PlayerId | null;
	readonly player3TeamId: TeamId | null;
}

/**
 * Event with its clock normalized to seconds
 */
export interface TimedEvent extends PlayByPlayEvent {
	/** Seconds left in the game (overtime: in the current overtime period) */
	readonly gameTimeRemaining: number;
	/** `gameTimeRemaining` at the instant this event's period began */
	readonly maxPeriodTime: number;
}

export interface TeamRoster {
	teamId: TeamId;
	playerIds: readonly PlayerId[];
}

export type Rosters = Record<Side, TeamRoster>;

/**
 * A closed stint on court. Time runs down, so `timeIn >= timeOut`.
 */
export interface SubstitutionInterval {
	readonly playerId: PlayerId;
	readonly teamId: TeamId;
	readonly timeIn: number;
	readonly timeOut: number;
	readonly period: number;
}

export type FivePlayers = readonly [PlayerId, PlayerId, PlayerId, PlayerId, PlayerId];

export interface LineupRow {
	gameId: string;
	eventNum: number;
	home: FivePlayers;
	visitor: FivePlayers;
}

/**
 * Options shared by the reconstruction pipeline
 */
export interface ReconstructionConfig {
	/** Log every substitution as it is applied */
	verbose: boolean;
	logger: Pick<Console, 'log' | 'warn'>;
}
