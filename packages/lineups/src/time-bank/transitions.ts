/**
 * Time-bank state machine - per-event transitions
 *
 * One forward pass over sequenced events. Substitutions and period ends
 * open and close stints; the first game action a player takes part in
 * during a period checks them in retroactively at the start of that period.
 */

import { resolveConfig } from '../config.js';
import { TeamMismatchError, UnknownParticipantError, UnterminatedIntervalError } from '../errors.js';
import type {
	PlayerId,
	ReconstructionConfig,
	Rosters,
	Side,
	SubstitutionInterval,
	TimedEvent,
} from '../types.js';
import { EventMessageType, GENERIC_PLAY_MAX_TYPE, SIDES } from '../types.js';
import type { PlayerTimeRecord, TimeBankState } from './state.js';
import { closeStint, createTimeBankState, isOnCourt, openStint } from './state.js';

/**
 * Everything the state machine produces for one game
 */
export interface TimeBank {
	/** Closed stints, grouped by player in roster order, each player's in game order */
	intervals: SubstitutionInterval[];
	/** Seconds banked per player while processing */
	playingTime: Map<PlayerId, number>;
}

/**
 * Apply a single event to the time bank
 */
export function applyEvent(
	state: TimeBankState,
	event: TimedEvent,
	config: ReconstructionConfig = resolveConfig()
): void {
	if (event.eventType === EventMessageType.SUBSTITUTION) {
		applySubstitution(state, event, config);
	} else if (event.eventType === EventMessageType.PERIOD_END) {
		applyPeriodEnd(state, event);
	} else if (event.eventType <= GENERIC_PLAY_MAX_TYPE) {
		applyGenericPlay(state, event);
	}
}

function requireRecord(state: TimeBankState, playerId: PlayerId | null, event: TimedEvent): PlayerTimeRecord {
	const record = playerId === null ? undefined : state.records.get(playerId);
	if (!record) {
		throw new UnknownParticipantError(playerId, event.eventNum);
	}
	return record;
}

/**
 * Team of a substitution comes from the outgoing player's team tag,
 * falling back to roster membership when the tag is missing.
 * Both players must be on the roster of that team.
 */
function substitutionSide(
	state: TimeBankState,
	event: TimedEvent,
	outgoing: PlayerTimeRecord,
	incoming: PlayerTimeRecord
): Side {
	let side = outgoing.side;
	if (event.player1TeamId === state.rosters.home.teamId) side = 'home';
	if (event.player1TeamId === state.rosters.visitor.teamId) side = 'visitor';

	const teamId = state.rosters[side].teamId;
	for (const record of [outgoing, incoming]) {
		if (record.side !== side) {
			throw new TeamMismatchError(record.playerId, teamId, event.eventNum);
		}
	}
	return side;
}

function applySubstitution(state: TimeBankState, event: TimedEvent, config: ReconstructionConfig): void {
	const outgoing = requireRecord(state, event.player1Id, event);
	const incoming = requireRecord(state, event.player2Id, event);
	const side = substitutionSide(state, event, outgoing, incoming);
	const court = state.onCourt[side];
	const t = event.gameTimeRemaining;

	court.delete(outgoing.playerId);
	if (court.has(incoming.playerId)) {
		config.logger.warn(
			`Player ${incoming.playerId} subbed in at event ${event.eventNum} while already on court`
		);
	} else {
		court.add(incoming.playerId);
	}

	if (config.verbose) {
		config.logger.log(`Subbing ${side}: ${incoming.playerId} in for ${outgoing.playerId}`);
	}

	// Implicit starter: on court since the period began without a recorded check-in
	if (!isOnCourt(outgoing)) {
		openStint(outgoing, event.maxPeriodTime);
	}
	closeStint(outgoing, t, state.period);

	openStint(incoming, t);
}

function applyPeriodEnd(state: TimeBankState, event: TimedEvent): void {
	for (const side of SIDES) {
		for (const playerId of state.onCourt[side]) {
			const record = requireRecord(state, playerId, event);
			closeStint(record, event.gameTimeRemaining, state.period);
		}
		state.onCourt[side].clear();
	}

	state.period += 1;
}

function applyGenericPlay(state: TimeBankState, event: TimedEvent): void {
	for (const playerId of [event.player1Id, event.player2Id, event.player3Id]) {
		if (playerId === null) continue;

		const record = requireRecord(state, playerId, event);
		const court = state.onCourt[record.side];
		if (court.has(playerId)) continue;

		court.add(playerId);
		openStint(record, event.maxPeriodTime);
	}
}

/**
 * Close the books once every event is applied.
 * Each player's check-ins and check-outs are zipped into intervals.
 */
export function finalizeTimeBank(state: TimeBankState): TimeBank {
	const intervals: SubstitutionInterval[] = [];
	const playingTime = new Map<PlayerId, number>();

	for (const record of state.records.values()) {
		if (isOnCourt(record) || record.checkIns.length !== record.checkOuts.length) {
			throw new UnterminatedIntervalError(record.playerId, record.checkIns.length, record.checkOuts.length);
		}

		for (let i = 0; i < record.checkIns.length; i++) {
			intervals.push({
				playerId: record.playerId,
				teamId: record.teamId,
				timeIn: record.checkIns[i],
				timeOut: record.checkOuts[i],
				period: record.periods[i],
			});
		}
		playingTime.set(record.playerId, record.playingTime);
	}

	return { intervals, playingTime };
}

/**
 * Run the whole state machine over sequenced events
 */
export function buildSubstitutionIntervals(
	events: readonly TimedEvent[],
	rosters: Rosters,
	config: ReconstructionConfig = resolveConfig()
): TimeBank {
	const state = createTimeBankState(rosters);

	for (const event of events) {
		applyEvent(state, event, config);
	}

	return finalizeTimeBank(state);
}
