/**
 * Lineup Assignment Engine
 *
 * Maps each event back to the five players per team whose stints contain
 * the event's game time. Which stint boundaries count depends on the event:
 *
 * - period end: stints closed by this very event (`timeOut === t`)
 * - substitution: `timeIn >= t && timeOut < t`, so the player who just
 *   left is out and the player who just arrived is in
 * - anything else: `timeIn >= t && timeOut <= t`, with the
 *   {@link preferContinuingPlayers} tie-break when a substitution lands
 *   on the same instant
 *
 * Regulation stints are all candidates for a regulation event. Overtime
 * clocks restart at 300 and overlap the fourth period, so an overtime event
 * or stint only meets stints and events of its own period. A period end only
 * collects stints of the period it closes: a substitution at the next
 * period's opening instant leaves a zero-length stint with the same `timeOut`.
 */

import { LineupSizeMismatchError } from './errors.js';
import type {
	FivePlayers,
	LineupRow,
	PlayerId,
	Rosters,
	SubstitutionInterval,
	TeamId,
	TimedEvent,
} from './types.js';
import { isOvertime } from './clock.js';
import { EventMessageType } from './types.js';

export const PLAYERS_ON_COURT = 5;

export type BoundaryRule = 'periodEnd' | 'substitution' | 'inPlay';

export function boundaryRuleFor(eventType: number): BoundaryRule {
	switch (eventType) {
		case EventMessageType.PERIOD_END:
			return 'periodEnd';
		case EventMessageType.SUBSTITUTION:
			return 'substitution';
		default:
			return 'inPlay';
	}
}

/**
 * Does a stint cover game time `t` under the given boundary rule?
 */
export function coversTime(interval: SubstitutionInterval, t: number, rule: BoundaryRule): boolean {
	switch (rule) {
		case 'periodEnd':
			return interval.timeOut === t;
		case 'substitution':
			return interval.timeIn >= t && interval.timeOut < t;
		case 'inPlay':
			return interval.timeIn >= t && interval.timeOut <= t;
	}
}

/**
 * Can a stint be on court for an event at all, before looking at times?
 */
export function inScope(interval: SubstitutionInterval, event: TimedEvent, rule: BoundaryRule): boolean {
	if (rule === 'periodEnd' || isOvertime(event.period) || isOvertime(interval.period)) {
		return interval.period === event.period;
	}
	return true;
}

/**
 * Tie-break for an event that shares its instant with a substitution.
 * Both the departing and arriving player's stints touch `t`; the player
 * already on court keeps the spot, so stints starting exactly at `t` drop out.
 */
export function preferContinuingPlayers(
	matches: readonly SubstitutionInterval[],
	t: number
): SubstitutionInterval[] {
	return matches.filter((interval) => interval.timeIn > t);
}

/**
 * Stints of one team on court at an event, before the size check
 */
export function selectOnCourt(
	teamIntervals: readonly SubstitutionInterval[],
	event: TimedEvent
): SubstitutionInterval[] {
	const t = event.gameTimeRemaining;
	const rule = boundaryRuleFor(event.eventType);

	const matches = teamIntervals.filter(
		(interval) => inScope(interval, event, rule) && coversTime(interval, t, rule)
	);

	if (rule === 'inPlay' && matches.length > PLAYERS_ON_COURT) {
		return preferContinuingPlayers(matches, t);
	}
	return matches;
}

function toFivePlayers(playerIds: readonly PlayerId[]): FivePlayers | null {
	if (playerIds.length !== PLAYERS_ON_COURT) return null;
	const [p1, p2, p3, p4, p5] = playerIds;
	return [p1, p2, p3, p4, p5];
}

/**
 * Five distinct players for one team at one event, or a fatal mismatch
 */
export function assignTeamLineup(
	teamIntervals: readonly SubstitutionInterval[],
	event: TimedEvent,
	teamId: TeamId
): FivePlayers {
	const playerIds = [...new Set(selectOnCourt(teamIntervals, event).map((i) => i.playerId))];
	const lineup = toFivePlayers(playerIds);
	if (!lineup) {
		throw new LineupSizeMismatchError(teamId, event.eventNum, playerIds.length);
	}
	return lineup;
}

/**
 * Assign both lineups for every event. Requires the finished interval set.
 */
export function assignLineups(
	intervals: readonly SubstitutionInterval[],
	events: readonly TimedEvent[],
	rosters: Rosters
): LineupRow[] {
	const homeIntervals = intervals.filter((i) => i.teamId === rosters.home.teamId);
	const visitorIntervals = intervals.filter((i) => i.teamId === rosters.visitor.teamId);

	return events.map((event) => ({
		gameId: event.gameId,
		eventNum: event.eventNum,
		home: assignTeamLineup(homeIntervals, event, rosters.home.teamId),
		visitor: assignTeamLineup(visitorIntervals, event, rosters.visitor.teamId),
	}));
}
