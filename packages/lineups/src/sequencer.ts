/**
 * Event Sequencer - puts raw play-by-play into processing order
 */

import { isOvertime, normalizeClock } from './clock.js';
import type { PlayByPlayEvent, TimedEvent } from './types.js';

/**
 * Attach normalized game time to an event (returns a new object)
 */
export function withGameTime(event: PlayByPlayEvent): TimedEvent {
	const { gameTimeRemaining, maxPeriodTime } = normalizeClock(event.clock, event.period);
	return { ...event, gameTimeRemaining, maxPeriodTime };
}

/**
 * Chronological comparator.
 *
 * Game time remaining descending, then period ascending, then event number.
 * Overtime clocks restart at 300 and overlap the fourth period's values, so
 * events from different periods where either one is overtime go by period.
 */
export function compareEvents(a: TimedEvent, b: TimedEvent): number {
	if (a.period !== b.period && (isOvertime(a.period) || isOvertime(b.period))) {
		return a.period - b.period;
	}

	return (
		b.gameTimeRemaining - a.gameTimeRemaining ||
		a.period - b.period ||
		a.eventNum - b.eventNum
	);
}

/**
 * Normalize every event and sort into game order.
 * Throws on the first malformed clock; nothing is returned for a partly-bad log.
 */
export function sequenceEvents(events: readonly PlayByPlayEvent[]): TimedEvent[] {
	return events.map(withGameTime).sort(compareEvents);
}
