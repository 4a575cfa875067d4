/**
 * Clock Normalizer
 *
 * Turns a period-relative game clock into seconds of game time remaining.
 * Regulation periods count down inside one 40-minute scale; overtime
 * restarts at 5:00 each period and adds no regulation time.
 */

import { MalformedClockError } from './errors.js';

export const REGULATION_PERIODS = 4;
export const REGULATION_PERIOD_SECONDS = 10 * 60;
export const OVERTIME_PERIOD_SECONDS = 5 * 60;

const CLOCK_PATTERN = /^(\d+):(\d+(?:\.\d+)?)$/;

export interface NormalizedClock {
	gameTimeRemaining: number;
	maxPeriodTime: number;
}

export function isOvertime(period: number): boolean {
	return period > REGULATION_PERIODS;
}

/**
 * Seconds left in the period for a "M:SS" or "M:SS.f" clock
 */
export function parseClock(clock: string, period: number): number {
	const match = CLOCK_PATTERN.exec(clock.trim());
	if (!match) {
		throw new MalformedClockError(clock, period);
	}

	const [, minutes, seconds] = match;
	return Number(minutes) * 60 + Number(seconds);
}

/**
 * Normalize a clock reading to game time remaining, plus the value
 * game time remaining had when the period started.
 *
 * @example normalizeClock('5:30', 2) // { gameTimeRemaining: 1530, maxPeriodTime: 1800 }
 */
export function normalizeClock(clock: string, period: number): NormalizedClock {
	if (!Number.isInteger(period) || period < 1) {
		throw new MalformedClockError(clock, period, 'period must be a positive integer');
	}

	const periodTimeLeft = parseClock(clock, period);

	if (isOvertime(period)) {
		return {
			gameTimeRemaining: periodTimeLeft,
			maxPeriodTime: OVERTIME_PERIOD_SECONDS,
		};
	}

	return {
		gameTimeRemaining: REGULATION_PERIOD_SECONDS * (REGULATION_PERIODS - period) + periodTimeLeft,
		maxPeriodTime: REGULATION_PERIOD_SECONDS * (REGULATION_PERIODS + 1 - period),
	};
}
