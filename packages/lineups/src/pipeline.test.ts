/**
 * End-to-end tests for lineup reconstruction over whole games
 */

import { describe, it, expect, vi } from 'vitest';
import { reconstructLineups } from './pipeline.js';
import { LineupSizeMismatchError, MalformedClockError, UnterminatedIntervalError } from './errors.js';
import { EventMessageType } from './types.js';
import type { PlayerId, SubstitutionInterval } from './types.js';
import {
	createRosters,
	generateGame,
	periodEnd,
	play,
	substitution,
	HOME_TEAM,
	VISITOR_TEAM,
} from '../test/helpers/game-log.js';

const quiet = { logger: { log: vi.fn(), warn: vi.fn() } };
const sorted = (ids: readonly PlayerId[]) => [...ids].sort((a, b) => a - b);

function intervalsByPlayer(intervals: readonly SubstitutionInterval[]): Map<PlayerId, SubstitutionInterval[]> {
	const byPlayer = new Map<PlayerId, SubstitutionInterval[]>();
	for (const interval of intervals) {
		byPlayer.set(interval.playerId, [...(byPlayer.get(interval.playerId) ?? []), interval]);
	}
	return byPlayer;
}

describe('reconstructLineups', () => {
	describe('three-kind game', () => {
		// Starters show up through game actions, one substitution, one period end
		const rosters = createRosters([1, 2, 3, 4, 5, 6], [101, 102, 103, 104, 105, 106]);
		const events = [
			play(1, 1, '9:45', [[1, HOME_TEAM], [2, HOME_TEAM], [101, VISITOR_TEAM]]),
			play(2, 1, '9:30', [[3, HOME_TEAM], [4, HOME_TEAM], [5, HOME_TEAM]]),
			play(3, 1, '9:15', [[102, VISITOR_TEAM], [103, VISITOR_TEAM], [104, VISITOR_TEAM]]),
			substitution(4, 1, '4:00', VISITOR_TEAM, 105, 106),
			periodEnd(5, 1),
		];

		it('should produce one row of five unique players per side for every event', () => {
			const { lineups } = reconstructLineups({ events, rosters }, quiet);

			expect(lineups).toHaveLength(events.length);
			for (const row of lineups) {
				expect(new Set(row.home).size).toBe(5);
				expect(new Set(row.visitor).size).toBe(5);
			}
			expect(lineups[0].visitor).toEqual([101, 102, 103, 104, 105]);
			expect(lineups[3].visitor).toEqual([101, 102, 103, 104, 106]);
			expect(lineups[4].visitor).toEqual([101, 102, 103, 104, 106]);
		});

		it('should bank five full periods of time per team', () => {
			const { playingTime } = reconstructLineups({ events, rosters }, quiet);
			const total = (ids: readonly PlayerId[]) => ids.reduce((sum, id) => sum + (playingTime.get(id) ?? 0), 0);

			expect(total(rosters.home.playerIds)).toBe(5 * 600);
			expect(total(rosters.visitor.playerIds)).toBe(5 * 600);
			expect(playingTime.get(105)).toBe(360);
			expect(playingTime.get(106)).toBe(240);
			expect(playingTime.get(6)).toBe(0);
		});
	});

	describe('generated games', () => {
		const seeds = [1, 2, 3, 5, 8, 13, 21];

		it.each(seeds)('should match the simulated lineups at every event (seed %d)', (seed) => {
			const game = generateGame({ seed });
			const { lineups } = reconstructLineups(game, quiet);

			expect(lineups).toHaveLength(game.events.length);
			for (const row of lineups) {
				const expected = game.truth.get(row.eventNum);
				expect(sorted(row.home)).toEqual(expected?.home);
				expect(sorted(row.visitor)).toEqual(expected?.visitor);
			}
		});

		it.each(seeds)('should bank the same time the intervals add up to (seed %d)', (seed) => {
			const { intervals, playingTime } = reconstructLineups(generateGame({ seed }), quiet);

			for (const [playerId, stints] of intervalsByPlayer(intervals)) {
				const summed = stints.reduce((sum, i) => sum + (i.timeIn - i.timeOut), 0);
				expect(summed).toBe(playingTime.get(playerId));
			}
		});

		it.each(seeds)('should keep each player’s stints ordered and apart (seed %d)', (seed) => {
			const { intervals } = reconstructLineups(generateGame({ seed }), quiet);

			for (const stints of intervalsByPlayer(intervals).values()) {
				for (let i = 0; i < stints.length; i++) {
					expect(stints[i].timeIn).toBeGreaterThanOrEqual(stints[i].timeOut);
					if (i > 0) {
						expect(stints[i].timeIn).toBeLessThan(stints[i - 1].timeIn);
						expect(stints[i].timeIn).toBeLessThanOrEqual(stints[i - 1].timeOut);
					}
				}
			}
		});

		it('should keep five players on court for the whole game', () => {
			const game = generateGame({ seed: 34 });
			const { playingTime } = reconstructLineups(game, quiet);
			const total = (ids: readonly PlayerId[]) => ids.reduce((sum, id) => sum + (playingTime.get(id) ?? 0), 0);

			expect(total(game.rosters.home.playerIds)).toBe(5 * 2400);
			expect(total(game.rosters.visitor.playerIds)).toBe(5 * 2400);
		});

		it('should report the closing lineup at every period end', () => {
			const game = generateGame({ seed: 55, substitutionRate: 0.5, simultaneousPlayRate: 0 });
			const { events, lineups } = reconstructLineups(game, quiet);

			lineups.forEach((row, i) => {
				if (events[i].eventType !== EventMessageType.PERIOD_END) return;
				// the event just before is still in the same period, after every substitution in it
				const previous = lineups[i - 1];
				expect(sorted(row.home)).toEqual(sorted(previous.home));
				expect(sorted(row.visitor)).toEqual(sorted(previous.visitor));
			});
		});

		it('should reconstruct overtime periods', () => {
			const game = generateGame({ seed: 89, periods: 6, actionsPerPeriod: 25 });
			const { lineups, playingTime } = reconstructLineups(game, quiet);

			for (const row of lineups) {
				expect(sorted(row.home)).toEqual(game.truth.get(row.eventNum)?.home);
			}
			const homeTotal = game.rosters.home.playerIds.reduce((sum, id) => sum + (playingTime.get(id) ?? 0), 0);
			expect(homeTotal).toBe(5 * (2400 + 300 + 300));
		});

		it.each([4, 7, 11])('should resolve events sharing a substitution instant (seed %d)', (seed) => {
			const game = generateGame({ seed, simultaneousPlayRate: 1, openingSubstitutionRate: 1 });
			const { events, lineups } = reconstructLineups(game, quiet);

			for (const row of lineups) {
				const expected = game.truth.get(row.eventNum);
				expect(sorted(row.home)).toEqual(expected?.home);
				expect(sorted(row.visitor)).toEqual(expected?.visitor);
			}

			const openingSubstitutions = events.filter(
				(e) => e.eventType === EventMessageType.SUBSTITUTION && e.clock === '10:00'
			);
			expect(openingSubstitutions).toHaveLength(3);
			const sharedInstants = events.filter(
				(e, i) =>
					i > 0 &&
					e.eventType !== EventMessageType.SUBSTITUTION &&
					events[i - 1].eventType === EventMessageType.SUBSTITUTION &&
					events[i - 1].clock === e.clock &&
					events[i - 1].period === e.period
			);
			expect(sharedInstants.length).toBeGreaterThan(0);
		});

		it('should carry the closing lineup into the next period start', () => {
			const game = generateGame({ seed: 17, openingSubstitutionRate: 1 });
			const { events, lineups } = reconstructLineups(game, quiet);

			lineups.forEach((row, i) => {
				if (events[i].eventType !== EventMessageType.PERIOD_START || events[i].period === 1) return;
				const closing = lineups[i - 1];
				expect(events[i - 1].eventType).toBe(EventMessageType.PERIOD_END);
				expect(sorted(row.home)).toEqual(sorted(closing.home));
				expect(sorted(row.visitor)).toEqual(sorted(closing.visitor));
			});
		});

		it('should give identical output on every run', () => {
			const game = generateGame({ seed: 144 });
			const first = reconstructLineups(game, quiet);
			const second = reconstructLineups(game, quiet);

			expect(second).toStrictEqual(first);
		});
	});

	describe('failures', () => {
		const rosters = createRosters([1, 2, 3, 4, 5], [101, 102, 103, 104, 105]);
		const starters = [
			play(1, 1, '9:45', [[1, HOME_TEAM], [2, HOME_TEAM], [3, HOME_TEAM]]),
			play(2, 1, '9:30', [[4, HOME_TEAM], [5, HOME_TEAM], [101, VISITOR_TEAM]]),
			play(3, 1, '9:15', [[102, VISITOR_TEAM], [103, VISITOR_TEAM], [104, VISITOR_TEAM]]),
			play(4, 1, '9:00', [[105, VISITOR_TEAM]]),
		];

		it('should reject a log without a final period end', () => {
			expect(() => reconstructLineups({ events: starters, rosters }, quiet)).toThrow(UnterminatedIntervalError);
		});

		it('should reject a malformed clock anywhere in the log', () => {
			const events = [...starters, play(5, 1, 'eight', [[1, HOME_TEAM]]), periodEnd(6, 1)];
			expect(() => reconstructLineups({ events, rosters }, quiet)).toThrow(MalformedClockError);
		});

		it('should reject a game where a starter never appears', () => {
			const events = [...starters.slice(0, 3), periodEnd(5, 1)];
			expect(() => reconstructLineups({ events, rosters }, quiet)).toThrow(LineupSizeMismatchError);
		});
	});
});
