/**
 * Full reconstruction for one game:
 * raw events -> sequencer -> time bank -> interval set -> lineup assignment
 */

import { assignLineups } from './assignment.js';
import { resolveConfig } from './config.js';
import { sequenceEvents } from './sequencer.js';
import { buildSubstitutionIntervals } from './time-bank/index.js';
import type {
  LineupRow,
  PlayByPlayEvent,
  PlayerId,
  ReconstructionConfig,
  Rosters,
  SubstitutionInterval,
  TimedEvent,
} from './types.js';

export interface ReconstructionInput {
  events: readonly PlayByPlayEvent[];
  rosters: Rosters;
}

export interface ReconstructionResult {
  /** Input events in processing order, with normalized game time */
  events: TimedEvent[];
  intervals: SubstitutionInterval[];
  playingTime: Map<PlayerId, number>;
  /** One row per event, in processing order */
  lineups: LineupRow[];
}

/**
 * Reconstruct the on-court lineups for every event of a game.
 * Any inconsistency in the log throws; there is no partial result.
 */
export function reconstructLineups(
  input: ReconstructionInput,
  config: Partial<ReconstructionConfig> = {}
): ReconstructionResult {
  const resolved = resolveConfig(config);
  const events = sequenceEvents(input.events);
  const { intervals, playingTime } = buildSubstitutionIntervals(events, input.rosters, resolved);
  const lineups = assignLineups(intervals, events, input.rosters);

  return { events, intervals, playingTime, lineups };
}
