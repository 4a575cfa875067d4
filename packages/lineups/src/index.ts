/**
 * @oncourt/lineups - On-court lineup reconstruction
 *
 * Infers the five players per team on court at every event of a
 * basketball play-by-play log from substitutions, period ends and
 * the players named in game actions.
 */

// Core types
export type {
  PlayerId,
  TeamId,
  Side,
  PlayByPlayEvent,
  TimedEvent,
  TeamRoster,
  Rosters,
  SubstitutionInterval,
  FivePlayers,
  LineupRow,
  ReconstructionConfig,
} from './types.js';
export { EventMessageType, GENERIC_PLAY_MAX_TYPE, SIDES } from './types.js';

// Errors
export {
  LineupReconstructionError,
  MalformedClockError,
  UnknownParticipantError,
  TeamMismatchError,
  LineupSizeMismatchError,
  UnterminatedIntervalError,
} from './errors.js';

export { DEFAULT_RECONSTRUCTION_CONFIG, resolveConfig } from './config.js';

// Clock and ordering
export type { NormalizedClock } from './clock.js';
export {
  normalizeClock,
  parseClock,
  isOvertime,
  REGULATION_PERIODS,
  REGULATION_PERIOD_SECONDS,
  OVERTIME_PERIOD_SECONDS,
} from './clock.js';
export { sequenceEvents, compareEvents, withGameTime } from './sequencer.js';

// Time bank
export type { CourtStatus, PlayerTimeRecord, TimeBankState, TimeBank } from './time-bank/index.js';
export {
  createTimeBankState,
  openStint,
  closeStint,
  applyEvent,
  finalizeTimeBank,
  buildSubstitutionIntervals,
} from './time-bank/index.js';

// Assignment
export type { BoundaryRule } from './assignment.js';
export {
  assignLineups,
  assignTeamLineup,
  selectOnCourt,
  inScope,
  preferContinuingPlayers,
  boundaryRuleFor,
  coversTime,
  PLAYERS_ON_COURT,
} from './assignment.js';

// Pipeline
export type { ReconstructionInput, ReconstructionResult } from './pipeline.js';
export { reconstructLineups } from './pipeline.js';

export type { BoxScoreEntry } from './rosters.js';
export { getRosters } from './rosters.js';
export type { LineupTableRecord } from './lineup-table.js';
export { toLineupTable, toLineupTableRecord, LINEUP_TABLE_COLUMNS } from './lineup-table.js';
