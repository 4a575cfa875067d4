export type { CourtStatus, PlayerTimeRecord, TimeBankState } from './state.js';
export { createTimeBankState, createPlayerTimeRecord, openStint, closeStint, isOnCourt } from './state.js';
export type { TimeBank } from './transitions.js';
export { applyEvent, finalizeTimeBank, buildSubstitutionIntervals } from './transitions.js';
