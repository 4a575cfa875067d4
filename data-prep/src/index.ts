export { createGameSchema } from './game-schema.js';
export type { GameRow, BoxScoreRow, PlayByPlayRow } from './game-schema.js';
export { GameStore } from './game-store.js';
export type { GameInfo, GameRecords, GameStoreOptions } from './game-store.js';
