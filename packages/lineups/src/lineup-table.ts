/**
 * Flat lineup table, one column per on-court slot
 */

import type { LineupRow, PlayerId } from './types.js';

export interface LineupTableRecord {
  game_id: string;
  eventnum: number;
  home_player_1: PlayerId;
  home_player_2: PlayerId;
  home_player_3: PlayerId;
  home_player_4: PlayerId;
  home_player_5: PlayerId;
  visitor_player_1: PlayerId;
  visitor_player_2: PlayerId;
  visitor_player_3: PlayerId;
  visitor_player_4: PlayerId;
  visitor_player_5: PlayerId;
}

export const LINEUP_TABLE_COLUMNS: readonly (keyof LineupTableRecord)[] = [
  'game_id',
  'eventnum',
  'home_player_1',
  'home_player_2',
  'home_player_3',
  'home_player_4',
  'home_player_5',
  'visitor_player_1',
  'visitor_player_2',
  'visitor_player_3',
  'visitor_player_4',
  'visitor_player_5',
];

export function toLineupTableRecord(row: LineupRow): LineupTableRecord {
  const [h1, h2, h3, h4, h5] = row.home;
  const [v1, v2, v3, v4, v5] = row.visitor;

  return {
    game_id: row.gameId,
    eventnum: row.eventNum,
    home_player_1: h1,
    home_player_2: h2,
    home_player_3: h3,
    home_player_4: h4,
    home_player_5: h5,
    visitor_player_1: v1,
    visitor_player_2: v2,
    visitor_player_3: v3,
    visitor_player_4: v4,
    visitor_player_5: v5,
  };
}

export function toLineupTable(rows: readonly LineupRow[]): LineupTableRecord[] {
  return rows.map(toLineupTableRecord);
}
