import Database from 'better-sqlite3';

/**
 * Create all tables for a play-by-play game database
 */
export function createGameSchema(db: Database.Database): void {
  db.exec(`
    -- One row per game
    CREATE TABLE IF NOT EXISTS games (
      game_id TEXT PRIMARY KEY,
      home_team_id INTEGER NOT NULL,
      visitor_team_id INTEGER NOT NULL
    );

    -- Box-score player lines (rosters come from here)
    CREATE TABLE IF NOT EXISTS box_scores (
      game_id TEXT NOT NULL,
      player_id INTEGER NOT NULL,
      team_id INTEGER NOT NULL,
      PRIMARY KEY (game_id, player_id),
      FOREIGN KEY (game_id) REFERENCES games(game_id) ON DELETE CASCADE
    );

    -- Raw play-by-play events
    CREATE TABLE IF NOT EXISTS play_by_play (
      game_id TEXT NOT NULL,
      eventnum INTEGER NOT NULL,
      period INTEGER NOT NULL,
      pctimestring TEXT NOT NULL,
      eventmsgtype INTEGER NOT NULL,
      player1_id INTEGER,
      player1_team_id INTEGER,
      player2_id INTEGER,
      player2_team_id INTEGER,
      player3_id INTEGER,
      player3_team_id INTEGER,
      PRIMARY KEY (game_id, eventnum),
      FOREIGN KEY (game_id) REFERENCES games(game_id) ON DELETE CASCADE
    );

    -- Reconstructed lineups, one row per event
    CREATE TABLE IF NOT EXISTS lineups (
      game_id TEXT NOT NULL,
      eventnum INTEGER NOT NULL,
      home_player_1 INTEGER NOT NULL,
      home_player_2 INTEGER NOT NULL,
      home_player_3 INTEGER NOT NULL,
      home_player_4 INTEGER NOT NULL,
      home_player_5 INTEGER NOT NULL,
      visitor_player_1 INTEGER NOT NULL,
      visitor_player_2 INTEGER NOT NULL,
      visitor_player_3 INTEGER NOT NULL,
      visitor_player_4 INTEGER NOT NULL,
      visitor_player_5 INTEGER NOT NULL,
      PRIMARY KEY (game_id, eventnum)
    );

    CREATE INDEX IF NOT EXISTS idx_box_scores_team ON box_scores(game_id, team_id);
  `);
}

// Row shapes as stored
export interface GameRow {
  game_id: string;
  home_team_id: number;
  visitor_team_id: number;
}

export interface BoxScoreRow {
  game_id: string;
  player_id: number;
  team_id: number;
}

export interface PlayByPlayRow {
  game_id: string;
  eventnum: number;
  period: number;
  pctimestring: string;
  eventmsgtype: number;
  player1_id: number | null;
  player1_team_id: number | null;
  player2_id: number | null;
  player2_team_id: number | null;
  player3_id: number | null;
  player3_team_id: number | null;
}
