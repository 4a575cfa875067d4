import Database from 'better-sqlite3';
import { getRosters, toLineupTableRecord } from '@oncourt/lineups';
import type {
  BoxScoreEntry,
  LineupRow,
  LineupTableRecord,
  PlayByPlayEvent,
  ReconstructionInput,
  TeamId,
} from '@oncourt/lineups';
import { createGameSchema } from './game-schema.js';
import type { BoxScoreRow, GameRow, PlayByPlayRow } from './game-schema.js';

export interface GameInfo {
  gameId: string;
  homeTeamId: TeamId;
  visitorTeamId: TeamId;
}

/**
 * Everything needed to store one game
 */
export interface GameRecords extends GameInfo {
  boxScore: readonly BoxScoreEntry[];
  events: readonly PlayByPlayEvent[];
}

export interface GameStoreOptions {
  readonly?: boolean;
}

function toEvent(row: PlayByPlayRow): PlayByPlayEvent {
  return {
    gameId: row.game_id,
    eventNum: row.eventnum,
    period: row.period,
    clock: row.pctimestring,
    eventType: row.eventmsgtype,
    player1Id: row.player1_id,
    player1TeamId: row.player1_team_id,
    player2Id: row.player2_id,
    player2TeamId: row.player2_team_id,
    player3Id: row.player3_id,
    player3TeamId: row.player3_team_id,
  };
}

function toPlayByPlayRow(event: PlayByPlayEvent): PlayByPlayRow {
  return {
    game_id: event.gameId,
    eventnum: event.eventNum,
    period: event.period,
    pctimestring: event.clock,
    eventmsgtype: event.eventType,
    player1_id: event.player1Id,
    player1_team_id: event.player1TeamId,
    player2_id: event.player2Id,
    player2_team_id: event.player2TeamId,
    player3_id: event.player3Id,
    player3_team_id: event.player3TeamId,
  };
}

/**
 * SQLite-backed source of play-by-play, box scores and game metadata,
 * and sink for reconstructed lineups
 */
export class GameStore {
  private db: Database.Database;

  constructor(path: string, options: GameStoreOptions = {}) {
    this.db = new Database(path, { readonly: options.readonly ?? false });
    if (!options.readonly) {
      createGameSchema(this.db);
    }
  }

  /**
   * Get game metadata, throwing for an unknown game
   */
  getGame(gameId: string): GameInfo {
    const row = this.db
      .prepare<[string], GameRow>('SELECT * FROM games WHERE game_id = ?')
      .get(gameId);

    if (!row) {
      throw new Error(`Game ${gameId} not found`);
    }

    return { gameId: row.game_id, homeTeamId: row.home_team_id, visitorTeamId: row.visitor_team_id };
  }

  /**
   * Box-score lines in the order they were stored
   */
  getBoxScore(gameId: string): BoxScoreEntry[] {
    return this.db
      .prepare<[string], BoxScoreRow>('SELECT * FROM box_scores WHERE game_id = ? ORDER BY rowid')
      .all(gameId)
      .map((row) => ({ playerId: row.player_id, teamId: row.team_id }));
  }

  /**
   * Raw events in log order; sequencing is left to the reconstruction
   */
  getPlayByPlay(gameId: string): PlayByPlayEvent[] {
    return this.db
      .prepare<[string], PlayByPlayRow>('SELECT * FROM play_by_play WHERE game_id = ? ORDER BY eventnum')
      .all(gameId)
      .map(toEvent);
  }

  /**
   * Load one game as reconstruction input
   */
  loadGameInput(gameId: string): ReconstructionInput {
    const game = this.getGame(gameId);
    return {
      events: this.getPlayByPlay(gameId),
      rosters: getRosters(game.homeTeamId, game.visitorTeamId, this.getBoxScore(gameId)),
    };
  }

  /**
   * Store a game's metadata, box score and events, replacing any earlier copy
   */
  saveGame(records: GameRecords): void {
    const deleteGame = this.db.prepare('DELETE FROM games WHERE game_id = ?');
    const insertGame = this.db.prepare<GameRow>(
      'INSERT INTO games (game_id, home_team_id, visitor_team_id) VALUES (@game_id, @home_team_id, @visitor_team_id)'
    );
    const insertBoxScore = this.db.prepare<BoxScoreRow>(
      'INSERT INTO box_scores (game_id, player_id, team_id) VALUES (@game_id, @player_id, @team_id)'
    );
    const insertEvent = this.db.prepare<PlayByPlayRow>(`
      INSERT INTO play_by_play (
        game_id, eventnum, period, pctimestring, eventmsgtype,
        player1_id, player1_team_id, player2_id, player2_team_id, player3_id, player3_team_id
      ) VALUES (
        @game_id, @eventnum, @period, @pctimestring, @eventmsgtype,
        @player1_id, @player1_team_id, @player2_id, @player2_team_id, @player3_id, @player3_team_id
      )
    `);

    const save = this.db.transaction((game: GameRecords) => {
      // child rows go explicitly; foreign_keys is off by default in SQLite
      this.db.prepare('DELETE FROM box_scores WHERE game_id = ?').run(game.gameId);
      this.db.prepare('DELETE FROM play_by_play WHERE game_id = ?').run(game.gameId);
      deleteGame.run(game.gameId);

      insertGame.run({
        game_id: game.gameId,
        home_team_id: game.homeTeamId,
        visitor_team_id: game.visitorTeamId,
      });
      for (const entry of game.boxScore) {
        insertBoxScore.run({ game_id: game.gameId, player_id: entry.playerId, team_id: entry.teamId });
      }
      for (const event of game.events) {
        insertEvent.run(toPlayByPlayRow(event));
      }
    });

    save(records);
  }

  /**
   * Replace the stored lineups for every game in `rows`
   */
  saveLineups(rows: readonly LineupRow[]): void {
    const deleteLineups = this.db.prepare('DELETE FROM lineups WHERE game_id = ?');
    const insertLineup = this.db.prepare<LineupTableRecord>(`
      INSERT INTO lineups (
        game_id, eventnum,
        home_player_1, home_player_2, home_player_3, home_player_4, home_player_5,
        visitor_player_1, visitor_player_2, visitor_player_3, visitor_player_4, visitor_player_5
      ) VALUES (
        @game_id, @eventnum,
        @home_player_1, @home_player_2, @home_player_3, @home_player_4, @home_player_5,
        @visitor_player_1, @visitor_player_2, @visitor_player_3, @visitor_player_4, @visitor_player_5
      )
    `);

    const save = this.db.transaction((lineupRows: readonly LineupRow[]) => {
      for (const gameId of new Set(lineupRows.map((row) => row.gameId))) {
        deleteLineups.run(gameId);
      }
      for (const row of lineupRows) {
        insertLineup.run(toLineupTableRecord(row));
      }
    });

    save(rows);
  }

  /**
   * Stored lineups for a game, in event order
   */
  getLineups(gameId: string): LineupTableRecord[] {
    return this.db
      .prepare<[string], LineupTableRecord>('SELECT * FROM lineups WHERE game_id = ? ORDER BY eventnum')
      .all(gameId);
  }

  close(): void {
    this.db.close();
  }
}
