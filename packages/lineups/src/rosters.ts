import type { PlayerId, Rosters, TeamId } from './types.js';

/**
 * One player line from a box score
 */
export interface BoxScoreEntry {
  playerId: PlayerId;
  teamId: TeamId;
}

/**
 * Split box-score lines into home and visitor rosters, keeping row order
 */
export function getRosters(
  homeTeamId: TeamId,
  visitorTeamId: TeamId,
  boxScore: readonly BoxScoreEntry[]
): Rosters {
  const playersOf = (teamId: TeamId) =>
    boxScore.filter((entry) => entry.teamId === teamId).map((entry) => entry.playerId);

  return {
    home: { teamId: homeTeamId, playerIds: playersOf(homeTeamId) },
    visitor: { teamId: visitorTeamId, playerIds: playersOf(visitorTeamId) },
  };
}
