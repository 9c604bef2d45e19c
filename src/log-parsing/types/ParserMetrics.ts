/**
 * Per-job counters for the server log parser
 */
export interface ParserMetrics {
  linesProcessed: number;
  undecodableLines: number;
  gamesOpened: number;
  /** GAME_OVER lines dropped for too few accolades */
  gamesDiscarded: number;
  /** GAME_OVER lines already ingested by an earlier run */
  duplicateGames: number;
  eventsEmitted: number;
}
