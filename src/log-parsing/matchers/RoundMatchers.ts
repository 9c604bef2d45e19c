import type ServerLogLine from '../parsing/ServerLogLine';
import { readRoundStatsPlayers } from '../parsing/RoundStatsReader';
import { GameEventType } from '../types/GameEvent';
import type { RoundEndEvent, RoundStartEvent } from '../types/GameEvent';
import type { LineMatcher, MatchContext } from './LineMatcher';

export const ROUND_START_RE = /^World triggered "Round_Start"/;
export const ROUND_END_RE = /^World triggered "Round_End"/;

export class RoundStartMatcher implements LineMatcher<RoundStartEvent> {
  readonly name = 'roundStart';

  match(line: ServerLogLine): RoundStartEvent | null {
    if (!ROUND_START_RE.test(line.body)) return null;
    return { type: GameEventType.ROUND_START, timestamp: line.timestamp };
  }
}

/**
 * Round_End plus the player ids of the stats block that follows it
 */
export class RoundEndMatcher implements LineMatcher<RoundEndEvent> {
  readonly name = 'roundEnd';

  match(line: ServerLogLine, context: MatchContext): RoundEndEvent | null {
    if (!ROUND_END_RE.test(line.body)) return null;
    return {
      type: GameEventType.ROUND_END,
      timestamp: line.timestamp,
      players: readRoundStatsPlayers(context.allLines, line.index, context.roundStatsLookahead),
    };
  }
}
