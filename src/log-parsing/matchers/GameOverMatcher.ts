import type ServerLogLine from '../parsing/ServerLogLine';
import { readInt } from './LineMatcher';
import type { LineMatcher } from './LineMatcher';

// Game Over: competitive mg_active de_inferno score 16:10 after 45 min
const GAME_OVER_RE =
  /^Game Over: (?<mode>\w+) (?<subMode>\w+) (?<map>\S+) score (?<team1Score>\d+):(?<team2Score>\d+) after (?<duration>\d+) min$/;

/**
 * Fields of a Game Over line. The parser turns it into a GameOverEvent
 * once the game has been accepted.
 */
export interface GameOverLine {
  timestamp: Date;
  map: string;
  mode: string;
  subMode: string;
  team1Score: number;
  team2Score: number;
  duration: number;
}

export class GameOverMatcher implements LineMatcher<GameOverLine> {
  readonly name = 'gameOver';

  match(line: ServerLogLine): GameOverLine | null {
    const groups = line.body.match(GAME_OVER_RE)?.groups;
    if (!groups) return null;

    const team1Score = readInt(groups, 'team1Score');
    const team2Score = readInt(groups, 'team2Score');
    const duration = readInt(groups, 'duration');
    const { map, mode, subMode } = groups;
    if (team1Score === null || team2Score === null || duration === null || !map || !mode || !subMode) {
      return null;
    }

    return { timestamp: line.timestamp, map, mode, subMode, team1Score, team2Score, duration };
  }
}
