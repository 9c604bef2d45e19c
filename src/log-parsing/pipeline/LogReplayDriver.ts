import { EventEmitter } from 'events';
import { ParserConfig } from '../../config/ParserConfig';
import { ServerLogParser } from '../parsing/ServerLogParser';
import type { ServerLogParserOptions } from '../parsing/ServerLogParser';
import type { GameEventSink } from '../types/Collaborators';
import { GameEventType, getActionPlayers } from '../types/GameEvent';
import type { GameEvent, GameOverEvent } from '../types/GameEvent';
import { ReplayLoopError } from '../types/ParserErrors';
import type { ParserMetrics } from '../types/ParserMetrics';
import { isBotOnly } from '../utils/PlayerUtils';
import { readServerLogFile } from './ServerLogFileReader';

export interface LogReplayDriverOptions extends ServerLogParserOptions {
  sink?: GameEventSink;
  /** Drop kills, assists and attacks between two bots; defaults to ParserConfig */
  skipBotOnlyEvents?: boolean;
}

export interface ReplayWarning {
  message: string;
  line: number;
  expectedRounds: number;
  roundsFound: number;
}

export interface ReplaySummary {
  lines: number;
  /** parseLine calls, including replayed lines */
  iterations: number;
  eventCounts: Record<GameEventType, number>;
  /** Bot-only events not forwarded to the sink */
  skippedEvents: number;
  games: GameOverEvent[];
  appServerId: number | null;
  metrics: ParserMetrics;
}

/**
 * Drives one ServerLogParser over a full line buffer, honouring every
 * returned nextIndex (rewinds included).
 *
 * Events: 'event' (GameEvent) for every forwarded event and
 * 'warning' (ReplayWarning) when a game has fewer rounds than its score.
 */
export class LogReplayDriver extends EventEmitter {
  private readonly sink: GameEventSink | null;
  private readonly skipBotOnlyEvents: boolean;
  private readonly parserOptions: ServerLogParserOptions;

  constructor(options: LogReplayDriverOptions = {}) {
    super();
    const { sink, skipBotOnlyEvents, ...parserOptions } = options;
    this.sink = sink ?? null;
    this.skipBotOnlyEvents = skipBotOnlyEvents ?? ParserConfig.SKIP_BOT_ONLY_EVENTS;
    this.parserOptions = parserOptions;
  }

  /**
   * Replay a whole buffer with a fresh parser. Throws ReplayLoopError when the
   * cursor keeps moving back past any valid replay.
   */
  public processLines(lines: readonly string[]): ReplaySummary {
    const parser = new ServerLogParser(this.parserOptions);
    const summary: ReplaySummary = {
      lines: lines.length,
      iterations: 0,
      eventCounts: createEventCounts(),
      skippedEvents: 0,
      games: [],
      appServerId: null,
      metrics: parser.getMetrics(),
    };

    // Each line is read at most twice (forward, then replayed) plus one catch-up per game
    const maxIterations = lines.length * 3 + 1;
    let index = 0;

    while (index < lines.length) {
      summary.iterations++;
      if (summary.iterations > maxIterations) {
        throw new ReplayLoopError(
          `Replay exceeded ${maxIterations} iterations at line ${index}`,
          summary.iterations
        );
      }

      const rawLine = lines[index];
      if (rawLine === undefined) break;

      const result = parser.parseLine(rawLine, lines, index);
      if (!result) {
        index++;
        continue;
      }

      this.dispatch(result.event, index, summary);
      index = result.nextIndex;
    }

    summary.appServerId = parser.getAppServerId();
    summary.metrics = parser.getMetrics();
    return summary;
  }

  public async processFile(filePath: string): Promise<ReplaySummary> {
    const lines = await readServerLogFile(filePath);
    console.info('[LogReplayDriver] Replaying file:', { filePath, lines: lines.length });
    return this.processLines(lines);
  }

  private dispatch(event: GameEvent, index: number, summary: ReplaySummary): void {
    const players = getActionPlayers(event);
    if (this.skipBotOnlyEvents && players && isBotOnly(players)) {
      summary.skippedEvents++;
      return;
    }

    if (event.type === GameEventType.GAME_OVER) {
      summary.games.push(event);
      const expectedRounds = event.team1Score + event.team2Score;
      if (event.roundsFound < expectedRounds) {
        const warning: ReplayWarning = {
          message: 'Game has fewer Round_Start lines than its final score',
          line: index,
          expectedRounds,
          roundsFound: event.roundsFound,
        };
        this.emit('warning', warning);
      }
    }

    summary.eventCounts[event.type]++;
    this.sink?.onEvent(event);
    this.emit('event', event);
  }
}

function createEventCounts(): Record<GameEventType, number> {
  return {
    [GameEventType.KILL]: 0,
    [GameEventType.ASSIST]: 0,
    [GameEventType.ATTACK]: 0,
    [GameEventType.BOMB_EVENT]: 0,
    [GameEventType.ROUND_START]: 0,
    [GameEventType.ROUND_END]: 0,
    [GameEventType.GAME_OVER]: 0,
    [GameEventType.GAME_PROCESSED]: 0,
  };
}
