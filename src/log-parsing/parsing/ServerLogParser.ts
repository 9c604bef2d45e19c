import { ParserConfig } from '../../config/ParserConfig';
import { createInRoundMatchers, GameOverMatcher, matchServerAppId, RoundStartMatcher } from '../matchers';
import { BOMB_SIGNAL, BombSignalKind } from '../matchers/BombMatcher';
import type { BombSignal } from '../matchers/BombMatcher';
import type { GameOverLine } from '../matchers/GameOverMatcher';
import type { LineMatcher, MatchContext } from '../matchers/LineMatcher';
import type { InRoundMatch } from '../matchers';
import type { AccoladeSink, ProcessedGameGate } from '../types/Collaborators';
import { BombAction, GameEventType } from '../types/GameEvent';
import type { BombEvent, GameEvent, GameOverEvent, Player } from '../types/GameEvent';
import type { ParseLineResult } from '../types/ParseLineResult';
import { ParserContractError, ParserErrorCode } from '../types/ParserErrors';
import type { ParserMetrics } from '../types/ParserMetrics';
import { AccoladeAccumulator } from './AccoladeAccumulator';
import ServerLogLine from './ServerLogLine';

export interface ServerLogParserOptions {
  /** Lookup of games ingested by earlier runs; defaults to "nothing processed" */
  gate?: ProcessedGameGate;
  accoladeSink?: AccoladeSink;
  accoladeThreshold?: number;
  roundStatsLookahead?: number;
}

interface RoundScan {
  rewindTarget: number;
  roundsFound: number;
}

const NOTHING_PROCESSED: ProcessedGameGate = {
  exists: () => false,
};

/**
 * Replay state machine for CS2 dedicated server logs.
 *
 * The final score only appears after every round of a game has been logged, so
 * an accepted Game Over line rewinds the caller to the game's first Round_Start.
 * The rounds are then walked again with the game open, and reaching the Game Over
 * line a second time emits GAME_PROCESSED and closes the game.
 *
 * One instance per log file; calls must be sequential and honour nextIndex.
 */
export class ServerLogParser {
  private readonly gate: ProcessedGameGate;
  private readonly accoladeSink: AccoladeSink | null;
  private readonly accoladeThreshold: number;
  private readonly roundStatsLookahead: number;

  private readonly gameOverMatcher = new GameOverMatcher();
  private readonly roundStartMatcher = new RoundStartMatcher();
  private readonly inRoundMatchers: LineMatcher<InRoundMatch>[] = createInRoundMatchers();
  private readonly accolades = new AccoladeAccumulator();

  // Replay state
  private matchStarted = false;
  private matchProcessingIndex: number | null = null;
  private roundsSeenSinceRewind = 0;
  private currentGame: GameOverEvent | null = null;

  // Bomb attribution within the current round
  private bombPlanter: Player | null = null;
  private bombsite: string | null = null;
  private bombDefuser: Player | null = null;

  private appServerId: number | null = null;
  private metrics: ParserMetrics = createEmptyMetrics();

  constructor(options: ServerLogParserOptions = {}) {
    this.gate = options.gate ?? NOTHING_PROCESSED;
    this.accoladeSink = options.accoladeSink ?? null;
    this.accoladeThreshold = options.accoladeThreshold ?? ParserConfig.ACCOLADE_THRESHOLD;
    this.roundStatsLookahead = options.roundStatsLookahead ?? ParserConfig.ROUND_STATS_LOOKAHEAD;
  }

  /**
   * Parse the line at currentIndex.
   * Returns null for "no event, advance by 1"; otherwise the event and the index
   * to resume from, which is below currentIndex after an accepted Game Over.
   * Throws ParserContractError when the buffer or cursor is unusable.
   */
  public parseLine(rawLine: string, allLines: readonly string[], currentIndex: number): ParseLineResult {
    this.assertContract(allLines, currentIndex);
    this.metrics.linesProcessed++;

    const decoded = ServerLogLine.decode(rawLine, currentIndex);
    if (!decoded.ok) {
      this.metrics.undecodableLines++;
      this.captureServerAppId(decoded.content ?? rawLine);
      return null;
    }
    const line = decoded.line;

    if (this.matchStarted && currentIndex === this.matchProcessingIndex) {
      return this.closeMatch(line);
    }

    const gameOver = this.gameOverMatcher.match(line);
    if (gameOver) {
      if (this.matchStarted) {
        console.debug('[ServerLogParser] Ignoring Game Over inside an open game at line', currentIndex);
        return null;
      }
      return this.handleGameOver(gameOver, allLines, currentIndex);
    }

    if (!this.matchStarted) {
      return null;
    }

    const context: MatchContext = { allLines, roundStatsLookahead: this.roundStatsLookahead };
    for (const matcher of this.inRoundMatchers) {
      const match = matcher.match(line, context);
      if (match) {
        const event = this.toGameEvent(match);
        return event ? this.emit(event, currentIndex + 1) : null;
      }
    }

    return null;
  }

  public getMetrics(): ParserMetrics {
    return { ...this.metrics };
  }

  public getAppServerId(): number | null {
    return this.appServerId;
  }

  public isMatchOpen(): boolean {
    return this.matchStarted;
  }

  /**
   * Clear all state, e.g. before parsing a different file with the same instance
   */
  public reset(): void {
    this.matchStarted = false;
    this.matchProcessingIndex = null;
    this.roundsSeenSinceRewind = 0;
    this.currentGame = null;
    this.appServerId = null;
    this.clearBombState();
    this.metrics = createEmptyMetrics();
  }

  private assertContract(allLines: readonly string[], currentIndex: number): void {
    if (!Array.isArray(allLines)) {
      throw new ParserContractError('Line buffer must be an array', ParserErrorCode.INVALID_LINE_BUFFER);
    }

    if (!Number.isInteger(currentIndex) || currentIndex < 0 || currentIndex >= allLines.length) {
      throw new ParserContractError(
        `Line index ${currentIndex} is outside a buffer of ${allLines.length} lines`,
        ParserErrorCode.INDEX_OUT_OF_RANGE,
        Number.isInteger(currentIndex) ? currentIndex : null
      );
    }

    if (
      this.matchStarted &&
      this.matchProcessingIndex !== null &&
      currentIndex > this.matchProcessingIndex
    ) {
      throw new ParserContractError(
        `Line ${currentIndex} requested while replay must stop at line ${this.matchProcessingIndex}`,
        ParserErrorCode.REPLAY_CURSOR_SKIPPED,
        currentIndex
      );
    }
  }

  private captureServerAppId(content: string): void {
    const appServerId = matchServerAppId(content);
    if (appServerId === null) return;

    if (appServerId !== this.appServerId) {
      console.info('[ServerLogParser] Dedicated server app id:', appServerId);
    }
    this.appServerId = appServerId;
  }

  private handleGameOver(
    gameOver: GameOverLine,
    allLines: readonly string[],
    currentIndex: number
  ): ParseLineResult {
    const expectedRounds = gameOver.team1Score + gameOver.team2Score;
    const { rewindTarget, roundsFound } = this.scanBackForRounds(allLines, currentIndex, expectedRounds);

    const accolades = this.accolades.collect(allLines, rewindTarget, currentIndex);
    if (accolades.length < this.accoladeThreshold) {
      this.metrics.gamesDiscarded++;
      console.info('[ServerLogParser] Discarding incomplete game:', {
        line: currentIndex,
        map: gameOver.map,
        accolades: accolades.length,
        threshold: this.accoladeThreshold,
      });
      return null;
    }

    if (this.gate.exists(GameEventType.GAME_OVER, gameOver.timestamp)) {
      this.metrics.duplicateGames++;
      console.info('[ServerLogParser] Game already processed, skipping:', {
        line: currentIndex,
        map: gameOver.map,
        timestamp: gameOver.timestamp.toISOString(),
      });
      return null;
    }

    if (roundsFound < expectedRounds) {
      console.warn('[ServerLogParser] Fewer rounds than the final score:', {
        line: currentIndex,
        expectedRounds,
        roundsFound,
        rewindTarget,
      });
    }

    const event: GameOverEvent = {
      type: GameEventType.GAME_OVER,
      timestamp: gameOver.timestamp,
      map: gameOver.map,
      mode: gameOver.mode,
      subMode: gameOver.subMode,
      team1Score: gameOver.team1Score,
      team2Score: gameOver.team2Score,
      duration: gameOver.duration,
      appServerId: this.appServerId,
      roundsFound,
    };

    this.matchStarted = true;
    this.matchProcessingIndex = currentIndex;
    this.roundsSeenSinceRewind = 0;
    this.currentGame = event;
    this.clearBombState();
    this.metrics.gamesOpened++;
    this.accoladeSink?.queueAccolades(accolades);

    console.info('[ServerLogParser] Game over accepted, replaying rounds:', {
      line: currentIndex,
      map: event.map,
      score: `${event.team1Score}:${event.team2Score}`,
      accolades: accolades.length,
      rewindTarget,
    });

    return this.emit(event, rewindTarget);
  }

  /**
   * Walk back from the Game Over line counting Round_Start lines. The walk stops
   * at the previous Game Over line so an earlier game is never replayed again.
   */
  private scanBackForRounds(
    allLines: readonly string[],
    currentIndex: number,
    expectedRounds: number
  ): RoundScan {
    let roundsFound = 0;
    let earliestRound = currentIndex;
    let boundary = -1;

    for (let index = currentIndex - 1; index >= 0 && roundsFound < expectedRounds; index--) {
      const rawLine = allLines[index];
      if (rawLine === undefined) continue;

      const decoded = ServerLogLine.decode(rawLine, index);
      if (!decoded.ok) continue;

      if (this.gameOverMatcher.match(decoded.line)) {
        boundary = index;
        break;
      }
      if (this.roundStartMatcher.match(decoded.line)) {
        roundsFound++;
        earliestRound = index;
      }
    }

    if (roundsFound < expectedRounds) {
      return { rewindTarget: boundary + 1, roundsFound };
    }
    return { rewindTarget: earliestRound, roundsFound };
  }

  private closeMatch(line: ServerLogLine): ParseLineResult {
    console.info('[ServerLogParser] Game replay complete:', {
      line: line.index,
      map: this.currentGame?.map,
      roundsReplayed: this.roundsSeenSinceRewind,
    });

    this.matchStarted = false;
    this.matchProcessingIndex = null;
    this.currentGame = null;
    this.clearBombState();

    return this.emit({ type: GameEventType.GAME_PROCESSED, timestamp: line.timestamp }, line.index + 1);
  }

  private toGameEvent(match: InRoundMatch): GameEvent | null {
    if (match.type === BOMB_SIGNAL) {
      return this.handleBombSignal(match);
    }

    if (match.type === GameEventType.ROUND_START) {
      this.roundsSeenSinceRewind++;
      this.clearBombState();
    }
    return match;
  }

  private handleBombSignal(signal: BombSignal): BombEvent | null {
    switch (signal.kind) {
      case BombSignalKind.PLANTED:
        this.bombPlanter = signal.player;
        this.bombsite = signal.bombsite;
        return this.createBombEvent(BombAction.PLANTED, signal.player, signal.timestamp);

      case BombSignalKind.DEFUSE_BEGUN:
        this.bombDefuser = signal.player;
        return null;

      case BombSignalKind.DEFUSED:
        return this.createBombEvent(BombAction.DEFUSED, this.bombDefuser, signal.timestamp);

      case BombSignalKind.EXPLODED:
        return this.createBombEvent(BombAction.EXPLODED, this.bombPlanter, signal.timestamp);
    }
  }

  private createBombEvent(action: BombAction, actor: Player | null, timestamp: Date): BombEvent {
    if (!actor) {
      console.warn('[ServerLogParser] Bomb outcome without a tracked player:', {
        action,
        timestamp: timestamp.toISOString(),
      });
    }

    return {
      type: GameEventType.BOMB_EVENT,
      timestamp,
      action,
      actor,
      bombsite: this.bombsite,
    };
  }

  private clearBombState(): void {
    this.bombPlanter = null;
    this.bombsite = null;
    this.bombDefuser = null;
  }

  private emit(event: GameEvent, nextIndex: number): ParseLineResult {
    this.metrics.eventsEmitted++;
    return { event, nextIndex };
  }
}

function createEmptyMetrics(): ParserMetrics {
  return {
    linesProcessed: 0,
    undecodableLines: 0,
    gamesOpened: 0,
    gamesDiscarded: 0,
    duplicateGames: 0,
    eventsEmitted: 0,
  };
}
