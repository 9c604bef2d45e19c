import { describe, it, expect, beforeEach } from 'vitest';
import { ServerLogParser } from '../../../src/log-parsing/parsing/ServerLogParser';
import { InMemoryProcessedGameStore, processedGameKey } from '../../../src/log-parsing/stores/ProcessedGameStore';
import type { AccoladeRecord } from '../../../src/log-parsing/types/Accolade';
import { BombAction, GameEventType, Team } from '../../../src/log-parsing/types/GameEvent';
import type { ParseLineResponse } from '../../../src/log-parsing/types/ParseLineResult';
import { ParserContractError, ParserErrorCode } from '../../../src/log-parsing/types/ParserErrors';
import {
  DEFAULT_START_TIME,
  ServerLogBuilder,
  expectEvent,
  humanToken,
} from '../../helpers/ServerLogBuilder';

const ALICE = humanToken('Alice', 2, 1001, 'CT');
const BOB = humanToken('Bob', 3, 1002, 'TERRORIST');

interface Step {
  index: number;
  response: ParseLineResponse;
}

/**
 * Minimal driver loop: honours nextIndex and records every emitted event
 */
function replayAll(parser: ServerLogParser, lines: string[]): Step[] {
  const steps: Step[] = [];
  let index = 0;
  while (index < lines.length) {
    const rawLine = lines[index];
    if (rawLine === undefined) break;
    const response = parser.parseLine(rawLine, lines, index);
    if (response) {
      steps.push({ index, response });
      index = response.nextIndex;
    } else {
      index++;
    }
  }
  return steps;
}

function parseAt(parser: ServerLogParser, lines: string[], index: number) {
  const rawLine = lines[index];
  if (rawLine === undefined) {
    throw new Error(`No fixture line at ${index}`);
  }
  return parser.parseLine(rawLine, lines, index);
}

function captureError(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  throw new Error('Expected an error');
}

function secondsAfterStart(seconds: number): Date {
  return new Date(DEFAULT_START_TIME.getTime() + seconds * 1000);
}

describe('ServerLogParser', () => {
  let queued: AccoladeRecord[][];
  let parser: ServerLogParser;

  beforeEach(() => {
    queued = [];
    parser = new ServerLogParser({
      accoladeThreshold: 6,
      roundStatsLookahead: 64,
      accoladeSink: { queueAccolades: accolades => queued.push(accolades) },
    });
  });

  describe('accolade threshold', () => {
    it('discards a Game Over preceded by five accolades', () => {
      const lines = new ServerLogBuilder().rounds(2).accolades(5).gameOver(1, 1).build();

      expect(parseAt(parser, lines, 7)).toBeNull();
      expect(parser.isMatchOpen()).toBe(false);
      expect(parser.getMetrics().gamesDiscarded).toBe(1);
      expect(queued).toEqual([]);
    });

    it('accepts a Game Over preceded by six accolades and rewinds to its first round', () => {
      const lines = new ServerLogBuilder().rounds(2).accolades(6).gameOver(1, 1).build();

      const result = parseAt(parser, lines, 8);

      expect(expectEvent(result, GameEventType.GAME_OVER).team1Score).toBe(1);
      expect(result?.nextIndex).toBe(0);
      expect(parser.isMatchOpen()).toBe(true);
      expect(queued).toHaveLength(1);
      expect(queued[0]).toHaveLength(6);
    });

    it('uses the configured threshold', () => {
      const lenient = new ServerLogParser({ accoladeThreshold: 2 });
      const lines = new ServerLogBuilder().rounds(1).accolades(2).gameOver(1, 0).build();

      expect(expectEvent(parseAt(lenient, lines, 3), GameEventType.GAME_OVER).map).toBe('de_inferno');
    });
  });

  describe('full game replay', () => {
    // 26 Round_Start lines (0-25), 6 accolades (26-31), Game Over 16:10 (32)
    const lines = new ServerLogBuilder().rounds(26).accolades(6).gameOver(16, 10, 'de_inferno', 45).build();

    it('ignores rounds while no game is open', () => {
      for (let index = 0; index < 32; index++) {
        expect(parseAt(parser, lines, index)).toBeNull();
      }
    });

    it('emits the Game Over with a rewind to line 0', () => {
      const result = parseAt(parser, lines, 32);

      expect(result).toEqual({
        event: {
          type: GameEventType.GAME_OVER,
          timestamp: secondsAfterStart(32),
          map: 'de_inferno',
          mode: 'competitive',
          subMode: 'mg_active',
          team1Score: 16,
          team2Score: 10,
          duration: 45,
          appServerId: null,
          roundsFound: 26,
        },
        nextIndex: 0,
      });
    });

    it('replays the rounds and closes the game at the Game Over line', () => {
      const steps = replayAll(parser, lines);

      expect(steps).toHaveLength(28);
      expect(steps[0]?.index).toBe(32);
      expect(steps[0]?.response.nextIndex).toBe(0);

      const rounds = steps.slice(1, 27);
      expect(rounds.every(step => step.response.event.type === GameEventType.ROUND_START)).toBe(true);
      expect(rounds.map(step => step.index)).toEqual(Array.from({ length: 26 }, (_, i) => i));
      expect(rounds.every(step => step.response.nextIndex === step.index + 1)).toBe(true);

      const last = steps[27];
      expect(last?.index).toBe(32);
      expect(last?.response).toEqual({
        event: { type: GameEventType.GAME_PROCESSED, timestamp: secondsAfterStart(32) },
        nextIndex: 33,
      });
      expect(parser.isMatchOpen()).toBe(false);
    });

    it('counts lines, games and events', () => {
      replayAll(parser, lines);

      expect(parser.getMetrics()).toEqual({
        linesProcessed: 66,
        undecodableLines: 0,
        gamesOpened: 1,
        gamesDiscarded: 0,
        duplicateGames: 0,
        eventsEmitted: 28,
      });
    });
  });

  describe('deduplication', () => {
    it('does not emit or open a game the gate already knows', () => {
      const lines = new ServerLogBuilder().rounds(2).accolades(6).gameOver(1, 1).build();
      const gate = new InMemoryProcessedGameStore([
        processedGameKey(GameEventType.GAME_OVER, secondsAfterStart(8)),
      ]);
      const deduped = new ServerLogParser({
        gate,
        accoladeThreshold: 6,
        accoladeSink: { queueAccolades: accolades => queued.push(accolades) },
      });

      expect(replayAll(deduped, lines)).toEqual([]);
      expect(deduped.isMatchOpen()).toBe(false);
      expect(deduped.getMetrics().duplicateGames).toBe(1);
      expect(queued).toEqual([]);
    });
  });

  describe('backward scan', () => {
    it('rewinds to line 0 when fewer rounds exist than the score', () => {
      const lines = new ServerLogBuilder().rounds(3).accolades(6).gameOver(16, 10).build();

      const result = parseAt(parser, lines, 9);

      expect(expectEvent(result, GameEventType.GAME_OVER).roundsFound).toBe(3);
      expect(result?.nextIndex).toBe(0);
    });

    it('never locates more rounds than the score', () => {
      const lines = new ServerLogBuilder().rounds(5).accolades(6).gameOver(2, 1).build();

      const result = parseAt(parser, lines, 11);

      expect(expectEvent(result, GameEventType.GAME_OVER).roundsFound).toBe(3);
      expect(result?.nextIndex).toBe(2);
    });

    it('stops at the previous Game Over line', () => {
      const lines = new ServerLogBuilder()
        .rounds(2)
        .accolades(6)
        .gameOver(1, 1, 'de_dust2')
        .rounds(2)
        .accolades(6)
        .gameOver(16, 10, 'de_nuke')
        .build();

      const steps = replayAll(parser, lines);

      expect(steps.map(step => [step.index, step.response.event.type, step.response.nextIndex])).toEqual([
        [8, GameEventType.GAME_OVER, 0],
        [0, GameEventType.ROUND_START, 1],
        [1, GameEventType.ROUND_START, 2],
        [8, GameEventType.GAME_PROCESSED, 9],
        [17, GameEventType.GAME_OVER, 9],
        [9, GameEventType.ROUND_START, 10],
        [10, GameEventType.ROUND_START, 11],
        [17, GameEventType.GAME_PROCESSED, 18],
      ]);
      expect(expectEvent(steps[4]?.response ?? null, GameEventType.GAME_OVER).roundsFound).toBe(2);
    });
  });

  describe('in-round events', () => {
    it('emits kills, attacks, assists and round ends only inside an open game', () => {
      const lines = new ServerLogBuilder()
        .roundStart()
        .kill(ALICE, BOB, 'ak47', ' (headshot)')
        .attack(ALICE, BOB)
        .assist(BOB, ALICE, true)
        .roundEnd()
        .accolades(6)
        .gameOver(1, 0)
        .build();

      const steps = replayAll(parser, lines);

      expect(steps.map(step => [step.index, step.response.event.type])).toEqual([
        [11, GameEventType.GAME_OVER],
        [0, GameEventType.ROUND_START],
        [1, GameEventType.KILL],
        [2, GameEventType.ATTACK],
        [3, GameEventType.ASSIST],
        [4, GameEventType.ROUND_END],
        [11, GameEventType.GAME_PROCESSED],
      ]);

      const kill = expectEvent(steps[2]?.response ?? null, GameEventType.KILL);
      expect(kill.headshot).toBe(true);
      expect(kill.attacker.team).toBe(Team.CT);
      expect(kill.attackerPosition).toEqual({ x: 10, y: 20, z: 30 });
      expect(kill.victimPosition).toEqual({ x: -40, y: 50, z: -60 });

      const attack = expectEvent(steps[3]?.response ?? null, GameEventType.ATTACK);
      expect(attack.attackerPosition).toEqual({ x: 1, y: 2, z: 3 });
      expect(attack.victimPosition).toEqual({ x: 4, y: 5, z: 6 });

      const assist = expectEvent(steps[4]?.response ?? null, GameEventType.ASSIST);
      expect(assist.assisterPosition).toBeNull();
      expect(assist.victimPosition).toBeNull();

      expect(expectEvent(steps[5]?.response ?? null, GameEventType.ROUND_END).players).toEqual([]);
    });

    it('attributes bomb outcomes to the tracked planter and defuser', () => {
      const lines = new ServerLogBuilder()
        .roundStart()
        .line(`${BOB} triggered "Planted_The_Bomb" at bombsite A`)
        .line(`${ALICE} triggered "Begin_Bomb_Defuse_With_Kit"`)
        .line('Team "CT" triggered "SFUI_Notice_Bomb_Defused" (CT "1") (T "0")')
        .roundStart()
        .line(`${BOB} triggered "Planted_The_Bomb" at bombsite B`)
        .line('Team "TERRORIST" triggered "SFUI_Notice_Target_Bombed" (CT "1") (T "1")')
        .roundStart()
        .line('Team "TERRORIST" triggered "SFUI_Notice_Target_Bombed" (CT "1") (T "2")')
        .accolades(6)
        .gameOver(1, 2)
        .build();

      const steps = replayAll(parser, lines);
      const bombs = steps
        .filter(step => step.response.event.type === GameEventType.BOMB_EVENT)
        .map(step => expectEvent(step.response, GameEventType.BOMB_EVENT));

      expect(bombs.map(bomb => [bomb.action, bomb.actor?.name ?? null, bomb.bombsite])).toEqual([
        [BombAction.PLANTED, 'Bob', 'A'],
        [BombAction.DEFUSED, 'Alice', 'A'],
        [BombAction.PLANTED, 'Bob', 'B'],
        [BombAction.EXPLODED, 'Bob', 'B'],
        [BombAction.EXPLODED, null, null],
      ]);
      // The defuse attempt itself is not an event
      expect(steps.some(step => step.index === 2)).toBe(false);
    });
  });

  describe('server app id', () => {
    it('attaches the app id from an unstamped startup line', () => {
      const lines = new ServerLogBuilder()
        .unstamped('ResetBreakpadAppId: Setting dedicated server app id: 2347773')
        .rounds(1)
        .accolades(6)
        .gameOver(1, 0)
        .build();

      const steps = replayAll(parser, lines);

      expect(parser.getAppServerId()).toBe(2347773);
      expect(expectEvent(steps[0]?.response ?? null, GameEventType.GAME_OVER).appServerId).toBe(2347773);
    });

    it('reads the startup line when it is not wrapped in an envelope', () => {
      const lines = new ServerLogBuilder()
        .raw('ResetBreakpadAppId: Setting dedicated server app id: 730')
        .build();

      expect(parseAt(parser, lines, 0)).toBeNull();
      expect(parser.getAppServerId()).toBe(730);
      expect(parser.getMetrics().undecodableLines).toBe(1);
    });
  });

  describe('contract violations', () => {
    const lines = new ServerLogBuilder().rounds(2).accolades(6).gameOver(1, 1).roundStart().build();

    it('rejects a cursor outside the buffer', () => {
      for (const index of [-1, 10, 1.5]) {
        const error = captureError(() => parser.parseLine('{}', lines, index));
        expect(error).toBeInstanceOf(ParserContractError);
        if (error instanceof ParserContractError) {
          expect(error.code).toBe(ParserErrorCode.INDEX_OUT_OF_RANGE);
        }
      }
    });

    it('rejects a buffer that is not an array', () => {
      // Simulates an untyped caller
      const notLines = JSON.parse('{"length": 3}');

      const error = captureError(() => parser.parseLine('{}', notLines, 0));

      expect(error).toBeInstanceOf(ParserContractError);
      if (error instanceof ParserContractError) {
        expect(error.code).toBe(ParserErrorCode.INVALID_LINE_BUFFER);
      }
    });

    it('rejects skipping past the Game Over line of an open game', () => {
      expect(parseAt(parser, lines, 8)?.nextIndex).toBe(0);

      const error = captureError(() => parseAt(parser, lines, 9));

      expect(error).toBeInstanceOf(ParserContractError);
      if (error instanceof ParserContractError) {
        expect(error.code).toBe(ParserErrorCode.REPLAY_CURSOR_SKIPPED);
        expect(error.index).toBe(9);
      }
    });
  });

  describe('noise', () => {
    it('skips lines that do not decode', () => {
      const lines = new ServerLogBuilder().raw('not json').raw('{"time":"x"}').unstamped('Server banner').build();

      expect(replayAll(parser, lines)).toEqual([]);
      expect(parser.getMetrics().undecodableLines).toBe(3);
    });
  });

  describe('reset', () => {
    it('clears the open game, app id and metrics', () => {
      const lines = new ServerLogBuilder()
        .unstamped('ResetBreakpadAppId: Setting dedicated server app id: 42')
        .rounds(1)
        .accolades(6)
        .gameOver(1, 0)
        .build();
      for (let index = 0; index <= 8; index++) {
        parseAt(parser, lines, index);
      }
      expect(parser.isMatchOpen()).toBe(true);

      parser.reset();

      expect(parser.isMatchOpen()).toBe(false);
      expect(parser.getAppServerId()).toBeNull();
      expect(parser.getMetrics().linesProcessed).toBe(0);
      expect(parseAt(parser, lines, 1)).toBeNull();
    });
  });
});
