import type ServerLogLine from '../parsing/ServerLogLine';
import type { AccoladeRecord } from '../types/Accolade';
import { readFloat, readInt } from './LineMatcher';
import type { LineMatcher } from './LineMatcher';

// Fields are separated by a comma plus a tab or spaces. The greedy name keeps
// any "<" in it and leaves the last <...> token as the id.
const ACCOLADE_RE = new RegExp(
  '^ACCOLADE, FINAL: \\{(?<type>[^}]+)\\}[,\\s]+' +
    '(?<playerName>.+)<(?<playerId>\\d+|BOT)>[,\\s]+' +
    'VALUE: (?<value>-?\\d+(?:\\.\\d+)?)[,\\s]+' +
    'POS: (?<position>\\d+)[,\\s]+' +
    'SCORE: (?<score>-?\\d+(?:\\.\\d+)?)\\s*$'
);

export class AccoladeMatcher implements LineMatcher<AccoladeRecord> {
  readonly name = 'accolade';

  match(line: ServerLogLine): AccoladeRecord | null {
    const groups = line.body.match(ACCOLADE_RE)?.groups;
    if (!groups) return null;

    const value = readFloat(groups, 'value');
    const position = readInt(groups, 'position');
    const score = readFloat(groups, 'score');
    const { type, playerName } = groups;
    if (value === null || position === null || score === null || !type || !playerName) {
      return null;
    }

    return {
      type,
      playerName,
      playerId: groups.playerId === 'BOT' ? null : readInt(groups, 'playerId'),
      value,
      position,
      score,
    };
  }
}
