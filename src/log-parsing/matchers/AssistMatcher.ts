import type ServerLogLine from '../parsing/ServerLogLine';
import { AssistKind, GameEventType } from '../types/GameEvent';
import type { AssistEvent } from '../types/GameEvent';
import { playerTokenSource, readPlayer } from '../utils/PlayerUtils';
import type { LineMatcher } from './LineMatcher';

// Assist lines carry no coordinates
const ASSIST_RE = new RegExp(
  `^${playerTokenSource('assister')} (?<assistType>flash-assisted|assisted) killing ` +
    `${playerTokenSource('victim')}$`
);

export class AssistMatcher implements LineMatcher<AssistEvent> {
  readonly name = 'assist';

  match(line: ServerLogLine): AssistEvent | null {
    const groups = line.body.match(ASSIST_RE)?.groups;
    if (!groups) return null;

    const assister = readPlayer(groups, 'assister');
    const victim = readPlayer(groups, 'victim');
    if (!assister || !victim) return null;

    return {
      type: GameEventType.ASSIST,
      timestamp: line.timestamp,
      assister,
      victim,
      assisterPosition: null,
      victimPosition: null,
      kind: groups.assistType === 'flash-assisted' ? AssistKind.Flash : AssistKind.Regular,
    };
  }
}
