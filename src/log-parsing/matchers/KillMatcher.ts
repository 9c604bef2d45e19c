import type ServerLogLine from '../parsing/ServerLogLine';
import { GameEventType } from '../types/GameEvent';
import type { KillEvent } from '../types/GameEvent';
import { playerTokenSource, positionSource, readPlayer, readPosition } from '../utils/PlayerUtils';
import type { LineMatcher } from './LineMatcher';

// "A<2><[U:1:1]><CT>" [1 2 3] killed "B<3><BOT><TERRORIST>" [4 5 6] with "ak47" (headshot) (penetrated)
const KILL_RE = new RegExp(
  `^${playerTokenSource('attacker')} ${positionSource('attacker')} killed (?:other )?` +
    `${playerTokenSource('victim')} ${positionSource('victim')} ` +
    `with "(?<weapon>[^"]+)"(?<modifiers>(?: \\([^)]+\\))*)$`
);
const MODIFIER_RE = /\(([^)]+)\)/g;

export function parseModifiers(text: string | undefined): string[] {
  if (!text) return [];
  return Array.from(text.matchAll(MODIFIER_RE), match => match[1] ?? '').filter(Boolean);
}

export class KillMatcher implements LineMatcher<KillEvent> {
  readonly name = 'kill';

  match(line: ServerLogLine): KillEvent | null {
    const groups = line.body.match(KILL_RE)?.groups;
    if (!groups) return null;

    const attacker = readPlayer(groups, 'attacker');
    const victim = readPlayer(groups, 'victim');
    const attackerPosition = readPosition(groups, 'attacker');
    const victimPosition = readPosition(groups, 'victim');
    const weapon = groups.weapon;
    if (!attacker || !victim || !attackerPosition || !victimPosition || !weapon) {
      return null;
    }

    const modifiers = parseModifiers(groups.modifiers);
    return {
      type: GameEventType.KILL,
      timestamp: line.timestamp,
      attacker,
      victim,
      attackerPosition,
      victimPosition,
      weapon,
      headshot: modifiers.some(modifier => modifier.includes('headshot')),
      modifiers,
    };
  }
}
