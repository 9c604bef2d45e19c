import type ServerLogLine from '../parsing/ServerLogLine';
import { GameEventType } from '../types/GameEvent';
import type { AttackEvent } from '../types/GameEvent';
import { playerTokenSource, positionSource, readPlayer, readPosition } from '../utils/PlayerUtils';
import { readInt } from './LineMatcher';
import type { LineMatcher } from './LineMatcher';

const ATTACK_RE = new RegExp(
  `^${playerTokenSource('attacker')} ${positionSource('attacker')} attacked ` +
    `${playerTokenSource('victim')} ${positionSource('victim')} ` +
    `with "(?<weapon>[^"]+)" ` +
    `\\(damage "(?<damage>\\d+)"\\) ` +
    `\\(damage_armor "(?<armorDamage>\\d+)"\\) ` +
    `\\(health "(?<healthRemaining>\\d+)"\\) ` +
    `\\(armor "(?<armorRemaining>\\d+)"\\) ` +
    `\\(hitgroup "(?<hitGroup>[^"]+)"\\)$`
);

export class AttackMatcher implements LineMatcher<AttackEvent> {
  readonly name = 'attack';

  match(line: ServerLogLine): AttackEvent | null {
    const groups = line.body.match(ATTACK_RE)?.groups;
    if (!groups) return null;

    const attacker = readPlayer(groups, 'attacker');
    const victim = readPlayer(groups, 'victim');
    const attackerPosition = readPosition(groups, 'attacker');
    const victimPosition = readPosition(groups, 'victim');
    const damage = readInt(groups, 'damage');
    const armorDamage = readInt(groups, 'armorDamage');
    const healthRemaining = readInt(groups, 'healthRemaining');
    const armorRemaining = readInt(groups, 'armorRemaining');
    const { weapon, hitGroup } = groups;

    if (
      !attacker ||
      !victim ||
      !attackerPosition ||
      !victimPosition ||
      damage === null ||
      armorDamage === null ||
      healthRemaining === null ||
      armorRemaining === null ||
      !weapon ||
      !hitGroup
    ) {
      return null;
    }

    return {
      type: GameEventType.ATTACK,
      timestamp: line.timestamp,
      attacker,
      victim,
      attackerPosition,
      victimPosition,
      weapon,
      damage,
      armorDamage,
      healthRemaining,
      armorRemaining,
      hitGroup,
    };
  }
}
