import type ServerLogLine from '../parsing/ServerLogLine';
import { Team } from '../types/GameEvent';
import type { Player } from '../types/GameEvent';
import { playerTokenSource, readPlayer } from '../utils/PlayerUtils';
import type { LineMatcher } from './LineMatcher';

const PLANT_RE = new RegExp(
  `^${playerTokenSource('planter')} triggered "Planted_The_Bomb" at bombsite (?<bombsite>[AB])$`
);
const DEFUSE_BEGIN_RE = new RegExp(
  `^${playerTokenSource('defuser')} triggered "Begin_Bomb_Defuse_(?:With|Without)_Kit"$`
);
const DEFUSED_RE = /^Team "CT" triggered "SFUI_Notice_Bomb_Defused"/;
const EXPLODED_RE = /^Team "TERRORIST" triggered "SFUI_Notice_Target_Bombed"/;

export const BOMB_SIGNAL = 'BOMB_SIGNAL';

export enum BombSignalKind {
  PLANTED = 'PLANTED',
  DEFUSE_BEGUN = 'DEFUSE_BEGUN',
  DEFUSED = 'DEFUSED',
  EXPLODED = 'EXPLODED',
}

/**
 * Raw bomb line. Outcome lines name no player; the parser attributes them
 * from the plant and defuse-begin lines it has seen in the round.
 */
export type BombSignal =
  | { type: typeof BOMB_SIGNAL; kind: BombSignalKind.PLANTED; player: Player; bombsite: string; timestamp: Date }
  | { type: typeof BOMB_SIGNAL; kind: BombSignalKind.DEFUSE_BEGUN; player: Player; timestamp: Date }
  | { type: typeof BOMB_SIGNAL; kind: BombSignalKind.DEFUSED | BombSignalKind.EXPLODED; timestamp: Date };

export class BombMatcher implements LineMatcher<BombSignal> {
  readonly name = 'bomb';

  match(line: ServerLogLine): BombSignal | null {
    const { body, timestamp } = line;

    const plant = body.match(PLANT_RE)?.groups;
    if (plant) {
      const player = readPlayer(plant, 'planter');
      const bombsite = plant.bombsite;
      if (!player || !bombsite) return null;
      return { type: BOMB_SIGNAL, kind: BombSignalKind.PLANTED, player, bombsite, timestamp };
    }

    const defuse = body.match(DEFUSE_BEGIN_RE)?.groups;
    if (defuse) {
      const player = readPlayer(defuse, 'defuser');
      // Only a CT can defuse
      if (!player || player.team !== Team.CT) return null;
      return { type: BOMB_SIGNAL, kind: BombSignalKind.DEFUSE_BEGUN, player, timestamp };
    }

    if (DEFUSED_RE.test(body)) {
      return { type: BOMB_SIGNAL, kind: BombSignalKind.DEFUSED, timestamp };
    }
    if (EXPLODED_RE.test(body)) {
      return { type: BOMB_SIGNAL, kind: BombSignalKind.EXPLODED, timestamp };
    }
    return null;
  }
}
