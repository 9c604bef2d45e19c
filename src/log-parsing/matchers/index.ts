import type { AssistEvent, AttackEvent, KillEvent, RoundEndEvent, RoundStartEvent } from '../types/GameEvent';
import { AccoladeMatcher } from './AccoladeMatcher';
import { AssistMatcher } from './AssistMatcher';
import { AttackMatcher } from './AttackMatcher';
import { BombMatcher } from './BombMatcher';
import type { BombSignal } from './BombMatcher';
import { GameOverMatcher } from './GameOverMatcher';
import { KillMatcher } from './KillMatcher';
import type { LineMatcher } from './LineMatcher';
import { RoundEndMatcher, RoundStartMatcher } from './RoundMatchers';

export type InRoundMatch =
  | AttackEvent
  | KillEvent
  | AssistEvent
  | BombSignal
  | RoundStartEvent
  | RoundEndEvent;

/**
 * Grammars that only produce events while a game is open, in priority order.
 * The first matcher that accepts a line wins; add a grammar by appending here.
 */
export function createInRoundMatchers(): LineMatcher<InRoundMatch>[] {
  return [
    new AttackMatcher(),
    new KillMatcher(),
    new AssistMatcher(),
    new BombMatcher(),
    new RoundStartMatcher(),
    new RoundEndMatcher(),
  ];
}

export { AccoladeMatcher, AssistMatcher, AttackMatcher, BombMatcher, GameOverMatcher, KillMatcher };
export { RoundEndMatcher, RoundStartMatcher };
export { BOMB_SIGNAL, BombSignalKind } from './BombMatcher';
export type { BombSignal } from './BombMatcher';
export type { GameOverLine } from './GameOverMatcher';
export type { LineMatcher, MatchContext } from './LineMatcher';
export { matchServerAppId } from './ServerAppIdMatcher';
