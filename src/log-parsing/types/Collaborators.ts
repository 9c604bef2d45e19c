import type { AccoladeRecord } from './Accolade';
import type { GameEvent, GameEventType } from './GameEvent';

/**
 * Receives every event the replay emits, in emission order.
 */
export interface GameEventSink {
  onEvent(event: GameEvent): void;
}

/**
 * Read-only lookup of games ingested by earlier runs.
 * Only consulted for GAME_OVER, keyed by the event timestamp.
 */
export interface ProcessedGameGate {
  exists(eventType: GameEventType.GAME_OVER, timestamp: Date): boolean;
}

/**
 * Receives the accolades of a game once its GAME_OVER has been accepted.
 */
export interface AccoladeSink {
  queueAccolades(accolades: AccoladeRecord[]): void;
}
