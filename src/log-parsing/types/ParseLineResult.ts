import type { GameEvent } from './GameEvent';

/**
 * One emitted event plus the index the caller must resume scanning from.
 * nextIndex may be below the current index (rewind) or above it.
 */
export interface ParseLineResponse {
  event: GameEvent;
  nextIndex: number;
}

/**
 * null means "no event, advance by 1".
 */
export type ParseLineResult = ParseLineResponse | null;
