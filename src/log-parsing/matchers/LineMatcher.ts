import type ServerLogLine from '../parsing/ServerLogLine';

/**
 * Read-only view of the job's line buffer, for grammars that span several lines
 */
export interface MatchContext {
  allLines: readonly string[];
  roundStatsLookahead: number;
}

/**
 * One event grammar. Returns null when the line does not fit it.
 */
export interface LineMatcher<T> {
  readonly name: string;
  match(line: ServerLogLine, context: MatchContext): T | null;
}

export type MatchGroups = Record<string, string | undefined>;

export function readInt(groups: MatchGroups, key: string): number | null {
  const value = groups[key];
  if (value === undefined) return null;
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : null;
}

export function readFloat(groups: MatchGroups, key: string): number | null {
  const value = groups[key];
  if (value === undefined) return null;
  const parsed = parseFloat(value);
  return Number.isFinite(parsed) ? parsed : null;
}
