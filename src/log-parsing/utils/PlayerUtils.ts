import { Team } from '../types/GameEvent';
import type { Player, Position } from '../types/GameEvent';

/**
 * Utility functions for player tokens in server log lines.
 *
 * Token format: "Name<slot><[U:1:N]|BOT><CT|TERRORIST>"
 */

const BOT_MARKER = 'BOT';

/**
 * Regex source for one quoted player token, with named groups prefixed by `role`
 * (e.g. `attackerName`, `attackerSteamId`, `attackerTeam`).
 */
export function playerTokenSource(role: string): string {
  return (
    `"(?<${role}Name>.+?)<\\d+>` +
    `<(?<${role}SteamId>\\[U:\\d+:\\d+\\]|${BOT_MARKER})>` +
    `<(?<${role}Team>CT|TERRORIST)>"`
  );
}

/**
 * Regex source for a bracketed "[x y z]" position with groups `${role}X/Y/Z`
 */
export function positionSource(role: string): string {
  return `\\[(?<${role}X>-?\\d+) (?<${role}Y>-?\\d+) (?<${role}Z>-?\\d+)\\]`;
}

type MatchGroups = Record<string, string | undefined>;

export function parseTeam(value: string | undefined): Team | null {
  switch (value) {
    case Team.CT:
      return Team.CT;
    case Team.TERRORIST:
      return Team.TERRORIST;
    default:
      return null;
  }
}

/**
 * Build a Player from the groups of a playerTokenSource(role) match.
 * The BOT marker in place of a Steam ID yields steamId null and isBot true.
 */
export function readPlayer(groups: MatchGroups, role: string): Player | null {
  const name = groups[`${role}Name`];
  const marker = groups[`${role}SteamId`];
  const team = parseTeam(groups[`${role}Team`]);
  if (name === undefined || marker === undefined || team === null) {
    return null;
  }

  const isBot = marker === BOT_MARKER;
  return {
    name,
    steamId: isBot ? null : marker,
    isBot,
    team,
  };
}

export function readPosition(groups: MatchGroups, role: string): Position | null {
  const x = parseCoordinate(groups[`${role}X`]);
  const y = parseCoordinate(groups[`${role}Y`]);
  const z = parseCoordinate(groups[`${role}Z`]);
  if (x === null || y === null || z === null) {
    return null;
  }
  return { x, y, z };
}

function parseCoordinate(value: string | undefined): number | null {
  if (value === undefined) return null;
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Check if both players of a player-versus-player event are bots
 */
export function isBotOnly(players: readonly Player[]): boolean {
  return players.length > 0 && players.every(player => player.isBot);
}
