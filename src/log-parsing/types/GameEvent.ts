/**
 * Game event types emitted by the server log parser
 */
export enum GameEventType {
  KILL = 'KILL',
  ASSIST = 'ASSIST',
  ATTACK = 'ATTACK',
  BOMB_EVENT = 'BOMB_EVENT',
  ROUND_START = 'ROUND_START',
  ROUND_END = 'ROUND_END',
  GAME_OVER = 'GAME_OVER',
  GAME_PROCESSED = 'GAME_PROCESSED',
}

export enum Team {
  CT = 'CT',
  TERRORIST = 'TERRORIST',
}

export enum AssistKind {
  Regular = 'Regular',
  Flash = 'Flash',
}

export enum BombAction {
  PLANTED = 'PLANTED',
  DEFUSED = 'DEFUSED',
  EXPLODED = 'EXPLODED',
}

/**
 * Player as it appears in a log token: "Name<slot><[U:1:N]|BOT><TEAM>"
 */
export interface Player {
  name: string;
  /** Steam ID3 in bracket form ("[U:1:123]"), null for bots */
  steamId: string | null;
  isBot: boolean;
  team: Team;
}

export interface Position {
  x: number;
  y: number;
  z: number;
}

interface BaseGameEvent {
  timestamp: Date;
}

export interface KillEvent extends BaseGameEvent {
  type: GameEventType.KILL;
  attacker: Player;
  victim: Player;
  attackerPosition: Position;
  victimPosition: Position;
  weapon: string;
  headshot: boolean;
  /** Raw parenthesised modifiers, e.g. ["headshot", "penetrated"] */
  modifiers: string[];
}

/**
 * Assist lines never carry coordinates; the positions are always null.
 */
export interface AssistEvent extends BaseGameEvent {
  type: GameEventType.ASSIST;
  assister: Player;
  victim: Player;
  assisterPosition: null;
  victimPosition: null;
  kind: AssistKind;
}

export interface AttackEvent extends BaseGameEvent {
  type: GameEventType.ATTACK;
  attacker: Player;
  victim: Player;
  attackerPosition: Position;
  victimPosition: Position;
  weapon: string;
  damage: number;
  armorDamage: number;
  healthRemaining: number;
  armorRemaining: number;
  hitGroup: string;
}

export interface BombEvent extends BaseGameEvent {
  type: GameEventType.BOMB_EVENT;
  action: BombAction;
  /** Planter for PLANTED/EXPLODED, last defuser for DEFUSED; null when nobody was tracked */
  actor: Player | null;
  bombsite: string | null;
}

export interface RoundStartEvent extends BaseGameEvent {
  type: GameEventType.ROUND_START;
}

export interface RoundEndEvent extends BaseGameEvent {
  type: GameEventType.ROUND_END;
  /** Account ids from the round stats block, in log order */
  players: number[];
}

export interface GameOverEvent extends BaseGameEvent {
  type: GameEventType.GAME_OVER;
  map: string;
  mode: string;
  subMode: string;
  team1Score: number;
  team2Score: number;
  /** Minutes, from the trailing "after N min" */
  duration: number;
  /** Dedicated server app id seen earlier in the same log, if any */
  appServerId: number | null;
  /** Round_Start lines located by the backward scan; below team1Score + team2Score on underrun */
  roundsFound: number;
}

/**
 * Synthetic marker: replay of the current game has caught up with its GAME_OVER line.
 */
export interface GameProcessedEvent extends BaseGameEvent {
  type: GameEventType.GAME_PROCESSED;
}

export type PlayerActionEvent = KillEvent | AssistEvent | AttackEvent;

export type GameEvent =
  | KillEvent
  | AssistEvent
  | AttackEvent
  | BombEvent
  | RoundStartEvent
  | RoundEndEvent
  | GameOverEvent
  | GameProcessedEvent;

/**
 * Returns the two players of a player-versus-player event, null for every other event.
 */
export function getActionPlayers(event: GameEvent): [Player, Player] | null {
  switch (event.type) {
    case GameEventType.KILL:
    case GameEventType.ATTACK:
      return [event.attacker, event.victim];
    case GameEventType.ASSIST:
      return [event.assister, event.victim];
    default:
      return null;
  }
}
