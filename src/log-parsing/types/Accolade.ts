/**
 * End-of-game award line:
 *   ACCOLADE, FINAL: {type},<tab>PlayerName<id>,<tab>VALUE: v,<tab>POS: p,<tab>SCORE: s
 */
export interface AccoladeRecord {
  /** Award tag without braces, e.g. "mvp", "3k", "hsp" */
  type: string;
  playerName: string;
  /** Numeric id from the trailing <...> token, null for bots */
  playerId: number | null;
  value: number;
  position: number;
  score: number;
}
