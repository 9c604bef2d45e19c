/**
 * Centralized configuration for server log replay.
 * Values are read from the environment once per access so a loaded .env applies.
 */
export type LogLevelName = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly';

const LOG_LEVELS: readonly LogLevelName[] = ['error', 'warn', 'info', 'verbose', 'debug', 'silly'];

export class ParserConfig {
  public static readonly DEFAULT_ACCOLADE_THRESHOLD = 6;
  public static readonly DEFAULT_ROUND_STATS_LOOKAHEAD = 64;
  public static readonly DEFAULT_PROCESSED_GAMES_FILE = './data/processed-games.json';

  /**
   * Minimum accolade lines before a GAME_OVER counts as a real game
   */
  public static get ACCOLADE_THRESHOLD(): number {
    return readPositiveInt('ACCOLADE_THRESHOLD', this.DEFAULT_ACCOLADE_THRESHOLD);
  }

  /**
   * Maximum lines scanned after a Round_End for the player stats block
   */
  public static get ROUND_STATS_LOOKAHEAD(): number {
    return readPositiveInt('ROUND_STATS_LOOKAHEAD', this.DEFAULT_ROUND_STATS_LOOKAHEAD);
  }

  public static get SKIP_BOT_ONLY_EVENTS(): boolean {
    return process.env.SKIP_BOT_ONLY_EVENTS !== 'false';
  }

  public static get PROCESSED_GAMES_FILE(): string {
    return process.env.PROCESSED_GAMES_FILE || this.DEFAULT_PROCESSED_GAMES_FILE;
  }

  public static get LOG_LEVEL(): LogLevelName {
    return parseLogLevel(process.env.LOG_LEVEL);
  }

  /**
   * File transport path; undefined keeps logging on the console only
   */
  public static get LOG_FILE(): string | undefined {
    return process.env.LOG_FILE || undefined;
  }
}

export function parseLogLevel(value: string | undefined): LogLevelName {
  const normalized = value?.trim().toLowerCase();
  const level = LOG_LEVELS.find(candidate => candidate === normalized);
  return level ?? 'info';
}

function readPositiveInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }

  const parsed = parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    console.warn(`[ParserConfig] Ignoring invalid ${name}:`, raw);
    return fallback;
  }
  return parsed;
}
