import * as fs from 'fs';
import * as path from 'path';
import { Mutex } from 'async-mutex';
import type { ProcessedGameGate } from '../types/Collaborators';
import { GameEventType } from '../types/GameEvent';

/**
 * Already-processed gate that can also record games.
 * exists() is synchronous; recording may touch disk.
 */
export interface ProcessedGameStore extends ProcessedGameGate {
  markProcessed(eventType: GameEventType.GAME_OVER, timestamp: Date): Promise<void>;
  size(): number;
}

interface ProcessedGamesFile {
  version: number;
  games: string[];
}

const FILE_VERSION = 1;

export function processedGameKey(eventType: GameEventType.GAME_OVER, timestamp: Date): string {
  return `${eventType}:${timestamp.toISOString()}`;
}

export class InMemoryProcessedGameStore implements ProcessedGameStore {
  private readonly keys: Set<string>;

  constructor(seed: Iterable<string> = []) {
    this.keys = new Set(seed);
  }

  exists(eventType: GameEventType.GAME_OVER, timestamp: Date): boolean {
    return this.keys.has(processedGameKey(eventType, timestamp));
  }

  async markProcessed(eventType: GameEventType.GAME_OVER, timestamp: Date): Promise<void> {
    this.keys.add(processedGameKey(eventType, timestamp));
  }

  size(): number {
    return this.keys.size;
  }

  keysSnapshot(): string[] {
    return Array.from(this.keys);
  }
}

/**
 * JSON file backed store. The file is read once on open; every new game
 * rewrites it atomically (temp file + rename) under a mutex.
 */
export class JsonFileProcessedGameStore implements ProcessedGameStore {
  private readonly mutex = new Mutex();

  private constructor(
    private readonly filePath: string,
    private readonly keys: Set<string>
  ) {}

  /**
   * Load the store; a missing file gives an empty store
   */
  static async open(filePath: string): Promise<JsonFileProcessedGameStore> {
    const resolved = path.resolve(filePath);
    const keys = await readKeys(resolved);
    console.info('[ProcessedGameStore] Loaded processed games:', { path: resolved, count: keys.size });
    return new JsonFileProcessedGameStore(resolved, keys);
  }

  exists(eventType: GameEventType.GAME_OVER, timestamp: Date): boolean {
    return this.keys.has(processedGameKey(eventType, timestamp));
  }

  async markProcessed(eventType: GameEventType.GAME_OVER, timestamp: Date): Promise<void> {
    const key = processedGameKey(eventType, timestamp);

    await this.mutex.runExclusive(async () => {
      if (this.keys.has(key)) return;

      this.keys.add(key);
      try {
        await this.atomicWrite();
      } catch (error) {
        this.keys.delete(key);
        console.error('[ProcessedGameStore] Failed to save processed games:', error);
        throw error;
      }
      console.debug('[ProcessedGameStore] Recorded game:', key);
    });
  }

  size(): number {
    return this.keys.size;
  }

  getFilePath(): string {
    return this.filePath;
  }

  private async atomicWrite(): Promise<void> {
    const data: ProcessedGamesFile = { version: FILE_VERSION, games: Array.from(this.keys).sort() };
    const tmpPath = `${this.filePath}.tmp`;

    try {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.promises.writeFile(tmpPath, JSON.stringify(data, null, 2), 'utf-8');
      await fs.promises.rename(tmpPath, this.filePath);
    } catch (error) {
      await fs.promises.rm(tmpPath, { force: true });
      throw error;
    }
  }
}

async function readKeys(filePath: string): Promise<Set<string>> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return new Set();
    }
    throw error;
  }

  const parsed: unknown = JSON.parse(raw);
  const games: unknown =
    typeof parsed === 'object' && parsed !== null ? Reflect.get(parsed, 'games') : undefined;
  if (!Array.isArray(games) || !games.every((game): game is string => typeof game === 'string')) {
    throw new Error(`Processed games file has no "games" string list: ${filePath}`);
  }
  return new Set(games);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
