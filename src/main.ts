#!/usr/bin/env node
import * as dotenv from 'dotenv';
import { ParserConfig } from './config/ParserConfig';
import { parseCliArgs, resolveConsoleLevel, USAGE } from './cliArgs';
import { configureLogging } from './logging';
import { LogReplayDriver } from './log-parsing/pipeline/LogReplayDriver';
import type { ReplaySummary, ReplayWarning } from './log-parsing/pipeline/LogReplayDriver';
import { JsonFileProcessedGameStore } from './log-parsing/stores/ProcessedGameStore';
import type { ProcessedGameStore } from './log-parsing/stores/ProcessedGameStore';
import type { AccoladeRecord } from './log-parsing/types/Accolade';
import { GameEventType } from './log-parsing/types/GameEvent';
import type { GameEvent } from './log-parsing/types/GameEvent';

// Load environment variables from .env file
dotenv.config();

async function replayFile(
  filePath: string,
  store: ProcessedGameStore,
  printEvents: boolean
): Promise<ReplaySummary> {
  const emitted: GameEvent[] = [];
  const accolades: AccoladeRecord[] = [];

  const driver = new LogReplayDriver({
    gate: store,
    accoladeSink: { queueAccolades: batch => accolades.push(...batch) },
    sink: { onEvent: event => emitted.push(event) },
  });
  driver.on('warning', (warning: ReplayWarning) => console.warn('[cs2-log-replay] Replay warning:', { filePath, ...warning }));

  const summary = await driver.processFile(filePath);

  for (const event of emitted) {
    if (printEvents) {
      process.stdout.write(`${JSON.stringify({ file: filePath, ...event })}\n`);
    }
    if (event.type === GameEventType.GAME_OVER) {
      await store.markProcessed(GameEventType.GAME_OVER, event.timestamp);
    }
  }

  console.info('[cs2-log-replay] File summary:', {
    filePath,
    lines: summary.lines,
    games: summary.games.map(game => `${game.map} ${game.team1Score}:${game.team2Score}`),
    accolades: accolades.length,
    events: summary.eventCounts,
    skippedEvents: summary.skippedEvents,
    appServerId: summary.appServerId,
    metrics: summary.metrics,
  });
  return summary;
}

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));
  configureLogging({
    level: resolveConsoleLevel(ParserConfig.LOG_LEVEL, args.printEvents),
    file: ParserConfig.LOG_FILE,
  });

  if (args.files.length === 0) {
    console.error(USAGE);
    process.exitCode = 1;
    return;
  }

  const store = await JsonFileProcessedGameStore.open(ParserConfig.PROCESSED_GAMES_FILE);

  // Each file gets its own driver and parser; only the store is shared
  const results = await Promise.allSettled(
    args.files.map(filePath => replayFile(filePath, store, args.printEvents))
  );

  results.forEach((result, i) => {
    if (result.status === 'rejected') {
      console.error('[cs2-log-replay] Failed to replay file:', args.files[i], result.reason);
      process.exitCode = 1;
    }
  });
}

if (require.main === module) {
  main().catch(error => {
    console.error('[cs2-log-replay] Fatal error:', error);
    process.exitCode = 1;
  });
}
