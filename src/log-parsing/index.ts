export { ServerLogParser } from './parsing/ServerLogParser';
export type { ServerLogParserOptions } from './parsing/ServerLogParser';
export { default as ServerLogLine, DecodeFailureReason } from './parsing/ServerLogLine';
export type { DecodeResult } from './parsing/ServerLogLine';
export { AccoladeAccumulator } from './parsing/AccoladeAccumulator';
export { readRoundStatsPlayers } from './parsing/RoundStatsReader';
export { LogReplayDriver } from './pipeline/LogReplayDriver';
export type { LogReplayDriverOptions, ReplaySummary, ReplayWarning } from './pipeline/LogReplayDriver';
export { readServerLogFile, splitServerLog } from './pipeline/ServerLogFileReader';
export {
  InMemoryProcessedGameStore,
  JsonFileProcessedGameStore,
  processedGameKey,
} from './stores/ProcessedGameStore';
export type { ProcessedGameStore } from './stores/ProcessedGameStore';
export * from './types/GameEvent';
export type { AccoladeRecord } from './types/Accolade';
export type { AccoladeSink, GameEventSink, ProcessedGameGate } from './types/Collaborators';
export type { ParseLineResponse, ParseLineResult } from './types/ParseLineResult';
export type { ParserMetrics } from './types/ParserMetrics';
export * from './types/ParserErrors';
