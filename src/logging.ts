import * as path from 'path';
import log from 'electron-log/node';
import type { LogLevelName } from './config/ParserConfig';

export interface LoggingOptions {
  level: LogLevelName;
  /** Also write to this file when set */
  file?: string;
}

/**
 * Route console output through electron-log so every module's console.* calls
 * share its levels and optional file transport.
 */
export function configureLogging(options: LoggingOptions): void {
  log.transports.console.level = options.level;

  const file = options.file;
  if (file) {
    const resolved = path.resolve(file);
    log.transports.file.level = options.level;
    log.transports.file.resolvePathFn = () => resolved;
  } else {
    log.transports.file.level = false;
  }

  Object.assign(console, log.functions);
}
