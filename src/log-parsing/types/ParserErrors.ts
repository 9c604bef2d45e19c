/**
 * Error types for caller contract violations in the log replay.
 *
 * Malformed log data never throws; these errors only signal a driver that
 * broke the parseLine contract.
 */

/**
 * Error codes for programmatic error handling
 */
export enum ParserErrorCode {
  INVALID_LINE_BUFFER = 'INVALID_LINE_BUFFER',
  INDEX_OUT_OF_RANGE = 'INDEX_OUT_OF_RANGE',
  REPLAY_CURSOR_SKIPPED = 'REPLAY_CURSOR_SKIPPED',
  REPLAY_LOOP_DETECTED = 'REPLAY_LOOP_DETECTED',
}

/**
 * Base error class for all parser errors
 */
export abstract class ParserError extends Error {
  public readonly code: ParserErrorCode;
  public readonly timestamp: Date;

  constructor(message: string, code: ParserErrorCode) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.timestamp = new Date();

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown when the line buffer or cursor handed to parseLine is unusable
 */
export class ParserContractError extends ParserError {
  public readonly index: number | null;

  constructor(message: string, code: ParserErrorCode, index: number | null = null) {
    super(message, code);
    this.index = index;
  }
}

/**
 * Thrown by the driver when a file needs more parseLine calls than any valid replay can
 */
export class ReplayLoopError extends ParserError {
  public readonly iterations: number;

  constructor(message: string, iterations: number) {
    super(message, ParserErrorCode.REPLAY_LOOP_DETECTED);
    this.iterations = iterations;
  }
}

export function isParserContractError(error: unknown): error is ParserContractError {
  return error instanceof ParserContractError;
}

/**
 * Type guard to check if an error is any ParserError
 */
export function isParserError(error: unknown): error is ParserError {
  return error instanceof ParserError;
}
