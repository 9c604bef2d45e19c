/**
 * One decoded line of a CS2 dedicated server log.
 *
 * Lines arrive wrapped in a container log envelope:
 *   {"time":"2024-04-20T17:52:34.123456789Z","log":"L 04/20/2024 - 17:52:34: <event text>\n"}
 * Only lines whose content starts with the "L MM/DD/YYYY - HH:MM:SS: " stamp decode.
 */
const LOG_PREFIX_RE = /^L (\d{2})\/(\d{2})\/(\d{4}) - (\d{2}):(\d{2}):(\d{2}): /;
const EXCESS_FRACTION_RE = /(\.\d{3})\d+/;

export enum DecodeFailureReason {
  INVALID_JSON = 'INVALID_JSON',
  MISSING_CONTENT = 'MISSING_CONTENT',
  EMPTY_CONTENT = 'EMPTY_CONTENT',
  MISSING_LOG_PREFIX = 'MISSING_LOG_PREFIX',
  MISSING_TIMESTAMP = 'MISSING_TIMESTAMP',
}

export interface DecodeFailure {
  ok: false;
  reason: DecodeFailureReason;
  /** Envelope content when the envelope itself was readable */
  content?: string;
}

export interface DecodeSuccess {
  ok: true;
  line: ServerLogLine;
}

export type DecodeResult = DecodeSuccess | DecodeFailure;

interface EnvelopeFields {
  content: string;
  time: string | null;
}

export default class ServerLogLine {
  private constructor(
    /** Position in the full ordered log */
    public readonly index: number,
    public readonly timestamp: Date,
    /** Full log text including the "L ..." stamp */
    public readonly content: string,
    /** Event text after the stamp */
    public readonly body: string
  ) {}

  /**
   * Decode one envelope line. Never throws.
   */
  static decode(rawLine: string, index: number): DecodeResult {
    const envelope = ServerLogLine.readEnvelope(rawLine);
    if (envelope === DecodeFailureReason.INVALID_JSON || envelope === DecodeFailureReason.MISSING_CONTENT) {
      return { ok: false, reason: envelope };
    }

    const { content, time } = envelope;
    if (content.length === 0) {
      return { ok: false, reason: DecodeFailureReason.EMPTY_CONTENT, content };
    }

    const prefix = content.match(LOG_PREFIX_RE);
    if (!prefix) {
      return { ok: false, reason: DecodeFailureReason.MISSING_LOG_PREFIX, content };
    }

    const timestamp = parseEnvelopeTime(time) ?? parseStampTime(prefix);
    if (!timestamp) {
      return { ok: false, reason: DecodeFailureReason.MISSING_TIMESTAMP, content };
    }

    return {
      ok: true,
      line: new ServerLogLine(index, timestamp, content, content.slice(prefix[0].length)),
    };
  }

  /**
   * Envelope content of a raw line without any prefix check, or null.
   * Used by lookahead scans that must see marker lines such as JSON_BEGIN.
   */
  static readContent(rawLine: string): string | null {
    const envelope = ServerLogLine.readEnvelope(rawLine);
    return typeof envelope === 'string' ? null : envelope.content;
  }

  private static readEnvelope(
    rawLine: string
  ): EnvelopeFields | DecodeFailureReason.INVALID_JSON | DecodeFailureReason.MISSING_CONTENT {
    let parsed: unknown;
    try {
      parsed = JSON.parse(rawLine);
    } catch {
      return DecodeFailureReason.INVALID_JSON;
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      return DecodeFailureReason.INVALID_JSON;
    }

    const log: unknown = Reflect.get(parsed, 'log');
    if (typeof log !== 'string') {
      return DecodeFailureReason.MISSING_CONTENT;
    }

    const time: unknown = Reflect.get(parsed, 'time');
    return {
      content: log.trimEnd(),
      time: typeof time === 'string' ? time : null,
    };
  }
}

function parseEnvelopeTime(time: string | null): Date | null {
  if (!time) return null;

  // Container runtimes write nanosecond fractions
  const date = new Date(time.replace(EXCESS_FRACTION_RE, '$1'));
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Server stamps carry no zone; they are read as UTC.
 */
function parseStampTime(prefix: RegExpMatchArray): Date | null {
  const [month, day, year, hour, min, sec] = prefix.slice(1, 7).map(part => parseInt(part, 10));
  if (
    month === undefined ||
    day === undefined ||
    year === undefined ||
    hour === undefined ||
    min === undefined ||
    sec === undefined
  ) {
    return null;
  }

  const date = new Date(Date.UTC(year, month - 1, day, hour, min, sec));
  return Number.isNaN(date.getTime()) ? null : date;
}
