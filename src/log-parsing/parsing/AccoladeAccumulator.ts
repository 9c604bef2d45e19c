import { AccoladeMatcher } from '../matchers/AccoladeMatcher';
import type { AccoladeRecord } from '../types/Accolade';
import ServerLogLine from './ServerLogLine';

/**
 * Gathers the ACCOLADE lines that precede a Game Over line.
 * Lines that do not decode or do not fit the grammar are skipped.
 */
export class AccoladeAccumulator {
  private readonly matcher = new AccoladeMatcher();

  /**
   * Accolades found in allLines[start, end), in log order
   */
  collect(allLines: readonly string[], start: number, end: number): AccoladeRecord[] {
    const accolades: AccoladeRecord[] = [];
    const from = Math.max(0, start);
    const to = Math.min(allLines.length, end);

    for (let index = from; index < to; index++) {
      const rawLine = allLines[index];
      if (rawLine === undefined) continue;

      const decoded = ServerLogLine.decode(rawLine, index);
      if (!decoded.ok) continue;

      const accolade = this.matcher.match(decoded.line);
      if (accolade) {
        accolades.push(accolade);
      }
    }

    return accolades;
  }
}
