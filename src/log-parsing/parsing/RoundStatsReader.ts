import ServerLogLine from './ServerLogLine';

const JSON_BEGIN_RE = /JSON_BEGIN/;
const JSON_END_RE = /JSON_END/;
// "player_3" : "   1017,    0,   0, ..."; the first value is the account id
const PLAYER_ROW_RE = /"player_\d+"\s*:\s*"\s*([^,"]*)/;
// Any of these before the stats block means the Round_End has none
const BOUNDARY_RE = /ACCOLADE, FINAL:|World triggered "Round_(?:Start|End)"|Game Over:/;
const ACCOUNT_ID_RE = /^\d+$/;

/**
 * Collect the account ids of the round stats block after a Round_End line.
 * Scans at most `lookahead` lines; an absent block yields an empty list.
 */
export function readRoundStatsPlayers(
  allLines: readonly string[],
  roundEndIndex: number,
  lookahead: number
): number[] {
  const players: number[] = [];
  const lastIndex = Math.min(allLines.length - 1, roundEndIndex + lookahead);
  let inBlock = false;

  for (let index = roundEndIndex + 1; index <= lastIndex; index++) {
    const rawLine = allLines[index];
    if (rawLine === undefined) break;

    const content = ServerLogLine.readContent(rawLine);
    if (content === null) continue;
    if (BOUNDARY_RE.test(content)) break;

    if (!inBlock) {
      inBlock = JSON_BEGIN_RE.test(content);
      continue;
    }
    if (JSON_END_RE.test(content)) break;

    const accountId = content.match(PLAYER_ROW_RE)?.[1]?.trim();
    if (accountId !== undefined && ACCOUNT_ID_RE.test(accountId)) {
      players.push(parseInt(accountId, 10));
    }
  }

  return players;
}
