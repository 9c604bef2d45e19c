import * as fs from 'fs';

/**
 * Load a server log file as the ordered line buffer for one replay job.
 * Blank lines are dropped; CRLF endings and a leading BOM are accepted.
 */
export async function readServerLogFile(filePath: string): Promise<string[]> {
  const content = await fs.promises.readFile(filePath, 'utf-8');
  return splitServerLog(content);
}

export function splitServerLog(content: string): string[] {
  return content
    .replace(/^\uFEFF/, '')
    .split(/\r?\n/)
    .filter(line => line.trim().length > 0);
}
