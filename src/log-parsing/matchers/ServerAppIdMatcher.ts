// Container startup line, written without the "L " stamp
const SERVER_APP_ID_RE = /ResetBreakpadAppId:\s*Setting\s+dedicated\s+server\s+app\s+id:\s*(\d+)/i;

/**
 * Dedicated server app id announced by a startup line, or null
 */
export function matchServerAppId(content: string): number | null {
  const digits = content.match(SERVER_APP_ID_RE)?.[1];
  if (digits === undefined) return null;
  const appId = parseInt(digits, 10);
  return Number.isSafeInteger(appId) ? appId : null;
}
