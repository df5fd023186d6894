import type { Logger } from "winston";
import { normalizeHandle } from "../helpers";

export type LiveProbe = (hostHandle: string) => Promise<boolean>;

// TikTok embeds the room status in the live page; 2 means broadcasting
const LIVE_STATUS_PATTERN = /"status"\s*:\s*2\b/;

export function isLivePage(html: string): boolean {
  return html.includes('"roomId"') && LIVE_STATUS_PATTERN.test(html);
}

/**
 * Checks the host's public live page. Any failure, including a timeout, is
 * read as "not live".
 */
export function createLiveProbe(log: Logger, timeoutMs: number, fetchImpl: typeof fetch = fetch): LiveProbe {
  return async (hostHandle) => {
    const handle = normalizeHandle(hostHandle);
    try {
      const res = await fetchImpl(`https://www.tiktok.com/@${encodeURIComponent(handle)}/live`, {
        headers: { "User-Agent": "Mozilla/5.0 (compatible; live-leaderboard-bot)" },
        signal: AbortSignal.timeout(timeoutMs),
      });
      if (!res.ok) {
        log.debug(`Live probe for @${handle} returned ${res.status}`);
        return false;
      }
      return isLivePage(await res.text());
    } catch (err) {
      log.debug(`Live probe for @${handle} failed`, err);
      return false;
    }
  };
}
