/**
 * Upstream timestamps are Korea Standard Time wall-clock values, either
 * `YYYYMMDD` or `YYYY-MM-DD HH:MM:SS`. They are parsed into Dates at the
 * matching UTC instant (KST is a fixed UTC+09:00, no DST).
 */

const KST_OFFSET_MS = 9 * 60 * 60_000;

const COMPACT_DATE = /^(\d{4})(\d{2})(\d{2})$/;
const DATE_TIME = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

/** Returns null when the text is in neither format or names an impossible date. */
export function parseKstDate(text: string): Date | null {
  const match = COMPACT_DATE.exec(text) ?? DATE_TIME.exec(text);
  if (!match) return null;

  const [year, month, day, hour = 0, minute = 0, second = 0] = match
    .slice(1)
    .map((part) => parseInt(part, 10));

  const wallClock = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  // Date.UTC rolls over out-of-range fields (month 13, Feb 30); reject those
  if (
    wallClock.getUTCFullYear() !== year ||
    wallClock.getUTCMonth() !== month - 1 ||
    wallClock.getUTCDate() !== day ||
    wallClock.getUTCHours() !== hour ||
    wallClock.getUTCMinutes() !== minute ||
    wallClock.getUTCSeconds() !== second
  ) {
    return null;
  }

  return new Date(wallClock.getTime() - KST_OFFSET_MS);
}

/**
 * Render a Date as KST wall-clock time: `YYYY-MM-DD` at midnight,
 * `YYYY-MM-DD HH:MM:SS` otherwise.
 */
export function formatKstDate(date: Date): string {
  const iso = new Date(date.getTime() + KST_OFFSET_MS).toISOString();
  const day = iso.slice(0, 10);
  const time = iso.slice(11, 19);
  return time === "00:00:00" ? day : `${day} ${time}`;
}
