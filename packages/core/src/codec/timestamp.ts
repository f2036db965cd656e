/**
 * Stint Core — Timestamp Codec
 *
 * Timestamps are written as `YYYY-MM-DD HH:MM:SS ZONE` with second precision.
 *
 *   utc mode:   2026-03-01 09:15:00 UTC
 *   local mode: 2026-03-01 10:15:00 +0100
 *
 * The zone is always explicit, so parseTimestamp(formatTimestamp(d)) yields the
 * same instant (truncated to the second) regardless of the reader's zone.
 * The parser also accepts `Z`, colon offsets (`+01:00`) and zone
 * abbreviations (`CEST`, `PST`). Abbreviations not in ZONE_ABBREVIATIONS are
 * read as offset zero.
 */

/** Which clock face timestamps are written in. */
export type TimeZoneMode = 'utc' | 'local';

/** Source of the current time. Injected so tests can pin it. */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2}) (Z|[A-Z]{3,5}|[+-]\d{2}:?\d{2})$/;

/** Offsets east of UTC, in minutes. */
const ZONE_ABBREVIATIONS: Readonly<Record<string, number>> = {
  UTC: 0, GMT: 0, WET: 0,
  BST: 60, CET: 60, WEST: 60,
  CEST: 120, EET: 120,
  EEST: 180, MSK: 180,
  JST: 540, KST: 540,
  AEST: 600, AEDT: 660,
  NZST: 720, NZDT: 780,
  HST: -600, AKST: -540, AKDT: -480,
  PST: -480, PDT: -420,
  MST: -420, MDT: -360,
  CST: -360, CDT: -300,
  EST: -300, EDT: -240,
};

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

function formatOffset(offsetMinutes: number): string {
  const sign = offsetMinutes < 0 ? '-' : '+';
  const abs = Math.abs(offsetMinutes);
  return `${sign}${pad(Math.floor(abs / 60))}${pad(abs % 60)}`;
}

/**
 * Serialize an instant. Milliseconds are dropped.
 */
export function formatTimestamp(date: Date, zone: TimeZoneMode = 'local'): string {
  if (zone === 'utc') {
    return (
      `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
      `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())} UTC`
    );
  }
  // getTimezoneOffset() is UTC minus local; the written offset is local minus UTC.
  const offset = -date.getTimezoneOffset();
  return (
    `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())} ${formatOffset(offset)}`
  );
}

function parseZone(zone: string): number | null {
  if (zone === 'Z') return 0;
  if (/^[A-Z]+$/.test(zone)) return ZONE_ABBREVIATIONS[zone] ?? 0;
  const digits = zone.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2, 4));
  if (hours > 23 || minutes > 59) return null;
  const magnitude = hours * 60 + minutes;
  return zone.startsWith('-') ? -magnitude : magnitude;
}

/**
 * Parse a serialized timestamp back into an instant.
 *
 * Returns null for anything that does not match the format exactly, including
 * out-of-range calendar fields such as `2026-02-30`.
 */
export function parseTimestamp(text: string): Date | null {
  const match = TIMESTAMP_PATTERN.exec(text);
  if (match === null) return null;

  const [, y, mo, d, h, mi, s, z] = match;
  if (
    y === undefined || mo === undefined || d === undefined || h === undefined ||
    mi === undefined || s === undefined || z === undefined
  ) {
    return null;
  }

  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);
  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) return null;

  const offset = parseZone(z);
  if (offset === null) return null;

  const wall = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  // Date.UTC silently rolls invalid days over into the next month.
  if (wall.getUTCDate() !== day || wall.getUTCMonth() !== month - 1) return null;
  // Date.UTC maps years 0-99 onto 1900-1999.
  wall.setUTCFullYear(year);

  return new Date(wall.getTime() - offset * 60_000);
}
