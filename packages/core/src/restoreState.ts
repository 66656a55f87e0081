import type { RestoreState } from './types';

const ONGOING_TRUE = 'ongoing-request="true"';
const ONGOING_FALSE = 'ongoing-request="false"';
const EXPIRY_MARKER = 'expiry-date="';

const WEEKDAYS = ['sun', 'mon', 'tue', 'wed', 'thu', 'fri', 'sat'];

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

const ZONE_OFFSETS_MINUTES: Record<string, number> = {
  gmt: 0,
  ut: 0,
  utc: 0,
  z: 0,
  edt: -4 * 60,
  est: -5 * 60,
  cdt: -5 * 60,
  cst: -6 * 60,
  mdt: -6 * 60,
  mst: -7 * 60,
  pdt: -7 * 60,
  pst: -8 * 60
};

const RFC2822_PATTERN =
  /^(?:([a-z]{3}),\s*)?(\d{1,2})\s+([a-z]{3})\s+(\d{4})\s+(\d{2}):(\d{2})(?::(\d{2}))?\s+([a-z]{1,3}|[+-]\d{4})$/i;

/**
 * Parses an RFC 2822 date-time (as used in the S3 `x-amz-restore` header) and returns it
 * normalized to UTC in ISO-8601 form, or null when the value is not a valid date.
 */
export function parseRfc2822Date(value: string): string | null {
  const match = RFC2822_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }
  const [, weekdayRaw, dayRaw, monthRaw, yearRaw, hourRaw, minuteRaw, secondRaw, zoneRaw] = match;
  const month = MONTHS.indexOf((monthRaw ?? '').toLowerCase());
  if (month === -1) {
    return null;
  }

  const zone = (zoneRaw ?? '').toLowerCase();
  let offsetMinutes: number;
  if (zone.startsWith('+') || zone.startsWith('-')) {
    const sign = zone.startsWith('-') ? -1 : 1;
    const hours = Number(zone.slice(1, 3));
    const minutes = Number(zone.slice(3, 5));
    if (minutes >= 60) {
      return null;
    }
    offsetMinutes = sign * (hours * 60 + minutes);
  } else {
    const known = ZONE_OFFSETS_MINUTES[zone];
    if (known === undefined) {
      return null;
    }
    offsetMinutes = known;
  }

  const year = Number(yearRaw);
  const day = Number(dayRaw);
  const hour = Number(hourRaw);
  const minute = Number(minuteRaw);
  const second = secondRaw ? Number(secondRaw) : 0;
  if (hour > 23 || minute > 59 || second > 60) {
    return null;
  }

  const local = new Date(Date.UTC(year, month, day, hour, minute, second));
  if (local.getUTCDate() !== day || local.getUTCMonth() !== month) {
    return null;
  }
  // A named weekday must agree with the calendar date.
  if (weekdayRaw && WEEKDAYS.indexOf(weekdayRaw.toLowerCase()) !== local.getUTCDay()) {
    return null;
  }
  return new Date(local.getTime() - offsetMinutes * 60_000).toISOString();
}

function extractExpiry(value: string): string | null {
  const start = value.indexOf(EXPIRY_MARKER);
  if (start === -1) {
    return null;
  }
  const valueStart = start + EXPIRY_MARKER.length;
  const end = value.indexOf('"', valueStart);
  return end === -1 ? value.slice(valueStart) : value.slice(valueStart, end);
}

/**
 * Decodes a backend restore-status token. An ongoing request wins over an expiry date, which
 * wins over a completed request; anything else means the restored copy has expired.
 * An absent token means the object is not archived and yields undefined.
 */
export function decodeRestoreState(raw: string | null | undefined): RestoreState | undefined {
  if (raw === null || raw === undefined) {
    return undefined;
  }
  const lowered = raw.toLowerCase();
  if (lowered.includes(ONGOING_TRUE)) {
    return { kind: 'inProgress', expiry: null };
  }
  const expiry = extractExpiry(lowered);
  if (expiry !== null) {
    const normalized = parseRfc2822Date(expiry);
    return normalized ? { kind: 'inProgress', expiry: normalized } : { kind: 'available' };
  }
  if (lowered.includes(ONGOING_FALSE)) {
    return { kind: 'available' };
  }
  return { kind: 'expired' };
}

export function describeRestoreState(state: RestoreState | undefined): string {
  if (!state) {
    return 'n/a';
  }
  switch (state.kind) {
    case 'available':
      return 'available';
    case 'expired':
      return 'expired';
    case 'inProgress':
      return state.expiry ? `in-progress (ready until ${state.expiry})` : 'in-progress';
  }
}
