/**
 * RFC 5322 date-time parsing and formatting
 *
 * @packageDocumentation
 */

import { MailParseError } from '../types/errors.js';

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];
const DAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];

/**
 * Obsolete zone names (RFC 5322 section 4.3), offsets in minutes
 */
const NAMED_ZONES: Record<string, number> = {
  UT: 0,
  UTC: 0,
  GMT: 0,
  Z: 0,
  EST: -300,
  EDT: -240,
  CST: -360,
  CDT: -300,
  MST: -420,
  MDT: -360,
  PST: -480,
  PDT: -420,
};

const DATE_PATTERN =
  /^(?:[A-Za-z]+,?\s*)?(\d{1,2})\s+([A-Za-z]{3})[a-z]*\s+(\d{2,4})\s+(\d{1,2}):(\d{2})(?::(\d{2}))?(?:\s+([+-]\d{4}|[A-Za-z]{1,5}))?$/;

function zoneOffsetMinutes(zone: string | undefined): number {
  if (zone === undefined) return 0;
  if (/^[+-]\d{4}$/.test(zone)) {
    const sign = zone[0] === '-' ? -1 : 1;
    return sign * (parseInt(zone.slice(1, 3), 10) * 60 + parseInt(zone.slice(3, 5), 10));
  }
  // Military and unknown zones carry no reliable offset
  return NAMED_ZONES[zone.toUpperCase()] ?? 0;
}

/**
 * Parses a Date header into an instant, honoring its UTC offset
 *
 * @param value - Date header value, e.g. "Tue, 1 Jul 2025 10:15:00 +0200"
 * @throws MailParseError if the value is missing or not a valid date
 */
export function parseRfc5322Date(value: string | undefined): Date {
  if (value === undefined || !value.trim()) {
    throw new MailParseError('Message has no Date header', value ?? '');
  }

  // Comments such as "(PDT)" are not part of the value
  const cleaned = value.replace(/\([^)]*\)/g, ' ').replace(/\s+/g, ' ').trim();
  const match = cleaned.match(DATE_PATTERN);
  if (!match) {
    throw new MailParseError(`Unparseable Date header: ${value}`, value);
  }

  const [, dayStr, monthStr, yearStr, hourStr, minuteStr, secondStr, zone] = match;
  const month = MONTHS.findIndex(m => m.toLowerCase() === monthStr.toLowerCase());
  const day = parseInt(dayStr, 10);
  const hour = parseInt(hourStr, 10);
  const minute = parseInt(minuteStr, 10);
  const second = secondStr === undefined ? 0 : parseInt(secondStr, 10);

  let year = parseInt(yearStr, 10);
  if (yearStr.length === 2) {
    year += year < 50 ? 2000 : 1900;
  } else if (yearStr.length === 3) {
    year += 1900;
  }

  if (month === -1 || day < 1 || hour > 23 || minute > 59 || second > 60) {
    throw new MailParseError(`Invalid date in Date header: ${value}`, value);
  }

  const local = new Date(Date.UTC(year, month, day, hour, minute, Math.min(second, 59)));
  if (local.getUTCDate() !== day) {
    throw new MailParseError(`Invalid day of month in Date header: ${value}`, value);
  }

  return new Date(local.getTime() - zoneOffsetMinutes(zone) * 60_000);
}

function pad(n: number, width = 2): string {
  return n.toString().padStart(width, '0');
}

/**
 * Formats a date for a Date header in local time with its numeric offset,
 * e.g. "Tue, 01 Jul 2025 10:15:00 +0200"
 */
export function formatRfc5322Date(date: Date): string {
  const offset = -date.getTimezoneOffset();
  const sign = offset < 0 ? '-' : '+';
  const abs = Math.abs(offset);

  return `${DAYS[date.getDay()]}, ${pad(date.getDate())} ${MONTHS[date.getMonth()]} ${pad(date.getFullYear(), 4)} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())} ` +
    `${sign}${pad(Math.floor(abs / 60))}${pad(abs % 60)}`;
}

/**
 * Formats a date as M/D/YY without zero padding, in UTC
 */
export function formatShortDate(date: Date): string {
  return `${date.getUTCMonth() + 1}/${date.getUTCDate()}/${pad(date.getUTCFullYear() % 100)}`;
}
