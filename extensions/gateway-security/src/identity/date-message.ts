/**
 * Fixed timestamp format used as the signed payload of a claim:
 * `YYYY-MM-DD HH:MM:SS ±ZZZZ` (e.g. `2026-03-01 12:30:00 +0100`).
 */

import { DateFormatError } from "../errors.js";

const DATE_MESSAGE_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2}) ([+-])(\d{2})(\d{2})$/;

const MINUTE_MS = 60_000;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * Parse a date message into the instant it names.
 * Throws DateFormatError for anything but the exact format with in-range fields.
 */
export function parseDateMessage(text: string): Date {
  const match = DATE_MESSAGE_PATTERN.exec(text);
  if (!match) {
    throw new DateFormatError("date message must match YYYY-MM-DD HH:MM:SS ±ZZZZ");
  }

  const [, year, month, day, hour, minute, second, sign, offsetHours, offsetMinutes] = match;
  const fields = {
    year: Number(year),
    month: Number(month),
    day: Number(day),
    hour: Number(hour),
    minute: Number(minute),
    second: Number(second),
    offsetHours: Number(offsetHours),
    offsetMinutes: Number(offsetMinutes),
  };

  if (
    fields.month < 1 ||
    fields.month > 12 ||
    fields.day < 1 ||
    fields.hour > 23 ||
    fields.minute > 59 ||
    fields.second > 60 ||
    fields.offsetHours > 23 ||
    fields.offsetMinutes > 59
  ) {
    throw new DateFormatError(`date message field out of range: ${text}`);
  }

  // setUTCFullYear keeps years 0-99 literal; Date.UTC would map them to 1900-1999
  const local = new Date(0);
  local.setUTCFullYear(fields.year, fields.month - 1, fields.day);
  if (local.getUTCMonth() !== fields.month - 1 || local.getUTCDate() !== fields.day) {
    throw new DateFormatError(`date message names a day that does not exist: ${text}`);
  }
  // Second 60 is a leap second: the first instant of the next minute
  local.setUTCHours(fields.hour, fields.minute, fields.second, 0);

  const offset = (fields.offsetHours * 60 + fields.offsetMinutes) * (sign === "-" ? -1 : 1);
  return new Date(local.getTime() - offset * MINUTE_MS);
}

/**
 * Render an instant in the date message format at the given UTC offset.
 */
export function formatDateMessage(date: Date, offsetMinutes = 0): string {
  const local = new Date(date.getTime() + offsetMinutes * MINUTE_MS);
  const sign = offsetMinutes < 0 ? "-" : "+";
  const absOffset = Math.abs(offsetMinutes);

  return (
    `${pad(local.getUTCFullYear(), 4)}-${pad(local.getUTCMonth() + 1)}-${pad(local.getUTCDate())} ` +
    `${pad(local.getUTCHours())}:${pad(local.getUTCMinutes())}:${pad(local.getUTCSeconds())} ` +
    `${sign}${pad(Math.floor(absOffset / 60))}${pad(absOffset % 60)}`
  );
}

/** Date message for `ttlMs` after `now`, in UTC. */
export function dateMessageIn(ttlMs: number, now: Date = new Date()): string {
  return formatDateMessage(new Date(now.getTime() + ttlMs));
}
