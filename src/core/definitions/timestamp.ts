/**
 * Timestamp Grammar
 *
 * Shared by `since` properties and record timestamps. Three grammars are
 * tried in order and the first match wins:
 *
 * 1. an instant with an offset (`2021-06-01T10:30:00+02:00`)
 * 2. a plain date and time, taken at UTC (`2021-06-01T10:30:00`)
 * 3. a date, taken as UTC midnight (`2021-06-01`)
 *
 * @module
 */

import { err, ok, orElse, type Result } from "../../types/result.js";

/**
 * Unix timestamp in milliseconds
 */
export type Timestamp = number;

const TIME = String.raw`(\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d{1,9}))?)?`;
const DATE = String.raw`(\d{4})-(\d{2})-(\d{2})`;

const INSTANT_PATTERN = new RegExp(`^${DATE}[Tt ]${TIME}(Z|z|[+-]\\d{2}(?::?\\d{2})?)$`);
const DATETIME_PATTERN = new RegExp(`^${DATE}[Tt ]${TIME}$`);
const DATE_PATTERN = new RegExp(`^${DATE}$`);

interface CivilTime {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
}

function daysInMonth(year: number, month: number): number {
  const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
  const days = [31, leap ? 29 : 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];
  return days[month - 1] ?? 0;
}

function toNumber(part: string | undefined, fallback = 0): number {
  return part === undefined ? fallback : Number.parseInt(part, 10);
}

function civilFromMatch(match: RegExpExecArray): Result<CivilTime, string> {
  const fraction = match[7];
  const civil: CivilTime = {
    year: toNumber(match[1]),
    month: toNumber(match[2]),
    day: toNumber(match[3]),
    hour: toNumber(match[4]),
    minute: toNumber(match[5]),
    second: toNumber(match[6]),
    millisecond: fraction === undefined ? 0 : toNumber(fraction.padEnd(3, "0").slice(0, 3)),
  };

  if (civil.month < 1 || civil.month > 12) return err(`month ${civil.month} is out of range`);
  if (civil.day < 1 || civil.day > daysInMonth(civil.year, civil.month)) {
    return err(`day ${civil.day} is out of range for ${civil.year}-${String(civil.month).padStart(2, "0")}`);
  }
  if (civil.hour > 23) return err(`hour ${civil.hour} is out of range`);
  if (civil.minute > 59) return err(`minute ${civil.minute} is out of range`);
  if (civil.second > 59) return err(`second ${civil.second} is out of range`);

  return ok(civil);
}

function civilToUtc(civil: CivilTime): Timestamp {
  const date = new Date(0);
  // setUTCFullYear keeps years below 100 as-is, unlike Date.UTC
  date.setUTCFullYear(civil.year, civil.month - 1, civil.day);
  date.setUTCHours(civil.hour, civil.minute, civil.second, civil.millisecond);
  return date.getTime();
}

function parseOffsetMinutes(offset: string): Result<number, string> {
  if (offset === "Z" || offset === "z") return ok(0);

  const sign = offset.startsWith("-") ? -1 : 1;
  const digits = offset.slice(1).replace(":", "");
  const hours = toNumber(digits.slice(0, 2));
  const minutes = toNumber(digits.slice(2, 4) || undefined);

  if (hours > 23 || minutes > 59) return err(`offset ${offset} is out of range`);
  return ok(sign * (hours * 60 + minutes));
}

function parseInstant(text: string): Result<Timestamp, string> {
  const match = INSTANT_PATTERN.exec(text);
  if (!match) return err("not an instant with an offset");

  const civil = civilFromMatch(match);
  if (!civil.ok) return civil;
  const offset = parseOffsetMinutes(match[8] ?? "Z");
  if (!offset.ok) return offset;

  return ok(civilToUtc(civil.value) - offset.value * 60_000);
}

function parseDateTime(text: string): Result<Timestamp, string> {
  const match = DATETIME_PATTERN.exec(text);
  if (!match) return err("not a date and time");

  const civil = civilFromMatch(match);
  return civil.ok ? ok(civilToUtc(civil.value)) : civil;
}

function parseDate(text: string): Result<Timestamp, string> {
  const match = DATE_PATTERN.exec(text);
  if (!match) return err("not a date");

  const civil = civilFromMatch(match);
  return civil.ok ? ok(civilToUtc(civil.value)) : civil;
}

/**
 * Parses a timestamp with the three accepted grammars, first match wins.
 * The error carries the reason from the last grammar tried.
 */
export function parseTimestamp(text: string): Result<Timestamp, string> {
  return orElse(
    orElse(parseInstant(text), () => parseDateTime(text)),
    () => parseDate(text)
  );
}

/**
 * Renders a timestamp as RFC 3339 in UTC. Milliseconds are only shown when non-zero.
 */
export function formatTimestamp(timestamp: Timestamp): string {
  const iso = new Date(timestamp).toISOString();
  return iso.endsWith(".000Z") ? `${iso.slice(0, -5)}Z` : iso;
}
