/**
 * Resolves free-form due date expressions into absolute local timestamps.
 * Supports: calendar dates (2025-07-15, 2025/07/15, 07/15/2025), today,
 * tomorrow, weekday names (next occurrence, never today) and natural
 * language handled by a pluggable grammar (chrono-node by default).
 *
 * Dates without a time of day resolve to 23:59:59 so that a task due
 * "today" is not overdue until the day is over.
 */

import * as chrono from 'chrono-node';
import { addDays, format, nextDay, set } from 'date-fns';
import type { Day } from 'date-fns';
import type { Timestamp } from '../types/task.js';
import type { DateResult } from '../types/results.js';

export const TIMESTAMP_FORMAT = "yyyy-MM-dd'T'HH:mm:ss.SSSxxx";

export const DATE_HINT = 'Try formats like: 2025-07-15, today, tomorrow, friday, in 3 days, next monday';

/** The one thing the resolver needs from a natural-language date library */
export interface DateGrammar {
  parse(text: string, reference: Date): { date: Date; hasTime: boolean } | null;
}

/** chrono-node, English, preferring dates after the reference. Whole-input matches only. */
export const chronoGrammar: DateGrammar = {
  parse(text, reference) {
    const [first] = chrono.parse(text, reference, { forwardDate: true });
    if (!first || first.index !== 0 || first.text.length !== text.length) return null;
    return { date: first.start.date(), hasTime: first.start.isCertain('hour') };
  },
};

const ISO_DATE_RE = /^(\d{4})([-/])(\d{2})\2(\d{2})$/;
const NUMERIC_DATE_RE = /^(\d{1,2})([-/])(\d{1,2})\2(\d{4})$/;

const DAY_MAP = new Map<string, Day>([
  ['sun', 0], ['sunday', 0],
  ['mon', 1], ['monday', 1],
  ['tue', 2], ['tuesday', 2],
  ['wed', 3], ['wednesday', 3],
  ['thu', 4], ['thursday', 4],
  ['fri', 5], ['friday', 5],
  ['sat', 6], ['saturday', 6],
]);

/** Format a Date as local wall-clock time with its current UTC offset */
export function formatTimestamp(d: Date): Timestamp {
  return format(d, TIMESTAMP_FORMAT);
}

/** 23:59:59.000 local on the same calendar day */
export function endOfDayAt(d: Date): Date {
  return set(d, { hours: 23, minutes: 59, seconds: 59, milliseconds: 0 });
}

/** Build a local date, or null if the fields don't name a real day (e.g. 2025-02-30) */
function calendarDate(year: number, month: number, day: number): Date | null {
  const d = new Date(year, month - 1, day);
  if (d.getFullYear() !== year || d.getMonth() !== month - 1 || d.getDate() !== day) {
    return null;
  }
  return d;
}

function tryParseIso(input: string): Date | null {
  const m = ISO_DATE_RE.exec(input);
  if (!m) return null;
  return calendarDate(Number(m[1]), Number(m[3]), Number(m[4]));
}

/** MM/DD/YYYY first; DD/MM/YYYY only when the first field can't be a month */
function tryParseNumeric(input: string): Date | null {
  const m = NUMERIC_DATE_RE.exec(input);
  if (!m) return null;
  const first = Number(m[1]);
  const second = Number(m[3]);
  const year = Number(m[4]);
  return calendarDate(year, first, second) ?? calendarDate(year, second, first);
}

function tryParseKeyword(input: string, now: Date): Date | null {
  switch (input) {
    case 'today': return now;
    case 'tomorrow': return addDays(now, 1);
    default: return null;
  }
}

function tryParseWeekday(input: string, now: Date): Date | null {
  const target = DAY_MAP.get(input);
  if (target === undefined) return null;
  return nextDay(now, target);
}

/**
 * Resolve a due date expression relative to `now`.
 *
 * @param expression - e.g. "2025-07-15", "tomorrow", "friday", "in 3 days"
 * @param now - Reference moment. Defaults to the current time.
 * @param grammar - Natural-language fallback. Defaults to chrono-node.
 */
export function resolveDate(
  expression: string,
  now: Date = new Date(),
  grammar: DateGrammar = chronoGrammar,
): DateResult {
  const trimmed = expression.trim();
  const normalized = trimmed.toLowerCase();

  const day = tryParseIso(trimmed)
    ?? tryParseNumeric(trimmed)
    ?? tryParseKeyword(normalized, now)
    ?? tryParseWeekday(normalized, now);
  if (day) {
    return { type: 'success', date: formatTimestamp(endOfDayAt(day)) };
  }

  const parsed = trimmed ? grammar.parse(trimmed, now) : null;
  if (parsed) {
    const date = parsed.hasTime ? parsed.date : endOfDayAt(parsed.date);
    return { type: 'success', date: formatTimestamp(date) };
  }

  return { type: 'error', error: { kind: 'unparseable', input: expression } };
}
