import type { EventTarget } from '../types/index.js';
import { ParseError, type ParseResult } from './errors.js';

export const MAX_TITLE_LENGTH = 60;

const DATE_TIME = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;
const DATE_TIME_HINT = "Expected format 'YYYY-MM-DD HH:MM:SS'";

function invalid<T>(message: string): ParseResult<T> {
  return { success: false, error: new ParseError('invalid-format', message) };
}

/**
 * Parses a local `YYYY-MM-DD HH:MM:SS` into epoch milliseconds.
 * Dates that do not exist in the calendar (2025-02-30) are rejected.
 */
export function parseDateTime(text: string): ParseResult<number> {
  const match = DATE_TIME.exec(text.trim());
  if (!match) {
    return invalid(`Invalid date '${text.trim()}'. ${DATE_TIME_HINT}`);
  }

  const [year, month, day, hours, minutes, seconds] = match.slice(1).map(Number);
  const date = new Date(year, month - 1, day, hours, minutes, seconds);

  if (
    date.getFullYear() !== year ||
    date.getMonth() !== month - 1 ||
    date.getDate() !== day ||
    date.getHours() !== hours ||
    date.getMinutes() !== minutes ||
    date.getSeconds() !== seconds
  ) {
    return invalid(`Invalid date '${text.trim()}'. ${DATE_TIME_HINT}`);
  }

  return { success: true, data: date.getTime() };
}

export function validateTitle(value: string): ParseResult<string | null> {
  const title = value.trim();
  if (title.length > MAX_TITLE_LENGTH) {
    return invalid(`Max. ${MAX_TITLE_LENGTH} chars`);
  }
  return { success: true, data: title.length > 0 ? title : null };
}

/**
 * Parses an event target given either as `YYYY-MM-DD HH:MM:SS` or as
 * `time=YYYY-MM-DD HH:MM:SS,title=My event` (keys in any order).
 */
export function parseEventTarget(text: string): ParseResult<EventTarget> {
  const value = text.trim();

  if (!value.includes('=')) {
    const parsed = parseDateTime(value);
    return parsed.success ? { success: true, data: { target: parsed.data, title: null } } : parsed;
  }

  let time: string | null = null;
  let title: string | null = null;

  for (const part of value.split(',')) {
    const separator = part.indexOf('=');
    if (separator === -1) {
      return invalid(`Invalid key=value pair: '${part.trim()}'`);
    }

    const key = part.slice(0, separator).trim();
    const pairValue = part.slice(separator + 1).trim();

    if (key === 'time') {
      time = pairValue;
    } else if (key === 'title') {
      title = pairValue;
    } else {
      return invalid(`Unknown key '${key}'. Valid keys: 'time', 'title'`);
    }
  }

  if (time === null) {
    return invalid("Missing required 'time' field");
  }

  const target = parseDateTime(time);
  if (!target.success) {
    return target;
  }

  const validTitle = validateTitle(title ?? '');
  if (!validTitle.success) {
    return validTitle;
  }

  return { success: true, data: { target: target.data, title: validTitle.data } };
}

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

export function formatDateTime(epochMs: number): string {
  const date = new Date(epochMs);
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/** Local midnight of the next January 1st. */
export function nextNewYear(now: number): EventTarget {
  const year = new Date(now).getFullYear() + 1;
  return { target: new Date(year, 0, 1, 0, 0, 0).getTime(), title: 'New Year' };
}
