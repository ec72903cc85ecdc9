import type { Duration, DurationComponents, EditField, Polarity } from '../types/index.js';
import { ParseError, type ParseResult } from './errors.js';

export const ONE_DECISECOND = 1;
export const ONE_SECOND = 10 * ONE_DECISECOND;
export const ONE_MINUTE = 60 * ONE_SECOND;
export const ONE_HOUR = 60 * ONE_MINUTE;
export const ONE_DAY = 24 * ONE_HOUR;
// Leap days are ignored: a year is always 365 days
export const ONE_YEAR = 365 * ONE_DAY;

/** 9999y 364d 23:59:59.9 */
export const MAX_DURATION: Duration = 10_000 * ONE_YEAR - ONE_DECISECOND;

export const MS_PER_DECISECOND = 100;

const FIELD_UNITS: Record<EditField, Duration> = {
  deciseconds: ONE_DECISECOND,
  seconds: ONE_SECOND,
  minutes: ONE_MINUTE,
  hours: ONE_HOUR,
  days: ONE_DAY,
  years: ONE_YEAR,
};

const INTEGER = /^\d+$/;
const SECONDS_FIELD = /^(\d+)(?:\.(\d))?$/;

export function clampDuration(value: number): Duration {
  if (!Number.isFinite(value) || value <= 0) {
    return 0;
  }
  return Math.min(MAX_DURATION, Math.floor(value));
}

export function unitOf(field: EditField): Duration {
  return FIELD_UNITS[field];
}

export function fromComponents(components: Partial<DurationComponents>): Duration {
  const {
    years = 0,
    days = 0,
    hours = 0,
    minutes = 0,
    seconds = 0,
    deciseconds = 0,
  } = components;

  return clampDuration(
    years * ONE_YEAR +
      days * ONE_DAY +
      hours * ONE_HOUR +
      minutes * ONE_MINUTE +
      seconds * ONE_SECOND +
      deciseconds
  );
}

export function toComponents(value: Duration): DurationComponents {
  let rest = clampDuration(value);
  const years = Math.floor(rest / ONE_YEAR);
  rest %= ONE_YEAR;
  const days = Math.floor(rest / ONE_DAY);
  rest %= ONE_DAY;
  const hours = Math.floor(rest / ONE_HOUR);
  rest %= ONE_HOUR;
  const minutes = Math.floor(rest / ONE_MINUTE);
  rest %= ONE_MINUTE;
  const seconds = Math.floor(rest / ONE_SECOND);

  return { years, days, hours, minutes, seconds, deciseconds: rest % ONE_SECOND };
}

export function addTicks(value: Duration, ticks: number): Duration {
  if (ticks <= 0) {
    return value;
  }
  return Math.min(MAX_DURATION, value + ticks);
}

export interface SubtractResult {
  value: Duration;
  /** The value was above zero before this call and is zero now */
  crossedZero: boolean;
  /** Ticks that did not fit above zero */
  overflow: number;
}

export function subTicks(value: Duration, ticks: number): SubtractResult {
  if (ticks <= 0) {
    return { value, crossedZero: false, overflow: 0 };
  }

  const next = Math.max(0, value - ticks);
  return {
    value: next,
    crossedZero: value > 0 && next === 0,
    overflow: Math.max(0, ticks - value),
  };
}

/**
 * Distance between two instants (epoch ms), truncated to deciseconds.
 * Polarity is `until` while `target` is still ahead of `now`.
 */
export function difference(target: number, now: number): { value: Duration; polarity: Polarity } {
  const delta = target - now;
  return {
    value: clampDuration(Math.floor(Math.abs(delta) / MS_PER_DECISECOND)),
    polarity: delta > 0 ? 'until' : 'since',
  };
}

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

export function formatDuration(value: Duration, withDeciseconds = false): string {
  const { years, days, hours, minutes, seconds, deciseconds } = toComponents(value);
  const clock = `${pad(hours)}:${pad(minutes)}:${pad(seconds)}`;

  let text: string;
  if (years > 0) {
    text = `${years}y ${days}d ${clock}`;
  } else if (days > 0) {
    text = `${days}d ${clock}`;
  } else if (hours > 0) {
    text = `${hours}:${pad(minutes)}:${pad(seconds)}`;
  } else if (minutes > 0) {
    text = `${minutes}:${pad(seconds)}`;
  } else {
    text = `${seconds}`;
  }

  return withDeciseconds ? `${text}.${deciseconds}` : text;
}

function invalid(message: string): ParseResult<Duration> {
  return { success: false, error: new ParseError('invalid-format', message) };
}

function parseTime(token: string): ParseResult<Duration> {
  const fields = token.split(':');
  if (fields.length > 3) {
    return invalid("Invalid time format. Use 'ss', 'mm:ss' or 'hh:mm:ss'");
  }

  const [secondsField = '', minutesField = '0', hoursField = '0'] = [...fields].reverse();

  const secondsMatch = SECONDS_FIELD.exec(secondsField);
  if (!secondsMatch) {
    return invalid(`Invalid seconds: '${secondsField}'`);
  }
  const seconds = Number(secondsMatch[1]);
  const deciseconds = secondsMatch[2] === undefined ? 0 : Number(secondsMatch[2]);
  if (seconds >= 60) {
    return invalid('Seconds must be less than 60');
  }

  if (!INTEGER.test(minutesField)) {
    return invalid(`Invalid minutes: '${minutesField}'`);
  }
  const minutes = Number(minutesField);
  if (minutes >= 60) {
    return invalid('Minutes must be less than 60');
  }

  if (!INTEGER.test(hoursField)) {
    return invalid(`Invalid hours: '${hoursField}'`);
  }

  return {
    success: true,
    data: Number(hoursField) * ONE_HOUR + minutes * ONE_MINUTE + seconds * ONE_SECOND + deciseconds,
  };
}

/**
 * Parses `[<N>y] [<N>d] [[hh:]mm:]ss[.d]`, e.g. `5:03`, `1d 10`, `1y 5d 10:30:00`.
 */
export function parseDuration(text: string): ParseResult<Duration> {
  const tokens = text.trim().split(/\s+/).filter((token) => token.length > 0);

  if (tokens.length === 0) {
    return invalid('Duration is empty');
  }
  if (tokens.length > 3) {
    return invalid('Too many parts. Use [<N>y] [<N>d] [hh:mm:ss]');
  }

  let years: number | null = null;
  let days: number | null = null;
  let time: Duration | null = null;

  for (const token of tokens) {
    if (time !== null) {
      return invalid(`Unexpected '${token}' after the time part`);
    }

    if (token.endsWith('y')) {
      const value = token.slice(0, -1);
      if (years !== null || days !== null || !INTEGER.test(value)) {
        return invalid(`Invalid years value: '${token}'`);
      }
      years = Number(value);
    } else if (token.endsWith('d')) {
      const value = token.slice(0, -1);
      if (days !== null || !INTEGER.test(value)) {
        return invalid(`Invalid days value: '${token}'`);
      }
      days = Number(value);
    } else {
      const parsed = parseTime(token);
      if (!parsed.success) {
        return parsed;
      }
      time = parsed.data;
    }
  }

  const total = (years ?? 0) * ONE_YEAR + (days ?? 0) * ONE_DAY + (time ?? 0);
  if (total > MAX_DURATION) {
    return {
      success: false,
      error: new ParseError('out-of-range', `Duration exceeds the maximum of ${formatDuration(MAX_DURATION, true)}`),
    };
  }

  return { success: true, data: total };
}
