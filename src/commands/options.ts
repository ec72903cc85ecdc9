import { InvalidArgumentError } from 'commander';
import type { ClockStyle, Duration, EventTarget, Mode } from '../types/index.js';
import { ClockStyleSchema } from '../types/index.js';
import { parseDuration } from '../services/duration.js';
import { parseEventTarget } from '../services/event-target.js';
import { LogLevelSchema, type LogLevel } from '../services/logger.js';
import { validateSoundFile } from '../services/notifier.js';
import type { StartupOptions } from '../app/state.js';

/** Options as commander hands them to the action. */
export interface StartOptions {
  countdown?: Duration;
  work?: Duration;
  pause?: Duration;
  event?: EventTarget;
  mode?: Mode;
  style?: ClockStyle;
  decis?: boolean;
  met: boolean;
  notification?: boolean;
  blink?: boolean;
  sound?: string;
  reset?: boolean;
  logLevel: LogLevel;
}

const MODE_ALIASES: Record<string, Mode> = {
  countdown: 'countdown',
  c: 'countdown',
  timer: 'timer',
  t: 'timer',
  pomodoro: 'pomodoro',
  p: 'pomodoro',
  event: 'event',
  e: 'event',
  localtime: 'localtime',
  l: 'localtime',
};

export function parseDurationOption(value: string): Duration {
  const parsed = parseDuration(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(parsed.error.message);
  }
  return parsed.data;
}

export function parseEventOption(value: string): EventTarget {
  const parsed = parseEventTarget(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(parsed.error.message);
  }
  return parsed.data;
}

export function parseModeOption(value: string): Mode {
  const mode = MODE_ALIASES[value.toLowerCase()];
  if (!mode) {
    throw new InvalidArgumentError(`Unknown mode '${value}'. Use countdown, timer, pomodoro, event or localtime`);
  }
  return mode;
}

export function parseStyleOption(value: string): ClockStyle {
  const parsed = ClockStyleSchema.safeParse(value.toLowerCase());
  if (!parsed.success) {
    throw new InvalidArgumentError(`Unknown style '${value}'. Use ${ClockStyleSchema.options.join(', ')}`);
  }
  return parsed.data;
}

export function parseSwitchOption(value: string): boolean {
  switch (value.toLowerCase()) {
    case 'on':
      return true;
    case 'off':
      return false;
    default:
      throw new InvalidArgumentError(`Expected 'on' or 'off', got '${value}'`);
  }
}

export function parseSoundOption(value: string): string {
  const validated = validateSoundFile(value);
  if (!validated.success) {
    throw new InvalidArgumentError(validated.error.message);
  }
  return validated.data;
}

export function parseLogLevelOption(value: string): LogLevel {
  const parsed = LogLevelSchema.safeParse(value.toLowerCase());
  if (!parsed.success) {
    throw new InvalidArgumentError(`Unknown log level '${value}'. Use ${LogLevelSchema.options.join(', ')}`);
  }
  return parsed.data;
}

export function toStartupOptions(options: StartOptions): StartupOptions {
  return {
    countdown: options.countdown,
    work: options.work,
    pause: options.pause,
    event: options.event,
    mode: options.mode,
    style: options.style,
    decis: options.decis,
    met: options.met,
    notifications: options.notification,
    blink: options.blink,
    soundPath: options.sound,
  };
}
