import type {
  CountdownContent,
  Duration,
  LocalTimeField,
  RunState,
  TransitionEvent,
} from '../types/index.js';
import { addTicks, clampDuration, MS_PER_DECISECOND } from '../services/duration.js';
import type { ParseResult } from '../services/errors.js';
import {
  cancelEdit,
  commitEdit,
  createClock,
  enterEdit,
  isTicking,
  resetClock,
  saveAsInitial,
  tickDown,
  toggleClock,
  toggleCountdownClock,
  type EditDirection,
} from './clock.js';

const LOCAL_TIME_FIELDS: readonly LocalTimeField[] = ['seconds', 'minutes', 'hours'];

const LOCAL_TIME_UNIT_MS: Record<LocalTimeField, number> = {
  seconds: 1000,
  minutes: 60 * 1000,
  hours: 60 * 60 * 1000,
};

export interface CountdownOptions {
  current?: Duration;
  runState?: RunState;
  overtime?: boolean;
  metEnabled?: boolean;
}

export function createCountdown(initial: Duration, options: CountdownOptions = {}): CountdownContent {
  const { current = initial, runState = 'initial', overtime = false, metEnabled = true } = options;
  return {
    clock: createClock(initial, current, runState),
    metEnabled,
    overtime: metEnabled && overtime,
    localTimeEdit: null,
  };
}

/**
 * Advances a running countdown. Reaching zero either ends it (`done`) or, with
 * Mission Elapsed Time enabled, flips it into overtime where it keeps counting
 * up. Either way `reached-zero` is returned only on that one tick.
 */
export function tickCountdown(countdown: CountdownContent, ticks: number): TransitionEvent | null {
  const { clock } = countdown;
  if (!isTicking(clock) || countdown.localTimeEdit) {
    return null;
  }

  if (countdown.overtime) {
    clock.current = addTicks(clock.current, ticks);
    return null;
  }

  const { reachedZero, overflow } = tickDown(clock, ticks);
  if (!reachedZero) {
    return null;
  }

  if (countdown.metEnabled) {
    countdown.overtime = true;
    clock.current = addTicks(0, overflow);
  } else {
    clock.runState = 'done';
  }
  return 'reached-zero';
}

export function toggleCountdown(countdown: CountdownContent): boolean {
  if (countdown.localTimeEdit) {
    return false;
  }
  return countdown.overtime ? toggleClock(countdown.clock) : toggleCountdownClock(countdown.clock);
}

export function resetCountdown(countdown: CountdownContent): boolean {
  if (countdown.localTimeEdit || !resetClock(countdown.clock)) {
    return false;
  }
  countdown.overtime = false;
  return true;
}

export function saveCountdownAsInitial(countdown: CountdownContent): boolean {
  if (countdown.overtime || countdown.localTimeEdit) {
    return false;
  }
  return saveAsInitial(countdown.clock);
}

export function setCountdownInitial(countdown: CountdownContent, value: Duration): void {
  countdown.clock = createClock(value);
  countdown.overtime = false;
  countdown.localTimeEdit = null;
}

export function enterCountdownEdit(countdown: CountdownContent): boolean {
  if (countdown.localTimeEdit) {
    return false;
  }
  const { clock } = countdown;
  return enterEdit(clock, countdown.overtime ? clock.initial : clock.current);
}

export function commitCountdownEdit(countdown: CountdownContent): ParseResult<Duration> | null {
  const result = commitEdit(countdown.clock);
  if (result?.success) {
    countdown.overtime = false;
  }
  return result;
}

export function cancelCountdownEdit(countdown: CountdownContent): boolean {
  return cancelEdit(countdown.clock);
}

export function enterLocalTimeEdit(countdown: CountdownContent, now: number): boolean {
  const { clock } = countdown;
  if (countdown.localTimeEdit || clock.edit || clock.runState === 'done') {
    return false;
  }

  const remaining = countdown.overtime ? 0 : clock.current;
  countdown.localTimeEdit = {
    target: now + remaining * MS_PER_DECISECOND,
    field: 'minutes',
    resumeState: clock.runState,
  };
  return true;
}

export function moveLocalTimeSelection(countdown: CountdownContent, direction: EditDirection): void {
  const edit = countdown.localTimeEdit;
  if (!edit) {
    return;
  }

  const index = LOCAL_TIME_FIELDS.indexOf(edit.field);
  const next = direction === 'left' ? Math.min(LOCAL_TIME_FIELDS.length - 1, index + 1) : Math.max(0, index - 1);
  edit.field = LOCAL_TIME_FIELDS[next];
}

export function adjustLocalTimeEdit(countdown: CountdownContent, delta: number, now: number): void {
  const edit = countdown.localTimeEdit;
  if (!edit) {
    return;
  }
  edit.target = Math.max(now, edit.target + delta * LOCAL_TIME_UNIT_MS[edit.field]);
}

/** Sets the countdown to the time left until the chosen wall-clock time. */
export function commitLocalTimeEdit(countdown: CountdownContent, now: number): Duration | null {
  const edit = countdown.localTimeEdit;
  if (!edit) {
    return null;
  }

  const value = clampDuration(Math.floor((edit.target - now) / MS_PER_DECISECOND));
  const { clock } = countdown;
  clock.initial = value;
  clock.current = value;
  clock.runState = edit.resumeState;
  countdown.overtime = false;
  countdown.localTimeEdit = null;
  return value;
}

export function cancelLocalTimeEdit(countdown: CountdownContent): boolean {
  if (!countdown.localTimeEdit) {
    return false;
  }
  countdown.localTimeEdit = null;
  return true;
}
