import type { ClockState, Duration, EditField, RunState } from '../types/index.js';
import { addTicks, clampDuration, MAX_DURATION, parseDuration, subTicks, unitOf } from '../services/duration.js';
import type { ParseResult } from '../services/errors.js';

export const EDIT_FIELDS: readonly EditField[] = ['deciseconds', 'seconds', 'minutes', 'hours', 'days', 'years'];

const EDITABLE_STATES: readonly RunState[] = ['initial', 'running', 'paused'];

// Characters accepted as typed duration text while editing
const EDIT_TEXT_CHARS = /^[0-9yd:. ]$/;

export type EditDirection = 'left' | 'right';

export function createClock(initial: Duration, current: Duration = initial, runState: RunState = 'initial'): ClockState {
  return {
    initial: clampDuration(initial),
    current: clampDuration(current),
    runState,
    edit: null,
  };
}

export function isTicking(clock: ClockState): boolean {
  return clock.runState === 'running' && clock.edit === null;
}

export function startClock(clock: ClockState): boolean {
  if (clock.edit || (clock.runState !== 'initial' && clock.runState !== 'paused')) {
    return false;
  }
  clock.runState = 'running';
  return true;
}

/** Starts a clock that counts down, which has nothing to run at zero. */
export function startCountdownClock(clock: ClockState): boolean {
  return clock.current > 0 && startClock(clock);
}

export function toggleCountdownClock(clock: ClockState): boolean {
  return clock.runState === 'running' ? pauseClock(clock) : startCountdownClock(clock);
}

export function pauseClock(clock: ClockState): boolean {
  if (clock.edit || clock.runState !== 'running') {
    return false;
  }
  clock.runState = 'paused';
  return true;
}

export function toggleClock(clock: ClockState): boolean {
  return clock.runState === 'running' ? pauseClock(clock) : startClock(clock);
}

export function resetClock(clock: ClockState): boolean {
  if (clock.edit) {
    return false;
  }
  clock.runState = 'initial';
  clock.current = clock.initial;
  return true;
}

export function saveAsInitial(clock: ClockState): boolean {
  if (clock.edit) {
    return false;
  }
  clock.initial = clock.current;
  return true;
}

/**
 * Counts down by `ticks`. `reachedZero` is set only on the tick that takes the
 * clock from above zero to zero; a clock already at zero never reports it.
 */
export function tickDown(clock: ClockState, ticks: number): { reachedZero: boolean; overflow: number } {
  if (!isTicking(clock)) {
    return { reachedZero: false, overflow: 0 };
  }

  const { value, crossedZero, overflow } = subTicks(clock.current, ticks);
  clock.current = value;
  return { reachedZero: crossedZero, overflow };
}

export function tickUp(clock: ClockState, ticks: number): { reachedMax: boolean } {
  if (!isTicking(clock)) {
    return { reachedMax: false };
  }

  clock.current = addTicks(clock.current, ticks);
  return { reachedMax: clock.current === MAX_DURATION };
}

export function enterEdit(clock: ClockState, pending: Duration = clock.current): boolean {
  if (clock.edit || !EDITABLE_STATES.includes(clock.runState)) {
    return false;
  }

  clock.edit = {
    field: 'minutes',
    pending: clampDuration(pending),
    text: '',
    error: null,
    resumeState: clock.runState,
  };
  return true;
}

export function moveEditSelection(clock: ClockState, direction: EditDirection): void {
  if (!clock.edit) {
    return;
  }

  const index = EDIT_FIELDS.indexOf(clock.edit.field);
  const next = direction === 'left' ? Math.min(EDIT_FIELDS.length - 1, index + 1) : Math.max(0, index - 1);
  clock.edit.field = EDIT_FIELDS[next];
}

export function updateEditField(clock: ClockState, delta: number): void {
  if (!clock.edit) {
    return;
  }

  const { pending, field } = clock.edit;
  clock.edit.pending = clampDuration(pending + delta * unitOf(field));
  clock.edit.text = '';
  clock.edit.error = null;
}

export function typeEditText(clock: ClockState, char: string): boolean {
  if (!clock.edit || !EDIT_TEXT_CHARS.test(char)) {
    return false;
  }
  clock.edit.text += char;
  clock.edit.error = null;
  return true;
}

export function deleteEditText(clock: ClockState): void {
  if (!clock.edit) {
    return;
  }
  clock.edit.text = clock.edit.text.slice(0, -1);
  clock.edit.error = null;
}

/**
 * Applies the pending value (or the typed text, if any) as the new initial
 * and current value. Invalid text keeps the edit open with its error.
 */
export function commitEdit(clock: ClockState): ParseResult<Duration> | null {
  const { edit } = clock;
  if (!edit) {
    return null;
  }

  let value = edit.pending;
  if (edit.text.trim().length > 0) {
    const parsed = parseDuration(edit.text);
    if (!parsed.success) {
      edit.error = parsed.error.message;
      return parsed;
    }
    value = parsed.data;
  }

  clock.initial = value;
  clock.current = value;
  clock.runState = edit.resumeState;
  clock.edit = null;
  return { success: true, data: value };
}

export function cancelEdit(clock: ClockState): boolean {
  if (!clock.edit) {
    return false;
  }
  clock.runState = clock.edit.resumeState;
  clock.edit = null;
  return true;
}
