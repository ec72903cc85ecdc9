import type { ClockState, Duration, PomodoroContent, PomodoroSide, TransitionEvent } from '../types/index.js';
import { createClock, resetClock, startCountdownClock, tickDown } from './clock.js';

export interface PomodoroOptions {
  activeSide?: PomodoroSide;
  round?: number;
  work?: ClockState;
  pause?: ClockState;
}

export function createPomodoro(work: Duration, pause: Duration, options: PomodoroOptions = {}): PomodoroContent {
  return {
    work: options.work ?? createClock(work),
    pause: options.pause ?? createClock(pause),
    activeSide: options.activeSide ?? 'work',
    round: options.round ?? 0,
  };
}

export function getActiveClock(pomodoro: PomodoroContent): ClockState {
  return pomodoro.activeSide === 'work' ? pomodoro.work : pomodoro.pause;
}

function otherSide(side: PomodoroSide): PomodoroSide {
  return side === 'work' ? 'pause' : 'work';
}

/**
 * Ticks the active side. When it runs out, the sides flip and the next one
 * starts from its initial value; finishing a pause completes a round.
 * Ticks left over after the flip are dropped. A side with a zero initial
 * value is left in its initial state instead of being started.
 */
export function tickPomodoro(pomodoro: PomodoroContent, ticks: number): TransitionEvent | null {
  const finished = getActiveClock(pomodoro);
  const { reachedZero } = tickDown(finished, ticks);
  if (!reachedZero) {
    return null;
  }

  resetClock(finished);
  if (pomodoro.activeSide === 'pause') {
    pomodoro.round += 1;
  }
  pomodoro.activeSide = otherSide(pomodoro.activeSide);

  const next = getActiveClock(pomodoro);
  resetClock(next);
  startCountdownClock(next);
  return 'reached-zero';
}

export function switchSide(pomodoro: PomodoroContent): void {
  pomodoro.activeSide = otherSide(pomodoro.activeSide);
}

export function resetPomodoro(pomodoro: PomodoroContent): boolean {
  if (pomodoro.work.edit || pomodoro.pause.edit) {
    return false;
  }
  resetClock(pomodoro.work);
  resetClock(pomodoro.pause);
  pomodoro.round = 0;
  return true;
}

export function setPomodoroInitial(pomodoro: PomodoroContent, side: PomodoroSide, value: Duration): void {
  pomodoro[side] = createClock(value);
}
