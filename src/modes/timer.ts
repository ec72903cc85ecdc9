import type { Duration, RunState, TimerContent, TransitionEvent } from '../types/index.js';
import { createClock, tickUp } from './clock.js';

export function createTimer(
  initial: Duration = 0,
  current: Duration = initial,
  runState: RunState = 'initial'
): TimerContent {
  return { clock: createClock(initial, current, runState) };
}

/** Counts up; hitting the maximum duration ends the timer. */
export function tickTimer(timer: TimerContent, ticks: number): TransitionEvent | null {
  const { reachedMax } = tickUp(timer.clock, ticks);
  if (!reachedMax) {
    return null;
  }
  timer.clock.runState = 'done';
  return 'reached-max';
}
