import type {
  AppState,
  ClockState,
  CountdownContent,
  Duration,
  EventContent,
  EventTarget,
  LocalTimeContent,
  PomodoroContent,
  TimerContent,
  TransitionEvent,
} from '../types/index.js';
import type { ParseResult } from '../services/errors.js';
import {
  cancelEdit,
  commitEdit,
  enterEdit,
  resetClock,
  saveAsInitial,
  toggleClock,
  toggleCountdownClock,
} from './clock.js';
import {
  cancelCountdownEdit,
  cancelLocalTimeEdit,
  commitCountdownEdit,
  enterCountdownEdit,
  resetCountdown,
  saveCountdownAsInitial,
  tickCountdown,
  toggleCountdown,
} from './countdown.js';
import { cancelEventEdit, commitEventEdit, enterEventEdit, tickEvent } from './event.js';
import { getActiveClock, tickPomodoro } from './pomodoro.js';
import { tickTimer } from './timer.js';

type CommitResult = ParseResult<Duration> | ParseResult<EventTarget> | null;

/**
 * Operations every mode answers to. Modes without a notion of an operation
 * (local time has no run state) answer with a no-op.
 */
export interface ModeController<TContent> {
  tick(content: TContent, ticks: number, now: number): TransitionEvent | null;
  toggle(content: TContent): boolean;
  reset(content: TContent): boolean;
  saveAsInitial(content: TContent): boolean;
  enterEdit(content: TContent): boolean;
  /** Clock whose duration edit overlay is open, if any */
  editingClock(content: TContent): ClockState | null;
  commitEdit(content: TContent, now: number): CommitResult;
  cancelEdit(content: TContent): boolean;
}

export interface BoundController {
  tick(ticks: number, now: number): TransitionEvent | null;
  toggle(): boolean;
  reset(): boolean;
  saveAsInitial(): boolean;
  enterEdit(): boolean;
  editingClock(): ClockState | null;
  commitEdit(now: number): CommitResult;
  cancelEdit(): boolean;
}

function openEdit(clock: ClockState): ClockState | null {
  return clock.edit ? clock : null;
}

export const countdownController: ModeController<CountdownContent> = {
  tick: (countdown, ticks) => tickCountdown(countdown, ticks),
  toggle: toggleCountdown,
  reset: resetCountdown,
  saveAsInitial: saveCountdownAsInitial,
  enterEdit: enterCountdownEdit,
  editingClock: (countdown) => openEdit(countdown.clock),
  commitEdit: (countdown) => commitCountdownEdit(countdown),
  cancelEdit: (countdown) => cancelCountdownEdit(countdown) || cancelLocalTimeEdit(countdown),
};

export const timerController: ModeController<TimerContent> = {
  tick: (timer, ticks) => tickTimer(timer, ticks),
  toggle: (timer) => toggleClock(timer.clock),
  reset: (timer) => resetClock(timer.clock),
  saveAsInitial: (timer) => saveAsInitial(timer.clock),
  enterEdit: (timer) => enterEdit(timer.clock),
  editingClock: (timer) => openEdit(timer.clock),
  commitEdit: (timer) => commitEdit(timer.clock),
  cancelEdit: (timer) => cancelEdit(timer.clock),
};

export const pomodoroController: ModeController<PomodoroContent> = {
  tick: (pomodoro, ticks) => tickPomodoro(pomodoro, ticks),
  toggle: (pomodoro) => toggleCountdownClock(getActiveClock(pomodoro)),
  reset: (pomodoro) => resetClock(getActiveClock(pomodoro)),
  saveAsInitial: (pomodoro) => saveAsInitial(getActiveClock(pomodoro)),
  enterEdit: (pomodoro) => enterEdit(getActiveClock(pomodoro)),
  editingClock: (pomodoro) => openEdit(getActiveClock(pomodoro)),
  commitEdit: (pomodoro) => commitEdit(getActiveClock(pomodoro)),
  cancelEdit: (pomodoro) => cancelEdit(getActiveClock(pomodoro)),
};

export const eventController: ModeController<EventContent> = {
  tick: (event, _ticks, now) => tickEvent(event, now),
  toggle: () => false,
  reset: () => false,
  saveAsInitial: () => false,
  enterEdit: enterEventEdit,
  editingClock: () => null,
  commitEdit: (event, now) => commitEventEdit(event, now),
  cancelEdit: cancelEventEdit,
};

export const localTimeController: ModeController<LocalTimeContent> = {
  tick: () => null,
  toggle: () => false,
  reset: () => false,
  saveAsInitial: () => false,
  enterEdit: () => false,
  editingClock: () => null,
  commitEdit: () => null,
  cancelEdit: () => false,
};

function bind<TContent>(controller: ModeController<TContent>, content: TContent): BoundController {
  return {
    tick: (ticks, now) => controller.tick(content, ticks, now),
    toggle: () => controller.toggle(content),
    reset: () => controller.reset(content),
    saveAsInitial: () => controller.saveAsInitial(content),
    enterEdit: () => controller.enterEdit(content),
    editingClock: () => controller.editingClock(content),
    commitEdit: (now) => controller.commitEdit(content, now),
    cancelEdit: () => controller.cancelEdit(content),
  };
}

export function getActiveController(state: AppState): BoundController {
  switch (state.activeMode) {
    case 'countdown':
      return bind(countdownController, state.countdown);
    case 'timer':
      return bind(timerController, state.timer);
    case 'pomodoro':
      return bind(pomodoroController, state.pomodoro);
    case 'event':
      return bind(eventController, state.event);
    case 'localtime':
      return bind(localTimeController, state.localTime);
  }
}
