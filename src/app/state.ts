import type {
  AppState,
  ClockStyle,
  Duration,
  EventTarget,
  Mode,
  PersistedClock,
  PersistedState,
  RunState,
} from '../types/index.js';
import { ONE_MINUTE } from '../services/duration.js';
import { formatDateTime, nextNewYear, parseDateTime } from '../services/event-target.js';
import { createClock } from '../modes/clock.js';
import { createCountdown, setCountdownInitial } from '../modes/countdown.js';
import { createEvent, setEventTarget } from '../modes/event.js';
import { createLocalTime } from '../modes/local-time.js';
import { createPomodoro, setPomodoroInitial } from '../modes/pomodoro.js';
import { createTimer } from '../modes/timer.js';

export const DEFAULT_COUNTDOWN: Duration = 10 * ONE_MINUTE;
export const DEFAULT_WORK: Duration = 25 * ONE_MINUTE;
export const DEFAULT_PAUSE: Duration = 5 * ONE_MINUTE;

export const DEFAULT_TERMINAL = { columns: 80, rows: 24 };

/** Values taken from the command line. They win over the persisted state. */
export interface StartupOptions {
  countdown?: Duration;
  work?: Duration;
  pause?: Duration;
  event?: EventTarget;
  mode?: Mode;
  style?: ClockStyle;
  decis?: boolean;
  met?: boolean;
  notifications?: boolean;
  blink?: boolean;
  soundPath?: string;
}

export function createDefaultState(now: number): AppState {
  return {
    activeMode: 'countdown',
    countdown: createCountdown(DEFAULT_COUNTDOWN),
    timer: createTimer(),
    pomodoro: createPomodoro(DEFAULT_WORK, DEFAULT_PAUSE),
    event: createEvent(nextNewYear(now), now),
    localTime: createLocalTime(),
    style: 'full',
    showDeciseconds: false,
    showLocalTime: false,
    menu: { open: false, selected: 0 },
    notificationsEnabled: true,
    blinkEnabled: false,
    soundPath: null,
    flash: 0,
    terminal: { ...DEFAULT_TERMINAL },
    now,
    lastTaskOutcome: null,
  };
}

export function applyStartupOptions(state: AppState, options: StartupOptions, now: number): void {
  if (options.countdown !== undefined) {
    setCountdownInitial(state.countdown, options.countdown);
  }
  if (options.work !== undefined) {
    setPomodoroInitial(state.pomodoro, 'work', options.work);
  }
  if (options.pause !== undefined) {
    setPomodoroInitial(state.pomodoro, 'pause', options.pause);
  }
  if (options.event !== undefined) {
    setEventTarget(state.event, options.event, now);
  }
  if (options.met !== undefined && options.met !== state.countdown.metEnabled) {
    state.countdown.metEnabled = options.met;
    if (!options.met && state.countdown.overtime) {
      setCountdownInitial(state.countdown, state.countdown.clock.initial);
    }
  }

  state.activeMode = options.mode ?? state.activeMode;
  state.style = options.style ?? state.style;
  state.showDeciseconds = options.decis ?? state.showDeciseconds;
  state.notificationsEnabled = options.notifications ?? state.notificationsEnabled;
  state.blinkEnabled = options.blink ?? state.blinkEnabled;
  state.soundPath = options.soundPath ?? state.soundPath;
}

// A clock cannot keep running while the app is closed
function restoredRunState(runState: RunState): RunState {
  return runState === 'running' ? 'paused' : runState;
}

function restoreClock({ initial, current, runState }: PersistedClock) {
  return createClock(initial, current, restoredRunState(runState));
}

function persistClock({ initial, current, runState }: PersistedClock): PersistedClock {
  return { initial, current, runState };
}

export function toPersisted(state: AppState): PersistedState {
  const { countdown, timer, pomodoro, event } = state;

  return {
    version: 1,
    activeMode: state.activeMode,
    style: state.style,
    showDeciseconds: state.showDeciseconds,
    showLocalTime: state.showLocalTime,
    localTimeFormat: state.localTime.format,
    menuOpen: state.menu.open,
    notificationsEnabled: state.notificationsEnabled,
    blinkEnabled: state.blinkEnabled,
    countdown: {
      ...persistClock(countdown.clock),
      overtime: countdown.overtime,
      metEnabled: countdown.metEnabled,
    },
    timer: persistClock(timer.clock),
    pomodoro: {
      activeSide: pomodoro.activeSide,
      round: pomodoro.round,
      work: persistClock(pomodoro.work),
      pause: persistClock(pomodoro.pause),
    },
    event: {
      target: formatDateTime(event.target),
      title: event.title,
    },
  };
}

export function fromPersisted(persisted: PersistedState, now: number): AppState {
  const state = createDefaultState(now);
  const { countdown, timer, pomodoro, event } = persisted;

  state.activeMode = persisted.activeMode;
  state.style = persisted.style;
  state.showDeciseconds = persisted.showDeciseconds;
  state.showLocalTime = persisted.showLocalTime;
  state.localTime = createLocalTime(persisted.localTimeFormat);
  state.menu.open = persisted.menuOpen;
  state.notificationsEnabled = persisted.notificationsEnabled;
  state.blinkEnabled = persisted.blinkEnabled;

  state.countdown = createCountdown(countdown.initial, {
    current: countdown.current,
    runState: restoredRunState(countdown.runState),
    overtime: countdown.overtime,
    metEnabled: countdown.metEnabled,
  });
  state.timer = createTimer(timer.initial, timer.current, restoredRunState(timer.runState));
  state.pomodoro = createPomodoro(pomodoro.work.initial, pomodoro.pause.initial, {
    activeSide: pomodoro.activeSide,
    round: pomodoro.round,
    work: restoreClock(pomodoro.work),
    pause: restoreClock(pomodoro.pause),
  });

  const target = parseDateTime(event.target);
  if (target.success) {
    state.event = createEvent({ target: target.data, title: event.title }, now);
  }

  return state;
}
