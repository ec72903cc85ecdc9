import type {
  AppEvent,
  AppState,
  ClockStyle,
  Effect,
  KeyInput,
  NotificationKind,
  SteppedMode,
  TransitionEvent,
} from '../types/index.js';
import type { Logger } from '../services/logger.js';
import { formatDuration } from '../services/duration.js';
import { getActiveController } from '../modes/controllers.js';
import { deleteEditText, moveEditSelection, typeEditText, updateEditField } from '../modes/clock.js';
import {
  adjustLocalTimeEdit,
  cancelLocalTimeEdit,
  commitLocalTimeEdit,
  enterLocalTimeEdit,
  moveLocalTimeSelection,
} from '../modes/countdown.js';
import { deleteEventEdit, switchEventEditField, tickEvent, typeEventEdit } from '../modes/event.js';
import { cycleLocalTimeFormat } from '../modes/local-time.js';
import { resetPomodoro, switchSide } from '../modes/pomodoro.js';
import {
  commandForKey,
  durationEditCommandForKey,
  isQuitKey,
  MENU_ITEMS,
  menuCommandForKey,
  textEditCommandForKey,
  type Command,
} from './keymap.js';

export const STYLE_ORDER: readonly ClockStyle[] = ['full', 'dark', 'medium', 'light', 'braille', 'thick', 'cross'];

/** Length of the done flash, 3 seconds. */
export const FLASH_TICKS = 30;

export interface ReduceContext {
  now: number;
  logger: Logger;
}

function isSteppedMode(mode: AppState['activeMode']): mode is SteppedMode {
  return mode === 'countdown' || mode === 'timer' || mode === 'pomodoro';
}

function describeTransition(state: AppState, mode: SteppedMode | 'event'): { kind: NotificationKind; message: string } {
  switch (mode) {
    case 'countdown':
      return {
        kind: 'countdown',
        message: `Countdown of ${formatDuration(state.countdown.clock.initial)} finished`,
      };
    case 'timer':
      return { kind: 'timer', message: `Timer reached ${formatDuration(state.timer.clock.current)}` };
    case 'pomodoro':
      // The sides have already flipped
      return state.pomodoro.activeSide === 'pause'
        ? { kind: 'work', message: 'Work session finished, time for a break' }
        : { kind: 'pause', message: `Break finished, round ${state.pomodoro.round} done` };
    case 'event':
      return { kind: 'event', message: `${state.event.title ?? 'Event'} reached` };
  }
}

function onTransition(
  state: AppState,
  mode: SteppedMode | 'event',
  transition: TransitionEvent,
  { logger }: ReduceContext
): Effect[] {
  const { kind, message } = describeTransition(state, mode);
  logger.info(`${mode} ${transition}: ${message}`);

  const effects: Effect[] = [];
  if (state.notificationsEnabled) {
    effects.push({ type: 'notify', kind, message });
  }
  if (state.soundPath) {
    effects.push({ type: 'play-sound', path: state.soundPath });
  }
  if (state.blinkEnabled) {
    state.flash = FLASH_TICKS;
  }
  return effects;
}

function reduceTick(state: AppState, count: number, context: ReduceContext): Effect[] {
  state.now = context.now;
  state.flash = Math.max(0, state.flash - count);

  const effects: Effect[] = [];
  const mode = state.activeMode;
  if (isSteppedMode(mode)) {
    const transition = getActiveController(state).tick(count, context.now);
    if (transition) {
      effects.push(...onTransition(state, mode, transition, context));
    }
  }

  // The event crossing is tracked whichever mode is on screen
  const eventTransition = tickEvent(state.event, context.now);
  if (eventTransition) {
    effects.push(...onTransition(state, 'event', eventTransition, context));
  }
  return effects;
}

function runCommand(state: AppState, command: Command, context: ReduceContext): Effect[] {
  const controller = getActiveController(state);

  switch (command.type) {
    case 'quit':
      return [{ type: 'quit' }];
    case 'switch-mode':
      state.activeMode = command.mode;
      return [];
    case 'toggle-run':
      controller.toggle();
      return [];
    case 'reset':
      controller.reset();
      return [];
    case 'reset-all':
      if (state.activeMode === 'pomodoro') {
        resetPomodoro(state.pomodoro);
      }
      return [];
    case 'edit':
      controller.enterEdit();
      return [];
    case 'edit-local-time':
      if (state.activeMode === 'countdown') {
        enterLocalTimeEdit(state.countdown, context.now);
      }
      return [];
    case 'save-initial':
      controller.saveAsInitial();
      return [];
    case 'switch-side':
      if (state.activeMode === 'pomodoro') {
        switchSide(state.pomodoro);
      }
      return [];
    case 'toggle-menu':
      state.menu.open = !state.menu.open;
      return [];
    case 'cycle-style':
      state.style = STYLE_ORDER[(STYLE_ORDER.indexOf(state.style) + 1) % STYLE_ORDER.length];
      return [];
    case 'toggle-deciseconds':
      state.showDeciseconds = !state.showDeciseconds;
      return [];
    case 'toggle-local-time':
      state.showLocalTime = !state.showLocalTime;
      return [];
    case 'cycle-local-time-format':
      cycleLocalTimeFormat(state.localTime);
      return [];
    case 'toggle-notifications':
      state.notificationsEnabled = !state.notificationsEnabled;
      return [];
    case 'save':
      return [{ type: 'save' }];
  }
}

function reduceLocalTimeEditKey(state: AppState, key: KeyInput, context: ReduceContext): void {
  const { countdown } = state;
  const command = durationEditCommandForKey(key);
  if (!command) {
    return;
  }

  switch (command.type) {
    case 'select':
      moveLocalTimeSelection(countdown, command.direction);
      break;
    case 'adjust':
      adjustLocalTimeEdit(countdown, command.delta, context.now);
      break;
    case 'commit': {
      const value = commitLocalTimeEdit(countdown, context.now);
      if (value !== null) {
        context.logger.debug(`countdown set to ${formatDuration(value)} by local time`);
      }
      break;
    }
    case 'cancel':
      cancelLocalTimeEdit(countdown);
      break;
  }
}

function reduceDurationEditKey(state: AppState, key: KeyInput, context: ReduceContext): void {
  const controller = getActiveController(state);
  const clock = controller.editingClock();
  const command = durationEditCommandForKey(key);
  if (!clock || !command) {
    return;
  }

  switch (command.type) {
    case 'select':
      moveEditSelection(clock, command.direction);
      break;
    case 'adjust':
      updateEditField(clock, command.delta);
      break;
    case 'type':
      typeEditText(clock, command.char);
      break;
    case 'delete':
      deleteEditText(clock);
      break;
    case 'commit': {
      const result = controller.commitEdit(context.now);
      if (result && !result.success) {
        context.logger.debug(`edit rejected: ${result.error.message}`);
      }
      break;
    }
    case 'cancel':
      controller.cancelEdit();
      break;
  }
}

function reduceEventEditKey(state: AppState, key: KeyInput, context: ReduceContext): void {
  const command = textEditCommandForKey(key);
  if (!command) {
    return;
  }

  switch (command.type) {
    case 'switch-field':
      switchEventEditField(state.event);
      break;
    case 'type':
      typeEventEdit(state.event, command.char);
      break;
    case 'delete':
      deleteEventEdit(state.event);
      break;
    case 'commit': {
      const result = getActiveController(state).commitEdit(context.now);
      if (result && !result.success) {
        context.logger.debug(`event edit rejected: ${result.error.message}`);
      }
      break;
    }
    case 'cancel':
      getActiveController(state).cancelEdit();
      break;
  }
}

function reduceMenuKey(state: AppState, key: KeyInput, context: ReduceContext): Effect[] {
  const { menu } = state;
  const command = menuCommandForKey(key);
  if (!command) {
    return [];
  }

  switch (command.type) {
    case 'move':
      menu.selected = (menu.selected + command.delta + MENU_ITEMS.length) % MENU_ITEMS.length;
      return [];
    case 'activate':
      menu.open = false;
      return runCommand(state, MENU_ITEMS[menu.selected].command, context);
    case 'close':
      menu.open = false;
      return [];
  }
}

function reduceKey(state: AppState, key: KeyInput, context: ReduceContext): Effect[] {
  if (isQuitKey(key)) {
    return [{ type: 'quit' }];
  }

  const durationOverlayOpen =
    (state.activeMode === 'countdown' && state.countdown.localTimeEdit !== null) ||
    getActiveController(state).editingClock() !== null;
  if (durationOverlayOpen) {
    // Mode keys are outside the duration grammar, so they still switch modes
    const command = commandForKey(key);
    if (command?.type === 'switch-mode') {
      state.activeMode = command.mode;
      return [];
    }
  }

  if (state.activeMode === 'countdown' && state.countdown.localTimeEdit) {
    reduceLocalTimeEditKey(state, key, context);
    return [];
  }
  if (getActiveController(state).editingClock()) {
    reduceDurationEditKey(state, key, context);
    return [];
  }
  if (state.activeMode === 'event' && state.event.edit) {
    reduceEventEditKey(state, key, context);
    return [];
  }
  if (state.menu.open) {
    return reduceMenuKey(state, key, context);
  }

  const command = commandForKey(key);
  return command ? runCommand(state, command, context) : [];
}

/**
 * Applies one event to the state in place and returns the side effects the
 * runtime has to carry out.
 */
export function reduce(state: AppState, event: AppEvent, context: ReduceContext): Effect[] {
  switch (event.type) {
    case 'tick':
      return reduceTick(state, event.count, context);
    case 'key':
      return reduceKey(state, event.key, context);
    case 'resize':
      state.terminal = { columns: event.columns, rows: event.rows };
      return [];
    case 'task-done':
      state.lastTaskOutcome = { task: event.task, outcome: event.outcome };
      if (event.outcome.ok) {
        context.logger.debug(`${event.task} delivered`);
      } else {
        context.logger.warn(`${event.task} failed: ${event.outcome.reason}`);
      }
      return [];
  }
}
