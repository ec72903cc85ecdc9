import type {
  AppState,
  ClockState,
  ClockStyle,
  EditField,
  EventEditField,
  LocalTimeField,
  Mode,
} from '../types/index.js';
import { formatDuration } from '../services/duration.js';
import { formatDateTime } from '../services/event-target.js';
import { getEventDistance, getEventProgress } from '../modes/event.js';
import { formatLocalTime } from '../modes/local-time.js';
import { getActiveClock } from '../modes/pomodoro.js';
import { MENU_ITEMS } from './keymap.js';

// Blink period of the done flash, in ticks
const FLASH_PHASE_TICKS = 5;

export type EditView =
  | { kind: 'duration'; field: EditField; value: string; text: string; error: string | null }
  | { kind: 'local-time'; field: LocalTimeField; value: string }
  | { kind: 'event'; field: EventEditField; datetime: string; title: string; error: string | null };

export interface KeyHint {
  key: string;
  description: string;
}

/** Everything the display needs for one frame, already formatted. */
export interface RenderSnapshot {
  mode: Mode;
  heading: string;
  display: string;
  sign: '+' | '-' | null;
  status: string;
  edit: EditView | null;
  /** Whole percent done, for modes that run towards an end */
  progress: number | null;
  localTime: string | null;
  style: ClockStyle;
  columns: number;
  flashVisible: boolean;
  menu: { open: boolean; items: string[]; selected: number };
  hints: KeyHint[];
  notice: string | null;
}

const MODE_HEADINGS: Record<Mode, string> = {
  countdown: 'Countdown',
  timer: 'Timer',
  pomodoro: 'Pomodoro',
  event: 'Event',
  localtime: 'Local time',
};

const RUN_STATE_LABELS: Record<ClockState['runState'], string> = {
  initial: 'ready',
  running: 'running',
  paused: 'paused',
  done: 'done',
};

function durationEditView(clock: ClockState, withDeciseconds: boolean): EditView | null {
  const { edit } = clock;
  if (!edit) {
    return null;
  }
  return {
    kind: 'duration',
    field: edit.field,
    value: formatDuration(edit.pending, withDeciseconds),
    text: edit.text,
    error: edit.error,
  };
}

// Share of a down-counting clock already used up
function countdownProgress({ initial, current }: ClockState): number {
  if (initial === 0) {
    return 100;
  }
  return Math.min(100, Math.max(0, Math.floor(((initial - current) * 100) / initial)));
}

function clockView(state: AppState, clock: ClockState) {
  return {
    display: formatDuration(clock.edit ? clock.edit.pending : clock.current, state.showDeciseconds),
    status: RUN_STATE_LABELS[clock.runState],
    edit: durationEditView(clock, state.showDeciseconds),
  };
}

type ModeView = Pick<RenderSnapshot, 'heading' | 'display' | 'sign' | 'status' | 'edit' | 'progress'>;

function modeView(state: AppState): ModeView {
  switch (state.activeMode) {
    case 'countdown': {
      const { countdown } = state;
      const view = clockView(state, countdown.clock);
      const localTimeEdit = countdown.localTimeEdit;
      return {
        heading: MODE_HEADINGS.countdown,
        ...view,
        sign: countdown.overtime ? '+' : null,
        status: countdown.overtime ? `MET ${view.status}` : view.status,
        progress: countdown.overtime ? 100 : countdownProgress(countdown.clock),
        edit: localTimeEdit
          ? {
              kind: 'local-time',
              field: localTimeEdit.field,
              value: formatLocalTime(localTimeEdit.target, 'hh:mm:ss'),
            }
          : view.edit,
      };
    }
    case 'timer':
      return { heading: MODE_HEADINGS.timer, ...clockView(state, state.timer.clock), sign: null, progress: null };
    case 'pomodoro': {
      const { pomodoro } = state;
      const side = pomodoro.activeSide === 'work' ? 'Work' : 'Pause';
      const clock = getActiveClock(pomodoro);
      return {
        heading: `${MODE_HEADINGS.pomodoro} · ${side} · round ${pomodoro.round}`,
        ...clockView(state, clock),
        sign: null,
        progress: countdownProgress(clock),
      };
    }
    case 'event': {
      const { event } = state;
      const { value, polarity } = getEventDistance(event, state.now);
      return {
        heading: event.title ?? MODE_HEADINGS.event,
        display: formatDuration(value, state.showDeciseconds),
        sign: polarity === 'until' ? '-' : '+',
        status: `${polarity} ${formatDateTime(event.target)}`,
        progress: getEventProgress(event, state.now),
        edit: event.edit
          ? {
              kind: 'event',
              field: event.edit.field,
              datetime: event.edit.datetime,
              title: event.edit.title,
              error: event.edit.error,
            }
          : null,
      };
    }
    case 'localtime':
      return {
        heading: MODE_HEADINGS.localtime,
        display: formatLocalTime(state.now, state.localTime.format),
        sign: null,
        status: state.localTime.format,
        edit: null,
        progress: null,
      };
  }
}

function hintsFor(state: AppState, edit: EditView | null): KeyHint[] {
  if (edit?.kind === 'event') {
    return [
      { key: 'tab', description: 'switch field' },
      { key: 'enter', description: 'apply' },
      { key: 'esc', description: 'cancel' },
    ];
  }
  if (edit) {
    return [
      { key: '←→', description: 'field' },
      { key: '↑↓', description: 'adjust' },
      { key: 'enter', description: 'apply' },
      { key: 'esc', description: 'cancel' },
    ];
  }
  if (state.menu.open) {
    return [
      { key: '↑↓', description: 'select' },
      { key: 'enter', description: 'open' },
      { key: 'esc', description: 'close' },
    ];
  }

  const hints: KeyHint[] = [];
  if (state.activeMode !== 'event' && state.activeMode !== 'localtime') {
    hints.push({ key: 's', description: 'start/pause' }, { key: 'r', description: 'reset' });
  }
  if (state.activeMode !== 'localtime') {
    hints.push({ key: 'e', description: 'edit' });
  }
  hints.push({ key: 'm', description: 'menu' }, { key: 'q', description: 'quit' });
  return hints;
}

function noticeFor(state: AppState): string | null {
  const last = state.lastTaskOutcome;
  if (!last || last.outcome.ok) {
    return null;
  }
  return `${last.task === 'notify' ? 'notification' : 'sound'} failed: ${last.outcome.reason}`;
}

export function toSnapshot(state: AppState): RenderSnapshot {
  const view = modeView(state);

  return {
    mode: state.activeMode,
    ...view,
    localTime:
      state.showLocalTime && state.activeMode !== 'localtime'
        ? formatLocalTime(state.now, state.localTime.format)
        : null,
    style: state.style,
    columns: state.terminal.columns,
    flashVisible: state.flash === 0 || Math.floor(state.flash / FLASH_PHASE_TICKS) % 2 === 1,
    menu: {
      open: state.menu.open,
      items: MENU_ITEMS.map(({ label }) => label),
      selected: state.menu.selected,
    },
    hints: hintsFor(state, view.edit),
    notice: noticeFor(state),
  };
}
