import type { KeyInput, Mode } from '../types/index.js';

export type Command =
  | { type: 'quit' }
  | { type: 'switch-mode'; mode: Mode }
  | { type: 'toggle-run' }
  | { type: 'reset' }
  | { type: 'reset-all' }
  | { type: 'edit' }
  | { type: 'edit-local-time' }
  | { type: 'save-initial' }
  | { type: 'switch-side' }
  | { type: 'toggle-menu' }
  | { type: 'cycle-style' }
  | { type: 'toggle-deciseconds' }
  | { type: 'toggle-local-time' }
  | { type: 'cycle-local-time-format' }
  | { type: 'toggle-notifications' }
  | { type: 'save' };

export type DurationEditCommand =
  | { type: 'select'; direction: 'left' | 'right' }
  | { type: 'adjust'; delta: number }
  | { type: 'type'; char: string }
  | { type: 'delete' }
  | { type: 'commit' }
  | { type: 'cancel' };

export type TextEditCommand =
  | { type: 'switch-field' }
  | { type: 'type'; char: string }
  | { type: 'delete' }
  | { type: 'commit' }
  | { type: 'cancel' };

export type MenuCommand =
  | { type: 'move'; delta: number }
  | { type: 'activate' }
  | { type: 'close' };

const MODE_KEYS: Record<string, Mode> = {
  c: 'countdown',
  t: 'timer',
  p: 'pomodoro',
  v: 'event',
  l: 'localtime',
};

const PLAIN_COMMANDS: Record<string, Command> = {
  q: { type: 'quit' },
  s: { type: 'toggle-run' },
  space: { type: 'toggle-run' },
  r: { type: 'reset' },
  e: { type: 'edit' },
  m: { type: 'toggle-menu' },
  ',': { type: 'cycle-style' },
  '.': { type: 'toggle-deciseconds' },
  ':': { type: 'toggle-local-time' },
  ';': { type: 'cycle-local-time-format' },
  n: { type: 'toggle-notifications' },
  w: { type: 'save' },
};

const CTRL_COMMANDS: Record<string, Command> = {
  c: { type: 'quit' },
  r: { type: 'reset-all' },
  e: { type: 'edit-local-time' },
  s: { type: 'save-initial' },
  left: { type: 'switch-side' },
  right: { type: 'switch-side' },
};

export function isQuitKey(key: KeyInput): boolean {
  return key.ctrl && key.name === 'c';
}

/** Printable character carried by a key, if any. */
export function charOf(key: KeyInput): string | null {
  if (key.ctrl) {
    return null;
  }
  if (key.name === 'space') {
    return ' ';
  }
  return [...key.name].length === 1 ? key.name : null;
}

export function commandForKey(key: KeyInput): Command | null {
  if (key.ctrl) {
    return CTRL_COMMANDS[key.name] ?? null;
  }

  const mode = MODE_KEYS[key.name];
  if (mode) {
    return { type: 'switch-mode', mode };
  }
  return PLAIN_COMMANDS[key.name] ?? null;
}

export function durationEditCommandForKey(key: KeyInput): DurationEditCommand | null {
  switch (key.name) {
    case 'left':
    case 'right':
      return key.ctrl ? null : { type: 'select', direction: key.name === 'left' ? 'left' : 'right' };
    case 'up':
      return { type: 'adjust', delta: 1 };
    case 'down':
      return { type: 'adjust', delta: -1 };
    case 'enter':
      return { type: 'commit' };
    case 'escape':
      return { type: 'cancel' };
    case 'backspace':
      return { type: 'delete' };
  }

  const char = charOf(key);
  if (char === 's') {
    return { type: 'commit' };
  }
  return char === null ? null : { type: 'type', char };
}

export function textEditCommandForKey(key: KeyInput): TextEditCommand | null {
  switch (key.name) {
    case 'tab':
      return { type: 'switch-field' };
    case 'enter':
      return { type: 'commit' };
    case 'escape':
      return { type: 'cancel' };
    case 'backspace':
      return { type: 'delete' };
  }

  const char = charOf(key);
  return char === null ? null : { type: 'type', char };
}

export function menuCommandForKey(key: KeyInput): MenuCommand | null {
  switch (key.name) {
    case 'up':
      return { type: 'move', delta: -1 };
    case 'down':
      return { type: 'move', delta: 1 };
    case 'enter':
      return { type: 'activate' };
    case 'escape':
    case 'm':
      return { type: 'close' };
    default:
      return null;
  }
}

export interface MenuItem {
  label: string;
  command: Command;
}

export const MENU_ITEMS: readonly MenuItem[] = [
  { label: 'Countdown', command: { type: 'switch-mode', mode: 'countdown' } },
  { label: 'Timer', command: { type: 'switch-mode', mode: 'timer' } },
  { label: 'Pomodoro', command: { type: 'switch-mode', mode: 'pomodoro' } },
  { label: 'Event', command: { type: 'switch-mode', mode: 'event' } },
  { label: 'Local time', command: { type: 'switch-mode', mode: 'localtime' } },
  { label: 'Cycle style', command: { type: 'cycle-style' } },
  { label: 'Toggle deciseconds', command: { type: 'toggle-deciseconds' } },
  { label: 'Toggle local time', command: { type: 'toggle-local-time' } },
  { label: 'Toggle notifications', command: { type: 'toggle-notifications' } },
  { label: 'Save state', command: { type: 'save' } },
  { label: 'Quit', command: { type: 'quit' } },
];
