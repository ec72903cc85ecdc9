// Theme colors for the tock display
// Minimal dark palette: black/gray/white with a few status accents

import type { RunState } from '../types/index.js';

export const colors = {
  primary: '#FFFFFF',
  secondary: '#A1A1A1',

  success: '#22C55E',
  warning: '#EAB308',
  error: '#EF4444',

  text: '#FAFAFA',
  textLabel: '#D4D4D8',
  textMuted: '#A1A1AA',
  textDim: '#71717A',

  border: '#27272A',
  borderFocused: '#52525B',
  borderActive: '#71717A',

  clockRunning: '#FAFAFA',
  clockPaused: '#EAB308',
  clockIdle: '#A1A1AA',
  clockDone: '#22C55E',
  clockOvertime: '#F87171',
} as const;

// Selected menu entry
export const selectStyles = {
  selectedBg: colors.text,
  selectedFg: '#000000',
} as const;

const runStateColors: Record<RunState, string> = {
  initial: colors.clockIdle,
  running: colors.clockRunning,
  paused: colors.clockPaused,
  done: colors.clockDone,
};

/** Color of the big digits for a run state label such as `running` or `MET paused`. */
export function getClockColor(status: string): string {
  if (status.startsWith('MET')) {
    return colors.clockOvertime;
  }
  switch (status) {
    case 'ready':
      return runStateColors.initial;
    case 'running':
      return runStateColors.running;
    case 'paused':
      return runStateColors.paused;
    case 'done':
      return runStateColors.done;
    default:
      return colors.text;
  }
}
