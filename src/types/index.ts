import { z } from 'zod/v4';

/** Non-negative count of deciseconds. */
export type Duration = number;

export type Mode = 'countdown' | 'timer' | 'pomodoro' | 'event' | 'localtime';

export type SteppedMode = 'countdown' | 'timer' | 'pomodoro';

export type RunState = 'initial' | 'running' | 'paused' | 'done';

export type EditField = 'deciseconds' | 'seconds' | 'minutes' | 'hours' | 'days' | 'years';

export type TransitionEvent = 'reached-zero' | 'reached-max';

export type ClockStyle = 'full' | 'dark' | 'medium' | 'light' | 'braille' | 'thick' | 'cross';

export type LocalTimeFormat = 'hh:mm:ss' | 'hh:mm' | 'h:mm a';

export type PomodoroSide = 'work' | 'pause';

/** `until`: the target lies ahead, `since`: the target has passed. */
export type Polarity = 'until' | 'since';

export interface DurationComponents {
  years: number;
  days: number;
  hours: number;
  minutes: number;
  seconds: number;
  deciseconds: number;
}

export interface EditSession {
  field: EditField;
  pending: Duration;
  // Typed input, parsed with the duration grammar on commit
  text: string;
  error: string | null;
  resumeState: RunState;
}

export interface ClockState {
  initial: Duration;
  current: Duration;
  runState: RunState;
  edit: EditSession | null;
}

export type LocalTimeField = 'hours' | 'minutes' | 'seconds';

export interface LocalTimeEdit {
  /** Wall-clock instant (epoch ms) the countdown should end at */
  target: number;
  field: LocalTimeField;
  resumeState: RunState;
}

export interface CountdownContent {
  clock: ClockState;
  metEnabled: boolean;
  /** Mission Elapsed Time: `clock.current` counts up past the target */
  overtime: boolean;
  localTimeEdit: LocalTimeEdit | null;
}

export interface TimerContent {
  clock: ClockState;
}

export interface PomodoroContent {
  work: ClockState;
  pause: ClockState;
  activeSide: PomodoroSide;
  round: number;
}

export type EventEditField = 'datetime' | 'title';

export interface EventEdit {
  field: EventEditField;
  datetime: string;
  title: string;
  error: string | null;
}

export interface EventContent {
  target: number;
  /** When the target was set; progress runs from here to the target */
  start: number;
  title: string | null;
  passed: boolean;
  edit: EventEdit | null;
}

export interface LocalTimeContent {
  format: LocalTimeFormat;
}

export interface EventTarget {
  target: number;
  title: string | null;
}

export interface KeyInput {
  name: string;
  ctrl: boolean;
  shift: boolean;
}

export type TaskKind = 'notify' | 'sound';

export type TaskOutcome =
  | { ok: true }
  | { ok: false; reason: string };

export type NotificationKind = 'countdown' | 'timer' | 'work' | 'pause' | 'event';

export type AppEvent =
  | { type: 'tick'; count: number }
  | { type: 'key'; key: KeyInput }
  | { type: 'resize'; columns: number; rows: number }
  | { type: 'task-done'; task: TaskKind; outcome: TaskOutcome };

export type Effect =
  | { type: 'notify'; kind: NotificationKind; message: string }
  | { type: 'play-sound'; path: string }
  | { type: 'save' }
  | { type: 'quit' };

export interface MenuState {
  open: boolean;
  selected: number;
}

export interface AppState {
  activeMode: Mode;
  countdown: CountdownContent;
  timer: TimerContent;
  pomodoro: PomodoroContent;
  event: EventContent;
  localTime: LocalTimeContent;
  style: ClockStyle;
  showDeciseconds: boolean;
  showLocalTime: boolean;
  menu: MenuState;
  notificationsEnabled: boolean;
  blinkEnabled: boolean;
  soundPath: string | null;
  /** Remaining ticks of the done flash */
  flash: number;
  terminal: { columns: number; rows: number };
  now: number;
  lastTaskOutcome: { task: TaskKind; outcome: TaskOutcome } | null;
}

// ── Zod Schemas ──────────────────────────────────────────────────────────────

export const ModeSchema = z.enum(['countdown', 'timer', 'pomodoro', 'event', 'localtime']);

export const RunStateSchema = z.enum(['initial', 'running', 'paused', 'done']);

export const ClockStyleSchema = z.enum(['full', 'dark', 'medium', 'light', 'braille', 'thick', 'cross']);

export const LocalTimeFormatSchema = z.enum(['hh:mm:ss', 'hh:mm', 'h:mm a']);

export const PomodoroSideSchema = z.enum(['work', 'pause']);

const DurationSchema = z.number().int().nonnegative();

export const PersistedClockSchema = z.object({
  initial: DurationSchema,
  current: DurationSchema,
  runState: RunStateSchema,
});

export const PersistedStateSchema = z.object({
  version: z.literal(1),
  activeMode: ModeSchema,
  style: ClockStyleSchema,
  showDeciseconds: z.boolean(),
  showLocalTime: z.boolean(),
  localTimeFormat: LocalTimeFormatSchema,
  menuOpen: z.boolean(),
  notificationsEnabled: z.boolean(),
  blinkEnabled: z.boolean(),
  countdown: PersistedClockSchema.extend({
    overtime: z.boolean(),
    metEnabled: z.boolean(),
  }),
  timer: PersistedClockSchema,
  pomodoro: z.object({
    activeSide: PomodoroSideSchema,
    round: z.number().int().nonnegative(),
    work: PersistedClockSchema,
    pause: PersistedClockSchema,
  }),
  event: z.object({
    target: z.string(),
    title: z.string().nullable(),
  }),
});

export type PersistedClock = z.infer<typeof PersistedClockSchema>;

export type PersistedState = z.infer<typeof PersistedStateSchema>;
