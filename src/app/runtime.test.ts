import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { runLoop, type RuntimeDeps } from './runtime.js';
import { createDefaultState } from './state.js';
import { EventBus } from '../services/event-bus.js';
import { createMemorySink, Logger } from '../services/logger.js';
import type { AppEvent, AppState, NotificationKind, PersistedState, TaskOutcome } from '../types/index.js';
import type { RenderSnapshot } from './snapshot.js';

const NOW = new Date(2030, 5, 15, 10, 0, 0).getTime();

function key(name: string, ctrl = false): AppEvent {
  return { type: 'key', key: { name, ctrl, shift: false } };
}

describe('runLoop', () => {
  let bus: EventBus;
  let state: AppState;
  let sink: ReturnType<typeof createMemorySink>;
  let rendered: RenderSnapshot[];
  let saved: PersistedState[];
  let notify: Mock<(kind: NotificationKind, message: string) => Promise<TaskOutcome>>;
  let playSound: Mock<(path: string) => Promise<TaskOutcome>>;
  let deps: RuntimeDeps;

  beforeEach(() => {
    bus = new EventBus();
    state = createDefaultState(NOW);
    sink = createMemorySink();
    rendered = [];
    saved = [];
    notify = vi.fn<(kind: NotificationKind, message: string) => Promise<TaskOutcome>>().mockResolvedValue({ ok: true });
    playSound = vi.fn<(path: string) => Promise<TaskOutcome>>().mockResolvedValue({ ok: true });
    deps = {
      bus,
      logger: new Logger({ level: 'debug', sink }),
      now: () => NOW,
      render: (snapshot) => rendered.push(snapshot),
      save: (persisted) => saved.push(persisted),
      notify,
      playSound,
    };
  });

  it('should render after every step and save once on quit', async () => {
    bus.push(key('s'));
    bus.push({ type: 'tick', count: 10 });
    bus.push(key('q'));

    await runLoop(state, deps);

    expect(rendered.map(({ display, status }) => `${display} ${status}`)).toEqual([
      '10:00 ready',
      '10:00 running',
      '9:59 running',
    ]);
    expect(saved).toHaveLength(1);
    expect(saved[0].countdown.runState).toBe('running');
    expect(bus.isClosed).toBe(true);
  });

  it('should save on request as well as on shutdown', async () => {
    bus.push(key('w'));
    bus.push(key('q'));

    await runLoop(state, deps);

    expect(saved).toHaveLength(2);
  });

  it('should dispatch the notification and feed its outcome back', async () => {
    notify.mockResolvedValue({ ok: false, reason: 'notify-send exited with code 1' });
    state.soundPath = '/tmp/done.wav';
    state.countdown.clock.current = 1;
    bus.push(key('s'));
    bus.push({ type: 'tick', count: 1 });

    const loop = runLoop(state, deps);

    await vi.waitFor(() => {
      expect(state.lastTaskOutcome).not.toBeNull();
    });
    expect(notify).toHaveBeenCalledWith('countdown', 'Countdown of 10:00 finished');
    expect(playSound).toHaveBeenCalledWith('/tmp/done.wav');

    bus.push(key('q'));
    await loop;

    expect(sink.lines.some((line) => line.endsWith('WARN notify failed: notify-send exited with code 1\n'))).toBe(
      true
    );
  });

  it('should pass the finished pomodoro side as the notification kind', async () => {
    state.activeMode = 'pomodoro';
    state.pomodoro.work.current = 1;
    bus.push(key('s'));
    bus.push({ type: 'tick', count: 1 });

    const loop = runLoop(state, deps);

    await vi.waitFor(() => {
      expect(state.lastTaskOutcome).not.toBeNull();
    });
    expect(notify).toHaveBeenCalledWith('work', 'Work session finished, time for a break');

    bus.push(key('q'));
    await loop;
  });

  it('should keep running when saving fails', async () => {
    deps.save = () => {
      throw new Error('disk full');
    };
    bus.push(key('w'));
    bus.push(key('q'));

    await runLoop(state, deps);

    expect(sink.lines.filter((line) => line.includes('ERROR disk full'))).toHaveLength(2);
  });
});
