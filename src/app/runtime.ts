import type {
  AppState,
  Effect,
  NotificationKind,
  PersistedState,
  TaskKind,
  TaskOutcome,
} from '../types/index.js';
import type { EventBus } from '../services/event-bus.js';
import { describeError } from '../services/errors.js';
import type { Logger } from '../services/logger.js';
import { reduce } from './reducer.js';
import { toSnapshot, type RenderSnapshot } from './snapshot.js';
import { toPersisted } from './state.js';

export interface RuntimeDeps {
  bus: EventBus;
  logger: Logger;
  now: () => number;
  render: (snapshot: RenderSnapshot) => void;
  save: (state: PersistedState) => void;
  notify: (kind: NotificationKind, message: string) => Promise<TaskOutcome>;
  playSound: (path: string) => Promise<TaskOutcome>;
}

function saveState(state: AppState, { save, logger }: RuntimeDeps): void {
  try {
    save(toPersisted(state));
    logger.info('state saved');
  } catch (error) {
    logger.error(describeError(error));
  }
}

// The loop never waits on a task; its settlement comes back as an event
function dispatchTask(task: TaskKind, run: () => Promise<TaskOutcome>, { bus, logger }: RuntimeDeps): void {
  logger.debug(`dispatching ${task}`);
  void run().then(
    (outcome) => bus.push({ type: 'task-done', task, outcome }),
    (error: unknown) => bus.push({ type: 'task-done', task, outcome: { ok: false, reason: describeError(error) } })
  );
}

function perform(effect: Effect, state: AppState, deps: RuntimeDeps): void {
  switch (effect.type) {
    case 'notify':
      dispatchTask('notify', () => deps.notify(effect.kind, effect.message), deps);
      break;
    case 'play-sound':
      dispatchTask('sound', () => deps.playSound(effect.path), deps);
      break;
    case 'save':
      saveState(state, deps);
      break;
    case 'quit':
      deps.logger.info('quit requested');
      deps.bus.close();
      break;
  }
}

/**
 * Consumes the bus until it closes, rendering after every step, then saves
 * the state once more before returning.
 */
export async function runLoop(state: AppState, deps: RuntimeDeps): Promise<void> {
  const { bus, logger } = deps;
  deps.render(toSnapshot(state));

  for (let event = await bus.next(); event; event = await bus.next()) {
    const effects = reduce(state, event, { now: deps.now(), logger });
    for (const effect of effects) {
      perform(effect, state, deps);
    }
    if (!bus.isClosed) {
      deps.render(toSnapshot(state));
    }
  }

  saveState(state, deps);
}
