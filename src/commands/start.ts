import type { KeyInput } from '../types/index.js';
import { getLogPath, clearPersistedState, loadPersistedState, savePersistedState } from '../services/config.js';
import { describeError } from '../services/errors.js';
import { EventBus, startTickSource } from '../services/event-bus.js';
import { createFileLogger } from '../services/logger.js';
import { notify, playSound } from '../services/notifier.js';
import { runLoop } from '../app/runtime.js';
import { applyStartupOptions, createDefaultState, fromPersisted } from '../app/state.js';
import { closeClockScreen, showClockScreen } from '../ui/interactive.js';
import { VERSION } from '../version.js';
import { toStartupOptions, type StartOptions } from './options.js';

function fail(message: string): never {
  console.log();
  console.log(`x ${message}`);
  console.log();
  process.exit(1);
}

export async function startCommand(options: StartOptions): Promise<void> {
  const { stdin, stdout } = process;
  if (!stdin.isTTY || !stdout.isTTY) {
    fail('tock needs an interactive terminal');
  }

  const logger = createFileLogger(options.logLevel, getLogPath(), (reason) => {
    console.log(`! Logging disabled: ${reason}`);
  });
  logger.info(`tock ${VERSION} starting`);

  if (options.reset && clearPersistedState(logger)) {
    logger.info('saved state cleared');
  }

  const now = Date.now();
  const persisted = loadPersistedState(logger);
  const state = persisted ? fromPersisted(persisted, now) : createDefaultState(now);
  applyStartupOptions(state, toStartupOptions(options), now);
  state.terminal = { columns: stdout.columns, rows: stdout.rows };

  const bus = new EventBus();
  const pushKey = (key: KeyInput) => bus.push({ type: 'key', key });

  const onResize = () => bus.push({ type: 'resize', columns: stdout.columns, rows: stdout.rows });
  stdout.on('resize', onResize);
  bus.onClose(() => stdout.off('resize', onResize));
  startTickSource(bus);

  try {
    await runLoop(state, {
      bus,
      logger,
      now: Date.now,
      render: (snapshot) => showClockScreen(snapshot, pushKey),
      save: savePersistedState,
      notify,
      playSound,
    });
  } catch (error) {
    logger.error(`event loop stopped: ${describeError(error)}`);
    closeClockScreen();
    logger.close();
    fail(describeError(error));
  }

  closeClockScreen();
  logger.info('tock stopped');
  logger.close();
}
