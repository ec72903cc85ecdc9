import Conf from 'conf';
import { dirname, join } from 'node:path';
import { PersistedStateSchema } from '../types/index.js';
import type { PersistedState } from '../types/index.js';
import { describeError, PersistenceError } from './errors.js';
import type { Logger } from './logger.js';

interface StateStore {
  state: unknown;
}

const config = new Conf<StateStore>({
  projectName: 'tock',
  configName: 'state',
  // A store that is not valid JSON is replaced instead of throwing on startup
  clearInvalidConfig: true,
});

export function getStatePath(): string {
  return config.path;
}

export function getLogPath(): string {
  return join(dirname(config.path), 'tock.log');
}

/**
 * Reads the saved snapshot. Anything missing, unreadable or failing validation
 * comes back as `null` so the caller starts from defaults.
 */
export function loadPersistedState(logger: Logger): PersistedState | null {
  let raw: unknown;
  try {
    raw = config.get('state');
  } catch (error) {
    logger.warn(`could not read ${config.path}: ${describeError(error)}`);
    return null;
  }

  if (raw === undefined) {
    logger.info('no saved state, using defaults');
    return null;
  }

  const parsed = PersistedStateSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn(`saved state is invalid, using defaults: ${parsed.error.message}`);
    return null;
  }
  return parsed.data;
}

export function savePersistedState(state: PersistedState): void {
  try {
    config.set('state', state);
  } catch (error) {
    throw new PersistenceError(`Failed to save state to ${config.path}`, { cause: error });
  }
}

/** Drops the saved snapshot. A store that cannot be written is logged and left as it is. */
export function clearPersistedState(logger: Logger): boolean {
  try {
    config.delete('state');
    return true;
  } catch (error) {
    logger.warn(`could not clear ${config.path}: ${describeError(error)}`);
    return false;
  }
}
