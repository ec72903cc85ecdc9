import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createMemorySink, Logger } from './logger.js';
import { toPersisted, createDefaultState } from '../app/state.js';

// Create mock store to hold values
let mockStore: Record<string, unknown> = {};
let failWrites = false;

// Mock Conf class
vi.mock('conf', () => {
  return {
    default: class MockConf {
      path = '/mock/path/state.json';

      get(key: string) {
        return mockStore[key];
      }

      set(key: string, value: unknown) {
        if (failWrites) {
          throw new Error('EACCES: permission denied');
        }
        mockStore[key] = value;
      }

      delete(key: string) {
        if (failWrites) {
          throw new Error('EACCES: permission denied');
        }
        delete mockStore[key];
      }
    },
  };
});

// Import after mocking
const { clearPersistedState, getLogPath, getStatePath, loadPersistedState, savePersistedState } = await import(
  './config.js'
);
const { PersistenceError } = await import('./errors.js');

const NOW = new Date(2030, 5, 15, 10, 0, 0).getTime();
const FIXED = new Date('2030-06-15T08:00:00.000Z');

describe('State store', () => {
  let sink: ReturnType<typeof createMemorySink>;
  let logger: Logger;

  beforeEach(() => {
    // Reset mock store before each test
    mockStore = {};
    failWrites = false;
    sink = createMemorySink();
    logger = new Logger({ sink, clock: () => FIXED });
  });

  it('should return null when nothing was saved', () => {
    expect(loadPersistedState(logger)).toBeNull();
    expect(sink.lines).toEqual(['2030-06-15T08:00:00.000Z INFO no saved state, using defaults\n']);
  });

  it('should return null and log when the saved state is invalid', () => {
    mockStore = { state: { version: 1, activeMode: 'stopwatch' } };

    expect(loadPersistedState(logger)).toBeNull();
    expect(sink.lines).toHaveLength(1);
    expect(sink.lines[0]).toContain('WARN saved state is invalid, using defaults');
  });

  it('should round-trip a saved state', () => {
    const persisted = toPersisted(createDefaultState(NOW));

    savePersistedState(persisted);

    expect(mockStore.state).toEqual(persisted);
    expect(loadPersistedState(logger)).toEqual(persisted);
  });

  it('should wrap write failures', () => {
    failWrites = true;

    expect(() => savePersistedState(toPersisted(createDefaultState(NOW)))).toThrow(PersistenceError);
  });

  it('should clear the saved state', () => {
    mockStore = { state: toPersisted(createDefaultState(NOW)) };

    expect(clearPersistedState(logger)).toBe(true);
    expect(mockStore).toEqual({});
  });

  it('should log and carry on when the saved state cannot be cleared', () => {
    mockStore = { state: toPersisted(createDefaultState(NOW)) };
    failWrites = true;

    expect(clearPersistedState(logger)).toBe(false);
    expect(mockStore).toHaveProperty('state');
    expect(sink.lines).toEqual([
      '2030-06-15T08:00:00.000Z WARN could not clear /mock/path/state.json: EACCES: permission denied\n',
    ]);
  });

  it('should keep the log file beside the state file', () => {
    expect(getStatePath()).toBe('/mock/path/state.json');
    expect(getLogPath()).toBe('/mock/path/tock.log');
  });
});
