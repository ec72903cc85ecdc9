import { describe, it, expect } from 'vitest';
import {
  adjustLocalTimeEdit,
  commitCountdownEdit,
  commitLocalTimeEdit,
  createCountdown,
  enterCountdownEdit,
  enterLocalTimeEdit,
  moveLocalTimeSelection,
  resetCountdown,
  saveCountdownAsInitial,
  setCountdownInitial,
  tickCountdown,
  toggleCountdown,
} from './countdown.js';
import { parseDuration } from '../services/duration.js';
import { updateEditField } from './clock.js';

const TEN_MINUTES = 6000;

function runTicks(countdown: ReturnType<typeof createCountdown>, count: number) {
  const transitions = [];
  for (let i = 0; i < count; i++) {
    const transition = tickCountdown(countdown, 1);
    if (transition) {
      transitions.push(transition);
    }
  }
  return transitions;
}

describe('Countdown', () => {
  it('should reach zero after 6000 ticks from 10:00 and fire exactly once', () => {
    const parsed = parseDuration('10:00');
    expect(parsed).toEqual({ success: true, data: TEN_MINUTES });

    const countdown = createCountdown(TEN_MINUTES, { metEnabled: false });
    toggleCountdown(countdown);

    expect(runTicks(countdown, 5999)).toEqual([]);
    expect(countdown.clock.current).toBe(1);
    expect(runTicks(countdown, 1)).toEqual(['reached-zero']);
    expect(countdown.clock.runState).toBe('done');
    expect(runTicks(countdown, 100)).toEqual([]);
    expect(countdown.clock.current).toBe(0);
  });

  it('should fire again only after a reset', () => {
    const countdown = createCountdown(2, { metEnabled: false });
    toggleCountdown(countdown);
    expect(runTicks(countdown, 5)).toEqual(['reached-zero']);

    resetCountdown(countdown);
    expect(countdown.clock.runState).toBe('initial');
    expect(countdown.clock.current).toBe(2);

    toggleCountdown(countdown);
    expect(runTicks(countdown, 5)).toEqual(['reached-zero']);
  });

  it('should refuse to start at zero', () => {
    const countdown = createCountdown(0, { metEnabled: false });
    expect(toggleCountdown(countdown)).toBe(false);
    expect(countdown.clock.runState).toBe('initial');
    expect(runTicks(countdown, 20)).toEqual([]);
  });

  it('should not fire while running at zero after an edit to zero', () => {
    const countdown = createCountdown(0, { runState: 'running' });
    expect(runTicks(countdown, 20)).toEqual([]);
    expect(countdown.overtime).toBe(false);
  });

  describe('Mission Elapsed Time', () => {
    it('should keep running and count up past zero without firing again', () => {
      const countdown = createCountdown(3);
      toggleCountdown(countdown);

      expect(runTicks(countdown, 3)).toEqual(['reached-zero']);
      expect(countdown.overtime).toBe(true);
      expect(countdown.clock.runState).toBe('running');
      expect(countdown.clock.current).toBe(0);

      expect(runTicks(countdown, 50)).toEqual([]);
      expect(countdown.clock.current).toBe(50);
    });

    it('should carry coalesced ticks past zero into overtime', () => {
      const countdown = createCountdown(3, { runState: 'running' });
      expect(tickCountdown(countdown, 10)).toBe('reached-zero');
      expect(countdown.clock.current).toBe(7);
    });

    it('should leave overtime on reset', () => {
      const countdown = createCountdown(30, { current: 12, overtime: true, runState: 'paused' });
      resetCountdown(countdown);
      expect(countdown.overtime).toBe(false);
      expect(countdown.clock.current).toBe(30);
    });

    it('should not save an overtime value as initial', () => {
      const countdown = createCountdown(30, { current: 12, overtime: true, runState: 'paused' });
      expect(saveCountdownAsInitial(countdown)).toBe(false);
      expect(countdown.clock.initial).toBe(30);
    });

    it('should be cleared by a new initial value', () => {
      const countdown = createCountdown(30, { current: 12, overtime: true, runState: 'running' });
      setCountdownInitial(countdown, 600);
      expect(countdown.overtime).toBe(false);
      expect(countdown.clock).toEqual({ initial: 600, current: 600, runState: 'initial', edit: null });
    });
  });

  describe('edit', () => {
    it('should start editing from the initial value while in overtime', () => {
      const countdown = createCountdown(300, { current: 40, overtime: true, runState: 'running' });
      expect(enterCountdownEdit(countdown)).toBe(true);
      expect(countdown.clock.edit?.pending).toBe(300);
    });

    it('should clear overtime on commit', () => {
      const countdown = createCountdown(300, { current: 40, overtime: true, runState: 'paused' });
      enterCountdownEdit(countdown);
      updateEditField(countdown.clock, 1);

      expect(commitCountdownEdit(countdown)).toEqual({ success: true, data: 900 });
      expect(countdown.overtime).toBe(false);
      expect(countdown.clock.runState).toBe('paused');
    });

    it('should save the current value as the new initial value', () => {
      const countdown = createCountdown(600, { current: 420, runState: 'paused' });
      expect(saveCountdownAsInitial(countdown)).toBe(true);
      expect(countdown.clock.initial).toBe(420);
    });
  });

  describe('edit by local time', () => {
    const NOW = 1_700_000_000_000;

    it('should target now plus the remaining time and commit the new distance', () => {
      const countdown = createCountdown(600, { runState: 'running' });

      expect(enterLocalTimeEdit(countdown, NOW)).toBe(true);
      expect(countdown.localTimeEdit).toEqual({ target: NOW + 60_000, field: 'minutes', resumeState: 'running' });
      expect(tickCountdown(countdown, 10)).toBeNull();
      expect(countdown.clock.current).toBe(600);

      adjustLocalTimeEdit(countdown, 2, NOW);
      moveLocalTimeSelection(countdown, 'left');
      adjustLocalTimeEdit(countdown, 1, NOW);

      expect(commitLocalTimeEdit(countdown, NOW + 500)).toBe(37_795);
      expect(countdown.clock).toEqual({ initial: 37_795, current: 37_795, runState: 'running', edit: null });
      expect(countdown.localTimeEdit).toBeNull();
    });

    it('should not move the target before now', () => {
      const countdown = createCountdown(600);
      enterLocalTimeEdit(countdown, NOW);
      adjustLocalTimeEdit(countdown, -5, NOW);

      expect(countdown.localTimeEdit?.target).toBe(NOW);
      expect(commitLocalTimeEdit(countdown, NOW)).toBe(0);
    });

    it('should reset overtime', () => {
      const countdown = createCountdown(600, { current: 70, overtime: true, runState: 'running' });
      enterLocalTimeEdit(countdown, NOW);
      adjustLocalTimeEdit(countdown, 1, NOW);
      commitLocalTimeEdit(countdown, NOW);

      expect(countdown.overtime).toBe(false);
      expect(countdown.clock.current).toBe(600);
    });
  });
});
