import { describe, it, expect } from 'vitest';
import {
  cancelEventEdit,
  commitEventEdit,
  createEvent,
  deleteEventEdit,
  enterEventEdit,
  getEventDistance,
  getEventProgress,
  setEventTarget,
  switchEventEditField,
  tickEvent,
  typeEventEdit,
} from './event.js';

const TARGET = new Date(2030, 0, 1, 12, 0, 0).getTime();

function typeText(event: ReturnType<typeof createEvent>, text: string) {
  for (const char of text) {
    typeEventEdit(event, char);
  }
}

function clearField(event: ReturnType<typeof createEvent>) {
  const length = event.edit ? event.edit[event.edit.field].length : 0;
  for (let i = 0; i < length; i++) {
    deleteEventEdit(event);
  }
}

describe('Event', () => {
  it('should count down until the target and up since it', () => {
    const event = createEvent({ target: TARGET, title: null }, TARGET - 1000);

    expect(getEventDistance(event, TARGET - 1000)).toEqual({ value: 10, polarity: 'until' });
    expect(getEventDistance(event, TARGET)).toEqual({ value: 0, polarity: 'since' });
    expect(getEventDistance(event, TARGET + 1500)).toEqual({ value: 15, polarity: 'since' });
  });

  it('should fire once when the target passes', () => {
    const event = createEvent({ target: TARGET, title: 'Launch' }, TARGET - 1000);

    expect(tickEvent(event, TARGET - 500)).toBeNull();
    expect(tickEvent(event, TARGET)).toBe('reached-zero');
    expect(tickEvent(event, TARGET + 100)).toBeNull();
    expect(event.passed).toBe(true);
  });

  it('should measure progress from when the target was set', () => {
    const event = createEvent({ target: TARGET, title: null }, TARGET - 4000);

    expect(getEventProgress(event, TARGET - 4000)).toBe(0);
    expect(getEventProgress(event, TARGET - 3000)).toBe(25);
    expect(getEventProgress(event, TARGET + 1000)).toBe(100);

    setEventTarget(event, { target: TARGET + 1000, title: null }, TARGET - 1000);
    expect(getEventProgress(event, TARGET - 500)).toBe(25);
  });

  it('should count a target set in the past as complete', () => {
    const event = createEvent({ target: TARGET, title: null }, TARGET + 5000);
    expect(getEventProgress(event, TARGET + 5000)).toBe(100);
  });

  it('should not fire for a target that was already past on creation', () => {
    const event = createEvent({ target: TARGET, title: null }, TARGET + 5000);
    expect(tickEvent(event, TARGET + 5100)).toBeNull();
  });

  describe('edit', () => {
    it('should prefill the current target and title', () => {
      const event = createEvent({ target: TARGET, title: 'Launch' }, TARGET - 1000);
      expect(enterEventEdit(event)).toBe(true);
      expect(event.edit).toEqual({ field: 'datetime', datetime: '2030-01-01 12:00:00', title: 'Launch', error: null });
    });

    it('should apply a new date and title together', () => {
      const event = createEvent({ target: TARGET, title: 'Launch' }, TARGET - 1000);
      enterEventEdit(event);
      clearField(event);
      typeText(event, '2031-05-06 07:08:09');
      switchEventEditField(event);
      clearField(event);
      typeText(event, 'Landing');

      const expected = { target: new Date(2031, 4, 6, 7, 8, 9).getTime(), title: 'Landing' };
      expect(commitEventEdit(event, TARGET)).toEqual({ success: true, data: expected });
      expect(event).toEqual({ ...expected, start: TARGET, passed: false, edit: null });
    });

    it('should keep the edit open on an invalid date', () => {
      const event = createEvent({ target: TARGET, title: null }, TARGET - 1000);
      enterEventEdit(event);
      switchEventEditField(event);
      clearField(event);
      switchEventEditField(event);
      clearField(event);
      typeText(event, '2031-02-30 00:00:00');

      const result = commitEventEdit(event, TARGET);

      expect(result?.success).toBe(false);
      expect(event.edit?.error).toBe("Invalid date '2031-02-30 00:00:00'. Expected format 'YYYY-MM-DD HH:MM:SS'");
      expect(event.target).toBe(TARGET);
    });

    it('should focus the title when it is too long', () => {
      const event = createEvent({ target: TARGET, title: null }, TARGET - 1000);
      enterEventEdit(event);
      switchEventEditField(event);
      typeText(event, 'x'.repeat(61));
      switchEventEditField(event);

      commitEventEdit(event, TARGET);

      expect(event.edit?.field).toBe('title');
      expect(event.edit?.error).toBe('Max. 60 chars');
    });

    it('should keep the prior target when only the title fails', () => {
      const event = createEvent({ target: TARGET, title: 'Launch' }, TARGET - 1000);
      enterEventEdit(event);
      clearField(event);
      typeText(event, '2031-05-06 07:08:09');
      switchEventEditField(event);
      typeText(event, 'x'.repeat(60));
      switchEventEditField(event);

      const result = commitEventEdit(event, TARGET);

      expect(result?.success).toBe(false);
      expect(event.edit?.field).toBe('title');
      expect(event.target).toBe(TARGET);
      expect(event.title).toBe('Launch');
    });

    it('should discard changes on cancel', () => {
      const event = createEvent({ target: TARGET, title: 'Launch' }, TARGET - 1000);
      enterEventEdit(event);
      deleteEventEdit(event);

      expect(cancelEventEdit(event)).toBe(true);
      expect(event).toEqual({ target: TARGET, start: TARGET - 1000, title: 'Launch', passed: false, edit: null });
    });
  });
});
