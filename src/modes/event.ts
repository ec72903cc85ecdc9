import type { Duration, EventContent, EventTarget, Polarity, TransitionEvent } from '../types/index.js';
import { difference } from '../services/duration.js';
import type { ParseResult } from '../services/errors.js';
import { formatDateTime, parseDateTime, validateTitle } from '../services/event-target.js';

export function createEvent({ target, title }: EventTarget, now: number): EventContent {
  return { target, start: now, title, passed: target <= now, edit: null };
}

export function setEventTarget(event: EventContent, { target, title }: EventTarget, now: number): void {
  event.target = target;
  event.start = now;
  event.title = title;
  event.passed = target <= now;
  event.edit = null;
}

export function getEventDistance(event: EventContent, now: number): { value: Duration; polarity: Polarity } {
  return difference(event.target, now);
}

/** Whole percent of the way from when the target was set to the target itself. */
export function getEventProgress(event: EventContent, now: number): number {
  const total = event.target - event.start;
  if (total <= 0) {
    return 100;
  }
  return Math.min(100, Math.max(0, Math.floor(((now - event.start) * 100) / total)));
}

/** Fires once, on the first reading at or after the target instant. */
export function tickEvent(event: EventContent, now: number): TransitionEvent | null {
  const passed = event.target <= now;
  const crossed = passed && !event.passed;
  event.passed = passed;
  return crossed ? 'reached-zero' : null;
}

export function enterEventEdit(event: EventContent): boolean {
  if (event.edit) {
    return false;
  }
  event.edit = {
    field: 'datetime',
    datetime: formatDateTime(event.target),
    title: event.title ?? '',
    error: null,
  };
  return true;
}

export function switchEventEditField(event: EventContent): void {
  if (event.edit) {
    event.edit.field = event.edit.field === 'datetime' ? 'title' : 'datetime';
  }
}

export function typeEventEdit(event: EventContent, char: string): void {
  const { edit } = event;
  if (!edit || char.length !== 1) {
    return;
  }
  edit[edit.field] += char;
  edit.error = null;
}

export function deleteEventEdit(event: EventContent): void {
  const { edit } = event;
  if (!edit) {
    return;
  }
  edit[edit.field] = edit[edit.field].slice(0, -1);
  edit.error = null;
}

/**
 * Validates both inputs and applies them together. On error the overlay stays
 * open on the first failing field with its message, and neither the target
 * nor the title changes.
 */
export function commitEventEdit(event: EventContent, now: number): ParseResult<EventTarget> | null {
  const { edit } = event;
  if (!edit) {
    return null;
  }

  const target = parseDateTime(edit.datetime);
  if (!target.success) {
    edit.error = target.error.message;
    edit.field = 'datetime';
    return target;
  }

  const title = validateTitle(edit.title);
  if (!title.success) {
    edit.error = title.error.message;
    edit.field = 'title';
    return title;
  }

  const next = { target: target.data, title: title.data };
  setEventTarget(event, next, now);
  return { success: true, data: next };
}

export function cancelEventEdit(event: EventContent): boolean {
  if (!event.edit) {
    return false;
  }
  event.edit = null;
  return true;
}
