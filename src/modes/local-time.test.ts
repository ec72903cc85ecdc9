import { describe, it, expect } from 'vitest';
import { createLocalTime, cycleLocalTimeFormat, formatLocalTime } from './local-time.js';

describe('Local time', () => {
  const MORNING = new Date(2030, 0, 1, 0, 5, 9).getTime();
  const AFTERNOON = new Date(2030, 0, 1, 13, 30, 0).getTime();

  it('should format in 24-hour form', () => {
    expect(formatLocalTime(MORNING, 'hh:mm:ss')).toBe('00:05:09');
    expect(formatLocalTime(AFTERNOON, 'hh:mm')).toBe('13:30');
  });

  it('should format in 12-hour form', () => {
    expect(formatLocalTime(MORNING, 'h:mm a')).toBe('12:05 AM');
    expect(formatLocalTime(AFTERNOON, 'h:mm a')).toBe('1:30 PM');
  });

  it('should cycle through the formats', () => {
    const localTime = createLocalTime();
    cycleLocalTimeFormat(localTime);
    expect(localTime.format).toBe('hh:mm');
    cycleLocalTimeFormat(localTime);
    expect(localTime.format).toBe('h:mm a');
    cycleLocalTimeFormat(localTime);
    expect(localTime.format).toBe('hh:mm:ss');
  });
});
