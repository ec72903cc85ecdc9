import type { LocalTimeContent, LocalTimeFormat } from '../types/index.js';

const FORMAT_ORDER: readonly LocalTimeFormat[] = ['hh:mm:ss', 'hh:mm', 'h:mm a'];

export function createLocalTime(format: LocalTimeFormat = 'hh:mm:ss'): LocalTimeContent {
  return { format };
}

export function cycleLocalTimeFormat(localTime: LocalTimeContent): void {
  const index = FORMAT_ORDER.indexOf(localTime.format);
  localTime.format = FORMAT_ORDER[(index + 1) % FORMAT_ORDER.length];
}

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

export function formatLocalTime(now: number, format: LocalTimeFormat): string {
  const date = new Date(now);
  const hours = date.getHours();
  const minutes = pad(date.getMinutes());

  switch (format) {
    case 'hh:mm:ss':
      return `${pad(hours)}:${minutes}:${pad(date.getSeconds())}`;
    case 'hh:mm':
      return `${pad(hours)}:${minutes}`;
    case 'h:mm a':
      return `${hours % 12 === 0 ? 12 : hours % 12}:${minutes} ${hours < 12 ? 'AM' : 'PM'}`;
  }
}
