import type { Key } from 'ink';
import type { KeyInput } from '../types/index.js';

export type InkKey = Pick<
  Key,
  | 'upArrow'
  | 'downArrow'
  | 'leftArrow'
  | 'rightArrow'
  | 'return'
  | 'escape'
  | 'tab'
  | 'backspace'
  | 'delete'
  | 'ctrl'
  | 'shift'
  | 'meta'
>;

function named(name: string, key: InkKey, ctrl = key.ctrl): KeyInput {
  return { name, ctrl, shift: key.shift };
}

/**
 * Translates one ink input callback into key presses. Pasted text arrives as
 * a single callback and becomes one press per character.
 */
export function toKeyInputs(input: string, key: InkKey): KeyInput[] {
  // Terminals report ctrl+arrow with either modifier
  const arrowCtrl = key.ctrl || key.meta;

  if (key.upArrow) return [named('up', key, arrowCtrl)];
  if (key.downArrow) return [named('down', key, arrowCtrl)];
  if (key.leftArrow) return [named('left', key, arrowCtrl)];
  if (key.rightArrow) return [named('right', key, arrowCtrl)];
  if (key.return) return [named('enter', key)];
  if (key.escape) return [named('escape', key)];
  if (key.tab) return [named('tab', key)];
  if (key.backspace || key.delete) return [named('backspace', key)];

  return [...input].map((char) => named(char === ' ' ? 'space' : char, key));
}
