import type { ClockStyle } from '../types/index.js';

export const GLYPH_HEIGHT = 5;

const FILLED = '#';

// 5-row bitmaps, `#` marks a filled cell
const GLYPHS: Record<string, readonly string[]> = {
  '0': ['###', '# #', '# #', '# #', '###'],
  '1': ['  #', '  #', '  #', '  #', '  #'],
  '2': ['###', '  #', '###', '#  ', '###'],
  '3': ['###', '  #', '###', '  #', '###'],
  '4': ['# #', '# #', '###', '  #', '  #'],
  '5': ['###', '#  ', '###', '  #', '###'],
  '6': ['###', '#  ', '###', '# #', '###'],
  '7': ['###', '  #', '  #', '  #', '  #'],
  '8': ['###', '# #', '###', '# #', '###'],
  '9': ['###', '# #', '###', '  #', '###'],
  ':': [' ', '#', ' ', '#', ' '],
  '.': [' ', ' ', ' ', ' ', '#'],
  ' ': [' ', ' ', ' ', ' ', ' '],
  '+': ['   ', ' # ', '###', ' # ', '   '],
  '-': ['   ', '   ', '###', '   ', '   '],
  y: ['# #', '# #', '###', '  #', '###'],
  d: ['  #', '  #', '###', '# #', '###'],
  A: ['###', '# #', '###', '# #', '# #'],
  P: ['###', '# #', '###', '#  ', '#  '],
  M: ['# #', '###', '# #', '# #', '# #'],
};

export const STYLE_SYMBOLS: Record<ClockStyle, string> = {
  full: '█',
  dark: '▓',
  medium: '▒',
  light: '░',
  braille: '⣿',
  thick: '┃',
  cross: '╬',
};

/** Renders `text` as big digits, one string per row. Unknown characters become blanks. */
export function renderBigText(text: string, style: ClockStyle): string[] {
  const symbol = STYLE_SYMBOLS[style];
  const glyphs = [...text].map((char) => GLYPHS[char] ?? GLYPHS[' ']);

  return Array.from({ length: GLYPH_HEIGHT }, (_, row) =>
    glyphs.map((glyph) => glyph[row].split(FILLED).join(symbol)).join(' ')
  );
}

export function bigTextWidth(text: string): number {
  return renderBigText(text, 'full')[0].length;
}

/** A bar `width` cells wide with `percent` of it filled in the style symbol. */
export function renderProgressBar(percent: number, width: number, style: ClockStyle): string {
  const filled = Math.round((Math.min(100, Math.max(0, percent)) * width) / 100);
  return STYLE_SYMBOLS[style].repeat(filled) + '·'.repeat(width - filled);
}
