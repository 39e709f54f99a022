/**
 * Display-width helpers shared by rows, the status line and the frame view.
 * A "character" here is one Unicode code point.
 */

import stringWidth from 'string-width';

export const DEFAULT_TAB_WIDTH = 4;

/** Split into code points so surrogate pairs count as one character. */
export function toChars(raw: string): string[] {
  return Array.from(raw);
}

/** Terminal columns taken by one character; a tab takes `tabWidth`. */
export function charWidth(ch: string, tabWidth: number): number {
  if (ch === '\t') {
    return tabWidth;
  }
  return stringWidth(ch);
}

/**
 * Prefix sums of character widths, starting at `base`.
 * `indices[i]` is the column where `chars[i]` starts; the last entry is the total width.
 */
export function buildIndices(chars: readonly string[], tabWidth: number, base = 0): number[] {
  const indices = [base];
  let column = base;
  for (const ch of chars) {
    column += charWidth(ch, tabWidth);
    indices.push(column);
  }
  return indices;
}

export function displayWidth(s: string, tabWidth = DEFAULT_TAB_WIDTH): number {
  let total = 0;
  for (const ch of s) {
    total += charWidth(ch, tabWidth);
  }
  return total;
}

/** Cut `s` so it takes at most `columns` columns. A wide character that would straddle the edge is dropped. */
export function truncate(s: string, columns: number, tabWidth = DEFAULT_TAB_WIDTH): string {
  let used = 0;
  let out = '';
  for (const ch of s) {
    const w = charWidth(ch, tabWidth);
    if (used + w > columns) {
      break;
    }
    used += w;
    out += ch;
  }
  return out;
}

/**
 * Pad between `lhs` and `rhs` so the result is exactly `length` columns wide.
 * Returns undefined when the two sides don't fit.
 */
export function alignSides(lhs: string, rhs: string, length: number, tabWidth = DEFAULT_TAB_WIDTH): string | undefined {
  const used = displayWidth(lhs, tabWidth) + displayWidth(rhs, tabWidth);
  if (used > length) {
    return undefined;
  }
  return `${lhs}${' '.repeat(length - used)}${rhs}`;
}
