const WHITESPACE = new Set([' ', '\t']);

/**
 * Character indices where words start, plus the row length as a final boundary.
 *
 * Single forward pass: whitespace is skipped, except that a tab seen before any
 * text is recorded so word jumps can land on indentation. Each run of
 * non-whitespace is recorded once at its first character.
 */
export function words(chars: readonly string[]): number[] {
  const result: number[] = [];
  let pad = true;
  let i = 0;
  while (i < chars.length) {
    const ch = chars[i];
    if (ch === '\t') {
      if (pad) {
        result.push(i);
      }
      i++;
      continue;
    }
    if (ch === ' ') {
      i++;
      continue;
    }
    pad = false;
    result.push(i);
    while (i < chars.length && !WHITESPACE.has(chars[i])) {
      i++;
    }
  }
  result.push(chars.length);
  return result;
}

/** First boundary strictly after `from`, or `end` when there is none. */
export function nextBoundaryAfter(boundaries: readonly number[], from: number, end: number): number {
  return boundaries.find((b) => b > from) ?? end;
}

/** Last boundary strictly before `from`, or 0 when there is none. */
export function nextBoundaryBefore(boundaries: readonly number[], from: number): number {
  let found = 0;
  for (const b of boundaries) {
    if (b >= from) {
      break;
    }
    found = b;
  }
  return found;
}
