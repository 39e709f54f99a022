import type { Loc } from './types.js';

/**
 * Atomic document edits. `loc.x` is a character index, `loc.y` a row index.
 *
 * `insert` and `remove` carry exactly one character (one code point).
 * `remove` and `removeRow` carry what they remove so the inverse can be rebuilt.
 * `spliceUp` merges row `loc.y` onto the row above; `loc.x` is ignored when it is
 * executed, and holds the length of the upper row in recorded copies.
 */
export type Event =
  | { readonly type: 'insert'; readonly loc: Loc; readonly ch: string }
  | { readonly type: 'remove'; readonly loc: Loc; readonly ch: string }
  | { readonly type: 'insertRow'; readonly index: number; readonly text: string }
  | { readonly type: 'removeRow'; readonly index: number; readonly text: string }
  | { readonly type: 'splitDown'; readonly loc: Loc }
  | { readonly type: 'spliceUp'; readonly loc: Loc };

export type EventType = Event['type'];

/** The event that undoes `event` when executed right after it. */
export function invert(event: Event): Event {
  switch (event.type) {
    case 'insert':
      return { type: 'remove', loc: { x: event.loc.x + 1, y: event.loc.y }, ch: event.ch };
    case 'remove':
      return { type: 'insert', loc: { x: event.loc.x - 1, y: event.loc.y }, ch: event.ch };
    case 'insertRow':
      return { type: 'removeRow', index: event.index, text: event.text };
    case 'removeRow':
      return { type: 'insertRow', index: event.index, text: event.text };
    case 'splitDown':
      return { type: 'spliceUp', loc: { x: event.loc.x, y: event.loc.y + 1 } };
    case 'spliceUp':
      return { type: 'splitDown', loc: { x: event.loc.x, y: event.loc.y - 1 } };
  }
}
