/**
 * Scroll arithmetic for one axis of the viewport, kept free of Document state.
 * `cursor` is the position inside the viewport, `offset` the scroll position;
 * their sum is the absolute position.
 */

export interface AxisState {
  readonly cursor: number;
  readonly offset: number;
}

/** Where a jump places a target that is out of view. */
export type Anchor = 'start' | 'end';

/**
 * Bring absolute position `target` into a viewport `span` cells long.
 * Targets inside the first screen reset the offset; targets already visible only
 * move the cursor; anything else scrolls so the target sits at the anchor edge.
 */
export function jumpTo(state: AxisState, target: number, span: number, anchor: Anchor): AxisState {
  if (target < span) {
    return { cursor: target, offset: 0 };
  }
  if (target >= state.offset && target < state.offset + span) {
    return { cursor: target - state.offset, offset: state.offset };
  }
  if (anchor === 'start') {
    return { cursor: 0, offset: target };
  }
  return { cursor: span - 1, offset: target - (span - 1) };
}

/** Step back `cells` cells, scrolling once the cursor is pinned at the leading edge. */
export function stepBack(state: AxisState, cells: number): AxisState {
  let { cursor, offset } = state;
  for (let i = 0; i < cells; i++) {
    if (cursor > 0) {
      cursor -= 1;
    } else if (offset > 0) {
      offset -= 1;
    }
  }
  return { cursor, offset };
}

/** Step forward `cells` cells, scrolling once the cursor is pinned at the trailing edge. */
export function stepForward(state: AxisState, cells: number, span: number): AxisState {
  let { cursor, offset } = state;
  for (let i = 0; i < cells; i++) {
    if (cursor >= span - 1) {
      offset += 1;
    } else {
      cursor += 1;
    }
  }
  return { cursor, offset };
}
