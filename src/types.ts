/** A position: `x` is horizontal, `y` is the row. Which unit `x` is in depends on the caller. */
export interface Loc {
  x: number;
  y: number;
}

/** Viewport dimensions in display columns and rows. */
export interface Size {
  w: number;
  h: number;
}

/**
 * Advisory signal returned by movement and edits. Not an error: clients use it to
 * wrap the cursor across rows.
 */
export type Status = 'none' | 'startOfRow' | 'endOfRow' | 'startOfDocument' | 'endOfDocument';
