import { OutOfRangeError } from './errors.js';
import type { Status } from './types.js';
import { buildIndices, DEFAULT_TAB_WIDTH, toChars } from './width.js';
import { nextBoundaryAfter, nextBoundaryBefore, words } from './words.js';

/** Character range in a row. `end` is exclusive unless `inclusive` is set. */
export interface CharRange {
  start: number;
  end: number;
  inclusive?: boolean;
}

/**
 * One line of a document: its characters and a prefix-sum table of their display widths.
 *
 * Rows know nothing about the document they sit in. The tab width is passed in
 * wherever widths have to be measured (construction and `insert`); every other
 * operation reads widths back out of the index table.
 */
export class Row {
  private _text: string[];
  private _indices: number[];
  /** Set by every edit. Clients clear it once they have caught up (e.g. re-highlighted). */
  public modified = false;

  public constructor(raw = '', tabWidth = DEFAULT_TAB_WIDTH) {
    this._text = toChars(raw);
    this._indices = buildIndices(this._text, tabWidth);
  }

  /** Build a row from an already-consistent character list and index table. */
  private static fromParts(text: string[], indices: number[], modified: boolean): Row {
    const row = new Row();
    row._text = text;
    row._indices = indices;
    row.modified = modified;
    return row;
  }

  public get text(): readonly string[] {
    return this._text;
  }

  /** `indices[i]` is the display column where character `i` starts; the last entry is the width. */
  public get indices(): readonly number[] {
    return this._indices;
  }

  public len(): number {
    return this._text.length;
  }

  public isEmpty(): boolean {
    return this._text.length === 0;
  }

  public width(): number {
    return this._indices[this._indices.length - 1];
  }

  /**
   * Insert `text` before character `start`.
   * Bounds are checked against the display width, which is how callers address positions;
   * a start between the length and the width appends.
   */
  public insert(start: number, text: string, tabWidth: number): Status {
    if (start < 0 || start > this.width()) {
      throw new OutOfRangeError(`Cannot insert at ${start} in a row ${this.width()} columns wide`);
    }
    const at = Math.min(start, this._text.length);
    const chars = toChars(text);
    const base = this._indices[at];
    const added = buildIndices(chars, tabWidth, base);
    const shift = added[added.length - 1] - base;
    this._text = [...this._text.slice(0, at), ...chars, ...this._text.slice(at)];
    this._indices = [...this._indices.slice(0, at + 1), ...added.slice(1), ...this._indices.slice(at + 1).map((i) => i + shift)];
    this.modified = true;
    return 'none';
  }

  /** Remove a range of characters; the index table suffix is shifted rather than rebuilt. */
  public remove(range: CharRange): Status {
    if (range.start < 0 || range.start > this.width()) {
      throw new OutOfRangeError(`Cannot remove from ${range.start} in a row ${this.width()} columns wide`);
    }
    const start = Math.min(range.start, this._text.length);
    const end = Math.min(Math.max(range.inclusive ? range.end + 1 : range.end, start), this._text.length);
    const removed = this._indices[end] - this._indices[start];
    this._text.splice(start, end - start);
    this._indices.splice(start + 1, end - start);
    for (let i = start + 1; i < this._indices.length; i++) {
      this._indices[i] -= removed;
    }
    this.modified = true;
    return 'none';
  }

  /** Split before character `idx`. The right half's index table starts again at zero. */
  public split(idx: number): [Row, Row] {
    if (idx < 0 || idx > this._text.length) {
      throw new OutOfRangeError(`Cannot split a row of length ${this._text.length} at ${idx}`);
    }
    const base = this._indices[idx];
    const left = Row.fromParts(this._text.slice(0, idx), this._indices.slice(0, idx + 1), true);
    const right = Row.fromParts(
      this._text.slice(idx),
      this._indices.slice(idx).map((i) => i - base),
      false,
    );
    return [left, right];
  }

  /** A new row holding this row followed by `other`. Neither operand changes. */
  public splice(other: Row): Row {
    const shift = this.width();
    return Row.fromParts([...this._text, ...other._text], [...this._indices, ...other._indices.slice(1).map((i) => i + shift)], true);
  }

  public words(): number[] {
    return words(this._text);
  }

  public nextWordForth(from: number): number {
    return nextBoundaryAfter(this.words(), from, this._text.length);
  }

  public nextWordBack(from: number): number {
    return nextBoundaryBefore(this.words(), from);
  }

  /**
   * Render from display column `from`, tabs expanded.
   * If `from` falls inside a wide character or a tab, one space stands in for the
   * visible part and rendering resumes at the next character.
   */
  public render(from: number): string {
    const start = Math.max(0, from);
    if (start >= this.width()) {
      return '';
    }
    let i = 0;
    while (this._indices[i] < start) {
      i++;
    }
    const pad = this._indices[i] === start ? '' : ' ';
    return `${pad}${this.expand(i)}`;
  }

  public renderFull(): string {
    return this.expand(0);
  }

  /** The characters as stored, tabs kept. Used for disk I/O. */
  public renderRaw(): string {
    return this._text.join('');
  }

  /** Character index at display column `column`; the row length once past the end. */
  public getCharPtr(column: number): number {
    if (column >= this.width()) {
      return this._text.length;
    }
    let i = 0;
    while (this._indices[i + 1] <= column) {
      i++;
    }
    return i;
  }

  /** Nearest character boundary at or before `column`, clamped to the row width. */
  public snap(column: number): number {
    const target = Math.min(Math.max(0, column), this.width());
    let found = 0;
    for (const boundary of this._indices) {
      if (boundary > target) {
        break;
      }
      found = boundary;
    }
    return found;
  }

  private expand(from: number): string {
    let out = '';
    for (let i = from; i < this._text.length; i++) {
      const ch = this._text[i];
      out += ch === '\t' ? ' '.repeat(this._indices[i + 1] - this._indices[i]) : ch;
    }
    return out;
  }
}
