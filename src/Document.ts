/**
 * Rows plus the cursor/viewport state that addresses them.
 *
 * Three coordinate spaces are kept in step here: the character index within the
 * current row (`charPtr`), the absolute display column (`cursor.x + offset.x`),
 * and the screen position (`cursor`, relative to the scrolled viewport).
 * Every operation that moves the cursor leaves
 * `charPtr === currentRow().getCharPtr(loc().x)`.
 */

import { readFileSync, writeFileSync } from 'node:fs';
import { basename, extname } from 'node:path';
import { EditStack } from './EditStack.js';
import { FileError, NoFileNameError, OutOfRangeError } from './errors.js';
import { type Event, invert } from './events.js';
import { fileTypeOf } from './fileTypes.js';
import type { Logger } from './Logger.js';
import { Row } from './Row.js';
import type { Loc, Size, Status } from './types.js';
import { type AxisState, jumpTo, stepBack, stepForward } from './viewport.js';
import { DEFAULT_TAB_WIDTH, toChars } from './width.js';

const LINE_ENDING = /\r\n|\n/;

export interface FileInfo {
  /** Path the document was opened from; undefined for an unsaved buffer. */
  file: string | undefined;
  /** True when the file uses \r\n line endings. */
  isDos: boolean;
  /**
   * Columns per tab. Set it right after construction: rows measure tabs with the
   * width in effect when they are created.
   */
  tabWidth: number;
}

export interface DocumentOptions {
  tabWidth?: number;
  logger?: Logger;
}

export interface StatusLineInfo {
  /** Base name, or `[No Name]` for an unsaved buffer. */
  readonly file: string;
  readonly fullPath: string;
  readonly type: string;
  /** `[+]` when there are unsaved edits. */
  readonly modified: string;
  readonly extension: string;
  /** 1-based. */
  readonly row: number;
  /** 0-based character index. */
  readonly column: number;
  readonly total: number;
}

/** Split file contents into lines; the empty line after a final newline is dropped. */
export function splitLines(raw: string): string[] {
  const lines = raw.split(LINE_ENDING);
  if (lines.length > 1 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

export class Document {
  public readonly info: FileInfo;
  public rows: Row[] = [];
  /** Set by executed edits, cleared by `save`. */
  public modified = false;
  public size: Size;
  /** Character index of the cursor within the current row. */
  public charPtr = 0;
  /** Position within the viewport. */
  public cursor: Loc = { x: 0, y: 0 };
  /** Scroll position of the viewport. */
  public offset: Loc = { x: 0, y: 0 };
  public readonly editStack = new EditStack();
  private readonly logger: Logger | undefined;

  public constructor(size: Size, options: DocumentOptions = {}) {
    this.size = size;
    this.info = { file: undefined, isDos: false, tabWidth: options.tabWidth ?? DEFAULT_TAB_WIDTH };
    this.logger = options.logger;
  }

  /** Replace the contents with the file at `path` and reset all cursor state. */
  public open(path: string): void {
    let raw: string;
    try {
      raw = readFileSync(path, 'utf8');
    } catch (err) {
      throw new FileError(path, err);
    }
    this.load(raw, path);
    this.logger?.log(`Opened ${path}`, { rows: this.rows.length, lineEnding: this.info.isDos ? 'crlf' : 'lf' });
  }

  /** Replace the contents with `raw`, as `open` does after reading. */
  public load(raw: string, file?: string): void {
    this.info.file = file;
    this.info.isDos = raw.includes('\r\n');
    this.cursor = { x: 0, y: 0 };
    this.offset = { x: 0, y: 0 };
    this.charPtr = 0;
    this.modified = false;
    this.editStack.clear();
    this.rows = splitLines(raw).map((line) => new Row(line, this.info.tabWidth));
  }

  public save(): void {
    const file = this.info.file;
    if (file === undefined) {
      throw new NoFileNameError();
    }
    this.write(file);
    this.modified = false;
    this.logger?.log(`Saved ${file}`);
  }

  /** Write to `path` without adopting it; `info.file` and `modified` are left alone. */
  public saveAs(path: string): void {
    this.write(path);
    this.logger?.log(`Saved a copy to ${path}`);
  }

  private write(path: string): void {
    try {
      writeFileSync(path, this.render());
    } catch (err) {
      throw new FileError(path, err);
    }
  }

  /** Apply an edit and move the cursor to match. */
  public execute(event: Event): Status {
    switch (event.type) {
      case 'insert': {
        if (toChars(event.ch).length !== 1) {
          throw new OutOfRangeError(`An insert carries one character, got ${JSON.stringify(event.ch)}`);
        }
        this.goto(event.loc);
        this.row(event.loc.y).insert(event.loc.x, event.ch, this.info.tabWidth);
        this.modified = true;
        return this.moveRight();
      }
      case 'remove': {
        if (event.loc.x === 0) {
          return 'startOfRow';
        }
        this.goto(event.loc);
        this.moveLeft();
        this.row(event.loc.y).remove({ start: this.charPtr, end: this.charPtr + 1 });
        this.modified = true;
        return 'none';
      }
      case 'insertRow': {
        if (event.index < 0 || event.index > this.rows.length) {
          throw new OutOfRangeError(`Cannot insert a row at ${event.index} in a document of ${this.rows.length} rows`);
        }
        this.rows.splice(event.index, 0, new Row(event.text, this.info.tabWidth));
        this.modified = true;
        this.gotoY(event.index);
        return 'none';
      }
      case 'removeRow': {
        this.row(event.index);
        this.rows.splice(event.index, 1);
        this.modified = true;
        this.gotoY(event.index === 0 ? 0 : event.index - 1);
        return 'none';
      }
      case 'spliceUp': {
        if (event.loc.y === 0) {
          return 'startOfDocument';
        }
        const upper = this.row(event.loc.y - 1);
        const lower = this.row(event.loc.y);
        this.rows.splice(event.loc.y - 1, 2, upper.splice(lower));
        this.modified = true;
        this.goto({ x: upper.len(), y: event.loc.y - 1 });
        return 'none';
      }
      case 'splitDown': {
        const [left, right] = this.row(event.loc.y).split(event.loc.x);
        this.rows.splice(event.loc.y, 1, left, right);
        this.modified = true;
        this.goto({ x: 0, y: event.loc.y + 1 });
        return 'none';
      }
    }
  }

  /** Execute `event` and record it in the edit stack. */
  public exe(event: Event): Status {
    if (this.isNoOp(event)) {
      return this.execute(event);
    }
    const recorded = this.record(event);
    const status = this.execute(event);
    this.editStack.exe(recorded);
    return status;
  }

  /** Execute the inverse of `event`. */
  public reverse(event: Event): Status {
    return this.execute(invert(event));
  }

  public commit(): void {
    this.editStack.commit();
  }

  /** Undo the latest patch. Returns false when there was nothing to undo. */
  public undo(): boolean {
    const patch = this.editStack.undo();
    if (patch === undefined) {
      return false;
    }
    for (const event of patch) {
      this.reverse(event);
    }
    return true;
  }

  /** Redo the last undone patch. Returns false when there was nothing to redo. */
  public redo(): boolean {
    const patch = this.editStack.redo();
    if (patch === undefined) {
      return false;
    }
    for (const event of patch) {
      this.execute(event);
    }
    return true;
  }

  private isNoOp(event: Event): boolean {
    return (event.type === 'remove' && event.loc.x === 0) || (event.type === 'spliceUp' && event.loc.y === 0);
  }

  /** The event as it will be stored: removals carry what they actually remove, splices their boundary. */
  private record(event: Event): Event {
    switch (event.type) {
      case 'remove': {
        const ch = this.row(event.loc.y).text[event.loc.x - 1];
        return ch === undefined ? event : { ...event, ch };
      }
      case 'removeRow':
        return { ...event, text: this.row(event.index).renderRaw() };
      case 'spliceUp':
        return { ...event, loc: { x: this.row(event.loc.y - 1).len(), y: event.loc.y } };
      default:
        return event;
    }
  }

  public goto(loc: Loc): void {
    this.gotoY(loc.y);
    this.gotoX(loc.x);
  }

  /** Move to character `x` of the current row, scrolling so its column is visible. */
  public gotoX(x: number): void {
    if (this.charPtr === x) {
      return;
    }
    const row = this.currentRow();
    if (x < 0 || x > row.len()) {
      throw new OutOfRangeError(`Character ${x} is outside a row of length ${row.len()}`);
    }
    this.charPtr = x;
    this.setAxisX(jumpTo(this.axisX(), row.indices[x], this.size.w, 'start'));
  }

  /**
   * Move to row `y`, scrolling so it is visible, then snap the column onto the new row.
   * `y` may be one past the last row.
   */
  public gotoY(y: number): void {
    if (y < 0 || y > this.rows.length) {
      throw new OutOfRangeError(`Row ${y} is outside a document of ${this.rows.length} rows`);
    }
    if (this.loc().y !== y) {
      this.setAxisY(jumpTo(this.axisY(), y, this.size.h, 'end'));
    }
    this.snapToRow();
  }

  public moveLeft(): Status {
    if (this.charPtr === 0) {
      return 'startOfRow';
    }
    const { indices } = this.currentRow();
    this.setAxisX(stepBack(this.axisX(), indices[this.charPtr] - indices[this.charPtr - 1]));
    this.charPtr -= 1;
    return 'none';
  }

  public moveRight(): Status {
    if (this.loc().y >= this.rows.length) {
      return 'endOfRow';
    }
    const row = this.currentRow();
    if (this.charPtr === row.len()) {
      return 'endOfRow';
    }
    this.setAxisX(stepForward(this.axisX(), row.indices[this.charPtr + 1] - row.indices[this.charPtr], this.size.w));
    this.charPtr += 1;
    return 'none';
  }

  public moveUp(): Status {
    if (this.loc().y === 0) {
      return 'startOfDocument';
    }
    this.setAxisY(stepBack(this.axisY(), 1));
    this.snapToRow();
    return 'none';
  }

  public moveDown(): Status {
    if (this.loc().y + 1 >= this.rows.length) {
      return 'endOfDocument';
    }
    this.setAxisY(stepForward(this.axisY(), 1, this.size.h));
    this.snapToRow();
    return 'none';
  }

  /** Rows joined by the file's line ending, with a trailing line ending. Tabs are kept. */
  public render(): string {
    if (this.rows.length === 0) {
      return '';
    }
    const ending = this.info.isDos ? '\r\n' : '\n';
    return `${this.rows.map((row) => row.renderRaw()).join(ending)}${ending}`;
  }

  public row(index: number): Row {
    if (index < 0 || index >= this.rows.length) {
      throw new OutOfRangeError(`Row ${index} is outside a document of ${this.rows.length} rows`);
    }
    return this.rows[index];
  }

  public currentRow(): Row {
    return this.row(this.loc().y);
  }

  /** Absolute display position: cursor plus scroll offset. */
  public loc(): Loc {
    return { x: this.cursor.x + this.offset.x, y: this.cursor.y + this.offset.y };
  }

  /** `index + 1`, right-aligned to the width of the largest line number. */
  public lineNumber(index: number): string {
    return String(index + 1).padStart(String(this.rows.length).length, ' ');
  }

  public statusLineInfo(): StatusLineInfo {
    const path = this.info.file;
    const extension = path === undefined ? '' : extname(path).replace(/^\./, '');
    return {
      file: path === undefined ? '[No Name]' : basename(path),
      fullPath: path ?? '',
      type: fileTypeOf(extension),
      modified: this.modified ? '[+]' : '',
      extension,
      row: this.loc().y + 1,
      column: this.charPtr,
      total: this.rows.length,
    };
  }

  /**
   * Pull the column back onto a character boundary of the current row (the row
   * end when it is shorter), one column at a time, and recompute `charPtr`.
   */
  private snapToRow(): void {
    const { x, y } = this.loc();
    if (y >= this.rows.length) {
      this.setAxisX(stepBack(this.axisX(), x));
      this.charPtr = 0;
      return;
    }
    const row = this.rows[y];
    const column = row.snap(x);
    this.setAxisX(stepBack(this.axisX(), x - column));
    this.charPtr = row.getCharPtr(column);
  }

  private axisX(): AxisState {
    return { cursor: this.cursor.x, offset: this.offset.x };
  }

  private axisY(): AxisState {
    return { cursor: this.cursor.y, offset: this.offset.y };
  }

  private setAxisX(state: AxisState): void {
    this.cursor.x = state.cursor;
    this.offset.x = state.offset;
  }

  private setAxisY(state: AxisState): void {
    this.cursor.y = state.cursor;
    this.offset.y = state.offset;
  }
}
