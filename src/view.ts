/**
 * Plain-text frame of a document's viewport: a line-number gutter, the visible
 * slice of each row, `~` past the last row, and a status line.
 */

import type { Document } from './Document.js';
import { StatusLineBuilder } from './StatusLineBuilder.js';
import { alignSides, truncate } from './width.js';

const STATUS_BG = '\x1B[48;2;31;92;62m';
const RESET_BG = '\x1B[49m';

export interface FrameOptions {
  lineNumbers: boolean;
  statusLine: boolean;
  colors: boolean;
}

/** Columns taken by the gutter: the widest line number plus ` │`. */
export function gutterWidth(doc: Document, lineNumbers: boolean): number {
  return lineNumbers ? String(doc.rows.length).length + 2 : 0;
}

export function buildStatusLine(doc: Document, width: number, colors: boolean): StatusLineBuilder {
  const info = doc.statusLineInfo();
  const lhs = ` ${info.file}${info.modified} | ${info.type} |`;
  const rhs = `| ${info.row}/${info.total} | ${info.column} `;
  const b = new StatusLineBuilder(doc.info.tabWidth);
  if (colors) {
    b.ansi(STATUS_BG);
  }
  const aligned = alignSides(lhs, rhs, width, doc.info.tabWidth);
  if (aligned !== undefined) {
    b.text(aligned);
  }
  b.text(' '.repeat(Math.max(0, width - b.visibleLength)));
  if (colors) {
    b.ansi(RESET_BG);
  }
  return b;
}

export function renderFrame(doc: Document, options: FrameOptions): string[] {
  const gutter = gutterWidth(doc, options.lineNumbers);
  const lines: string[] = [];
  for (let y = 0; y < doc.size.h; y++) {
    const index = y + doc.offset.y;
    if (index < doc.rows.length) {
      const text = truncate(doc.row(index).render(doc.offset.x), doc.size.w);
      lines.push(options.lineNumbers ? `${doc.lineNumber(index)} │${text}` : text);
    } else {
      lines.push(options.lineNumbers ? `${' '.repeat(gutter - 3)}~ │` : '~');
    }
  }
  if (options.statusLine) {
    lines.push(buildStatusLine(doc, doc.size.w + gutter, options.colors).output);
  }
  return lines;
}
