import { DEFAULT_TAB_WIDTH, displayWidth } from './width.js';

export class StatusLineBuilder {
  public output = '';
  public visibleLength = 0;

  public constructor(private readonly tabWidth = DEFAULT_TAB_WIDTH) {}

  /** Append text that is visible on screen (counts toward line width). */
  public text(s: string): this {
    this.output += s;
    this.visibleLength += displayWidth(s, this.tabWidth);
    return this;
  }

  /** Append an ANSI escape sequence (zero visible width). */
  public ansi(s: string): this {
    this.output += s;
    return this;
  }
}
