export { type DocumentOptions, Document, type FileInfo, splitLines, type StatusLineInfo } from './Document.js';
export { EditStack } from './EditStack.js';
export { FileError, NoFileNameError, OutOfRangeError, TextBufferError, type TextBufferErrorCode } from './errors.js';
export { type Event, type EventType, invert } from './events.js';
export { fileTypeOf, UNKNOWN_FILE_TYPE } from './fileTypes.js';
export { Logger, type LoggerOptions, type LogSink } from './Logger.js';
export { type CharRange, Row } from './Row.js';
export type { Loc, Size, Status } from './types.js';
export { type Anchor, type AxisState, jumpTo, stepBack, stepForward } from './viewport.js';
export { alignSides, buildIndices, charWidth, DEFAULT_TAB_WIDTH, displayWidth, toChars, truncate } from './width.js';
export { nextBoundaryAfter, nextBoundaryBefore, words } from './words.js';
export { CONFIG_PATH, generateJsonSchema, initConfig, loadConfig, parseConfig, type ResolvedConfig } from './config.js';
export { buildStatusLine, type FrameOptions, gutterWidth, renderFrame } from './view.js';
