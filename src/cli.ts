import { parseArgs } from 'node:util';
import { globSync } from 'glob';
import { z } from 'zod';
import { Document } from './Document.js';
import { TextBufferError } from './errors.js';
import type { Logger } from './Logger.js';
import { type FrameOptions, gutterWidth, renderFrame } from './view.js';

const cliArgsSchema = z.object({
  version: z.boolean(),
  help: z.boolean(),
  initConfig: z.boolean(),
  printSchema: z.boolean(),
  tabWidth: z.coerce.number().int().min(1).optional(),
  width: z.coerce.number().int().min(1).optional(),
  height: z.coerce.number().int().min(1).optional(),
  line: z.coerce.number().int().min(1).optional(),
  files: z.array(z.string()),
});

export type CliArgs = z.infer<typeof cliArgsSchema>;

export function parseCliArgs(argv: string[]): CliArgs {
  const { values, positionals } = parseArgs({
    args: argv.filter((a) => a !== '-?'),
    options: {
      version: { type: 'boolean', short: 'v', default: false },
      help: { type: 'boolean', short: 'h', default: false },
      'init-config': { type: 'boolean', default: false },
      'print-schema': { type: 'boolean', default: false },
      'tab-width': { type: 'string', short: 't' },
      width: { type: 'string', short: 'W' },
      height: { type: 'string', short: 'H' },
      line: { type: 'string', short: 'l' },
    },
    allowPositionals: true,
  });
  return cliArgsSchema.parse({
    version: values.version,
    help: values.help || argv.includes('-?'),
    initConfig: values['init-config'],
    printSchema: values['print-schema'],
    tabWidth: values['tab-width'],
    width: values.width,
    height: values.height,
    line: values.line,
    files: positionals,
  });
}

/** Expand glob patterns; a pattern with no matches is kept so opening it reports the error. */
export function expandFiles(patterns: string[]): string[] {
  return patterns.flatMap((pattern) => {
    const matches = globSync(pattern, { nodir: true }).sort();
    return matches.length > 0 ? matches : [pattern];
  });
}

export interface ViewOptions {
  /** Terminal columns, gutter included. */
  columns: number;
  /** Rows available for document text. */
  rows: number;
  tabWidth: number;
  /** 1-based line to bring into view. */
  line?: number;
  frame: FrameOptions;
}

/** Print a frame for each file. Returns the process exit code. */
export function viewFiles(files: string[], options: ViewOptions, out: (line: string) => void, logger: Logger): number {
  let failures = 0;
  for (const file of files) {
    const doc = new Document({ w: options.columns, h: options.rows }, { tabWidth: options.tabWidth, logger });
    try {
      doc.open(file);
      doc.size.w = Math.max(1, options.columns - gutterWidth(doc, options.frame.lineNumbers));
      if (options.line !== undefined) {
        doc.gotoY(Math.min(options.line - 1, Math.max(0, doc.rows.length - 1)));
      }
    } catch (err) {
      if (err instanceof TextBufferError) {
        logger.error(err.message);
        failures++;
        continue;
      }
      throw err;
    }
    for (const line of renderFrame(doc, options.frame)) {
      out(line);
    }
  }
  return failures > 0 ? 1 : 0;
}
