#!/usr/bin/env node
import { expandFiles, parseCliArgs, viewFiles } from './cli.js';
import { generateJsonSchema, initConfig, loadConfig } from './config.js';
import { printUsage, printVersion } from './help.js';
import { Logger } from './Logger.js';

const logger = new Logger({ colors: process.stderr.isTTY === true });

let args: ReturnType<typeof parseCliArgs>;
try {
  args = parseCliArgs(process.argv.slice(2));
} catch (err) {
  logger.error(`${err}`);
  // biome-ignore lint/suspicious/noConsole: CLI usage output on bad arguments
  printUsage(console.log);
  process.exit(2);
}

if (args.version) {
  // biome-ignore lint/suspicious/noConsole: CLI --version output
  printVersion(console.log);
  process.exit(0);
}

if (args.help) {
  // biome-ignore lint/suspicious/noConsole: CLI --help output
  printUsage(console.log);
  process.exit(0);
}

if (args.initConfig) {
  // biome-ignore lint/suspicious/noConsole: CLI --init-config output
  initConfig(console.log);
  process.exit(0);
}

if (args.printSchema) {
  // biome-ignore lint/suspicious/noConsole: CLI --print-schema output
  console.log(JSON.stringify(generateJsonSchema(), null, 2));
  process.exit(0);
}

const { config, warnings } = loadConfig();
for (const warning of warnings) {
  logger.error(warning);
}

if (args.files.length === 0) {
  // biome-ignore lint/suspicious/noConsole: CLI usage output when no files are given
  printUsage(console.log);
  process.exit(1);
}

process.exitCode = viewFiles(
  expandFiles(args.files),
  {
    columns: args.width ?? (process.stdout.columns || 80),
    rows: args.height ?? Math.max(1, (process.stdout.rows || 24) - (config.statusLine ? 1 : 0)),
    tabWidth: args.tabWidth ?? config.tabWidth,
    line: args.line,
    frame: { lineNumbers: config.lineNumbers, statusLine: config.statusLine, colors: process.stdout.isTTY === true },
  },
  (line) => process.stdout.write(`${line}\n`),
  logger,
);
