import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { expandFiles, parseCliArgs, type ViewOptions, viewFiles } from '../src/cli.js';
import { Logger } from '../src/Logger.js';

describe('parseCliArgs', () => {
  it('collects files and leaves options unset', () => {
    expect(parseCliArgs(['a.txt', 'b.txt'])).toEqual({
      version: false,
      help: false,
      initConfig: false,
      printSchema: false,
      files: ['a.txt', 'b.txt'],
    });
  });

  it('parses numeric options', () => {
    const args = parseCliArgs(['-t', '8', '--width', '100', '-H', '20', '--line', '42', 'a.txt']);
    expect(args.tabWidth).toBe(8);
    expect(args.width).toBe(100);
    expect(args.height).toBe(20);
    expect(args.line).toBe(42);
  });

  it('treats -? as help', () => {
    expect(parseCliArgs(['-?']).help).toBe(true);
  });

  it('parses flags', () => {
    const args = parseCliArgs(['-v', '--init-config', '--print-schema']);
    expect(args.version).toBe(true);
    expect(args.initConfig).toBe(true);
    expect(args.printSchema).toBe(true);
  });

  it('rejects a line number below one', () => {
    expect(() => parseCliArgs(['--line', '0', 'a.txt'])).toThrow();
  });

  it('rejects unknown options', () => {
    expect(() => parseCliArgs(['--bogus'])).toThrow();
  });
});

describe('files', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'termbuf-cli-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('expandFiles', () => {
    it('expands a glob in sorted order', () => {
      writeFileSync(join(dir, 'b.txt'), '');
      writeFileSync(join(dir, 'a.txt'), '');
      writeFileSync(join(dir, 'c.md'), '');
      expect(expandFiles([join(dir, '*.txt')])).toEqual([join(dir, 'a.txt'), join(dir, 'b.txt')]);
    });

    it('keeps a pattern with no matches', () => {
      const missing = join(dir, 'missing.txt');
      expect(expandFiles([missing])).toEqual([missing]);
    });
  });

  describe('viewFiles', () => {
    const options: ViewOptions = {
      columns: 20,
      rows: 2,
      tabWidth: 4,
      frame: { lineNumbers: true, statusLine: false, colors: false },
    };

    function capture(): { out: string[]; log: string[]; logger: Logger } {
      const log: string[] = [];
      return { out: [], log, logger: new Logger({ sink: (line) => log.push(line) }) };
    }

    it('prints a frame for each file', () => {
      const first = join(dir, 'first.txt');
      const second = join(dir, 'second.txt');
      writeFileSync(first, 'hi\n');
      writeFileSync(second, 'one\ntwo\nthree\n');
      const { out, logger } = capture();

      const code = viewFiles([first, second], options, (line) => out.push(line), logger);

      expect(code).toBe(0);
      expect(out).toEqual(['1 │hi', '~ │', '1 │one', '2 │two']);
    });

    it('scrolls to the requested line', () => {
      const file = join(dir, 'lines.txt');
      writeFileSync(file, 'one\ntwo\nthree\nfour\n');
      const { out, logger } = capture();

      viewFiles([file], { ...options, line: 4 }, (line) => out.push(line), logger);

      expect(out).toEqual(['3 │three', '4 │four']);
    });

    it('reports files that cannot be read and carries on', () => {
      const missing = join(dir, 'missing.txt');
      const present = join(dir, 'present.txt');
      writeFileSync(present, 'ok\n');
      const { out, log, logger } = capture();

      const code = viewFiles([missing, present], options, (line) => out.push(line), logger);

      expect(code).toBe(1);
      expect(out).toEqual(['1 │ok', '~ │']);
      expect(log.filter((line) => line.startsWith('Error: '))).toHaveLength(1);
      expect(log[0].startsWith(`Error: File error at ${missing}: ENOENT`)).toBe(true);
    });
  });
});
