import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, resolve } from 'node:path';
import { z } from 'zod';

const configSchema = z
  .object({
    $schema: z.string().optional().describe('JSON Schema reference for editor autocomplete'),
    tabWidth: z.int().min(1).optional().default(4).catch(4).describe('Columns per tab. Applies to rows created after the document is constructed'),
    lineNumbers: z.boolean().optional().default(true).catch(true).describe('Show a line number gutter'),
    statusLine: z.boolean().optional().default(true).catch(true).describe('Show the status line below the rows'),
  })
  .meta({ title: 'termbuf Configuration', description: 'Configuration for the termbuf text buffer and viewer' });

export type ResolvedConfig = Omit<z.infer<typeof configSchema>, '$schema'>;

export const CONFIG_PATH = resolve(homedir(), '.config', 'termbuf', 'config.json');

function withoutIntegerCeiling(node: unknown): unknown {
  if (Array.isArray(node)) {
    return node.map(withoutIntegerCeiling);
  }
  if (node === null || typeof node !== 'object') {
    return node;
  }
  return Object.fromEntries(
    Object.entries(node)
      .filter(([key, value]) => !(key === 'maximum' && value === Number.MAX_SAFE_INTEGER))
      .map(([key, value]) => [key, withoutIntegerCeiling(value)]),
  );
}

/** JSON Schema for the config file. Every key is optional and integers have no ceiling. */
export function generateJsonSchema(): unknown {
  const { required: _required, additionalProperties: _additionalProperties, ...schema } = configSchema.toJSONSchema({ target: 'draft-07' });
  return withoutIntegerCeiling(schema);
}

/** Validate raw config. Invalid fields fall back to their defaults; `$schema` is dropped. */
export function parseConfig(raw: unknown): ResolvedConfig {
  const { $schema: _, ...config } = configSchema.parse(raw);
  return config;
}

export function loadConfig(path = CONFIG_PATH): { config: ResolvedConfig; warnings: string[]; path: string | null } {
  const defaults = parseConfig({});

  if (!existsSync(path)) {
    return { config: defaults, warnings: [], path: null };
  }

  try {
    const raw = JSON.parse(readFileSync(path, 'utf8'));
    return { config: parseConfig(raw), warnings: [], path };
  } catch (err) {
    return { config: defaults, warnings: [`Failed to parse ${path}: ${err}`], path };
  }
}

export function initConfig(log: (msg: string) => void, path = CONFIG_PATH): void {
  if (existsSync(path)) {
    log(`Config already exists at ${path}`);
    return;
  }

  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  const content = JSON.stringify(parseConfig({}), null, 2);
  writeFileSync(path, `${content}\n`);
  log(`Created config at ${path}`);
}
