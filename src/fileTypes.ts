import { readFileSync } from 'node:fs';
import { z } from 'zod';

// One level up from both src/ and dist/
const FILE_TYPES_PATH = new URL('../data/file-types.json', import.meta.url);

export const UNKNOWN_FILE_TYPE = 'Unknown';

const fileTypesSchema = z.record(z.string(), z.string());

let table: Map<string, string> | undefined;

function loadTable(): Map<string, string> {
  if (table === undefined) {
    const raw = JSON.parse(readFileSync(FILE_TYPES_PATH, 'utf8'));
    table = new Map(Object.entries(fileTypesSchema.parse(raw)));
  }
  return table;
}

/** Label for a file extension (without the dot), case-insensitive. */
export function fileTypeOf(extension: string): string {
  return loadTable().get(extension.toLowerCase()) ?? UNKNOWN_FILE_TYPE;
}
