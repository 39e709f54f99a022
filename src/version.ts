import { readFileSync } from 'node:fs';
import { z } from 'zod';

const packageSchema = z.object({
  name: z.string(),
  version: z.string(),
});

// package.json sits one level above both src/ and dist/
export const packageInfo = packageSchema.parse(JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8')));
