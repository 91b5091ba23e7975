import { z } from 'zod';
import { readFileSync } from 'fs';

const packageSchema = z.object({ name: z.string(), version: z.string() });

/** Name and version from package.json (one level above src/ and dist/) */
export const PACKAGE = packageSchema.parse(JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8')));

export const VERSION = PACKAGE.version;
