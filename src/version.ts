import { readFileSync } from 'node:fs';
import { z } from 'zod';

// src/ and dist/ both sit one level below package.json
const packageJson = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8')));

export const SERVER_VERSION = packageJson.version;
