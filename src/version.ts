import { readFileSync } from 'node:fs';
import { z } from 'zod';

const PackageJsonSchema = z.object({ version: z.string() });

// package.json sits one level above both src/ and dist/
const packageJson = PackageJsonSchema.parse(
  JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'))
);

export const SERVER_NAME = 'permterm-mcp';
export const SERVER_VERSION = packageJson.version;
