import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { ConfigSchema, type Config } from '../types/config.js';

export const CONFIG_ENV_VAR = 'PERMTERM_CONFIG';

export function loadConfig(configPath?: string): Config {
  const path = configPath || process.env[CONFIG_ENV_VAR] || resolve(process.cwd(), 'config.json');

  try {
    const raw = readFileSync(path, 'utf-8');
    const parsed: unknown = JSON.parse(raw);
    return ConfigSchema.parse(parsed);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new Error(
        `Config file not found: ${path}\n` +
        `Create config.json or set ${CONFIG_ENV_VAR}`
      );
    }
    throw error;
  }
}
