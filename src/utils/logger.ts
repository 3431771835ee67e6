import pino from 'pino';
import type { Config } from '../types/config.js';

/**
 * Create a configured logger instance.
 * stdout carries the JSON-RPC stream, so every log line goes to stderr.
 */
export function createLogger(config: Pick<Config, 'logLevel'>) {
  return pino(
    {
      level: config.logLevel,
      base: { service: 'permterm-mcp' },
    },
    pino.destination({ dest: 2, sync: false }) // fd 2 = stderr
  );
}

export type Logger = pino.Logger;
