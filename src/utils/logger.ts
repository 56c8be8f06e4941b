import pino from 'pino';
import type { Config } from '../types/config.js';

/**
 * Create a configured logger instance
 * CRITICAL: the MCP transport uses stdout for JSON-RPC protocol messages
 * ALL logs MUST go to stderr to avoid protocol corruption
 */
export function createLogger(config: Pick<Config, 'logLevel'>) {
  return pino(
    {
      name: 'shell-agent',
      level: config.logLevel,
    },
    pino.destination({ dest: 2, sync: false }) // fd 2 = stderr
  );
}

export type Logger = ReturnType<typeof createLogger>;
