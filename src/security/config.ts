import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { ConfigSchema, type Config } from '../types/config.js';

export const DEFAULT_CONFIG_FILE = 'shell-agent.json';

/**
 * Load configuration from a JSON file.
 * An explicitly requested file must exist; a missing default file yields the schema defaults.
 */
export function loadConfig(configPath?: string): Config {
  const explicit = configPath || process.env.SHELL_AGENT_CONFIG;
  const path = explicit || resolve(process.cwd(), DEFAULT_CONFIG_FILE);

  if (!explicit && !existsSync(path)) {
    return ConfigSchema.parse({});
  }

  try {
    const raw = readFileSync(path, 'utf-8');
    const parsed: unknown = JSON.parse(raw);
    return ConfigSchema.parse(parsed);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new Error(
        `Config file not found: ${path}\n` +
        'Create it or unset SHELL_AGENT_CONFIG'
      );
    }
    throw error;
  }
}

export type ConfigOverrides = Partial<Pick<Config, 'host' | 'port' | 'logLevel' | 'autoApprove'>>;

/**
 * Apply command-line overrides on top of a loaded config
 */
export function applyOverrides(config: Config, overrides: ConfigOverrides): Config {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
  return ConfigSchema.parse({ ...config, ...defined });
}
