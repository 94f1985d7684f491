import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseToml } from 'smol-toml';
import { logger } from '../logger.js';

export type TomlTable = Record<string, unknown>;

export const CONFIG_PATH_ENV = 'MIRRORSYNC_CONFIG_PATH';
export const DEFAULT_CONFIG_PATH = 'mirrorsync.toml';

export type ConfigFileLocation = {
  path: string;
  /** Explicitly requested files must exist; the default one is optional. */
  required: boolean;
};

export function resolveConfigPath(
  env: NodeJS.ProcessEnv,
  explicitPath: string | undefined,
  cwd: string,
): ConfigFileLocation {
  const fromOption = explicitPath?.trim();
  if (fromOption) return { path: resolve(cwd, fromOption), required: true };
  const fromEnv = env[CONFIG_PATH_ENV]?.trim();
  if (fromEnv) return { path: resolve(cwd, fromEnv), required: true };
  return { path: resolve(cwd, DEFAULT_CONFIG_PATH), required: false };
}

function isTomlTable(value: unknown): value is TomlTable {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function loadTomlConfig(location: ConfigFileLocation): TomlTable {
  if (!location.required && !existsSync(location.path)) return {};
  try {
    const raw = readFileSync(location.path, 'utf8');
    const parsed: unknown = parseToml(raw);
    if (!isTomlTable(parsed)) {
      throw new Error('mirrorsync config TOML must be a table at the root.');
    }
    return parsed;
  } catch (err) {
    logger.error({ err, path: location.path }, 'Failed to load mirrorsync config TOML');
    throw err;
  }
}

export function getTomlTable(value: unknown, name: string): TomlTable | undefined {
  if (value === undefined) return undefined;
  if (isTomlTable(value)) return value;
  throw new Error(`Invalid ${name} in TOML. Expected a table.`);
}

export function getTomlString(value: unknown, name: string): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value === 'string') return value;
  throw new Error(`Invalid ${name} in TOML. Expected a string.`);
}
