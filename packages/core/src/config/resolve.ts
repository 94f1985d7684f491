import os from 'node:os';
import { getTomlString } from './toml.js';

type ValueOptions = {
  cliValue?: string | undefined;
  defaultValue?: string;
};

function parseBooleanValue(raw: string, name: string): boolean {
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'y', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'n', 'off'].includes(normalized)) return false;
  throw new Error(`Invalid ${name} value: ${raw}. Use true/false.`);
}

export function resolveFlag(
  env: NodeJS.ProcessEnv,
  name: string,
  tomlValue: unknown,
  options: { cliValue?: boolean | undefined; defaultValue?: boolean } = {},
): boolean {
  if (options.cliValue !== undefined) return options.cliValue;
  const raw = env[name];
  if (raw !== undefined && raw.trim() !== '') return parseBooleanValue(raw, name);
  if (tomlValue === undefined) return options.defaultValue ?? false;
  if (typeof tomlValue === 'boolean') return tomlValue;
  if (typeof tomlValue === 'string') return parseBooleanValue(tomlValue, `${name} (toml)`);
  throw new Error(`Invalid ${name} in TOML. Use true/false.`);
}

export function resolveStringValue(
  env: NodeJS.ProcessEnv,
  envName: string,
  tomlValue: unknown,
  options: ValueOptions = {},
): string | undefined {
  const cliTrimmed = options.cliValue?.trim();
  if (cliTrimmed) return cliTrimmed;
  const envRaw = env[envName];
  if (envRaw !== undefined) {
    const trimmed = envRaw.trim();
    if (trimmed !== '') return trimmed;
  }
  const tomlString = getTomlString(tomlValue, envName);
  if (tomlString !== undefined) {
    const trimmed = tomlString.trim();
    if (trimmed !== '') return trimmed;
  }
  return options.defaultValue;
}

export function expandHomePath(value: string, home: string = os.homedir()): string {
  if (value === '~') return home;
  if (value.startsWith('~/')) return `${home}/${value.slice(2)}`;
  if (value === '$HOME') return home;
  if (value.startsWith('$HOME/')) return `${home}/${value.slice(6)}`;
  if (value === '${HOME}') return home;
  if (value.startsWith('${HOME}/')) return `${home}/${value.slice(8)}`;
  return value;
}

export function resolvePathValue(
  env: NodeJS.ProcessEnv,
  envName: string,
  tomlValue: unknown,
  options: ValueOptions = {},
): string | undefined {
  const raw = resolveStringValue(env, envName, tomlValue, options);
  if (!raw) return raw;
  return expandHomePath(raw, env.HOME?.trim() || os.homedir());
}

/** Tokens come from the command line or the environment only, never from the TOML file. */
export function resolveSecret(
  env: NodeJS.ProcessEnv,
  envName: string,
  cliValue?: string,
): string | undefined {
  const fromCli = cliValue?.trim();
  if (fromCli) return fromCli;
  const fromEnv = env[envName]?.trim();
  return fromEnv ? fromEnv : undefined;
}
