import { homedir } from 'os';
import { join } from 'path';
import { existsSync, readFileSync } from 'fs';
import { parse } from 'dotenv';
import { CONFIG_FILE_NAME, CONFIG_KEYS } from '../constants.js';
import { ConfigError } from '../errors.js';

export type ConfigSource = Partial<Record<(typeof CONFIG_KEYS)[number], string>>;

export function getConfigPath(): string {
  return join(homedir(), CONFIG_FILE_NAME);
}

/**
 * Read POZNOTE_* settings from the dotenv-style config file, then let
 * environment variables of the same name take precedence.
 */
export function loadConfigSource(
  configPath: string = getConfigPath(),
  env: NodeJS.ProcessEnv = process.env,
): ConfigSource {
  const source: ConfigSource = {};

  if (existsSync(configPath)) {
    let fileValues: Record<string, string>;
    try {
      fileValues = parse(readFileSync(configPath, 'utf-8'));
    } catch (error) {
      throw new ConfigError(
        'unreadable-file',
        `Could not read ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
    for (const key of CONFIG_KEYS) {
      if (fileValues[key] !== undefined) {
        source[key] = fileValues[key];
      }
    }
  } else {
    console.error(`[Info] Poznote config not found at: ${configPath}`);
  }

  for (const key of CONFIG_KEYS) {
    const value = env[key];
    if (value !== undefined) {
      source[key] = value;
    }
  }

  return source;
}
