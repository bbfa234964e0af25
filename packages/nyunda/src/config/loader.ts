// src/config/loader.ts
// Load and parse nyunda configuration files

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { createLogger, type Logger } from '../utils/logger.js';
import {
  validateConfig,
  fromConfigFile,
  resolveConfig,
  type NyundaConfig,
} from './schema.js';

export const CONFIG_FILES = ['nyunda.config.yaml', 'nyunda.config.yml', 'nyunda.config.json'];

/**
 * Find a config file in the given directory
 */
export function findConfig(dir: string = process.cwd()): string | null {
  for (const name of CONFIG_FILES) {
    const path = join(dir, name);
    if (existsSync(path)) {
      return path;
    }
  }

  return null;
}

/**
 * Load and validate a config file, filling in defaults.
 * Returns null when the file is missing, unreadable or invalid.
 */
export function loadConfig(path: string, logger: Logger = createLogger('warn')): NyundaConfig | null {
  if (!existsSync(path)) {
    return null;
  }

  let raw: unknown;
  try {
    const content = readFileSync(path, 'utf-8');
    raw = path.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
  } catch (err) {
    logger.error('Failed to parse config', { path }, err instanceof Error ? err : undefined);
    return null;
  }

  // An empty YAML document parses to null; treat it as all defaults
  if (raw === null || raw === undefined) {
    return resolveConfig();
  }

  if (!validateConfig(raw)) {
    logger.error('Invalid config', { path });
    return null;
  }

  return resolveConfig(fromConfigFile(raw));
}

/**
 * Load the config file from a directory, or the defaults when there is none.
 */
export function loadConfigFromDirectory(dir: string = process.cwd(), logger?: Logger): NyundaConfig {
  const path = findConfig(dir);
  if (path === null) {
    return resolveConfig();
  }
  return loadConfig(path, logger) ?? resolveConfig();
}
