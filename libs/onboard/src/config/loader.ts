/**
 * Configuration loader
 *
 * A missing file yields the defaults. A file that cannot be read, is not
 * valid TOML or does not match the schema is fatal.
 */

import * as fs from 'node:fs/promises';
import { parse as parseToml } from '@iarna/toml';
import { errorMessage, getLogger } from '@modegreet/core';
import { ConfigError } from '../errors.js';
import { defaultConfig, OnboardConfigSchema, type OnboardConfig } from './schema.js';

export const DEFAULT_CONFIG_PATH = '/etc/modegreet/onboard.toml';

export function parseConfig(content: string, path = '<inline>'): OnboardConfig {
  let document: unknown;
  try {
    document = parseToml(content);
  } catch (err) {
    throw new ConfigError(`Invalid TOML in ${path}: ${errorMessage(err)}`, path);
  }

  const result = OnboardConfigSchema.safeParse(document);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : 'config';
    throw new ConfigError(`Invalid config in ${path}: ${where}: ${issue?.message ?? 'invalid value'}`, path);
  }
  return result.data;
}

export async function loadConfig(path: string = DEFAULT_CONFIG_PATH): Promise<OnboardConfig> {
  const log = getLogger('config');
  let content: string;
  try {
    content = await fs.readFile(path, 'utf8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      log.info({ path }, 'Config file not found, using defaults');
      return defaultConfig();
    }
    throw new ConfigError(`Cannot read ${path}: ${errorMessage(err)}`, path);
  }

  const config = parseConfig(content, path);
  log.info({ path, categories: config.updates.length }, 'Loaded config');
  return config;
}
