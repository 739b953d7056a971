/**
 * Collection loader configuration loading
 *
 * Values come from, in increasing precedence:
 * 1. DEFAULT_LOADER_CONFIG
 * 2. A YAML file named by PAGEFLOW_CONFIG
 * 3. Environment variables (PAGEFLOW_LOADER_ID, PAGEFLOW_DEBUG)
 */

import { readFileSync } from 'fs';
import { load } from 'js-yaml';
import { DEFAULT_LOADER_CONFIG, type CollectionLoaderConfiguration } from '@pageflow/shared';

/**
 * Shape of the YAML configuration file
 */
interface ConfigFile {
  loaderId?: unknown;
  debug?: unknown;
}

/**
 * Load configuration from the environment and the optional config file
 * @throws Error if a value is invalid or the config file cannot be read
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CollectionLoaderConfiguration {
  const config: CollectionLoaderConfiguration = { ...DEFAULT_LOADER_CONFIG };

  const configPath = env.PAGEFLOW_CONFIG;
  if (configPath) {
    const file = readConfigFile(configPath);

    if (file.loaderId !== undefined) {
      config.loaderId = parseLoaderId(file.loaderId, `${configPath}: loaderId`);
    }
    if (file.debug !== undefined) {
      if (typeof file.debug !== 'boolean') {
        throw new Error(`${configPath}: debug must be a boolean`);
      }
      config.debug = file.debug;
    }
  }

  if (env.PAGEFLOW_LOADER_ID !== undefined) {
    config.loaderId = parseLoaderId(env.PAGEFLOW_LOADER_ID.trim(), 'PAGEFLOW_LOADER_ID');
  }
  if (env.PAGEFLOW_DEBUG !== undefined) {
    config.debug = parseBoolean(env.PAGEFLOW_DEBUG, 'PAGEFLOW_DEBUG');
  }

  return config;
}

/**
 * Print configuration (for debugging)
 */
export function printConfig(config: CollectionLoaderConfiguration): void {
  console.log('Collection Loader Configuration:');
  console.log(`  Loader ID: ${config.loaderId}`);
  console.log(`  Debug: ${config.debug}`);
}

function readConfigFile(path: string): ConfigFile {
  const content = readFileSync(path, 'utf8');
  const parsed: unknown = load(content);

  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error(`${path}: configuration must be a mapping`);
  }
  return parsed;
}

function parseLoaderId(value: unknown, source: string): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new Error(`${source} must be a non-empty string`);
  }
  return value;
}

function parseBoolean(value: string, source: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') {
    return true;
  }
  if (normalized === 'false' || normalized === '0' || normalized === '') {
    return false;
  }
  throw new Error(`${source} must be true or false, got "${value}"`);
}

