import { isAbsolute, join, resolve } from 'node:path';
import { readFileOrNull } from '../../infra/fs-utils.js';
import { isPlainObject } from '../../infra/types.js';
import { validate, type Schema } from '../../infra/validator.js';
import { LOG_LEVELS } from '../../logging/logger.js';
import { ValidationError, errorMessage } from '../../errors.js';
import { CONFIG_FILE } from '../../constants.js';
import type { DeckConfig } from './types.js';
import { DEFAULT_CONFIG } from './types.js';

const UNSAFE_MERGE_KEYS = new Set(['__proto__', 'constructor', 'prototype']);

const CONFIG_SCHEMA: Schema = {
  pluginsDir: { type: 'string', required: false, min: 1 },
  settingsFile: { type: 'string', required: false, min: 1 },
  execution: {
    type: 'object',
    schema: {
      defaultTimeoutSeconds: { type: 'number', min: 0 },
      monitorIntervalMs: { type: 'number', min: 1, integer: true },
    },
  },
  logging: {
    type: 'object',
    schema: {
      level: { type: 'enum', values: Object.keys(LOG_LEVELS) },
    },
  },
};

function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const key of Object.keys(override)) {
    if (UNSAFE_MERGE_KEYS.has(key)) continue;
    const val = override[key];
    const current = result[key];
    if (isPlainObject(val)) {
      result[key] = deepMerge(isPlainObject(current) ? current : {}, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

function isDeckConfig(value: Record<string, unknown>): value is Record<string, unknown> & DeckConfig {
  return validate(value, CONFIG_SCHEMA).length === 0;
}

export function validateConfig(value: Record<string, unknown>): DeckConfig {
  if (!isDeckConfig(value)) {
    throw new ValidationError('Invalid configuration', validate(value, CONFIG_SCHEMA));
  }
  return value;
}

export class ConfigLoader {
  async load(configDir: string): Promise<DeckConfig> {
    let merged = deepMerge({}, { ...DEFAULT_CONFIG });
    const fileConfig = await this.readLayer(configDir, true);
    if (fileConfig) merged = deepMerge(merged, this.resolveLayerPaths(fileConfig, configDir));
    return validateConfig(merged);
  }

  /**
   * Three-layer config fallback: DEFAULT_CONFIG → global → project.
   * Global config with invalid JSON is silently skipped.
   * Project config with invalid JSON throws ValidationError.
   */
  async loadWithFallback(projectDir: string, globalDir: string): Promise<DeckConfig> {
    let merged = deepMerge({}, { ...DEFAULT_CONFIG });

    const globalConfig = await this.readLayer(globalDir, false);
    if (globalConfig) {
      merged = deepMerge(merged, this.resolveLayerPaths(globalConfig, globalDir));
    }

    const projectConfig = await this.readLayer(projectDir, true);
    if (projectConfig) {
      merged = deepMerge(merged, this.resolveLayerPaths(projectConfig, projectDir));
    }

    return validateConfig(merged);
  }

  private async readLayer(dir: string, strict: boolean): Promise<Record<string, unknown> | null> {
    const configPath = join(dir, CONFIG_FILE);
    const raw = await readFileOrNull(configPath);
    if (raw === null) return null;

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (e) {
      if (!strict) return null;
      throw new ValidationError(`Invalid JSON in config file: ${configPath}`, [errorMessage(e)]);
    }
    if (!isPlainObject(parsed)) {
      if (!strict) return null;
      throw new ValidationError(`Config file must contain an object: ${configPath}`, ['root must be an object']);
    }
    return parsed;
  }

  private resolveLayerPaths(layer: Record<string, unknown>, baseDir: string): Record<string, unknown> {
    const out = { ...layer };
    for (const key of ['pluginsDir', 'settingsFile']) {
      const value = out[key];
      if (typeof value === 'string' && value.length > 0 && !isAbsolute(value)) {
        out[key] = resolve(baseDir, value);
      }
    }
    return out;
  }
}
