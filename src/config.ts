/**
 * Host configuration accessor with dot-path key support.
 *
 * This is process configuration (where modules live, timeouts, logging), not
 * the operator-editable settings owned by SettingsStore.
 */

import { existsSync, readFileSync } from 'node:fs';
import yaml from 'js-yaml';
import { ConfigError, ConfigNotFoundError } from './errors.js';
import { isMapping } from './utils/index.js';

export const DEFAULT_CONFIG: Readonly<Record<string, unknown>> = Object.freeze({
  modules: { dirs: ['./modules'] },
  settings: { file: './data/settings.yaml' },
  storage: { dir: './data/storage' },
  dependencies: { retries: 1 },
  dispatch: { handler_timeout: 5000 },
  lifecycle: { load_timeout: 30000 },
  logging: { level: 'info', format: 'text' },
});

function mergeDeep(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = result[key];
    result[key] = isMapping(current) && isMapping(value) ? mergeDeep(current, value) : value;
  }
  return result;
}

export class Config {
  private _data: Record<string, unknown>;

  constructor(data?: Record<string, unknown>) {
    this._data = data ?? {};
  }

  /**
   * Load a YAML config file, layered over DEFAULT_CONFIG.
   */
  static load(yamlPath: string): Config {
    if (!existsSync(yamlPath)) {
      throw new ConfigNotFoundError(yamlPath);
    }

    let parsed: unknown;
    try {
      parsed = yaml.load(readFileSync(yamlPath, 'utf-8'));
    } catch (e) {
      throw new ConfigError(`Invalid YAML in config file: ${yamlPath}`, { cause: e instanceof Error ? e : undefined });
    }

    if (parsed === null || parsed === undefined) return Config.withDefaults();
    if (!isMapping(parsed)) {
      throw new ConfigError(`Config file must be a YAML mapping: ${yamlPath}`);
    }
    return Config.withDefaults(parsed);
  }

  static withDefaults(overrides?: Record<string, unknown>): Config {
    return new Config(mergeDeep({ ...DEFAULT_CONFIG }, overrides ?? {}));
  }

  get(key: string, defaultValue?: unknown): unknown {
    const parts = key.split('.');
    let current: unknown = this._data;
    for (const part of parts) {
      if (isMapping(current) && part in current) {
        current = current[part];
      } else {
        return defaultValue;
      }
    }
    return current;
  }

  getNumber(key: string, defaultValue: number): number {
    const value = this.get(key);
    if (value === undefined) return defaultValue;
    if (typeof value !== 'number' || Number.isNaN(value)) {
      throw new ConfigError(`Config key '${key}' must be a number, got ${typeof value}`);
    }
    return value;
  }

  getString(key: string, defaultValue: string): string {
    const value = this.get(key);
    if (value === undefined) return defaultValue;
    if (typeof value !== 'string') {
      throw new ConfigError(`Config key '${key}' must be a string, got ${typeof value}`);
    }
    return value;
  }

  getStringList(key: string, defaultValue: string[]): string[] {
    const value = this.get(key);
    if (value === undefined) return defaultValue;
    if (typeof value === 'string') return [value];
    if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
      throw new ConfigError(`Config key '${key}' must be a list of strings`);
    }
    return value;
  }
}
