/**
 * Module directory scanning.
 *
 * Each immediate sub-directory holding a `manifest.yaml` is one candidate;
 * its name is the module id the manifest must declare.
 */

import { existsSync, readdirSync, readFileSync, statSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { ConfigNotFoundError } from '../errors.js';
import type { ContextLogger } from '../observability/index.js';
import type { ModuleCandidate } from './types.js';

export const MANIFEST_FILE = 'manifest.yaml';
export const SETTINGS_SCHEMA_FILE = 'settings_schema.yaml';

const SKIP_DIR_NAMES = new Set(['node_modules']);

function isDirectory(p: string): boolean {
  try {
    return statSync(p).isDirectory();
  } catch {
    return false;
  }
}

export function directoryCandidate(directory: string): ModuleCandidate {
  const dir = resolve(directory);
  const id = dir.split(/[\\/]/).pop() ?? dir;
  return Object.freeze({
    id,
    source: dir,
    directory: dir,
    readManifest: () => readFileSync(join(dir, MANIFEST_FILE), 'utf-8'),
    readSettingsSchema: () => {
      const schemaPath = join(dir, SETTINGS_SCHEMA_FILE);
      return existsSync(schemaPath) ? readFileSync(schemaPath, 'utf-8') : null;
    },
  });
}

/**
 * Candidates under `root`, sorted by directory name.
 */
export function scanModuleDirectory(root: string, logger?: ContextLogger): ModuleCandidate[] {
  const rootResolved = resolve(root);
  if (!isDirectory(rootResolved)) {
    throw new ConfigNotFoundError(rootResolved);
  }

  const results: ModuleCandidate[] = [];
  for (const name of readdirSync(rootResolved).sort()) {
    if (name.startsWith('.') || SKIP_DIR_NAMES.has(name)) continue;
    const dir = join(rootResolved, name);
    if (!isDirectory(dir)) continue;
    if (!existsSync(join(dir, MANIFEST_FILE))) {
      logger?.debug('Skipping directory without a manifest', { path: dir });
      continue;
    }
    results.push(directoryCandidate(dir));
  }
  return results;
}

/**
 * A candidate whose manifest, settings schema and entry live in memory.
 * Pair it with a StaticEntryLoader.
 */
export function memoryCandidate(
  id: string,
  manifest: string | Record<string, unknown>,
  settingsSchema: unknown = null,
): ModuleCandidate {
  return Object.freeze({
    id,
    source: `memory:${id}`,
    directory: null,
    readManifest: () => manifest,
    readSettingsSchema: () => settingsSchema,
  });
}
