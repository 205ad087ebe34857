/**
 * Entry resolution: turning a module's code into a ModuleEntry.
 *
 * All module code enters the process through an EntryLoader.
 */

import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { ModuleLoadError, toError } from '../errors.js';
import type { ModuleManifest } from '../manifest/index.js';
import type { EntryLoader, LifecycleHook, ModuleCandidate, ModuleEntry, ModuleFactory } from './types.js';

const HOOK_NAMES = ['onEnable', 'onDisable', 'onUnload'] as const;

function isHook(value: unknown): value is LifecycleHook {
  return typeof value === 'function';
}

function isFactory(value: ModuleEntry | ModuleFactory): value is ModuleFactory {
  return typeof value === 'function';
}

export function isModuleEntry(value: unknown): value is ModuleEntry {
  if (typeof value !== 'object' || value === null) return false;
  if (!('setup' in value) || typeof value.setup !== 'function') return false;
  const record: Record<string, unknown> = { ...value };
  return HOOK_NAMES.every((name) => record[name] === undefined || isHook(record[name]));
}

/**
 * Pick the entry out of an imported module namespace.
 *
 * Accepted shapes, in order: a default export that is an entry object, a
 * default export that is a setup function, or named `setup` (plus optional
 * `onEnable`, `onDisable`, `onUnload`) exports.
 */
export function toModuleEntry(moduleId: string, loaded: unknown): ModuleEntry {
  if (typeof loaded !== 'object' || loaded === null) {
    throw new ModuleLoadError(moduleId, 'entry file did not evaluate to a module');
  }
  const exports: Record<string, unknown> = { ...loaded };

  const fallback = exports['default'];
  if (isModuleEntry(fallback)) return fallback;
  if (isHook(fallback)) return { setup: fallback };

  const setup = exports['setup'];
  if (!isHook(setup)) {
    throw new ModuleLoadError(moduleId, 'entry exports neither a default entry nor a setup function');
  }
  const entry: ModuleEntry = { setup };
  const onEnable = exports['onEnable'];
  const onDisable = exports['onDisable'];
  const onUnload = exports['onUnload'];
  if (isHook(onEnable)) entry.onEnable = onEnable;
  if (isHook(onDisable)) entry.onDisable = onDisable;
  if (isHook(onUnload)) entry.onUnload = onUnload;
  return entry;
}

/**
 * Imports `<module dir>/<manifest.entry>`. Each load appends a fresh query
 * string to the file URL so a reload evaluates the file again instead of
 * reusing the cached module.
 */
export class FileEntryLoader implements EntryLoader {
  private _generation = 0;

  async load(candidate: ModuleCandidate, manifest: ModuleManifest): Promise<ModuleEntry> {
    if (candidate.directory === null) {
      throw new ModuleLoadError(candidate.id, `'${candidate.source}' has no directory to load an entry from`);
    }
    const filePath = resolve(candidate.directory, manifest.entry);
    if (!existsSync(filePath)) {
      throw new ModuleLoadError(candidate.id, `entry file not found: ${filePath}`);
    }

    this._generation += 1;
    const url = `${pathToFileURL(filePath).href}?v=${this._generation}`;
    let loaded: unknown;
    try {
      loaded = await import(url);
    } catch (e) {
      const error = toError(e);
      throw new ModuleLoadError(candidate.id, `failed to import ${filePath}: ${error.message}`, { cause: error });
    }
    return toModuleEntry(candidate.id, loaded);
  }
}

/**
 * Entries registered in code, keyed by module id. A factory is called on
 * every load, so reloads get a fresh instance; a plain entry object is
 * reused as is. Ids with no registration go to `fallback` when given.
 */
export class StaticEntryLoader implements EntryLoader {
  private readonly _entries: Map<string, ModuleEntry | ModuleFactory> = new Map();
  private readonly _fallback: EntryLoader | null;

  constructor(entries?: Record<string, ModuleEntry | ModuleFactory>, fallback?: EntryLoader | null) {
    for (const [id, entry] of Object.entries(entries ?? {})) {
      this._entries.set(id, entry);
    }
    this._fallback = fallback ?? null;
  }

  register(moduleId: string, entry: ModuleEntry | ModuleFactory): void {
    this._entries.set(moduleId, entry);
  }

  has(moduleId: string): boolean {
    return this._entries.has(moduleId);
  }

  async load(candidate: ModuleCandidate, manifest: ModuleManifest): Promise<ModuleEntry> {
    const registered = this._entries.get(candidate.id);
    if (registered === undefined) {
      if (this._fallback !== null) return this._fallback.load(candidate, manifest);
      throw new ModuleLoadError(candidate.id, 'no entry registered for this module');
    }
    if (!isFactory(registered)) return registered;

    let produced: unknown;
    try {
      produced = await registered();
    } catch (e) {
      const error = toError(e);
      throw new ModuleLoadError(candidate.id, `entry factory failed: ${error.message}`, { cause: error });
    }
    if (!isModuleEntry(produced)) {
      throw new ModuleLoadError(candidate.id, 'entry factory did not return an entry');
    }
    return produced;
  }
}
