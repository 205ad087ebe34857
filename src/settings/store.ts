/**
 * SettingsStore - the single writer of operator settings.
 *
 * Values live in one nested document mirroring the persisted YAML file.
 * Schema entries decide which paths in that document are declared; values
 * whose schema is gone (an unloaded module, a removed key) stay in the
 * document and are written back on save.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { isDeepStrictEqual } from 'node:util';
import yaml from 'js-yaml';
import {
  ReservedSettingsKeyError,
  SettingNotFoundError,
  SettingsValidationError,
  toError,
  type SettingsErrorDetail,
} from '../errors.js';
import { silentLogger, type ContextLogger } from '../observability/index.js';
import { deepCopy, isMapping } from '../utils/index.js';
import { parseSettingsSchema } from './schema.js';
import type {
  ObserveOptions,
  ScopedSettings,
  SettingObserver,
  SettingView,
  SettingsSchemaEntry,
} from './types.js';
import { validateSettingValue } from './validator.js';

/**
 * Host-level settings. Their top-level keys are reserved: no module may use
 * one as its namespace.
 */
export const HOST_SETTINGS: Readonly<Record<string, unknown>> = Object.freeze({
  token: {
    type: 'string',
    default: '',
    description: 'Chat platform bot token',
  },
  debug: {
    default: false,
    description: 'Verbose logging and extra diagnostics',
  },
  command_prefixes: {
    default: ['!'],
    minItems: 1,
    items: { type: 'string', minLength: 1 },
    description: 'Prefixes that mark a message as a command',
  },
  administrators: {
    type: 'array',
    default: [],
    items: { type: 'string', pattern: '^[0-9]+$' },
    description: 'User ids allowed to run administrative commands',
  },
  case_insensitive_prefix: {
    default: false,
    description: 'Match command prefixes without regard to case',
  },
  modules: {
    type: 'array',
    default: [],
    items: { type: 'string' },
    description: 'Ids of the modules loaded at start',
  },
});

export interface SettingsStoreOptions {
  /** YAML file backing the store; null keeps settings in memory only. */
  file?: string | null;
  logger?: ContextLogger;
}

interface ObserverRecord {
  observer: SettingObserver;
  alwaysTrigger: boolean;
}

type PathLookup =
  | { kind: 'found'; value: unknown }
  | { kind: 'missing' }
  | { kind: 'blocked'; at: string };

function lookup(document: Record<string, unknown>, keyPath: string): PathLookup {
  const parts = keyPath.split('.');
  let current: unknown = document;
  for (let i = 0; i < parts.length; i++) {
    if (!isMapping(current)) {
      return { kind: 'blocked', at: parts.slice(0, i).join('.') };
    }
    if (!Object.hasOwn(current, parts[i])) return { kind: 'missing' };
    current = current[parts[i]];
  }
  return { kind: 'found', value: current };
}

function assign(document: Record<string, unknown>, keyPath: string, value: unknown): void {
  const parts = keyPath.split('.');
  let current = document;
  for (const part of parts.slice(0, -1)) {
    const next = current[part];
    if (isMapping(next)) {
      current = next;
    } else {
      const group: Record<string, unknown> = {};
      current[part] = group;
      current = group;
    }
  }
  current[parts[parts.length - 1]] = value;
}

function inNamespace(keyPath: string, namespace: string): boolean {
  return keyPath === namespace || keyPath.startsWith(`${namespace}.`);
}

export class SettingsStore {
  private readonly _file: string | null;
  private readonly _logger: ContextLogger;
  private _document: Record<string, unknown> = {};
  private readonly _entries: Map<string, SettingsSchemaEntry> = new Map();
  private readonly _observers: Map<string, ObserverRecord[]> = new Map();
  private readonly _reserved: ReadonlySet<string>;

  constructor(options?: SettingsStoreOptions) {
    this._file = options?.file ?? null;
    this._logger = options?.logger ?? silentLogger();

    const hostEntries = parseSettingsSchema(null, HOST_SETTINGS);
    this._reserved = new Set(hostEntries.map((e) => e.keyPath.split('.')[0]));
    this._commit(null, hostEntries, this._document);
  }

  get file(): string | null {
    return this._file;
  }

  reservedKeys(): string[] {
    return [...this._reserved];
  }

  /**
   * Read the backing file. Every entry declared so far is checked against the
   * file's values; the store is unchanged when any of them fails.
   */
  load(): void {
    if (this._file === null || !existsSync(this._file)) return;

    let parsed: unknown;
    try {
      parsed = yaml.load(readFileSync(this._file, 'utf-8'));
    } catch (e) {
      throw new SettingsValidationError(`Invalid YAML in settings file: ${this._file}`, [], { cause: toError(e) });
    }
    if (parsed === null || parsed === undefined) parsed = {};
    if (!isMapping(parsed)) {
      throw new SettingsValidationError(`Settings file must be a YAML mapping: ${this._file}`);
    }

    const document = deepCopy(parsed);
    const errors = this._check([...this._entries.values()], document);
    if (errors.length > 0) {
      throw new SettingsValidationError(`Settings file ${this._file} does not match the declared schema`, errors);
    }
    for (const entry of this._entries.values()) {
      if (lookup(document, entry.keyPath).kind === 'missing') {
        assign(document, entry.keyPath, deepCopy(entry.default));
      }
    }
    this._document = document;
    this._logger.debug('Settings loaded', { file: this._file });
  }

  /**
   * Declare a module's settings. Persisted values are validated first and
   * every failure is reported together; nothing is committed unless all of
   * them pass. Missing values take their defaults. Entries the namespace
   * declared before are replaced.
   */
  merge(moduleId: string, entries: readonly SettingsSchemaEntry[]): void {
    if (this._reserved.has(moduleId)) {
      throw new ReservedSettingsKeyError(moduleId, moduleId);
    }
    const outside = entries.filter((e) => !e.keyPath.startsWith(`${moduleId}.`));
    if (outside.length > 0) {
      throw new SettingsValidationError(
        `Settings declared by '${moduleId}' must live under '${moduleId}.'`,
        outside.map((e) => ({ keyPath: e.keyPath, message: 'outside the module namespace' })),
      );
    }

    const errors = this._check(entries, this._document);
    if (errors.length > 0) {
      throw new SettingsValidationError(`Persisted settings of '${moduleId}' do not match its schema`, errors);
    }

    for (const keyPath of [...this._entries.keys()]) {
      if (inNamespace(keyPath, moduleId)) this._entries.delete(keyPath);
    }
    this._commit(moduleId, entries, this._document);
  }

  /**
   * Forget a module's schema and observers. Its values stay in the document.
   */
  release(moduleId: string): void {
    for (const keyPath of [...this._entries.keys()]) {
      if (inNamespace(keyPath, moduleId)) this._entries.delete(keyPath);
    }
    for (const keyPath of [...this._observers.keys()]) {
      if (inNamespace(keyPath, moduleId)) this._observers.delete(keyPath);
    }
  }

  has(keyPath: string): boolean {
    return this._entries.has(keyPath);
  }

  get(keyPath: string): unknown {
    this._entry(keyPath);
    const found = lookup(this._document, keyPath);
    return found.kind === 'found' ? deepCopy(found.value) : undefined;
  }

  set(keyPath: string, value: unknown): void {
    const entry = this._entry(keyPath);
    const errors = validateSettingValue(entry, value);
    if (errors.length > 0) {
      throw new SettingsValidationError(`Invalid value for setting '${keyPath}'`, errors);
    }
    const oldValue = this.get(keyPath);
    assign(this._document, keyPath, deepCopy(value));
    this._notify(keyPath, oldValue, deepCopy(value));
  }

  /**
   * Call `observer(old, new)` after every `set` of `keyPath`. Unless
   * `alwaysTrigger` is set, writes that leave the value unchanged are not
   * reported. Returns a function that removes the observer.
   */
  observe(keyPath: string, observer: SettingObserver, options?: ObserveOptions): () => void {
    this._entry(keyPath);
    const record: ObserverRecord = { observer, alwaysTrigger: options?.alwaysTrigger ?? false };
    const list = this._observers.get(keyPath) ?? [];
    list.push(record);
    this._observers.set(keyPath, list);
    return () => {
      const current = this._observers.get(keyPath);
      if (!current) return;
      const idx = current.indexOf(record);
      if (idx !== -1) current.splice(idx, 1);
    };
  }

  /**
   * Declared settings, in declaration order. With a prefix, only that
   * namespace or group.
   */
  entries(prefix?: string): SettingView[] {
    const views: SettingView[] = [];
    for (const entry of this._entries.values()) {
      if (prefix !== undefined && prefix !== '' && !inNamespace(entry.keyPath, prefix)) continue;
      views.push(Object.freeze({
        keyPath: entry.keyPath,
        type: entry.type,
        value: this.get(entry.keyPath),
        default: deepCopy(entry.default),
        description: entry.description,
        constraints: entry.constraints,
      }));
    }
    return views;
  }

  /**
   * Paths holding a value that no current schema declares.
   */
  undeclared(): string[] {
    const result: string[] = [];
    const visit = (node: Record<string, unknown>, prefix: string): void => {
      for (const [key, value] of Object.entries(node)) {
        const keyPath = prefix === '' ? key : `${prefix}.${key}`;
        if (this._entries.has(keyPath)) continue;
        if (isMapping(value)) {
          visit(value, keyPath);
        } else {
          result.push(keyPath);
        }
      }
    };
    visit(this._document, '');
    return result;
  }

  /**
   * Write the document to the backing file. Undeclared values are kept and
   * logged. Returns the path written, or null for an in-memory store.
   */
  save(): string | null {
    if (this._file === null) return null;
    for (const keyPath of this.undeclared()) {
      this._logger.warn('Setting is not declared in any schema', { key_path: keyPath });
    }
    mkdirSync(dirname(this._file), { recursive: true });
    writeFileSync(this._file, yaml.dump(this._document, { lineWidth: -1 }), 'utf-8');
    return this._file;
  }

  scoped(namespace: string): ScopedSettings {
    const full = (key: string): string => `${namespace}.${key}`;
    return Object.freeze({
      namespace,
      has: (key: string) => this.has(full(key)),
      get: (key: string) => this.get(full(key)),
      set: (key: string, value: unknown) => this.set(full(key), value),
      observe: (key: string, observer: SettingObserver, options?: ObserveOptions) =>
        this.observe(full(key), observer, options),
      entries: () => this.entries(namespace),
    });
  }

  private _entry(keyPath: string): SettingsSchemaEntry {
    const entry = this._entries.get(keyPath);
    if (!entry) throw new SettingNotFoundError(keyPath);
    return entry;
  }

  private _check(entries: readonly SettingsSchemaEntry[], document: Record<string, unknown>): SettingsErrorDetail[] {
    const errors: SettingsErrorDetail[] = [];
    for (const entry of entries) {
      const found = lookup(document, entry.keyPath);
      if (found.kind === 'blocked') {
        errors.push({ keyPath: entry.keyPath, message: `'${found.at}' holds a value, not a group` });
      } else if (found.kind === 'found') {
        errors.push(...validateSettingValue(entry, found.value));
      }
    }
    return errors;
  }

  private _commit(
    namespace: string | null,
    entries: readonly SettingsSchemaEntry[],
    document: Record<string, unknown>,
  ): void {
    for (const entry of entries) {
      this._entries.set(entry.keyPath, entry);
      if (lookup(document, entry.keyPath).kind === 'missing') {
        assign(document, entry.keyPath, deepCopy(entry.default));
      }
    }
    if (namespace !== null && entries.length > 0) {
      this._logger.debug('Settings merged', { module_id: namespace, count: entries.length });
    }
  }

  private _notify(keyPath: string, oldValue: unknown, newValue: unknown): void {
    const records = this._observers.get(keyPath);
    if (!records) return;
    const changed = !isDeepStrictEqual(oldValue, newValue);
    for (const record of [...records]) {
      if (!changed && !record.alwaysTrigger) continue;
      try {
        record.observer(oldValue, newValue);
      } catch (e) {
        this._logger.error('Settings observer failed', { key_path: keyPath, error: toError(e) });
      }
    }
  }
}
