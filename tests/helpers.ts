/**
 * Shared test fixtures and helpers.
 */

import type { PackageInstaller } from '../src/dependencies/types.js';
import { DependencyResolver } from '../src/dependencies/resolver.js';
import type { GatewayClient, GatewayListener, PlatformEvent } from '../src/dispatch/types.js';
import type { PermissionApprover } from '../src/lifecycle/approval.js';
import { StaticEntryLoader } from '../src/lifecycle/entry-point.js';
import { LifecycleManager } from '../src/lifecycle/manager.js';
import type { ModuleContext, ModuleEntry, ModuleFactory } from '../src/lifecycle/types.js';
import { ContextLogger, type LogLevel } from '../src/observability/context-logger.js';
import type { PermissionTag, PlatformAction } from '../src/permissions.js';
import { SettingsStore } from '../src/settings/store.js';
import { isMapping } from '../src/utils/index.js';

/**
 * Package environment kept in memory. `published` lists what can be
 * installed; `installs` records every install attempt in order.
 */
export class MemoryInstaller implements PackageInstaller {
  readonly installed: Map<string, string> = new Map();
  readonly installs: string[] = [];
  private readonly _published: Map<string, string[]>;
  private readonly _failures: Map<string, number> = new Map();
  private _hold: { gate: Promise<void>; started: () => void } | null = null;

  constructor(published: Record<string, string[]> = {}) {
    this._published = new Map(Object.entries(published));
  }

  failNext(name: string, times: number): void {
    this._failures.set(name, times);
  }

  /**
   * Make the next install wait for `gate`. Resolves once that install has
   * started.
   */
  holdNextInstall(gate: Promise<void>): Promise<void> {
    return new Promise((started) => {
      this._hold = { gate, started };
    });
  }

  async installedVersion(name: string): Promise<string | null> {
    return this.installed.get(name) ?? null;
  }

  async availableVersions(name: string): Promise<string[]> {
    return [...(this._published.get(name) ?? [])];
  }

  async install(name: string, version: string): Promise<void> {
    this.installs.push(`${name}@${version}`);
    const hold = this._hold;
    if (hold !== null) {
      this._hold = null;
      hold.started();
      await hold.gate;
    }
    const left = this._failures.get(name) ?? 0;
    if (left > 0) {
      this._failures.set(name, left - 1);
      throw new Error('registry unreachable');
    }
    if (!(this._published.get(name) ?? []).includes(version)) {
      throw new Error(`${name}@${version} is not published`);
    }
    this.installed.set(name, version);
  }
}

export class FakeGateway implements GatewayClient {
  readonly performed: { action: PlatformAction; payload: Record<string, unknown> }[] = [];
  /** Permissions the bot account holds; null means all of them. */
  botPermissions: Set<PermissionTag> | null = null;
  private readonly _listeners: Set<GatewayListener> = new Set();

  get listenerCount(): number {
    return this._listeners.size;
  }

  subscribe(listener: GatewayListener): () => void {
    this._listeners.add(listener);
    return () => {
      this._listeners.delete(listener);
    };
  }

  checkPermission(tag: PermissionTag): boolean {
    return this.botPermissions === null || this.botPermissions.has(tag);
  }

  async perform(action: PlatformAction, payload: Record<string, unknown>): Promise<unknown> {
    this.performed.push({ action, payload });
    return { ok: true };
  }

  emit(event: PlatformEvent): void {
    for (const listener of this._listeners) listener(event);
  }
}

export function platformEvent(
  category: string,
  requiredPermission: PermissionTag | null = null,
  payload: Record<string, unknown> = {},
): PlatformEvent {
  return { category, requiredPermission, payload };
}

/**
 * A logger writing JSON lines into memory. `entries()` lifts each line's
 * extra fields to the top level.
 */
export function bufferLogger(level: LogLevel = 'debug'): {
  logger: ContextLogger;
  lines: string[];
  entries: () => Record<string, unknown>[];
} {
  const lines: string[] = [];
  const logger = new ContextLogger({ format: 'json', level, output: { write: (s: string) => lines.push(s) } });
  const entries = (): Record<string, unknown>[] =>
    lines.map((line) => {
      const parsed: unknown = JSON.parse(line);
      if (!isMapping(parsed)) return {};
      const extra = parsed['extra'];
      return isMapping(extra) ? { ...parsed, ...extra } : { ...parsed };
    });
  return { logger, lines, entries };
}

/**
 * A decoded manifest document for `id` with the required fields filled in.
 */
export function manifestOf(id: string, fields: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    manifest_version: 1,
    module: { id, name: `${id} module`, version: '1.0.0', ...fields },
  };
}

/**
 * An entry that records which of its hooks ran, in order.
 */
export interface TrackingEntry extends ModuleEntry {
  readonly calls: string[];
  context: ModuleContext | null;
}

export function trackingEntry(overrides: Partial<ModuleEntry> = {}): TrackingEntry {
  const calls: string[] = [];
  const entry: TrackingEntry = {
    calls,
    context: null,
    setup(context: ModuleContext) {
      calls.push('setup');
      entry.context = context;
      return overrides.setup?.(context);
    },
    onEnable(context: ModuleContext) {
      calls.push('enable');
      return overrides.onEnable?.(context);
    },
    onDisable(context: ModuleContext) {
      calls.push('disable');
      return overrides.onDisable?.(context);
    },
    onUnload(context: ModuleContext) {
      calls.push('unload');
      return overrides.onUnload?.(context);
    },
  };
  return entry;
}

export interface Harness {
  installer: MemoryInstaller;
  settings: SettingsStore;
  resolver: DependencyResolver;
  loader: StaticEntryLoader;
  manager: LifecycleManager;
  gateway: FakeGateway;
}

export function createHarness(options?: {
  published?: Record<string, string[]>;
  entries?: Record<string, ModuleEntry | ModuleFactory>;
  approver?: PermissionApprover;
  loadTimeout?: number;
  storageDir?: string;
  logger?: ContextLogger;
}): Harness {
  const installer = new MemoryInstaller(options?.published);
  const settings = new SettingsStore();
  const resolver = new DependencyResolver(installer);
  const loader = new StaticEntryLoader(options?.entries);
  const gateway = new FakeGateway();
  const manager = new LifecycleManager({
    resolver,
    settings,
    loader,
    approver: options?.approver,
    loadTimeout: options?.loadTimeout ?? 1000,
    storageDir: options?.storageDir,
    logger: options?.logger,
    gateway: () => gateway,
  });
  return { installer, settings, resolver, loader, manager, gateway };
}

/**
 * A promise plus the functions that settle it.
 */
export function deferred<T = void>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
