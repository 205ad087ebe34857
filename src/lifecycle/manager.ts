/**
 * LifecycleManager - owns every module record and drives it through the
 * lifecycle state machine.
 *
 * Module failures never escape: they are recorded on the record, which moves
 * to `errored`. The one error that does propagate is InvalidTransitionError
 * from a disallowed state change, because it means the manager's bookkeeping
 * is wrong.
 *
 * Operations on one module id are serialised by that id's mutex. A call to
 * `unload` while a load or reload of the id is running cancels it first; the
 * pipeline notices at the next step boundary, so an install or settings
 * merge already under way always completes before the cleanup.
 */

import { Mutex } from 'async-mutex';
import { CancelToken } from '../cancel.js';
import type { DependencyResolver } from '../dependencies/index.js';
import type { GatewayClient } from '../dispatch/types.js';
import {
  ConfigNotFoundError,
  HostError,
  InvalidInputError,
  InvalidTransitionError,
  LifecycleCancelledError,
  ModuleNotFoundError,
  ModuleRuntimeError,
  ModuleTimeoutError,
  PermissionDeniedError,
  toError,
} from '../errors.js';
import { parseManifest, type ModuleManifest } from '../manifest/index.js';
import { silentLogger, type ContextLogger } from '../observability/index.js';
import type { PermissionTag } from '../permissions.js';
import { parseSettingsSchema, type SettingsStore } from '../settings/index.js';
import { withTimeout } from '../utils/index.js';
import { AutoApproveHandler, createPermissionRequest, type PermissionApprover } from './approval.js';
import { createModuleContext } from './context.js';
import { scanModuleDirectory } from './scanner.js';
import { canTransition, ModuleState } from './states.js';
import type {
  DiscoverResult,
  DispatchTarget,
  EntryLoader,
  EventHandler,
  LifecycleEventName,
  LoadAllResult,
  ModuleCandidate,
  ModuleContext,
  ModuleEntry,
  ModuleSnapshot,
  Subscription,
  TransitionEvent,
  TransitionListener,
} from './types.js';

export interface LifecycleManagerOptions {
  resolver: DependencyResolver;
  settings: SettingsStore;
  loader: EntryLoader;
  approver?: PermissionApprover;
  /** Root logger; the manager logs under `<name>.lifecycle`, modules under `<name>.<id>`. */
  logger?: ContextLogger;
  /** Limit for `setup` and each lifecycle hook, in ms; 0 disables it. */
  loadTimeout?: number;
  storageDir?: string;
  gateway?: () => GatewayClient | null;
}

interface ModuleRecord {
  readonly id: string;
  readonly candidate: ModuleCandidate;
  state: ModuleState;
  manifest: ModuleManifest | null;
  entry: ModuleEntry | null;
  context: ModuleContext | null;
  dependencies: ModuleManifest['requirements'];
  settingsKeys: string[];
  grantedPermissions: Set<PermissionTag>;
  subscriptions: Subscription[];
  lastError: Error | null;
  updatedAt: string;
}

type PipelineOutcome = 'enabled' | 'errored' | 'cancelled';

type HookName = 'onEnable' | 'onDisable' | 'onUnload';

const HOOK_PHASES: Record<HookName, string> = {
  onEnable: 'enable',
  onDisable: 'disable',
  onUnload: 'unload',
};

const UNLOADABLE: ReadonlySet<ModuleState> = new Set([
  ModuleState.Discovered,
  ModuleState.Enabled,
  ModuleState.Disabled,
  ModuleState.Errored,
]);

const RELOADABLE: ReadonlySet<ModuleState> = new Set([
  ModuleState.Enabled,
  ModuleState.Disabled,
  ModuleState.Errored,
]);

function newRecord(candidate: ModuleCandidate): ModuleRecord {
  return {
    id: candidate.id,
    candidate,
    state: ModuleState.Discovered,
    manifest: null,
    entry: null,
    context: null,
    dependencies: [],
    settingsKeys: [],
    grantedPermissions: new Set(),
    subscriptions: [],
    lastError: null,
    updatedAt: new Date().toISOString(),
  };
}

function snapshotOf(record: ModuleRecord): ModuleSnapshot {
  return Object.freeze({
    id: record.id,
    state: record.state,
    source: record.candidate.source,
    manifest: record.manifest,
    grantedPermissions: Object.freeze([...record.grantedPermissions].sort()),
    dependencies: Object.freeze([...record.dependencies]),
    settingsKeys: Object.freeze([...record.settingsKeys]),
    subscriptions: Object.freeze(record.subscriptions.map((s) => s.pattern)),
    lastError: record.lastError,
    updatedAt: record.updatedAt,
  });
}

export class LifecycleManager {
  private readonly _resolver: DependencyResolver;
  private readonly _settings: SettingsStore;
  private readonly _loader: EntryLoader;
  private readonly _approver: PermissionApprover;
  private readonly _rootLogger: ContextLogger;
  private readonly _logger: ContextLogger;
  private readonly _loadTimeout: number;
  private readonly _storageDir: string;
  private readonly _gateway: () => GatewayClient | null;

  // Insertion order is registration order; a reload swaps the value in place.
  private readonly _records: Map<string, ModuleRecord> = new Map();
  private readonly _locks: Map<string, Mutex> = new Map();
  private readonly _pending: Map<string, CancelToken> = new Map();
  private readonly _approved: Map<string, string> = new Map();
  private readonly _listeners: Record<LifecycleEventName, Set<TransitionListener>> = {
    transition: new Set(),
    subscription: new Set(),
  };

  constructor(options: LifecycleManagerOptions) {
    this._resolver = options.resolver;
    this._settings = options.settings;
    this._loader = options.loader;
    this._approver = options.approver ?? new AutoApproveHandler();
    this._rootLogger = options.logger ?? silentLogger();
    this._logger = this._rootLogger.child('lifecycle');
    this._loadTimeout = options.loadTimeout ?? 30000;
    this._storageDir = options.storageDir ?? './data/storage';
    this._gateway = options.gateway ?? (() => null);
  }

  /**
   * Register listeners. `transition` fires after every state change,
   * `subscription` whenever a module adds or removes an event handler.
   */
  on(event: LifecycleEventName, listener: TransitionListener): () => void {
    this._listeners[event].add(listener);
    return () => {
      this._listeners[event].delete(listener);
    };
  }

  // -- Registration --------------------------------------------------------

  /**
   * Scan module directories and register every new candidate. Ids that are
   * already registered are skipped and reported, never replaced.
   */
  discover(dirs: readonly string[]): DiscoverResult {
    const registered: string[] = [];
    const skipped: { id: string; source: string; reason: string }[] = [];

    for (const dir of dirs) {
      let candidates: ModuleCandidate[];
      try {
        candidates = scanModuleDirectory(dir, this._logger);
      } catch (e) {
        if (e instanceof ConfigNotFoundError) {
          this._logger.warn('Module directory not found', { path: dir });
          continue;
        }
        throw e;
      }

      for (const candidate of candidates) {
        const existing = this._records.get(candidate.id);
        if (existing) {
          const reason = `id already registered from ${existing.candidate.source}`;
          this._logger.warn('Skipping duplicate module', { module_id: candidate.id, source: candidate.source, reason });
          skipped.push({ id: candidate.id, source: candidate.source, reason });
          continue;
        }
        this._add(candidate);
        registered.push(candidate.id);
      }
    }
    return { registered, skipped };
  }

  register(candidate: ModuleCandidate): ModuleSnapshot {
    const existing = this._records.get(candidate.id);
    if (existing) {
      throw new InvalidInputError(
        `Module '${candidate.id}' is already registered from ${existing.candidate.source}`,
      );
    }
    return snapshotOf(this._add(candidate));
  }

  // -- Queries -------------------------------------------------------------

  has(moduleId: string): boolean {
    return this._records.has(moduleId);
  }

  get(moduleId: string): ModuleSnapshot {
    return snapshotOf(this._require(moduleId));
  }

  list(): ModuleSnapshot[] {
    return [...this._records.values()].map(snapshotOf);
  }

  /**
   * Enabled modules in registration order, as the dispatcher needs them.
   */
  dispatchView(): readonly DispatchTarget[] {
    const targets: DispatchTarget[] = [];
    for (const record of this._records.values()) {
      if (record.state !== ModuleState.Enabled) continue;
      targets.push(Object.freeze({
        moduleId: record.id,
        permissions: new Set(record.grantedPermissions),
        subscriptions: Object.freeze([...record.subscriptions]),
      }));
    }
    return Object.freeze(targets);
  }

  // -- Operations ----------------------------------------------------------

  /**
   * Run the load pipeline for a discovered or errored module. Resolves with
   * the resulting snapshot; module failures show up as `errored`, not as a
   * rejection.
   */
  async load(moduleId: string): Promise<ModuleSnapshot> {
    this._require(moduleId);
    return this._lock(moduleId).runExclusive(async () => {
      const record = this._require(moduleId);
      if (record.state !== ModuleState.Discovered && record.state !== ModuleState.Errored) {
        throw new InvalidTransitionError(moduleId, record.state, ModuleState.Validating);
      }
      const outcome = await this._runPipeline(record);
      if (outcome === 'cancelled') {
        this._records.delete(moduleId);
      }
      return snapshotOf(record);
    });
  }

  /**
   * Load an errored module again.
   */
  async retry(moduleId: string): Promise<ModuleSnapshot> {
    const record = this._require(moduleId);
    if (record.state !== ModuleState.Errored) {
      throw new InvalidTransitionError(moduleId, record.state, ModuleState.Validating);
    }
    return this.load(moduleId);
  }

  /**
   * Load every discovered module, one at a time, in registration order.
   * With `only`, modules not named there stay discovered.
   */
  async loadAll(only?: readonly string[]): Promise<LoadAllResult> {
    const enabled: string[] = [];
    const failed: { id: string; error: Error }[] = [];
    const wanted = only === undefined ? null : new Set(only);
    const ids = [...this._records.values()]
      .filter((r) => r.state === ModuleState.Discovered && (wanted === null || wanted.has(r.id)))
      .map((r) => r.id);

    for (const id of ids) {
      if (!this._records.has(id)) continue;
      const snapshot = await this.load(id);
      if (snapshot.state === ModuleState.Enabled) {
        enabled.push(id);
      } else if (snapshot.lastError !== null) {
        failed.push({ id, error: snapshot.lastError });
      }
    }
    this._logger.info('Modules loaded', { enabled: enabled.length, failed: failed.length });
    return { enabled, failed };
  }

  async enable(moduleId: string): Promise<ModuleSnapshot> {
    this._require(moduleId);
    return this._lock(moduleId).runExclusive(async () => {
      const record = this._require(moduleId);
      if (record.state !== ModuleState.Disabled) {
        throw new InvalidTransitionError(moduleId, record.state, ModuleState.Enabled);
      }
      const error = await this._callHook(record, 'onEnable');
      if (error !== null) {
        await this._teardown(record);
        record.lastError = error;
        this._transition(record, ModuleState.Errored, error);
      } else {
        this._transition(record, ModuleState.Enabled);
      }
      return snapshotOf(record);
    });
  }

  async disable(moduleId: string): Promise<ModuleSnapshot> {
    this._require(moduleId);
    return this._lock(moduleId).runExclusive(async () => {
      const record = this._require(moduleId);
      if (record.state !== ModuleState.Enabled) {
        throw new InvalidTransitionError(moduleId, record.state, ModuleState.Disabled);
      }
      this._transition(record, ModuleState.Disabled);
      await this._callHook(record, 'onDisable');
      return snapshotOf(record);
    });
  }

  /**
   * Tear a module down and forget it. A load or reload in progress is
   * cancelled first.
   */
  async unload(moduleId: string): Promise<void> {
    this._require(moduleId);
    this._pending.get(moduleId)?.cancel();

    await this._lock(moduleId).runExclusive(async () => {
      const record = this._records.get(moduleId);
      // Already gone: the cancelled load removed it.
      if (!record) return;
      if (!UNLOADABLE.has(record.state)) {
        throw new InvalidTransitionError(moduleId, record.state, ModuleState.Unloading);
      }
      await this._unloadRecord(record, ModuleState.Unloaded);
      this._records.delete(moduleId);
      this._approved.delete(moduleId);
      this._logger.info('Module unloaded', { module_id: moduleId });
    });
  }

  /**
   * Replace a module with a freshly loaded copy of itself. The old version is
   * fully torn down first and its slot waits in `reloading` until the new
   * one is `enabled` or `errored`. There is no rollback: a failed reload
   * leaves the module errored.
   */
  async reload(moduleId: string): Promise<ModuleSnapshot> {
    this._require(moduleId);
    return this._lock(moduleId).runExclusive(async () => {
      const old = this._require(moduleId);
      if (!RELOADABLE.has(old.state)) {
        throw new InvalidTransitionError(moduleId, old.state, ModuleState.Unloading);
      }
      await this._unloadRecord(old, ModuleState.Reloading);

      const draft = newRecord(old.candidate);
      const outcome = await this._runPipeline(draft);
      if (outcome === 'cancelled') {
        this._transition(old, ModuleState.Unloaded);
        this._records.delete(moduleId);
        return snapshotOf(draft);
      }

      this._records.set(moduleId, draft);
      this._emit('transition', {
        moduleId,
        from: ModuleState.Reloading,
        to: draft.state,
        error: draft.lastError,
      });
      this._logger.info('Module reloaded', { module_id: moduleId, state: draft.state });
      return snapshotOf(draft);
    });
  }

  /**
   * Unload every module, most recently registered first.
   */
  async shutdown(): Promise<void> {
    for (const moduleId of [...this._records.keys()].reverse()) {
      if (!this._records.has(moduleId)) continue;
      await this.unload(moduleId);
    }
  }

  // -- Internals -----------------------------------------------------------

  private _add(candidate: ModuleCandidate): ModuleRecord {
    const record = newRecord(candidate);
    this._records.set(record.id, record);
    this._emit('transition', { moduleId: record.id, from: null, to: record.state, error: null });
    return record;
  }

  private _require(moduleId: string): ModuleRecord {
    const record = this._records.get(moduleId);
    if (!record) throw new ModuleNotFoundError(moduleId);
    return record;
  }

  private _lock(moduleId: string): Mutex {
    let lock = this._locks.get(moduleId);
    if (!lock) {
      lock = new Mutex();
      this._locks.set(moduleId, lock);
    }
    return lock;
  }

  private _transition(record: ModuleRecord, to: ModuleState, error: Error | null = null): void {
    const from = record.state;
    if (!canTransition(from, to)) {
      throw new InvalidTransitionError(record.id, from, to);
    }
    record.state = to;
    record.updatedAt = new Date().toISOString();
    this._logger.debug('Module state changed', { module_id: record.id, from, to });
    this._emit('transition', { moduleId: record.id, from, to, error });
  }

  private _emit(event: LifecycleEventName, payload: TransitionEvent): void {
    for (const listener of [...this._listeners[event]]) {
      try {
        listener(payload);
      } catch (e) {
        this._logger.error('Lifecycle listener failed', { event, module_id: payload.moduleId, error: toError(e) });
      }
    }
  }

  private async _runPipeline(record: ModuleRecord): Promise<PipelineOutcome> {
    const moduleId = record.id;
    const token = new CancelToken(moduleId);
    this._pending.set(moduleId, token);
    let phase = 'validation';

    try {
      this._transition(record, ModuleState.Validating);
      const manifest = parseManifest(record.candidate.readManifest(), { expectedId: moduleId });
      record.manifest = manifest;
      await this._approve(manifest);
      record.grantedPermissions = new Set(manifest.permissions);
      token.check();

      phase = 'dependency resolution';
      this._transition(record, ModuleState.ResolvingDeps);
      await this._resolver.ensure(moduleId, manifest.requirements);
      record.dependencies = manifest.requirements;
      token.check();

      phase = 'settings merge';
      this._transition(record, ModuleState.MergingSettings);
      const entries = parseSettingsSchema(moduleId, record.candidate.readSettingsSchema());
      this._settings.merge(moduleId, entries);
      record.settingsKeys = entries.map((e) => e.keyPath);
      token.check();

      phase = 'setup';
      this._transition(record, ModuleState.Loading);
      const entry = await this._loader.load(record.candidate, manifest);
      const context = this._createContext(record, manifest);
      record.entry = entry;
      record.context = context;
      await withTimeout(
        () => entry.setup(context),
        this._loadTimeout,
        () => new ModuleTimeoutError(moduleId, 'setup', this._loadTimeout),
      );
      token.check();

      phase = 'enable';
      const hookError = await this._callHook(record, 'onEnable');
      if (hookError !== null) throw hookError;
      token.check();

      record.lastError = null;
      this._transition(record, ModuleState.Enabled);
      this._logger.info('Module enabled', { module_id: moduleId, version: manifest.version });
      return 'enabled';
    } catch (e) {
      if (e instanceof InvalidTransitionError) throw e;
      await this._teardown(record);

      if (e instanceof LifecycleCancelledError) {
        this._transition(record, ModuleState.Unloading);
        this._transition(record, ModuleState.Unloaded);
        this._logger.info('Pending load cancelled', { module_id: moduleId });
        return 'cancelled';
      }

      const error = e instanceof HostError ? e : new ModuleRuntimeError(moduleId, phase, toError(e));
      record.lastError = error;
      this._transition(record, ModuleState.Errored, error);
      this._logger.error('Module failed to load', { module_id: moduleId, phase, error });
      return 'errored';
    } finally {
      if (this._pending.get(moduleId) === token) this._pending.delete(moduleId);
    }
  }

  private async _approve(manifest: ModuleManifest): Promise<void> {
    if (manifest.permissions.length === 0) return;
    const key = manifest.permissions.join(',');
    if (this._approved.get(manifest.id) === key) return;

    const request = createPermissionRequest(manifest);
    this._logger.info('Requesting permission approval', {
      module_id: manifest.id,
      permissions: manifest.permissions,
    });
    const decision = await this._approver.requestApproval(request);
    if (decision.status !== 'approved') {
      throw new PermissionDeniedError(
        manifest.id,
        manifest.permissions.join(', '),
        decision.reason ?? 'not approved by the operator',
      );
    }
    this._approved.set(manifest.id, key);
  }

  private _createContext(record: ModuleRecord, manifest: ModuleManifest): ModuleContext {
    return createModuleContext({
      manifest,
      settings: this._settings.scoped(record.id),
      logger: this._rootLogger.forModule(record.id),
      storageDir: this._storageDir,
      granted: record.grantedPermissions,
      gateway: this._gateway,
      isActive: () => record.state === ModuleState.Loading || record.state === ModuleState.Enabled,
      subscribe: (pattern: string, handler: EventHandler) => this._subscribe(record, pattern, handler),
    });
  }

  private _subscribe(record: ModuleRecord, pattern: string, handler: EventHandler): () => void {
    const subscription: Subscription = Object.freeze({ pattern, handler });
    record.subscriptions.push(subscription);
    this._emit('subscription', { moduleId: record.id, from: record.state, to: record.state, error: null });
    return () => {
      const idx = record.subscriptions.indexOf(subscription);
      if (idx === -1) return;
      record.subscriptions.splice(idx, 1);
      this._emit('subscription', { moduleId: record.id, from: record.state, to: record.state, error: null });
    };
  }

  /**
   * Run a lifecycle hook under the load timeout. Failures are logged and
   * returned, never thrown.
   */
  private async _callHook(record: ModuleRecord, name: HookName): Promise<Error | null> {
    const entry = record.entry;
    const context = record.context;
    if (entry === null || context === null || entry[name] === undefined) return null;
    const phase = HOOK_PHASES[name];
    try {
      await withTimeout(
        () => entry[name]?.(context),
        this._loadTimeout,
        () => new ModuleTimeoutError(record.id, phase, this._loadTimeout),
      );
      return null;
    } catch (e) {
      const error = e instanceof HostError ? e : new ModuleRuntimeError(record.id, phase, toError(e));
      this._logger.error('Module hook failed', { module_id: record.id, phase, error });
      return error;
    }
  }

  /**
   * Release everything a record acquired: the module's own teardown hook,
   * event handlers, settings entries and dependency claims.
   */
  private async _teardown(record: ModuleRecord): Promise<void> {
    if (record.entry !== null) {
      await this._callHook(record, 'onUnload');
    }
    this._clearSubscriptions(record);
    this._settings.release(record.id);
    this._resolver.release(record.id);
    record.entry = null;
    record.context = null;
    record.dependencies = [];
    record.settingsKeys = [];
    record.grantedPermissions = new Set();
  }

  private async _unloadRecord(
    record: ModuleRecord,
    final: ModuleState.Unloaded | ModuleState.Reloading,
  ): Promise<void> {
    const wasEnabled = record.state === ModuleState.Enabled;
    this._transition(record, ModuleState.Unloading);
    if (wasEnabled) {
      await this._callHook(record, 'onDisable');
    }
    await this._teardown(record);
    this._transition(record, final);
  }

  private _clearSubscriptions(record: ModuleRecord): void {
    if (record.subscriptions.length === 0) return;
    record.subscriptions = [];
    this._emit('subscription', { moduleId: record.id, from: record.state, to: record.state, error: null });
  }
}
