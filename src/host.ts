/**
 * Host - wires the components together and exposes the operator commands.
 *
 * Everything process-wide (settings, the dependency environment, module
 * records) belongs to one Host instance; nothing is kept in module-level
 * state.
 */

import { Config } from './config.js';
import {
  dependencyPrefix,
  DependencyResolver,
  isWithin,
  NpmInstaller,
  type PackageInstaller,
} from './dependencies/index.js';
import { EventDispatcher, type GatewayClient } from './dispatch/index.js';
import { InvalidInputError } from './errors.js';
import {
  createPermissionRequest,
  FileEntryLoader,
  LifecycleManager,
  ModuleState,
  type EntryLoader,
  type LoadAllResult,
  type ModuleCandidate,
  type ModuleSnapshot,
  type PermissionApprover,
} from './lifecycle/index.js';
import { ContextLogger } from './observability/index.js';
import { SettingsStore, type SettingView } from './settings/index.js';

export interface HostOptions {
  config?: Config;
  installer?: PackageInstaller;
  loader?: EntryLoader;
  approver?: PermissionApprover;
  logger?: ContextLogger;
  /** Overrides `settings.file`; null keeps settings in memory. */
  settingsFile?: string | null;
}

export interface StartOptions {
  gateway?: GatewayClient;
}

export interface ModuleDescription {
  readonly module: ModuleSnapshot;
  /** What the module asks to be allowed to do, as shown before approval. */
  readonly permissionDisclosure: string | null;
  readonly settings: readonly SettingView[];
}

export class Host {
  readonly config: Config;
  readonly logger: ContextLogger;
  readonly settings: SettingsStore;
  readonly resolver: DependencyResolver;
  readonly lifecycle: LifecycleManager;
  readonly dispatcher: EventDispatcher;
  private _gateway: GatewayClient | null = null;
  private _running = false;

  constructor(options?: HostOptions) {
    this.config = options?.config ?? Config.withDefaults();
    this.logger = options?.logger ?? ContextLogger.fromConfig(this.config);

    const settingsFile = options?.settingsFile !== undefined
      ? options.settingsFile
      : this.config.getString('settings.file', './data/settings.yaml');
    this.settings = new SettingsStore({ file: settingsFile, logger: this.logger.child('settings') });

    const installer = options?.installer ?? new NpmInstaller(this._dependencyPrefix());
    this.resolver = new DependencyResolver(installer, {
      retries: this.config.getNumber('dependencies.retries', 1),
      logger: this.logger.child('dependencies'),
    });

    this.lifecycle = new LifecycleManager({
      resolver: this.resolver,
      settings: this.settings,
      loader: options?.loader ?? new FileEntryLoader(),
      approver: options?.approver,
      logger: this.logger,
      loadTimeout: this.config.getNumber('lifecycle.load_timeout', 30000),
      storageDir: this.config.getString('storage.dir', './data/storage'),
      gateway: () => this._gateway,
    });

    this.dispatcher = new EventDispatcher(this.lifecycle, {
      handlerTimeout: this.config.getNumber('dispatch.handler_timeout', 5000),
      logger: this.logger.child('dispatch'),
    });
  }

  get running(): boolean {
    return this._running;
  }

  /**
   * Register a module that does not live in a module directory.
   * Call before `start()` to have it loaded with the rest.
   */
  registerModule(candidate: ModuleCandidate): ModuleSnapshot {
    return this.lifecycle.register(candidate);
  }

  /**
   * Load settings, discover modules, load the ones listed in the `modules`
   * setting, then start taking events from the gateway.
   */
  async start(options?: StartOptions): Promise<LoadAllResult> {
    if (this._running) {
      throw new InvalidInputError('Host is already running');
    }
    this.settings.load();
    const dirs = this.config.getStringList('modules.dirs', ['./modules']);
    const discovered = this.lifecycle.discover(dirs);
    this.logger.info('Modules discovered', {
      registered: discovered.registered.length,
      skipped: discovered.skipped.length,
    });

    this._gateway = options?.gateway ?? null;
    const result = await this.lifecycle.loadAll(this._listedModules());
    if (this._gateway !== null) {
      this.dispatcher.attach(this._gateway);
    }
    this._running = true;
    return result;
  }

  /**
   * Stop taking events, deliver what is queued, unload every module and
   * persist settings.
   */
  async stop(): Promise<void> {
    this.dispatcher.close();
    await this.dispatcher.drain();
    await this.lifecycle.shutdown();
    this.settings.save();
    this._gateway = null;
    this._running = false;
    this.logger.info('Host stopped');
  }

  // -- Operator commands ---------------------------------------------------

  listModules(): ModuleSnapshot[] {
    return this.lifecycle.list();
  }

  describeModule(moduleId: string): ModuleDescription {
    const snapshot = this.lifecycle.get(moduleId);
    return Object.freeze({
      module: snapshot,
      permissionDisclosure: snapshot.manifest === null ? null : createPermissionRequest(snapshot.manifest).disclosure,
      settings: this.settings.entries(moduleId),
    });
  }

  /**
   * Enable a module and add it to the `modules` setting. A module that was
   * discovered but never loaded is loaded first.
   */
  async enableModule(moduleId: string): Promise<ModuleSnapshot> {
    const current = this.lifecycle.get(moduleId);
    const snapshot = current.state === ModuleState.Discovered
      ? await this.lifecycle.load(moduleId)
      : await this.lifecycle.enable(moduleId);
    if (snapshot.state === ModuleState.Enabled) this._setListed(moduleId, true);
    return snapshot;
  }

  async disableModule(moduleId: string): Promise<ModuleSnapshot> {
    const snapshot = await this.lifecycle.disable(moduleId);
    this._setListed(moduleId, false);
    return snapshot;
  }

  reloadModule(moduleId: string): Promise<ModuleSnapshot> {
    return this.lifecycle.reload(moduleId);
  }

  async unloadModule(moduleId: string): Promise<void> {
    await this.lifecycle.unload(moduleId);
    this._setListed(moduleId, false);
  }

  retryModule(moduleId: string): Promise<ModuleSnapshot> {
    return this.lifecycle.retry(moduleId);
  }

  listSettings(prefix?: string): SettingView[] {
    return this.settings.entries(prefix);
  }

  getSetting(keyPath: string): unknown {
    return this.settings.get(keyPath);
  }

  setSetting(keyPath: string, value: unknown): void {
    this.settings.set(keyPath, value);
  }

  saveSettings(): string | null {
    return this.settings.save();
  }

  // -- Internals -----------------------------------------------------------

  /**
   * `dependencies.prefix` when configured, else the common ancestor of the
   * module directories. Module code cannot import from a prefix that is not
   * above it.
   */
  private _dependencyPrefix(): string {
    const dirs = this.config.getStringList('modules.dirs', ['./modules']);
    const configured = this.config.getString('dependencies.prefix', '');
    if (configured === '') return dependencyPrefix(dirs);
    for (const dir of dirs) {
      if (!isWithin(dir, configured)) {
        this.logger.warn('Module directory is outside the dependency prefix', { dir, prefix: configured });
      }
    }
    return configured;
  }

  /**
   * The `modules` setting with duplicates removed. The cleaned list is
   * written back; listed ids that were not discovered are logged.
   */
  private _listedModules(): string[] {
    const listed = this._readListed();
    const unique = [...new Set(listed)];
    if (unique.length !== listed.length) {
      this.logger.warn('Duplicate module entries removed from settings', { removed: listed.length - unique.length });
      this.settings.set('modules', unique);
    }
    for (const id of unique) {
      if (!this.lifecycle.has(id)) {
        this.logger.warn('Module enabled but not found', { module_id: id });
      }
    }
    return unique;
  }

  private _readListed(): string[] {
    const value = this.settings.get('modules');
    return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
  }

  private _setListed(moduleId: string, listed: boolean): void {
    const current = this._readListed();
    const has = current.includes(moduleId);
    if (listed && !has) {
      this.settings.set('modules', [...current, moduleId]);
    } else if (!listed && has) {
      this.settings.set('modules', current.filter((id) => id !== moduleId));
    }
  }
}
