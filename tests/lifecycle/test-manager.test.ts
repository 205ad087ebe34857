import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import yaml from 'js-yaml';
import { memoryCandidate } from '../../src/lifecycle/scanner.js';
import { ModuleState } from '../../src/lifecycle/states.js';
import {
  AlwaysDenyHandler,
  CallbackApprovalHandler,
  createPermissionDecision,
} from '../../src/lifecycle/approval.js';
import type { TransitionEvent } from '../../src/lifecycle/types.js';
import {
  DependencyConflictError,
  InvalidInputError,
  InvalidTransitionError,
  ManifestError,
  ModuleNotFoundError,
  ModuleRuntimeError,
  ModuleTimeoutError,
  PermissionDeniedError,
  ReservedSettingsKeyError,
} from '../../src/errors.js';
import { bufferLogger, createHarness, deferred, manifestOf, trackingEntry } from '../helpers.js';

function transitionsOf(events: TransitionEvent[], moduleId: string): string[] {
  return events.filter((e) => e.moduleId === moduleId).map((e) => `${e.from ?? '-'}>${e.to}`);
}

describe('LifecycleManager', () => {
  describe('load', () => {
    it('walks a module through the pipeline to enabled', async () => {
      const entry = trackingEntry();
      const h = createHarness({ entries: { greeter: entry } });
      const events: TransitionEvent[] = [];
      h.manager.on('transition', (e) => events.push(e));

      h.manager.register(memoryCandidate('greeter', manifestOf('greeter'), { greeting: 'hello' }));
      const snapshot = await h.manager.load('greeter');

      expect(snapshot.state).toBe(ModuleState.Enabled);
      expect(snapshot.lastError).toBeNull();
      expect(snapshot.settingsKeys).toEqual(['greeter.greeting']);
      expect(entry.calls).toEqual(['setup', 'enable']);
      expect(transitionsOf(events, 'greeter')).toEqual([
        '->discovered',
        'discovered>validating',
        'validating>resolving_deps',
        'resolving_deps>merging_settings',
        'merging_settings>loading',
        'loading>enabled',
      ]);
    });

    it('installs requirements and records them on the snapshot', async () => {
      const h = createHarness({ published: { chalk: ['4.1.2'] }, entries: { painter: trackingEntry() } });
      h.manager.register(memoryCandidate('painter', manifestOf('painter', { requirements: ['chalk@^4'] })));

      const snapshot = await h.manager.load('painter');
      expect(snapshot.dependencies.map((d) => d.name)).toEqual(['chalk']);
      expect(h.installer.installed.get('chalk')).toBe('4.1.2');
    });

    it('hands setup a working context', async () => {
      const entry = trackingEntry({
        setup: (context) => {
          context.subscribe('message.*', () => undefined);
          context.settings.set('greeting', 'hi');
        },
      });
      const h = createHarness({ entries: { greeter: entry } });
      h.manager.register(memoryCandidate('greeter', manifestOf('greeter', { permissions: ['read_messages'] }), { greeting: 'hello' }));

      const snapshot = await h.manager.load('greeter');
      expect(snapshot.subscriptions).toEqual(['message.*']);
      expect(snapshot.grantedPermissions).toEqual(['read_messages']);
      expect(h.settings.get('greeter.greeting')).toBe('hi');
      expect(entry.context?.moduleId).toBe('greeter');
    });

    it('records an invalid manifest as errored', async () => {
      const h = createHarness({ entries: { greeter: trackingEntry() } });
      h.manager.register(memoryCandidate('greeter', manifestOf('greeter', { version: 'soon' })));

      const snapshot = await h.manager.load('greeter');
      expect(snapshot.state).toBe(ModuleState.Errored);
      expect(snapshot.lastError).toBeInstanceOf(ManifestError);
    });

    it('requires the manifest id to match the candidate id', async () => {
      const h = createHarness();
      h.manager.register(memoryCandidate('weather', manifestOf('forecast')));
      const snapshot = await h.manager.load('weather');
      expect(snapshot.lastError?.message).toBe(
        "Invalid manifest field 'module.id': 'forecast' does not match the module directory 'weather'",
      );
    });

    it('asks for approval before installing anything', async () => {
      const h = createHarness({
        published: { chalk: ['4.1.2'] },
        entries: { painter: trackingEntry() },
        approver: new AlwaysDenyHandler(),
      });
      h.manager.register(
        memoryCandidate('painter', manifestOf('painter', { requirements: ['chalk'], permissions: ['send_messages'] })),
      );

      const snapshot = await h.manager.load('painter');
      expect(snapshot.lastError).toBeInstanceOf(PermissionDeniedError);
      expect(snapshot.lastError?.message).toBe(
        "Module 'painter' is not permitted to use 'send_messages': Always denied",
      );
      expect(h.installer.installs).toEqual([]);
    });

    it('does not ask about modules without permissions', async () => {
      const h = createHarness({ entries: { greeter: trackingEntry() }, approver: new AlwaysDenyHandler() });
      h.manager.register(memoryCandidate('greeter', manifestOf('greeter')));
      expect((await h.manager.load('greeter')).state).toBe(ModuleState.Enabled);
    });

    it('rejects a namespace reserved by the host before loading code', async () => {
      const entry = trackingEntry();
      const h = createHarness({ published: { chalk: ['4.1.2'] }, entries: { debug: entry } });
      h.manager.register(
        memoryCandidate('debug', manifestOf('debug', { requirements: ['chalk'] }), { verbose: true }),
      );

      const snapshot = await h.manager.load('debug');
      expect(snapshot.state).toBe(ModuleState.Errored);
      expect(snapshot.lastError).toBeInstanceOf(ReservedSettingsKeyError);
      expect(entry.calls).toEqual([]);
      expect(h.resolver.claimsOf('debug')).toEqual([]);
    });

    it('isolates a dependency conflict to the module that caused it', async () => {
      const h = createHarness({
        published: { lib: ['1.5.0', '2.5.0'] },
        entries: { a: trackingEntry(), b: trackingEntry() },
      });
      h.manager.register(memoryCandidate('a', manifestOf('a', { requirements: ['lib<2.0'] })));
      h.manager.register(memoryCandidate('b', manifestOf('b', { requirements: ['lib>=2.0'] })));

      await h.manager.load('a');
      const b = await h.manager.load('b');

      expect(b.state).toBe(ModuleState.Errored);
      expect(b.lastError).toBeInstanceOf(DependencyConflictError);
      expect(h.manager.get('a').state).toBe(ModuleState.Enabled);
      expect(h.installer.installed.get('lib')).toBe('1.5.0');
    });

    it('tears down after setup throws', async () => {
      const entry = trackingEntry({
        setup: () => {
          throw new Error('boom');
        },
      });
      const h = createHarness({ entries: { greeter: entry } });
      h.manager.register(memoryCandidate('greeter', manifestOf('greeter'), { greeting: 'hello' }));

      const snapshot = await h.manager.load('greeter');
      expect(snapshot.state).toBe(ModuleState.Errored);
      expect(snapshot.lastError).toBeInstanceOf(ModuleRuntimeError);
      expect(snapshot.lastError?.message).toBe("Module 'greeter' raised during setup: boom");
      expect(entry.calls).toEqual(['setup', 'unload']);
      expect(snapshot.settingsKeys).toEqual([]);
      expect(h.settings.has('greeter.greeting')).toBe(false);
    });

    it('times out a setup that never finishes', async () => {
      const entry = trackingEntry({ setup: () => new Promise(() => undefined) });
      const h = createHarness({ entries: { slow: entry }, loadTimeout: 20 });
      h.manager.register(memoryCandidate('slow', manifestOf('slow')));

      const snapshot = await h.manager.load('slow');
      expect(snapshot.lastError).toBeInstanceOf(ModuleTimeoutError);
      expect(snapshot.lastError?.message).toBe("Module 'slow' timed out during setup after 20ms");
    });

    it('errors when onEnable throws', async () => {
      const entry = trackingEntry({
        onEnable: () => {
          throw new Error('no');
        },
      });
      const h = createHarness({ entries: { greeter: entry } });
      h.manager.register(memoryCandidate('greeter', manifestOf('greeter')));

      const snapshot = await h.manager.load('greeter');
      expect(snapshot.state).toBe(ModuleState.Errored);
      expect(snapshot.lastError?.message).toBe("Module 'greeter' raised during enable: no");
      expect(entry.calls).toEqual(['setup', 'enable', 'unload']);
    });

    it('refuses to load an enabled module', async () => {
      const h = createHarness({ entries: { greeter: trackingEntry() } });
      h.manager.register(memoryCandidate('greeter', manifestOf('greeter')));
      await h.manager.load('greeter');
      await expect(h.manager.load('greeter')).rejects.toThrow(InvalidTransitionError);
    });

    it('raises for unknown ids', async () => {
      const h = createHarness();
      await expect(h.manager.load('ghost')).rejects.toThrow(ModuleNotFoundError);
      expect(() => h.manager.get('ghost')).toThrow(ModuleNotFoundError);
    });
  });

  describe('retry', () => {
    it('loads an errored module again', async () => {
      let attempts = 0;
      const h = createHarness({
        entries: {
          flaky: () =>
            trackingEntry({
              setup: () => {
                attempts += 1;
                if (attempts === 1) throw new Error('not yet');
              },
            }),
        },
      });
      h.manager.register(memoryCandidate('flaky', manifestOf('flaky')));

      expect((await h.manager.load('flaky')).state).toBe(ModuleState.Errored);
      const snapshot = await h.manager.retry('flaky');
      expect(snapshot.state).toBe(ModuleState.Enabled);
      expect(snapshot.lastError).toBeNull();
    });

    it('only applies to errored modules', async () => {
      const h = createHarness({ entries: { greeter: trackingEntry() } });
      h.manager.register(memoryCandidate('greeter', manifestOf('greeter')));
      await expect(h.manager.retry('greeter')).rejects.toThrow(InvalidTransitionError);
    });
  });

  describe('enable and disable', () => {
    it('toggles without re-resolving or re-running setup', async () => {
      const entry = trackingEntry();
      const h = createHarness({ published: { chalk: ['4.1.2'] }, entries: { painter: entry } });
      h.manager.register(memoryCandidate('painter', manifestOf('painter', { requirements: ['chalk'] })));
      await h.manager.load('painter');

      const disabled = await h.manager.disable('painter');
      expect(disabled.state).toBe(ModuleState.Disabled);
      expect(h.manager.dispatchView()).toEqual([]);

      const enabled = await h.manager.enable('painter');
      expect(enabled.state).toBe(ModuleState.Enabled);
      expect(entry.calls).toEqual(['setup', 'enable', 'disable', 'enable']);
      expect(h.installer.installs).toEqual(['chalk@4.1.2']);
    });

    it('refuses transitions from the wrong state', async () => {
      const h = createHarness({ entries: { greeter: trackingEntry() } });
      h.manager.register(memoryCandidate('greeter', manifestOf('greeter')));
      await expect(h.manager.enable('greeter')).rejects.toThrow(
        "Module 'greeter' cannot move from 'discovered' to 'enabled'",
      );
      await h.manager.load('greeter');
      await expect(h.manager.enable('greeter')).rejects.toThrow(InvalidTransitionError);
      await h.manager.disable('greeter');
      await expect(h.manager.disable('greeter')).rejects.toThrow(InvalidTransitionError);
    });

    it('errors a module whose onEnable fails on re-enable', async () => {
      let enables = 0;
      const entry = trackingEntry({
        onEnable: () => {
          enables += 1;
          if (enables > 1) throw new Error('stuck');
        },
      });
      const h = createHarness({ entries: { greeter: entry } });
      h.manager.register(memoryCandidate('greeter', manifestOf('greeter')));
      await h.manager.load('greeter');
      await h.manager.disable('greeter');

      const snapshot = await h.manager.enable('greeter');
      expect(snapshot.state).toBe(ModuleState.Errored);
      expect(entry.calls).toEqual(['setup', 'enable', 'disable', 'enable', 'unload']);
    });
  });

  describe('unload', () => {
    it('tears down and forgets the module', async () => {
      const entry = trackingEntry();
      const h = createHarness({ published: { chalk: ['4.1.2'] }, entries: { painter: entry } });
      h.manager.register(memoryCandidate('painter', manifestOf('painter', { requirements: ['chalk'] }), { colour: 'red' }));
      await h.manager.load('painter');

      await h.manager.unload('painter');
      expect(entry.calls).toEqual(['setup', 'enable', 'disable', 'unload']);
      expect(h.manager.has('painter')).toBe(false);
      expect(h.resolver.claimsOf('painter')).toEqual([]);
      expect(h.settings.has('painter.colour')).toBe(false);
    });

    it('unloads a module that was never loaded', async () => {
      const h = createHarness();
      const events: TransitionEvent[] = [];
      h.manager.on('transition', (e) => events.push(e));
      h.manager.register(memoryCandidate('greeter', manifestOf('greeter')));

      await h.manager.unload('greeter');
      expect(transitionsOf(events, 'greeter')).toEqual([
        '->discovered',
        'discovered>unloading',
        'unloading>unloaded',
      ]);
    });

    it('cancels a load in progress', async () => {
      const entered = deferred();
      const gate = deferred();
      const entry = trackingEntry({
        setup: async () => {
          entered.resolve();
          await gate.promise;
        },
      });
      const h = createHarness({ entries: { slow: entry } });
      h.manager.register(memoryCandidate('slow', manifestOf('slow')));

      const loading = h.manager.load('slow');
      await entered.promise;
      const unloading = h.manager.unload('slow');
      gate.resolve();

      const snapshot = await loading;
      await unloading;
      expect(snapshot.state).toBe(ModuleState.Unloaded);
      expect(entry.calls).toEqual(['setup', 'unload']);
      expect(h.manager.has('slow')).toBe(false);
    });

    it('lets an install in progress finish before cancelling', async () => {
      const gate = deferred();
      const entry = trackingEntry();
      const h = createHarness({ published: { lib: ['1.0.0'] }, entries: { deps: entry } });
      const events: TransitionEvent[] = [];
      h.manager.on('transition', (e) => events.push(e));
      h.manager.register(memoryCandidate('deps', manifestOf('deps', { requirements: ['lib>=1.0'] })));
      const started = h.installer.holdNextInstall(gate.promise);

      const loading = h.manager.load('deps');
      await started;
      const unloading = h.manager.unload('deps');
      await Promise.resolve();
      expect(h.manager.get('deps').state).toBe(ModuleState.ResolvingDeps);
      expect(h.installer.installed.has('lib')).toBe(false);

      gate.resolve();
      const snapshot = await loading;
      await unloading;
      expect(snapshot.state).toBe(ModuleState.Unloaded);
      expect(h.installer.installed.get('lib')).toBe('1.0.0');
      expect(h.resolver.claimsOf('deps')).toEqual([]);
      expect(entry.calls).toEqual([]);
      expect(h.manager.has('deps')).toBe(false);
      expect(transitionsOf(events, 'deps')).toEqual([
        '->discovered',
        'discovered>validating',
        'validating>resolving_deps',
        'resolving_deps>unloading',
        'unloading>unloaded',
      ]);
    });
  });

  describe('reload', () => {
    it('discards a pending reload when the module is unloaded', async () => {
      const entered = deferred();
      const gate = deferred();
      const built: ReturnType<typeof trackingEntry>[] = [];
      const h = createHarness({
        entries: {
          r: () => {
            const entry = trackingEntry(
              built.length === 0
                ? {}
                : {
                    setup: async () => {
                      entered.resolve();
                      await gate.promise;
                    },
                  },
            );
            built.push(entry);
            return entry;
          },
        },
      });
      h.manager.register(memoryCandidate('r', manifestOf('r'), { level: 1 }));
      await h.manager.load('r');

      const reloading = h.manager.reload('r');
      await entered.promise;
      expect(h.manager.get('r').state).toBe(ModuleState.Reloading);
      const unloading = h.manager.unload('r');
      gate.resolve();

      const snapshot = await reloading;
      await unloading;
      expect(snapshot.state).toBe(ModuleState.Unloaded);
      expect(built[0]?.calls).toEqual(['setup', 'enable', 'disable', 'unload']);
      expect(built[1]?.calls).toEqual(['setup', 'unload']);
      expect(h.manager.has('r')).toBe(false);
      expect(h.settings.has('r.level')).toBe(false);
    });

    it('replaces the module with a fresh instance', async () => {
      const built: ReturnType<typeof trackingEntry>[] = [];
      const h = createHarness({
        entries: {
          greeter: () => {
            const entry = trackingEntry();
            built.push(entry);
            return entry;
          },
        },
      });
      const events: TransitionEvent[] = [];
      h.manager.register(memoryCandidate('greeter', manifestOf('greeter')));
      await h.manager.load('greeter');
      h.manager.on('transition', (e) => events.push(e));

      const snapshot = await h.manager.reload('greeter');
      expect(snapshot.state).toBe(ModuleState.Enabled);
      expect(built).toHaveLength(2);
      expect(built[0]?.calls).toEqual(['setup', 'enable', 'disable', 'unload']);
      expect(built[1]?.calls).toEqual(['setup', 'enable']);
      expect(transitionsOf(events, 'greeter')).toEqual([
        'enabled>unloading',
        'unloading>reloading',
        'discovered>validating',
        'validating>resolving_deps',
        'resolving_deps>merging_settings',
        'merging_settings>loading',
        'loading>enabled',
        'reloading>enabled',
      ]);
    });

    it('leaves the module errored when the new version fails', async () => {
      let builds = 0;
      const first = trackingEntry();
      const h = createHarness({
        entries: {
          greeter: () => {
            builds += 1;
            if (builds === 1) return first;
            return trackingEntry({
              setup: () => {
                throw new Error('broken release');
              },
            });
          },
        },
      });
      h.manager.register(memoryCandidate('greeter', manifestOf('greeter')));
      await h.manager.load('greeter');

      const snapshot = await h.manager.reload('greeter');
      expect(snapshot.state).toBe(ModuleState.Errored);
      expect(first.calls).toEqual(['setup', 'enable', 'disable', 'unload']);
      expect(h.manager.get('greeter').state).toBe(ModuleState.Errored);
      expect(h.manager.dispatchView()).toEqual([]);
    });

    it('does not ask again for an unchanged permission set', async () => {
      let asked = 0;
      const approver = new CallbackApprovalHandler(async () => {
        asked += 1;
        return createPermissionDecision({ status: 'approved', approvedBy: 'operator' });
      });
      const h = createHarness({ entries: { greeter: trackingEntry() }, approver });
      h.manager.register(memoryCandidate('greeter', manifestOf('greeter', { permissions: ['send_messages'] })));

      await h.manager.load('greeter');
      await h.manager.reload('greeter');
      expect(asked).toBe(1);

      await h.manager.unload('greeter');
      h.manager.register(memoryCandidate('greeter', manifestOf('greeter', { permissions: ['send_messages'] })));
      await h.manager.load('greeter');
      expect(asked).toBe(2);
    });

    it('refuses modules that were never loaded', async () => {
      const h = createHarness();
      h.manager.register(memoryCandidate('greeter', manifestOf('greeter')));
      await expect(h.manager.reload('greeter')).rejects.toThrow(InvalidTransitionError);
    });
  });

  describe('registration and discovery', () => {
    let root: string;

    beforeEach(() => {
      root = mkdtempSync(join(tmpdir(), 'manager-test-'));
    });

    afterEach(() => {
      rmSync(root, { recursive: true, force: true });
    });

    function writeModule(dir: string, id: string): void {
      mkdirSync(join(root, dir, id), { recursive: true });
      writeFileSync(join(root, dir, id, 'manifest.yaml'), yaml.dump(manifestOf(id)));
    }

    it('rejects a second registration of the same id', () => {
      const h = createHarness();
      h.manager.register(memoryCandidate('greeter', manifestOf('greeter')));
      expect(() => h.manager.register(memoryCandidate('greeter', manifestOf('greeter')))).toThrow(InvalidInputError);
    });

    it('keeps the first directory that provides an id', () => {
      writeModule('core', 'greeter');
      writeModule('extra', 'greeter');
      writeModule('extra', 'weather');
      const h = createHarness();

      const result = h.manager.discover([join(root, 'core'), join(root, 'extra')]);
      expect(result.registered).toEqual(['greeter', 'weather']);
      expect(result.skipped).toEqual([
        {
          id: 'greeter',
          source: join(root, 'extra', 'greeter'),
          reason: `id already registered from ${join(root, 'core', 'greeter')}`,
        },
      ]);
      expect(h.manager.get('greeter').source).toBe(join(root, 'core', 'greeter'));
    });

    it('warns about a missing module directory', () => {
      const { logger, entries } = bufferLogger();
      const h = createHarness({ logger });
      const result = h.manager.discover([join(root, 'missing')]);
      expect(result.registered).toEqual([]);
      expect(entries().some((e) => e['message'] === 'Module directory not found')).toBe(true);
    });
  });

  describe('loadAll and shutdown', () => {
    it('loads everything and reports failures without stopping', async () => {
      const h = createHarness({
        entries: {
          a: trackingEntry(),
          b: trackingEntry({
            setup: () => {
              throw new Error('bad');
            },
          }),
          c: trackingEntry(),
        },
      });
      for (const id of ['a', 'b', 'c']) h.manager.register(memoryCandidate(id, manifestOf(id)));

      const result = await h.manager.loadAll();
      expect(result.enabled).toEqual(['a', 'c']);
      expect(result.failed.map((f) => f.id)).toEqual(['b']);
      expect(h.manager.list().map((s) => s.state)).toEqual([
        ModuleState.Enabled,
        ModuleState.Errored,
        ModuleState.Enabled,
      ]);
    });

    it('unloads modules in reverse registration order', async () => {
      const order: string[] = [];
      const entryFor = (id: string) =>
        trackingEntry({
          onUnload: () => {
            order.push(id);
          },
        });
      const h = createHarness({ entries: { a: entryFor('a'), b: entryFor('b') } });
      h.manager.register(memoryCandidate('a', manifestOf('a')));
      h.manager.register(memoryCandidate('b', manifestOf('b')));
      await h.manager.loadAll();

      await h.manager.shutdown();
      expect(order).toEqual(['b', 'a']);
      expect(h.manager.list()).toEqual([]);
    });
  });

  describe('dispatchView and listeners', () => {
    it('lists enabled modules with their subscriptions', async () => {
      const h = createHarness({
        entries: {
          greeter: trackingEntry({
            setup: (context) => {
              context.subscribe('message.create', () => undefined);
            },
          }),
        },
      });
      h.manager.register(memoryCandidate('greeter', manifestOf('greeter', { permissions: ['read_messages'] })));
      await h.manager.load('greeter');

      const [target] = h.manager.dispatchView();
      expect(target?.moduleId).toBe('greeter');
      expect(target?.subscriptions.map((s) => s.pattern)).toEqual(['message.create']);
      expect([...(target?.permissions ?? [])]).toEqual(['read_messages']);
    });

    it('announces subscription changes', async () => {
      let unsubscribe: () => void = () => undefined;
      const h = createHarness({
        entries: {
          greeter: trackingEntry({
            setup: (context) => {
              unsubscribe = context.subscribe('message.*', () => undefined);
            },
          }),
        },
      });
      const seen: string[] = [];
      h.manager.on('subscription', (e) => seen.push(e.moduleId));
      h.manager.register(memoryCandidate('greeter', manifestOf('greeter')));
      await h.manager.load('greeter');

      unsubscribe();
      expect(seen).toEqual(['greeter', 'greeter']);
      expect(h.manager.get('greeter').subscriptions).toEqual([]);
    });

    it('logs a listener that throws and carries on', async () => {
      const { logger, entries } = bufferLogger();
      const h = createHarness({ entries: { greeter: trackingEntry() }, logger });
      h.manager.on('transition', () => {
        throw new Error('listener broke');
      });
      h.manager.register(memoryCandidate('greeter', manifestOf('greeter')));

      expect((await h.manager.load('greeter')).state).toBe(ModuleState.Enabled);
      expect(entries().filter((e) => e['message'] === 'Lifecycle listener failed').length).toBeGreaterThan(0);
    });
  });
});
