/**
 * DependencyResolver - computes and applies install plans against the shared
 * package environment.
 *
 * Every module's satisfied requirements are recorded as claims. A new
 * requirement is checked against the claims of all other modules on the same
 * package; the version installed for it must satisfy every claim at once.
 */

import { Mutex } from 'async-mutex';
import semver from 'semver';
import { DependencyConflictError, DependencyInstallError, toError } from '../errors.js';
import type { DependencySpecifier } from '../manifest/index.js';
import { silentLogger, type ContextLogger } from '../observability/index.js';
import type {
  DependencyClaim,
  DependencyResolverOptions,
  InstallPlan,
  InstallStep,
  PackageInstaller,
} from './types.js';

export class DependencyResolver {
  private readonly _installer: PackageInstaller;
  private readonly _retries: number;
  private readonly _logger: ContextLogger;
  private readonly _claims: Map<string, readonly DependencySpecifier[]> = new Map();
  private readonly _environmentLock = new Mutex();

  constructor(installer: PackageInstaller, options?: DependencyResolverOptions) {
    this._installer = installer;
    this._retries = Math.max(0, options?.retries ?? 1);
    this._logger = options?.logger ?? silentLogger();
  }

  /**
   * Claims other modules hold on `name`.
   */
  claimsOn(name: string, excludeModuleId?: string): DependencyClaim[] {
    const result: DependencyClaim[] = [];
    for (const [moduleId, specs] of this._claims) {
      if (moduleId === excludeModuleId) continue;
      for (const specifier of specs) {
        if (specifier.name === name) result.push({ moduleId, specifier });
      }
    }
    return result;
  }

  claimsOf(moduleId: string): readonly DependencySpecifier[] {
    return this._claims.get(moduleId) ?? [];
  }

  /**
   * Compute what installing `requirements` for `moduleId` would change.
   * Requirements already satisfied by the installed version are omitted, so
   * re-planning an unchanged requirement set gives an empty plan.
   */
  async plan(moduleId: string, requirements: readonly DependencySpecifier[]): Promise<InstallPlan> {
    const steps: InstallStep[] = [];

    for (const requirement of requirements) {
      const others = this.claimsOn(requirement.name, moduleId);
      for (const other of others) {
        if (!semver.intersects(requirement.range, other.specifier.range)) {
          throw new DependencyConflictError(
            moduleId,
            requirement.name,
            requirement.range,
            other.moduleId,
            other.specifier.range,
          );
        }
      }

      const ranges = [requirement.range, ...others.map((o) => o.specifier.range)];
      const installed = await this._installer.installedVersion(requirement.name);
      if (installed !== null && ranges.every((r) => semver.satisfies(installed, r))) {
        continue;
      }

      const available = await this._installer.availableVersions(requirement.name);
      const candidates = available.filter(
        (v) => semver.valid(v) !== null && ranges.every((r) => semver.satisfies(v, r)),
      );
      if (candidates.length === 0) {
        throw new DependencyInstallError(
          moduleId,
          requirement.name,
          `no available version satisfies ${ranges.map((r) => `'${r}'`).join(' and ')}`,
        );
      }
      const [version] = semver.rsort(candidates);
      steps.push({ name: requirement.name, version, previousVersion: installed, ranges });
    }

    return { moduleId, steps };
  }

  /**
   * Plan and apply under the environment lock, then record the claims.
   * Nothing is recorded when any step fails.
   */
  async ensure(moduleId: string, requirements: readonly DependencySpecifier[]): Promise<InstallPlan> {
    return this._environmentLock.runExclusive(async () => {
      const plan = await this.plan(moduleId, requirements);
      for (const step of plan.steps) {
        await this._install(moduleId, step);
      }
      this._claims.set(moduleId, [...requirements]);
      if (plan.steps.length > 0) {
        this._logger.info('Dependencies installed', {
          module_id: moduleId,
          packages: plan.steps.map((s) => `${s.name}@${s.version}`),
        });
      }
      return plan;
    });
  }

  /**
   * Drop a module's claims. Installed packages stay where they are.
   */
  release(moduleId: string): void {
    this._claims.delete(moduleId);
  }

  private async _install(moduleId: string, step: InstallStep): Promise<void> {
    let lastError: Error | null = null;
    for (let attempt = 0; attempt <= this._retries; attempt++) {
      try {
        await this._installer.install(step.name, step.version);
        return;
      } catch (e) {
        lastError = toError(e);
        this._logger.warn('Install attempt failed', {
          module_id: moduleId,
          package: `${step.name}@${step.version}`,
          attempt: attempt + 1,
          error: lastError,
        });
      }
    }
    throw new DependencyInstallError(moduleId, step.name, lastError?.message ?? 'install failed', {
      cause: lastError ?? undefined,
    });
  }
}
