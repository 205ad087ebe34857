export { dependencyPrefix, isWithin, NpmInstaller } from './installer.js';
export type { NpmInstallerOptions } from './installer.js';
export { DependencyResolver } from './resolver.js';
export type {
  DependencyClaim,
  DependencyResolverOptions,
  InstallPlan,
  InstallStep,
  PackageInstaller,
} from './types.js';
