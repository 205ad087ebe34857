/**
 * PackageInstaller backed by the npm CLI.
 *
 * Packages go into `<prefix>/node_modules` and are recorded in
 * `<prefix>/package.json`; npm prunes anything a later install finds
 * unrecorded. Module code only resolves bare imports from `node_modules`
 * directories above it, so the prefix must be an ancestor of every module
 * directory (see `dependencyPrefix`).
 */

import { spawn } from 'node:child_process';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, join, parse, resolve, sep } from 'node:path';
import { isMapping } from '../utils/index.js';
import type { PackageInstaller } from './types.js';

/**
 * The deepest directory containing every one of `dirs`. For a single module
 * directory that is the directory itself.
 */
export function dependencyPrefix(dirs: readonly string[]): string {
  const resolved = dirs.map((d) => resolve(d));
  if (resolved.length === 0) return resolve('.');
  let prefix = resolved[0];
  for (const dir of resolved.slice(1)) {
    while (!isWithin(dir, prefix)) {
      const parent = dirname(prefix);
      if (parent === prefix) return parse(prefix).root;
      prefix = parent;
    }
  }
  return prefix;
}

/**
 * Whether `path` is `ancestor` or lies below it.
 */
export function isWithin(path: string, ancestor: string): boolean {
  const p = resolve(path);
  const a = resolve(ancestor);
  if (p === a) return true;
  return p.startsWith(a.endsWith(sep) ? a : `${a}${sep}`);
}

export interface NpmInstallerOptions {
  /** Executable to run; defaults to `npm`. */
  command?: string;
  timeoutMs?: number;
}

interface RunResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export class NpmInstaller implements PackageInstaller {
  private readonly _prefix: string;
  private readonly _command: string;
  private readonly _timeoutMs: number | undefined;

  constructor(prefix: string, options?: NpmInstallerOptions) {
    this._prefix = resolve(prefix);
    this._command = options?.command ?? 'npm';
    this._timeoutMs = options?.timeoutMs;
  }

  get prefix(): string {
    return this._prefix;
  }

  async installedVersion(name: string): Promise<string | null> {
    const manifestPath = join(this._prefix, 'node_modules', name, 'package.json');
    if (!existsSync(manifestPath)) return null;
    const parsed: unknown = JSON.parse(readFileSync(manifestPath, 'utf-8'));
    if (isMapping(parsed) && typeof parsed['version'] === 'string') {
      return parsed['version'];
    }
    return null;
  }

  async availableVersions(name: string): Promise<string[]> {
    const result = await this._run(['view', name, 'versions', '--json']);
    if (result.exitCode !== 0) {
      throw new Error(`npm view ${name} exited with ${result.exitCode}: ${result.stderr.trim()}`);
    }
    const parsed: unknown = JSON.parse(result.stdout);
    if (typeof parsed === 'string') return [parsed];
    if (Array.isArray(parsed)) {
      return parsed.filter((v): v is string => typeof v === 'string');
    }
    throw new Error(`npm view ${name} returned an unexpected payload`);
  }

  /**
   * Create the prefix and its package.json when missing. Returns the
   * package.json path.
   */
  prepare(): string {
    mkdirSync(this._prefix, { recursive: true });
    const manifestPath = join(this._prefix, 'package.json');
    if (!existsSync(manifestPath)) {
      const manifest = {
        private: true,
        description: 'Packages installed for host modules',
        type: 'module',
        dependencies: {},
      };
      writeFileSync(manifestPath, `${JSON.stringify(manifest, null, 2)}\n`, 'utf-8');
    }
    return manifestPath;
  }

  async install(name: string, version: string): Promise<void> {
    this.prepare();
    const result = await this._run([
      'install',
      '--save',
      '--save-exact',
      '--prefix',
      this._prefix,
      `${name}@${version}`,
    ]);
    if (result.exitCode !== 0) {
      throw new Error(`npm install ${name}@${version} exited with ${result.exitCode}: ${result.stderr.trim()}`);
    }
  }

  private _run(args: readonly string[]): Promise<RunResult> {
    return new Promise((resolvePromise, reject) => {
      const child = spawn(this._command, [...args], {
        env: process.env,
        stdio: ['ignore', 'pipe', 'pipe'],
        ...(this._timeoutMs !== undefined ? { timeout: this._timeoutMs } : {}),
      });

      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];
      child.stdout.on('data', (chunk: Buffer) => { stdoutChunks.push(chunk); });
      child.stderr.on('data', (chunk: Buffer) => { stderrChunks.push(chunk); });

      child.on('close', (exitCode: number | null) => {
        resolvePromise({
          exitCode: exitCode ?? 1,
          stdout: Buffer.concat(stdoutChunks).toString('utf-8'),
          stderr: Buffer.concat(stderrChunks).toString('utf-8'),
        });
      });
      child.on('error', (err: Error) => { reject(err); });
    });
  }
}
