/**
 * Error hierarchy for the module host.
 *
 * Every failure a module can cause is one of these. The lifecycle manager
 * records them on the module record instead of letting them escape; only
 * InvalidTransitionError is allowed to propagate, since it means the
 * registry's own bookkeeping is wrong.
 */

export interface ErrorOptions {
  cause?: Error;
  retryable?: boolean | null;
  suggestion?: string | null;
}

export class HostError extends Error {
  static readonly DEFAULT_RETRYABLE: boolean | null = null;

  readonly code: string;
  readonly details: Record<string, unknown>;
  override readonly cause?: Error;
  readonly timestamp: string;
  readonly retryable: boolean | null;
  readonly suggestion: string | null;

  constructor(
    code: string,
    message: string,
    details?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'HostError';
    this.code = code;
    this.details = details ?? {};
    this.cause = options?.cause;
    this.timestamp = new Date().toISOString();
    this.retryable = options?.retryable !== undefined
      ? options.retryable
      : (this.constructor as typeof HostError).DEFAULT_RETRYABLE;
    this.suggestion = options?.suggestion ?? null;
  }

  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }

  toJSON(): Record<string, unknown> {
    const obj: Record<string, unknown> = {
      code: this.code,
      message: this.message,
    };
    if (Object.keys(this.details).length > 0) {
      obj.details = this.details;
    }
    if (this.cause !== undefined) {
      obj.cause = String(this.cause);
    }
    obj.timestamp = this.timestamp;
    if (this.retryable !== null) {
      obj.retryable = this.retryable;
    }
    if (this.suggestion !== null) {
      obj.suggestion = this.suggestion;
    }
    return obj;
  }
}

/**
 * Wrap anything thrown by module code or a collaborator into an Error.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(typeof value === 'string' ? value : JSON.stringify(value) ?? String(value));
}

export class ConfigNotFoundError extends HostError {
  static override readonly DEFAULT_RETRYABLE: boolean | null = false;

  constructor(configPath: string, options?: ErrorOptions) {
    super('CONFIG_NOT_FOUND', `Configuration file not found: ${configPath}`, { configPath }, options);
    this.name = 'ConfigNotFoundError';
  }
}

export class ConfigError extends HostError {
  static override readonly DEFAULT_RETRYABLE: boolean | null = false;

  constructor(message: string, options?: ErrorOptions) {
    super('CONFIG_INVALID', message, {}, options);
    this.name = 'ConfigError';
  }
}

export class InvalidInputError extends HostError {
  static override readonly DEFAULT_RETRYABLE: boolean | null = false;

  constructor(message: string = 'Invalid input', options?: ErrorOptions) {
    super('GENERAL_INVALID_INPUT', message, {}, options);
    this.name = 'InvalidInputError';
  }
}

export class ManifestError extends HostError {
  static override readonly DEFAULT_RETRYABLE: boolean | null = false;

  constructor(field: string, message: string, options?: ErrorOptions) {
    super('MANIFEST_INVALID', `Invalid manifest field '${field}': ${message}`, { field }, options);
    this.name = 'ManifestError';
  }

  get field(): string {
    return this.details['field'] as string;
  }
}

export class UnsupportedManifestVersionError extends HostError {
  static override readonly DEFAULT_RETRYABLE: boolean | null = false;

  constructor(manifestVersion: unknown, supported: readonly number[], options?: ErrorOptions) {
    super(
      'MANIFEST_VERSION_UNSUPPORTED',
      `Unsupported manifest_version ${JSON.stringify(manifestVersion) ?? 'undefined'}; this host supports ${supported.join(', ')}`,
      { manifestVersion, supported: [...supported] },
      { ...options, suggestion: options?.suggestion ?? 'The module requires a newer host' },
    );
    this.name = 'UnsupportedManifestVersionError';
  }
}

export class DependencyConflictError extends HostError {
  static override readonly DEFAULT_RETRYABLE: boolean | null = false;

  constructor(
    moduleId: string,
    dependency: string,
    requested: string,
    conflictingModuleId: string,
    conflictingRange: string,
    options?: ErrorOptions,
  ) {
    super(
      'DEPENDENCY_CONFLICT',
      `Module '${moduleId}' requires ${dependency}@${requested}, which conflicts with ${dependency}@${conflictingRange} required by '${conflictingModuleId}'`,
      { moduleId, dependency, requested, conflictingModuleId, conflictingRange },
      options,
    );
    this.name = 'DependencyConflictError';
  }

  get conflictingModuleId(): string {
    return this.details['conflictingModuleId'] as string;
  }

  get dependency(): string {
    return this.details['dependency'] as string;
  }
}

export class DependencyInstallError extends HostError {
  static override readonly DEFAULT_RETRYABLE: boolean | null = true;

  constructor(moduleId: string, dependency: string, reason: string, options?: ErrorOptions) {
    super(
      'DEPENDENCY_INSTALL_FAILED',
      `Could not install ${dependency} for module '${moduleId}': ${reason}`,
      { moduleId, dependency, reason },
      options,
    );
    this.name = 'DependencyInstallError';
  }
}

export interface SettingsErrorDetail {
  keyPath: string;
  message: string;
  value?: unknown;
}

export class SettingsValidationError extends HostError {
  static override readonly DEFAULT_RETRYABLE: boolean | null = false;

  constructor(
    message: string = 'Settings validation failed',
    errors?: SettingsErrorDetail[],
    options?: ErrorOptions,
  ) {
    super('SETTINGS_INVALID', message, { errors: errors ?? [] }, options);
    this.name = 'SettingsValidationError';
  }

  get errors(): SettingsErrorDetail[] {
    return this.details['errors'] as SettingsErrorDetail[];
  }
}

export class ReservedSettingsKeyError extends SettingsValidationError {
  constructor(moduleId: string, key: string, options?: ErrorOptions) {
    super(
      `Settings namespace '${moduleId}' conflicts with reserved host key '${key}'`,
      [{ keyPath: key, message: 'reserved by the host' }],
      options,
    );
    this.name = 'ReservedSettingsKeyError';
  }
}

export class SettingNotFoundError extends HostError {
  static override readonly DEFAULT_RETRYABLE: boolean | null = false;

  constructor(keyPath: string, options?: ErrorOptions) {
    super('SETTING_NOT_FOUND', `Setting not declared in any schema: ${keyPath}`, { keyPath }, options);
    this.name = 'SettingNotFoundError';
  }
}

export class ModuleNotFoundError extends HostError {
  static override readonly DEFAULT_RETRYABLE: boolean | null = false;

  constructor(moduleId: string, options?: ErrorOptions) {
    super('MODULE_NOT_FOUND', `Module not found: ${moduleId}`, { moduleId }, options);
    this.name = 'ModuleNotFoundError';
  }
}

export class ModuleLoadError extends HostError {
  static override readonly DEFAULT_RETRYABLE: boolean | null = false;

  constructor(moduleId: string, reason: string, options?: ErrorOptions) {
    super('MODULE_LOAD_ERROR', `Failed to load module '${moduleId}': ${reason}`, { moduleId, reason }, options);
    this.name = 'ModuleLoadError';
  }
}

export class ModuleRuntimeError extends HostError {
  static override readonly DEFAULT_RETRYABLE: boolean | null = null;

  constructor(moduleId: string, phase: string, cause: Error, options?: ErrorOptions) {
    super(
      'MODULE_RUNTIME_ERROR',
      `Module '${moduleId}' raised during ${phase}: ${cause.message}`,
      { moduleId, phase },
      { ...options, cause },
    );
    this.name = 'ModuleRuntimeError';
  }

  get moduleId(): string {
    return this.details['moduleId'] as string;
  }

  get phase(): string {
    return this.details['phase'] as string;
  }
}

export class ModuleTimeoutError extends HostError {
  static override readonly DEFAULT_RETRYABLE: boolean | null = true;

  constructor(moduleId: string, phase: string, timeoutMs: number, options?: ErrorOptions) {
    super(
      'MODULE_TIMEOUT',
      `Module '${moduleId}' timed out during ${phase} after ${timeoutMs}ms`,
      { moduleId, phase, timeoutMs },
      options,
    );
    this.name = 'ModuleTimeoutError';
  }

  get timeoutMs(): number {
    return this.details['timeoutMs'] as number;
  }
}

export class PermissionDeniedError extends HostError {
  static override readonly DEFAULT_RETRYABLE: boolean | null = false;

  constructor(moduleId: string, permission: string, reason: string, options?: ErrorOptions) {
    super(
      'PERMISSION_DENIED',
      `Module '${moduleId}' is not permitted to use '${permission}': ${reason}`,
      { moduleId, permission, reason },
      options,
    );
    this.name = 'PermissionDeniedError';
  }

  get permission(): string {
    return this.details['permission'] as string;
  }
}

export class InvalidTransitionError extends HostError {
  static override readonly DEFAULT_RETRYABLE: boolean | null = false;

  constructor(moduleId: string, from: string, to: string, options?: ErrorOptions) {
    super(
      'INVALID_TRANSITION',
      `Module '${moduleId}' cannot move from '${from}' to '${to}'`,
      { moduleId, from, to },
      options,
    );
    this.name = 'InvalidTransitionError';
  }

  get from(): string {
    return this.details['from'] as string;
  }

  get to(): string {
    return this.details['to'] as string;
  }
}

export class LifecycleCancelledError extends HostError {
  static override readonly DEFAULT_RETRYABLE: boolean | null = false;

  constructor(moduleId: string, options?: ErrorOptions) {
    super('LIFECYCLE_CANCELLED', `Pending load of module '${moduleId}' was cancelled`, { moduleId }, options);
    this.name = 'LifecycleCancelledError';
  }
}

export const ErrorCodes = Object.freeze({
  CONFIG_NOT_FOUND: 'CONFIG_NOT_FOUND',
  CONFIG_INVALID: 'CONFIG_INVALID',
  GENERAL_INVALID_INPUT: 'GENERAL_INVALID_INPUT',
  MANIFEST_INVALID: 'MANIFEST_INVALID',
  MANIFEST_VERSION_UNSUPPORTED: 'MANIFEST_VERSION_UNSUPPORTED',
  DEPENDENCY_CONFLICT: 'DEPENDENCY_CONFLICT',
  DEPENDENCY_INSTALL_FAILED: 'DEPENDENCY_INSTALL_FAILED',
  SETTINGS_INVALID: 'SETTINGS_INVALID',
  SETTING_NOT_FOUND: 'SETTING_NOT_FOUND',
  MODULE_NOT_FOUND: 'MODULE_NOT_FOUND',
  MODULE_LOAD_ERROR: 'MODULE_LOAD_ERROR',
  MODULE_RUNTIME_ERROR: 'MODULE_RUNTIME_ERROR',
  MODULE_TIMEOUT: 'MODULE_TIMEOUT',
  PERMISSION_DENIED: 'PERMISSION_DENIED',
  INVALID_TRANSITION: 'INVALID_TRANSITION',
  LIFECYCLE_CANCELLED: 'LIFECYCLE_CANCELLED',
} as const);

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
