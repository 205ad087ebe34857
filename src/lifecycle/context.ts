/**
 * The context object handed to module entry code.
 */

import { mkdirSync } from 'node:fs';
import { join, resolve } from 'node:path';
import type { GatewayClient } from '../dispatch/types.js';
import { InvalidInputError, PermissionDeniedError } from '../errors.js';
import type { ModuleManifest } from '../manifest/index.js';
import type { ContextLogger } from '../observability/index.js';
import {
  covers,
  isPlatformAction,
  PLATFORM_ACTIONS,
  type PermissionTag,
  type PlatformAction,
} from '../permissions.js';
import type { ScopedSettings } from '../settings/index.js';
import type { EventHandler, ModuleContext, PlatformAccess } from './types.js';

export interface ModuleContextOptions {
  manifest: ModuleManifest;
  settings: ScopedSettings;
  logger: ContextLogger;
  storageDir: string;
  granted: ReadonlySet<PermissionTag>;
  gateway: () => GatewayClient | null;
  /** Whether the module may currently act on the platform. */
  isActive: () => boolean;
  subscribe: (pattern: string, handler: EventHandler) => () => void;
}

function platformAccess(moduleId: string, options: ModuleContextOptions): PlatformAccess {
  const can = (action: PlatformAction): boolean => covers(options.granted, PLATFORM_ACTIONS[action]);

  return Object.freeze({
    can,
    async perform(action: PlatformAction, payload?: Record<string, unknown>): Promise<unknown> {
      if (!isPlatformAction(action)) {
        throw new InvalidInputError(`Unknown platform action '${String(action)}'`);
      }
      const required = PLATFORM_ACTIONS[action];
      if (!can(action)) {
        throw new PermissionDeniedError(moduleId, required, `'${action}' requires a permission the module did not declare`);
      }
      if (!options.isActive()) {
        throw new PermissionDeniedError(moduleId, required, 'the module is not enabled');
      }
      const gateway = options.gateway();
      if (gateway === null) {
        throw new PermissionDeniedError(moduleId, required, 'no gateway is connected');
      }
      if (!(await gateway.checkPermission(required))) {
        throw new PermissionDeniedError(moduleId, required, 'the bot account lacks this permission on the platform');
      }
      options.logger.debug('Performing platform action', { action });
      return gateway.perform(action, payload ?? {});
    },
  });
}

export function createModuleContext(options: ModuleContextOptions): ModuleContext {
  const moduleId = options.manifest.id;
  let storage: string | null = null;

  return Object.freeze({
    moduleId,
    manifest: options.manifest,
    settings: options.settings,
    platform: platformAccess(moduleId, options),
    logger: options.logger,
    subscribe: (pattern: string, handler: EventHandler) => {
      if (pattern.trim() === '') {
        throw new InvalidInputError('Subscription pattern must not be empty');
      }
      return options.subscribe(pattern, handler);
    },
    storagePath: () => {
      if (storage === null) {
        storage = join(resolve(options.storageDir), moduleId);
        mkdirSync(storage, { recursive: true });
      }
      return storage;
    },
  });
}
