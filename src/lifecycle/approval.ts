/**
 * Permission approval: the operator gate between a module declaring
 * permissions and the host granting them.
 *
 * The lifecycle manager asks the configured approver during validation,
 * before anything is installed or loaded. A module that declares no
 * permissions, or whose permission set was already approved, is not asked
 * about again.
 */

import type { ModuleManifest } from '../manifest/index.js';
import { describePermissions, type PermissionTag } from '../permissions.js';

/**
 * What the operator is shown.
 */
export interface PermissionRequest {
  readonly moduleId: string;
  readonly manifest: ModuleManifest;
  readonly permissions: readonly PermissionTag[];
  /** Human-readable disclosure of the requested permissions. */
  readonly disclosure: string;
}

export function createPermissionRequest(manifest: ModuleManifest): PermissionRequest {
  return Object.freeze({
    moduleId: manifest.id,
    manifest,
    permissions: Object.freeze([...manifest.permissions]),
    disclosure: `${manifest.name} (${manifest.id} ${manifest.version}) requests:\n${describePermissions(manifest.permissions)}`,
  });
}

export interface PermissionDecision {
  readonly status: 'approved' | 'rejected';
  readonly approvedBy: string | null;
  readonly reason: string | null;
}

export function createPermissionDecision(options: {
  status: 'approved' | 'rejected';
  approvedBy?: string | null;
  reason?: string | null;
}): PermissionDecision {
  return Object.freeze({
    status: options.status,
    approvedBy: options.approvedBy ?? null,
    reason: options.reason ?? null,
  });
}

export interface PermissionApprover {
  requestApproval(request: PermissionRequest): Promise<PermissionDecision>;
}

/**
 * Grants every request. The default for unattended hosts and tests.
 */
export class AutoApproveHandler implements PermissionApprover {
  async requestApproval(_request: PermissionRequest): Promise<PermissionDecision> {
    return createPermissionDecision({ status: 'approved', approvedBy: 'auto' });
  }
}

/**
 * Rejects every request.
 */
export class AlwaysDenyHandler implements PermissionApprover {
  async requestApproval(_request: PermissionRequest): Promise<PermissionDecision> {
    return createPermissionDecision({ status: 'rejected', reason: 'Always denied' });
  }
}

/**
 * Delegates the decision to a callback, e.g. an operator prompt.
 */
export class CallbackApprovalHandler implements PermissionApprover {
  private _callback: (request: PermissionRequest) => Promise<PermissionDecision>;

  constructor(callback: (request: PermissionRequest) => Promise<PermissionDecision>) {
    this._callback = callback;
  }

  async requestApproval(request: PermissionRequest): Promise<PermissionDecision> {
    return this._callback(request);
  }
}
