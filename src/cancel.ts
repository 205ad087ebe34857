/**
 * Cooperative cancellation for pending module loads.
 *
 * The lifecycle manager only checks a token between pipeline steps, so a
 * cancelled load always finishes the step it is in (an install, a settings
 * merge) before it is discarded.
 */

import { LifecycleCancelledError } from './errors.js';

export class CancelToken {
  private _cancelled: boolean = false;
  private readonly _moduleId: string;

  constructor(moduleId: string) {
    this._moduleId = moduleId;
  }

  get isCancelled(): boolean {
    return this._cancelled;
  }

  cancel(): void {
    this._cancelled = true;
  }

  check(): void {
    if (this._cancelled) {
      throw new LifecycleCancelledError(this._moduleId);
    }
  }
}
