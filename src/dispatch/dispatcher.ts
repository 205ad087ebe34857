/**
 * EventDispatcher - forwards platform events to enabled modules.
 *
 * Events are queued as they arrive and delivered one at a time. For each
 * event, modules are visited in registration order; a module receives the
 * event only if its granted permissions cover the event's required
 * permission. A handler that throws or times out affects that invocation
 * alone.
 *
 * Handlers receive a frozen copy of the event, so no module can change what
 * the next one sees.
 */

import { v4 as uuidv4 } from 'uuid';
import { ModuleRuntimeError, ModuleTimeoutError, toError } from '../errors.js';
import type { DispatchTarget, LifecycleEventName, TransitionListener } from '../lifecycle/types.js';
import { silentLogger, type ContextLogger } from '../observability/index.js';
import { covers } from '../permissions.js';
import { deepCopy, deepFreeze, matchPattern, withTimeout } from '../utils/index.js';
import type {
  DispatchReport,
  EventDispatcherOptions,
  FailedDelivery,
  GatewayClient,
  PlatformEvent,
  SkippedDelivery,
} from './types.js';

/**
 * Where the dispatcher reads its module view from. LifecycleManager is one.
 */
export interface DispatchViewSource {
  dispatchView(): readonly DispatchTarget[];
  on(event: LifecycleEventName, listener: TransitionListener): () => void;
}

const frozenEvents = new WeakSet<PlatformEvent>();

function freezeEvent(event: PlatformEvent): PlatformEvent {
  if (frozenEvents.has(event)) return event;
  const frozen = deepFreeze(deepCopy(event));
  frozenEvents.add(frozen);
  return frozen;
}

export class EventDispatcher {
  private readonly _source: DispatchViewSource;
  private readonly _handlerTimeout: number;
  private readonly _logger: ContextLogger;
  private _view: readonly DispatchTarget[];
  private readonly _queue: PlatformEvent[] = [];
  private _pump: Promise<void> | null = null;
  private _detachGateway: (() => void) | null = null;
  private readonly _detachSource: (() => void)[];

  constructor(source: DispatchViewSource, options?: EventDispatcherOptions & { logger?: ContextLogger }) {
    this._source = source;
    this._handlerTimeout = options?.handlerTimeout ?? 5000;
    this._logger = options?.logger ?? silentLogger();
    this._view = source.dispatchView();

    const refresh = (): void => {
      this._view = this._source.dispatchView();
    };
    this._detachSource = [source.on('transition', refresh), source.on('subscription', refresh)];
  }

  get pending(): number {
    return this._queue.length;
  }

  get attached(): boolean {
    return this._detachGateway !== null;
  }

  /**
   * Start receiving events from `gateway`. A previously attached gateway is
   * detached first.
   */
  attach(gateway: GatewayClient): void {
    this._detachGateway?.();
    this._detachGateway = gateway.subscribe((event) => this.enqueue(event));
    this._logger.info('Attached to gateway');
  }

  /**
   * Queue an event and return immediately.
   */
  enqueue(event: PlatformEvent): void {
    this._queue.push(freezeEvent(event));
    if (this._pump === null) {
      this._pump = this._runQueue();
    }
  }

  /**
   * Resolves once every queued event has been delivered.
   */
  async drain(): Promise<void> {
    while (this._pump !== null) {
      await this._pump;
    }
  }

  /**
   * Stop receiving events. Queued events are still delivered; await
   * `drain()` to wait for them.
   */
  close(): void {
    this._detachGateway?.();
    this._detachGateway = null;
    for (const detach of this._detachSource.splice(0)) detach();
  }

  /**
   * Deliver one event now, bypassing the queue.
   */
  async dispatch(incoming: PlatformEvent): Promise<DispatchReport> {
    const event = freezeEvent(incoming);
    const dispatchId = uuidv4();
    const view = this._view;
    const delivered: string[] = [];
    const skipped: SkippedDelivery[] = [];
    const failed: FailedDelivery[] = [];

    for (const target of view) {
      const handlers = target.subscriptions.filter((s) => matchPattern(s.pattern, event.category));
      if (handlers.length === 0) continue;
      if (!covers(target.permissions, event.requiredPermission)) {
        skipped.push({ moduleId: target.moduleId, reason: `missing permission '${event.requiredPermission}'` });
        continue;
      }

      let received = false;
      for (const subscription of handlers) {
        try {
          await withTimeout(
            () => subscription.handler(event),
            this._handlerTimeout,
            () => new ModuleTimeoutError(target.moduleId, `'${event.category}' handler`, this._handlerTimeout),
          );
          received = true;
        } catch (e) {
          const error = e instanceof ModuleTimeoutError
            ? e
            : new ModuleRuntimeError(target.moduleId, `'${event.category}' handler`, toError(e));
          failed.push({ moduleId: target.moduleId, pattern: subscription.pattern, error });
          this._logger.error('Event handler failed', {
            dispatch_id: dispatchId,
            module_id: target.moduleId,
            category: event.category,
            error,
          });
        }
      }
      if (received) delivered.push(target.moduleId);
    }

    this._logger.debug('Event dispatched', {
      dispatch_id: dispatchId,
      category: event.category,
      delivered: delivered.length,
      skipped: skipped.length,
      failed: failed.length,
    });
    return Object.freeze({ dispatchId, category: event.category, delivered, skipped, failed });
  }

  private async _runQueue(): Promise<void> {
    try {
      let event = this._queue.shift();
      while (event !== undefined) {
        try {
          await this.dispatch(event);
        } catch (e) {
          this._logger.error('Dispatch failed', { category: event.category, error: toError(e) });
        }
        event = this._queue.shift();
      }
    } finally {
      this._pump = null;
    }
  }
}
