/**
 * Gateway collaborator and event types.
 */

import type { PermissionTag, PlatformAction } from '../permissions.js';

/**
 * An event from the chat platform. `category` is dot-separated, e.g.
 * `message.create` or `member.join`.
 */
export interface PlatformEvent {
  readonly category: string;
  /** Permission a module must hold to receive the event; null for none. */
  readonly requiredPermission: PermissionTag | null;
  readonly payload: Readonly<Record<string, unknown>>;
}

export type GatewayListener = (event: PlatformEvent) => void;

/**
 * The chat-platform client. Only its surface is defined here.
 */
export interface GatewayClient {
  /** Register a listener; returns a function that removes it. */
  subscribe(listener: GatewayListener): () => void;
  /** Whether the bot account itself holds `tag` on the platform. */
  checkPermission(tag: PermissionTag): boolean | Promise<boolean>;
  perform(action: PlatformAction, payload: Record<string, unknown>): Promise<unknown>;
}

export interface SkippedDelivery {
  readonly moduleId: string;
  readonly reason: string;
}

export interface FailedDelivery {
  readonly moduleId: string;
  readonly pattern: string;
  readonly error: Error;
}

export interface DispatchReport {
  readonly dispatchId: string;
  readonly category: string;
  /** Module ids that received the event, in delivery order. */
  readonly delivered: readonly string[];
  readonly skipped: readonly SkippedDelivery[];
  readonly failed: readonly FailedDelivery[];
}

export interface EventDispatcherOptions {
  /** Per-handler limit in ms; 0 disables it. */
  handlerTimeout?: number;
}
