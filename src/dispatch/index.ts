export { EventDispatcher } from './dispatcher.js';
export type { DispatchViewSource } from './dispatcher.js';
export type {
  DispatchReport,
  EventDispatcherOptions,
  FailedDelivery,
  GatewayClient,
  GatewayListener,
  PlatformEvent,
  SkippedDelivery,
} from './types.js';
