/**
 * Capability routing.
 *
 * @module routing
 */

export {
  TransportRouter,
  type CapabilityStatus,
  type RouterStartResult,
  type TransportFactory,
  type TransportRouterEvents,
  type TransportRouterOptions,
} from './router.js';
