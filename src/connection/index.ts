/**
 * Connection lifecycle, backoff and call correlation.
 *
 * @module connection
 */

export { Backoff, backoffDelay, type RandomSource } from './backoff.js';

export { SendGate } from './send-gate.js';

export {
  PendingCalls,
  type PendingCallsStats,
  type RegisterOptions,
} from './pending-calls.js';

export {
  ConnectionManager,
  CONNECTION_TRANSITIONS,
  type ConnectionManagerEvents,
  type ConnectionManagerOptions,
  type ConnectionManagerStats,
  type ConnectionState,
} from './connection-manager.js';
