/**
 * Transport configuration.
 *
 * @module config
 */

export { TRANSPORT_DEFAULTS } from './defaults.js';
export {
  resolveTransportConfig,
  transportFor,
  type ConnectionPolicy,
  type EventStreamConfig,
  type PipeConfig,
  type ReconnectPolicy,
  type SocketConfig,
  type TcpConfig,
  type TransportConfig,
  type TransportConfigInput,
} from './schema.js';
