/**
 * Transports carrying encoded payloads between peers.
 *
 * @module transport
 *
 * @example
 * ```typescript
 * import { createTransport, resolveTransportConfig } from 'relayline';
 *
 * const config = resolveTransportConfig({
 *   defaultTransport: 'socket',
 *   socket: { host: 'localhost', port: 9000 },
 * });
 * const transport = createTransport('socket', config);
 * await transport.open();
 * ```
 */

export {
  authorizationHeader,
  type AuthTokenProvider,
  type Transport,
  type TransportKind,
  type TransportOptions,
} from './types.js';

export { FrameQueue } from './frame-queue.js';

export {
  PipeTransport,
  type PipeChild,
  type PipeStreams,
  type PipeTarget,
  type PipeTransportOptions,
  type SpawnFunction,
} from './pipe-transport.js';

export {
  EventStreamTransport,
  ENDPOINT_EVENT,
  MESSAGE_EVENT,
} from './event-stream-transport.js';

export { SocketTransport, socketUrl } from './socket-transport.js';

export { TcpTransport } from './tcp-transport.js';

export { createTransport, type CreateTransportOptions } from './create-transport.js';
