/**
 * relayline - transport-agnostic JSON-RPC message exchange
 *
 * This module provides the public API for the relayline library.
 */

export const VERSION = '0.1.0' as const;

// Protocol
export type {
  RequestId,
  MessageParams,
  ErrorPayload,
  RequestMessage,
  ResponseMessage,
  ErrorMessage,
  NotificationMessage,
  Message,
  ReplyMessage,
  CapabilityKind,
} from './protocol/types.js';
export { CAPABILITY_KINDS, ErrorCode, PROTOCOL } from './protocol/types.js';
export { MessageCodec } from './protocol/codec.js';
export { LineFramer, frameLine, MAX_LINE_SIZE } from './protocol/line-framer.js';
export { EventStreamParser, type ServerSentEvent } from './protocol/event-stream-parser.js';

// Error classes
export {
  ConfigError,
  DecodeError,
  EncodeError,
  TransportError,
  ConnectionNotActiveError,
  CallTimeoutError,
  CallCancelledError,
  DuplicateRequestIdError,
  ConnectionResetError,
  ConnectionClosedError,
  ReconnectExhaustedError,
  RemoteError,
  type TransportKind,
  type TransportOperation,
  type DecodeErrorKind,
} from './errors.js';

// Configuration
export {
  TRANSPORT_DEFAULTS,
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
} from './config/index.js';

// Transports
export {
  createTransport,
  PipeTransport,
  EventStreamTransport,
  SocketTransport,
  TcpTransport,
  type Transport,
  type TransportOptions,
  type AuthTokenProvider,
  type CreateTransportOptions,
  type PipeChild,
  type PipeStreams,
  type PipeTarget,
  type PipeTransportOptions,
  type SpawnFunction,
} from './transport/index.js';

// Connections
export {
  ConnectionManager,
  CONNECTION_TRANSITIONS,
  PendingCalls,
  Backoff,
  backoffDelay,
  type ConnectionState,
  type ConnectionManagerEvents,
  type ConnectionManagerOptions,
  type ConnectionManagerStats,
  type PendingCallsStats,
  type RandomSource,
} from './connection/index.js';

// Routing
export {
  TransportRouter,
  type CapabilityStatus,
  type RouterStartResult,
  type TransportFactory,
  type TransportRouterEvents,
  type TransportRouterOptions,
} from './routing/index.js';

// Dispatch
export {
  Dispatcher,
  createHandlerTable,
  createRequestResponder,
  type AuthGate,
  type CallOptions,
  type DispatcherOptions,
  type HandlerTable,
  type InboundSink,
  type RequestContext,
  type RequestHandler,
  type RequestResponderOptions,
  type ResultParser,
} from './dispatch/index.js';

// Logging
export { createLogger, createRootLogger, setRootLogger, type Logger } from './logging/index.js';
