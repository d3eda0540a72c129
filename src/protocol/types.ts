/**
 * Wire-level message types shared by every transport.
 *
 * The in-memory {@link Message} union is substrate-independent. The codec adds
 * the JSON-RPC version marker on the way out and checks it on the way in.
 *
 * @module protocol/types
 */

// =============================================================================
// Identifiers
// =============================================================================

/**
 * Correlation identifier linking a request to its response.
 */
export type RequestId = string | number;

/**
 * Structured request/notification payload. Its schema is owned by the
 * capability layer; the protocol only requires an object or an array.
 */
export type MessageParams = Readonly<Record<string, unknown>> | readonly unknown[];

// =============================================================================
// Messages
// =============================================================================

/**
 * Error payload carried by an error response.
 */
export interface ErrorPayload {
  readonly code: number;
  readonly message: string;
  readonly data?: unknown;
}

/**
 * A request expecting exactly one response with the same `id`.
 */
export interface RequestMessage {
  readonly type: 'request';
  readonly id: RequestId;
  readonly method: string;
  readonly params?: MessageParams;
}

/**
 * Successful reply to a request.
 */
export interface ResponseMessage {
  readonly type: 'response';
  readonly id: RequestId;
  /**
   * Any JSON value. `undefined` is sent as `null`, so a reply built with
   * `result: undefined` decodes with `result: null` on the other side.
   */
  readonly result: unknown;
}

/**
 * Failed reply to a request.
 *
 * `id` is `null` when the peer could not determine which request failed
 * (for example, it could not parse it).
 */
export interface ErrorMessage {
  readonly type: 'error';
  readonly id: RequestId | null;
  readonly error: ErrorPayload;
}

/**
 * One-way message. Never answered.
 */
export interface NotificationMessage {
  readonly type: 'notification';
  readonly method: string;
  readonly params?: MessageParams;
}

/**
 * Discriminated union of every message that crosses a transport.
 *
 * @example
 * ```typescript
 * function describe(message: Message): string {
 *   switch (message.type) {
 *     case 'request':
 *       return `request ${message.id} ${message.method}`;
 *     case 'response':
 *       return `response ${message.id}`;
 *     case 'error':
 *       return `error ${message.id} (${message.error.code})`;
 *     case 'notification':
 *       return `notification ${message.method}`;
 *   }
 * }
 * ```
 */
export type Message =
  | RequestMessage
  | ResponseMessage
  | ErrorMessage
  | NotificationMessage;

/**
 * Messages that complete a pending call.
 */
export type ReplyMessage = ResponseMessage | ErrorMessage;

// =============================================================================
// Capabilities
// =============================================================================

/**
 * Logical categories of operations that can be bound to distinct transports.
 */
export const CAPABILITY_KINDS = ['tool', 'resource', 'prompt', 'auth'] as const;

/**
 * Logical category of an operation.
 */
export type CapabilityKind = (typeof CAPABILITY_KINDS)[number];

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Standard JSON-RPC error codes plus the ones this layer emits itself.
 */
export const ErrorCode = {
  ParseError: -32700,
  InvalidRequest: -32600,
  MethodNotFound: -32601,
  InvalidParams: -32602,
  InternalError: -32603,
  Unauthorized: -32001,
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Protocol constants.
 */
export const PROTOCOL = {
  /** Version marker written into every encoded payload */
  JSONRPC_VERSION: '2.0',

  /** Method answered by every responder, used for application-level pings */
  PING_METHOD: 'ping',
} as const;
