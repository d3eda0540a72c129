/**
 * Error taxonomy for the message-exchange layer.
 *
 * Every failure a caller can observe is one of these classes. Each carries a
 * literal `name` and the context needed to act on it.
 *
 * @module errors
 */

import type { ErrorPayload, RequestId } from './protocol/types.js';

/**
 * Transport variants. Declared here so errors can name the substrate
 * without importing transport implementations.
 */
export type TransportKind = 'pipe' | 'eventStream' | 'socket' | 'tcp';

/**
 * Transport operations that can fail.
 */
export type TransportOperation = 'open' | 'send' | 'receive' | 'probe' | 'close';

/**
 * Reasons a payload can fail to decode.
 *
 * - `malformed`: empty, not JSON, or missing/mistyped required fields
 * - `unknown_variant`: well-formed, but matches no message variant
 */
export type DecodeErrorKind = 'malformed' | 'unknown_variant';

// =============================================================================
// Configuration
// =============================================================================

/**
 * Error thrown when a transport configuration is invalid or incomplete.
 *
 * Raised while building the configuration or the router, never at call time.
 */
export class ConfigError extends Error {
  override readonly name = 'ConfigError' as const;

  constructor(readonly issues: readonly string[]) {
    super(`Invalid transport configuration: ${issues.join('; ')}`);
  }
}

// =============================================================================
// Codec
// =============================================================================

/**
 * Error thrown when an inbound payload cannot be decoded.
 */
export class DecodeError extends Error {
  override readonly name = 'DecodeError' as const;

  constructor(
    readonly kind: DecodeErrorKind,
    readonly reason: string,
  ) {
    super(`Failed to decode message (${kind}): ${reason}`);
  }
}

/**
 * Error thrown when a message cannot be serialized.
 */
export class EncodeError extends Error {
  override readonly name = 'EncodeError' as const;

  constructor(readonly reason: string) {
    super(`Failed to encode message: ${reason}`);
  }
}

// =============================================================================
// Transport
// =============================================================================

/**
 * Error raised by a transport operation.
 *
 * `fatal` tells whether the underlying channel is gone. A non-fatal receive
 * failure leaves the transport readable.
 */
export class TransportError extends Error {
  override readonly name: string = 'TransportError';

  constructor(
    readonly transport: TransportKind,
    readonly operation: TransportOperation,
    message: string,
    readonly fatal: boolean = true,
    options?: { readonly cause?: unknown },
  ) {
    super(`${transport} transport ${operation} failed: ${message}`, options);
  }
}

/**
 * Error thrown when a message is sent on a connection that cannot carry it.
 */
export class ConnectionNotActiveError extends Error {
  override readonly name = 'ConnectionNotActiveError' as const;

  constructor(
    readonly connection: string,
    readonly state: string,
  ) {
    super(`Connection '${connection}' cannot send in state '${state}'`);
  }
}

// =============================================================================
// Pending Calls
// =============================================================================

/**
 * Error thrown when a call exceeds its deadline.
 */
export class CallTimeoutError extends Error {
  override readonly name = 'CallTimeoutError' as const;

  constructor(
    readonly id: RequestId,
    readonly method: string,
    readonly timeoutMs: number,
  ) {
    super(`Call '${method}' (id ${String(id)}) timed out after ${timeoutMs}ms`);
  }
}

/**
 * Error thrown when the caller cancels a pending call.
 */
export class CallCancelledError extends Error {
  override readonly name = 'CallCancelledError' as const;

  constructor(
    readonly id: RequestId,
    readonly method: string,
  ) {
    super(`Call '${method}' (id ${String(id)}) was cancelled`);
  }
}

/**
 * Error thrown when a request id is already pending on the connection.
 */
export class DuplicateRequestIdError extends Error {
  override readonly name = 'DuplicateRequestIdError' as const;

  constructor(readonly id: RequestId) {
    super(`Request id ${String(id)} is already pending`);
  }
}

/**
 * Error delivered to calls that were pending when the connection dropped
 * and was later re-established. Such calls are never retried.
 */
export class ConnectionResetError extends Error {
  override readonly name = 'ConnectionResetError' as const;

  constructor(readonly connection: string) {
    super(`Connection '${connection}' was reset`);
  }
}

/**
 * Error delivered to calls that were pending when the connection was shut down.
 */
export class ConnectionClosedError extends Error {
  override readonly name = 'ConnectionClosedError' as const;

  constructor(readonly connection: string) {
    super(`Connection '${connection}' is closed`);
  }
}

/**
 * Error raised when a connection gives up reconnecting.
 */
export class ReconnectExhaustedError extends Error {
  override readonly name = 'ReconnectExhaustedError' as const;

  constructor(
    readonly connection: string,
    readonly attempts: number,
  ) {
    super(`Connection '${connection}' failed after ${attempts} reconnection attempts`);
  }
}

// =============================================================================
// Remote
// =============================================================================

/**
 * Error returned by the peer for a request.
 */
export class RemoteError extends Error {
  override readonly name = 'RemoteError' as const;

  constructor(
    readonly code: number,
    message: string,
    readonly data?: unknown,
  ) {
    super(message);
  }

  /**
   * Rebuilds the error from a wire error payload.
   */
  static fromPayload(payload: ErrorPayload): RemoteError {
    return new RemoteError(payload.code, payload.message, payload.data);
  }

  /**
   * Returns the wire representation of this error.
   */
  toPayload(): ErrorPayload {
    return this.data === undefined
      ? { code: this.code, message: this.message }
      : { code: this.code, message: this.message, data: this.data };
  }
}

/**
 * Normalizes an unknown thrown value into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
