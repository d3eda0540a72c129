/**
 * Answering inbound requests from a fixed handler table.
 *
 * @module dispatch/responder
 */

import type { ConnectionManager } from '../connection/index.js';
import { RemoteError } from '../errors.js';
import { createLogger, type Logger } from '../logging/index.js';
import {
  ErrorCode,
  PROTOCOL,
  type ErrorPayload,
  type MessageParams,
  type NotificationMessage,
  type RequestId,
  type RequestMessage,
} from '../protocol/types.js';
import type { Dispatcher, InboundSink } from './dispatcher.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Context handed to a request handler.
 */
export interface RequestContext {
  readonly method: string;

  /** Request id, or `null` for a notification */
  readonly id: RequestId | null;
  readonly connection: ConnectionManager;
}

/**
 * Handles one method. The returned value becomes the response's `result`;
 * a thrown {@link RemoteError} becomes the error reply as-is.
 */
export type RequestHandler = (params: MessageParams | undefined, context: RequestContext) => unknown;

/**
 * Handler table, built once and read-only afterwards.
 */
export type HandlerTable = ReadonlyMap<string, RequestHandler>;

/**
 * Decides whether a request may be served. Returning `false` answers
 * with `Unauthorized`.
 */
export type AuthGate = (request: RequestMessage, connection: ConnectionManager) => boolean | Promise<boolean>;

/**
 * Options for {@link createRequestResponder}.
 */
export interface RequestResponderOptions {
  readonly authGate?: AuthGate;
  readonly logger?: Logger;
}

// =============================================================================
// Handler Table
// =============================================================================

const pingHandler: RequestHandler = () => ({});

/**
 * Builds a handler table. A `ping` handler answering `{}` is included
 * unless `handlers` defines its own.
 *
 * @example
 * ```typescript
 * const table = createHandlerTable({
 *   add: (params) => {
 *     const { a, b } = z.object({ a: z.number(), b: z.number() }).parse(params);
 *     return a + b;
 *   },
 * });
 * ```
 */
export function createHandlerTable(handlers: Readonly<Record<string, RequestHandler>>): HandlerTable {
  const table = new Map<string, RequestHandler>([[PROTOCOL.PING_METHOD, pingHandler]]);
  for (const [method, handler] of Object.entries(handlers)) {
    table.set(method, handler);
  }
  return table;
}

function isHandlerTable(value: HandlerTable | Readonly<Record<string, RequestHandler>>): value is HandlerTable {
  return value instanceof Map;
}

function toErrorPayload(error: unknown): ErrorPayload {
  if (error instanceof RemoteError) {
    return error.toPayload();
  }
  return {
    code: ErrorCode.InternalError,
    message: error instanceof Error ? error.message : String(error),
  };
}

// =============================================================================
// Responder
// =============================================================================

/**
 * Creates an inbound sink that answers requests through `dispatcher`.
 *
 * - unknown method → `-32601 Method not found`
 * - handler throws → `-32603` with the thrown message, or the thrown
 *   {@link RemoteError}'s own code and data
 * - `authGate` refusal → `-32001 Unauthorized`
 * - notifications run their handler when one exists; they are never answered
 *
 * @example
 * ```typescript
 * const handlers = createHandlerTable({ add: addHandler });
 * dispatcher.setInboundSink(
 *   createRequestResponder(dispatcher, handlers, { authGate: (request) => request.method !== 'admin' }),
 * );
 * ```
 */
export function createRequestResponder(
  dispatcher: Dispatcher,
  handlers: HandlerTable | Readonly<Record<string, RequestHandler>>,
  options: RequestResponderOptions = {},
): InboundSink {
  const table = isHandlerTable(handlers) ? handlers : createHandlerTable(handlers);
  const { authGate } = options;
  const log = options.logger ?? createLogger('responder');

  const answer = async (request: RequestMessage, connection: ConnectionManager): Promise<void> => {
    let result: unknown;
    try {
      if (authGate !== undefined && !(await authGate(request, connection))) {
        log.warn({ method: request.method }, 'request refused by auth gate');
        await dispatcher.respondError(connection, request.id, {
          code: ErrorCode.Unauthorized,
          message: 'Unauthorized',
        });
        return;
      }

      const handler = table.get(request.method);
      if (handler === undefined) {
        await dispatcher.respondError(connection, request.id, {
          code: ErrorCode.MethodNotFound,
          message: `Method not found: ${request.method}`,
        });
        return;
      }

      result = await handler(request.params, { method: request.method, id: request.id, connection });
    } catch (error) {
      log.debug({ err: error, method: request.method }, 'handler failed');
      await dispatcher.respondError(connection, request.id, toErrorPayload(error));
      return;
    }

    await dispatcher.respond(connection, request.id, result);
  };

  const consume = async (notification: NotificationMessage, connection: ConnectionManager): Promise<void> => {
    const handler = table.get(notification.method);
    if (handler === undefined) {
      log.debug({ method: notification.method }, 'no handler for notification');
      return;
    }
    await handler(notification.params, { method: notification.method, id: null, connection });
  };

  return async (message, connection) => {
    switch (message.type) {
      case 'request':
        await answer(message, connection);
        return;
      case 'notification':
        await consume(message, connection);
        return;
      case 'response':
      case 'error':
        log.debug({ id: message.id, type: message.type }, 'reply matched no pending call');
        return;
    }
  };
}
