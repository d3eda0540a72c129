/**
 * Request/response dispatch over routed connections.
 *
 * @module dispatch/dispatcher
 */

import type { ConnectionManager } from '../connection/index.js';
import { CallCancelledError, toError } from '../errors.js';
import { createLogger, type Logger } from '../logging/index.js';
import type {
  CapabilityKind,
  ErrorPayload,
  Message,
  MessageParams,
  RequestId,
} from '../protocol/types.js';
import type { TransportRouter } from '../routing/index.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Receives every inbound message that does not complete a pending call,
 * together with the connection it arrived on.
 */
export type InboundSink = (message: Message, connection: ConnectionManager) => void | Promise<void>;

/**
 * Turns a raw result into the caller's type, throwing if it does not fit.
 * A zod schema's `parse` is a typical parser.
 */
export type ResultParser<T> = (result: unknown) => T;

/**
 * Per-call options.
 */
export interface CallOptions {
  /** Deadline for the reply (default: the connection policy's `callTimeoutMs`) */
  readonly timeoutMs?: number;

  /** Aborting fails the call with {@link CallCancelledError} */
  readonly signal?: AbortSignal;
}

/**
 * Options for {@link Dispatcher}.
 */
export interface DispatcherOptions {
  readonly logger?: Logger;
}

// =============================================================================
// Dispatcher
// =============================================================================

/**
 * Sends requests and notifications through a {@link TransportRouter} and
 * correlates replies.
 *
 * Request ids are numeric and unique for the lifetime of the dispatcher.
 * Replies are matched against the correlation table of the connection they
 * arrive on; everything else goes to the inbound sink.
 *
 * @example
 * ```typescript
 * const dispatcher = new Dispatcher(router);
 *
 * const sum = await dispatcher.call('tool', 'add', { a: 2, b: 3 }, {
 *   timeoutMs: 5000,
 *   parse: (value) => z.number().parse(value),
 * });
 *
 * await dispatcher.notify('resource', 'subscribe', { uri: 'file:///notes.md' });
 * ```
 */
export class Dispatcher {
  private readonly log: Logger;
  private readonly detachers: Array<() => void> = [];

  private nextId = 1;
  private sink: InboundSink | null = null;

  constructor(
    private readonly router: TransportRouter,
    options: DispatcherOptions = {},
  ) {
    this.log = options.logger ?? createLogger('dispatcher');

    for (const connection of router.getConnections().values()) {
      const onMessage = (message: Message): void => {
        this.route(message, connection);
      };
      connection.on('message', onMessage);
      this.detachers.push(() => connection.off('message', onMessage));
    }
  }

  /**
   * Sends a request and waits for its reply.
   *
   * Fails with the send error if the request cannot be sent, with
   * `RemoteError` if the peer answers with an error, with `CallTimeoutError`
   * when the deadline passes and with {@link CallCancelledError} when the
   * signal aborts. Cancellation is local: nothing is sent to the peer.
   */
  call(capability: CapabilityKind, method: string, params?: MessageParams, options?: CallOptions): Promise<unknown>;
  call<T>(
    capability: CapabilityKind,
    method: string,
    params: MessageParams | undefined,
    options: CallOptions & { readonly parse: ResultParser<T> },
  ): Promise<T>;
  async call<T>(
    capability: CapabilityKind,
    method: string,
    params?: MessageParams,
    options: CallOptions & { readonly parse?: ResultParser<T> } = {},
  ): Promise<unknown> {
    const connection = this.router.resolve(capability);
    const id = this.nextId++;

    if (options.signal?.aborted) {
      throw new CallCancelledError(id, method);
    }

    const reply = connection.pendingCalls.register({
      id,
      method,
      timeoutMs: options.timeoutMs ?? this.router.config.connection.callTimeoutMs,
      signal: options.signal,
    });

    const sent = connection
      .send({ type: 'request', id, method, ...(params !== undefined && { params }) })
      .catch((error: unknown) => {
        if (!connection.pendingCalls.reject(id, toError(error))) {
          this.log.debug({ id, method, err: error }, 'send failed after the call settled');
        }
      });

    const [result] = await Promise.all([reply, sent]);
    return options.parse ? options.parse(result) : result;
  }

  /**
   * Sends a notification. No reply is expected.
   */
  async notify(capability: CapabilityKind, method: string, params?: MessageParams): Promise<void> {
    await this.router
      .resolve(capability)
      .send({ type: 'notification', method, ...(params !== undefined && { params }) });
  }

  /**
   * Answers an inbound request.
   */
  async respond(connection: ConnectionManager, id: RequestId, result: unknown): Promise<void> {
    await connection.send({ type: 'response', id, result });
  }

  /**
   * Answers an inbound request with an error.
   */
  async respondError(connection: ConnectionManager, id: RequestId | null, error: ErrorPayload): Promise<void> {
    await connection.send({ type: 'error', id, error });
  }

  /**
   * Installs the receiver of unmatched inbound messages, replacing any
   * previous one. `null` drops them.
   */
  setInboundSink(sink: InboundSink | null): void {
    this.sink = sink;
  }

  /**
   * Stops listening to the router's connections.
   */
  detach(): void {
    for (const detach of this.detachers.splice(0)) {
      detach();
    }
  }

  private route(message: Message, connection: ConnectionManager): void {
    if ((message.type === 'response' || message.type === 'error') && connection.pendingCalls.settle(message)) {
      return;
    }

    const sink = this.sink;
    if (sink === null) {
      this.log.debug({ type: message.type, connection: connection.name }, 'no inbound sink, message dropped');
      return;
    }

    void new Promise<void>((resolve) => {
      resolve(sink(message, connection));
    }).catch((error: unknown) => {
      this.log.error({ err: error, type: message.type, connection: connection.name }, 'inbound sink failed');
    });
  }
}
