/**
 * WebSocket transport.
 *
 * @module transport/socket-transport
 */

import { WebSocket, type RawData } from 'ws';

import type { SocketConfig } from '../config/index.js';
import { TransportError } from '../errors.js';
import { createLogger, type Logger } from '../logging/index.js';
import { FrameQueue } from './frame-queue.js';
import { authorizationHeader, type Transport, type TransportOptions } from './types.js';

/**
 * Time a closing handshake may take before the socket is terminated.
 */
const CLOSE_TIMEOUT_MS = 1000;

/**
 * Normal closure status code.
 */
const NORMAL_CLOSURE = 1000;

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data);
  }
  return Buffer.from(data);
}

/**
 * Builds the socket URL from its configuration.
 */
export function socketUrl(config: SocketConfig): string {
  const scheme = config.secure ? 'wss' : 'ws';
  return `${scheme}://${config.host}:${config.port}${config.path}`;
}

// =============================================================================
// SocketTransport
// =============================================================================

/**
 * Transport over a WebSocket, one payload per text frame.
 *
 * Pings from the peer are answered automatically. {@link probe} sends a ping
 * of its own and fails when no pong arrives within `heartbeatTimeoutMs`.
 *
 * @example
 * ```typescript
 * const transport = new SocketTransport(
 *   { host: 'localhost', port: 9000, path: '/rpc', secure: false, connectTimeoutMs: 10000, heartbeatTimeoutMs: 5000 },
 *   { authTokenProvider: () => process.env.API_TOKEN },
 * );
 * await transport.open();
 * ```
 */
export class SocketTransport implements Transport {
  readonly kind = 'socket' as const;

  private readonly queue = new FrameQueue();
  private readonly log: Logger;
  private readonly url: string;

  private socket: WebSocket | null = null;

  constructor(
    private readonly config: SocketConfig,
    private readonly options: TransportOptions = {},
  ) {
    this.url = socketUrl(config);
    this.log = options.logger ?? createLogger('transport', { transport: 'socket' });
  }

  isOpen(): boolean {
    return this.socket !== null && this.socket.readyState === WebSocket.OPEN;
  }

  async open(): Promise<void> {
    if (this.isOpen()) {
      return;
    }
    this.discard();

    this.queue.reset(new TransportError('socket', 'receive', 'transport reopened'));
    const headers = { ...this.config.headers, ...(await authorizationHeader(this.options.authTokenProvider)) };

    const socket = new WebSocket(this.url, {
      headers,
      handshakeTimeout: this.config.connectTimeoutMs,
    });
    this.socket = socket;

    socket.on('error', (error: Error) => {
      this.log.warn({ err: error }, 'socket error');
    });

    try {
      await waitForOpen(socket);
    } catch (error) {
      if (this.socket === socket) {
        this.socket = null;
      }
      socket.terminate();
      const message = error instanceof Error ? error.message : String(error);
      throw new TransportError('socket', 'open', message, true, { cause: error });
    }

    socket.on('message', (data: RawData, isBinary: boolean) => {
      if (this.socket !== socket) return;
      if (isBinary) {
        this.log.debug('binary frame received');
      }
      this.queue.push(toBuffer(data));
    });

    socket.on('close', (code: number, reason: Buffer) => {
      if (this.socket !== socket) return;
      this.socket = null;
      const detail = reason.length > 0 ? `${code} ${reason.toString('utf8')}` : String(code);
      this.log.warn({ code }, 'socket closed by peer');
      this.queue.fail(new TransportError('socket', 'receive', `socket closed (${detail})`), true);
    });

    this.log.debug({ url: this.url }, 'socket opened');
  }

  send(payload: Buffer): Promise<void> {
    const socket = this.socket;
    if (socket === null || socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new TransportError('socket', 'send', 'transport is not open'));
    }

    return new Promise((resolve, reject) => {
      socket.send(payload, { binary: false }, (error) => {
        if (error) {
          reject(new TransportError('socket', 'send', error.message, true, { cause: error }));
          return;
        }
        resolve();
      });
    });
  }

  receive(): Promise<Buffer> {
    return this.queue.next();
  }

  probe(): Promise<void> {
    const socket = this.socket;
    if (socket === null || socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new TransportError('socket', 'probe', 'transport is not open'));
    }

    return new Promise((resolve, reject) => {
      const onPong = (): void => {
        clearTimeout(timer);
        resolve();
      };

      const timer = setTimeout(() => {
        socket.off('pong', onPong);
        reject(new TransportError('socket', 'probe', `no pong within ${this.config.heartbeatTimeoutMs}ms`));
      }, this.config.heartbeatTimeoutMs);

      socket.once('pong', onPong);
      socket.ping();
    });
  }

  async close(): Promise<void> {
    const socket = this.socket;
    if (socket === null) {
      return;
    }

    this.socket = null;
    this.queue.fail(new TransportError('socket', 'receive', 'transport closed'), true);

    if (socket.readyState === WebSocket.CLOSED) {
      return;
    }

    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        socket.terminate();
        resolve();
      }, CLOSE_TIMEOUT_MS);

      socket.once('close', () => {
        clearTimeout(timer);
        resolve();
      });

      if (socket.readyState === WebSocket.CONNECTING) {
        socket.terminate();
      } else {
        socket.close(NORMAL_CLOSURE);
      }
    });
  }

  private discard(): void {
    const socket = this.socket;
    this.socket = null;
    socket?.terminate();
  }
}

function waitForOpen(socket: WebSocket): Promise<void> {
  return new Promise((resolve, reject) => {
    const cleanup = (): void => {
      socket.off('open', onOpen);
      socket.off('error', onError);
      socket.off('unexpected-response', onUnexpected);
    };

    const onOpen = (): void => {
      cleanup();
      resolve();
    };

    const onError = (error: Error): void => {
      cleanup();
      reject(error);
    };

    const onUnexpected = (_request: unknown, response: { statusCode?: number | undefined }): void => {
      cleanup();
      reject(new Error(`unexpected server response: ${response.statusCode ?? 'unknown'}`));
    };

    socket.on('open', onOpen);
    socket.on('error', onError);
    socket.on('unexpected-response', onUnexpected);
  });
}
