/**
 * Raw TCP transport.
 *
 * Payloads travel as newline-delimited lines, the same framing as the pipe
 * transport. The transport either dials the peer or listens for it.
 *
 * @module transport/tcp-transport
 */

import * as net from 'node:net';

import type { TcpConfig } from '../config/index.js';
import { TransportError } from '../errors.js';
import { createLogger, type Logger } from '../logging/index.js';
import { frameLine, LineFramer } from '../protocol/line-framer.js';
import { FrameQueue } from './frame-queue.js';
import type { Transport, TransportOptions } from './types.js';

/**
 * Time a half-closed connection gets to finish before it is destroyed.
 */
const CLOSE_TIMEOUT_MS = 1000;

interface AcceptWaiter {
  readonly resolve: (socket: net.Socket) => void;
  readonly reject: (error: TransportError) => void;
}

// =============================================================================
// TcpTransport
// =============================================================================

/**
 * Transport over a single TCP connection.
 *
 * In `connect` mode, {@link open} dials `host:port` within
 * `connectTimeoutMs`. In `listen` mode, it binds `host:port` and resolves
 * once a peer connects; only one peer is served at a time and further
 * connections are refused while one is open. A port of `0` is bound once
 * and reused on every reopen.
 *
 * Keep-alive is enabled on every connection; {@link probe} fails once the
 * connection is gone or no longer writable.
 *
 * @example
 * ```typescript
 * const transport = new TcpTransport({
 *   mode: 'connect',
 *   host: 'localhost',
 *   port: 7400,
 *   connectTimeoutMs: 10000,
 *   keepAliveMs: 30000,
 * });
 * await transport.open();
 * ```
 */
export class TcpTransport implements Transport {
  readonly kind = 'tcp' as const;

  private readonly queue = new FrameQueue();
  private readonly log: Logger;

  private socket: net.Socket | null = null;
  private server: net.Server | null = null;
  private boundPort: number | null = null;
  private acceptWaiter: AcceptWaiter | null = null;
  private waitingPeer: net.Socket | null = null;

  constructor(
    private readonly config: TcpConfig,
    options: TransportOptions = {},
  ) {
    this.log = options.logger ?? createLogger('transport', { transport: 'tcp' });
  }

  /**
   * Port the transport listens on, or `null` when it is not listening.
   */
  get listeningPort(): number | null {
    return this.server === null ? null : this.boundPort;
  }

  isOpen(): boolean {
    return this.socket !== null && !this.socket.destroyed;
  }

  async open(): Promise<void> {
    if (this.isOpen()) {
      return;
    }
    this.discard();

    this.queue.reset(new TransportError('tcp', 'receive', 'transport reopened'));

    const socket = this.config.mode === 'connect' ? await this.dial() : await this.accept();
    this.attach(socket);
    this.log.debug({ remote: `${socket.remoteAddress ?? '?'}:${socket.remotePort ?? '?'}` }, 'tcp connection open');
  }

  send(payload: Buffer): Promise<void> {
    const socket = this.socket;
    if (socket === null || socket.destroyed) {
      return Promise.reject(new TransportError('tcp', 'send', 'transport is not open'));
    }

    return new Promise((resolve, reject) => {
      socket.write(frameLine(payload), (error) => {
        if (error) {
          reject(new TransportError('tcp', 'send', error.message, true, { cause: error }));
          return;
        }
        resolve();
      });
    });
  }

  receive(): Promise<Buffer> {
    return this.queue.next();
  }

  async probe(): Promise<void> {
    const socket = this.socket;
    if (socket === null || socket.destroyed) {
      throw new TransportError('tcp', 'probe', 'transport is not open');
    }
    if (!socket.writable) {
      throw new TransportError('tcp', 'probe', 'connection is not writable');
    }
  }

  async close(): Promise<void> {
    const waiter = this.acceptWaiter;
    this.acceptWaiter = null;
    waiter?.reject(new TransportError('tcp', 'open', 'transport closed'));

    this.waitingPeer?.destroy();
    this.waitingPeer = null;

    const socket = this.socket;
    if (socket !== null) {
      this.socket = null;
      this.queue.fail(new TransportError('tcp', 'receive', 'transport closed'), true);
      await endSocket(socket);
    }

    const server = this.server;
    if (server !== null) {
      this.server = null;
      await new Promise<void>((resolve) => {
        server.close((error) => {
          if (error) {
            this.log.debug({ err: error }, 'server was not running');
          }
          resolve();
        });
      });
    }
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private dial(): Promise<net.Socket> {
    const { host, port, connectTimeoutMs } = this.config;

    return new Promise((resolve, reject) => {
      let settled = false;
      const socket = new net.Socket();
      this.guard(socket);

      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        socket.destroy();
        reject(new TransportError('tcp', 'open', `no connection to ${host}:${port} within ${connectTimeoutMs}ms`));
      }, connectTimeoutMs);

      const onError = (error: Error): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        socket.destroy();
        reject(new TransportError('tcp', 'open', error.message, true, { cause: error }));
      };

      socket.once('connect', () => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        socket.off('error', onError);
        resolve(socket);
      });
      socket.on('error', onError);

      socket.connect(port, host);
    });
  }

  private async accept(): Promise<net.Socket> {
    await this.listen();

    const waiting = this.waitingPeer;
    if (waiting !== null && !waiting.destroyed) {
      this.waitingPeer = null;
      return waiting;
    }

    return new Promise((resolve, reject) => {
      this.acceptWaiter = { resolve, reject };
    });
  }

  private listen(): Promise<void> {
    if (this.server !== null) {
      return Promise.resolve();
    }

    const server = net.createServer((peer) => {
      this.handlePeer(peer);
    });
    this.server = server;
    const port = this.boundPort ?? this.config.port;

    return new Promise((resolve, reject) => {
      const onError = (error: Error): void => {
        if (this.server === server) {
          this.server = null;
        }
        reject(new TransportError('tcp', 'open', `cannot listen on ${this.config.host}:${port}: ${error.message}`, true, { cause: error }));
      };

      server.once('error', onError);
      server.listen(port, this.config.host, () => {
        server.off('error', onError);
        server.on('error', (error) => {
          this.log.warn({ err: error }, 'tcp server error');
        });

        const address = server.address();
        if (address !== null && typeof address === 'object') {
          this.boundPort = address.port;
        }
        this.log.debug({ host: this.config.host, port: this.boundPort }, 'listening');
        resolve();
      });
    });
  }

  private handlePeer(peer: net.Socket): void {
    this.guard(peer);

    const waiter = this.acceptWaiter;
    if (waiter !== null) {
      this.acceptWaiter = null;
      waiter.resolve(peer);
      return;
    }

    if (this.isOpen()) {
      this.log.warn({ remote: peer.remoteAddress }, 'refusing second peer');
      peer.destroy();
      return;
    }

    this.waitingPeer?.destroy();
    this.waitingPeer = peer;
  }

  private attach(socket: net.Socket): void {
    const framer = new LineFramer();
    this.socket = socket;

    socket.setKeepAlive(true, this.config.keepAliveMs);
    socket.setNoDelay(true);

    socket.on('data', (chunk: Buffer) => {
      if (this.socket !== socket) return;
      let frames: Buffer[];
      try {
        frames = framer.push(chunk);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.queue.fail(new TransportError('tcp', 'receive', message, false, { cause: error }), false);
        return;
      }
      for (const frame of frames) {
        this.queue.push(frame);
      }
    });

    socket.on('close', (hadError: boolean) => {
      if (this.socket !== socket) return;
      this.socket = null;
      const reason = hadError ? 'connection reset' : 'connection closed by peer';
      this.log.warn({ reason }, 'tcp connection lost');
      this.queue.fail(new TransportError('tcp', 'receive', reason), true);
    });
  }

  /**
   * Logs socket errors for the socket's whole life; `close` reports the loss.
   */
  private guard(socket: net.Socket): void {
    socket.on('error', (error: Error) => {
      this.log.debug({ err: error }, 'tcp socket error');
    });
  }

  private discard(): void {
    const socket = this.socket;
    this.socket = null;
    socket?.destroy();
  }
}

function endSocket(socket: net.Socket): Promise<void> {
  if (socket.destroyed) {
    return Promise.resolve();
  }

  return new Promise((resolve) => {
    const timer = setTimeout(() => {
      socket.destroy();
    }, CLOSE_TIMEOUT_MS);

    socket.once('close', () => {
      clearTimeout(timer);
      resolve();
    });
    socket.end();
  });
}
