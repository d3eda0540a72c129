/**
 * Event-stream transport.
 *
 * Inbound payloads arrive as `message` events on a long-lived
 * `text/event-stream` GET. Each outbound payload is POSTed separately.
 *
 * @module transport/event-stream-transport
 */

import * as http from 'node:http';
import * as https from 'node:https';

import type { EventStreamConfig } from '../config/index.js';
import { TransportError } from '../errors.js';
import { createLogger, type Logger } from '../logging/index.js';
import { EventStreamParser, type ServerSentEvent } from '../protocol/event-stream-parser.js';
import { FrameQueue } from './frame-queue.js';
import { authorizationHeader, type Transport, type TransportOptions } from './types.js';

/**
 * Event carrying one encoded payload.
 */
export const MESSAGE_EVENT = 'message';

/**
 * Event announcing the URL outbound payloads are POSTed to.
 */
export const ENDPOINT_EVENT = 'endpoint';

interface EndpointWaiter {
  readonly resolve: (url: URL) => void;
  readonly reject: (error: TransportError) => void;
}

interface Stream {
  readonly request: http.ClientRequest;
  response: http.IncomingMessage | null;
  ended: boolean;
}

function startRequest(url: URL, options: http.RequestOptions): http.ClientRequest {
  return url.protocol === 'https:' ? https.request(url, options) : http.request(url, options);
}

// =============================================================================
// EventStreamTransport
// =============================================================================

/**
 * Transport pairing a server-sent event stream with out-of-band POSTs.
 *
 * On reopen the id of the last received event is sent as `Last-Event-ID`
 * so the server can resume the stream.
 *
 * @example
 * ```typescript
 * const transport = new EventStreamTransport({
 *   url: 'http://localhost:8080/events',
 *   connectTimeoutMs: 10000,
 *   stallTimeoutMs: 45000,
 * });
 * await transport.open(); // waits for the server's `endpoint` event
 * ```
 */
export class EventStreamTransport implements Transport {
  readonly kind = 'eventStream' as const;

  private readonly queue = new FrameQueue();
  private readonly log: Logger;
  private readonly streamUrl: URL;

  private parser = new EventStreamParser();
  private stream: Stream | null = null;
  private postUrl: URL | null = null;
  private authHeaders: Record<string, string> = {};
  private lastActivityAt = 0;
  private endpointWaiter: EndpointWaiter | null = null;

  constructor(
    private readonly config: EventStreamConfig,
    private readonly options: TransportOptions = {},
  ) {
    this.streamUrl = new URL(config.url);
    this.log = options.logger ?? createLogger('transport', { transport: 'eventStream' });
  }

  /**
   * Id of the last event received, sent as `Last-Event-ID` on reopen.
   */
  get lastEventId(): string | undefined {
    return this.parser.lastEventId;
  }

  isOpen(): boolean {
    return this.stream !== null && !this.stream.ended && this.postUrl !== null;
  }

  async open(): Promise<void> {
    if (this.isOpen()) {
      return;
    }
    this.teardown();

    this.queue.reset(new TransportError('eventStream', 'receive', 'transport reopened'));
    this.parser = new EventStreamParser(this.parser.lastEventId);
    this.postUrl = this.config.postUrl !== undefined ? new URL(this.config.postUrl) : null;
    this.authHeaders = await authorizationHeader(this.options.authTokenProvider);

    const headers: Record<string, string> = {
      Accept: 'text/event-stream',
      'Cache-Control': 'no-cache',
      ...this.config.headers,
      ...this.authHeaders,
    };
    const lastEventId = this.parser.lastEventId;
    if (lastEventId !== undefined) {
      headers['Last-Event-ID'] = lastEventId;
    }

    try {
      await this.connect(headers);
    } catch (error) {
      this.teardown();
      throw error;
    }

    this.log.debug({ url: this.config.url, lastEventId, postUrl: this.postUrl?.href }, 'stream opened');
  }

  send(payload: Buffer): Promise<void> {
    const target = this.postUrl;
    if (target === null || this.stream === null) {
      return Promise.reject(new TransportError('eventStream', 'send', 'transport is not open'));
    }

    return new Promise((resolve, reject) => {
      const request = startRequest(target, {
        method: 'POST',
        headers: {
          ...this.config.headers,
          ...this.authHeaders,
          'Content-Type': 'application/json',
          'Content-Length': payload.length,
        },
        timeout: this.config.connectTimeoutMs,
      });

      request.on('response', (response) => {
        response.resume();
        const status = response.statusCode ?? 0;
        if (status >= 200 && status < 300) {
          resolve();
        } else {
          reject(new TransportError('eventStream', 'send', `POST returned status ${status}`, false));
        }
      });

      request.on('timeout', () => {
        request.destroy(new Error(`no response within ${this.config.connectTimeoutMs}ms`));
      });

      request.on('error', (error) => {
        reject(new TransportError('eventStream', 'send', error.message, true, { cause: error }));
      });

      request.end(payload);
    });
  }

  receive(): Promise<Buffer> {
    return this.queue.next();
  }

  async probe(): Promise<void> {
    const stream = this.stream;
    if (stream === null || stream.ended) {
      throw new TransportError('eventStream', 'probe', 'stream has ended');
    }
    const silentForMs = Date.now() - this.lastActivityAt;
    if (silentForMs > this.config.stallTimeoutMs) {
      throw new TransportError('eventStream', 'probe', `stream silent for ${silentForMs}ms`);
    }
  }

  async close(): Promise<void> {
    if (this.stream === null) {
      return;
    }
    this.teardown();
    this.queue.fail(new TransportError('eventStream', 'receive', 'transport closed'), true);
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private connect(headers: Record<string, string>): Promise<void> {
    return new Promise((resolve, reject) => {
      let settled = false;

      const fail = (error: TransportError): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        this.endpointWaiter = null;
        reject(error);
      };

      const succeed = (): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        this.endpointWaiter = null;
        resolve();
      };

      const timer = setTimeout(() => {
        const waitingFor = stream.response === null ? 'stream response' : 'endpoint event';
        fail(new TransportError('eventStream', 'open', `no ${waitingFor} within ${this.config.connectTimeoutMs}ms`));
      }, this.config.connectTimeoutMs);

      const request = startRequest(this.streamUrl, { method: 'GET', headers });
      const stream: Stream = { request, response: null, ended: false };
      this.stream = stream;

      request.on('response', (response) => {
        const status = response.statusCode ?? 0;
        const contentType = response.headers['content-type'] ?? '';
        if (status !== 200 || !contentType.includes('text/event-stream')) {
          response.resume();
          fail(new TransportError('eventStream', 'open', `unexpected response: status ${status}, content-type '${contentType}'`));
          return;
        }

        stream.response = response;
        this.lastActivityAt = Date.now();
        response.setEncoding('utf8');
        response.on('data', (chunk: string) => this.handleChunk(stream, chunk));
        response.on('end', () => this.handleEnd(stream, 'stream ended'));
        response.on('close', () => this.handleEnd(stream, 'stream closed'));

        if (this.postUrl !== null) {
          succeed();
        } else {
          this.endpointWaiter = {
            resolve: (url) => {
              this.postUrl = url;
              succeed();
            },
            reject: fail,
          };
        }
      });

      request.on('error', (error) => {
        if (!settled) {
          fail(new TransportError('eventStream', 'open', error.message, true, { cause: error }));
          return;
        }
        this.handleEnd(stream, error.message, error);
      });

      request.end();
    });
  }

  private handleChunk(stream: Stream, chunk: string): void {
    if (this.stream !== stream) return;
    this.lastActivityAt = Date.now();

    let events: ServerSentEvent[];
    try {
      events = this.parser.push(chunk);
    } catch (error) {
      // The rest of the oversized line would be misread as fields
      const message = error instanceof Error ? error.message : String(error);
      this.handleEnd(stream, message, error);
      stream.response?.destroy();
      return;
    }

    for (const event of events) {
      this.handleEvent(event);
    }
  }

  private handleEvent(event: ServerSentEvent): void {
    switch (event.event) {
      case MESSAGE_EVENT:
        this.queue.push(Buffer.from(event.data, 'utf8'));
        break;
      case ENDPOINT_EVENT: {
        let url: URL;
        try {
          url = new URL(event.data.trim(), this.streamUrl);
        } catch (error) {
          this.log.warn({ err: error, data: event.data }, 'ignoring invalid endpoint event');
          return;
        }
        if (this.endpointWaiter !== null) {
          this.endpointWaiter.resolve(url);
        } else {
          this.postUrl = url;
        }
        break;
      }
      default:
        this.log.debug({ event: event.event }, 'ignoring event');
    }
  }

  private handleEnd(stream: Stream, reason: string, cause?: unknown): void {
    if (this.stream !== stream || stream.ended) return;
    stream.ended = true;
    if (this.endpointWaiter !== null) {
      this.endpointWaiter.reject(new TransportError('eventStream', 'open', `${reason} before endpoint event`, true, { cause }));
      return;
    }
    this.log.warn({ reason }, 'event stream lost');
    this.queue.fail(new TransportError('eventStream', 'receive', reason, true, { cause }), true);
  }

  private teardown(): void {
    const stream = this.stream;
    this.stream = null;
    this.endpointWaiter = null;
    if (stream !== null) {
      stream.ended = true;
      stream.response?.destroy();
      stream.request.destroy();
    }
  }
}
