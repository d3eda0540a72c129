import { FrameQueue } from '../../src/transport/frame-queue.js';
import { TransportError, type TransportKind } from '../../src/errors.js';
import { MessageCodec } from '../../src/protocol/codec.js';
import type { Message, RequestMessage } from '../../src/protocol/types.js';
import type { Transport } from '../../src/transport/types.js';

/**
 * In-memory transport driven by the test.
 */
export class FakeTransport implements Transport {
  readonly sent: Message[] = [];

  opens = 0;
  closes = 0;
  probes = 0;

  /** Number of upcoming open() calls that fail */
  openFailures = 0;
  probeOk = true;
  sendError: Error | null = null;

  /** Answers outbound requests; return undefined to stay silent */
  responder: ((request: RequestMessage) => Message | undefined) | null = null;

  private readonly queue = new FrameQueue();
  private opened = false;

  constructor(readonly kind: TransportKind = 'socket') {}

  async open(): Promise<void> {
    this.opens++;
    if (this.openFailures > 0) {
      this.openFailures--;
      throw new TransportError(this.kind, 'open', 'connection refused');
    }
    this.queue.reset(new TransportError(this.kind, 'receive', 'transport reopened'));
    this.opened = true;
  }

  async send(payload: Buffer): Promise<void> {
    if (!this.opened) {
      throw new TransportError(this.kind, 'send', 'transport is not open');
    }
    if (this.sendError) {
      throw this.sendError;
    }

    const message = MessageCodec.decode(payload);
    this.sent.push(message);

    const responder = this.responder;
    if (responder && message.type === 'request') {
      const reply = responder(message);
      if (reply) {
        queueMicrotask(() => this.deliver(reply));
      }
    }
  }

  receive(): Promise<Buffer> {
    return this.queue.next();
  }

  async probe(): Promise<void> {
    this.probes++;
    if (!this.opened || !this.probeOk) {
      throw new TransportError(this.kind, 'probe', 'no answer');
    }
  }

  async close(): Promise<void> {
    this.closes++;
    this.opened = false;
    this.queue.fail(new TransportError(this.kind, 'receive', 'transport closed'), true);
  }

  isOpen(): boolean {
    return this.opened;
  }

  // Test controls

  deliver(message: Message): void {
    this.queue.push(MessageCodec.encode(message));
  }

  deliverRaw(payload: Buffer): void {
    this.queue.push(payload);
  }

  /** Fails one receive without losing the connection */
  hiccup(reason = 'garbled frame'): void {
    this.queue.fail(new TransportError(this.kind, 'receive', reason, false), false);
  }

  /** Simulates the peer going away */
  drop(reason = 'connection lost'): void {
    this.opened = false;
    this.queue.fail(new TransportError(this.kind, 'receive', reason), true);
  }

  requests(): RequestMessage[] {
    return this.sent.filter((message): message is RequestMessage => message.type === 'request');
  }
}
