/**
 * Connection lifecycle management.
 *
 * A {@link ConnectionManager} owns one transport and drives it through an
 * explicit state machine:
 *
 * ```
 * initializing ──► active ◄──► degraded ──► reconnecting ──► active
 *       │                                        │
 *       └──────────► reconnecting                └──► failed
 *
 * any non-terminal state ──► closed (shutdown)
 * ```
 *
 * @module connection/connection-manager
 */

import { EventEmitter } from 'node:events';

import type { ConnectionPolicy } from '../config/index.js';
import {
  ConnectionClosedError,
  ConnectionNotActiveError,
  ConnectionResetError,
  DecodeError,
  ReconnectExhaustedError,
  TransportError,
  toError,
  type TransportKind,
  type TransportOperation,
} from '../errors.js';
import { createLogger, type Logger } from '../logging/index.js';
import { MessageCodec } from '../protocol/codec.js';
import type { Message } from '../protocol/types.js';
import type { Transport } from '../transport/index.js';
import { Backoff, type RandomSource } from './backoff.js';
import { PendingCalls, type PendingCallsStats } from './pending-calls.js';
import { SendGate } from './send-gate.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Lifecycle state of a connection.
 */
export type ConnectionState =
  | 'initializing'
  | 'active'
  | 'degraded'
  | 'reconnecting'
  | 'closed'
  | 'failed';

/**
 * Allowed transitions. `closed` and `failed` are terminal.
 */
export const CONNECTION_TRANSITIONS: Readonly<Record<ConnectionState, readonly ConnectionState[]>> = {
  initializing: ['active', 'reconnecting', 'failed', 'closed'],
  active: ['degraded', 'closed'],
  degraded: ['active', 'reconnecting', 'closed'],
  reconnecting: ['active', 'failed', 'closed'],
  closed: [],
  failed: [],
};

/**
 * Options for {@link ConnectionManager}.
 */
export interface ConnectionManagerOptions {
  /** Name used in errors and logs (default: the transport kind) */
  readonly name?: string;

  readonly policy: ConnectionPolicy;
  readonly logger?: Logger;

  /** Random source for backoff jitter */
  readonly random?: RandomSource;
}

/**
 * Events emitted by ConnectionManager.
 */
export interface ConnectionManagerEvents {
  /** Emitted on every state transition */
  stateChange: [from: ConnectionState, to: ConnectionState];

  /** Emitted for every decoded inbound message */
  message: [message: Message];

  /** Emitted before each reconnection attempt */
  reconnecting: [attempt: number, delayMs: number];

  /** Emitted once when the reconnection budget is exhausted */
  failed: [error: ReconnectExhaustedError];

  /** Emitted on transport faults. Only emitted when someone listens. */
  error: [error: Error];
}

/**
 * Statistics for a connection.
 */
export interface ConnectionManagerStats {
  readonly name: string;
  readonly transport: TransportKind;
  readonly state: ConnectionState;
  readonly messagesSent: number;
  readonly messagesReceived: number;

  /** Inbound payloads dropped because they could not be decoded */
  readonly decodeErrors: number;

  /** Attempts made in the current reconnection cycle */
  readonly reconnectAttempts: number;

  /** Successful reconnections over the connection's lifetime */
  readonly reconnects: number;
  readonly lastSentAt: number | null;
  readonly lastReceivedAt: number | null;

  /** Timestamp of the last transition into `active` */
  readonly activeSince: number | null;
  readonly pendingCalls: PendingCallsStats;
}

interface ReadyWaiter {
  readonly resolve: () => void;
  readonly reject: (error: Error) => void;
}

interface Sleeper {
  readonly timer: ReturnType<typeof setTimeout>;
  readonly wake: () => void;
}

// =============================================================================
// ConnectionManager
// =============================================================================

/**
 * Drives one transport through its lifecycle and owns its correlation table.
 *
 * - Sends are accepted while `active` or `degraded` and go out one at a time.
 * - A single reading loop per transport generation decodes inbound payloads;
 *   undecodable ones are logged and dropped.
 * - A failed periodic probe, receive or send moves an active connection to
 *   `degraded`, where up to `maxProbeAttempts` probes decide between
 *   recovering and reconnecting.
 * - After a successful reconnection every call pending from before the drop
 *   fails with {@link ConnectionResetError}.
 *
 * @example
 * ```typescript
 * const connection = new ConnectionManager(transport, { policy: config.connection });
 *
 * connection.on('stateChange', (from, to) => console.log(`${from} → ${to}`));
 * connection.on('message', (message) => handle(message));
 *
 * await connection.start();
 * await connection.send({ type: 'notification', method: 'ready' });
 * await connection.shutdown();
 * ```
 */
export class ConnectionManager extends EventEmitter<ConnectionManagerEvents> {
  readonly name: string;
  readonly pendingCalls: PendingCalls;

  private readonly policy: ConnectionPolicy;
  private readonly log: Logger;
  private readonly backoff: Backoff;
  private readonly gate = new SendGate();

  private state: ConnectionState = 'initializing';
  private started = false;
  private generation = 0;
  private readerGeneration: number | null = null;
  private probing = false;
  private failure: ReconnectExhaustedError | null = null;
  private shutdownPromise: Promise<void> | null = null;

  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
  private readonly sleepers = new Set<Sleeper>();
  private readonly readyWaiters: ReadyWaiter[] = [];

  // Statistics
  private messagesSent = 0;
  private messagesReceived = 0;
  private decodeErrors = 0;
  private reconnects = 0;
  private lastSentAt: number | null = null;
  private lastReceivedAt: number | null = null;
  private activeSince: number | null = null;

  constructor(
    private readonly transport: Transport,
    options: ConnectionManagerOptions,
  ) {
    super();

    this.name = options.name ?? transport.kind;
    this.policy = options.policy;
    this.log = options.logger ?? createLogger('connection', { connection: this.name });
    this.backoff = new Backoff(options.policy.reconnect, options.random);
    this.pendingCalls = new PendingCalls(options.policy.sweepIntervalMs);
  }

  /**
   * Kind of the owned transport.
   */
  get kind(): TransportKind {
    return this.transport.kind;
  }

  /**
   * Returns the current lifecycle state.
   */
  getState(): ConnectionState {
    return this.state;
  }

  /**
   * Whether sends are currently accepted.
   */
  isUsable(): boolean {
    return this.state === 'active' || this.state === 'degraded';
  }

  /**
   * Returns connection statistics.
   */
  getStats(): ConnectionManagerStats {
    return {
      name: this.name,
      transport: this.transport.kind,
      state: this.state,
      messagesSent: this.messagesSent,
      messagesReceived: this.messagesReceived,
      decodeErrors: this.decodeErrors,
      reconnectAttempts: this.backoff.attempts,
      reconnects: this.reconnects,
      lastSentAt: this.lastSentAt,
      lastReceivedAt: this.lastReceivedAt,
      activeSince: this.activeSince,
      pendingCalls: this.pendingCalls.getStats(),
    };
  }

  /**
   * Opens the transport.
   *
   * Resolves once the connection is active. Rejects with
   * {@link ReconnectExhaustedError} if it never becomes active, or with
   * {@link ConnectionClosedError} if it is shut down first.
   */
  start(): Promise<void> {
    if (!this.started && this.state === 'initializing') {
      this.started = true;
      this.runInBackground(this.initialize(), 'initialize');
    }
    return this.ready();
  }

  /**
   * Waits until the connection can carry messages.
   */
  ready(): Promise<void> {
    switch (this.state) {
      case 'active':
      case 'degraded':
        return Promise.resolve();
      case 'failed':
        return Promise.reject(this.failure ?? new ReconnectExhaustedError(this.name, this.backoff.attempts));
      case 'closed':
        return Promise.reject(new ConnectionClosedError(this.name));
      default:
        return new Promise((resolve, reject) => {
          this.readyWaiters.push({ resolve, reject });
        });
    }
  }

  /**
   * Encodes and sends one message.
   *
   * @throws {ConnectionNotActiveError} If the connection is not active or degraded
   * @throws {EncodeError} If the message cannot be encoded
   * @throws {TransportError} If the transport fails to send
   */
  async send(message: Message): Promise<void> {
    if (!this.isUsable()) {
      throw new ConnectionNotActiveError(this.name, this.state);
    }

    const payload = MessageCodec.encode(message);

    await this.gate.run(async () => {
      // The state may have changed while queued behind other sends
      if (!this.isUsable()) {
        throw new ConnectionNotActiveError(this.name, this.state);
      }

      try {
        await this.transport.send(payload);
      } catch (error) {
        const err = toError(error);
        this.handleFault(err, 'send');
        throw err;
      }

      this.messagesSent++;
      this.lastSentAt = Date.now();
    });
  }

  /**
   * Closes the connection for good.
   *
   * Pending calls fail with {@link ConnectionClosedError}. Safe to call more
   * than once and from any state.
   */
  shutdown(): Promise<void> {
    if (this.shutdownPromise === null) {
      this.shutdownPromise = this.doShutdown();
    }
    return this.shutdownPromise;
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  private async initialize(): Promise<void> {
    try {
      await this.transport.open();
    } catch (error) {
      if (this.state !== 'initializing') return;
      this.log.warn({ err: error }, 'initial open failed');
      this.emitError(toError(error));
      this.transition('reconnecting');
      await this.reconnect();
      return;
    }

    if (this.state !== 'initializing') {
      await this.closeTransport();
      return;
    }

    this.activate();
  }

  private activate(): void {
    const from = this.state;
    this.transition('active');
    this.activeSince = Date.now();
    this.backoff.reset();

    if (from === 'reconnecting') {
      this.reconnects++;
      const reset = this.pendingCalls.rejectAll(new ConnectionResetError(this.name));
      if (reset > 0) {
        this.log.info({ calls: reset }, 'failed calls pending before reconnection');
      }
    }

    if (this.readerGeneration !== this.generation) {
      this.startReading();
    }
    this.startHeartbeat();
    this.settleReadyWaiters(null);
  }

  private handleFault(error: Error, operation: TransportOperation): void {
    this.emitError(error);

    if (this.state !== 'active') {
      return;
    }

    this.log.warn({ err: error, operation }, 'transport fault, connection degraded');
    this.transition('degraded');
    this.runInBackground(this.confirmLiveness(), 'confirm liveness');
  }

  private async confirmLiveness(): Promise<void> {
    const { maxProbeAttempts, probeIntervalMs } = this.policy;

    for (let attempt = 1; attempt <= maxProbeAttempts; attempt++) {
      if (attempt > 1) {
        await this.sleep(probeIntervalMs);
      }
      if (this.state !== 'degraded') return;

      try {
        await this.transport.probe();
        if (this.state !== 'degraded') return;
        if (this.readerGeneration === this.generation) {
          this.log.info({ attempt }, 'probe succeeded, connection recovered');
          this.activate();
          return;
        }
        this.log.debug({ attempt }, 'probe succeeded but the reader has stopped');
      } catch (error) {
        if (this.state !== 'degraded') return;
        this.log.debug({ err: error, attempt }, 'probe failed');
      }
    }

    if (this.state !== 'degraded') return;
    this.transition('reconnecting');
    await this.reconnect();
  }

  private async reconnect(): Promise<void> {
    this.stopHeartbeat();
    this.generation++;
    await this.closeTransport();

    while (this.state === 'reconnecting') {
      if (this.backoff.exhausted) {
        this.fail();
        return;
      }

      const delayMs = this.backoff.next();
      const attempt = this.backoff.attempts;
      this.log.info({ attempt, delayMs }, 'reconnecting');
      this.emit('reconnecting', attempt, delayMs);

      await this.sleep(delayMs);
      if (this.state !== 'reconnecting') return;

      try {
        await this.transport.open();
      } catch (error) {
        if (this.state !== 'reconnecting') return;
        this.log.warn({ err: error, attempt }, 'reconnection attempt failed');
        this.emitError(toError(error));
        continue;
      }

      if (this.state !== 'reconnecting') {
        await this.closeTransport();
        return;
      }

      this.activate();
      return;
    }
  }

  private fail(): void {
    const error = new ReconnectExhaustedError(this.name, this.backoff.attempts);
    this.failure = error;
    this.transition('failed');
    this.stopHeartbeat();
    this.pendingCalls.rejectAll(error);
    this.log.error({ attempts: error.attempts }, 'reconnection attempts exhausted');
    this.settleReadyWaiters(error);
    this.emit('failed', error);
  }

  private async doShutdown(): Promise<void> {
    if (this.state !== 'closed' && this.state !== 'failed') {
      this.transition('closed');
    }

    this.generation++;
    this.stopHeartbeat();
    this.wakeSleepers();

    const error = new ConnectionClosedError(this.name);
    this.pendingCalls.rejectAll(error);
    this.settleReadyWaiters(error);

    await this.closeTransport();
    this.log.info('connection shut down');
  }

  private transition(to: ConnectionState): void {
    const from = this.state;
    if (!CONNECTION_TRANSITIONS[from].includes(to)) {
      throw new Error(`Illegal connection transition: ${from} → ${to}`);
    }

    this.state = to;
    this.log.debug({ from, to }, 'state changed');
    this.emit('stateChange', from, to);
  }

  // ===========================================================================
  // Inbound
  // ===========================================================================

  private startReading(): void {
    const generation = this.generation;
    this.readerGeneration = generation;
    this.runInBackground(this.readLoop(generation), 'read loop');
  }

  private async readLoop(generation: number): Promise<void> {
    while (this.generation === generation) {
      let payload: Buffer;
      try {
        payload = await this.transport.receive();
      } catch (error) {
        if (this.generation !== generation) return;
        if (error instanceof TransportError && !error.fatal) {
          // The reader stays current; liveness checks decide whether the link recovers.
          this.handleFault(error, 'receive');
          continue;
        }
        this.readerGeneration = null;
        this.handleFault(toError(error), 'receive');
        return;
      }

      if (this.generation !== generation) return;
      this.handleInbound(payload);
    }
  }

  private handleInbound(payload: Buffer): void {
    let message: Message;
    try {
      message = MessageCodec.decode(payload);
    } catch (error) {
      if (error instanceof DecodeError) {
        this.decodeErrors++;
        this.log.warn({ kind: error.kind, reason: error.reason }, 'dropping undecodable message');
        return;
      }
      throw error;
    }

    this.messagesReceived++;
    this.lastReceivedAt = Date.now();
    this.emit('message', message);
  }

  // ===========================================================================
  // Heartbeat
  // ===========================================================================

  private startHeartbeat(): void {
    if (this.heartbeatTimer !== null) {
      return;
    }

    this.heartbeatTimer = setInterval(() => {
      this.heartbeat();
    }, this.policy.heartbeatIntervalMs);

    // Don't block process exit
    this.heartbeatTimer.unref();
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer !== null) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }

  private heartbeat(): void {
    if (this.state !== 'active' || this.probing) {
      return;
    }

    this.probing = true;
    this.transport.probe().then(
      () => {
        this.probing = false;
      },
      (error: unknown) => {
        this.probing = false;
        this.log.warn({ err: error }, 'heartbeat missed');
        this.handleFault(toError(error), 'probe');
      },
    );
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private async closeTransport(): Promise<void> {
    try {
      await this.transport.close();
    } catch (error) {
      this.log.warn({ err: error }, 'transport close failed');
    }
  }

  private emitError(error: Error): void {
    if (this.listenerCount('error') > 0) {
      this.emit('error', error);
    }
  }

  private settleReadyWaiters(error: Error | null): void {
    const waiters = this.readyWaiters.splice(0);
    for (const waiter of waiters) {
      if (error === null) {
        waiter.resolve();
      } else {
        waiter.reject(error);
      }
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const sleeper: Sleeper = {
        timer: setTimeout(() => {
          this.sleepers.delete(sleeper);
          resolve();
        }, ms),
        wake: resolve,
      };
      this.sleepers.add(sleeper);
    });
  }

  private wakeSleepers(): void {
    for (const sleeper of this.sleepers) {
      clearTimeout(sleeper.timer);
      sleeper.wake();
    }
    this.sleepers.clear();
  }

  private runInBackground(task: Promise<void>, label: string): void {
    task.catch((error: unknown) => {
      this.log.error({ err: error, task: label }, 'background task failed');
      this.emitError(toError(error));
    });
  }
}
