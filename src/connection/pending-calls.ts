/**
 * Correlation table for outstanding requests.
 *
 * Matches replies to the calls that are waiting for them and fails calls
 * whose deadline has passed, that were cancelled, or whose connection went
 * away.
 *
 * @module connection/pending-calls
 */

import {
  CallCancelledError,
  CallTimeoutError,
  DuplicateRequestIdError,
  RemoteError,
} from '../errors.js';
import type { ReplyMessage, RequestId } from '../protocol/types.js';

// =============================================================================
// Types
// =============================================================================

interface PendingCall {
  readonly id: RequestId;
  readonly method: string;
  readonly resolve: (result: unknown) => void;
  readonly reject: (error: Error) => void;
  readonly timeoutMs: number;
  readonly deadline: number;
  readonly createdAt: number;

  /** Removes the abort listener, if any */
  readonly detach: () => void;
}

/**
 * Options for registering a call.
 */
export interface RegisterOptions {
  readonly id: RequestId;
  readonly method: string;
  readonly timeoutMs: number;

  /** Aborting the signal cancels the call locally */
  readonly signal?: AbortSignal | undefined;
}

/**
 * Statistics about pending calls.
 */
export interface PendingCallsStats {
  /** Number of currently pending calls */
  readonly pendingCount: number;

  readonly totalRegistered: number;
  readonly totalResolved: number;

  /** Calls failed by an error reply or a connection event */
  readonly totalRejected: number;
  readonly totalTimedOut: number;
  readonly totalCancelled: number;
}

// =============================================================================
// PendingCalls
// =============================================================================

/**
 * Tracks calls from registration until they are settled exactly once.
 *
 * Deadlines are enforced by a periodic sweep that runs only while calls are
 * pending.
 *
 * @example
 * ```typescript
 * const pending = new PendingCalls(50);
 *
 * const result = pending.register({ id: 1, method: 'add', timeoutMs: 5000 });
 * // ...send the request...
 *
 * // Later, when the reply arrives:
 * pending.settle({ type: 'response', id: 1, result: 5 });
 * await result; // 5
 * ```
 */
export class PendingCalls {
  private readonly pending = new Map<RequestId, PendingCall>();
  private sweepTimer: ReturnType<typeof setInterval> | null = null;

  // Statistics
  private totalRegistered = 0;
  private totalResolved = 0;
  private totalRejected = 0;
  private totalTimedOut = 0;
  private totalCancelled = 0;

  constructor(private readonly sweepIntervalMs: number) {}

  /**
   * Registers a call and returns the promise of its result.
   *
   * @throws {DuplicateRequestIdError} If `id` is already pending
   */
  register(options: RegisterOptions): Promise<unknown> {
    const { id, method, timeoutMs, signal } = options;

    if (this.pending.has(id)) {
      throw new DuplicateRequestIdError(id);
    }

    if (signal?.aborted) {
      this.totalCancelled++;
      return Promise.reject(new CallCancelledError(id, method));
    }

    const promise = new Promise<unknown>((resolve, reject) => {
      const onAbort = (): void => {
        this.cancel(id);
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      const now = Date.now();
      this.pending.set(id, {
        id,
        method,
        resolve,
        reject,
        timeoutMs,
        deadline: now + timeoutMs,
        createdAt: now,
        detach: () => signal?.removeEventListener('abort', onAbort),
      });
    });

    this.totalRegistered++;
    this.ensureSweeping();

    return promise;
  }

  /**
   * Completes the call a reply belongs to.
   *
   * An error reply rejects the call with a {@link RemoteError}.
   *
   * @returns true if a pending call matched the reply
   */
  settle(reply: ReplyMessage): boolean {
    if (reply.id === null) {
      return false;
    }

    const call = this.take(reply.id);
    if (!call) {
      return false;
    }

    if (reply.type === 'response') {
      this.totalResolved++;
      call.resolve(reply.result);
    } else {
      this.totalRejected++;
      call.reject(RemoteError.fromPayload(reply.error));
    }
    return true;
  }

  /**
   * Fails one pending call.
   *
   * @returns true if the call was pending
   */
  reject(id: RequestId, error: Error): boolean {
    const call = this.take(id);
    if (!call) {
      return false;
    }

    this.totalRejected++;
    call.reject(error);
    return true;
  }

  /**
   * Cancels a pending call locally. Nothing is sent to the peer; a reply
   * arriving later no longer matches anything.
   *
   * @returns true if the call was pending
   */
  cancel(id: RequestId): boolean {
    const call = this.take(id);
    if (!call) {
      return false;
    }

    this.totalCancelled++;
    call.reject(new CallCancelledError(call.id, call.method));
    return true;
  }

  /**
   * Fails every pending call with the same error.
   *
   * @returns Number of calls failed
   */
  rejectAll(error: Error): number {
    const calls = [...this.pending.values()];
    this.pending.clear();
    this.stopSweeping();

    for (const call of calls) {
      call.detach();
      this.totalRejected++;
      call.reject(error);
    }

    return calls.length;
  }

  /**
   * Fails every call whose deadline has passed.
   *
   * @returns Number of calls timed out
   */
  sweep(now: number = Date.now()): number {
    const expired: PendingCall[] = [];
    for (const call of this.pending.values()) {
      if (call.deadline <= now) {
        expired.push(call);
      }
    }

    for (const call of expired) {
      this.take(call.id);
      this.totalTimedOut++;
      call.reject(new CallTimeoutError(call.id, call.method, call.timeoutMs));
    }

    return expired.length;
  }

  /**
   * Checks if a call is pending.
   */
  has(id: RequestId): boolean {
    return this.pending.has(id);
  }

  /**
   * Gets information about a pending call.
   */
  get(id: RequestId): {
    readonly method: string;
    readonly timeoutMs: number;
    readonly createdAt: number;
    readonly elapsedMs: number;
  } | undefined {
    const call = this.pending.get(id);
    if (!call) {
      return undefined;
    }

    return {
      method: call.method,
      timeoutMs: call.timeoutMs,
      createdAt: call.createdAt,
      elapsedMs: Date.now() - call.createdAt,
    };
  }

  /**
   * Returns the number of currently pending calls.
   */
  get size(): number {
    return this.pending.size;
  }

  /**
   * Returns statistics about pending calls.
   */
  getStats(): PendingCallsStats {
    return {
      pendingCount: this.pending.size,
      totalRegistered: this.totalRegistered,
      totalResolved: this.totalResolved,
      totalRejected: this.totalRejected,
      totalTimedOut: this.totalTimedOut,
      totalCancelled: this.totalCancelled,
    };
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private take(id: RequestId): PendingCall | undefined {
    const call = this.pending.get(id);
    if (!call) {
      return undefined;
    }

    this.pending.delete(id);
    call.detach();
    if (this.pending.size === 0) {
      this.stopSweeping();
    }
    return call;
  }

  private ensureSweeping(): void {
    if (this.sweepTimer !== null) {
      return;
    }

    this.sweepTimer = setInterval(() => {
      this.sweep();
    }, this.sweepIntervalMs);

    // Don't block process exit
    this.sweepTimer.unref();
  }

  private stopSweeping(): void {
    if (this.sweepTimer !== null) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }
}
