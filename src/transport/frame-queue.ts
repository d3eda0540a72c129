/**
 * Hand-off between a transport's inbound events and `receive()` callers.
 *
 * @module transport/frame-queue
 */

interface Waiter {
  readonly resolve: (frame: Buffer) => void;
  readonly reject: (error: Error) => void;
}

/**
 * Queue of received frames with restartable failure semantics.
 *
 * A transient failure rejects one receive (the oldest waiting one, or the
 * next one to arrive). A fatal failure rejects every receive until
 * {@link reset} is called. Frames that arrived before a failure are still
 * delivered first.
 *
 * @example
 * ```typescript
 * const queue = new FrameQueue();
 * const next = queue.next();
 * queue.push(Buffer.from('{"jsonrpc":"2.0","method":"ping"}'));
 * await next;
 * ```
 */
export class FrameQueue {
  private readonly frames: Buffer[] = [];
  private readonly waiters: Waiter[] = [];
  private readonly transientErrors: Error[] = [];
  private fatalError: Error | null = null;

  /**
   * Number of frames waiting to be received.
   */
  get size(): number {
    return this.frames.length;
  }

  /**
   * Whether a fatal failure is in effect.
   */
  get failed(): boolean {
    return this.fatalError !== null;
  }

  /**
   * Delivers a frame to the oldest waiter or buffers it.
   */
  push(frame: Buffer): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(frame);
      return;
    }
    this.frames.push(frame);
  }

  /**
   * Records a failure.
   */
  fail(error: Error, fatal: boolean): void {
    if (fatal) {
      if (this.fatalError === null) {
        this.fatalError = error;
      }
      const waiters = this.waiters.splice(0);
      for (const waiter of waiters) {
        waiter.reject(error);
      }
      return;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.reject(error);
    } else {
      this.transientErrors.push(error);
    }
  }

  /**
   * Resolves with the next frame.
   */
  next(): Promise<Buffer> {
    const frame = this.frames.shift();
    if (frame) {
      return Promise.resolve(frame);
    }

    const transient = this.transientErrors.shift();
    if (transient) {
      return Promise.reject(transient);
    }

    if (this.fatalError !== null) {
      return Promise.reject(this.fatalError);
    }

    return new Promise<Buffer>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  /**
   * Starts a new generation: clears buffered frames and failures.
   * Receives still waiting from the previous generation are rejected.
   */
  reset(error: Error): void {
    const waiters = this.waiters.splice(0);
    for (const waiter of waiters) {
      waiter.reject(error);
    }
    this.frames.length = 0;
    this.transientErrors.length = 0;
    this.fatalError = null;
  }
}
