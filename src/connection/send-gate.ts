/**
 * Serialization of outbound sends.
 *
 * @module connection/send-gate
 */

/**
 * Runs tasks one at a time in submission order.
 *
 * A failing task does not block the ones queued behind it; its error is
 * delivered only to the caller that submitted it.
 *
 * @example
 * ```typescript
 * const gate = new SendGate();
 * await Promise.all([
 *   gate.run(() => transport.send(first)),
 *   gate.run(() => transport.send(second)), // starts after the first settles
 * ]);
 * ```
 */
export class SendGate {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  /**
   * Tasks submitted and not yet settled.
   */
  get pending(): number {
    return this.waiting;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    this.waiting++;
    const result = this.tail.then(task).finally(() => {
      this.waiting--;
    });
    // The chain only orders tasks; outcomes travel through `result`
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
