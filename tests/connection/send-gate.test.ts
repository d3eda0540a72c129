import { describe, it, expect } from 'vitest';
import { SendGate } from '../../src/connection/send-gate.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('SendGate', () => {
  it('runs one task at a time in submission order', async () => {
    const gate = new SendGate();
    const events: string[] = [];
    const first = deferred();

    const a = gate.run(async () => {
      events.push('a:start');
      await first.promise;
      events.push('a:end');
    });
    const b = gate.run(async () => {
      events.push('b:start');
    });

    await Promise.resolve();
    expect(events).toEqual(['a:start']);
    expect(gate.pending).toBe(2);

    first.resolve();
    await Promise.all([a, b]);

    expect(events).toEqual(['a:start', 'a:end', 'b:start']);
    expect(gate.pending).toBe(0);
  });

  it('delivers a failure only to its own caller', async () => {
    const gate = new SendGate();

    const failing = gate.run(async () => {
      throw new Error('broken pipe');
    });
    const next = gate.run(async () => 'sent');

    await expect(failing).rejects.toThrow('broken pipe');
    await expect(next).resolves.toBe('sent');
  });
});
