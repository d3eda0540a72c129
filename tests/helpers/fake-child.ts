import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';
import type { SpawnOptions } from 'node:child_process';

import type { PipeChild, SpawnFunction } from '../../src/transport/pipe-transport.js';

/**
 * Child process stand-in whose stdio are in-memory streams.
 */
export class FakeChild extends EventEmitter implements PipeChild {
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly pid = 4242;

  exitCode: number | null = null;
  signalCode: NodeJS.Signals | null = null;

  readonly signals: Array<NodeJS.Signals | number | undefined> = [];
  ignoreSigterm = false;

  kill(signal?: NodeJS.Signals | number): boolean {
    this.signals.push(signal);
    if (signal === 'SIGTERM' && this.ignoreSigterm) {
      return true;
    }
    setImmediate(() => this.exit(null, typeof signal === 'string' ? signal : 'SIGTERM'));
    return true;
  }

  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (this.exitCode !== null || this.signalCode !== null) return;
    this.exitCode = code;
    this.signalCode = signal;
    this.emit('exit', code, signal);
  }

  /** Collects every chunk written to stdin as text */
  written(): string {
    const chunks: Buffer[] = [];
    let chunk: unknown = this.stdin.read();
    while (chunk !== null) {
      if (Buffer.isBuffer(chunk)) chunks.push(chunk);
      chunk = this.stdin.read();
    }
    return Buffer.concat(chunks).toString('utf8');
  }
}

export interface SpawnCall {
  readonly command: string;
  readonly args: readonly string[];
  readonly options: SpawnOptions;
}

/**
 * Spawn stand-in. Each call creates a FakeChild that emits `spawn`, or
 * `error` when `failWith` is set.
 */
export function createFakeSpawn(): {
  spawn: SpawnFunction;
  calls: SpawnCall[];
  children: FakeChild[];
  failWith: { error: Error | null };
} {
  const calls: SpawnCall[] = [];
  const children: FakeChild[] = [];
  const failWith: { error: Error | null } = { error: null };

  const spawn: SpawnFunction = (command, args, options) => {
    calls.push({ command, args, options });
    const child = new FakeChild();
    children.push(child);
    const error = failWith.error;
    setImmediate(() => {
      if (error) {
        child.emit('error', error);
      } else {
        child.emit('spawn');
      }
    });
    return child;
  };

  return { spawn, calls, children, failWith };
}
