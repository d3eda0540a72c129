/**
 * Process-pipe transport.
 *
 * Payloads travel as newline-delimited lines over a child process's
 * stdin/stdout, or over an attached readable/writable pair (the server side,
 * typically `process.stdin` and `process.stdout`).
 *
 * @module transport/pipe-transport
 */

import { spawn as spawnProcess, type SpawnOptions } from 'node:child_process';
import type { Readable, Writable } from 'node:stream';

import type { PipeConfig } from '../config/index.js';
import { TransportError } from '../errors.js';
import { createLogger, type Logger } from '../logging/index.js';
import { frameLine, LineFramer } from '../protocol/line-framer.js';
import { FrameQueue } from './frame-queue.js';
import type { Transport, TransportOptions } from './types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * The part of a child process the transport relies on.
 * `ChildProcess` satisfies it.
 */
export interface PipeChild {
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly pid?: number | undefined;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals | number): boolean;
  once(event: 'spawn', listener: () => void): this;
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  on(event: 'error', listener: (error: Error) => void): this;
  on(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
}

/**
 * Starts the child process. Defaults to `child_process.spawn`.
 */
export type SpawnFunction = (
  command: string,
  args: readonly string[],
  options: SpawnOptions,
) => PipeChild;

/**
 * Readable/writable pair used instead of spawning a process.
 */
export interface PipeStreams {
  /** Stream the peer writes to (our inbound side) */
  readonly input: Readable;

  /** Stream the peer reads from (our outbound side) */
  readonly output: Writable;
}

/**
 * Options for {@link PipeTransport}.
 */
export interface PipeTransportOptions extends TransportOptions {
  readonly spawn?: SpawnFunction;
}

/**
 * Where the transport's bytes come from.
 */
export type PipeTarget =
  | { readonly mode: 'spawn'; readonly config: PipeConfig }
  | { readonly mode: 'attach'; readonly streams: PipeStreams };

interface Channel {
  readonly input: Readable;
  readonly output: Writable;
  readonly child: PipeChild | null;
  readonly detach: () => void;
}

// =============================================================================
// PipeTransport
// =============================================================================

/**
 * Transport over a subordinate process's standard streams.
 *
 * An unexpected exit of the process fails every pending and future
 * `receive()` until the transport is reopened, which spawns a new process.
 *
 * @example
 * ```typescript
 * const transport = new PipeTransport({
 *   mode: 'spawn',
 *   config: { command: 'calc-server', args: ['--stdio'], closeGraceMs: 2000 },
 * });
 * await transport.open();
 * await transport.send(MessageCodec.encode({ type: 'request', id: 1, method: 'add', params: { a: 2, b: 3 } }));
 * const reply = MessageCodec.decode(await transport.receive());
 * ```
 */
export class PipeTransport implements Transport {
  readonly kind = 'pipe' as const;

  private readonly queue = new FrameQueue();
  private readonly spawn: SpawnFunction;
  private readonly log: Logger;

  private channel: Channel | null = null;
  /** Spawned process; outlives a lost channel until it is terminated */
  private process: PipeChild | null = null;
  private closing = false;
  private readonly guarded = new WeakSet<Readable | Writable>();

  constructor(
    private readonly target: PipeTarget,
    options: PipeTransportOptions = {},
  ) {
    this.spawn = options.spawn ?? spawnProcess;
    this.log = options.logger ?? createLogger('transport', { transport: 'pipe' });
  }

  isOpen(): boolean {
    return this.channel !== null;
  }

  async open(): Promise<void> {
    if (this.channel !== null) {
      return;
    }

    const leftover = this.process;
    if (leftover !== null) {
      this.process = null;
      await this.terminate(leftover);
    }

    this.closing = false;
    this.queue.reset(new TransportError('pipe', 'receive', 'transport reopened'));

    if (this.target.mode === 'attach') {
      this.channel = this.attach(this.target.streams.input, this.target.streams.output, null);
      this.log.debug('attached to streams');
      return;
    }

    const child = await this.startProcess(this.target.config);
    const { stdin, stdout } = child;
    if (stdin === null || stdout === null) {
      child.kill('SIGKILL');
      throw new TransportError('pipe', 'open', 'child process has no stdio pipes');
    }

    this.process = child;
    this.channel = this.attach(stdout, stdin, child);
    this.log.debug({ pid: child.pid }, 'process started');
  }

  send(payload: Buffer): Promise<void> {
    const channel = this.channel;
    if (channel === null) {
      return Promise.reject(new TransportError('pipe', 'send', 'transport is not open'));
    }

    return new Promise((resolve, reject) => {
      channel.output.write(frameLine(payload), (error) => {
        if (error) {
          reject(new TransportError('pipe', 'send', error.message, true, { cause: error }));
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
    const channel = this.channel;
    if (channel === null) {
      throw new TransportError('pipe', 'probe', 'transport is not open');
    }
    if (channel.child !== null && hasExited(channel.child)) {
      throw new TransportError('pipe', 'probe', 'process is not running');
    }
    if (!channel.output.writable) {
      throw new TransportError('pipe', 'probe', 'output stream is not writable');
    }
  }

  /**
   * Closes the channel and terminates the process, including one left
   * running after the channel was lost.
   */
  async close(): Promise<void> {
    this.closing = true;

    const channel = this.channel;
    if (channel !== null) {
      this.channel = null;
      channel.detach();
      this.queue.fail(new TransportError('pipe', 'receive', 'transport closed'), true);
    }

    const child = this.process;
    if (child !== null) {
      this.process = null;
      await this.terminate(child);
    }
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private async terminate(child: PipeChild): Promise<void> {
    const grace = this.target.mode === 'spawn' ? this.target.config.closeGraceMs : 0;

    const stdin = child.stdin;
    if (stdin !== null && stdin.writable) {
      stdin.end();
    }
    if (hasExited(child)) {
      return;
    }

    child.kill('SIGTERM');
    if (await waitForExit(child, grace)) {
      return;
    }

    this.log.warn({ pid: child.pid, graceMs: grace }, 'process ignored SIGTERM, killing');
    child.kill('SIGKILL');
    await waitForExit(child, grace);
  }

  private startProcess(config: PipeConfig): Promise<PipeChild> {
    return new Promise((resolve, reject) => {
      let settled = false;
      let child: PipeChild;

      try {
        child = this.spawn(config.command, config.args, {
          cwd: config.cwd,
          env: { ...process.env, ...config.env },
          stdio: ['pipe', 'pipe', 'inherit'],
        });
      } catch (error) {
        reject(new TransportError('pipe', 'open', `cannot spawn '${config.command}'`, true, { cause: error }));
        return;
      }

      child.once('spawn', () => {
        if (settled) return;
        settled = true;
        resolve(child);
      });

      child.on('error', (error) => {
        if (settled) {
          this.log.warn({ err: error }, 'process error');
          return;
        }
        settled = true;
        reject(new TransportError('pipe', 'open', `cannot spawn '${config.command}': ${error.message}`, true, { cause: error }));
      });
    });
  }

  private attach(input: Readable, output: Writable, child: PipeChild | null): Channel {
    const framer = new LineFramer();

    const isCurrent = (): boolean => this.channel !== null && this.channel.input === input;

    const onData = (chunk: Buffer | string): void => {
      if (!isCurrent()) return;
      let frames: Buffer[];
      try {
        frames = framer.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.queue.fail(new TransportError('pipe', 'receive', message, false, { cause: error }), false);
        return;
      }
      for (const frame of frames) {
        this.queue.push(frame);
      }
    };

    const onEnd = (): void => {
      if (!isCurrent() || this.closing) return;
      this.lose('input stream ended');
    };

    input.on('data', onData);
    input.on('end', onEnd);
    this.guard(input);
    this.guard(output);

    if (child !== null) {
      child.on('exit', (code, signal) => {
        if (this.closing || this.channel === null || this.channel.child !== child) return;
        const reason = signal !== null ? `process killed by ${signal}` : `process exited with code ${String(code)}`;
        this.lose(reason);
      });
    }

    return {
      input,
      output,
      child,
      detach: () => {
        input.off('data', onData);
        input.off('end', onEnd);
      },
    };
  }

  /**
   * Keeps an `error` listener on the stream for its whole life. Errors on a
   * stream that is no longer current (EPIPE after the process exited) are
   * only logged.
   */
  private guard(stream: Readable | Writable): void {
    if (this.guarded.has(stream)) return;
    this.guarded.add(stream);

    stream.on('error', (error: Error) => {
      const channel = this.channel;
      const current = channel !== null && (channel.input === stream || channel.output === stream);
      if (!current || this.closing) {
        this.log.debug({ err: error }, 'error on inactive stream');
        return;
      }
      this.lose(error.message, error);
    });
  }

  private lose(reason: string, cause?: unknown): void {
    const channel = this.channel;
    this.channel = null;
    channel?.detach();
    this.log.warn({ reason }, 'pipe lost');
    this.queue.fail(new TransportError('pipe', 'receive', reason, true, { cause }), true);
  }
}

// =============================================================================
// Helpers
// =============================================================================

function hasExited(child: PipeChild): boolean {
  return child.exitCode !== null || child.signalCode !== null;
}

function waitForExit(child: PipeChild, timeoutMs: number): Promise<boolean> {
  if (hasExited(child)) {
    return Promise.resolve(true);
  }

  return new Promise((resolve) => {
    const timer = setTimeout(() => resolve(false), timeoutMs);
    child.once('exit', () => {
      clearTimeout(timer);
      resolve(true);
    });
  });
}
