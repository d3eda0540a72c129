import { describe, it, expect, afterEach } from 'vitest';
import { TransportRouter } from '../../src/routing/router.js';
import { Dispatcher } from '../../src/dispatch/dispatcher.js';
import type { ConnectionState } from '../../src/connection/index.js';
import {
  ConfigError,
  ConnectionNotActiveError,
  ReconnectExhaustedError,
  type TransportKind,
} from '../../src/errors.js';
import { createFakeRouter } from '../helpers/fake-router.js';
import { waitFor } from '../helpers/wait.js';

describe('TransportRouter', () => {
  let router: TransportRouter | null = null;

  afterEach(async () => {
    await router?.shutdown();
    router = null;
  });

  describe('construction', () => {
    it('rejects a binding to a transport without configuration', () => {
      let error: unknown;
      try {
        new TransportRouter({ defaultTransport: 'pipe', bindings: { tool: 'socket' }, pipe: { command: 'calc-server' } });
      } catch (e) {
        error = e;
      }

      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toMatchObject({ issues: ['socket: section is required by bindings.tool'] });
    });

    it('creates one connection per transport kind in use', () => {
      const fake = createFakeRouter({
        defaultTransport: 'pipe',
        bindings: { tool: 'socket', prompt: 'socket' },
        pipe: { command: 'calc-server' },
        socket: { port: 9000 },
      });
      router = fake.router;

      expect([...router.getConnections().keys()]).toEqual(['pipe', 'socket']);
      expect(router.connection('eventStream')).toBeUndefined();
    });
  });

  describe('resolve', () => {
    it('routes bound capabilities and falls back to the default transport', () => {
      const fake = createFakeRouter({
        defaultTransport: 'pipe',
        bindings: { tool: 'socket', prompt: 'socket' },
        pipe: { command: 'calc-server' },
        socket: { port: 9000 },
      });
      router = fake.router;

      expect(router.resolve('tool').kind).toBe('socket');
      expect(router.resolve('resource').kind).toBe('pipe');
      expect(router.resolve('auth').kind).toBe('pipe');
      expect(router.resolve().kind).toBe('pipe');
      expect(router.resolve('prompt')).toBe(router.resolve('tool'));
    });
  });

  describe('start', () => {
    it('keeps working connections when another one fails', async () => {
      const fake = createFakeRouter(
        {
          defaultTransport: 'pipe',
          bindings: { tool: 'socket' },
          pipe: { command: 'calc-server' },
          socket: { port: 9000 },
          connection: { reconnect: { baseDelayMs: 10, maxDelayMs: 10, jitter: 0, maxAttempts: 1 } },
        },
        (transport) => {
          if (transport.kind === 'socket') {
            transport.openFailures = 100;
          }
        },
      );
      router = fake.router;
      const failedKinds: TransportKind[] = [];
      router.on('connectionFailed', (kind) => failedKinds.push(kind));

      const result = await router.start();

      expect(result.active).toEqual(['pipe']);
      expect(result.failed).toHaveLength(1);
      expect(result.failed[0]?.kind).toBe('socket');
      expect(result.failed[0]?.error).toBeInstanceOf(ReconnectExhaustedError);
      expect(failedKinds).toEqual(['socket']);

      expect(router.getCapabilityStatus()).toEqual([
        { capability: 'tool', transport: 'socket', state: 'failed', usable: false },
        { capability: 'resource', transport: 'pipe', state: 'active', usable: true },
        { capability: 'prompt', transport: 'pipe', state: 'active', usable: true },
        { capability: 'auth', transport: 'pipe', state: 'active', usable: true },
      ]);
    });

    it('reports state changes with the transport kind', async () => {
      const fake = createFakeRouter({ defaultTransport: 'socket', socket: { port: 9000 } });
      router = fake.router;
      const changes: Array<[TransportKind, ConnectionState, ConnectionState]> = [];
      router.on('connectionStateChange', (kind, from, to) => changes.push([kind, from, to]));

      await router.start();

      expect(changes).toEqual([['socket', 'initializing', 'active']]);
    });
  });

  describe('isolation', () => {
    it('serves resource calls while the tool connection reconnects', async () => {
      const fake = createFakeRouter({
        defaultTransport: 'pipe',
        bindings: { tool: 'socket' },
        pipe: { command: 'calc-server' },
        socket: { port: 9000 },
        connection: {
          reconnect: { baseDelayMs: 60000, maxDelayMs: 60000 },
          maxProbeAttempts: 1,
          probeIntervalMs: 10,
        },
      });
      router = fake.router;
      fake.transport('pipe').responder = (request) => ({
        type: 'response',
        id: request.id,
        result: { uri: 'file:///notes.md', text: 'hello' },
      });
      const dispatcher = new Dispatcher(router);
      await router.start();

      fake.transport('socket').drop();
      await waitFor(() => router?.resolve('tool').getState() === 'reconnecting');

      await expect(dispatcher.call('resource', 'read', { uri: 'file:///notes.md' })).resolves.toEqual({
        uri: 'file:///notes.md',
        text: 'hello',
      });
      await expect(dispatcher.call('tool', 'add', { a: 2, b: 3 })).rejects.toBeInstanceOf(ConnectionNotActiveError);
      expect(router.resolve('resource').getState()).toBe('active');
    });
  });

  describe('shutdown', () => {
    it('closes every connection', async () => {
      const fake = createFakeRouter({
        defaultTransport: 'pipe',
        bindings: { tool: 'socket' },
        pipe: { command: 'calc-server' },
        socket: { port: 9000 },
      });
      router = fake.router;
      await router.start();

      await router.shutdown();

      expect([...router.getConnections().values()].map((connection) => connection.getState())).toEqual([
        'closed',
        'closed',
      ]);
      expect(fake.transport('pipe').closes).toBe(1);
      expect(fake.transport('socket').closes).toBe(1);
    });
  });
});
