import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { IncomingMessage } from 'node:http';
import { WebSocketServer, type WebSocket } from 'ws';
import { SocketTransport, socketUrl } from '../../src/transport/socket-transport.js';
import type { SocketConfig } from '../../src/config/index.js';
import { TransportError } from '../../src/errors.js';
import { MessageCodec } from '../../src/protocol/codec.js';
import { waitFor } from '../helpers/wait.js';

describe('socketUrl', () => {
  it('builds the URL from host, port and path', () => {
    const base: SocketConfig = {
      host: 'localhost',
      port: 9000,
      path: '/rpc',
      secure: false,
      connectTimeoutMs: 1000,
      heartbeatTimeoutMs: 1000,
    };

    expect(socketUrl(base)).toBe('ws://localhost:9000/rpc');
    expect(socketUrl({ ...base, secure: true })).toBe('wss://localhost:9000/rpc');
  });
});

describe('SocketTransport', () => {
  let server: WebSocketServer;
  let port: number;
  let transport: SocketTransport | null;

  const peers: WebSocket[] = [];
  const upgrades: IncomingMessage[] = [];
  const frames: Array<{ data: string; isBinary: boolean }> = [];

  beforeEach(async () => {
    transport = null;
    server = new WebSocketServer({ host: '127.0.0.1', port: 0, path: '/rpc' });
    server.on('connection', (peer, request) => {
      peers.push(peer);
      upgrades.push(request);
      peer.on('message', (data, isBinary) => {
        frames.push({ data: data.toString(), isBinary });
      });
    });
    await new Promise<void>((resolve) => server.once('listening', () => resolve()));

    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('server has no port');
    }
    port = address.port;
  });

  afterEach(async () => {
    await transport?.close();
    for (const peer of peers.splice(0)) {
      peer.terminate();
    }
    upgrades.length = 0;
    frames.length = 0;
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  function create(overrides: Partial<SocketConfig> = {}, token?: string): SocketTransport {
    transport = new SocketTransport(
      {
        host: '127.0.0.1',
        port,
        path: '/rpc',
        secure: false,
        connectTimeoutMs: 1000,
        heartbeatTimeoutMs: 200,
        ...overrides,
      },
      token === undefined ? {} : { authTokenProvider: async () => token },
    );
    return transport;
  }

  function peer(): WebSocket {
    const current = peers[peers.length - 1];
    if (!current) {
      throw new Error('no peer connected');
    }
    return current;
  }

  describe('open', () => {
    it('connects with the configured headers and bearer token', async () => {
      const t = create({ headers: { 'X-Client': 'relay-test' } }, 'test-token');

      await t.open();
      await waitFor(() => upgrades.length === 1);

      expect(t.isOpen()).toBe(true);
      expect(upgrades[0]?.headers['x-client']).toBe('relay-test');
      expect(upgrades[0]?.headers['authorization']).toBe('Bearer test-token');
    });

    it('fails when the server rejects the upgrade', async () => {
      const t = create({ path: '/elsewhere' });

      const error = await t.open().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      expect(error).toMatchObject({ transport: 'socket', operation: 'open', fatal: true });
      expect(t.isOpen()).toBe(false);
    });
  });

  describe('send and receive', () => {
    it('sends each payload as one text frame', async () => {
      const t = create();
      await t.open();

      await t.send(MessageCodec.encode({ type: 'request', id: 1, method: 'add', params: { a: 2, b: 3 } }));
      await waitFor(() => frames.length === 1);

      expect(frames[0]).toEqual({
        data: '{"jsonrpc":"2.0","id":1,"method":"add","params":{"a":2,"b":3}}',
        isBinary: false,
      });
    });

    it('receives frames from the peer in order', async () => {
      const t = create();
      await t.open();
      await waitFor(() => peers.length === 1);

      peer().send('{"jsonrpc":"2.0","id":1,"result":5}');
      peer().send('{"jsonrpc":"2.0","method":"done"}');

      expect(MessageCodec.decode(await t.receive())).toEqual({ type: 'response', id: 1, result: 5 });
      expect(MessageCodec.decode(await t.receive())).toEqual({ type: 'notification', method: 'done' });
    });

    it('fails every receive once the peer closes', async () => {
      const t = create();
      await t.open();
      await waitFor(() => peers.length === 1);
      const received = t.receive().catch((e: unknown) => e);

      peer().close(4000, 'bye');

      const error = await received;
      expect(error).toBeInstanceOf(TransportError);
      expect(error instanceof Error ? error.message : '').toBe(
        'socket transport receive failed: socket closed (4000 bye)',
      );
      expect(t.isOpen()).toBe(false);
      await expect(t.receive()).rejects.toBe(error);
    });

    it('refuses to send when not open', async () => {
      const t = create();

      await expect(t.send(Buffer.from('{}'))).rejects.toThrow('transport is not open');
    });
  });

  describe('probe', () => {
    it('succeeds when the peer answers the ping', async () => {
      const t = create();
      await t.open();

      await expect(t.probe()).resolves.toBeUndefined();
    });

    it('fails when the transport is not open', async () => {
      const t = create();

      await expect(t.probe()).rejects.toThrow('transport is not open');
    });

    it('fails when the peer does not answer the ping in time', async () => {
      const silent = new WebSocketServer({ host: '127.0.0.1', port: 0, autoPong: false });
      await new Promise<void>((resolve) => silent.once('listening', () => resolve()));
      const address = silent.address();
      if (address === null || typeof address === 'string') {
        throw new Error('server has no port');
      }

      try {
        const t = create({ port: address.port, path: '/', heartbeatTimeoutMs: 50 });
        await t.open();

        const error = await t.probe().catch((e: unknown) => e);

        expect(error).toBeInstanceOf(TransportError);
        expect(error).toMatchObject({ transport: 'socket', operation: 'probe' });
        expect(error instanceof Error ? error.message : '').toBe(
          'socket transport probe failed: no pong within 50ms',
        );
      } finally {
        await transport?.close();
        transport = null;
        for (const client of silent.clients) {
          client.terminate();
        }
        await new Promise<void>((resolve) => silent.close(() => resolve()));
      }
    });
  });

  describe('close', () => {
    it('closes with a normal closure code', async () => {
      const t = create();
      await t.open();
      await waitFor(() => peers.length === 1);
      const closed = new Promise<number>((resolve) => peer().once('close', (code) => resolve(code)));

      await t.close();

      expect(await closed).toBe(1000);
      expect(t.isOpen()).toBe(false);
    });

    it('can be reopened after closing', async () => {
      const t = create();
      await t.open();
      await t.close();

      await t.open();

      expect(t.isOpen()).toBe(true);
      await waitFor(() => peers.length === 2);
    });
  });
});
