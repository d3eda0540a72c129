import { describe, it, expect } from 'vitest';
import { createTransport } from '../../src/transport/create-transport.js';
import { PipeTransport } from '../../src/transport/pipe-transport.js';
import { EventStreamTransport } from '../../src/transport/event-stream-transport.js';
import { SocketTransport } from '../../src/transport/socket-transport.js';
import { TcpTransport } from '../../src/transport/tcp-transport.js';
import { resolveTransportConfig } from '../../src/config/index.js';
import { ConfigError } from '../../src/errors.js';
import { createFakeSpawn } from '../helpers/fake-child.js';

describe('createTransport', () => {
  const config = resolveTransportConfig({
    defaultTransport: 'pipe',
    bindings: { tool: 'socket', resource: 'eventStream' },
    pipe: { command: 'calc-server' },
    eventStream: { url: 'http://127.0.0.1:8080/events' },
    socket: { port: 9000 },
    tcp: { port: 7400 },
  });

  it('builds the transport for each kind', () => {
    expect(createTransport('pipe', config)).toBeInstanceOf(PipeTransport);
    expect(createTransport('eventStream', config)).toBeInstanceOf(EventStreamTransport);
    expect(createTransport('socket', config)).toBeInstanceOf(SocketTransport);
    expect(createTransport('tcp', config)).toBeInstanceOf(TcpTransport);
  });

  it('starts pipe processes through the given spawn function', async () => {
    const fake = createFakeSpawn();
    const transport = createTransport('pipe', config, { spawn: fake.spawn });

    await transport.open();
    await transport.close();

    expect(fake.calls.map((call) => call.command)).toEqual(['calc-server']);
  });

  it('refuses a kind whose section is missing', () => {
    const pipeOnly = resolveTransportConfig({ defaultTransport: 'pipe', pipe: { command: 'calc-server' } });

    expect(() => createTransport('socket', pipeOnly)).toThrow(ConfigError);
    expect(() => createTransport('socket', pipeOnly)).toThrow('socket: section is required');
    expect(() => createTransport('tcp', pipeOnly)).toThrow('tcp: section is required');
  });

  it('creates transports that start closed', () => {
    expect(createTransport('socket', config).isOpen()).toBe(false);
    expect(createTransport('eventStream', config).isOpen()).toBe(false);
    expect(createTransport('tcp', config).isOpen()).toBe(false);
  });
});
