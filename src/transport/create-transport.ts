/**
 * Selection of the transport variant for a configured kind.
 *
 * @module transport/create-transport
 */

import type { TransportConfig } from '../config/index.js';
import { ConfigError, type TransportKind } from '../errors.js';
import { EventStreamTransport } from './event-stream-transport.js';
import { PipeTransport, type SpawnFunction } from './pipe-transport.js';
import { SocketTransport } from './socket-transport.js';
import { TcpTransport } from './tcp-transport.js';
import type { Transport, TransportOptions } from './types.js';

/**
 * Options for {@link createTransport}.
 */
export interface CreateTransportOptions extends TransportOptions {
  /** Process starter for the pipe transport */
  readonly spawn?: SpawnFunction;
}

/**
 * Builds the transport for `kind` from its configuration section.
 *
 * @throws {ConfigError} If the configuration has no section for `kind`
 */
export function createTransport(
  kind: TransportKind,
  config: TransportConfig,
  options: CreateTransportOptions = {},
): Transport {
  const { spawn, ...common } = options;

  switch (kind) {
    case 'pipe': {
      if (config.pipe === undefined) {
        throw new ConfigError(['pipe: section is required']);
      }
      return new PipeTransport({ mode: 'spawn', config: config.pipe }, spawn ? { ...common, spawn } : common);
    }
    case 'eventStream': {
      if (config.eventStream === undefined) {
        throw new ConfigError(['eventStream: section is required']);
      }
      return new EventStreamTransport(config.eventStream, common);
    }
    case 'socket': {
      if (config.socket === undefined) {
        throw new ConfigError(['socket: section is required']);
      }
      return new SocketTransport(config.socket, common);
    }
    case 'tcp': {
      if (config.tcp === undefined) {
        throw new ConfigError(['tcp: section is required']);
      }
      return new TcpTransport(config.tcp, common);
    }
  }
}
