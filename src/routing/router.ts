/**
 * Capability-to-transport routing.
 *
 * The router builds one {@link ConnectionManager} per transport kind the
 * configuration references and binds every capability kind to one of them.
 * Bindings are fixed at construction and never retargeted.
 *
 * @module routing/router
 */

import { EventEmitter } from 'node:events';

import {
  resolveTransportConfig,
  transportFor,
  type TransportConfig,
  type TransportConfigInput,
} from '../config/index.js';
import { ConnectionManager, type ConnectionState, type RandomSource } from '../connection/index.js';
import { toError, type TransportKind } from '../errors.js';
import { createLogger, type Logger } from '../logging/index.js';
import { CAPABILITY_KINDS, type CapabilityKind } from '../protocol/types.js';
import {
  createTransport,
  type AuthTokenProvider,
  type SpawnFunction,
  type Transport,
} from '../transport/index.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Builds the transport for a kind. Defaults to {@link createTransport}.
 */
export type TransportFactory = (kind: TransportKind, config: TransportConfig) => Transport;

/**
 * Options for {@link TransportRouter}.
 */
export interface TransportRouterOptions {
  readonly logger?: Logger;

  /** Credential source for socket and event-stream transports */
  readonly authTokenProvider?: AuthTokenProvider;

  /** Process starter for the pipe transport */
  readonly spawn?: SpawnFunction;

  /** Random source for backoff jitter */
  readonly random?: RandomSource;

  readonly transportFactory?: TransportFactory;
}

/**
 * Events emitted by TransportRouter.
 */
export interface TransportRouterEvents {
  /** Emitted whenever one of the connections changes state */
  connectionStateChange: [kind: TransportKind, from: ConnectionState, to: ConnectionState];

  /** Emitted when a connection exhausts its reconnection budget */
  connectionFailed: [kind: TransportKind, error: Error];
}

/**
 * Outcome of {@link TransportRouter.start}.
 */
export interface RouterStartResult {
  readonly active: readonly TransportKind[];
  readonly failed: ReadonlyArray<{ readonly kind: TransportKind; readonly error: Error }>;
}

/**
 * Usability of one capability kind.
 */
export interface CapabilityStatus {
  readonly capability: CapabilityKind;
  readonly transport: TransportKind;
  readonly state: ConnectionState;

  /** Whether calls for this capability can currently be sent */
  readonly usable: boolean;
}

// =============================================================================
// TransportRouter
// =============================================================================

/**
 * Maps capability kinds to connections.
 *
 * Capabilities bound to the same transport kind share one connection and
 * therefore one correlation table. A failure of one connection leaves the
 * others untouched, so the remaining capabilities keep working.
 *
 * @example
 * ```typescript
 * const router = new TransportRouter({
 *   defaultTransport: 'pipe',
 *   bindings: { tool: 'socket', resource: 'pipe' },
 *   pipe: { command: 'resource-server' },
 *   socket: { host: 'localhost', port: 9000 },
 * });
 *
 * router.on('connectionFailed', (kind, error) => console.error(kind, error.message));
 *
 * const { failed } = await router.start();
 * router.resolve('tool'); // socket connection
 * ```
 */
export class TransportRouter extends EventEmitter<TransportRouterEvents> {
  readonly config: TransportConfig;

  private readonly connections = new Map<TransportKind, ConnectionManager>();
  private readonly log: Logger;

  /**
   * @throws {ConfigError} If the configuration is invalid or incomplete
   */
  constructor(config: TransportConfigInput | TransportConfig, options: TransportRouterOptions = {}) {
    super();

    this.config = resolveTransportConfig(config);
    this.log = options.logger ?? createLogger('router');

    const factory: TransportFactory =
      options.transportFactory ??
      ((kind, resolved) =>
        createTransport(kind, resolved, {
          logger: this.log.child({ transport: kind }),
          ...(options.authTokenProvider !== undefined && { authTokenProvider: options.authTokenProvider }),
          ...(options.spawn !== undefined && { spawn: options.spawn }),
        }));

    const kinds = new Set<TransportKind>([this.config.defaultTransport]);
    for (const capability of CAPABILITY_KINDS) {
      kinds.add(transportFor(this.config, capability));
    }

    for (const kind of kinds) {
      const connection = new ConnectionManager(factory(kind, this.config), {
        name: kind,
        policy: this.config.connection,
        logger: this.log.child({ connection: kind }),
        ...(options.random !== undefined && { random: options.random }),
      });

      connection.on('stateChange', (from, to) => {
        this.emit('connectionStateChange', kind, from, to);
      });
      connection.on('failed', (error) => {
        this.log.error({ transport: kind, err: error }, 'connection failed');
        this.emit('connectionFailed', kind, error);
      });
      connection.on('error', (error) => {
        this.log.debug({ transport: kind, err: error }, 'connection fault');
      });

      this.connections.set(kind, connection);
    }
  }

  /**
   * Returns the connection a capability is bound to.
   * Without a capability, returns the default transport's connection.
   */
  resolve(capability?: CapabilityKind): ConnectionManager {
    const kind = capability === undefined ? this.config.defaultTransport : transportFor(this.config, capability);
    const connection = this.connections.get(kind);
    if (!connection) {
      throw new Error(`No connection for transport '${kind}'`);
    }
    return connection;
  }

  /**
   * Returns the connection for a transport kind, if the configuration uses it.
   */
  connection(kind: TransportKind): ConnectionManager | undefined {
    return this.connections.get(kind);
  }

  /**
   * Returns every connection, keyed by transport kind.
   */
  getConnections(): ReadonlyMap<TransportKind, ConnectionManager> {
    return this.connections;
  }

  /**
   * Starts every connection concurrently.
   *
   * Resolves once each connection is either active or has failed; a failing
   * connection does not prevent the others from starting.
   */
  async start(): Promise<RouterStartResult> {
    const entries = [...this.connections.entries()];
    const outcomes = await Promise.allSettled(entries.map(([, connection]) => connection.start()));

    const active: TransportKind[] = [];
    const failed: Array<{ kind: TransportKind; error: Error }> = [];

    outcomes.forEach((outcome, index) => {
      const entry = entries[index];
      if (!entry) return;
      const [kind] = entry;
      if (outcome.status === 'fulfilled') {
        active.push(kind);
      } else {
        failed.push({ kind, error: toError(outcome.reason) });
      }
    });

    this.log.info({ active, failed: failed.map((entry) => entry.kind) }, 'router started');
    return { active, failed };
  }

  /**
   * Shuts down every connection.
   */
  async shutdown(): Promise<void> {
    await Promise.all([...this.connections.values()].map((connection) => connection.shutdown()));
    this.log.info('router shut down');
  }

  /**
   * Reports which capabilities can currently be used.
   */
  getCapabilityStatus(): CapabilityStatus[] {
    return CAPABILITY_KINDS.map((capability) => {
      const connection = this.resolve(capability);
      return {
        capability,
        transport: connection.kind,
        state: connection.getState(),
        usable: connection.isUsable(),
      };
    });
  }
}
