/**
 * Transport configuration schema and resolution.
 *
 * A raw configuration object (typically loaded from a file by an outer layer)
 * is validated once into an immutable {@link TransportConfig}. Every problem is
 * reported together so a broken file can be fixed in one pass.
 *
 * @module config/schema
 */

import { z } from 'zod';

import { ConfigError, type TransportKind } from '../errors.js';
import { CAPABILITY_KINDS, type CapabilityKind } from '../protocol/types.js';
import { TRANSPORT_DEFAULTS } from './defaults.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Parameters of the process-pipe transport.
 */
export interface PipeConfig {
  /** Executable to spawn */
  readonly command: string;
  readonly args: readonly string[];

  /** Extra environment variables, merged over the parent environment */
  readonly env?: Readonly<Record<string, string>>;
  readonly cwd?: string;

  /** Time the child gets to exit after SIGTERM before it is killed */
  readonly closeGraceMs: number;
}

/**
 * Parameters of the event-stream transport.
 */
export interface EventStreamConfig {
  /** URL of the `text/event-stream` resource */
  readonly url: string;

  /** URL receiving outbound POSTs. Announced by the server when omitted. */
  readonly postUrl?: string;
  readonly headers?: Readonly<Record<string, string>>;
  readonly connectTimeoutMs: number;

  /** Silence after which the stream counts as stalled */
  readonly stallTimeoutMs: number;
}

/**
 * Parameters of the socket transport.
 */
export interface SocketConfig {
  readonly host: string;
  readonly port: number;
  readonly path: string;

  /** Use `wss:` instead of `ws:` */
  readonly secure: boolean;
  readonly headers?: Readonly<Record<string, string>>;
  readonly connectTimeoutMs: number;

  /** Time the peer has to answer a ping */
  readonly heartbeatTimeoutMs: number;
}

/**
 * Parameters of the raw TCP transport.
 */
export interface TcpConfig {
  /** `connect` dials the peer; `listen` waits for one peer to connect */
  readonly mode: 'connect' | 'listen';
  readonly host: string;

  /** Port to dial or listen on. `0` picks a free port when listening. */
  readonly port: number;
  readonly connectTimeoutMs: number;

  /** Idle time before the OS starts keep-alive probes */
  readonly keepAliveMs: number;
}

/**
 * Reconnection backoff policy.
 */
export interface ReconnectPolicy {
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;

  /** Spread in [0, 1] applied to each delay */
  readonly jitter: number;
  readonly maxAttempts: number;
}

/**
 * Lifecycle policy shared by every connection.
 */
export interface ConnectionPolicy {
  readonly reconnect: ReconnectPolicy;
  readonly heartbeatIntervalMs: number;
  readonly maxProbeAttempts: number;
  readonly probeIntervalMs: number;
  readonly callTimeoutMs: number;
  readonly sweepIntervalMs: number;
}

/**
 * Resolved, immutable transport configuration.
 */
export interface TransportConfig {
  /** Transport used by capabilities without an explicit binding */
  readonly defaultTransport: TransportKind;

  /** Capability kind → transport kind */
  readonly bindings: Readonly<Partial<Record<CapabilityKind, TransportKind>>>;

  readonly pipe?: PipeConfig;
  readonly eventStream?: EventStreamConfig;
  readonly socket?: SocketConfig;
  readonly tcp?: TcpConfig;

  readonly connection: ConnectionPolicy;
}

// =============================================================================
// Schemas
// =============================================================================

const TRANSPORT_KINDS = ['pipe', 'eventStream', 'socket', 'tcp'] as const satisfies readonly TransportKind[];

const durationSchema = z.number().int().positive();

const headersSchema = z.record(z.string());

const pipeSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  env: z.record(z.string()).optional(),
  cwd: z.string().min(1).optional(),
  closeGraceMs: durationSchema.default(TRANSPORT_DEFAULTS.CLOSE_GRACE_MS),
});

const eventStreamSchema = z.object({
  url: z.string().url(),
  postUrl: z.string().url().optional(),
  headers: headersSchema.optional(),
  connectTimeoutMs: durationSchema.default(TRANSPORT_DEFAULTS.CONNECT_TIMEOUT_MS),
  stallTimeoutMs: durationSchema.default(TRANSPORT_DEFAULTS.STALL_TIMEOUT_MS),
});

const socketSchema = z.object({
  host: z.string().min(1).default('127.0.0.1'),
  port: z.number().int().min(1).max(65535),
  path: z.string().startsWith('/').default(TRANSPORT_DEFAULTS.SOCKET_PATH),
  secure: z.boolean().default(false),
  headers: headersSchema.optional(),
  connectTimeoutMs: durationSchema.default(TRANSPORT_DEFAULTS.CONNECT_TIMEOUT_MS),
  heartbeatTimeoutMs: durationSchema.default(TRANSPORT_DEFAULTS.HEARTBEAT_TIMEOUT_MS),
});

const tcpSchema = z
  .object({
    mode: z.enum(['connect', 'listen']).default('connect'),
    host: z.string().min(1).default('127.0.0.1'),
    port: z.number().int().min(0).max(65535),
    connectTimeoutMs: durationSchema.default(TRANSPORT_DEFAULTS.CONNECT_TIMEOUT_MS),
    keepAliveMs: durationSchema.default(TRANSPORT_DEFAULTS.TCP_KEEPALIVE_MS),
  })
  .refine((tcp) => tcp.mode === 'listen' || tcp.port > 0, {
    message: 'port must be positive when connecting',
    path: ['port'],
  });

const reconnectSchema = z
  .object({
    baseDelayMs: durationSchema.default(TRANSPORT_DEFAULTS.RECONNECT_BASE_DELAY_MS),
    maxDelayMs: durationSchema.default(TRANSPORT_DEFAULTS.RECONNECT_MAX_DELAY_MS),
    jitter: z.number().min(0).max(1).default(TRANSPORT_DEFAULTS.RECONNECT_JITTER),
    maxAttempts: z.number().int().min(1).default(TRANSPORT_DEFAULTS.RECONNECT_MAX_ATTEMPTS),
  })
  .refine((policy) => policy.maxDelayMs >= policy.baseDelayMs, {
    message: 'maxDelayMs must not be smaller than baseDelayMs',
    path: ['maxDelayMs'],
  });

const connectionSchema = z.object({
  reconnect: reconnectSchema.default({}),
  heartbeatIntervalMs: durationSchema.default(TRANSPORT_DEFAULTS.HEARTBEAT_INTERVAL_MS),
  maxProbeAttempts: z.number().int().min(1).default(TRANSPORT_DEFAULTS.MAX_PROBE_ATTEMPTS),
  probeIntervalMs: durationSchema.default(TRANSPORT_DEFAULTS.PROBE_INTERVAL_MS),
  callTimeoutMs: durationSchema.default(TRANSPORT_DEFAULTS.CALL_TIMEOUT_MS),
  sweepIntervalMs: durationSchema.default(TRANSPORT_DEFAULTS.SWEEP_INTERVAL_MS),
});

const transportKindSchema = z.enum(TRANSPORT_KINDS);

const transportConfigSchema = z
  .object({
    defaultTransport: transportKindSchema,
    bindings: z.record(z.enum(CAPABILITY_KINDS), transportKindSchema).default({}),
    pipe: pipeSchema.optional(),
    eventStream: eventStreamSchema.optional(),
    socket: socketSchema.optional(),
    tcp: tcpSchema.optional(),
    connection: connectionSchema.default({}),
  })
  .superRefine((config, ctx) => {
    const referencedBy = new Map<TransportKind, string>();
    referencedBy.set(config.defaultTransport, 'defaultTransport');
    for (const capability of CAPABILITY_KINDS) {
      const kind = config.bindings[capability];
      if (kind !== undefined && !referencedBy.has(kind)) {
        referencedBy.set(kind, `bindings.${capability}`);
      }
    }

    for (const [kind, source] of referencedBy) {
      if (config[kind] === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [kind],
          message: `section is required by ${source}`,
        });
      }
    }
  });

/**
 * Raw configuration accepted by {@link resolveTransportConfig}.
 * Omitted timings take their {@link TRANSPORT_DEFAULTS} values.
 */
export type TransportConfigInput = z.input<typeof transportConfigSchema>;

// =============================================================================
// Resolution
// =============================================================================

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${path}: ${issue.message}`;
}

/**
 * Validates a raw configuration and returns a frozen {@link TransportConfig}.
 *
 * Accepts any value: configuration read from a file arrives untyped. Typed
 * callers get checking through {@link TransportConfigInput}.
 *
 * @throws {ConfigError} Listing every invalid or missing field
 *
 * @example
 * ```typescript
 * const config = resolveTransportConfig({
 *   defaultTransport: 'pipe',
 *   bindings: { tool: 'socket' },
 *   pipe: { command: 'my-server', args: ['--stdio'] },
 *   socket: { host: 'localhost', port: 9000 },
 * });
 * config.connection.reconnect.maxAttempts; // 5
 * ```
 */
export function resolveTransportConfig(input: unknown): TransportConfig {
  const parsed = transportConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(formatIssue));
  }
  const config: TransportConfig = parsed.data;
  return deepFreeze(config);
}

/**
 * Transport kind a capability is routed to.
 */
export function transportFor(config: TransportConfig, capability: CapabilityKind): TransportKind {
  return config.bindings[capability] ?? config.defaultTransport;
}
