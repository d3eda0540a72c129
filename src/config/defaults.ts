/**
 * Default timings for transports and connection management.
 *
 * @module config/defaults
 */

/**
 * Default configuration values.
 */
export const TRANSPORT_DEFAULTS = {
  /** Delay before the first reconnection attempt */
  RECONNECT_BASE_DELAY_MS: 500,

  /** Upper bound for any reconnection delay */
  RECONNECT_MAX_DELAY_MS: 30_000,

  /** Random spread added to each delay, as a fraction of it */
  RECONNECT_JITTER: 0.2,

  /** Reconnection attempts before a connection is declared failed */
  RECONNECT_MAX_ATTEMPTS: 5,

  /** Interval between liveness probes while active */
  HEARTBEAT_INTERVAL_MS: 15_000,

  /** Confirmation probes made while degraded */
  MAX_PROBE_ATTEMPTS: 3,

  /** Spacing between confirmation probes */
  PROBE_INTERVAL_MS: 1_000,

  /** Deadline applied to calls that do not set their own */
  CALL_TIMEOUT_MS: 30_000,

  /** How often expired calls are swept */
  SWEEP_INTERVAL_MS: 100,

  /** Time a child process gets to exit after SIGTERM */
  CLOSE_GRACE_MS: 2_000,

  /** Time allowed for a socket or stream to connect */
  CONNECT_TIMEOUT_MS: 10_000,

  /** Silence after which an event stream counts as stalled */
  STALL_TIMEOUT_MS: 45_000,

  /** Time a socket has to answer a ping */
  HEARTBEAT_TIMEOUT_MS: 5_000,

  /** Idle time before TCP keep-alive probes start */
  TCP_KEEPALIVE_MS: 30_000,

  /** Default WebSocket path */
  SOCKET_PATH: '/',
} as const;
