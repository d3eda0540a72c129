/**
 * Transport contract shared by every substrate.
 *
 * @module transport/types
 */

import type { TransportKind } from '../errors.js';
import type { Logger } from '../logging/index.js';

export type { TransportKind } from '../errors.js';

/**
 * One bidirectional channel carrying whole encoded payloads.
 *
 * Transports know nothing about message semantics: they frame bytes
 * produced by the codec and hand back whole payloads.
 *
 * - `receive` resolves with exactly one payload. A non-fatal failure rejects
 *   the current call only; a fatal one rejects every call until `open`
 *   succeeds again.
 * - A closed transport may be opened again.
 */
export interface Transport {
  readonly kind: TransportKind;

  /** Establishes the channel. Resolves once payloads can be sent. */
  open(): Promise<void>;

  /** Sends one encoded payload. */
  send(payload: Buffer): Promise<void>;

  /** Waits for the next inbound payload. */
  receive(): Promise<Buffer>;

  /** Confirms the peer is still reachable. Rejects when it is not. */
  probe(): Promise<void>;

  /** Releases the channel. Pending receives reject. */
  close(): Promise<void>;

  isOpen(): boolean;
}

/**
 * Supplies a credential before each `open()` of socket and event-stream
 * transports. Returning nothing opens without an `Authorization` header.
 */
export type AuthTokenProvider = () =>
  | string
  | null
  | undefined
  | Promise<string | null | undefined>;

/**
 * Options common to every transport.
 */
export interface TransportOptions {
  readonly logger?: Logger;
  readonly authTokenProvider?: AuthTokenProvider;
}

/**
 * Resolves the `Authorization` header for an open attempt.
 */
export async function authorizationHeader(
  provider: AuthTokenProvider | undefined,
): Promise<Record<string, string>> {
  if (provider === undefined) {
    return {};
  }
  const token = await provider();
  return token ? { Authorization: `Bearer ${token}` } : {};
}
