/**
 * Message codec shared by every transport.
 *
 * Converts {@link Message} values to JSON-RPC 2.0 payload bytes and back.
 * The codec knows nothing about framing: the same message always produces
 * the same bytes, and each transport decides how to delimit them.
 *
 * @module protocol/codec
 */

import { TextDecoder } from 'node:util';
import { z } from 'zod';

import { DecodeError, EncodeError } from '../errors.js';
import {
  PROTOCOL,
  type ErrorMessage,
  type Message,
  type NotificationMessage,
  type RequestMessage,
  type ResponseMessage,
} from './types.js';

// =============================================================================
// Wire Schemas
// =============================================================================

const requestIdSchema = z.union([z.string(), z.number()]);

const paramsSchema = z.union([z.record(z.unknown()), z.array(z.unknown())]);

const errorPayloadSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional(),
});

const requestSchema = z.object({
  id: requestIdSchema,
  method: z.string().min(1),
  params: paramsSchema.optional(),
});

const notificationSchema = z.object({
  method: z.string().min(1),
  params: paramsSchema.optional(),
});

const responseSchema = z.object({
  id: requestIdSchema,
  result: z.unknown(),
});

const errorSchema = z.object({
  id: requestIdSchema.nullable(),
  error: errorPayloadSchema,
});

const utf8 = new TextDecoder('utf-8', { fatal: true });

// =============================================================================
// Helpers
// =============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join(', ');
}

function parseWith<T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new DecodeError('malformed', formatIssues(parsed.error));
  }
  return parsed.data;
}

function toWire(message: Message): Record<string, unknown> {
  const base = { jsonrpc: PROTOCOL.JSONRPC_VERSION };

  switch (message.type) {
    case 'request':
      return {
        ...base,
        id: message.id,
        method: message.method,
        ...(message.params !== undefined && { params: message.params }),
      };
    case 'notification':
      return {
        ...base,
        method: message.method,
        ...(message.params !== undefined && { params: message.params }),
      };
    case 'response':
      // `result` is mandatory on the wire, JSON has no undefined
      return { ...base, id: message.id, result: message.result ?? null };
    case 'error':
      return {
        ...base,
        id: message.id,
        error: {
          code: message.error.code,
          message: message.error.message,
          ...(message.error.data !== undefined && { data: message.error.data }),
        },
      };
  }
}

function fromWire(value: Record<string, unknown>): Message {
  const hasMethod = 'method' in value;
  const hasResult = 'result' in value;
  const hasError = 'error' in value;

  if (hasResult && hasError) {
    throw new DecodeError('malformed', 'response carries both result and error');
  }

  if (hasMethod) {
    if ('id' in value) {
      const request = parseWith(requestSchema, value);
      const message: RequestMessage = {
        type: 'request',
        id: request.id,
        method: request.method,
        ...(request.params !== undefined && { params: request.params }),
      };
      return message;
    }

    const notification = parseWith(notificationSchema, value);
    const message: NotificationMessage = {
      type: 'notification',
      method: notification.method,
      ...(notification.params !== undefined && { params: notification.params }),
    };
    return message;
  }

  if (hasResult) {
    const response = parseWith(responseSchema, value);
    const message: ResponseMessage = {
      type: 'response',
      id: response.id,
      result: response.result,
    };
    return message;
  }

  if (hasError) {
    const failure = parseWith(errorSchema, value);
    const message: ErrorMessage = {
      type: 'error',
      id: failure.id,
      error: {
        code: failure.error.code,
        message: failure.error.message,
        ...(failure.error.data !== undefined && { data: failure.error.data }),
      },
    };
    return message;
  }

  throw new DecodeError('unknown_variant', 'object has no method, result or error');
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Codec for protocol messages.
 *
 * @example
 * ```typescript
 * import { MessageCodec } from 'relayline';
 *
 * const bytes = MessageCodec.encode({ type: 'request', id: 1, method: 'add', params: { a: 2, b: 3 } });
 * const message = MessageCodec.decode(bytes);
 * ```
 */
export const MessageCodec = {
  /**
   * Encodes a message into UTF-8 JSON bytes.
   *
   * @throws {EncodeError} If the message contains values JSON cannot carry
   */
  encode(message: Message): Buffer {
    try {
      return Buffer.from(JSON.stringify(toWire(message)), 'utf8');
    } catch (error) {
      throw new EncodeError(error instanceof Error ? error.message : String(error));
    }
  },

  /**
   * Decodes one payload into a message.
   *
   * Unknown fields are ignored. Missing or mistyped required fields are not.
   *
   * @throws {DecodeError} If the payload is malformed or matches no variant
   */
  decode(payload: Uint8Array): Message {
    if (payload.length === 0) {
      throw new DecodeError('malformed', 'empty payload');
    }

    let text: string;
    try {
      text = utf8.decode(payload);
    } catch {
      throw new DecodeError('malformed', 'payload is not valid UTF-8');
    }

    if (text.trim().length === 0) {
      throw new DecodeError('malformed', 'empty payload');
    }

    let value: unknown;
    try {
      value = JSON.parse(text);
    } catch (error) {
      throw new DecodeError('malformed', error instanceof Error ? error.message : String(error));
    }

    if (Array.isArray(value)) {
      throw new DecodeError('unknown_variant', 'batch payloads are not supported');
    }

    if (!isPlainObject(value)) {
      throw new DecodeError('malformed', 'payload is not a JSON object');
    }

    if (value['jsonrpc'] !== PROTOCOL.JSONRPC_VERSION) {
      throw new DecodeError(
        'malformed',
        `expected jsonrpc "${PROTOCOL.JSONRPC_VERSION}", got ${JSON.stringify(value['jsonrpc'] ?? null)}`,
      );
    }

    return fromWire(value);
  },
} as const;
