/**
 * Incremental parser for `text/event-stream` bodies.
 *
 * Chunks may split lines, fields and even CRLF pairs anywhere; complete events
 * are emitted only when their terminating blank line has arrived.
 *
 * @module protocol/event-stream-parser
 */

import { MAX_LINE_SIZE } from './line-framer.js';

/**
 * One dispatched server-sent event.
 */
export interface ServerSentEvent {
  /** Event type (`message` when the stream does not name one) */
  readonly event: string;

  /** Data lines joined with `\n` */
  readonly data: string;

  /** Last event id in effect when the event was dispatched */
  readonly id: string | undefined;
}

/**
 * Parses server-sent events from text chunks.
 *
 * `retry:` fields are ignored; reconnection timing belongs to the
 * connection's backoff policy.
 *
 * @example
 * ```typescript
 * const parser = new EventStreamParser();
 * parser.push('id: 7\ndata: {"jsonrpc"');  // → []
 * parser.push(':"2.0"}\n\n');               // → [{ event: 'message', id: '7', ... }]
 * parser.lastEventId;                        // '7'
 * ```
 */
export class EventStreamParser {
  private buffer = '';
  private pendingCarriageReturn = false;

  private eventType = '';
  private dataLines: string[] = [];
  private hasData = false;
  private currentId: string | undefined;

  constructor(
    lastEventId?: string,
    private readonly maxLineSize: number = MAX_LINE_SIZE,
  ) {
    this.currentId = lastEventId;
  }

  /**
   * Id of the most recent event carrying an `id:` field.
   */
  get lastEventId(): string | undefined {
    return this.currentId;
  }

  /**
   * Feeds a chunk and returns the events it completes.
   *
   * @throws {RangeError} If an unterminated line grows past the size limit;
   *   partial input is discarded
   */
  push(chunk: string): ServerSentEvent[] {
    let text = chunk;

    // A CR at the end of the previous chunk may be the first half of CRLF
    if (this.pendingCarriageReturn) {
      this.pendingCarriageReturn = false;
      if (text.startsWith('\n')) {
        text = text.slice(1);
      }
    }

    // The carried-over partial line holds no terminators; scan only new text
    const scanFrom = this.buffer.length;
    this.buffer += text;
    const events: ServerSentEvent[] = [];

    let lineStart = 0;
    for (let i = scanFrom; i < this.buffer.length; i++) {
      const char = this.buffer[i];
      if (char !== '\n' && char !== '\r') {
        continue;
      }

      const line = this.buffer.slice(lineStart, i);

      if (char === '\r') {
        if (i + 1 < this.buffer.length) {
          if (this.buffer[i + 1] === '\n') {
            i++;
          }
        } else {
          this.pendingCarriageReturn = true;
        }
      }

      lineStart = i + 1;

      const event = this.processLine(line);
      if (event) {
        events.push(event);
      }
    }

    this.buffer = this.buffer.slice(lineStart);

    if (this.buffer.length > this.maxLineSize) {
      this.reset();
      throw new RangeError(`Event-stream line exceeds maximum size of ${this.maxLineSize} characters`);
    }

    return events;
  }

  /**
   * Discards partial input, keeping the last event id for resumption.
   */
  reset(): void {
    this.buffer = '';
    this.pendingCarriageReturn = false;
    this.clearEvent();
  }

  private processLine(line: string): ServerSentEvent | null {
    if (line.length === 0) {
      return this.dispatch();
    }

    if (line.startsWith(':')) {
      return null;
    }

    const colon = line.indexOf(':');
    const field = colon === -1 ? line : line.slice(0, colon);
    let value = colon === -1 ? '' : line.slice(colon + 1);
    if (value.startsWith(' ')) {
      value = value.slice(1);
    }

    switch (field) {
      case 'event':
        this.eventType = value;
        break;
      case 'data':
        this.dataLines.push(value);
        this.hasData = true;
        break;
      case 'id':
        // Ids containing NUL are ignored by the event-stream format
        if (!value.includes('\u0000')) {
          this.currentId = value;
        }
        break;
      default:
        break;
    }

    return null;
  }

  private dispatch(): ServerSentEvent | null {
    if (!this.hasData) {
      this.clearEvent();
      return null;
    }

    const event: ServerSentEvent = {
      event: this.eventType.length > 0 ? this.eventType : 'message',
      data: this.dataLines.join('\n'),
      id: this.currentId,
    };

    this.clearEvent();
    return event;
  }

  private clearEvent(): void {
    this.eventType = '';
    this.dataLines = [];
    this.hasData = false;
  }
}
