import { describe, it, expect } from 'vitest';
import { EventStreamParser } from '../../src/protocol/event-stream-parser.js';

describe('EventStreamParser', () => {
  it('parses a complete event', () => {
    const parser = new EventStreamParser();

    expect(parser.push('event: endpoint\ndata: /messages\n\n')).toEqual([
      { event: 'endpoint', data: '/messages', id: undefined },
    ]);
  });

  it('defaults the event type to message', () => {
    const parser = new EventStreamParser();

    const [event] = parser.push('data: {}\n\n');

    expect(event?.event).toBe('message');
  });

  it('reassembles events split across chunks', () => {
    const parser = new EventStreamParser();

    expect(parser.push('id: 7\ndata: {"jsonrpc"')).toEqual([]);
    expect(parser.push(':"2.0"}\n')).toEqual([]);
    expect(parser.push('\n')).toEqual([
      { event: 'message', data: '{"jsonrpc":"2.0"}', id: '7' },
    ]);
    expect(parser.lastEventId).toBe('7');
  });

  it('joins multi-line data with newlines', () => {
    const parser = new EventStreamParser();

    const [event] = parser.push('data: first\ndata: second\n\n');

    expect(event?.data).toBe('first\nsecond');
  });

  it('accepts CRLF and CR line endings', () => {
    const parser = new EventStreamParser();

    const events = parser.push('data: a\r\n\r\ndata: b\r\rdata: c\n\n');

    expect(events.map((event) => event.data)).toEqual(['a', 'b', 'c']);
  });

  it('handles a CRLF pair split between chunks', () => {
    const parser = new EventStreamParser();

    expect(parser.push('data: a\r')).toEqual([]);
    const events = parser.push('\n\r\n');

    expect(events.map((event) => event.data)).toEqual(['a']);
  });

  it('ignores comments and unknown fields', () => {
    const parser = new EventStreamParser();

    const events = parser.push(': keep-alive\nfoo: bar\ndata: x\n\n');

    expect(events.map((event) => event.data)).toEqual(['x']);
  });

  it('does not dispatch an event without data', () => {
    const parser = new EventStreamParser();

    expect(parser.push('event: noop\n\n')).toEqual([]);
    expect(parser.push('data: y\n\n').map((event) => event.event)).toEqual(['message']);
  });

  it('keeps only one leading space of a value', () => {
    const parser = new EventStreamParser();

    expect(parser.push('data:  padded\n\n').map((event) => event.data)).toEqual([' padded']);
  });

  it('ignores retry fields', () => {
    const parser = new EventStreamParser();

    expect(parser.push('retry: 3000\ndata: x\n\n')).toEqual([{ event: 'message', data: 'x', id: undefined }]);
  });

  it('rejects an unterminated line longer than the limit', () => {
    const parser = new EventStreamParser(undefined, 8);

    expect(() => parser.push('data: 0123456789')).toThrow(
      new RangeError('Event-stream line exceeds maximum size of 8 characters'),
    );
    expect(parser.push('\ndata: ok\n\n')).toEqual([{ event: 'message', data: 'ok', id: undefined }]);
  });

  it('accepts complete lines longer than the limit', () => {
    const parser = new EventStreamParser(undefined, 8);

    expect(parser.push('data: 0123456789\n\n').map((event) => event.data)).toEqual(['0123456789']);
  });

  it('keeps the last event id across reset', () => {
    const parser = new EventStreamParser('41');
    parser.push('id: 42\ndata: partial');

    parser.reset();

    expect(parser.lastEventId).toBe('42');
    expect(parser.push('data: z\n\n')).toEqual([{ event: 'message', data: 'z', id: '42' }]);
  });
});
