import { describe, it, expect } from 'vitest';
import { LineFramer, frameLine } from '../../src/protocol/line-framer.js';

function texts(frames: Buffer[]): string[] {
  return frames.map((frame) => frame.toString('utf8'));
}

describe('LineFramer', () => {
  it('frames a payload with a trailing newline', () => {
    expect(frameLine(Buffer.from('{"a":1}')).toString('utf8')).toBe('{"a":1}\n');
  });

  it('splits complete lines', () => {
    const framer = new LineFramer();

    expect(texts(framer.push(Buffer.from('one\ntwo\n')))).toEqual(['one', 'two']);
    expect(framer.pending).toBe(0);
  });

  it('keeps a partial line until its terminator arrives', () => {
    const framer = new LineFramer();

    expect(texts(framer.push(Buffer.from('{"a":1}\n{"b"')))).toEqual(['{"a":1}']);
    expect(framer.pending).toBe(4);
    expect(texts(framer.push(Buffer.from(':2}\n')))).toEqual(['{"b":2}']);
  });

  it('strips carriage returns and skips blank lines', () => {
    const framer = new LineFramer();

    expect(texts(framer.push(Buffer.from('one\r\n\r\n\ntwo\n')))).toEqual(['one', 'two']);
  });

  it('reassembles multi-byte characters split across chunks', () => {
    const framer = new LineFramer();
    const bytes = Buffer.from('"žluť"\n', 'utf8');

    expect(framer.push(bytes.subarray(0, 3))).toEqual([]);
    expect(texts(framer.push(bytes.subarray(3)))).toEqual(['"žluť"']);
  });

  it('drops partial input on reset', () => {
    const framer = new LineFramer();
    framer.push(Buffer.from('partial'));

    framer.reset();

    expect(framer.pending).toBe(0);
    expect(texts(framer.push(Buffer.from('next\n')))).toEqual(['next']);
  });
});
