import { describe, it, expect, vi } from 'vitest';
import { LineFramer } from './line-framer.js';

const bytes = (text: string): Buffer => Buffer.from(text, 'utf-8');

describe('LineFramer', () => {
  it('splits a chunk into lines', () => {
    const framer = new LineFramer();

    expect(framer.push(bytes('{"a":1}\n{"b":2}\n'))).toEqual(['{"a":1}', '{"b":2}']);
    expect(framer.bufferedBytes).toBe(0);
  });

  it('keeps a partial trailing line for the next chunk', () => {
    const framer = new LineFramer();

    expect(framer.push(bytes('{"a":'))).toEqual([]);
    expect(framer.bufferedBytes).toBe(5);
    expect(framer.push(bytes('1}\n{"b"'))).toEqual(['{"a":1}']);
    expect(framer.bufferedBytes).toBe(4);
  });

  it('drops a trailing carriage return', () => {
    const framer = new LineFramer();

    expect(framer.push(bytes('x\r\ny\n'))).toEqual(['x', 'y']);
  });

  it('skips blank lines', () => {
    const framer = new LineFramer();

    expect(framer.push(bytes('\n\r\n  \nz\n'))).toEqual(['z']);
  });

  it('reassembles a multi-byte character split across chunks', () => {
    const framer = new LineFramer();
    const encoded = bytes('é\n');

    expect(framer.push(encoded.subarray(0, 1))).toEqual([]);
    expect(framer.push(encoded.subarray(1))).toEqual(['é']);
  });

  it('discards an oversized line inside one chunk', () => {
    const onOversizedLine = vi.fn();
    const framer = new LineFramer({ maxLineBytes: 4, onOversizedLine });

    expect(framer.push(bytes('abcdefgh\nok\n'))).toEqual(['ok']);
    expect(onOversizedLine).toHaveBeenCalledOnce();
    expect(onOversizedLine).toHaveBeenCalledWith(8);
  });

  it('discards an oversized line spanning chunks and reports it once', () => {
    const onOversizedLine = vi.fn();
    const framer = new LineFramer({ maxLineBytes: 4, onOversizedLine });

    expect(framer.push(bytes('abcdef'))).toEqual([]);
    expect(framer.bufferedBytes).toBe(0);
    expect(framer.push(bytes('ghij'))).toEqual([]);
    expect(framer.push(bytes('kl\nok\n'))).toEqual(['ok']);
    expect(onOversizedLine).toHaveBeenCalledOnce();
    expect(onOversizedLine).toHaveBeenCalledWith(6);
  });

  it('accepts a line of exactly the limit', () => {
    const framer = new LineFramer({ maxLineBytes: 4 });

    expect(framer.push(bytes('abcd\n'))).toEqual(['abcd']);
  });

  it('forgets buffered bytes on reset', () => {
    const framer = new LineFramer();
    framer.push(bytes('partial'));
    framer.reset();

    expect(framer.bufferedBytes).toBe(0);
    expect(framer.push(bytes('next\n'))).toEqual(['next']);
  });
});
