/**
 * LineFramer: splits an inbound byte stream into protocol lines.
 *
 * Bytes are buffered until a `\n` arrives; partial trailing bytes stay
 * buffered for the next chunk. A trailing `\r` is dropped and blank lines
 * are skipped. A line longer than `maxLineBytes` is discarded whole, even
 * when it spans many chunks, and reported once through `onOversizedLine`.
 */

import { MAX_LINE_BYTES } from '../types/protocol.js';

const NEWLINE = 0x0a;

export interface LineFramerOptions {
  maxLineBytes?: number;
  /** Called once per discarded line with the number of bytes seen so far. */
  onOversizedLine?: (byteLength: number) => void;
}

export class LineFramer {
  private readonly maxLineBytes: number;
  private readonly onOversizedLine: (byteLength: number) => void;
  private pending: Buffer[] = [];
  private pendingBytes = 0;
  /** Set while dropping the rest of an oversized line. */
  private discarding = false;

  constructor(options: LineFramerOptions = {}) {
    this.maxLineBytes = options.maxLineBytes ?? MAX_LINE_BYTES;
    this.onOversizedLine = options.onOversizedLine ?? (() => undefined);
  }

  /** Bytes held for an incomplete line. */
  get bufferedBytes(): number {
    return this.pendingBytes;
  }

  /** Feed one chunk; returns the complete lines it finished, in order. */
  push(chunk: Buffer): string[] {
    const lines: string[] = [];
    let start = 0;
    let newline = chunk.indexOf(NEWLINE, start);

    while (newline !== -1) {
      const segment = chunk.subarray(start, newline);
      if (this.discarding) {
        this.discarding = false;
      } else {
        const length = this.pendingBytes + segment.length;
        if (length > this.maxLineBytes) {
          this.onOversizedLine(length);
        } else {
          const line = this.decode(segment);
          if (line.trim().length > 0) lines.push(line);
        }
      }
      this.pending = [];
      this.pendingBytes = 0;
      start = newline + 1;
      newline = chunk.indexOf(NEWLINE, start);
    }

    if (start < chunk.length && !this.discarding) {
      const rest = chunk.subarray(start);
      this.pending.push(rest);
      this.pendingBytes += rest.length;
      if (this.pendingBytes > this.maxLineBytes) {
        this.onOversizedLine(this.pendingBytes);
        this.pending = [];
        this.pendingBytes = 0;
        this.discarding = true;
      }
    }
    return lines;
  }

  /** Drop buffered bytes, e.g. after the connection closed. */
  reset(): void {
    this.pending = [];
    this.pendingBytes = 0;
    this.discarding = false;
  }

  private decode(segment: Buffer): string {
    const bytes = this.pending.length === 0 ? segment : Buffer.concat([...this.pending, segment]);
    const text = bytes.toString('utf-8');
    return text.endsWith('\r') ? text.slice(0, -1) : text;
  }
}
