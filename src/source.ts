import { isUtf8 } from 'buffer';
import { SourceLocation } from './errors';

export interface SourcePosition {
  readonly offset: number;
  /** 1-based */
  readonly line: number;
  /** 0-based, counted in bytes */
  readonly column: number;
}

export const START_POSITION: SourcePosition = { offset: 0, line: 1, column: 0 };

export const EOF = -1;

/**
 * An immutable byte buffer plus the display name used in diagnostics.
 */
export class SourceText {
  readonly bytes: Buffer;
  readonly name: string;

  constructor(input: Uint8Array | string, name = '<string>') {
    if (typeof input === 'string') {
      this.bytes = Buffer.from(input, 'utf8');
    } else if (Buffer.isBuffer(input)) {
      this.bytes = input;
    } else {
      this.bytes = Buffer.from(input);
    }
    this.name = name;
  }

  get length(): number {
    return this.bytes.length;
  }

  byteAt(offset: number): number {
    const value = this.bytes[offset];
    return value === undefined ? EOF : value;
  }

  /** The bytes in [start, end), one char per byte. */
  slice(start: number, end: number): string {
    const from = Math.max(0, Math.min(start, this.length));
    const to = Math.max(from, Math.min(end, this.length));
    return this.bytes.toString('latin1', from, to);
  }

  lineAt(offset: number): string {
    const at = Math.max(0, Math.min(offset, this.length));
    let start = at;
    while (start > 0 && this.bytes[start - 1] !== 0x0a) {
      start -= 1;
    }
    let end = at;
    while (end < this.length && this.bytes[end] !== 0x0a) {
      end += 1;
    }
    return readBytes(this.bytes.subarray(start, end)).replace(/\r$/, '');
  }

  locate(position: SourcePosition): SourceLocation {
    return {
      source: this.name,
      line: position.line,
      column: position.column,
      offset: position.offset,
      lineText: this.lineAt(position.offset),
    };
  }
}

/** UTF-8 where the bytes are valid UTF-8, otherwise latin1. */
export function readBytes(bytes: Buffer): string {
  return bytes.toString(isUtf8(bytes) ? 'utf8' : 'latin1');
}

/** Reads a one-char-per-byte string, as `SourceText.slice` returns. */
export function readByteString(text: string): string {
  return readBytes(Buffer.from(text, 'latin1'));
}
