/**
 * Little-endian reader/writer shared by the two asset codecs
 */

import { TextDecoder } from 'util';

import { BYTES_PER_FLOAT } from './config.js';
import { EncodingError, FormatError, TruncatedStreamError } from './errors.js';

const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Sequential reader over a byte buffer. Every read checks the remaining
 * length first and reports the offset of the field that did not fit.
 */
export class BinaryReader {
  private readonly buffer: Buffer;
  private position = 0;

  constructor(bytes: Uint8Array) {
    this.buffer = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get offset(): number {
    return this.position;
  }

  get remaining(): number {
    return this.buffer.length - this.position;
  }

  readU16(field: string): number {
    this.require(field, 2);
    const value = this.buffer.readUInt16LE(this.position);
    this.position += 2;
    return value;
  }

  readU32(field: string): number {
    this.require(field, 4);
    const value = this.buffer.readUInt32LE(this.position);
    this.position += 4;
    return value;
  }

  readUtf8(field: string, byteLength: number): string {
    this.require(field, byteLength);
    const start = this.position;
    const bytes = this.buffer.subarray(start, start + byteLength);
    let text: string;
    try {
      text = utf8.decode(bytes);
    } catch (err) {
      throw new EncodingError(`Invalid UTF-8 in ${field}: ${err instanceof Error ? err.message : String(err)}`, start);
    }
    this.position += byteLength;
    return text;
  }

  readF32Array(field: string, count: number): Float32Array {
    this.require(field, count * BYTES_PER_FLOAT);
    const out = new Float32Array(count);
    for (let i = 0; i < count; i++) {
      out[i] = this.buffer.readFloatLE(this.position);
      this.position += BYTES_PER_FLOAT;
    }
    return out;
  }

  /** Fails if anything follows the last declared record. */
  expectEnd(): void {
    if (this.remaining > 0) {
      throw new FormatError(`Unexpected ${this.remaining} trailing bytes`, this.position);
    }
  }

  private require(field: string, byteLength: number): void {
    if (byteLength > this.remaining) {
      throw new TruncatedStreamError(field, this.position, byteLength, this.remaining);
    }
  }
}

/**
 * Writer over a pre-sized buffer. Codecs compute the exact output size up
 * front so the whole asset is written in one allocation.
 */
export class BinaryWriter {
  private readonly buffer: Buffer;
  private position = 0;

  constructor(byteLength: number) {
    this.buffer = Buffer.alloc(byteLength);
  }

  writeU16(value: number): void {
    this.position = this.buffer.writeUInt16LE(value, this.position);
  }

  writeU32(value: number): void {
    this.position = this.buffer.writeUInt32LE(value, this.position);
  }

  writeBytes(bytes: Uint8Array): void {
    this.buffer.set(bytes, this.position);
    this.position += bytes.length;
  }

  writeF32Array(values: ArrayLike<number>): void {
    for (let i = 0; i < values.length; i++) {
      this.position = this.buffer.writeFloatLE(values[i] ?? 0, this.position);
    }
  }

  /** Returns the written bytes; throws if the pre-computed size was wrong. */
  finish(): Buffer {
    if (this.position !== this.buffer.length) {
      throw new FormatError(`Wrote ${this.position} of ${this.buffer.length} allocated bytes`, this.position);
    }
    return this.buffer;
  }
}
